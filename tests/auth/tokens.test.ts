import jwt from 'jsonwebtoken';
import { describe, expect, it } from 'vitest';

import { TokenService } from '../../src/auth/tokens';
import { AuthenticationError } from '../../src/errors';
import { createClock } from '../helpers';

const CONFIG = { secretKey: 'test-secret-key-0123456789', algorithm: 'HS256' as const, tokenLifetimeMinutes: 60 };

function captureError(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    return undefined;
}

describe('TokenService', () => {
    it('issues a token that validates to the same subject', () => {
        const clock = createClock();
        const tokens = new TokenService(CONFIG, clock.now);

        const issued = tokens.issue({ username: 'ash' });
        const claims = tokens.validate(issued.token);

        expect(issued.tokenType).toBe('bearer');
        expect(issued.expiresAt.getTime()).toBe(clock.now() + 60 * 60 * 1000);
        expect(claims.subject).toBe('ash');
        expect(claims.issuedAt.getTime()).toBe(clock.now());
        expect(claims.expiresAt).toEqual(issued.expiresAt);
    });

    it('accepts the token until just before expiry and rejects it at expiry', () => {
        const clock = createClock();
        const tokens = new TokenService(CONFIG, clock.now);
        const { token } = tokens.issue({ username: 'ash' });

        clock.advance(60 * 60 * 1000 - 1000);
        expect(tokens.validate(token).subject).toBe('ash');

        clock.advance(1000);
        const error = captureError(() => tokens.validate(token));
        expect(error).toBeInstanceOf(AuthenticationError);
        expect(error).toMatchObject({ code: 'TOKEN_EXPIRED', statusCode: 401, message: 'Token has expired' });
    });

    it('rejects a token signed with another secret', () => {
        const clock = createClock();
        const other = new TokenService({ ...CONFIG, secretKey: 'another-secret-key-000000' }, clock.now);
        const tokens = new TokenService(CONFIG, clock.now);

        const error = captureError(() => tokens.validate(other.issue({ username: 'ash' }).token));
        expect(error).toMatchObject({ code: 'TOKEN_INVALID', message: 'Could not validate credentials' });
    });

    it('rejects a token signed with a different algorithm', () => {
        const clock = createClock();
        const hs512 = new TokenService({ ...CONFIG, algorithm: 'HS512' }, clock.now);
        const tokens = new TokenService(CONFIG, clock.now);

        expect(captureError(() => tokens.validate(hs512.issue({ username: 'ash' }).token))).toMatchObject({
            code: 'TOKEN_INVALID',
        });
    });

    it('rejects a tampered payload', () => {
        const clock = createClock();
        const tokens = new TokenService(CONFIG, clock.now);
        const [header, , signature] = tokens.issue({ username: 'ash' }).token.split('.');
        const forgedPayload = Buffer.from(JSON.stringify({ sub: 'misty', iat: 1, exp: 9999999999 })).toString(
            'base64url'
        );

        expect(captureError(() => tokens.validate(`${header}.${forgedPayload}.${signature}`))).toMatchObject({
            code: 'TOKEN_INVALID',
        });
    });

    it('rejects malformed tokens', () => {
        const tokens = new TokenService(CONFIG);
        expect(captureError(() => tokens.validate('not-a-token'))).toMatchObject({ code: 'TOKEN_INVALID' });
    });

    it('rejects a correctly signed token without a subject', () => {
        const clock = createClock();
        const tokens = new TokenService(CONFIG, clock.now);
        const iat = Math.floor(clock.now() / 1000);
        const token = jwt.sign({ iat, scope: 'none' }, CONFIG.secretKey, { algorithm: 'HS256', expiresIn: 60 });

        expect(captureError(() => tokens.validate(token))).toMatchObject({ code: 'TOKEN_INVALID' });
    });
});

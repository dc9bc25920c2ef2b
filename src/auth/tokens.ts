/**
 * Issues and validates signed, time-bounded bearer tokens.
 *
 * Tokens are stateless: there is no server-side session table and no
 * revocation list, so a token stays valid until its `exp` passes.
 */

import jwt, { JsonWebTokenError, TokenExpiredError, type JwtPayload } from 'jsonwebtoken';

import { AuthenticationError } from '../errors';
import type { AuthConfig, IssuedToken, TokenClaims } from './types';
import { Logger } from '../utils/logger';

const logger = new Logger('TokenService');

export type Clock = () => number;

export class TokenService {
    private config: Pick<AuthConfig, 'secretKey' | 'algorithm' | 'tokenLifetimeMinutes'>;
    private now: Clock;

    constructor(config: Pick<AuthConfig, 'secretKey' | 'algorithm' | 'tokenLifetimeMinutes'>, now: Clock = Date.now) {
        this.config = config;
        this.now = now;
    }

    /**
     * Sign a token whose subject is the account's username.
     */
    issue(account: { username: string }): IssuedToken {
        const issuedAt = Math.floor(this.now() / 1000);
        const lifetimeSeconds = this.config.tokenLifetimeMinutes * 60;
        const token = jwt.sign({ sub: account.username, iat: issuedAt }, this.config.secretKey, {
            algorithm: this.config.algorithm,
            expiresIn: lifetimeSeconds,
        });
        logger.debug('Issued token', { subject: account.username });
        return {
            token,
            tokenType: 'bearer',
            expiresAt: new Date((issuedAt + lifetimeSeconds) * 1000),
        };
    }

    /**
     * Verify signature, algorithm and expiry, returning the embedded claims.
     */
    validate(token: string): TokenClaims {
        let payload: string | JwtPayload;
        try {
            payload = jwt.verify(token, this.config.secretKey, {
                algorithms: [this.config.algorithm],
                clockTimestamp: Math.floor(this.now() / 1000),
            });
        } catch (err) {
            if (err instanceof TokenExpiredError) {
                throw new AuthenticationError('Token has expired', 'TOKEN_EXPIRED');
            }
            if (err instanceof JsonWebTokenError) {
                logger.warn('Token verification failed', { reason: err.message });
                throw new AuthenticationError('Could not validate credentials', 'TOKEN_INVALID');
            }
            throw err;
        }

        if (
            typeof payload === 'string' ||
            typeof payload.sub !== 'string' ||
            payload.sub.length === 0 ||
            typeof payload.iat !== 'number' ||
            typeof payload.exp !== 'number'
        ) {
            throw new AuthenticationError('Could not validate credentials', 'TOKEN_INVALID');
        }

        return {
            subject: payload.sub,
            issuedAt: new Date(payload.iat * 1000),
            expiresAt: new Date(payload.exp * 1000),
        };
    }
}

/**
 * Bearer-token authentication for protected routes.
 */

import type { IncomingHttpHeaders } from 'http';

import { AuthenticationError } from '../errors';
import { AuthService } from './service';
import type { Identity } from './types';
import { Logger } from '../utils/logger';

const logger = new Logger('AuthMiddleware');

const BEARER = /^Bearer\s+(\S+)\s*$/i;

export class AuthMiddleware {
    private authService: AuthService;

    constructor(authService: AuthService) {
        this.authService = authService;
    }

    /**
     * Resolve the caller from the Authorization header or fail with 401.
     */
    async authenticate(headers: IncomingHttpHeaders): Promise<Identity> {
        const header = headers['authorization'];
        if (!header) {
            logger.debug('No authorization token provided');
            throw new AuthenticationError('Not authenticated', 'TOKEN_MISSING');
        }

        const match = BEARER.exec(header);
        if (!match) {
            logger.warn('Malformed authorization header');
            throw new AuthenticationError('Could not validate credentials', 'TOKEN_INVALID');
        }

        const identity = await this.authService.resolve(match[1]);
        logger.debug(`Authenticated user ${identity.userId}`);
        return identity;
    }
}

/**
 * Authentication service handling registration, login and identity lookup.
 */

import { AuthenticationError, ConflictError, ValidationError } from '../errors';
import { isUniqueViolation } from '../db/connection';
import { UserRepository } from '../db/user-repo';
import { checkPasswordStrength } from './password-policy';
import { TokenService } from './tokens';
import type { Account, AuthConfig, Identity, IssuedToken } from './types';
import { hashPassword, comparePassword } from '../utils/crypto';
import { Logger } from '../utils/logger';

const logger = new Logger('AuthService');

const INVALID_CREDENTIALS = 'Incorrect username or password';

export interface LoginResult extends IssuedToken {
    account: Account;
}

export class AuthService {
    private config: AuthConfig;
    private users: UserRepository;
    private tokens: TokenService;
    private dummyHash?: Promise<string>;

    constructor(config: AuthConfig, users: UserRepository, tokens: TokenService) {
        this.config = config;
        this.users = users;
        this.tokens = tokens;
    }

    /**
     * Create an account after enforcing the password policy and username uniqueness.
     */
    async register(username: string, password: string): Promise<Account> {
        const strength = checkPasswordStrength(password);
        if (!strength.ok) {
            logger.warn('Register failed (weak password)', { username });
            throw new ValidationError(
                'Password is too weak',
                'WEAK_PASSWORD',
                strength.problems.map((message) => ({ path: 'password', message }))
            );
        }

        if (await this.users.findByUsername(username)) {
            logger.warn('Register failed (duplicate)', { username });
            throw new ConflictError('Username already registered', 'DUPLICATE_USERNAME');
        }

        const passwordHash = await hashPassword(password, this.config.passwordHashRounds);
        try {
            const account = await this.users.create({ username, passwordHash });
            logger.info('User registered successfully', { userId: account.id, username });
            return account;
        } catch (err) {
            if (isUniqueViolation(err)) {
                throw new ConflictError('Username already registered', 'DUPLICATE_USERNAME');
            }
            throw err;
        }
    }

    /**
     * Check credentials. Every failure looks the same to the caller.
     */
    async verify(username: string, password: string): Promise<Account> {
        const account = await this.users.findByUsername(username);
        if (!account) {
            // burn the same bcrypt work as a real comparison
            await comparePassword(password, await this.getDummyHash());
            logger.warn('Login failed (bad credentials)', { username });
            throw new AuthenticationError(INVALID_CREDENTIALS, 'INVALID_CREDENTIALS');
        }

        const matches = await comparePassword(password, account.passwordHash);
        if (!matches || !account.isActive) {
            logger.warn('Login failed (bad credentials)', { username });
            throw new AuthenticationError(INVALID_CREDENTIALS, 'INVALID_CREDENTIALS');
        }
        return account;
    }

    /**
     * Authenticate a user with username and password and issue a bearer token.
     */
    async login(username: string, password: string): Promise<LoginResult> {
        const account = await this.verify(username, password);
        const issued = this.tokens.issue(account);
        logger.info('Login successful', { userId: account.id, username });
        return { ...issued, account };
    }

    /**
     * Turn a bearer token into the identity of a still-active account.
     */
    async resolve(token: string): Promise<Identity> {
        const claims = this.tokens.validate(token);
        const account = await this.users.findByUsername(claims.subject);
        if (!account || !account.isActive) {
            logger.warn('Token subject does not map to an active account', { subject: claims.subject });
            throw new AuthenticationError('Could not validate credentials', 'TOKEN_INVALID');
        }
        return { userId: account.id, username: account.username };
    }

    async getAccount(identity: Identity): Promise<Account> {
        const account = await this.users.findById(identity.userId);
        if (!account) {
            throw new AuthenticationError('Could not validate credentials', 'TOKEN_INVALID');
        }
        return account;
    }

    private getDummyHash(): Promise<string> {
        if (!this.dummyHash) {
            this.dummyHash = hashPassword('not-a-real-password', this.config.passwordHashRounds);
        }
        return this.dummyHash;
    }
}

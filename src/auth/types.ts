/**
 * Core authentication types for the application.
 */

import type { SigningAlgorithm } from '../config';

export interface Account {
    id: number;
    username: string;
    passwordHash: string;
    isActive: boolean;
    createdAt: Date;
}

/**
 * Account as it may leave the service: never carries the hash.
 */
export interface PublicAccount {
    id: number;
    username: string;
    isActive: boolean;
    createdAt: Date;
}

/**
 * Caller resolved from a valid bearer token.
 */
export interface Identity {
    userId: number;
    username: string;
}

export interface TokenClaims {
    subject: string;
    issuedAt: Date;
    expiresAt: Date;
}

export interface IssuedToken {
    token: string;
    tokenType: 'bearer';
    expiresAt: Date;
}

export interface AuthConfig {
    secretKey: string;
    algorithm: SigningAlgorithm;
    tokenLifetimeMinutes: number;
    passwordHashRounds: number;
}

export function toPublicAccount(account: Account): PublicAccount {
    return {
        id: account.id,
        username: account.username,
        isActive: account.isActive,
        createdAt: account.createdAt,
    };
}

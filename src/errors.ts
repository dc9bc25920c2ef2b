/**
 * Typed application errors. Each carries the HTTP status and a stable code;
 * translation into a response body happens only in the error middleware.
 */

export type ErrorCode =
    | 'VALIDATION_FAILED'
    | 'WEAK_PASSWORD'
    | 'INVALID_CREDENTIALS'
    | 'TOKEN_MISSING'
    | 'TOKEN_INVALID'
    | 'TOKEN_EXPIRED'
    | 'ORIGIN_NOT_ALLOWED'
    | 'NOT_FOUND'
    | 'DUPLICATE_USERNAME'
    | 'DUPLICATE_ENTRY'
    | 'RATE_LIMITED'
    | 'UPSTREAM_UNAVAILABLE'
    | 'INTERNAL_ERROR';

export interface ErrorDetail {
    path: string;
    message: string;
}

export class AppError extends Error {
    constructor(
        message: string,
        public readonly statusCode: number,
        public readonly code: ErrorCode,
        public readonly headers: Record<string, string> = {}
    ) {
        super(message);
        this.name = 'AppError';
    }
}

export class ValidationError extends AppError {
    constructor(
        message: string,
        code: 'VALIDATION_FAILED' | 'WEAK_PASSWORD' = 'VALIDATION_FAILED',
        public readonly details: ErrorDetail[] = []
    ) {
        super(message, 400, code);
        this.name = 'ValidationError';
    }
}

export class AuthenticationError extends AppError {
    constructor(
        message: string,
        code: 'INVALID_CREDENTIALS' | 'TOKEN_MISSING' | 'TOKEN_INVALID' | 'TOKEN_EXPIRED'
    ) {
        super(message, 401, code, { 'WWW-Authenticate': 'Bearer' });
        this.name = 'AuthenticationError';
    }
}

export class ForbiddenOriginError extends AppError {
    constructor() {
        super('Origin not allowed', 403, 'ORIGIN_NOT_ALLOWED');
        this.name = 'ForbiddenOriginError';
    }
}

/**
 * Covers both "does not exist" and "belongs to someone else".
 */
export class NotFoundError extends AppError {
    constructor(message: string = 'Resource not found') {
        super(message, 404, 'NOT_FOUND');
        this.name = 'NotFoundError';
    }
}

export class ConflictError extends AppError {
    constructor(message: string, code: 'DUPLICATE_USERNAME' | 'DUPLICATE_ENTRY') {
        super(message, 409, code);
        this.name = 'ConflictError';
    }
}

export class RateLimitExceededError extends AppError {
    constructor(public readonly retryAfterSeconds: number) {
        super('Rate limit exceeded', 429, 'RATE_LIMITED', {
            'Retry-After': String(retryAfterSeconds),
        });
        this.name = 'RateLimitExceededError';
    }
}

/**
 * The external Pokémon data service failed or timed out. Safe to retry.
 */
export class UpstreamUnavailableError extends AppError {
    constructor(message: string, public readonly timedOut: boolean = false) {
        super(message, timedOut ? 504 : 502, 'UPSTREAM_UNAVAILABLE');
        this.name = 'UpstreamUnavailableError';
    }
}

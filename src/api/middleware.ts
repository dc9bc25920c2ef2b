/**
 * Cross-cutting express middleware: request logging, origin allow-list and
 * the error boundary that turns typed errors into responses.
 */

import cors from 'cors';
import type { ErrorRequestHandler, NextFunction, Request, RequestHandler, Response } from 'express';

import { AppError, ForbiddenOriginError, NotFoundError, ValidationError } from '../errors';
import { Logger } from '../utils/logger';

const logger = new Logger('Http');

export function requestLogger(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const startedAt = process.hrtime.bigint();
        logger.info(`Request: ${req.method} ${req.path}`);
        res.on('finish', () => {
            const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
            logger.info(`Response: ${req.method} ${req.path}`, {
                status: res.statusCode,
                durationMs: Math.round(durationMs * 10) / 10,
            });
        });
        next();
    };
}

/**
 * Reject browser requests from origins outside the allow-list, then add
 * CORS headers for the allowed ones.
 */
export function originPolicy(allowedOrigins: string[]): RequestHandler[] {
    const allowed = new Set(allowedOrigins);
    const guard = (req: Request, _res: Response, next: NextFunction): void => {
        const origin = req.headers.origin;
        if (origin !== undefined && !allowed.has(origin)) {
            logger.warn('Origin rejected', { origin, method: req.method, path: req.path });
            next(new ForbiddenOriginError());
            return;
        }
        next();
    };

    return [
        guard,
        cors({
            origin: [...allowed],
            credentials: true,
            methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE'],
            allowedHeaders: ['Authorization', 'Content-Type'],
            maxAge: 3600,
        }),
    ];
}

export function notFound(): RequestHandler {
    return (_req: Request, _res: Response, next: NextFunction): void => {
        next(new NotFoundError('Route not found'));
    };
}

interface BodyParserError {
    status: number;
    type: string;
}

function isBodyParserError(err: unknown): err is BodyParserError {
    return (
        typeof err === 'object' &&
        err !== null &&
        'type' in err &&
        typeof err.type === 'string' &&
        'status' in err &&
        typeof err.status === 'number'
    );
}

function toAppError(err: unknown): AppError | null {
    if (err instanceof AppError) {
        return err;
    }
    if (isBodyParserError(err) && err.status >= 400 && err.status < 500) {
        if (err.type === 'entity.parse.failed') {
            return new ValidationError('Malformed request body');
        }
        return new AppError('Request body rejected', err.status, 'VALIDATION_FAILED');
    }
    return null;
}

export function errorHandler(): ErrorRequestHandler {
    return (err: unknown, req: Request, res: Response, next: NextFunction): void => {
        if (res.headersSent) {
            next(err);
            return;
        }

        const appError = toAppError(err);
        if (!appError) {
            logger.error('Unhandled error', {
                method: req.method,
                path: req.path,
                error: err,
                stack: err instanceof Error ? err.stack : undefined,
            });
            res.status(500).json({ error: 'Internal server error', code: 'INTERNAL_ERROR' });
            return;
        }

        if (appError.statusCode >= 500) {
            logger.error(appError.message, { method: req.method, path: req.path, code: appError.code });
        }
        for (const [name, value] of Object.entries(appError.headers)) {
            res.setHeader(name, value);
        }
        const body: Record<string, unknown> = { error: appError.message, code: appError.code };
        if (appError instanceof ValidationError && appError.details.length > 0) {
            body.details = appError.details;
        }
        res.status(appError.statusCode).json(body);
    };
}

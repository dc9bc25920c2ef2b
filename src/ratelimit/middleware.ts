/**
 * Express middleware enforcing a route group's quota per client IP.
 */

import type { NextFunction, Request, RequestHandler, Response } from 'express';

import { RateLimitExceededError } from '../errors';
import { FixedWindowRateLimiter, type RateLimitQuota } from './limiter';
import type { RouteGroup } from './policies';
import { Logger } from '../utils/logger';

const logger = new Logger('RateLimit');

export function clientIp(req: Request): string {
    return req.ip ?? req.socket.remoteAddress ?? 'unknown';
}

export function rateLimit(limiter: FixedWindowRateLimiter, group: RouteGroup, quota: RateLimitQuota): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
        const ip = clientIp(req);
        const decision = limiter.hit(`${group}:${ip}`, quota);

        res.setHeader('X-RateLimit-Limit', String(decision.limit));
        res.setHeader('X-RateLimit-Remaining', String(decision.remaining));
        res.setHeader('X-RateLimit-Reset', String(Math.ceil(decision.resetAt / 1000)));

        if (!decision.allowed) {
            logger.warn('Rate limit exceeded', { group, ip, method: req.method, path: req.path });
            next(new RateLimitExceededError(decision.retryAfterSeconds));
            return;
        }
        next();
    };
}

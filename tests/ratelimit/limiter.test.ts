import { describe, expect, it } from 'vitest';

import { FixedWindowRateLimiter } from '../../src/ratelimit/limiter';
import { RATE_LIMITS } from '../../src/ratelimit/policies';
import { createClock } from '../helpers';

describe('FixedWindowRateLimiter', () => {
    const quota = { limit: 3, windowMs: 60_000 };

    it('rejects the request after the quota within one window', () => {
        const clock = createClock();
        const limiter = new FixedWindowRateLimiter(clock.now);

        const remaining = [1, 2, 3].map(() => limiter.hit('login:1.2.3.4', quota).remaining);
        const rejected = limiter.hit('login:1.2.3.4', quota);

        expect(remaining).toEqual([2, 1, 0]);
        expect(rejected).toEqual({
            allowed: false,
            limit: 3,
            remaining: 0,
            resetAt: clock.now() + 60_000,
            retryAfterSeconds: 60,
        });
    });

    it('allows requests again once the window has passed', () => {
        const clock = createClock();
        const limiter = new FixedWindowRateLimiter(clock.now);
        for (let i = 0; i < 4; i++) limiter.hit('k', quota);

        clock.advance(59_999);
        expect(limiter.hit('k', quota).allowed).toBe(false);

        clock.advance(1);
        const decision = limiter.hit('k', quota);
        expect(decision.allowed).toBe(true);
        expect(decision.remaining).toBe(2);
    });

    it('rejected requests do not extend the window', () => {
        const clock = createClock();
        const limiter = new FixedWindowRateLimiter(clock.now);
        const first = limiter.hit('k', quota);
        for (let i = 0; i < 10; i++) {
            clock.advance(1000);
            limiter.hit('k', quota);
        }
        expect(limiter.hit('k', quota).resetAt).toBe(first.resetAt);
    });

    it('keeps independent counters per key', () => {
        const limiter = new FixedWindowRateLimiter(createClock().now);
        for (let i = 0; i < 3; i++) limiter.hit('search:10.0.0.1', quota);

        expect(limiter.hit('search:10.0.0.1', quota).allowed).toBe(false);
        expect(limiter.hit('search:10.0.0.2', quota).allowed).toBe(true);
        expect(limiter.hit('login:10.0.0.1', quota).allowed).toBe(true);
    });

    it('reports retry-after rounded up to whole seconds', () => {
        const clock = createClock();
        const limiter = new FixedWindowRateLimiter(clock.now);
        for (let i = 0; i < 3; i++) limiter.hit('k', quota);

        clock.advance(58_500);
        expect(limiter.hit('k', quota).retryAfterSeconds).toBe(2);
    });

    it('sweeps expired windows', () => {
        const clock = createClock();
        const limiter = new FixedWindowRateLimiter(clock.now);
        limiter.hit('a', quota);
        limiter.hit('b', quota);
        expect(limiter.size).toBe(2);

        clock.advance(120_000);
        limiter.hit('c', quota);
        expect(limiter.size).toBe(1);
    });

    it('never lets more than the quota through for a burst of calls', () => {
        const limiter = new FixedWindowRateLimiter(createClock().now);
        const allowed = Array.from({ length: 50 }, () => limiter.hit('burst', RATE_LIMITS.search)).filter(
            (decision) => decision.allowed
        );
        expect(allowed).toHaveLength(30);
    });
});

describe('RATE_LIMITS', () => {
    it('declares the route group quotas', () => {
        expect(RATE_LIMITS).toEqual({
            register: { limit: 5, windowMs: 3_600_000 },
            login: { limit: 10, windowMs: 60_000 },
            resources: { limit: 100, windowMs: 60_000 },
            search: { limit: 30, windowMs: 60_000 },
        });
    });
});

/**
 * In-memory fixed-window rate limiter.
 *
 * Counters are process-local: several server processes each enforce their
 * own quota. The check-and-increment in hit() is synchronous, so two
 * concurrent requests can never observe the same count.
 */

export interface RateLimitQuota {
    limit: number;
    windowMs: number;
}

export interface RateLimitDecision {
    allowed: boolean;
    limit: number;
    remaining: number;
    /** Epoch milliseconds at which the current window ends. */
    resetAt: number;
    retryAfterSeconds: number;
}

interface Window {
    count: number;
    resetAt: number;
}

const SWEEP_INTERVAL_MS = 60_000;

export class FixedWindowRateLimiter {
    private windows = new Map<string, Window>();
    private now: () => number;
    private nextSweepAt: number;

    constructor(now: () => number = Date.now) {
        this.now = now;
        this.nextSweepAt = now() + SWEEP_INTERVAL_MS;
    }

    /**
     * Count one request against the key's current window.
     */
    hit(key: string, quota: RateLimitQuota): RateLimitDecision {
        const now = this.now();
        this.sweep(now);

        let window = this.windows.get(key);
        if (!window || window.resetAt <= now) {
            window = { count: 0, resetAt: now + quota.windowMs };
            this.windows.set(key, window);
        }

        const retryAfterSeconds = Math.max(1, Math.ceil((window.resetAt - now) / 1000));
        if (window.count >= quota.limit) {
            return { allowed: false, limit: quota.limit, remaining: 0, resetAt: window.resetAt, retryAfterSeconds };
        }

        window.count += 1;
        return {
            allowed: true,
            limit: quota.limit,
            remaining: quota.limit - window.count,
            resetAt: window.resetAt,
            retryAfterSeconds,
        };
    }

    get size(): number {
        return this.windows.size;
    }

    private sweep(now: number): void {
        if (now < this.nextSweepAt) return;
        for (const [key, window] of this.windows) {
            if (window.resetAt <= now) {
                this.windows.delete(key);
            }
        }
        this.nextSweepAt = now + SWEEP_INTERVAL_MS;
    }
}

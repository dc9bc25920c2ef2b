import type { RateLimitQuota } from './limiter';

const MINUTE = 60_000;
const HOUR = 60 * MINUTE;

export type RouteGroup = 'register' | 'login' | 'resources' | 'search';

export const RATE_LIMITS: Record<RouteGroup, RateLimitQuota> = {
    register: { limit: 5, windowMs: HOUR },
    login: { limit: 10, windowMs: MINUTE },
    resources: { limit: 100, windowMs: MINUTE },
    search: { limit: 30, windowMs: MINUTE },
};

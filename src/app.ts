/**
 * Builds the express application from the route table.
 */

import express, { type NextFunction, type Request, type RequestHandler, type Response, type Router } from 'express';

import { configureRoutes } from './api/routes';
import { errorHandler, notFound, originPolicy, requestLogger } from './api/middleware';
import type { HttpMethod, Request as ApiRequest, Response as ApiResponse, Route } from './api/types';
import type { AppConfig } from './config';
import type { Services } from './container';
import { FixedWindowRateLimiter, type RateLimitQuota } from './ratelimit/limiter';
import { rateLimit } from './ratelimit/middleware';
import { RATE_LIMITS, type RouteGroup } from './ratelimit/policies';

export interface AppOptions {
    config: Pick<AppConfig, 'corsOrigins' | 'trustProxy'>;
    services: Services;
    limiter?: FixedWindowRateLimiter;
    rateLimits?: Record<RouteGroup, RateLimitQuota>;
}

function send(res: Response, response: ApiResponse): void {
    for (const [name, value] of Object.entries(response.headers ?? {})) {
        res.setHeader(name, value);
    }
    res.status(response.status);
    if (response.body === undefined) {
        res.end();
    } else if (Buffer.isBuffer(response.body)) {
        res.send(response.body);
    } else {
        res.json(response.body);
    }
}

function dispatch(route: Route, services: Services): RequestHandler {
    const run = async (req: Request, res: Response): Promise<void> => {
        const request: ApiRequest = {
            body: req.body,
            params: req.params,
            query: req.query,
            headers: req.headers,
        };
        if (route.requiresAuth) {
            const identity = await services.authMiddleware.authenticate(req.headers);
            send(res, await route.handler({ ...request, identity }));
        } else {
            send(res, await route.handler(request));
        }
    };
    return (req: Request, res: Response, next: NextFunction): void => {
        run(req, res).catch(next);
    };
}

function mount(router: Router, method: HttpMethod, path: string, handlers: RequestHandler[]): void {
    switch (method) {
        case 'GET':
            router.get(path, ...handlers);
            break;
        case 'POST':
            router.post(path, ...handlers);
            break;
        case 'PUT':
            router.put(path, ...handlers);
            break;
        case 'PATCH':
            router.patch(path, ...handlers);
            break;
        case 'DELETE':
            router.delete(path, ...handlers);
            break;
    }
}

export function createApp(options: AppOptions): express.Express {
    const { config, services } = options;
    const limiter = options.limiter ?? new FixedWindowRateLimiter();
    const quotas = options.rateLimits ?? RATE_LIMITS;

    const app = express();
    app.disable('x-powered-by');
    app.set('trust proxy', config.trustProxy);

    app.use(requestLogger());
    app.use(originPolicy(config.corsOrigins));
    app.use(express.json({ limit: '100kb' }));
    app.use(express.urlencoded({ extended: false, limit: '100kb' }));

    const router = express.Router();
    for (const route of configureRoutes(services)) {
        const handlers: RequestHandler[] = [];
        if (route.group) {
            handlers.push(rateLimit(limiter, route.group, quotas[route.group]));
        }
        handlers.push(dispatch(route, services));
        mount(router, route.method, route.path, handlers);
    }
    app.use(router);

    app.use(notFound());
    app.use(errorHandler());
    return app;
}

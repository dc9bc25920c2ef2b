/**
 * Framework-neutral request and response shapes the handlers work with.
 */

import type { IncomingHttpHeaders } from 'http';

import type { Identity } from '../auth/types';
import type { RouteGroup } from '../ratelimit/policies';

export interface Request {
    body: unknown;
    params: Record<string, string>;
    query: Record<string, unknown>;
    headers: IncomingHttpHeaders;
}

export interface AuthenticatedRequest extends Request {
    identity: Identity;
}

export interface Response {
    status: number;
    body?: unknown;
    headers?: Record<string, string>;
}

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

interface RouteBase {
    method: HttpMethod;
    path: string;
    /** Rate-limit group; routes without one are not limited. */
    group?: RouteGroup;
}

export interface PublicRoute extends RouteBase {
    requiresAuth: false;
    handler: (req: Request) => Promise<Response>;
}

export interface ProtectedRoute extends RouteBase {
    requiresAuth: true;
    handler: (req: AuthenticatedRequest) => Promise<Response>;
}

export type Route = PublicRoute | ProtectedRoute;

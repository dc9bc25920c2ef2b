/**
 * Request handlers for account endpoints.
 */

import type { AuthenticatedRequest, Request, Response } from '../types';
import { parseInput } from '../validation';
import { AuthService } from '../../auth/service';
import { toPublicAccount } from '../../auth/types';
import { LoginSchema, RegisterSchema } from '../../schemas/auth';

/**
 * Handle user registration.
 */
export async function handleRegister(req: Request, authService: AuthService): Promise<Response> {
    const { username, password } = parseInput(RegisterSchema, req.body);
    const account = await authService.register(username, password);
    return { status: 201, body: toPublicAccount(account) };
}

/**
 * Handle user login requests. Accepts JSON or an urlencoded form.
 */
export async function handleLogin(req: Request, authService: AuthService): Promise<Response> {
    const { username, password } = parseInput(LoginSchema, req.body);
    const result = await authService.login(username, password);
    return {
        status: 200,
        body: { token: result.token, tokenType: result.tokenType, expiresAt: result.expiresAt },
    };
}

export async function handleMe(req: AuthenticatedRequest, authService: AuthService): Promise<Response> {
    const account = await authService.getAccount(req.identity);
    return { status: 200, body: toPublicAccount(account) };
}

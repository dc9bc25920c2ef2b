/**
 * Account request validation schemas. Password strength is checked by the
 * auth service so that it reports WEAK_PASSWORD rather than a shape error.
 */

import { z } from 'zod';

import { exceedsHashInput, MAX_PASSWORD_BYTES } from '../auth/password-policy';

const Password = z
    .string()
    .min(1, 'is required')
    .refine((value) => !exceedsHashInput(value), `must be at most ${MAX_PASSWORD_BYTES} bytes long`);

export const RegisterSchema = z.object({
    username: z
        .string()
        .trim()
        .min(3, 'must be at least 3 characters')
        .max(50, 'must be at most 50 characters')
        .regex(/^[A-Za-z0-9_.-]+$/, 'may only contain letters, digits, ".", "_" and "-"'),
    password: Password,
});

export const LoginSchema = z.object({
    username: z.string().trim().min(1, 'is required'),
    password: Password,
});

import type { z } from 'zod';

import { ValidationError } from '../errors';

/**
 * Parse untrusted input or fail with a 400 listing each problem.
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown): z.infer<S> {
    const result = schema.safeParse(value);
    if (!result.success) {
        throw new ValidationError(
            'Invalid request',
            'VALIDATION_FAILED',
            result.error.issues.map((issue) => ({
                path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
                message: issue.message,
            }))
        );
    }
    return result.data;
}

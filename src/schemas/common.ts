import { z } from 'zod';

export const queryBoolean = z.enum(['true', 'false']).transform((value) => value === 'true');

/** Largest value an INTEGER column holds. */
export const MAX_ROW_ID = 2_147_483_647;

export const RowId = z.number().int().positive().max(MAX_ROW_ID);

export const IdParamSchema = z.object({
    id: z.coerce.number().pipe(RowId),
});

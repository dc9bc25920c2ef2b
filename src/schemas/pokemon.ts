import { z } from 'zod';

const SpeciesName = z
    .string()
    .trim()
    .min(1)
    .max(50)
    .regex(/^[A-Za-z0-9-]+$/, 'may only contain letters, digits and "-"');

export const SearchQuerySchema = z.object({
    query: z.preprocess((value) => (value === '' ? undefined : value), SpeciesName.optional()),
    limit: z.coerce.number().int().min(1).max(200).default(20),
    offset: z.coerce.number().int().min(0).default(0),
});

export const PokemonParamSchema = z.object({
    idOrName: SpeciesName,
});

export const TypeParamSchema = z.object({
    type: z
        .string()
        .min(1)
        .max(30)
        .regex(/^[A-Za-z-]+$/, 'may only contain letters and "-"'),
});

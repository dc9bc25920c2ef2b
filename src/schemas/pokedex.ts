/**
 * Pokédex request validation schemas.
 */

import { z } from 'zod';

import { queryBoolean, RowId } from './common';

const Nickname = z.string().trim().max(50, 'must be at most 50 characters');
const Notes = z.string().max(500, 'must be at most 500 characters');
const Level = z.number().int().min(1).max(100);

export const CreatePokedexEntrySchema = z
    .object({
        pokemonId: RowId,
        nickname: Nickname.nullable().optional(),
        notes: Notes.nullable().optional(),
        level: Level.nullable().optional(),
        isCaptured: z.boolean().default(false),
        favorite: z.boolean().default(false),
    })
    .strict();

export const UpdatePokedexEntrySchema = z
    .object({
        nickname: Nickname.nullable().optional(),
        notes: Notes.nullable().optional(),
        level: Level.nullable().optional(),
        isCaptured: z.boolean().optional(),
        favorite: z.boolean().optional(),
        captureDate: z.coerce.date().nullable().optional(),
    })
    .strict();

export const ListPokedexQuerySchema = z.object({
    captured: queryBoolean.optional(),
    favorite: queryBoolean.optional(),
    sort: z.enum(['id', 'pokemon_id', 'pokemon_name', 'capture_date']).default('id'),
    order: z.enum(['asc', 'desc']).default('asc'),
    limit: z.coerce.number().int().min(1).max(200).default(50),
    offset: z.coerce.number().int().min(0).default(0),
});

export const ExportQuerySchema = z.object({
    format: z.enum(['pdf', 'csv']).default('pdf'),
});

export type CreatePokedexEntryInput = z.infer<typeof CreatePokedexEntrySchema>;
export type UpdatePokedexEntryInput = z.infer<typeof UpdatePokedexEntrySchema>;
export type ExportFormat = z.infer<typeof ExportQuerySchema>['format'];

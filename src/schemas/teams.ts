/**
 * Team request validation schemas.
 */

import { z } from 'zod';

import { MAX_TEAM_SIZE } from '../teams/types';
import { RowId } from './common';

const PokemonIds = z
    .array(RowId)
    .min(1, 'Team must have at least 1 Pokémon')
    .max(MAX_TEAM_SIZE, `Team cannot have more than ${MAX_TEAM_SIZE} Pokémon`)
    .refine((ids) => new Set(ids).size === ids.length, 'Team cannot contain the same Pokémon twice');

export const CreateTeamSchema = z
    .object({
        name: z.string().trim().min(1).max(100),
        description: z.string().max(500).nullable().optional(),
        pokemonIds: PokemonIds,
    })
    .strict();

export const UpdateTeamSchema = z
    .object({
        name: z.string().trim().min(1).max(100).optional(),
        description: z.string().max(500).nullable().optional(),
        pokemonIds: PokemonIds.optional(),
    })
    .strict();

export type CreateTeamInput = z.infer<typeof CreateTeamSchema>;
export type UpdateTeamInput = z.infer<typeof UpdateTeamSchema>;

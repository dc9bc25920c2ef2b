/**
 * Upstream payload schemas. Anything not listed here is dropped on parse.
 */

import { z } from 'zod';

const NamedResource = z.object({
    name: z.string(),
    url: z.string(),
});

const Sprite = z.string().nullable().optional();

export const PokemonPayload = z.object({
    id: z.number().int().positive(),
    name: z.string().min(1),
    sprites: z
        .object({
            front_default: Sprite,
            other: z
                .object({
                    'official-artwork': z.object({ front_default: Sprite }).nullable().optional(),
                })
                .nullable()
                .optional(),
        })
        .nullable()
        .optional(),
    types: z
        .array(
            z.object({
                slot: z.number().int().optional(),
                type: z.object({ name: z.string() }),
            })
        )
        .default([]),
    stats: z
        .array(
            z.object({
                base_stat: z.number(),
                stat: z.object({ name: z.string() }),
            })
        )
        .default([]),
    abilities: z.array(z.object({ ability: z.object({ name: z.string() }) })).default([]),
});

export const PokemonListPayload = z.object({
    count: z.number().int().nonnegative(),
    results: z.array(NamedResource),
});

export const TypePayload = z.object({
    pokemon: z.array(z.object({ pokemon: NamedResource })).default([]),
});

export type PokemonPayload = z.infer<typeof PokemonPayload>;

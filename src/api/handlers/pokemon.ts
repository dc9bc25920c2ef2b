/**
 * Request handlers proxying the external Pokémon data service.
 */

import type { AuthenticatedRequest, Response } from '../types';
import { parseInput } from '../validation';
import type { SpeciesGateway } from '../../pokeapi/types';
import { PokemonParamSchema, SearchQuerySchema, TypeParamSchema } from '../../schemas/pokemon';

/**
 * Search one species by name, or page through the index when no query is given.
 */
export async function handleSearchPokemon(req: AuthenticatedRequest, species: SpeciesGateway): Promise<Response> {
    const { query, limit, offset } = parseInput(SearchQuerySchema, req.query);
    if (query) {
        const result = await species.search(query);
        return { status: 200, body: { count: 1, results: [result] } };
    }
    return { status: 200, body: await species.listPokemon(limit, offset) };
}

export async function handleGetPokemon(req: AuthenticatedRequest, species: SpeciesGateway): Promise<Response> {
    const { idOrName } = parseInput(PokemonParamSchema, req.params);
    return { status: 200, body: await species.getPokemon(idOrName.toLowerCase()) };
}

export async function handlePokemonByType(req: AuthenticatedRequest, species: SpeciesGateway): Promise<Response> {
    const { type } = parseInput(TypeParamSchema, req.params);
    return { status: 200, body: await species.getPokemonByType(type.toLowerCase()) };
}

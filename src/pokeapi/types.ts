/**
 * Shapes the rest of the application sees from the Pokémon data service.
 */

export interface SpeciesInfo {
    id: number;
    name: string;
    types: string[];
    sprite: string;
}

export interface BaseStat {
    name: string;
    base: number;
}

export interface PokemonDetails extends SpeciesInfo {
    stats: BaseStat[];
    abilities: string[];
}

export interface SpeciesPage {
    count: number;
    results: SpeciesInfo[];
}

/**
 * Read-only access to species data. Implemented by PokeApiClient; tests
 * substitute their own.
 */
export interface SpeciesGateway {
    search(query: string): Promise<SpeciesInfo>;
    getPokemon(idOrName: string | number): Promise<PokemonDetails>;
    listPokemon(limit: number, offset: number): Promise<SpeciesPage>;
    getPokemonByType(typeName: string): Promise<SpeciesInfo[]>;
}

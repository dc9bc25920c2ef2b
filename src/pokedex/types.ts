/**
 * Pokédex entry types: one caught (or tracked) species in a user's collection.
 */

export interface PokedexEntry {
    id: number;
    ownerId: number;
    pokemonId: number;
    pokemonName: string;
    pokemonSprite: string | null;
    pokemonTypes: string[];
    nickname: string | null;
    notes: string | null;
    level: number | null;
    isCaptured: boolean;
    favorite: boolean;
    captureDate: Date | null;
    createdAt: Date;
    updatedAt: Date;
}

export type PokedexSortField = 'id' | 'pokemon_id' | 'pokemon_name' | 'capture_date';
export type SortOrder = 'asc' | 'desc';

export interface PokedexFilters {
    captured?: boolean;
    favorite?: boolean;
    sort: PokedexSortField;
    order: SortOrder;
    limit: number;
    offset: number;
}

export interface NewPokedexEntry {
    ownerId: number;
    pokemonId: number;
    pokemonName: string;
    pokemonSprite: string | null;
    pokemonTypes: string[];
    nickname: string | null;
    notes: string | null;
    level: number | null;
    isCaptured: boolean;
    favorite: boolean;
    captureDate: Date | null;
}

export interface PokedexEntryChanges {
    nickname?: string | null;
    notes?: string | null;
    level?: number | null;
    isCaptured?: boolean;
    favorite?: boolean;
    captureDate?: Date | null;
}

export interface PokedexStats {
    totalPokemon: number;
    captured: number;
    favorites: number;
    completionPercentage: number;
    mostCommonType: string | null;
    captureStreakDays: number;
}

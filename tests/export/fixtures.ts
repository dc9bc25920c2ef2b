import type { PokedexEntry } from '../../src/pokedex/types';

export function makeEntry(overrides: Partial<PokedexEntry> = {}): PokedexEntry {
    return {
        id: 1,
        ownerId: 1,
        pokemonId: 25,
        pokemonName: 'pikachu',
        pokemonSprite: 'https://sprites.test/25.png',
        pokemonTypes: ['electric'],
        nickname: null,
        notes: null,
        level: null,
        isCaptured: false,
        favorite: false,
        captureDate: null,
        createdAt: new Date(Date.UTC(2026, 0, 1)),
        updatedAt: new Date(Date.UTC(2026, 0, 1)),
        ...overrides,
    };
}

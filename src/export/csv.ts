/**
 * CSV rendering of a Pokédex.
 */

import type { PokedexEntry } from '../pokedex/types';

export const POKEDEX_CSV_HEADER = [
    'id',
    'pokemon_id',
    'pokemon_name',
    'types',
    'nickname',
    'level',
    'is_captured',
    'favorite',
    'capture_date',
];

export function escapeCsvField(value: string): string {
    return /[",\r\n]/.test(value) ? `"${value.replace(/"/g, '""')}"` : value;
}

export function renderPokedexCsv(entries: PokedexEntry[]): string {
    const lines = [POKEDEX_CSV_HEADER.join(',')];
    for (const entry of entries) {
        const fields = [
            String(entry.id),
            String(entry.pokemonId),
            entry.pokemonName,
            entry.pokemonTypes.join('/'),
            entry.nickname ?? '',
            entry.level !== null ? String(entry.level) : '',
            String(entry.isCaptured),
            String(entry.favorite),
            entry.captureDate ? entry.captureDate.toISOString() : '',
        ];
        lines.push(fields.map(escapeCsvField).join(','));
    }
    return `${lines.join('\n')}\n`;
}

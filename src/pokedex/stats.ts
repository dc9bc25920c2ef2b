/**
 * Collection statistics computed from a user's entries.
 */

import type { PokedexEntry, PokedexStats } from './types';

const DAY_MS = 24 * 60 * 60 * 1000;

function utcDay(date: Date): number {
    return Date.UTC(date.getUTCFullYear(), date.getUTCMonth(), date.getUTCDate());
}

/**
 * Longest run of consecutive UTC calendar days with at least one capture.
 */
export function longestCaptureStreak(dates: Date[]): number {
    const days = [...new Set(dates.map(utcDay))].sort((a, b) => a - b);
    let longest = 0;
    let current = 0;
    let previous: number | undefined;

    for (const day of days) {
        current = previous !== undefined && day - previous === DAY_MS ? current + 1 : 1;
        previous = day;
        longest = Math.max(longest, current);
    }
    return longest;
}

export function mostCommonType(entries: PokedexEntry[]): string | null {
    const counts = new Map<string, number>();
    for (const entry of entries) {
        for (const type of entry.pokemonTypes) {
            counts.set(type, (counts.get(type) ?? 0) + 1);
        }
    }

    let best: string | null = null;
    let bestCount = 0;
    for (const [type, count] of counts) {
        if (count > bestCount) {
            best = type;
            bestCount = count;
        }
    }
    return best;
}

export function computeStats(entries: PokedexEntry[]): PokedexStats {
    const total = entries.length;
    const captured = entries.filter((entry) => entry.isCaptured).length;
    const favorites = entries.filter((entry) => entry.favorite).length;
    const captureDates = entries
        .map((entry) => entry.captureDate)
        .filter((date): date is Date => date !== null);

    return {
        totalPokemon: total,
        captured,
        favorites,
        completionPercentage: total > 0 ? Math.round((captured * 1000) / total) / 10 : 0,
        mostCommonType: mostCommonType(entries),
        captureStreakDays: longestCaptureStreak(captureDates),
    };
}

/**
 * Printable report models. Building one is a pure function of the records
 * passed in; renderers turn it into bytes.
 */

import type { PokedexEntry } from '../pokedex/types';
import type { Team } from '../teams/types';

export interface ReportColumn {
    header: string;
    /** Share of the usable page width. */
    weight: number;
}

export interface ReportDocument {
    title: string;
    subtitle: string;
    summary: string[];
    columns: ReportColumn[];
    rows: string[][];
    emptyMessage: string;
}

const POKEDEX_COLUMNS: ReportColumn[] = [
    { header: '#', weight: 1 },
    { header: 'Pokémon', weight: 3 },
    { header: 'Types', weight: 3 },
    { header: 'Nickname', weight: 3 },
    { header: 'Level', weight: 1 },
    { header: 'Captured', weight: 2 },
    { header: 'Favorite', weight: 1.5 },
];

const TEAM_COLUMNS: ReportColumn[] = [
    { header: 'Slot', weight: 1 },
    { header: '#', weight: 1 },
    { header: 'Pokémon', weight: 4 },
];

function formatDay(date: Date): string {
    return date.toISOString().slice(0, 10);
}

function describeCapture(entry: PokedexEntry): string {
    if (!entry.isCaptured) return 'no';
    return entry.captureDate ? formatDay(entry.captureDate) : 'yes';
}

export function buildPokedexReport(username: string, entries: PokedexEntry[], generatedAt: Date): ReportDocument {
    const captured = entries.filter((entry) => entry.isCaptured).length;
    return {
        title: `Pokédex of ${username}`,
        subtitle: `Generated ${generatedAt.toISOString()}`,
        summary: [`Entries: ${entries.length}`, `Captured: ${captured}`],
        columns: POKEDEX_COLUMNS,
        rows: entries.map((entry) => [
            String(entry.pokemonId),
            entry.pokemonName,
            entry.pokemonTypes.join('/') || '-',
            entry.nickname ?? '-',
            entry.level !== null ? String(entry.level) : '-',
            describeCapture(entry),
            entry.favorite ? 'yes' : 'no',
        ]),
        emptyMessage: 'No Pokémon in this Pokédex yet.',
    };
}

export function buildTeamReport(team: Team, generatedAt: Date): ReportDocument {
    const summary = [`Members: ${team.members.length}`];
    if (team.description) {
        summary.unshift(team.description);
    }
    return {
        title: `Team ${team.name}`,
        subtitle: `Generated ${generatedAt.toISOString()}`,
        summary,
        columns: TEAM_COLUMNS,
        rows: team.members.map((member) => [
            String(member.position),
            String(member.pokemonId),
            member.pokemonName,
        ]),
        emptyMessage: 'This team has no members.',
    };
}

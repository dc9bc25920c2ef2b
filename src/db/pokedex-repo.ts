/**
 * Pokédex entry repository. Every statement that touches an existing row is
 * filtered by owner as well as id.
 */

import type { Queryable } from './connection';
import type {
    NewPokedexEntry,
    PokedexEntry,
    PokedexEntryChanges,
    PokedexFilters,
    PokedexSortField,
} from '../pokedex/types';
import { Logger } from '../utils/logger';

const logger = new Logger('PokedexRepository');

interface PokedexRow {
    id: number;
    owner_id: number;
    pokemon_id: number;
    pokemon_name: string;
    pokemon_sprite: string | null;
    pokemon_types: string;
    nickname: string | null;
    notes: string | null;
    level: number | null;
    is_captured: boolean;
    favorite: boolean;
    capture_date: Date | null;
    created_at: Date;
    updated_at: Date;
}

const SORT_COLUMNS: Record<PokedexSortField, string> = {
    id: 'id',
    pokemon_id: 'pokemon_id',
    pokemon_name: 'pokemon_name',
    capture_date: 'capture_date',
};

const CHANGE_COLUMNS: Record<keyof PokedexEntryChanges, string> = {
    nickname: 'nickname',
    notes: 'notes',
    level: 'level',
    isCaptured: 'is_captured',
    favorite: 'favorite',
    captureDate: 'capture_date',
};

function joinTypes(types: string[]): string {
    return types.join(',');
}

function splitTypes(value: string): string[] {
    return value.length > 0 ? value.split(',') : [];
}

function toEntry(row: PokedexRow): PokedexEntry {
    return {
        id: row.id,
        ownerId: row.owner_id,
        pokemonId: row.pokemon_id,
        pokemonName: row.pokemon_name,
        pokemonSprite: row.pokemon_sprite,
        pokemonTypes: splitTypes(row.pokemon_types),
        nickname: row.nickname,
        notes: row.notes,
        level: row.level,
        isCaptured: row.is_captured,
        favorite: row.favorite,
        captureDate: row.capture_date,
        createdAt: row.created_at,
        updatedAt: row.updated_at,
    };
}

function isChangeKey(key: string): key is keyof PokedexEntryChanges {
    return key in CHANGE_COLUMNS;
}

export class PokedexRepository {
    private db: Queryable;

    constructor(db: Queryable) {
        this.db = db;
    }

    async insert(entry: NewPokedexEntry): Promise<PokedexEntry> {
        logger.info('Creating pokedex entry', { ownerId: entry.ownerId, pokemonId: entry.pokemonId });
        const result = await this.db.query<PokedexRow>(
            `INSERT INTO pokedex_entries
                (owner_id, pokemon_id, pokemon_name, pokemon_sprite, pokemon_types,
                 nickname, notes, level, is_captured, favorite, capture_date)
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11)
             RETURNING *`,
            [
                entry.ownerId,
                entry.pokemonId,
                entry.pokemonName,
                entry.pokemonSprite,
                joinTypes(entry.pokemonTypes),
                entry.nickname,
                entry.notes,
                entry.level,
                entry.isCaptured,
                entry.favorite,
                entry.captureDate,
            ]
        );
        return toEntry(result.rows[0]);
    }

    async findOwned(ownerId: number, id: number): Promise<PokedexEntry | null> {
        const result = await this.db.query<PokedexRow>(
            'SELECT * FROM pokedex_entries WHERE id = $1 AND owner_id = $2',
            [id, ownerId]
        );
        return result.rows.length > 0 ? toEntry(result.rows[0]) : null;
    }

    async findOwnedBySpecies(ownerId: number, pokemonId: number): Promise<PokedexEntry | null> {
        const result = await this.db.query<PokedexRow>(
            'SELECT * FROM pokedex_entries WHERE owner_id = $1 AND pokemon_id = $2',
            [ownerId, pokemonId]
        );
        return result.rows.length > 0 ? toEntry(result.rows[0]) : null;
    }

    /**
     * One filtered, ordered page of an owner's entries.
     */
    async listOwned(ownerId: number, filters: PokedexFilters): Promise<PokedexEntry[]> {
        const conditions = ['owner_id = $1'];
        const params: unknown[] = [ownerId];

        if (filters.captured !== undefined) {
            params.push(filters.captured);
            conditions.push(`is_captured = $${params.length}`);
        }
        if (filters.favorite !== undefined) {
            params.push(filters.favorite);
            conditions.push(`favorite = $${params.length}`);
        }

        const direction = filters.order === 'desc' ? 'DESC' : 'ASC';
        const column = SORT_COLUMNS[filters.sort];
        const orderBy = column === 'id' ? `id ${direction}` : `${column} ${direction}, id ${direction}`;

        params.push(filters.limit, filters.offset);
        const result = await this.db.query<PokedexRow>(
            `SELECT * FROM pokedex_entries
             WHERE ${conditions.join(' AND ')}
             ORDER BY ${orderBy}
             LIMIT $${params.length - 1} OFFSET $${params.length}`,
            params
        );
        return result.rows.map(toEntry);
    }

    /**
     * Every entry of an owner in insertion order.
     */
    async listAllOwned(ownerId: number): Promise<PokedexEntry[]> {
        const result = await this.db.query<PokedexRow>(
            'SELECT * FROM pokedex_entries WHERE owner_id = $1 ORDER BY id ASC',
            [ownerId]
        );
        return result.rows.map(toEntry);
    }

    async updateOwned(ownerId: number, id: number, changes: PokedexEntryChanges): Promise<PokedexEntry | null> {
        const assignments: string[] = [];
        const params: unknown[] = [id, ownerId];

        for (const [key, value] of Object.entries(changes)) {
            if (!isChangeKey(key) || value === undefined) continue;
            params.push(value);
            assignments.push(`${CHANGE_COLUMNS[key]} = $${params.length}`);
        }
        params.push(new Date());
        assignments.push(`updated_at = $${params.length}`);

        const result = await this.db.query<PokedexRow>(
            `UPDATE pokedex_entries SET ${assignments.join(', ')}
             WHERE id = $1 AND owner_id = $2
             RETURNING *`,
            params
        );
        return result.rows.length > 0 ? toEntry(result.rows[0]) : null;
    }

    /**
     * Delete an entry together with the team slots that reference it.
     */
    async deleteOwned(ownerId: number, id: number): Promise<boolean> {
        return this.db.transaction(async (tx) => {
            const existing = await tx.query<{ id: number }>(
                'SELECT id FROM pokedex_entries WHERE id = $1 AND owner_id = $2',
                [id, ownerId]
            );
            if (existing.rows.length === 0) return false;

            logger.info('Deleting pokedex entry', { ownerId, id });
            await tx.query('DELETE FROM team_members WHERE pokedex_entry_id = $1', [id]);
            const result = await tx.query<{ id: number }>(
                'DELETE FROM pokedex_entries WHERE id = $1 AND owner_id = $2 RETURNING id',
                [id, ownerId]
            );
            return result.rows.length > 0;
        });
    }
}

/**
 * Team and team member persistence.
 */

import type { Queryable } from './connection';
import type { TeamMember, TeamRecord } from '../teams/types';
import { Logger } from '../utils/logger';

const logger = new Logger('TeamRepository');

interface TeamRow {
    id: number;
    owner_id: number;
    name: string;
    description: string | null;
    created_at: Date;
}

interface MemberRow {
    position: number;
    pokedex_entry_id: number;
    pokemon_id: number;
    pokemon_name: string;
    pokemon_sprite: string | null;
}

function toTeam(row: TeamRow): TeamRecord {
    return {
        id: row.id,
        ownerId: row.owner_id,
        name: row.name,
        description: row.description,
        createdAt: row.created_at,
    };
}

export class TeamRepository {
    private db: Queryable;

    constructor(db: Queryable) {
        this.db = db;
    }

    async insert(ownerId: number, name: string, description: string | null): Promise<TeamRecord> {
        logger.info('Creating team', { ownerId, name });
        const result = await this.db.query<TeamRow>(
            'INSERT INTO teams (owner_id, name, description) VALUES ($1, $2, $3) RETURNING *',
            [ownerId, name, description]
        );
        return toTeam(result.rows[0]);
    }

    async findOwned(ownerId: number, id: number): Promise<TeamRecord | null> {
        const result = await this.db.query<TeamRow>('SELECT * FROM teams WHERE id = $1 AND owner_id = $2', [
            id,
            ownerId,
        ]);
        return result.rows.length > 0 ? toTeam(result.rows[0]) : null;
    }

    async listOwned(ownerId: number): Promise<TeamRecord[]> {
        const result = await this.db.query<TeamRow>('SELECT * FROM teams WHERE owner_id = $1 ORDER BY id ASC', [
            ownerId,
        ]);
        return result.rows.map(toTeam);
    }

    async updateOwned(
        ownerId: number,
        id: number,
        changes: { name?: string; description?: string | null }
    ): Promise<TeamRecord | null> {
        const assignments: string[] = [];
        const params: unknown[] = [id, ownerId];
        if (changes.name !== undefined) {
            params.push(changes.name);
            assignments.push(`name = $${params.length}`);
        }
        if (changes.description !== undefined) {
            params.push(changes.description);
            assignments.push(`description = $${params.length}`);
        }
        if (assignments.length === 0) {
            return this.findOwned(ownerId, id);
        }

        const result = await this.db.query<TeamRow>(
            `UPDATE teams SET ${assignments.join(', ')} WHERE id = $1 AND owner_id = $2 RETURNING *`,
            params
        );
        return result.rows.length > 0 ? toTeam(result.rows[0]) : null;
    }

    async deleteOwned(ownerId: number, id: number): Promise<boolean> {
        return this.db.transaction(async (tx) => {
            const existing = await tx.query<{ id: number }>('SELECT id FROM teams WHERE id = $1 AND owner_id = $2', [
                id,
                ownerId,
            ]);
            if (existing.rows.length === 0) return false;

            logger.info('Deleting team', { ownerId, id });
            await tx.query('DELETE FROM team_members WHERE team_id = $1', [id]);
            const result = await tx.query<{ id: number }>(
                'DELETE FROM teams WHERE id = $1 AND owner_id = $2 RETURNING id',
                [id, ownerId]
            );
            return result.rows.length > 0;
        });
    }

    /**
     * Replace the members of a team; positions follow the order given.
     */
    async replaceMembers(teamId: number, pokedexEntryIds: number[]): Promise<void> {
        await this.db.query('DELETE FROM team_members WHERE team_id = $1', [teamId]);
        for (const [index, entryId] of pokedexEntryIds.entries()) {
            await this.db.query(
                'INSERT INTO team_members (team_id, pokedex_entry_id, position) VALUES ($1, $2, $3)',
                [teamId, entryId, index + 1]
            );
        }
    }

    async listMembers(teamId: number): Promise<TeamMember[]> {
        const result = await this.db.query<MemberRow>(
            `SELECT tm.position, tm.pokedex_entry_id, e.pokemon_id, e.pokemon_name, e.pokemon_sprite
             FROM team_members tm
             JOIN pokedex_entries e ON e.id = tm.pokedex_entry_id
             WHERE tm.team_id = $1
             ORDER BY tm.position ASC`,
            [teamId]
        );
        return result.rows.map((row) => ({
            position: row.position,
            pokedexEntryId: row.pokedex_entry_id,
            pokemonId: row.pokemon_id,
            pokemonName: row.pokemon_name,
            pokemonSprite: row.pokemon_sprite,
        }));
    }
}

/**
 * Battle teams built from entries of the owner's own Pokédex.
 */

import type { Identity } from '../auth/types';
import { NotFoundError, ValidationError } from '../errors';
import type { Queryable } from '../db/connection';
import { PokedexRepository } from '../db/pokedex-repo';
import { TeamRepository } from '../db/team-repo';
import type { CreateTeamInput, UpdateTeamInput } from '../schemas/teams';
import type { Team, TeamRecord } from './types';
import { Logger } from '../utils/logger';

const logger = new Logger('TeamService');

const TEAM_NOT_FOUND = 'Team not found';

/**
 * Repositories bound to one connection or transaction.
 */
interface TeamStores {
    teams: TeamRepository;
    entries: PokedexRepository;
}

function storesFor(db: Queryable): TeamStores {
    return { teams: new TeamRepository(db), entries: new PokedexRepository(db) };
}

export class TeamService {
    private db: Queryable;
    private teams: TeamRepository;

    constructor(db: Queryable) {
        this.db = db;
        this.teams = new TeamRepository(db);
    }

    /**
     * The team row and its members are written in one transaction.
     */
    async create(identity: Identity, input: CreateTeamInput): Promise<Team> {
        const team = await this.db.transaction(async (tx) => {
            const stores = storesFor(tx);
            const entryIds = await this.resolveEntries(stores, identity, input.pokemonIds);
            const created = await stores.teams.insert(identity.userId, input.name, input.description ?? null);
            await stores.teams.replaceMembers(created.id, entryIds);
            logger.info('Team created', { userId: identity.userId, teamId: created.id, size: entryIds.length });
            return created;
        });
        return this.withMembers(team);
    }

    async list(identity: Identity): Promise<Team[]> {
        const teams = await this.teams.listOwned(identity.userId);
        return Promise.all(teams.map((team) => this.withMembers(team)));
    }

    async get(identity: Identity, id: number): Promise<Team> {
        return this.withMembers(await this.findOwned(identity, id));
    }

    /**
     * Rename, re-describe or re-roster a team. A new roster replaces the old one.
     */
    async update(identity: Identity, id: number, input: UpdateTeamInput): Promise<Team> {
        const team = await this.db.transaction(async (tx) => {
            const stores = storesFor(tx);
            const existing = await stores.teams.findOwned(identity.userId, id);
            if (!existing) {
                throw new NotFoundError(TEAM_NOT_FOUND);
            }
            const entryIds = input.pokemonIds
                ? await this.resolveEntries(stores, identity, input.pokemonIds)
                : undefined;

            const updated = await stores.teams.updateOwned(identity.userId, id, {
                name: input.name,
                description: input.description,
            });
            if (!updated) {
                throw new NotFoundError(TEAM_NOT_FOUND);
            }
            if (entryIds) {
                await stores.teams.replaceMembers(updated.id, entryIds);
            }
            return updated;
        });
        return this.withMembers(team);
    }

    async delete(identity: Identity, id: number): Promise<void> {
        const deleted = await this.teams.deleteOwned(identity.userId, id);
        if (!deleted) {
            throw new NotFoundError(TEAM_NOT_FOUND);
        }
        logger.info('Team deleted', { userId: identity.userId, teamId: id });
    }

    private async findOwned(identity: Identity, id: number): Promise<TeamRecord> {
        const team = await this.teams.findOwned(identity.userId, id);
        if (!team) {
            throw new NotFoundError(TEAM_NOT_FOUND);
        }
        return team;
    }

    private async withMembers(team: TeamRecord): Promise<Team> {
        return { ...team, members: await this.teams.listMembers(team.id) };
    }

    /**
     * Map species ids to the caller's Pokédex entry ids, in order.
     */
    private async resolveEntries(stores: TeamStores, identity: Identity, pokemonIds: number[]): Promise<number[]> {
        const entryIds: number[] = [];
        for (const pokemonId of pokemonIds) {
            const entry = await stores.entries.findOwnedBySpecies(identity.userId, pokemonId);
            if (!entry) {
                throw new ValidationError(`Pokemon with id ${pokemonId} is not in your Pokedex`);
            }
            entryIds.push(entry.id);
        }
        return entryIds;
    }
}

/**
 * Ownership-scoped access to Pokédex entries.
 *
 * An entry that exists but belongs to another account is reported exactly
 * like a missing one, so callers cannot tell which ids other users hold.
 */

import type { Identity } from '../auth/types';
import { ConflictError, NotFoundError } from '../errors';
import { isUniqueViolation } from '../db/connection';
import { PokedexRepository } from '../db/pokedex-repo';
import type { SpeciesGateway } from '../pokeapi/types';
import type { CreatePokedexEntryInput, UpdatePokedexEntryInput } from '../schemas/pokedex';
import { computeStats } from './stats';
import type { PokedexEntry, PokedexEntryChanges, PokedexFilters, PokedexStats } from './types';
import { Logger } from '../utils/logger';

const logger = new Logger('PokedexService');

const ENTRY_NOT_FOUND = 'Pokedex entry not found';

export class PokedexService {
    private entries: PokedexRepository;
    private species: SpeciesGateway;
    private now: () => Date;

    constructor(entries: PokedexRepository, species: SpeciesGateway, now: () => Date = () => new Date()) {
        this.entries = entries;
        this.species = species;
        this.now = now;
    }

    /**
     * Add a species to the caller's Pokédex, copying its name, sprite and types.
     */
    async create(identity: Identity, input: CreatePokedexEntryInput): Promise<PokedexEntry> {
        if (await this.entries.findOwnedBySpecies(identity.userId, input.pokemonId)) {
            throw new ConflictError('Pokemon already in your Pokedex', 'DUPLICATE_ENTRY');
        }

        const species = await this.species.getPokemon(input.pokemonId);
        try {
            const entry = await this.entries.insert({
                ownerId: identity.userId,
                pokemonId: species.id,
                pokemonName: species.name,
                pokemonSprite: species.sprite,
                pokemonTypes: species.types,
                nickname: input.nickname ?? null,
                notes: input.notes ?? null,
                level: input.level ?? null,
                isCaptured: input.isCaptured,
                favorite: input.favorite,
                captureDate: input.isCaptured ? this.now() : null,
            });
            logger.info('Pokemon added to pokedex', { userId: identity.userId, entryId: entry.id });
            return entry;
        } catch (err) {
            if (isUniqueViolation(err)) {
                throw new ConflictError('Pokemon already in your Pokedex', 'DUPLICATE_ENTRY');
            }
            throw err;
        }
    }

    async list(identity: Identity, filters: PokedexFilters): Promise<PokedexEntry[]> {
        return this.entries.listOwned(identity.userId, filters);
    }

    async listAll(identity: Identity): Promise<PokedexEntry[]> {
        return this.entries.listAllOwned(identity.userId);
    }

    async get(identity: Identity, id: number): Promise<PokedexEntry> {
        const entry = await this.entries.findOwned(identity.userId, id);
        if (!entry) {
            throw new NotFoundError(ENTRY_NOT_FOUND);
        }
        return entry;
    }

    /**
     * Apply partial changes. Marking an entry captured without a capture
     * date stamps it with the current time.
     */
    async update(identity: Identity, id: number, input: UpdatePokedexEntryInput): Promise<PokedexEntry> {
        const existing = await this.get(identity, id);
        const changes: PokedexEntryChanges = { ...input };

        const captureDate = input.captureDate !== undefined ? input.captureDate : existing.captureDate;
        if (input.isCaptured === true && captureDate === null) {
            changes.captureDate = this.now();
        }

        const updated = await this.entries.updateOwned(identity.userId, id, changes);
        if (!updated) {
            throw new NotFoundError(ENTRY_NOT_FOUND);
        }
        return updated;
    }

    async delete(identity: Identity, id: number): Promise<void> {
        const deleted = await this.entries.deleteOwned(identity.userId, id);
        if (!deleted) {
            throw new NotFoundError(ENTRY_NOT_FOUND);
        }
        logger.info('Pokemon removed from pokedex', { userId: identity.userId, entryId: id });
    }

    async stats(identity: Identity): Promise<PokedexStats> {
        return computeStats(await this.entries.listAllOwned(identity.userId));
    }
}

/**
 * Client for the public Pokémon data REST API. Responses are reduced to the
 * few fields the application exposes before they go anywhere else.
 */

import type { z } from 'zod';

import { NotFoundError, UpstreamUnavailableError, ValidationError } from '../errors';
import { PokemonListPayload, PokemonPayload, TypePayload } from './payloads';
import type { PokemonDetails, SpeciesGateway, SpeciesInfo, SpeciesPage } from './types';
import { mapWithConcurrency } from '../utils/concurrency';
import { Logger } from '../utils/logger';

const logger = new Logger('PokeApiClient');

export const SPRITE_BASE_URL =
    'https://raw.githubusercontent.com/PokeAPI/sprites/master/sprites/pokemon/other/official-artwork';

const MAX_CACHE_ENTRIES = 1000;
/** Detail lookups a single list or type request may have in flight. */
export const UPSTREAM_CONCURRENCY = 8;

export interface PokeApiClientOptions {
    baseUrl: string;
    timeoutMs: number;
    fetchImpl?: typeof fetch;
}

export function buildSpriteUrl(pokemonId: number): string {
    return `${SPRITE_BASE_URL}/${pokemonId}.png`;
}

export function toPokemonDetails(payload: PokemonPayload): PokemonDetails {
    const sprites = payload.sprites;
    const sprite =
        sprites?.other?.['official-artwork']?.front_default ??
        sprites?.front_default ??
        buildSpriteUrl(payload.id);

    return {
        id: payload.id,
        name: payload.name,
        sprite,
        types: payload.types.map((entry) => entry.type.name),
        stats: payload.stats.map((entry) => ({ name: entry.stat.name, base: entry.base_stat })),
        abilities: payload.abilities.map((entry) => entry.ability.name),
    };
}

export function toSpeciesInfo(details: PokemonDetails): SpeciesInfo {
    return {
        id: details.id,
        name: details.name,
        types: details.types,
        sprite: details.sprite,
    };
}

function cacheKey(identifier: string | number): string {
    return String(identifier).trim().toLowerCase();
}

export class PokeApiClient implements SpeciesGateway {
    private readonly baseUrl: string;
    private readonly timeoutMs: number;
    private readonly fetchImpl: typeof fetch;
    private readonly cache = new Map<string, PokemonDetails>();

    constructor(options: PokeApiClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.timeoutMs = options.timeoutMs;
        this.fetchImpl = options.fetchImpl ?? fetch;
    }

    /**
     * Look up one species by name or number.
     */
    async search(query: string): Promise<SpeciesInfo> {
        const normalized = cacheKey(query);
        if (normalized.length === 0) {
            throw new ValidationError('Search query must not be empty');
        }
        return toSpeciesInfo(await this.getPokemon(normalized));
    }

    /**
     * Full details (stats, abilities) of one species, cached by id and name.
     */
    async getPokemon(idOrName: string | number): Promise<PokemonDetails> {
        const key = cacheKey(idOrName);
        const cached = this.cache.get(key);
        if (cached) {
            return cached;
        }

        const payload = await this.request(`/pokemon/${encodeURIComponent(key)}`, PokemonPayload);
        const details = toPokemonDetails(payload);
        this.remember(key, details);
        this.remember(String(details.id), details);
        this.remember(details.name, details);
        return details;
    }

    /**
     * One page of the species index, each entry resolved to its summary.
     */
    async listPokemon(limit: number, offset: number): Promise<SpeciesPage> {
        const page = await this.request(`/pokemon?limit=${limit}&offset=${offset}`, PokemonListPayload);
        const results = await mapWithConcurrency(page.results, UPSTREAM_CONCURRENCY, (item) =>
            this.getPokemon(item.name)
        );
        return { count: page.count, results: results.map(toSpeciesInfo) };
    }

    async getPokemonByType(typeName: string): Promise<SpeciesInfo[]> {
        const payload = await this.request(`/type/${encodeURIComponent(cacheKey(typeName))}`, TypePayload);
        const details = await mapWithConcurrency(payload.pokemon, UPSTREAM_CONCURRENCY, (entry) =>
            this.getPokemon(entry.pokemon.name)
        );
        return details.map(toSpeciesInfo);
    }

    private remember(key: string, details: PokemonDetails): void {
        if (this.cache.size >= MAX_CACHE_ENTRIES && !this.cache.has(key)) {
            const oldest = this.cache.keys().next();
            if (!oldest.done) {
                this.cache.delete(oldest.value);
            }
        }
        this.cache.set(key, details);
    }

    /**
     * Internal request handler: bounded by the timeout, upstream failures
     * mapped to NotFoundError or UpstreamUnavailableError.
     */
    private async request<S extends z.ZodTypeAny>(path: string, schema: S): Promise<z.infer<S>> {
        const url = `${this.baseUrl}${path}`;
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), this.timeoutMs);

        logger.info(`GET ${path}`);
        try {
            let response: Response;
            try {
                response = await this.fetchImpl(url, {
                    headers: { Accept: 'application/json' },
                    signal: controller.signal,
                });
            } catch (err) {
                throw this.transportError(err, path, controller.signal.aborted);
            }

            if (response.status === 404) {
                throw new NotFoundError('Pokemon not found');
            }
            if (!response.ok) {
                logger.error('Upstream returned an error status', { path, status: response.status });
                throw new UpstreamUnavailableError('Error calling the Pokémon data service');
            }

            let data: unknown;
            try {
                data = await response.json();
            } catch (err) {
                if (controller.signal.aborted) {
                    throw this.transportError(err, path, true);
                }
                logger.error('Upstream returned a body that is not JSON', { path });
                throw new UpstreamUnavailableError('Unexpected response from the Pokémon data service');
            }

            const parsed = schema.safeParse(data);
            if (!parsed.success) {
                logger.error('Upstream payload did not match the expected shape', {
                    path,
                    issues: parsed.error.issues.length,
                });
                throw new UpstreamUnavailableError('Unexpected response from the Pokémon data service');
            }
            return parsed.data;
        } finally {
            clearTimeout(timer);
        }
    }

    private transportError(err: unknown, path: string, timedOut: boolean): UpstreamUnavailableError {
        if (timedOut) {
            logger.error('Upstream request timed out', { path, timeoutMs: this.timeoutMs });
            return new UpstreamUnavailableError('The Pokémon data service timed out', true);
        }
        logger.error('Network error calling the Pokémon data service', { path, error: err });
        return new UpstreamUnavailableError('Error connecting to the Pokémon data service');
    }
}

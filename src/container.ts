/**
 * Wires repositories and services together for one database.
 */

import type { AppConfig } from './config';
import { AuthMiddleware } from './auth/middleware';
import { AuthService } from './auth/service';
import { TokenService } from './auth/tokens';
import { Database } from './db/connection';
import { PokedexRepository } from './db/pokedex-repo';
import { UserRepository } from './db/user-repo';
import { PokedexExporter } from './export/exporter';
import { PokeApiClient } from './pokeapi/client';
import type { SpeciesGateway } from './pokeapi/types';
import { PokedexService } from './pokedex/service';
import { TeamService } from './teams/service';

export interface Services {
    database: Database;
    authService: AuthService;
    authMiddleware: AuthMiddleware;
    pokedexService: PokedexService;
    teamService: TeamService;
    exporter: PokedexExporter;
    species: SpeciesGateway;
}

export interface ServiceOverrides {
    species?: SpeciesGateway;
    /** Wall clock in epoch milliseconds, shared by tokens and timestamps. */
    now?: () => number;
}

export function buildServices(
    config: Pick<AppConfig, 'auth' | 'pokeApi'>,
    database: Database,
    overrides: ServiceOverrides = {}
): Services {
    const now = overrides.now ?? Date.now;
    const currentDate = (): Date => new Date(now());

    const users = new UserRepository(database);
    const entries = new PokedexRepository(database);

    const species =
        overrides.species ?? new PokeApiClient({ baseUrl: config.pokeApi.baseUrl, timeoutMs: config.pokeApi.timeoutMs });
    const tokens = new TokenService(config.auth, now);
    const authService = new AuthService(config.auth, users, tokens);
    const pokedexService = new PokedexService(entries, species, currentDate);
    const teamService = new TeamService(database);

    return {
        database,
        authService,
        authMiddleware: new AuthMiddleware(authService),
        pokedexService,
        teamService,
        exporter: new PokedexExporter(pokedexService, teamService, currentDate),
        species,
    };
}

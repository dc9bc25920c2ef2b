/**
 * API route definitions and configuration.
 */

import type { Services } from '../container';
import { handleLogin, handleMe, handleRegister } from './handlers/auth';
import { handleHealth } from './handlers/health';
import {
    handleCreateEntry,
    handleDeleteEntry,
    handleExportPokedex,
    handleGetEntry,
    handleListPokedex,
    handlePokedexStats,
    handleUpdateEntry,
} from './handlers/pokedex';
import { handleGetPokemon, handlePokemonByType, handleSearchPokemon } from './handlers/pokemon';
import {
    handleCreateTeam,
    handleDeleteTeam,
    handleExportTeam,
    handleGetTeam,
    handleListTeams,
    handleUpdateTeam,
} from './handlers/teams';
import type { Route } from './types';
import { Logger } from '../utils/logger';

const logger = new Logger('Routes');

export const API_PREFIX = '/api/v1';

/**
 * Configure and return all API routes. Static paths come before their
 * parameterised siblings.
 */
export function configureRoutes(services: Services): Route[] {
    logger.debug('Configuring API routes');
    const { authService, pokedexService, teamService, exporter, species, database } = services;
    const api = (path: string): string => `${API_PREFIX}${path}`;

    const routes: Route[] = [
        {
            method: 'GET',
            path: '/health',
            handler: () => handleHealth(database),
            requiresAuth: false,
        },

        // auth
        {
            method: 'POST',
            path: api('/auth/register'),
            group: 'register',
            handler: (req) => handleRegister(req, authService),
            requiresAuth: false,
        },
        {
            method: 'POST',
            path: api('/auth/login'),
            group: 'login',
            handler: (req) => handleLogin(req, authService),
            requiresAuth: false,
        },
        {
            method: 'GET',
            path: api('/auth/me'),
            group: 'resources',
            handler: (req) => handleMe(req, authService),
            requiresAuth: true,
        },

        // pokedex
        {
            method: 'GET',
            path: api('/pokedex'),
            group: 'resources',
            handler: (req) => handleListPokedex(req, pokedexService),
            requiresAuth: true,
        },
        {
            method: 'POST',
            path: api('/pokedex'),
            group: 'resources',
            handler: (req) => handleCreateEntry(req, pokedexService),
            requiresAuth: true,
        },
        {
            method: 'GET',
            path: api('/pokedex/stats'),
            group: 'resources',
            handler: (req) => handlePokedexStats(req, pokedexService),
            requiresAuth: true,
        },
        {
            method: 'GET',
            path: api('/pokedex/export'),
            group: 'resources',
            handler: (req) => handleExportPokedex(req, exporter),
            requiresAuth: true,
        },
        {
            method: 'GET',
            path: api('/pokedex/:id'),
            group: 'resources',
            handler: (req) => handleGetEntry(req, pokedexService),
            requiresAuth: true,
        },
        {
            method: 'PUT',
            path: api('/pokedex/:id'),
            group: 'resources',
            handler: (req) => handleUpdateEntry(req, pokedexService),
            requiresAuth: true,
        },
        {
            method: 'PATCH',
            path: api('/pokedex/:id'),
            group: 'resources',
            handler: (req) => handleUpdateEntry(req, pokedexService),
            requiresAuth: true,
        },
        {
            method: 'DELETE',
            path: api('/pokedex/:id'),
            group: 'resources',
            handler: (req) => handleDeleteEntry(req, pokedexService),
            requiresAuth: true,
        },

        // external species data
        {
            method: 'GET',
            path: api('/pokemon/search'),
            group: 'search',
            handler: (req) => handleSearchPokemon(req, species),
            requiresAuth: true,
        },
        {
            method: 'GET',
            path: api('/pokemon/type/:type'),
            group: 'resources',
            handler: (req) => handlePokemonByType(req, species),
            requiresAuth: true,
        },
        {
            method: 'GET',
            path: api('/pokemon/:idOrName'),
            group: 'resources',
            handler: (req) => handleGetPokemon(req, species),
            requiresAuth: true,
        },

        // teams
        {
            method: 'GET',
            path: api('/teams'),
            group: 'resources',
            handler: (req) => handleListTeams(req, teamService),
            requiresAuth: true,
        },
        {
            method: 'POST',
            path: api('/teams'),
            group: 'resources',
            handler: (req) => handleCreateTeam(req, teamService),
            requiresAuth: true,
        },
        {
            method: 'GET',
            path: api('/teams/:id'),
            group: 'resources',
            handler: (req) => handleGetTeam(req, teamService),
            requiresAuth: true,
        },
        {
            method: 'PUT',
            path: api('/teams/:id'),
            group: 'resources',
            handler: (req) => handleUpdateTeam(req, teamService),
            requiresAuth: true,
        },
        {
            method: 'PATCH',
            path: api('/teams/:id'),
            group: 'resources',
            handler: (req) => handleUpdateTeam(req, teamService),
            requiresAuth: true,
        },
        {
            method: 'DELETE',
            path: api('/teams/:id'),
            group: 'resources',
            handler: (req) => handleDeleteTeam(req, teamService),
            requiresAuth: true,
        },
        {
            method: 'GET',
            path: api('/teams/:id/export'),
            group: 'resources',
            handler: (req) => handleExportTeam(req, exporter),
            requiresAuth: true,
        },
    ];

    return routes;
}

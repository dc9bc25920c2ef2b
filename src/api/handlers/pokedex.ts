/**
 * Request handlers for the caller's Pokédex.
 */

import type { AuthenticatedRequest, Response } from '../types';
import { parseInput } from '../validation';
import { PokedexExporter } from '../../export/exporter';
import { PokedexService } from '../../pokedex/service';
import { IdParamSchema } from '../../schemas/common';
import {
    CreatePokedexEntrySchema,
    ExportQuerySchema,
    ListPokedexQuerySchema,
    UpdatePokedexEntrySchema,
} from '../../schemas/pokedex';
import { attachment } from './documents';

export async function handleListPokedex(req: AuthenticatedRequest, pokedex: PokedexService): Promise<Response> {
    const filters = parseInput(ListPokedexQuerySchema, req.query);
    return { status: 200, body: await pokedex.list(req.identity, filters) };
}

export async function handleCreateEntry(req: AuthenticatedRequest, pokedex: PokedexService): Promise<Response> {
    const input = parseInput(CreatePokedexEntrySchema, req.body);
    return { status: 201, body: await pokedex.create(req.identity, input) };
}

export async function handleGetEntry(req: AuthenticatedRequest, pokedex: PokedexService): Promise<Response> {
    const { id } = parseInput(IdParamSchema, req.params);
    return { status: 200, body: await pokedex.get(req.identity, id) };
}

export async function handleUpdateEntry(req: AuthenticatedRequest, pokedex: PokedexService): Promise<Response> {
    const { id } = parseInput(IdParamSchema, req.params);
    const changes = parseInput(UpdatePokedexEntrySchema, req.body);
    return { status: 200, body: await pokedex.update(req.identity, id, changes) };
}

export async function handleDeleteEntry(req: AuthenticatedRequest, pokedex: PokedexService): Promise<Response> {
    const { id } = parseInput(IdParamSchema, req.params);
    await pokedex.delete(req.identity, id);
    return { status: 204 };
}

export async function handlePokedexStats(req: AuthenticatedRequest, pokedex: PokedexService): Promise<Response> {
    return { status: 200, body: await pokedex.stats(req.identity) };
}

export async function handleExportPokedex(req: AuthenticatedRequest, exporter: PokedexExporter): Promise<Response> {
    const { format } = parseInput(ExportQuerySchema, req.query);
    return attachment(await exporter.exportPokedex(req.identity, format));
}

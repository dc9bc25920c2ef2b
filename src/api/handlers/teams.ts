/**
 * Request handlers for battle teams.
 */

import type { AuthenticatedRequest, Response } from '../types';
import { parseInput } from '../validation';
import { PokedexExporter } from '../../export/exporter';
import { IdParamSchema } from '../../schemas/common';
import { CreateTeamSchema, UpdateTeamSchema } from '../../schemas/teams';
import { TeamService } from '../../teams/service';
import { attachment } from './documents';

export async function handleListTeams(req: AuthenticatedRequest, teams: TeamService): Promise<Response> {
    return { status: 200, body: await teams.list(req.identity) };
}

export async function handleCreateTeam(req: AuthenticatedRequest, teams: TeamService): Promise<Response> {
    const input = parseInput(CreateTeamSchema, req.body);
    return { status: 201, body: await teams.create(req.identity, input) };
}

export async function handleGetTeam(req: AuthenticatedRequest, teams: TeamService): Promise<Response> {
    const { id } = parseInput(IdParamSchema, req.params);
    return { status: 200, body: await teams.get(req.identity, id) };
}

export async function handleUpdateTeam(req: AuthenticatedRequest, teams: TeamService): Promise<Response> {
    const { id } = parseInput(IdParamSchema, req.params);
    const input = parseInput(UpdateTeamSchema, req.body);
    return { status: 200, body: await teams.update(req.identity, id, input) };
}

export async function handleDeleteTeam(req: AuthenticatedRequest, teams: TeamService): Promise<Response> {
    const { id } = parseInput(IdParamSchema, req.params);
    await teams.delete(req.identity, id);
    return { status: 204 };
}

export async function handleExportTeam(req: AuthenticatedRequest, exporter: PokedexExporter): Promise<Response> {
    const { id } = parseInput(IdParamSchema, req.params);
    return attachment(await exporter.exportTeam(req.identity, id));
}

/**
 * Produces downloadable documents of a user's collection and teams.
 */

import type { Identity } from '../auth/types';
import { PokedexService } from '../pokedex/service';
import type { ExportFormat } from '../schemas/pokedex';
import { TeamService } from '../teams/service';
import { renderPokedexCsv } from './csv';
import { renderReportPdf } from './pdf';
import { buildPokedexReport, buildTeamReport } from './report';
import { Logger } from '../utils/logger';

const logger = new Logger('PokedexExporter');

export interface ExportedDocument {
    filename: string;
    contentType: string;
    body: Buffer;
}

function safeFilePart(value: string): string {
    return value.replace(/[^A-Za-z0-9_.-]/g, '_');
}

export class PokedexExporter {
    private pokedex: PokedexService;
    private teams: TeamService;
    private now: () => Date;

    constructor(pokedex: PokedexService, teams: TeamService, now: () => Date = () => new Date()) {
        this.pokedex = pokedex;
        this.teams = teams;
        this.now = now;
    }

    /**
     * Every entry the caller owns, as PDF or CSV.
     */
    async exportPokedex(identity: Identity, format: ExportFormat = 'pdf'): Promise<ExportedDocument> {
        const entries = await this.pokedex.listAll(identity);
        logger.info('Exporting pokedex', { userId: identity.userId, format, entries: entries.length });

        const basename = `pokedex-${safeFilePart(identity.username)}`;
        if (format === 'csv') {
            return {
                filename: `${basename}.csv`,
                contentType: 'text/csv; charset=utf-8',
                body: Buffer.from(renderPokedexCsv(entries), 'utf8'),
            };
        }
        return {
            filename: `${basename}.pdf`,
            contentType: 'application/pdf',
            body: await renderReportPdf(buildPokedexReport(identity.username, entries, this.now())),
        };
    }

    async exportTeam(identity: Identity, teamId: number): Promise<ExportedDocument> {
        const team = await this.teams.get(identity, teamId);
        logger.info('Exporting team', { userId: identity.userId, teamId });
        return {
            filename: `team-${team.id}-${safeFilePart(team.name)}.pdf`,
            contentType: 'application/pdf',
            body: await renderReportPdf(buildTeamReport(team, this.now())),
        };
    }
}

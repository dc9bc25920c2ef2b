import type { Response } from '../types';
import { Database } from '../../db/connection';

export async function handleHealth(database: Database): Promise<Response> {
    const healthy = await database.isHealthy();
    return {
        status: healthy ? 200 : 503,
        body: { status: healthy ? 'ok' : 'degraded', database: healthy ? 'up' : 'down' },
    };
}

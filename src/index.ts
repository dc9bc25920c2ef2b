/**
 * Application entry point.
 */

import 'dotenv/config';

import { createApp } from './app';
import { loadConfig } from './config';
import { buildServices } from './container';
import { Database } from './db/connection';
import { Logger, setDefaultLogLevel } from './utils/logger';

const logger = new Logger('App');

async function main(): Promise<void> {
    const config = loadConfig();
    setDefaultLogLevel(config.logLevel);
    logger.info('Starting application');

    const db = new Database({ connectionString: config.databaseUrl });
    await db.connect();
    await db.migrate();

    const services = buildServices(config, db);
    const app = createApp({ config, services });

    const server = app.listen(config.port, () => {
        logger.info(`Server running on port ${config.port}`);
    });

    const shutdown = (signal: string): void => {
        logger.info(`Received ${signal}, shutting down`);
        server.close((err) => {
            if (err) {
                logger.error('Error while closing the HTTP server', { error: err });
            }
            db.disconnect()
                .then(() => process.exit(err ? 1 : 0))
                .catch((disconnectError: unknown) => {
                    logger.error('Error while closing the database pool', { error: disconnectError });
                    process.exit(1);
                });
        });
    };
    process.once('SIGINT', () => shutdown('SIGINT'));
    process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err) => {
    logger.error(`Fatal error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
});

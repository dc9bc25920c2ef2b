/**
 * Database connection manager backed by a pg connection pool.
 */

import { promises as fs } from 'fs';
import path from 'path';
import { Pool, type PoolClient, type QueryResultRow } from 'pg';

import { Logger } from '../utils/logger';

const logger = new Logger('Database');

export const SCHEMA_PATH = path.resolve(__dirname, '../../sql/schema.sql');

const UNIQUE_VIOLATION = '23505';

export interface QueryResult<R> {
    rows: R[];
    rowCount: number;
}

/**
 * Anything that runs SQL: the pool-backed Database or one transaction.
 */
export interface Queryable {
    query<R extends QueryResultRow = QueryResultRow>(sql: string, params?: unknown[]): Promise<QueryResult<R>>;
    /** Run work atomically. Inside a transaction this joins the open one. */
    transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T>;
}

/**
 * Statements issued on one checked-out client between BEGIN and COMMIT.
 */
class TransactionScope implements Queryable {
    private client: PoolClient;

    constructor(client: PoolClient) {
        this.client = client;
    }

    async query<R extends QueryResultRow = QueryResultRow>(
        sql: string,
        params: unknown[] = []
    ): Promise<QueryResult<R>> {
        logger.debug('Executing query in transaction', { sql: sql.replace(/\s+/g, ' ') });
        const result = await this.client.query<R>(sql, params);
        return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
    }

    transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
        return work(this);
    }
}

export interface DatabaseOptions {
    connectionString?: string;
    /** Use an existing pool instead of creating one from the connection string. */
    pool?: Pool;
}

export class Database implements Queryable {
    private pool: Pool;
    private connected: boolean;

    constructor(options: DatabaseOptions) {
        if (options.pool) {
            this.pool = options.pool;
        } else if (options.connectionString) {
            this.pool = new Pool({ connectionString: options.connectionString });
        } else {
            throw new Error('Database requires a connection string or a pool');
        }
        this.connected = false;
    }

    /**
     * Establish connection to the database.
     */
    async connect(): Promise<void> {
        logger.info('Connecting to database');
        await this.pool.query('SELECT 1');
        this.connected = true;
        logger.info('Database connected successfully');
    }

    /**
     * Create missing tables from the schema file.
     */
    async migrate(schemaPath: string = SCHEMA_PATH): Promise<void> {
        const sql = await fs.readFile(schemaPath, 'utf8');
        const statements = sql
            .split(';')
            .map((statement) => statement.trim())
            .filter((statement) => statement.length > 0);
        for (const statement of statements) {
            await this.query(statement);
        }
        logger.info(`Applied ${statements.length} schema statements`);
    }

    /**
     * Execute a parameterised SQL query against the database.
     */
    async query<R extends QueryResultRow = QueryResultRow>(
        sql: string,
        params: unknown[] = []
    ): Promise<QueryResult<R>> {
        if (!this.connected) {
            throw new Error('Database not connected');
        }
        logger.debug('Executing query', { sql: sql.replace(/\s+/g, ' ') });
        const result = await this.pool.query<R>(sql, params);
        return { rows: result.rows, rowCount: result.rowCount ?? result.rows.length };
    }

    /**
     * Run work on a single client inside BEGIN/COMMIT, rolling back when it throws.
     */
    async transaction<T>(work: (tx: Queryable) => Promise<T>): Promise<T> {
        if (!this.connected) {
            throw new Error('Database not connected');
        }
        const client = await this.pool.connect();
        try {
            await client.query('BEGIN');
            const result = await work(new TransactionScope(client));
            await client.query('COMMIT');
            return result;
        } catch (err) {
            try {
                await client.query('ROLLBACK');
            } catch (rollbackError) {
                logger.error('Rollback failed', { error: rollbackError });
            }
            throw err;
        } finally {
            client.release();
        }
    }

    /**
     * Close the database connection.
     */
    async disconnect(): Promise<void> {
        logger.info('Disconnecting from database');
        this.connected = false;
        await this.pool.end();
    }

    /**
     * Check if the database connection is healthy.
     */
    async isHealthy(): Promise<boolean> {
        if (!this.connected) return false;
        try {
            await this.pool.query('SELECT 1');
            return true;
        } catch (err) {
            logger.warn('Health check query failed', { error: err });
            return false;
        }
    }
}

export function isUniqueViolation(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === UNIQUE_VIOLATION;
}

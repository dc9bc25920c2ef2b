/**
 * User repository for database operations on account records.
 */

import type { Queryable } from './connection';
import type { Account } from '../auth/types';
import { Logger } from '../utils/logger';

const logger = new Logger('UserRepository');

interface UserRow {
    id: number;
    username: string;
    password_hash: string;
    is_active: boolean;
    created_at: Date;
}

function toAccount(row: UserRow): Account {
    return {
        id: row.id,
        username: row.username,
        passwordHash: row.password_hash,
        isActive: row.is_active,
        createdAt: row.created_at,
    };
}

export class UserRepository {
    private db: Queryable;

    constructor(db: Queryable) {
        this.db = db;
    }

    /**
     * Find an account by its unique ID.
     */
    async findById(id: number): Promise<Account | null> {
        logger.debug('Finding user by id', { id });
        const result = await this.db.query<UserRow>('SELECT * FROM users WHERE id = $1', [id]);
        return result.rows.length > 0 ? toAccount(result.rows[0]) : null;
    }

    /**
     * Find an account by its username.
     */
    async findByUsername(username: string): Promise<Account | null> {
        logger.debug('Finding user by username', { username });
        const result = await this.db.query<UserRow>('SELECT * FROM users WHERE username = $1', [username]);
        return result.rows.length > 0 ? toAccount(result.rows[0]) : null;
    }

    /**
     * Create a new account record in the database.
     */
    async create(account: Pick<Account, 'username' | 'passwordHash'>): Promise<Account> {
        logger.info('Creating user', { username: account.username });
        const result = await this.db.query<UserRow>(
            'INSERT INTO users (username, password_hash) VALUES ($1, $2) RETURNING *',
            [account.username, account.passwordHash]
        );
        return toAccount(result.rows[0]);
    }
}

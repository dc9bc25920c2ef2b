/**
 * Password hashing and comparison.
 */

import bcrypt from 'bcryptjs';

import { exceedsHashInput } from '../auth/password-policy';
import { Logger } from './logger';

const logger = new Logger('Crypto');

/**
 * Hash a plaintext password with a per-password salt.
 */
export async function hashPassword(password: string, rounds: number): Promise<string> {
    logger.debug('Hashing password', { rounds });
    return bcrypt.hash(password, rounds);
}

/**
 * Compare a plaintext password against a stored hash. A password longer than
 * bcrypt's input never matches, since registration caps passwords at that length.
 */
export async function comparePassword(password: string, storedHash: string): Promise<boolean> {
    logger.debug('Comparing password');
    const matches = await bcrypt.compare(password, storedHash);
    return matches && !exceedsHashInput(password);
}

/**
 * Environment-sourced configuration. Required values have no fallback:
 * a missing secret or database URL stops start-up.
 */

import { z } from 'zod';

import { LogLevel, parseLogLevel } from './utils/logger';

export const SIGNING_ALGORITHMS = ['HS256', 'HS384', 'HS512'] as const;
export type SigningAlgorithm = (typeof SIGNING_ALGORITHMS)[number];

const booleanFlag = z
    .enum(['true', 'false', '1', '0'])
    .default('false')
    .transform((value) => value === 'true' || value === '1');

const EnvSchema = z.object({
    SECRET_KEY: z.string({ required_error: 'is required' }).min(16, 'must be at least 16 characters'),
    DATABASE_URL: z
        .string({ required_error: 'is required' })
        .regex(/^postgres(ql)?:\/\//, 'must be a postgres:// connection string'),
    ALGORITHM: z.enum(SIGNING_ALGORITHMS).default('HS256'),
    ACCESS_TOKEN_EXPIRE_MINUTES: z.coerce.number().int().positive().default(1440),
    PORT: z.coerce.number().int().min(0).max(65535).default(8000),
    CORS_ORIGINS: z.string().default('http://localhost:3000,http://localhost:5173'),
    POKEAPI_BASE_URL: z.string().url().default('https://pokeapi.co/api/v2'),
    POKEAPI_TIMEOUT_MS: z.coerce.number().int().positive().max(60000).default(10000),
    PASSWORD_HASH_ROUNDS: z.coerce.number().int().min(4).max(15).default(12),
    TRUST_PROXY: booleanFlag,
    LOG_LEVEL: z
        .string()
        .default('info')
        .refine((value) => parseLogLevel(value) !== undefined, 'must be one of debug, info, warn, error, silent'),
});

export interface AppConfig {
    port: number;
    databaseUrl: string;
    auth: {
        secretKey: string;
        algorithm: SigningAlgorithm;
        tokenLifetimeMinutes: number;
        passwordHashRounds: number;
    };
    corsOrigins: string[];
    pokeApi: {
        baseUrl: string;
        timeoutMs: number;
    };
    trustProxy: boolean;
    logLevel: LogLevel;
}

export class ConfigError extends Error {
    constructor(public readonly problems: string[]) {
        super(`Invalid configuration: ${problems.join('; ')}`);
        this.name = 'ConfigError';
    }
}

export function parseOrigins(raw: string): string[] {
    return raw
        .split(',')
        .map((origin) => origin.trim().replace(/\/+$/, ''))
        .filter((origin) => origin.length > 0);
}

/**
 * Read and validate configuration from an environment map.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const problems = parsed.error.issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
        throw new ConfigError(problems);
    }

    const values = parsed.data;
    return {
        port: values.PORT,
        databaseUrl: values.DATABASE_URL,
        auth: {
            secretKey: values.SECRET_KEY,
            algorithm: values.ALGORITHM,
            tokenLifetimeMinutes: values.ACCESS_TOKEN_EXPIRE_MINUTES,
            passwordHashRounds: values.PASSWORD_HASH_ROUNDS,
        },
        corsOrigins: parseOrigins(values.CORS_ORIGINS),
        pokeApi: {
            baseUrl: values.POKEAPI_BASE_URL.replace(/\/+$/, ''),
            timeoutMs: values.POKEAPI_TIMEOUT_MS,
        },
        trustProxy: values.TRUST_PROXY,
        logLevel: parseLogLevel(values.LOG_LEVEL) ?? LogLevel.INFO,
    };
}

/**
 * Context-tagged logger used across the application.
 */

export enum LogLevel {
    DEBUG = 0,
    INFO = 1,
    WARN = 2,
    ERROR = 3,
    SILENT = 4,
}

export type LogContext = Record<string, unknown>;

const LEVEL_NAMES: Record<string, LogLevel> = {
    debug: LogLevel.DEBUG,
    info: LogLevel.INFO,
    warn: LogLevel.WARN,
    error: LogLevel.ERROR,
    silent: LogLevel.SILENT,
};

let defaultLevel: LogLevel = LogLevel.INFO;

/**
 * Set the level used by every logger that was not given an explicit one.
 */
export function setDefaultLogLevel(level: LogLevel): void {
    defaultLevel = level;
}

export function parseLogLevel(name: string): LogLevel | undefined {
    return LEVEL_NAMES[name.toLowerCase()];
}

function formatValue(value: unknown): string {
    if (value instanceof Error) {
        return JSON.stringify(value.message);
    }
    if (value instanceof Date) {
        return value.toISOString();
    }
    if (typeof value === 'string') {
        return /\s|"/.test(value) ? JSON.stringify(value) : value;
    }
    if (typeof value === 'object' && value !== null) {
        return JSON.stringify(value);
    }
    return String(value);
}

export function formatContext(context?: LogContext): string {
    if (!context) return '';
    const pairs = Object.entries(context)
        .filter(([, value]) => value !== undefined)
        .map(([key, value]) => `${key}=${formatValue(value)}`);
    return pairs.length > 0 ? ` ${pairs.join(' ')}` : '';
}

export class Logger {
    private context: string;
    private level?: LogLevel;

    constructor(context: string, level?: LogLevel) {
        this.context = context;
        this.level = level;
    }

    debug(message: string, context?: LogContext): void {
        if (this.currentLevel() <= LogLevel.DEBUG) {
            this.log('DEBUG', message, context);
        }
    }

    info(message: string, context?: LogContext): void {
        if (this.currentLevel() <= LogLevel.INFO) {
            this.log('INFO', message, context);
        }
    }

    warn(message: string, context?: LogContext): void {
        if (this.currentLevel() <= LogLevel.WARN) {
            this.log('WARN', message, context);
        }
    }

    error(message: string, context?: LogContext): void {
        if (this.currentLevel() <= LogLevel.ERROR) {
            this.log('ERROR', message, context);
        }
    }

    private currentLevel(): LogLevel {
        return this.level ?? defaultLevel;
    }

    private log(level: string, message: string, context?: LogContext): void {
        const timestamp = new Date().toISOString();
        const line = `[${timestamp}] [${level}] [${this.context}] ${message}${formatContext(context)}`;
        if (level === 'ERROR') {
            console.error(line);
        } else {
            console.log(line);
        }
    }
}

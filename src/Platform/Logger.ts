/**
 * Minimal structured logger
 *
 * One JSON line per entry on stdout/stderr. The threshold comes from the loaded
 * configuration, or from VESTING_LOG_LEVEL read at call time.
 */

import { LogLevelSchema } from './Config.js';
import type { LogLevel } from './Config.js';

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export interface Logger {
    debug(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    error(message: string, error?: unknown, meta?: Record<string, unknown>): void;
}

let configured: LogLevel | undefined;

/**
 * Pins the threshold for the process; until called, VESTING_LOG_LEVEL decides.
 */
export function setLogLevel(level: LogLevel): void {
    configured = level;
}

function threshold(): LogLevel {
    return configured ?? LogLevelSchema.catch('info').parse(process.env['VESTING_LOG_LEVEL']);
}

function describeError(error: unknown): unknown {
    if (error instanceof Error) {
        return { name: error.name, message: error.message, stack: error.stack ?? '' };
    }
    return error === undefined ? undefined : String(error);
}

function write(level: Exclude<LogLevel, 'silent'>, scope: string, message: string, extra: Record<string, unknown>): void {
    if (RANK[level] < RANK[threshold()]) return;
    const line = JSON.stringify(
        { level, scope, message, ...extra, timestamp: new Date().toISOString() },
        (_key, v: unknown) => (typeof v === 'bigint' ? v.toString() : v)
    );
    if (level === 'error' || level === 'warn') console.error(line);
    else console.log(line);
}

export function createLogger(scope: string): Logger {
    return {
        debug: (message, meta) => write('debug', scope, message, { meta }),
        info: (message, meta) => write('info', scope, message, { meta }),
        warn: (message, meta) => write('warn', scope, message, { meta }),
        error: (message, error, meta) => write('error', scope, message, { error: describeError(error), meta })
    };
}

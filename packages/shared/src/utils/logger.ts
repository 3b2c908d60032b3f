/**
 * @perch/shared: Logger
 *
 * Tagged console logging in the `  📥 [Source] message` shape used across
 * the project. A single process-wide threshold filters output; it starts
 * from PERCH_LOG_LEVEL and is later replaced by the loaded config.
 */

import pc from 'picocolors';

// ─── Types ────────────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
    debug(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    error(message: string, ...details: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && (LOG_LEVELS as readonly string[]).includes(value);
}

// ─── Threshold ────────────────────────────────────────────────────

const envLevel = process.env['PERCH_LOG_LEVEL'];
let threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

export function setLogLevel(level: LogLevel): void {
    threshold = level;
}

export function getLogLevel(): LogLevel {
    return threshold;
}

function enabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[threshold];
}

// ─── Factory ──────────────────────────────────────────────────────

export function createLogger(source: string): Logger {
    const tag = pc.cyan(`[${source}]`);

    return {
        debug(message, ...details) {
            if (enabled('debug')) console.log(`  ${pc.dim('·')} ${tag} ${pc.dim(message)}`, ...details);
        },
        info(message, ...details) {
            if (enabled('info')) console.log(`  ${pc.green('●')} ${tag} ${message}`, ...details);
        },
        warn(message, ...details) {
            if (enabled('warn')) console.warn(`  ⚠️  ${tag} ${pc.yellow(message)}`, ...details);
        },
        error(message, ...details) {
            if (enabled('error')) console.error(`  ❌ ${tag} ${pc.red(message)}`, ...details);
        },
    };
}

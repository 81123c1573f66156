/**
 * Centralized logger.
 * Everything goes to stderr: stdout belongs to the MCP stdio transport.
 */

export const LOG_PREFIX = 'shape-morph';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

/** Log levels, lowest first */
export type LogLevel = (typeof LOG_LEVELS)[number];

interface LoggerConfig {
    /** Messages below this level are dropped */
    level: LogLevel;
}

const config: LoggerConfig = {
    level: 'warn',
};

function enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(config.level);
}

function formatMessage(level: LogLevel, message: string): string {
    return `[${LOG_PREFIX}] ${level.toUpperCase()} ${message}`;
}

export function debug(message: string, ...args: unknown[]): void {
    if (!enabled('debug')) return;
    console.error(formatMessage('debug', message), ...args);
}

export function info(message: string, ...args: unknown[]): void {
    if (!enabled('info')) return;
    console.error(formatMessage('info', message), ...args);
}

export function warn(message: string, ...args: unknown[]): void {
    if (!enabled('warn')) return;
    console.error(formatMessage('warn', message), ...args);
}

/**
 * Log an error message. Error instances contribute their message and stack.
 */
export function error(message: string, err?: unknown, ...args: unknown[]): void {
    if (err instanceof Error) {
        console.error(formatMessage('error', message), err.message, err.stack, ...args);
    } else if (err !== undefined) {
        console.error(formatMessage('error', message), err, ...args);
    } else {
        console.error(formatMessage('error', message), ...args);
    }
}

export function setLogLevel(level: LogLevel): void {
    config.level = level;
}

export function getLogLevel(): LogLevel {
    return config.level;
}

const LEVEL_NAMES: ReadonlySet<string> = new Set(LOG_LEVELS);

export function isLogLevel(value: unknown): value is LogLevel {
    return typeof value === 'string' && LEVEL_NAMES.has(value);
}

/**
 * Logger namespace object for convenience
 */
export const logger = {
    debug,
    info,
    warn,
    error,
    setLogLevel,
    getLogLevel,
};

export default logger;

/**
 * Upload Client Logger
 * Leveled console logging, one prefix per scope.
 */

export type LogLevel = 'silent' | 'error' | 'warn' | 'info' | 'debug' | 'trace';

export interface Logger {
    error(message: string, ...args: unknown[]): void;
    warn(message: string, ...args: unknown[]): void;
    info(message: string, ...args: unknown[]): void;
    debug(message: string, ...args: unknown[]): void;
    trace(message: string, ...args: unknown[]): void;
}

const LOG_LEVELS: Record<LogLevel, number> = {
    silent: 0,
    error: 1,
    warn: 2,
    info: 3,
    debug: 4,
    trace: 5
};

function isLogLevel(value: string): value is LogLevel {
    return Object.keys(LOG_LEVELS).includes(value);
}

let currentLevel: LogLevel = 'info';

// Detect initial log level from env
if (typeof process !== 'undefined' && process.env.UPLOAD_CLIENT_LOG_LEVEL) {
    const envLevel = process.env.UPLOAD_CLIENT_LOG_LEVEL.toLowerCase();
    if (isLogLevel(envLevel)) {
        currentLevel = envLevel;
    }
}

const PREFIX = process.env.UPLOAD_CLIENT_LOG_PREFIX || 'upload-client';

export function getLogLevel(): LogLevel {
    return currentLevel;
}

export function setLogLevel(level: LogLevel): void {
    if (isLogLevel(level)) {
        currentLevel = level;
    }
}

class ConsoleLogger implements Logger {
    constructor(private readonly scope: string) {}

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVELS[level] <= LOG_LEVELS[currentLevel];
    }

    private format(message: string): string {
        return `[${PREFIX}:${this.scope}] ${message}`;
    }

    error(message: string, ...args: unknown[]): void {
        if (this.shouldLog('error')) {
            console.error(this.format(message), ...args);
        }
    }

    warn(message: string, ...args: unknown[]): void {
        if (this.shouldLog('warn')) {
            console.warn(this.format(message), ...args);
        }
    }

    info(message: string, ...args: unknown[]): void {
        if (this.shouldLog('info')) {
            console.info(this.format(message), ...args);
        }
    }

    debug(message: string, ...args: unknown[]): void {
        if (this.shouldLog('debug')) {
            console.debug(this.format(message), ...args);
        }
    }

    trace(message: string, ...args: unknown[]): void {
        if (this.shouldLog('trace')) {
            console.log(this.format(message), ...args);
        }
    }
}

const loggers = new Map<string, Logger>();

export function getLogger(scope = 'core'): Logger {
    let logger = loggers.get(scope);
    if (!logger) {
        logger = new ConsoleLogger(scope);
        loggers.set(scope, logger);
    }
    return logger;
}

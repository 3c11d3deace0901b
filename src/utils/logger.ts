/**
 * Scoped stderr logger
 * Threshold comes from LOG_LEVEL, DEBUG=1 forces debug output
 */

import chalk from 'chalk';
import { LOG_LEVELS, type LogLevel } from '../config.js';
import { envBool, envChoice } from './env.js';

const LEVEL_RANK: Record<LogLevel, number> = {
    error: 0,
    warn: 1,
    info: 2,
    debug: 3,
};

const LEVEL_STYLE: Record<LogLevel, (text: string) => string> = {
    error: chalk.hex('#EF4444'),
    warn: chalk.hex('#F59E0B'),
    info: chalk.hex('#06B6D4'),
    debug: chalk.gray,
};

export interface Logger {
    error(message: string, ...details: unknown[]): void;
    warn(message: string, ...details: unknown[]): void;
    info(message: string, ...details: unknown[]): void;
    debug(message: string, ...details: unknown[]): void;
}

let levelOverride: LogLevel | undefined;

/**
 * Pin the threshold for every logger, e.g. from a --verbose flag
 */
export function setLogLevel(level: LogLevel | undefined): void {
    levelOverride = level;
}

export function currentLogLevel(): LogLevel {
    if (levelOverride) return levelOverride;
    if (envBool(process.env.DEBUG, false)) return 'debug';
    return envChoice(process.env.LOG_LEVEL, LOG_LEVELS, 'warn');
}

function isPlainMode(): boolean {
    return process.env.UI_MODE?.trim().toLowerCase() === 'plain' || process.env.NO_COLOR !== undefined;
}

export function createLogger(scope: string): Logger {
    const emit = (level: LogLevel, message: string, details: unknown[]) => {
        if (LEVEL_RANK[level] > LEVEL_RANK[currentLogLevel()]) return;
        const tag = `[${scope} ${level}]`;
        const prefix = isPlainMode() ? tag : LEVEL_STYLE[level](tag);
        console.error(prefix, message, ...details);
    };

    return {
        error: (message, ...details) => emit('error', message, details),
        warn: (message, ...details) => emit('warn', message, details),
        info: (message, ...details) => emit('info', message, details),
        debug: (message, ...details) => emit('debug', message, details),
    };
}

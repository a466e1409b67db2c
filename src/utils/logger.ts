/**
 * Console logging for spin-catalog
 * Provides leveled, structured log lines with JSON metadata
 */

import { LOG_LEVEL } from '../config/constants';

/**
 * Log levels
 */
export enum LogLevel {
    ERROR = 'error',
    WARN = 'warn',
    INFO = 'info',
    DEBUG = 'debug',
}

const LEVEL_ORDER: readonly LogLevel[] = [LogLevel.ERROR, LogLevel.WARN, LogLevel.INFO, LogLevel.DEBUG];

/**
 * Logger interface
 */
export interface Logger {
    error(message: string, meta?: Record<string, unknown>): void;
    warn(message: string, meta?: Record<string, unknown>): void;
    info(message: string, meta?: Record<string, unknown>): void;
    debug(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Map a free-form level name onto a LogLevel, or undefined when unknown
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (!value) {
        return undefined;
    }
    const normalized = value.trim().toLowerCase();
    return LEVEL_ORDER.find(level => level === normalized);
}

/**
 * Console logger implementation
 */
export class ConsoleLogger implements Logger {
    private level: LogLevel;

    constructor(level?: LogLevel) {
        this.level = level ?? parseLogLevel(process.env['LOG_LEVEL'] || LOG_LEVEL) ?? LogLevel.INFO;
    }

    setLevel(level: LogLevel): void {
        this.level = level;
    }

    getLevel(): LogLevel {
        return this.level;
    }

    private shouldLog(level: LogLevel): boolean {
        return LEVEL_ORDER.indexOf(level) <= LEVEL_ORDER.indexOf(this.level);
    }

    private formatMessage(level: LogLevel, message: string, meta?: Record<string, unknown>): string {
        const timestamp = new Date().toISOString();
        const metaStr = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `[${timestamp}] ${level.toUpperCase()}: ${message}${metaStr}`;
    }

    error(message: string, meta?: Record<string, unknown>): void {
        if (this.shouldLog(LogLevel.ERROR)) {
            console.error(this.formatMessage(LogLevel.ERROR, message, meta));
        }
    }

    warn(message: string, meta?: Record<string, unknown>): void {
        if (this.shouldLog(LogLevel.WARN)) {
            console.warn(this.formatMessage(LogLevel.WARN, message, meta));
        }
    }

    info(message: string, meta?: Record<string, unknown>): void {
        if (this.shouldLog(LogLevel.INFO)) {
            console.info(this.formatMessage(LogLevel.INFO, message, meta));
        }
    }

    debug(message: string, meta?: Record<string, unknown>): void {
        if (this.shouldLog(LogLevel.DEBUG)) {
            console.debug(this.formatMessage(LogLevel.DEBUG, message, meta));
        }
    }
}

/**
 * Default logger instance
 */
export const logger = new ConsoleLogger();

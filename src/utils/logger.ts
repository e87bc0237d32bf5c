/**
 * Centralized logging utility for gvwidget
 *
 * Writes timestamped, level-filtered lines to the console. Runs unchanged in
 * the notebook kernel (Node) and in the widget's browser context.
 */

/**
 * Log levels, lowest to highest priority
 */
export enum LogLevel {
    DEBUG = 'DEBUG',
    INFO = 'INFO',
    WARNING = 'WARNING',
    ERROR = 'ERROR',
}

const LOG_LEVEL_PRIORITY: Record<LogLevel, number> = {
    [LogLevel.DEBUG]: 0,
    [LogLevel.INFO]: 1,
    [LogLevel.WARNING]: 2,
    [LogLevel.ERROR]: 3,
};

/**
 * Parse a level name (case-insensitive), or return undefined if unknown
 */
export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (!value) {
        return undefined;
    }
    const upper = value.trim().toUpperCase();
    return Object.values(LogLevel).find((level) => level === upper);
}

/**
 * Usage:
 *   import { logger } from '../utils/logger';
 *   logger.info('Mounting browser');
 *   logger.error('Failed to mount browser', error);
 */
class Logger {
    private readonly prefix = '[gvwidget]';
    private minLevel: LogLevel = LogLevel.INFO;

    public setMinLevel(level: LogLevel): void {
        this.minLevel = level;
    }

    public getMinLevel(): LogLevel {
        return this.minLevel;
    }

    public debug(message: string, ...args: unknown[]): void {
        this.log(LogLevel.DEBUG, message, ...args);
    }

    public info(message: string, ...args: unknown[]): void {
        this.log(LogLevel.INFO, message, ...args);
    }

    public warning(message: string, ...args: unknown[]): void {
        this.log(LogLevel.WARNING, message, ...args);
    }

    /**
     * Log an error message, appending the error's message and stack when given
     */
    public error(message: string, error?: unknown): void {
        const errorDetails = error instanceof Error ? error.message : String(error);
        const fullMessage = error !== undefined ? `${message}: ${errorDetails}` : message;

        if (error instanceof Error && error.stack) {
            this.log(LogLevel.ERROR, fullMessage, error.stack);
        } else {
            this.log(LogLevel.ERROR, fullMessage);
        }
    }

    private shouldLog(level: LogLevel): boolean {
        return LOG_LEVEL_PRIORITY[level] >= LOG_LEVEL_PRIORITY[this.minLevel];
    }

    private log(level: LogLevel, message: string, ...args: unknown[]): void {
        if (!this.shouldLog(level)) {
            return;
        }

        const timestamp = new Date().toISOString().substring(11, 23); // HH:mm:ss.SSS
        const formattedMessage = `${this.prefix} [${timestamp}] [${level}] ${message}`;

        switch (level) {
            case LogLevel.DEBUG:
                console.debug(formattedMessage, ...args);
                break;
            case LogLevel.INFO:
                console.log(formattedMessage, ...args);
                break;
            case LogLevel.WARNING:
                console.warn(formattedMessage, ...args);
                break;
            case LogLevel.ERROR:
                console.error(formattedMessage, ...args);
                break;
        }
    }
}

// Export singleton instance
export const logger = new Logger();

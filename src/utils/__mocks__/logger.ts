/**
 * Mock logger for testing
 */

export const logger = {
    debug: jest.fn(),
    info: jest.fn(),
    warning: jest.fn(),
    error: jest.fn(),
    setMinLevel: jest.fn(),
    getMinLevel: jest.fn(() => 'INFO'),
};

export enum LogLevel {
    DEBUG = 'DEBUG',
    INFO = 'INFO',
    WARNING = 'WARNING',
    ERROR = 'ERROR',
}

export function parseLogLevel(value: string | undefined): LogLevel | undefined {
    if (!value) {
        return undefined;
    }
    const upper = value.trim().toUpperCase();
    return Object.values(LogLevel).find((level) => level === upper);
}

/**
 * Centralized error types and message formatting
 *
 * Configuration errors raised by the visualization engine itself are not
 * wrapped here: they reach the caller unchanged.
 */

import { logger } from './logger';

/**
 * What the library was doing when an error occurred
 */
export enum ErrorContext {
    CONFIG_LOAD = 'loading configuration',
    TRACK_BUILD = 'building track',
    RESOURCE_RESOLVE = 'resolving resource',
    BROWSER_MOUNT = 'mounting browser',
    BROWSER_REMOVE = 'removing browser',
}

export class GvError extends Error {
    constructor(
        message: string,
        public readonly context: ErrorContext,
        public readonly cause?: Error
    ) {
        super(message);
        this.name = 'GvError';
    }
}

export class ValidationError extends GvError {
    constructor(message: string, parameterName?: string) {
        const fullMessage = parameterName
            ? `Invalid parameter '${parameterName}': ${message}`
            : message;
        super(fullMessage, ErrorContext.CONFIG_LOAD);
        this.name = 'ValidationError';
    }
}

export class UnknownTrackFormatError extends GvError {
    constructor(
        public readonly source: string,
        public readonly format: string
    ) {
        super(
            `Cannot infer track type for '${source}' (format '${format}'). ` +
                `Pass an explicit 'type' or 'format' option.`,
            ErrorContext.TRACK_BUILD
        );
        this.name = 'UnknownTrackFormatError';
    }
}

export class ResourceNotFoundError extends GvError {
    constructor(public readonly path: string) {
        super(`File not found: ${path}`, ErrorContext.RESOURCE_RESOLVE);
        this.name = 'ResourceNotFoundError';
    }
}

/**
 * Format error message for display
 *
 * @param error - Error instance
 * @param context - Operation context, used unless the error carries its own
 * @returns Message of the form "Failed <context>: <message>"
 */
export function formatErrorMessage(error: unknown, context: ErrorContext): string {
    if (error instanceof GvError) {
        return `Failed ${error.context}: ${error.message}`;
    }

    if (error instanceof Error) {
        return `Failed ${context}: ${error.message}`;
    }

    return `Failed ${context}: ${String(error)}`;
}

/**
 * Log an error with context and hand it back unchanged, for use in rethrows
 */
export function reportError<E>(error: E, context: ErrorContext): E {
    logger.error(formatErrorMessage(error, context), error);
    return error;
}

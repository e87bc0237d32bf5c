/**
 * Library settings
 *
 * Read from GVWIDGET_* environment variables in the kernel. Invalid values fall
 * back to the defaults with a warning.
 */

import { LogLevel, logger, parseLogLevel } from '../utils/logger';

export interface Settings {
    /** Genome used by sessions until `ref()` is called */
    defaultGenome: string;

    /** Minimum level the logger emits */
    logLevel: LogLevel;

    /** Base URL under which the notebook server exposes local files, if any */
    filesBaseUrl?: string;
}

export const DEFAULT_SETTINGS: Settings = {
    defaultGenome: 'hg38',
    logLevel: LogLevel.INFO,
};

export type Environment = Record<string, string | undefined>;

function currentEnvironment(): Environment {
    return typeof process !== 'undefined' ? process.env : {};
}

/**
 * Build settings from an environment record
 *
 * @param env - Variables to read (defaults to process.env when available)
 */
export function loadSettings(env: Environment = currentEnvironment()): Settings {
    const settings: Settings = { ...DEFAULT_SETTINGS };

    const genome = env.GVWIDGET_GENOME?.trim();
    if (genome) {
        settings.defaultGenome = genome;
    }

    const rawLevel = env.GVWIDGET_LOG_LEVEL;
    if (rawLevel !== undefined) {
        const level = parseLogLevel(rawLevel);
        if (level) {
            settings.logLevel = level;
        } else {
            logger.warning(`Ignoring unknown GVWIDGET_LOG_LEVEL '${rawLevel}'`);
        }
    }

    const filesUrl = env.GVWIDGET_FILES_URL?.trim();
    if (filesUrl) {
        settings.filesBaseUrl = filesUrl;
    }

    return settings;
}

/**
 * Apply settings that have process-wide effect (currently the log level)
 */
export function applySettings(settings: Settings): void {
    logger.setMinLevel(settings.logLevel);
}

/**
 * Browser configuration loading
 *
 * Accepts igv.js-style configuration objects (as saved from an igv.js session
 * or written by hand) and validates them into a BrowserConfig.
 */

import type {
    BrowserConfig,
    CustomGenome,
    GenomeReference,
    Locus,
} from '../types/browser-types';
import type { Track } from '../types/track-types';
import { ValidationError } from '../utils/error-handler';
import { logger } from '../utils/logger';
import { createTrack } from './track-builder';
import { DEFAULT_SETTINGS } from './settings';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function parseGenome(value: unknown, defaultGenome: string): GenomeReference {
    if (value === undefined || value === null) {
        return defaultGenome;
    }
    if (typeof value === 'string') {
        if (value.trim().length === 0) {
            throw new ValidationError('genome must not be empty', 'genome');
        }
        return value;
    }
    if (isRecord(value)) {
        if (typeof value.fastaURL !== 'string' || value.fastaURL.length === 0) {
            throw new ValidationError('custom genome requires a fastaURL', 'genome');
        }
        const genome: CustomGenome = { fastaURL: value.fastaURL };
        for (const key of ['id', 'name', 'indexURL', 'cytobandURL', 'aliasURL'] as const) {
            const field = value[key];
            if (field === undefined || field === null) {
                continue;
            }
            if (typeof field !== 'string') {
                throw new ValidationError(`expected ${key} to be a string`, 'genome');
            }
            genome[key] = field;
        }
        return genome;
    }
    throw new ValidationError('expected a genome identifier or custom genome object', 'genome');
}

function parseLocus(value: unknown): Locus {
    if (value === undefined || value === null) {
        return null;
    }
    if (typeof value === 'string') {
        return value;
    }
    if (Array.isArray(value) && value.every((item): item is string => typeof item === 'string')) {
        return [...value];
    }
    throw new ValidationError('expected a string or a list of strings', 'locus');
}

function parseTracks(value: unknown): Track[] {
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw new ValidationError('expected a list of tracks', 'tracks');
    }
    return value.map((entry: unknown, index) => {
        if (!isRecord(entry)) {
            throw new ValidationError(`track ${index} is not an object`, 'tracks');
        }
        return createTrack(entry);
    });
}

/**
 * Validate an untyped configuration object
 *
 * @param value - Object with optional `genome`, `locus` and `tracks` fields
 * @param defaultGenome - Genome used when the object has none
 */
export function configFromObject(
    value: unknown,
    defaultGenome: string = DEFAULT_SETTINGS.defaultGenome
): BrowserConfig {
    if (!isRecord(value)) {
        throw new ValidationError('configuration must be a JSON object');
    }

    const config: BrowserConfig = {
        genome: parseGenome(value.genome, defaultGenome),
        locus: parseLocus(value.locus),
        tracks: parseTracks(value.tracks),
    };
    logger.debug(`Loaded configuration with ${config.tracks.length} track(s)`);
    return config;
}

/**
 * Parse a JSON-encoded configuration
 */
export function parseConfig(
    json: string,
    defaultGenome: string = DEFAULT_SETTINGS.defaultGenome
): BrowserConfig {
    let value: unknown;
    try {
        value = JSON.parse(json);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ValidationError(`configuration is not valid JSON (${reason})`);
    }
    return configFromObject(value, defaultGenome);
}

/**
 * Copy a configuration; the genome, locus list and each track object are copied
 */
export function cloneConfig(config: BrowserConfig): BrowserConfig {
    return {
        genome: typeof config.genome === 'string' ? config.genome : { ...config.genome },
        locus: Array.isArray(config.locus) ? [...config.locus] : config.locus,
        tracks: config.tracks.map((t) => ({ ...t })),
    };
}

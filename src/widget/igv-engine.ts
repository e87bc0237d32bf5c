/**
 * igv.js behind the bridge's engine interface
 */

import igv, { type Browser, type CreateOpt } from 'igv';
import { type Track, isTrackType } from '../types/track-types';
import { ValidationError } from '../utils/error-handler';
import type { EngineOptions, VisualizationEngine } from './widget-bridge';

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isGenome(value: unknown): boolean {
    return typeof value === 'string' || (isRecord(value) && typeof value.fastaURL === 'string');
}

function isLocus(value: unknown): boolean {
    return (
        value === undefined ||
        typeof value === 'string' ||
        (Array.isArray(value) && value.every((item) => typeof item === 'string'))
    );
}

function isTrackLoad(value: unknown): boolean {
    return (
        isRecord(value) &&
        isTrackType(value.type) &&
        typeof value.url === 'string' &&
        (value.indexURL === undefined || typeof value.indexURL === 'string')
    );
}

/**
 * Check the fields igv.js reads before it builds anything
 */
function isCreateOpt(options: object): options is CreateOpt {
    return (
        isRecord(options) &&
        isGenome(options.genome) &&
        isLocus(options.locus) &&
        Array.isArray(options.tracks) &&
        options.tracks.every(isTrackLoad)
    );
}

/** igv.js expects a missing index to be absent, not null */
function toTrackLoad(track: Track): Record<string, unknown> {
    const { indexURL, ...rest } = track;
    return indexURL === null ? rest : { ...rest, indexURL };
}

/**
 * Map engine options onto igv.js `createBrowser` options
 *
 * @throws ValidationError if a track or the genome cannot be handed to igv.js
 */
export function toCreateOptions(options: EngineOptions): CreateOpt {
    const createOptions = { ...options, tracks: options.tracks.map(toTrackLoad) };
    if (!isCreateOpt(createOptions)) {
        throw new ValidationError('configuration cannot be passed to igv.js', 'tracks');
    }
    return createOptions;
}

export const igvEngine: VisualizationEngine<Browser> = {
    createBrowser: (container, options) => igv.createBrowser(container, toCreateOptions(options)),
    removeBrowser: (browser) => igv.removeBrowser(browser),
};

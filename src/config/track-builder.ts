/**
 * Track Builder
 *
 * Turns a bare source, a [data, index] pair, or an options record into a
 * fully-typed track. Track type comes from an explicit `type`, else the
 * declared `format`, else the file extension.
 */

import {
    IndexedTrackSource,
    Track,
    TrackArgument,
    TrackOptions,
    TrackType,
} from '../types/track-types';
import { ValidationError } from '../utils/error-handler';
import { trackDisplayName } from '../utils/format-utils';
import {
    alignmentDefaults,
    annotationDefaults,
    variantDefaults,
    wigDefaults,
} from './track-defaults';
import { guessFormat, resolveTrackType } from './track-formats';

interface CoreTrackFields {
    name: string;
    url: string;
    indexURL: string | null;
}

function isIndexedSource(value: unknown): value is readonly unknown[] {
    return Array.isArray(value);
}

/**
 * Check a [data, index] source at run time; callers may pass parsed JSON
 */
function indexedPair(source: readonly unknown[]): IndexedTrackSource {
    const length: number = source.length;
    if (length !== 2) {
        throw new ValidationError(
            `expected a [data, index] pair, got ${length} element(s)`,
            'source'
        );
    }
    const [dataSource, indexSource] = source;
    if (typeof dataSource !== 'string' || typeof indexSource !== 'string') {
        throw new ValidationError('expected a [data, index] pair of strings', 'source');
    }
    return [dataSource, indexSource];
}

function withoutUndefined(entry: Readonly<Record<string, unknown>>): Record<string, unknown> {
    const result: Record<string, unknown> = {};
    for (const [key, value] of Object.entries(entry)) {
        if (value !== undefined) {
            result[key] = value;
        }
    }
    return result;
}

function optionalString(value: unknown, parameterName: string): string | undefined {
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string' || value.length === 0) {
        throw new ValidationError('expected a non-empty string', parameterName);
    }
    return value;
}

/**
 * Layer type defaults, caller options and core fields, in that order
 */
function assemble(
    type: TrackType,
    options: Record<string, unknown>,
    core: CoreTrackFields
): Track {
    switch (type) {
        case 'annotation':
            return Object.assign(annotationDefaults(), options, core, { type });
        case 'wig':
            return Object.assign(wigDefaults(), options, core, { type });
        case 'alignment':
            return Object.assign(alignmentDefaults(), options, core, { type });
        case 'variant':
            return Object.assign(variantDefaults(), options, core, { type });
    }
}

/**
 * Create a track from a single config entry
 *
 * The entry must carry `url`. `indexURL` is only ever taken from the entry
 * itself; it is never derived from the data file name.
 *
 * @param entry - Untyped track record, e.g. one element of a config's `tracks`
 * @throws ValidationError on missing or mistyped core fields
 * @throws UnknownTrackFormatError when no type can be resolved
 */
export function createTrack(entry: Readonly<Record<string, unknown>>): Track {
    const url = optionalString(entry.url, 'url');
    if (url === undefined) {
        throw new ValidationError('track requires a url', 'url');
    }

    const indexURL = optionalString(entry.indexURL, 'indexURL') ?? null;
    const format = optionalString(entry.format, 'format');
    const name = optionalString(entry.name, 'name') ?? trackDisplayName(url);
    const type = resolveTrackType(entry.type, format ?? guessFormat(url), url);

    return assemble(type, withoutUndefined(entry), { name, url, indexURL });
}

/**
 * Build a track
 *
 * @example
 *   track('fragments.bed')
 *   track(['example.bam', 'example.bam.bai'])
 *   track('10x_cov.bw', { name: '10x coverage', autoscale: true })
 *   track(undefined, { url: 'https://example.org/genes.gtf' })
 *
 * @param source - Bare path/URL, [data, index] pair, or an existing track. An
 *   existing track is returned as-is when no options are given; otherwise the
 *   options are merged over it and the result is validated as a new track.
 * @param options - Display options; explicit values override inferred defaults
 */
export function track(source?: TrackArgument, options: TrackOptions = {}): Track {
    if (source === undefined) {
        return createTrack(options);
    }

    if (typeof source === 'string') {
        if (options.indexURL !== undefined && options.indexURL !== null) {
            throw new ValidationError(
                'an index file must be given together with its data file as a [data, index] pair',
                'indexURL'
            );
        }
        return createTrack({ ...options, url: source, indexURL: null });
    }

    if (isIndexedSource(source)) {
        const [dataSource, indexSource] = indexedPair(source);
        return createTrack({ ...options, url: dataSource, indexURL: indexSource });
    }

    const overrides = withoutUndefined(options);
    if (Object.keys(overrides).length === 0) {
        return source;
    }
    return createTrack({ ...source, ...overrides });
}

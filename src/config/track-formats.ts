/**
 * File format → track type lookup
 *
 * The mapping is a fixed table. Unknown formats fail fast rather than falling
 * back to a generic track type.
 */

import { TrackType, isTrackType } from '../types/track-types';
import { UnknownTrackFormatError, ValidationError } from '../utils/error-handler';

export const FORMAT_TRACK_TYPES: Readonly<Record<string, TrackType>> = {
    bam: 'alignment',
    cram: 'alignment',
    sam: 'alignment',

    bed: 'annotation',
    bedpe: 'annotation',
    gff: 'annotation',
    gff3: 'annotation',
    gtf: 'annotation',
    bb: 'annotation',
    bigbed: 'annotation',

    wig: 'wig',
    bw: 'wig',
    bigwig: 'wig',
    bg: 'wig',
    bedgraph: 'wig',

    vcf: 'variant',
};

/**
 * Guess a file format from its name
 *
 * Uses the last extension, lower-cased; a trailing ".gz" is skipped.
 * Query strings and fragments are ignored so signed URLs work.
 *
 * @example guessFormat('calls.vcf.gz') === 'vcf'
 */
export function guessFormat(source: string): string {
    const withoutQuery = source.split(/[?#]/)[0];
    const filename = withoutQuery.substring(withoutQuery.lastIndexOf('/') + 1);
    const parts = filename.split('.');

    let format = parts[parts.length - 1].toLowerCase();
    if (format === 'gz' && parts.length > 2) {
        format = parts[parts.length - 2].toLowerCase();
    }
    return format;
}

/**
 * Resolve the track type from an explicit type or a file format
 *
 * @param explicitType - `type` given by the caller, if any; it always wins
 * @param format - Declared or guessed file format
 * @param source - Track source, for error messages
 * @throws ValidationError if `explicitType` is not a track type
 * @throws UnknownTrackFormatError if the format is not in the table
 */
export function resolveTrackType(
    explicitType: unknown,
    format: string,
    source: string = format
): TrackType {
    if (explicitType !== undefined && explicitType !== null) {
        if (!isTrackType(explicitType)) {
            throw new ValidationError(
                `expected one of annotation, wig, alignment, variant; got '${String(explicitType)}'`,
                'type'
            );
        }
        return explicitType;
    }

    const key = format.toLowerCase();
    if (!Object.prototype.hasOwnProperty.call(FORMAT_TRACK_TYPES, key)) {
        throw new UnknownTrackFormatError(source, format);
    }
    return FORMAT_TRACK_TYPES[key];
}

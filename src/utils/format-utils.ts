/**
 * Formatting utilities for track names, loci and log lines
 */

import type { GenomeReference, Locus } from '../types/browser-types';

/**
 * Check whether a source is a remote http(s) URL rather than a local path
 */
export function isHref(source: string): boolean {
    return /^https?:\/\//i.test(source);
}

/**
 * Default display name for a track source
 *
 * URLs are shown in full; local paths by their file name.
 *
 * @example trackDisplayName('data/sample.bam') === 'sample.bam'
 */
export function trackDisplayName(source: string): string {
    if (isHref(source)) {
        return source;
    }
    const parts = source.split(/[\\/]/);
    return parts[parts.length - 1] || source;
}

/**
 * Format a locus for log output
 *
 * @returns e.g. "chr1:100-200", "chr1:100-200 | chr2:5-10", or "(default)"
 */
export function formatLocus(locus: Locus): string {
    if (locus === null || locus.length === 0) {
        return '(default)';
    }
    return Array.isArray(locus) ? locus.join(' | ') : locus;
}

/**
 * Format a genome reference for log output
 */
export function formatGenome(genome: GenomeReference): string {
    if (typeof genome === 'string') {
        return genome;
    }
    return genome.id ?? genome.name ?? genome.fastaURL;
}

/**
 * Format a track count into a human-readable string
 *
 * @returns e.g. "1 track", "3 tracks"
 */
export function formatTrackCount(count: number): string {
    return `${count.toLocaleString()} track${count !== 1 ? 's' : ''}`;
}

/**
 * Tests for Format Utilities
 */

import { describe, it, expect } from '@jest/globals';
import {
    formatGenome,
    formatLocus,
    formatTrackCount,
    isHref,
    trackDisplayName,
} from '../format-utils';

describe('Format Utilities', () => {
    describe('isHref', () => {
        it('should recognize http and https URLs', () => {
            expect(isHref('https://example.org/a.bam')).toBe(true);
            expect(isHref('HTTP://example.org/a.bam')).toBe(true);
        });

        it('should treat everything else as a path', () => {
            expect(isHref('/data/a.bam')).toBe(false);
            expect(isHref('data/a.bam')).toBe(false);
            expect(isHref('ftp://example.org/a.bam')).toBe(false);
        });
    });

    describe('trackDisplayName', () => {
        it('should use the file name of a local path', () => {
            expect(trackDisplayName('data/sample.bam')).toBe('sample.bam');
            expect(trackDisplayName('C:\\data\\sample.bam')).toBe('sample.bam');
            expect(trackDisplayName('sample.bam')).toBe('sample.bam');
        });

        it('should keep URLs whole', () => {
            expect(trackDisplayName('https://example.org/data/sample.bam')).toBe(
                'https://example.org/data/sample.bam'
            );
        });

        it('should fall back to the source for a trailing separator', () => {
            expect(trackDisplayName('data/')).toBe('data/');
        });
    });

    describe('formatLocus', () => {
        it('should format a single locus', () => {
            expect(formatLocus('chr1:100-200')).toBe('chr1:100-200');
        });

        it('should join several loci', () => {
            expect(formatLocus(['chr1:100-200', 'chr2:5-10'])).toBe('chr1:100-200 | chr2:5-10');
        });

        it('should describe a missing locus', () => {
            expect(formatLocus(null)).toBe('(default)');
            expect(formatLocus([])).toBe('(default)');
            expect(formatLocus('')).toBe('(default)');
        });
    });

    describe('formatGenome', () => {
        it('should return identifiers unchanged', () => {
            expect(formatGenome('hg38')).toBe('hg38');
        });

        it('should prefer id, then name, then fasta URL', () => {
            expect(formatGenome({ id: 'custom', name: 'Custom', fastaURL: 'ref.fa' })).toBe(
                'custom'
            );
            expect(formatGenome({ name: 'Custom', fastaURL: 'ref.fa' })).toBe('Custom');
            expect(formatGenome({ fastaURL: 'ref.fa' })).toBe('ref.fa');
        });
    });

    describe('formatTrackCount', () => {
        it('should use the singular for one track', () => {
            expect(formatTrackCount(1)).toBe('1 track');
        });

        it('should use the plural otherwise', () => {
            expect(formatTrackCount(0)).toBe('0 tracks');
            expect(formatTrackCount(3)).toBe('3 tracks');
        });
    });
});

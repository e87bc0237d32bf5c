import type { Track } from './track-types';

/** A user-supplied reference assembly */
export interface CustomGenome {
    id?: string;
    name?: string;
    fastaURL: string;
    indexURL?: string;
    cytobandURL?: string;
    aliasURL?: string;
}

/** A genome build identifier such as "hg38" or "mm10", or a custom reference */
export type GenomeReference = string | CustomGenome;

/** One or more ranges such as "chr17:31,531,100-31,531,259"; null lets igv.js choose */
export type Locus = string | string[] | null;

export type BrowserConfig = {
    genome: GenomeReference;
    locus: Locus;
    tracks: Track[];
};

/**
 * Fields of the synchronized model shared by the kernel and the widget.
 * Always read together as one snapshot.
 */
export type BrowserModelState = BrowserConfig;

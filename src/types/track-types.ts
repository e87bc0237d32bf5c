/**
 * Track configuration types
 *
 * Only a minimal set of properties is typed here. Any other renderer option is
 * passed to igv.js untouched; see https://github.com/igvteam/igv.js/wiki/Tracks-2.0
 * for the full list.
 */

export const TRACK_TYPES = ['annotation', 'wig', 'alignment', 'variant'] as const;

export type TrackType = (typeof TRACK_TYPES)[number];

export type DisplayMode = 'COLLAPSED' | 'EXPANDED' | 'SQUISHED';

export interface BaseTrack {
    type: TrackType;

    /** Display name (label) */
    name: string;

    /** Track data resource: a file path, URL, or data URI */
    url: string;

    /**
     * Index file (BAM .bai, tabix .tbi, ...). Always null unless the track was
     * built from an explicit [data, index] pair or config entry.
     */
    indexURL: string | null;

    /** If not specified, igv.js infers the format from the file name */
    format?: string;

    /** Explicitly marks the resource as not indexed */
    indexed?: boolean;

    /** CSS color value for track features, e.g. "#ff0000" */
    color?: string;

    height?: number;
    autoHeight?: boolean;
    minHeight?: number;
    maxHeight?: number;

    /** Maximum window size in base pairs for which data is displayed */
    visibilityWindow?: number;

    /** Renderer-specific options */
    [option: string]: unknown;
}

/** Non-quantitative annotations such as genes (bed, gff, gtf, ...) */
export interface AnnotationTrack extends BaseTrack {
    type: 'annotation';
    displayMode?: DisplayMode;
    expandedRowHeight?: number;
    squishedRowHeight?: number;
    nameField?: string;
    maxRows?: number;
    searchable?: boolean;
    searchableFields?: string[];
    filterTypes?: string[];
    altColor?: string;
    colorBy?: string;
}

/** Quantitative data such as coverage (wig, bigWig, bedGraph) */
export interface WigTrack extends BaseTrack {
    type: 'wig';
    autoscale?: boolean;
    autoscaleGroup?: string;
    altColor?: string;
    graphType?: 'bar' | 'points';
    flipAxis?: boolean;
    windowFunction?: 'min' | 'max' | 'mean';
}

/** Read alignments (bam, cram) */
export interface AlignmentTrack extends BaseTrack {
    type: 'alignment';
    showCoverage?: boolean;
    showAlignments?: boolean;

    /** Draw paired reads connected with a line */
    viewAsPairs?: boolean;

    /** If false, mate information is ignored during downsampling */
    pairsSupported?: boolean;

    coverageColor?: string;
    deletionColor?: string;

    /** Color of skipped regions such as splice junctions */
    skippedColor?: string;

    insertionColor?: string;

    /** Used when colorBy is "strand" */
    negStrandColor?: string;
    posStrandColor?: string;

    /** Connector line between read pairs in "view as pairs" mode */
    pairConnectorColor?: string;

    /** One of none, strand, firstOfPairStrand, pairOrientation, tlen, unexpectedPair, tag */
    colorBy?: string;
    colorByTag?: string;

    /** Tag that encodes an explicit r,g,b color */
    bamColorTag?: string;

    samplingWindowSize?: number;
    samplingDepth?: number;
    alignmentRowHeight?: number;

    /** Read group id (tag RG) */
    readgroup?: string;

    /** Initial sort option, e.g. { chr, position, option: 'BASE' } */
    sort?: string | Record<string, unknown>;

    showSoftClips?: boolean;
    showMismatches?: boolean;
    showInsertionText?: boolean;
    insertionTextColor?: string;
    showDeletionText?: boolean;
    deletionTextColor?: string;

    /** Expected pair orientation: ff, fr or rf */
    pairOrientation?: 'ff' | 'fr' | 'rf';

    /** Expected absolute TLEN range */
    minTLEN?: number;
    maxTLEN?: number;

    /** Percentile bounds for the expected insert size */
    minTLENPercentile?: number;
    maxTLENPercentile?: number;
}

/** Variant calls (vcf) */
export interface VariantTrack extends BaseTrack {
    type: 'variant';
    displayMode?: DisplayMode;
    squishedCallHeight?: number;
    expandedCallHeight?: number;
}

export type Track = AnnotationTrack | WigTrack | AlignmentTrack | VariantTrack;

/**
 * Options accepted by `track()`. Everything is optional; `url` is required only
 * when no positional source is given.
 */
export interface TrackOptions {
    type?: TrackType;
    name?: string;
    url?: string;
    indexURL?: string | null;
    format?: string;
    color?: string;
    autoscale?: boolean;
    [option: string]: unknown;
}

/** A path or URL */
export type TrackSource = string;

/** A data file and its index, e.g. ['sample.bam', 'sample.bam.bai'] */
export type IndexedTrackSource = readonly [TrackSource, TrackSource];

export type TrackArgument = TrackSource | IndexedTrackSource | Track;

export function isTrackType(value: unknown): value is TrackType {
    return TRACK_TYPES.some((type) => type === value);
}

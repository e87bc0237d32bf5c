/**
 * Default track properties per track type
 *
 * Mirrors the igv.js defaults so the serialized config is explicit about what
 * the widget will render. Each call returns fresh objects.
 */

import type {
    AlignmentTrack,
    AnnotationTrack,
    BaseTrack,
    VariantTrack,
    WigTrack,
} from '../types/track-types';

/** Known (non-index-signature) properties of a track type, all optional */
export type TrackDefaults<T> = {
    [K in keyof T as string extends K ? never : number extends K ? never : K]?: T[K];
};

type LayoutDefaults = Pick<
    TrackDefaults<BaseTrack>,
    'height' | 'autoHeight' | 'minHeight' | 'maxHeight'
>;

export function baseDefaults(): LayoutDefaults {
    return {
        height: 50,
        autoHeight: false,
        minHeight: 50,
        maxHeight: 500,
    };
}

export function annotationDefaults(): TrackDefaults<AnnotationTrack> {
    return {
        ...baseDefaults(),
        displayMode: 'COLLAPSED',
        expandedRowHeight: 30,
        squishedRowHeight: 15,
        maxRows: 500,
        searchable: false,
        filterTypes: ['chromosome', 'gene'],
        color: 'rgb(0,0,150)',
    };
}

export function wigDefaults(): TrackDefaults<WigTrack> {
    return {
        ...baseDefaults(),
        color: 'rgb(150,150,150)',
        graphType: 'bar',
        flipAxis: false,
        windowFunction: 'mean',
    };
}

export function alignmentDefaults(): TrackDefaults<AlignmentTrack> {
    return {
        ...baseDefaults(),
        showCoverage: true,
        showAlignments: true,
        viewAsPairs: false,
        pairsSupported: true,
        coverageColor: 'rgb(150, 150, 150)',
        color: 'rgb(170, 170, 170)',
        deletionColor: 'black',
        skippedColor: 'rgb(150, 170, 170)',
        insertionColor: 'rgb(138, 94, 161)',
        negStrandColor: 'rgba(150, 150, 230, 0.75)',
        posStrandColor: 'rgba(230, 150, 150, 0.75)',
        colorBy: 'unexpectedPair',
        bamColorTag: 'YC',
        samplingWindowSize: 100,
        samplingDepth: 100,
        alignmentRowHeight: 14,
        showSoftClips: false,
        showMismatches: true,
        showInsertionText: false,
        insertionTextColor: 'white',
        showDeletionText: false,
        deletionTextColor: 'black',
        minTLENPercentile: 0.1,
        maxTLENPercentile: 99.9,
    };
}

export function variantDefaults(): TrackDefaults<VariantTrack> {
    return {
        ...baseDefaults(),
        displayMode: 'EXPANDED',
        squishedCallHeight: 1,
        expandedCallHeight: 10,
    };
}

/**
 * Widget Bridge
 *
 * Owns exactly one visualization instance per mount. There is no update
 * path: when the model changes, the host tears the instance down and mounts a
 * new one from a fresh snapshot.
 *
 *   Unmounted --mountBrowser()--> Mounted --teardown()--> Torn Down
 *
 * Teardown must run once before the same container is mounted again.
 */

import type { BrowserModelState, GenomeReference } from '../types/browser-types';
import type { Track } from '../types/track-types';
import { ErrorContext, reportError } from '../utils/error-handler';
import { formatGenome, formatLocus, formatTrackCount } from '../utils/format-utils';
import { logger } from '../utils/logger';
import type { ReadableModel } from './synced-model';

/** Configuration handed to the engine's create call */
export interface EngineOptions {
    genome: GenomeReference;
    locus?: string | string[];
    tracks: Track[];
}

/**
 * The two engine calls the bridge makes
 */
export interface VisualizationEngine<I> {
    createBrowser(container: HTMLElement, options: EngineOptions): Promise<I>;
    removeBrowser(instance: I): void;
}

/** Releases the mounted instance */
export type Teardown = () => void;

/**
 * Read the model's three fields as one snapshot
 *
 * The track list is copied so later model writes cannot reach a mounted
 * instance's configuration.
 */
export function readSnapshot(model: ReadableModel<BrowserModelState>): BrowserModelState {
    return {
        genome: model.get('genome'),
        locus: model.get('locus'),
        tracks: [...model.get('tracks')],
    };
}

export function toEngineOptions(snapshot: BrowserModelState): EngineOptions {
    const options: EngineOptions = {
        genome: snapshot.genome,
        tracks: snapshot.tracks,
    };
    if (snapshot.locus !== null) {
        options.locus = snapshot.locus;
    }
    return options;
}

/**
 * Create one engine instance into `container`
 *
 * Construction errors from the engine (bad genome, malformed locus,
 * unreachable track) are logged and rethrown unchanged; nothing is retried.
 *
 * @returns Callback that removes the created instance
 */
export async function mountBrowser<I>(
    snapshot: BrowserModelState,
    container: HTMLElement,
    engine: VisualizationEngine<I>
): Promise<Teardown> {
    logger.debug(
        `Mounting browser: genome=${formatGenome(snapshot.genome)}, ` +
            `locus=${formatLocus(snapshot.locus)}, ${formatTrackCount(snapshot.tracks.length)}`
    );

    let instance: I;
    try {
        instance = await engine.createBrowser(container, toEngineOptions(snapshot));
    } catch (error) {
        throw reportError(error, ErrorContext.BROWSER_MOUNT);
    }

    return () => {
        engine.removeBrowser(instance);
        logger.debug('Browser removed');
    };
}

/**
 * Browser Widget
 *
 * Kernel-side handle for one genome browser. Holds the synchronized model and,
 * when attached to a container, keeps exactly one visualization instance in
 * step with it by tearing down and remounting on every change.
 */

import { cloneConfig } from '../config/browser-config';
import { track } from '../config/track-builder';
import type { BrowserConfig, GenomeReference, Locus } from '../types/browser-types';
import type { Track, TrackArgument, TrackOptions } from '../types/track-types';
import { ErrorContext, formatErrorMessage } from '../utils/error-handler';
import { logger } from '../utils/logger';
import { StandaloneHtmlOptions, getStandaloneHtml } from '../utils/standalone-html';
import { InProcessModel } from './synced-model';
import { Teardown, VisualizationEngine, mountBrowser, readSnapshot } from './widget-bridge';

export interface AttachOptions {
    /** Called when a remount triggered by a model change fails */
    onError?: (error: unknown) => void;
}

/**
 * One container kept in sync with one model
 *
 * Remounts run one after another on a promise chain; changes arriving while a
 * remount is queued collapse into it.
 */
class Attachment<I> {
    private teardown?: Teardown;
    private queue: Promise<void> = Promise.resolve();
    private remountQueued = false;
    private detached = false;

    constructor(
        private readonly model: InProcessModel<BrowserConfig>,
        private readonly container: HTMLElement,
        private readonly engine: VisualizationEngine<I>,
        private readonly options: AttachOptions
    ) {}

    /**
     * Subscribe and mount; errors propagate to the caller of `attach`
     *
     * Does nothing if the attachment was detached before it started.
     */
    async start(): Promise<void> {
        if (this.detached) {
            return;
        }
        this.model.on('change', this.handleChange);
        this.model.on('destroy', this.handleDestroy);
        const first = this.remount();
        // later remounts must still run after a failed first mount
        this.queue = first.catch(() => undefined);
        await first;
    }

    detach(): Promise<void> {
        if (!this.detached) {
            this.detached = true;
            this.model.off('change', this.handleChange);
            this.model.off('destroy', this.handleDestroy);
            this.queue = this.queue.then(() => this.release());
        }
        return this.queue;
    }

    /**
     * Resolves once every queued remount has finished
     */
    settled(): Promise<void> {
        return this.queue;
    }

    private handleChange = (): void => {
        if (this.remountQueued || this.detached) {
            return;
        }
        this.remountQueued = true;
        this.queue = this.queue.then(async () => {
            this.remountQueued = false;
            try {
                await this.remount();
            } catch (error) {
                logger.error(formatErrorMessage(error, ErrorContext.BROWSER_MOUNT), error);
                this.options.onError?.(error);
            }
        });
    };

    private handleDestroy = (): void => {
        void this.detach();
    };

    private release(): void {
        if (this.teardown) {
            const teardown = this.teardown;
            this.teardown = undefined;
            teardown();
        }
    }

    private async remount(): Promise<void> {
        this.release();
        if (this.detached) {
            return;
        }
        const teardown = await mountBrowser(readSnapshot(this.model), this.container, this.engine);
        if (this.detached) {
            teardown();
            return;
        }
        this.teardown = teardown;
    }
}

export class BrowserWidget {
    readonly model: InProcessModel<BrowserConfig>;
    private attachment?: Attachment<unknown>;

    constructor(config: BrowserConfig) {
        this.model = new InProcessModel(cloneConfig(config));
    }

    get genome(): GenomeReference {
        return this.model.get('genome');
    }

    get locus(): Locus {
        return this.model.get('locus');
    }

    get tracks(): readonly Track[] {
        return this.model.get('tracks');
    }

    setGenome(genome: GenomeReference): void {
        this.model.set('genome', genome);
    }

    setLocus(locus: Locus): void {
        this.model.set('locus', locus);
    }

    /**
     * Replace the whole track list
     */
    setTracks(tracks: TrackArgument[]): void {
        this.model.set(
            'tracks',
            tracks.map((t) => track(t))
        );
    }

    /**
     * Append one track to the end of the list
     */
    addTrack(source: TrackArgument, options?: TrackOptions): Track {
        const added = track(source, options);
        this.model.set('tracks', [...this.model.get('tracks'), added]);
        return added;
    }

    /**
     * Mount into `container` and follow model changes until detached
     *
     * @throws whatever the engine raises while creating the first instance
     */
    async attach<I>(
        container: HTMLElement,
        engine: VisualizationEngine<I>,
        options: AttachOptions = {}
    ): Promise<void> {
        // registered before the first await: detach() and dispose() must find it
        const previous = this.attachment;
        const attachment = new Attachment(this.model, container, engine, options);
        this.attachment = attachment;
        await previous?.detach();
        await attachment.start();
    }

    async detach(): Promise<void> {
        const attachment = this.attachment;
        this.attachment = undefined;
        await attachment?.detach();
    }

    /**
     * Resolves when no remount is pending
     */
    async settled(): Promise<void> {
        await this.attachment?.settled();
    }

    /**
     * Tear down any mounted instance and release the model
     */
    async dispose(): Promise<void> {
        await this.detach();
        this.model.destroy();
    }

    toConfig(): BrowserConfig {
        return cloneConfig(readSnapshot(this.model));
    }

    toJSON(): BrowserConfig {
        return this.toConfig();
    }

    toHtml(options: StandaloneHtmlOptions): string {
        return getStandaloneHtml(this.toConfig(), options);
    }
}

/**
 * Browser Session
 *
 * Scripting entry point for notebooks: set a reference genome and locus once,
 * then create browsers from track lists or saved configurations.
 *
 * Usage:
 *   const gv = createSession();
 *   gv.ref('mm10');
 *   gv.locus('chr17:31,531,100-31,531,259');
 *   const browser = gv.browse('fragments.bed', gv.track('10x_cov.bw', { autoscale: true }));
 *
 * A session never tracks a "current" browser: every call returns a new
 * widget that the caller holds on to.
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { configFromObject, parseConfig } from '../config/browser-config';
import { ResourceProvider, StaticFileProvider, servableConfig } from '../config/resource-resolver';
import { Settings, applySettings, loadSettings } from '../config/settings';
import { track } from '../config/track-builder';
import type { GenomeReference, Locus } from '../types/browser-types';
import type { Track, TrackArgument, TrackOptions } from '../types/track-types';
import { ValidationError } from '../utils/error-handler';
import { formatGenome, formatLocus, formatTrackCount } from '../utils/format-utils';
import { logger } from '../utils/logger';
import { BrowserWidget } from '../widget/browser-widget';

export class BrowserSession {
    private genome: GenomeReference;
    private initialLocus: Locus = null;

    constructor(private readonly settings: Settings) {
        this.genome = settings.defaultGenome;
    }

    /**
     * Set the reference genome for browsers created after this call
     */
    ref(genome: GenomeReference): void {
        if (typeof genome === 'string' && genome.trim().length === 0) {
            throw new ValidationError('genome must not be empty', 'genome');
        }
        this.genome = genome;
        logger.debug(`Session genome set to ${formatGenome(genome)}`);
    }

    /**
     * Set the initial locus for browsers created after this call
     */
    locus(locus: Locus): void {
        this.initialLocus = Array.isArray(locus) ? [...locus] : locus;
    }

    getGenome(): GenomeReference {
        return this.genome;
    }

    getLocus(): Locus {
        return this.initialLocus;
    }

    track(source?: TrackArgument, options?: TrackOptions): Track {
        return track(source, options);
    }

    /**
     * Create a new browser showing `tracks` in the given order
     */
    browse(...tracks: TrackArgument[]): BrowserWidget {
        const widget = new BrowserWidget({
            genome: this.genome,
            locus: this.initialLocus,
            tracks: tracks.map((t) => track(t)),
        });
        logger.info(
            `Created browser on ${formatGenome(this.genome)} at ${formatLocus(this.initialLocus)} ` +
                `with ${formatTrackCount(widget.tracks.length)}`
        );
        return widget;
    }

    /**
     * Create a browser from an already-parsed configuration object
     */
    fromObject(config: unknown): BrowserWidget {
        return new BrowserWidget(configFromObject(config, this.settings.defaultGenome));
    }

    /**
     * Create a browser from a JSON-encoded configuration
     */
    loads(json: string): BrowserWidget {
        return new BrowserWidget(parseConfig(json, this.settings.defaultGenome));
    }

    /**
     * Create a browser from a JSON configuration file
     */
    async load(filePath: string): Promise<BrowserWidget> {
        const content = await fs.readFile(filePath, 'utf-8');
        return this.loads(content);
    }

    /**
     * Provider for local files, when a files URL is configured
     */
    defaultProvider(): ResourceProvider | undefined {
        if (!this.settings.filesBaseUrl) {
            return undefined;
        }
        return new StaticFileProvider(process.cwd(), this.settings.filesBaseUrl);
    }

    /**
     * Copy of `widget` whose local track files are served through `provider`
     *
     * @throws ValidationError when no provider is given and none is configured
     */
    async servable(
        widget: BrowserWidget,
        provider: ResourceProvider | undefined = this.defaultProvider()
    ): Promise<BrowserWidget> {
        if (!provider) {
            throw new ValidationError(
                'no resource provider given and GVWIDGET_FILES_URL is not set',
                'provider'
            );
        }
        return new BrowserWidget(await servableConfig(widget.toConfig(), provider));
    }

    /**
     * Write a widget's configuration as JSON, readable by `load`
     */
    async save(widget: BrowserWidget, filePath: string): Promise<void> {
        await fs.mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
        await fs.writeFile(filePath, JSON.stringify(widget.toConfig(), null, 2), 'utf-8');
        logger.info(`Saved browser configuration to ${filePath}`);
    }
}

/**
 * Start a session, reading GVWIDGET_* settings unless given explicitly
 */
export function createSession(settings: Settings = loadSettings()): BrowserSession {
    applySettings(settings);
    return new BrowserSession(settings);
}

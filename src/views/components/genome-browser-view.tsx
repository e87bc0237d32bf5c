/**
 * GenomeBrowserView - React host for one visualization instance
 *
 * Mounts on first render and tears down and remounts whenever genome, locus,
 * tracks or engine change (by identity). Engine construction errors are
 * rethrown from render so the nearest ErrorBoundary shows them.
 */

import * as React from 'react';
import type { GenomeReference, Locus } from '../../types/browser-types';
import type { Track } from '../../types/track-types';
import { Teardown, VisualizationEngine, mountBrowser } from '../../widget/widget-bridge';

export interface GenomeBrowserViewProps<I> {
    genome: GenomeReference;
    locus: Locus;
    tracks: Track[];
    engine: VisualizationEngine<I>;
    className?: string;
}

export function GenomeBrowserView<I>({
    genome,
    locus,
    tracks,
    engine,
    className,
}: GenomeBrowserViewProps<I>): React.ReactElement {
    const containerRef = React.useRef<HTMLDivElement>(null);
    const [mountError, setMountError] = React.useState<Error | null>(null);

    React.useEffect(() => {
        const container = containerRef.current;
        if (!container) {
            return;
        }

        let cancelled = false;
        let teardown: Teardown | undefined;

        void mountBrowser({ genome, locus, tracks }, container, engine).then(
            (release) => {
                if (cancelled) {
                    release();
                } else {
                    teardown = release;
                }
            },
            (error: unknown) => {
                if (!cancelled) {
                    setMountError(error instanceof Error ? error : new Error(String(error)));
                }
            }
        );

        return () => {
            cancelled = true;
            teardown?.();
        };
    }, [genome, locus, tracks, engine]);

    if (mountError) {
        throw mountError;
    }

    return (
        <div
            ref={containerRef}
            className={className ? `gvwidget-browser ${className}` : 'gvwidget-browser'}
            data-testid="genome-browser"
        />
    );
}

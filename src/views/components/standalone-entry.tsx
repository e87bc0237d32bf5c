/*---------------------------------------------------------------------------------------------
 *  Copyright (C) 2024 Posit Software, PBC. All rights reserved.
 *  Licensed under the Elastic License 2.0. See LICENSE.txt for license information.
 *--------------------------------------------------------------------------------------------*/

/**
 * Standalone Entry Point
 *
 * Boots the genome browser in a page produced by getStandaloneHtml(): reads the
 * embedded configuration and renders it with React 18's createRoot() API.
 * Bundled separately for the browser.
 */

import * as React from 'react';
import { createRoot, Root } from 'react-dom/client';
import { parseConfig } from '../../config/browser-config';
import { CONFIG_ELEMENT_ID } from '../../utils/standalone-html';
import { logger } from '../../utils/logger';
import { igvEngine } from '../../widget/igv-engine';
import type { VisualizationEngine } from '../../widget/widget-bridge';
import { ErrorBoundary } from './error-boundary';
import { GenomeBrowserView } from './genome-browser-view';

/**
 * Render the embedded configuration into #root
 *
 * @returns The React root, or null when the page lacks #root or the config element
 */
export function bootStandalonePage<I>(doc: Document, engine: VisualizationEngine<I>): Root | null {
    const rootElement = doc.getElementById('root');
    const configElement = doc.getElementById(CONFIG_ELEMENT_ID);
    if (!rootElement || !configElement) {
        logger.debug('No standalone browser configuration on this page');
        return null;
    }

    const config = parseConfig(configElement.textContent ?? '');
    const reactRoot = createRoot(rootElement);
    reactRoot.render(
        <ErrorBoundary>
            <GenomeBrowserView
                genome={config.genome}
                locus={config.locus}
                tracks={config.tracks}
                engine={engine}
            />
        </ErrorBoundary>
    );
    return reactRoot;
}

bootStandalonePage(document, igvEngine);

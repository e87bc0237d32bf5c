/**
 * anywidget entry point
 *
 * Loaded by the notebook front end as the widget's ES module. The kernel side
 * syncs `genome`, `locus` and `tracks`; on every render the front end gets a
 * fresh instance and calls the returned cleanup before the next one.
 */

import type { Render } from '@anywidget/types';
import type { BrowserModelState } from '../types/browser-types';
import { igvEngine } from './igv-engine';
import type { ReadableModel } from './synced-model';
import { Teardown, mountBrowser, readSnapshot } from './widget-bridge';

export interface WidgetRenderProps {
    model: ReadableModel<BrowserModelState>;
    el: HTMLElement;
}

export async function render({ model, el }: WidgetRenderProps): Promise<Teardown> {
    return mountBrowser(readSnapshot(model), el, igvEngine);
}

const widget: { render: Render<BrowserModelState> } = { render };

export default widget;

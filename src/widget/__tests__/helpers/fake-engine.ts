/**
 * In-process stand-in for igv.js
 *
 * Records every create call and renders a marker element into the container
 * so tests can check what is still on screen.
 */

import type { EngineOptions, VisualizationEngine } from '../../widget-bridge';

export interface FakeInstance {
    id: number;
    container: HTMLElement;
    options: EngineOptions;
    element: HTMLElement;
    removed: boolean;
}

export class FakeEngine implements VisualizationEngine<FakeInstance> {
    readonly created: FakeInstance[] = [];
    failWith?: Error;
    private gate?: Promise<void>;

    /**
     * Hold every create call until the returned function is called
     */
    pause(): () => void {
        let resume: () => void = () => undefined;
        this.gate = new Promise<void>((resolve) => {
            resume = resolve;
        });
        return () => {
            this.gate = undefined;
            resume();
        };
    }

    async createBrowser(container: HTMLElement, options: EngineOptions): Promise<FakeInstance> {
        if (this.gate) {
            await this.gate;
        }
        if (this.failWith) {
            throw this.failWith;
        }
        const element = container.ownerDocument.createElement('div');
        element.className = 'fake-igv';
        container.appendChild(element);

        const instance: FakeInstance = {
            id: this.created.length + 1,
            container,
            options,
            element,
            removed: false,
        };
        this.created.push(instance);
        return instance;
    }

    removeBrowser(instance: FakeInstance): void {
        instance.removed = true;
        instance.element.remove();
    }

    live(): FakeInstance[] {
        return this.created.filter((instance) => !instance.removed);
    }
}

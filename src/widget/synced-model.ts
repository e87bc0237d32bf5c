/**
 * Synchronized model
 *
 * The widget reads its configuration from a model kept in sync between the
 * kernel and the browser. `SyncedModel` is the subset of that contract the
 * library relies on; the anywidget model satisfies it in the notebook, and
 * `InProcessModel` provides it wherever both sides share one process.
 */

export type ModelEvent<T> = 'change' | `change:${Extract<keyof T, string>}` | 'destroy';

function changeEvent<T, K extends Extract<keyof T, string>>(key: K): ModelEvent<T> {
    const event: `change:${K}` = `change:${key}`;
    return event;
}

export type ModelListener = () => void;

export interface ReadableModel<T> {
    get<K extends keyof T>(key: K): T[K];
}

export type ModelKey<T> = Extract<keyof T, string>;

export interface SyncedModel<T> extends ReadableModel<T> {
    set<K extends ModelKey<T>>(key: K, value: T[K]): void;
    on(event: ModelEvent<T>, callback: ModelListener): void;
    off(event: ModelEvent<T>, callback: ModelListener): void;
}

/**
 * Event-emitting key/value model
 *
 * `set` emits `change:<key>` and then `change`; `update` sets several fields
 * and emits a single `change`. Setting an identical value emits nothing.
 */
export class InProcessModel<T extends object> implements SyncedModel<T> {
    private readonly listeners = new Map<ModelEvent<T>, Set<ModelListener>>();
    private destroyed = false;

    constructor(private state: T) {}

    get<K extends keyof T>(key: K): T[K] {
        return this.state[key];
    }

    set<K extends ModelKey<T>>(key: K, value: T[K]): void {
        if (Object.is(this.state[key], value)) {
            return;
        }
        this.state = { ...this.state, [key]: value };
        this.emit(changeEvent<T, K>(key));
        this.emit('change');
    }

    update(changes: Partial<T>): void {
        const changedKeys: Array<ModelKey<T>> = [];
        for (const key in changes) {
            if (!Object.is(this.state[key], changes[key])) {
                changedKeys.push(key);
            }
        }
        if (changedKeys.length === 0) {
            return;
        }
        this.state = { ...this.state, ...changes };
        for (const key of changedKeys) {
            this.emit(changeEvent<T, ModelKey<T>>(key));
        }
        this.emit('change');
    }

    on(event: ModelEvent<T>, callback: ModelListener): void {
        let callbacks = this.listeners.get(event);
        if (!callbacks) {
            callbacks = new Set();
            this.listeners.set(event, callbacks);
        }
        callbacks.add(callback);
    }

    off(event: ModelEvent<T>, callback: ModelListener): void {
        this.listeners.get(event)?.delete(callback);
    }

    /**
     * Notify `destroy` listeners once and drop all listeners
     */
    destroy(): void {
        if (this.destroyed) {
            return;
        }
        this.destroyed = true;
        this.emit('destroy');
        this.listeners.clear();
    }

    isDestroyed(): boolean {
        return this.destroyed;
    }

    private emit(event: ModelEvent<T>): void {
        const callbacks = this.listeners.get(event);
        if (!callbacks) {
            return;
        }
        for (const callback of [...callbacks]) {
            callback();
        }
    }
}

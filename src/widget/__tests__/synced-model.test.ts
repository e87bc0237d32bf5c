/**
 * Tests for the in-process synchronized model
 */

import { describe, it, expect, jest } from '@jest/globals';
import { InProcessModel } from '../synced-model';

interface Counter {
    count: number;
    label: string;
}

describe('InProcessModel', () => {
    it('should return stored values', () => {
        const model = new InProcessModel<Counter>({ count: 1, label: 'a' });

        expect(model.get('count')).toBe(1);
        expect(model.get('label')).toBe('a');
    });

    it('should emit the keyed event before the generic one', () => {
        const model = new InProcessModel<Counter>({ count: 1, label: 'a' });
        const events: string[] = [];
        model.on('change:count', () => events.push('change:count'));
        model.on('change', () => events.push('change'));
        model.on('change:label', () => events.push('change:label'));

        model.set('count', 2);

        expect(events).toEqual(['change:count', 'change']);
        expect(model.get('count')).toBe(2);
    });

    it('should not emit when the value is unchanged', () => {
        const model = new InProcessModel<Counter>({ count: 1, label: 'a' });
        const listener = jest.fn();
        model.on('change', listener);

        model.set('count', 1);

        expect(listener).not.toHaveBeenCalled();
    });

    it('should emit one change for a batch update', () => {
        const model = new InProcessModel<Counter>({ count: 1, label: 'a' });
        const change = jest.fn();
        const countChange = jest.fn();
        const labelChange = jest.fn();
        model.on('change', change);
        model.on('change:count', countChange);
        model.on('change:label', labelChange);

        model.update({ count: 5, label: 'a' });

        expect(change).toHaveBeenCalledTimes(1);
        expect(countChange).toHaveBeenCalledTimes(1);
        expect(labelChange).not.toHaveBeenCalled();
        expect(model.get('count')).toBe(5);
    });

    it('should stop notifying removed listeners', () => {
        const model = new InProcessModel<Counter>({ count: 1, label: 'a' });
        const listener = jest.fn();
        model.on('change', listener);
        model.off('change', listener);

        model.set('count', 2);

        expect(listener).not.toHaveBeenCalled();
    });

    it('should notify destroy listeners once', () => {
        const model = new InProcessModel<Counter>({ count: 1, label: 'a' });
        const onDestroy = jest.fn();
        const onChange = jest.fn();
        model.on('destroy', onDestroy);
        model.on('change', onChange);

        model.destroy();
        model.destroy();
        model.set('count', 3);

        expect(onDestroy).toHaveBeenCalledTimes(1);
        expect(onChange).not.toHaveBeenCalled();
        expect(model.isDestroyed()).toBe(true);
    });
});

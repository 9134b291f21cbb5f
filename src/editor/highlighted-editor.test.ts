import { describe, expect, it, vi } from 'vitest';

import { compileRuleSet } from '../highlighting/rule-set.js';
import { createTextBinding, firstRangeListener, HighlightedEditor } from './highlighted-editor.js';
import { MemoryTextSurface } from './memory-surface.js';
import { caretAt } from './selection.js';

type Attrs = { bold: boolean; color: string };

const rules = compileRuleSet<Attrs>([{ regex: 'world', styles: [{ key: 'color', value: 'blue' }] }]);

const createQueue = () => {
    const pending: (() => void)[] = [];
    return {
        flush: () => {
            for (const callback of pending.splice(0)) {
                callback();
            }
        },
        schedule: (callback: () => void) => {
            pending.push(callback);
        },
    };
};

const setup = (text = 'Hello world') => {
    const surface = new MemoryTextSurface<Attrs>();
    const binding = createTextBinding(text);
    const queue = createQueue();
    const onTextChange = vi.fn();
    const onSelectionChange = vi.fn();
    const onEditingBegan = vi.fn();
    const onEditingEnded = vi.fn();
    const editor = new HighlightedEditor(surface, {
        binding,
        onEditingBegan,
        onEditingEnded,
        onSelectionChange,
        onTextChange,
        rules,
        schedule: queue.schedule,
    });
    return { binding, editor, onEditingBegan, onEditingEnded, onSelectionChange, onTextChange, queue, surface };
};

describe('createTextBinding', () => {
    it('should hold the value', () => {
        const binding = createTextBinding('a');
        binding.set('b');
        expect(binding.get()).toBe('b');
    });
});

describe('firstRangeListener', () => {
    it('should pass only the first range and ignore empty selections', () => {
        const callback = vi.fn();
        const listener = firstRangeListener(callback);
        listener([]);
        listener([caretAt(2), caretAt(7)]);
        expect(callback).toHaveBeenCalledTimes(1);
        expect(callback).toHaveBeenCalledWith({ length: 0, start: 2 });
    });
});

describe('HighlightedEditor', () => {
    it('should style the bound text on construction without notifying', () => {
        const { editor, onSelectionChange, onTextChange, queue, surface } = setup();
        queue.flush();
        expect(surface.getText()).toBe('Hello world');
        expect(editor.getStyledText()?.runs).toEqual([
            { attributes: {}, end: 6, start: 0 },
            { attributes: { color: 'blue' }, end: 11, start: 6 },
        ]);
        expect(onSelectionChange).not.toHaveBeenCalled();
        expect(onTextChange).not.toHaveBeenCalled();
    });

    it('should push user edits into the binding and re-style', () => {
        const { binding, editor, onTextChange, surface } = setup();
        surface.select([caretAt(5)]);
        surface.insert('!');
        expect(binding.get()).toBe('Hello! world');
        expect(onTextChange).toHaveBeenCalledWith('Hello! world');
        expect(editor.getStyledText()?.runs).toEqual([
            { attributes: {}, end: 7, start: 0 },
            { attributes: { color: 'blue' }, end: 12, start: 7 },
        ]);
        expect(surface.getSelection()).toEqual([{ length: 0, start: 6 }]);
        expect(editor.getSelection()).toEqual([{ length: 0, start: 6 }]);
    });

    it('should defer selection notifications and never report its own passes', () => {
        const { onSelectionChange, queue, surface } = setup();
        surface.select([caretAt(5)]);
        surface.insert('!');
        expect(onSelectionChange).not.toHaveBeenCalled();
        queue.flush();
        expect(onSelectionChange.mock.calls).toEqual([[[{ length: 0, start: 5 }]], [[{ length: 0, start: 6 }]]]);
    });

    it('should default to microtask scheduling', async () => {
        const surface = new MemoryTextSurface<Attrs>();
        const onSelectionChange = vi.fn();
        new HighlightedEditor(surface, { binding: createTextBinding('abc'), onSelectionChange, rules });
        surface.select([caretAt(1)]);
        expect(onSelectionChange).not.toHaveBeenCalled();
        await Promise.resolve();
        expect(onSelectionChange).toHaveBeenCalledWith([{ length: 0, start: 1 }]);
    });

    it('should sync the binding and forward edit session events', () => {
        const { binding, onEditingBegan, onEditingEnded, surface } = setup();
        surface.focus();
        expect(onEditingBegan).toHaveBeenCalledTimes(1);
        binding.set('stale');
        surface.blur();
        expect(binding.get()).toBe('Hello world');
        expect(onEditingEnded).toHaveBeenCalledTimes(1);
    });

    it('should apply programmatic text changes', () => {
        const { binding, editor, onTextChange, surface } = setup();
        editor.setText('world peace');
        editor.setText('world peace');
        expect(binding.get()).toBe('world peace');
        expect(surface.getText()).toBe('world peace');
        expect(onTextChange).toHaveBeenCalledTimes(1);
        expect(editor.getStyledText()?.runs[0]).toEqual({ attributes: { color: 'blue' }, end: 5, start: 0 });
    });

    it('should re-style when the rules change', () => {
        const { editor } = setup('Hello');
        editor.setRules(compileRuleSet<Attrs>([{ regex: 'H', styles: [{ key: 'bold', value: true }] }]));
        expect(editor.getStyledText()?.runs).toEqual([
            { attributes: { bold: true }, end: 1, start: 0 },
            { attributes: {}, end: 5, start: 1 },
        ]);
    });

    it('should refresh idempotently', () => {
        const { editor, onSelectionChange, queue, surface } = setup();
        surface.select([{ length: 3, start: 2 }]);
        queue.flush();
        onSelectionChange.mockClear();
        const before = editor.getStyledText();
        const styleCount = surface.styleCount;
        editor.refresh();
        editor.refresh();
        queue.flush();
        expect(surface.styleCount).toBe(styleCount + 2);
        expect(editor.getStyledText()).toEqual(before);
        expect(surface.getSelection()).toEqual([{ length: 3, start: 2 }]);
        expect(onSelectionChange).not.toHaveBeenCalled();
        expect(editor.isUpdating()).toBe(false);
    });

    it('should detach from the surface on dispose', () => {
        const { binding, editor, onTextChange, surface } = setup();
        editor.dispose();
        editor.dispose();
        surface.insert('!');
        expect(binding.get()).toBe('Hello world');
        expect(onTextChange).not.toHaveBeenCalled();
        expect(editor.refresh()).toBeUndefined();
    });
});

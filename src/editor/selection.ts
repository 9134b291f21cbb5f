import type { SelectionRange } from '../types/index.js';

/**
 * Fits selection ranges into a text of `length` characters.
 *
 * Ranges that start beyond the end are dropped and lengths are cut at the
 * end. When every range is dropped, a caret at the end of the text remains so
 * the surface keeps a selection. An empty input stays empty.
 *
 * @example
 * clampSelection([{ start: 2, length: 10 }], 5)                       // [{ start: 2, length: 3 }]
 * clampSelection([{ start: 1, length: 0 }, { start: 9, length: 1 }], 5) // [{ start: 1, length: 0 }]
 * clampSelection([{ start: 9, length: 1 }], 5)                       // [{ start: 5, length: 0 }]
 */
export const clampSelection = (ranges: readonly SelectionRange[], length: number): SelectionRange[] => {
    if (!ranges.length) {
        return [];
    }
    const kept: SelectionRange[] = [];
    for (const range of ranges) {
        const start = Math.max(0, range.start);
        if (start > length) {
            continue;
        }
        kept.push({ length: Math.max(0, Math.min(range.length, length - start)), start });
    }
    return kept.length ? kept : [{ length: 0, start: length }];
};

/**
 * Whether every range lies within a text of `length` characters.
 */
export const isSelectionInBounds = (ranges: readonly SelectionRange[], length: number): boolean => {
    return ranges.every((r) => r.start >= 0 && r.length >= 0 && r.start + r.length <= length);
};

export const selectionEquals = (a: readonly SelectionRange[], b: readonly SelectionRange[]): boolean => {
    return a.length === b.length && a.every((r, i) => r.start === b[i].start && r.length === b[i].length);
};

/**
 * A caret at `offset`.
 */
export const caretAt = (offset: number): SelectionRange => ({ length: 0, start: offset });

import { describe, expect, it } from 'vitest';

import { caretAt, clampSelection, isSelectionInBounds, selectionEquals } from './selection.js';

describe('selection', () => {
    describe('clampSelection', () => {
        it('should keep ranges that fit', () => {
            expect(clampSelection([{ length: 2, start: 1 }], 5)).toEqual([{ length: 2, start: 1 }]);
        });

        it('should clamp lengths at the end of the text', () => {
            expect(clampSelection([{ length: 10, start: 2 }], 5)).toEqual([{ length: 3, start: 2 }]);
        });

        it('should drop ranges starting beyond the end', () => {
            expect(
                clampSelection(
                    [
                        { length: 0, start: 1 },
                        { length: 1, start: 9 },
                    ],
                    5,
                ),
            ).toEqual([{ length: 0, start: 1 }]);
        });

        it('should leave a caret at the end when every range is dropped', () => {
            expect(clampSelection([{ length: 1, start: 9 }], 5)).toEqual([{ length: 0, start: 5 }]);
        });

        it('should keep a caret exactly at the end', () => {
            expect(clampSelection([caretAt(5)], 5)).toEqual([{ length: 0, start: 5 }]);
        });

        it('should keep an empty selection empty', () => {
            expect(clampSelection([], 5)).toEqual([]);
        });
    });

    describe('isSelectionInBounds', () => {
        it('should accept ranges within the text', () => {
            expect(isSelectionInBounds([caretAt(5), { length: 2, start: 0 }], 5)).toBe(true);
        });

        it('should reject ranges past the end', () => {
            expect(isSelectionInBounds([{ length: 2, start: 4 }], 5)).toBe(false);
        });
    });

    describe('selectionEquals', () => {
        it('should compare ranges pairwise', () => {
            expect(selectionEquals([caretAt(1)], [{ length: 0, start: 1 }])).toBe(true);
            expect(selectionEquals([caretAt(1)], [caretAt(2)])).toBe(false);
            expect(selectionEquals([caretAt(1)], [])).toBe(false);
        });
    });
});

/**
 * Gap-free run list of attributes over `[0, length)`.
 *
 * Merging a key over a span splits runs at the span edges and rewrites the
 * attribute objects of the covered runs. Attribute objects are never mutated
 * once stored, so split runs can share them safely.
 *
 * @module attribute-runs
 */

import type { AttributeMap, Attributes, StyleRun } from '../types/index.js';

/**
 * Whether two attribute sets hold the same keys with `Object.is`-equal values.
 */
export const attributesEqual = <A extends AttributeMap>(a: Attributes<A>, b: Attributes<A>): boolean => {
    if (a === b) {
        return true;
    }
    const aEntries = Object.entries(a);
    const bValues = new Map<string, unknown>(Object.entries(b));
    if (aEntries.length !== bValues.size) {
        return false;
    }
    return aEntries.every(([key, value]) => bValues.has(key) && Object.is(value, bValues.get(key)));
};

export class AttributeRuns<A extends AttributeMap> {
    private readonly runs: StyleRun<A>[];

    constructor(
        readonly length: number,
        base: Attributes<A> = {},
    ) {
        this.runs = length > 0 ? [{ attributes: { ...base }, end: length, start: 0 }] : [];
    }

    /**
     * Finds the index of the run containing `offset` using binary search.
     * O(log n) in the number of runs.
     */
    private findRunIndex(offset: number): number {
        let lo = 0;
        let hi = this.runs.length - 1;

        while (lo <= hi) {
            const mid = (lo + hi) >>> 1;
            const run = this.runs[mid];
            if (offset < run.start) {
                hi = mid - 1;
            } else if (offset >= run.end) {
                lo = mid + 1;
            } else {
                return mid;
            }
        }
        return -1;
    }

    /**
     * Ensures a run boundary exists at `offset` and returns the index of the
     * run starting there (or `runs.length` when `offset` is the end).
     */
    private splitAt(offset: number): number {
        if (offset >= this.length) {
            return this.runs.length;
        }
        const index = this.findRunIndex(offset);
        const run = this.runs[index];
        if (run.start === offset) {
            return index;
        }
        this.runs.splice(index, 1, { ...run, end: offset }, { ...run, start: offset });
        return index + 1;
    }

    /**
     * Sets `key` to `value` over `[start, end)`, overwriting any existing value
     * for that key. Other keys are untouched. Out-of-bounds spans are clamped;
     * empty spans are ignored.
     */
    merge<K extends keyof A>(start: number, end: number, key: K, value: A[K]): void {
        const from = Math.max(0, start);
        const to = Math.min(this.length, end);
        if (from >= to) {
            return;
        }
        const first = this.splitAt(from);
        const last = this.splitAt(to);
        for (let i = first; i < last; i++) {
            const run = this.runs[i];
            run.attributes = { ...run.attributes, [key]: value };
        }
    }

    /**
     * Snapshot of the runs with adjacent equal attribute sets coalesced.
     */
    toRuns(): StyleRun<A>[] {
        const result: StyleRun<A>[] = [];
        for (const run of this.runs) {
            const previous = result[result.length - 1];
            if (previous && attributesEqual(previous.attributes, run.attributes)) {
                previous.end = run.end;
                continue;
            }
            result.push({ attributes: run.attributes, end: run.end, start: run.start });
        }
        return result;
    }
}

import type { AttributeMap, Attributes, StyledText, StyleRun, TextRange } from '../types/index.js';
import { attributesEqual } from './attribute-runs.js';

/**
 * Returns the attributes at a character offset, or `undefined` when the
 * offset is outside `[0, text.length)`.
 *
 * @example
 * getAttributesAt(highlight('**a** b', rules), 1) // { bold: true }
 */
export const getAttributesAt = <A extends AttributeMap>(
    styled: StyledText<A>,
    offset: number,
): Attributes<A> | undefined => {
    let lo = 0;
    let hi = styled.runs.length - 1;
    while (lo <= hi) {
        const mid = (lo + hi) >>> 1;
        const run = styled.runs[mid];
        if (offset < run.start) {
            hi = mid - 1;
        } else if (offset >= run.end) {
            lo = mid + 1;
        } else {
            return run.attributes;
        }
    }
    return undefined;
};

/**
 * Collects the maximal ranges where `key` is set (to `value`, when given).
 *
 * Adjacent runs that both carry the key are merged into one range, so the
 * result describes where a style is visible regardless of how other keys
 * split the runs.
 *
 * @example
 * findStyledRanges(styled, 'italic')          // [{ start: 14, end: 20 }]
 * findStyledRanges(styled, 'italic', false)   // []
 */
export const findStyledRanges = <A extends AttributeMap, K extends keyof A & string>(
    styled: StyledText<A>,
    key: K,
    value?: A[K],
): TextRange[] => {
    const ranges: TextRange[] = [];
    for (const run of styled.runs) {
        if (!Object.hasOwn(run.attributes, key)) {
            continue;
        }
        if (value !== undefined && !Object.is(run.attributes[key], value)) {
            continue;
        }
        const previous = ranges[ranges.length - 1];
        if (previous && previous.end === run.start) {
            previous.end = run.end;
        } else {
            ranges.push({ end: run.end, start: run.start });
        }
    }
    return ranges;
};

/**
 * Whether two styled texts have the same text and the same runs.
 */
export const styledTextEquals = <A extends AttributeMap>(a: StyledText<A>, b: StyledText<A>): boolean => {
    if (a.text !== b.text || a.runs.length !== b.runs.length) {
        return false;
    }
    return a.runs.every((run, i) => {
        const other: StyleRun<A> = b.runs[i];
        return run.start === other.start && run.end === other.end && attributesEqual(run.attributes, other.attributes);
    });
};

/**
 * Text covered by a run.
 */
export const getRunText = <A extends AttributeMap>(styled: StyledText<A>, run: StyleRun<A>): string => {
    return styled.text.slice(run.start, run.end);
};

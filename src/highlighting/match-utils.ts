/**
 * Utility functions for scanning rule matches and resolving style targets.
 *
 * @module match-utils
 */

import type { TextRange } from '../types/index.js';
import type { StyleTarget } from '../types/rules.js';

/**
 * Index just past the character at `index`, stepping over a whole surrogate
 * pair when the regex is unicode-aware.
 */
const advanceIndex = (text: string, index: number, unicode: boolean): number => {
    if (!unicode || index + 1 >= text.length) {
        return index + 1;
    }
    const code = text.charCodeAt(index);
    return code >= 0xd800 && code <= 0xdbff ? index + 2 : index + 1;
};

/**
 * Finds every non-overlapping match of a global regex, in order.
 *
 * Standard leftmost-first scanning. Zero-length matches are skipped (they
 * would style no characters) and the scan steps past them so it never stalls.
 * A global regex is scanned in place from `lastIndex` 0 and is left at 0 once
 * the scan ends; a non-global one is scanned through a global copy.
 *
 * @param regex - Compiled regex (scanned globally whether or not it carries `g`)
 * @param text - Text to scan
 * @returns Non-empty matches in offset order
 *
 * @example
 * findMatches(/b+/dg, 'abbcb').map((m) => m.index) // [1, 4]
 */
export const findMatches = (regex: RegExp, text: string): RegExpExecArray[] => {
    const matches: RegExpExecArray[] = [];
    if (!text) {
        return matches;
    }
    const scanner = regex.global ? regex : new RegExp(regex.source, `${regex.flags}g`);
    scanner.lastIndex = 0;
    let match: RegExpExecArray | null;
    while ((match = scanner.exec(text)) !== null) {
        if (match[0].length === 0) {
            scanner.lastIndex = advanceIndex(text, scanner.lastIndex, scanner.unicode);
            continue;
        }
        matches.push(match);
    }
    return matches;
};

/**
 * Span of the whole match.
 */
export const getMatchRange = (match: RegExpExecArray): TextRange => {
    return { end: match.index + match[0].length, start: match.index };
};

/**
 * Resolves the span a style targets within a match.
 *
 * Uses the match indices recorded by the `d` flag, so repeated substrings
 * never resolve to the wrong occurrence.
 *
 * @param match - A match produced by a regex with the `d` flag
 * @param group - Target group (`undefined` for the whole match)
 * @returns The target span, or `undefined` when the group did not participate
 *
 * @example
 * const match = /\[([^\]]*)\]\((.*?)\)/d.exec('see [docs](x.md)')!;
 * resolveTargetRange(match, 1) // { start: 5, end: 9 }
 * resolveTargetRange(match, undefined) // { start: 4, end: 16 }
 */
export const resolveTargetRange = (match: RegExpExecArray, group: StyleTarget): TextRange | undefined => {
    if (group === undefined) {
        return getMatchRange(match);
    }
    const { indices } = match;
    if (!indices) {
        throw new Error('Match has no indices; compile the pattern with the `d` flag');
    }
    const span = typeof group === 'number' ? indices[group] : indices.groups?.[group];
    if (!span) {
        return undefined;
    }
    const [start, end] = span;
    return { end, start };
};

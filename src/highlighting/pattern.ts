/**
 * Pattern source + options → compiled regex.
 *
 * Compilation happens once per rule when a rule set is built. An invalid
 * pattern throws here and never during a highlighting pass.
 */

import type { PatternOptions } from '../types/rules.js';

/**
 * A compiled pattern and what the engine needs to know about its groups.
 */
export type CompiledPattern = {
    /** Compiled RegExp, always carrying the `g` and `d` flags */
    regex: RegExp;
    /** Number of positional capture groups (named groups included) */
    groupCount: number;
    /** Names of named capture groups, in declaration order */
    groupNames: string[];
};

/**
 * Flags the engine owns. `g` and `d` are always added; `y` would make the scan
 * stop at the first non-adjacent match.
 */
const ENGINE_FLAGS = new Set(['g', 'd', 'y']);

/**
 * Builds the flag string for a pattern.
 *
 * Flags already on a `RegExp` source are kept (except the engine-owned ones)
 * and merged with `options`. The result is in a stable order so two equal
 * patterns always compile to the same flags.
 *
 * @example
 * buildFlags('', { multiline: true })        // 'dgm'
 * buildFlags('iy', { dotAll: true })         // 'dgis'
 */
export const buildFlags = (existing: string, options: PatternOptions = {}): string => {
    const flags = new Set(['d', 'g']);
    for (const flag of existing) {
        if (!ENGINE_FLAGS.has(flag)) {
            flags.add(flag);
        }
    }
    if (options.ignoreCase) {
        flags.add('i');
    }
    if (options.multiline) {
        flags.add('m');
    }
    if (options.dotAll) {
        flags.add('s');
    }
    if (options.unicode) {
        flags.add('u');
    }
    return [...flags].sort().join('');
};

/**
 * Matches the regex, with an empty alternative appended, against the empty
 * string. The result always exists and has one slot per capture group.
 */
const probeGroups = (regex: RegExp): RegExpExecArray | null => {
    const probe = new RegExp(`${regex.source}|`, regex.flags.replace(/[gy]/g, ''));
    return probe.exec('');
};

/**
 * Named capture groups of a compiled regex, in declaration order.
 *
 * Names come from the regex engine, so escaped parentheses and lookbehind
 * assertions (`(?<=`, `(?<!`) never count as groups.
 *
 * @example
 * extractNamedGroupNames(/^(?<level>#{1,6})\s(?<title>.*)$/) // ['level', 'title']
 * extractNamedGroupNames(/\(?<x>/)                            // []
 */
export const extractNamedGroupNames = (regex: RegExp): string[] => {
    return Object.keys(probeGroups(regex)?.groups ?? {});
};

/**
 * Counts the capture groups of a compiled regex.
 */
export const countCaptureGroups = (regex: RegExp): number => {
    const result = probeGroups(regex);
    return result ? result.length - 1 : 0;
};

/**
 * Compiles a pattern, throwing a helpful error if it is invalid.
 *
 * @throws {Error} `Invalid regex pattern: <source>` with the engine's message as the cause line
 *
 * @example
 * compilePattern('^#{1,6}\\s.*$', { multiline: true }).regex.flags // 'dgm'
 *
 * @example
 * compilePattern('(unclosed')
 * // throws: Invalid regex pattern: (unclosed
 * //           Cause: Invalid regular expression: /(unclosed/dg: Unterminated group
 */
export const compilePattern = (source: string | RegExp, options?: PatternOptions): CompiledPattern => {
    const pattern = typeof source === 'string' ? source : source.source;
    const flags = buildFlags(typeof source === 'string' ? '' : source.flags, options);

    let regex: RegExp;
    try {
        regex = new RegExp(pattern, flags);
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        throw new Error(`Invalid regex pattern: ${pattern}\n  Cause: ${message}`);
    }

    return {
        groupCount: countCaptureGroups(regex),
        groupNames: extractNamedGroupNames(regex),
        regex,
    };
};

/**
 * Whether a pattern can match the empty string somewhere.
 *
 * Such patterns are legal (their zero-length matches are skipped) but usually
 * indicate a mistake like `\\d*` where `\\d+` was meant.
 *
 * @example
 * canMatchEmpty(compilePattern('a*').regex)   // true
 * canMatchEmpty(compilePattern('^>.*').regex) // false
 */
export const canMatchEmpty = (regex: RegExp): boolean => {
    const probe = new RegExp(regex.source, regex.flags.replace(/[gy]/g, ''));
    // Anchors and lookarounds may only admit an empty match in context, so probe a few shapes.
    return ['', '\n', ' ', 'x'].some((sample) => {
        const result = probe.exec(sample);
        return result !== null && result[0] === '';
    });
};

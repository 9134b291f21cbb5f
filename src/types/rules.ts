import type { AttributeMap, TextRange } from './index.js';

/**
 * Matching options for a pattern.
 *
 * The engine always scans globally and records match indices, so the `g` and
 * `d` flags are implied. Everything else is opt-in.
 *
 * @example
 * // Heading lines: `^` and `$` match at every line boundary
 * { multiline: true }
 *
 * @example
 * // Fenced code: `.` also matches newlines
 * { dotAll: true }
 */
export type PatternOptions = {
    /** `^` and `$` match at line boundaries (`m` flag) */
    multiline?: boolean;
    /** `.` matches line separators (`s` flag) */
    dotAll?: boolean;
    /** Case-insensitive matching (`i` flag) */
    ignoreCase?: boolean;
    /**
     * Unicode-aware matching (`u` flag).
     *
     * Off by default: in unicode mode identity escapes such as `\-` outside a
     * character class are syntax errors.
     */
    unicode?: boolean;
};

/**
 * Which part of a match a style applies to.
 *
 * - `undefined`: the whole match
 * - `number`: a positional capture group (1-based)
 * - `string`: a named capture group
 */
export type StyleTarget = number | string | undefined;

/**
 * Context handed to a dynamic style for every match.
 */
export type MutationContext = {
    /** The full match, including every capture group */
    match: RegExpExecArray;
    /** The targeted group, as declared on the style */
    group: StyleTarget;
    /** Span of the targeted group (or of the whole match) */
    range: TextRange;
    /** Span of the whole match */
    matchRange: TextRange;
};

/**
 * Fixed attribute value applied verbatim to every match.
 *
 * @example
 * { key: 'underline', value: true }
 *
 * @example
 * // Only the link text inside `[text](url)`
 * { key: 'underline', value: true, group: 1 }
 */
export type StaticStyle<A extends AttributeMap, K extends keyof A = keyof A> = {
    key: K;
    value: A[K];
    group?: number | string;
};

/**
 * Attribute value computed from the match content.
 *
 * `compute` receives the exact text of the targeted span plus the full match
 * context. Returning `undefined` leaves the attribute unset for that span.
 *
 * @example
 * // Heading size depends on the number of leading hashes
 * {
 *   key: 'fontSize',
 *   compute: (text) => 30 - countLeadingHashes(text) * 2,
 * }
 */
export type DynamicStyle<A extends AttributeMap, K extends keyof A = keyof A> = {
    key: K;
    compute: (text: string, context: MutationContext) => A[K] | undefined;
    group?: number | string;
};

/**
 * A single attribute change applied to a match or capture group.
 *
 * Distributes over the attribute keys so that `key` and `value` (or the
 * return type of `compute`) always agree.
 */
export type StyleMutation<A extends AttributeMap = AttributeMap> = {
    [K in keyof A]: StaticStyle<A, K> | DynamicStyle<A, K>;
}[keyof A];

/**
 * Either form of style with the key left open. Used once rules are compiled,
 * where the key/value pairing has already been checked.
 */
export type StyleVariant<A extends AttributeMap = AttributeMap> = StaticStyle<A> | DynamicStyle<A>;

/**
 * Declarative pattern rule: a regular expression and the styles applied to
 * each of its matches.
 *
 * Styles are applied in listed order, so a later style may overwrite a key set
 * by an earlier one in the same rule.
 *
 * @example
 * const emphasis: PatternRule<EditorAttributes> = {
 *   name: 'emphasis',
 *   regex: '\\*[^*]+\\*',
 *   styles: [{ key: 'italic', value: true }],
 * };
 *
 * @example
 * // Multiline heading rule with a computed font
 * const heading: PatternRule<EditorAttributes> = {
 *   regex: '^#{1,6}\\s.*$',
 *   options: { multiline: true },
 *   styles: [
 *     { key: 'kern', value: 0.5 },
 *     { key: 'font', compute: (text) => headingFont(text) },
 *   ],
 * };
 */
export type PatternRule<A extends AttributeMap = AttributeMap> = {
    /**
     * Pattern source. A `RegExp` keeps its own flags (other than `g`, `d`
     * and `y`), combined with `options`.
     */
    regex: string | RegExp;
    /** Matching options */
    options?: PatternOptions;
    /** Styles applied to each match, in order */
    styles: StyleMutation<A>[];
    /** Optional label used in log messages and validation reports */
    name?: string;
};

/**
 * Attribute values attached to styled text, keyed by attribute name.
 *
 * Values are opaque to the engine: it never interprets them, it only carries
 * them and merges them by key. Rendering back-ends decide what a `font` or a
 * `foregroundColor` value means.
 *
 * @example
 * type EditorAttributes = {
 *   font: { family: string; size: number };
 *   bold: boolean;
 *   foregroundColor: string;
 * };
 */
export type AttributeMap = Record<string, unknown>;

/**
 * A resolved attribute set. Keys absent from the object are unstyled.
 */
export type Attributes<A extends AttributeMap = AttributeMap> = Partial<Readonly<A>>;

/**
 * A half-open span `[start, end)` of UTF-16 code units into the source text.
 */
export type TextRange = {
    /** Start offset (inclusive) */
    start: number;
    /** End offset (exclusive) */
    end: number;
};

/**
 * One run of identically styled characters.
 *
 * @example
 * // "**hi**" styled bold over the whole match
 * { start: 0, end: 6, attributes: { bold: true } }
 */
export type StyleRun<A extends AttributeMap = AttributeMap> = TextRange & {
    /** Every attribute resolved for the characters in this run */
    attributes: Attributes<A>;
};

/**
 * Output of `highlight()`.
 *
 * `runs` partition `[0, text.length)` in order with no gaps and no overlaps.
 * Adjacent runs never carry equal attribute sets. Empty text has no runs.
 */
export type StyledText<A extends AttributeMap = AttributeMap> = {
    /** The source text, unchanged */
    text: string;
    /** Gap-free, coalesced attribute runs */
    runs: StyleRun<A>[];
};

/**
 * A cursor or selection range in a text surface.
 *
 * A cursor is a range with `length: 0`.
 *
 * @example
 * { start: 5, length: 0 }  // caret after the fifth character
 * { start: 2, length: 4 }  // characters 2..5 selected
 */
export type SelectionRange = {
    start: number;
    length: number;
};

// Re-export rule and option types for convenience
export type { Logger, HighlightOptions } from './options.js';
export type {
    DynamicStyle,
    MutationContext,
    PatternOptions,
    PatternRule,
    StaticStyle,
    StyleMutation,
    StyleTarget,
} from './rules.js';
export type {
    RuleValidationIssue,
    RuleValidationIssueType,
    RuleValidationResult,
} from './validation.js';

/**
 * Core highlighting engine.
 *
 * Takes source text and a compiled rule set and produces a gap-free styled
 * representation of the text. Rules run strictly in rule-set order and merges
 * overwrite by attribute key, so a later rule always wins conflicts on the
 * same key while attributes with different keys compose.
 *
 * @module highlighter
 */

import type { AttributeMap, StyledText, TextRange } from '../types/index.js';
import type { HighlightOptions, Logger } from '../types/options.js';
import type { StyleVariant } from '../types/rules.js';
import { AttributeRuns } from './attribute-runs.js';
import { findMatches, getMatchRange, resolveTargetRange } from './match-utils.js';
import type { CompiledRule, RuleSet } from './rule-set.js';

/**
 * Resolves the value of one style for one match.
 *
 * Dynamic styles that throw are reported and treated like a style that
 * returned `undefined`: the attribute is left unset for this span only.
 */
const resolveStyleValue = <A extends AttributeMap>(
    style: StyleVariant<A>,
    text: string,
    match: RegExpExecArray,
    range: TextRange,
    rule: CompiledRule<A>,
    logger?: Logger,
): A[keyof A] | undefined => {
    if (!('compute' in style)) {
        return style.value;
    }
    try {
        return style.compute(text.slice(range.start, range.end), {
            group: style.group,
            match,
            matchRange: getMatchRange(match),
            range,
        });
    } catch (error) {
        logger?.warn?.(`[highlight] dynamic style "${String(style.key)}" failed in ${rule.name}`, {
            error,
            matchStart: match.index,
            ruleIndex: rule.index,
        });
        return undefined;
    }
};

/**
 * Applies every match of one rule to the run list.
 */
const applyRule = <A extends AttributeMap>(
    runs: AttributeRuns<A>,
    text: string,
    rule: CompiledRule<A>,
    logger?: Logger,
) => {
    const matches = findMatches(rule.regex, text);
    logger?.debug?.(`[highlight] ${rule.name}`, { matches: matches.length, ruleIndex: rule.index });

    for (const match of matches) {
        logger?.trace?.('[highlight] match', { ruleIndex: rule.index, start: match.index, text: match[0] });
        for (const style of rule.styles) {
            const range = resolveTargetRange(match, style.group);
            if (!range) {
                continue;
            }
            const value = resolveStyleValue(style, text, match, range, rule, logger);
            if (value !== undefined) {
                runs.merge(range.start, range.end, style.key, value);
            }
        }
    }
};

/**
 * Highlights text with a rule set.
 *
 * This is the main entry point of the engine. The whole text is rescanned on
 * every call: for each rule, in order, every non-overlapping non-empty match is
 * found and each of the rule's styles is merged into its target span.
 *
 * The result is deterministic for a given (text, rules, options) triple and
 * neither input is mutated.
 *
 * @param text - Source text (may be empty)
 * @param ruleSet - Compiled rule set (may be empty)
 * @param options - Base attributes and logger
 * @returns Styled text whose runs cover the whole input with no gaps
 *
 * @example
 * const rules = compileRuleSet<{ bold: boolean; italic: boolean }>([
 *   { regex: '^#{1,6}\\s.*$', options: { multiline: true }, styles: [{ key: 'bold', value: true }] },
 *   { regex: '\\*[^*]+\\*', styles: [{ key: 'italic', value: true }] },
 * ]);
 * highlight('# Title\nplain *word* text', rules).runs;
 * // [
 * //   { start: 0, end: 7, attributes: { bold: true } },
 * //   { start: 7, end: 14, attributes: {} },
 * //   { start: 14, end: 20, attributes: { italic: true } },
 * //   { start: 20, end: 25, attributes: {} },
 * // ]
 */
export const highlight = <A extends AttributeMap>(
    text: string,
    ruleSet: RuleSet<A>,
    options: HighlightOptions<A> = {},
): StyledText<A> => {
    const { baseAttributes = {}, logger } = options;
    const runs = new AttributeRuns<A>(text.length, baseAttributes);

    for (const rule of ruleSet.rules) {
        applyRule(runs, text, rule, logger);
    }

    return { runs: runs.toRuns(), text };
};

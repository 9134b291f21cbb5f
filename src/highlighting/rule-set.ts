/**
 * Declarative rules → immutable compiled rule sets.
 *
 * @module rule-set
 */

import type { AttributeMap } from '../types/index.js';
import type { PatternRule, StyleVariant } from '../types/rules.js';
import { type CompiledPattern, compilePattern } from './pattern.js';

/**
 * A pattern rule after compilation.
 */
export type CompiledRule<A extends AttributeMap = AttributeMap> = Readonly<
    CompiledPattern & {
        /** Position of the rule in its rule set */
        index: number;
        /** Label from the declarative rule, or `rule <index>` */
        name: string;
        /** Styles, in application order */
        styles: readonly StyleVariant<A>[];
    }
>;

/**
 * An ordered, immutable collection of compiled rules. Rule order is the
 * conflict-resolution order: later rules overwrite earlier ones key by key.
 */
export type RuleSet<A extends AttributeMap = AttributeMap> = {
    readonly rules: readonly CompiledRule<A>[];
};

const describeRule = <A extends AttributeMap>(rule: PatternRule<A>, index: number) => rule.name ?? `rule ${index + 1}`;

/**
 * Checks that every style targets a group the pattern actually declares.
 */
const assertTargetsExist = <A extends AttributeMap>(
    rule: PatternRule<A>,
    styles: readonly StyleVariant<A>[],
    index: number,
    { groupCount, groupNames }: CompiledPattern,
) => {
    for (const style of styles) {
        const { group } = style;
        if (group === undefined) {
            continue;
        }
        if (typeof group === 'number') {
            if (!Number.isInteger(group) || group < 1 || group > groupCount) {
                throw new Error(
                    `Invalid capture group ${group} for style "${String(style.key)}" in ${describeRule(rule, index)}: pattern has ${groupCount} group(s)`,
                );
            }
        } else if (!groupNames.includes(group)) {
            throw new Error(
                `Unknown capture group "${group}" for style "${String(style.key)}" in ${describeRule(rule, index)}`,
            );
        }
    }
};

/**
 * Compiles a single rule.
 *
 * @throws {Error} If the pattern is invalid or a style targets a missing group
 */
export const compileRule = <A extends AttributeMap>(rule: PatternRule<A>, index: number): CompiledRule<A> => {
    const compiled = compilePattern(rule.regex, rule.options);
    const styles: readonly StyleVariant<A>[] = rule.styles;
    assertTargetsExist(rule, styles, index, compiled);
    return Object.freeze({
        ...compiled,
        index,
        name: describeRule(rule, index),
        styles: Object.freeze([...styles]),
    });
};

/**
 * Compiles an ordered list of rules into a rule set.
 *
 * Every failure surfaces here, when the rule set is built: a broken pattern is
 * a programming error, not something a highlighting pass recovers from.
 *
 * @param rules - Declarative rules, in conflict-resolution order
 * @returns Frozen rule set
 * @throws {Error} On the first invalid pattern or capture group reference
 *
 * @example
 * const rules = compileRuleSet<EditorAttributes>([
 *   { regex: '^#{1,6}\\s.*$', options: { multiline: true }, styles: [{ key: 'bold', value: true }] },
 *   { regex: '\\*[^*]+\\*', styles: [{ key: 'italic', value: true }] },
 * ]);
 */
export const compileRuleSet = <A extends AttributeMap>(rules: readonly PatternRule<A>[]): RuleSet<A> => {
    return Object.freeze({ rules: Object.freeze(rules.map((rule, i) => compileRule(rule, i))) });
};

/**
 * Composes rule sets by concatenation, preserving order exactly.
 *
 * Rule indices are renumbered to their position in the combined set; the
 * compiled patterns are shared.
 *
 * @example
 * const rules = concatRuleSets(MARKDOWN_RULES, URL_RULES);
 * // URL styles win over markdown styles for the same attribute key
 */
export const concatRuleSets = <A extends AttributeMap>(...sets: readonly RuleSet<A>[]): RuleSet<A> => {
    const combined = sets.flatMap((set) => set.rules).map((rule, index) => Object.freeze({ ...rule, index }));
    return Object.freeze({ rules: Object.freeze(combined) });
};

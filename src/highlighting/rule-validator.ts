/**
 * Rule validation utilities for detecting common mistakes in pattern rules.
 *
 * `compileRuleSet()` throws on the first invalid pattern; this reports every
 * problem at once, including rules that compile fine but probably do not do
 * what their author meant.
 */

import type { AttributeMap } from '../types/index.js';
import type { PatternRule } from '../types/rules.js';
import type { RuleValidationIssue, RuleValidationResult } from '../types/validation.js';
import { canMatchEmpty, compilePattern } from './pattern.js';

const getSource = (regex: string | RegExp) => (typeof regex === 'string' ? regex : regex.source);

/**
 * Compiles a rule's pattern for inspection, turning a syntax error into an
 * issue instead of throwing.
 */
const tryCompile = <A extends AttributeMap>(rule: PatternRule<A>): { regex: RegExp } | { issue: RuleValidationIssue } => {
    try {
        return { regex: compilePattern(rule.regex, rule.options).regex };
    } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return { issue: { message, suggestion: 'Fix the pattern syntax', type: 'invalid_pattern' } };
    }
};

/**
 * Validates a single rule for common issues.
 */
const validateRule = <A extends AttributeMap>(
    rule: PatternRule<A>,
    index: number,
    seenPatterns: Map<string, number>,
): RuleValidationIssue[] => {
    const issues: RuleValidationIssue[] = [];
    const source = getSource(rule.regex);

    if (!source || source === '(?:)') {
        issues.push({ message: 'Empty pattern is not allowed', type: 'empty_pattern' });
        return issues;
    }

    if (!rule.styles.length) {
        issues.push({
            message: 'Rule has no styles and will never change the output',
            suggestion: 'Add at least one style or remove the rule',
            type: 'no_styles',
        });
    }

    const compiled = tryCompile(rule);
    if ('issue' in compiled) {
        issues.push(compiled.issue);
        return issues;
    }

    // Same source and effective flags as an earlier rule
    const key = `/${compiled.regex.source}/${compiled.regex.flags}`;
    const firstIndex = seenPatterns.get(key);
    if (firstIndex !== undefined) {
        issues.push({
            duplicateOf: firstIndex,
            message: `Duplicate pattern: "${source}" (same as rule ${firstIndex + 1})`,
            suggestion: 'Merge the styles into the earlier rule',
            type: 'duplicate',
        });
    } else {
        seenPatterns.set(key, index);
    }

    if (canMatchEmpty(compiled.regex)) {
        issues.push({
            message: `Pattern "${source}" can match the empty string; those matches are skipped`,
            suggestion: 'Use a quantifier that requires at least one character, e.g. + instead of *',
            type: 'zero_length',
        });
    }

    return issues;
};

/**
 * Validates pattern rules for common issues.
 *
 * Checks for:
 * - Empty patterns
 * - Invalid regex syntax (reported instead of thrown)
 * - Rules without styles
 * - Duplicate patterns (same source and effective flags as an earlier rule)
 * - Patterns that can match the empty string
 *
 * @param rules - Declarative rules to validate
 * @returns Array parallel to input with validation results (undefined if no issues)
 *
 * @example
 * const results = validateRules([
 *   { regex: '\\d*', styles: [{ key: 'bold', value: true }] },  // can match empty
 *   { regex: '`[^`]*`', styles: [] },                          // no styles
 * ]);
 * // results[0]?.issues[0].type === 'zero_length'
 * // results[1]?.issues[0].type === 'no_styles'
 */
export const validateRules = <A extends AttributeMap>(
    rules: readonly PatternRule<A>[],
): (RuleValidationResult | undefined)[] => {
    const seenPatterns = new Map<string, number>();
    return rules.map((rule, index) => {
        const issues = validateRule(rule, index, seenPatterns);
        return issues.length ? { issues } : undefined;
    });
};

/**
 * Formats a validation result array into a list of human-readable messages.
 *
 * @param results - The result array from `validateRules()`
 * @returns Array of formatted messages
 *
 * @example
 * formatValidationReport(validateRules(rules));
 * // ['Rule 1: Pattern "\\d*" can match the empty string; those matches are skipped']
 */
export const formatValidationReport = (results: (RuleValidationResult | undefined)[]): string[] => {
    const errors: string[] = [];

    results.forEach((result, ruleIndex) => {
        if (!result) {
            return;
        }
        for (const issue of result.issues) {
            errors.push(`Rule ${ruleIndex + 1}: ${issue.message}`);
        }
    });

    return errors;
};

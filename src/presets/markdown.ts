import { compileRuleSet, type RuleSet } from '../highlighting/rule-set.js';
import type { PatternRule } from '../types/rules.js';
import type { PresetAttributes } from './attributes.js';
import { LINE_ANCHORED, MARKDOWN_PATTERNS as P, SPANS_LINES } from './markdown-patterns.js';
import { DEFAULT_THEME, headingFontFor, type PresetTheme } from './theme.js';

/**
 * Declarative markdown rules for a theme.
 *
 * Strikethrough uses a single `~` delimiter.
 */
export const markdownRules = (theme: PresetTheme = DEFAULT_THEME): PatternRule<PresetAttributes>[] => [
    { name: 'inline code', regex: P.inlineCode, styles: [{ key: 'font', value: theme.codeFont }] },
    {
        name: 'code block',
        options: SPANS_LINES,
        regex: P.codeBlock,
        styles: [{ key: 'font', value: theme.codeFont }],
    },
    {
        name: 'heading',
        options: LINE_ANCHORED,
        regex: P.heading,
        styles: [
            { key: 'kern', value: 0.5 },
            { compute: (line) => headingFontFor(line, theme), key: 'font' },
        ],
    },
    { name: 'link or image', regex: P.linkOrImage, styles: [{ key: 'underline', value: true }] },
    { name: 'link or image reference', regex: P.linkOrImageTag, styles: [{ key: 'underline', value: true }] },
    { name: 'bold', regex: P.bold, styles: [{ key: 'bold', value: true }] },
    { name: 'emphasis (*)', regex: P.emphasisAsterisk, styles: [{ key: 'italic', value: true }] },
    { name: 'emphasis (_)', regex: P.emphasisUnderscore, styles: [{ key: 'italic', value: true }] },
    {
        name: 'bold emphasis',
        regex: P.boldEmphasis,
        styles: [
            { key: 'bold', value: true },
            { key: 'italic', value: true },
        ],
    },
    {
        name: 'blockquote',
        options: LINE_ANCHORED,
        regex: P.blockquote,
        styles: [{ key: 'backgroundColor', value: theme.secondaryBackground }],
    },
    {
        name: 'horizontal rule',
        regex: P.horizontalRule,
        styles: [{ key: 'foregroundColor', value: theme.lighterColor }],
    },
    {
        name: 'unordered list',
        options: LINE_ANCHORED,
        regex: P.unorderedList,
        styles: [{ key: 'foregroundColor', value: theme.lighterColor }],
    },
    {
        name: 'ordered list',
        options: LINE_ANCHORED,
        regex: P.orderedList,
        styles: [{ key: 'foregroundColor', value: theme.lighterColor }],
    },
    { name: 'button', regex: P.button, styles: [{ key: 'foregroundColor', value: theme.lighterColor }] },
    {
        name: 'strikethrough',
        regex: '(~)((?!\\1).)+\\1',
        styles: [
            { key: 'strikethrough', value: true },
            { key: 'strikethroughColor', value: theme.textColor },
        ],
    },
    {
        name: 'reference tag',
        options: LINE_ANCHORED,
        regex: P.tag,
        styles: [{ key: 'foregroundColor', value: theme.lighterColor }],
    },
    { name: 'footnote', regex: P.footnote, styles: [{ key: 'foregroundColor', value: theme.lighterColor }] },
    {
        name: 'html',
        options: { dotAll: true, ignoreCase: true },
        regex: P.html,
        styles: [
            { key: 'font', value: theme.codeFont },
            { key: 'foregroundColor', value: theme.lighterColor },
        ],
    },
];

/**
 * Compiled markdown rule set for a theme.
 *
 * @example
 * const rules = createMarkdownRules({ ...DEFAULT_THEME, codeFont: { family: 'Fira Code', size: 12 } });
 */
export const createMarkdownRules = (theme: PresetTheme = DEFAULT_THEME): RuleSet<PresetAttributes> =>
    compileRuleSet(markdownRules(theme));

/** Markdown rules with the default theme */
export const MARKDOWN_RULES = createMarkdownRules();

import { compileRuleSet, type RuleSet } from '../highlighting/rule-set.js';
import type { PatternRule } from '../types/rules.js';
import type { PresetAttributes, PresetParagraph } from './attributes.js';
import { LINE_ANCHORED, MARKDOWN_PATTERNS as P, SPANS_LINES } from './markdown-patterns.js';
import { DEFAULT_THEME, headingFontFor, type PresetTheme } from './theme.js';

const HEADING_PARAGRAPH: PresetParagraph = Object.freeze({ spacingAfter: 10 });

const LIST_PARAGRAPH: PresetParagraph = Object.freeze({ firstLineHeadIndent: 15, headIndent: 15, spacingAfter: 12 });

/**
 * Declarative rules for a more finished look: headings and list items get
 * paragraph spacing, syntax characters are dimmed and `==text==` is
 * highlighted.
 *
 * Strikethrough uses the `~~` delimiter. Rules late in the list (the syntax
 * dimming ones) deliberately overwrite colors set earlier.
 */
export const prettyMarkdownRules = (theme: PresetTheme = DEFAULT_THEME): PatternRule<PresetAttributes>[] => [
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
            { key: 'paragraph', value: HEADING_PARAGRAPH },
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
        styles: [{ key: 'paragraph', value: LIST_PARAGRAPH }],
    },
    {
        name: 'ordered list',
        options: LINE_ANCHORED,
        regex: P.orderedList,
        styles: [
            { key: 'paragraph', value: LIST_PARAGRAPH },
            { key: 'foregroundColor', value: theme.lighterColor },
        ],
    },
    { name: 'button', regex: P.button, styles: [{ key: 'foregroundColor', value: theme.lighterColor }] },
    {
        name: 'strikethrough',
        regex: '(~~)((?!\\1).)+\\1',
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
    // Syntax characters
    { name: 'asterisk', regex: '\\*', styles: [{ key: 'foregroundColor', value: theme.lighterColor }] },
    {
        name: 'heading marker',
        options: LINE_ANCHORED,
        regex: '^#{1,6}',
        styles: [
            { key: 'foregroundColor', value: theme.lighterColor },
            { key: 'font', value: theme.syntaxFont },
        ],
    },
    {
        name: 'emphasis opener',
        regex: '(?<=^|[^*])\\*(?=[^*])',
        styles: [{ key: 'foregroundColor', value: theme.lighterColor }],
    },
    {
        name: 'emphasis closer',
        regex: '(?<=[^*])\\*(?=[^*]|$)',
        styles: [{ key: 'foregroundColor', value: theme.lighterColor }],
    },
    {
        name: 'highlight',
        regex: '==.*?==',
        styles: [
            { key: 'backgroundColor', value: theme.textHighlight },
            { key: 'foregroundColor', value: theme.textColor },
        ],
    },
    {
        name: 'highlight marker',
        regex: '(?<=\\s)==|==(?=\\s)',
        styles: [{ key: 'foregroundColor', value: theme.lighterColor }],
    },
    {
        name: 'unchecked checkbox',
        options: LINE_ANCHORED,
        regex: '^(\\[\\s\\]).*',
        styles: [{ key: 'backgroundColor', value: theme.checkboxBackground }],
    },
];

/**
 * Compiled pretty-markdown rule set for a theme.
 */
export const createPrettyMarkdownRules = (theme: PresetTheme = DEFAULT_THEME): RuleSet<PresetAttributes> =>
    compileRuleSet(prettyMarkdownRules(theme));

/** Pretty-markdown rules with the default theme */
export const PRETTY_MARKDOWN_RULES = createPrettyMarkdownRules();

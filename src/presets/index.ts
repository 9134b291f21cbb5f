export type { PresetAttributes, PresetFont, PresetParagraph } from './attributes.js';
export { presetAttributesToCss } from './css.js';
export { createMarkdownRules, MARKDOWN_RULES, markdownRules } from './markdown.js';
export { LINE_ANCHORED, MARKDOWN_PATTERNS, SPANS_LINES } from './markdown-patterns.js';
export { createPrettyMarkdownRules, PRETTY_MARKDOWN_RULES, prettyMarkdownRules } from './pretty-markdown.js';
export { DEFAULT_THEME, headingFontFor, type PresetTheme, presetBaseAttributes } from './theme.js';
export { createUrlRules, toAbsoluteUrl, URL_PATTERN, URL_RULES, urlRules } from './url.js';

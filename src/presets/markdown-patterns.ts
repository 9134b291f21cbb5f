import type { PatternOptions } from '../types/rules.js';

/**
 * Markdown constructs recognised by the presets, as pattern sources.
 *
 * Deliberately approximate: each construct is one regular expression, and
 * nesting goes only as far as a regular expression can express it.
 */
export const MARKDOWN_PATTERNS = Object.freeze({
    /** `> quoted` lines */
    blockquote: '^>.*',
    /** `**bold**` and `__bold__` */
    bold: '((\\*|_){2})((?!\\1).)+\\1',
    /** `***bold emphasis***` */
    boldEmphasis: '(\\*){3}((?!\\1).)+\\1{3}',
    /** `<button>…</button>` */
    button: '<\\s*button[^>]*>(.*?)<\\s*/\\s*button>',
    /** Fenced code between triple backticks */
    codeBlock: '(`){3}((?!\\1).)+\\1{3}',
    /** `*emphasis*` not touching another asterisk */
    emphasisAsterisk: '(?<!\\*)(\\*)((?!\\1).)+\\1(?!\\*)',
    /** `_emphasis_` */
    emphasisUnderscore: '(?<!_)_[^_]+_(?!\\*)',
    /** `[^1]` footnote references */
    footnote: '\\[\\^(.*?)\\]',
    /** `# Heading` lines, levels 1–6 */
    heading: '^#{1,6}\\s.*$',
    /** `---` or `***` between blank lines */
    horizontalRule: '\n\n(-{3}|\\*{3})\n',
    /** A paired HTML element such as `<em>…</em>` */
    html: '<([A-Z][A-Z0-9]*)\\b[^>]*>(.*?)</\\1>',
    /** `` `inline code` `` */
    inlineCode: '`[^`]*`',
    /** `[text](url)` and `![alt](src)` */
    linkOrImage: '!?\\[([^\\[\\]]*)\\]\\((.*?)\\)',
    /** `[text][ref]` and `![alt][ref]` */
    linkOrImageTag: '!?\\[([^\\[\\]]*)\\]\\[(.*?)\\]',
    /** `1. ` item markers */
    orderedList: '^\\d*\\.\\s',
    /** `[ref]:` reference definitions */
    tag: '^\\[([^\\[\\]]*)\\]:',
    /** `- ` and `* ` item markers */
    unorderedList: '^(\\-|\\*)\\s',
});

/** Options for line-anchored constructs */
export const LINE_ANCHORED: PatternOptions = Object.freeze({ multiline: true });

/** Options for constructs that may span lines */
export const SPANS_LINES: PatternOptions = Object.freeze({ dotAll: true });

import type { Attributes } from '../types/index.js';
import type { PresetAttributes, PresetFont } from './attributes.js';

/**
 * Fonts and colors the presets draw from.
 */
export type PresetTheme = {
    /** Editor body text */
    bodyFont: PresetFont;
    /** Base font for headings; the size grows with the heading level */
    headingFont: PresetFont;
    /** Inline code, fenced code and HTML */
    codeFont: PresetFont;
    /** Heading markers (`#`) in the pretty preset */
    syntaxFont: PresetFont;
    textColor: string;
    /** Dimmed text: list markers, rules, footnotes, syntax characters */
    lighterColor: string;
    /** Blockquote background */
    secondaryBackground: string;
    /** `==highlight==` background */
    textHighlight: string;
    /** Unchecked `[ ]` checkbox line background */
    checkboxBackground: string;
};

/**
 * A light editor palette with a 13pt body.
 */
export const DEFAULT_THEME: PresetTheme = Object.freeze({
    bodyFont: { family: 'system-ui', size: 13 },
    checkboxBackground: 'rgba(245, 142, 39, 0.2)',
    codeFont: { family: 'Menlo', size: 13 },
    headingFont: { family: 'Lato', size: 13, weight: 800 },
    lighterColor: '#aaaaaa',
    secondaryBackground: '#f2f2f7',
    syntaxFont: { family: 'system-ui', size: 14 },
    textColor: '#1d1d1f',
    textHighlight: '#b3efff',
});

/**
 * Attributes under every run: the body font and text color.
 *
 * @example
 * highlight(text, MARKDOWN_RULES, { baseAttributes: presetBaseAttributes() });
 */
export const presetBaseAttributes = (theme: PresetTheme = DEFAULT_THEME): Attributes<PresetAttributes> => ({
    font: theme.bodyFont,
    foregroundColor: theme.textColor,
});

const MAX_HEADING_LEVEL = 6;

/**
 * Font for a heading line: one step of 2.5pt per level above 6.
 *
 * @example
 * headingFontFor('## Title', DEFAULT_THEME) // { family: 'Lato', size: 23, weight: 800 }
 */
export const headingFontFor = (line: string, theme: PresetTheme): PresetFont => {
    const hashes = /^#*/.exec(line)?.[0].length ?? 0;
    const level = Math.min(MAX_HEADING_LEVEL, hashes);
    return { ...theme.headingFont, size: (MAX_HEADING_LEVEL - level) * 2.5 + theme.headingFont.size };
};

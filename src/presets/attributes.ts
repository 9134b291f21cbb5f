/**
 * A font as the presets describe it. Rendering back-ends map it to their own
 * font objects (a CSS `font` shorthand, a canvas font string, ...).
 */
export type PresetFont = {
    family: string;
    /** Point size */
    size: number;
    /** Numeric weight, 100–900 */
    weight?: number;
};

/**
 * Paragraph-level layout, applied to the characters of the paragraph a match
 * touches.
 */
export type PresetParagraph = {
    /** Space below the paragraph */
    spacingAfter?: number;
    /** Indent of the first line */
    firstLineHeadIndent?: number;
    /** Indent of the following lines */
    headIndent?: number;
};

/**
 * The attribute vocabulary the built-in presets style text with. Colors are
 * CSS color strings.
 */
export type PresetAttributes = {
    font: PresetFont;
    bold: boolean;
    italic: boolean;
    /** Extra spacing between characters */
    kern: number;
    underline: boolean;
    /** Absolute URL the span links to */
    link: string;
    strikethrough: boolean;
    strikethroughColor: string;
    foregroundColor: string;
    backgroundColor: string;
    paragraph: PresetParagraph;
};

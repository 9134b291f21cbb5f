import type { CssStyle } from '../render/html.js';
import type { Attributes } from '../types/index.js';
import type { PresetAttributes } from './attributes.js';

/**
 * Inline CSS for preset attributes, for use with `renderStyledTextToHtml`.
 *
 * Paragraph attributes have no inline equivalent and are not rendered; neither
 * is `link`, since a backdrop does not receive clicks.
 *
 * @example
 * presetAttributesToCss({ bold: true, underline: true, strikethrough: true })
 * // { fontWeight: 'bold', textDecorationLine: 'underline line-through', ... }
 */
export const presetAttributesToCss = (attributes: Attributes<PresetAttributes>): CssStyle => {
    const { font, bold, italic, kern, underline, strikethrough } = attributes;
    const decorations = [underline && 'underline', strikethrough && 'line-through'].filter(
        (line): line is string => typeof line === 'string',
    );
    return {
        backgroundColor: attributes.backgroundColor,
        color: attributes.foregroundColor,
        fontFamily: font?.family,
        fontSize: font?.size,
        fontStyle: italic ? 'italic' : undefined,
        fontWeight: bold ? 'bold' : font?.weight,
        letterSpacing: kern,
        textDecorationColor: strikethrough ? attributes.strikethroughColor : undefined,
        textDecorationLine: decorations.length ? decorations.join(' ') : undefined,
    };
};

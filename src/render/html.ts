/**
 * Renders styled text as HTML for display surfaces that cannot style text
 * natively (a backdrop behind a `<textarea>`, a static preview).
 *
 * @module html
 */

import type { AttributeMap, Attributes, StyledText } from '../types/index.js';

/**
 * Inline CSS as a camelCase record, e.g. `{ fontWeight: 'bold', fontSize: 14 }`.
 * `undefined` and empty-string values are left out.
 */
export type CssStyle = Record<string, string | number | undefined>;

/**
 * Maps resolved attributes to inline CSS.
 */
export type AttributesToCss<A extends AttributeMap> = (attributes: Attributes<A>) => CssStyle;

const UNITLESS_PROPERTIES = new Set(['flexGrow', 'fontWeight', 'lineHeight', 'opacity', 'order', 'zIndex']);

/**
 * Escapes the characters that are significant in HTML text and in
 * double-quoted attribute values.
 */
export const escapeHtml = (text: string): string => {
    return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;').replace(/"/g, '&quot;');
};

const toKebabCase = (property: string) => property.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`);

/**
 * Converts a camelCase style record into the value of a `style` attribute.
 * Numbers get a `px` unit unless the property is unitless.
 *
 * @example
 * cssDeclarations({ fontWeight: 700, fontSize: 14, color: undefined })
 * // 'font-weight: 700; font-size: 14px'
 */
export const cssDeclarations = (style: CssStyle): string => {
    const declarations: string[] = [];
    for (const [property, value] of Object.entries(style)) {
        if (value === undefined || value === '') {
            continue;
        }
        const rendered = typeof value === 'number' && !UNITLESS_PROPERTIES.has(property) ? `${value}px` : String(value);
        declarations.push(`${toKebabCase(property)}: ${rendered}`);
    }
    return declarations.join('; ');
};

/**
 * Renders every run as `<span style="…">text</span>`.
 *
 * Runs whose CSS is empty are emitted as bare text. A trailing newline gets an
 * extra space after it, otherwise the browser collapses the last empty line
 * and the backdrop ends up one line shorter than the textarea.
 *
 * @example
 * renderStyledTextToHtml(
 *   { text: 'a <b>', runs: [{ start: 0, end: 1, attributes: { bold: true } }, { start: 1, end: 5, attributes: {} }] },
 *   (attributes) => ({ fontWeight: attributes.bold ? 'bold' : undefined }),
 * )
 * // '<span style="font-weight: bold">a</span> &lt;b&gt;'
 */
export const renderStyledTextToHtml = <A extends AttributeMap>(
    styled: StyledText<A>,
    toCss: AttributesToCss<A>,
): string => {
    let html = '';
    for (const run of styled.runs) {
        const content = escapeHtml(styled.text.slice(run.start, run.end));
        const declarations = cssDeclarations(toCss(run.attributes));
        html += declarations ? `<span style="${escapeHtml(declarations)}">${content}</span>` : content;
    }
    if (styled.text.endsWith('\n')) {
        html += ' ';
    }
    return html;
};

import { describe, expect, it } from 'vitest';

import { highlight } from '../highlighting/highlighter.js';
import { concatRuleSets } from '../highlighting/rule-set.js';
import { validateRules } from '../highlighting/rule-validator.js';
import { getAttributesAt } from '../highlighting/styled-text.js';
import { cssDeclarations } from '../render/html.js';
import { presetAttributesToCss } from './css.js';
import { MARKDOWN_RULES, markdownRules } from './markdown.js';
import { PRETTY_MARKDOWN_RULES, prettyMarkdownRules } from './pretty-markdown.js';
import { DEFAULT_THEME, headingFontFor, presetBaseAttributes } from './theme.js';
import { toAbsoluteUrl, URL_RULES, urlRules } from './url.js';

describe('theme', () => {
    it('should grow heading fonts by 2.5pt per level above 6', () => {
        expect(headingFontFor('# A', DEFAULT_THEME)).toEqual({ family: 'Lato', size: 25.5, weight: 800 });
        expect(headingFontFor('## A', DEFAULT_THEME)).toEqual({ family: 'Lato', size: 23, weight: 800 });
        expect(headingFontFor('###### A', DEFAULT_THEME).size).toBe(13);
    });

    it('should cap the level at 6', () => {
        expect(headingFontFor('######## A', DEFAULT_THEME).size).toBe(13);
    });

    it('should provide the body font and text color as base attributes', () => {
        expect(presetBaseAttributes()).toEqual({ font: { family: 'system-ui', size: 13 }, foregroundColor: '#1d1d1f' });
    });
});

describe('markdown preset', () => {
    it('should have no lint issues', () => {
        expect(validateRules(markdownRules()).every((result) => result === undefined)).toBe(true);
    });

    it('should size and kern headings', () => {
        expect(highlight('## Title', MARKDOWN_RULES).runs).toEqual([
            { attributes: { font: { family: 'Lato', size: 23, weight: 800 }, kern: 0.5 }, end: 8, start: 0 },
        ]);
    });

    it('should use the code font for inline code', () => {
        expect(highlight('use `x` now', MARKDOWN_RULES).runs).toEqual([
            { attributes: {}, end: 4, start: 0 },
            { attributes: { font: { family: 'Menlo', size: 13 } }, end: 7, start: 4 },
            { attributes: {}, end: 11, start: 7 },
        ]);
    });

    it('should tell bold from emphasis', () => {
        expect(highlight('**bold**', MARKDOWN_RULES).runs).toEqual([{ attributes: { bold: true }, end: 8, start: 0 }]);
        expect(highlight('*word*', MARKDOWN_RULES).runs).toEqual([{ attributes: { italic: true }, end: 6, start: 0 }]);
    });

    it('should strike through single-tilde spans', () => {
        expect(highlight('a ~b~ c', MARKDOWN_RULES).runs).toEqual([
            { attributes: {}, end: 2, start: 0 },
            { attributes: { strikethrough: true, strikethroughColor: '#1d1d1f' }, end: 5, start: 2 },
            { attributes: {}, end: 7, start: 5 },
        ]);
    });

    it('should dim list markers', () => {
        expect(highlight('1. one', MARKDOWN_RULES).runs).toEqual([
            { attributes: { foregroundColor: '#aaaaaa' }, end: 3, start: 0 },
            { attributes: {}, end: 6, start: 3 },
        ]);
    });
});

describe('pretty markdown preset', () => {
    it('should have no lint issues', () => {
        expect(validateRules(prettyMarkdownRules()).every((result) => result === undefined)).toBe(true);
    });

    it('should dim the heading marker and space the heading paragraph', () => {
        const styled = highlight('# A', PRETTY_MARKDOWN_RULES);
        expect(getAttributesAt(styled, 0)).toEqual({
            font: { family: 'system-ui', size: 14 },
            foregroundColor: '#aaaaaa',
            kern: 0.5,
            paragraph: { spacingAfter: 10 },
        });
        expect(getAttributesAt(styled, 2)).toEqual({
            font: { family: 'Lato', size: 25.5, weight: 800 },
            kern: 0.5,
            paragraph: { spacingAfter: 10 },
        });
    });

    it('should highlight ==marked== text and dim its markers', () => {
        const marked = { backgroundColor: '#b3efff' };
        expect(highlight('a ==b== c', PRETTY_MARKDOWN_RULES).runs).toEqual([
            { attributes: {}, end: 2, start: 0 },
            { attributes: { ...marked, foregroundColor: '#aaaaaa' }, end: 4, start: 2 },
            { attributes: { ...marked, foregroundColor: '#1d1d1f' }, end: 5, start: 4 },
            { attributes: { ...marked, foregroundColor: '#aaaaaa' }, end: 7, start: 5 },
            { attributes: {}, end: 9, start: 7 },
        ]);
    });

    it('should indent list items', () => {
        expect(highlight('- item', PRETTY_MARKDOWN_RULES).runs).toEqual([
            { attributes: { paragraph: { firstLineHeadIndent: 15, headIndent: 15, spacingAfter: 12 } }, end: 2, start: 0 },
            { attributes: {}, end: 6, start: 2 },
        ]);
    });

    it('should strike through double-tilde spans only', () => {
        expect(highlight('~a~', PRETTY_MARKDOWN_RULES).runs).toEqual([{ attributes: {}, end: 3, start: 0 }]);
        expect(getAttributesAt(highlight('~~a~~', PRETTY_MARKDOWN_RULES), 2)).toEqual({
            strikethrough: true,
            strikethroughColor: '#1d1d1f',
        });
    });

    it('should tint unchecked checkbox lines', () => {
        expect(highlight('[ ] todo', PRETTY_MARKDOWN_RULES).runs).toEqual([
            { attributes: { backgroundColor: 'rgba(245, 142, 39, 0.2)' }, end: 8, start: 0 },
        ]);
    });
});

describe('url preset', () => {
    it('should have no lint issues', () => {
        expect(validateRules(urlRules())).toEqual([undefined]);
    });

    it('should resolve addresses to absolute URLs', () => {
        expect(toAbsoluteUrl('www.example.com')).toBe('https://www.example.com/');
        expect(toAbsoluteUrl('http://example.org/a.html')).toBe('http://example.org/a.html');
        expect(toAbsoluteUrl('https://exa mple.com')).toBeUndefined();
    });

    it('should underline and link addresses', () => {
        expect(highlight('visit www.example.com today', URL_RULES).runs).toEqual([
            { attributes: {}, end: 6, start: 0 },
            { attributes: { link: 'https://www.example.com/', underline: true }, end: 21, start: 6 },
            { attributes: {}, end: 27, start: 21 },
        ]);
    });

    it('should leave text without addresses alone', () => {
        expect(highlight('no link here', URL_RULES).runs).toEqual([{ attributes: {}, end: 12, start: 0 }]);
    });

    it('should compose after markdown', () => {
        const styled = highlight('[site](www.example.com)', concatRuleSets(MARKDOWN_RULES, URL_RULES));
        expect(getAttributesAt(styled, 0)).toEqual({ underline: true });
        expect(getAttributesAt(styled, 7)).toEqual({ link: 'https://www.example.com/', underline: true });
    });
});

describe('presetAttributesToCss', () => {
    it('should map preset attributes to inline CSS', () => {
        const css = presetAttributesToCss({
            backgroundColor: '#eee',
            bold: true,
            font: { family: 'Menlo', size: 13, weight: 400 },
            foregroundColor: '#111',
            italic: true,
            kern: 0.5,
            link: 'https://example.com/',
            paragraph: { spacingAfter: 10 },
            strikethrough: true,
            strikethroughColor: 'red',
            underline: true,
        });
        expect(cssDeclarations(css)).toBe(
            'background-color: #eee; color: #111; font-family: Menlo; font-size: 13px; font-style: italic; ' +
                'font-weight: bold; letter-spacing: 0.5px; text-decoration-color: red; text-decoration-line: underline line-through',
        );
    });

    it('should use the font weight when not bold', () => {
        expect(presetAttributesToCss({ font: { family: 'Lato', size: 23, weight: 800 } }).fontWeight).toBe(800);
    });
});

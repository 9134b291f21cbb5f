import fc from 'fast-check';
import { describe, expect, it } from 'vitest';

import type { Attributes } from '../types/index.js';
import { attributesEqual } from './attribute-runs.js';
import { highlight } from './highlighter.js';
import { findMatches } from './match-utils.js';
import { compileRuleSet } from './rule-set.js';
import { getAttributesAt } from './styled-text.js';

type Attrs = { bold: boolean; color: string; size: number };

const rules = compileRuleSet<Attrs>([
    { regex: 'a+', styles: [{ key: 'color', value: 'red' }] },
    {
        regex: '\\*[^*\\n]*\\*',
        styles: [
            { key: 'color', value: 'blue' },
            { key: 'bold', value: true },
        ],
    },
    { options: { multiline: true }, regex: '^#.*$', styles: [{ key: 'size', value: 2 }] },
    { regex: 'b', styles: [{ key: 'color', value: 'green' }] },
]);

const textArb = fc.stringOf(fc.constantFrom('a', 'b', '*', '#', ' ', '\n'), { maxLength: 40 });

/**
 * Character-by-character model: every match of every rule, in rule order,
 * overwrites its keys on each covered character.
 */
const expectedAttributesPerChar = (text: string): Attributes<Attrs>[] => {
    const chars: Attributes<Attrs>[] = Array.from({ length: text.length }, () => ({}));
    for (const rule of rules.rules) {
        for (const match of findMatches(rule.regex, text)) {
            for (let i = match.index; i < match.index + match[0].length; i++) {
                for (const style of rule.styles) {
                    if ('value' in style) {
                        chars[i] = { ...chars[i], [style.key]: style.value };
                    }
                }
            }
        }
    }
    return chars;
};

describe('highlight properties', () => {
    it('should be deterministic', () => {
        fc.assert(
            fc.property(textArb, (text) => {
                expect(highlight(text, rules)).toEqual(highlight(text, rules));
            }),
        );
    });

    it('should partition the text into coalesced runs', () => {
        fc.assert(
            fc.property(textArb, (text) => {
                const { runs } = highlight(text, rules);
                let offset = 0;
                for (const [i, run] of runs.entries()) {
                    expect(run.start).toBe(offset);
                    expect(run.end).toBeGreaterThan(run.start);
                    if (i > 0) {
                        expect(attributesEqual(runs[i - 1].attributes, run.attributes)).toBe(false);
                    }
                    offset = run.end;
                }
                expect(offset).toBe(text.length);
            }),
        );
    });

    it('should resolve every character as if later rules overwrote earlier ones', () => {
        fc.assert(
            fc.property(textArb, (text) => {
                const styled = highlight(text, rules);
                const expected = expectedAttributesPerChar(text);
                for (let i = 0; i < text.length; i++) {
                    expect(getAttributesAt(styled, i)).toEqual(expected[i]);
                }
            }),
        );
    });
});

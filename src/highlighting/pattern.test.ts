import { describe, expect, it } from 'vitest';

import { buildFlags, canMatchEmpty, compilePattern, countCaptureGroups, extractNamedGroupNames } from './pattern.js';

describe('pattern', () => {
    describe('buildFlags', () => {
        it('should always add the global and indices flags', () => {
            expect(buildFlags('')).toBe('dg');
        });

        it('should map options to flags in a stable order', () => {
            expect(buildFlags('', { dotAll: true, ignoreCase: true, multiline: true, unicode: true })).toBe('dgimsu');
        });

        it('should keep existing flags but drop sticky', () => {
            expect(buildFlags('iy', { dotAll: true })).toBe('dgis');
        });
    });

    describe('extractNamedGroupNames', () => {
        it('should return named groups in declaration order', () => {
            expect(extractNamedGroupNames(/^(?<level>#{1,6})\s(?<title>.*)$/)).toEqual(['level', 'title']);
        });

        it('should not treat lookbehinds as groups', () => {
            expect(extractNamedGroupNames(/(?<!_)_[^_]+_(?<=_)/)).toEqual([]);
        });

        it('should not treat an escaped parenthesis as a group', () => {
            expect(extractNamedGroupNames(/\(?<x>/)).toEqual([]);
            expect(compilePattern('\\(?<x>').groupNames).toEqual([]);
        });
    });

    describe('countCaptureGroups', () => {
        it('should count positional and named groups but not non-capturing ones', () => {
            expect(countCaptureGroups(/(a)(?:b)(?<c>c)/)).toBe(2);
        });

        it('should return 0 for a pattern without groups', () => {
            expect(countCaptureGroups(/abc/g)).toBe(0);
        });
    });

    describe('compilePattern', () => {
        it('should compile a string source with options', () => {
            const { regex, groupCount, groupNames } = compilePattern('^(#{1,6})\\s.*$', { multiline: true });
            expect(regex.source).toBe('^(#{1,6})\\s.*$');
            expect(regex.flags).toBe('dgm');
            expect(groupCount).toBe(1);
            expect(groupNames).toEqual([]);
        });

        it('should accept a RegExp and keep its own flags', () => {
            const { regex } = compilePattern(/<b>/iy);
            expect(regex.flags).toBe('dgi');
        });

        it('should throw helpful error for invalid regex', () => {
            expect(() => compilePattern('(unclosed')).toThrow(/^Invalid regex pattern: \(unclosed\n {2}Cause: /);
        });
    });

    describe('canMatchEmpty', () => {
        it('should detect patterns that admit an empty match', () => {
            expect(canMatchEmpty(compilePattern('a*').regex)).toBe(true);
            expect(canMatchEmpty(compilePattern('^$', { multiline: true }).regex)).toBe(true);
        });

        it('should accept patterns that always consume characters', () => {
            expect(canMatchEmpty(compilePattern('^>.*', { multiline: true }).regex)).toBe(false);
            expect(canMatchEmpty(compilePattern('\\*[^*]+\\*').regex)).toBe(false);
        });
    });
});

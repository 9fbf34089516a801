import { describe, expect, it } from 'vitest';
import type { CompiledPatternRule } from '../types/index.js';
import { applyPatternRules, normalizeReplaceFlags, sortByPriority } from './patterns.js';

const rule = (pattern: string, replacement: string, extra: Partial<CompiledPatternRule> = {}): CompiledPatternRule => ({
    mode: 'cumulative',
    re: new RegExp(pattern, 'gu'),
    replacement,
    ...extra,
});

describe('patterns', () => {
    describe('normalizeReplaceFlags', () => {
        it('should default to gu', () => {
            expect(normalizeReplaceFlags()).toBe('gu');
            expect(normalizeReplaceFlags('')).toBe('gu');
        });

        it('should always add g and u and order the flags', () => {
            expect(normalizeReplaceFlags('i')).toBe('giu');
            expect(normalizeReplaceFlags('mi')).toBe('gimu');
        });

        it('should throw on an unknown flag', () => {
            expect(() => normalizeReplaceFlags('gx')).toThrow('Invalid replace regex flag: "x" (allowed: gimsyu)');
        });
    });

    describe('applyPatternRules', () => {
        it('should chain cumulative rules, each seeing the previous output', () => {
            const rules = [rule('([āīū])\\1+', '$1'), rule('(\\p{L})\\1{2,}', '$1$1')];
            expect(applyPatternRules('bzāāāfff', rules, 'moroccan')).toBe('bzāff');
        });

        it('should apply only the first matching exclusive rule', () => {
            const rules = [
                rule('x', 'y', { mode: 'exclusive' }),
                rule('a', 'b', { mode: 'exclusive' }),
                rule('a', 'c', { mode: 'exclusive' }),
            ];
            expect(applyPatternRules('aa', rules, 'moroccan')).toBe('bb');
        });

        it('should keep running cumulative rules after an exclusive match', () => {
            const rules = [rule('a', 'b', { mode: 'exclusive' }), rule('b', 'c', { mode: 'exclusive' }), rule('b', 'd')];
            expect(applyPatternRules('a', rules, 'moroccan')).toBe('d');
        });

        it('should skip rules limited to other dialects', () => {
            const rules = [rule('o', 'u', { dialects: new Set(['moroccan']) })];
            expect(applyPatternRules('kom', rules, 'msa')).toBe('kom');
            expect(applyPatternRules('kom', rules, 'moroccan')).toBe('kum');
        });

        it('should give the same result when the same rules run twice', () => {
            const rules = [rule('a', 'b')];
            expect(applyPatternRules('aa', rules, 'moroccan')).toBe('bb');
            expect(applyPatternRules('aa', rules, 'moroccan')).toBe('bb');
        });
    });

    describe('sortByPriority', () => {
        it('should sort higher priority first and keep ties in order', () => {
            const items = [
                { id: 'a', priority: 0 },
                { id: 'b', priority: 2 },
                { id: 'c', priority: 0 },
                { id: 'd', priority: 2 },
            ];
            expect(sortByPriority(items, (i) => i.priority).map((i) => i.id)).toEqual(['b', 'd', 'a', 'c']);
        });
    });
});

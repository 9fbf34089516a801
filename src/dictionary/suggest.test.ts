import { describe, expect, it, vi } from 'vitest';
import { loadDefaultTables } from '../config/files.js';
import { UnknownDialectError } from '../errors.js';
import { similarity, suggestDictionaryEntries } from './suggest.js';

const state = loadDefaultTables({ env: {} });

describe('suggest', () => {
    describe('similarity', () => {
        it('should score by longest common subsequence', () => {
            expect(similarity('slam', 'salam')).toBeCloseTo(88.89, 2);
            expect(similarity('salam', 'salam')).toBe(100);
            expect(similarity('abc', 'xyz')).toBe(0);
            expect(similarity('', '')).toBe(100);
        });

        it('should count code points, not code units', () => {
            expect(similarity('ḥ', 'ḥ')).toBe(100);
            expect(similarity('😀a', 'a')).toBeCloseTo(66.67, 2);
        });
    });

    describe('suggestDictionaryEntries', () => {
        it('should find close dictionary keys', () => {
            const [first] = suggestDictionaryEntries('Slam', state);
            expect(first.key).toBe('salam');
            expect(first.value).toBe('salām');
            expect(first.score).toBeCloseTo(88.89, 2);
        });

        it('should search the dialect partition', () => {
            expect(suggestDictionaryEntries('kolchii', state, { dialect: 'moroccan' }).map((s) => s.key)).toEqual(['kolchi']);
            expect(suggestDictionaryEntries('kolchii', state, { dialect: 'msa' })).toEqual([]);
        });

        it('should treat an unknown dialect the way convert does', () => {
            expect(() => suggestDictionaryEntries('kolchii', state, { dialect: 'egyptian' })).toThrow(UnknownDialectError);

            const warn = vi.fn();
            const suggestions = suggestDictionaryEntries('kolchii', state, {
                dialect: 'egyptian',
                logger: { warn },
                onUnknownDialect: 'default',
            });
            expect(suggestions.map((s) => s.key)).toEqual(['kolchi']);
            expect(warn).toHaveBeenCalledWith('Unknown dialect "egyptian", using "moroccan"', {
                available: ['moroccan', 'msa'],
            });
        });

        it('should honor threshold and limit', () => {
            expect(suggestDictionaryEntries('slam', state, { threshold: 95 })).toEqual([]);
            expect(suggestDictionaryEntries('chokran', state, { limit: 1, threshold: 50 })).toEqual([
                { key: 'chokran', score: 100, value: 'šukran' },
            ]);
        });

        it('should sort by score, best first', () => {
            const keys = suggestDictionaryEntries('mezyan', state, { threshold: 80 }).map((s) => s.key);
            expect(keys).toEqual(['mezyan', 'mzyan']);
        });

        it('should return nothing for a blank word', () => {
            expect(suggestDictionaryEntries('  ', state)).toEqual([]);
        });
    });
});

import { describe, expect, it, vi } from 'vitest';
import type { CompiledCorrections } from '../types/index.js';
import { applyCorrections, applySuffixCorrections, applyWordCorrections } from './corrector.js';

const corrections = (overrides: Partial<CompiledCorrections> = {}): CompiledCorrections => ({
    patterns: [],
    suffixes: [],
    words: new Map(),
    ...overrides,
});

describe('corrector', () => {
    describe('applyWordCorrections', () => {
        it('should replace whole word runs only', () => {
            const words = new Map([['allah', 'allāh']]);
            expect(applyWordCorrections('allah, wallah', words)).toBe('allāh, wallah');
        });

        it('should match case-sensitively', () => {
            const words = new Map([['allah', 'allāh']]);
            expect(applyWordCorrections('Allah', words)).toBe('Allah');
        });

        it('should replace a word with several words', () => {
            const words = new Map([['inšallah', 'in šāʾ allāh']]);
            expect(applyWordCorrections('daba inšallah', words)).toBe('daba in šāʾ allāh');
        });
    });

    describe('applySuffixCorrections', () => {
        const rules = [{ minStemLength: 2, replacement: 'kum', suffix: 'kom' }];

        it('should rewrite the suffix and keep the stem', () => {
            expect(applySuffixCorrections('nšufkom', rules, 'moroccan')).toBe('nšufkum');
        });

        it('should leave words whose stem is too short', () => {
            expect(applySuffixCorrections('kom ykom', rules, 'moroccan')).toBe('kom ykom');
            expect(applySuffixCorrections('mkom', rules, 'moroccan')).toBe('mkom');
            expect(applySuffixCorrections('ʿlikom', rules, 'moroccan')).toBe('ʿlikum');
        });

        it('should use only the first matching rule per word', () => {
            const ordered = [
                { minStemLength: 1, replacement: 'X', suffix: 'om' },
                { minStemLength: 1, replacement: 'Y', suffix: 'kom' },
            ];
            expect(applySuffixCorrections('nšufkom', ordered, 'moroccan')).toBe('nšufkX');
        });

        it('should honor dialect filters', () => {
            const filtered = [{ dialects: new Set(['moroccan']), minStemLength: 1, replacement: 'kum', suffix: 'kom' }];
            expect(applySuffixCorrections('nšufkom', filtered, 'msa')).toBe('nšufkom');
        });
    });

    describe('applyCorrections', () => {
        it('should run article and ta marbuta fixups after the tables', () => {
            const result = applyCorrections(
                [
                    { locked: false, text: 'al' },
                    { locked: false, text: ' ' },
                    { locked: false, text: 'madina_t' },
                    { locked: false, text: ' ' },
                    { locked: false, text: 'kbira' },
                ],
                corrections(),
                { dialect: 'moroccan' },
            );
            expect(result).toBe('al-madinat kbira');
        });

        it('should never rewrite locked segments', () => {
            const result = applyCorrections(
                [
                    { locked: true, text: 'allah' },
                    { locked: false, text: ' ' },
                    { locked: false, text: 'allah' },
                    { locked: false, text: ' ' },
                    { locked: true, text: 'Al' },
                    { locked: false, text: ' ' },
                    { locked: false, text: 'šams' },
                ],
                corrections({
                    patterns: [{ mode: 'cumulative', re: /l/gu, replacement: 'L' }],
                    words: new Map([['allah', 'allāh']]),
                }),
                { dialect: 'moroccan' },
            );
            expect(result).toBe('allah aLLāh Al šams');
        });

        it('should restore placeholder-range characters already present in the text', () => {
            const existing = String.fromCodePoint(0xf0000);
            const result = applyCorrections(
                [
                    { locked: false, text: existing },
                    { locked: true, text: 'ok' },
                ],
                corrections(),
                { dialect: 'moroccan' },
            );
            expect(result).toBe(`${existing}ok`);
        });

        it('should log the corrected text at trace', () => {
            const trace = vi.fn();
            applyCorrections([{ locked: false, text: 'bzaf' }], corrections({ words: new Map([['bzaf', 'bezzāf']]) }), {
                dialect: 'moroccan',
                logger: { trace },
            });
            expect(trace).toHaveBeenCalledWith('Corrections applied', { after: 'bezzāf', before: 'bzaf' });
        });
    });
});

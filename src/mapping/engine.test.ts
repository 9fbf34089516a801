import { describe, expect, it } from 'vitest';
import { loadDefaultTables } from '../config/files.js';
import { applyEmphaticCasing, caseUnit, mapWord, transliterateWord } from './engine.js';

const state = loadDefaultTables({ env: {} });
const moroccan = state.dialects.get('moroccan');
const msa = state.dialects.get('msa');

if (!moroccan || !msa) {
    throw new Error('bundled dialects are missing');
}

describe('engine', () => {
    describe('transliterateWord', () => {
        it('should prefer a digraph over its single letters', () => {
            expect(transliterateWord('shams', moroccan, state.base).text).toBe('šams');
            expect(transliterateWord('khobz', moroccan, state.base).text).toBe('ḫobz');
        });

        it('should map chat digits', () => {
            expect(transliterateWord('mar7aba', moroccan, state.base).text).toBe('marḥaba');
            expect(transliterateWord('3afak', moroccan, state.base).text).toBe('ʿafak');
            expect(transliterateWord('so2al', moroccan, state.base).text).toBe('soʾal');
        });

        it('should read a capital as the emphatic consonant', () => {
            expect(transliterateWord('tin', moroccan, state.base).text).toBe('tin');
            expect(transliterateWord('Tin', moroccan, state.base).text).toBe('ṭin');
            expect(transliterateWord('SbaH', moroccan, state.base).text).toBe('ṣbaḥ');
        });

        it('should map capitals without an emphatic counterpart as lowercase', () => {
            expect(transliterateWord('Mar7aba', moroccan, state.base).text).toBe('marḥaba');
        });

        it('should let a trigraph keep two letters apart', () => {
            expect(transliterateWord("as'hal", moroccan, state.base).text).toBe('ashal');
        });

        it('should case each letter a trigraph keeps apart', () => {
            expect(transliterateWord("S'hab", moroccan, state.base).text).toBe('ṣhab');
            expect(transliterateWord("s'hab", moroccan, state.base).text).toBe('shab');
            expect(transliterateWord("T'Har", moroccan, state.base).text).toBe('ṭḥar');
        });

        it('should read the ta marbuta marker in either case', () => {
            expect(transliterateWord('madina_T', moroccan, state.base)).toEqual({
                source: 'rules',
                text: 'madina_t',
                unmapped: [],
            });
            expect(transliterateWord('Madina_T', moroccan, state.base).text).toBe('madina_t');
        });

        it('should follow the casing the tokenizer recorded', () => {
            expect(transliterateWord('Tin', moroccan, state.base, 'lower').text).toBe('tin');
            expect(transliterateWord('Tin', moroccan, state.base, 'title').text).toBe('ṭin');
        });

        it('should apply dialect overrides before the base tables', () => {
            expect(transliterateWord('mabrouk', moroccan, state.base).text).toBe('mabruk');
            expect(transliterateWord('mabrouk', msa, state.base).text).toBe('mabrouk');
        });

        it('should normalize vowel length after mapping', () => {
            expect(transliterateWord('kitaab', msa, state.base).text).toBe('kitāb');
            expect(transliterateWord('bghiit', msa, state.base).text).toBe('bġīt');
        });

        it('should keep and report characters no table maps', () => {
            const mapped = transliterateWord('pizza1', msa, state.base);
            expect(mapped).toEqual({ source: 'rules', text: 'pizza1', unmapped: ['p', '1'] });
        });

        it('should not report apostrophes and underscores', () => {
            expect(transliterateWord('madina_t', moroccan, state.base).unmapped).toEqual([]);
        });
    });

    describe('applyEmphaticCasing', () => {
        it('should only swap when the source character is uppercase', () => {
            expect(applyEmphaticCasing('d', 'D', state.base.emphatics)).toBe('ḍ');
            expect(applyEmphaticCasing('d', 'd', state.base.emphatics)).toBe('d');
            expect(applyEmphaticCasing('ḏ', 'D', state.base.emphatics)).toBe('ẓ');
            expect(applyEmphaticCasing('m', 'M', state.base.emphatics)).toBe('m');
        });
    });

    describe('caseUnit', () => {
        it('should case letter by letter only when the letter counts line up', () => {
            expect(caseUnit('sh', ['S', "'", 'h'], state.base.emphatics)).toBe('ṣh');
            expect(caseUnit('š', ['S', 'h'], state.base.emphatics)).toBe('š');
            expect(caseUnit('ṯ', ['T', 'h'], state.base.emphatics)).toBe('ṯ');
        });
    });

    describe('mapWord', () => {
        it('should pass foreign words through verbatim', () => {
            expect(mapWord('Facebook', moroccan, state)).toEqual({ source: 'foreign', text: 'Facebook', unmapped: [] });
        });

        it('should look up the dialect dictionary before the shared one', () => {
            expect(mapWord('wach', moroccan, state)).toEqual({ source: 'dictionary', text: 'waš', unmapped: [] });
            expect(mapWord('Salam', moroccan, state).text).toBe('salām');
            expect(mapWord('wach', msa, state).source).toBe('rules');
        });

        it('should use caller fallbacks after the dictionaries', () => {
            const fallbacks = new Map([
                ['pizza', 'piza'],
                ['salam', 'ignored'],
            ]);
            expect(mapWord('Pizza', msa, state, fallbacks)).toEqual({ source: 'fallback', text: 'piza', unmapped: [] });
            expect(mapWord('salam', msa, state, fallbacks).text).toBe('salām');
        });

        it('should pass pure numbers through', () => {
            expect(mapWord('2024', moroccan, state)).toEqual({ source: 'numeric', text: '2024', unmapped: [] });
            expect(mapWord('7', moroccan, state).source).toBe('numeric');
        });

        it('should map digits inside words', () => {
            expect(mapWord('7alek', moroccan, state)).toEqual({ source: 'rules', text: 'ḥalek', unmapped: [] });
        });

        it('should return an empty result for an empty word', () => {
            expect(mapWord('', moroccan, state).text).toBe('');
        });
    });
});

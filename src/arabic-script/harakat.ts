/**
 * Character class matching all Arabic diacritics (Tashkeel/Harakat).
 *
 * Includes the following diacritical marks:
 * - U+064B: ً (fathatan - double fatha)
 * - U+064C: ٌ (dammatan - double damma)
 * - U+064D: ٍ (kasratan - double kasra)
 * - U+064E: َ (fatha - short a)
 * - U+064F: ُ (damma - short u)
 * - U+0650: ِ (kasra - short i)
 * - U+0651: ّ (shadda - gemination)
 * - U+0652: ْ (sukun - no vowel)
 */
const DIACRITICS_CLASS = '[\u064B\u064C\u064D\u064E\u064F\u0650\u0651\u0652]';

const DIACRITICS = new RegExp(DIACRITICS_CLASS, 'gu');

export const SHADDA = '\u0651';

/**
 * Whether a string consists only of Arabic diacritics (a bare haraka).
 */
export const isHaraka = (s: string): boolean => s.length > 0 && s.replace(DIACRITICS, '') === '';

/**
 * Removes every Arabic diacritic, leaving the bare consonantal skeleton.
 *
 * @example
 * stripHarakat('مَرحَبَ') // → 'مرحب'
 */
export const stripHarakat = (text: string): string => text.replace(DIACRITICS, '');

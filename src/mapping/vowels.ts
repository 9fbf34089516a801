import type { MappingTable } from '../types/index.js';

/**
 * Collapses two-letter vowel runs into long vowels (`aa → ā`, `ii → ī`, `uu → ū`).
 *
 * Runs on the output of the consonant/vowel mapping, so vowels produced by a
 * digraph expansion are still eligible. Matching is case-insensitive and
 * left-to-right: `aaa` becomes `āa`. Idempotent for any vowel table that
 * passed load-time validation, since no replacement shares a character with a
 * key.
 *
 * @example
 * normalizeVowelLength('kitaab', vowels) // → 'kitāb'
 * normalizeVowelLength('kitāb', vowels)  // → 'kitāb'
 */
export const normalizeVowelLength = (text: string, vowels: MappingTable): string => {
    if (vowels.entries.size === 0) {
        return text;
    }

    const chars = Array.from(text);
    let result = '';

    for (let i = 0; i < chars.length; i++) {
        if (i + 1 < chars.length) {
            const long = vowels.entries.get(`${chars[i]}${chars[i + 1]}`.toLowerCase());
            if (long !== undefined) {
                result += long;
                i++;
                continue;
            }
        }
        result += chars[i];
    }

    return result;
};

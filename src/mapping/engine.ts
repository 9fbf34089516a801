/**
 * Mapping engine: transliterates a single word token.
 *
 * Stages, first success wins:
 * 1. Foreign-word guard (verbatim, casing preserved)
 * 2. Dictionary (dialect partition, then shared)
 * 3. Caller-supplied fallback results
 * 4. Pure numbers pass through
 * 5. Rules: trigraphs, then digraphs, then single characters (dialect
 *    override before base at every step), then vowel-length normalization
 *
 * Emphatic casing is decided per matched unit from the casing of the unit's
 * first *source* character: `T` yields `ṭ` where `t` yields `t`. A unit whose
 * output keeps several letters (`s'h → sh`) is cased letter by letter against
 * the source letters. Words whose token casing is `lower` or `none` skip the
 * check.
 *
 * @module engine
 */

import { TA_MARBUTA_MARKER } from '../corrections/structural.js';
import { getCasing, isUppercase } from '../tokenizer/tokenize.js';
import type { BaseTables, DialectProfile, EngineState, MappedWord, MappingTable, TokenCasing } from '../types/index.js';
import { normalizeVowelLength } from './vowels.js';

const NUMERIC = /^\p{N}+$/u;
const LETTER_OR_DIGIT = /^[\p{L}\p{N}]$/u;
const LETTER = /^\p{L}$/u;
const NO_EMPHATICS: ReadonlyMap<string, string> = new Map();

type MultigraphMatch = { output: string; length: number };

/**
 * Looks up a key in the dialect table first, then the base table.
 */
const lookup = (key: string, override: MappingTable, base: MappingTable): string | undefined =>
    override.entries.get(key) ?? base.entries.get(key);

/**
 * Tries the longest pattern first (3, then 2 characters) at `index`.
 */
const matchMultigraph = (
    lowered: readonly string[],
    index: number,
    profile: DialectProfile,
    base: BaseTables,
): MultigraphMatch | null => {
    const candidates: [number, MappingTable, MappingTable][] = [
        [3, profile.overrides.trigraphs, base.trigraphs],
        [2, profile.overrides.digraphs, base.digraphs],
    ];

    for (const [length, override, fallback] of candidates) {
        if (index + length > lowered.length) {
            continue;
        }
        const output = lookup(lowered.slice(index, index + length).join(''), override, fallback);
        if (output !== undefined) {
            return { length, output };
        }
    }

    return null;
};

/**
 * Swaps a plain consonant for its emphatic counterpart when the source
 * character that opened the unit is uppercase.
 */
export const applyEmphaticCasing = (
    output: string,
    sourceChar: string,
    emphatics: ReadonlyMap<string, string>,
): string => (isUppercase(sourceChar) ? (emphatics.get(output) ?? output) : output);

/**
 * Cases one matched unit. When the output has as many letters as the source
 * span (`S'h → sh`), each output letter follows its own source letter;
 * otherwise the first source character decides for the whole unit.
 *
 * @example
 * caseUnit('sh', ['S', "'", 'h'], emphatics) // → 'ṣh'
 * caseUnit('š', ['S', 'h'], emphatics)       // → 'š'
 */
export const caseUnit = (output: string, source: readonly string[], emphatics: ReadonlyMap<string, string>): string => {
    const letters = Array.from(output);
    const sourceLetters = source.filter((ch) => LETTER.test(ch));
    if (letters.length > 1 && letters.length === sourceLetters.length) {
        return letters.map((letter, k) => applyEmphaticCasing(letter, sourceLetters[k], emphatics)).join('');
    }
    return applyEmphaticCasing(output, source[0], emphatics);
};

const isMarkerAt = (lowered: readonly string[], index: number) =>
    index + TA_MARBUTA_MARKER.length === lowered.length && lowered.slice(index).join('') === TA_MARBUTA_MARKER;

/**
 * Rule-based transliteration of one word (stages 5 and the casing rule).
 *
 * Characters no table maps are kept verbatim; letters and digits among them
 * are reported in `unmapped`. The tāʾ marbūṭa marker at the end of a word is
 * read in either case (`_T` is `_t`).
 *
 * @param casing - Casing of the whole word, as the tokenizer recorded it
 *
 * @example
 * transliterateWord('shams', profile, state.base).text // → 'šams'
 * transliterateWord('Tin', profile, state.base).text   // → 'ṭin'
 */
export const transliterateWord = (
    word: string,
    profile: DialectProfile,
    base: BaseTables,
    casing: TokenCasing = getCasing(word),
): MappedWord => {
    const chars = Array.from(word);
    const lowered = chars.map((ch) => ch.toLowerCase());
    const emphatics = casing === 'lower' || casing === 'none' ? NO_EMPHATICS : base.emphatics;
    const unmapped: string[] = [];
    let output = '';
    let i = 0;

    while (i < chars.length) {
        if (isMarkerAt(lowered, i)) {
            output += TA_MARBUTA_MARKER;
            break;
        }

        const multigraph = matchMultigraph(lowered, i, profile, base);
        if (multigraph) {
            output += caseUnit(multigraph.output, chars.slice(i, i + multigraph.length), emphatics);
            i += multigraph.length;
            continue;
        }

        const single = lookup(lowered[i], profile.overrides.single, base.single);
        if (single !== undefined) {
            output += applyEmphaticCasing(single, chars[i], emphatics);
        } else {
            output += chars[i];
            if (LETTER_OR_DIGIT.test(chars[i])) {
                unmapped.push(chars[i]);
            }
        }
        i++;
    }

    return { source: 'rules', text: normalizeVowelLength(output, base.vowels), unmapped };
};

/**
 * Transliterates a single word token through every stage.
 *
 * @param fallbacks - Lowercase word → result from an external resolver
 * @param casing - Token casing; derived from `word` when left out
 *
 * @example
 * mapWord('Facebook', profile, state)  // → { source: 'foreign', text: 'Facebook', unmapped: [] }
 * mapWord('Salam', profile, state)     // → { source: 'dictionary', text: 'salām', unmapped: [] }
 * mapWord('mar7aba', profile, state)   // → { source: 'rules', text: 'marḥaba', unmapped: [] }
 */
export const mapWord = (
    word: string,
    profile: DialectProfile,
    state: EngineState,
    fallbacks?: ReadonlyMap<string, string>,
    casing?: TokenCasing,
): MappedWord => {
    if (!word) {
        return { source: 'rules', text: '', unmapped: [] };
    }

    const lower = word.toLowerCase();
    if (state.foreignWords.has(lower)) {
        return { source: 'foreign', text: word, unmapped: [] };
    }

    const entry = profile.dictionary.get(lower) ?? state.dictionary.get(lower);
    if (entry !== undefined) {
        return { source: 'dictionary', text: entry, unmapped: [] };
    }

    const fallback = fallbacks?.get(lower);
    if (fallback !== undefined) {
        return { source: 'fallback', text: fallback, unmapped: [] };
    }

    if (NUMERIC.test(word)) {
        return { source: 'numeric', text: word, unmapped: [] };
    }

    return transliterateWord(word, profile, state.base, casing);
};

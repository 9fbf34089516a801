/**
 * Structural fixups run after all table-driven corrections.
 *
 * - Definite article: `al shams`, `al - shams`, `alshams`, `Al-shams` → `al-šams`
 * - Tāʾ marbūṭa: the chat marker `_t` → `a` at the end of an utterance or
 *   before punctuation, `at` before another word (construct state)
 *
 * Both rules are adjacency heuristics over the transliterated string; there is
 * no syntactic parse.
 *
 * @module structural
 */

/** Characters that continue a word, including locked-word placeholders (private use) */
const WORD = String.raw`[\p{L}\p{M}\p{N}\p{Co}_']`;

/** Transliterated consonants that can follow an attached article (`l` excluded: `allāh`) */
const CONSONANTS = 'bcdfghjkmnpqrstvwxyzçḍḏġḥḫṣšṭṯẓǧʿʾ';

export const ARTICLE = 'al-';
export const TA_MARBUTA_MARKER = '_t';

const SEPARATED_ARTICLE = new RegExp(String.raw`(?<!${WORD})al(?:[ \t]*-[ \t]*|[ \t]+)(?=\p{L})`, 'giu');
const ATTACHED_ARTICLE = new RegExp(String.raw`(?<!${WORD})al(?=[${CONSONANTS}][\p{L}\p{M}]{2,})`, 'giu');
const WORD_ARTICLE = new RegExp(String.raw`^al(?=[${CONSONANTS}][\p{L}\p{M}]{2,})`, 'iu');

const TA_MARBUTA_CONSTRUCT = new RegExp(String.raw`(?<=[\p{L}\p{M}])a?_t(?=[ \t]+${WORD})`, 'gu');
const TA_MARBUTA_PAUSAL = new RegExp(String.raw`(?<=[\p{L}\p{M}])a?_t(?!${WORD})`, 'gu');

/**
 * Rewrites every form of the definite article as the lowercase prefix `al-`.
 *
 * A standalone `al` joins the following word whatever separated them (spaces,
 * a hyphen, or both). An attached `al` is split off only when a consonant
 * other than `l` and at least two more letters follow, so `alf` and `allāh`
 * stay whole.
 *
 * @example
 * normalizeDefiniteArticle('al šams')  // → 'al-šams'
 * normalizeDefiniteArticle('alšams')   // → 'al-šams'
 * normalizeDefiniteArticle('Al - šams') // → 'al-šams'
 */
export const normalizeDefiniteArticle = (text: string): string =>
    text.replace(SEPARATED_ARTICLE, ARTICLE).replace(ATTACHED_ARTICLE, ARTICLE);

/**
 * Splits an attached article off a single transliterated word.
 *
 * @returns the word without its article, or `null` when it has none
 *
 * @example
 * splitAttachedArticle('alšams') // → 'šams'
 * splitAttachedArticle('alf')    // → null
 */
export const splitAttachedArticle = (word: string): string | null =>
    WORD_ARTICLE.test(word) ? word.slice(2) : null;

/**
 * Resolves the tāʾ marbūṭa marker by what follows it.
 *
 * An `a` right before the marker belongs to it (`madina_t` → `madina`).
 *
 * @example
 * resolveTaMarbuta('madina_t')         // → 'madina'
 * resolveTaMarbuta('madina_t kbira')   // → 'madinat kbira'
 * resolveTaMarbuta('madina_t, kbira')  // → 'madina, kbira'
 */
export const resolveTaMarbuta = (text: string): string => {
    if (!text.includes(TA_MARBUTA_MARKER)) {
        return text;
    }
    return text.replace(TA_MARBUTA_CONSTRUCT, 'at').replace(TA_MARBUTA_PAUSAL, 'a');
};

/**
 * Experimental Arabic-script approximation.
 *
 * Rewrites the per-token Arabica output into Arabic script with a separate,
 * smaller table. Low confidence by nature: short vowels are guessed from the
 * Latin vowels, no correction layer runs, and a word containing anything the
 * table cannot map is left in Latin script.
 *
 * Never throws: an internal failure yields `null`.
 *
 * @module approximate
 */

import { ARTICLE, splitAttachedArticle, TA_MARBUTA_MARKER } from '../corrections/structural.js';
import type { ArabicScriptOptions, ArabicScriptTable, Logger, MappedWord, Token } from '../types/index.js';
import { isHaraka, SHADDA, stripHarakat } from './harakat.js';

const ARABIC_ARTICLE = 'ال';
const TA_MARBUTA = 'ة';
const LETTER_OR_DIGIT = /^[\p{L}\p{N}]$/u;
const ARTICLE_SEPARATOR = /^[ \t]+$|^-$/;

/**
 * A token paired with its mapping-engine output (word tokens only).
 */
export type ApproximationItem = {
    token: Token;
    mapped?: MappedWord;
};

/**
 * Converts the letters of one bare word, longest key first.
 *
 * A doubled consonant is written once with a shadda.
 *
 * @returns the Arabic-script word, or `null` when a letter or digit has no mapping
 */
export const convertLetters = (word: string, table: ArabicScriptTable): string | null => {
    let body = word;
    let taMarbuta = false;
    if (body.endsWith(TA_MARBUTA_MARKER)) {
        body = body.slice(0, -TA_MARBUTA_MARKER.length);
        body = body.endsWith('a') ? body.slice(0, -1) : body;
        taMarbuta = true;
    }

    const chars = Array.from(body);
    let result = '';
    let i = 0;
    let previousKey: string | null = null;

    const initial = chars.length > 1 ? table.initialVowels.get(chars[0]) : undefined;
    if (initial !== undefined) {
        result += initial;
        i = 1;
    }

    while (i < chars.length) {
        let matched = false;
        for (let length = Math.min(table.maxKeyLength, chars.length - i); length > 0; length--) {
            const key = chars.slice(i, i + length).join('');
            const value = table.letters.get(key);
            if (value === undefined) {
                continue;
            }
            result += key === previousKey && !isHaraka(value) ? SHADDA : value;
            previousKey = key;
            i += length;
            matched = true;
            break;
        }

        if (!matched) {
            const ch = chars[i];
            if (LETTER_OR_DIGIT.test(ch)) {
                return null;
            }
            result += ch;
            previousKey = null;
            i++;
        }
    }

    return taMarbuta ? result + TA_MARBUTA : result;
};

/**
 * Converts one transliterated word or phrase (dictionary entries may hold
 * several words), handling `al-` and attached articles.
 */
export const convertPhrase = (phrase: string, table: ArabicScriptTable): string | null => {
    const pieces = phrase.toLowerCase().split(/(\s+)/u);
    const converted: string[] = [];

    for (const piece of pieces) {
        if (!piece || /^\s+$/u.test(piece)) {
            converted.push(piece);
            continue;
        }

        let prefix = '';
        let rest = piece;
        if (rest.startsWith(ARTICLE)) {
            prefix = ARABIC_ARTICLE;
            rest = rest.slice(ARTICLE.length);
        } else {
            const withoutArticle = splitAttachedArticle(rest);
            if (withoutArticle !== null) {
                prefix = ARABIC_ARTICLE;
                rest = withoutArticle;
            }
        }

        const letters = convertLetters(rest, table);
        if (letters === null) {
            return null;
        }
        converted.push(prefix + letters);
    }

    return converted.join('');
};

const keepsLatin = (mapped?: MappedWord) => !mapped || mapped.source === 'foreign' || mapped.source === 'numeric';

/**
 * Index of the word a standalone `al` attaches to, or -1.
 */
const findArticleTarget = (items: readonly ApproximationItem[], index: number): number => {
    let j = index + 1;
    while (j < items.length && items[j].token.type !== 'word' && ARTICLE_SEPARATOR.test(items[j].token.text)) {
        j++;
    }
    return j > index + 1 && items[j]?.token.type === 'word' ? j : -1;
};

const approximateTokens = (items: readonly ApproximationItem[], table: ArabicScriptTable, logger?: Logger) => {
    const parts: string[] = [];
    const partial: string[] = [];

    for (let i = 0; i < items.length; i++) {
        const { mapped, token } = items[i];

        if (token.type === 'whitespace') {
            parts.push(token.text);
            continue;
        }
        if (token.type === 'punctuation') {
            parts.push(table.punctuation.get(token.text) ?? token.text);
            continue;
        }
        if (!mapped || keepsLatin(mapped)) {
            parts.push(token.text);
            continue;
        }

        // A word left in Latin script keeps its separator from the article
        if (mapped.text.toLowerCase() === 'al') {
            const target = findArticleTarget(items, i);
            if (target !== -1) {
                parts.push(ARABIC_ARTICLE);
                if (!keepsLatin(items[target].mapped)) {
                    i = target - 1;
                }
                continue;
            }
        }

        const converted = convertPhrase(mapped.text, table);
        if (converted === null) {
            partial.push(token.text);
            parts.push(token.text);
        } else {
            parts.push(converted);
        }
    }

    if (partial.length > 0) {
        logger?.debug?.('Arabic-script approximation left words in Latin script', partial);
    }

    return parts.join('');
};

/**
 * Builds the Arabic-script approximation of a token stream.
 *
 * @returns the approximation (possibly partial), or `null` on internal failure
 *
 * @example
 * approximateArabicScript(items, table)                        // → 'مَرحَبَ، كَيف حَلِك؟'
 * approximateArabicScript(items, table, { vocalized: false })  // → 'مرحب، كيف حلك؟'
 */
export const approximateArabicScript = (
    items: readonly ApproximationItem[],
    table: ArabicScriptTable,
    options: ArabicScriptOptions = {},
    logger?: Logger,
): string | null => {
    try {
        const text = approximateTokens(items, table, logger);
        return options.vocalized === false ? stripHarakat(text) : text;
    } catch (error) {
        logger?.warn?.('Arabic-script approximation failed', error);
        return null;
    }
};

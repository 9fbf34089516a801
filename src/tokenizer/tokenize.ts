/**
 * Splits raw chat input into word, whitespace and punctuation tokens.
 *
 * Word tokens are maximal runs of letters, combining marks, digits, the
 * apostrophe and the underscore (the latter two mark morpheme boundaries in
 * chat writing, e.g. `s'hab`, `madina_t`). Whitespace runs form one token.
 * Every other code point (punctuation, symbols, emoji) is its own token.
 *
 * @module tokenize
 */

import type { Token, TokenCasing, TokenType } from '../types/index.js';

const WORD_CHAR = /^[\p{L}\p{M}\p{N}'_]$/u;
const WHITESPACE_CHAR = /^\s$/u;

const classify = (ch: string): TokenType => {
    if (WORD_CHAR.test(ch)) {
        return 'word';
    }
    return WHITESPACE_CHAR.test(ch) ? 'whitespace' : 'punctuation';
};

/**
 * Whether a single character is an uppercase cased letter.
 *
 * Uncased characters (digits, Arabic letters, `ʿ`) are never uppercase.
 */
export const isUppercase = (ch: string): boolean => ch !== ch.toLowerCase() && ch === ch.toUpperCase();

const isCased = (ch: string): boolean => ch.toLowerCase() !== ch.toUpperCase();

/**
 * Classifies the casing pattern of a span.
 *
 * @example
 * getCasing('salam') // → 'lower'
 * getCasing('Salam') // → 'title'
 * getCasing('SbaH')  // → 'mixed'
 * getCasing('7')     // → 'none'
 */
export const getCasing = (text: string): TokenCasing => {
    const letters = Array.from(text).filter(isCased);
    if (letters.length === 0) {
        return 'none';
    }

    const upper = letters.filter(isUppercase).length;
    if (upper === 0) {
        return 'lower';
    }
    if (upper === letters.length && letters.length > 1) {
        return 'upper';
    }
    if (upper === 1 && isUppercase(letters[0])) {
        return 'title';
    }
    return 'mixed';
};

const makeToken = (type: TokenType, text: string, start: number): Token => ({
    casing: type === 'word' ? getCasing(text) : 'none',
    end: start + text.length,
    start,
    text,
    type,
});

/**
 * Tokenizes input text.
 *
 * Never fails: any input, including the empty string, produces a valid
 * (possibly empty) token list whose texts concatenate back to the input.
 *
 * @example
 * tokenize('mar7aba, kayf?').map((t) => t.text);
 * // → ['mar7aba', ',', ' ', 'kayf', '?']
 */
export const tokenize = (text: string): Token[] => {
    const tokens: Token[] = [];
    let current: { type: TokenType; text: string; start: number } | null = null;
    let offset = 0;

    for (const ch of text) {
        const type = classify(ch);
        if (current && current.type === type && type !== 'punctuation') {
            current.text += ch;
        } else {
            if (current) {
                tokens.push(makeToken(current.type, current.text, current.start));
            }
            current = { start: offset, text: ch, type };
        }
        offset += ch.length;
    }

    if (current) {
        tokens.push(makeToken(current.type, current.text, current.start));
    }

    return tokens;
};

/**
 * Reassembles tokens into a string.
 */
export const detokenize = (tokens: readonly Pick<Token, 'text'>[]): string => tokens.map((t) => t.text).join('');

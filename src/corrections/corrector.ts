/**
 * Correction layer: fixes the assembled transliteration after word-by-word
 * mapping, where cross-token and systematic errors become visible.
 *
 * Order:
 * 1. Word corrections (exact, case-sensitive, per word run)
 * 2. Pattern corrections (ordered regex chain over the whole string)
 * 3. Suffix corrections (per word run, stem preserved)
 * 4. Definite-article normalization
 * 5. Tāʾ marbūṭa resolution
 *
 * Locked segments (foreign words) are swapped for private-use placeholders
 * while the stages run, so no rule can rewrite them, and restored at the end.
 *
 * @module corrector
 */

import type { CompiledCorrections, CompiledSuffixRule, Logger } from '../types/index.js';
import { applyPatternRules } from './patterns.js';
import { normalizeDefiniteArticle, resolveTaMarbuta } from './structural.js';

/**
 * A piece of mapped output. Locked pieces are emitted exactly as given.
 */
export type CorrectionSegment = {
    text: string;
    locked: boolean;
};

export type CorrectionContext = {
    dialect: string;
    logger?: Logger;
};

const WORD_RUN = /[\p{L}\p{M}\p{N}_']+/gu;
const PLACEHOLDER = /[\u{F0000}-\u{FFFFD}]/gu;
const PLACEHOLDER_FIRST = 0xf0000;
const PLACEHOLDER_LAST = 0xffffd;

type LockedText = { text: string; restore: (text: string) => string };

/**
 * Joins segments, replacing each distinct locked text with a placeholder code
 * point that does not already occur in the unlocked text.
 */
const lockSegments = (segments: readonly CorrectionSegment[], logger?: Logger): LockedText => {
    const used = new Set<number>();
    for (const segment of segments) {
        if (!segment.locked) {
            for (const [ch] of segment.text.matchAll(PLACEHOLDER)) {
                used.add(ch.codePointAt(0) ?? 0);
            }
        }
    }

    const placeholderByText = new Map<string, string>();
    const textByPlaceholder = new Map<string, string>();
    let next = PLACEHOLDER_FIRST;

    const placeholderFor = (text: string): string | null => {
        const existing = placeholderByText.get(text);
        if (existing) {
            return existing;
        }
        while (used.has(next)) {
            next++;
        }
        if (next > PLACEHOLDER_LAST) {
            return null;
        }
        const placeholder = String.fromCodePoint(next++);
        placeholderByText.set(text, placeholder);
        textByPlaceholder.set(placeholder, text);
        return placeholder;
    };

    const text = segments
        .map((segment) => {
            if (!segment.locked) {
                return segment.text;
            }
            const placeholder = placeholderFor(segment.text);
            if (placeholder === null) {
                logger?.debug?.('No placeholder left, locked segment is exposed to corrections', segment.text);
                return segment.text;
            }
            return placeholder;
        })
        .join('');

    return {
        restore: (corrected) =>
            textByPlaceholder.size === 0
                ? corrected
                : corrected.replace(PLACEHOLDER, (ch) => textByPlaceholder.get(ch) ?? ch),
        text,
    };
};

/**
 * Replaces a word run whose exact text has a correction.
 */
export const applyWordCorrections = (text: string, words: ReadonlyMap<string, string>): string =>
    words.size === 0 ? text : text.replace(WORD_RUN, (run) => words.get(run) ?? run);

const suffixApplies = (run: string, rule: CompiledSuffixRule, dialect: string) =>
    (!rule.dialects || rule.dialects.has(dialect)) &&
    run.endsWith(rule.suffix) &&
    Array.from(run).length - Array.from(rule.suffix).length >= rule.minStemLength;

/**
 * Rewrites the suffix of each word run with the first rule that matches.
 *
 * @example
 * applySuffixCorrections('nšufkom', [{ minStemLength: 2, replacement: 'kum', suffix: 'kom' }], 'moroccan');
 * // → 'nšufkum'
 */
export const applySuffixCorrections = (
    text: string,
    rules: readonly CompiledSuffixRule[],
    dialect: string,
): string => {
    if (rules.length === 0) {
        return text;
    }
    return text.replace(WORD_RUN, (run) => {
        const rule = rules.find((r) => suffixApplies(run, r, dialect));
        return rule ? run.slice(0, run.length - rule.suffix.length) + rule.replacement : run;
    });
};

/**
 * Runs the full correction layer and returns the final transliteration.
 *
 * The output is final: casing rules are not re-run on it.
 */
export const applyCorrections = (
    segments: readonly CorrectionSegment[],
    corrections: CompiledCorrections,
    { dialect, logger }: CorrectionContext,
): string => {
    const locked = lockSegments(segments, logger);

    let text = applyWordCorrections(locked.text, corrections.words);
    text = applyPatternRules(text, corrections.patterns, dialect);
    text = applySuffixCorrections(text, corrections.suffixes, dialect);
    text = normalizeDefiniteArticle(text);
    text = resolveTaMarbuta(text);

    logger?.trace?.('Corrections applied', { after: text, before: locked.text });

    return locked.restore(text);
};

import { convert } from './convert.js';
import type { ConversionResult, ConvertOptions, EngineState } from './types/index.js';

/**
 * External collaborator (a language model, a lookup service, a human) that
 * transliterates a word the engine could not map.
 *
 * @param word - The word as written in the input
 * @param context - The whole input text
 */
export type UnknownWordResolver = (word: string, context?: string) => string | Promise<string>;

export type FallbackOptions = Omit<ConvertOptions, 'fallbacks'>;

/**
 * Converts, asks `resolver` about every unknown word, then converts again with
 * the answers spliced in before the correction layer.
 *
 * Words are resolved concurrently. A resolver that throws, rejects or answers
 * with an empty string leaves the engine's own output for that word.
 *
 * @example
 * const resolver = async (word: string) => (word === 'flan' ? 'flān' : word);
 * await convertWithFallback('flan 9', 'moroccan', state, resolver);
 */
export const convertWithFallback = async (
    text: string,
    dialect: string,
    state: EngineState,
    resolver: UnknownWordResolver,
    options: FallbackOptions = {},
): Promise<ConversionResult> => {
    const { logger } = options;
    const first = convert(text, dialect, state, options);
    if (first.unknownWords.length === 0) {
        return first;
    }

    const outcomes = await Promise.allSettled(
        first.unknownWords.map(async (word) => ({ result: await resolver(word, text), word })),
    );

    const fallbacks = new Map<string, string>();
    outcomes.forEach((outcome, index) => {
        const word = first.unknownWords[index];
        if (outcome.status === 'rejected') {
            logger?.warn?.(`Resolver failed for "${word}"`, outcome.reason);
        } else if (!outcome.value.result) {
            logger?.debug?.(`Resolver had no answer for "${word}"`);
        } else {
            fallbacks.set(word, outcome.value.result);
        }
    });

    if (fallbacks.size === 0) {
        return first;
    }

    logger?.debug?.('Resolved unknown words', Object.fromEntries(fallbacks));
    return convert(text, dialect, state, { ...options, fallbacks });
};

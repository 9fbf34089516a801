import { resolveDialect } from '../convert.js';
import type { ConvertOptions, EngineState, Logger } from '../types/index.js';

export type SuggestOptions = {
    /** Dialect whose own entries are searched alongside the shared dictionary (default: the state's default) */
    dialect?: string;
    /**
     * What to do with an unknown `dialect`, as in `convert()`.
     *
     * @default 'throw'
     */
    onUnknownDialect?: ConvertOptions['onUnknownDialect'];
    logger?: Logger;
    /**
     * Minimum score (0-100).
     *
     * @default 85
     */
    threshold?: number;
    /** @default 5 */
    limit?: number;
};

export type DictionarySuggestion = {
    key: string;
    value: string;
    /** Similarity in 0-100 */
    score: number;
};

/**
 * Length of the longest common subsequence of two code-point arrays.
 */
const lcsLength = (a: readonly string[], b: readonly string[]) => {
    let previous = new Array<number>(b.length + 1).fill(0);
    for (const ch of a) {
        const current = [0];
        for (let j = 0; j < b.length; j++) {
            current.push(ch === b[j] ? previous[j] + 1 : Math.max(previous[j + 1], current[j]));
        }
        previous = current;
    }
    return previous[b.length];
};

/**
 * Normalized indel similarity: `100 × 2·LCS / (|a| + |b|)`.
 *
 * @example
 * similarity('slam', 'salam') // → 88.88…
 * similarity('', '')          // → 100
 */
export const similarity = (a: string, b: string): number => {
    const left = Array.from(a);
    const right = Array.from(b);
    const total = left.length + right.length;
    return total === 0 ? 100 : (200 * lcsLength(left, right)) / total;
};

/**
 * Finds dictionary entries whose key is close to `word`, best first.
 *
 * Meant for tooling around the engine (spell hints, dictionary curation);
 * `convert()` never uses approximate matches.
 *
 * @throws UnknownDialectError for an unknown `dialect` under the `'throw'` policy
 *
 * @example
 * suggestDictionaryEntries('slam', state);
 * // → [{ key: 'salam', score: 88.88…, value: 'salām' }]
 */
export const suggestDictionaryEntries = (
    word: string,
    state: EngineState,
    options: SuggestOptions = {},
): DictionarySuggestion[] => {
    const { limit = 5, threshold = 85 } = options;
    const needle = word.trim().toLowerCase();
    if (!needle || limit <= 0) {
        return [];
    }

    const profile = resolveDialect(
        options.dialect ?? state.defaultDialect,
        state,
        options.onUnknownDialect,
        options.logger,
    );
    const entries = new Map(state.dictionary);
    for (const [key, value] of profile.dictionary) {
        entries.set(key, value);
    }

    return [...entries]
        .map(([key, value]) => ({ key, score: similarity(needle, key), value }))
        .filter(({ score }) => score >= threshold)
        .sort((a, b) => b.score - a.score || a.key.localeCompare(b.key))
        .slice(0, limit);
};

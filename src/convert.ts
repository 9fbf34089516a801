import { approximateArabicScript, type ApproximationItem } from './arabic-script/approximate.js';
import { applyCorrections, type CorrectionSegment } from './corrections/corrector.js';
import { UnknownDialectError } from './errors.js';
import { mapWord } from './mapping/engine.js';
import { tokenize } from './tokenizer/tokenize.js';
import type { ConversionResult, ConvertOptions, DialectProfile, EngineState, Logger } from './types/index.js';

type Fallbacks = NonNullable<ConvertOptions['fallbacks']>;

const isMap = (fallbacks: Fallbacks): fallbacks is ReadonlyMap<string, string> => fallbacks instanceof Map;

/**
 * Keys fallbacks by lowercase word, first spelling wins.
 */
const normalizeFallbacks = (fallbacks?: Fallbacks): ReadonlyMap<string, string> | undefined => {
    if (!fallbacks) {
        return undefined;
    }
    const pairs = isMap(fallbacks) ? [...fallbacks.entries()] : Object.entries(fallbacks);
    const normalized = new Map<string, string>();
    for (const [word, result] of pairs) {
        const key = word.toLowerCase();
        if (!normalized.has(key)) {
            normalized.set(key, result);
        }
    }
    return normalized;
};

/**
 * Finds the profile for `dialect`, applying the unknown-dialect policy.
 *
 * @throws UnknownDialectError under the `'throw'` policy
 */
export const resolveDialect = (
    dialect: string,
    state: EngineState,
    onUnknownDialect: ConvertOptions['onUnknownDialect'] = 'throw',
    logger?: Logger,
): DialectProfile => {
    const profile = state.dialects.get(dialect);
    if (profile) {
        return profile;
    }

    const available = [...state.dialects.keys()];
    const fallback = onUnknownDialect === 'default' ? state.dialects.get(state.defaultDialect) : undefined;
    if (!fallback) {
        throw new UnknownDialectError(dialect, available);
    }

    logger?.warn?.(`Unknown dialect "${dialect}", using "${fallback.name}"`, { available });
    return fallback;
};

/**
 * Lists the loaded dialect profiles, default first.
 */
export const listDialects = (state: EngineState): { name: string; label: string }[] =>
    [...state.dialects.values()]
        .sort((a, b) => Number(b.name === state.defaultDialect) - Number(a.name === state.defaultDialect))
        .map(({ label, name }) => ({ label, name }));

/**
 * Converts Arabizi text into Arabica for one dialect.
 *
 * The text is tokenized, each word mapped on its own (foreign-word guard,
 * dictionaries, caller fallbacks, then the rule tables), and the correction
 * layer runs over the reassembled string. Whitespace and punctuation come
 * through untouched. Nothing in this path throws except an unknown dialect.
 *
 * @param dialect - Name of a loaded dialect profile
 * @param state - Tables from `loadTables()`, shared across calls
 *
 * @example
 * const { result, unknownWords } = convert('mar7aba, kayf 7alek?', 'moroccan', state);
 * // result → 'marḥaba, kayf ḥalek?'
 * // unknownWords → []
 */
export const convert = (
    text: string,
    dialect: string,
    state: EngineState,
    options: ConvertOptions = {},
): ConversionResult => {
    const { logger } = options;
    const profile = resolveDialect(dialect, state, options.onUnknownDialect, logger);
    const fallbacks = normalizeFallbacks(options.fallbacks);

    const items: ApproximationItem[] = [];
    const segments: CorrectionSegment[] = [];
    const unknownWords = new Map<string, string>();

    for (const token of tokenize(text)) {
        if (token.type !== 'word') {
            items.push({ token });
            segments.push({ locked: false, text: token.text });
            continue;
        }

        const mapped = mapWord(token.text, profile, state, fallbacks, token.casing);
        logger?.trace?.('Mapped word', { output: mapped.text, source: mapped.source, word: token.text });

        if (mapped.source === 'rules' && mapped.unmapped.length > 0) {
            const key = token.text.toLowerCase();
            if (!unknownWords.has(key)) {
                unknownWords.set(key, token.text);
            }
        }

        items.push({ mapped, token });
        segments.push({ locked: mapped.source === 'foreign', text: mapped.text });
    }

    const result = applyCorrections(segments, state.corrections, { dialect: profile.name, logger });

    const scriptOption = options.arabicScript ?? true;
    const arabicScript =
        scriptOption === false || !state.arabicScript
            ? null
            : approximateArabicScript(items, state.arabicScript, scriptOption === true ? {} : scriptOption, logger);

    return { arabicScript, result, unknownWords: [...unknownWords.values()] };
};

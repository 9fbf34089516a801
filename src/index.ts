/**
 * arabizi-arabica - Converts Moroccan Arabizi (chat alphabet) into the
 * Arabica academic transliteration.
 *
 * Tables are validated once into an immutable engine state; every conversion
 * tokenizes the input, maps each word (foreign-word guard, dictionaries, rule
 * tables with dialect overrides, emphatic capitals) and runs a correction
 * layer over the result. An experimental Arabic-script approximation is
 * produced alongside.
 *
 * @packageDocumentation
 *
 * @example
 * import { convert, loadDefaultTables } from 'arabizi-arabica';
 *
 * const state = loadDefaultTables();
 * const { result, arabicScript } = convert('mar7aba, kayf 7alek?', 'moroccan', state);
 * // result       → 'marḥaba, kayf ḥalek?'
 * // arabicScript → 'مَرحَبَ، كَيف حَلِك؟'
 */

// ─────────────────────────────────────────────────────────────
// Conversion
// ─────────────────────────────────────────────────────────────

export { convert, listDialects, resolveDialect } from './convert.js';
export type { FallbackOptions, UnknownWordResolver } from './fallback.js';
export { convertWithFallback } from './fallback.js';

// ─────────────────────────────────────────────────────────────
// Configuration
// ─────────────────────────────────────────────────────────────

export type { LoadDefaultOptions } from './config/files.js';
export {
    CONFIG_DIR_ENV,
    findRepeatedKeys,
    loadDefaultTables,
    readConfigDirectory,
    resolveConfigDirectory,
} from './config/files.js';
export type { ConfigValidation } from './config/load.js';
export { loadTables, validateConfig } from './config/load.js';
export type { DialectConfig, EngineConfig, PatternRuleConfig, SuffixRuleConfig, TableInput } from './config/schemas.js';
export { EngineConfigSchema } from './config/schemas.js';
export { ConfigError, formatConfigIssues, UnknownDialectError } from './errors.js';

// ─────────────────────────────────────────────────────────────
// Building blocks
// ─────────────────────────────────────────────────────────────

export type { ApproximationItem } from './arabic-script/approximate.js';
export { approximateArabicScript } from './arabic-script/approximate.js';
export { stripHarakat } from './arabic-script/harakat.js';
export type { CorrectionSegment } from './corrections/corrector.js';
export { applyCorrections } from './corrections/corrector.js';
export { normalizeDefiniteArticle, resolveTaMarbuta } from './corrections/structural.js';
export type { DictionarySuggestion, SuggestOptions } from './dictionary/suggest.js';
export { similarity, suggestDictionaryEntries } from './dictionary/suggest.js';
export { mapWord, transliterateWord } from './mapping/engine.js';
export { normalizeVowelLength } from './mapping/vowels.js';
export { detokenize, tokenize } from './tokenizer/tokenize.js';

// Type definitions
export type {
    ArabicScriptOptions,
    ArabicScriptTable,
    BaseTables,
    CompiledCorrections,
    CompiledPatternRule,
    CompiledSuffixRule,
    ConfigIssue,
    ConfigIssueSeverity,
    ConfigIssueType,
    ConversionResult,
    ConvertOptions,
    DialectProfile,
    EngineState,
    LoadOptions,
    Logger,
    MappedWord,
    MappedWordSource,
    MappingOverrides,
    MappingTable,
    PatternRuleMode,
    Token,
    TokenCasing,
    TokenType,
} from './types/index.js';

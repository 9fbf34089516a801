/**
 * Kind of span produced by the tokenizer.
 */
export type TokenType = 'word' | 'whitespace' | 'punctuation';

/**
 * Casing pattern of a token's letters.
 *
 * - `lower`: at least one letter, none uppercase (`salam`)
 * - `upper`: at least two letters, all uppercase (`SALAM`)
 * - `title`: only the first letter is uppercase (`Salam`, `T`)
 * - `mixed`: any other combination (`SbaH`)
 * - `none`: no cased letters at all (`7`, `,`, ` `)
 */
export type TokenCasing = 'lower' | 'upper' | 'title' | 'mixed' | 'none';

/**
 * A contiguous span of the input.
 *
 * Concatenating the `text` of every token returned by `tokenize()`
 * reproduces the input exactly.
 *
 * @example
 * { type: 'word', text: 'Sa7bi', start: 0, end: 5, casing: 'title' }
 */
export type Token = {
    type: TokenType;
    /** Original text of the span, untouched */
    text: string;
    /** Offset of the first UTF-16 code unit in the input */
    start: number;
    /** Offset one past the last UTF-16 code unit in the input */
    end: number;
    /** The mapping engine skips the emphatic check for `lower` and `none` words */
    casing: TokenCasing;
};

/**
 * Ordered `pattern → replacement` pairs of one arity.
 *
 * Keys are lowercase and exactly `arity` code points long; insertion order is
 * the order the pairs were declared in.
 */
export type MappingTable = {
    readonly arity: number;
    readonly entries: ReadonlyMap<string, string>;
};

/**
 * Override tables a dialect layers over the base tables.
 */
export type MappingOverrides = {
    readonly single: MappingTable;
    readonly digraphs: MappingTable;
    readonly trigraphs: MappingTable;
};

/**
 * The active set of overrides and dictionary entries for one regional variety.
 */
export type DialectProfile = {
    readonly name: string;
    readonly label: string;
    readonly overrides: MappingOverrides;
    /** Lowercase input word → transliteration, consulted before the shared dictionary */
    readonly dictionary: ReadonlyMap<string, string>;
};

/**
 * Base tables shared by every dialect.
 */
export type BaseTables = MappingOverrides & {
    /** Two-letter vowel runs → long vowel (`aa → ā`) */
    readonly vowels: MappingTable;
    /** Plain consonant output → emphatic output (`t → ṭ`) */
    readonly emphatics: ReadonlyMap<string, string>;
};

export type PatternRuleMode = 'cumulative' | 'exclusive';

export type CompiledPatternRule = {
    readonly re: RegExp;
    readonly replacement: string;
    readonly mode: PatternRuleMode;
    /** When present, the rule only runs for these dialects */
    readonly dialects?: ReadonlySet<string>;
    readonly description?: string;
};

export type CompiledSuffixRule = {
    readonly suffix: string;
    readonly replacement: string;
    readonly minStemLength: number;
    readonly dialects?: ReadonlySet<string>;
};

/**
 * Correction rules, already sorted into the order they are tried in.
 */
export type CompiledCorrections = {
    readonly words: ReadonlyMap<string, string>;
    readonly patterns: readonly CompiledPatternRule[];
    readonly suffixes: readonly CompiledSuffixRule[];
};

/**
 * Arabica → Arabic-script table used by the experimental approximator.
 */
export type ArabicScriptTable = {
    readonly letters: ReadonlyMap<string, string>;
    /** Length (in code points) of the longest key in `letters` */
    readonly maxKeyLength: number;
    /** Word-initial short vowel → alif seat with its haraka */
    readonly initialVowels: ReadonlyMap<string, string>;
    readonly punctuation: ReadonlyMap<string, string>;
};

/**
 * Immutable, fully validated tables. Build one with `loadTables()` and pass it
 * into every `convert()` call; nothing mutates it afterwards.
 */
export type EngineState = {
    readonly base: BaseTables;
    readonly dialects: ReadonlyMap<string, DialectProfile>;
    readonly defaultDialect: string;
    /** Shared dictionary, consulted after the dialect's own partition */
    readonly dictionary: ReadonlyMap<string, string>;
    /** Lowercase foreign words passed through verbatim */
    readonly foreignWords: ReadonlySet<string>;
    readonly corrections: CompiledCorrections;
    readonly arabicScript: ArabicScriptTable | null;
};

/**
 * Which stage produced a word's transliteration.
 */
export type MappedWordSource = 'foreign' | 'dictionary' | 'fallback' | 'numeric' | 'rules';

export type MappedWord = {
    text: string;
    source: MappedWordSource;
    /** Letters and digits no table could map, in order of appearance */
    unmapped: string[];
};

/**
 * Output of `convert()`.
 */
export type ConversionResult = {
    /** The Arabica transliteration */
    result: string;
    /**
     * Experimental Arabic-script approximation; `null` when disabled, when no
     * Arabic-script table is loaded, or when the approximator failed.
     */
    arabicScript: string | null;
    /**
     * Distinct words (first-seen spelling) that still contain characters no
     * table could map. Candidates for an external resolver.
     */
    unknownWords: string[];
};

export type { ArabicScriptOptions, ConvertOptions, LoadOptions, Logger } from './options.js';
export type { ConfigIssue, ConfigIssueSeverity, ConfigIssueType } from './validation.js';

/**
 * Validates an engine configuration and compiles it into an immutable
 * `EngineState`.
 *
 * Validation runs in two passes: the zod schemas check the shape of every
 * section, then each table is read key by key (arity, casing, duplicates),
 * overlapping patterns are flagged, regexes are compiled and dialect
 * references resolved. Every issue is
 * collected before anything is reported.
 *
 * @module load
 */

import type { ZodIssue } from 'zod';
import { normalizeReplaceFlags, sortByPriority } from '../corrections/patterns.js';
import { ConfigError } from '../errors.js';
import type {
    ArabicScriptTable,
    BaseTables,
    CompiledCorrections,
    CompiledPatternRule,
    CompiledSuffixRule,
    DialectProfile,
    EngineState,
    LoadOptions,
    MappingOverrides,
    MappingTable,
} from '../types/index.js';
import type { ConfigIssue } from '../types/validation.js';
import { type EngineConfig, EngineConfigSchema, type ParsedEngineConfig } from './schemas.js';
import {
    checkDigraphVowelOverlap,
    checkTrigraphOverlap,
    checkVowelIdempotence,
    type KeyMode,
    readTable,
    readWordSet,
} from './tables.js';

/**
 * Outcome of `validateConfig()`.
 */
export type ConfigValidation = {
    /** `true` when no issue has `error` severity */
    valid: boolean;
    issues: ConfigIssue[];
};

type Compiled = { issues: ConfigIssue[]; state: EngineState | null };

type OverridesInput = ParsedEngineConfig['mappings'];

const OVERRIDE_ARITIES = [
    ['single', 1],
    ['digraphs', 2],
    ['trigraphs', 3],
] as const;

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

const readSource = (value: unknown): string | undefined =>
    typeof value === 'object' && value !== null && 'source' in value && typeof value.source === 'string'
        ? value.source
        : undefined;

const readName = (value: unknown): string | undefined =>
    typeof value === 'object' && value !== null && 'name' in value && typeof value.name === 'string'
        ? value.name
        : undefined;

const childOf = (value: unknown, key: string | number): unknown => {
    if (Array.isArray(value)) {
        return typeof key === 'number' ? value[key] : undefined;
    }
    if (typeof value === 'object' && value !== null) {
        return Object.entries(value).find(([k]) => k === String(key))?.[1];
    }
    return undefined;
};

/**
 * Joins path segments as `a.b[2].c`.
 */
export const formatPath = (path: readonly (string | number)[]) =>
    path.reduce<string>(
        (acc, part) => (typeof part === 'number' ? `${acc}[${part}]` : acc ? `${acc}.${part}` : part),
        '',
    );

/**
 * Works out which file (or in-memory section) a schema issue belongs to, and
 * the path inside it.
 */
const locateSchemaIssue = (input: unknown, path: readonly (string | number)[]) => {
    const [section, second] = path;

    if (section === 'dialects' && typeof second === 'number') {
        const dialect = childOf(childOf(input, 'dialects'), second);
        const name = readName(dialect);
        const source = readSource(dialect) ?? (name ? `dialects/${name}` : `dialects[${second}]`);
        return { path: formatPath(path.slice(2)), source };
    }

    if (section === 'corrections' && typeof second === 'string') {
        const source = readSource(childOf(childOf(input, 'corrections'), second)) ?? `corrections.${second}`;
        return { path: formatPath(path.slice(2)), source };
    }

    if (typeof section === 'string') {
        const source = readSource(childOf(input, section));
        if (source || path.length > 1) {
            return { path: formatPath(path.slice(1)), source: source ?? section };
        }
    }

    return { path: formatPath(path), source: 'config' };
};

/**
 * Converts zod issues into `invalid_shape` config issues attributed to the
 * file or section they were found in.
 */
export const toShapeIssues = (input: unknown, issues: readonly ZodIssue[]): ConfigIssue[] =>
    issues.map((issue): ConfigIssue => {
        const { path, source } = locateSchemaIssue(input, issue.path);
        return { message: issue.message, severity: 'error', source, type: 'invalid_shape', ...(path ? { path } : {}) };
    });

const compileTable = (
    table: Parameters<typeof readTable>[0],
    arity: number,
    options: { keyMode: KeyMode; path: string; source: string },
    issues: ConfigIssue[],
): MappingTable => {
    const read = readTable(table, { ...options, arity });
    issues.push(...read.issues);
    return { arity, entries: read.entries };
};

const compileOverrides = (
    input: Partial<Pick<OverridesInput, 'digraphs' | 'single' | 'trigraphs'>> | undefined,
    source: string,
    prefix: string,
    issues: ConfigIssue[],
): MappingOverrides => {
    const tables = OVERRIDE_ARITIES.map(([key, arity]) =>
        compileTable(input?.[key], arity, { keyMode: 'require-lowercase', path: `${prefix}${key}`, source }, issues),
    );
    const [single, digraphs, trigraphs] = tables;
    return { digraphs, single, trigraphs };
};

const compileBase = (mappings: OverridesInput, issues: ConfigIssue[]): BaseTables => {
    const source = mappings.source ?? 'mappings';
    const overrides = compileOverrides(mappings, source, '', issues);
    const vowels = compileTable(mappings.vowels, 2, { keyMode: 'require-lowercase', path: 'vowels', source }, issues);
    const emphatics = readTable(mappings.emphatics, { keyMode: 'preserve', path: 'emphatics', source });

    issues.push(
        ...emphatics.issues,
        ...checkVowelIdempotence(vowels.entries, source),
        ...checkDigraphVowelOverlap(overrides.digraphs.entries, vowels.entries, { path: 'digraphs', source }),
    );

    return { ...overrides, emphatics: emphatics.entries, vowels };
};

const compileDialects = (config: ParsedEngineConfig, base: BaseTables, issues: ConfigIssue[]) => {
    const dialects = new Map<string, DialectProfile>();

    config.dialects.forEach((dialect, index) => {
        const source = dialect.source ?? `dialects/${dialect.name}`;
        if (dialects.has(dialect.name)) {
            issues.push({
                key: dialect.name,
                message: `Dialect "${dialect.name}" is declared more than once`,
                path: `dialects[${index}]`,
                severity: 'error',
                source,
                type: 'duplicate_dialect',
            });
            return;
        }

        const overrides = compileOverrides(dialect.overrides, source, 'overrides.', issues);
        const dictionary = readTable(dialect.dictionary, { keyMode: 'normalize', path: 'dictionary', source });
        const digraphs = new Map([...base.digraphs.entries, ...overrides.digraphs.entries]);
        issues.push(
            ...dictionary.issues,
            ...checkDigraphVowelOverlap(overrides.digraphs.entries, base.vowels.entries, {
                path: 'overrides.digraphs',
                source,
            }),
            ...checkTrigraphOverlap(overrides.trigraphs.entries, digraphs, { path: 'overrides.trigraphs', source }),
        );

        dialects.set(dialect.name, {
            dictionary: dictionary.entries,
            label: dialect.label ?? dialect.name,
            name: dialect.name,
            overrides,
        });
    });

    return dialects;
};

const checkDialectRefs = (
    dialects: readonly string[] | undefined,
    known: ReadonlyMap<string, DialectProfile>,
    location: { path: string; source: string },
    issues: ConfigIssue[],
): ReadonlySet<string> | undefined => {
    if (!dialects) {
        return undefined;
    }
    for (const name of dialects.filter((d) => !known.has(d))) {
        issues.push({
            ...location,
            key: name,
            message: `Rule targets unknown dialect "${name}"`,
            severity: 'error',
            type: 'unknown_dialect',
        });
    }
    return new Set(dialects);
};

const compilePatternRules = (
    patterns: NonNullable<ParsedEngineConfig['corrections']>['patterns'],
    dialects: ReadonlyMap<string, DialectProfile>,
    issues: ConfigIssue[],
): CompiledPatternRule[] => {
    if (!patterns) {
        return [];
    }
    const source = patterns.source ?? 'corrections.patterns';
    const compiled: { priority: number; rule: CompiledPatternRule }[] = [];

    patterns.rules.forEach((rule, index) => {
        const path = `rules[${index}]`;
        let flags: string;
        try {
            flags = normalizeReplaceFlags(rule.flags);
        } catch (error) {
            issues.push({ message: errorMessage(error), path: `${path}.flags`, severity: 'error', source, type: 'invalid_flags' });
            return;
        }

        let re: RegExp;
        try {
            re = new RegExp(rule.pattern, flags);
        } catch (error) {
            issues.push({
                message: `Invalid regex: ${errorMessage(error)}`,
                path: `${path}.pattern`,
                severity: 'error',
                source,
                type: 'invalid_regex',
            });
            return;
        }

        compiled.push({
            priority: rule.priority,
            rule: {
                description: rule.description,
                dialects: checkDialectRefs(rule.dialects, dialects, { path: `${path}.dialects`, source }, issues),
                mode: rule.mode,
                re,
                replacement: rule.replacement,
            },
        });
    });

    return sortByPriority(compiled, (c) => c.priority).map((c) => c.rule);
};

const compileSuffixRules = (
    suffixes: NonNullable<ParsedEngineConfig['corrections']>['suffixes'],
    dialects: ReadonlyMap<string, DialectProfile>,
    issues: ConfigIssue[],
): CompiledSuffixRule[] => {
    if (!suffixes) {
        return [];
    }
    const source = suffixes.source ?? 'corrections.suffixes';
    const rules = suffixes.rules.map((rule, index) => ({
        priority: rule.priority,
        rule: {
            dialects: checkDialectRefs(rule.dialects, dialects, { path: `rules[${index}].dialects`, source }, issues),
            minStemLength: rule.minStemLength,
            replacement: rule.replacement,
            suffix: rule.suffix,
        },
    }));
    return sortByPriority(rules, (r) => r.priority).map((r) => r.rule);
};

const compileCorrections = (
    config: ParsedEngineConfig,
    dialects: ReadonlyMap<string, DialectProfile>,
    issues: ConfigIssue[],
): CompiledCorrections => {
    const { corrections } = config;
    const words = readTable(corrections?.words?.entries, {
        keyMode: 'preserve',
        path: 'entries',
        source: corrections?.words?.source ?? 'corrections.words',
    });
    issues.push(...words.issues);

    return {
        patterns: compilePatternRules(corrections?.patterns, dialects, issues),
        suffixes: compileSuffixRules(corrections?.suffixes, dialects, issues),
        words: words.entries,
    };
};

const compileArabicScript = (config: ParsedEngineConfig, issues: ConfigIssue[]): ArabicScriptTable | null => {
    const { arabicScript } = config;
    if (!arabicScript) {
        return null;
    }
    const source = arabicScript.source ?? 'arabicScript';
    const letters = readTable(arabicScript.letters, { keyMode: 'require-lowercase', path: 'letters', source });
    const initialVowels = readTable(arabicScript.initialVowels, {
        arity: 1,
        keyMode: 'require-lowercase',
        path: 'initialVowels',
        source,
    });
    const punctuation = readTable(arabicScript.punctuation, { arity: 1, keyMode: 'preserve', path: 'punctuation', source });
    issues.push(...letters.issues, ...initialVowels.issues, ...punctuation.issues);

    return {
        initialVowels: initialVowels.entries,
        letters: letters.entries,
        maxKeyLength: Math.max(0, ...[...letters.entries.keys()].map((k) => Array.from(k).length)),
        punctuation: punctuation.entries,
    };
};

const compile = (input: unknown): Compiled => {
    const parsed = EngineConfigSchema.safeParse(input);
    if (!parsed.success) {
        return { issues: toShapeIssues(input, parsed.error.issues), state: null };
    }

    const config = parsed.data;
    const issues: ConfigIssue[] = [];
    const base = compileBase(config.mappings, issues);
    const dialects = compileDialects(config, base, issues);

    const dictionarySource = config.dictionary?.source ?? 'dictionary';
    const dictionary = readTable(config.dictionary?.entries, {
        keyMode: 'normalize',
        path: 'entries',
        source: dictionarySource,
    });
    const foreign = readWordSet(config.foreignWords?.words, {
        path: 'words',
        source: config.foreignWords?.source ?? 'foreignWords',
    });
    issues.push(...dictionary.issues, ...foreign.issues);

    const corrections = compileCorrections(config, dialects, issues);
    const arabicScript = compileArabicScript(config, issues);

    const [firstDialect] = dialects.keys();
    const defaultDialect = config.defaultDialect ?? firstDialect;
    if (config.defaultDialect !== undefined && !dialects.has(config.defaultDialect)) {
        issues.push({
            key: config.defaultDialect,
            message: `Default dialect "${config.defaultDialect}" has no profile`,
            path: 'defaultDialect',
            severity: 'error',
            source: 'config',
            type: 'unknown_dialect',
        });
    }

    if (issues.some((issue) => issue.severity === 'error') || defaultDialect === undefined) {
        return { issues, state: null };
    }

    const state: EngineState = Object.freeze({
        arabicScript,
        base: Object.freeze(base),
        corrections: Object.freeze(corrections),
        defaultDialect,
        dialects,
        dictionary: dictionary.entries,
        foreignWords: foreign.words,
    });

    return { issues, state };
};

/**
 * Checks a configuration without building anything and without throwing.
 *
 * @example
 * const { valid, issues } = validateConfig(JSON.parse(raw));
 * if (!valid) {
 *     console.error(formatConfigIssues(issues).join('\n'));
 * }
 */
export const validateConfig = (input: unknown): ConfigValidation => {
    const { issues } = compile(input);
    return { issues, valid: !issues.some((issue) => issue.severity === 'error') };
};

/**
 * Validates the configuration once and compiles the immutable engine state.
 *
 * Call this at startup and share the result: `convert()` never reloads or
 * mutates it.
 *
 * @throws ConfigError when any error-level issue is found
 *
 * @example
 * const state = loadTables(config, { logger: console });
 * convert('mar7aba', 'moroccan', state).result; // → 'marḥaba'
 */
export const loadTables = (config: EngineConfig, options: LoadOptions = {}): EngineState => {
    const { logger } = options;
    const { issues, state } = compile(config);
    const errors = issues.filter((issue) => issue.severity === 'error');

    if (errors.length > 0 || !state) {
        logger?.error?.('Configuration rejected', errors);
        throw new ConfigError(errors);
    }

    for (const issue of issues) {
        logger?.warn?.(`${issue.source}: ${issue.message}`, issue);
    }

    logger?.info?.('Tables loaded', {
        defaultDialect: state.defaultDialect,
        dialects: [...state.dialects.keys()],
        dictionary: state.dictionary.size,
        foreignWords: state.foreignWords.size,
        patterns: state.corrections.patterns.length,
        suffixes: state.corrections.suffixes.length,
        wordCorrections: state.corrections.words.size,
    });

    return state;
};

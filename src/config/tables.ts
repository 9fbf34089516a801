/**
 * Reading raw table input into validated, ordered maps.
 *
 * Checks performed per key:
 * - empty keys
 * - arity (exact code-point length) for mapping tables
 * - uppercase keys in tables matched case-insensitively
 * - repeated keys: a different replacement is an error, the same one a warning
 *
 * and across tables:
 * - vowel idempotence
 * - overlapping patterns (digraph against vowel, dialect trigraph against digraph)
 */

import type { ConfigIssue } from '../types/validation.js';
import type { TableInput } from './schemas.js';

/**
 * How keys are treated.
 * - `require-lowercase`: matching is case-insensitive, so an uppercase key could never match
 * - `normalize`: keys are trimmed and lowercased before use (dictionaries)
 * - `preserve`: keys are used as written (case-sensitive corrections)
 */
export type KeyMode = 'require-lowercase' | 'normalize' | 'preserve';

export type ReadTableOptions = {
    source: string;
    path: string;
    arity?: number;
    keyMode: KeyMode;
};

export type ReadTableResult = {
    entries: Map<string, string>;
    issues: ConfigIssue[];
};

/**
 * Returns the declared pairs of a table in order.
 */
export const tablePairs = (table: TableInput | undefined): [string, string][] => {
    if (!table) {
        return [];
    }
    return Array.isArray(table) ? table : Object.entries(table);
};

const codePointLength = (s: string) => Array.from(s).length;

/**
 * Validates a table and returns its entries as an insertion-ordered map.
 *
 * The first occurrence of a repeated key is kept; the repetition is reported.
 *
 * @example
 * const { entries, issues } = readTable([['sh', 'š'], ['sh', 's']], {
 *   arity: 2,
 *   keyMode: 'require-lowercase',
 *   path: 'digraphs',
 *   source: 'mappings.json',
 * });
 * // entries → Map { 'sh' => 'š' }
 * // issues[0].type → 'conflicting_key'
 */
export const readTable = (table: TableInput | undefined, options: ReadTableOptions): ReadTableResult => {
    const { arity, keyMode, path, source } = options;
    const entries = new Map<string, string>();
    const issues: ConfigIssue[] = [];
    const byPair = Array.isArray(table);

    tablePairs(table).forEach(([rawKey, value], index) => {
        const location = byPair ? `${path}[${index}]` : `${path}.${rawKey}`;
        const key = keyMode === 'normalize' ? rawKey.trim().toLowerCase() : rawKey;

        if (!key) {
            issues.push({ message: 'Empty key is not allowed', path: location, severity: 'error', source, type: 'empty_key' });
            return;
        }

        if (arity !== undefined && codePointLength(key) !== arity) {
            issues.push({
                key,
                message: `Key "${key}" must be exactly ${arity} character${arity === 1 ? '' : 's'} long`,
                path: location,
                severity: 'error',
                source,
                type: 'invalid_arity',
            });
            return;
        }

        if (keyMode === 'require-lowercase' && key !== key.toLowerCase()) {
            issues.push({
                key,
                message: `Key "${key}" is ambiguous: matching is case-insensitive, write it as "${key.toLowerCase()}"`,
                path: location,
                severity: 'error',
                source,
                type: 'ambiguous_case',
            });
            return;
        }

        const existing = entries.get(key);
        if (existing === undefined) {
            entries.set(key, value);
        } else if (existing !== value) {
            issues.push({
                key,
                message: `Conflicting replacements for "${key}": "${existing}" and "${value}"`,
                path: location,
                severity: 'error',
                source,
                type: 'conflicting_key',
            });
        } else {
            issues.push({
                key,
                message: `Duplicate key "${key}"`,
                path: location,
                severity: 'warn',
                source,
                type: 'duplicate_key',
            });
        }
    });

    return { entries, issues };
};

/**
 * Validates a list of literal words (lowercased) into a set.
 */
export const readWordSet = (
    words: readonly string[] | undefined,
    options: Pick<ReadTableOptions, 'path' | 'source'>,
): { words: Set<string>; issues: ConfigIssue[] } => {
    const set = new Set<string>();
    const issues: ConfigIssue[] = [];

    (words ?? []).forEach((raw, index) => {
        const word = raw.trim().toLowerCase();
        const location = `${options.path}[${index}]`;
        if (!word) {
            issues.push({ message: 'Empty word is not allowed', path: location, severity: 'error', source: options.source, type: 'empty_key' });
        } else if (set.has(word)) {
            issues.push({
                key: word,
                message: `Duplicate word "${word}"`,
                path: location,
                severity: 'warn',
                source: options.source,
                type: 'duplicate_key',
            });
        } else {
            set.add(word);
        }
    });

    return { issues, words: set };
};

/**
 * Flags vowel replacements that a second normalization pass could rewrite again.
 *
 * A replacement is safe when it shares no character with any vowel key, which
 * keeps the normalization idempotent.
 */
export const checkVowelIdempotence = (vowels: ReadonlyMap<string, string>, source: string): ConfigIssue[] => {
    const keyChars = new Set([...vowels.keys()].flatMap((k) => Array.from(k)));
    const issues: ConfigIssue[] = [];

    for (const [key, replacement] of vowels) {
        const clash = Array.from(replacement).find((ch) => keyChars.has(ch));
        if (clash !== undefined) {
            issues.push({
                key,
                message: `Vowel replacement "${replacement}" for "${key}" contains "${clash}", so normalizing twice would change it again`,
                path: `vowels.${key}`,
                severity: 'error',
                source,
                type: 'non_idempotent_vowel',
            });
        }
    }

    return issues;
};

type Location = Pick<ReadTableOptions, 'path' | 'source'>;

/**
 * Flags digraph keys that are also vowel keys.
 *
 * The digraph stage consumes the pair before vowel normalization sees it, so
 * a different output is an error. The same output is a redundant rule and
 * only a warning.
 *
 * @example
 * checkDigraphVowelOverlap(new Map([['oo', 'u']]), new Map([['oo', 'ū']]), { path: 'digraphs', source: 'mappings.json' });
 * // → [{ key: 'oo', path: 'digraphs.oo', severity: 'error', type: 'overlapping_pattern', ... }]
 */
export const checkDigraphVowelOverlap = (
    digraphs: ReadonlyMap<string, string>,
    vowels: ReadonlyMap<string, string>,
    { path, source }: Location,
): ConfigIssue[] => {
    const issues: ConfigIssue[] = [];

    for (const [key, output] of digraphs) {
        const vowel = vowels.get(key);
        if (vowel === undefined) {
            continue;
        }
        const differs = vowel !== output;
        issues.push({
            key,
            message: differs
                ? `Digraph "${key}" → "${output}" overlaps the vowel rule "${key}" → "${vowel}", which would never apply`
                : `Digraph "${key}" repeats the vowel rule "${key}" → "${vowel}"`,
            path: `${path}.${key}`,
            severity: differs ? 'error' : 'warn',
            source,
            type: 'overlapping_pattern',
        });
    }

    return issues;
};

/**
 * Flags dialect trigraphs that take words away from a digraph on their first
 * two letters: a trigraph whose output does not begin with that digraph's
 * output changes how every word containing it reads (warning).
 */
export const checkTrigraphOverlap = (
    trigraphs: ReadonlyMap<string, string>,
    digraphs: ReadonlyMap<string, string>,
    { path, source }: Location,
): ConfigIssue[] => {
    const issues: ConfigIssue[] = [];

    for (const [key, output] of trigraphs) {
        const head = Array.from(key).slice(0, 2).join('');
        const digraph = digraphs.get(head);
        if (digraph !== undefined && !output.startsWith(digraph)) {
            issues.push({
                key,
                message: `Trigraph "${key}" → "${output}" overlaps the digraph "${head}" → "${digraph}"`,
                path: `${path}.${key}`,
                severity: 'warn',
                source,
                type: 'overlapping_pattern',
            });
        }
    }

    return issues;
};

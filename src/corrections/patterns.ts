import type { CompiledPatternRule } from '../types/index.js';

const DEFAULT_REPLACE_FLAGS = 'gu';

/**
 * Validates user flags and always adds `g` and `u`.
 *
 * @throws Error for a flag outside `gimsuy`
 */
export const normalizeReplaceFlags = (flags?: string) => {
    if (!flags) {
        return DEFAULT_REPLACE_FLAGS;
    }

    const allowed = new Set(['g', 'i', 'm', 's', 'u', 'y']);
    const set = new Set(
        flags.split('').filter((ch) => {
            if (!allowed.has(ch)) {
                throw new Error(`Invalid replace regex flag: "${ch}" (allowed: gimsyu)`);
            }
            return true;
        }),
    );
    set.add('g');
    set.add('u');

    return ['g', 'i', 'm', 's', 'y', 'u'].filter((c) => set.has(c)).join('');
};

const appliesTo = (dialects: ReadonlySet<string> | undefined, dialect: string) => !dialects || dialects.has(dialect);

/**
 * Runs pattern rules over the whole string, in order.
 *
 * Each rule's output is the next rule's input. Cumulative rules always run;
 * exclusive rules form a first-match-wins group: once one of them matches,
 * later exclusive rules are skipped.
 *
 * @example
 * applyPatternRules('bzāāf', [{ mode: 'cumulative', re: /([āīū])\1+/gu, replacement: '$1' }], 'moroccan');
 * // → 'bzāf'
 */
export const applyPatternRules = (text: string, rules: readonly CompiledPatternRule[], dialect: string) => {
    let result = text;
    let exclusiveMatched = false;

    for (const rule of rules) {
        if (!appliesTo(rule.dialects, dialect)) {
            continue;
        }
        if (rule.mode === 'exclusive' && exclusiveMatched) {
            continue;
        }

        // search() ignores lastIndex, so the shared regex is never mutated
        if (result.search(rule.re) === -1) {
            continue;
        }

        result = result.replace(rule.re, rule.replacement);
        if (rule.mode === 'exclusive') {
            exclusiveMatched = true;
        }
    }

    return result;
};

/**
 * Sorts by priority (higher first); the declaration order breaks ties.
 */
export const sortByPriority = <T>(items: readonly T[], priorityOf: (item: T) => number): T[] =>
    items
        .map((item, index) => ({ index, item }))
        .sort((a, b) => priorityOf(b.item) - priorityOf(a.item) || a.index - b.index)
        .map(({ item }) => item);

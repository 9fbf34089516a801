import type { ConfigIssue } from './types/validation.js';

/**
 * Renders issues as `source (path): message` lines.
 *
 * @example
 * formatConfigIssues(validateConfig(config).issues);
 * // ['dialects/moroccan.json (overrides.digraphs[1]): Conflicting replacements for "ou": "u" and "o"']
 */
export const formatConfigIssues = (issues: readonly ConfigIssue[]): string[] =>
    issues.map((issue) => `${issue.source}${issue.path ? ` (${issue.path})` : ''}: ${issue.message}`);

/**
 * Raised by `loadTables()` (and the directory reader) when the configuration
 * has at least one error-level issue. Fatal: the engine cannot start.
 */
export class ConfigError extends Error {
    /** The first offending file or section */
    readonly source: string;
    readonly issues: readonly ConfigIssue[];

    constructor(issues: readonly ConfigIssue[]) {
        const [first] = issues;
        const source = first?.source ?? 'config';
        const details = formatConfigIssues(issues);
        super(`Invalid configuration in ${source}: ${details.join('; ')}`);
        this.name = 'ConfigError';
        this.source = source;
        this.issues = issues;
    }
}

/**
 * Raised by `convert()` when the requested dialect has no loaded profile.
 */
export class UnknownDialectError extends Error {
    readonly dialect: string;
    readonly available: readonly string[];

    constructor(dialect: string, available: readonly string[]) {
        super(`Unknown dialect "${dialect}". Available dialects: ${available.join(', ')}`);
        this.name = 'UnknownDialectError';
        this.dialect = dialect;
        this.available = available;
    }
}

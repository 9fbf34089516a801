/**
 * Reads an engine configuration from a directory of JSON files.
 *
 * Layout (every file but `mappings.json` and `dialects/` is optional):
 *
 * ```
 * mappings.json
 * dialects/<name>.json
 * dictionary.json
 * foreign-words.json
 * corrections/words.json
 * corrections/patterns.json
 * corrections/suffixes.json
 * arabic-script.json
 * engine.json            { "defaultDialect": "moroccan" }
 * ```
 *
 * Each section's `source` is set to its path relative to the directory, so
 * validation issues name the file they came from. A key written twice in the
 * same JSON object is reported the way a repeated table key is: a different
 * value is an error, the same value a warning.
 *
 * @module files
 */

import { existsSync, readdirSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { getNodeValue, type Node, parseTree } from 'jsonc-parser';
import { ConfigError } from '../errors.js';
import type { EngineState, LoadOptions } from '../types/index.js';
import type { ConfigIssue } from '../types/validation.js';
import { formatPath, loadTables, toShapeIssues } from './load.js';
import { type EngineConfig, EngineConfigSchema } from './schemas.js';

/** Environment variable naming a directory that replaces the bundled tables */
export const CONFIG_DIR_ENV = 'ARABICA_CONFIG_DIR';

const errorMessage = (error: unknown) => (error instanceof Error ? error.message : String(error));

const isRecord = (value: unknown): value is Record<string, unknown> =>
    typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * Finds keys declared more than once in the same JSON object. `JSON.parse`
 * keeps only the last of them.
 *
 * @example
 * findRepeatedKeys('{"digraphs": {"sh": "š", "sh": "s"}}', 'mappings.json');
 * // → [{ key: 'sh', path: 'digraphs.sh', severity: 'error', type: 'conflicting_key', ... }]
 */
export const findRepeatedKeys = (text: string, source: string): ConfigIssue[] => {
    const issues: ConfigIssue[] = [];

    const visit = (node: Node, at: readonly (string | number)[]) => {
        if (node.type === 'array') {
            node.children?.forEach((child, index) => visit(child, [...at, index]));
            return;
        }
        if (node.type !== 'object') {
            return;
        }

        const seen = new Map<string, string>();
        for (const property of node.children ?? []) {
            const [keyNode, valueNode] = property.children ?? [];
            const key: unknown = keyNode?.value;
            if (typeof key !== 'string' || !valueNode) {
                continue;
            }

            const value = JSON.stringify(getNodeValue(valueNode));
            const previous = seen.get(key);
            const path = formatPath([...at, key]);
            if (previous === undefined) {
                seen.set(key, value);
            } else if (previous !== value) {
                issues.push({
                    key,
                    message: `Conflicting replacements for "${key}": ${previous} and ${value}`,
                    path,
                    severity: 'error',
                    source,
                    type: 'conflicting_key',
                });
            } else {
                issues.push({ key, message: `Duplicate key "${key}"`, path, severity: 'warn', source, type: 'duplicate_key' });
            }
            visit(valueNode, [...at, key]);
        }
    };

    const root = parseTree(text);
    if (root) {
        visit(root, []);
    }
    return issues;
};

type JsonReader = (relative: string) => unknown;

/**
 * Returns a reader that parses one JSON file (or `undefined` when it does not
 * exist) and collects its repeated keys into `repeated`.
 *
 * The reader throws ConfigError (`invalid_json`) when a file cannot be read
 * or parsed.
 */
const createJsonReader =
    (dir: string, repeated: ConfigIssue[]): JsonReader =>
    (relative) => {
        const file = path.join(dir, relative);
        if (!existsSync(file)) {
            return undefined;
        }
        try {
            const text = readFileSync(file, 'utf8');
            const value: unknown = JSON.parse(text);
            repeated.push(...findRepeatedKeys(text, relative));
            return value;
        } catch (error) {
            throw new ConfigError([
                { message: `Unreadable JSON: ${errorMessage(error)}`, severity: 'error', source: relative, type: 'invalid_json' },
            ]);
        }
    };

const withSource = (value: unknown, source: string): unknown => (isRecord(value) ? { ...value, source } : value);

const readSection = (read: JsonReader, relative: string) => withSource(read(relative), relative);

/**
 * Dialect files may leave `name` out; it defaults to the file name.
 */
const readDialects = (dir: string, read: JsonReader) => {
    const folder = path.join(dir, 'dialects');
    if (!existsSync(folder)) {
        return [];
    }
    return readdirSync(folder)
        .filter((file) => file.endsWith('.json'))
        .sort()
        .map((file) => {
            const relative = `dialects/${file}`;
            const dialect = read(relative);
            return isRecord(dialect) ? { name: path.basename(file, '.json'), ...dialect, source: relative } : dialect;
        });
};

const readCorrections = (read: JsonReader) => {
    const corrections = {
        patterns: readSection(read, 'corrections/patterns.json'),
        suffixes: readSection(read, 'corrections/suffixes.json'),
        words: readSection(read, 'corrections/words.json'),
    };
    return Object.values(corrections).some((section) => section !== undefined) ? corrections : undefined;
};

/**
 * Reads and shape-checks every configuration file in `dir`.
 *
 * Repeated keys with the same value are logged as warnings.
 *
 * @throws ConfigError when `mappings.json` is missing (`missing_file`), a file
 * is not valid JSON (`invalid_json`), a key is given two different values
 * (`conflicting_key`) or a section has the wrong shape
 */
export const readConfigDirectory = (dir: string, options: LoadOptions = {}): EngineConfig => {
    const { logger } = options;
    if (!existsSync(path.join(dir, 'mappings.json'))) {
        throw new ConfigError([
            { message: `No mappings.json in ${dir}`, severity: 'error', source: 'mappings.json', type: 'missing_file' },
        ]);
    }

    const repeated: ConfigIssue[] = [];
    const read = createJsonReader(dir, repeated);
    const engine = read('engine.json');
    const raw = {
        arabicScript: readSection(read, 'arabic-script.json'),
        corrections: readCorrections(read),
        defaultDialect: isRecord(engine) ? engine.defaultDialect : undefined,
        dialects: readDialects(dir, read),
        dictionary: readSection(read, 'dictionary.json'),
        foreignWords: readSection(read, 'foreign-words.json'),
        mappings: readSection(read, 'mappings.json'),
    };

    const conflicts = repeated.filter((issue) => issue.severity === 'error');
    if (conflicts.length > 0) {
        logger?.error?.('Configuration rejected', conflicts);
        throw new ConfigError(conflicts);
    }
    for (const issue of repeated) {
        logger?.warn?.(`${issue.source}: ${issue.message}`, issue);
    }

    const parsed = EngineConfigSchema.safeParse(raw);
    if (!parsed.success) {
        throw new ConfigError(toShapeIssues(raw, parsed.error.issues));
    }
    return parsed.data;
};

/**
 * Directory the default tables are read from: `ARABICA_CONFIG_DIR` when set,
 * the `data/` directory shipped with the package otherwise.
 */
export const resolveConfigDirectory = (env: NodeJS.ProcessEnv = process.env): string =>
    env[CONFIG_DIR_ENV] || fileURLToPath(new URL('../../data/', import.meta.url));

export type LoadDefaultOptions = LoadOptions & {
    /** Environment to resolve the directory from */
    env?: NodeJS.ProcessEnv;
};

/**
 * Reads the configuration directory and loads it in one step.
 *
 * @example
 * const state = loadDefaultTables();
 * convert('wach nta mzyan?', 'moroccan', state).result; // → 'waš nta mezyān?'
 */
export const loadDefaultTables = (options: LoadDefaultOptions = {}): EngineState => {
    const { env, logger } = options;
    const dir = resolveConfigDirectory(env);
    logger?.debug?.('Reading configuration directory', dir);
    return loadTables(readConfigDirectory(dir, { logger }), { logger });
};

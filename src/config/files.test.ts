import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ConfigError } from '../errors.js';
import { findRepeatedKeys, loadDefaultTables, readConfigDirectory, resolveConfigDirectory } from './files.js';

const write = (dir: string, relative: string, content: unknown) => {
    const file = path.join(dir, relative);
    mkdirSync(path.dirname(file), { recursive: true });
    writeFileSync(file, typeof content === 'string' ? content : JSON.stringify(content));
};

describe('config files', () => {
    let dir: string;

    beforeEach(() => {
        dir = mkdtempSync(path.join(tmpdir(), 'arabica-config-'));
    });

    afterEach(() => {
        rmSync(dir, { force: true, recursive: true });
    });

    it('should read every section and name each source after its file', () => {
        write(dir, 'mappings.json', { single: { a: 'a' } });
        write(dir, 'dialects/moroccan.json', { dictionary: { wach: 'waš' } });
        write(dir, 'dialects/msa.json', { label: 'Modern Standard Arabic', name: 'msa' });
        write(dir, 'foreign-words.json', { words: ['ok'] });
        write(dir, 'corrections/words.json', { entries: { allah: 'allāh' } });
        write(dir, 'engine.json', { defaultDialect: 'msa' });

        const config = readConfigDirectory(dir);

        expect(config.mappings.source).toBe('mappings.json');
        expect(config.dialects.map((d) => [d.name, d.source])).toEqual([
            ['moroccan', 'dialects/moroccan.json'],
            ['msa', 'dialects/msa.json'],
        ]);
        expect(config.foreignWords?.source).toBe('foreign-words.json');
        expect(config.corrections?.words?.source).toBe('corrections/words.json');
        expect(config.corrections?.patterns).toBeUndefined();
        expect(config.defaultDialect).toBe('msa');
        expect(config.dictionary).toBeUndefined();
    });

    it('should fail with missing_file when mappings.json is absent', () => {
        expect(() => readConfigDirectory(dir)).toThrow(ConfigError);
        try {
            readConfigDirectory(dir);
        } catch (error) {
            expect(error instanceof ConfigError && error.issues[0].type).toBe('missing_file');
        }
    });

    it('should fail with invalid_json naming the unreadable file', () => {
        write(dir, 'mappings.json', { single: { a: 'a' } });
        write(dir, 'dialects/moroccan.json', '{ "name": ');

        try {
            readConfigDirectory(dir);
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            expect(error instanceof ConfigError && error.source).toBe('dialects/moroccan.json');
            expect(error instanceof ConfigError && error.issues[0].type).toBe('invalid_json');
        }
    });

    it('should report shape errors against the file they came from', () => {
        write(dir, 'mappings.json', { single: { a: 'a' }, unknownTable: {} });
        write(dir, 'dialects/moroccan.json', {});

        try {
            readConfigDirectory(dir);
            expect.unreachable();
        } catch (error) {
            expect(error instanceof ConfigError && error.source).toBe('mappings.json');
            expect(error instanceof ConfigError && error.issues[0].type).toBe('invalid_shape');
        }
    });

    it('should reject a key written twice with different values', () => {
        write(dir, 'mappings.json', '{"digraphs": {"sh": "š", "sh": "s"}, "single": {"a": "a"}}');
        write(dir, 'dialects/moroccan.json', {});

        expect(() => loadDefaultTables({ env: { ARABICA_CONFIG_DIR: dir } })).toThrow(ConfigError);
        try {
            readConfigDirectory(dir);
            expect.unreachable();
        } catch (error) {
            expect(error instanceof ConfigError && error.issues).toEqual([
                {
                    key: 'sh',
                    message: 'Conflicting replacements for "sh": "š" and "s"',
                    path: 'digraphs.sh',
                    severity: 'error',
                    source: 'mappings.json',
                    type: 'conflicting_key',
                },
            ]);
        }
    });

    it('should locate a repeated key inside a dialect file', () => {
        write(dir, 'mappings.json', { single: { a: 'a' } });
        write(dir, 'dialects/moroccan.json', '{"overrides": {"digraphs": {"ou": "u", "ou": "o"}}}');

        try {
            readConfigDirectory(dir);
            expect.unreachable();
        } catch (error) {
            expect(error instanceof ConfigError && error.source).toBe('dialects/moroccan.json');
            expect(error instanceof ConfigError && error.issues[0].path).toBe('overrides.digraphs.ou');
        }
    });

    it('should warn about a key repeated with the same value and still load', () => {
        write(dir, 'mappings.json', '{"single": {"a": "a", "b": "b", "a": "a"}}');
        write(dir, 'dialects/moroccan.json', {});
        const warn = vi.fn();

        const state = loadDefaultTables({ env: { ARABICA_CONFIG_DIR: dir }, logger: { warn } });

        expect(state.base.single.entries.get('a')).toBe('a');
        expect(warn).toHaveBeenCalledWith('mappings.json: Duplicate key "a"', {
            key: 'a',
            message: 'Duplicate key "a"',
            path: 'single.a',
            severity: 'warn',
            source: 'mappings.json',
            type: 'duplicate_key',
        });
    });

    it('should find repeated keys in nested objects and arrays only within the same object', () => {
        const text = '{"rules": [{"suffix": "kom"}, {"suffix": "hom"}], "entries": {"x": {"a": 1, "a": 2}}}';
        expect(findRepeatedKeys(text, 'f.json').map((issue) => [issue.path, issue.type])).toEqual([
            ['entries.x.a', 'conflicting_key'],
        ]);
    });

    it('should resolve the directory from the environment', () => {
        expect(resolveConfigDirectory({ ARABICA_CONFIG_DIR: '/etc/arabica' })).toBe('/etc/arabica');
        expect(resolveConfigDirectory({}).endsWith(`${path.sep}data${path.sep}`)).toBe(true);
    });

    it('should load the bundled tables', () => {
        const state = loadDefaultTables({ env: {} });

        expect(state.defaultDialect).toBe('moroccan');
        expect([...state.dialects.keys()]).toEqual(['moroccan', 'msa']);
        expect(state.foreignWords.has('facebook')).toBe(true);
        expect(state.arabicScript?.maxKeyLength).toBe(2);
    });

    it('should load tables from an overriding directory', () => {
        write(dir, 'mappings.json', { single: { a: 'a', b: 'b' } });
        write(dir, 'dialects/test.json', {});

        const state = loadDefaultTables({ env: { ARABICA_CONFIG_DIR: dir } });
        expect([...state.dialects.keys()]).toEqual(['test']);
        expect(state.arabicScript).toBeNull();
    });
});

import { z } from 'zod';

/**
 * A table is either a JSON object or an ordered list of `[pattern, replacement]`
 * pairs. Only the pair form can carry (and so reveal) a repeated key, since a
 * JSON object silently keeps the last duplicate.
 */
export const TableSchema = z.union([
    z.record(z.string(), z.string()),
    z.array(z.tuple([z.string(), z.string()])),
]);

const SourceField = z.string().min(1).optional();

export const MappingOverridesSchema = z
    .object({
        digraphs: TableSchema.optional(),
        single: TableSchema.optional(),
        trigraphs: TableSchema.optional(),
    })
    .strict();

export const BaseMappingSchema = MappingOverridesSchema.extend({
    emphatics: TableSchema.optional(),
    source: SourceField,
    vowels: TableSchema.optional(),
}).strict();

export const DialectSchema = z
    .object({
        dictionary: TableSchema.optional(),
        label: z.string().optional(),
        name: z
            .string()
            .min(1)
            .regex(/^[a-z][a-z0-9_-]*$/, 'Dialect names are lowercase identifiers'),
        overrides: MappingOverridesSchema.optional(),
        source: SourceField,
    })
    .strict();

export const DictionarySchema = z.object({ entries: TableSchema, source: SourceField }).strict();

export const ForeignWordsSchema = z.object({ source: SourceField, words: z.array(z.string()) }).strict();

export const PatternRuleSchema = z
    .object({
        description: z.string().optional(),
        dialects: z.array(z.string().min(1)).optional(),
        flags: z.string().optional(),
        mode: z.enum(['cumulative', 'exclusive']).default('cumulative'),
        pattern: z.string().min(1),
        priority: z.number().int().default(0),
        replacement: z.string(),
    })
    .strict();

export const SuffixRuleSchema = z
    .object({
        dialects: z.array(z.string().min(1)).optional(),
        minStemLength: z.number().int().nonnegative().default(1),
        priority: z.number().int().default(0),
        replacement: z.string(),
        suffix: z.string().min(1),
    })
    .strict();

export const CorrectionsSchema = z
    .object({
        patterns: z.object({ rules: z.array(PatternRuleSchema), source: SourceField }).strict().optional(),
        suffixes: z.object({ rules: z.array(SuffixRuleSchema), source: SourceField }).strict().optional(),
        words: z.object({ entries: TableSchema, source: SourceField }).strict().optional(),
    })
    .strict();

export const ArabicScriptSchema = z
    .object({
        initialVowels: TableSchema.optional(),
        letters: TableSchema,
        punctuation: TableSchema.optional(),
        source: SourceField,
    })
    .strict();

export const EngineConfigSchema = z
    .object({
        arabicScript: ArabicScriptSchema.optional(),
        corrections: CorrectionsSchema.optional(),
        defaultDialect: z.string().min(1).optional(),
        dialects: z.array(DialectSchema).min(1, 'At least one dialect profile is required'),
        dictionary: DictionarySchema.optional(),
        foreignWords: ForeignWordsSchema.optional(),
        mappings: BaseMappingSchema,
    })
    .strict();

/** Configuration as written by a caller or read from JSON (defaults not yet applied) */
export type EngineConfig = z.input<typeof EngineConfigSchema>;

/** Configuration after schema parsing (defaults applied) */
export type ParsedEngineConfig = z.output<typeof EngineConfigSchema>;

export type TableInput = z.infer<typeof TableSchema>;
export type DialectConfig = z.input<typeof DialectSchema>;
export type PatternRuleConfig = z.input<typeof PatternRuleSchema>;
export type SuffixRuleConfig = z.input<typeof SuffixRuleSchema>;

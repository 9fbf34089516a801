export type ConfigIssueSeverity = 'error' | 'warn';

export type ConfigIssueType =
    | 'invalid_shape'
    | 'invalid_json'
    | 'missing_file'
    | 'empty_key'
    | 'invalid_arity'
    | 'ambiguous_case'
    | 'conflicting_key'
    | 'duplicate_key'
    | 'non_idempotent_vowel'
    | 'overlapping_pattern'
    | 'invalid_regex'
    | 'invalid_flags'
    | 'duplicate_dialect'
    | 'unknown_dialect';

export type ConfigIssue = {
    type: ConfigIssueType;
    severity: ConfigIssueSeverity;
    /** File (or in-memory section name) the problem was found in */
    source: string;
    /** Location inside the source, e.g. `digraphs.sh` or `rules[2].pattern` */
    path?: string;
    message: string;
    /** The table key involved (for key-level issues) */
    key?: string;
};

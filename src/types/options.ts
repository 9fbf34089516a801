/**
 * Logger interface for custom logging implementations.
 *
 * All methods are optional - only implement the verbosity levels you need.
 * When no logger is provided, no logging overhead is incurred.
 *
 * @example
 * // Simple console logger
 * const logger: Logger = {
 *   debug: console.debug,
 *   info: console.info,
 *   warn: console.warn,
 *   error: console.error,
 * };
 *
 * @example
 * // Production logger (only warnings and errors)
 * const prodLogger: Logger = {
 *   warn: (msg, ...args) => myLoggingService.warn(msg, args),
 *   error: (msg, ...args) => myLoggingService.error(msg, args),
 * };
 */
export interface Logger {
    /** Log a debug message (verbose debugging output) */
    debug?: (message: string, ...args: unknown[]) => void;
    /** Log an error message (critical failures) */
    error?: (message: string, ...args: unknown[]) => void;
    /** Log an informational message (key progress points) */
    info?: (message: string, ...args: unknown[]) => void;
    /** Log a trace message (extremely verbose, per-token details) */
    trace?: (message: string, ...args: unknown[]) => void;
    /** Log a warning message (potential issues) */
    warn?: (message: string, ...args: unknown[]) => void;
}

/**
 * Options for the experimental Arabic-script side output.
 */
export type ArabicScriptOptions = {
    /**
     * Keep short-vowel harakat (fatha, kasra, damma) and shadda in the output.
     *
     * @default true
     */
    vocalized?: boolean;
};

/**
 * Options accepted by `convert()`.
 *
 * @example
 * convert('mar7aba', 'moroccan', state, {
 *   arabicScript: { vocalized: false },
 *   fallbacks: { flan: 'flān' },
 *   logger: { warn: console.warn },
 * });
 */
export type ConvertOptions = {
    /**
     * Produce the Arabic-script approximation alongside the transliteration.
     * Pass `false` to skip it (`arabicScript` is then `null`).
     *
     * @default true
     */
    arabicScript?: boolean | ArabicScriptOptions;

    /**
     * Results an external resolver produced for words the engine could not map,
     * keyed by the word as written (matched case-insensitively).
     *
     * Fallbacks are consulted after the foreign-word guard and the dictionary,
     * and their output goes through the correction layer like any other word.
     */
    fallbacks?: Readonly<Record<string, string>> | ReadonlyMap<string, string>;

    /**
     * What to do when `dialect` names no loaded profile.
     * - `'throw'`: raise `UnknownDialectError`
     * - `'default'`: use the default profile and log a warning
     *
     * @default 'throw'
     */
    onUnknownDialect?: 'throw' | 'default';

    /**
     * Optional logger. Per-token mapping decisions are reported at `trace`.
     */
    logger?: Logger;
};

/**
 * Options accepted by `loadTables()`.
 */
export type LoadOptions = {
    /**
     * Receives table counts at `info` and non-fatal validation issues
     * (such as a key repeated with the same replacement) at `warn`.
     */
    logger?: Logger;
};

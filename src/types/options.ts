import type { AttributeMap, Attributes } from './index.js';

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
 * // Only surface problems with dynamic styles
 * const quietLogger: Logger = {
 *   warn: (msg, ...args) => myLoggingService.warn(msg, args),
 * };
 */
export interface Logger {
    /** Log a debug message (verbose debugging output) */
    debug?: (message: string, ...args: unknown[]) => void;
    /** Log an error message (critical failures) */
    error?: (message: string, ...args: unknown[]) => void;
    /** Log an informational message (key progress points) */
    info?: (message: string, ...args: unknown[]) => void;
    /** Log a trace message (extremely verbose, per-match details) */
    trace?: (message: string, ...args: unknown[]) => void;
    /** Log a warning message (potential issues) */
    warn?: (message: string, ...args: unknown[]) => void;
}

/**
 * Options for a single `highlight()` pass.
 *
 * @example
 * highlight(text, MARKDOWN_RULES, {
 *   baseAttributes: { font: { family: 'Lato', size: 15 }, foregroundColor: '#1d1d1f' },
 * });
 */
export type HighlightOptions<A extends AttributeMap = AttributeMap> = {
    /**
     * Attributes covering the whole text before any rule runs, e.g. the
     * default editor font. Rules overwrite them key by key.
     *
     * @default {}
     */
    baseAttributes?: Attributes<A>;

    /**
     * Optional logger.
     *
     * - `trace`: every applied match
     * - `debug`: per-rule match counts
     * - `warn`: dynamic styles that threw
     */
    logger?: Logger;
};

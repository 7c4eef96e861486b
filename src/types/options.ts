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
 * };
 *
 * @example
 * // Only trace the compiled patterns
 * const logger: Logger = {
 *   info: (msg, ...args) => myLoggingService.info(msg, args),
 * };
 */
export interface Logger {
    /** Log a debug message (one line per compilation pass) */
    debug?: (message: string, ...args: unknown[]) => void;
    /** Log an informational message (completed compilations) */
    info?: (message: string, ...args: unknown[]) => void;
    /** Log a trace message (extremely verbose, per-placeholder details) */
    trace?: (message: string, ...args: unknown[]) => void;
    /** Log a warning message (alternation runs kept as literal text) */
    warn?: (message: string, ...args: unknown[]) => void;
}

/**
 * Options accepted by `compileExpression()` and `createStepExpression()`.
 */
export type CompileOptions = {
    /**
     * Optional logger for tracing each compilation pass.
     *
     * @example
     * compileExpression('I have {int} cukes', registry, { logger: { debug: console.debug } })
     */
    logger?: Logger;
};

import type { ExpressionError } from '../errors.js';
import type { Argument } from '../matching/arguments.js';
import type { ParameterType } from './parameters.js';

/**
 * Output of `compileExpression()`. Frozen once built.
 *
 * @example
 * compileExpression('I have {int} cukes', registry)
 * // → { source: 'I have {int} cukes', pattern: '^I have ((?:-?\\d+)|(?:\\d+)) cukes$', parameterTypes: [int] }
 */
export type CompiledExpression = {
    /** The expression exactly as authored */
    readonly source: string;

    /** Anchored regex source */
    readonly pattern: string;

    /**
     * One entry per placeholder, in left-to-right source order.
     * Index `i` describes the `i`-th top-level capture group of `pattern`.
     */
    readonly parameterTypes: readonly ParameterType[];
};

/**
 * A compiled expression bound to its pattern engine, ready for matching.
 */
export type StepExpression = CompiledExpression & {
    readonly regexp: RegExp;

    /**
     * Matches the whole of `text`.
     *
     * @returns One argument per placeholder, or `null` when the text does not match
     */
    match: (text: string) => Argument[] | null;

    /** The source, JSON-quoted */
    toString: () => string;
};

/**
 * Result of `tryCompileExpression()`.
 */
export type CompileResult = { ok: true; expression: StepExpression } | { ok: false; error: ExpressionError };

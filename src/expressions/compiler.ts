/**
 * Expression compiler.
 *
 * Runs the five passes in a fixed order, each consuming the previous pass's output:
 *
 * 1. escape metacharacters
 * 2. optional groups `(text)` → `(?:text)?`
 * 3. alternations `a/b` → `(?:a|b)`
 * 4. placeholders `{name}` → capture groups
 * 5. anchors `^...$`
 *
 * Any failure aborts the whole compilation; there is no partially compiled result.
 *
 * @module compiler
 *
 * @example
 * const registry = createParameterTypeRegistry();
 * const expression = createStepExpression('I have {int} cuke(s)', registry);
 * expression.match('I have 42 cukes')?.map((a) => a.value) // → [42]
 */

import { isExpressionError } from '../errors.js';
import { buildArguments } from '../matching/arguments.js';
import { createTreeRegexp } from '../matching/tree-regexp.js';
import type { CompiledExpression, CompileResult, StepExpression } from '../types/expressions.js';
import type { CompileOptions } from '../types/options.js';
import type { ParameterTypeLookup } from '../types/parameters.js';
import { rewriteAlternations } from './alternation.js';
import { escapeExpressionText } from './escape.js';
import { rewriteOptionalGroups } from './optional.js';
import { substitutePlaceholders } from './placeholders.js';

/**
 * Final compilation pass: anchors the pattern so it must match the entire text.
 */
export const anchorPattern = (pattern: string): string => `^${pattern}$`;

/**
 * Compiles an expression into an anchored regex source and its ordered parameter types.
 *
 * @throws {ExpressionError} `optional_placeholder`, `alternative_placeholder`,
 * `naming_violation` or `undefined_parameter_type`
 *
 * @example
 * compileExpression('red/blue', registry).pattern // → '^(?:red|blue)$'
 */
export const compileExpression = (
    source: string,
    registry: ParameterTypeLookup,
    { logger }: CompileOptions = {},
): CompiledExpression => {
    const escaped = escapeExpressionText(source);
    logger?.debug?.('[compiler] escaped', { pattern: escaped });

    const withOptionals = rewriteOptionalGroups(escaped, source);
    logger?.debug?.('[compiler] optional groups', { pattern: withOptionals });

    const withAlternations = rewriteAlternations(withOptionals, source, logger);
    logger?.debug?.('[compiler] alternations', { pattern: withAlternations });

    const { pattern: substituted, parameterTypes } = substitutePlaceholders(withAlternations, registry, logger);
    logger?.debug?.('[compiler] placeholders', { parameterCount: parameterTypes.length, pattern: substituted });

    const pattern = anchorPattern(substituted);
    logger?.info?.('Compiled expression', { pattern, source });

    return Object.freeze({ parameterTypes: Object.freeze(parameterTypes), pattern, source });
};

/**
 * Compiles an expression and binds it to its pattern engine for matching.
 *
 * @throws {ExpressionError} for any compilation failure (see `compileExpression()`)
 * @throws {SyntaxError} when a parameter type's regexps make the pattern invalid
 */
export const createStepExpression = (
    source: string,
    registry: ParameterTypeLookup,
    options?: CompileOptions,
): StepExpression => {
    const compiled = compileExpression(source, registry, options);
    const treeRegexp = createTreeRegexp(compiled.pattern);

    return Object.freeze({
        ...compiled,
        match: (text: string) => buildArguments(treeRegexp, text, compiled.parameterTypes),
        regexp: treeRegexp.regexp,
        toString: () => JSON.stringify(source),
    });
};

/**
 * Non-throwing variant of `createStepExpression()`.
 *
 * Only compilation errors are captured; anything else still throws.
 *
 * @example
 * const result = tryCompileExpression('({int})', registry);
 * if (!result.ok) console.log(result.error.kind); // 'optional_placeholder'
 */
export const tryCompileExpression = (
    source: string,
    registry: ParameterTypeLookup,
    options?: CompileOptions,
): CompileResult => {
    try {
        return { expression: createStepExpression(source, registry, options), ok: true };
    } catch (error) {
        if (isExpressionError(error)) {
            return { error, ok: false };
        }
        throw error;
    }
};

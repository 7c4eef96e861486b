/**
 * step-expressions - Readable step-text expressions compiled to anchored regular expressions.
 *
 * Expressions use a small shorthand on top of literal text:
 * - `{name}` placeholders resolved through a parameter type registry
 * - `(text)` optional text
 * - `a/b/c` alternative words
 * - `\(`, `\{` and `\/` to keep those characters literal
 *
 * @packageDocumentation
 *
 * @example
 * import { createParameterTypeRegistry, createStepExpression } from 'step-expressions';
 *
 * const registry = createParameterTypeRegistry();
 * const expression = createStepExpression('I have {int} cucumber(s) in my belly/stomach', registry);
 *
 * expression.match('I have 42 cucumbers in my belly')?.map((arg) => arg.value); // → [42]
 * expression.match('I have many cucumbers');                                    // → null
 */

// ─────────────────────────────────────────────────────────────
// Compilation
// ─────────────────────────────────────────────────────────────

export { anchorPattern, compileExpression, createStepExpression, tryCompileExpression } from './expressions/compiler.js';
// Individual passes
export { rewriteAlternations, splitAlternatives } from './expressions/alternation.js';
export { escapeExpressionText } from './expressions/escape.js';
export { rewriteOptionalGroups } from './expressions/optional.js';
export type { SubstitutionResult } from './expressions/placeholders.js';
export { buildCaptureRegex, substitutePlaceholders } from './expressions/placeholders.js';

// ─────────────────────────────────────────────────────────────
// Parameter Types
// ─────────────────────────────────────────────────────────────

export {
    ANONYMOUS_PARAMETER_TYPE,
    BUILT_IN_PARAMETER_TYPES,
    FLOAT_PARAMETER_TYPE,
    INT_PARAMETER_TYPE,
    STRING_PARAMETER_TYPE,
    WORD_PARAMETER_TYPE,
} from './parameters/builtins.js';
export { checkParameterTypeName, isValidParameterTypeName, unescapeParameterTypeName } from './parameters/names.js';
export type { RegistryOptions } from './parameters/registry.js';
export { createParameterTypeRegistry } from './parameters/registry.js';

// ─────────────────────────────────────────────────────────────
// Matching
// ─────────────────────────────────────────────────────────────

export type { Argument } from './matching/arguments.js';
export { buildArguments } from './matching/arguments.js';
export type { Group, GroupNode, TreeRegexp } from './matching/tree-regexp.js';
export { buildGroupTree, createTreeRegexp, getGroupValues } from './matching/tree-regexp.js';

// ─────────────────────────────────────────────────────────────
// Errors & Types
// ─────────────────────────────────────────────────────────────

export type { ExpressionErrorDetails, ExpressionErrorKind } from './errors.js';
export {
    ExpressionError,
    isExpressionError,
    PARAMETER_TYPES_CANNOT_BE_ALTERNATIVE,
    PARAMETER_TYPES_CANNOT_BE_OPTIONAL,
} from './errors.js';
export type {
    CompiledExpression,
    CompileOptions,
    CompileResult,
    Logger,
    ParameterTransformer,
    ParameterType,
    ParameterTypeLookup,
    ParameterTypeRegistry,
    StepExpression,
} from './types/index.js';

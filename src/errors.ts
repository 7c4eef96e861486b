/**
 * Error taxonomy for expression compilation, parameter-type registration and
 * argument decoding.
 *
 * Every failure is an {@link ExpressionError} whose `kind` discriminates the
 * cause; structured details live on `details`, so callers never need to parse
 * `message`.
 *
 * @module errors
 */

export const PARAMETER_TYPES_CANNOT_BE_OPTIONAL = 'Parameter types cannot be optional: ';
export const PARAMETER_TYPES_CANNOT_BE_ALTERNATIVE = 'Parameter types cannot be alternative: ';

/**
 * Payload carried by each error kind.
 */
export type ExpressionErrorDetails = {
    /** A `{name}` placeholder sits inside a non-escaped optional group */
    optional_placeholder: { source: string };
    /** A `{name}` placeholder is one of the fragments of an alternation */
    alternative_placeholder: { source: string };
    /** The registry has no parameter type with this name */
    undefined_parameter_type: { typeName: string };
    /** The parameter name contains a regex metacharacter */
    naming_violation: { typeName: string; character: string };
    duplicate_parameter_type: { typeName: string };
    invalid_parameter_type: { typeName: string; reason: string };
    /** The match produced a different number of top-level groups than there are parameter types */
    argument_count_mismatch: { groupCount: number; typeCount: number };
};

export type ExpressionErrorKind = keyof ExpressionErrorDetails;

export class ExpressionError<K extends ExpressionErrorKind = ExpressionErrorKind> extends Error {
    readonly kind: K;
    readonly details: ExpressionErrorDetails[K];

    constructor(kind: K, message: string, details: ExpressionErrorDetails[K]) {
        super(message);
        this.name = 'ExpressionError';
        this.kind = kind;
        this.details = details;
    }
}

/**
 * Narrows an unknown thrown value to an {@link ExpressionError}, optionally of a given kind.
 *
 * @example
 * try { compileExpression('({int})', registry) } catch (e) {
 *   if (isExpressionError(e, 'optional_placeholder')) console.log(e.details.source);
 * }
 */
export const isExpressionError = <K extends ExpressionErrorKind>(
    error: unknown,
    kind?: K,
): error is ExpressionError<K> => {
    return error instanceof ExpressionError && (kind === undefined || error.kind === kind);
};

export const optionalPlaceholderError = (source: string) =>
    new ExpressionError('optional_placeholder', `${PARAMETER_TYPES_CANNOT_BE_OPTIONAL}${source}`, { source });

export const alternativePlaceholderError = (source: string) =>
    new ExpressionError('alternative_placeholder', `${PARAMETER_TYPES_CANNOT_BE_ALTERNATIVE}${source}`, { source });

export const undefinedParameterTypeError = (typeName: string) =>
    new ExpressionError('undefined_parameter_type', `Undefined parameter type {${typeName}}`, { typeName });

export const parameterNameError = (typeName: string, character: string) =>
    new ExpressionError('naming_violation', `Illegal character '${character}' in parameter name {${typeName}}`, {
        character,
        typeName,
    });

export const duplicateParameterTypeError = (typeName: string) =>
    new ExpressionError('duplicate_parameter_type', `There is already a parameter type with name ${typeName}`, {
        typeName,
    });

export const invalidParameterTypeError = (typeName: string, reason: string) =>
    new ExpressionError('invalid_parameter_type', `Invalid parameter type {${typeName}}: ${reason}`, {
        reason,
        typeName,
    });

export const argumentCountError = (groupCount: number, typeCount: number) =>
    new ExpressionError(
        'argument_count_mismatch',
        `Expression has ${groupCount} capture groups, but there were ${typeCount} parameter types`,
        { groupCount, typeCount },
    );

import { parameterNameError } from '../errors.js';

/** Characters a parameter name may not contain */
const ILLEGAL_PARAMETER_NAME_REGEX = /([[\]()$.|?*+])/;

/** A backslash the escaping pass put in front of a metacharacter */
const UNESCAPE_REGEX = /(\\([[$.|?*+\]]))/g;

/** Any backslash the escaping pass added, including before `^` and `\` */
const EXPRESSION_UNESCAPE_REGEX = /\\([\\^[$.|?*+\]])/g;

/**
 * Removes the escapes the first compilation pass added to a placeholder name,
 * giving the name as authored and as registered.
 *
 * @example
 * unescapeParameterTypeName('a\\^b') // → 'a^b'
 */
export const unescapeParameterTypeName = (typeName: string): string => typeName.replace(EXPRESSION_UNESCAPE_REGEX, '$1');

/**
 * Validates a parameter type name.
 *
 * Names reach the compiler after escaping, so escapes added by that pass are
 * removed before checking and before reporting the name.
 *
 * @throws {ExpressionError} `naming_violation` naming the first illegal character
 *
 * @example
 * checkParameterTypeName('color')   // ok
 * checkParameterTypeName('co\\.lor') // throws: Illegal character '.' in parameter name {co.lor}
 */
export const checkParameterTypeName = (typeName: string): void => {
    const unescapedTypeName = typeName.replace(UNESCAPE_REGEX, '$2');
    const illegal = ILLEGAL_PARAMETER_NAME_REGEX.exec(unescapedTypeName);
    if (illegal) {
        throw parameterNameError(unescapedTypeName, illegal[1]);
    }
};

/**
 * Whether `typeName` would pass {@link checkParameterTypeName}.
 */
export const isValidParameterTypeName = (typeName: string): boolean => {
    return !ILLEGAL_PARAMETER_NAME_REGEX.test(typeName.replace(UNESCAPE_REGEX, '$2'));
};

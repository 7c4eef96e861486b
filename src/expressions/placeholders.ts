/**
 * Fourth compilation pass: replaces `{name}` placeholders with capture groups.
 *
 * Runs after the optional-group and alternation passes, which only touch
 * parentheses and slashes, so escaped braces reach this pass intact.
 *
 * @module placeholders
 *
 * @example
 * substitutePlaceholders('I have {int} cukes', registry)
 * // → { pattern: 'I have ((?:-?\\d+)|(?:\\d+)) cukes', parameterTypes: [int] }
 */

import { undefinedParameterTypeError } from '../errors.js';
import { checkParameterTypeName, unescapeParameterTypeName } from '../parameters/names.js';
import type { Logger } from '../types/options.js';
import type { ParameterType, ParameterTypeLookup } from '../types/parameters.js';
import { DOUBLE_ESCAPE } from './escape.js';
import { PLACEHOLDER_REGEX } from './placeholder-form.js';

/**
 * Result of substituting every placeholder in an expression.
 */
export type SubstitutionResult = {
    /** The expression with placeholders replaced by capture groups */
    pattern: string;
    /** Resolved types, one per capture group, in source order */
    parameterTypes: ParameterType[];
};

/**
 * Builds the single capture group a parameter type occupies.
 *
 * @example
 * buildCaptureRegex(['\\d+'])          // → '(\\d+)'
 * buildCaptureRegex(['-?\\d+', '\\d+']) // → '((?:-?\\d+)|(?:\\d+))'
 */
export const buildCaptureRegex = (regexps: readonly string[]): string => {
    if (regexps.length === 1) {
        return `(${regexps[0]})`;
    }
    const alternatives = regexps.map((regexp) => `(?:${regexp})`);
    return `(${alternatives.join('|')})`;
};

/**
 * Replaces each `{name}` with its type's capture group.
 *
 * An escaped placeholder (`\{name}` as authored) becomes the literal text `{name}`
 * and is neither looked up nor captured.
 *
 * Names are looked up as authored, without the escapes the first pass added.
 *
 * @throws {ExpressionError} `naming_violation` for a malformed name
 * @throws {ExpressionError} `undefined_parameter_type` when the registry has no such type
 */
export const substitutePlaceholders = (
    expression: string,
    registry: ParameterTypeLookup,
    logger?: Logger,
): SubstitutionResult => {
    const parameterTypes: ParameterType[] = [];

    const pattern = expression.replace(PLACEHOLDER_REGEX, (_match, marker: string | undefined, name: string) => {
        if (marker === DOUBLE_ESCAPE) {
            return `\\{${name}\\}`;
        }

        const typeName = unescapeParameterTypeName(name);
        checkParameterTypeName(typeName);
        const parameterType = registry.lookupByTypeName(typeName);
        if (!parameterType) {
            throw undefinedParameterTypeError(typeName);
        }

        logger?.trace?.('[compiler] placeholder resolved', { index: parameterTypes.length, name: typeName });
        parameterTypes.push(parameterType);
        return buildCaptureRegex(parameterType.regexps);
    });

    return { parameterTypes, pattern };
};

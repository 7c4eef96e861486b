import { optionalPlaceholderError } from '../errors.js';
import { DOUBLE_ESCAPE } from './escape.js';
import { containsPlaceholder } from './placeholder-form.js';

/**
 * `(text)` optionally preceded by the double-escape marker.
 * Group 1 is the marker, group 2 the text.
 */
const OPTIONAL_REGEX = /(\\\\)?\(([^)]+)\)/g;

/**
 * Second compilation pass: turns `(text)` into the optional group `(?:text)?`.
 *
 * An escaped opening parenthesis (`\(` as authored, `\\(` after escaping) keeps
 * both parentheses literal so that `\(3)` matches the text `(3)`.
 *
 * @param expression - Output of `escapeExpressionText()`
 * @param source - The authored expression, used in error messages
 * @throws {ExpressionError} `optional_placeholder` when the optional text contains `{...}`
 *
 * @example
 * rewriteOptionalGroups('cup(s)', 'cup(s)')      // → 'cup(?:s)?'
 * rewriteOptionalGroups('\\\\(3)', '\\(3)')      // → '\\(3\\)'
 */
export const rewriteOptionalGroups = (expression: string, source: string): string => {
    return expression.replace(OPTIONAL_REGEX, (_match, marker: string | undefined, text: string) => {
        if (marker === DOUBLE_ESCAPE) {
            return `\\(${text}\\)`;
        }
        // A placeholder needs a capture in every match, so it cannot be optional
        if (containsPlaceholder(text)) {
            throw optionalPlaceholderError(source);
        }
        return `(?:${text})?`;
    });
};

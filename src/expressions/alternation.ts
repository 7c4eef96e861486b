import { alternativePlaceholderError } from '../errors.js';
import type { Logger } from '../types/options.js';
import { containsPlaceholder } from './placeholder-form.js';

/**
 * A run of non-whitespace text holding at least one `/`.
 * Runs are built from whole escape pairs (`\\x`), so the backslash the first
 * pass put before a metacharacter is never split from it. A bare `^` ends a run.
 */
const ALTERNATIVE_RUN_REGEX = /((?:\\.|[^\s\\^/])+)((\/(?:\\.|[^\s\\^/])+)+)/g;

/** A `/` that is not preceded by a backslash */
const SEPARATOR_REGEX = /(?<!\\)\//;

/** An authored `\/`, which reads `\\/` after escaping */
const ESCAPED_SLASH_REGEX = /\\\\\//g;

/**
 * Splits an alternation run into its fragments, turning escaped slashes back into plain `/`.
 *
 * @example
 * splitAlternatives('red/blue')     // → ['red', 'blue']
 * splitAlternatives('and\\\\/or')   // → ['and/or']
 */
export const splitAlternatives = (run: string): string[] => {
    return run.split(SEPARATOR_REGEX).map((fragment) => fragment.replace(ESCAPED_SLASH_REGEX, '/'));
};

/**
 * Third compilation pass: turns `a/b/c` into the alternation `(?:a|b|c)`.
 *
 * A run whose slashes are all escaped is a single fragment and is emitted as
 * literal text with its slashes unescaped.
 *
 * @param expression - Output of `rewriteOptionalGroups()`
 * @param source - The authored expression, used in error messages
 * @throws {ExpressionError} `alternative_placeholder` when any fragment contains `{...}`
 *
 * @example
 * rewriteAlternations('belly/stomach', 'belly/stomach') // → '(?:belly|stomach)'
 */
export const rewriteAlternations = (expression: string, source: string, logger?: Logger): string => {
    return expression.replace(ALTERNATIVE_RUN_REGEX, (run: string) => {
        const fragments = splitAlternatives(run);

        if (fragments.length === 1) {
            logger?.warn?.('[compiler] alternation without separators kept literal', { run });
            return fragments[0];
        }

        if (fragments.some(containsPlaceholder)) {
            throw alternativePlaceholderError(source);
        }

        return `(?:${fragments.join('|')})`;
    });
};

/**
 * Built-in parameter types available in every registry.
 *
 * @module builtins
 */

import type { ParameterType } from '../types/parameters.js';

const INTEGER_REGEXPS = ['-?\\d+', '\\d+'];
const FLOAT_REGEXP = '-?\\d*\\.\\d+';
const WORD_REGEXP = '[^\\s]+';
// Group 1 (or 3) holds the text between the quotes
const DOUBLE_QUOTED_REGEXP = '"([^"\\\\]*(\\\\.[^"\\\\]*)*)"';
const SINGLE_QUOTED_REGEXP = "'([^'\\\\]*(\\\\.[^'\\\\]*)*)'";
const ANONYMOUS_REGEXP = '.*';

const unescapeQuotes = (s: string): string => s.replace(/\\"/g, '"').replace(/\\'/g, "'");

/**
 * `{int}` matches optionally signed whole numbers.
 *
 * @example 'I have {int} cukes' matches 'I have -3 cukes' → -3
 */
export const INT_PARAMETER_TYPE: ParameterType<number> = {
    name: 'int',
    regexps: INTEGER_REGEXPS,
    transformer: (s) => Number.parseInt(s, 10),
};

/**
 * `{float}` matches decimals with a fractional part.
 *
 * @example '{float} litres' matches '.5 litres' → 0.5
 */
export const FLOAT_PARAMETER_TYPE: ParameterType<number> = {
    name: 'float',
    regexps: [FLOAT_REGEXP],
    transformer: (s) => Number.parseFloat(s),
};

/**
 * `{word}` matches one run of non-whitespace characters.
 */
export const WORD_PARAMETER_TYPE: ParameterType<string> = {
    name: 'word',
    regexps: [WORD_REGEXP],
};

/**
 * `{string}` matches double- or single-quoted text and yields it without the quotes.
 *
 * @example 'I say {string}' matches 'I say "it\'s \\"fine\\""' → 'it\'s "fine"'
 */
export const STRING_PARAMETER_TYPE: ParameterType<string> = {
    name: 'string',
    regexps: [DOUBLE_QUOTED_REGEXP, SINGLE_QUOTED_REGEXP],
    // Only the group of the quote style that matched has a value
    transformer: (s = '') => unescapeQuotes(s),
};

/**
 * `{}` matches anything.
 */
export const ANONYMOUS_PARAMETER_TYPE: ParameterType<string> = {
    name: '',
    regexps: [ANONYMOUS_REGEXP],
};

export const BUILT_IN_PARAMETER_TYPES: readonly ParameterType[] = [
    INT_PARAMETER_TYPE,
    FLOAT_PARAMETER_TYPE,
    WORD_PARAMETER_TYPE,
    STRING_PARAMETER_TYPE,
    ANONYMOUS_PARAMETER_TYPE,
];

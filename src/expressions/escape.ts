/**
 * First compilation pass: escapes regex metacharacters in authored text.
 *
 * `(`, `)`, `{` and `}` are deliberately left alone because the optional-group
 * and placeholder passes give them meaning. After this pass every backslash the
 * author typed appears doubled (`\\`), which is the marker later passes use to
 * recognise an escaped `(`, `{` or `/`.
 *
 * @module escape
 */

const ESCAPE_REGEX = /([\\^[$.|?*+\]])/g;

/**
 * The two characters an authored `\` turns into after escaping.
 */
export const DOUBLE_ESCAPE = '\\\\';

/**
 * Escapes `\ ^ [ $ . | ? * + ]` with a backslash.
 *
 * @example
 * escapeExpressionText('a.b')        // → 'a\\.b'
 * escapeExpressionText('cost $5?')   // → 'cost \\$5\\?'
 * escapeExpressionText('cup(s)')     // → 'cup(s)' (parentheses untouched)
 */
export const escapeExpressionText = (expression: string): string => expression.replace(ESCAPE_REGEX, '\\$1');

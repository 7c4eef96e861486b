/**
 * `{name}` optionally preceded by the double-escape marker.
 * Group 1 is the marker, group 2 the name.
 */
export const PLACEHOLDER_REGEX = /(\\\\)?\{([^}]*)\}/g;

const PLACEHOLDER_PRESENCE = /\{[^}]*\}/;

/**
 * Whether `text` contains a `{...}` form, escaped or not.
 */
export const containsPlaceholder = (text: string): boolean => PLACEHOLDER_PRESENCE.test(text);

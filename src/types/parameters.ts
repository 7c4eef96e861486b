/**
 * Converts the strings captured for a parameter into its typed value.
 *
 * Receives the values of the parameter's nested capture groups when its
 * regexps contain any, otherwise the text matched by the whole parameter.
 */
export type ParameterTransformer<T = unknown> = (...captures: string[]) => T;

/**
 * A named parameter type usable as `{name}` inside an expression.
 *
 * @example
 * const color: ParameterType<string> = {
 *   name: 'color',
 *   regexps: ['red', 'blue', 'yellow'],
 *   transformer: (s) => s.toUpperCase(),
 * };
 */
export type ParameterType<T = unknown> = {
    /** Name used between braces; the empty string is the anonymous type `{}` */
    name: string;

    /**
     * Alternative regex sources, in order of preference. Must not be empty.
     * Several sources compile to `((?:a)|(?:b))` so the parameter still occupies one capture slot.
     */
    regexps: readonly string[];

    /** When omitted, the first captured string is the value */
    transformer?: ParameterTransformer<T>;
};

/**
 * Lookup surface the compiler needs from a registry.
 */
export type ParameterTypeLookup = {
    lookupByTypeName: (name: string) => ParameterType | undefined;
};

/**
 * A mutable set of parameter types keyed by name.
 */
export type ParameterTypeRegistry = ParameterTypeLookup & {
    /** Registers a type, rejecting invalid names, empty regexps and duplicate names */
    defineParameterType: <T>(parameterType: ParameterType<T>) => void;
    /** All registered types in definition order */
    readonly parameterTypes: readonly ParameterType[];
};

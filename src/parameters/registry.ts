import { duplicateParameterTypeError, invalidParameterTypeError } from '../errors.js';
import type { ParameterType, ParameterTypeRegistry } from '../types/parameters.js';
import { BUILT_IN_PARAMETER_TYPES } from './builtins.js';
import { checkParameterTypeName } from './names.js';

/**
 * Options for `createParameterTypeRegistry()`.
 */
export type RegistryOptions = {
    /** Register `int`, `float`, `word`, `string` and `{}`. Defaults to `true`. */
    includeBuiltIns?: boolean;
};

/**
 * Creates a registry of parameter types keyed by name.
 *
 * @example
 * const registry = createParameterTypeRegistry();
 * registry.defineParameterType({ name: 'color', regexps: ['red|blue|yellow'] });
 * registry.lookupByTypeName('color')?.regexps // → ['red|blue|yellow']
 */
export const createParameterTypeRegistry = ({ includeBuiltIns = true }: RegistryOptions = {}): ParameterTypeRegistry => {
    const typesByName = new Map<string, ParameterType>();

    const defineParameterType = <T>(parameterType: ParameterType<T>): void => {
        const { name, regexps } = parameterType;
        checkParameterTypeName(name);
        if (regexps.length === 0) {
            throw invalidParameterTypeError(name, 'at least one regexp is required');
        }
        if (typesByName.has(name)) {
            throw duplicateParameterTypeError(name);
        }
        typesByName.set(name, parameterType);
    };

    if (includeBuiltIns) {
        for (const parameterType of BUILT_IN_PARAMETER_TYPES) {
            defineParameterType(parameterType);
        }
    }

    return {
        defineParameterType,
        lookupByTypeName: (name) => typesByName.get(name),
        get parameterTypes() {
            return [...typesByName.values()];
        },
    };
};

import { argumentCountError } from '../errors.js';
import type { ParameterType } from '../types/parameters.js';
import { getGroupValues, type Group, type TreeRegexp } from './tree-regexp.js';

/**
 * One decoded placeholder of a successful match.
 */
export type Argument = {
    /** The capture group the placeholder occupied */
    group: Group;
    parameterType: ParameterType;
    /** Result of the type's transformer, or the captured text when it has none */
    value: unknown;
};

const transform = (parameterType: ParameterType, group: Group): unknown => {
    const values = getGroupValues(group);
    if (!parameterType.transformer) {
        return values[0];
    }
    return parameterType.transformer(...values);
};

/**
 * Matches `text` and decodes one argument per top-level capture group.
 *
 * @param parameterTypes - Types in capture-group order, as produced by the compiler
 * @returns `null` when the text does not match
 * @throws {ExpressionError} `argument_count_mismatch` when groups and types disagree
 *
 * @example
 * buildArguments(createTreeRegexp('^I have (\\d+) cukes$'), 'I have 7 cukes', [INT_PARAMETER_TYPE])
 * // → [{ group: { value: '7', start: 7, end: 8, children: [] }, parameterType: int, value: 7 }]
 */
export const buildArguments = (
    treeRegexp: TreeRegexp,
    text: string,
    parameterTypes: readonly ParameterType[],
): Argument[] | null => {
    const match = treeRegexp.match(text);
    if (!match) {
        return null;
    }

    const argumentGroups = match.children;
    if (argumentGroups.length !== parameterTypes.length) {
        throw argumentCountError(argumentGroups.length, parameterTypes.length);
    }

    return parameterTypes.map((parameterType, i) => {
        const group = argumentGroups[i];
        return { group, parameterType, value: transform(parameterType, group) };
    });
};

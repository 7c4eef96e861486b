import { describe, expect, it } from 'vitest';

import { INT_PARAMETER_TYPE } from './builtins.js';
import { createParameterTypeRegistry } from './registry.js';

describe('createParameterTypeRegistry', () => {
    it('should register the built-in types by default', () => {
        const registry = createParameterTypeRegistry();
        expect(registry.parameterTypes.map((t) => t.name)).toEqual(['int', 'float', 'word', 'string', '']);
        expect(registry.lookupByTypeName('int')).toBe(INT_PARAMETER_TYPE);
    });

    it('should start empty when built-ins are excluded', () => {
        const registry = createParameterTypeRegistry({ includeBuiltIns: false });
        expect(registry.parameterTypes).toEqual([]);
        expect(registry.lookupByTypeName('int')).toBeUndefined();
    });

    it('should look up a defined type by name', () => {
        const registry = createParameterTypeRegistry();
        const color = { name: 'color', regexps: ['red', 'blue'] };
        registry.defineParameterType(color);
        expect(registry.lookupByTypeName('color')).toBe(color);
    });

    it('should reject a duplicate name', () => {
        const registry = createParameterTypeRegistry();
        expect(() => registry.defineParameterType({ name: 'int', regexps: ['\\d'] })).toThrow(
            'There is already a parameter type with name int',
        );
    });

    it('should reject a type without regexps', () => {
        const registry = createParameterTypeRegistry();
        expect(() => registry.defineParameterType({ name: 'nothing', regexps: [] })).toThrow(
            'Invalid parameter type {nothing}: at least one regexp is required',
        );
    });

    it('should reject an illegal name', () => {
        const registry = createParameterTypeRegistry();
        expect(() => registry.defineParameterType({ name: 'co.lor', regexps: ['x'] })).toThrow(
            "Illegal character '.' in parameter name {co.lor}",
        );
        expect(registry.lookupByTypeName('co.lor')).toBeUndefined();
    });
});

import { describe, expect, it, vi } from 'vitest';

import { captureError } from '../../testing/capture-error.js';
import { buildGroupTree } from '../matching/tree-regexp.js';
import { createParameterTypeRegistry } from '../parameters/registry.js';
import { anchorPattern, compileExpression, createStepExpression, tryCompileExpression } from './compiler.js';

const values = (expression: string, text: string) => {
    const registry = createParameterTypeRegistry();
    return createStepExpression(expression, registry)
        .match(text)
        ?.map((arg) => arg.value);
};

describe('anchorPattern', () => {
    it('should wrap the pattern in start and end anchors', () => {
        expect(anchorPattern('a|b')).toBe('^a|b$');
    });
});

describe('compileExpression', () => {
    const registry = createParameterTypeRegistry();

    it('should only escape and anchor plain text', () => {
        expect(compileExpression('hello world', registry).pattern).toBe('^hello world$');
        expect(compileExpression('Is it $5.00?', registry).pattern).toBe('^Is it \\$5\\.00\\?$');
    });

    it('should compile optional groups, alternations and placeholders together', () => {
        const compiled = compileExpression('I have {int} cucumber(s) in my belly/stomach', registry);
        expect(compiled.pattern).toBe('^I have ((?:-?\\d+)|(?:\\d+)) cucumber(?:s)? in my (?:belly|stomach)$');
        expect(compiled.parameterTypes.map((t) => t.name)).toEqual(['int']);
    });

    it('should produce one top-level capture group per placeholder, in source order', () => {
        const cases: [string, string[]][] = [
            ['none', []],
            ['I have {int} cups', ['int']],
            ['{int} and {string}', ['int', 'string']],
            ['{word} says {string} to {} about {float} cup(s) of tea/coffee', ['word', 'string', '', 'float']],
        ];
        for (const [source, names] of cases) {
            const { parameterTypes, pattern } = createStepExpression(source, registry);
            expect(parameterTypes.map((t) => t.name)).toEqual(names);
            expect(buildGroupTree(pattern).children).toHaveLength(names.length);
        }
    });

    it('should keep an escaped metacharacter whole inside an alternation', () => {
        const expression = createStepExpression('a/b^', registry);
        expect(expression.pattern).toBe('^(?:a|b\\^)$');
        expect(expression.match('a')).toEqual([]);
        expect(expression.match('b^')).toEqual([]);

        const withSuffix = createStepExpression('a/b^c', registry);
        expect(withSuffix.match('b^c')).toEqual([]);
        expect(withSuffix.match('b')).toBeNull();
    });

    it('should look up names containing escaped characters as authored', () => {
        const custom = createParameterTypeRegistry();
        custom.defineParameterType({ name: 'a^b', regexps: ['x+'] });
        custom.defineParameterType({ name: 'c\\d', regexps: ['y+'] });

        const compiled = compileExpression('{a^b} {c\\d}', custom);
        expect(compiled.pattern).toBe('^(x+) (y+)$');
        expect(compiled.parameterTypes.map((t) => t.name)).toEqual(['a^b', 'c\\d']);
    });

    it('should report an undefined name without the added escapes', () => {
        expect(captureError(() => compileExpression('{x^y}', registry))).toMatchObject({
            details: { typeName: 'x^y' },
            kind: 'undefined_parameter_type',
            message: 'Undefined parameter type {x^y}',
        });
    });

    it('should keep literal parentheses after an escaped opening parenthesis', () => {
        expect(compileExpression('\\(3)', registry).pattern).toBe('^\\(3\\)$');
    });

    it('should keep literal braces after an escaped opening brace', () => {
        const compiled = compileExpression('\\{int}', registry);
        expect(compiled.pattern).toBe('^\\{int\\}$');
        expect(compiled.parameterTypes).toEqual([]);
    });

    it('should freeze the result', () => {
        const compiled = compileExpression('{int}', registry);
        expect(Object.isFrozen(compiled)).toBe(true);
        expect(Object.isFrozen(compiled.parameterTypes)).toBe(true);
    });

    it('should give structurally equal output for the same source', () => {
        const source = 'I have {int} cucumber(s) in my belly/stomach';
        expect(compileExpression(source, registry)).toEqual(compileExpression(source, registry));
    });

    it('should reject an optional placeholder', () => {
        expect(captureError(() => compileExpression('({int})', registry))).toMatchObject({
            details: { source: '({int})' },
            kind: 'optional_placeholder',
            message: 'Parameter types cannot be optional: ({int})',
        });
    });

    it('should reject an alternative placeholder', () => {
        expect(captureError(() => compileExpression('red/{int}', registry))).toMatchObject({
            kind: 'alternative_placeholder',
            message: 'Parameter types cannot be alternative: red/{int}',
        });
    });

    it('should reject an undefined placeholder type', () => {
        expect(captureError(() => compileExpression('{unknown}', registry))).toMatchObject({
            details: { typeName: 'unknown' },
            kind: 'undefined_parameter_type',
            message: 'Undefined parameter type {unknown}',
        });
    });

    it('should log each pass and the finished compilation', () => {
        const logger = { debug: vi.fn(), info: vi.fn() };
        compileExpression('a', registry, { logger });
        expect(logger.debug).toHaveBeenCalledTimes(4);
        expect(logger.debug).toHaveBeenNthCalledWith(1, '[compiler] escaped', { pattern: 'a' });
        expect(logger.info).toHaveBeenCalledWith('Compiled expression', { pattern: '^a$', source: 'a' });
    });
});

describe('createStepExpression', () => {
    it('should match with and without the optional text', () => {
        expect(values('I have 1 cup(s)', 'I have 1 cup')).toEqual([]);
        expect(values('I have 1 cup(s)', 'I have 1 cups')).toEqual([]);
        expect(values('I have 1 cup(s)', 'I have 1 cupss')).toBeUndefined();
    });

    it('should match literal parentheses instead of an optional group', () => {
        expect(values('\\(3)', '(3)')).toEqual([]);
        expect(values('\\(3)', '3')).toBeUndefined();
    });

    it('should match exactly one alternative', () => {
        expect(values('red/blue/green', 'red')).toEqual([]);
        expect(values('red/blue/green', 'green')).toEqual([]);
        expect(values('red/blue/green', 'red/blue')).toBeUndefined();
        expect(values('red/blue/green', 'purple')).toBeUndefined();
    });

    it('should match escaped metacharacters literally', () => {
        expect(values('Is it $5.00?', 'Is it $5.00?')).toEqual([]);
        expect(values('Is it $5.00?', 'Is it $5X00')).toBeUndefined();
    });

    it('should match an escaped slash literally', () => {
        expect(values('and\\/or', 'and/or')).toEqual([]);
    });

    it('should decode built-in types', () => {
        expect(values('I have {int} cups', 'I have -3 cups')).toEqual([-3]);
        expect(values('{float} litres', '.5 litres')).toEqual([0.5]);
        expect(values('I have {int} {word} in {string}', 'I have 2 apples in "the basket"')).toEqual([
            2,
            'apples',
            'the basket',
        ]);
        expect(values('I see {}', 'I see anything here')).toEqual(['anything here']);
    });

    it('should decode several placeholders including one with nested groups', () => {
        expect(values('{int} and {string}', '3 and "x"')).toEqual([3, 'x']);
    });

    it('should unescape quotes in strings', () => {
        expect(values('I say {string}', 'I say "it\'s \\"fine\\""')).toEqual(['it\'s "fine"']);
        expect(values('I say {string}', "I say 'hi'")).toEqual(['hi']);
        expect(values('I say {string}', 'I say ""')).toEqual(['']);
    });

    it('should match the whole text only', () => {
        expect(values('I have {int} cups', 'I have 3 cups today')).toBeUndefined();
    });

    it('should use custom types from the registry', () => {
        const registry = createParameterTypeRegistry();
        registry.defineParameterType({
            name: 'color',
            regexps: ['red', 'blue'],
            transformer: (s) => s.toUpperCase(),
        });
        const expression = createStepExpression('{color} car', registry);
        expect(expression.pattern).toBe('^((?:red)|(?:blue)) car$');
        expect(expression.match('blue car')?.map((arg) => arg.value)).toEqual(['BLUE']);
    });

    it('should expose the quoted source and the compiled regexp', () => {
        const expression = createStepExpression('I have {int} cukes', createParameterTypeRegistry());
        expect(expression.toString()).toBe('"I have {int} cukes"');
        expect(expression.source).toBe('I have {int} cukes');
        expect(expression.regexp.source).toBe('^I have ((?:-?\\d+)|(?:\\d+)) cukes$');
    });
});

describe('tryCompileExpression', () => {
    const registry = createParameterTypeRegistry();

    it('should return the expression on success', () => {
        const result = tryCompileExpression('{int}', registry);
        expect(result.ok).toBe(true);
    });

    it('should return the error instead of throwing', () => {
        const result = tryCompileExpression('({int})', registry);
        expect(result).toMatchObject({ error: { kind: 'optional_placeholder' }, ok: false });
    });

    it('should still throw errors that are not compilation errors', () => {
        const throwing = {
            lookupByTypeName: () => {
                throw new TypeError('registry unavailable');
            },
        };
        expect(() => tryCompileExpression('{int}', throwing)).toThrow(TypeError);
    });
});

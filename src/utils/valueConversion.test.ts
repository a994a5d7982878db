import { describe, expect, it } from 'vitest';
import type { Value } from './types';
import { getValueType, isTruthy, valuesEqual, valueToLiteral, valueToString } from './valueConversion';

describe('isTruthy', () => {
    it('treats empty and zero values as false', () => {
        const falsy: Value[] = [false, null, 0, '', [], {}];
        for (const value of falsy) {
            expect(isTruthy(value)).toBe(false);
        }
    });

    it('treats everything else as true', () => {
        const truthy: Value[] = [true, -1, 0.5, '0', [0], { a: null }];
        for (const value of truthy) {
            expect(isTruthy(value)).toBe(true);
        }
    });
});

describe('valueToString', () => {
    it('prints top-level strings raw and nested strings quoted', () => {
        expect(valueToString('hi')).toBe('hi');
        expect(valueToString(['hi', 1])).toBe('["hi", 1]');
        expect(valueToString({ k: 'v', n: [true, null] })).toBe('{"k": "v", "n": [true, null]}');
    });

    it('prints integers without a fraction', () => {
        expect(valueToString(7)).toBe('7');
        expect(valueToString(2.5)).toBe('2.5');
        expect(valueToString(Infinity)).toBe('inf');
    });

    it('quotes only strings in literal form', () => {
        expect(valueToLiteral('a"b')).toBe('"a\\"b"');
        expect(valueToLiteral(3)).toBe('3');
    });
});

describe('valuesEqual', () => {
    it('compares lists and dicts structurally', () => {
        expect(valuesEqual([1, { a: [2] }], [1, { a: [2] }])).toBe(true);
        expect(valuesEqual({ a: 1 }, { a: 1, b: 2 })).toBe(false);
        expect(valuesEqual([1], ['1'])).toBe(false);
    });
});

describe('getValueType', () => {
    it('separates int from float', () => {
        expect(getValueType(3)).toBe('int');
        expect(getValueType(3.25)).toBe('float');
        expect(getValueType([])).toBe('list');
    });
});

/**
 * Value conversion and type checking utilities for Claro
 */

import type { Value, ValueMap, ValueType } from './types';

export function isList(value: Value): value is Value[] {
    return Array.isArray(value);
}

export function isDict(value: Value): value is ValueMap {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Check if a value is truthy according to Claro rules
 * (false, null, 0, "", [] and {} are falsy)
 */
export function isTruthy(val: Value): boolean {
    if (val === null) {
        return false;
    }
    if (typeof val === 'number') {
        return val !== 0 && !isNaN(val);
    }
    if (typeof val === 'string') {
        return val.length > 0;
    }
    if (typeof val === 'boolean') {
        return val;
    }
    if (isList(val)) {
        return val.length > 0;
    }
    return Object.keys(val).length > 0;
}

/**
 * Get the type name of a value, as reported by the `type` builtin and in error messages
 */
export function getValueType(value: Value): ValueType {
    if (value === null) {
        return 'null';
    }
    if (typeof value === 'string') {
        return 'string';
    }
    if (typeof value === 'number') {
        return Number.isInteger(value) ? 'int' : 'float';
    }
    if (typeof value === 'boolean') {
        return 'boolean';
    }
    if (isList(value)) {
        return 'list';
    }
    return 'dict';
}

function formatNumber(val: number): string {
    if (Number.isNaN(val)) return 'nan';
    if (val === Infinity) return 'inf';
    if (val === -Infinity) return '-inf';
    return String(val);
}

/**
 * Literal form of a value, used for elements nested inside lists and dicts
 */
export function valueToLiteral(val: Value): string {
    if (typeof val === 'string') {
        return JSON.stringify(val);
    }
    return valueToString(val);
}

/**
 * Display form of a value, used by PRINT, STRING and str()
 */
export function valueToString(val: Value): string {
    if (val === null) {
        return 'null';
    }
    if (typeof val === 'string') {
        return val;
    }
    if (typeof val === 'number') {
        return formatNumber(val);
    }
    if (typeof val === 'boolean') {
        return val ? 'true' : 'false';
    }
    if (isList(val)) {
        return '[' + val.map(valueToLiteral).join(', ') + ']';
    }
    const entries = Object.entries(val).map(([key, item]) => `${JSON.stringify(key)}: ${valueToLiteral(item)}`);
    return '{' + entries.join(', ') + '}';
}

/**
 * Structural equality used by ==, != and `in`
 */
export function valuesEqual(a: Value, b: Value): boolean {
    if (isList(a) && isList(b)) {
        return a.length === b.length && a.every((item, i) => valuesEqual(item, b[i]));
    }
    if (isDict(a) && isDict(b)) {
        const keysA = Object.keys(a);
        const keysB = Object.keys(b);
        if (keysA.length !== keysB.length) {
            return false;
        }
        return keysA.every(key => Object.prototype.hasOwnProperty.call(b, key) && valuesEqual(a[key], b[key]));
    }
    return a === b;
}


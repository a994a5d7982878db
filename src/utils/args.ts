/**
 * Argument checking utilities for builtin modules
 */

import type { Value } from './types';
import { getValueType } from './valueConversion';

/**
 * Throw unless the builtin received between min and max arguments (max defaults to min)
 *
 * @example
 * ```typescript
 * export const MyFunctions: Record<string, BuiltinHandler> = {
 *   twice: (args) => {
 *     expectArgCount('twice', args, 1);
 *     return expectNumber('twice', args[0]) * 2;
 *   }
 * };
 * ```
 */
export function expectArgCount(fnName: string, args: Value[], min: number, max: number = min): void {
    if (args.length < min || args.length > max) {
        const expected = min === max ? `${min}` : `${min} to ${max}`;
        throw new Error(`${fnName}() takes ${expected} argument(s), got ${args.length}`);
    }
}

export function expectNumber(fnName: string, value: Value): number {
    if (typeof value !== 'number') {
        throw new Error(`${fnName}() expects a number, got ${getValueType(value)}`);
    }
    return value;
}

export function expectInteger(fnName: string, value: Value): number {
    const num = expectNumber(fnName, value);
    if (!Number.isInteger(num)) {
        throw new Error(`${fnName}() expects an integer, got ${num}`);
    }
    return num;
}

export function expectString(fnName: string, value: Value): string {
    if (typeof value !== 'string') {
        throw new Error(`${fnName}() expects a string, got ${getValueType(value)}`);
    }
    return value;
}

import type { BuiltinHandler, ModuleAdapter } from '../types/Environment.type';
import type { Value } from '../utils';
import { getValueType, isDict, isList, valueToString } from '../utils';
import { expectArgCount, expectNumber, expectInteger } from '../utils/args';

/**
 * Core module for Claro
 * Provides conversions and collection helpers callable from any expression: len, str, int, range, ...
 */

function toNumber(value: Value, fnName: string, integer: boolean): number {
    if (typeof value === 'number') {
        return integer ? Math.trunc(value) : value;
    }
    if (typeof value === 'boolean') {
        return value ? 1 : 0;
    }
    if (typeof value === 'string') {
        const trimmed = value.trim();
        const parsed = integer && /^[+-]?\d+$/.test(trimmed) ? parseInt(trimmed, 10) : Number(trimmed);
        if (trimmed === '' || isNaN(parsed)) {
            throw new Error(`${fnName}() cannot convert '${value}'`);
        }
        return integer ? Math.trunc(parsed) : parsed;
    }
    throw new Error(`${fnName}() cannot convert a ${getValueType(value)}`);
}

/**
 * min(3, 1) and min([3, 1]) both work
 */
function spreadSingleList(args: Value[]): Value[] {
    const first = args[0];
    return args.length === 1 && isList(first) ? first : args;
}

export const CoreFunctions: Record<string, BuiltinHandler> = {
    len: (args) => {
        expectArgCount('len', args, 1);
        const value = args[0];
        if (typeof value === 'string' || isList(value)) {
            return value.length;
        }
        if (isDict(value)) {
            return Object.keys(value).length;
        }
        throw new Error(`len() is not defined for ${getValueType(value)}`);
    },

    str: (args) => {
        expectArgCount('str', args, 1);
        return valueToString(args[0]);
    },

    int: (args) => {
        expectArgCount('int', args, 1);
        return toNumber(args[0], 'int', true);
    },

    float: (args) => {
        expectArgCount('float', args, 1);
        return toNumber(args[0], 'float', false);
    },

    bool: (args) => {
        expectArgCount('bool', args, 1);
        const value = args[0];
        if (value === null || value === false || value === 0 || value === '') return false;
        if (isList(value)) return value.length > 0;
        if (isDict(value)) return Object.keys(value).length > 0;
        return true;
    },

    type: (args) => {
        expectArgCount('type', args, 1);
        return getValueType(args[0]);
    },

    range: (args) => {
        expectArgCount('range', args, 1, 3);
        const [start, stop] = args.length === 1
            ? [0, expectInteger('range', args[0])]
            : [expectInteger('range', args[0]), expectInteger('range', args[1])];
        const step = args.length === 3 ? expectInteger('range', args[2]) : 1;
        if (step === 0) {
            throw new Error('range() step must not be zero');
        }
        const result: Value[] = [];
        for (let i = start; step > 0 ? i < stop : i > stop; i += step) {
            result.push(i);
        }
        return result;
    },

    keys: (args) => {
        expectArgCount('keys', args, 1);
        const value = args[0];
        if (!isDict(value)) {
            throw new Error(`keys() expects a dict, got ${getValueType(value)}`);
        }
        return Object.keys(value);
    },

    values: (args) => {
        expectArgCount('values', args, 1);
        const value = args[0];
        if (!isDict(value)) {
            throw new Error(`values() expects a dict, got ${getValueType(value)}`);
        }
        return Object.values(value);
    },

    append: (args) => {
        expectArgCount('append', args, 2);
        const list = args[0];
        if (!isList(list)) {
            throw new Error(`append() expects a list, got ${getValueType(list)}`);
        }
        return [...list, args[1]];
    },

    abs: (args) => {
        expectArgCount('abs', args, 1);
        return Math.abs(expectNumber('abs', args[0]));
    },

    min: (args) => {
        const numbers = spreadSingleList(args).map(arg => expectNumber('min', arg));
        if (numbers.length === 0) {
            throw new Error('min() needs at least one number');
        }
        return Math.min(...numbers);
    },

    max: (args) => {
        const numbers = spreadSingleList(args).map(arg => expectNumber('max', arg));
        if (numbers.length === 0) {
            throw new Error('max() needs at least one number');
        }
        return Math.max(...numbers);
    },

    round: (args) => {
        expectArgCount('round', args, 1, 2);
        const value = expectNumber('round', args[0]);
        const digits = args.length === 2 ? expectInteger('round', args[1]) : 0;
        const factor = Math.pow(10, digits);
        return Math.round(value * factor) / factor;
    }
};

const CoreModule: ModuleAdapter = {
    name: 'core',
    functions: CoreFunctions,
    global: true
};

export default CoreModule;

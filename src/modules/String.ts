import type { BuiltinHandler, ModuleAdapter } from '../types/Environment.type';
import { isList, valueToString } from '../utils';
import { expectArgCount, expectString } from '../utils/args';

/**
 * String module for Claro
 * Called with the module prefix: string.upper(name), string.format("{} + {}", a, b)
 */

export const StringFunctions: Record<string, BuiltinHandler> = {
    upper: (args) => {
        expectArgCount('string.upper', args, 1);
        return expectString('string.upper', args[0]).toUpperCase();
    },

    lower: (args) => {
        expectArgCount('string.lower', args, 1);
        return expectString('string.lower', args[0]).toLowerCase();
    },

    trim: (args) => {
        expectArgCount('string.trim', args, 1);
        return expectString('string.trim', args[0]).trim();
    },

    split: (args) => {
        expectArgCount('string.split', args, 1, 2);
        const str = expectString('string.split', args[0]);
        if (args.length === 1) {
            return str.split(/\s+/).filter(part => part.length > 0);
        }
        return str.split(expectString('string.split', args[1]));
    },

    join: (args) => {
        expectArgCount('string.join', args, 2);
        const list = args[0];
        if (!isList(list)) {
            throw new Error('string.join() expects a list as its first argument');
        }
        return list.map(valueToString).join(expectString('string.join', args[1]));
    },

    replace: (args) => {
        expectArgCount('string.replace', args, 3);
        const str = expectString('string.replace', args[0]);
        const search = expectString('string.replace', args[1]);
        const replacement = expectString('string.replace', args[2]);
        return str.split(search).join(replacement);
    },

    contains: (args) => {
        expectArgCount('string.contains', args, 2);
        return expectString('string.contains', args[0]).includes(expectString('string.contains', args[1]));
    },

    startswith: (args) => {
        expectArgCount('string.startswith', args, 2);
        return expectString('string.startswith', args[0]).startsWith(expectString('string.startswith', args[1]));
    },

    endswith: (args) => {
        expectArgCount('string.endswith', args, 2);
        return expectString('string.endswith', args[0]).endsWith(expectString('string.endswith', args[1]));
    },

    /**
     * Replace each {} placeholder with the display form of the next argument
     */
    format: (args) => {
        if (args.length === 0) {
            throw new Error('string.format() needs a template');
        }
        const template = expectString('string.format', args[0]);
        const values = args.slice(1);
        let next = 0;
        return template.replace(/\{\}/g, () => {
            if (next >= values.length) {
                throw new Error('string.format() has more placeholders than arguments');
            }
            return valueToString(values[next++]);
        });
    }
};

const StringModule: ModuleAdapter = {
    name: 'string',
    functions: StringFunctions
};

export default StringModule;

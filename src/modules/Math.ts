import type { BuiltinHandler, ModuleAdapter } from '../types/Environment.type';
import { expectArgCount, expectNumber } from '../utils/args';

/**
 * Math module for Claro
 * Called with the module prefix: math.sqrt(16), math.pi()
 */

export const MathFunctions: Record<string, BuiltinHandler> = {
    sqrt: (args) => {
        expectArgCount('math.sqrt', args, 1);
        const num = expectNumber('math.sqrt', args[0]);
        if (num < 0) {
            throw new Error('Square root of negative number');
        }
        return Math.sqrt(num);
    },

    floor: (args) => {
        expectArgCount('math.floor', args, 1);
        return Math.floor(expectNumber('math.floor', args[0]));
    },

    ceil: (args) => {
        expectArgCount('math.ceil', args, 1);
        return Math.ceil(expectNumber('math.ceil', args[0]));
    },

    pow: (args) => {
        expectArgCount('math.pow', args, 2);
        return Math.pow(expectNumber('math.pow', args[0]), expectNumber('math.pow', args[1]));
    },

    pi: (args) => {
        expectArgCount('math.pi', args, 0);
        return Math.PI;
    }
};

const MathModule: ModuleAdapter = {
    name: 'math',
    functions: MathFunctions
};

export default MathModule;

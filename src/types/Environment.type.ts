import type { Value, SourceLine } from '../utils';
import type { FunctionTable } from '../classes/FunctionTable';

export type BuiltinHandler = (args: Value[]) => Value;

/**
 * Group of builtin functions.
 * Functions are callable as `name.fn(...)`, and also as bare `fn(...)` when global is true.
 */
export interface ModuleAdapter {
    name: string;
    functions: Record<string, BuiltinHandler>;
    global?: boolean;
}

/**
 * Reads one line of external input for INPUT. Resolves to null at end of input.
 */
export type LineInput = (prompt: string) => Promise<string | null>;

export type VariableEnvironment = Map<string, Value>;

/**
 * State shared by every frame of one interpreter instance
 */
export interface Environment {
    variables: VariableEnvironment;  // global variables, owned by the program driver
    functions: FunctionTable;
    builtins: Map<string, BuiltinHandler>;
    callStack: string[];             // names of the functions currently executing, outermost first
    maxCallDepth: number;
    debug: boolean;                  // toggled by DEBUG ON|OFF
    readLine: LineInput;
}

/**
 * One executing line sequence: the top-level program, or one function call
 */
export interface Frame {
    lines: SourceLine[];
    locals: VariableEnvironment;     // the globals at top level, the call-scoped copy inside a function
    output: string[];
    isFunctionFrame: boolean;
}

/**
 * Result of executing one line, returned up the call chain instead of a global control flag.
 * Loops consume 'break' and 'continue'; function calls consume 'return'.
 */
export type Outcome =
    | { kind: 'next'; index: number }
    | { kind: 'break'; lineNumber: number }
    | { kind: 'continue'; lineNumber: number }
    | { kind: 'return'; value: Value }
    | { kind: 'exit' };

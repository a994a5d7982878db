/**
 * Claro Interpreter
 *
 * A line-oriented scripting language: one statement per line, blocks closed by END.
 *
 * @example
 * ```typescript
 * const claro = new Claro();
 * const { output } = await claro.executeScript('FUNC add a b\nPRINT a + b\nEND\nCALL add 3 4');
 * // output: ['7']
 * ```
 */

import { formatErrorWithContext, type Value, type SourceLine } from './utils';
import { Executor, ExpressionEvaluator, FunctionTable, BLOCK_OPENERS, loadProgram, keywordOf, ScriptError } from './classes';
import type { Environment, LineInput, ModuleAdapter, Outcome } from './types/Environment.type';

// Import core modules
import CoreModule from './modules/Core';
import MathModule from './modules/Math';
import StringModule from './modules/String';

export type { Value, ValueMap, ValueType, SourceLine } from './utils';
export type { BuiltinHandler, ModuleAdapter, LineInput, Environment, Frame, Outcome } from './types/Environment.type';
export type { Expression } from './types/Ast.type';
export type { FunctionDefinition, TryRegion } from './classes';
export { isTruthy, valueToString, valueToLiteral, valuesEqual, getValueType, formatErrorWithContext } from './utils';
export { Lexer, LexerError, TokenKind } from './classes';
export { parseExpressionText } from './parsers/ExpressionParser';
export { ExpressionEvaluator, Executor, FunctionTable, loadProgram };
export { BlockResolver } from './classes';
export * from './classes/exceptions';

export const DEFAULT_MAX_CALL_DEPTH = 100;

export interface ClaroOptions {
    maxCallDepth?: number;
    debug?: boolean;
    lineInput?: LineInput;
}

export interface RunResult {
    output: string[];
    error: ScriptError | null;
    exited: boolean;       // true when the run ended with EXIT
}

export interface ReplResult extends RunResult {
    done: boolean;
    waitingFor?: 'end';
}

const noInput: LineInput = async () => null;

export class Claro {
    private environment: Environment;
    private evaluator: ExpressionEvaluator;
    private replBuffer: string[] = [];

    constructor(options: ClaroOptions = {}) {
        this.environment = {
            variables: new Map(),
            functions: new FunctionTable(),
            builtins: new Map(),
            callStack: [],
            maxCallDepth: options.maxCallDepth ?? DEFAULT_MAX_CALL_DEPTH,
            debug: options.debug ?? false,
            readLine: options.lineInput ?? noInput
        };
        this.evaluator = new ExpressionEvaluator(this.environment.builtins);

        // Load native modules (includes Core module with global builtins)
        for (const module of Claro.NATIVE_MODULES) {
            this.registerModule(module);
        }
    }

    /**
     * Native modules registry
     * Add new modules here to auto-load them
     */
    private static readonly NATIVE_MODULES: ModuleAdapter[] = [
        CoreModule,
        MathModule,
        StringModule
    ];

    /**
     * Register a module of builtins, callable as `name.fn(...)`.
     * With global: true the functions are also callable without the prefix,
     * unless a builtin of that name already exists.
     *
     * @example
     * claro.registerModule({
     *   name: 'greet',
     *   functions: { hello: (args) => `hello ${args[0]}` }
     * });
     * // PRINT greet.hello("you")
     */
    registerModule(module: ModuleAdapter): void {
        for (const [funcName, handler] of Object.entries(module.functions)) {
            this.environment.builtins.set(`${module.name}.${funcName}`, handler);
            if (module.global === true && !this.environment.builtins.has(funcName)) {
                this.environment.builtins.set(funcName, handler);
            }
        }
    }

    /**
     * Set the source of INPUT lines
     */
    setLineInput(reader: LineInput): void {
        this.environment.readLine = reader;
    }

    /**
     * Run a whole program against the persistent globals.
     * Errors outside a TRY halt the run; they are logged with source context and returned, never thrown.
     */
    async executeScript(source: string): Promise<RunResult> {
        return this.run(loadProgram(source), source);
    }

    /**
     * REPL-friendly execution that supports multi-line blocks.
     *
     * Usage pattern:
     *  - Call this for every user-entered line.
     *  - If done === false, keep collecting lines (a block is still open).
     *  - When done === true, the buffered lines have run and the buffer is cleared.
     */
    async executeReplLine(line: string): Promise<ReplResult> {
        this.replBuffer.push(line);
        const source = this.replBuffer.join('\n');

        const more = this.needsMoreInput(source);
        if (more.needsMore) {
            return { done: false, output: [], error: null, exited: false, waitingFor: more.waitingFor };
        }

        this.replBuffer = [];
        const result = await this.executeScript(source);
        return { done: true, ...result };
    }

    /**
     * True while some IF/WHILE/FOR/FUNC/TRY in the source has no END yet
     */
    needsMoreInput(source: string): { needsMore: boolean; waitingFor?: 'end' } {
        let depth = 0;
        for (const line of loadProgram(source)) {
            const keyword = keywordOf(line);
            if (BLOCK_OPENERS.has(keyword)) {
                depth++;
            } else if (keyword === 'END' && depth > 0) {
                depth--;
            }
        }
        return depth > 0 ? { needsMore: true, waitingFor: 'end' } : { needsMore: false };
    }

    /**
     * Drop any partially entered REPL block
     */
    resetReplBuffer(): void {
        this.replBuffer = [];
    }

    getVariable(name: string): Value {
        return this.environment.variables.get(name) ?? null;
    }

    setVariable(name: string, value: Value): void {
        this.environment.variables.set(name, value);
    }

    /**
     * Snapshot of the global variables, in definition order
     */
    getVariables(): Record<string, Value> {
        return Object.fromEntries(this.environment.variables);
    }

    getFunctionNames(): string[] {
        return this.environment.functions.names();
    }

    private async run(lines: SourceLine[], source: string): Promise<RunResult> {
        const output: string[] = [];
        const executor = new Executor(this.environment, {
            lines,
            locals: this.environment.variables,
            output,
            isFunctionFrame: false
        }, this.evaluator);

        let outcome: Outcome;
        try {
            outcome = await executor.runFrame();
        } catch (error) {
            if (!(error instanceof ScriptError)) {
                throw error;
            }
            console.error(formatErrorWithContext({ message: error.describe(), lineNumber: error.lineNumber, source }));
            return { output, error, exited: false };
        }

        return { output, error: null, exited: outcome.kind === 'exit' };
    }
}

export default Claro;

/**
 * Executor class for executing Claro statements
 *
 * One Executor runs one frame: the top-level program or a single function call.
 * There is no statement tree. The executor walks the frame's line list with a program counter,
 * and every statement returns an Outcome naming the next line or a control transfer
 * (break, continue, return, exit) that enclosing loops, calls and the driver consume.
 */

import { getValueType, isDict, isList, isTruthy, valueToLiteral, valueToString, type SourceLine, type Value } from '../utils';
import { BlockResolver, BLOCK_OPENERS } from './BlockResolver';
import { ExpressionEvaluator } from './ExpressionEvaluator';
import { isIdentifier } from './FunctionTable';
import { Lexer } from './Lexer';
import { argumentsOf, keywordOf } from './Program';
import {
    ScriptError,
    ControlFlowError,
    InputError,
    InvalidStatementError,
    MissingArgumentError,
    NotIterableError,
    TypeMismatchError,
    UndefinedFunctionError,
    ArityMismatchError,
    RecursionLimitExceededError
} from './exceptions';
import type { Environment, Frame, Outcome } from '../types/Environment.type';

/** Keywords REPEAT refuses to run, since they need a block or a surrounding region */
const NON_REPEATABLE: ReadonlySet<string> = new Set([...BLOCK_OPENERS, 'ELSE', 'END', 'EXCEPT', 'FINALLY', 'REPEAT']);

type LoopStep = 'again' | 'stop' | Outcome;

export class Executor {
    private environment: Environment;
    private frame: Frame;
    private evaluator: ExpressionEvaluator;

    /**
     * Debug mode flag - set to true to log every executed line
     * Seeded from the CLARO_DEBUG environment variable, or set programmatically
     */
    static debug: boolean = (() => {
        try {
            return typeof process !== 'undefined' && process.env.CLARO_DEBUG === 'true';
        } catch {
            return false;
        }
    })();

    constructor(environment: Environment, frame: Frame, evaluator: ExpressionEvaluator) {
        this.environment = environment;
        this.frame = frame;
        this.evaluator = evaluator;
    }

    /**
     * Run the whole frame from its first line.
     * A break or continue that no loop consumed is a ControlFlowError here.
     */
    async runFrame(): Promise<Outcome> {
        const outcome = await this.runRange(0, this.frame.lines.length);
        if (outcome.kind === 'break' || outcome.kind === 'continue') {
            const keyword = outcome.kind === 'break' ? 'BREAK' : 'CONTINUE';
            throw new ControlFlowError(`${keyword} outside of a loop`, outcome.lineNumber);
        }
        return outcome;
    }

    /**
     * Execute lines [start, end) in order, following jumps.
     * Returns the first non-'next' outcome, or 'next' pointing at end.
     */
    async runRange(start: number, end: number): Promise<Outcome> {
        let index = start;
        while (index < end) {
            const outcome = await this.execute(index);
            if (outcome.kind !== 'next') {
                return outcome;
            }
            index = outcome.index;
        }
        return { kind: 'next', index: end };
    }

    /**
     * Execute the line at index. Errors leave with that line's number attached.
     */
    async execute(index: number): Promise<Outcome> {
        const line = this.frame.lines[index];

        if (Executor.debug || this.environment.debug) {
            const timestamp = new Date().toISOString();
            console.log(`[Executor] [${timestamp}] line ${line.lineNumber}: ${line.text}`);
        }

        try {
            return await this.dispatch(line, index);
        } catch (error) {
            if (error instanceof ScriptError) {
                throw error.atLine(line.lineNumber);
            }
            throw error;
        }
    }

    private async dispatch(line: SourceLine, index: number): Promise<Outcome> {
        const keyword = keywordOf(line);
        const args = argumentsOf(line);
        const next: Outcome = { kind: 'next', index: index + 1 };

        switch (keyword) {
            case 'PRINT':
                this.frame.output.push(valueToString(this.evaluate(this.require(keyword, args))));
                return next;

            case 'VARIABLE':
            case 'SET':
                this.executeAssignment(keyword, args, value => value);
                return next;

            case 'STRING':
                this.executeAssignment(keyword, args, value => valueToString(value));
                return next;

            case 'LIST':
                this.executeAssignment(keyword, args, value => {
                    if (!isList(value)) {
                        throw new TypeMismatchError(`LIST needs a list value, got ${getValueType(value)}`);
                    }
                    return value;
                });
                return next;

            case 'DICT':
                this.executeAssignment(keyword, args, value => {
                    if (!isDict(value)) {
                        throw new TypeMismatchError(`DICT needs a dict value, got ${getValueType(value)}`);
                    }
                    return value;
                }, expr => (expr.startsWith('{') ? expr : `{${expr}}`));
                return next;

            case 'IF':
                return this.executeIf(index, args);

            case 'ELSE':
                // Only reached when the true branch ran to its end
                return { kind: 'next', index: BlockResolver.findClose(index, this.frame.lines) + 1 };

            case 'WHILE':
                return this.executeWhile(index, args);

            case 'FOR':
                return this.executeFor(index, args);

            case 'FUNC': {
                const { endIndex } = this.environment.functions.define(args, index, this.frame.lines);
                return { kind: 'next', index: endIndex + 1 };
            }

            case 'CALL':
                return this.executeCall(args, next);

            case 'RETURN':
                if (!this.frame.isFunctionFrame) {
                    throw new InvalidStatementError('RETURN outside of a function');
                }
                return { kind: 'return', value: args.length > 0 ? this.evaluate(args) : null };

            case 'TRY':
                return this.executeTry(index);

            case 'EXCEPT':
            case 'FINALLY':
                throw new InvalidStatementError(`${keyword} without a matching TRY`);

            case 'BREAK':
                return { kind: 'break', lineNumber: line.lineNumber };

            case 'CONTINUE':
                return { kind: 'continue', lineNumber: line.lineNumber };

            case 'INPUT':
                await this.executeInput(args);
                return next;

            case 'REPEAT':
                return this.executeRepeat(line, index, args);

            case 'COMMENT':
            case 'REM':
            case 'END':
                return next;

            case 'DEBUG': {
                const mode = this.require(keyword, args).toUpperCase();
                if (mode !== 'ON' && mode !== 'OFF') {
                    throw new InvalidStatementError(`DEBUG expects ON or OFF, got '${args}'`);
                }
                this.environment.debug = mode === 'ON';
                return next;
            }

            case 'STACK':
                this.executeStack();
                return next;

            case 'TRACE':
                this.executeTrace();
                return next;

            case 'EXIT':
                return { kind: 'exit' };

            default:
                throw new InvalidStatementError(`Unknown statement: ${line.text.split(/\s+/)[0]}`);
        }
    }

    private evaluate(expr: string): Value {
        return this.evaluator.evaluate(expr, this.frame.locals);
    }

    private require(keyword: string, args: string): string {
        if (args.length === 0) {
            throw new MissingArgumentError(`${keyword} requires an argument`);
        }
        return args;
    }

    /**
     * VARIABLE name = expr, or VARIABLE name expr
     */
    private executeAssignment(
        keyword: string,
        args: string,
        convert: (value: Value) => Value,
        rewrite: (expr: string) => string = expr => expr
    ): void {
        const match = this.require(keyword, args).match(/^(\S+?)\s*(?:=(?!=)\s*|\s+|$)([\s\S]*)$/);
        const name = match ? match[1] : args;
        const expr = match ? match[2].trim() : '';

        if (!isIdentifier(name)) {
            throw new InvalidStatementError(`Invalid variable name '${name}'`);
        }
        if (expr.length === 0) {
            throw new MissingArgumentError(`${keyword} ${name} requires a value`);
        }

        this.frame.locals.set(name, convert(this.evaluate(rewrite(expr))));
    }

    private executeIf(index: number, condition: string): Outcome {
        this.require('IF', condition);
        // Resolved up front so an IF without END fails whichever branch runs
        const elseOrEnd = BlockResolver.findElseOrClose(index, this.frame.lines);
        if (isTruthy(this.evaluate(condition))) {
            return { kind: 'next', index: index + 1 };
        }
        return { kind: 'next', index: elseOrEnd + 1 };
    }

    /**
     * Run one pass of a loop body and say whether the loop goes on
     */
    private async runLoopBody(start: number, end: number): Promise<LoopStep> {
        const outcome = await this.runRange(start, end);
        switch (outcome.kind) {
            case 'next':
            case 'continue':
                return 'again';
            case 'break':
                return 'stop';
            default:
                return outcome;
        }
    }

    private async executeWhile(index: number, condition: string): Promise<Outcome> {
        this.require('WHILE', condition);
        const endIndex = BlockResolver.findClose(index, this.frame.lines);

        while (isTruthy(this.evaluate(condition))) {
            const step = await this.runLoopBody(index + 1, endIndex);
            if (step === 'stop') {
                break;
            }
            if (step !== 'again') {
                return step;
            }
        }

        return { kind: 'next', index: endIndex + 1 };
    }

    /**
     * FOR x IN iterable, or FOR i = a TO b [STEP s]
     */
    private async executeFor(index: number, header: string): Promise<Outcome> {
        this.require('FOR', header);
        const endIndex = BlockResolver.findClose(index, this.frame.lines);

        const counted = header.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.+?)\s+TO\s+(.+?)(?:\s+STEP\s+(.+))?$/i);
        const each = header.match(/^([A-Za-z_][A-Za-z0-9_]*)\s+IN\s+(.+)$/i);

        let name: string;
        let items: Iterable<Value>;
        if (counted) {
            name = counted[1];
            items = this.countedRange(counted[2], counted[3], counted[4]);
        } else if (each) {
            name = each[1];
            items = this.snapshot(this.evaluate(each[2]));
        } else {
            throw new InvalidStatementError(`Invalid FOR header: ${header}`);
        }

        for (const item of items) {
            this.frame.locals.set(name, item);
            const step = await this.runLoopBody(index + 1, endIndex);
            if (step === 'stop') {
                break;
            }
            if (step !== 'again') {
                return step;
            }
        }

        return { kind: 'next', index: endIndex + 1 };
    }

    private *countedRange(fromText: string, toText: string, stepText: string | undefined): Generator<number> {
        const from = this.evaluate(fromText);
        const to = this.evaluate(toText);
        const step = stepText === undefined ? 1 : this.evaluate(stepText);

        if (typeof from !== 'number' || typeof to !== 'number' || typeof step !== 'number') {
            throw new TypeMismatchError('FOR bounds and STEP must be numbers');
        }
        if (step === 0) {
            throw new InvalidStatementError('FOR STEP must not be zero');
        }

        for (let value = from; step > 0 ? value <= to : value >= to; value += step) {
            yield value;
        }
    }

    /**
     * Elements of a list, characters of a string, keys of a dict. Copied before the first pass.
     */
    private snapshot(value: Value): Value[] {
        if (isList(value)) {
            return [...value];
        }
        if (typeof value === 'string') {
            return Array.from(value);
        }
        if (isDict(value)) {
            return Object.keys(value);
        }
        throw new NotIterableError(getValueType(value));
    }

    /**
     * CALL name args [INTO var]
     */
    private async executeCall(args: string, next: Outcome): Promise<Outcome> {
        let callText = this.require('CALL', args);
        let target: string | null = null;

        const pieces = Lexer.splitTopLevel(callText, 'whitespace');
        if (pieces.length >= 3 && pieces[pieces.length - 2].toUpperCase() === 'INTO') {
            target = pieces[pieces.length - 1];
            if (!isIdentifier(target)) {
                throw new InvalidStatementError(`Invalid INTO target '${target}'`);
            }
            callText = callText.replace(/\s+INTO\s+\S+\s*$/i, '');
        }

        let name: string;
        let argText: string;
        const parenCall = callText.match(/^([A-Za-z_][A-Za-z0-9_]*)\s*\(([\s\S]*)\)$/);
        if (parenCall) {
            name = parenCall[1];
            argText = parenCall[2];
        } else {
            const firstSpace = callText.search(/\s/);
            name = firstSpace === -1 ? callText : callText.slice(0, firstSpace);
            argText = firstSpace === -1 ? '' : callText.slice(firstSpace + 1);
        }

        // name(a, b) always separates by commas; the bare form falls back to whitespace
        const argExprs = parenCall || Lexer.hasTopLevel(argText, ',')
            ? Lexer.splitTopLevel(argText, ',')
            : Lexer.splitTopLevel(argText, 'whitespace');

        const outcome = await this.callFunction(name, argExprs);
        if (outcome.kind === 'exit') {
            return outcome;
        }
        if (target !== null) {
            this.frame.locals.set(target, outcome.kind === 'return' ? outcome.value : null);
        }
        return next;
    }

    /**
     * Call a user function: check arity and depth, run the body in a copy of the caller's
     * variables, then merge every variable of the call back into the caller.
     */
    private async callFunction(name: string, argExprs: string[]): Promise<Outcome> {
        const definition = this.environment.functions.get(name);
        if (!definition) {
            throw new UndefinedFunctionError(name);
        }
        if (argExprs.length !== definition.params.length) {
            throw new ArityMismatchError(name, definition.params.length, argExprs.length);
        }
        if (this.environment.callStack.length >= this.environment.maxCallDepth) {
            throw new RecursionLimitExceededError(name, this.environment.maxCallDepth);
        }

        const argValues = argExprs.map(expr => this.evaluate(expr));
        const locals = new Map(this.frame.locals);
        definition.params.forEach((param, i) => locals.set(param, argValues[i]));

        const callee = new Executor(this.environment, {
            lines: definition.body,
            locals,
            output: this.frame.output,
            isFunctionFrame: true
        }, this.evaluator);

        this.environment.callStack.push(name);
        let outcome: Outcome;
        try {
            outcome = await callee.runFrame();
        } finally {
            this.environment.callStack.pop();
        }

        for (const [key, value] of locals) {
            this.frame.locals.set(key, value);
        }
        return outcome;
    }

    /**
     * TRY ... [EXCEPT [var] ...] [FINALLY ...] END
     */
    private async executeTry(index: number): Promise<Outcome> {
        const { exceptIndex, finallyIndex, endIndex } = BlockResolver.partitionTry(index, this.frame.lines);
        const tryEnd = exceptIndex ?? finallyIndex ?? endIndex;
        const exceptEnd = finallyIndex ?? endIndex;

        let pending: Outcome | null = null;
        let failure: unknown = null;
        let failed = false;

        try {
            pending = await this.runRange(index + 1, tryEnd);
        } catch (error) {
            if (error instanceof ScriptError && error.recoverable) {
                // without EXCEPT the error is recovered by an empty except body
                try {
                    if (exceptIndex !== null) {
                        this.bindException(exceptIndex, error);
                        pending = await this.runRange(exceptIndex + 1, exceptEnd);
                    }
                } catch (exceptError) {
                    failed = true;
                    failure = exceptError;
                }
            } else {
                failed = true;
                failure = error;
            }
        }

        if (finallyIndex !== null) {
            const finallyOutcome = await this.runRange(finallyIndex + 1, endIndex);
            if (finallyOutcome.kind !== 'next') {
                return finallyOutcome;
            }
        }

        if (failed) {
            throw failure;
        }
        if (pending === null || pending.kind === 'next') {
            return { kind: 'next', index: endIndex + 1 };
        }
        return pending;
    }

    private bindException(exceptIndex: number, error: ScriptError): void {
        const exceptLine = this.frame.lines[exceptIndex];
        const name = argumentsOf(exceptLine);
        if (name.length === 0) {
            return;
        }
        if (!isIdentifier(name)) {
            throw new InvalidStatementError(`Invalid EXCEPT variable '${name}'`, exceptLine.lineNumber);
        }
        this.frame.locals.set(name, error.message);
    }

    /**
     * INPUT name [prompt]. A quoted prompt is a string expression, anything else is used as written.
     */
    private async executeInput(args: string): Promise<void> {
        const text = this.require('INPUT', args);
        const firstSpace = text.search(/\s/);
        const name = firstSpace === -1 ? text : text.slice(0, firstSpace);
        const promptText = firstSpace === -1 ? '' : text.slice(firstSpace + 1).trim();

        if (!isIdentifier(name)) {
            throw new InvalidStatementError(`Invalid variable name '${name}'`);
        }

        const prompt = /^(["']).*\1$/.test(promptText) ? valueToString(this.evaluate(promptText)) : promptText;
        const input = await this.environment.readLine(prompt);
        if (input === null) {
            throw new InputError(`No input available for '${name}'`);
        }
        this.frame.locals.set(name, input);
    }

    /**
     * REPEAT n statement: runs a single-line statement n times
     */
    private async executeRepeat(line: SourceLine, index: number, args: string): Promise<Outcome> {
        const text = this.require('REPEAT', args);
        const countText = Lexer.splitTopLevel(text, 'whitespace')[0];
        const statement = text.slice(countText.length).trim();
        if (statement.length === 0) {
            throw new MissingArgumentError('REPEAT requires a count and a statement');
        }

        const count = this.evaluate(countText);
        if (typeof count !== 'number' || !Number.isInteger(count) || count < 0) {
            throw new TypeMismatchError(`REPEAT count must be a non-negative integer, got ${valueToString(count)}`);
        }

        const inner: SourceLine = { text: statement, lineNumber: line.lineNumber };
        if (NON_REPEATABLE.has(keywordOf(inner))) {
            throw new InvalidStatementError(`${keywordOf(inner)} cannot be used with REPEAT`);
        }

        for (let i = 0; i < count; i++) {
            const outcome = await this.dispatch(inner, index);
            if (outcome.kind !== 'next') {
                return outcome;
            }
        }
        return { kind: 'next', index: index + 1 };
    }

    private executeStack(): void {
        const { callStack } = this.environment;
        this.frame.output.push(`Call stack (depth ${callStack.length}):`);
        for (const name of callStack) {
            this.frame.output.push(`  ${name}`);
        }
    }

    private executeTrace(): void {
        const output = this.frame.output;
        output.push('---- TRACE ----');
        for (const [name, value] of this.frame.locals) {
            output.push(`  ${name} = ${valueToLiteral(value)}`);
        }
        for (const definition of this.environment.functions.entries()) {
            output.push(`  ${definition.name}(${definition.params.join(', ')}) with ${definition.body.length} lines`);
        }
        output.push('---- END TRACE ----');
    }
}

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Claro, type ClaroOptions } from '../index';

const script = (...lines: string[]) => lines.join('\n');

async function run(source: string, options?: ClaroOptions) {
    const claro = new Claro(options);
    const result = await claro.executeScript(source);
    return { claro, ...result };
}

describe('Executor', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('IF / ELSE', () => {
        const program = (x: number) => script(
            `VARIABLE x = ${x}`,
            'IF x > 3',
            'PRINT "big"',
            'ELSE',
            'PRINT "small"',
            'END',
            'PRINT "done"'
        );

        it('runs only the true branch, then resumes after END', async () => {
            expect((await run(program(5))).output).toEqual(['big', 'done']);
        });

        it('runs only the ELSE branch when the condition is false', async () => {
            expect((await run(program(1))).output).toEqual(['small', 'done']);
        });

        it('skips to END when there is no ELSE', async () => {
            const { output } = await run(script('IF 0', 'PRINT "no"', 'END', 'PRINT "yes"'));
            expect(output).toEqual(['yes']);
        });

        it('resolves nested blocks inside the skipped branch', async () => {
            const { output } = await run(script(
                'IF false',
                'IF true',
                'PRINT "inner"',
                'ELSE',
                'PRINT "inner else"',
                'END',
                'ELSE',
                'PRINT "outer else"',
                'END'
            ));
            expect(output).toEqual(['outer else']);
        });

        it('reports an IF without END on the IF line', async () => {
            const { output, error } = await run(script('PRINT "a"', 'IF 1', 'PRINT "b"'));
            expect(output).toEqual(['a']);
            expect(error).toMatchObject({
                kind: 'UnterminatedBlock',
                lineNumber: 2,
                message: 'IF block starting at line 2 has no matching END'
            });
        });
    });

    describe('WHILE', () => {
        it('re-evaluates the condition before every pass', async () => {
            const { output } = await run(script(
                'VARIABLE i = 0',
                'WHILE i < 3',
                'PRINT i',
                'VARIABLE i = i + 1',
                'END'
            ));
            expect(output).toEqual(['0', '1', '2']);
        });

        it('makes zero passes when the condition starts false', async () => {
            const { output } = await run(script('WHILE false', 'PRINT "never"', 'END', 'PRINT "after"'));
            expect(output).toEqual(['after']);
        });

        it('stops on BREAK', async () => {
            const { output } = await run(script(
                'VARIABLE i = 0',
                'WHILE true',
                'VARIABLE i = i + 1',
                'IF i == 3',
                'BREAK',
                'END',
                'END',
                'PRINT i'
            ));
            expect(output).toEqual(['3']);
        });
    });

    describe('FOR', () => {
        it('skips the rest of a pass on CONTINUE', async () => {
            const { output } = await run(script(
                'FOR n IN [1, 2, 3]',
                'IF n == 2',
                'CONTINUE',
                'END',
                'PRINT n',
                'END'
            ));
            expect(output).toEqual(['1', '3']);
        });

        it('confines BREAK to the innermost loop', async () => {
            const { output } = await run(script(
                'FOR i IN [1, 2]',
                'FOR j IN [1, 2, 3]',
                'IF j == 2',
                'BREAK',
                'END',
                'PRINT i * 10 + j',
                'END',
                'END'
            ));
            expect(output).toEqual(['11', '21']);
        });

        it('iterates characters of a string and keys of a dict', async () => {
            const { output } = await run(script(
                'FOR c IN "ab"',
                'PRINT c',
                'END',
                'FOR k IN {"x": 1, "y": 2}',
                'PRINT k',
                'END'
            ));
            expect(output).toEqual(['a', 'b', 'x', 'y']);
        });

        it('iterates a snapshot of the list', async () => {
            const { output } = await run(script(
                'LIST xs = [1, 2]',
                'FOR x IN xs',
                'SET xs = append(xs, x)',
                'PRINT x',
                'END',
                'PRINT len(xs)'
            ));
            expect(output).toEqual(['1', '2', '4']);
        });

        it('counts inclusively with TO and STEP', async () => {
            const { output } = await run(script(
                'FOR i = 1 TO 5 STEP 2',
                'PRINT i',
                'END',
                'FOR i = 3 TO 1 STEP -1',
                'PRINT i',
                'END'
            ));
            expect(output).toEqual(['1', '3', '5', '3', '2', '1']);
        });

        it('makes zero passes over an empty list', async () => {
            const { output } = await run(script('FOR x IN []', 'PRINT x', 'END', 'PRINT "done"'));
            expect(output).toEqual(['done']);
        });

        it('rejects values that are not iterable', async () => {
            const { error } = await run('FOR v IN 5\nPRINT v\nEND');
            expect(error).toMatchObject({ kind: 'NotIterable', lineNumber: 1, message: 'Value of type int is not iterable' });
        });

        it('rejects a zero STEP', async () => {
            const { error } = await run('FOR i = 1 TO 3 STEP 0\nEND');
            expect(error).toMatchObject({ kind: 'InvalidStatement', message: 'FOR STEP must not be zero' });
        });
    });

    describe('functions', () => {
        it('calls a function with positional arguments', async () => {
            const { output } = await run(script('FUNC add a b', 'PRINT a + b', 'END', 'CALL add 3 4'));
            expect(output).toEqual(['7']);
        });

        it('splits arguments on commas when present', async () => {
            const { output } = await run(script('FUNC add a, b', 'PRINT a + b', 'END', 'CALL add 1 + 2, 3', 'CALL add(10, 20)'));
            expect(output).toEqual(['6', '30']);
        });

        it('binds the RETURN value with INTO', async () => {
            const { output } = await run(script(
                'FUNC square n',
                'RETURN n * n',
                'PRINT "unreached"',
                'END',
                'CALL square 6 INTO result',
                'PRINT result'
            ));
            expect(output).toEqual(['36']);
        });

        it('binds null with INTO when the function has no RETURN', async () => {
            const { claro } = await run(script('FUNC noop', 'COMMENT nothing', 'END', 'CALL noop INTO r'));
            expect(claro.getVariable('r')).toBeNull();
        });

        it('merges every variable of the call back into the caller', async () => {
            const { claro, output } = await run(script(
                'VARIABLE x = 1',
                'FUNC bump step',
                'VARIABLE x = x + step',
                'VARIABLE created = "yes"',
                'END',
                'CALL bump 5',
                'PRINT x',
                'PRINT created'
            ));
            expect(output).toEqual(['6', 'yes']);
            expect(claro.getVariable('step')).toBe(5);
        });

        it('supports recursion', async () => {
            const { output } = await run(script(
                'FUNC countdown k',
                'IF k > 0',
                'PRINT k',
                'CALL countdown(k - 1)',
                'END',
                'END',
                'CALL countdown(3)'
            ));
            expect(output).toEqual(['3', '2', '1']);
        });

        it('fails on arity mismatch before running any of the body', async () => {
            const { output, error } = await run(script('FUNC add a b', 'PRINT "body"', 'END', 'CALL add 1'));
            expect(output).toEqual([]);
            expect(error).toMatchObject({
                kind: 'ArityMismatch',
                lineNumber: 4,
                message: "Function 'add' expects 2 argument(s), got 1"
            });
        });

        it('fails on undefined functions', async () => {
            const { error } = await run('CALL ghost');
            expect(error).toMatchObject({ kind: 'UndefinedFunction', lineNumber: 1, message: "Function 'ghost' is not defined" });
        });

        it('stops runaway recursion at the configured depth', async () => {
            const { claro, error } = await run(script('FUNC forever', 'CALL forever', 'END', 'CALL forever'), { maxCallDepth: 5 });
            expect(error).toMatchObject({
                kind: 'RecursionLimitExceeded',
                lineNumber: 2,
                message: "Call depth limit of 5 exceeded while calling 'forever'"
            });
            expect((await claro.executeScript('STACK')).output).toEqual(['Call stack (depth 0):']);
        });

        it('reports errors inside a body with the original line number', async () => {
            const { error } = await run(script('# helper', 'FUNC f', '', 'PRINT nope', 'END', 'CALL f'));
            expect(error).toMatchObject({ kind: 'ExpressionError', lineNumber: 4 });
        });

        it('shows active calls with STACK', async () => {
            const { output } = await run(script(
                'FUNC inner',
                'STACK',
                'END',
                'FUNC outer',
                'CALL inner',
                'END',
                'CALL outer'
            ));
            expect(output).toEqual(['Call stack (depth 2):', '  outer', '  inner']);
        });

        it('rejects RETURN outside a function', async () => {
            const { error } = await run('RETURN 1');
            expect(error).toMatchObject({ kind: 'InvalidStatement', message: 'RETURN outside of a function' });
        });

        it('rejects malformed definitions', async () => {
            const { error } = await run('FUNC f a a\nEND');
            expect(error).toMatchObject({ kind: 'FunctionDefinitionError', lineNumber: 1 });
        });
    });

    describe('TRY / EXCEPT / FINALLY', () => {
        it('runs EXCEPT with the message and FINALLY once', async () => {
            const { output, error } = await run(script(
                'TRY',
                'PRINT "start"',
                'PRINT missing',
                'PRINT "unreached"',
                'EXCEPT err',
                'PRINT "caught: " + err',
                'FINALLY',
                'PRINT "finally"',
                'END',
                'PRINT "after"'
            ));
            expect(error).toBeNull();
            expect(output).toEqual([
                'start',
                "caught: Cannot evaluate 'missing': Undefined variable 'missing'",
                'finally',
                'after'
            ]);
        });

        it('skips EXCEPT when the body succeeds', async () => {
            const { output } = await run(script('TRY', 'PRINT 1', 'EXCEPT', 'PRINT 2', 'END', 'PRINT 3'));
            expect(output).toEqual(['1', '3']);
        });

        it('recovers without EXCEPT, runs FINALLY and resumes after END', async () => {
            const { output, error } = await run(script(
                'TRY',
                'PRINT 1 / 0',
                'PRINT "skipped"',
                'FINALLY',
                'PRINT "cleanup"',
                'END',
                'PRINT "after"'
            ));
            expect(error).toBeNull();
            expect(output).toEqual(['cleanup', 'after']);
        });

        it('recovers in a bare TRY with neither EXCEPT nor FINALLY', async () => {
            const { output, error } = await run(script('TRY', 'PRINT nope', 'END', 'PRINT "after"'));
            expect(error).toBeNull();
            expect(output).toEqual(['after']);
        });

        it('keeps dict entries named "__proto__"', async () => {
            const { output } = await run(script(
                'VARIABLE d = {"__proto__": {"x": 1}}',
                'PRINT len(d)',
                'PRINT "__proto__" in d'
            ));
            expect(output).toEqual(['1', 'true']);
        });

        it('runs FINALLY when BREAK leaves the body', async () => {
            const { output } = await run(script(
                'FOR i IN [1, 2, 3]',
                'TRY',
                'IF i == 2',
                'BREAK',
                'END',
                'PRINT i',
                'FINALLY',
                'PRINT "f" + str(i)',
                'END',
                'END'
            ));
            expect(output).toEqual(['1', 'f1', 'f2']);
        });

        it('runs FINALLY when RETURN leaves the body', async () => {
            const { output } = await run(script(
                'FUNC f',
                'TRY',
                'RETURN 1',
                'FINALLY',
                'PRINT "closing"',
                'END',
                'PRINT "unreached"',
                'END',
                'CALL f INTO r',
                'PRINT r'
            ));
            expect(output).toEqual(['closing', '1']);
        });

        it('runs FINALLY when EXCEPT itself fails, then propagates', async () => {
            const { output, error } = await run(script(
                'TRY',
                'PRINT nope',
                'EXCEPT',
                'PRINT also_nope',
                'FINALLY',
                'PRINT "finally"',
                'END'
            ));
            expect(output).toEqual(['finally']);
            expect(error).toMatchObject({
                lineNumber: 4,
                message: "Cannot evaluate 'also_nope': Undefined variable 'also_nope'"
            });
        });

        it('lets a control transfer in FINALLY override the pending outcome', async () => {
            const { output } = await run(script(
                'FOR i IN [1, 2]',
                'TRY',
                'PRINT nope',
                'EXCEPT',
                'PRINT "handled"',
                'FINALLY',
                'BREAK',
                'END',
                'END',
                'PRINT "out"'
            ));
            expect(output).toEqual(['handled', 'out']);
        });

        it('catches errors raised inside called functions', async () => {
            const { output } = await run(script(
                'FUNC risky',
                'CALL missing_function',
                'END',
                'TRY',
                'CALL risky',
                'EXCEPT e',
                'PRINT e',
                'END'
            ));
            expect(output).toEqual(["Function 'missing_function' is not defined"]);
        });

        it('never catches a BREAK that escaped its function', async () => {
            const { output, error } = await run(script(
                'FUNC f',
                'BREAK',
                'END',
                'TRY',
                'CALL f',
                'EXCEPT',
                'PRINT "caught"',
                'END'
            ));
            expect(output).toEqual([]);
            expect(error).toMatchObject({ kind: 'ControlFlowError', lineNumber: 2, message: 'BREAK outside of a loop', recoverable: false });
        });

        it('rejects EXCEPT reached without TRY', async () => {
            const { error } = await run('EXCEPT');
            expect(error).toMatchObject({ kind: 'InvalidStatement', message: 'EXCEPT without a matching TRY' });
        });
    });

    describe('statements', () => {
        it('assigns with VARIABLE, SET, STRING, LIST and DICT', async () => {
            const { output } = await run(script(
                'VARIABLE a = 1',
                'SET b 2',
                'DICT d = "a": a, "b": [b, 3]',
                'LIST xs = [1, "two"]',
                'STRING s = 42',
                'PRINT d',
                'PRINT xs',
                'PRINT s + "!"'
            ));
            expect(output).toEqual(['{"a": 1, "b": [2, 3]}', '[1, "two"]', '42!']);
        });

        it('rejects a LIST of the wrong type', async () => {
            const { error } = await run('LIST xs = 5');
            expect(error).toMatchObject({ kind: 'TypeMismatch', message: 'LIST needs a list value, got int' });
        });

        it('rejects a missing argument', async () => {
            const { error } = await run('PRINT');
            expect(error).toMatchObject({ kind: 'MissingArgument', lineNumber: 1, message: 'PRINT requires an argument' });
        });

        it('rejects unknown statements', async () => {
            const { error } = await run('PRINT 1\nPRNT 2');
            expect(error).toMatchObject({ kind: 'InvalidStatement', lineNumber: 2, message: 'Unknown statement: PRNT' });
        });

        it('treats COMMENT, REM and a stray END as no-ops', async () => {
            const { output } = await run(script('COMMENT a', 'REM b', 'END', 'PRINT 1'));
            expect(output).toEqual(['1']);
        });

        it('reads INPUT through the line reader', async () => {
            const lineInput = vi.fn(async () => 'Ada');
            const { output } = await run(script('INPUT name "Name? "', 'PRINT "hi " + name'), { lineInput });
            expect(output).toEqual(['hi Ada']);
            expect(lineInput).toHaveBeenCalledWith('Name? ');
        });

        it('fails INPUT when no input is left', async () => {
            const { error } = await run('INPUT name');
            expect(error).toMatchObject({ kind: 'InputError', message: "No input available for 'name'" });
        });

        it('repeats a single statement with REPEAT', async () => {
            const { output } = await run(script('REPEAT 3 PRINT "hi"', 'VARIABLE n = 0', 'REPEAT 4 SET n = n + 2', 'PRINT n'));
            expect(output).toEqual(['hi', 'hi', 'hi', '8']);
        });

        it('rejects block keywords in REPEAT', async () => {
            const { error } = await run('REPEAT 2 IF x');
            expect(error).toMatchObject({ kind: 'InvalidStatement', message: 'IF cannot be used with REPEAT' });
        });

        it('stops the whole run on EXIT, even inside a function', async () => {
            const first = await run(script('PRINT 1', 'EXIT', 'PRINT 2'));
            expect(first.output).toEqual(['1']);
            expect(first.exited).toBe(true);

            const nested = await run(script('FUNC f', 'EXIT', 'END', 'CALL f', 'PRINT "no"'));
            expect(nested.output).toEqual([]);
            expect(nested.exited).toBe(true);
        });

        it('dumps variables and functions with TRACE', async () => {
            const { output } = await run(script(
                'VARIABLE x = 1',
                'STRING s = "a"',
                'FUNC add a, b',
                'RETURN a + b',
                'END',
                'TRACE'
            ));
            expect(output).toEqual([
                '---- TRACE ----',
                '  x = 1',
                '  s = "a"',
                '  add(a, b) with 1 lines',
                '---- END TRACE ----'
            ]);
        });

        it('logs each line after DEBUG ON', async () => {
            const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
            await run(script('DEBUG ON', 'PRINT 1', 'DEBUG OFF', 'PRINT 2'));
            const lines = log.mock.calls.map(call => String(call[0]));
            expect(lines.some(line => /^\[Executor\] \[.+\] line 2: PRINT 1$/.test(line))).toBe(true);
            expect(lines.some(line => line.endsWith('line 4: PRINT 2'))).toBe(false);
        });

        it('reports a BREAK outside any loop', async () => {
            const { error } = await run('PRINT 1\nBREAK');
            expect(error).toMatchObject({ kind: 'ControlFlowError', lineNumber: 2, message: 'BREAK outside of a loop' });
        });
    });
});

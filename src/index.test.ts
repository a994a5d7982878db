import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Claro, ScriptError } from './index';

describe('Claro', () => {
    beforeEach(() => {
        vi.spyOn(console, 'error').mockImplementation(() => undefined);
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    describe('executeScript', () => {
        it('returns the output of the run', async () => {
            const claro = new Claro();
            const result = await claro.executeScript('FUNC add a b\nPRINT a + b\nEND\nCALL add 3 4');
            expect(result).toEqual({ output: ['7'], error: null, exited: false });
        });

        it('keeps variables and functions across runs but not output', async () => {
            const claro = new Claro();
            await claro.executeScript('VARIABLE total = 10\nFUNC twice n\nRETURN n * 2\nEND\nPRINT "first"');
            const second = await claro.executeScript('CALL twice total INTO total\nPRINT total');

            expect(second.output).toEqual(['20']);
            expect(claro.getVariable('total')).toBe(20);
            expect(claro.getFunctionNames()).toEqual(['twice']);
        });

        it('halts on the first uncaught error and keeps earlier output', async () => {
            const claro = new Claro();
            const result = await claro.executeScript('PRINT "before"\nPRINT 1 / 0\nPRINT "after"');

            expect(result.output).toEqual(['before']);
            expect(result.error).toBeInstanceOf(ScriptError);
            expect(result.error?.describe()).toBe("Error at line 2: Cannot evaluate '1 / 0': Division by zero");
        });

        it('logs the error with source context', async () => {
            const claro = new Claro();
            await claro.executeScript('VARIABLE x = 1\nPRNT x\nPRINT x');

            const errorLog = vi.mocked(console.error);
            expect(errorLog).toHaveBeenCalledTimes(1);
            expect(errorLog).toHaveBeenCalledWith([
                'Error at line 2: Unknown statement: PRNT',
                '',
                'Context:',
                '     1 | VARIABLE x = 1',
                '  >  2 | PRNT x',
                '     3 | PRINT x'
            ].join('\n'));
        });

        it('runs an empty program without output', async () => {
            const claro = new Claro();
            expect(await claro.executeScript('\n# nothing here\n')).toEqual({ output: [], error: null, exited: false });
        });
    });

    describe('executeReplLine', () => {
        it('buffers lines until the open block is closed', async () => {
            const claro = new Claro();

            expect(await claro.executeReplLine('FOR i IN range(2)')).toEqual({ done: false, output: [], error: null, exited: false, waitingFor: 'end' });
            expect(await claro.executeReplLine('IF i == 1')).toMatchObject({ done: false, waitingFor: 'end' });
            expect(await claro.executeReplLine('PRINT "one"')).toMatchObject({ done: false });
            expect(await claro.executeReplLine('END')).toMatchObject({ done: false });

            const result = await claro.executeReplLine('END');
            expect(result).toEqual({ done: true, output: ['one'], error: null, exited: false });
        });

        it('runs single lines against persistent state', async () => {
            const claro = new Claro();
            await claro.executeReplLine('VARIABLE x = 2');
            const result = await claro.executeReplLine('PRINT x * 21');
            expect(result.output).toEqual(['42']);
        });

        it('reports errors and keeps going', async () => {
            const claro = new Claro();
            const failed = await claro.executeReplLine('PRINT missing');
            expect(failed.done).toBe(true);
            expect(failed.error?.kind).toBe('ExpressionError');

            const next = await claro.executeReplLine('PRINT "still here"');
            expect(next.output).toEqual(['still here']);
        });

        it('can drop a half-entered block', async () => {
            const claro = new Claro();
            await claro.executeReplLine('WHILE true');
            claro.resetReplBuffer();
            expect((await claro.executeReplLine('PRINT 1')).output).toEqual(['1']);
        });
    });

    describe('needsMoreInput', () => {
        it('counts open blocks', () => {
            const claro = new Claro();
            expect(claro.needsMoreInput('IF x\nWHILE y\nEND')).toEqual({ needsMore: true, waitingFor: 'end' });
            expect(claro.needsMoreInput('IF x\nELSE\nEND')).toEqual({ needsMore: false });
            expect(claro.needsMoreInput('PRINT 1')).toEqual({ needsMore: false });
        });
    });

    describe('host API', () => {
        it('reads and writes global variables', async () => {
            const claro = new Claro();
            claro.setVariable('name', 'Ada');
            await claro.executeScript('STRING greeting = "hello " + name');

            expect(claro.getVariable('greeting')).toBe('hello Ada');
            expect(claro.getVariable('unknown')).toBeNull();
            expect(claro.getVariables()).toEqual({ name: 'Ada', greeting: 'hello Ada' });
        });

        it('registers modules with and without the global flag', async () => {
            const claro = new Claro();
            claro.registerModule({
                name: 'greet',
                functions: { hello: (args) => `hello ${String(args[0])}` }
            });
            claro.registerModule({
                name: 'extra',
                functions: {
                    double: (args) => {
                        const [value] = args;
                        return typeof value === 'number' ? value * 2 : null;
                    },
                    len: () => -1
                },
                global: true
            });

            const result = await claro.executeScript('PRINT greet.hello("you")\nPRINT double(4)\nPRINT len([1])\nPRINT extra.len([1])');
            expect(result.output).toEqual(['hello you', '8', '1', '-1']);
        });

        it('swaps the INPUT reader', async () => {
            const claro = new Claro();
            const answers = ['3', '4'];
            claro.setLineInput(async () => answers.shift() ?? null);

            const result = await claro.executeScript('INPUT a\nINPUT b\nPRINT int(a) + int(b)');
            expect(result.output).toEqual(['7']);
        });
    });
});

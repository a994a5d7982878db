#!/usr/bin/env node

import * as fs from 'node:fs';
import * as readline from 'node:readline';
import { fileURLToPath } from 'node:url';
import { Claro, type LineInput } from './index';
import { Executor } from './classes/Executor';
import { loadConfig, loadConfigForScript, ConfigError, type ClaroConfig } from './config';

export const VERSION = '0.1.0';

const USAGE = `
claro - the Claro scripting language v${VERSION}

Usage:
  claro -e <file>        Run a Claro script
  claro <file>           Same as -e
  claro -i               Start interactive mode
  claro -h, --help       Show this help message
  claro --version        Show the version

Options:
  --config <path>        Path to a claro.config.json5 (auto-detected by default)
  --debug                Log every executed line

Environment Variables:
  CLARO_DEBUG            Set to "true" to log every executed line
  CLARO_MAX_CALL_DEPTH   Override the maximum call depth (default 100)
`;

function getArg(args: string[], flag: string): string | undefined {
    const idx = args.indexOf(flag);
    if (idx !== -1 && idx + 1 < args.length) {
        return args[idx + 1];
    }
    return undefined;
}

/**
 * Reads stdin one line at a time. Resolves to null once stdin is exhausted.
 * The interface is opened on the first read, so scripts without INPUT never touch stdin.
 */
function createStdinReader(): { readLine: LineInput; close: () => void } {
    let rl: readline.Interface | null = null;
    let lines: AsyncIterator<string> | null = null;

    const readLine: LineInput = async (prompt) => {
        if (lines === null) {
            rl = readline.createInterface({ input: process.stdin, terminal: false });
            lines = rl[Symbol.asyncIterator]();
        }
        if (prompt) {
            process.stdout.write(prompt);
        }
        const result = await lines.next();
        return result.done ? null : result.value;
    };

    return {
        readLine,
        close: () => {
            rl?.close();
        }
    };
}

function printOutput(output: string[]): void {
    for (const line of output) {
        console.log(line);
    }
}

async function runFile(file: string, config: ClaroConfig): Promise<number> {
    if (!fs.existsSync(file)) {
        console.error(`Error: File not found: ${file}`);
        return 1;
    }

    const source = fs.readFileSync(file, 'utf-8');
    const stdin = createStdinReader();
    try {
        const claro = new Claro({ maxCallDepth: config.maxCallDepth, debug: config.debug, lineInput: stdin.readLine });
        const result = await claro.executeScript(source);
        printOutput(result.output);
        return result.error ? 1 : 0;
    } finally {
        stdin.close();
    }
}

async function runRepl(config: ClaroConfig): Promise<number> {
    const stdin = createStdinReader();
    const claro = new Claro({ maxCallDepth: config.maxCallDepth, debug: config.debug, lineInput: stdin.readLine });
    const prompt = config.prompt ?? 'claro> ';

    console.log(`Claro v${VERSION} interactive mode. Type EXIT to quit.`);
    try {
        let waiting = false;
        for (;;) {
            const line = await stdin.readLine(waiting ? '...    ' : prompt);
            if (line === null) {
                break;
            }
            const result = await claro.executeReplLine(line);
            waiting = !result.done;
            printOutput(result.output);
            if (result.exited) {
                break;
            }
        }
    } finally {
        stdin.close();
    }
    return 0;
}

/**
 * Entry point. Returns the process exit code.
 */
export async function main(args: string[]): Promise<number> {
    if (args.length === 0 || args.includes('-h') || args.includes('--help')) {
        console.log(USAGE);
        return args.length === 0 ? 2 : 0;
    }

    if (args.includes('--version')) {
        console.log(`claro ${VERSION}`);
        return 0;
    }

    const configPath = getArg(args, '--config');
    const file = getArg(args, '-e') ?? args.find((arg, i) => !arg.startsWith('-') && args[i - 1] !== '--config');
    const interactive = args.includes('-i');

    if (!interactive && file === undefined) {
        console.error('Error: No script file given.');
        console.log(USAGE);
        return 2;
    }

    let config: ClaroConfig;
    try {
        if (configPath) {
            config = loadConfig(configPath);
        } else {
            config = file !== undefined && !interactive ? loadConfigForScript(file) : loadConfig();
        }
    } catch (error) {
        if (error instanceof ConfigError) {
            console.error(`Error: ${error.message}`);
            return 1;
        }
        throw error;
    }

    if (args.includes('--debug')) {
        Executor.debug = true;
    }

    return interactive ? runRepl(config) : runFile(file ?? '', config);
}

const entry = process.argv[1];
if (entry && fs.existsSync(entry) && fileURLToPath(import.meta.url) === fs.realpathSync(entry)) {
    main(process.argv.slice(2)).then(
        code => {
            process.exitCode = code;
        },
        (error: unknown) => {
            console.error(error instanceof Error ? error.stack ?? error.message : String(error));
            process.exitCode = 1;
        }
    );
}

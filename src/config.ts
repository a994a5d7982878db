/**
 * Configuration loader for Claro.
 *
 * Loads claro.config.json5 (or .clarorc) from the script's directory or the working directory.
 * Files are JSON5, so comments and trailing commas are allowed.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import JSON5 from 'json5';

export const CONFIG_FILENAMES = ['claro.config.json5', '.clarorc'];

export interface ClaroConfig {
    maxCallDepth?: number;
    debug?: boolean;
    prompt?: string;
}

export class ConfigError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'ConfigError';
    }
}

/**
 * Load configuration from the filesystem.
 *
 * Search order:
 * 1. Explicit path (if provided)
 * 2. claro.config.json5 in cwd
 * 3. .clarorc in cwd
 *
 * Returns an empty config if no file is found. Environment overrides are applied last.
 */
export function loadConfig(explicitPath?: string, env: NodeJS.ProcessEnv = process.env): ClaroConfig {
    if (explicitPath) {
        return applyEnvOverrides(readConfigFile(explicitPath), env);
    }

    const found = findConfigFile(process.cwd());
    return applyEnvOverrides(found ? readConfigFile(found) : {}, env);
}

/**
 * Load config relative to a script file's directory, falling back to cwd.
 */
export function loadConfigForScript(scriptPath: string, env: NodeJS.ProcessEnv = process.env): ClaroConfig {
    const scriptDir = path.dirname(path.resolve(scriptPath));
    const found = findConfigFile(scriptDir);
    if (found) {
        return applyEnvOverrides(readConfigFile(found), env);
    }
    return loadConfig(undefined, env);
}

function findConfigFile(dir: string): string | null {
    for (const filename of CONFIG_FILENAMES) {
        const filePath = path.join(dir, filename);
        if (fs.existsSync(filePath)) {
            return filePath;
        }
    }
    return null;
}

export function readConfigFile(filePath: string): ClaroConfig {
    let content: string;
    try {
        content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Cannot read config file ${filePath}: ${reason}`);
    }

    let parsed: unknown;
    try {
        parsed = JSON5.parse(content);
    } catch (error) {
        const reason = error instanceof Error ? error.message : String(error);
        throw new ConfigError(`Invalid JSON5 in config file ${filePath}: ${reason}`);
    }

    return validateConfig(parsed, filePath);
}

/**
 * Validate config structure. Throws ConfigError on unknown keys or wrong types.
 */
export function validateConfig(raw: unknown, source: string): ClaroConfig {
    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
        throw new ConfigError(`Config in ${source} must be an object`);
    }

    const config: ClaroConfig = {};
    for (const [key, value] of Object.entries(raw)) {
        switch (key) {
            case 'maxCallDepth':
                config.maxCallDepth = parseDepth(value, `"maxCallDepth" in ${source}`);
                break;
            case 'debug':
                if (typeof value !== 'boolean') {
                    throw new ConfigError(`Invalid "debug" in ${source}: must be a boolean`);
                }
                config.debug = value;
                break;
            case 'prompt':
                if (typeof value !== 'string') {
                    throw new ConfigError(`Invalid "prompt" in ${source}: must be a string`);
                }
                config.prompt = value;
                break;
            default:
                throw new ConfigError(`Unknown config key "${key}" in ${source}`);
        }
    }
    return config;
}

function parseDepth(value: unknown, label: string): number {
    if (typeof value !== 'number' || !Number.isInteger(value) || value < 1) {
        throw new ConfigError(`Invalid ${label}: must be a positive integer`);
    }
    return value;
}

/**
 * CLARO_MAX_CALL_DEPTH and CLARO_DEBUG win over file settings
 */
export function applyEnvOverrides(config: ClaroConfig, env: NodeJS.ProcessEnv): ClaroConfig {
    const result: ClaroConfig = { ...config };
    const depth = env.CLARO_MAX_CALL_DEPTH;
    if (depth !== undefined && depth !== '') {
        result.maxCallDepth = parseDepth(Number(depth), 'CLARO_MAX_CALL_DEPTH');
    }
    if (env.CLARO_DEBUG === 'true') {
        result.debug = true;
    }
    return result;
}

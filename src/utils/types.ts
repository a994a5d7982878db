/**
 * Shared types for utility functions
 */

export type Value = string | number | boolean | null | Value[] | ValueMap;

export interface ValueMap {
    [key: string]: Value;
}

export type ValueType = 'int' | 'float' | 'string' | 'boolean' | 'null' | 'list' | 'dict';

/**
 * One line of a loaded program.
 * lineNumber is the 1-based line in the original source, before blank and comment lines were dropped.
 */
export interface SourceLine {
    text: string;
    lineNumber: number;
}

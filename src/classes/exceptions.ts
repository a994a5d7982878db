/**
 * Exception classes for Claro execution errors
 */

export type ErrorKind =
    | 'InvalidStatement'
    | 'MissingArgument'
    | 'FunctionDefinitionError'
    | 'UnterminatedBlock'
    | 'UndefinedFunction'
    | 'ArityMismatch'
    | 'TypeMismatch'
    | 'NotIterable'
    | 'ExpressionError'
    | 'RecursionLimitExceeded'
    | 'InputError'
    | 'ControlFlowError';

/**
 * Base class for every error a Claro program can raise.
 * lineNumber is the 1-based original source line, or null until the executor attaches it.
 */
export class ScriptError extends Error {
    readonly kind: ErrorKind;
    lineNumber: number | null;
    /** Recoverable errors can be caught by a TRY/EXCEPT region */
    readonly recoverable: boolean;

    constructor(kind: ErrorKind, message: string, lineNumber: number | null = null, recoverable: boolean = true) {
        super(message);
        this.kind = kind;
        this.lineNumber = lineNumber;
        this.recoverable = recoverable;
        this.name = kind;
    }

    /**
     * Attach a line number if none is known yet. Errors raised deeper down keep their own line.
     */
    atLine(lineNumber: number): this {
        if (this.lineNumber === null) {
            this.lineNumber = lineNumber;
        }
        return this;
    }

    /**
     * Message with its line prefix, e.g. "Error at line 3: Unknown statement: FOO"
     */
    describe(): string {
        return this.lineNumber === null
            ? `Error: ${this.message}`
            : `Error at line ${this.lineNumber}: ${this.message}`;
    }
}

export class InvalidStatementError extends ScriptError {
    constructor(message: string, lineNumber: number | null = null) {
        super('InvalidStatement', message, lineNumber);
    }
}

export class MissingArgumentError extends ScriptError {
    constructor(message: string, lineNumber: number | null = null) {
        super('MissingArgument', message, lineNumber);
    }
}

export class FunctionDefinitionError extends ScriptError {
    constructor(message: string, lineNumber: number | null = null) {
        super('FunctionDefinitionError', message, lineNumber);
    }
}

export class UnterminatedBlockError extends ScriptError {
    readonly keyword: string;

    constructor(keyword: string, lineNumber: number) {
        super('UnterminatedBlock', `${keyword} block starting at line ${lineNumber} has no matching END`, lineNumber);
        this.keyword = keyword;
    }
}

export class UndefinedFunctionError extends ScriptError {
    readonly functionName: string;

    constructor(functionName: string, lineNumber: number | null = null) {
        super('UndefinedFunction', `Function '${functionName}' is not defined`, lineNumber);
        this.functionName = functionName;
    }
}

export class ArityMismatchError extends ScriptError {
    constructor(functionName: string, expected: number, received: number, lineNumber: number | null = null) {
        super('ArityMismatch', `Function '${functionName}' expects ${expected} argument(s), got ${received}`, lineNumber);
    }
}

export class TypeMismatchError extends ScriptError {
    constructor(message: string, lineNumber: number | null = null) {
        super('TypeMismatch', message, lineNumber);
    }
}

export class NotIterableError extends ScriptError {
    constructor(typeName: string, lineNumber: number | null = null) {
        super('NotIterable', `Value of type ${typeName} is not iterable`, lineNumber);
    }
}

export class ExpressionError extends ScriptError {
    readonly expression: string;
    readonly reason: string;

    constructor(expression: string, reason: string, lineNumber: number | null = null) {
        super('ExpressionError', `Cannot evaluate '${expression}': ${reason}`, lineNumber);
        this.expression = expression;
        this.reason = reason;
    }
}

export class RecursionLimitExceededError extends ScriptError {
    constructor(functionName: string, limit: number, lineNumber: number | null = null) {
        super('RecursionLimitExceeded', `Call depth limit of ${limit} exceeded while calling '${functionName}'`, lineNumber);
    }
}

export class InputError extends ScriptError {
    constructor(message: string, lineNumber: number | null = null) {
        super('InputError', message, lineNumber);
    }
}

/**
 * BREAK or CONTINUE that escaped every enclosing loop. Never caught by TRY.
 */
export class ControlFlowError extends ScriptError {
    constructor(message: string, lineNumber: number | null = null) {
        super('ControlFlowError', message, lineNumber, false);
    }
}

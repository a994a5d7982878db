/**
 * Utility for formatting errors with code context
 */

export interface ErrorContext {
    message: string;            // Error message, usually ScriptError.describe()
    lineNumber?: number | null; // 1-based line in the original source
    source?: string;            // Original source code
}

/**
 * Format an error message with the surrounding source lines.
 * The failing line is marked with '>'; two lines before and after are shown.
 *
 * @example
 * ```
 * Error at line 2: Unknown statement: PRNT
 *
 * Context:
 *      1 | VARIABLE x = 1
 *   >  2 | PRNT x
 *      3 | PRINT x
 * ```
 */
export function formatErrorWithContext(context: ErrorContext): string {
    const { message, lineNumber, source } = context;

    if (source === undefined || lineNumber === undefined || lineNumber === null) {
        return message;
    }

    const lines = source.split(/\r?\n/);
    const lineIndex = lineNumber - 1;
    if (lineIndex < 0 || lineIndex >= lines.length) {
        return message;
    }

    const contextLines: string[] = [];
    for (let i = Math.max(0, lineIndex - 2); i < Math.min(lines.length, lineIndex + 3); i++) {
        const lineNum = (i + 1).toString().padStart(3, ' ');
        const marker = i === lineIndex ? '>' : ' ';
        contextLines.push(`  ${marker}${lineNum} | ${lines[i]}`);
    }

    return message + '\n\nContext:\n' + contextLines.join('\n');
}

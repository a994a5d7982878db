/**
 * Program loader: turns raw source text into the flat line list the executor runs over
 */

import type { SourceLine } from '../utils';

/**
 * True for lines the loader drops: '# ...' and '// ...'
 */
export function isCommentLine(text: string): boolean {
    return text.startsWith('#') || text.startsWith('//');
}

/**
 * Load a program.
 * Blank and comment lines are removed, the rest are trimmed.
 * Every kept line remembers its 1-based line number in the original source.
 * A line ending with a backslash is joined with the next one and keeps the first line's number.
 */
export function loadProgram(source: string): SourceLine[] {
    const rawLines = source.split(/\r?\n/);
    const lines: SourceLine[] = [];
    let i = 0;

    while (i < rawLines.length) {
        const lineNumber = i + 1;
        let text = rawLines[i].trim();
        i++;

        while (text.endsWith('\\') && i < rawLines.length) {
            text = text.slice(0, -1).trimEnd() + ' ' + rawLines[i].trim();
            i++;
        }
        if (text.endsWith('\\')) {
            text = text.slice(0, -1).trimEnd();
        }

        if (text.length === 0 || isCommentLine(text)) {
            continue;
        }
        lines.push({ text, lineNumber });
    }

    return lines;
}

/**
 * First word of a statement line, upper-cased; the keyword the dispatcher switches on
 */
export function keywordOf(line: SourceLine): string {
    const match = line.text.match(/^\S+/);
    return match ? match[0].toUpperCase() : '';
}

/**
 * Everything after the keyword, trimmed
 */
export function argumentsOf(line: SourceLine): string {
    return line.text.replace(/^\S+\s*/, '').trim();
}

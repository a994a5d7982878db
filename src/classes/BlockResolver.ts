/**
 * BlockResolver: finds the ELSE / EXCEPT / FINALLY / END lines that belong to a block opener.
 *
 * Every construct closes with the same END, so matching is a forward scan with a depth counter.
 * Nothing is cached; each jump re-scans from the opener.
 */

import type { SourceLine } from '../utils';
import { keywordOf } from './Program';
import { InvalidStatementError, UnterminatedBlockError } from './exceptions';

export const BLOCK_OPENERS: ReadonlySet<string> = new Set(['IF', 'WHILE', 'FOR', 'FUNC', 'TRY']);

export interface TryRegion {
    exceptIndex: number | null;
    finallyIndex: number | null;
    endIndex: number;
}

export class BlockResolver {
    /**
     * Index of the END matching the opener at openIndex
     */
    static findClose(openIndex: number, lines: SourceLine[]): number {
        return BlockResolver.scan(openIndex, lines, () => false);
    }

    /**
     * Index of the first depth-0 ELSE, or of the matching END when there is none
     */
    static findElseOrClose(openIndex: number, lines: SourceLine[]): number {
        return BlockResolver.scan(openIndex, lines, keyword => keyword === 'ELSE');
    }

    /**
     * Split a TRY region into its EXCEPT, FINALLY and END lines
     */
    static partitionTry(openIndex: number, lines: SourceLine[]): TryRegion {
        let exceptIndex: number | null = null;
        let finallyIndex: number | null = null;

        const endIndex = BlockResolver.scan(openIndex, lines, (keyword, index) => {
            if (keyword === 'EXCEPT') {
                if (exceptIndex !== null) {
                    throw new InvalidStatementError('TRY block has more than one EXCEPT', lines[index].lineNumber);
                }
                if (finallyIndex !== null) {
                    throw new InvalidStatementError('EXCEPT must come before FINALLY', lines[index].lineNumber);
                }
                exceptIndex = index;
            } else if (keyword === 'FINALLY') {
                if (finallyIndex !== null) {
                    throw new InvalidStatementError('TRY block has more than one FINALLY', lines[index].lineNumber);
                }
                finallyIndex = index;
            }
            return false;
        });

        return { exceptIndex, finallyIndex, endIndex };
    }

    /**
     * Walk forward from openIndex + 1. Openers nest, END at depth 0 closes.
     * stopAt sees every depth-0 keyword and may end the scan early.
     */
    private static scan(
        openIndex: number,
        lines: SourceLine[],
        stopAt: (keyword: string, index: number) => boolean
    ): number {
        let depth = 0;

        for (let i = openIndex + 1; i < lines.length; i++) {
            const keyword = keywordOf(lines[i]);

            if (BLOCK_OPENERS.has(keyword)) {
                depth++;
            } else if (keyword === 'END') {
                if (depth === 0) {
                    return i;
                }
                depth--;
            } else if (depth === 0 && stopAt(keyword, i)) {
                return i;
            }
        }

        const opener = lines[openIndex];
        throw new UnterminatedBlockError(keywordOf(opener), opener.lineNumber);
    }
}

/**
 * FunctionTable: user-defined functions of one interpreter instance
 */

import type { SourceLine } from '../utils';
import { BlockResolver } from './BlockResolver';
import { FunctionDefinitionError, UnterminatedBlockError } from './exceptions';

export interface FunctionDefinition {
    name: string;
    params: string[];
    body: SourceLine[];
    lineNumber: number;   // line of the FUNC statement
}

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;

export function isIdentifier(text: string): boolean {
    return IDENTIFIER.test(text);
}

export class FunctionTable {
    private functions: Map<string, FunctionDefinition> = new Map();

    /**
     * Parse `name [params]` from a FUNC line and store the body up to its END.
     * Accepts `add a b`, `add a, b` and `add(a, b)`. Redefinition overwrites.
     *
     * @returns the stored definition and the index of its END line
     */
    define(signatureText: string, lineIndex: number, lines: SourceLine[]): { definition: FunctionDefinition; endIndex: number } {
        const lineNumber = lines[lineIndex].lineNumber;
        const { name, params } = FunctionTable.parseSignature(signatureText, lineNumber);

        let endIndex: number;
        try {
            endIndex = BlockResolver.findClose(lineIndex, lines);
        } catch (error) {
            if (error instanceof UnterminatedBlockError) {
                throw new FunctionDefinitionError(`Function '${name}' has no matching END`, lineNumber);
            }
            throw error;
        }

        const definition: FunctionDefinition = {
            name,
            params,
            body: lines.slice(lineIndex + 1, endIndex),
            lineNumber
        };
        this.functions.set(name, definition);
        return { definition, endIndex };
    }

    get(name: string): FunctionDefinition | undefined {
        return this.functions.get(name);
    }

    names(): string[] {
        return Array.from(this.functions.keys());
    }

    entries(): FunctionDefinition[] {
        return Array.from(this.functions.values());
    }

    static parseSignature(signatureText: string, lineNumber: number): { name: string; params: string[] } {
        const text = signatureText.trim();
        if (text.length === 0) {
            throw new FunctionDefinitionError('FUNC needs a function name', lineNumber);
        }

        let nameText: string;
        let paramText: string;
        const parenMatch = text.match(/^([^\s(]+)\s*\((.*)\)$/);
        if (parenMatch) {
            nameText = parenMatch[1];
            paramText = parenMatch[2];
        } else {
            const firstSpace = text.search(/\s/);
            nameText = firstSpace === -1 ? text : text.slice(0, firstSpace);
            paramText = firstSpace === -1 ? '' : text.slice(firstSpace + 1);
        }

        if (!isIdentifier(nameText)) {
            throw new FunctionDefinitionError(`Invalid function name '${nameText}'`, lineNumber);
        }

        const params = paramText.split(/[\s,]+/).filter(param => param.length > 0);
        const seen = new Set<string>();
        for (const param of params) {
            if (!isIdentifier(param)) {
                throw new FunctionDefinitionError(`Invalid parameter name '${param}' in function '${nameText}'`, lineNumber);
            }
            if (seen.has(param)) {
                throw new FunctionDefinitionError(`Duplicate parameter '${param}' in function '${nameText}'`, lineNumber);
            }
            seen.add(param);
        }

        return { name: nameText, params };
    }
}

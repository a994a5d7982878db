/**
 * TokenStream - A stream of tokens for parsing
 *
 * This class provides convenient methods for consuming and inspecting tokens
 * during expression parsing. It supports lookahead and error reporting.
 */

import { TokenKind } from './Lexer';
import type { Token } from './Lexer';

export class TokenStream {
    private tokens: Token[];
    private position: number = 0;

    /**
     * Create a new TokenStream
     * @param tokens - Array of tokens to stream (terminated by EOF)
     * @param startIndex - Optional starting index (default 0)
     */
    constructor(tokens: Token[], startIndex: number = 0) {
        this.tokens = tokens;
        this.position = startIndex;
    }

    /**
     * Get the current token without consuming it
     */
    current(): Token {
        return this.peek(0);
    }

    /**
     * Look ahead at a token without consuming it.
     * Past the end this keeps returning the EOF token.
     */
    peek(offset: number = 0): Token {
        const index = Math.min(this.position + offset, this.tokens.length - 1);
        return this.tokens[index];
    }

    /**
     * Consume and return the current token
     */
    next(): Token {
        const token = this.current();
        if (this.position < this.tokens.length - 1) {
            this.position++;
        }
        return token;
    }

    /**
     * Check if we're at the end of the token stream
     */
    isAtEnd(): boolean {
        return this.current().kind === TokenKind.EOF;
    }

    /**
     * Check if the current token matches the given kind, without consuming it
     */
    check(kind: TokenKind): boolean {
        return this.current().kind === kind;
    }

    /**
     * Check if the current token is the given word operator (and, or, not, in)
     */
    checkKeyword(word: string): boolean {
        const token = this.current();
        return token.kind === TokenKind.KEYWORD && token.text === word;
    }

    /**
     * If the current token matches, consume it and return true
     * Otherwise, return false without consuming
     */
    match(kind: TokenKind): boolean {
        if (this.check(kind)) {
            this.next();
            return true;
        }
        return false;
    }

    /**
     * Expect the current token to match, consume it, and return it
     * If it doesn't match, throw an error
     *
     * @param kind - TokenKind to expect
     * @param message - Optional custom error message
     */
    expect(kind: TokenKind, message?: string): Token {
        const token = this.current();
        if (token.kind !== kind) {
            const found = token.kind === TokenKind.EOF ? 'end of expression' : `'${token.text}'`;
            throw new Error(message || `Expected ${kind} but found ${found} at ${this.formatPosition()}`);
        }
        this.next();
        return token;
    }

    /**
     * Format current position for error messages
     * @returns String like "column 5"
     */
    formatPosition(): string {
        const token = this.current();
        if (token.kind === TokenKind.EOF) {
            return 'end of expression';
        }
        return `column ${token.column + 1}`;
    }
}

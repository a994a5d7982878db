/**
 * Lexer class for tokenizing Claro expressions and splitting statement arguments
 */

// ============================================================================
// Token Types
// ============================================================================

/**
 * Token kinds for Claro expressions
 * Using const object instead of enum for better compatibility
 */
export const TokenKind = {
    // Literals
    STRING: 'STRING',           // "hello", 'world'
    NUMBER: 'NUMBER',           // 42, 3.14
    BOOLEAN: 'BOOLEAN',         // true, false, True, False
    NULL: 'NULL',               // null, None

    // Identifiers
    IDENTIFIER: 'IDENTIFIER',   // x, total, math
    KEYWORD: 'KEYWORD',         // and, or, not, in

    // Arithmetic
    PLUS: 'PLUS',               // +
    MINUS: 'MINUS',             // -
    MULTIPLY: 'MULTIPLY',       // *
    DIVIDE: 'DIVIDE',           // /
    FLOOR_DIVIDE: 'FLOOR_DIVIDE', // //
    MODULO: 'MODULO',           // %
    POWER: 'POWER',             // **

    // Comparison Operators
    EQ: 'EQ',                   // ==
    NE: 'NE',                   // !=
    GT: 'GT',                   // >
    LT: 'LT',                   // <
    GTE: 'GTE',                 // >=
    LTE: 'LTE',                 // <=

    // Logical Operators
    AND: 'AND',                 // &&
    OR: 'OR',                   // ||
    NOT: 'NOT',                 // !

    // Punctuation
    LPAREN: 'LPAREN',           // (
    RPAREN: 'RPAREN',           // )
    LBRACKET: 'LBRACKET',       // [
    RBRACKET: 'RBRACKET',       // ]
    LBRACE: 'LBRACE',           // {
    RBRACE: 'RBRACE',           // }
    COMMA: 'COMMA',             // ,
    COLON: 'COLON',             // :
    DOT: 'DOT',                 // .

    EOF: 'EOF',
} as const;

export type TokenKind = typeof TokenKind[keyof typeof TokenKind];

/**
 * Word operators. Matched case-insensitively.
 */
export const KEYWORDS = new Set(['and', 'or', 'not', 'in']);

export type TokenValue = string | number | boolean | null;

/**
 * A single token in an expression
 */
export interface Token {
    kind: TokenKind;
    text: string;           // Original text from source
    column: number;         // 0-based column offset
    value?: TokenValue;     // Parsed value for literals
}

/**
 * Raised for characters or strings the lexer cannot tokenize
 */
export class LexerError extends Error {
    readonly column: number;

    constructor(message: string, column: number) {
        super(`${message} at column ${column + 1}`);
        this.name = 'LexerError';
        this.column = column;
    }
}

const SINGLE_CHAR_TOKENS: Record<string, TokenKind> = {
    '+': TokenKind.PLUS,
    '-': TokenKind.MINUS,
    '*': TokenKind.MULTIPLY,
    '/': TokenKind.DIVIDE,
    '%': TokenKind.MODULO,
    '>': TokenKind.GT,
    '<': TokenKind.LT,
    '!': TokenKind.NOT,
    '(': TokenKind.LPAREN,
    ')': TokenKind.RPAREN,
    '[': TokenKind.LBRACKET,
    ']': TokenKind.RBRACKET,
    '{': TokenKind.LBRACE,
    '}': TokenKind.RBRACE,
    ',': TokenKind.COMMA,
    ':': TokenKind.COLON,
    '.': TokenKind.DOT,
};

const TWO_CHAR_TOKENS: Record<string, TokenKind> = {
    '==': TokenKind.EQ,
    '!=': TokenKind.NE,
    '>=': TokenKind.GTE,
    '<=': TokenKind.LTE,
    '&&': TokenKind.AND,
    '||': TokenKind.OR,
    '**': TokenKind.POWER,
    '//': TokenKind.FLOOR_DIVIDE,
};

const OPENERS: Record<string, string> = { '(': ')', '[': ']', '{': '}' };

// ============================================================================
// Lexer Implementation
// ============================================================================

export class Lexer {
    /**
     * Tokenize one expression into Token objects
     *
     * @param source - Expression text (a single line)
     * @returns Array of tokens, always terminated by an EOF token
     */
    static tokenize(source: string): Token[] {
        const tokens: Token[] = [];
        let i = 0;

        const makeToken = (kind: TokenKind, text: string, column: number, value?: TokenValue): Token => {
            return { kind, text, column, value };
        };

        const isWhitespace = (char: string): boolean => {
            return char === ' ' || char === '\t' || char === '\r' || char === '\n';
        };

        const isDigit = (char: string): boolean => {
            return char >= '0' && char <= '9';
        };

        const isAlpha = (char: string): boolean => {
            return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z') || char === '_';
        };

        const isAlphaNumeric = (char: string): boolean => {
            return isAlpha(char) || isDigit(char);
        };

        while (i < source.length) {
            const char = source[i];
            const nextChar = i + 1 < source.length ? source[i + 1] : '';

            if (isWhitespace(char)) {
                i++;
                continue;
            }

            // Strings (", ')
            if (char === '"' || char === "'") {
                const start = i;
                const quoteChar = char;
                let content = '';
                let closed = false;
                i++;

                while (i < source.length) {
                    const c = source[i];
                    if (c === '\\' && i + 1 < source.length) {
                        const escaped = source[i + 1];
                        switch (escaped) {
                            case 'n': content += '\n'; break;
                            case 't': content += '\t'; break;
                            case 'r': content += '\r'; break;
                            default: content += escaped; break;
                        }
                        i += 2;
                        continue;
                    }
                    if (c === quoteChar) {
                        closed = true;
                        i++;
                        break;
                    }
                    content += c;
                    i++;
                }

                if (!closed) {
                    throw new LexerError('Unterminated string literal', start);
                }
                tokens.push(makeToken(TokenKind.STRING, source.slice(start, i), start, content));
                continue;
            }

            // Numbers (integers and decimals). A leading minus is a unary operator, not part of the literal.
            if (isDigit(char) || (char === '.' && isDigit(nextChar))) {
                const start = i;
                while (i < source.length && isDigit(source[i])) {
                    i++;
                }
                if (source[i] === '.' && isDigit(source[i + 1] ?? '')) {
                    i++;
                    while (i < source.length && isDigit(source[i])) {
                        i++;
                    }
                }
                if ((source[i] === 'e' || source[i] === 'E') && /^[eE][+-]?\d/.test(source.slice(i, i + 3))) {
                    i++;
                    if (source[i] === '+' || source[i] === '-') {
                        i++;
                    }
                    while (i < source.length && isDigit(source[i])) {
                        i++;
                    }
                }
                const text = source.slice(start, i);
                tokens.push(makeToken(TokenKind.NUMBER, text, start, parseFloat(text)));
                continue;
            }

            const pair = char + nextChar;
            const twoCharKind = TWO_CHAR_TOKENS[pair];
            if (twoCharKind) {
                tokens.push(makeToken(twoCharKind, pair, i));
                i += 2;
                continue;
            }

            const singleCharKind = SINGLE_CHAR_TOKENS[char];
            if (singleCharKind) {
                tokens.push(makeToken(singleCharKind, char, i));
                i++;
                continue;
            }

            // Identifiers, keywords and word literals
            if (isAlpha(char)) {
                const start = i;
                while (i < source.length && isAlphaNumeric(source[i])) {
                    i++;
                }
                const text = source.slice(start, i);
                const lower = text.toLowerCase();

                if (lower === 'true' || lower === 'false') {
                    tokens.push(makeToken(TokenKind.BOOLEAN, text, start, lower === 'true'));
                } else if (lower === 'null' || text === 'None') {
                    tokens.push(makeToken(TokenKind.NULL, text, start, null));
                } else if (KEYWORDS.has(lower)) {
                    tokens.push(makeToken(TokenKind.KEYWORD, lower, start));
                } else {
                    tokens.push(makeToken(TokenKind.IDENTIFIER, text, start));
                }
                continue;
            }

            throw new LexerError(`Unexpected character '${char}'`, i);
        }

        tokens.push(makeToken(TokenKind.EOF, '', source.length));
        return tokens;
    }

    /**
     * Split statement arguments on top-level separators.
     * Separators inside quotes or (), [], {} are kept as part of the current piece.
     *
     * @param text - Argument text of a statement
     * @param separator - 'whitespace' to split on runs of blanks, or a single character such as ','
     * @returns Trimmed, non-empty pieces
     */
    static splitTopLevel(text: string, separator: 'whitespace' | string): string[] {
        const pieces: string[] = [];
        const currentChars: string[] = [];
        const closers: string[] = [];
        let inString: false | '"' | "'" = false;

        const flushCurrent = () => {
            const piece = currentChars.join('').trim();
            if (piece.length > 0) {
                pieces.push(piece);
            }
            currentChars.length = 0;
        };

        for (let i = 0; i < text.length; i++) {
            const char = text[i];

            if (inString) {
                currentChars.push(char);
                if (char === '\\' && i + 1 < text.length) {
                    currentChars.push(text[i + 1]);
                    i++;
                } else if (char === inString) {
                    inString = false;
                }
                continue;
            }

            if (char === '"' || char === "'") {
                inString = char;
                currentChars.push(char);
                continue;
            }

            const closer = OPENERS[char];
            if (closer) {
                closers.push(closer);
                currentChars.push(char);
                continue;
            }
            if (closers.length > 0 && char === closers[closers.length - 1]) {
                closers.pop();
                currentChars.push(char);
                continue;
            }

            if (closers.length === 0) {
                const isSeparator = separator === 'whitespace' ? /\s/.test(char) : char === separator;
                if (isSeparator) {
                    flushCurrent();
                    continue;
                }
            }

            currentChars.push(char);
        }

        flushCurrent();
        return pieces;
    }

    /**
     * True if the text contains the separator outside quotes and brackets
     */
    static hasTopLevel(text: string, separator: string): boolean {
        return Lexer.splitTopLevel(text, separator).length > 1;
    }
}

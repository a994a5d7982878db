/**
 * Parser for expressions
 * Converts tokens into Expression AST nodes
 */

import { TokenStream } from '../classes/TokenStream';
import { Lexer, TokenKind } from '../classes/Lexer';
import type { Token } from '../classes/Lexer';
import type { Expression, BinaryOperator, DictEntry } from '../types/Ast.type';

/**
 * Parse a complete expression string.
 * Trailing tokens after a valid expression are an error.
 *
 * @param source - Expression text
 * @returns Expression AST node
 */
export function parseExpressionText(source: string): Expression {
    const stream = new TokenStream(Lexer.tokenize(source));
    if (stream.isAtEnd()) {
        throw new Error('Empty expression');
    }
    const expr = parseExpression(stream);
    if (!stream.isAtEnd()) {
        throw new Error(`Unexpected '${stream.current().text}' at ${stream.formatPosition()}`);
    }
    return expr;
}

/**
 * Parse an expression from TokenStream
 *
 * Precedence levels (lowest first):
 * - or, ||
 * - and, &&
 * - not, !
 * - ==, !=, <, <=, >, >=, in, not in
 * - +, -
 * - *, /, //, %
 * - unary -, +
 * - ** (right associative)
 * - postfix [index], .member
 */
export function parseExpression(stream: TokenStream): Expression {
    return parseOr(stream);
}

function parseOr(stream: TokenStream): Expression {
    let left = parseAnd(stream);
    while (stream.check(TokenKind.OR) || stream.checkKeyword('or')) {
        const token = stream.next();
        const right = parseAnd(stream);
        left = { type: 'logical', operator: 'or', left, right, column: token.column };
    }
    return left;
}

function parseAnd(stream: TokenStream): Expression {
    let left = parseNot(stream);
    while (stream.check(TokenKind.AND) || stream.checkKeyword('and')) {
        const token = stream.next();
        const right = parseNot(stream);
        left = { type: 'logical', operator: 'and', left, right, column: token.column };
    }
    return left;
}

function parseNot(stream: TokenStream): Expression {
    if (stream.check(TokenKind.NOT) || stream.checkKeyword('not')) {
        const token = stream.next();
        const argument = parseNot(stream);
        return { type: 'unary', operator: 'not', argument, column: token.column };
    }
    return parseComparison(stream);
}

const COMPARISON_OPERATORS: Partial<Record<TokenKind, BinaryOperator>> = {
    [TokenKind.EQ]: '==',
    [TokenKind.NE]: '!=',
    [TokenKind.LT]: '<',
    [TokenKind.LTE]: '<=',
    [TokenKind.GT]: '>',
    [TokenKind.GTE]: '>=',
};

function parseComparison(stream: TokenStream): Expression {
    let left = parseAdditive(stream);

    while (true) {
        const token = stream.current();
        let operator = COMPARISON_OPERATORS[token.kind];

        if (!operator && stream.checkKeyword('in')) {
            operator = 'in';
        } else if (!operator && stream.checkKeyword('not')) {
            const following = stream.peek(1);
            if (following.kind !== TokenKind.KEYWORD || following.text !== 'in') {
                break;
            }
            stream.next();
            operator = 'not in';
        }
        if (!operator) {
            break;
        }

        stream.next();
        const right = parseAdditive(stream);
        left = { type: 'binary', operator, left, right, column: token.column };
    }

    return left;
}

function parseAdditive(stream: TokenStream): Expression {
    let left = parseMultiplicative(stream);
    while (stream.check(TokenKind.PLUS) || stream.check(TokenKind.MINUS)) {
        const token = stream.next();
        const operator = token.kind === TokenKind.PLUS ? '+' : '-';
        const right = parseMultiplicative(stream);
        left = { type: 'binary', operator, left, right, column: token.column };
    }
    return left;
}

const MULTIPLICATIVE_OPERATORS: Partial<Record<TokenKind, BinaryOperator>> = {
    [TokenKind.MULTIPLY]: '*',
    [TokenKind.DIVIDE]: '/',
    [TokenKind.FLOOR_DIVIDE]: '//',
    [TokenKind.MODULO]: '%',
};

function parseMultiplicative(stream: TokenStream): Expression {
    let left = parseUnary(stream);
    while (true) {
        const token = stream.current();
        const operator = MULTIPLICATIVE_OPERATORS[token.kind];
        if (!operator) {
            break;
        }
        stream.next();
        const right = parseUnary(stream);
        left = { type: 'binary', operator, left, right, column: token.column };
    }
    return left;
}

function parseUnary(stream: TokenStream): Expression {
    if (stream.check(TokenKind.MINUS) || stream.check(TokenKind.PLUS)) {
        const token = stream.next();
        const operator = token.kind === TokenKind.MINUS ? '-' : '+';
        const argument = parseUnary(stream);
        return { type: 'unary', operator, argument, column: token.column };
    }
    return parsePower(stream);
}

function parsePower(stream: TokenStream): Expression {
    const base = parsePostfix(stream);
    if (stream.check(TokenKind.POWER)) {
        const token = stream.next();
        // Right operand goes back through unary so that 2 ** -1 and 2 ** 3 ** 2 both parse
        const exponent = parseUnary(stream);
        return { type: 'binary', operator: '**', left: base, right: exponent, column: token.column };
    }
    return base;
}

function parsePostfix(stream: TokenStream): Expression {
    let expr = parsePrimary(stream);

    while (true) {
        const token = stream.current();
        if (token.kind === TokenKind.LBRACKET) {
            stream.next();
            const index = parseExpression(stream);
            stream.expect(TokenKind.RBRACKET, `Expected ']' after index at ${stream.formatPosition()}`);
            expr = { type: 'index', object: expr, index, column: token.column };
            continue;
        }
        if (token.kind === TokenKind.DOT) {
            stream.next();
            const property = stream.expect(TokenKind.IDENTIFIER, `Expected a field name after '.' at ${stream.formatPosition()}`);
            expr = { type: 'member', object: expr, property: property.text, column: token.column };
            continue;
        }
        break;
    }

    return expr;
}

/**
 * Parse a primary expression (literals, identifiers, calls, parenthesized expressions)
 */
function parsePrimary(stream: TokenStream): Expression {
    const startToken = stream.current();

    switch (startToken.kind) {
        case TokenKind.NUMBER:
        case TokenKind.STRING:
        case TokenKind.BOOLEAN:
        case TokenKind.NULL:
            stream.next();
            return { type: 'literal', value: startToken.value ?? null, column: startToken.column };

        case TokenKind.IDENTIFIER:
            return parseIdentifierOrCall(stream);

        case TokenKind.LPAREN: {
            stream.next();
            const expr = parseExpression(stream);
            stream.expect(TokenKind.RPAREN, `Expected ')' to close '(' at column ${startToken.column + 1}`);
            return expr;
        }

        case TokenKind.LBRACKET: {
            stream.next();
            const elements = parseDelimitedList(stream, TokenKind.RBRACKET, parseExpression);
            return { type: 'list', elements, column: startToken.column };
        }

        case TokenKind.LBRACE: {
            stream.next();
            const entries = parseDelimitedList(stream, TokenKind.RBRACE, parseDictEntry);
            return { type: 'dict', entries, column: startToken.column };
        }

        case TokenKind.EOF:
            throw new Error('Unexpected end of expression');

        default:
            throw new Error(`Unexpected '${startToken.text}' at column ${startToken.column + 1}`);
    }
}

/**
 * An identifier, or a call when the (optionally dotted) name is followed by '('.
 * "math.sqrt(x)" is a call to the builtin "math.sqrt"; "point.x" stays a member access.
 */
function parseIdentifierOrCall(stream: TokenStream): Expression {
    const first = stream.current();
    let length = 1;
    while (stream.peek(length).kind === TokenKind.DOT && stream.peek(length + 1).kind === TokenKind.IDENTIFIER) {
        length += 2;
    }

    if (stream.peek(length).kind === TokenKind.LPAREN) {
        const nameParts: string[] = [];
        for (let i = 0; i < length; i++) {
            const token: Token = stream.next();
            if (token.kind === TokenKind.IDENTIFIER) {
                nameParts.push(token.text);
            }
        }
        stream.next(); // consume (
        const args = parseDelimitedList(stream, TokenKind.RPAREN, parseExpression);
        return { type: 'call', callee: nameParts.join('.'), args, column: first.column };
    }

    stream.next();
    return { type: 'identifier', name: first.text, column: first.column };
}

function parseDictEntry(stream: TokenStream): DictEntry {
    const token = stream.current();
    let key: Expression;
    // Bare identifier keys are strings: {name: "x"}
    if (token.kind === TokenKind.IDENTIFIER && stream.peek(1).kind === TokenKind.COLON) {
        stream.next();
        key = { type: 'literal', value: token.text, column: token.column };
    } else {
        key = parseExpression(stream);
    }
    stream.expect(TokenKind.COLON, `Expected ':' after dict key at ${stream.formatPosition()}`);
    const value = parseExpression(stream);
    return { key, value };
}

/**
 * Parse comma-separated items up to the closing token. A trailing comma is allowed.
 */
function parseDelimitedList<T>(stream: TokenStream, closing: TokenKind, parseItem: (stream: TokenStream) => T): T[] {
    const items: T[] = [];
    while (!stream.check(closing)) {
        if (stream.isAtEnd()) {
            throw new Error(`Expected ${closing} before end of expression`);
        }
        items.push(parseItem(stream));
        if (!stream.match(TokenKind.COMMA)) {
            break;
        }
    }
    stream.expect(closing);
    return items;
}

/**
 * Expression AST types for Claro
 *
 * Statements are never turned into nodes: the executor works on source lines directly.
 * Only the argument text of a statement is parsed, into one of these Expression nodes.
 */

import type { Value } from '../utils';

export interface LiteralExpression {
    type: 'literal';
    value: Value;
    column: number;
}

export interface IdentifierExpression {
    type: 'identifier';
    name: string;
    column: number;
}

export interface ListLiteralExpression {
    type: 'list';
    elements: Expression[];
    column: number;
}

export interface DictEntry {
    key: Expression;
    value: Expression;
}

export interface DictLiteralExpression {
    type: 'dict';
    entries: DictEntry[];
    column: number;
}

export type BinaryOperator =
    | '+' | '-' | '*' | '/' | '//' | '%' | '**'
    | '==' | '!=' | '<' | '<=' | '>' | '>='
    | 'in' | 'not in';

export interface BinaryExpression {
    type: 'binary';
    operator: BinaryOperator;
    left: Expression;
    right: Expression;
    column: number;
}

export type LogicalOperator = 'and' | 'or';

/**
 * Short-circuiting and/or, kept apart from BinaryExpression since the right side is evaluated lazily
 */
export interface LogicalExpression {
    type: 'logical';
    operator: LogicalOperator;
    left: Expression;
    right: Expression;
    column: number;
}

export type UnaryOperator = 'not' | '-' | '+';

export interface UnaryExpression {
    type: 'unary';
    operator: UnaryOperator;
    argument: Expression;
    column: number;
}

export interface IndexExpression {
    type: 'index';
    object: Expression;
    index: Expression;
    column: number;
}

/**
 * m.key: dict field access
 */
export interface MemberExpression {
    type: 'member';
    object: Expression;
    property: string;
    column: number;
}

/**
 * callee is the builtin name, possibly module-qualified ("len", "math.sqrt")
 */
export interface CallExpression {
    type: 'call';
    callee: string;
    args: Expression[];
    column: number;
}

export type Expression =
    | LiteralExpression
    | IdentifierExpression
    | ListLiteralExpression
    | DictLiteralExpression
    | BinaryExpression
    | LogicalExpression
    | UnaryExpression
    | IndexExpression
    | MemberExpression
    | CallExpression;

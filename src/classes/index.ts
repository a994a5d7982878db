/**
 * Barrel export for the interpreter classes
 */

export { Lexer, LexerError, TokenKind, KEYWORDS } from './Lexer';
export type { Token, TokenValue } from './Lexer';
export { TokenStream } from './TokenStream';
export { ExpressionEvaluator } from './ExpressionEvaluator';
export { Executor } from './Executor';
export { BlockResolver, BLOCK_OPENERS } from './BlockResolver';
export type { TryRegion } from './BlockResolver';
export { FunctionTable } from './FunctionTable';
export type { FunctionDefinition } from './FunctionTable';
export { loadProgram, keywordOf, argumentsOf, isCommentLine } from './Program';
export * from './exceptions';

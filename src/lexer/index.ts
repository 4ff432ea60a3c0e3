export { SExprLexer, tokenize } from './lexer.js';
export { TokenType, NUMBER_PATTERN, INTEGER_PATTERN, STRING_ESCAPES, type Token } from './tokens.js';

/**
 * Parser module exports
 *
 * - SExprParserBase: token cursor with single-token lookahead
 * - SExprParser: recursive descent into Node trees
 * - preprocess: caller-side helpers for multi-expression files
 */
export { SExprParser, parse, parseTokens, parseOptionsFromConfig, type ParseOptions } from './parser.js';
export { SExprParserBase } from './base.js';
export { stripHashComments, wrapExpressions, parseMany } from './preprocess.js';

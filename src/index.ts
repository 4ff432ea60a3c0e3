export * from './ast/index.js';
export { SExprLexer, tokenize, TokenType, type Token } from './lexer/index.js';
export {
  SExprParser,
  SExprParserBase,
  parse,
  parseTokens,
  parseOptionsFromConfig,
  stripHashComments,
  wrapExpressions,
  parseMany,
  type ParseOptions,
} from './parser/index.js';
export {
  SExprPrinter,
  render,
  DEFAULT_RENDER_STRATEGY,
  DEFAULT_FORMATTERS,
  createRenderStrategy,
  strategyFromConfig,
  formatFloat,
  formatInteger,
  quoteString,
  type RenderStrategy,
  type RenderStrategyOverrides,
  type AtomFormatter,
  type AtomFormatters,
} from './printer/index.js';
export * from './fields/index.js';
export {
  SExprError,
  LexerError,
  ParseError,
  MissingFieldError,
  getSourceLine,
  type SourceLocation,
  type ErrorContext,
  type SyntaxErrorKind,
  type ParseErrorKind,
} from './errors/index.js';
export {
  ENGINE_DEFAULTS,
  FIELD_DEFAULTS,
  ENV_VARS,
  loadEnv,
  resolveEngineConfig,
  type EngineConfig,
  type EnvSource,
  type LoadEnvOptions,
  type LoadEnvResult,
  type LogLevel,
  type TrailingAtomPlacement,
} from './config/index.js';

// Observability
export {
  createStructuredLogger,
  loggerFromConfig,
  ConsoleOutput,
  BufferOutput,
  type StructuredLogger,
  type LogContext,
  type LogEntry,
  type LogOutput,
  type Span,
  type CreateLoggerOptions,
} from './observability/index.js';

import type { Node } from './ast/index.js';
import { parse as parseText } from './parser/index.js';

// Tagged template literal for inline trees
export function sexpr(strings: TemplateStringsArray, ...values: unknown[]): Node {
  let source = strings[0];
  for (let i = 0; i < values.length; i++) {
    source += String(values[i]) + strings[i + 1];
  }
  return parseText(source);
}

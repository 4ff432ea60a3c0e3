import { INTEGER_PATTERN, TokenType, type Token } from '../lexer/tokens.js';
import { ENGINE_DEFAULTS, type EngineConfig } from '../config/constants.js';
import { resolveEngineConfig } from '../config/env.js';
import type { StructuredLogger } from '../observability/logger.js';
import { float, int, list, str, sym, type Node } from '../ast/nodes.js';
import { SExprLexer } from '../lexer/lexer.js';
import { SExprParserBase } from './base.js';

export interface ParseOptions {
  /**
   * Deepest list nesting accepted. Defaults to SEXPR_MAX_DEPTH, then
   * ENGINE_DEFAULTS.MAX_DEPTH; never below ENGINE_DEFAULTS.MIN_DEPTH.
   */
  maxDepth?: number;
  /** Reported in error messages */
  filePath?: string;
  /** Receives debug spans; parsing is silent without one */
  logger?: StructuredLogger;
}

export class SExprParser extends SExprParserBase {
  private maxDepth: number;
  private nodeCount = 0;

  constructor(tokens: Iterable<Token>, source?: string, options: ParseOptions = {}) {
    super(tokens, source, options.filePath);
    this.maxDepth = resolveMaxDepth(options.maxDepth);
  }

  /**
   * Parse exactly one expression. Several top-level expressions must be
   * wrapped by the caller (see wrapExpressions).
   */
  parse(): Node {
    if (this.isAtEnd()) {
      throw this.error('UnexpectedToken', 'Unexpected end of input: expected an expression');
    }

    const node = this.parseExpression(0);

    if (!this.isAtEnd()) {
      const trailing = this.peek();
      const message = trailing?.type === TokenType.CLOSE_PAREN
        ? "Unexpected ')' with no matching '('"
        : 'Unexpected token after the top-level expression';
      throw this.error('UnexpectedToken', message);
    }

    return node;
  }

  /** Number of nodes built by the last parse() */
  get count(): number {
    return this.nodeCount;
  }

  private parseExpression(depth: number): Node {
    const token = this.advance();
    this.nodeCount++;

    switch (token.type) {
      case TokenType.OPEN_PAREN:
        return this.parseList(token, depth + 1);
      case TokenType.CLOSE_PAREN:
        throw this.error('UnexpectedToken', "Unexpected ')' with no matching '('", token);
      case TokenType.NUMBER:
        return this.parseNumber(token);
      case TokenType.STRING:
        return str(token.value);
      case TokenType.SYMBOL:
        return sym(token.value);
    }
  }

  private parseList(open: Token, depth: number): Node {
    if (depth > this.maxDepth) {
      throw this.error(
        'MaxDepthExceeded',
        `List nesting exceeds the maximum depth of ${this.maxDepth}`,
        open
      );
    }

    const children: Node[] = [];
    while (!this.check(TokenType.CLOSE_PAREN)) {
      if (this.isAtEnd()) {
        throw this.error('UnterminatedList', "Unterminated list: missing ')'", open);
      }
      children.push(this.parseExpression(depth));
    }
    this.advance(); // consume ')'

    return list(...children);
  }

  private parseNumber(token: Token): Node {
    const value = Number(token.value);
    // 1e999 and friends overflow; keep the text so it renders back unchanged
    if (!Number.isFinite(value)) return sym(token.value);
    return INTEGER_PATTERN.test(token.value) ? int(value) : float(value);
  }
}

function resolveMaxDepth(requested: number | undefined): number {
  if (requested === undefined || !Number.isInteger(requested)) {
    return resolveEngineConfig().maxDepth;
  }
  return Math.max(ENGINE_DEFAULTS.MIN_DEPTH, requested);
}

/**
 * Options carrying the depth limit of an EngineConfig (see resolveEngineConfig).
 * Explicit overrides win.
 */
export function parseOptionsFromConfig(
  config: Pick<EngineConfig, 'maxDepth'>,
  overrides: ParseOptions = {}
): ParseOptions {
  return { ...overrides, maxDepth: overrides.maxDepth ?? config.maxDepth };
}

/**
 * Parse text holding a single expression into a Node tree.
 * Throws LexerError or ParseError; never returns a partial tree.
 */
export function parse(text: string, options: ParseOptions = {}): Node {
  const span = options.logger?.span('parse');
  try {
    const tokens = new SExprLexer(text, { source: text, filePath: options.filePath }).tokenize();
    const parser = new SExprParser(tokens, text, options);
    const node = parser.parse();
    span?.addContext({ chars: text.length, nodes: parser.count });
    return node;
  } finally {
    span?.end();
  }
}

/**
 * Parse an already tokenized stream (see tokenize())
 */
export function parseTokens(tokens: Iterable<Token>, options: ParseOptions = {}): Node {
  return new SExprParser(tokens, undefined, options).parse();
}

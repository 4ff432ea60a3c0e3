import { TokenType, type Token } from '../lexer/tokens.js';
import { ParseError, type ErrorContext, type ParseErrorKind, type SourceLocation } from '../errors/index.js';

/**
 * Single-token lookahead over a (possibly lazy) token stream
 */
export class SExprParserBase {
  private iterator: Iterator<Token, unknown, undefined>;
  private current?: Token;
  private last?: Token;
  protected source?: string;
  protected filePath?: string;

  constructor(tokens: Iterable<Token>, source?: string, filePath?: string) {
    this.iterator = tokens[Symbol.iterator]();
    this.source = source;
    this.filePath = filePath;
    this.current = this.pull();
  }

  protected peek(): Token | undefined {
    return this.current;
  }

  protected check(type: TokenType): boolean {
    return this.current?.type === type;
  }

  protected match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  /**
   * Consume the current token. Callers check isAtEnd() first.
   */
  protected advance(): Token {
    const token = this.current;
    if (token === undefined) {
      throw this.error('UnexpectedToken', 'Unexpected end of input');
    }
    this.last = token;
    this.current = this.pull();
    return token;
  }

  protected isAtEnd(): boolean {
    return this.current === undefined;
  }

  protected error(kind: ParseErrorKind, message: string, at?: Token): ParseError {
    const token = at ?? this.current;
    return new ParseError(kind, message, this.locate(token), this.errorContext(), token?.value);
  }

  private locate(token: Token | undefined): SourceLocation {
    if (token) return { line: token.line, column: token.column };
    if (this.last) return { line: this.last.line, column: this.last.column + this.last.value.length };
    return { line: 1, column: 1 };
  }

  private errorContext(): ErrorContext | undefined {
    return this.source !== undefined ? { source: this.source, filePath: this.filePath } : undefined;
  }

  private pull(): Token | undefined {
    const next = this.iterator.next();
    return next.done ? undefined : next.value;
  }
}

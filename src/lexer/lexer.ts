import { LexerError, type ErrorContext } from '../errors/index.js';
import { NUMBER_PATTERN, STRING_ESCAPES, TokenType, type Token } from './tokens.js';

export class SExprLexer {
  private source: string;
  private context?: ErrorContext;
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string, context?: ErrorContext) {
    this.source = source;
    this.context = context;
  }

  /**
   * Lazily yield tokens. Each call starts over from the beginning of the source.
   */
  *tokenize(): Generator<Token, void, undefined> {
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (true) {
      this.skipWhitespace();
      if (this.isAtEnd()) return;
      yield this.nextToken();
    }
  }

  private nextToken(): Token {
    const char = this.peek();

    if (char === '(') return this.single(TokenType.OPEN_PAREN);
    if (char === ')') return this.single(TokenType.CLOSE_PAREN);
    if (char === '"') return this.readString();

    return this.readAtom();
  }

  private single(type: TokenType): Token {
    const token = { type, value: this.peek(), line: this.line, column: this.column };
    this.advance();
    return token;
  }

  private readString(): Token {
    const startLine = this.line;
    const startColumn = this.column;
    this.advance(); // consume opening quote

    let value = '';
    while (!this.isAtEnd() && this.peek() !== '"') {
      if (this.peek() === '\\') {
        this.advance();
        if (this.isAtEnd()) break;
        const escaped = this.advance();
        value += STRING_ESCAPES[escaped] ?? escaped;
      } else {
        value += this.advance();
      }
    }

    if (this.isAtEnd()) {
      throw new LexerError(
        'UnterminatedString',
        `Unterminated string starting at line ${startLine}, column ${startColumn}`,
        { line: startLine, column: startColumn },
        this.context
      );
    }

    this.advance(); // consume closing quote
    return { type: TokenType.STRING, value, line: startLine, column: startColumn };
  }

  private readAtom(): Token {
    const startColumn = this.column;
    let value = '';

    while (!this.isAtEnd() && !this.isDelimiter(this.peek())) {
      if (this.isInvalid(this.peek())) {
        throw this.invalidCharacter();
      }
      value += this.advance();
    }

    const type = NUMBER_PATTERN.test(value) ? TokenType.NUMBER : TokenType.SYMBOL;
    return { type, value, line: this.line, column: startColumn };
  }

  private invalidCharacter(): LexerError {
    const code = this.peek().charCodeAt(0).toString(16).toUpperCase().padStart(4, '0');
    return new LexerError(
      'InvalidCharacter',
      `Invalid character U+${code} at line ${this.line}, column ${this.column}`,
      { line: this.line, column: this.column },
      this.context
    );
  }

  private skipWhitespace(): void {
    while (!this.isAtEnd() && this.isWhitespace(this.peek())) {
      this.advance();
    }
  }

  private peek(): string {
    return this.source[this.pos] ?? '\0';
  }

  private advance(): string {
    const char = this.source[this.pos];
    this.pos++;
    if (char === '\n') {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return char;
  }

  private isAtEnd(): boolean {
    return this.pos >= this.source.length;
  }

  private isWhitespace(char: string): boolean {
    return char === ' ' || char === '\t' || char === '\n' || char === '\r';
  }

  private isDelimiter(char: string): boolean {
    return this.isWhitespace(char) || char === '(' || char === ')' || char === '"';
  }

  private isInvalid(char: string): boolean {
    const code = char.charCodeAt(0);
    return code < 0x20 || code === 0x7f;
  }
}

/**
 * Tokenize text into a lazy token stream
 */
export function tokenize(text: string, context?: ErrorContext): Generator<Token, void, undefined> {
  return new SExprLexer(text, context).tokenize();
}

export interface SourceLocation {
  line: number;
  column: number;
  /** End column (optional, for ranges) */
  endColumn?: number;
}

export interface ErrorContext {
  /** The text being tokenized/parsed */
  source?: string;
  /** File path if available */
  filePath?: string;
}

export type SyntaxErrorKind = 'UnterminatedString' | 'InvalidCharacter';
export type ParseErrorKind = 'UnexpectedToken' | 'UnterminatedList' | 'MaxDepthExceeded';

/**
 * Base class for engine errors with source location info
 */
export class SExprError extends Error {
  readonly location?: SourceLocation;
  readonly context?: ErrorContext;

  constructor(message: string, location?: SourceLocation, context?: ErrorContext) {
    super(message);
    this.name = 'SExprError';
    this.location = location;
    this.context = context;
  }

  /**
   * Format the error with source context for display
   */
  format(): string {
    const lines: string[] = [];
    lines.push(`${this.name}: ${this.message}`);

    if (!this.location) {
      return lines.join('\n');
    }

    const fileInfo = this.context?.filePath ? `${this.context.filePath}:` : '';
    lines.push(`  --> ${fileInfo}${this.location.line}:${this.location.column}`);

    if (this.context?.source) {
      const errorLine = getSourceLine(this.context.source, this.location.line);

      if (errorLine !== undefined) {
        const lineNum = this.location.line.toString();
        const padding = ' '.repeat(lineNum.length);

        lines.push(`${padding} |`);
        lines.push(`${lineNum} | ${errorLine}`);

        const underlineStart = this.location.column - 1;
        const underlineLength = this.location.endColumn
          ? this.location.endColumn - this.location.column
          : 1;
        const underline = ' '.repeat(underlineStart) + '^'.repeat(Math.max(1, underlineLength));
        lines.push(`${padding} | ${underline}`);
      }
    }

    return lines.join('\n');
  }

  toString(): string {
    return this.format();
  }
}

/**
 * Tokenizer-level failure (the format's "SyntaxError")
 */
export class LexerError extends SExprError {
  readonly kind: SyntaxErrorKind;

  constructor(kind: SyntaxErrorKind, message: string, location: SourceLocation, context?: ErrorContext) {
    super(message, location, context);
    this.name = 'LexerError';
    this.kind = kind;
  }
}

/**
 * Error during parsing
 */
export class ParseError extends SExprError {
  readonly kind: ParseErrorKind;
  /** The token value that caused the error */
  readonly tokenValue?: string;

  constructor(
    kind: ParseErrorKind,
    message: string,
    location: SourceLocation,
    context?: ErrorContext,
    tokenValue?: string
  ) {
    super(message, location, context);
    this.name = 'ParseError';
    this.kind = kind;
    this.tokenValue = tokenValue;
  }

  format(): string {
    const base = super.format();
    if (this.tokenValue) {
      return `${base}\n  found: '${this.tokenValue}'`;
    }
    return base;
  }
}

/**
 * Raised by required-field accessors when the token is absent and
 * the caller supplied no default
 */
export class MissingFieldError extends SExprError {
  readonly fieldName: string;
  /** Head of the list that was searched, when it has one */
  readonly parent?: string;

  constructor(fieldName: string, parent?: string) {
    super(
      parent
        ? `Required token '${fieldName}' not found in '${parent}'`
        : `Required token '${fieldName}' not found`
    );
    this.name = 'MissingFieldError';
    this.fieldName = fieldName;
    this.parent = parent;
  }
}

/**
 * Get the source line at a given line number
 */
export function getSourceLine(source: string, lineNumber: number): string | undefined {
  const lines = source.split('\n');
  return lines[lineNumber - 1];
}

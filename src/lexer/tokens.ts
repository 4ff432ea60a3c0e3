export enum TokenType {
  OPEN_PAREN = 'OPEN_PAREN',
  CLOSE_PAREN = 'CLOSE_PAREN',
  SYMBOL = 'SYMBOL',
  // Escapes already resolved
  STRING = 'STRING',
  // Raw literal text; the parser decides Integer vs Float
  NUMBER = 'NUMBER',
}

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

/**
 * Full-match grammar for unquoted numeric atoms:
 * optional sign, digits with optional fraction (or a bare fraction), optional exponent
 */
export const NUMBER_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/** Numeric literals without fraction or exponent parse as Integer */
export const INTEGER_PATTERN = /^[+-]?\d+$/;

/** Escape sequences resolved inside quoted strings; others decode to the escaped char */
export const STRING_ESCAPES: Readonly<Record<string, string>> = {
  n: '\n',
  r: '\r',
  t: '\t',
  '\\': '\\',
  '"': '"',
};

/**
 * Caller-side helpers for file families that do not hold a single
 * expression (design-rule files carry `#` comment lines and several
 * top-level rules). The parser itself never applies them.
 */

import { isList, type Node } from '../ast/nodes.js';
import { parse, type ParseOptions } from './parser.js';

/**
 * Drop blank lines and lines whose first non-blank character is '#'
 */
export function stripHashComments(text: string): string {
  return text
    .split('\n')
    .filter((line) => {
      const trimmed = line.trim();
      return trimmed.length > 0 && !trimmed.startsWith('#');
    })
    .join('\n');
}

/**
 * Wrap several top-level expressions into one synthetic list,
 * optionally headed by a symbol
 */
export function wrapExpressions(text: string, head?: string): string {
  const prefix = head !== undefined ? `${head}\n` : '';
  return `(${prefix}${text}\n)`;
}

/**
 * Parse every top-level expression of `text`, in order
 */
export function parseMany(text: string, options: ParseOptions = {}): Node[] {
  const wrapped = wrapExpressions(text);
  const root = parse(wrapped, options);
  return isList(root) ? [...root.children] : [root];
}

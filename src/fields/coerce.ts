/**
 * Total coercions from atoms to JS values. None of them throw: a value that
 * cannot be read comes back as { ok: false } with the reason.
 */

import type { Node } from '../ast/nodes.js';
import { INTEGER_PATTERN, NUMBER_PATTERN } from '../lexer/tokens.js';
import { formatFloat, formatInteger } from '../printer/format.js';

export type Coercion<T> = { ok: true; value: T } | { ok: false; reason: string };

function success<T>(value: T): Coercion<T> {
  return { ok: true, value };
}

function failure<T>(reason: string): Coercion<T> {
  return { ok: false, reason };
}

/**
 * Textual value of an atom: symbol/string text, numbers as the printer
 * writes them. Undefined for lists.
 */
export function atomText(node: Node | undefined): string | undefined {
  if (node === undefined) return undefined;
  switch (node.type) {
    case 'Symbol':
    case 'String':
      return node.text;
    case 'Integer':
      return formatInteger(node.value);
    case 'Float':
      return formatFloat(node.value);
    case 'List':
      return undefined;
  }
}

export function coerceStr(node: Node | undefined): Coercion<string> {
  if (node === undefined) return failure('missing value');
  const text = atomText(node);
  return text !== undefined ? success(text) : failure('expected an atom, found a list');
}

export function coerceFloat(node: Node | undefined): Coercion<number> {
  if (node === undefined) return failure('missing value');
  switch (node.type) {
    case 'Integer':
    case 'Float':
      return success(node.value);
    case 'Symbol':
    case 'String': {
      const text = node.text.trim();
      const value = Number(text);
      return NUMBER_PATTERN.test(text) && Number.isFinite(value)
        ? success(value)
        : failure(`'${node.text}' is not a number`);
    }
    case 'List':
      return failure('expected a number, found a list');
  }
}

/**
 * Integer atoms as-is, floats truncated toward zero, text only when it is
 * an integer literal ("2.5" fails) within the safe integer range
 */
export function coerceInt(node: Node | undefined): Coercion<number> {
  if (node === undefined) return failure('missing value');
  switch (node.type) {
    case 'Integer':
      return success(node.value);
    case 'Float':
      return success(Math.trunc(node.value));
    case 'Symbol':
    case 'String': {
      const text = node.text.trim();
      if (!INTEGER_PATTERN.test(text)) return failure(`'${node.text}' is not an integer`);
      const value = parseInt(text, 10);
      return Number.isSafeInteger(value)
        ? success(value)
        : failure(`'${node.text}' is outside the safe integer range`);
    }
    case 'List':
      return failure('expected an integer, found a list');
  }
}

/**
 * Value of a coercion, or the fallback when it failed
 */
export function valueOr<T>(coercion: Coercion<T>, fallback: T): T {
  return coercion.ok ? coercion.value : fallback;
}

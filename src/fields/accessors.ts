/**
 * Typed accessors over named child tokens.
 *
 *   getOptionalFloat(pad, 'thickness')                 number | undefined
 *   getRequiredFloat(pad, 'thickness')                 throws MissingFieldError
 *   getRequiredFloat(pad, 'thickness', { default: 1.6 })
 */

import { headName, type ListNode, type Node } from '../ast/nodes.js';
import { FIELD_DEFAULTS } from '../config/constants.js';
import { MissingFieldError } from '../errors/index.js';
import type { StructuredLogger } from '../observability/logger.js';
import { coerceFloat, coerceInt, coerceStr, valueOr, type Coercion } from './coerce.js';
import { findToken, hasSymbol } from './lookup.js';
import { ORIGIN, positionFromNode, type Position } from './position.js';

export interface RequiredFieldOptions<T> {
  /** Slot inside the token to read (default 1) */
  index?: number;
  /** Returned when the token is absent, or its slot is missing or unreadable */
  default?: T;
  /** Receives a debug entry when a default stands in for an absent token */
  logger?: StructuredLogger;
}

type Coerce<T> = (node: Node | undefined) => Coercion<T>;

function readOptional<T>(list: ListNode, name: string, index: number, coerce: Coerce<T>): T | undefined {
  const found = findToken(list, name);
  if (!found) return undefined;
  const result = coerce(found.children[index]);
  return result.ok ? result.value : undefined;
}

function readRequired<T>(
  list: ListNode,
  name: string,
  coerce: Coerce<T>,
  zero: T,
  options: RequiredFieldOptions<T>
): T {
  const found = findToken(list, name);

  if (!found) {
    if (options.default === undefined) {
      throw new MissingFieldError(name, headName(list));
    }
    options.logger?.debug('field:default', { field: name, parent: headName(list) ?? null });
    return options.default;
  }

  return valueOr(coerce(found.children[options.index ?? FIELD_DEFAULTS.VALUE_INDEX]), options.default ?? zero);
}

// ============================================
// Optional accessors
// ============================================

export function getOptionalStr(list: ListNode, name: string, index: number = FIELD_DEFAULTS.VALUE_INDEX): string | undefined {
  return readOptional(list, name, index, coerceStr);
}

export function getOptionalFloat(list: ListNode, name: string, index: number = FIELD_DEFAULTS.VALUE_INDEX): number | undefined {
  return readOptional(list, name, index, coerceFloat);
}

export function getOptionalInt(list: ListNode, name: string, index: number = FIELD_DEFAULTS.VALUE_INDEX): number | undefined {
  return readOptional(list, name, index, coerceInt);
}

export function getOptionalPosition(list: ListNode, name: string = 'at'): Position | undefined {
  const found = findToken(list, name);
  return found ? positionFromNode(found) : undefined;
}

/**
 * `true` when the bare flag symbol is present, otherwise undefined
 */
export function getOptionalBoolFlag(list: ListNode, name: string): true | undefined {
  return hasSymbol(list, name) ? true : undefined;
}

// ============================================
// Required accessors
// ============================================

export function getRequiredStr(list: ListNode, name: string, options: RequiredFieldOptions<string> = {}): string {
  return readRequired(list, name, coerceStr, '', options);
}

export function getRequiredFloat(list: ListNode, name: string, options: RequiredFieldOptions<number> = {}): number {
  return readRequired(list, name, coerceFloat, 0, options);
}

export function getRequiredInt(list: ListNode, name: string, options: RequiredFieldOptions<number> = {}): number {
  return readRequired(list, name, coerceInt, 0, options);
}

/**
 * Position slots that are missing read as 0, so only absence of the token
 * itself can fail.
 */
export function getRequiredPosition(
  list: ListNode,
  name: string = 'at',
  options: Omit<RequiredFieldOptions<Position>, 'index'> = {}
): Position {
  const found = findToken(list, name);
  if (found) return positionFromNode(found);

  if (options.default === undefined) {
    throw new MissingFieldError(name, headName(list));
  }
  options.logger?.debug('field:default', { field: name, parent: headName(list) ?? null });
  return { ...options.default };
}

/**
 * Like getOptionalPosition, but missing or unreadable X/Y slots take the
 * given defaults instead of 0
 */
export function getPositionWithDefault(
  list: ListNode,
  name: string,
  defaultX: number = FIELD_DEFAULTS.COORDINATE,
  defaultY: number = FIELD_DEFAULTS.COORDINATE
): Position {
  const found = findToken(list, name);
  if (!found) return { ...ORIGIN, x: defaultX, y: defaultY };

  return {
    x: valueOr(coerceFloat(found.children[1]), defaultX),
    y: valueOr(coerceFloat(found.children[2]), defaultY),
    angle: valueOr(coerceFloat(found.children[3]), FIELD_DEFAULTS.COORDINATE),
  };
}

// ============================================
// Positional accessors
// ============================================

export function safeGetStr(list: ListNode, index: number, fallback: string = ''): string {
  return valueOr(coerceStr(list.children[index]), fallback);
}

export function safeGetInt(list: ListNode, index: number, fallback: number = 0): number {
  return valueOr(coerceInt(list.children[index]), fallback);
}

export function safeGetFloat(list: ListNode, index: number, fallback: number = 0): number {
  return valueOr(coerceFloat(list.children[index]), fallback);
}

import { isNamedList, isSymbol, type ListNode, type Node } from '../ast/nodes.js';

/**
 * First direct child list whose head symbol is `name`
 */
export function findToken(list: ListNode, name: string): ListNode | undefined {
  for (const child of list.children) {
    if (isNamedList(child, name)) return child;
  }
  return undefined;
}

/**
 * Every direct child list whose head symbol is `name`, in document order
 */
export function findAllTokens(list: ListNode, name: string): ListNode[] {
  const results: ListNode[] = [];
  for (const child of list.children) {
    if (isNamedList(child, name)) results.push(child);
  }
  return results;
}

export function hasToken(list: ListNode, name: string): boolean {
  return findToken(list, name) !== undefined;
}

/**
 * Bare flag check: (pin ... hide) -> hasSymbol(pin, 'hide')
 */
export function hasSymbol(list: ListNode, name: string): boolean {
  return list.children.some((child) => isSymbol(child, name));
}

/**
 * Positional access that never throws
 */
export function getValue(list: ListNode, index: number): Node | undefined;
export function getValue<T>(list: ListNode, index: number, fallback: T): Node | T;
export function getValue<T>(list: ListNode, index: number, fallback?: T): Node | T | undefined {
  if (Number.isInteger(index) && index >= 0 && index < list.children.length) {
    return list.children[index];
  }
  return fallback;
}

/**
 * Value that follows a bare symbol: (pad "1" smd rect ...) with name 'smd' -> rect
 */
export function getSymbolValue(list: ListNode, name: string): Node | undefined;
export function getSymbolValue<T>(list: ListNode, name: string, fallback: T): Node | T;
export function getSymbolValue<T>(list: ListNode, name: string, fallback?: T): Node | T | undefined {
  const children = list.children;
  for (let i = 0; i < children.length - 1; i++) {
    if (isSymbol(children[i], name)) return children[i + 1];
  }
  return fallback;
}

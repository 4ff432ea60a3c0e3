import { float, isNamedList, token, type ListNode, type Node } from '../ast/nodes.js';
import { FIELD_DEFAULTS } from '../config/constants.js';
import { coerceFloat, valueOr } from './coerce.js';

/**
 * (at X Y [ANGLE]) or (offset (xyz X Y Z))
 */
export interface Position {
  x: number;
  y: number;
  angle: number;
  /** Present only for the 3D (xyz ...) form */
  z?: number;
}

export const ORIGIN: Readonly<Position> = Object.freeze({ x: 0, y: 0, angle: 0 });

function floatAt(list: ListNode, index: number, fallback: number = FIELD_DEFAULTS.COORDINATE): number {
  return valueOr(coerceFloat(list.children[index]), fallback);
}

/**
 * Read a position token. Missing or unreadable slots become 0.
 */
export function positionFromNode(node: ListNode | undefined): Position {
  if (node === undefined || node.children.length < 2) {
    return { ...ORIGIN };
  }

  const first: Node = node.children[1];
  if (isNamedList(first, 'xyz')) {
    return { x: floatAt(first, 1), y: floatAt(first, 2), z: floatAt(first, 3), angle: 0 };
  }

  return { x: floatAt(node, 1), y: floatAt(node, 2), angle: floatAt(node, 3) };
}

/**
 * Build a position token; a zero angle is left out
 */
export function positionToNode(position: Position, name: string = 'at'): ListNode {
  if (position.z !== undefined) {
    return token(name, token('xyz', float(position.x), float(position.y), float(position.z)));
  }

  const children = [float(position.x), float(position.y)];
  if (position.angle !== 0) {
    children.push(float(position.angle));
  }
  return token(name, ...children);
}

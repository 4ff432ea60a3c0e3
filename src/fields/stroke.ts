import { float, sym, token, type ListNode, type Node } from '../ast/nodes.js';
import { FIELD_DEFAULTS } from '../config/constants.js';
import { coerceFloat, valueOr } from './coerce.js';
import { getOptionalStr, getRequiredFloat } from './accessors.js';
import { parseEnum, STROKE_TYPES, type StrokeType } from './enums.js';
import { findToken } from './lookup.js';

export type Rgba = readonly [number, number, number, number];

/**
 * (stroke (width W) (type T) (color R G B A))
 */
export interface Stroke {
  width: number;
  type: StrokeType;
  color?: Rgba;
}

export function defaultStroke(width: number = FIELD_DEFAULTS.STROKE_WIDTH): Stroke {
  return { width, type: 'solid' };
}

function colorFromNode(node: ListNode | undefined): Rgba | undefined {
  if (!node || node.children.length < 5) return undefined;
  const channel = (index: number): number => valueOr(coerceFloat(node.children[index]), 0);
  return [channel(1), channel(2), channel(3), channel(4)];
}

export function strokeFromNode(node: ListNode | undefined): Stroke {
  if (!node) return defaultStroke();

  const stroke: Stroke = {
    width: getRequiredFloat(node, 'width', { default: FIELD_DEFAULTS.STROKE_WIDTH }),
    type: parseEnum(getOptionalStr(node, 'type'), STROKE_TYPES, 'solid'),
  };
  const color = colorFromNode(findToken(node, 'color'));
  if (color) stroke.color = color;
  return stroke;
}

/**
 * Outline of a graphic item. Current files carry (stroke ...), older ones a
 * bare (width W); when both are present the stroke token wins.
 */
export function parseStrokeOrWidth(list: ListNode, defaultWidth: number = FIELD_DEFAULTS.STROKE_WIDTH): Stroke {
  const strokeToken = findToken(list, 'stroke');
  if (strokeToken) return strokeFromNode(strokeToken);

  const widthToken = findToken(list, 'width');
  if (widthToken) {
    return defaultStroke(valueOr(coerceFloat(widthToken.children[1]), defaultWidth));
  }

  return defaultStroke(defaultWidth);
}

/**
 * Solid is the implicit type and is not written
 */
export function strokeToNode(stroke: Stroke): ListNode {
  const children: Node[] = [token('width', float(stroke.width))];
  if (stroke.type !== 'solid') {
    children.push(token('type', sym(stroke.type)));
  }
  if (stroke.color) {
    children.push(token('color', ...stroke.color.map((channel) => float(channel))));
  }
  return token('stroke', ...children);
}

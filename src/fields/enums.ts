import { isAtom, type Node } from '../ast/nodes.js';
import type { StructuredLogger } from '../observability/logger.js';
import { atomText } from './coerce.js';

// ============================================
// Closed enumerations shared by record schemas
// ============================================

export const STROKE_TYPES = ['dash', 'dash_dot', 'dash_dot_dot', 'dot', 'default', 'solid'] as const;
export type StrokeType = (typeof STROKE_TYPES)[number];

export const FILL_TYPES = ['none', 'outline', 'background'] as const;
export type FillType = (typeof FILL_TYPES)[number];

export const JUSTIFY_HORIZONTAL = ['left', 'right', 'center'] as const;
export type JustifyHorizontal = (typeof JUSTIFY_HORIZONTAL)[number];

export const JUSTIFY_VERTICAL = ['top', 'bottom', 'center'] as const;
export type JustifyVertical = (typeof JUSTIFY_VERTICAL)[number];

export const PIN_ELECTRICAL_TYPES = [
  'input',
  'output',
  'bidirectional',
  'tri_state',
  'passive',
  'free',
  'unspecified',
  'power_in',
  'power_out',
  'open_collector',
  'open_emitter',
  'no_connect',
] as const;
export type PinElectricalType = (typeof PIN_ELECTRICAL_TYPES)[number];

export const PIN_GRAPHIC_STYLES = [
  'line',
  'inverted',
  'clock',
  'inverted_clock',
  'input_low',
  'clock_low',
  'output_low',
  'edge_clock_high',
  'non_logic',
] as const;
export type PinGraphicStyle = (typeof PIN_GRAPHIC_STYLES)[number];

export const PAD_TYPES = ['thru_hole', 'smd', 'connect', 'np_thru_hole'] as const;
export type PadType = (typeof PAD_TYPES)[number];

export const PAD_SHAPES = ['circle', 'rect', 'oval', 'trapezoid', 'roundrect', 'custom'] as const;
export type PadShape = (typeof PAD_SHAPES)[number];

export interface ParseEnumOptions {
  /** Receives a debug entry whenever the fallback is used */
  logger?: StructuredLogger;
}

/**
 * Read one member of a closed set. Unknown, missing and non-atom values
 * yield `fallback`; this is how schemas tolerate tokens written by other
 * tool versions.
 */
export function parseEnum<T extends readonly string[]>(
  value: Node | string | undefined,
  allowed: T,
  fallback: T[number],
  options: ParseEnumOptions = {}
): T[number] {
  const text = typeof value === 'string' ? value : isAtom(value) ? atomText(value) : undefined;
  const member = allowed.find((candidate) => candidate === text);

  if (member === undefined) {
    options.logger?.debug('enum:fallback', { value: text ?? null, fallback });
    return fallback;
  }
  return member;
}

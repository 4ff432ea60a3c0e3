import type { Node } from '../ast/nodes.js';
import type { StructuredLogger } from '../observability/logger.js';
import { atomText } from './coerce.js';
import { parseEnum, PIN_ELECTRICAL_TYPES, type PinElectricalType } from './enums.js';

const LEGACY_OVERBAR = /~([^~{}]+)~/g;

const LEGACY_PIN_TYPES = new Map<string, PinElectricalType>([['unconnected', 'no_connect']]);

/**
 * Old files write an empty value as "~" and overbars as ~TEXT~; current
 * files use "" and ~{TEXT}.
 */
export function normalizeTextContent(text: string): string {
  if (text === '~') return '';
  return text.replace(LEGACY_OVERBAR, '~{$1}');
}

export function normalizePinElectricalType(type: string): string {
  return LEGACY_PIN_TYPES.get(type) ?? type;
}

export function parsePinElectricalType(
  value: Node | string | undefined,
  options: { logger?: StructuredLogger } = {}
): PinElectricalType {
  const text = typeof value === 'string' ? value : atomText(value);
  return parseEnum(
    text === undefined ? undefined : normalizePinElectricalType(text),
    PIN_ELECTRICAL_TYPES,
    'unspecified',
    options
  );
}

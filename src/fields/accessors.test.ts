import { describe, it, expect } from 'vitest';
import {
  getOptionalBoolFlag,
  getOptionalFloat,
  getOptionalInt,
  getOptionalPosition,
  getOptionalStr,
  getPositionWithDefault,
  getRequiredFloat,
  getRequiredInt,
  getRequiredPosition,
  getRequiredStr,
  safeGetFloat,
  safeGetInt,
  safeGetStr,
} from './accessors.js';
import { isList, list, sym, type ListNode } from '../ast/index.js';
import { parse } from '../parser/index.js';
import { MissingFieldError } from '../errors/index.js';
import { BufferOutput, createStructuredLogger } from '../observability/index.js';

function parseList(text: string): ListNode {
  const node = parse(text);
  if (!isList(node)) throw new Error(`expected a list: ${text}`);
  return node;
}

const general = parseList('(general (thickness 1.6) (legacy_teardrops no) (count 3) (grid 5 10) (name U1) (bad "abc") (empty))');

describe('optional accessors', () => {
  it('read the first value slot', () => {
    expect(getOptionalFloat(general, 'thickness')).toBe(1.6);
    expect(getOptionalInt(general, 'count')).toBe(3);
    expect(getOptionalStr(general, 'name')).toBe('U1');
  });

  it('read another slot on request', () => {
    expect(getOptionalInt(general, 'grid', 2)).toBe(10);
    expect(getOptionalStr(general, 'grid', 2)).toBe('10');
  });

  it('return undefined when the token is absent', () => {
    expect(getOptionalFloat(general, 'paper')).toBeUndefined();
    expect(getOptionalStr(general, 'paper')).toBeUndefined();
  });

  it('return undefined when the slot is missing or unreadable', () => {
    expect(getOptionalFloat(general, 'bad')).toBeUndefined();
    expect(getOptionalFloat(general, 'empty')).toBeUndefined();
    expect(getOptionalInt(general, 'grid', 5)).toBeUndefined();
  });

  it('truncate floats read as integers', () => {
    expect(getOptionalInt(general, 'thickness')).toBe(1);
  });

  it('read positions', () => {
    const pad = parseList('(pad "1" smd (at 1.5 -2 90))');

    expect(getOptionalPosition(pad)).toEqual({ x: 1.5, y: -2, angle: 90 });
    expect(getOptionalPosition(pad, 'offset')).toBeUndefined();
  });

  it('read bare flags', () => {
    const pin = parseList('(pin input line hide)');

    expect(getOptionalBoolFlag(pin, 'hide')).toBe(true);
    expect(getOptionalBoolFlag(pin, 'locked')).toBeUndefined();
  });
});

describe('required accessors', () => {
  it('read present values', () => {
    expect(getRequiredFloat(general, 'thickness')).toBe(1.6);
    expect(getRequiredInt(general, 'grid', { index: 2 })).toBe(10);
    expect(getRequiredStr(general, 'legacy_teardrops')).toBe('no');
  });

  it('throw MissingFieldError when the token is absent without a default', () => {
    const board = parseList('(general (legacy_teardrops no))');

    expect(() => getRequiredFloat(board, 'thickness')).toThrow(MissingFieldError);
    expect(() => getRequiredFloat(board, 'thickness')).toThrow("Required token 'thickness' not found in 'general'");
  });

  it('name the missing field on the error', () => {
    try {
      getRequiredStr(list(), 'uuid');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(MissingFieldError);
      if (error instanceof MissingFieldError) {
        expect(error.fieldName).toBe('uuid');
        expect(error.parent).toBeUndefined();
        expect(error.message).toBe("Required token 'uuid' not found");
      }
    }
  });

  it('return the default when the token is absent', () => {
    const board = parseList('(general (legacy_teardrops no))');

    expect(getRequiredFloat(board, 'thickness', { default: 1.6 })).toBe(1.6);
    expect(getRequiredStr(board, 'paper', { default: 'A4' })).toBe('A4');
    expect(getRequiredInt(board, 'count', { default: 0 })).toBe(0);
  });

  it('fall back to the zero value when the slot is unreadable', () => {
    expect(getRequiredFloat(general, 'bad')).toBe(0);
    expect(getRequiredStr(general, 'empty')).toBe('');
    expect(getRequiredInt(general, 'name')).toBe(0);
  });

  it('prefer the default over the zero value for unreadable slots', () => {
    expect(getRequiredFloat(general, 'bad', { default: 5 })).toBe(5);
  });

  it('log when a default stands in for an absent token', () => {
    const buffer = new BufferOutput();
    const logger = createStructuredLogger({ level: 'debug', outputs: [buffer] });

    getRequiredFloat(general, 'paper_height', { default: 297, logger });

    expect(buffer.entries).toHaveLength(1);
    expect(buffer.entries[0]).toMatchObject({
      level: 'debug',
      message: 'field:default',
      context: { field: 'paper_height', parent: 'general' },
    });
  });

  it('read required positions', () => {
    const text = parseList('(text "R1" (at 10 20))');

    expect(getRequiredPosition(text)).toEqual({ x: 10, y: 20, angle: 0 });
    expect(() => getRequiredPosition(parseList('(text "R1")'))).toThrow("Required token 'at' not found in 'text'");
  });

  it('copy the default position', () => {
    const fallback = { x: 1, y: 2, angle: 0 };
    const result = getRequiredPosition(parseList('(text "R1")'), 'at', { default: fallback });

    expect(result).toEqual(fallback);
    expect(result).not.toBe(fallback);
  });
});

describe('getPositionWithDefault', () => {
  it('uses the token when present', () => {
    const pad = parseList('(pad (at 3 4 180))');

    expect(getPositionWithDefault(pad, 'at', 9, 9)).toEqual({ x: 3, y: 4, angle: 180 });
  });

  it('builds a position from the defaults otherwise', () => {
    expect(getPositionWithDefault(parseList('(pad)'), 'at', 3, 4)).toEqual({ x: 3, y: 4, angle: 0 });
    expect(getPositionWithDefault(parseList('(pad)'), 'at')).toEqual({ x: 0, y: 0, angle: 0 });
  });

  it('fills missing or unreadable slots of a present token from the defaults', () => {
    expect(getPositionWithDefault(parseList('(pad (at))'), 'at', 5, 7)).toEqual({ x: 5, y: 7, angle: 0 });
    expect(getPositionWithDefault(parseList('(pad (at 2))'), 'at', 5, 7)).toEqual({ x: 2, y: 7, angle: 0 });
    expect(getPositionWithDefault(parseList('(pad (at left 3 up))'), 'at', 5, 7)).toEqual({ x: 5, y: 3, angle: 0 });
  });
});

describe('positional accessors', () => {
  const net = parseList('(net 2 "VCC" 1.5)');

  it('coerce the value at an index', () => {
    expect(safeGetInt(net, 1)).toBe(2);
    expect(safeGetStr(net, 2)).toBe('VCC');
    expect(safeGetFloat(net, 3)).toBe(1.5);
  });

  it('return the fallback for missing or unreadable slots', () => {
    expect(safeGetInt(net, 2, -1)).toBe(-1);
    expect(safeGetStr(net, 9, 'none')).toBe('none');
    expect(safeGetFloat(list(sym('x')), 1)).toBe(0);
  });
});

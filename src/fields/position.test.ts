import { describe, it, expect } from 'vitest';
import { ORIGIN, positionFromNode, positionToNode } from './position.js';
import { isList, type ListNode } from '../ast/index.js';
import { parse } from '../parser/index.js';
import { render } from '../printer/index.js';

function parseList(text: string): ListNode {
  const node = parse(text);
  if (!isList(node)) throw new Error(`expected a list: ${text}`);
  return node;
}

describe('positionFromNode', () => {
  it('reads X Y and an optional angle', () => {
    expect(positionFromNode(parseList('(at 1 2)'))).toEqual({ x: 1, y: 2, angle: 0 });
    expect(positionFromNode(parseList('(at 1.27 -2.54 180)'))).toEqual({ x: 1.27, y: -2.54, angle: 180 });
  });

  it('reads the 3D xyz form', () => {
    expect(positionFromNode(parseList('(offset (xyz 1 2 3))'))).toEqual({ x: 1, y: 2, z: 3, angle: 0 });
  });

  it('reads unusable slots as zero', () => {
    expect(positionFromNode(parseList('(at a b)'))).toEqual({ x: 0, y: 0, angle: 0 });
    expect(positionFromNode(parseList('(at 5)'))).toEqual({ x: 5, y: 0, angle: 0 });
  });

  it('returns the origin for empty or missing tokens', () => {
    expect(positionFromNode(parseList('(at)'))).toEqual(ORIGIN);
    expect(positionFromNode(undefined)).toEqual(ORIGIN);
  });
});

describe('positionToNode', () => {
  it('omits a zero angle', () => {
    expect(render(positionToNode({ x: 1, y: 2, angle: 0 }))).toBe('(at 1.0 2.0)');
  });

  it('writes a non-zero angle', () => {
    expect(render(positionToNode({ x: 1, y: 2, angle: 90 }))).toBe('(at 1.0 2.0 90.0)');
  });

  it('writes the xyz form under another name', () => {
    expect(render(positionToNode({ x: 0, y: 0, z: 1.5, angle: 0 }, 'offset'))).toBe('(offset\n\t(xyz 0.0 0.0 1.5)\n)');
  });
});

// (property "Reference" "U") -> List[Symbol, String, String]

export interface SymbolNode {
  type: 'Symbol';
  text: string;
}

export interface StringNode {
  type: 'String';
  text: string;
}

export interface IntegerNode {
  type: 'Integer';
  value: number;
}

export interface FloatNode {
  type: 'Float';
  value: number;
}

export interface ListNode {
  type: 'List';
  readonly children: readonly Node[];
}

export type AtomNode = SymbolNode | StringNode | IntegerNode | FloatNode;
export type Node = AtomNode | ListNode;
export type NodeType = Node['type'];
export type AtomType = AtomNode['type'];

// ============================================
// Builders
// ============================================

export function sym(text: string): SymbolNode {
  return { type: 'Symbol', text };
}

export function str(text: string): StringNode {
  return { type: 'String', text };
}

export function int(value: number): IntegerNode {
  if (!Number.isInteger(value)) {
    throw new RangeError(`Integer node requires an integral value, got ${value}`);
  }
  return { type: 'Integer', value };
}

export function float(value: number): FloatNode {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Float node requires a finite number, got ${value}`);
  }
  return { type: 'Float', value };
}

export function list(...children: Node[]): ListNode {
  return { type: 'List', children: Object.freeze([...children]) };
}

/**
 * Build a named list: token('xy', float(0), float(1)) -> (xy 0.0 1.0)
 */
export function token(name: string, ...children: Node[]): ListNode {
  return list(sym(name), ...children);
}

// ============================================
// Guards
// ============================================

export function isList(node: Node | undefined): node is ListNode {
  return node?.type === 'List';
}

export function isAtom(node: Node | undefined): node is AtomNode {
  return node !== undefined && node.type !== 'List';
}

export function isSymbol(node: Node | undefined, text?: string): node is SymbolNode {
  return node?.type === 'Symbol' && (text === undefined || node.text === text);
}

export function isString(node: Node | undefined): node is StringNode {
  return node?.type === 'String';
}

export function isInteger(node: Node | undefined): node is IntegerNode {
  return node?.type === 'Integer';
}

export function isFloat(node: Node | undefined): node is FloatNode {
  return node?.type === 'Float';
}

export function isNumeric(node: Node | undefined): node is IntegerNode | FloatNode {
  return isInteger(node) || isFloat(node);
}

/**
 * Head symbol text of a named list, undefined for anything else
 */
export function headName(node: Node | undefined): string | undefined {
  if (!isList(node)) return undefined;
  const head = node.children[0];
  return isSymbol(head) ? head.text : undefined;
}

export function isNamedList(node: Node | undefined, name?: string): node is ListNode {
  const head = headName(node);
  return head !== undefined && (name === undefined || head === name);
}

// ============================================
// Equality
// ============================================

/**
 * Order- and type-sensitive structural equality. Float(2) and Integer(2) differ.
 */
export function nodesEqual(a: Node, b: Node): boolean {
  if (a.type === 'List') {
    if (b.type !== 'List' || a.children.length !== b.children.length) return false;
    return a.children.every((child, i) => nodesEqual(child, b.children[i]));
  }
  if (b.type === 'List') return false;
  return atomsEqual(a, b);
}

/**
 * List children compared as multisets. Only meant for comparison tooling;
 * the render path never relies on it.
 */
export function nodesEqualUnordered(a: Node, b: Node): boolean {
  if (a.type === 'List') {
    if (b.type !== 'List' || a.children.length !== b.children.length) return false;
    const remaining = [...b.children];
    for (const child of a.children) {
      const index = remaining.findIndex((candidate) => nodesEqualUnordered(child, candidate));
      if (index === -1) return false;
      remaining.splice(index, 1);
    }
    return true;
  }
  if (b.type === 'List') return false;
  return atomsEqual(a, b);
}

function atomsEqual(a: AtomNode, b: AtomNode): boolean {
  switch (a.type) {
    case 'Symbol':
      return b.type === 'Symbol' && b.text === a.text;
    case 'String':
      return b.type === 'String' && b.text === a.text;
    case 'Integer':
      return b.type === 'Integer' && Object.is(b.value, a.value);
    case 'Float':
      return b.type === 'Float' && Object.is(b.value, a.value);
  }
}

export {
  sym,
  str,
  int,
  float,
  list,
  token,
  isList,
  isAtom,
  isSymbol,
  isString,
  isInteger,
  isFloat,
  isNumeric,
  headName,
  isNamedList,
  nodesEqual,
  nodesEqualUnordered,
  type SymbolNode,
  type StringNode,
  type IntegerNode,
  type FloatNode,
  type ListNode,
  type AtomNode,
  type Node,
  type NodeType,
  type AtomType,
} from './nodes.js';

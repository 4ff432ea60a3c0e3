import { isList, isSymbol, type Node } from '../ast/nodes.js';
import {
  DEFAULT_RENDER_STRATEGY,
  createRenderStrategy,
  formatAtom,
  type RenderStrategy,
  type RenderStrategyOverrides,
} from './strategy.js';

/**
 * Pretty-printer for the KiCad flavour of S-expressions:
 *
 *   (net 1 "GND")            lists without list children stay on one line
 *
 *   (pts                     list children go on their own lines, one
 *     (xy 0 0)              indent deeper; ')' closes at the parent's
 *     (xy 10 0)             indentation
 *   )
 */
export class SExprPrinter {
  private strategy: RenderStrategy;

  constructor(strategy: RenderStrategy = DEFAULT_RENDER_STRATEGY) {
    this.strategy = strategy;
  }

  render(node: Node): string {
    const text = this.renderNode(node);
    return this.isRootMarked(node) ? `${text}\n` : text;
  }

  private renderNode(node: Node): string {
    if (!isList(node)) {
      return formatAtom(node, this.strategy.formatters);
    }
    if (node.children.length === 0) {
      return '()';
    }

    const [head, ...rest] = node.children;
    if (this.strategy.compact || !rest.some(isList)) {
      return `(${node.children.map((child) => this.renderNode(child)).join(' ')})`;
    }

    return this.renderMultiline(head, rest);
  }

  private renderMultiline(head: Node, rest: readonly Node[]): string {
    const opening = [this.renderNode(head)];
    const nested: Node[] = [];

    for (const child of rest) {
      const onOpeningLine = this.strategy.trailingAtoms === 'hoist'
        ? !isList(child)
        : !isList(child) && nested.length === 0;

      if (onOpeningLine) {
        opening.push(this.renderNode(child));
      } else {
        nested.push(child);
      }
    }

    const lines = nested.map((child) => this.indent(this.renderNode(child)));
    return `(${opening.join(' ')}${lines.map((line) => `\n${line}`).join('')}\n)`;
  }

  private indent(text: string): string {
    return text
      .split('\n')
      .map((line) => (line.trim() ? this.strategy.indent + line : line))
      .join('\n');
  }

  private isRootMarked(node: Node): boolean {
    if (this.strategy.compact || !isList(node)) return false;
    const head = node.children[0];
    return isSymbol(head) && this.strategy.rootMarkers.includes(head.text);
  }
}

/**
 * Render a Node tree to text. Total for any structurally valid tree.
 */
export function render(node: Node, strategy?: RenderStrategyOverrides): string {
  const resolved = strategy ? createRenderStrategy(strategy) : DEFAULT_RENDER_STRATEGY;
  return new SExprPrinter(resolved).render(node);
}

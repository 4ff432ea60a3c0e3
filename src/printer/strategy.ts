import type { AtomNode, AtomType } from '../ast/nodes.js';
import { ENGINE_DEFAULTS, type EngineConfig, type TrailingAtomPlacement } from '../config/constants.js';
import { formatFloat, formatInteger, quoteString } from './format.js';

export type AtomFormatter<K extends AtomType> = (node: Extract<AtomNode, { type: K }>) => string;

export type AtomFormatters = { [K in AtomType]: AtomFormatter<K> };

/**
 * Everything the printer needs to know about the target format.
 * Passed explicitly to render(); there is no global registry.
 */
export interface RenderStrategy {
  /** One indentation unit */
  indent: string;
  /** Root heads followed by one extra newline after the closing ')' */
  rootMarkers: readonly string[];
  /**
   * Atoms after the first list child: 'own-line' keeps them in place on
   * their own indented line; 'hoist' moves every atom to the opening line
   * (reorders children).
   */
  trailingAtoms: TrailingAtomPlacement;
  /** Render every list on a single line */
  compact: boolean;
  formatters: AtomFormatters;
}

export const DEFAULT_FORMATTERS: AtomFormatters = {
  Symbol: (node) => node.text,
  String: (node) => quoteString(node.text),
  Integer: (node) => formatInteger(node.value),
  Float: (node) => formatFloat(node.value),
};

export const DEFAULT_RENDER_STRATEGY: RenderStrategy = Object.freeze({
  indent: ENGINE_DEFAULTS.INDENT,
  rootMarkers: ENGINE_DEFAULTS.ROOT_MARKERS,
  trailingAtoms: ENGINE_DEFAULTS.TRAILING_ATOMS,
  compact: false,
  formatters: DEFAULT_FORMATTERS,
});

export interface RenderStrategyOverrides extends Partial<Omit<RenderStrategy, 'formatters'>> {
  formatters?: Partial<AtomFormatters>;
}

/**
 * Defaults with the given overrides applied; keys set to undefined keep
 * their default
 */
export function createRenderStrategy(overrides: RenderStrategyOverrides = {}): RenderStrategy {
  const formatters = overrides.formatters ?? {};
  return {
    indent: overrides.indent ?? DEFAULT_RENDER_STRATEGY.indent,
    rootMarkers: overrides.rootMarkers ?? DEFAULT_RENDER_STRATEGY.rootMarkers,
    trailingAtoms: overrides.trailingAtoms ?? DEFAULT_RENDER_STRATEGY.trailingAtoms,
    compact: overrides.compact ?? DEFAULT_RENDER_STRATEGY.compact,
    formatters: {
      Symbol: formatters.Symbol ?? DEFAULT_FORMATTERS.Symbol,
      String: formatters.String ?? DEFAULT_FORMATTERS.String,
      Integer: formatters.Integer ?? DEFAULT_FORMATTERS.Integer,
      Float: formatters.Float ?? DEFAULT_FORMATTERS.Float,
    },
  };
}

/**
 * Strategy carrying the indentation and root markers of an EngineConfig
 * (see resolveEngineConfig)
 */
export function strategyFromConfig(
  config: Pick<EngineConfig, 'indent' | 'rootMarkers'>,
  overrides: RenderStrategyOverrides = {}
): RenderStrategy {
  return createRenderStrategy({
    ...overrides,
    indent: overrides.indent ?? config.indent,
    rootMarkers: overrides.rootMarkers ?? config.rootMarkers,
  });
}

export function formatAtom(node: AtomNode, formatters: AtomFormatters): string {
  switch (node.type) {
    case 'Symbol':
      return formatters.Symbol(node);
    case 'String':
      return formatters.String(node);
    case 'Integer':
      return formatters.Integer(node);
    case 'Float':
      return formatters.Float(node);
  }
}

export { SExprPrinter, render } from './printer.js';
export {
  DEFAULT_RENDER_STRATEGY,
  DEFAULT_FORMATTERS,
  createRenderStrategy,
  strategyFromConfig,
  formatAtom,
  type RenderStrategy,
  type RenderStrategyOverrides,
  type AtomFormatter,
  type AtomFormatters,
} from './strategy.js';
export { formatFloat, formatInteger, quoteString } from './format.js';

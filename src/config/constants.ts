/**
 * Centralized Configuration Constants
 *
 * Default values used by the tokenizer, parser, printer and field accessors.
 * Explicit options passed to `parse`/`render` always take precedence.
 */

// ============================================
// Engine Configuration
// ============================================

/**
 * Default parse/render configuration
 */
export const ENGINE_DEFAULTS = {
  /** Maximum list nesting accepted by the parser */
  MAX_DEPTH: 1000,
  /** Lowest value accepted for MAX_DEPTH overrides */
  MIN_DEPTH: 100,
  /** One indentation unit in rendered output */
  INDENT: '\t',
  /** Root heads that get a trailing newline after the final ')' */
  ROOT_MARKERS: ['kicad_symbol_lib'] as readonly string[],
  /** Placement of atoms that follow the first list child */
  TRAILING_ATOMS: 'own-line' as const,
} as const;

// ============================================
// Field Accessor Defaults
// ============================================

/**
 * Fallbacks used by the field accessors when a slot is missing or unreadable
 */
export const FIELD_DEFAULTS = {
  /** Stroke width when neither (stroke ...) nor legacy (width W) is present */
  STROKE_WIDTH: 0.254,
  /** Coordinate used for missing X/Y/angle slots */
  COORDINATE: 0,
  /** Slot read by single-value accessors: (name VALUE) */
  VALUE_INDEX: 1,
} as const;

// ============================================
// Environment Variables
// ============================================

/**
 * Environment variable names read by resolveEngineConfig()
 */
export const ENV_VARS = {
  MAX_DEPTH: 'SEXPR_MAX_DEPTH',
  INDENT: 'SEXPR_INDENT',
  ROOT_MARKERS: 'SEXPR_ROOT_MARKERS',
  LOG_LEVEL: 'SEXPR_LOG_LEVEL',
} as const;

// ============================================
// Type Exports for Configuration
// ============================================

/** Placement of atoms that appear after a list child */
export type TrailingAtomPlacement = 'own-line' | 'hoist';

/** Log levels understood by the structured logger */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type EngineConfig = {
  maxDepth: number;
  indent: string;
  rootMarkers: readonly string[];
  logLevel: LogLevel;
};

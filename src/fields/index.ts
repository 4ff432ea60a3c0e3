/**
 * Field extraction over parsed trees: token lookup, typed accessors with
 * optional/required semantics, closed enumerations and legacy-format helpers.
 */
export { atomText, coerceStr, coerceFloat, coerceInt, valueOr, type Coercion } from './coerce.js';
export { findToken, findAllTokens, hasToken, hasSymbol, getValue, getSymbolValue } from './lookup.js';
export {
  getOptionalStr,
  getOptionalFloat,
  getOptionalInt,
  getOptionalPosition,
  getOptionalBoolFlag,
  getRequiredStr,
  getRequiredFloat,
  getRequiredInt,
  getRequiredPosition,
  getPositionWithDefault,
  safeGetStr,
  safeGetInt,
  safeGetFloat,
  type RequiredFieldOptions,
} from './accessors.js';
export { ORIGIN, positionFromNode, positionToNode, type Position } from './position.js';
export {
  parseEnum,
  STROKE_TYPES,
  FILL_TYPES,
  JUSTIFY_HORIZONTAL,
  JUSTIFY_VERTICAL,
  PIN_ELECTRICAL_TYPES,
  PIN_GRAPHIC_STYLES,
  PAD_TYPES,
  PAD_SHAPES,
  type ParseEnumOptions,
  type StrokeType,
  type FillType,
  type JustifyHorizontal,
  type JustifyVertical,
  type PinElectricalType,
  type PinGraphicStyle,
  type PadType,
  type PadShape,
} from './enums.js';
export {
  defaultStroke,
  strokeFromNode,
  parseStrokeOrWidth,
  strokeToNode,
  type Stroke,
  type Rgba,
} from './stroke.js';
export { normalizeTextContent, normalizePinElectricalType, parsePinElectricalType } from './text.js';

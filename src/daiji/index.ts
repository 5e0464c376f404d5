/**
 * Daiji conversion core.
 */

export { DaijiConverter } from './converter.js';
export { normalize } from './normalizer.js';
export { render } from './renderer.js';
export { formatNumeric, type NumericValue } from './format.js';
export {
  createDecomposition,
  decompositionToString,
  hasFractionPart,
  hasIntegerPart,
  withoutFraction,
  withoutInteger,
  ZERO,
  type DecompositionParts,
  type NumeralDecomposition,
} from './decomposition.js';
export {
  DEFAULT_CONFIG,
  DEFAULT_DIGIT_GLYPHS,
  DEFAULT_LARGE_UNIT_NAMES,
  DEFAULT_POSITIONAL_UNIT_NAMES,
  MAX_SHIFTED_DIGITS,
} from './constants.js';
export { ConfigurationError, LargeUnitOverflowError, MalformedNumeralError } from './errors.js';
export {
  OVERFLOW_POLICIES,
  type DaijiConfig,
  type DaijiConfigOptions,
  type OverflowPolicy,
} from './types.js';

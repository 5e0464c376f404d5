/**
 * Stringification of JavaScript numeric values for the normalizer.
 */

import { NUMBER_FORMAT_PRECISION } from './constants.js';
import { MalformedNumeralError } from './errors.js';

/**
 * Numeric types accepted by DaijiConverter.convertNumber().
 */
export type NumericValue = number | bigint;

/**
 * Render a numeric value as numeral text without losing digits.
 *
 * `bigint` values are exact. `number` values are written with 35
 * significant digits, which covers every digit a double carries.
 *
 * @throws MalformedNumeralError for NaN and infinities
 */
export function formatNumeric(value: NumericValue): string {
  if (typeof value === 'bigint') {
    return value.toString();
  }
  if (!Number.isFinite(value)) {
    throw new MalformedNumeralError(`${value} has no numeral form`, String(value));
  }
  return value.toPrecision(NUMBER_FORMAT_PRECISION);
}

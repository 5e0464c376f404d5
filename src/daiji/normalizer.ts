/**
 * Numeral string normalization.
 *
 * Turns text such as "-1,234.5e-2" into a {@link NumeralDecomposition}
 * without doing any arithmetic: the exponent is applied by moving digits
 * across the decimal point, padding with '0' where a side runs out. The
 * result is exact as long as neither side grows past
 * {@link MAX_SHIFTED_DIGITS} digits.
 */

import { MAX_SHIFTED_DIGITS } from './constants.js';
import {
  createDecomposition,
  stripLeadingZeros,
  stripTrailingZeros,
  ZERO,
  type NumeralDecomposition,
} from './decomposition.js';
import { MalformedNumeralError } from './errors.js';

const MANTISSA_PATTERN = /^[0-9]*(?:\.[0-9]*)?$/;
const EXPONENT_PATTERN = /^[+-]?[0-9]+$/;
const LEADING_SIGNS = /^[+-]+/;

function parseExponent(field: string, input: string): number {
  if (!EXPONENT_PATTERN.test(field)) {
    throw new MalformedNumeralError(
      `Exponent must be a signed integer, got "${field}"`,
      input
    );
  }
  const exponent = Number(field);
  if (!Number.isSafeInteger(exponent)) {
    throw new MalformedNumeralError(`Exponent ${field} is out of range`, input);
  }
  return exponent;
}

/**
 * Move `exponent` digits across the decimal point.
 *
 * A positive exponent moves digits from the front of the fraction to the
 * end of the integer part; a negative one moves digits from the end of the
 * integer part to the front of the fraction.
 */
function shiftDigits(
  integer: string,
  fraction: string,
  exponent: number
): { integer: string; fraction: string } {
  if (exponent > 0) {
    const moved = fraction.slice(0, exponent).padEnd(exponent, '0');
    return { integer: integer + moved, fraction: fraction.slice(exponent) };
  }
  if (exponent < 0) {
    const count = -exponent;
    const kept = Math.max(integer.length - count, 0);
    const moved = integer.slice(kept).padStart(count, '0');
    return { integer: integer.slice(0, kept), fraction: moved + fraction };
  }
  return { integer, fraction };
}

/**
 * Parse a numeral string into its canonical decomposition.
 *
 * Accepted form: optional sign, digits (commas and spaces are ignored),
 * optional decimal point and digits, optional `E`/`e` and a signed integer.
 *
 * @param text - Numeral such as "12,345", "-0.5" or "120.3045E4"
 * @throws MalformedNumeralError if the text does not follow that form, or
 * the exponent would push either side past {@link MAX_SHIFTED_DIGITS} digits
 */
export function normalize(text: string): NumeralDecomposition {
  let work = text.replace(/[, ]/g, '').trim().toUpperCase();
  if (work.length === 0) {
    throw new MalformedNumeralError('Numeral is empty', text);
  }

  const isMinus = work[0] === '-';
  work = work.replace(LEADING_SIGNS, '');

  const fields = work.split('E');
  if (fields.length > 2) {
    throw new MalformedNumeralError('Numeral has more than one exponent marker', text);
  }
  const mantissa = fields[0];
  const exponent = fields.length === 2 ? parseExponent(fields[1], text) : 0;

  if (!MANTISSA_PATTERN.test(mantissa) || !/[0-9]/.test(mantissa)) {
    throw new MalformedNumeralError(`"${mantissa}" is not a decimal mantissa`, text);
  }

  const pointAt = mantissa.indexOf('.');
  const integerField = pointAt === -1 ? mantissa : mantissa.slice(0, pointAt);
  const fractionField = pointAt === -1 ? '' : mantissa.slice(pointAt + 1);
  const integer = stripLeadingZeros(integerField);
  const fraction = stripTrailingZeros(fractionField);

  if (integer.length === 0 && fraction.length === 0) {
    return ZERO;
  }

  if (
    integer.length + exponent > MAX_SHIFTED_DIGITS ||
    fraction.length - exponent > MAX_SHIFTED_DIGITS
  ) {
    throw new MalformedNumeralError(
      `Exponent ${exponent} would produce more than ${MAX_SHIFTED_DIGITS} digits`,
      text
    );
  }

  const shifted = shiftDigits(integer, fraction, exponent);
  return createDecomposition({
    isMinus,
    integerDigits: shifted.integer,
    fractionDigits: shifted.fraction,
  });
}

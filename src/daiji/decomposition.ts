/**
 * Canonical, exponent-free representation of a numeral.
 *
 * A decomposition is an immutable value: the truncation helpers return a
 * new object and never touch their argument.
 */

import { MalformedNumeralError } from './errors.js';

/**
 * Sign, zero flag and the two digit runs of a numeral.
 */
export interface NumeralDecomposition {
  readonly isMinus: boolean;
  readonly isZero: boolean;
  /** Integer digits without leading zeros; '' when there is no integer part. */
  readonly integerDigits: string;
  /** Fraction digits without trailing zeros; '' when there is no fraction. */
  readonly fractionDigits: string;
}

/**
 * Fields accepted by {@link createDecomposition}.
 */
export interface DecompositionParts {
  isMinus?: boolean;
  integerDigits?: string;
  fractionDigits?: string;
}

const DIGITS_ONLY = /^[0-9]*$/;

export const ZERO: NumeralDecomposition = Object.freeze({
  isMinus: false,
  isZero: true,
  integerDigits: '',
  fractionDigits: '',
});

export function stripLeadingZeros(digits: string): string {
  return digits.replace(/^0+/, '');
}

export function stripTrailingZeros(digits: string): string {
  return digits.replace(/0+$/, '');
}

function assertDigits(value: string, part: string): void {
  if (!DIGITS_ONLY.test(value)) {
    throw new MalformedNumeralError(
      `The ${part} part may only contain the digits 0-9, got "${value}"`,
      value
    );
  }
}

/**
 * Build a decomposition from raw digit runs.
 *
 * Zero-ness is derived from the digits, and a zero value never carries a
 * minus sign.
 *
 * @throws MalformedNumeralError if either run contains a non-digit
 */
export function createDecomposition(parts: DecompositionParts): NumeralDecomposition {
  const integerRaw = parts.integerDigits ?? '';
  const fractionRaw = parts.fractionDigits ?? '';
  assertDigits(integerRaw, 'integer');
  assertDigits(fractionRaw, 'fraction');

  const integerDigits = stripLeadingZeros(integerRaw);
  const fractionDigits = stripTrailingZeros(fractionRaw);
  if (integerDigits.length === 0 && fractionDigits.length === 0) {
    return ZERO;
  }

  return Object.freeze({
    isMinus: parts.isMinus ?? false,
    isZero: false,
    integerDigits,
    fractionDigits,
  });
}

export function hasIntegerPart(d: NumeralDecomposition): boolean {
  return d.integerDigits.length > 0;
}

export function hasFractionPart(d: NumeralDecomposition): boolean {
  return d.fractionDigits.length > 0;
}

/**
 * Drop the fractional part. The result may be zero.
 */
export function withoutFraction(d: NumeralDecomposition): NumeralDecomposition {
  return createDecomposition({ isMinus: d.isMinus, integerDigits: d.integerDigits });
}

/**
 * Drop the integer part. The result may be zero.
 */
export function withoutInteger(d: NumeralDecomposition): NumeralDecomposition {
  return createDecomposition({ isMinus: d.isMinus, fractionDigits: d.fractionDigits });
}

/**
 * Plain decimal text of a decomposition: "0", "1", "0.1", "-1.2".
 */
export function decompositionToString(d: NumeralDecomposition): string {
  if (d.isZero) {
    return '0';
  }

  const sign = d.isMinus ? '-' : '';
  const integer = hasIntegerPart(d) ? d.integerDigits : '0';
  const fraction = hasFractionPart(d) ? `.${d.fractionDigits}` : '';
  return `${sign}${integer}${fraction}`;
}

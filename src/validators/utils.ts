/**
 * Limits and patterns shared by the tool validators.
 */

/**
 * Longest numeral text a tool accepts.
 */
export const MAX_NUMERAL_LENGTH = 1000;

/**
 * Largest exponent magnitude a tool accepts. Applying an exponent writes
 * one digit per step, so this bounds the work a single call can cause.
 */
export const MAX_EXPONENT = 10000;

/**
 * Regex pattern for the exponent field of a numeral.
 */
export const EXPONENT_FIELD_PATTERN = /[eE]\s*([+-]?\d+)\s*$/;

/**
 * Separators the normalizer drops before it reads the exponent.
 */
const IGNORED_SEPARATORS = /[, ]/g;

/**
 * Check whether a numeral's exponent is within {@link MAX_EXPONENT}.
 *
 * Commas and spaces are removed first, as the normalizer does, so a
 * grouped exponent such as "1E20,000" is measured at its full value.
 * Text without a well-formed exponent passes; the normalizer reports the
 * malformed cases itself.
 *
 * @param text - Numeral text
 * @returns True if the exponent is absent or small enough
 */
export function isExponentWithinLimit(text: string): boolean {
  const match = EXPONENT_FIELD_PATTERN.exec(text.replace(IGNORED_SEPARATORS, '').trim());
  if (!match) {
    return true;
  }
  return Math.abs(Number(match[1])) <= MAX_EXPONENT;
}

/**
 * Unicode normalization for numeral input.
 *
 * NFKC folds full-width digits, signs, commas and the ideographic space to
 * their ASCII forms (１２，３４５ → 12,345). It leaves the typographic minus
 * signs alone, so those are mapped to '-' here.
 */

const MINUS_VARIANTS = /[−‒–—]/g;

/**
 * Normalize numeral text to NFKC form with ASCII minus signs.
 *
 * @param text - Numeral text, possibly full-width
 * @returns Normalized text
 */
export function normalizeNumeralText(text: string): string {
  if (typeof text !== 'string') {
    return String(text);
  }
  return text.normalize('NFKC').replace(MINUS_VARIANTS, '-');
}

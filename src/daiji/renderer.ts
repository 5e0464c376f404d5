/**
 * Daiji rendering of a normalized numeral.
 *
 * Digits are walked from the most significant one in 4-digit groups. Within
 * a group, positions 0..3 are thousand, hundred, ten and one's place; a
 * group that produced any output is closed with its large-unit name.
 */

import { DIGITS_PER_GROUP } from './constants.js';
import { withoutFraction, type NumeralDecomposition } from './decomposition.js';
import { LargeUnitOverflowError } from './errors.js';
import type { DaijiConfig } from './types.js';

const ONES_PLACE = DIGITS_PER_GROUP - 1;

function largeUnitFor(groupIndex: number, config: DaijiConfig): string {
  if (groupIndex < config.largeUnitNames.length) {
    return config.largeUnitNames[groupIndex];
  }
  if (config.overflowPolicy === 'fail') {
    throw new LargeUnitOverflowError(groupIndex, config.largeUnitNames.length);
  }
  return '';
}

/**
 * Render the integer part of a decomposition as daiji.
 *
 * The fraction is discarded, never rounded. A value that truncates to zero
 * renders as the zero glyph alone.
 *
 * @throws LargeUnitOverflowError if a group has no unit name and the
 * overflow policy is `fail`
 */
export function render(decomposition: NumeralDecomposition, config: DaijiConfig): string {
  const truncated = withoutFraction(decomposition);
  if (truncated.isZero) {
    return config.digitGlyphs[0];
  }

  const digits = truncated.integerDigits;
  let result = truncated.isMinus ? '-' : '';
  let groupIndex = Math.floor((digits.length - 1) / DIGITS_PER_GROUP);
  let position = (DIGITS_PER_GROUP - (digits.length % DIGITS_PER_GROUP)) % DIGITS_PER_GROUP;
  let groupEmitted = false;

  for (const char of digits) {
    const digit = char.charCodeAt(0) - 48;

    if (digit !== 0) {
      if (position === ONES_PLACE || digit !== 1 || config.appendOneBeforeSmallUnits) {
        result += config.digitGlyphs[digit];
        groupEmitted = true;
      }
      // A bare 千/百/拾 still stands for one of that unit.
      const unit = config.positionalUnitNames[position];
      if (unit.length > 0) {
        result += unit;
        groupEmitted = true;
      }
    }

    if (position === ONES_PLACE && groupEmitted) {
      result += largeUnitFor(groupIndex, config);
    }

    position = (position + 1) % DIGITS_PER_GROUP;
    if (position === 0) {
      groupEmitted = false;
      groupIndex--;
    }
  }

  return result;
}

/**
 * Default daiji tables.
 */

import type { DaijiConfig } from './types.js';

/**
 * Large-number names for each 4-digit group, up to 10^64.
 */
export const DEFAULT_LARGE_UNIT_NAMES: readonly string[] = Object.freeze([
  '',
  '万',
  '億',
  '兆',
  '京',
  '垓',
  '𥝱',
  '穣',
  '溝',
  '澗',
  '正',
  '載',
  '極',
  '恒河沙',
  '阿僧祇',
  '那由他',
  '不可思議',
]);

/**
 * Thousand, hundred, ten, one's place.
 */
export const DEFAULT_POSITIONAL_UNIT_NAMES: readonly string[] = Object.freeze([
  '千',
  '百',
  '拾',
  '',
]);

export const DEFAULT_DIGIT_GLYPHS: readonly string[] = Object.freeze([
  '零',
  '壱',
  '弐',
  '参',
  '四',
  '五',
  '六',
  '七',
  '八',
  '九',
]);

export const POSITIONAL_UNIT_COUNT = 4;
export const DIGIT_GLYPH_COUNT = 10;
export const DIGITS_PER_GROUP = 4;

/**
 * Most digits either side of the decimal point may hold once the exponent
 * is applied.
 */
export const MAX_SHIFTED_DIGITS = 10_000_000;

/**
 * Significant digits used when stringifying a `number`.
 */
export const NUMBER_FORMAT_PRECISION = 35;

export const DEFAULT_CONFIG: DaijiConfig = {
  largeUnitNames: DEFAULT_LARGE_UNIT_NAMES,
  positionalUnitNames: DEFAULT_POSITIONAL_UNIT_NAMES,
  digitGlyphs: DEFAULT_DIGIT_GLYPHS,
  appendOneBeforeSmallUnits: true,
  overflowPolicy: 'omit',
};

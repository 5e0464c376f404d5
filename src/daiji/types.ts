/**
 * Configuration types for daiji rendering.
 */

/**
 * What to do when a 4-digit group has no large-unit name.
 *
 * - `fail`: throw a LargeUnitOverflowError
 * - `omit`: render the group's digits without a unit name
 */
export type OverflowPolicy = 'fail' | 'omit';

export const OVERFLOW_POLICIES = ['fail', 'omit'] as const satisfies readonly OverflowPolicy[];

/**
 * Tables and flags read by the renderer.
 */
export interface DaijiConfig {
  /** Names per 4-digit group: [0] no unit, [1] 10^4, [2] 10^8, ... */
  readonly largeUnitNames: readonly string[];
  /** Thousand, hundred, ten and one's-place names within a group. */
  readonly positionalUnitNames: readonly string[];
  /** Glyph per digit value; [0] is only used for a zero result. */
  readonly digitGlyphs: readonly string[];
  /** Write the digit 1 before 千/百/拾 (it is always written before a large unit). */
  readonly appendOneBeforeSmallUnits: boolean;
  readonly overflowPolicy: OverflowPolicy;
}

/**
 * Per-entry overrides accepted by DaijiConverter.
 */
export type DaijiConfigOptions = Partial<DaijiConfig>;

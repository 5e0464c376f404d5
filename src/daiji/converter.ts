/**
 * Daiji converter: configuration holder and public conversion API.
 *
 * @example
 * const converter = new DaijiConverter();
 * converter.convertNumber(123456789); // '壱億弐千参百四拾五万六千七百八拾九'
 * converter.convertNumeralString('120.3045E4'); // '壱百弐拾万参千四拾五'
 *
 * Fractions are truncated, so "0.9" becomes '零'. Negative values get a
 * leading '-', which formal documents rarely want.
 *
 * A converter is meant to be configured once and then shared; derive a
 * variant with {@link DaijiConverter.withOptions} instead of mutating a
 * shared instance.
 */

import {
  DEFAULT_CONFIG,
  DIGIT_GLYPH_COUNT,
  POSITIONAL_UNIT_COUNT,
} from './constants.js';
import type { NumeralDecomposition } from './decomposition.js';
import { ConfigurationError } from './errors.js';
import { formatNumeric, type NumericValue } from './format.js';
import { normalize } from './normalizer.js';
import { render } from './renderer.js';
import {
  OVERFLOW_POLICIES,
  type DaijiConfig,
  type DaijiConfigOptions,
  type OverflowPolicy,
} from './types.js';

function freezeTable(
  value: readonly string[],
  setting: string,
  minimum: number
): readonly string[] {
  if (value.length < minimum) {
    throw new ConfigurationError(
      `${setting} needs at least ${minimum} entries, got ${value.length}`,
      setting
    );
  }
  return Object.freeze([...value]);
}

export class DaijiConverter {
  private largeUnitTable: readonly string[] = DEFAULT_CONFIG.largeUnitNames;
  private positionalUnitTable: readonly string[] = DEFAULT_CONFIG.positionalUnitNames;
  private digitGlyphTable: readonly string[] = DEFAULT_CONFIG.digitGlyphs;
  private appendOne: boolean = DEFAULT_CONFIG.appendOneBeforeSmallUnits;
  private overflow: OverflowPolicy = DEFAULT_CONFIG.overflowPolicy;

  /**
   * @param options - Entries to override; the rest keep their defaults
   * @throws ConfigurationError if a table is too short
   */
  constructor(options: DaijiConfigOptions = {}) {
    if (options.largeUnitNames !== undefined) {
      this.largeUnitNames = options.largeUnitNames;
    }
    if (options.positionalUnitNames !== undefined) {
      this.positionalUnitNames = options.positionalUnitNames;
    }
    if (options.digitGlyphs !== undefined) {
      this.digitGlyphs = options.digitGlyphs;
    }
    if (options.appendOneBeforeSmallUnits !== undefined) {
      this.appendOneBeforeSmallUnits = options.appendOneBeforeSmallUnits;
    }
    if (options.overflowPolicy !== undefined) {
      this.overflowPolicy = options.overflowPolicy;
    }
  }

  /**
   * Large-unit names per 4-digit group, index 0 being the ones group.
   */
  get largeUnitNames(): readonly string[] {
    return this.largeUnitTable;
  }

  set largeUnitNames(value: readonly string[]) {
    this.largeUnitTable = freezeTable(value, 'largeUnitNames', 1);
  }

  /**
   * Names for the thousand, hundred, ten and one's place, in that order.
   * Entries past the fourth are ignored.
   */
  get positionalUnitNames(): readonly string[] {
    return this.positionalUnitTable;
  }

  set positionalUnitNames(value: readonly string[]) {
    this.positionalUnitTable = freezeTable(value, 'positionalUnitNames', POSITIONAL_UNIT_COUNT);
  }

  /**
   * Glyphs for the digits 0-9. Entries past the tenth are ignored.
   */
  get digitGlyphs(): readonly string[] {
    return this.digitGlyphTable;
  }

  set digitGlyphs(value: readonly string[]) {
    this.digitGlyphTable = freezeTable(value, 'digitGlyphs', DIGIT_GLYPH_COUNT);
  }

  get appendOneBeforeSmallUnits(): boolean {
    return this.appendOne;
  }

  set appendOneBeforeSmallUnits(value: boolean) {
    this.appendOne = value;
  }

  get overflowPolicy(): OverflowPolicy {
    return this.overflow;
  }

  set overflowPolicy(value: OverflowPolicy) {
    if (!OVERFLOW_POLICIES.includes(value)) {
      throw new ConfigurationError(
        `overflowPolicy must be one of ${OVERFLOW_POLICIES.join(', ')}, got "${String(value)}"`,
        'overflowPolicy'
      );
    }
    this.overflow = value;
  }

  /**
   * Snapshot of the active configuration.
   */
  get config(): DaijiConfig {
    return {
      largeUnitNames: this.largeUnitTable,
      positionalUnitNames: this.positionalUnitTable,
      digitGlyphs: this.digitGlyphTable,
      appendOneBeforeSmallUnits: this.appendOne,
      overflowPolicy: this.overflow,
    };
  }

  /**
   * New converter with this one's configuration plus the given overrides.
   */
  withOptions(overrides: DaijiConfigOptions): DaijiConverter {
    return new DaijiConverter({
      largeUnitNames: overrides.largeUnitNames ?? this.largeUnitTable,
      positionalUnitNames: overrides.positionalUnitNames ?? this.positionalUnitTable,
      digitGlyphs: overrides.digitGlyphs ?? this.digitGlyphTable,
      appendOneBeforeSmallUnits: overrides.appendOneBeforeSmallUnits ?? this.appendOne,
      overflowPolicy: overrides.overflowPolicy ?? this.overflow,
    });
  }

  /**
   * Parse a numeral string without rendering it.
   */
  normalize(text: string): NumeralDecomposition {
    return normalize(text);
  }

  /**
   * Convert a `number` or `bigint` to daiji.
   *
   * @throws MalformedNumeralError for NaN and infinities
   */
  convertNumber(value: NumericValue): string {
    return this.convertNumeralString(formatNumeric(value));
  }

  /**
   * Convert numeral text such as "12,345" or "31.4E-1" to daiji.
   *
   * @throws MalformedNumeralError if the text is not a numeral, or its
   * exponent would write out more than MAX_SHIFTED_DIGITS digits
   * @throws LargeUnitOverflowError if the value outgrows the large-unit
   * table and the overflow policy is `fail`
   */
  convertNumeralString(text: string): string {
    return render(normalize(text), this.config);
  }
}

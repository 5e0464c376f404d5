import { DEFAULT_LARGE_UNIT_NAMES } from './constants';
import { DaijiConverter } from './converter';
import { ConfigurationError, LargeUnitOverflowError, MalformedNumeralError } from './errors';

describe('DaijiConverter', () => {
  describe('convertNumber', () => {
    const converter = new DaijiConverter();

    it.each([
      [0, '零'],
      [1, '壱'],
      [10, '壱拾'],
      [1000, '壱千'],
      [12345, '壱万弐千参百四拾五'],
      [123456789, '壱億弐千参百四拾五万六千七百八拾九'],
      [-7.9, '-七'],
      [0.1, '零'],
      [1e21, '壱拾垓'],
      [Number.MAX_SAFE_INTEGER, '九千七兆壱千九百九拾弐億五千四百七拾四万九百九拾壱'],
    ])('%p → %s', (value, expected) => {
      expect(converter.convertNumber(value)).toBe(expected);
    });

    it('converts bigint values exactly', () => {
      expect(converter.convertNumber(12345n)).toBe('壱万弐千参百四拾五');
      expect(converter.convertNumber(-100000001n)).toBe('-壱億壱');
      expect(converter.convertNumber(10n ** 64n)).toBe('壱不可思議');
    });

    it.each([NaN, Infinity, -Infinity])('rejects %p', (value) => {
      expect(() => converter.convertNumber(value)).toThrow(MalformedNumeralError);
    });
  });

  describe('convertNumeralString', () => {
    const converter = new DaijiConverter();

    it('converts exponent and grouped notation', () => {
      expect(converter.convertNumeralString('120.3045E4')).toBe('壱百弐拾万参千四拾五');
      expect(converter.convertNumeralString('1,234,567')).toBe('壱百弐拾参万四千五百六拾七');
    });

    it('rejects malformed text', () => {
      expect(() => converter.convertNumeralString('12a')).toThrow(MalformedNumeralError);
    });

    it('rejects exponents too large to write out', () => {
      expect(() => converter.convertNumeralString('1E1000000000')).toThrow(MalformedNumeralError);
    });
  });

  describe('configuration', () => {
    it('starts from the default tables', () => {
      const converter = new DaijiConverter();

      expect(converter.largeUnitNames).toEqual(DEFAULT_LARGE_UNIT_NAMES);
      expect(converter.positionalUnitNames).toEqual(['千', '百', '拾', '']);
      expect(converter.digitGlyphs[0]).toBe('零');
      expect(converter.appendOneBeforeSmallUnits).toBe(true);
      expect(converter.overflowPolicy).toBe('omit');
    });

    it('applies constructor overrides independently', () => {
      const converter = new DaijiConverter({ appendOneBeforeSmallUnits: false });

      expect(converter.convertNumber(1000)).toBe('千');
      expect(converter.overflowPolicy).toBe('omit');
    });

    it('applies setter changes', () => {
      const converter = new DaijiConverter();
      converter.largeUnitNames = ['', '万'];
      converter.overflowPolicy = 'fail';

      expect(() => converter.convertNumber(123456789)).toThrow(LargeUnitOverflowError);
    });

    it('stores a frozen copy of each table', () => {
      const glyphs = ['〇', '一', '二', '三', '四', '五', '六', '七', '八', '九'];
      const converter = new DaijiConverter({ digitGlyphs: glyphs });
      glyphs[1] = 'X';

      expect(converter.digitGlyphs[1]).toBe('一');
      expect(Object.isFrozen(converter.digitGlyphs)).toBe(true);
    });

    it('ignores entries past the required table size', () => {
      const converter = new DaijiConverter({ positionalUnitNames: ['千', '百', '拾', '', '余'] });

      expect(converter.convertNumber(1111)).toBe('壱千壱百壱拾壱');
    });

    it.each([
      ['positionalUnitNames', { positionalUnitNames: ['千', '百', '拾'] }],
      ['digitGlyphs', { digitGlyphs: ['零', '壱', '弐'] }],
      ['largeUnitNames', { largeUnitNames: [] }],
    ])('rejects a short %s table', (setting, options) => {
      let caught: unknown;
      try {
        new DaijiConverter(options);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught).toHaveProperty('setting', setting);
    });

    it('rejects a short table through the setter', () => {
      const converter = new DaijiConverter();

      expect(() => {
        converter.digitGlyphs = ['零'];
      }).toThrow('digitGlyphs needs at least 10 entries, got 1');
      expect(converter.digitGlyphs).toHaveLength(10);
    });
  });

  describe('withOptions', () => {
    it('derives a converter without changing the original', () => {
      const base = new DaijiConverter({ largeUnitNames: ['', '万'] });
      const derived = base.withOptions({ appendOneBeforeSmallUnits: false });

      expect(derived.convertNumber(1000)).toBe('千');
      expect(derived.largeUnitNames).toEqual(['', '万']);
      expect(base.convertNumber(1000)).toBe('壱千');
    });

    it('keeps the current value for undefined overrides', () => {
      const base = new DaijiConverter({ overflowPolicy: 'fail' });
      const derived = base.withOptions({ overflowPolicy: undefined });

      expect(derived.overflowPolicy).toBe('fail');
    });
  });

  describe('normalize', () => {
    it('exposes the decomposition', () => {
      const d = new DaijiConverter().normalize('-31.4E-1');

      expect(d).toEqual({
        isMinus: true,
        isZero: false,
        integerDigits: '3',
        fractionDigits: '14',
      });
    });
  });
});

import {
  createDecomposition,
  decompositionToString,
  hasFractionPart,
  hasIntegerPart,
  withoutFraction,
  withoutInteger,
  ZERO,
} from './decomposition';
import { MalformedNumeralError } from './errors';

describe('decomposition', () => {
  describe('createDecomposition', () => {
    it('strips leading integer zeros and trailing fraction zeros', () => {
      const d = createDecomposition({ integerDigits: '00120', fractionDigits: '5000' });

      expect(d.integerDigits).toBe('120');
      expect(d.fractionDigits).toBe('5');
      expect(d.isZero).toBe(false);
    });

    it('collapses all-zero digits to ZERO and drops the sign', () => {
      const d = createDecomposition({ isMinus: true, integerDigits: '000', fractionDigits: '00' });

      expect(d).toBe(ZERO);
      expect(d.isMinus).toBe(false);
      expect(d.isZero).toBe(true);
    });

    it('rejects non-digit characters in either part', () => {
      expect(() => createDecomposition({ integerDigits: '12a' })).toThrow(MalformedNumeralError);
      expect(() => createDecomposition({ fractionDigits: '-5' })).toThrow(MalformedNumeralError);
    });

    it('returns frozen values', () => {
      const d = createDecomposition({ integerDigits: '7' });

      expect(Object.isFrozen(d)).toBe(true);
      expect(Object.isFrozen(ZERO)).toBe(true);
    });
  });

  describe('truncation', () => {
    it('withoutFraction keeps the integer and sign', () => {
      const d = withoutFraction(
        createDecomposition({ isMinus: true, integerDigits: '12', fractionDigits: '5' })
      );

      expect(d.integerDigits).toBe('12');
      expect(d.fractionDigits).toBe('');
      expect(d.isMinus).toBe(true);
    });

    it('withoutFraction of a pure fraction is zero without a sign', () => {
      const d = withoutFraction(createDecomposition({ isMinus: true, fractionDigits: '9' }));

      expect(d.isZero).toBe(true);
      expect(d.isMinus).toBe(false);
    });

    it('withoutInteger keeps the fraction and sign', () => {
      const d = withoutInteger(
        createDecomposition({ isMinus: true, integerDigits: '12', fractionDigits: '5' })
      );

      expect(decompositionToString(d)).toBe('-0.5');
    });

    it('withoutInteger of a whole number is zero', () => {
      expect(withoutInteger(createDecomposition({ integerDigits: '40' })).isZero).toBe(true);
    });

    it('leaves the original untouched', () => {
      const original = createDecomposition({ integerDigits: '3', fractionDigits: '14' });
      withoutFraction(original);

      expect(original.fractionDigits).toBe('14');
    });
  });

  describe('part checks', () => {
    it('reports which parts are present', () => {
      const d = createDecomposition({ fractionDigits: '25' });

      expect(hasIntegerPart(d)).toBe(false);
      expect(hasFractionPart(d)).toBe(true);
    });
  });

  describe('decompositionToString', () => {
    it.each([
      [ZERO, '0'],
      [createDecomposition({ integerDigits: '1' }), '1'],
      [createDecomposition({ fractionDigits: '1' }), '0.1'],
      [createDecomposition({ isMinus: true, integerDigits: '1', fractionDigits: '2' }), '-1.2'],
    ])('%o → %s', (d, expected) => {
      expect(decompositionToString(d)).toBe(expected);
    });
  });
});

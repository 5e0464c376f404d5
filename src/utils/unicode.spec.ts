import { normalizeNumeralText } from './unicode';

describe('normalizeNumeralText', () => {
  it('folds full-width digits, signs and separators', () => {
    expect(normalizeNumeralText('－１２，３４５．６')).toBe('-12,345.6');
    expect(normalizeNumeralText('１．２Ｅ８')).toBe('1.2E8');
  });

  it('maps typographic minus signs to "-"', () => {
    expect(normalizeNumeralText('−5')).toBe('-5');
    expect(normalizeNumeralText('–5')).toBe('-5');
  });

  it('leaves ASCII numerals unchanged', () => {
    expect(normalizeNumeralText('-1,000.5e3')).toBe('-1,000.5e3');
  });
});

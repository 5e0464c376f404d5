import { createDecomposition } from '../daiji/decomposition';
import {
  escapeMarkdown,
  formatConversionMarkdown,
  formatNormalizationMarkdown,
} from './markdown';

describe('markdown formatters', () => {
  describe('escapeMarkdown', () => {
    it('escapes numeral punctuation', () => {
      expect(escapeMarkdown('-1.5')).toBe('\\-1\\.5');
      expect(escapeMarkdown('+2')).toBe('\\+2');
    });

    it('leaves kanji and commas alone', () => {
      expect(escapeMarkdown('壱万,弐千')).toBe('壱万,弐千');
    });
  });

  describe('formatConversionMarkdown', () => {
    it('renders the report table', () => {
      const text = formatConversionMarkdown({
        input: '-1.5E1',
        canonical: '-15',
        daiji: '-壱拾五',
        appendOneBeforeSmallUnits: false,
        overflowPolicy: 'fail',
      });

      expect(text).toBe(
        '# Daiji Conversion\n\n' +
          '**Daiji:** `-壱拾五`\n\n' +
          '| Field | Value |\n' +
          '|-------|-------|\n' +
          '| Input | \\-1\\.5E1 |\n' +
          '| Canonical | \\-15 |\n' +
          '| Daiji | \\-壱拾五 |\n' +
          '| 壱 before 千百拾 | no |\n' +
          '| Overflow policy | fail |\n'
      );
    });
  });

  describe('formatNormalizationMarkdown', () => {
    it('marks missing parts', () => {
      const text = formatNormalizationMarkdown('0.5', createDecomposition({ fractionDigits: '5' }), '0.5');

      expect(text).toContain('| Integer digits | (none) |\n');
      expect(text).toContain('| Fraction digits | 5 |\n');
      expect(text).toContain('| Sign | non-negative |\n');
    });
  });
});

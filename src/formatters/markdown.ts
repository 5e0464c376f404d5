/**
 * Markdown formatting utilities for conversion results.
 *
 * Provides functions to escape special characters and format tool output
 * as human-readable markdown.
 */

import type { NumeralDecomposition } from '../daiji/decomposition.js';
import type { OverflowPolicy } from '../daiji/types.js';

/**
 * Regex pattern for markdown special characters that need escaping.
 */
const MD_SPECIAL = /([\\`*_{}[\]()#+\-.!|>])/g;

/**
 * Escape special Markdown characters to prevent formatting issues.
 *
 * @param text - String that may contain Markdown special characters
 * @returns Escaped string safe for Markdown output
 */
export function escapeMarkdown(text: string): string {
  if (typeof text !== 'string') {
    return String(text);
  }
  return text.replace(MD_SPECIAL, '\\$1');
}

/**
 * Everything the conversion report shows.
 */
export interface ConversionReport {
  input: string;
  canonical: string;
  daiji: string;
  appendOneBeforeSmallUnits: boolean;
  overflowPolicy: OverflowPolicy;
}

/**
 * Format a daiji conversion as markdown.
 *
 * The daiji string is also given on its own line in a code span so clients
 * can copy it without escapes.
 */
export function formatConversionMarkdown(report: ConversionReport): string {
  let output = '# Daiji Conversion\n\n';

  output += `**Daiji:** \`${report.daiji}\`\n\n`;
  output += '| Field | Value |\n';
  output += '|-------|-------|\n';
  output += `| Input | ${escapeMarkdown(report.input)} |\n`;
  output += `| Canonical | ${escapeMarkdown(report.canonical)} |\n`;
  output += `| Daiji | ${escapeMarkdown(report.daiji)} |\n`;
  output += `| 壱 before 千百拾 | ${report.appendOneBeforeSmallUnits ? 'yes' : 'no'} |\n`;
  output += `| Overflow policy | ${report.overflowPolicy} |\n`;

  return output;
}

/**
 * Format a numeral decomposition as markdown.
 *
 * @param input - Numeral text as received
 * @param decomposition - Normalized value
 * @param canonical - Plain decimal text of the value
 */
export function formatNormalizationMarkdown(
  input: string,
  decomposition: NumeralDecomposition,
  canonical: string
): string {
  let output = '# Numeral Normalization\n\n';

  output += '| Field | Value |\n';
  output += '|-------|-------|\n';
  output += `| Input | ${escapeMarkdown(input)} |\n`;
  output += `| Canonical | ${escapeMarkdown(canonical)} |\n`;
  output += `| Sign | ${decomposition.isMinus ? 'negative' : 'non-negative'} |\n`;
  output += `| Zero | ${decomposition.isZero ? 'yes' : 'no'} |\n`;
  output += `| Integer digits | ${decomposition.integerDigits || '(none)'} |\n`;
  output += `| Fraction digits | ${decomposition.fractionDigits || '(none)'} |\n`;

  return output;
}

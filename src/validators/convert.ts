/**
 * Zod schema for daiji conversion input validation.
 */

import { z } from 'zod';
import { OVERFLOW_POLICIES } from '../daiji/types.js';
import { normalizeNumeralText } from '../utils/unicode.js';
import { isExponentWithinLimit, MAX_EXPONENT, MAX_NUMERAL_LENGTH } from './utils.js';

/**
 * Zod shape for daiji conversion (for MCP SDK registration).
 */
export const convertParamsShape = {
  value: z
    .string()
    .min(1, 'Value cannot be empty')
    .max(MAX_NUMERAL_LENGTH, `Value must be ${MAX_NUMERAL_LENGTH} characters or less`)
    .describe(
      'Number to convert: digits with an optional sign, grouping commas, ' +
        'decimal point and exponent (12345, -1,000, 120.3045E4, １２３). ' +
        'The fraction is truncated.'
    ),
  append_one: z
    .boolean()
    .optional()
    .describe(
      'Write 壱 before 千, 百 and 拾 (壱千 rather than 千). Defaults to the server setting.'
    ),
  overflow_policy: z
    .enum(OVERFLOW_POLICIES)
    .optional()
    .describe(
      "What to do when the number needs a unit beyond 不可思議 (10^64): " +
        "'fail' returns an error, 'omit' writes the digits without a unit. " +
        'Defaults to the server setting.'
    ),
};

/**
 * Schema for daiji conversion input.
 */
export const ConvertInputSchema = z.object({
  value: z
    .string({ message: 'Value must be a string' })
    .max(MAX_NUMERAL_LENGTH, `Value must be ${MAX_NUMERAL_LENGTH} characters or less`)
    .transform((v) => normalizeNumeralText(v.trim()))
    .refine((v) => v.length > 0, 'Value cannot be empty')
    .refine(isExponentWithinLimit, `Exponent must be between -${MAX_EXPONENT} and ${MAX_EXPONENT}`),
  append_one: z.boolean({ message: 'append_one must be a boolean' }).optional(),
  overflow_policy: z.enum(OVERFLOW_POLICIES).optional(),
});

/**
 * TypeScript type for validated conversion input.
 */
export type ConvertInput = z.infer<typeof ConvertInputSchema>;

/**
 * Tool name constant.
 */
export const CONVERT_TOOL_NAME = 'daiji_convert';

/**
 * Tool description.
 */
export const CONVERT_TOOL_DESCRIPTION =
  'Convert a number to formal Japanese daiji numerals as used on contracts, ' +
  'receipts and certificates (12345 → 壱万弐千参百四拾五). ' +
  'Accepts plain, comma-grouped, decimal and exponential notation. ' +
  'Fractions are truncated, not rounded.';

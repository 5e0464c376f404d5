/**
 * Zod schema for numeral normalization input.
 */

import { z } from 'zod';
import { normalizeNumeralText } from '../utils/unicode.js';
import { isExponentWithinLimit, MAX_EXPONENT, MAX_NUMERAL_LENGTH } from './utils.js';

/**
 * Zod shape for numeral normalization (for MCP SDK registration).
 */
export const normalizeParamsShape = {
  value: z
    .string()
    .min(1, 'Value cannot be empty')
    .max(MAX_NUMERAL_LENGTH, `Value must be ${MAX_NUMERAL_LENGTH} characters or less`)
    .describe('Numeral to expand, e.g. 31.4E-1 or -1,200.50'),
};

export const NormalizeInputSchema = z.object({
  value: z
    .string({ message: 'Value must be a string' })
    .max(MAX_NUMERAL_LENGTH, `Value must be ${MAX_NUMERAL_LENGTH} characters or less`)
    .transform((v) => normalizeNumeralText(v.trim()))
    .refine((v) => v.length > 0, 'Value cannot be empty')
    .refine(isExponentWithinLimit, `Exponent must be between -${MAX_EXPONENT} and ${MAX_EXPONENT}`),
});

export type NormalizeInput = z.infer<typeof NormalizeInputSchema>;

export const NORMALIZE_TOOL_NAME = 'daiji_normalize';

export const NORMALIZE_TOOL_DESCRIPTION =
  'Expand a numeral in exponential or grouped notation into its exact sign, ' +
  'integer digits and fraction digits without rounding (31.4E-1 → 3.14). ' +
  'Useful for checking what daiji_convert will render.';

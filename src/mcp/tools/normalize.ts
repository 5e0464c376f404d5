/**
 * Numeral normalization tool implementation.
 */

import { decompositionToString } from '../../daiji/decomposition.js';
import { normalize } from '../../daiji/normalizer.js';
import { formatNormalizationMarkdown } from '../../formatters/markdown.js';
import { toErrorResult, ToolError, type ToolResult } from '../../utils/errors.js';
import { logConversion } from '../../utils/logger.js';
import { formatZodError } from '../../utils/validation.js';
import { NORMALIZE_TOOL_NAME, NormalizeInputSchema } from '../../validators/normalize.js';

/**
 * Execute numeral normalization.
 *
 * @param args - Tool arguments containing the value
 * @returns MCP tool result with the decomposition as markdown
 */
export async function executeNormalize(args: Record<string, unknown>): Promise<ToolResult> {
  try {
    const parseResult = NormalizeInputSchema.safeParse(args);
    if (!parseResult.success) {
      throw new ToolError(`Validation error: ${formatZodError(parseResult.error)}`);
    }

    const { value } = parseResult.data;
    const decomposition = normalize(value);
    const canonical = decompositionToString(decomposition);

    logConversion(NORMALIZE_TOOL_NAME, value, canonical);

    return {
      content: [
        {
          type: 'text',
          text: formatNormalizationMarkdown(value, decomposition, canonical),
        },
      ],
    };
  } catch (error) {
    return toErrorResult(error, 'Normalize');
  }
}

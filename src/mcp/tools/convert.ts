/**
 * Daiji conversion tool implementation.
 */

import type { DaijiConverter } from '../../daiji/converter.js';
import { decompositionToString } from '../../daiji/decomposition.js';
import { render } from '../../daiji/renderer.js';
import { CONVERT_TOOL_NAME, ConvertInputSchema } from '../../validators/convert.js';
import { formatConversionMarkdown } from '../../formatters/markdown.js';
import { toErrorResult, ToolError, type ToolResult } from '../../utils/errors.js';
import { logConversion } from '../../utils/logger.js';
import { formatZodError } from '../../utils/validation.js';

/**
 * Execute a daiji conversion.
 *
 * Per-call options are applied to a derived converter; the shared one is
 * never modified.
 *
 * @param args - Tool arguments containing the value and optional settings
 * @param converter - Converter holding the server's configuration
 * @returns MCP tool result with the formatted conversion
 */
export async function executeConvert(
  args: Record<string, unknown>,
  converter: DaijiConverter
): Promise<ToolResult> {
  try {
    const parseResult = ConvertInputSchema.safeParse(args);
    if (!parseResult.success) {
      throw new ToolError(`Validation error: ${formatZodError(parseResult.error)}`);
    }

    const { value, append_one, overflow_policy } = parseResult.data;
    const active = converter.withOptions({
      appendOneBeforeSmallUnits: append_one,
      overflowPolicy: overflow_policy,
    });

    const decomposition = active.normalize(value);
    const daiji = render(decomposition, active.config);

    logConversion(CONVERT_TOOL_NAME, value, daiji);

    return {
      content: [
        {
          type: 'text',
          text: formatConversionMarkdown({
            input: value,
            canonical: decompositionToString(decomposition),
            daiji,
            appendOneBeforeSmallUnits: active.appendOneBeforeSmallUnits,
            overflowPolicy: active.overflowPolicy,
          }),
        },
      ],
    };
  } catch (error) {
    return toErrorResult(error, 'Convert');
  }
}

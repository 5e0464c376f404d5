/**
 * Error handling utilities for the MCP server.
 *
 * Maps conversion errors to tool results with messages an LLM client can
 * act on.
 */

import {
  ConfigurationError,
  LargeUnitOverflowError,
  MalformedNumeralError,
} from '../daiji/errors.js';
import { logConversionError, logger } from './logger.js';

/**
 * Standard result shape returned by all MCP tool implementations.
 */
export interface ToolResult {
  [key: string]: unknown;
  content: Array<{
    type: 'text';
    text: string;
  }>;
  isError?: boolean;
}

/**
 * Custom error class for tool execution failures.
 *
 * Tool errors tell the client something went wrong so it can correct its
 * input and try again.
 */
export class ToolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolError';
    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, ToolError.prototype);
  }
}

/**
 * Map a conversion failure to a ToolError.
 *
 * This function never returns.
 *
 * @param error - The error that occurred
 * @throws ToolError - Always throws with formatted error message
 */
export function handleConversionError(error: unknown): never {
  if (error instanceof MalformedNumeralError) {
    throw new ToolError(
      `Invalid numeral: ${error.message}. ` +
        'Use digits with an optional sign, decimal point and exponent, e.g. "-12,345.6" or "1.2E8".'
    );
  }

  if (error instanceof LargeUnitOverflowError) {
    throw new ToolError(
      `Number too large: ${error.message}. ` +
        "Use overflow_policy 'omit' to render the digits without a unit name."
    );
  }

  if (error instanceof ConfigurationError) {
    throw new ToolError(`Invalid conversion settings: ${error.message}`);
  }

  if (error instanceof Error) {
    // Log full details for debugging
    logger.error('Unexpected error during conversion', {
      errorType: error.name,
      errorMessage: error.message,
      stack: error.stack,
    });

    throw new ToolError(
      'An unexpected error occurred while converting the number. ' +
        'If the problem persists, check the server logs for details.'
    );
  }

  logger.error('Unknown error type', { error });
  throw new ToolError('An unexpected error occurred. Please try again.');
}

/**
 * Convert any caught error into a ToolResult with isError set.
 *
 * A ToolError keeps its message; anything else is logged and mapped
 * through handleConversionError.
 *
 * @param error - The caught error
 * @param toolName - Name of the tool for logging context
 * @returns A ToolResult indicating the error
 */
export function toErrorResult(error: unknown, toolName: string): ToolResult {
  if (error instanceof ToolError) {
    return { content: [{ type: 'text', text: error.message }], isError: true };
  }

  if (error instanceof Error) {
    logConversionError(toolName, error);
  } else {
    logger.error(`${toolName} error`, { error: String(error) });
  }

  try {
    handleConversionError(error);
  } catch (toolError) {
    const message =
      toolError instanceof ToolError ? toolError.message : 'An unexpected error occurred';
    return { content: [{ type: 'text', text: message }], isError: true };
  }
}

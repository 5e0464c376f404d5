/**
 * Winston-based structured logging for the daiji service.
 *
 * JSON lines in production, a readable coloured format elsewhere.
 */

import winston from 'winston';

const { combine, timestamp, json, printf, colorize } = winston.format;

/**
 * Custom format for development that's more readable.
 */
const devFormat = printf(({ level, message, timestamp, ...meta }) => {
  const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : '';
  return `${timestamp} [${level}]: ${message}${metaStr}`;
});

const isProduction = process.env.NODE_ENV === 'production';

/**
 * Main application logger.
 *
 * Configuration:
 * - Production: JSON format for structured logging
 * - Development: Human-readable format with colors
 * - Test (NODE_ENV=test): silent
 * - Log level controlled by LOG_LEVEL env var (default: 'info')
 */
export const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: isProduction
    ? combine(timestamp(), json())
    : combine(timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }), colorize(), devFormat),
  transports: [new winston.transports.Console()],
  silent: process.env.NODE_ENV === 'test',
  exitOnError: false,
});

/**
 * Log a finished conversion.
 *
 * @param tool - Tool or route that ran the conversion
 * @param input - Numeral text as received
 * @param output - Produced text
 */
export function logConversion(tool: string, input: string, output: string): void {
  logger.info('Conversion completed', {
    tool,
    input,
    outputLength: output.length,
  });
}

/**
 * Log a conversion failure.
 *
 * @param tool - Tool or route that ran the conversion
 * @param error - Error object
 */
export function logConversionError(tool: string, error: Error): void {
  logger.error('Conversion error', {
    tool,
    errorType: error.name,
    errorMessage: error.message,
  });
}

/**
 * Environment-driven service settings.
 */

import { z } from 'zod';
import { ConfigurationError } from './daiji/errors.js';
import { OVERFLOW_POLICIES, type DaijiConfigOptions } from './daiji/types.js';
import { formatZodError } from './utils/validation.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const EnvSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  DAIJI_APPEND_ONE: booleanFlag.default('true'),
  DAIJI_OVERFLOW_POLICY: z.enum(OVERFLOW_POLICIES).default('omit'),
  DAIJI_LARGE_UNITS: z
    .string()
    .min(1, 'DAIJI_LARGE_UNITS cannot be empty')
    .transform((v) => v.split(',').map((name) => name.trim()))
    .optional(),
});

export interface AppConfig {
  port: number;
  converter: DaijiConfigOptions;
}

/**
 * Read service settings from the environment.
 *
 * `DAIJI_LARGE_UNITS` is a comma-separated list starting with the ones
 * group, so its first entry is usually empty: ",万,億,兆".
 *
 * @param env - Environment variables (defaults to process.env)
 * @throws ConfigurationError if a variable has an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid environment: ${formatZodError(parsed.error)}`,
      'environment'
    );
  }

  const { PORT, DAIJI_APPEND_ONE, DAIJI_OVERFLOW_POLICY, DAIJI_LARGE_UNITS } = parsed.data;
  return {
    port: PORT,
    converter: {
      appendOneBeforeSmallUnits: DAIJI_APPEND_ONE,
      overflowPolicy: DAIJI_OVERFLOW_POLICY,
      largeUnitNames: DAIJI_LARGE_UNITS,
    },
  };
}

/**
 * Service version, read from package.json so it is declared once.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';

const PackageJsonSchema = z.object({
  version: z.string(),
});

const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(join(__dirname, '../package.json'), 'utf-8'))
);

export const VERSION: string = packageJson.version;

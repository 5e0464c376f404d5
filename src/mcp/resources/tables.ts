/**
 * MCP Resource describing the active daiji tables.
 *
 * Lists each large unit with the power of ten it stands for, so clients
 * can tell how large a number the server will name.
 */

import { DIGIT_GLYPH_COUNT, DIGITS_PER_GROUP, POSITIONAL_UNIT_COUNT } from '../../daiji/constants.js';
import type { DaijiConverter } from '../../daiji/converter.js';
import type { OverflowPolicy } from '../../daiji/types.js';
import { logger } from '../../utils/logger.js';

/**
 * Resource URI for the tables.
 */
export const TABLES_RESOURCE_URI = 'daiji://info/tables';

/**
 * Resource definition for MCP resources/list response.
 */
export const tablesResourceDefinition = {
  uri: TABLES_RESOURCE_URI,
  name: 'Daiji Tables',
  description:
    'Digit glyphs, positional units (千百拾) and large units (万億兆...) the server ' +
    'uses for daiji conversion, with the power of ten each large unit represents.',
  mimeType: 'application/json',
};

/**
 * JSON body of the tables resource.
 */
export interface TablesDocument {
  digitGlyphs: readonly string[];
  positionalUnits: readonly string[];
  largeUnits: Array<{ index: number; name: string; power: number }>;
  appendOneBeforeSmallUnits: boolean;
  overflowPolicy: OverflowPolicy;
  maxDigits: number;
}

/**
 * Describe a converter's configuration.
 */
export function describeTables(converter: DaijiConverter): TablesDocument {
  const { largeUnitNames } = converter;
  return {
    digitGlyphs: converter.digitGlyphs.slice(0, DIGIT_GLYPH_COUNT),
    positionalUnits: converter.positionalUnitNames.slice(0, POSITIONAL_UNIT_COUNT),
    largeUnits: largeUnitNames.map((name, index) => ({
      index,
      name,
      power: index * DIGITS_PER_GROUP,
    })),
    appendOneBeforeSmallUnits: converter.appendOneBeforeSmallUnits,
    overflowPolicy: converter.overflowPolicy,
    maxDigits: largeUnitNames.length * DIGITS_PER_GROUP,
  };
}

/**
 * Read the tables resource.
 *
 * @param converter - Converter holding the server's configuration
 * @returns MCP resource contents
 */
export async function readTablesResource(converter: DaijiConverter): Promise<{
  contents: Array<{
    uri: string;
    mimeType: string;
    text: string;
  }>;
}> {
  const document = describeTables(converter);
  logger.debug('Serving tables resource', { largeUnits: document.largeUnits.length });
  return {
    contents: [
      {
        uri: TABLES_RESOURCE_URI,
        mimeType: 'application/json',
        text: JSON.stringify(document, null, 2),
      },
    ],
  };
}

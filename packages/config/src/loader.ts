/**
 * Config Loader
 *
 * Validates formatter settings from code or from the environment:
 *   - STYLECODE_ENCODING
 *   - STYLECODE_LINE_LIMIT
 *   - STYLECODE_TABLE_WIDTH
 *   - STYLECODE_TABLE_COLOR
 *   - STYLECODE_TABLE_ROW_MAX
 *   - STYLECODE_LOG_LEVEL
 */

import { logger } from '@stylecode/logger';
import { FormatConfigError } from './errors.js';
import { FormatConfigSchema } from './types.js';
import type { FormatConfig } from './types.js';

/**
 * Validate settings and fill in defaults.
 *
 * @throws FormatConfigError when any field is invalid
 */
export function resolveFormatConfig(input: unknown = {}): FormatConfig {
  const parsed = FormatConfigSchema.safeParse(input);
  if (!parsed.success) {
    const error = FormatConfigError.fromZod(parsed.error);
    logger.warn('Rejected formatter configuration', { issues: error.issues });
    throw error;
  }
  return parsed.data;
}

/** Unset and blank variables count as absent; anything else must be numeric. */
function numberVar(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return Number(value);
}

function textVar(value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value.trim();
}

/**
 * Read settings from environment variables. Absent variables fall back to
 * the defaults; malformed ones are rejected like any other invalid input.
 */
export function formatConfigFromEnv(env: NodeJS.ProcessEnv = process.env): FormatConfig {
  const input = {
    encoding: textVar(env.STYLECODE_ENCODING),
    lineLimit: numberVar(env.STYLECODE_LINE_LIMIT),
    table: {
      width: numberVar(env.STYLECODE_TABLE_WIDTH),
      color: numberVar(env.STYLECODE_TABLE_COLOR),
      rowMax: numberVar(env.STYLECODE_TABLE_ROW_MAX),
    },
    logLevel: textVar(env.STYLECODE_LOG_LEVEL),
  };

  logger.debug('Formatter configuration read from environment', {
    keys: Object.keys(env).filter((key) => key.startsWith('STYLECODE_')),
  });
  return resolveFormatConfig(input);
}

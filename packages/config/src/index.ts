/**
 * Config Public API
 *
 * Zod-validated formatter settings with defaults and environment loading.
 * Nothing is persisted: configuration lives as long as the formatter using it.
 */

export { resolveFormatConfig, formatConfigFromEnv } from './loader.js';
export { FormatConfigError, isFormatConfigError } from './errors.js';
export type { ConfigIssue, FormatConfigErrorCode } from './errors.js';
export { FormatConfigSchema, CONFIG_DEFAULTS, LOG_LEVEL_NAMES } from './types.js';
export type { FormatConfig, FormatConfigInput } from './types.js';

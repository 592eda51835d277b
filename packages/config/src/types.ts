/**
 * Config Module - Type Definitions
 *
 * Zod schema for formatter settings. Every field has a default, so an empty
 * object resolves to a complete configuration.
 */

import { z } from 'zod';

export const LOG_LEVEL_NAMES = ['debug', 'info', 'warn', 'error', 'silent', 'off'] as const;

/**
 * Full formatter configuration schema.
 */
export const FormatConfigSchema = z.object({
  /** Encoding used to measure transmitted lines */
  encoding: z.enum(['utf8', 'utf-8', 'latin1', 'ascii', 'utf16le']).default('utf8'),

  /** Byte ceiling for one transmitted line */
  lineLimit: z.number().int().positive().default(512),

  /** Bordered grid tables */
  table: z
    .object({
      width: z.number().int().positive().default(100),
      color: z.number().int().min(0).max(99).default(12),
      rowMax: z.number().int().positive().optional(),
    })
    .default({}),

  /** Justified rows */
  justify: z
    .object({
      minSeparator: z.number().int().nonnegative().default(3),
    })
    .default({}),

  /** Column-aligned rows */
  align: z
    .object({
      separator: z.string().default(' \x0308⎪\x03 '),
    })
    .default({}),

  /** Log level applied when a formatter is created */
  logLevel: z.enum(LOG_LEVEL_NAMES).optional(),
});

export type FormatConfig = z.output<typeof FormatConfigSchema>;
export type FormatConfigInput = z.input<typeof FormatConfigSchema>;

export const CONFIG_DEFAULTS: FormatConfig = FormatConfigSchema.parse({});

/**
 * Formatter
 *
 * Binds resolved configuration to the marker codec and the layout engines so
 * transport code gets one object with the right ceilings and defaults:
 *
 *   1. Resolve and validate configuration
 *   2. Measure lines in bytes of the configured encoding
 *   3. Minify, split and cut messages into transmittable lines
 *   4. Lay out tables with the configured widths and colours
 */

import {
  alignTable,
  joinUntil,
  justifiedTable,
  namedTable,
  truncate,
} from '@stylecode/layout';
import { logger, setLogMode } from '@stylecode/logger';
import { resolveFormatConfig } from '@stylecode/config';
import type { FormatConfig } from '@stylecode/config';
import { displayWidth, encodedSize, minify } from '@stylecode/markers';
import type { NamedTableOptions } from '@stylecode/types';

export interface Formatter {
  readonly config: FormatConfig;
  /** Size of text on the wire, in bytes of the configured encoding. */
  measure(text: string): number;
  displayWidth(text: string): number;
  minify(text: string): string;
  /** Longest prefix of parts that fits one line (or `ceiling` bytes). */
  joinUntil(separator: string, parts: Iterable<string>, ceiling?: number): string | null;
  /** Minified lines, each within the line limit. */
  toLines(text: string): string[];
  namedTable(labels: Iterable<string>, options?: NamedTableOptions): string[];
  justifiedTable(items: Iterable<string>, width?: number): string[];
  alignTable(rows: ReadonlyArray<readonly string[]>): string[];
}

/**
 * Minify and strip trailing whitespace until neither changes the line.
 * Dropping a trailing marker run can expose spaces, and trimming spaces can
 * expose another run.
 */
function tidyLine(line: string): string {
  let current = minify(line);
  let trimmed = current.trimEnd();
  while (trimmed !== current) {
    current = minify(trimmed);
    trimmed = current.trimEnd();
  }
  return current;
}

/**
 * Create a formatter.
 *
 * @param input - Configuration overrides; validated against the schema
 * @throws FormatConfigError when the configuration is invalid
 */
export function createFormatter(input: unknown = {}): Formatter {
  const config = resolveFormatConfig(input);
  if (config.logLevel !== undefined) setLogMode(config.logLevel);

  const measure = (text: string): number => encodedSize(text, config.encoding);

  logger.debug('Formatter created', { encoding: config.encoding, lineLimit: config.lineLimit });

  return {
    config,
    measure,
    displayWidth,
    minify,

    joinUntil(separator, parts, ceiling = config.lineLimit) {
      const joined = joinUntil(separator, parts, ceiling, measure);
      if (joined === null) logger.debug('joinUntil: no feasible prefix', { ceiling });
      return joined;
    },

    toLines(text) {
      return text.split('\n').map((line) => {
        const minified = tidyLine(line);
        if (measure(minified) <= config.lineLimit) return minified;

        const cut = tidyLine(truncate(minified, config.lineLimit, measure));
        logger.debug('Line truncated to fit limit', {
          before: measure(minified),
          after: measure(cut),
          limit: config.lineLimit,
        });
        return cut;
      });
    },

    namedTable(labels, options = {}) {
      return namedTable(labels, {
        width: config.table.width,
        color: config.table.color,
        rowMax: config.table.rowMax,
        ...options,
      });
    },

    justifiedTable(items, width = config.table.width) {
      return justifiedTable(items, width, config.justify.minSeparator);
    },

    alignTable(rows) {
      return alignTable(rows, config.align.separator);
    },
  };
}

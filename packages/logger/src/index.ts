import { LogEngine, LogMode } from '@wgtechlabs/log-engine';

// Local time only, with context-aware emoji. Quiet unless something is wrong.
LogEngine.configure({
  mode: LogMode.WARN,
  format: {
    includeIsoTimestamp: false,
    includeLocalTime: true,
    includeEmoji: true,
    emoji: {
      customMappings: [
        {
          emoji: '🎨',
          code: ':art:',
          description: 'Marker operations',
          keywords: ['minify', 'marker', 'color', 'canonical'],
        },
        {
          emoji: '📐',
          code: ':triangular_ruler:',
          description: 'Layout operations',
          keywords: ['table', 'truncate', 'line', 'join', 'width'],
        },
      ],
    },
  },
});

// ---------------------------------------------------------------------------
// Runtime log-mode switching
// ---------------------------------------------------------------------------

/** Human-readable log level names accepted by configuration. */
export const LOG_MODES = {
  debug: LogMode.DEBUG,
  info: LogMode.INFO,
  warn: LogMode.WARN,
  error: LogMode.ERROR,
  silent: LogMode.SILENT,
  off: LogMode.OFF,
} as const;

export type LogModeName = keyof typeof LOG_MODES;

/**
 * Change the active log level at runtime.
 *
 * Accepts either a level name ("debug", "info", …) or a numeric `LogMode`.
 */
export function setLogMode(level: LogModeName | LogMode): void {
  const mode = typeof level === 'string' ? LOG_MODES[level] : level;
  LogEngine.configure({ mode });
}

export const logger = LogEngine;
export { LogMode };

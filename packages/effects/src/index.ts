/**
 * @stylecode/effects — Decorative text helpers
 *
 * Unicode effects that need no control markers, plus small humanizers and
 * an HTML entity decoder used when building command replies.
 */

export { overline, underline, strikethrough } from './combining.js';
export { smallcaps, fullwidth } from './letterforms.js';
export { ordinal, prettyDate } from './humanize.js';
export { nickColor } from './nick-color.js';
export { unescape } from './entities.js';

/**
 * Combining-mark effects
 *
 * These draw with Unicode combining characters rather than control markers,
 * so they survive clients that strip formatting. Each mark is a code point of
 * its own and counts towards display width.
 */

import { renderMarker, tokenize } from '@stylecode/markers';

const COMBINING_OVERLINE = '\u0305';
const COMBINING_LOW_LINE = '\u0332';
const COMBINING_LONG_STROKE = '\u0336';

function interleave(text: string, mark: string): string {
  const chars = Array.from(text);
  return chars.length === 0 ? '' : mark + chars.join(mark);
}

export function overline(text: string): string {
  return interleave(text, COMBINING_OVERLINE);
}

export function underline(text: string): string {
  return interleave(text, COMBINING_LOW_LINE);
}

/**
 * Strike through literal text only; markers pass through untouched.
 */
export function strikethrough(text: string): string {
  return tokenize(text)
    .map((segment) =>
      segment.type === 'text' ? interleave(segment.text, COMBINING_LONG_STROKE) : renderMarker(segment),
    )
    .join('');
}

/**
 * Marker Tokenizer
 *
 * Single left-to-right pass over the reserved byte alphabet. Never fails:
 * anything that does not fit the colour tail grammar is literal text.
 */

import type { Chunk, Marker, Segment } from '@stylecode/types';
import { ControlCode, TOGGLE_CODES, isDigit, toggleForCode } from './codes.js';

/** Read at most two digits starting at `start`. */
function readDigits(text: string, start: number): string {
  let end = start;
  while (end < text.length && end - start < 2 && isDigit(text[end])) end++;
  return text.slice(start, end);
}

/**
 * Split annotated text into literal runs and markers.
 */
export function tokenize(text: string): Segment[] {
  const segments: Segment[] = [];
  let literalStart = 0;
  let cursor = 0;

  const flush = (end: number): void => {
    if (end > literalStart) {
      segments.push({ type: 'text', text: text.slice(literalStart, end) });
    }
  };

  while (cursor < text.length) {
    const char = text[cursor];
    const kind = toggleForCode(char);

    if (kind !== undefined) {
      flush(cursor);
      segments.push({ type: 'toggle', kind });
      cursor++;
      literalStart = cursor;
    } else if (char === ControlCode.RESET) {
      flush(cursor);
      segments.push({ type: 'reset' });
      cursor++;
      literalStart = cursor;
    } else if (char === ControlCode.COLOR) {
      flush(cursor);
      cursor++;
      const fg = readDigits(text, cursor);
      cursor += fg.length;

      let bg = '';
      if (text[cursor] === ',' && isDigit(text[cursor + 1])) {
        bg = readDigits(text, cursor + 1);
        cursor += 1 + bg.length;
      }

      segments.push({ type: 'color', fg: fg || null, bg: bg || null });
      literalStart = cursor;
    } else {
      cursor++;
    }
  }

  flush(text.length);
  return segments;
}

/**
 * Write a marker back out. Digit strings are kept as given, so a tokenized
 * marker renders to exactly the bytes it was read from.
 */
export function renderMarker(marker: Marker): string {
  switch (marker.type) {
    case 'toggle':
      return TOGGLE_CODES[marker.kind];
    case 'reset':
      return ControlCode.RESET;
    case 'color':
      return `${ControlCode.COLOR}${marker.fg ?? ''}${marker.bg !== null ? `,${marker.bg}` : ''}`;
  }
}

export function renderSegments(segments: readonly Segment[]): string {
  return segments.map((segment) => (segment.type === 'text' ? segment.text : renderMarker(segment))).join('');
}

/**
 * Collapse consecutive markers into runs, so literal text and marker runs
 * alternate.
 */
export function groupRuns(segments: readonly Segment[]): Chunk[] {
  const chunks: Chunk[] = [];

  for (const segment of segments) {
    if (segment.type === 'text') {
      chunks.push(segment);
      continue;
    }
    const last = chunks[chunks.length - 1];
    if (last !== undefined && last.type === 'run') {
      last.markers.push(segment);
    } else {
      chunks.push({ type: 'run', markers: [segment] });
    }
  }

  return chunks;
}

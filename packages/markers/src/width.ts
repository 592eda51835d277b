/**
 * Display Width
 *
 * Markers take up bytes but no columns. Width is counted in Unicode code
 * points (not UTF-16 code units) of the text left once markers are removed.
 */

import { Buffer } from 'node:buffer';
import { tokenize } from './tokenizer.js';

const ANY_CONTROL = /[\x02\x03\x0f\x16\x1d\x1f]/;

export function stripMarkers(text: string): string {
  if (!ANY_CONTROL.test(text)) return text;

  let visible = '';
  for (const segment of tokenize(text)) {
    if (segment.type === 'text') visible += segment.text;
  }
  return visible;
}

export function codepointLength(text: string): number {
  let length = 0;
  for (const _char of text) length++;
  return length;
}

export function displayWidth(text: string): number {
  return codepointLength(stripMarkers(text));
}

/**
 * Count the bytes a string takes up on the wire.
 */
export function encodedSize(text: string, encoding: BufferEncoding = 'utf8'): number {
  return Buffer.byteLength(text, encoding);
}

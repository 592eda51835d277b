/**
 * Line splitting and truncation
 *
 * Cuts happen between atoms (one marker, or one code point of literal text)
 * so a colour marker never loses its digits and a surrogate pair is never
 * split.
 */

import type { Measure } from '@stylecode/types';
import { codepointLength, renderMarker, tokenize } from '@stylecode/markers';
import { joinUntil } from './join.js';

function* atoms(text: string): Generator<string> {
  for (const segment of tokenize(text)) {
    if (segment.type === 'text') {
      yield* segment.text;
    } else {
      yield renderMarker(segment);
    }
  }
}

/**
 * Longest prefix of `text` whose measure fits `ceiling`.
 */
export function truncate(text: string, ceiling: number, measure: Measure = codepointLength): string {
  if (measure(text) <= ceiling) return text;
  return joinUntil('', atoms(text), ceiling, measure) ?? '';
}

/**
 * Split text into transmittable lines: trailing whitespace removed and each
 * line cut down to `maxSize`.
 */
export function lineify(text: string, maxSize = 512, measure: Measure = codepointLength): string[] {
  return text.split('\n').map((line) => truncate(line.trimEnd(), maxSize, measure));
}

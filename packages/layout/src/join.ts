import type { Measure } from '@stylecode/types';
import { displayWidth } from '@stylecode/markers';

/**
 * Intercalate `separator` between parts until `ceiling` would be breached.
 *
 * With no ceiling this is a plain join. Returns null when there are no parts
 * or when even the first part alone does not fit. Assumes `measure` never
 * decreases as text is appended.
 */
export function joinUntil(
  separator: string,
  parts: Iterable<string>,
  ceiling?: number,
  measure: Measure = displayWidth,
): string | null {
  let result: string | null = null;

  for (const part of parts) {
    const candidate: string = result === null ? part : result + separator + part;
    if (ceiling !== undefined && measure(candidate) > ceiling) return result;
    result = candidate;
  }

  return result;
}

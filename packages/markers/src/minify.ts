/**
 * Stream Minifier
 *
 * Rewrites a message into the shortest marker encoding that draws the same
 * thing. Each line is independent and starts from a clear state. Within a
 * line, marker runs are first reduced to the net change they make, then
 * written out against all the literal text that follows them.
 */

import type { Chunk, Marker, RenderState } from '@stylecode/types';
import { ControlCode, TOGGLE_CODES, absorbsColorTail, isDigit } from './codes.js';
import { canonicalTransition, paddedDigits, shortDigits } from './canonicalize.js';
import { activeToggles, initialState, replay } from './state.js';
import { groupRuns, tokenize } from './tokenizer.js';

/** Canonical markers and the literal text they lead into. */
interface Frame {
  markers: Marker[];
  after: RenderState;
  text: string;
}

/**
 * Write a colour or style marker so that `following` (the text or marker
 * byte right after it) cannot be read as more digits.
 */
function writeMarker(marker: Marker, following: string): string {
  if (marker.type === 'toggle') return TOGGLE_CODES[marker.kind];
  if (marker.type === 'reset') return ControlCode.RESET;

  const { fg, bg } = marker;
  if (bg !== null) {
    const fgText = fg === null ? '' : shortDigits(fg);
    const bgText = isDigit(following[0]) ? paddedDigits(bg) : shortDigits(bg);
    return `${ControlCode.COLOR}${fgText},${bgText}`;
  }
  if (fg !== null) {
    const fgText = isDigit(following[0]) ? paddedDigits(fg) : shortDigits(fg);
    // No background to write, so a following ",N" needs something in between.
    const spacer = absorbsColorTail(following) && !isDigit(following[0])
      ? ControlCode.BOLD + ControlCode.BOLD
      : '';
    return `${ControlCode.COLOR}${fgText}${spacer}`;
  }
  return ControlCode.COLOR;
}

/**
 * Serialize a canonical run that is followed by `nextText`.
 */
function writeRun(markers: readonly Marker[], nextText: string, after: RenderState): string {
  const last = markers[markers.length - 1];
  if (last === undefined) return '';

  // A bare colour marker would swallow the digits; reset and restore instead.
  if (last.type === 'color' && last.fg === null && last.bg === null && absorbsColorTail(nextText)) {
    return ControlCode.RESET + activeToggles(after).map((kind) => TOGGLE_CODES[kind]).join('');
  }

  return markers
    .map((marker, index) => {
      const next = markers[index + 1];
      return writeMarker(marker, next === undefined ? nextText : writeMarker(next, ''));
    })
    .join('');
}

/**
 * Fold a line's chunks into frames. A run whose net effect is nothing
 * vanishes and the text on both sides of it joins into one frame. Trailing
 * runs are dropped.
 */
function toFrames(chunks: readonly Chunk[]): Frame[] {
  const frames: Frame[] = [];
  let drawn = initialState();
  let pending = drawn;

  for (const chunk of chunks) {
    if (chunk.type === 'run') {
      pending = replay(chunk.markers, pending);
      continue;
    }

    const markers = canonicalTransition(drawn, pending);
    const last = frames[frames.length - 1];
    if (markers.length === 0 && last !== undefined) {
      last.text += chunk.text;
    } else {
      frames.push({ markers, after: pending, text: chunk.text });
    }
    drawn = pending;
  }

  return frames;
}

export function minifyLine(line: string): string {
  return toFrames(groupRuns(tokenize(line)))
    .map((frame) => writeRun(frame.markers, frame.text, frame.after) + frame.text)
    .join('');
}

/**
 * Rearrange and rewrite control markers to shorten a message.
 */
export function minify(text: string): string {
  if (text.includes('\n')) return text.split('\n').map(minifyLine).join('\n');
  return minifyLine(text);
}

/**
 * Render State
 *
 * Markers never nest: the style in effect is the left fold of every marker
 * seen so far over the all-clear state.
 */

import type { Marker, RenderState, StyledSpan, ToggleKind } from '@stylecode/types';
import { TOGGLE_ORDER } from './codes.js';
import { tokenize } from './tokenizer.js';

export function initialState(): RenderState {
  return {
    italics: false,
    bold: false,
    underline: false,
    reverse: false,
    fg: null,
    bg: null,
  };
}

export function applyMarker(state: RenderState, marker: Marker): RenderState {
  switch (marker.type) {
    case 'reset':
      return initialState();
    case 'toggle': {
      const next = { ...state };
      next[marker.kind] = !state[marker.kind];
      return next;
    }
    case 'color':
      if (marker.fg === null && marker.bg === null) {
        return { ...state, fg: null, bg: null };
      }
      return {
        ...state,
        fg: marker.fg ?? state.fg,
        bg: marker.bg ?? state.bg,
      };
  }
}

export function replay(markers: Iterable<Marker>, from: RenderState = initialState()): RenderState {
  let state = from;
  for (const marker of markers) state = applyMarker(state, marker);
  return state;
}

/** Colour slots compare by numeric value: "04" and "4" are one colour. */
export function sameColor(a: string | null, b: string | null): boolean {
  if (a === null || b === null) return a === b;
  return Number(a) === Number(b);
}

export function statesEquivalent(a: RenderState, b: RenderState): boolean {
  return (
    TOGGLE_ORDER.every((kind) => a[kind] === b[kind]) &&
    sameColor(a.fg, b.fg) &&
    sameColor(a.bg, b.bg)
  );
}

export function isClearState(state: RenderState): boolean {
  return statesEquivalent(state, initialState());
}

/** Flags that are on, in canonical order. */
export function activeToggles(state: RenderState): ToggleKind[] {
  return TOGGLE_ORDER.filter((kind) => state[kind]);
}

/**
 * Visible text of one line, cut wherever the style changes hands.
 * Empty spans are never produced.
 */
export function toSpans(line: string): StyledSpan[] {
  const spans: StyledSpan[] = [];
  let state = initialState();

  for (const segment of tokenize(line)) {
    if (segment.type !== 'text') {
      state = applyMarker(state, segment);
      continue;
    }
    const last = spans[spans.length - 1];
    if (last !== undefined && statesEquivalent(last.state, state)) {
      last.text += segment.text;
    } else {
      spans.push({ text: segment.text, state });
    }
  }

  return spans;
}

/**
 * Run Canonicalizer
 *
 * Reduces a run of markers to the shortest marker list that moves the render
 * state from `before` to the same place the run does:
 *
 *   1. Everything before the last reset is dead; the state after a reset is clear.
 *   2. Colour and toggle markers are folded separately.
 *   3. Toggles cancel in pairs; survivors come out italics, bold, underline, reverse.
 *   4. Colours fold left to right; only components that changed are written.
 *   5. Output order is reset, colour, toggles.
 *
 * Both a reset-led and a reset-free encoding are built from the net
 * transition and the shorter one wins, so the result depends only on the
 * states on either side of the run.
 */

import type { ColorMarker, Marker, RenderState } from '@stylecode/types';
import { TOGGLE_ORDER } from './codes.js';
import { activeToggles, initialState, isClearState, replay, sameColor } from './state.js';

type Colors = Pick<RenderState, 'fg' | 'bg'>;

const CLEAR_COLOR: ColorMarker = { type: 'color', fg: null, bg: null };

/** Digits without a leading zero; "00" becomes "0". */
export function shortDigits(digits: string): string {
  return String(Number(digits));
}

/** Always two digits. */
export function paddedDigits(digits: string): string {
  return shortDigits(digits).padStart(2, '0');
}

/**
 * Colour markers that take `from` to `to`. A marker can set either slot but
 * can only clear both at once, so clearing one slot while keeping the other
 * costs a bare marker followed by a set.
 */
export function colorTransition(from: Colors, to: Colors): ColorMarker[] {
  const fgChanged = !sameColor(from.fg, to.fg);
  const bgChanged = !sameColor(from.bg, to.bg);

  if (!fgChanged && !bgChanged) return [];
  if (to.fg === null && to.bg === null) return [CLEAR_COLOR];

  const dropsSlot = (to.fg === null && from.fg !== null) || (to.bg === null && from.bg !== null);
  if (dropsSlot) {
    return [CLEAR_COLOR, { type: 'color', fg: to.fg, bg: to.bg }];
  }

  return [
    {
      type: 'color',
      fg: fgChanged ? to.fg : null,
      bg: bgChanged ? to.bg : null,
    },
  ];
}

/** Bytes a marker list occupies once digits are shortened. */
function encodedCost(markers: readonly Marker[]): number {
  let cost = 0;
  for (const marker of markers) {
    cost += 1;
    if (marker.type !== 'color') continue;
    if (marker.fg !== null) cost += shortDigits(marker.fg).length;
    if (marker.bg !== null) cost += 1 + shortDigits(marker.bg).length;
  }
  return cost;
}

/**
 * Minimal markers for the state change `before` → `after`.
 */
export function canonicalTransition(before: RenderState, after: RenderState): Marker[] {
  const direct: Marker[] = [
    ...colorTransition(before, after),
    ...TOGGLE_ORDER.filter((kind) => before[kind] !== after[kind]).map(
      (kind): Marker => ({ type: 'toggle', kind }),
    ),
  ];

  if (isClearState(before)) return direct;

  const viaReset: Marker[] = [
    { type: 'reset' },
    ...colorTransition(initialState(), after),
    ...activeToggles(after).map((kind): Marker => ({ type: 'toggle', kind })),
  ];

  return encodedCost(viaReset) < encodedCost(direct) ? viaReset : direct;
}

/**
 * Canonical form of one marker run given the state in effect before it.
 */
export function canonicalizeRun(run: readonly Marker[], before: RenderState): Marker[] {
  return canonicalTransition(before, replay(run, before));
}

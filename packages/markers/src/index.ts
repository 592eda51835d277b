/**
 * @stylecode/markers — Control Marker Codec
 *
 * Tokenizer → canonicalizer → re-serializer for IRC-style inline markers:
 *
 *   Grammar:   reserved bytes and the colour digit tail
 *   Width:     display width ignores marker bytes
 *   State:     render state as a fold over markers
 *   Canonical: minimal marker list for one run
 *   Minify:    whole-message rewrite, one frame per line
 *
 * Usage:
 *   import { minify, displayWidth } from '@stylecode/markers';
 *   const line = minify('\x02\x02hello \x0304world');
 */

export {
  ControlCode,
  TOGGLE_ORDER,
  TOGGLE_CODES,
  toggleForCode,
  isDigit,
  absorbsColorTail,
} from './codes.js';
export { tokenize, renderMarker, renderSegments, groupRuns } from './tokenizer.js';
export { stripMarkers, displayWidth, codepointLength, encodedSize } from './width.js';
export {
  initialState,
  applyMarker,
  replay,
  sameColor,
  statesEquivalent,
  isClearState,
  activeToggles,
  toSpans,
} from './state.js';
export {
  canonicalizeRun,
  canonicalTransition,
  colorTransition,
  shortDigits,
  paddedDigits,
} from './canonicalize.js';
export { minify, minifyLine } from './minify.js';

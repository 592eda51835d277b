// Core type definitions for stylecode

// ---------------------------------------------------------------------------
// Markers & Segments
// ---------------------------------------------------------------------------

/** Boolean style flags, each flipped by its own reserved byte. */
export type ToggleKind = 'italics' | 'bold' | 'underline' | 'reverse';

export interface ToggleMarker {
  type: 'toggle';
  kind: ToggleKind;
}

export interface ResetMarker {
  type: 'reset';
}

/**
 * Colour change. Slots hold the digits exactly as written (1-2 digits).
 * Both slots null is the bare colour marker, which clears both colours.
 */
export interface ColorMarker {
  type: 'color';
  fg: string | null;
  bg: string | null;
}

export type Marker = ToggleMarker | ResetMarker | ColorMarker;

export interface TextSegment {
  type: 'text';
  text: string;
}

export type Segment = TextSegment | Marker;

/** A maximal run of markers with no literal text inside it. */
export interface MarkerRun {
  type: 'run';
  markers: Marker[];
}

export type Chunk = TextSegment | MarkerRun;

// ---------------------------------------------------------------------------
// Render State
// ---------------------------------------------------------------------------

export interface RenderState {
  italics: boolean;
  bold: boolean;
  underline: boolean;
  reverse: boolean;
  fg: string | null;
  bg: string | null;
}

/** Visible text together with the style it is drawn in. */
export interface StyledSpan {
  text: string;
  state: RenderState;
}

// ---------------------------------------------------------------------------
// Layout
// ---------------------------------------------------------------------------

/** Size of a string in whatever unit a ceiling is expressed in. */
export type Measure = (text: string) => number;

export interface NamedTableOptions {
  /** Total display width budget. Default: 100 */
  width?: number;
  /** Maximum number of data rows; the widest labels are dropped to fit. */
  rowMax?: number;
  /** Left-aligned header text. */
  header?: string;
  /** Right-aligned header text. */
  rightHeader?: string;
  /** Border colour index (0-99). Default: 12 */
  color?: number;
}

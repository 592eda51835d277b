/**
 * Reserved control bytes
 *
 * Each marker is one reserved byte. Colour is the only marker with a tail:
 * up to two foreground digits, then optionally a comma and one or two
 * background digits.
 */

import type { ToggleKind } from '@stylecode/types';

export const ControlCode = {
  ITALICS: '\x1d',
  BOLD: '\x02',
  UNDERLINE: '\x1f',
  COLOR: '\x03',
  RESET: '\x0f',
  REVERSE: '\x16',
} as const;

/** Canonical emission order for surviving toggles. */
export const TOGGLE_ORDER: readonly ToggleKind[] = ['italics', 'bold', 'underline', 'reverse'];

export const TOGGLE_CODES: Readonly<Record<ToggleKind, string>> = {
  italics: ControlCode.ITALICS,
  bold: ControlCode.BOLD,
  underline: ControlCode.UNDERLINE,
  reverse: ControlCode.REVERSE,
};

const TOGGLE_BY_CODE = new Map<string, ToggleKind>(
  TOGGLE_ORDER.map((kind) => [TOGGLE_CODES[kind], kind]),
);

/** The toggle a byte stands for, if it is one. */
export function toggleForCode(char: string): ToggleKind | undefined {
  return TOGGLE_BY_CODE.get(char);
}

export function isDigit(char: string | undefined): boolean {
  return char !== undefined && char >= '0' && char <= '9';
}

/**
 * Whether `text`, placed right after a colour marker, would be read as part
 * of that marker's digits.
 */
export function absorbsColorTail(text: string): boolean {
  return isDigit(text[0]) || (text[0] === ',' && isDigit(text[1]));
}

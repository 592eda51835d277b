import { ControlCode, displayWidth } from '@stylecode/markers';

export const DEFAULT_ALIGN_SEPARATOR = ` ${ControlCode.COLOR}08⎪${ControlCode.COLOR} `;

/**
 * Column-align rows of unequal length. Each column is as wide as its widest
 * cell; rows without a column simply end early.
 */
export function alignTable(
  rows: ReadonlyArray<readonly string[]>,
  separator: string = DEFAULT_ALIGN_SEPARATOR,
): string[] {
  const widths: number[] = [];
  for (const row of rows) {
    row.forEach((cell, index) => {
      widths[index] = Math.max(widths[index] ?? 0, displayWidth(cell));
    });
  }

  return rows.map((row) =>
    row.map((cell, index) => cell + ' '.repeat(widths[index] - displayWidth(cell))).join(separator),
  );
}

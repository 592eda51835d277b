/**
 * Bordered grid table
 *
 * Lays a flat list of labels out in as many equal-width columns as the width
 * budget allows:
 *
 *   \x0312(first 2 rows)      right header
 *   ⎢label  ⎪ label  ⎪  label⎥
 *   ⎢label  ⎪ label  ⎪  label⎥
 */

import type { NamedTableOptions } from '@stylecode/types';
import { logger } from '@stylecode/logger';
import { ControlCode, absorbsColorTail, displayWidth } from '@stylecode/markers';
import { padEndVisible, padStartVisible, spacepad } from './pad.js';

interface GridShape {
  widest: number;
  columns: number;
  rows: number;
}

/** Border and divider decoration cost per column. */
const CELL_CHROME = 3;

function fitGrid(labels: readonly string[], width: number): GridShape {
  const widest = Math.max(...labels.map(displayWidth));
  const fit = Math.floor((width - 2) / (widest + CELL_CHROME));
  const columns = Math.max(1, Math.min(labels.length, fit));
  return { widest, columns, rows: Math.ceil(labels.length / columns) };
}

function indexOfWidest(labels: readonly string[]): number {
  let best = 0;
  labels.forEach((label, index) => {
    if (displayWidth(label) > displayWidth(labels[best])) best = index;
  });
  return best;
}

/** Two-digit colour code, so following digits are never read as part of it. */
function tint(color: number): string {
  return ControlCode.COLOR + String(color).padStart(2, '0');
}

/** Close a border colour without letting `next` extend the marker. */
function closeBefore(next: string): string {
  return absorbsColorTail(next) ? ControlCode.RESET : ControlCode.COLOR;
}

export function namedTable(labels: Iterable<string>, options: NamedTableOptions = {}): string[] {
  const { width = 100, rowMax, header = '', rightHeader = '', color = 12 } = options;
  const cells = Array.from(labels);
  if (cells.length === 0) return [];

  let shape = fitGrid(cells, width);
  let note = '';

  if (rowMax !== undefined && rowMax > 0 && shape.rows > rowMax) {
    const total = cells.length;
    while (shape.rows > rowMax) {
      cells.splice(indexOfWidest(cells), 1);
      shape = fitGrid(cells, width);
    }
    note = `(first ${shape.rows} rows) `;
    logger.debug('Table truncated to row limit', { rowMax, dropped: total - cells.length });
  }

  const headWidth = displayWidth(header) + displayWidth(note) + displayWidth(rightHeader);
  const { columns, rows } = shape;

  let cellWidth = shape.widest;
  let rowWidth = columns * (cellWidth + CELL_CHROME) - 1;
  // Header wider than the grid: grow the cells instead of clipping it.
  if (headWidth > rowWidth) {
    cellWidth = Math.ceil((headWidth + 1) / columns) - CELL_CHROME;
    rowWidth = columns * (cellWidth + CELL_CHROME) - 1;
  }

  // The two-digit tint cannot take more digits, but a leading ",N" would
  // still read as a background.
  const headRight = spacepad(note, rightHeader, rowWidth - displayWidth(header));
  const spacer =
    headRight.startsWith(',') && absorbsColorTail(headRight) ? ControlCode.BOLD + ControlCode.BOLD : '';
  const lines = [`${header}${tint(color)}${spacer}${headRight}`];
  const divider = ` ${tint(color)}⎪${ControlCode.COLOR} `;
  const borderRight = `${tint(color)}⎥${ControlCode.COLOR}`;

  for (let row = 0; row < rows; row++) {
    const padded = cells
      .slice(row * columns, (row + 1) * columns)
      .map((cell, index) =>
        index + 1 === columns ? padStartVisible(cell, cellWidth) : padEndVisible(cell, cellWidth),
      );
    const body = padded.join(divider);
    lines.push(`${tint(color)}⎢${closeBefore(body)}${body}${borderRight}`);
  }

  return lines;
}

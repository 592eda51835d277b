import { displayWidth } from '@stylecode/markers';

/**
 * Pack items greedily into rows of at most `width` columns, then spread each
 * row's leftover space across its gaps. Leftmost gaps take the remainder.
 */
export function justifiedTable(items: Iterable<string>, width: number, minSeparator = 3): string[] {
  const rows: string[][] = [];
  let current: string[] = [];
  let used = 0;

  for (const item of items) {
    const itemWidth = displayWidth(item);
    if (current.length === 0 || used + minSeparator + itemWidth <= width) {
      used += (current.length === 0 ? 0 : minSeparator) + itemWidth;
      current.push(item);
    } else {
      rows.push(current);
      current = [item];
      used = itemWidth;
    }
  }
  if (current.length > 0) rows.push(current);

  return rows.map((row) => {
    if (row.length === 1) return row[0];

    const textWidth = row.reduce((sum, item) => sum + displayWidth(item), 0);
    const gaps = row.length - 1;
    const spare = Math.max(0, width - textWidth);
    const gapWidth = Math.floor(spare / gaps);
    const remainder = spare % gaps;

    return row.reduce((line, item, index) => {
      if (index === 0) return item;
      const gap = gapWidth + (index - 1 < remainder ? 1 : 0);
      return line + ' '.repeat(gap) + item;
    }, '');
  });
}

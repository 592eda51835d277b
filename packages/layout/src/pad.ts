import { displayWidth } from '@stylecode/markers';

/**
 * Glue `left` and `right` together with enough spaces between them to reach
 * `length` columns.
 */
export function spacepad(left: string, right: string, length: number): string {
  const used = displayWidth(left) + displayWidth(right);
  return left + ' '.repeat(Math.max(0, length - used)) + right;
}

export function padEndVisible(text: string, width: number): string {
  return text + ' '.repeat(Math.max(0, width - displayWidth(text)));
}

export function padStartVisible(text: string, width: number): string {
  return ' '.repeat(Math.max(0, width - displayWidth(text))) + text;
}

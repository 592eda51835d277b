/**
 * @stylecode/formatter — configured entry point for transport code
 *
 * Usage:
 *   import { createFormatter } from '@stylecode/formatter';
 *   const formatter = createFormatter({ lineLimit: 400 });
 *   for (const line of formatter.toLines(reply)) send(line);
 */

export { createFormatter } from './formatter.js';
export type { Formatter } from './formatter.js';

/**
 * @stylecode/layout — Width-Constrained Layout
 *
 * Everything here measures in display width, so markers inside cells never
 * throw columns out of line:
 *
 *   - joinUntil:      longest joinable prefix under a ceiling
 *   - lineify:        transport-safe lines, cut between markers
 *   - namedTable:     bordered grid of labels
 *   - justifiedTable: greedily packed, evenly spaced rows
 *   - alignTable:     column-aligned rows
 */

export { joinUntil } from './join.js';
export { spacepad, padEndVisible, padStartVisible } from './pad.js';
export { truncate, lineify } from './lines.js';
export { namedTable } from './named-table.js';
export { justifiedTable } from './justified-table.js';
export { alignTable, DEFAULT_ALIGN_SEPARATOR } from './align-table.js';

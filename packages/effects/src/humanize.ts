const ORDINAL_SUFFIXES: Readonly<Record<number, string>> = { 1: 'st', 2: 'nd', 3: 'rd' };

/**
 * Ordinal form of an integer (1 => 1st, 12 => 12th, 22 => 22nd).
 */
export function ordinal(value: number): string {
  const magnitude = Math.abs(Math.trunc(value));
  const teen = Math.floor((magnitude % 100) / 10) === 1;
  const suffix = (!teen && ORDINAL_SUFFIXES[magnitude % 10]) || 'th';
  return `${Math.trunc(value)}${suffix}`;
}

const MINUTE = 60;
const HOUR = 60 * MINUTE;
const DAY = 24 * HOUR;

/**
 * Describe an elapsed time in seconds ("just now", "3 hours ago",
 * "Yesterday", "2 weeks ago"). Negative spans read as "just now".
 */
export function prettyDate(deltaSeconds: number): string {
  const days = Math.floor(deltaSeconds / DAY);
  const seconds = Math.floor(deltaSeconds - days * DAY);

  if (days < 0) return 'just now';

  if (days === 0) {
    if (seconds < 10) return 'just now';
    if (seconds < MINUTE) return `${seconds} seconds ago`;
    if (seconds < 2 * MINUTE) return 'a minute ago';
    if (seconds < HOUR) return `${Math.floor(seconds / MINUTE)} minutes ago`;
    if (seconds < 2 * HOUR) return 'an hour ago';
    return `${Math.floor(seconds / HOUR)} hours ago`;
  }
  if (days === 1) return 'Yesterday';
  if (days < 7) return `${days} days ago`;
  if (days < 31) return `${Math.floor(days / 7)} weeks ago`;
  if (days < 365) return `${Math.floor(days / 30)} months ago`;
  return `${Math.floor(days / 365)} years ago`;
}

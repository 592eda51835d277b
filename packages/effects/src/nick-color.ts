// Extended palette entries, shifted down into the 0-15 range on use.
const NICK_PALETTE = [19, 20, 22, 24, 25, 26, 27, 28, 29] as const;

/**
 * Stable colour index for a nickname, so the same nick is always drawn in
 * the same colour.
 */
export function nickColor(nick: string): number {
  let sum = 0;
  for (const char of nick) sum += char.codePointAt(0) ?? 0;
  return NICK_PALETTE[sum % NICK_PALETTE.length] - 16;
}

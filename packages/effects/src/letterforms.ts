const SMALL_CAPS: Readonly<Record<string, string>> = {
  a: 'ᴀ', b: 'ʙ', c: 'ᴄ', d: 'ᴅ', e: 'ᴇ', f: 'ꜰ', g: 'ɢ', h: 'ʜ', i: 'ɪ',
  j: 'ᴊ', k: 'ᴋ', l: 'ʟ', m: 'ᴍ', n: 'ɴ', o: 'ᴏ', p: 'ᴘ', q: 'ǫ', r: 'ʀ',
  s: 'ꜱ', t: 'ᴛ', u: 'ᴜ', v: 'ᴠ', w: 'ᴡ', x: 'x', y: 'ʏ', z: 'ᴢ',
};

// Printable ASCII '!'..'~' maps one-to-one onto U+FF01..U+FF5E.
const FULLWIDTH_FIRST = 0x21;
const FULLWIDTH_LAST = 0x7e;
const FULLWIDTH_OFFSET = 0xfee0;

/** Lowercase letters as small capitals; everything else unchanged. */
export function smallcaps(text: string): string {
  return Array.from(text, (char) => SMALL_CAPS[char] ?? char).join('');
}

/** Printable ASCII as full-width forms. Spaces stay narrow. */
export function fullwidth(text: string): string {
  return Array.from(text, (char) => {
    const code = char.codePointAt(0) ?? 0;
    return code >= FULLWIDTH_FIRST && code <= FULLWIDTH_LAST
      ? String.fromCodePoint(code + FULLWIDTH_OFFSET)
      : char;
  }).join('');
}

import { describe, expect, it } from 'vitest';
import { overline, strikethrough, underline } from '../src/combining.js';
import { fullwidth, smallcaps } from '../src/letterforms.js';
import { ordinal, prettyDate } from '../src/humanize.js';
import { nickColor } from '../src/nick-color.js';
import { unescape } from '../src/entities.js';

describe('combining marks', () => {
  it('overlines each character', () => {
    expect(overline('ab')).toBe('\u0305a\u0305b');
  });

  it('underlines each character', () => {
    expect(underline('hi')).toBe('\u0332h\u0332i');
  });

  it('returns empty text unchanged', () => {
    expect(overline('')).toBe('');
  });

  it('strikes through literal text but not markers', () => {
    expect(strikethrough('\x02ab\x02c')).toBe('\x02\u0336a\u0336b\x02\u0336c');
    expect(strikethrough('\x0304x')).toBe('\x0304\u0336x');
  });
});

describe('letterforms', () => {
  it('maps lowercase letters to small capitals', () => {
    expect(smallcaps('Hi there')).toBe('Hɪ ᴛʜᴇʀᴇ');
  });

  it('maps printable ASCII to full width and leaves spaces', () => {
    expect(fullwidth('Az 1!')).toBe('Ａｚ １！');
  });

  it('leaves non-ASCII text alone', () => {
    expect(fullwidth('é')).toBe('é');
  });
});

describe('ordinal', () => {
  it.each([
    [1, '1st'],
    [2, '2nd'],
    [3, '3rd'],
    [4, '4th'],
    [11, '11th'],
    [12, '12th'],
    [13, '13th'],
    [21, '21st'],
    [22, '22nd'],
    [101, '101st'],
    [111, '111th'],
    [112, '112th'],
    [0, '0th'],
  ])('%i → %s', (value, expected) => {
    expect(ordinal(value)).toBe(expected);
  });
});

describe('prettyDate', () => {
  it.each([
    [-5, 'just now'],
    [5, 'just now'],
    [30, '30 seconds ago'],
    [90, 'a minute ago'],
    [600, '10 minutes ago'],
    [4000, 'an hour ago'],
    [7300, '2 hours ago'],
    [86400, 'Yesterday'],
    [3 * 86400, '3 days ago'],
    [15 * 86400, '2 weeks ago'],
    [60 * 86400, '2 months ago'],
    [800 * 86400, '2 years ago'],
  ])('%i seconds → %s', (seconds, expected) => {
    expect(prettyDate(seconds)).toBe(expected);
  });
});

describe('nickColor', () => {
  it('picks from the palette by code point sum', () => {
    // 'a' + 'b' = 195; 195 % 9 = 6; palette[6] = 27; 27 - 16 = 11
    expect(nickColor('ab')).toBe(11);
    expect(nickColor('')).toBe(3);
  });

  it('is stable for the same nick', () => {
    expect(nickColor('someone')).toBe(nickColor('someone'));
  });
});

describe('unescape', () => {
  it('decodes decimal and hex character references', () => {
    expect(unescape('it&#39;s')).toBe("it's");
    expect(unescape('it&#x27;s')).toBe("it's");
    expect(unescape('&#128512;')).toBe('\u{1F600}');
  });

  it('decodes named entities', () => {
    expect(unescape('Tom &amp; Jerry &lt;3')).toBe('Tom & Jerry <3');
    expect(unescape('caf&eacute;&hellip;')).toBe('caf\u00e9\u2026');
  });

  it('decodes &apos; to an apostrophe', () => {
    expect(unescape('don&apos;t')).toBe("don't");
  });

  it('leaves unknown and malformed entities as written', () => {
    expect(unescape('&bogus; &#xZZ; &#X27; & done;')).toBe('&bogus; &#xZZ; &#X27; & done;');
    expect(unescape('&#1114112;')).toBe('&#1114112;');
  });

  it('returns plain text unchanged', () => {
    expect(unescape('no entities here')).toBe('no entities here');
  });
});

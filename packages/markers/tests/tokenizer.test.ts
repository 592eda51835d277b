import { describe, expect, it } from 'vitest';
import { groupRuns, renderMarker, renderSegments, tokenize } from '../src/tokenizer.js';

describe('tokenize', () => {
  it('returns an empty list for empty input', () => {
    expect(tokenize('')).toEqual([]);
  });

  it('keeps plain text as a single segment', () => {
    expect(tokenize('plain words')).toEqual([{ type: 'text', text: 'plain words' }]);
  });

  it('recognises every toggle byte and reset', () => {
    expect(tokenize('\x02\x1d\x1f\x16x\x0f')).toEqual([
      { type: 'toggle', kind: 'bold' },
      { type: 'toggle', kind: 'italics' },
      { type: 'toggle', kind: 'underline' },
      { type: 'toggle', kind: 'reverse' },
      { type: 'text', text: 'x' },
      { type: 'reset' },
    ]);
  });

  it('reads foreground and background digits', () => {
    expect(tokenize('\x0304,12x')).toEqual([
      { type: 'color', fg: '04', bg: '12' },
      { type: 'text', text: 'x' },
    ]);
  });

  it('reads a background-only colour', () => {
    expect(tokenize('\x03,5a')).toEqual([
      { type: 'color', fg: null, bg: '5' },
      { type: 'text', text: 'a' },
    ]);
  });

  it('leaves a comma without digits as literal text', () => {
    expect(tokenize('\x03,a')).toEqual([
      { type: 'color', fg: null, bg: null },
      { type: 'text', text: ',a' },
    ]);
  });

  it('stops reading digits after two', () => {
    expect(tokenize('\x03123')).toEqual([
      { type: 'color', fg: '12', bg: null },
      { type: 'text', text: '3' },
    ]);
    expect(tokenize('\x034,123')).toEqual([
      { type: 'color', fg: '4', bg: '12' },
      { type: 'text', text: '3' },
    ]);
  });

  it('treats a trailing comma as literal text', () => {
    expect(tokenize('\x0305,')).toEqual([
      { type: 'color', fg: '05', bg: null },
      { type: 'text', text: ',' },
    ]);
  });
});

describe('renderMarker', () => {
  it('writes colour digits as stored', () => {
    expect(renderMarker({ type: 'color', fg: '04', bg: null })).toBe('\x0304');
    expect(renderMarker({ type: 'color', fg: null, bg: '7' })).toBe('\x03,7');
    expect(renderMarker({ type: 'color', fg: null, bg: null })).toBe('\x03');
  });

  it('round-trips tokenized text byte for byte', () => {
    for (const text of ['\x0304,12hi\x02 there', '\x03,x', '\x031234', 'a\x0fb\x16c']) {
      expect(renderSegments(tokenize(text))).toBe(text);
    }
  });
});

describe('groupRuns', () => {
  it('alternates text chunks and marker runs', () => {
    expect(groupRuns(tokenize('\x02\x1fa\x03'))).toEqual([
      {
        type: 'run',
        markers: [
          { type: 'toggle', kind: 'bold' },
          { type: 'toggle', kind: 'underline' },
        ],
      },
      { type: 'text', text: 'a' },
      { type: 'run', markers: [{ type: 'color', fg: null, bg: null }] },
    ]);
  });
});

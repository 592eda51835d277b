import { describe, expect, it } from 'vitest';
import { encodedSize } from '@stylecode/markers';
import { lineify, truncate } from '../src/lines.js';
import { padEndVisible, padStartVisible, spacepad } from '../src/pad.js';

describe('spacepad', () => {
  it('fills the gap between left and right', () => {
    expect(spacepad('ab', 'cd', 8)).toBe('ab    cd');
  });

  it('measures without markers', () => {
    expect(spacepad('\x02ab\x02', 'c', 5)).toBe('\x02ab\x02  c');
  });

  it('adds nothing when the parts are already too wide', () => {
    expect(spacepad('abc', 'def', 4)).toBe('abcdef');
  });
});

describe('padEndVisible / padStartVisible', () => {
  it('pads to a display width', () => {
    expect(padEndVisible('\x0304a', 3)).toBe('\x0304a  ');
    expect(padStartVisible('\x0304a', 3)).toBe('  \x0304a');
  });
});

describe('truncate', () => {
  it('returns short text unchanged', () => {
    expect(truncate('hello', 10)).toBe('hello');
  });

  it('never splits a colour marker', () => {
    // The marker counts as three code points and goes in whole or not at all.
    expect(truncate('ab\x0304cd', 4)).toBe('ab');
    expect(truncate('ab\x0304cd', 5)).toBe('ab\x0304');
  });

  it('never splits a surrogate pair', () => {
    expect(truncate('😀😀', 3, (text) => text.length)).toBe('😀');
  });

  it('cuts by bytes with an encoded measure', () => {
    expect(truncate('aéé', 4, (text) => encodedSize(text))).toBe('aé');
  });
});

describe('lineify', () => {
  it('splits lines and strips trailing whitespace', () => {
    expect(lineify('one  \ntwo\t\n')).toEqual(['one', 'two', '']);
  });

  it('cuts each line to the size limit', () => {
    expect(lineify('abcdef\nxy', 4)).toEqual(['abcd', 'xy']);
  });
});

import { describe, expect, it } from 'vitest';
import { replacePair } from '../merge.js';

describe('replacePair', () => {
  it('replaces consecutive occurrences', () => {
    expect(replacePair([101, 32, 101, 32, 101, 32, 101], [101, 32], 256)).toEqual([
      256, 256, 256, 101,
    ]);
  });

  it('pairs runs of one symbol from the left without overlap', () => {
    expect(replacePair([1, 1, 1], [1, 1], 256)).toEqual([256, 1]);
    expect(replacePair([1, 1, 1, 1], [1, 1], 256)).toEqual([256, 256]);
    expect(replacePair([1, 1, 1, 1, 1], [1, 1], 256)).toEqual([256, 256, 1]);
  });

  it('resumes scanning after the consumed right symbol', () => {
    expect(replacePair([256, 1, 1], [256, 1], 257)).toEqual([257, 1]);
  });

  it('leaves streams without the pair untouched', () => {
    expect(replacePair([1, 2, 3], [3, 1], 256)).toEqual([1, 2, 3]);
  });

  it('handles empty and single-symbol streams', () => {
    expect(replacePair([], [1, 1], 256)).toEqual([]);
    expect(replacePair([7], [7, 7], 256)).toEqual([7]);
  });

  it('returns a new array', () => {
    const stream = [1, 1];
    const out = replacePair(stream, [1, 1], 256);
    expect(out).toEqual([256]);
    expect(stream).toEqual([1, 1]);
  });
});

import { describe, expect, it } from 'vitest';
import {
  comparePairs,
  countPairs,
  mostFrequentPair,
  pairKey,
  topPair,
  unpackPairKey,
} from '../pairs.js';

describe('countPairs', () => {
  it('counts overlapping pairs at every position', () => {
    const counts = countPairs([1, 1, 1, 2]);
    expect(counts.size).toBe(2);
    expect(counts.get(pairKey(1, 1))).toEqual({ pair: [1, 1], count: 2 });
    expect(counts.get(pairKey(1, 2))).toEqual({ pair: [1, 2], count: 1 });
  });

  it('returns an empty count for streams shorter than two symbols', () => {
    expect(countPairs([]).size).toBe(0);
    expect(countPairs([42]).size).toBe(0);
  });

  it('keys pairs by value, not by position', () => {
    const counts = countPairs([7, 8, 9, 7, 8]);
    expect(counts.get(pairKey(7, 8))?.count).toBe(2);
    expect(counts.get(pairKey(8, 7))).toBeUndefined();
  });

  it('does not modify its input', () => {
    const stream = [3, 3, 3];
    countPairs(stream);
    expect(stream).toEqual([3, 3, 3]);
  });
});

describe('pair keys', () => {
  it('unpacks what it packed, including learned ids', () => {
    expect(unpackPairKey(pairKey(300, 7))).toEqual([300, 7]);
    expect(unpackPairKey(pairKey(0, 0))).toEqual([0, 0]);
    expect(unpackPairKey(pairKey(255, 65_535))).toEqual([255, 65_535]);
  });

  it('distinguishes (a, b) from (b, a)', () => {
    expect(pairKey(1, 2)).not.toBe(pairKey(2, 1));
  });
});

describe('topPair / mostFrequentPair', () => {
  it('picks the highest count', () => {
    expect(topPair(countPairs([9, 9, 9, 1, 2]))).toEqual({ pair: [9, 9], count: 2 });
  });

  it('breaks ties by the smaller left id, then the smaller right id', () => {
    // (5,6) x2 and (1,2) x2
    expect(mostFrequentPair([5, 6, 5, 6, 1, 2, 1, 2])).toEqual([1, 2]);
    // (1,9) x2 and (1,3) x2
    expect(mostFrequentPair([1, 9, 1, 9, 1, 3, 1, 3])).toEqual([1, 3]);
  });

  it('returns undefined when no pair repeats', () => {
    expect(topPair(countPairs([3, 4, 1, 2]))).toEqual({ pair: [1, 2], count: 1 });
    expect(mostFrequentPair([3, 4, 1, 2])).toBeUndefined();
  });

  it('returns undefined for short streams', () => {
    expect(topPair(countPairs([]))).toBeUndefined();
    expect(mostFrequentPair([1])).toBeUndefined();
  });

  it('orders pairs numerically', () => {
    expect(comparePairs([1, 2], [1, 3])).toBeLessThan(0);
    expect(comparePairs([2, 0], [1, 300])).toBeGreaterThan(0);
    expect(comparePairs([4, 4], [4, 4])).toBe(0);
  });
});

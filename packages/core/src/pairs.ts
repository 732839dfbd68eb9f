// ============================================================================
// @bytepair/core: Pair Counter
// ============================================================================
//
// Counts adjacent symbol pairs. Pairs are keyed by a packed number
// (left * PAIR_KEY_BASE + right) so map lookups compare by value, and every
// entry keeps its tuple for callers that need the ids back.
// ============================================================================

import type { Pair, PairCount, SymbolId } from './types.js';

/**
 * Packing base for pair keys. Ids stay well below 2^26, so
 * left * 2^26 + right is exact within Number.MAX_SAFE_INTEGER.
 */
const PAIR_KEY_BASE = 2 ** 26;

/** Largest symbol id a pair key can hold. */
export const MAX_SYMBOL_ID = PAIR_KEY_BASE - 1;

/** Value key for a pair. */
export type PairKey = number;

/** Pair → occurrence count, keyed by value. */
export type FrequencyCount = Map<PairKey, PairCount>;

export function pairKey(left: number, right: number): PairKey {
  return left * PAIR_KEY_BASE + right;
}

export function unpackPairKey(key: PairKey): Pair {
  const right = key % PAIR_KEY_BASE;
  return [(key - right) / PAIR_KEY_BASE, right];
}

/**
 * Count every adjacent pair in the stream. Overlapping pairs count at each
 * position, so a run of k identical symbols contributes k − 1.
 */
export function countPairs(stream: readonly SymbolId[]): FrequencyCount {
  const counts: FrequencyCount = new Map();
  for (let i = 0; i + 1 < stream.length; i++) {
    const left = stream[i];
    const right = stream[i + 1];
    const key = pairKey(left, right);
    const existing = counts.get(key);
    counts.set(key, {
      pair: existing?.pair ?? [left, right],
      count: (existing?.count ?? 0) + 1,
    });
  }
  return counts;
}

/**
 * Total order used to break frequency ties: smaller left id first, then
 * smaller right id.
 */
export function comparePairs(a: Pair, b: Pair): number {
  return a[0] - b[0] || a[1] - b[1];
}

/**
 * The entry with the highest count; ties go to the smallest pair under
 * {@link comparePairs}. Undefined for an empty count.
 */
export function topPair(counts: FrequencyCount): PairCount | undefined {
  let best: PairCount | undefined;
  for (const entry of counts.values()) {
    if (
      best === undefined ||
      entry.count > best.count ||
      (entry.count === best.count && comparePairs(entry.pair, best.pair) < 0)
    ) {
      best = entry;
    }
  }
  return best;
}

/**
 * Most frequent adjacent pair in the stream, or undefined when the stream
 * is shorter than two symbols or no pair occurs more than once.
 */
export function mostFrequentPair(stream: readonly SymbolId[]): Pair | undefined {
  const top = topPair(countPairs(stream));
  if (!top || top.count < 2) return undefined;
  return top.pair;
}

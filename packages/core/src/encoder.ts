// ============================================================================
// @bytepair/core: Encoder
// ============================================================================
//
// Applies learned merges to new input in training order. Each round scans
// the whole stream for the adjacent pair with the lowest rank, anywhere in
// the stream, and rewrites all of its non-overlapping occurrences. Every
// rewrite shortens the stream, so the loop ends once no adjacent pair is in
// the table.
// ============================================================================

import { toSymbols } from './bytes.js';
import { replacePair } from './merge.js';
import type { MergeTable } from './merge_table.js';
import { pairKey } from './pairs.js';
import type { Pair, SymbolId, SymbolStream } from './types.js';

interface Candidate {
  pair: Pair;
  id: SymbolId;
  rank: number;
}

/**
 * The learned pair with the lowest rank present anywhere in the stream.
 */
function lowestRankedPair(stream: readonly SymbolId[], table: MergeTable): Candidate | undefined {
  let best: Candidate | undefined;
  for (let i = 0; i + 1 < stream.length; i++) {
    const hit = table.lookup(pairKey(stream[i], stream[i + 1]));
    if (hit && (best === undefined || hit.rank < best.rank)) {
      best = { pair: [stream[i], stream[i + 1]], id: hit.id, rank: hit.rank };
      if (hit.rank === 0) break;
    }
  }
  return best;
}

/**
 * Merge an already-tokenized stream until no learned pair remains adjacent.
 * Passing a fully merged stream returns an equal copy.
 */
export function applyMerges(stream: readonly SymbolId[], table: MergeTable): SymbolStream {
  let tokens: SymbolStream = [...stream];
  if (table.size === 0) return tokens;

  for (;;) {
    const next = lowestRankedPair(tokens, table);
    if (!next) return tokens;
    tokens = replacePair(tokens, next.pair, next.id);
  }
}

/**
 * Encode text or raw bytes into token ids.
 *
 * Bytes that no merge covers pass through as their literal id (0–255).
 *
 * @example
 * ```ts
 * const table = learnMerges('aaabdaaabac', { vocabSize: 259 });
 * encode('aaabdaaabac', table); // [258, 100, 258, 97, 99]
 * ```
 */
export function encode(input: string | Uint8Array, table: MergeTable): SymbolStream {
  return applyMerges(toSymbols(input), table);
}

import type { Pair, SymbolId, SymbolStream } from './types.js';

/**
 * Replace every non-overlapping occurrence of `pair` with `id`, scanning left
 * to right. A match at i consumes i and i + 1 and scanning resumes at i + 2,
 * so `[a, a, a]` with `(a, a)` becomes `[id, a]`.
 *
 * Always returns a new array; the input is not modified.
 */
export function replacePair(stream: readonly SymbolId[], pair: Pair, id: SymbolId): SymbolStream {
  const [left, right] = pair;
  const out: SymbolStream = [];

  let i = 0;
  while (i < stream.length) {
    if (i + 1 < stream.length && stream[i] === left && stream[i + 1] === right) {
      out.push(id);
      i += 2;
    } else {
      out.push(stream[i]);
      i += 1;
    }
  }
  return out;
}

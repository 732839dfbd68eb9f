// ============================================================================
// @bytepair/core: Merge Table
// ============================================================================
//
// Ordered (pair → id) entries with an index for O(1) pair lookup. Insertion
// order is priority: rank 0 was learned first and is applied first by the
// encoder. A table is validated once on construction and never mutated.
// ============================================================================

import { MalformedMergeTableError } from './errors.js';
import { MAX_SYMBOL_ID, type PairKey, pairKey } from './pairs.js';
import { BYTE_VOCAB_SIZE, type MergeEntry, type Pair, type SymbolId } from './types.js';

interface IndexedEntry {
  entry: MergeEntry;
  rank: number;
}

/**
 * Immutable, priority-ordered merge table.
 *
 * @example
 * ```ts
 * const table = new MergeTable([
 *   { pair: [97, 97], id: 256 },
 *   { pair: [256, 98], id: 257 },
 * ]);
 * table.rank([256, 98]); // 1
 * table.vocabSize;       // 258
 * ```
 */
export class MergeTable implements Iterable<MergeEntry> {
  private readonly list: readonly MergeEntry[];
  private readonly index = new Map<PairKey, IndexedEntry>();

  /**
   * @throws {MalformedMergeTableError} When a pair repeats, an id does not
   *   increase, or a pair references an id no earlier entry assigned
   */
  constructor(entries: Iterable<MergeEntry> = []) {
    const list: MergeEntry[] = [];
    const known = new Set<SymbolId>();
    let lastId = BYTE_VOCAB_SIZE - 1;

    for (const raw of entries) {
      const rank = list.length;
      const [left, right] = raw.pair;
      const { id } = raw;

      if (!Number.isInteger(id) || id <= lastId || id > MAX_SYMBOL_ID) {
        throw new MalformedMergeTableError(
          rank,
          `id ${id} must be an integer greater than ${lastId}`,
          raw.pair,
        );
      }
      for (const ref of [left, right]) {
        if (!Number.isInteger(ref) || ref < 0 || (ref >= BYTE_VOCAB_SIZE && !known.has(ref))) {
          throw new MalformedMergeTableError(
            rank,
            `pair (${left}, ${right}) references unknown id ${ref}`,
            raw.pair,
          );
        }
      }

      const key = pairKey(left, right);
      if (this.index.has(key)) {
        throw new MalformedMergeTableError(rank, `pair (${left}, ${right}) appears twice`, raw.pair);
      }

      const entry: MergeEntry = { pair: [left, right], id };
      list.push(entry);
      this.index.set(key, { entry, rank });
      known.add(id);
      lastId = id;
    }

    this.list = Object.freeze(list);
  }

  /** Number of learned merges. */
  get size(): number {
    return this.list.length;
  }

  /** Highest assigned id, or 255 for an empty table. */
  get maxId(): SymbolId {
    return this.list.length === 0 ? BYTE_VOCAB_SIZE - 1 : this.list[this.list.length - 1].id;
  }

  /** Number of vocabulary entries: the byte ids plus one per merge. */
  get vocabSize(): number {
    return BYTE_VOCAB_SIZE + this.list.length;
  }

  /** Entries in priority order. */
  entries(): readonly MergeEntry[] {
    return this.list;
  }

  [Symbol.iterator](): Iterator<MergeEntry> {
    return this.list[Symbol.iterator]();
  }

  has(pair: Pair): boolean {
    return this.index.has(pairKey(pair[0], pair[1]));
  }

  /** Id assigned to the pair, if it was learned. */
  get(pair: Pair): SymbolId | undefined {
    return this.index.get(pairKey(pair[0], pair[1]))?.entry.id;
  }

  /** Priority of the pair (0 = learned first), if it was learned. */
  rank(pair: Pair): number | undefined {
    return this.index.get(pairKey(pair[0], pair[1]))?.rank;
  }

  /** Lookup by packed key, used by the encoder's hot loop. */
  lookup(key: PairKey): { id: SymbolId; rank: number } | undefined {
    const hit = this.index.get(key);
    return hit ? { id: hit.entry.id, rank: hit.rank } : undefined;
  }

  /** Entries as `[left, right, id]` triples. */
  toTriples(): Array<[SymbolId, SymbolId, SymbolId]> {
    return this.list.map(({ pair, id }) => [pair[0], pair[1], id]);
  }

  static fromTriples(triples: Iterable<readonly [SymbolId, SymbolId, SymbolId]>): MergeTable {
    const entries: MergeEntry[] = [];
    for (const [left, right, id] of triples) {
      entries.push({ pair: [left, right], id });
    }
    return new MergeTable(entries);
  }
}

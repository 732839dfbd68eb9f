import { concatBytes } from './bytes.js';
import { MalformedMergeTableError } from './errors.js';
import type { MergeTable } from './merge_table.js';
import { BYTE_VOCAB_SIZE, type SymbolId, type Vocabulary } from './types.js';

/**
 * Expand a merge table into id → bytes.
 *
 * Built bottom-up in priority order: every entry only needs the bytes of two
 * ids that are already resolved, so the whole build is linear.
 *
 * @throws {MalformedMergeTableError} If an entry references an id that is
 *   neither a byte nor defined by an earlier entry
 */
export function buildVocabulary(table: Pick<MergeTable, 'entries'>): Vocabulary {
  const vocab = new Map<SymbolId, Uint8Array>();
  for (let b = 0; b < BYTE_VOCAB_SIZE; b++) {
    vocab.set(b, Uint8Array.of(b));
  }

  table.entries().forEach(({ pair, id }, index) => {
    const left = vocab.get(pair[0]);
    const right = vocab.get(pair[1]);
    if (!left || !right) {
      const missing = left ? pair[1] : pair[0];
      throw new MalformedMergeTableError(index, `id ${missing} is not in the vocabulary yet`, pair);
    }
    vocab.set(id, concatBytes([left, right]));
  });

  return vocab;
}

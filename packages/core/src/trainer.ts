// ============================================================================
// @bytepair/core: Merge Learner
// ============================================================================
//
// Greedy BPE training. Each step counts adjacent pairs, takes the most
// frequent one (ties → smallest (left, right)), assigns it the next id and
// rewrites the working stream. Training stops early, without error, once no
// pair occurs more than once.
// ============================================================================

import { toSymbols } from './bytes.js';
import { BpeValidationError } from './errors.js';
import { logMerge, logTraining, timer } from './logger.js';
import { replacePair } from './merge.js';
import { MergeTable } from './merge_table.js';
import { MAX_SYMBOL_ID, countPairs, topPair } from './pairs.js';
import {
  BYTE_VOCAB_SIZE,
  type MergeEntry,
  type TrainOptions,
  type TrainTarget,
} from './types.js';

/**
 * Number of merges a target asks for.
 *
 * @throws {BpeValidationError} For negative or fractional counts and
 *   vocabulary sizes below 256
 */
export function resolveMergeCount(target: TrainTarget): number {
  let merges: number;
  if (typeof target === 'number') {
    merges = target;
  } else if ('vocabSize' in target) {
    if (!Number.isInteger(target.vocabSize) || target.vocabSize < BYTE_VOCAB_SIZE) {
      throw new BpeValidationError(
        `vocabSize must be an integer >= ${BYTE_VOCAB_SIZE}, got ${target.vocabSize}`,
        { field: 'vocabSize', reason: 'out_of_range', value: target.vocabSize },
      );
    }
    merges = target.vocabSize - BYTE_VOCAB_SIZE;
  } else {
    merges = target.merges;
  }

  if (!Number.isInteger(merges) || merges < 0 || merges > MAX_SYMBOL_ID - BYTE_VOCAB_SIZE) {
    throw new BpeValidationError(`merge count must be a non-negative integer, got ${merges}`, {
      field: 'merges',
      reason: 'out_of_range',
      value: merges,
    });
  }
  return merges;
}

/**
 * Learn a merge table from raw training input.
 *
 * @param input - Training text (UTF-8 encoded) or raw bytes
 * @param target - Merge count, or `{ vocabSize }` for 256 + merges
 * @returns A table with at most the requested number of merges
 *
 * @example
 * ```ts
 * const table = learnMerges('aaabdaaabac', { vocabSize: 259 });
 * table.toTriples(); // [[97, 97, 256], [97, 98, 257], [256, 257, 258]]
 * ```
 */
export function learnMerges(
  input: string | Uint8Array,
  target: TrainTarget,
  options: TrainOptions = {},
): MergeTable {
  const requested = resolveMergeCount(target);
  if (requested === 0) return new MergeTable();

  const t = timer('learnMerges');
  let stream = toSymbols(input);
  const inputBytes = stream.length;
  const entries: MergeEntry[] = [];

  for (let i = 0; i < requested; i++) {
    const top = topPair(countPairs(stream));
    if (!top || top.count <= 1) break;

    const id = BYTE_VOCAB_SIZE + i;
    stream = replacePair(stream, top.pair, id);
    entries.push({ pair: top.pair, id });

    logMerge(top.pair, id, top.count);
    options.onMerge?.({ pair: top.pair, id, count: top.count, streamLength: stream.length });
  }

  logTraining(t, requested, entries.length, inputBytes);
  return new MergeTable(entries);
}

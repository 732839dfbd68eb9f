// ============================================================================
// @bytepair/core: Type Definitions & Constants
// ============================================================================
//
// Shared types for the learner, vocabulary builder, encoder and decoder.
// A symbol id below BYTE_VOCAB_SIZE is a literal byte; anything at or above
// it names a learned merge.
// ============================================================================

/** A single symbol (token) id. */
export type SymbolId = number;

/** An ordered sequence of symbol ids for one piece of text. */
export type SymbolStream = SymbolId[];

/** Two adjacent symbols, left then right. */
export type Pair = readonly [left: SymbolId, right: SymbolId];

/** One learned merge: the pair it combines and the id it was assigned. */
export interface MergeEntry {
  readonly pair: Pair;
  readonly id: SymbolId;
}

/** Pair frequency as produced by the pair counter. */
export interface PairCount {
  readonly pair: Pair;
  readonly count: number;
}

/** Maps every symbol id in use to its fully expanded bytes. */
export type Vocabulary = ReadonlyMap<SymbolId, Uint8Array>;

/**
 * How much to learn. A bare number or `{ merges }` is a merge count;
 * `{ vocabSize }` is the final vocabulary size including the 256 byte ids.
 */
export type TrainTarget = number | { merges: number } | { vocabSize: number };

/** Reported once per learned merge during training. */
export interface MergeEvent {
  pair: Pair;
  id: SymbolId;
  /** Occurrences of the pair before the rewrite */
  count: number;
  /** Stream length after the rewrite */
  streamLength: number;
}

export interface TrainOptions {
  onMerge?: (event: MergeEvent) => void;
}

/** Number of literal byte ids; the first learned id. */
export const BYTE_VOCAB_SIZE = 256;

/** Reference tokenizer encodings available through js-tiktoken. */
export type ReferenceEncoding = 'cl100k_base' | 'o200k_base' | 'p50k_base' | 'r50k_base';

export const REFERENCE_ENCODINGS: readonly ReferenceEncoding[] = [
  'cl100k_base',
  'o200k_base',
  'p50k_base',
  'r50k_base',
];

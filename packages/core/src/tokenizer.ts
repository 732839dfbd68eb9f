// ============================================================================
// @bytepair/core: Tokenizer
// ============================================================================
//
// Bundles a merge table with its vocabulary so callers train or load once
// and then encode/decode freely. String encodes go through a bounded LRU
// cache; byte input is always encoded directly.
// ============================================================================

import { escapeBytes, toBytes } from './bytes.js';
import { loadConfig } from './config.js';
import { decode, decodeText } from './decoder.js';
import { encode } from './encoder.js';
import { type CacheStats, LRUCache } from './lru_cache.js';
import { MergeTable } from './merge_table.js';
import { parseMergeTable, serializeMergeTable } from './serialize.js';
import { learnMerges } from './trainer.js';
import type {
  SymbolId,
  SymbolStream,
  TrainOptions,
  TrainTarget,
  Vocabulary,
} from './types.js';
import { buildVocabulary } from './vocabulary.js';

export interface TokenizerOptions {
  /** Encode cache entries; 0 disables caching. Defaults to BPE_CACHE_SIZE. */
  maxCacheSize?: number;
}

/**
 * A trained byte-pair tokenizer.
 *
 * @example
 * ```ts
 * const tok = BpeTokenizer.train(corpus, { vocabSize: 512 });
 * const ids = tok.encode('hello world');
 * tok.decodeText(ids);                 // 'hello world'
 * writeFileSync('model.json', tok.serialize());
 * ```
 */
export class BpeTokenizer {
  readonly mergeTable: MergeTable;
  readonly vocabulary: Vocabulary;
  private cache: LRUCache<string, readonly SymbolId[]>;

  constructor(table: MergeTable, options?: TokenizerOptions) {
    this.mergeTable = table;
    this.vocabulary = buildVocabulary(table);
    this.cache = new LRUCache(options?.maxCacheSize ?? loadConfig().maxCacheSize);
  }

  static train(
    input: string | Uint8Array,
    target: TrainTarget,
    options?: TrainOptions & TokenizerOptions,
  ): BpeTokenizer {
    return new BpeTokenizer(learnMerges(input, target, options), options);
  }

  static fromJSON(json: string, options?: TokenizerOptions): BpeTokenizer {
    return new BpeTokenizer(parseMergeTable(json), options);
  }

  /** Number of vocabulary entries (256 + merges). */
  get vocabSize(): number {
    return this.vocabulary.size;
  }

  /** Encode text (cached) or raw bytes into token ids. */
  encode(input: string | Uint8Array): SymbolStream {
    if (typeof input !== 'string') return encode(input, this.mergeTable);

    const cached = this.cache.get(input);
    if (cached) return [...cached];
    const ids = encode(input, this.mergeTable);
    this.cache.set(input, ids);
    return [...ids];
  }

  decode(ids: readonly SymbolId[]): Uint8Array {
    return decode(ids, this.vocabulary);
  }

  decodeText(ids: readonly SymbolId[]): string {
    return decodeText(ids, this.vocabulary);
  }

  countTokens(input: string | Uint8Array): number {
    return this.encode(input).length;
  }

  /**
   * Input bytes per output token. 1 means no compression; empty input is 1.
   */
  compressionRatio(input: string | Uint8Array): number {
    const byteLength = toBytes(input).length;
    if (byteLength === 0) return 1;
    return byteLength / this.countTokens(input);
  }

  /** Copy of the bytes a single id expands to, if it is in the vocabulary. */
  tokenBytes(id: SymbolId): Uint8Array | undefined {
    const bytes = this.vocabulary.get(id);
    return bytes && Uint8Array.from(bytes);
  }

  /** Display form of a token, e.g. `"th"` or `"\xe2\x80"`. */
  describeToken(id: SymbolId): string {
    const bytes = this.vocabulary.get(id);
    return bytes ? `"${escapeBytes(bytes)}"` : '<unknown>';
  }

  serialize(): string {
    return serializeMergeTable(this.mergeTable);
  }

  get stats(): CacheStats {
    return this.cache.getStats();
  }

  /** Drop cached encodings. */
  dispose(): void {
    this.cache.clear();
  }
}

// ============================================================================
// @bytepair/core: Public API
// ============================================================================

// Core algorithm
export { toBytes, toSymbols, concatBytes, escapeBytes } from './bytes.js';
export {
  countPairs,
  comparePairs,
  mostFrequentPair,
  topPair,
  pairKey,
  unpackPairKey,
  MAX_SYMBOL_ID,
} from './pairs.js';
export type { FrequencyCount, PairKey } from './pairs.js';
export { replacePair } from './merge.js';
export { MergeTable } from './merge_table.js';
export { learnMerges, resolveMergeCount } from './trainer.js';
export { buildVocabulary } from './vocabulary.js';
export { encode, applyMerges } from './encoder.js';
export { decode, decodeText } from './decoder.js';

// High-level API
export { BpeTokenizer } from './tokenizer.js';
export type { TokenizerOptions } from './tokenizer.js';
export { LRUCache } from './lru_cache.js';
export type { CacheStats } from './lru_cache.js';

// Persistence
export {
  serializeMergeTable,
  parseMergeTable,
  fromDocument,
  toDocument,
  mergeTableHash,
  mergeTableDocumentSchema,
  mergeTripleSchema,
  MERGE_TABLE_FORMAT,
  MERGE_TABLE_VERSION,
} from './serialize.js';
export type { MergeTableDocument } from './serialize.js';

// Reference tokenizers
export { ReferenceTokenizer, isReferenceEncoding, resolveReferenceEncoding } from './reference.js';

// Errors
export {
  BpeError,
  BpeValidationError,
  MalformedMergeTableError,
  MergeTableParseError,
  UnknownTokenError,
  ModelNotFoundError,
} from './errors.js';

// Logging & config
export {
  debug,
  info,
  warn,
  error,
  onLog,
  timer,
  Timer,
  setLogLevel,
  getLogLevel,
  parseLogLevel,
} from './logger.js';
export type { LogLevel, LogEntry, LogCallback } from './logger.js';
export { loadConfig, DEFAULT_CONFIG } from './config.js';
export type { BpeConfig } from './config.js';

// Types
export type {
  SymbolId,
  SymbolStream,
  Pair,
  PairCount,
  MergeEntry,
  MergeEvent,
  Vocabulary,
  TrainTarget,
  TrainOptions,
  ReferenceEncoding,
} from './types.js';
export { BYTE_VOCAB_SIZE, REFERENCE_ENCODINGS } from './types.js';

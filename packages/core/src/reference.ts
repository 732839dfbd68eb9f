// ============================================================================
// @bytepair/core: Reference Tokenizers
// ============================================================================
//
// Production BPE vocabularies (via js-tiktoken) to put next to a learned
// merge table when reporting token counts:
//   - cl100k_base  (GPT-4, GPT-3.5-Turbo)
//   - o200k_base   (GPT-4o, GPT-4o-mini)
//   - p50k_base    (GPT-3, Codex)
//   - r50k_base    (GPT-3 earliest)
//
// Encoders are created lazily, one per encoding, and reused.
// ============================================================================

import { type Tiktoken, getEncoding } from 'js-tiktoken';
import { BpeValidationError } from './errors.js';
import { REFERENCE_ENCODINGS, type ReferenceEncoding, type SymbolStream } from './types.js';

export function isReferenceEncoding(value: string): value is ReferenceEncoding {
  return REFERENCE_ENCODINGS.some((encoding) => encoding === value);
}

/**
 * Validate a user-supplied encoding name.
 *
 * @throws {BpeValidationError} If the name is not a supported encoding
 */
export function resolveReferenceEncoding(value: string): ReferenceEncoding {
  if (!isReferenceEncoding(value)) {
    throw new BpeValidationError(
      `Unknown reference encoding "${value}". Available: ${REFERENCE_ENCODINGS.join(', ')}`,
      { field: 'encoding', reason: 'unknown', value },
    );
  }
  return value;
}

/**
 * @example
 * ```ts
 * const ref = new ReferenceTokenizer('o200k_base');
 * ref.countTokens('Hello world');                 // o200k_base
 * ref.countTokens('Hello world', 'cl100k_base');  // cl100k_base
 * ref.dispose();
 * ```
 */
export class ReferenceTokenizer {
  private encoders = new Map<ReferenceEncoding, Tiktoken>();
  private defaultEncoding: ReferenceEncoding;

  constructor(defaultEncoding: ReferenceEncoding = 'cl100k_base') {
    this.defaultEncoding = defaultEncoding;
  }

  private getEncoder(encoding?: ReferenceEncoding): Tiktoken {
    const enc = encoding ?? this.defaultEncoding;
    let encoder = this.encoders.get(enc);
    if (!encoder) {
      encoder = getEncoding(enc);
      this.encoders.set(enc, encoder);
    }
    return encoder;
  }

  tokenize(text: string, encoding?: ReferenceEncoding): SymbolStream {
    return Array.from(this.getEncoder(encoding).encode(text));
  }

  detokenize(tokens: SymbolStream, encoding?: ReferenceEncoding): string {
    return this.getEncoder(encoding).decode(tokens);
  }

  countTokens(text: string, encoding?: ReferenceEncoding): number {
    return this.tokenize(text, encoding).length;
  }

  dispose(): void {
    this.encoders.clear();
  }
}

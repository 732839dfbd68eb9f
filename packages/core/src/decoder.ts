import { concatBytes } from './bytes.js';
import { UnknownTokenError } from './errors.js';
import type { SymbolId, Vocabulary } from './types.js';

const utf8 = new TextDecoder('utf-8', { fatal: false });

/**
 * Expand token ids back into the raw bytes they stand for.
 *
 * @throws {UnknownTokenError} If an id is not in the vocabulary
 */
export function decode(ids: readonly SymbolId[], vocabulary: Vocabulary): Uint8Array {
  const parts: Uint8Array[] = [];
  ids.forEach((id, position) => {
    const bytes = vocabulary.get(id);
    if (!bytes) {
      throw new UnknownTokenError(id, position);
    }
    parts.push(bytes);
  });
  return concatBytes(parts);
}

/**
 * Decode to a UTF-8 string. Byte sequences that are not valid UTF-8 (a
 * stream cut mid-character, say) become U+FFFD.
 */
export function decodeText(ids: readonly SymbolId[], vocabulary: Vocabulary): string {
  return utf8.decode(decode(ids, vocabulary));
}

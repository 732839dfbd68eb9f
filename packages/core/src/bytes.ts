import type { SymbolStream } from './types.js';

const utf8 = new TextEncoder();

/**
 * Raw bytes of the input. Strings are UTF-8 encoded.
 */
export function toBytes(input: string | Uint8Array): Uint8Array {
  return typeof input === 'string' ? utf8.encode(input) : input;
}

/**
 * The initial symbol stream for the input: one id (0–255) per byte.
 *
 * @example
 * ```ts
 * toSymbols('hello'); // [104, 101, 108, 108, 111]
 * ```
 */
export function toSymbols(input: string | Uint8Array): SymbolStream {
  return Array.from(toBytes(input));
}

/**
 * Concatenate byte arrays into one.
 */
export function concatBytes(parts: readonly Uint8Array[]): Uint8Array {
  let total = 0;
  for (const part of parts) total += part.length;

  const out = new Uint8Array(total);
  let offset = 0;
  for (const part of parts) {
    out.set(part, offset);
    offset += part.length;
  }
  return out;
}

/**
 * Render bytes for display: printable ASCII as is, backslash and quote
 * escaped, everything else as `\xNN`.
 *
 * @example
 * ```ts
 * escapeBytes(Uint8Array.of(104, 105, 10)); // 'hi\\x0a'
 * ```
 */
export function escapeBytes(bytes: Uint8Array): string {
  let out = '';
  for (const b of bytes) {
    if (b === 0x5c) out += '\\\\';
    else if (b === 0x22) out += '\\"';
    else if (b >= 0x20 && b < 0x7f) out += String.fromCharCode(b);
    else out += `\\x${b.toString(16).padStart(2, '0')}`;
  }
  return out;
}

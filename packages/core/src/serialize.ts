// ============================================================================
// @bytepair/core: Merge Table Persistence
// ============================================================================
//
// JSON document layout (version 1):
//
//   {
//     "format": "bytepair-merges",
//     "version": 1,
//     "merges": [[left, right, id], ...]     // priority order
//   }
//
// The merges array keeps insertion order, which is what the encoder ranks by.
// Shape is checked with zod; table invariants are checked by MergeTable.
// ============================================================================

import { createHash } from 'node:crypto';
import { z } from 'zod';
import { MergeTableParseError } from './errors.js';
import { MergeTable } from './merge_table.js';

export const MERGE_TABLE_FORMAT = 'bytepair-merges';
export const MERGE_TABLE_VERSION = 1;

const symbolId = z.number().int().nonnegative();

export const mergeTripleSchema = z.tuple([symbolId, symbolId, symbolId]);

export const mergeTableDocumentSchema = z.object({
  format: z.literal(MERGE_TABLE_FORMAT),
  version: z.literal(MERGE_TABLE_VERSION),
  merges: z.array(mergeTripleSchema),
});

export type MergeTableDocument = z.infer<typeof mergeTableDocumentSchema>;

export function toDocument(table: MergeTable): MergeTableDocument {
  return {
    format: MERGE_TABLE_FORMAT,
    version: MERGE_TABLE_VERSION,
    merges: table.toTriples(),
  };
}

/**
 * Serialize a merge table to JSON, one merge per line.
 */
export function serializeMergeTable(table: MergeTable): string {
  const lines = table.toTriples().map((t) => `    [${t.join(', ')}]`);
  const merges = lines.length > 0 ? `[\n${lines.join(',\n')}\n  ]` : '[]';
  return `{\n  "format": "${MERGE_TABLE_FORMAT}",\n  "version": ${MERGE_TABLE_VERSION},\n  "merges": ${merges}\n}\n`;
}

/**
 * Build a table from an already-parsed document.
 *
 * @throws {MergeTableParseError} If the value does not have the document shape
 * @throws {MalformedMergeTableError} If the merges break table invariants
 */
export function fromDocument(value: unknown): MergeTable {
  const parsed = mergeTableDocumentSchema.safeParse(value);
  if (!parsed.success) {
    throw new MergeTableParseError(
      'Invalid merge table document',
      parsed.error.issues.map((issue) => `${issue.path.join('.') || '$'}: ${issue.message}`),
    );
  }
  return MergeTable.fromTriples(parsed.data.merges);
}

/**
 * Parse a merge table from its JSON serialization.
 */
export function parseMergeTable(json: string): MergeTable {
  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (err: unknown) {
    throw new MergeTableParseError(
      `Merge table is not valid JSON: ${err instanceof Error ? err.message : String(err)}`,
    );
  }
  return fromDocument(value);
}

/**
 * SHA-256 of the serialized table. Equal tables hash equally.
 */
export function mergeTableHash(table: MergeTable): string {
  return createHash('sha256').update(serializeMergeTable(table)).digest('hex');
}

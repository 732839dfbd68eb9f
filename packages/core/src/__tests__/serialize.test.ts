import { describe, expect, it } from 'vitest';
import { MalformedMergeTableError, MergeTableParseError } from '../errors.js';
import { MergeTable } from '../merge_table.js';
import {
  fromDocument,
  mergeTableHash,
  parseMergeTable,
  serializeMergeTable,
  toDocument,
} from '../serialize.js';
import { learnMerges } from '../trainer.js';

const table = learnMerges('aaabdaaabac', { vocabSize: 259 });

describe('serializeMergeTable', () => {
  it('writes one merge per line in priority order', () => {
    expect(serializeMergeTable(table)).toBe(
      [
        '{',
        '  "format": "bytepair-merges",',
        '  "version": 1,',
        '  "merges": [',
        '    [97, 97, 256],',
        '    [97, 98, 257],',
        '    [256, 257, 258]',
        '  ]',
        '}',
        '',
      ].join('\n'),
    );
  });

  it('writes an empty table', () => {
    expect(serializeMergeTable(new MergeTable())).toBe(
      '{\n  "format": "bytepair-merges",\n  "version": 1,\n  "merges": []\n}\n',
    );
  });

  it('produces valid JSON equal to the document form', () => {
    expect(JSON.parse(serializeMergeTable(table))).toEqual(toDocument(table));
  });
});

describe('parseMergeTable', () => {
  it('reads back what was written', () => {
    expect(parseMergeTable(serializeMergeTable(table)).toTriples()).toEqual(table.toTriples());
  });

  it('keeps the document order as priority', () => {
    const parsed = parseMergeTable(
      JSON.stringify({
        format: 'bytepair-merges',
        version: 1,
        merges: [
          [98, 99, 256],
          [97, 98, 257],
        ],
      }),
    );
    expect(parsed.rank([98, 99])).toBe(0);
    expect(parsed.rank([97, 98])).toBe(1);
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseMergeTable('{ merges')).toThrow(MergeTableParseError);
  });

  it('rejects the wrong shape', () => {
    expect(() => fromDocument({ format: 'bytepair-merges', version: 2, merges: [] })).toThrow(
      MergeTableParseError,
    );
    expect(() =>
      fromDocument({ format: 'bytepair-merges', version: 1, merges: [[97, 97]] }),
    ).toThrow(MergeTableParseError);
    expect(() => fromDocument({ format: 'bytepair-merges', version: 1, merges: [[97, -1, 256]] })).toThrow(
      MergeTableParseError,
    );
    expect(() => fromDocument(null)).toThrow(MergeTableParseError);
  });

  it('lists the failing path', () => {
    try {
      fromDocument({ format: 'other', version: 1, merges: [] });
      expect.unreachable();
    } catch (err) {
      if (!(err instanceof MergeTableParseError)) throw err;
      expect(err.issues).toHaveLength(1);
      expect(err.issues[0].startsWith('format: ')).toBe(true);
    }
  });

  it('rejects well-formed documents that break table invariants', () => {
    const doc = {
      format: 'bytepair-merges',
      version: 1,
      merges: [
        [97, 97, 256],
        [97, 97, 257],
      ],
    };
    expect(() => fromDocument(doc)).toThrow(MalformedMergeTableError);
  });
});

describe('mergeTableHash', () => {
  it('is stable for equal tables and differs otherwise', () => {
    const same = MergeTable.fromTriples(table.toTriples());
    expect(mergeTableHash(same)).toBe(mergeTableHash(table));
    expect(mergeTableHash(table)).toMatch(/^[0-9a-f]{64}$/);
    expect(mergeTableHash(new MergeTable())).not.toBe(mergeTableHash(table));
  });
});

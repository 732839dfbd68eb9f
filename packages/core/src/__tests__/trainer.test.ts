import { describe, expect, it } from 'vitest';
import { BpeValidationError } from '../errors.js';
import { learnMerges, resolveMergeCount } from '../trainer.js';
import type { MergeEvent } from '../types.js';

describe('learnMerges', () => {
  it('learns the repeated pair from [a, a, a, b]', () => {
    const table = learnMerges(Uint8Array.of(97, 97, 97, 98), 1);
    expect(table.toTriples()).toEqual([[97, 97, 256]]);
  });

  it('learns "aaabdaaabac" in frequency order with the documented tie-break', () => {
    // step 1: (a,a) x4
    // step 2: (a,b) x2 ties (256,a) x2 → smaller left id wins
    // step 3: (256,257) x2
    const table = learnMerges('aaabdaaabac', { vocabSize: 259 });
    expect(table.toTriples()).toEqual([
      [97, 97, 256],
      [97, 98, 257],
      [256, 257, 258],
    ]);
    expect(table.vocabSize).toBe(259);
  });

  it('stops early once no pair repeats', () => {
    const table = learnMerges('aaabdaaabac', { vocabSize: 276 });
    expect(table.size).toBe(3);
  });

  it('returns an empty table for empty input', () => {
    expect(learnMerges('', 5).size).toBe(0);
    expect(learnMerges(new Uint8Array(0), { merges: 5 }).size).toBe(0);
  });

  it('returns an empty table when zero merges are requested', () => {
    expect(learnMerges('aaaa', 0).size).toBe(0);
    expect(learnMerges('aaaa', { merges: 0 }).size).toBe(0);
    expect(learnMerges('aaaa', { vocabSize: 256 }).size).toBe(0);
  });

  it('merges a run pairwise and does not learn a pair seen once', () => {
    // "aaaa" → [256, 256]; (256, 256) occurs once
    const table = learnMerges('aaaa', 2);
    expect(table.toTriples()).toEqual([[97, 97, 256]]);
  });

  it('assigns strictly increasing ids from 256', () => {
    const table = learnMerges('the cat sat on the mat with the hat', 8);
    const ids = table.entries().map((e) => e.id);
    expect(ids).toEqual(ids.map((_, i) => 256 + i));
  });

  it('is deterministic', () => {
    const corpus = 'abab cdcd abab cdcd efef';
    expect(learnMerges(corpus, 6).toTriples()).toEqual(learnMerges(corpus, 6).toTriples());
  });

  it('reports every merge to onMerge', () => {
    const events: MergeEvent[] = [];
    learnMerges('aaabdaaabac', 3, { onMerge: (e) => events.push(e) });
    expect(events).toEqual([
      { pair: [97, 97], id: 256, count: 4, streamLength: 9 },
      { pair: [97, 98], id: 257, count: 2, streamLength: 7 },
      { pair: [256, 257], id: 258, count: 2, streamLength: 5 },
    ]);
  });

  it('does not modify byte input', () => {
    const bytes = Uint8Array.of(1, 1, 1, 1);
    learnMerges(bytes, 2);
    expect(Array.from(bytes)).toEqual([1, 1, 1, 1]);
  });
});

describe('resolveMergeCount', () => {
  it('accepts counts and vocabulary sizes', () => {
    expect(resolveMergeCount(3)).toBe(3);
    expect(resolveMergeCount({ merges: 7 })).toBe(7);
    expect(resolveMergeCount({ vocabSize: 276 })).toBe(20);
  });

  it('rejects vocabulary sizes below 256', () => {
    expect(() => resolveMergeCount({ vocabSize: 255 })).toThrow(BpeValidationError);
  });

  it('rejects negative and fractional counts', () => {
    expect(() => resolveMergeCount(-1)).toThrow(BpeValidationError);
    expect(() => resolveMergeCount({ merges: 1.5 })).toThrow(BpeValidationError);
    expect(() => learnMerges('abab', Number.NaN)).toThrow(BpeValidationError);
  });

  it('names the offending field', () => {
    try {
      resolveMergeCount({ vocabSize: 10 });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(BpeValidationError);
      if (err instanceof BpeValidationError) {
        expect(err.field).toBe('vocabSize');
        expect(err.value).toBe(10);
      }
    }
  });
});

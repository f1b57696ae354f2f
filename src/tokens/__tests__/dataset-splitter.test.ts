import { describe, it, expect } from 'vitest';
import { DatasetSplitter } from '../dataset-splitter.js';
import { ApproximateCounter, TiktokenCounter } from '../token-counter.js';
import { TokenLimitError } from '../../library/errors.js';

// ApproximateCounter: 4 characters per token
const rowOf = (tokens: number, id: number) => ({ id, text: 'x'.repeat(tokens * 4) });

describe('DatasetSplitter', () => {
  const splitter = new DatasetSplitter(new ApproximateCounter());

  describe('split', () => {
    it('closes a batch when the next row would exceed the budget', () => {
      const rows = Array.from({ length: 10 }, (_, i) => rowOf(1000, i));

      const batches = splitter.split(rows, ['text'], 3500);

      expect(batches.map((b) => b.rows.length)).toEqual([3, 3, 3, 1]);
      expect(batches.map((b) => b.tokenCount)).toEqual([3000, 3000, 3000, 1000]);
      expect(batches.map((b) => [b.index, b.start, b.end])).toEqual([
        [0, 0, 3],
        [1, 3, 6],
        [2, 6, 9],
        [3, 9, 10],
      ]);
    });

    it('keeps every row exactly once and in order', () => {
      const rows = Array.from({ length: 7 }, (_, i) => rowOf(300 + i * 100, i));

      const batches = splitter.split(rows, ['text'], 1000);

      expect(batches.flatMap((b) => b.rows.map((r) => r.id))).toEqual([0, 1, 2, 3, 4, 5, 6]);
      for (const batch of batches) {
        expect(batch.tokenCount).toBeLessThanOrEqual(1000);
      }
    });

    it('gives a row that alone exceeds the budget its own batch', () => {
      const rows = [rowOf(100, 0), rowOf(5000, 1), rowOf(100, 2)];

      const batches = splitter.split(rows, ['text'], 1000);

      expect(batches.map((b) => b.rows.map((r) => r.id))).toEqual([[0], [1], [2]]);
      expect(batches[1].tokenCount).toBe(5000);
    });

    it('counts only the requested columns', () => {
      const rows = [
        { text: 'x'.repeat(400), ignored: 'y'.repeat(40000) },
        { text: 'x'.repeat(400), ignored: 'y'.repeat(40000) },
      ];

      const batches = splitter.split(rows, ['text'], 1000);

      expect(batches).toHaveLength(1);
      expect(batches[0].tokenCount).toBe(200);
    });

    it('splits rows that contain special-token markup', () => {
      const rows = [{ output: 'see <|endoftext|> here' }, { output: 'plain text' }];

      const batches = new DatasetSplitter(new TiktokenCounter()).split(rows, ['output'], 1000);

      expect(batches).toHaveLength(1);
      expect(batches[0].rows).toEqual(rows);
    });

    it('returns no batches for no rows', () => {
      expect(splitter.split([], ['text'], 1000)).toEqual([]);
    });

    it('rejects a budget that is not a positive integer', () => {
      expect(() => splitter.split([rowOf(1, 0)], ['text'], 0)).toThrow(TokenLimitError);
      expect(() => splitter.split([rowOf(1, 0)], ['text'], 1.5)).toThrow(
        'maxTokens must be a positive integer, got 1.5'
      );
    });
  });

  describe('estimateBatchCount', () => {
    it('divides the total estimate by the budget, rounding up', () => {
      const rows = Array.from({ length: 10 }, (_, i) => rowOf(1000, i));
      expect(splitter.estimateBatchCount(rows, ['text'], 3500)).toBe(3);
    });

    it('is at least one for rows and zero for none', () => {
      expect(splitter.estimateBatchCount([{ text: '' }], ['text'], 1000)).toBe(1);
      expect(splitter.estimateBatchCount([], ['text'], 1000)).toBe(0);
    });

    it('rejects a non-positive budget', () => {
      expect(() => splitter.estimateBatchCount([], ['text'], -1)).toThrow(TokenLimitError);
    });
  });
});

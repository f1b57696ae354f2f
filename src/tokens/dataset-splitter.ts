import type { DatasetRow } from '../types.js';
import { TokenLimitError } from '../library/errors.js';
import type { TokenCounter } from './token-counter.js';

/**
 * A contiguous slice of the dataset. `end` is exclusive.
 */
export interface Batch {
  index: number;
  start: number;
  end: number;
  rows: DatasetRow[];
  tokenCount: number;
}

function assertBudget(maxTokens: number): void {
  if (!Number.isInteger(maxTokens) || maxTokens <= 0) {
    throw new TokenLimitError(
      `maxTokens must be a positive integer, got ${maxTokens}`
    );
  }
}

/**
 * Split rows into contiguous batches whose token totals fit the budget.
 */
export class DatasetSplitter {
  constructor(private readonly tokenCounter: TokenCounter) {}

  /**
   * Greedy single pass. A batch is closed when the next row would push it
   * over `maxTokens`; a row that alone exceeds the budget becomes its own
   * batch. Every row lands in exactly one batch, in order.
   */
  split(
    rows: readonly DatasetRow[],
    columns: readonly string[],
    maxTokens: number
  ): Batch[] {
    assertBudget(maxTokens);
    if (rows.length === 0) return [];

    const rowTokens = this.tokenCounter.countRows(rows, columns);

    const boundaries: Array<{ start: number; end: number; tokens: number }> = [];
    let batchStart = 0;
    let batchTokens = 0;

    rowTokens.forEach((tokens, idx) => {
      if (batchTokens + tokens > maxTokens && idx > batchStart) {
        boundaries.push({ start: batchStart, end: idx, tokens: batchTokens });
        batchStart = idx;
        batchTokens = tokens;
      } else {
        batchTokens += tokens;
      }
    });
    boundaries.push({ start: batchStart, end: rows.length, tokens: batchTokens });

    return boundaries.map(({ start, end, tokens }, index) => ({
      index,
      start,
      end,
      rows: rows.slice(start, end),
      tokenCount: tokens,
    }));
  }

  /**
   * Quick upper-bound estimate of the batch count, for progress reporting.
   * Does not materialize batches.
   */
  estimateBatchCount(
    rows: readonly DatasetRow[],
    columns: readonly string[],
    maxTokens: number
  ): number {
    assertBudget(maxTokens);
    if (rows.length === 0) return 0;

    const totalTokens = columns.reduce((total, column) => {
      const text = rows
        .map((row) => row[column])
        .filter((value) => value !== null && value !== undefined)
        .map(String)
        .join('');
      return total + this.tokenCounter.estimate(text);
    }, 0);

    return Math.max(1, Math.ceil(totalTokens / maxTokens));
  }
}

import type { CellValue, DatasetRow } from '../types.js';
import type { ScorerName, TestScorer } from './types.js';
import { assertColumns } from '../dataset/dataset.js';
import { DatasetError } from '../library/errors.js';

const POSITIVE_LABELS = new Set(['1', 'true', 'correct', 'yes', 'pass']);

/**
 * Read a label cell as 1 or 0. Numbers other than 1 and unknown strings
 * are negative.
 */
export function toBinaryLabel(value: CellValue | undefined): 0 | 1 {
  if (value === true || value === 1) return 1;
  if (typeof value === 'string' && POSITIVE_LABELS.has(value.trim().toLowerCase())) return 1;
  return 0;
}

function confusion(yTrue: readonly number[], yPred: readonly number[]) {
  let tp = 0;
  let fp = 0;
  let fn = 0;
  let tn = 0;
  yTrue.forEach((truth, i) => {
    const pred = yPred[i];
    if (truth === 1 && pred === 1) tp++;
    else if (truth === 0 && pred === 1) fp++;
    else if (truth === 1 && pred === 0) fn++;
    else tn++;
  });
  return { tp, fp, fn, tn };
}

function ratio(numerator: number, denominator: number): number {
  return denominator === 0 ? 0 : numerator / denominator;
}

/**
 * Binary classification metrics. Positive class is 1; a zero denominator
 * scores 0.
 */
export function computeMetric(
  scorer: ScorerName,
  yTrue: readonly number[],
  yPred: readonly number[]
): number {
  if (yTrue.length !== yPred.length) {
    throw new DatasetError(`Label lengths differ: ${yTrue.length} true, ${yPred.length} predicted`);
  }
  const { tp, fp, fn, tn } = confusion(yTrue, yPred);
  const precision = ratio(tp, tp + fp);
  const recall = ratio(tp, tp + fn);

  switch (scorer) {
    case 'accuracy':
      return ratio(tp + tn, yTrue.length);
    case 'precision':
      return precision;
    case 'recall':
      return recall;
    case 'f1':
      return ratio(2 * precision * recall, precision + recall);
  }
}

export function scorerLabel(testScorer: TestScorer): string {
  return typeof testScorer === 'function' ? 'custom' : testScorer.scorer;
}

/**
 * Score evaluated test rows. Without an expected column every row is
 * taken to be a positive example.
 */
export async function scoreRows(
  testScorer: TestScorer,
  rows: readonly DatasetRow[]
): Promise<number> {
  if (typeof testScorer === 'function') {
    return testScorer(rows);
  }

  const { scorer, labelColumn, expectedColumn } = testScorer;
  assertColumns(rows, expectedColumn !== undefined ? [labelColumn, expectedColumn] : [labelColumn]);

  const yPred = rows.map((row) => toBinaryLabel(row[labelColumn]));
  const yTrue =
    expectedColumn !== undefined
      ? rows.map((row) => toBinaryLabel(row[expectedColumn]))
      : rows.map(() => 1);
  return computeMetric(scorer, yTrue, yPred);
}

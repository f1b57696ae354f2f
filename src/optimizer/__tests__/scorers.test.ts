import { describe, it, expect } from 'vitest';
import { computeMetric, scoreRows, scorerLabel, toBinaryLabel } from '../scorers.js';
import { DatasetError } from '../../library/errors.js';

describe('toBinaryLabel', () => {
  it('reads common positive labels', () => {
    expect([true, 1, '1', 'true', ' Correct ', 'YES', 'pass'].map(toBinaryLabel)).toEqual([
      1, 1, 1, 1, 1, 1, 1,
    ]);
  });

  it('reads everything else as negative', () => {
    expect([false, 0, 2, 0.5, 'incorrect', 'no', '', null, undefined].map(toBinaryLabel)).toEqual([
      0, 0, 0, 0, 0, 0, 0, 0, 0,
    ]);
  });
});

describe('computeMetric', () => {
  const yTrue = [1, 0, 1, 1];
  const yPred = [1, 1, 0, 1];

  it('computes accuracy', () => {
    expect(computeMetric('accuracy', yTrue, yPred)).toBe(0.5);
  });

  it('computes precision, recall and f1 for the positive class', () => {
    expect(computeMetric('precision', yTrue, yPred)).toBeCloseTo(2 / 3, 10);
    expect(computeMetric('recall', yTrue, yPred)).toBeCloseTo(2 / 3, 10);
    expect(computeMetric('f1', yTrue, yPred)).toBeCloseTo(2 / 3, 10);
  });

  it('scores zero when a denominator is zero', () => {
    expect(computeMetric('precision', [1, 1], [0, 0])).toBe(0);
    expect(computeMetric('recall', [0, 0], [1, 0])).toBe(0);
    expect(computeMetric('f1', [0, 0], [0, 0])).toBe(0);
    expect(computeMetric('accuracy', [], [])).toBe(0);
  });

  it('rejects labels of different lengths', () => {
    expect(() => computeMetric('accuracy', [1], [1, 0])).toThrow(DatasetError);
  });
});

describe('scoreRows', () => {
  const rows = [
    { verdict: 'correct', expected: 'yes' },
    { verdict: 'incorrect', expected: 'yes' },
    { verdict: 'correct', expected: 'no' },
    { verdict: 'correct', expected: 'yes' },
  ];

  it('compares predicted and expected labels', async () => {
    await expect(
      scoreRows({ scorer: 'accuracy', labelColumn: 'verdict', expectedColumn: 'expected' }, rows)
    ).resolves.toBe(0.5);
  });

  it('treats every row as positive without an expected column', async () => {
    await expect(scoreRows({ scorer: 'accuracy', labelColumn: 'verdict' }, rows)).resolves.toBe(
      0.75
    );
  });

  it('calls a custom scorer with the rows', async () => {
    await expect(scoreRows(async (data) => data.length / 10, rows)).resolves.toBe(0.4);
  });

  it('requires the label column', async () => {
    await expect(scoreRows({ scorer: 'f1', labelColumn: 'missing' }, rows)).rejects.toThrow(
      'Dataset missing required columns: missing'
    );
  });
});

describe('scorerLabel', () => {
  it('names built-in and custom scorers', () => {
    expect(scorerLabel({ scorer: 'f1', labelColumn: 'x' })).toBe('f1');
    expect(scorerLabel(() => 1)).toBe('custom');
  });
});

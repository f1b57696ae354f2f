import { describe, it, expect, vi } from 'vitest';
import { Annotator } from '../annotator.js';
import { PricingCalculator } from '../../pricing/pricing.js';
import { RetryPolicy } from '../../library/retry.js';
import { ConfigurationError, ProviderError } from '../../library/errors.js';
import type { LLMResult, LanguageModel } from '../../types.js';

function fakeModel(generate: (prompt: string) => Promise<LLMResult>): LanguageModel {
  return { model: 'gpt-4', generate };
}

const input = {
  baselinePrompt: 'Answer {question}',
  rows: [{ question: '2+2?', output: '5', feedback: 'incorrect', expected: '4' }],
  templateVariables: ['question'],
  feedbackColumns: ['feedback'],
  outputColumn: 'output',
};

describe('Annotator', () => {
  it('renders examples with the ground truth', () => {
    const annotator = new Annotator({
      model: fakeModel(async () => ({ text: '', inputTokens: 0, outputTokens: 0 })),
      template: 'For {baseline_prompt}:\n{examples}',
    });

    expect(annotator.render({ ...input, groundTruthColumn: 'expected' })).toBe(
      [
        'For Answer {question}:',
        'Example 0',
        '',
        'Input:',
        '  question: 2+2?',
        '',
        'Output: 5',
        '',
        'Ground Truth: 4',
        '',
        'Feedback:',
        'feedback: incorrect',
      ].join('\n')
    );
  });

  it('shows N/A without a ground truth column', () => {
    const annotator = new Annotator({
      model: fakeModel(async () => ({ text: '', inputTokens: 0, outputTokens: 0 })),
      template: '{examples}',
    });

    expect(annotator.render(input)).toContain('\nGround Truth: N/A\n');
  });

  it('returns the trimmed annotation and records its usage', async () => {
    const generate = vi.fn(async (_prompt: string) => ({
      text: '  Outputs skip the arithmetic.\n',
      inputTokens: 1000,
      outputTokens: 500,
    }));
    const pricing = new PricingCalculator();
    const annotator = new Annotator({ model: fakeModel(generate), pricing });

    const annotation = await annotator.generateAnnotation('rendered');

    expect(annotation).toBe('Outputs skip the arithmetic.');
    expect(generate).toHaveBeenCalledWith('rendered');
    expect(pricing.summary().totalInputTokens).toBe(1000);
    expect(pricing.spent).toBeCloseTo(0.06, 10);
  });

  it('retries transient failures', async () => {
    let calls = 0;
    const annotator = new Annotator({
      model: fakeModel(async () => {
        calls++;
        if (calls === 1) throw new ProviderError('timed out', { category: 'timeout' });
        return { text: 'note', inputTokens: 1, outputTokens: 1 };
      }),
      retryPolicy: new RetryPolicy({ sleep: async () => {} }),
    });

    await expect(annotator.generateAnnotation('rendered')).resolves.toBe('note');
    expect(calls).toBe(2);
  });

  it('rejects a template with unknown variables', () => {
    expect(
      () =>
        new Annotator({
          model: fakeModel(async () => ({ text: '', inputTokens: 0, outputTokens: 0 })),
          template: '{examples} {ruleset}',
        })
    ).toThrow(ConfigurationError);
  });
});

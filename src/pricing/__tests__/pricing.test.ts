import { describe, it, expect } from 'vitest';
import { PricingCalculator } from '../pricing.js';
import { TokenLimitError } from '../../library/errors.js';

describe('PricingCalculator', () => {
  describe('priceFor', () => {
    const calculator = new PricingCalculator();

    it('matches the exact model name first', () => {
      expect(calculator.priceFor('gpt-4')).toEqual({
        modelName: 'gpt-4',
        inputPricePer1k: 0.03,
        outputPricePer1k: 0.06,
      });
    });

    it('prefers the longest known name contained in the model', () => {
      expect(calculator.priceFor('gpt-4o-mini-2024-07-18').modelName).toBe('gpt-4o-mini');
      expect(calculator.priceFor('gpt-4-turbo-preview').modelName).toBe('gpt-4-turbo');
      expect(calculator.priceFor('GPT-4o-2024-08-06').modelName).toBe('gpt-4o');
    });

    it('falls back to a shared family name', () => {
      expect(calculator.priceFor('claude-3-opus').modelName).toBe('claude-opus-4-5');
    });

    it('uses conservative pricing for unknown models', () => {
      expect(calculator.priceFor('mistral-large')).toEqual({
        modelName: 'unknown',
        inputPricePer1k: 0.01,
        outputPricePer1k: 0.03,
      });
    });

    it('accepts a custom table', () => {
      const custom = new PricingCalculator([
        { modelName: 'house-model', inputPricePer1k: 1, outputPricePer1k: 2 },
      ]);
      expect(custom.cost('house-model', 1000, 1000)).toBe(3);
      expect(custom.priceFor('gpt-4').modelName).toBe('unknown');
    });
  });

  describe('ledger', () => {
    it('prices input and output tokens separately', () => {
      const calculator = new PricingCalculator();
      expect(calculator.record('gpt-4', 1000, 500)).toBeCloseTo(0.06, 10);
    });

    it('accumulates usage across calls', () => {
      const calculator = new PricingCalculator();
      calculator.record('gpt-4', 1000, 500);
      calculator.record('gpt-4', 500);

      const summary = calculator.summary();
      expect(summary.totalCost).toBeCloseTo(0.075, 10);
      expect(summary.totalInputTokens).toBe(1500);
      expect(summary.totalOutputTokens).toBe(500);
      expect(summary.totalTokens).toBe(2000);
      expect(calculator.spent).toBeCloseTo(0.075, 10);
    });

    it('checks a prospective call against the budget without recording it', () => {
      const calculator = new PricingCalculator();
      calculator.record('gpt-4', 1000, 500);

      expect(calculator.wouldExceed('gpt-4', 1000, 0, 0.08)).toBe(true);
      expect(calculator.wouldExceed('gpt-4', 1000, 0, 0.1)).toBe(false);
      expect(calculator.summary().totalInputTokens).toBe(1000);
    });

    it('rejects negative or fractional token counts', () => {
      const calculator = new PricingCalculator();
      expect(() => calculator.record('gpt-4', -1)).toThrow(TokenLimitError);
      expect(() => calculator.record('gpt-4', 10, 0.5)).toThrow(
        'outputTokens must be a non-negative integer, got 0.5'
      );
      expect(calculator.spent).toBe(0);
    });

    it('resets to zero', () => {
      const calculator = new PricingCalculator();
      calculator.record('gpt-4', 1000, 500);
      calculator.reset();
      expect(calculator.summary()).toEqual({
        totalCost: 0,
        totalInputTokens: 0,
        totalOutputTokens: 0,
        totalTokens: 0,
      });
    });
  });
});

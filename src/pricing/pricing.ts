import type { ModelPricing, UsageSummary } from '../types.js';
import {
  FALLBACK_PRICING,
  FALLBACK_PRICING_KEY,
  MODEL_PRICING_TABLE,
  TOKENS_PER_THOUSAND,
} from '../library/constants.js';
import { TokenLimitError } from '../library/errors.js';

const DEFAULT_PRICING: ReadonlyMap<string, ModelPricing> = new Map(
  MODEL_PRICING_TABLE.map(([modelName, inputPricePer1k, outputPricePer1k]) => [
    modelName,
    Object.freeze({ modelName, inputPricePer1k, outputPricePer1k }),
  ])
);

const FALLBACK: ModelPricing = Object.freeze({
  modelName: FALLBACK_PRICING_KEY,
  inputPricePer1k: FALLBACK_PRICING[0],
  outputPricePer1k: FALLBACK_PRICING[1],
});

function assertTokenCount(name: string, value: number): void {
  if (!Number.isInteger(value) || value < 0) {
    throw new TokenLimitError(`${name} must be a non-negative integer, got ${value}`);
  }
}

/**
 * Maps models to per-1K-token prices and keeps a running usage ledger.
 *
 * Costs are plain floating point. Treat the ledger as advisory, not billing.
 * The ledger is not synchronized: concurrent runs sharing one calculator
 * must serialize access themselves.
 */
export class PricingCalculator {
  private readonly pricing: ReadonlyMap<string, ModelPricing>;
  private totalCost = 0;
  private totalInputTokens = 0;
  private totalOutputTokens = 0;

  constructor(pricing: Iterable<ModelPricing> = DEFAULT_PRICING.values()) {
    this.pricing = new Map(
      Array.from(pricing, (p) => [p.modelName, Object.freeze({ ...p })])
    );
  }

  /**
   * Exact name first, then the longest key contained in the model name,
   * then a shared family token, then the conservative fallback.
   */
  priceFor(model: string): ModelPricing {
    const exact = this.pricing.get(model);
    if (exact) return exact;

    const lower = model.toLowerCase();

    let best: ModelPricing | undefined;
    for (const [key, pricing] of this.pricing) {
      if (lower.includes(key) && (!best || key.length > best.modelName.length)) {
        best = pricing;
      }
    }
    if (best) return best;

    // Numeric parts ("4", "2.5") say nothing about the family
    const tokens = new Set(lower.split(/[-_\s/]+/).filter(Boolean));
    for (const [key, pricing] of this.pricing) {
      const familyParts = key.split('-').filter((part) => /[a-z]/.test(part));
      if (familyParts.some((part) => tokens.has(part))) {
        return pricing;
      }
    }

    return FALLBACK;
  }

  cost(model: string, inputTokens: number, outputTokens = 0): number {
    const pricing = this.priceFor(model);
    const inputCost = (inputTokens / TOKENS_PER_THOUSAND) * pricing.inputPricePer1k;
    const outputCost = (outputTokens / TOKENS_PER_THOUSAND) * pricing.outputPricePer1k;
    return inputCost + outputCost;
  }

  /**
   * Add usage to the ledger and return the cost of this call.
   */
  record(model: string, inputTokens: number, outputTokens = 0): number {
    assertTokenCount('inputTokens', inputTokens);
    assertTokenCount('outputTokens', outputTokens);
    const cost = this.cost(model, inputTokens, outputTokens);
    this.totalCost += cost;
    this.totalInputTokens += inputTokens;
    this.totalOutputTokens += outputTokens;
    return cost;
  }

  wouldExceed(
    model: string,
    inputTokens: number,
    outputTokens: number,
    budget: number
  ): boolean {
    return this.totalCost + this.cost(model, inputTokens, outputTokens) > budget;
  }

  get spent(): number {
    return this.totalCost;
  }

  summary(): UsageSummary {
    return {
      totalCost: this.totalCost,
      totalInputTokens: this.totalInputTokens,
      totalOutputTokens: this.totalOutputTokens,
      totalTokens: this.totalInputTokens + this.totalOutputTokens,
    };
  }

  reset(): void {
    this.totalCost = 0;
    this.totalInputTokens = 0;
    this.totalOutputTokens = 0;
  }
}

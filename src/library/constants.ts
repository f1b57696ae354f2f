import { LLMProviders } from '../types.js';

// LLM Provider configuration
export interface ProviderSpec {
  model: string;
  maxTokens: number;
  apiKeyEnvVar: string;
}

export const PROVIDER_SPECS: Record<LLMProviders, ProviderSpec> = {
  [LLMProviders.anthropic_claude_opus]: { model: 'claude-opus-4-5-20251101', maxTokens: 64000, apiKeyEnvVar: 'ANTHROPIC_API_KEY' },
  [LLMProviders.anthropic_claude_sonnet]: { model: 'claude-sonnet-4-5-20250929', maxTokens: 64000, apiKeyEnvVar: 'ANTHROPIC_API_KEY' },
  [LLMProviders.anthropic_claude_haiku]: { model: 'claude-haiku-4-5-20251001', maxTokens: 64000, apiKeyEnvVar: 'ANTHROPIC_API_KEY' },
  [LLMProviders.openai_gpt5]: { model: 'gpt-5', maxTokens: 32000, apiKeyEnvVar: 'OPENAI_API_KEY' },
  [LLMProviders.openai_gpt5_mini]: { model: 'gpt-5-mini', maxTokens: 32000, apiKeyEnvVar: 'OPENAI_API_KEY' },
  [LLMProviders.openai_gpt4o]: { model: 'gpt-4o', maxTokens: 16384, apiKeyEnvVar: 'OPENAI_API_KEY' },
  [LLMProviders.openai_gpt4]: { model: 'gpt-4', maxTokens: 8192, apiKeyEnvVar: 'OPENAI_API_KEY' },
};

export const ANTHROPIC_THINKING_BUDGET_TOKENS = 31999;

// Pricing (USD per 1K tokens). Lookup order matters for family matches.
export const MODEL_PRICING_TABLE: ReadonlyArray<readonly [string, number, number]> = [
  ['gpt-4', 0.03, 0.06],
  ['gpt-4-turbo', 0.01, 0.03],
  ['gpt-4o', 0.0025, 0.01],
  ['gpt-4o-mini', 0.00015, 0.0006],
  ['gpt-3.5-turbo', 0.0015, 0.002],
  ['gpt-5', 0.00125, 0.01],
  ['gpt-5-mini', 0.00025, 0.002],
  ['gemini-2.5-flash', 0.0003, 0.0025],
  ['gemini-2.5-pro', 0.00125, 0.01],
  ['gemini-pro', 0.00125, 0.01],
  ['claude-opus-4-5', 0.005, 0.025],
  ['claude-sonnet-4-5', 0.003, 0.015],
  ['claude-haiku-4-5', 0.001, 0.005],
];
export const FALLBACK_PRICING_KEY = 'unknown';
export const FALLBACK_PRICING: readonly [number, number] = [0.01, 0.03];
export const TOKENS_PER_THOUSAND = 1_000;

// Retry constants
export const DEFAULT_MAX_RETRIES = 5;
export const DEFAULT_INITIAL_DELAY_MS = 1000;
export const DEFAULT_BACKOFF_MULTIPLIER = 3;

// Template constants
export const START_DELIM = '{';
export const END_DELIM = '}';

// Optimizer constants
export const DEFAULT_CONTEXT_SIZE_TOKENS = 128_000;
export const DEFAULT_MAX_COST = 5.0;
export const DEFAULT_LOG_DIR = './prompt-refinery-logs';
export const DEFAULT_EDITABLE_ROLE = 'user';
export const DEFAULT_OPTIMIZATION_THRESHOLD = 1.0;
export const DEFAULT_MAX_OPTIMIZATION_LOOPS = 5;

// Token counter constants
export const APPROXIMATE_CHARS_PER_TOKEN = 4;
export const DEFAULT_TIKTOKEN_ENCODING = 'cl100k_base';

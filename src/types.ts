// ═══════════════════════════════════════════════════════════════════════════
// LLM
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Chat message, as found in message-list and versioned prompts.
 */
export interface Message {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

/**
 * Supported LLM providers.
 */
export enum LLMProviders {
  // Anthropic Claude 4.5
  anthropic_claude_opus = 'anthropic_claude_opus',
  anthropic_claude_sonnet = 'anthropic_claude_sonnet',
  anthropic_claude_haiku = 'anthropic_claude_haiku',
  // OpenAI
  openai_gpt5 = 'openai_gpt5',
  openai_gpt5_mini = 'openai_gpt5_mini',
  openai_gpt4o = 'openai_gpt4o',
  openai_gpt4 = 'openai_gpt4',
}

/**
 * Result of a single language-model call.
 */
export interface LLMResult {
  text: string;
  inputTokens: number;
  outputTokens: number;
}

/**
 * The "generate text" boundary the optimizer talks to.
 * `model` is the model identifier used for pricing. Timeouts and rate limits
 * thrown by `generate` are retried, whether raw SDK errors or ProviderErrors.
 */
export interface LanguageModel {
  readonly model: string;
  generate(prompt: string): Promise<LLMResult>;
}

// ═══════════════════════════════════════════════════════════════════════════
// DATASET
// ═══════════════════════════════════════════════════════════════════════════

export type CellValue = string | number | boolean | null;

/**
 * One example: template-variable values, model output, feedback and
 * optionally a ground truth, addressed by column name.
 */
export type DatasetRow = Record<string, CellValue>;

/**
 * Rows in memory, or a path to a `.json`, `.jsonl`/`.ndjson` or `.csv` file.
 */
export type DatasetSource = readonly DatasetRow[] | string;

/**
 * Computes feedback for a dataset. Returns one value array per new column,
 * each as long as `rows`.
 */
export type Evaluator = (
  rows: readonly DatasetRow[]
) => Promise<EvaluatorOutput> | EvaluatorOutput;

export type EvaluatorOutput = Record<string, CellValue[]>;

// ═══════════════════════════════════════════════════════════════════════════
// PROMPTS
// ═══════════════════════════════════════════════════════════════════════════

export interface TextPrompt {
  kind: 'text';
  text: string;
}

export interface MessagesPrompt {
  kind: 'messages';
  messages: Message[];
}

/**
 * A prompt held in an external registry, carried with its messages.
 */
export interface VersionedPrompt {
  kind: 'versioned';
  id?: string;
  name?: string;
  description?: string;
  modelName: string;
  modelProvider: string;
  messages: Message[];
}

export type PromptRepresentation = TextPrompt | MessagesPrompt | VersionedPrompt;

// ═══════════════════════════════════════════════════════════════════════════
// USAGE
// ═══════════════════════════════════════════════════════════════════════════

export interface ModelPricing {
  readonly modelName: string;
  readonly inputPricePer1k: number;
  readonly outputPricePer1k: number;
}

export interface UsageSummary {
  totalCost: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalTokens: number;
}

// Optimizer types live with the optimizer
export type {
  OptimizationMode,
  OptimizeOptions,
  OptimizeResult,
  PromptOptimizeResult,
  RulesetOptimizeResult,
  BatchRecord,
  BatchStatus,
  StopReason,
  ExperimentOptions,
  ExperimentResult,
  LoopResult,
  Task,
  TestScorer,
} from './optimizer/types.js';

// Re-export types
export type {
  // LLM types
  Message,
  LLMResult,
  LanguageModel,
  // Dataset types
  CellValue,
  DatasetRow,
  DatasetSource,
  Evaluator,
  EvaluatorOutput,
  // Prompt types
  TextPrompt,
  MessagesPrompt,
  VersionedPrompt,
  PromptRepresentation,
  // Usage types
  ModelPricing,
  UsageSummary,
  // Optimizer types
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
} from './types.js';
export type { ScorerName } from './optimizer/types.js';
export type { RefineryConfig, RefineryConfigInput, Env } from './library/config.js';
export type { RetryOptions, RetryOutcome } from './library/retry.js';
export type { ProviderErrorCategory } from './library/errors.js';
export type { TokenCounter } from './tokens/token-counter.js';
export type { Batch } from './tokens/dataset-splitter.js';
export type { TemplateSpec, RenderOptions } from './prompt/template.js';
export type { EditableRole } from './prompt/prompt.js';
export type { MetaPromptInput } from './optimizer/meta-prompt.js';
export type { AnnotationInput, AnnotatorOptions } from './optimizer/annotator.js';
export type { EvaluatorRun } from './optimizer/evaluators.js';
export type {
  PromptLearningOptimizerOptions,
  CreateAnnotationsOptions,
} from './optimizer/optimizer.js';
export type { ProviderModelOptions } from './library/llm/types.js';

// Re-export enums
export { LLMProviders } from './types.js';

// Errors
export {
  PromptLearningError,
  DatasetError,
  TokenLimitError,
  ProviderError,
  OptimizationError,
  ConfigurationError,
  classifyProviderError,
  isTransientError,
} from './library/errors.js';

// Configuration and retry
export { loadConfig, requireApiKey } from './library/config.js';
export { RetryPolicy } from './library/retry.js';

// LLM
export { callLLM, createProviderModel } from './library/llm/llm-client.js';

// Tokens, batching and pricing
export { TiktokenCounter, ApproximateCounter, encodingForModel } from './tokens/token-counter.js';
export { DatasetSplitter } from './tokens/dataset-splitter.js';
export { PricingCalculator } from './pricing/pricing.js';

// Datasets, templates and prompts
export { loadDataset, columnsOf } from './dataset/dataset.js';
export {
  detectTemplateVariables,
  escapeTemplateValue,
  renderTemplate,
  compileTemplate,
  formatTemplateWithVars,
} from './prompt/template.js';
export { textPrompt, editableContent, withContent } from './prompt/prompt.js';

// Optimizer
export { MetaPrompt, formatPromptExamples, formatRulesetExamples } from './optimizer/meta-prompt.js';
export { Annotator } from './optimizer/annotator.js';
export { runEvaluators } from './optimizer/evaluators.js';
export { computeMetric, toBinaryLabel } from './optimizer/scorers.js';
export { PromptLearningOptimizer } from './optimizer/optimizer.js';
export { optimizeWithExperiments } from './optimizer/experiments.js';
export {
  META_PROMPT_TEMPLATE,
  RULESET_META_PROMPT_TEMPLATE,
  ANNOTATION_PROMPT_TEMPLATE,
} from './optimizer/prompts.js';

// Main refinery namespace
import type { ExperimentOptions, ExperimentResult, OptimizeOptions, OptimizeResult } from './types.js';
import type { PromptLearningOptimizerOptions } from './optimizer/optimizer.js';
import { PromptLearningOptimizer } from './optimizer/optimizer.js';
import { optimizeWithExperiments } from './optimizer/experiments.js';

/**
 * Main refinery namespace for fluent API.
 *
 * @example
 * ```ts
 * import { refinery } from 'prompt-refinery';
 *
 * const result = await refinery.optimize(
 *   { prompt: 'Classify the sentiment of: {review}' },
 *   {
 *     dataset: './reviews.csv',
 *     outputColumn: 'output',
 *     feedbackColumns: ['correctness', 'explanation'],
 *   }
 * );
 *
 * if (result.mode === 'prompt') console.log(result.content);
 * ```
 */
export const refinery = {
  /**
   * Create an optimizer for a prompt.
   */
  optimizer(options: PromptLearningOptimizerOptions): PromptLearningOptimizer {
    return new PromptLearningOptimizer(options);
  },

  /**
   * Run one optimization pass over a dataset.
   */
  optimize(
    options: PromptLearningOptimizerOptions,
    run: OptimizeOptions
  ): Promise<OptimizeResult> {
    return new PromptLearningOptimizer(options).optimize(run);
  },

  /**
   * Run the train/test experiment loop.
   */
  experiment(
    options: PromptLearningOptimizerOptions,
    run: ExperimentOptions
  ): Promise<ExperimentResult> {
    return optimizeWithExperiments(new PromptLearningOptimizer(options), run);
  },
};

// Default export
export default refinery;

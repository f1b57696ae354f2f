import type {
  CellValue,
  DatasetRow,
  DatasetSource,
  Evaluator,
  PromptRepresentation,
  UsageSummary,
} from '../types.js';
import type { RefineryConfig } from '../library/config.js';

// ═══════════════════════════════════════════════════════════════════════════
// PUBLIC API TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * What one optimization run mutates: the candidate prompt, or a ruleset
 * alongside a fixed prompt.
 */
export type OptimizationMode =
  | { kind: 'prompt' }
  | { kind: 'ruleset'; ruleset: string };

/**
 * Options for PromptLearningOptimizer.optimize().
 */
export interface OptimizeOptions {
  dataset: DatasetSource;
  outputColumn: string;
  feedbackColumns?: string[];
  evaluators?: Evaluator[];
  /** Static annotations added to every meta-prompt */
  annotations?: string[];
  /** Annotation templates run against each batch before its meta-prompt */
  annotatorPrompts?: string[];
  groundTruthColumn?: string;
  mode?: OptimizationMode;
  /** Token budget per batch (default: config.contextSizeTokens) */
  contextSizeTokens?: number;
  /** Currency budget for the run (default: config.maxCost) */
  maxCost?: number;
  storeLogs?: boolean | string; // true = "./prompt-refinery-logs/optimize_<timestamp>/summary.md", string = custom path
}

export type BatchStatus = 'updated' | 'failed' | 'rejected';

export type StopReason = 'completed' | 'budget';

/**
 * What happened to one batch.
 */
export interface BatchRecord {
  index: number;
  start: number;
  end: number;
  rowCount: number;
  tokenCount: number;
  status: BatchStatus;
  error?: string;
  /** Variables missing from a rejected rewrite */
  droppedVariables?: string[];
  annotations: number;
  cost: number;
  inputTokens: number;
  outputTokens: number;
  durationMs: number;
}

interface BaseOptimizeResult {
  templateVariables: string[];
  batches: BatchRecord[];
  /** Batches never started because the budget ran out */
  skippedBatches: number;
  usage: UsageSummary;
  stopReason: StopReason;
  logFolder?: string;
}

export interface PromptOptimizeResult extends BaseOptimizeResult {
  mode: 'prompt';
  /** Same shape as the input prompt */
  prompt: PromptRepresentation;
  content: string;
}

export interface RulesetOptimizeResult extends BaseOptimizeResult {
  mode: 'ruleset';
  ruleset: string;
}

export type OptimizeResult = PromptOptimizeResult | RulesetOptimizeResult;

// ═══════════════════════════════════════════════════════════════════════════
// EXPERIMENTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Runs the prompt for one row. Receives the prompt with the row's template
 * variables already filled in.
 */
export type Task = (renderedPrompt: string, row: DatasetRow) => Promise<CellValue>;

export type ScorerName = 'accuracy' | 'precision' | 'recall' | 'f1';

export type TestScorer =
  | {
      scorer: ScorerName;
      /** Column holding the predicted label (1/0, true/false, "correct"...) */
      labelColumn: string;
      /** Column holding the true label (default: every row positive) */
      expectedColumn?: string;
    }
  | ((rows: readonly DatasetRow[]) => number | Promise<number>);

export interface ExperimentOptions {
  trainDataset: DatasetSource;
  testDataset: DatasetSource;
  task: Task;
  /** Produce feedback for train outputs */
  evaluators: Evaluator[];
  /** Produce the columns the test scorer reads */
  testEvaluators?: Evaluator[];
  testScorer: TestScorer;
  outputColumn: string;
  feedbackColumns?: string[];
  annotatorPrompts?: string[];
  /** Stop once the test score reaches this (default: config.optimizationThreshold) */
  threshold?: number;
  /** Maximum optimize passes (default: config.maxOptimizationLoops) */
  loops?: number;
  /** Rows run at once (default: all) */
  concurrency?: number;
  /** Train rows drawn at random for each loop (default: every row) */
  trainSampleSize?: number;
  contextSizeTokens?: number;
  maxCost?: number;
  storeLogs?: boolean | string;
}

/**
 * One scored prompt in the experiment loop.
 */
export interface LoopResult {
  loop: number;
  content: string;
  testScore: number;
  cost: number;
  cumulativeCost: number;
  durationMs: number;
  taskFailures: number;
  batches?: BatchRecord[];
}

export interface ExperimentResult {
  success: boolean;
  bestPrompt: PromptRepresentation;
  bestScore: number;
  loops: LoopResult[];
  usage: UsageSummary;
  logFolder?: string;
}

// ═══════════════════════════════════════════════════════════════════════════
// INTERNAL TYPES
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Context passed to logging functions.
 */
export interface LogContext {
  config: RefineryConfig;
  startTime: Date;
  model: string;
  rowCount: number;
  contextSizeTokens: number;
  maxCost: number;
  mode: OptimizationMode['kind'];
}

/**
 * Context passed to experiment report writers.
 */
export interface ExperimentLogContext {
  config: RefineryConfig;
  startTime: Date;
  model: string;
  threshold: number;
  maxLoops: number;
  maxCost: number;
  trainCount: number;
  testCount: number;
  scorer: string;
}

import type {
  LanguageModel,
  PromptRepresentation,
  UsageSummary,
} from '../types.js';
import type {
  BatchRecord,
  LogContext,
  OptimizationMode,
  OptimizeOptions,
  OptimizeResult,
  StopReason,
} from './types.js';
import * as path from 'path';
import { loadConfig, requireApiKey, type RefineryConfig } from '../library/config.js';
import { ConfigurationError, DatasetError, errorMessage } from '../library/errors.js';
import { DEFAULT_EDITABLE_ROLE } from '../library/constants.js';
import { RetryPolicy } from '../library/retry.js';
import { createProviderModel } from '../library/llm/llm-client.js';
import { TiktokenCounter, type TokenCounter } from '../tokens/token-counter.js';
import { DatasetSplitter, type Batch } from '../tokens/dataset-splitter.js';
import { PricingCalculator } from '../pricing/pricing.js';
import { assertColumns, columnsOf, loadDataset } from '../dataset/dataset.js';
import { detectTemplateVariables } from '../prompt/template.js';
import {
  editableContent,
  textPrompt,
  withContent,
  type EditableRole,
} from '../prompt/prompt.js';
import { MetaPrompt } from './meta-prompt.js';
import { Annotator, type AnnotationInput } from './annotator.js';
import { runEvaluators, type EvaluatorRun } from './evaluators.js';
import { setOutputEnabled } from './ui.js';
import {
  generateLogContent,
  logAnnotationFailed,
  logAnnotationStart,
  logBatchFailed,
  logBatchStart,
  logBatchUpdated,
  logBudgetReached,
  logLogsWritten,
  logMetaPromptStart,
  logOptimizationComplete,
  logOptimizerHeader,
  logRetry,
  logVariablesDropped,
  resolveLogPath,
  writeFinalLogs,
  writeLog,
  type RunOutcome,
} from './optimizer-logging.js';

export interface PromptLearningOptimizerOptions {
  /** The prompt to improve. A string is treated as a text prompt. */
  prompt: PromptRepresentation | string;
  /** Rewriting model (default: the configured provider) */
  model?: LanguageModel;
  /** Settings (default: loadConfig() from the environment) */
  config?: RefineryConfig;
  /** Row token counter (default: exact counter for the model's family) */
  tokenCounter?: TokenCounter;
  /** Shared usage ledger (default: a fresh calculator) */
  pricing?: PricingCalculator;
  metaPrompt?: MetaPrompt;
  /** Retry policy for every model call (default: from config.retry) */
  retryPolicy?: RetryPolicy;
  /** Role of the message to rewrite (default: 'user') */
  editableRole?: EditableRole;
}

export interface CreateAnnotationsOptions {
  dataset: OptimizeOptions['dataset'];
  outputColumn: string;
  feedbackColumns: string[];
  annotatorPrompts: string[];
  groundTruthColumn?: string;
}

/** Outcome of one model call for a batch, before it is recorded */
type BatchOutcome =
  | { status: 'updated'; content: string }
  | { status: 'rejected'; droppedVariables: string[] }
  | { status: 'failed'; error: string };

/**
 * Refines a prompt (or a ruleset beside a fixed prompt) batch by batch
 * against feedback on a dataset.
 *
 * Batches run strictly in order: each meta-prompt shows the candidate left
 * by the previous batch. A batch whose call fails is skipped with the
 * candidate unchanged.
 */
export class PromptLearningOptimizer {
  readonly prompt: PromptRepresentation;
  readonly config: RefineryConfig;
  readonly model: LanguageModel;
  readonly editableRole: EditableRole;
  private readonly tokenCounter: TokenCounter;
  private readonly splitter: DatasetSplitter;
  private readonly ledger: PricingCalculator;
  private readonly metaPrompt: MetaPrompt;
  private readonly basePolicy: RetryPolicy;
  private readonly retryPolicy: RetryPolicy;

  constructor(options: PromptLearningOptimizerOptions) {
    this.prompt = typeof options.prompt === 'string' ? textPrompt(options.prompt) : options.prompt;
    this.config = options.config ?? loadConfig();
    this.editableRole = options.editableRole ?? DEFAULT_EDITABLE_ROLE;

    // Fail on an unusable prompt before anything else is set up
    editableContent(this.prompt, this.editableRole);

    this.model =
      options.model ??
      createProviderModel({
        provider: this.config.provider,
        apiKey: requireApiKey(this.config),
        thinking: this.config.thinking,
      });
    this.tokenCounter = options.tokenCounter ?? new TiktokenCounter({ model: this.model.model });
    this.splitter = new DatasetSplitter(this.tokenCounter);
    this.ledger = options.pricing ?? new PricingCalculator();
    this.metaPrompt = options.metaPrompt ?? new MetaPrompt();

    const policy = options.retryPolicy ?? new RetryPolicy(this.config.retry);
    this.basePolicy = policy;
    this.retryPolicy = policy.withOnRetry((attempt, error, delayMs) =>
      logRetry(attempt, policy.maxRetries, errorMessage(error), delayMs)
    );
  }

  /**
   * An optimizer for another prompt sharing this one's model, ledger and
   * settings.
   */
  withPrompt(prompt: PromptRepresentation | string): PromptLearningOptimizer {
    return new PromptLearningOptimizer({
      prompt,
      model: this.model,
      config: this.config,
      tokenCounter: this.tokenCounter,
      pricing: this.ledger,
      metaPrompt: this.metaPrompt,
      retryPolicy: this.basePolicy,
      editableRole: this.editableRole,
    });
  }

  get pricing(): PricingCalculator {
    return this.ledger;
  }

  /**
   * Usage recorded in the ledger so far.
   */
  usage(): UsageSummary {
    return this.ledger.summary();
  }

  /**
   * Add evaluator feedback columns to a dataset without optimizing.
   */
  async runEvaluators(
    dataset: OptimizeOptions['dataset'],
    evaluators: NonNullable<OptimizeOptions['evaluators']>,
    feedbackColumns: string[] = []
  ): Promise<EvaluatorRun> {
    setOutputEnabled(this.config.logLevel !== 'silent');
    return runEvaluators(loadDataset(dataset), evaluators, feedbackColumns);
  }

  /**
   * Run each annotator prompt once over the whole dataset. Failed
   * annotators are logged and left out of the result.
   */
  async createAnnotations(options: CreateAnnotationsOptions): Promise<string[]> {
    setOutputEnabled(this.config.logLevel !== 'silent');
    const rows = loadDataset(options.dataset);
    assertColumns(rows, this.requiredColumns(options));

    const annotators = this.buildAnnotators(options.annotatorPrompts);
    const baselinePrompt = editableContent(this.prompt, this.editableRole);
    return this.annotate(annotators, {
      baselinePrompt,
      rows,
      templateVariables: detectTemplateVariables(baselinePrompt),
      feedbackColumns: options.feedbackColumns,
      outputColumn: options.outputColumn,
      groundTruthColumn: options.groundTruthColumn,
    });
  }

  async optimize(options: OptimizeOptions): Promise<OptimizeResult> {
    setOutputEnabled(this.config.logLevel !== 'silent');

    const startTime = new Date();
    const mode: OptimizationMode = options.mode ?? { kind: 'prompt' };
    const contextSizeTokens = options.contextSizeTokens ?? this.config.contextSizeTokens;
    const maxCost = options.maxCost ?? this.config.maxCost;
    const evaluators = options.evaluators ?? [];
    const givenFeedback = options.feedbackColumns ?? [];

    // Preconditions: all checked before any model call
    if (givenFeedback.length === 0 && evaluators.length === 0) {
      throw new DatasetError('Either feedbackColumns or evaluators must be provided');
    }
    const loaded = loadDataset(options.dataset);
    if (loaded.length === 0) {
      throw new DatasetError('Dataset is empty');
    }
    assertColumns(loaded, this.requiredColumns({ ...options, feedbackColumns: givenFeedback }));
    if (!Number.isInteger(contextSizeTokens) || contextSizeTokens <= 0) {
      throw new ConfigurationError(
        `contextSizeTokens must be a positive integer, got ${contextSizeTokens}`
      );
    }
    const annotators = this.buildAnnotators(options.annotatorPrompts ?? []);

    // 1-2. Feedback columns from the data and from evaluators
    const { rows, feedbackColumns } = await runEvaluators(loaded, evaluators, givenFeedback);
    if (feedbackColumns.length === 0) {
      throw new DatasetError('No feedback columns: every evaluator failed');
    }

    // 3. Editable content and its variables
    const baseline = editableContent(this.prompt, this.editableRole);
    const templateVariables = detectTemplateVariables(baseline);

    // 4. Batches over every column
    const batches = this.splitter.split(rows, columnsOf(rows), contextSizeTokens);

    const logContext: LogContext = {
      config: this.config,
      startTime,
      model: this.model.model,
      rowCount: rows.length,
      contextSizeTokens,
      maxCost,
      mode: mode.kind,
    };
    const logPath = resolveLogPath(options.storeLogs, this.config.outputDir, 'optimize', startTime);

    logOptimizerHeader(logContext, batches.length);

    // 5. Sequential refinement; `candidate` is the prompt text or the ruleset
    let candidate = mode.kind === 'ruleset' ? mode.ruleset : baseline;
    let stopReason: StopReason = 'completed';
    let skippedBatches = 0;
    const records: BatchRecord[] = [];

    const outcomeSoFar = (): RunOutcome => ({
      stopReason,
      skippedBatches,
      templateVariables,
      usage: this.ledger.summary(),
    });

    for (const batch of batches) {
      const label = `${batch.index + 1}/${batches.length}`;
      const example = {
        rows: batch.rows,
        startIndex: batch.start,
        templateVariables,
        feedbackColumns,
        outputColumn: options.outputColumn,
      };
      const renderFor = (annotations: readonly string[]): string =>
        mode.kind === 'ruleset'
          ? this.metaPrompt.render({ ...example, candidate: baseline, ruleset: candidate, annotations })
          : this.metaPrompt.render({ ...example, candidate, annotations });

      const staticAnnotations = options.annotations ?? [];
      if (this.wouldExceedBudget(renderFor(staticAnnotations), candidate, maxCost)) {
        stopReason = 'budget';
        skippedBatches = batches.length - batch.index;
        logBudgetReached(this.ledger.spent, maxCost, skippedBatches);
        break;
      }

      logBatchStart(label, batch);
      const batchStart = Date.now();
      const usageBefore = this.ledger.summary();

      let annotations = staticAnnotations;
      if (annotators.length > 0) {
        const generated = await this.annotate(annotators, {
          ...example,
          baselinePrompt: mode.kind === 'ruleset' ? baseline : candidate,
          groundTruthColumn: options.groundTruthColumn,
        });
        annotations = [...staticAnnotations, ...generated];
      }

      const metaPrompt = renderFor(annotations);
      if (this.wouldExceedBudget(metaPrompt, candidate, maxCost)) {
        stopReason = 'budget';
        skippedBatches = batches.length - batch.index;
        logBudgetReached(this.ledger.spent, maxCost, skippedBatches);
        break;
      }

      const outcome = await this.refineBatch(metaPrompt, mode, templateVariables);
      const usageAfter = this.ledger.summary();
      const record = this.recordBatch(batch, outcome, {
        annotations: annotations.length,
        cost: usageAfter.totalCost - usageBefore.totalCost,
        inputTokens: usageAfter.totalInputTokens - usageBefore.totalInputTokens,
        outputTokens: usageAfter.totalOutputTokens - usageBefore.totalOutputTokens,
        durationMs: Date.now() - batchStart,
      });
      records.push(record);

      if (outcome.status === 'updated') {
        candidate = outcome.content;
      }
      if (logPath) writeLog(logPath, generateLogContent(records, logContext, outcomeSoFar()));
    }

    // 6. Result in the input's shape
    const finalOutcome = outcomeSoFar();
    logOptimizationComplete(records, finalOutcome);

    let logFolder: string | undefined;
    if (logPath) {
      writeFinalLogs(logPath, records, logContext, finalOutcome);
      logFolder = path.dirname(logPath);
      logLogsWritten(logFolder);
    }

    const base = {
      templateVariables,
      batches: records,
      skippedBatches,
      usage: finalOutcome.usage,
      stopReason,
      ...(logFolder !== undefined ? { logFolder } : {}),
    };

    if (mode.kind === 'ruleset') {
      return { mode: 'ruleset', ruleset: candidate, ...base };
    }
    const prompt =
      candidate === baseline ? this.prompt : withContent(this.prompt, candidate, this.editableRole);
    return { mode: 'prompt', prompt, content: candidate, ...base };
  }

  // ─────────────────────────────────────────────────────────────────────────
  // Internals
  // ─────────────────────────────────────────────────────────────────────────

  private requiredColumns(options: {
    outputColumn: string;
    feedbackColumns: readonly string[];
    groundTruthColumn?: string;
  }): string[] {
    const required = [options.outputColumn, ...options.feedbackColumns];
    if (options.groundTruthColumn !== undefined) required.push(options.groundTruthColumn);
    return required;
  }

  private buildAnnotators(templates: readonly string[]): Annotator[] {
    return templates.map(
      (template) =>
        new Annotator({
          model: this.model,
          template,
          retryPolicy: this.retryPolicy,
          pricing: this.ledger,
        })
    );
  }

  private async annotate(
    annotators: readonly Annotator[],
    input: AnnotationInput
  ): Promise<string[]> {
    if (annotators.length === 0) return [];
    logAnnotationStart(annotators.length);

    const annotations: string[] = [];
    for (const [index, annotator] of annotators.entries()) {
      try {
        const text = await annotator.generateAnnotation(annotator.render(input));
        if (text !== '') annotations.push(text);
      } catch (error) {
        if (error instanceof ConfigurationError) throw error;
        logAnnotationFailed(index, errorMessage(error));
      }
    }
    return annotations;
  }

  /**
   * Input is the meta-prompt; output is estimated at the candidate's size
   * since the model returns a rewrite of it.
   */
  private wouldExceedBudget(metaPrompt: string, candidate: string, maxCost: number): boolean {
    return this.ledger.wouldExceed(
      this.model.model,
      this.tokenCounter.count(metaPrompt),
      this.tokenCounter.count(candidate),
      maxCost
    );
  }

  private async refineBatch(
    metaPrompt: string,
    mode: OptimizationMode,
    templateVariables: readonly string[]
  ): Promise<BatchOutcome> {
    logMetaPromptStart();
    let text: string;
    try {
      const result = await this.retryPolicy.run(() => this.model.generate(metaPrompt));
      this.ledger.record(this.model.model, result.inputTokens, result.outputTokens);
      text = result.text.trim();
    } catch (error) {
      if (error instanceof ConfigurationError) throw error;
      return { status: 'failed', error: errorMessage(error) };
    }

    if (text === '') {
      return { status: 'failed', error: 'Model returned an empty response' };
    }
    if (mode.kind === 'prompt') {
      const kept = new Set(detectTemplateVariables(text));
      const dropped = templateVariables.filter((name) => !kept.has(name));
      if (dropped.length > 0) {
        return { status: 'rejected', droppedVariables: dropped };
      }
    }
    return { status: 'updated', content: text };
  }

  private recordBatch(
    batch: Batch,
    outcome: BatchOutcome,
    usage: Pick<BatchRecord, 'annotations' | 'cost' | 'inputTokens' | 'outputTokens' | 'durationMs'>
  ): BatchRecord {
    const record: BatchRecord = {
      index: batch.index,
      start: batch.start,
      end: batch.end,
      rowCount: batch.rows.length,
      tokenCount: batch.tokenCount,
      status: outcome.status,
      ...usage,
    };

    switch (outcome.status) {
      case 'updated':
        logBatchUpdated(usage.cost, this.ledger.spent, usage.durationMs);
        break;
      case 'rejected':
        record.droppedVariables = outcome.droppedVariables;
        logVariablesDropped(outcome.droppedVariables);
        break;
      case 'failed':
        record.error = outcome.error;
        logBatchFailed(outcome.error);
        break;
    }
    return record;
  }
}


import type { CellValue, DatasetRow, PromptRepresentation } from '../types.js';
import type {
  ExperimentLogContext,
  ExperimentOptions,
  ExperimentResult,
  LoopResult,
  Task,
} from './types.js';
import * as path from 'path';
import { ConfigurationError, DatasetError, OptimizationError } from '../library/errors.js';
import { assertColumns, loadDataset, withColumns } from '../dataset/dataset.js';
import { detectTemplateVariables, formatTemplateWithVars } from '../prompt/template.js';
import { editableContent } from '../prompt/prompt.js';
import type { PromptLearningOptimizer } from './optimizer.js';
import { runEvaluators } from './evaluators.js';
import { scoreRows, scorerLabel } from './scorers.js';
import { setOutputEnabled } from './ui.js';
import {
  createProgressUpdater,
  logCostLimitReached,
  logExperimentComplete,
  logExperimentHeader,
  logLogsWritten,
  logLoopStart,
  logRegressionDetected,
  logTaskFailures,
  logTaskStart,
  logTestScore,
  logThresholdReached,
  resolveLogPath,
  trackPromiseProgress,
  writeExperimentLogs,
} from './optimizer-logging.js';

interface TaskRun {
  rows: DatasetRow[];
  failures: number;
}

/**
 * Run the task over every row with the prompt filled in, `concurrency` rows
 * at a time. A row whose task fails gets a null output.
 */
async function runTask(
  task: Task,
  content: string,
  templateVariables: readonly string[],
  rows: readonly DatasetRow[],
  outputColumn: string,
  concurrency: number,
  split: 'train' | 'test'
): Promise<TaskRun> {
  logTaskStart(split, rows.length);
  const outputs: CellValue[] = [];
  let failures = 0;
  const progress = createProgressUpdater('rows');

  for (let offset = 0; offset < rows.length; offset += concurrency) {
    const chunk = rows.slice(offset, offset + concurrency);
    const settled = await trackPromiseProgress(
      // async so a row that cannot be rendered rejects like a failed task
      chunk.map(async (row) => task(formatTemplateWithVars(content, templateVariables, row), row)),
      (completed) => progress.update(offset + completed, rows.length)
    );
    for (const result of settled) {
      if (result.status === 'fulfilled') {
        outputs.push(result.value);
      } else {
        outputs.push(null);
        failures++;
      }
    }
  }
  progress.finish();

  if (failures > 0) logTaskFailures(failures, rows.length);
  return { rows: withColumns(rows, { [outputColumn]: outputs }), failures };
}

/**
 * `size` rows drawn without replacement, kept in dataset order.
 */
function sampleRows(rows: readonly DatasetRow[], size: number): readonly DatasetRow[] {
  if (size >= rows.length) return rows;
  const indices = rows.map((_, i) => i);
  for (let i = 0; i < size; i++) {
    const j = i + Math.floor(Math.random() * (indices.length - i));
    [indices[i], indices[j]] = [indices[j], indices[i]];
  }
  return indices
    .slice(0, size)
    .sort((a, b) => a - b)
    .map((i) => rows[i]);
}

function validateOptions(options: ExperimentOptions, threshold: number, loops: number): void {
  if (options.evaluators.length === 0 && (options.feedbackColumns?.length ?? 0) === 0) {
    throw new DatasetError('Either feedbackColumns or evaluators must be provided');
  }
  if (threshold < 0 || threshold > 1) {
    throw new ConfigurationError(`threshold must be between 0 and 1, got ${threshold}`);
  }
  if (!Number.isInteger(loops) || loops < 1) {
    throw new ConfigurationError(`loops must be a positive integer, got ${loops}`);
  }
  if (
    options.concurrency !== undefined &&
    (!Number.isInteger(options.concurrency) || options.concurrency < 1)
  ) {
    throw new ConfigurationError(
      `concurrency must be a positive integer, got ${options.concurrency}`
    );
  }
  if (
    options.trainSampleSize !== undefined &&
    (!Number.isInteger(options.trainSampleSize) || options.trainSampleSize < 1)
  ) {
    throw new ConfigurationError(
      `trainSampleSize must be a positive integer, got ${options.trainSampleSize}`
    );
  }
}

/**
 * Train/test loop around the optimizer: score the prompt on the test split,
 * stop once it reaches the threshold, otherwise run the task on the train
 * split, collect feedback and optimize. The highest-scoring prompt wins;
 * ties keep the earlier one.
 */
export async function optimizeWithExperiments(
  optimizer: PromptLearningOptimizer,
  options: ExperimentOptions
): Promise<ExperimentResult> {
  const { config } = optimizer;
  setOutputEnabled(config.logLevel !== 'silent');

  const threshold = options.threshold ?? config.optimizationThreshold;
  const maxLoops = options.loops ?? config.maxOptimizationLoops;
  const maxCost = options.maxCost ?? config.maxCost;
  validateOptions(options, threshold, maxLoops);

  const train = loadDataset(options.trainDataset);
  const test = loadDataset(options.testDataset);
  if (train.length === 0 || test.length === 0) {
    throw new DatasetError('Train and test datasets must both have rows');
  }

  // Only the baseline's variables are filled; the rewrite must keep them
  const templateVariables = detectTemplateVariables(
    editableContent(optimizer.prompt, optimizer.editableRole)
  );
  assertColumns(train, templateVariables);
  assertColumns(test, templateVariables);

  const startTime = new Date();
  const ledger = optimizer.pricing;
  const startCost = ledger.spent;
  const spent = (): number => ledger.spent - startCost;
  const concurrency = options.concurrency ?? Math.max(train.length, test.length);

  const logContext: ExperimentLogContext = {
    config,
    startTime,
    model: optimizer.model.model,
    threshold,
    maxLoops,
    maxCost,
    trainCount: train.length,
    testCount: test.length,
    scorer: scorerLabel(options.testScorer),
  };
  const logPath = resolveLogPath(options.storeLogs, config.outputDir, 'experiment', startTime);
  logExperimentHeader(logContext);

  let current = optimizer;
  let bestPrompt: PromptRepresentation = optimizer.prompt;
  let bestScore = -Infinity;
  let success = false;
  const loops: LoopResult[] = [];

  for (let loop = 0; ; loop++) {
    const loopStart = Date.now();
    const costBefore = ledger.spent;
    const content = editableContent(current.prompt, current.editableRole);
    logLoopStart(`${loop}/${maxLoops}`);

    // Score the current prompt
    const testRun = await runTask(
      options.task,
      content,
      templateVariables,
      test,
      options.outputColumn,
      concurrency,
      'test'
    );
    const scoredRows = options.testEvaluators
      ? (await runEvaluators(testRun.rows, options.testEvaluators)).rows
      : testRun.rows;
    const testScore = await scoreRows(options.testScorer, scoredRows);
    logTestScore(testScore, spent(), Date.now() - loopStart);

    if (testScore > bestScore) {
      bestScore = testScore;
      bestPrompt = current.prompt;
    } else {
      logRegressionDetected(bestScore);
    }

    const record: LoopResult = {
      loop,
      content,
      testScore,
      cost: 0,
      cumulativeCost: 0,
      durationMs: 0,
      taskFailures: testRun.failures,
    };
    const finishLoop = (): void => {
      record.cost = ledger.spent - costBefore;
      record.cumulativeCost = spent();
      record.durationMs = Date.now() - loopStart;
      loops.push(record);
    };

    if (testScore >= threshold) {
      success = true;
      logThresholdReached(threshold);
      finishLoop();
      break;
    }
    if (loop >= maxLoops) {
      finishLoop();
      break;
    }
    if (spent() >= maxCost) {
      logCostLimitReached(spent());
      finishLoop();
      break;
    }

    // Collect train feedback and refine
    const trainRun = await runTask(
      options.task,
      content,
      templateVariables,
      sampleRows(train, options.trainSampleSize ?? train.length),
      options.outputColumn,
      concurrency,
      'train'
    );
    record.taskFailures += trainRun.failures;

    const result = await current.optimize({
      dataset: trainRun.rows,
      outputColumn: options.outputColumn,
      feedbackColumns: options.feedbackColumns,
      evaluators: options.evaluators,
      annotatorPrompts: options.annotatorPrompts,
      contextSizeTokens: options.contextSizeTokens,
      // The ledger is shared, so the stop is on its running total
      maxCost: startCost + maxCost,
    });
    if (result.mode !== 'prompt') {
      throw new OptimizationError('Experiments optimize prompts, not rulesets');
    }
    record.batches = result.batches;
    finishLoop();

    if (result.stopReason === 'budget') {
      logCostLimitReached(spent());
      break;
    }
    current = current.withPrompt(result.prompt);
  }

  logExperimentComplete(bestScore, threshold, spent());

  let logFolder: string | undefined;
  if (logPath) {
    writeExperimentLogs(logPath, loops, logContext, success);
    logFolder = path.dirname(logPath);
    logLogsWritten(logFolder);
  }

  return {
    success,
    bestPrompt,
    bestScore,
    loops,
    usage: ledger.summary(),
    ...(logFolder !== undefined ? { logFolder } : {}),
  };
}

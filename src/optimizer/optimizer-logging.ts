import type { UsageSummary } from '../types.js';
import type {
  BatchRecord,
  ExperimentLogContext,
  LogContext,
  LoopResult,
  StopReason,
} from './types.js';
import * as fs from 'fs';
import * as path from 'path';
import {
  theme,
  spinner,
  print,
  isOutputEnabled,
  createProgressTracker,
  formatCost,
  formatCostShort,
  formatDuration,
  formatPercentage,
  formatTokens,
  type ProgressTracker,
} from './ui.js';

export type { LogContext, ExperimentLogContext };

// ═══════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════

/** How an optimize run ended, for reports */
export interface RunOutcome {
  stopReason: StopReason;
  skippedBatches: number;
  templateVariables: string[];
  usage: UsageSummary;
}

/** Full JSON report structure for one optimize run */
interface OptimizationReport {
  metadata: {
    timestamp: string;
    model: string;
    provider: string;
    mode: string;
    rowCount: number;
    contextSizeTokens: number;
    maxCost: number;
    templateVariables: string[];
  };
  summary: {
    totalBatches: number;
    updated: number;
    rejected: number;
    failed: number;
    skipped: number;
    stopReason: StopReason;
    totalDurationMs: number;
    totalCost: number;
    totalInputTokens: number;
    totalOutputTokens: number;
  };
  batches: BatchRecord[];
}

/** Full JSON report structure for one experiment run */
interface ExperimentReport {
  metadata: {
    timestamp: string;
    model: string;
    provider: string;
    scorer: string;
    threshold: number;
    maxLoops: number;
    maxCost: number;
    trainCount: number;
    testCount: number;
  };
  summary: {
    totalLoops: number;
    startScore: number;
    bestScore: number;
    bestLoop: number;
    thresholdMet: boolean;
    totalCost: number;
  };
  loops: Array<Omit<LoopResult, 'content'>>;
}

// ═══════════════════════════════════════════════════════════════════════════
// FORMATTERS
// ═══════════════════════════════════════════════════════════════════════════

function formatProgressBar(rate: number, width = 20): string {
  const clamped = Math.min(1, Math.max(0, rate));
  const filled = Math.round(clamped * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

function countByStatus(batches: readonly BatchRecord[]): Record<BatchRecord['status'], number> {
  const counts = { updated: 0, rejected: 0, failed: 0 };
  for (const batch of batches) counts[batch.status]++;
  return counts;
}

// ═══════════════════════════════════════════════════════════════════════════
// PROGRESS TRACKING
// ═══════════════════════════════════════════════════════════════════════════

/** Progress bar updater interface */
export interface ProgressUpdater {
  update(completed: number, total: number): void;
  finish(): void;
}

/**
 * Clear any active progress line before logging
 */
export function clearProgressLine(): void {
  if (!isOutputEnabled() || !process.stdout.isTTY) return;
  const width = process.stdout.columns || 80;
  process.stdout.write('\r' + ' '.repeat(width) + '\r');
}

function emit(line = ''): void {
  spinner.stop();
  clearProgressLine();
  print(line);
}

export function createProgressUpdater(label: string): ProgressUpdater {
  let tracker: ProgressTracker | null = null;

  return {
    update(completed: number, total: number) {
      if (!tracker) {
        tracker = createProgressTracker(label);
        tracker.start(total);
      }
      tracker.update(completed);
    },

    finish() {
      if (tracker) {
        tracker.stop();
        tracker = null;
      }
    },
  };
}

/**
 * Track progress of a set of promises, settling like Promise.allSettled
 */
export async function trackPromiseProgress<T>(
  promises: Promise<T>[],
  onProgress: (completed: number, total: number) => void
): Promise<PromiseSettledResult<T>[]> {
  if (promises.length === 0) {
    return [];
  }

  let completed = 0;
  const total = promises.length;
  onProgress(0, total);

  const wrapped = promises.map((promise) =>
    promise.then(
      (value): PromiseSettledResult<T> => {
        completed++;
        onProgress(completed, total);
        return { status: 'fulfilled', value };
      },
      (reason: unknown): PromiseSettledResult<T> => {
        completed++;
        onProgress(completed, total);
        return { status: 'rejected', reason };
      }
    )
  );

  return Promise.all(wrapped);
}

// ═══════════════════════════════════════════════════════════════════════════
// CONSOLE LOGGING: OPTIMIZE
// ═══════════════════════════════════════════════════════════════════════════

export function logOptimizerHeader(ctx: LogContext, batchCount: number): void {
  emit('');
  print(theme.bold('Prompt Learning Optimizer'));
  print(
    `  ${theme.dim('Model:')} ${ctx.model}${theme.separator}${theme.dim('Mode:')} ${ctx.mode}${theme.separator}${theme.dim('Rows:')} ${ctx.rowCount}${theme.separator}${theme.dim('Batches:')} ${batchCount}`
  );
  print(
    `  ${theme.dim('Context:')} ${formatTokens(ctx.contextSizeTokens)} tokens${theme.separator}${theme.dim('Budget:')} ${formatCostShort(ctx.maxCost)}`
  );
}

export function logEvaluatorsStart(count: number): void {
  emit('');
  print(`  ${theme.bold('Running evaluators')}`);
  spinner.start(`Running ${count} evaluator${count === 1 ? '' : 's'}...`);
}

export function logEvaluatorResult(index: number, columns: readonly string[]): void {
  emit(`    ${theme.check} Evaluator ${index + 1} ${theme.dim(`→ ${columns.join(', ')}`)}`);
}

export function logEvaluatorFailed(index: number, message: string): void {
  emit(`    ${theme.cross} Evaluator ${index + 1} failed ${theme.dim(`(${message})`)}`);
}

export function logBatchStart(label: string, batch: { start: number; end: number; tokenCount: number }): void {
  emit('');
  print(theme.divider(`Batch ${label}`));
  print(
    `  ${theme.dim('Rows:')} ${batch.start}-${batch.end - 1}${theme.separator}${theme.dim('Tokens:')} ${formatTokens(batch.tokenCount)}`
  );
}

export function logAnnotationStart(count: number): void {
  emit(`  ${theme.bold('Generating annotations')}`);
  spinner.start(`Running ${count} annotator${count === 1 ? '' : 's'}...`);
}

export function logAnnotationFailed(index: number, message: string): void {
  emit(`    ${theme.warn} ${theme.warning(`Annotator ${index + 1} failed`)} ${theme.dim(`(${message})`)}`);
}

export function logMetaPromptStart(): void {
  emit(`  ${theme.bold('Refining')}`);
  spinner.start('Waiting for model...');
}

export function logRetry(
  attempt: number,
  maxRetries: number,
  message: string,
  delayMs: number
): void {
  emit(
    `    ${theme.pointer} ${theme.warning(`Retry ${attempt}/${maxRetries}`)} in ${formatDuration(delayMs)} ${theme.dim(`(${message})`)}`
  );
  spinner.start('Waiting for model...');
}

export function logBatchUpdated(cost: number, cumulativeCost: number, durationMs: number): void {
  emit(
    `    ${theme.check} Updated${theme.separator}${theme.dim('Cost:')} ${formatCost(cost)}${theme.separator}${theme.dim('Total:')} ${formatCostShort(cumulativeCost)}${theme.separator}${theme.dim(formatDuration(durationMs))}`
  );
}

export function logBatchFailed(message: string): void {
  emit(`    ${theme.cross} ${theme.error('Batch failed, skipping')} ${theme.dim(`(${message})`)}`);
}

export function logVariablesDropped(dropped: readonly string[]): void {
  emit(
    `    ${theme.cross} ${theme.error('Rewrite rejected')} ${theme.dim(`(dropped ${dropped.map((v) => `{${v}}`).join(', ')})`)}`
  );
}

export function logBudgetReached(spent: number, maxCost: number, remainingBatches: number): void {
  emit(
    `    ${theme.warn} ${theme.warning('Budget reached')} ${theme.dim(`(${formatCostShort(spent)} of ${formatCostShort(maxCost)}, ${remainingBatches} batches skipped)`)}`
  );
}

export function logOptimizationComplete(
  batches: readonly BatchRecord[],
  outcome: RunOutcome
): void {
  const counts = countByStatus(batches);
  const total = batches.length + outcome.skippedBatches;

  emit('');
  print(theme.divider('Complete'));
  print('');

  const icon = counts.updated > 0 ? theme.check : theme.cross;
  print(`  ${icon} ${theme.bold('Updated:')} ${counts.updated}/${total} batches`);
  if (counts.rejected > 0 || counts.failed > 0 || outcome.skippedBatches > 0) {
    print(
      `  ${theme.dim('Rejected:')} ${counts.rejected}${theme.separator}${theme.dim('Failed:')} ${counts.failed}${theme.separator}${theme.dim('Skipped:')} ${outcome.skippedBatches}`
    );
  }
  print(
    `  ${theme.dim('Tokens:')} ${formatTokens(outcome.usage.totalInputTokens)} in / ${formatTokens(outcome.usage.totalOutputTokens)} out${theme.separator}${theme.dim('Total Cost:')} ${formatCostShort(outcome.usage.totalCost)}`
  );
}

export function logLogsWritten(logPath: string): void {
  emit(`  ${theme.dim('Logs written to:')} ${logPath}`);
  print('');
}

// ═══════════════════════════════════════════════════════════════════════════
// CONSOLE LOGGING: EXPERIMENTS
// ═══════════════════════════════════════════════════════════════════════════

export function logExperimentHeader(ctx: ExperimentLogContext): void {
  emit('');
  print(theme.bold('Prompt Learning Experiments'));
  print(
    `  ${theme.dim('Model:')} ${ctx.model}${theme.separator}${theme.dim('Scorer:')} ${ctx.scorer}${theme.separator}${theme.dim('Threshold:')} ${formatPercentage(ctx.threshold)}`
  );
  print(
    `  ${theme.dim('Train:')} ${ctx.trainCount}${theme.separator}${theme.dim('Test:')} ${ctx.testCount}${theme.separator}${theme.dim('Loops:')} ${ctx.maxLoops}${theme.separator}${theme.dim('Budget:')} ${formatCostShort(ctx.maxCost)}`
  );
}

export function logLoopStart(label: string): void {
  emit('');
  print(theme.divider(`Loop ${label}`));
  print('');
}

export function logTaskStart(split: 'train' | 'test', rowCount: number): void {
  emit(`  ${theme.bold(`Running task on ${split} split`)} ${theme.dim(`(${rowCount} rows)`)}`);
}

export function logTaskFailures(failed: number, total: number): void {
  emit(`    ${theme.warn} ${theme.warning(`${failed}/${total} task runs failed`)}`);
}

export function logTestScore(score: number, cumulativeCost: number, durationMs: number): void {
  const icon = score >= 0.9 ? theme.check : score >= 0.5 ? theme.warn : theme.cross;
  emit(
    `    ${icon} ${theme.bold(formatPercentage(score))} test score${theme.separator}${theme.dim('Total:')} ${formatCostShort(cumulativeCost)}${theme.separator}${theme.dim(formatDuration(durationMs))}`
  );
}

export function logRegressionDetected(bestScore: number): void {
  emit(
    `    ${theme.pointer} ${theme.warning('Regression')} ${theme.dim(`(best ${formatPercentage(bestScore)})`)}`
  );
}

export function logThresholdReached(threshold: number): void {
  emit(
    `    ${theme.check} ${theme.success('Threshold reached!')} ${theme.dim(`(${formatPercentage(threshold)})`)}`
  );
}

export function logCostLimitReached(cumulativeCost: number): void {
  emit(
    `    ${theme.warn} ${theme.warning('Cost limit reached')} ${theme.dim(`($${cumulativeCost.toFixed(2)})`)}`
  );
}

export function logExperimentComplete(
  bestScore: number,
  threshold: number,
  cumulativeCost: number
): void {
  emit('');
  print(theme.divider('Complete'));
  print('');

  const met = bestScore >= threshold;
  const icon = met ? theme.check : theme.cross;
  const scoreColor = met ? theme.success : theme.error;

  print(`  ${icon} ${theme.bold('Best:')} ${scoreColor(formatPercentage(bestScore))}`);
  print(
    `  ${theme.dim('Threshold:')} ${formatPercentage(threshold)}${theme.separator}${theme.dim('Total Cost:')} ${formatCostShort(cumulativeCost)}`
  );
}

// ═══════════════════════════════════════════════════════════════════════════
// MARKDOWN REPORT: OPTIMIZE
// ═══════════════════════════════════════════════════════════════════════════

function generateConfigSection(ctx: LogContext): string[] {
  return [
    '## Configuration',
    '| Setting | Value |',
    '|---------|-------|',
    `| Model | ${ctx.model} |`,
    `| Provider | ${ctx.config.provider} |`,
    `| Thinking | ${ctx.config.thinking ? 'Enabled' : 'Disabled'} |`,
    `| Mode | ${ctx.mode} |`,
    `| Rows | ${ctx.rowCount} |`,
    `| Context Size | ${ctx.contextSizeTokens} tokens |`,
    `| Max Cost | $${ctx.maxCost.toFixed(2)} |`,
    `| Max Retries | ${ctx.config.retry.maxRetries} |`,
    '',
  ];
}

function generateSummarySection(
  batches: readonly BatchRecord[],
  outcome: RunOutcome
): string[] {
  const counts = countByStatus(batches);
  const totalDuration = batches.reduce((sum, b) => sum + b.durationMs, 0);
  const variables =
    outcome.templateVariables.length > 0
      ? outcome.templateVariables.map((v) => `\`{${v}}\``).join(', ')
      : '(none)';

  return [
    '## Summary',
    '| Metric | Value |',
    '|--------|-------|',
    `| Batches | ${batches.length + outcome.skippedBatches} |`,
    `| Updated / Rejected / Failed | ${counts.updated} / ${counts.rejected} / ${counts.failed} |`,
    `| Skipped (budget) | ${outcome.skippedBatches} |`,
    `| Stop Reason | ${outcome.stopReason} |`,
    `| Template Variables | ${variables} |`,
    `| Total Duration | ${formatDuration(totalDuration)} |`,
    `| Total Tokens | ${formatTokens(outcome.usage.totalInputTokens)} in / ${formatTokens(outcome.usage.totalOutputTokens)} out |`,
    `| Total Cost | $${outcome.usage.totalCost.toFixed(4)} |`,
    '',
  ];
}

const STATUS_MARKS: Record<BatchRecord['status'], string> = {
  updated: '✓',
  rejected: '↺',
  failed: '✗',
};

function generateBatchTable(batches: readonly BatchRecord[]): string[] {
  const lines = [
    '## Batches',
    '| # | Rows | Tokens | Status | Annotations | Cost | Duration | Tokens In/Out |',
    '|---|------|--------|--------|-------------|------|----------|---------------|',
  ];

  for (const batch of batches) {
    const status = `${STATUS_MARKS[batch.status]} ${batch.status}`;
    const tokens = `${formatTokens(batch.inputTokens)} / ${formatTokens(batch.outputTokens)}`;
    lines.push(
      `| ${batch.index + 1} | ${batch.start}-${batch.end - 1} | ${batch.tokenCount} | ${status} | ${batch.annotations} | $${batch.cost.toFixed(4)} | ${formatDuration(batch.durationMs)} | ${tokens} |`
    );
  }

  lines.push('');
  lines.push('✓ = Updated | ↺ = Rejected | ✗ = Failed');
  lines.push('');

  const notes = batches.filter((b) => b.error !== undefined || b.droppedVariables !== undefined);
  if (notes.length > 0) {
    lines.push('### Notes');
    for (const batch of notes) {
      const note = batch.droppedVariables
        ? `dropped ${batch.droppedVariables.map((v) => `\`{${v}}\``).join(', ')}`
        : batch.error;
      lines.push(`- Batch ${batch.index + 1}: ${note}`);
    }
    lines.push('');
  }

  return lines;
}

export function generateLogContent(
  batches: readonly BatchRecord[],
  ctx: LogContext,
  outcome: RunOutcome
): string {
  const lines: string[] = [];

  lines.push('# Optimization Report');
  lines.push(`**Run:** ${ctx.startTime.toLocaleString()}`);
  lines.push('');

  lines.push(...generateConfigSection(ctx));
  lines.push(...generateSummarySection(batches, outcome));
  lines.push(...generateBatchTable(batches));

  lines.push('---');
  lines.push('Raw data: `rawData.json`');

  return lines.join('\n');
}

// ═══════════════════════════════════════════════════════════════════════════
// MARKDOWN REPORT: EXPERIMENTS
// ═══════════════════════════════════════════════════════════════════════════

function bestLoopOf(loops: readonly LoopResult[]): LoopResult | undefined {
  return loops.reduce<LoopResult | undefined>(
    (best, curr) => (!best || curr.testScore > best.testScore ? curr : best),
    undefined
  );
}

function generateLoopsTable(loops: readonly LoopResult[]): string[] {
  const best = bestLoopOf(loops);
  const lines = [
    '## Loops',
    '| # | Test Score | Task Failures | Cost | Duration |',
    '|---|------------|---------------|------|----------|',
  ];

  loops.forEach((loop, i) => {
    let indicator = '';
    if (loop === best) {
      indicator = ' ★';
    } else if (i > 0 && loop.testScore < loops[i - 1].testScore) {
      indicator = ' ↓';
    }
    lines.push(
      `| ${loop.loop} | ${formatPercentage(loop.testScore)}${indicator} | ${loop.taskFailures} | $${loop.cost.toFixed(4)} | ${formatDuration(loop.durationMs)} |`
    );
  });

  lines.push('');
  lines.push('★ = Best | ↓ = Regressed');
  lines.push('');
  return lines;
}

function generateProgressChart(loops: readonly LoopResult[], threshold: number): string[] {
  const best = bestLoopOf(loops);
  const lines = ['## Progression', '```'];
  for (const loop of loops) {
    let suffix = '';
    if (loop === best) suffix += ' ★';
    if (loop.testScore >= threshold) suffix += ' ✓';
    lines.push(
      `Loop ${loop.loop}: ${formatProgressBar(loop.testScore)} ${formatPercentage(loop.testScore)}  ${formatDuration(loop.durationMs)}${suffix}`
    );
  }
  lines.push('```');
  lines.push('');
  return lines;
}

export function generateExperimentLogContent(
  loops: readonly LoopResult[],
  ctx: ExperimentLogContext,
  success: boolean
): string {
  const best = bestLoopOf(loops);
  const first = loops[0];
  const totalCost = loops[loops.length - 1]?.cumulativeCost ?? 0;
  const lines: string[] = [];

  lines.push('# Experiment Report');
  lines.push(`**Run:** ${ctx.startTime.toLocaleString()}`);
  lines.push('');

  lines.push('## Configuration');
  lines.push('| Setting | Value |');
  lines.push('|---------|-------|');
  lines.push(`| Model | ${ctx.model} |`);
  lines.push(`| Provider | ${ctx.config.provider} |`);
  lines.push(`| Scorer | ${ctx.scorer} |`);
  lines.push(`| Threshold | ${formatPercentage(ctx.threshold)} |`);
  lines.push(`| Max Loops | ${ctx.maxLoops} |`);
  lines.push(`| Max Cost | $${ctx.maxCost.toFixed(2)} |`);
  lines.push(`| Train / Test Rows | ${ctx.trainCount} / ${ctx.testCount} |`);
  lines.push('');

  lines.push('## Summary');
  lines.push('| Metric | Value |');
  lines.push('|--------|-------|');
  lines.push(`| Loops | ${loops.length} |`);
  lines.push(
    `| Start -> Best | ${formatPercentage(first?.testScore ?? 0)} -> ${formatPercentage(best?.testScore ?? 0)} |`
  );
  lines.push(`| Best Loop | ${best?.loop ?? '-'} |`);
  lines.push(`| Threshold Met | ${success ? '✓ Yes' : '✗ No'} |`);
  lines.push(`| Total Cost | $${totalCost.toFixed(4)} |`);
  lines.push('');

  if (loops.length > 0) {
    lines.push(...generateLoopsTable(loops));
    lines.push(...generateProgressChart(loops, ctx.threshold));
  }

  lines.push('---');
  lines.push('Prompts: `prompts.md`');
  lines.push('Raw data: `rawData.json`');

  return lines.join('\n');
}

// ═══════════════════════════════════════════════════════════════════════════
// FILE WRITERS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Where reports go: the given summary path, or a timestamped folder under
 * the configured output directory.
 */
export function resolveLogPath(
  storeLogs: boolean | string | undefined,
  outputDir: string,
  prefix: string,
  startTime: Date
): string | undefined {
  if (!storeLogs) return undefined;
  if (typeof storeLogs === 'string') return storeLogs;
  return path.join(outputDir, `${prefix}_${startTime.getTime()}`, 'summary.md');
}

function ensureDir(dir: string): void {
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
}

export function writeLog(logPath: string, content: string): void {
  ensureDir(path.dirname(logPath));
  fs.writeFileSync(logPath, content, 'utf-8');
}

export function writeRawDataJson(
  folderPath: string,
  batches: readonly BatchRecord[],
  ctx: LogContext,
  outcome: RunOutcome
): void {
  const counts = countByStatus(batches);
  const report: OptimizationReport = {
    metadata: {
      timestamp: ctx.startTime.toISOString(),
      model: ctx.model,
      provider: ctx.config.provider,
      mode: ctx.mode,
      rowCount: ctx.rowCount,
      contextSizeTokens: ctx.contextSizeTokens,
      maxCost: ctx.maxCost,
      templateVariables: outcome.templateVariables,
    },
    summary: {
      totalBatches: batches.length + outcome.skippedBatches,
      updated: counts.updated,
      rejected: counts.rejected,
      failed: counts.failed,
      skipped: outcome.skippedBatches,
      stopReason: outcome.stopReason,
      totalDurationMs: batches.reduce((sum, b) => sum + b.durationMs, 0),
      totalCost: outcome.usage.totalCost,
      totalInputTokens: outcome.usage.totalInputTokens,
      totalOutputTokens: outcome.usage.totalOutputTokens,
    },
    batches: [...batches],
  };

  fs.writeFileSync(path.join(folderPath, 'rawData.json'), JSON.stringify(report, null, 2), 'utf-8');
}

/**
 * Write summary.md and rawData.json beside each other.
 */
export function writeFinalLogs(
  logPath: string,
  batches: readonly BatchRecord[],
  ctx: LogContext,
  outcome: RunOutcome
): void {
  const folderPath = path.dirname(logPath);
  ensureDir(folderPath);
  fs.writeFileSync(logPath, generateLogContent(batches, ctx, outcome), 'utf-8');
  writeRawDataJson(folderPath, batches, ctx, outcome);
}

function writePromptsFile(folderPath: string, loops: readonly LoopResult[], ctx: ExperimentLogContext): void {
  const best = bestLoopOf(loops);
  const lines: string[] = ['# Prompts Log', `**Run:** ${ctx.startTime.toLocaleString()}`, ''];

  for (const loop of loops) {
    lines.push(`## Loop ${loop.loop} | ${formatPercentage(loop.testScore)}`);
    lines.push('');
    lines.push('```');
    lines.push(loop.content);
    lines.push('```');
    lines.push('');
  }

  if (best) {
    lines.push('---');
    lines.push('');
    lines.push(`## Best Prompt (Loop ${best.loop}) | ${formatPercentage(best.testScore)}`);
    lines.push('');
    lines.push('```');
    lines.push(best.content);
    lines.push('```');
  }

  fs.writeFileSync(path.join(folderPath, 'prompts.md'), lines.join('\n'), 'utf-8');
}

/**
 * Write summary.md, prompts.md and rawData.json for an experiment run.
 */
export function writeExperimentLogs(
  logPath: string,
  loops: readonly LoopResult[],
  ctx: ExperimentLogContext,
  success: boolean
): void {
  const folderPath = path.dirname(logPath);
  ensureDir(folderPath);
  fs.writeFileSync(logPath, generateExperimentLogContent(loops, ctx, success), 'utf-8');
  writePromptsFile(folderPath, loops, ctx);

  const best = bestLoopOf(loops);
  const report: ExperimentReport = {
    metadata: {
      timestamp: ctx.startTime.toISOString(),
      model: ctx.model,
      provider: ctx.config.provider,
      scorer: ctx.scorer,
      threshold: ctx.threshold,
      maxLoops: ctx.maxLoops,
      maxCost: ctx.maxCost,
      trainCount: ctx.trainCount,
      testCount: ctx.testCount,
    },
    summary: {
      totalLoops: loops.length,
      startScore: loops[0]?.testScore ?? 0,
      bestScore: best?.testScore ?? 0,
      bestLoop: best?.loop ?? 0,
      thresholdMet: success,
      totalCost: loops[loops.length - 1]?.cumulativeCost ?? 0,
    },
    loops: loops.map(({ content: _content, ...rest }) => rest),
  };
  fs.writeFileSync(path.join(folderPath, 'rawData.json'), JSON.stringify(report, null, 2), 'utf-8');
}

import type { CellValue, DatasetRow, Evaluator, EvaluatorOutput } from '../types.js';
import { withColumns } from '../dataset/dataset.js';
import { errorMessage } from '../library/errors.js';
import {
  logEvaluatorFailed,
  logEvaluatorResult,
  logEvaluatorsStart,
} from './optimizer-logging.js';

export interface EvaluatorRun {
  /** Rows with every evaluator column added */
  rows: DatasetRow[];
  /** The given feedback columns followed by the new ones, without repeats */
  feedbackColumns: string[];
  /** Evaluators (by index) that threw or returned malformed output */
  failures: Array<{ index: number; error: string }>;
}

function checkOutput(output: EvaluatorOutput, rowCount: number): string | undefined {
  const entries = Object.entries(output);
  if (entries.length === 0) return 'returned no columns';
  for (const [column, values] of entries) {
    if (!Array.isArray(values)) return `column "${column}" is not an array`;
    if (values.length !== rowCount) {
      return `column "${column}" has ${values.length} values for ${rowCount} rows`;
    }
  }
  return undefined;
}

/**
 * Run evaluators in order, each seeing the columns added by the ones before
 * it. A failing evaluator is logged and skipped; the others still apply.
 */
export async function runEvaluators(
  rows: readonly DatasetRow[],
  evaluators: readonly Evaluator[],
  feedbackColumns: readonly string[] = []
): Promise<EvaluatorRun> {
  let current: DatasetRow[] = [...rows];
  const columns = new Set(feedbackColumns);
  const failures: EvaluatorRun['failures'] = [];

  if (evaluators.length === 0) {
    return { rows: current, feedbackColumns: [...columns], failures };
  }

  logEvaluatorsStart(evaluators.length);

  for (const [index, evaluator] of evaluators.entries()) {
    let output: EvaluatorOutput;
    try {
      output = await evaluator(current);
    } catch (error) {
      const message = errorMessage(error);
      failures.push({ index, error: message });
      logEvaluatorFailed(index, message);
      continue;
    }

    const problem = checkOutput(output, current.length);
    if (problem !== undefined) {
      failures.push({ index, error: problem });
      logEvaluatorFailed(index, problem);
      continue;
    }

    const added: Record<string, CellValue[]> = output;
    current = withColumns(current, added);
    for (const column of Object.keys(added)) columns.add(column);
    logEvaluatorResult(index, Object.keys(added));
  }

  return { rows: current, feedbackColumns: [...columns], failures };
}

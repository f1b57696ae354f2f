import type { DatasetRow } from '../types.js';
import { compileTemplate, formatCell, renderTemplate } from '../prompt/template.js';
import {
  META_PROMPT_SPEC,
  META_PROMPT_TEMPLATE,
  NO_ANNOTATIONS,
  RULESET_META_PROMPT_SPEC,
  RULESET_META_PROMPT_TEMPLATE,
} from './prompts.js';

export interface MetaPromptInput {
  /** Current candidate prompt (or the static prompt in ruleset mode) */
  candidate: string;
  rows: readonly DatasetRow[];
  /** Dataset index of the first row, used to number examples */
  startIndex?: number;
  templateVariables: readonly string[];
  feedbackColumns: readonly string[];
  outputColumn: string;
  annotations?: readonly string[];
  /** Present in ruleset mode: the ruleset being edited */
  ruleset?: string;
}

function feedbackLines(row: DatasetRow, feedbackColumns: readonly string[]): string[] {
  return feedbackColumns.map((column) => `${column}: ${formatCell(row[column])}`);
}

function variableLines(row: DatasetRow, templateVariables: readonly string[]): string[] {
  if (templateVariables.length === 0) return ['  (no template variables)'];
  return templateVariables.map((name) => `  ${name}: ${formatCell(row[name])}`);
}

/**
 * Examples for the prompt-rewrite template: inputs, output and feedback.
 */
export function formatPromptExamples(input: MetaPromptInput): string {
  const start = input.startIndex ?? 0;
  return input.rows
    .map((row, i) =>
      [
        `Example ${start + i}`,
        '',
        'Data for baseline prompt:',
        ...variableLines(row, input.templateVariables),
        '',
        `LLM Output using baseline prompt: ${formatCell(row[input.outputColumn])}`,
        '',
        'Output level feedback:',
        ...feedbackLines(row, input.feedbackColumns),
      ].join('\n')
    )
    .join('\n\n');
}

/**
 * Examples for the ruleset template: the agent's output and feedback.
 */
export function formatRulesetExamples(input: MetaPromptInput): string {
  const start = input.startIndex ?? 0;
  return input.rows
    .map((row, i) =>
      [
        `Example ${start + i}`,
        '',
        `coding agent patch: ${formatCell(row[input.outputColumn])}`,
        '',
        ...feedbackLines(row, input.feedbackColumns),
      ].join('\n')
    )
    .join('\n\n');
}

/**
 * Builds the meta-prompt that asks a model to improve a prompt or ruleset.
 * Custom templates are checked for their variables up front.
 */
export class MetaPrompt {
  readonly template: string;
  readonly rulesetTemplate: string;

  constructor(
    options: { template?: string; rulesetTemplate?: string } = {}
  ) {
    this.template = compileTemplate(
      options.template ?? META_PROMPT_TEMPLATE,
      META_PROMPT_SPEC,
      'meta-prompt template'
    );
    this.rulesetTemplate = compileTemplate(
      options.rulesetTemplate ?? RULESET_META_PROMPT_TEMPLATE,
      RULESET_META_PROMPT_SPEC,
      'ruleset meta-prompt template'
    );
  }

  render(input: MetaPromptInput): string {
    const annotations =
      input.annotations && input.annotations.length > 0
        ? input.annotations.join('\n')
        : NO_ANNOTATIONS;

    // Row values are escaped while formatting; the blocks go in as they are
    if (input.ruleset !== undefined) {
      return renderTemplate(
        this.rulesetTemplate,
        {
          baseline_prompt: input.candidate,
          ruleset: input.ruleset,
          examples: formatRulesetExamples(input),
          annotations,
        },
        { verbatim: ['baseline_prompt', 'ruleset', 'examples', 'annotations'] }
      );
    }

    return renderTemplate(
      this.template,
      {
        baseline_prompt: input.candidate,
        examples: formatPromptExamples(input),
        annotations,
      },
      { verbatim: ['baseline_prompt', 'examples', 'annotations'] }
    );
  }
}

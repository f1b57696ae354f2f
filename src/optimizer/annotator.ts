import type { DatasetRow, LanguageModel } from '../types.js';
import type { PricingCalculator } from '../pricing/pricing.js';
import { RetryPolicy } from '../library/retry.js';
import { compileTemplate, formatCell, renderTemplate } from '../prompt/template.js';
import { ANNOTATION_PROMPT_SPEC, ANNOTATION_PROMPT_TEMPLATE } from './prompts.js';

export interface AnnotationInput {
  baselinePrompt: string;
  rows: readonly DatasetRow[];
  startIndex?: number;
  templateVariables: readonly string[];
  feedbackColumns: readonly string[];
  outputColumn: string;
  groundTruthColumn?: string;
}

export interface AnnotatorOptions {
  model: LanguageModel;
  template?: string;
  retryPolicy?: RetryPolicy;
  /** Usage of annotation calls is recorded here when given */
  pricing?: PricingCalculator;
}

function formatAnnotationExamples(input: AnnotationInput): string {
  const start = input.startIndex ?? 0;
  return input.rows
    .map((row, i) => {
      const inputs = input.templateVariables.map((name) => `  ${name}: ${formatCell(row[name])}`);
      const groundTruth =
        input.groundTruthColumn !== undefined ? formatCell(row[input.groundTruthColumn]) : 'N/A';
      return [
        `Example ${start + i}`,
        '',
        'Input:',
        ...(inputs.length > 0 ? inputs : ['  (no template variables)']),
        '',
        `Output: ${formatCell(row[input.outputColumn])}`,
        '',
        `Ground Truth: ${groundTruth}`,
        '',
        'Feedback:',
        ...input.feedbackColumns.map((column) => `${column}: ${formatCell(row[column])}`),
      ].join('\n');
    })
    .join('\n\n');
}

/**
 * Pre-digests a batch's feedback into prose for the meta-prompt.
 */
export class Annotator {
  readonly template: string;
  private readonly model: LanguageModel;
  private readonly retryPolicy: RetryPolicy;
  private readonly pricing?: PricingCalculator;

  constructor(options: AnnotatorOptions) {
    this.template = compileTemplate(
      options.template ?? ANNOTATION_PROMPT_TEMPLATE,
      ANNOTATION_PROMPT_SPEC,
      'annotation template'
    );
    this.model = options.model;
    this.retryPolicy = options.retryPolicy ?? new RetryPolicy();
    this.pricing = options.pricing;
  }

  render(input: AnnotationInput): string {
    return renderTemplate(
      this.template,
      {
        baseline_prompt: input.baselinePrompt,
        examples: formatAnnotationExamples(input),
      },
      { verbatim: ['baseline_prompt', 'examples'] }
    );
  }

  async generateAnnotation(renderedPrompt: string): Promise<string> {
    const result = await this.retryPolicy.run(() => this.model.generate(renderedPrompt));
    this.pricing?.record(this.model.model, result.inputTokens, result.outputTokens);
    return result.text.trim();
  }
}

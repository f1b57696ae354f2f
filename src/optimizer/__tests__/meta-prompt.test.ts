import { describe, it, expect } from 'vitest';
import { MetaPrompt, formatPromptExamples, formatRulesetExamples } from '../meta-prompt.js';
import type { MetaPromptInput } from '../meta-prompt.js';
import { META_PROMPT_TEMPLATE, NO_ANNOTATIONS } from '../prompts.js';
import { ConfigurationError } from '../../library/errors.js';

const input: MetaPromptInput = {
  candidate: 'Answer {question}',
  rows: [
    { question: '2+2?', output: '4', feedback: 'correct' },
    { question: 'Capital of {France}?', output: null, feedback: 'missing answer' },
  ],
  startIndex: 3,
  templateVariables: ['question'],
  feedbackColumns: ['feedback'],
  outputColumn: 'output',
};

describe('formatPromptExamples', () => {
  it('numbers examples from the batch start and escapes row values', () => {
    expect(formatPromptExamples(input)).toBe(
      [
        'Example 3',
        '',
        'Data for baseline prompt:',
        '  question: 2+2?',
        '',
        'LLM Output using baseline prompt: 4',
        '',
        'Output level feedback:',
        'feedback: correct',
        '',
        'Example 4',
        '',
        'Data for baseline prompt:',
        '  question: Capital of  France ?',
        '',
        'LLM Output using baseline prompt: None',
        '',
        'Output level feedback:',
        'feedback: missing answer',
      ].join('\n')
    );
  });

  it('notes a prompt without template variables', () => {
    const text = formatPromptExamples({ ...input, rows: [input.rows[0]], templateVariables: [] });
    expect(text.split('\n')[3]).toBe('  (no template variables)');
  });
});

describe('formatRulesetExamples', () => {
  it('shows the output as the agent patch with feedback', () => {
    expect(formatRulesetExamples({ ...input, rows: [input.rows[0]], startIndex: 0 })).toBe(
      'Example 0\n\ncoding agent patch: 4\n\nfeedback: correct'
    );
  });
});

describe('MetaPrompt', () => {
  it('uses the default templates', () => {
    expect(new MetaPrompt().template).toBe(META_PROMPT_TEMPLATE);
  });

  it('fills a custom template and keeps the candidate verbatim', () => {
    const metaPrompt = new MetaPrompt({ template: 'P={baseline_prompt}|E={examples}|A={annotations}' });
    const single = { ...input, rows: [input.rows[0]] };

    expect(metaPrompt.render(single)).toBe(
      `P=Answer {question}|E=${formatPromptExamples(single)}|A=${NO_ANNOTATIONS}`
    );
  });

  it('joins annotations one per line', () => {
    const metaPrompt = new MetaPrompt({ template: '{baseline_prompt}{examples}\n{annotations}' });

    const rendered = metaPrompt.render({ ...input, annotations: ['First note', 'Second note'] });

    expect(rendered.endsWith('\nFirst note\nSecond note')).toBe(true);
  });

  it('renders the ruleset template in ruleset mode', () => {
    const metaPrompt = new MetaPrompt({
      rulesetTemplate: 'P={baseline_prompt}|R={ruleset}|E={examples}',
    });
    const single = { ...input, rows: [input.rows[0]], startIndex: 0 };

    expect(metaPrompt.render({ ...single, ruleset: '- be brief' })).toBe(
      `P=Answer {question}|R=- be brief|E=${formatRulesetExamples(single)}`
    );
  });

  it('rejects a template without the examples placeholder', () => {
    expect(() => new MetaPrompt({ template: 'Improve {baseline_prompt}' })).toThrow(
      'meta-prompt template is missing required variables: {examples}'
    );
  });

  it('rejects a ruleset template without the ruleset placeholder', () => {
    expect(
      () => new MetaPrompt({ rulesetTemplate: '{baseline_prompt} {examples}' })
    ).toThrow(ConfigurationError);
  });
});

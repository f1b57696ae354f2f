import type { TemplateSpec } from '../prompt/template.js';

/**
 * Default meta-prompt for free-form prompt rewriting.
 * Shows the model the current prompt, a batch of examples with feedback and
 * any annotations, and asks for a revised prompt.
 */
export const META_PROMPT_TEMPLATE = `
You are an expert in prompt optimization. Given the original baseline prompt and the following associated metadata (such as model inputs, outputs, evaluation labels and explanations),
generate a revised version of the original prompt that would likely improve results with respect to the evaluation labels.
Your goal is to align the prompt with the feedback and evaluation criteria.

BELOW IS THE ORIGINAL BASELINE PROMPT
************* start prompt *************

{baseline_prompt}
************* end prompt *************

BELOW ARE THE EXAMPLES USING THE ABOVE PROMPT
************* start example data *************

{examples}
************* end example data *************

HERE ARE SOME ANNOTATIONS THAT MAY BE HELPFUL:
{annotations}

FINAL INSTRUCTIONS
Iterate on the original prompt (above) with a new prompt that will improve the results, based on the examples and feedback above.

A common best practice in prompt optimization is to add guidelines and the most helpful few shot examples.

Note: Keep every template variable from the original prompt, written exactly as it appears there: a variable name wrapped in single curly brackets.
If you drop one, the LLM will not be able to access the required data.
Do not put curly brackets around anything other than the variables from the original prompt.
Copy the exact return instructions from the original prompt. Do not add any brackets there.

YOUR NEW PROMPT:
`;

/**
 * Default meta-prompt for ruleset editing.
 * The baseline prompt is static; only the dynamic ruleset may change.
 */
export const RULESET_META_PROMPT_TEMPLATE = `
You are an expert in coding agent prompt optimization.
Your goal is to improve the dynamic ruleset that guides the coding agent.

Process:
1. Carefully review the baseline prompt, the current dynamic ruleset, examples, and annotations.
2. Identify high-level issues in the baseline prompt and dynamic ruleset. Focus on missing guidance, vague constraints, or areas where rules could be made more reliable.
3. Revise the dynamic ruleset so it generalizes well beyond the provided examples.

BELOW IS THE ORIGINAL BASELINE PROMPT WITH STATIC RULESET
************* start prompt *************

{baseline_prompt}
************* end prompt *************

BELOW IS THE CURRENT DYNAMIC RULESET (CHANGE THESE OR ADD NEW RULES)
************* start ruleset *************

{ruleset}
************* end ruleset *************

BELOW ARE THE EXAMPLES USING THE ABOVE PROMPT
************* start example data *************

{examples}
************* end example data *************

HERE ARE SOME ANNOTATIONS THAT MAY BE HELPFUL:
{annotations}

FINAL INSTRUCTIONS
Iterate on the **dynamic ruleset only**. You may:
- Add new rules
- Edit or strengthen existing rules

Important constraints:
- Do **not** modify the static rules in the baseline prompt.
- Do **not** add rules that request user input, confirmations, or follow-up questions. The coding agent should always act autonomously.
- Keep the ruleset concise. Avoid rules that only patch the given examples.

Output format:
- Return only the final, revised dynamic ruleset as a bullet-point list.
- Do not include any extra commentary, explanations, or text outside the ruleset.

New ruleset:
`;

/**
 * Default prompt for batch annotations.
 * Asks for a qualitative summary of the feedback, not a new prompt.
 */
export const ANNOTATION_PROMPT_TEMPLATE = `
You are reviewing the results of an LLM prompt against evaluator feedback.

BELOW IS THE PROMPT THAT PRODUCED THE OUTPUTS
************* start prompt *************

{baseline_prompt}
************* end prompt *************

BELOW ARE THE EXAMPLES
************* start example data *************

{examples}
************* end example data *************

Write a short annotation for the person improving this prompt.
Summarize the recurring failure patterns in the feedback, what the outputs get right, and which instructions in the prompt appear to cause the failures.
Do not rewrite the prompt. Do not quote examples verbatim.
`;

export const META_PROMPT_SPEC: TemplateSpec = {
  required: ['baseline_prompt', 'examples'],
  allowed: ['baseline_prompt', 'examples', 'annotations'],
};

export const RULESET_META_PROMPT_SPEC: TemplateSpec = {
  required: ['baseline_prompt', 'ruleset', 'examples'],
  allowed: ['baseline_prompt', 'ruleset', 'examples', 'annotations'],
};

export const ANNOTATION_PROMPT_SPEC: TemplateSpec = {
  required: ['examples'],
  allowed: ['baseline_prompt', 'examples'],
};

export const NO_ANNOTATIONS = 'None provided.';

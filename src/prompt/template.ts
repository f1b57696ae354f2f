import type { CellValue } from '../types.js';
import { END_DELIM, START_DELIM } from '../library/constants.js';
import { ConfigurationError, DatasetError } from '../library/errors.js';

// A bare identifier in single braces is the only placeholder syntax
const TEMPLATE_VARIABLE_RE = /\{([A-Za-z_][A-Za-z0-9_]*)\}/g;

/**
 * Unique `{name}` placeholders, in order of first appearance.
 */
export function detectTemplateVariables(text: string): string[] {
  const names = new Set<string>();
  for (const match of text.matchAll(TEMPLATE_VARIABLE_RE)) {
    names.add(match[1]);
  }
  return [...names];
}

/**
 * Replace template delimiters inside a value with spaces so the value can
 * neither open nor close a placeholder once inserted.
 */
export function escapeTemplateValue(value: string): string {
  return value.split(START_DELIM).join(' ').split(END_DELIM).join(' ');
}

/**
 * Render a cell for display in a prompt. Missing values read as "None".
 */
export function formatCell(value: CellValue | undefined): string {
  if (value === null || value === undefined) return 'None';
  return escapeTemplateValue(String(value));
}

export interface RenderOptions {
  /** Names whose values are inserted without escaping */
  verbatim?: readonly string[];
}

/**
 * Substitute `{name}` placeholders in a single pass. Placeholders without a
 * value are left as they are, and inserted text is never scanned again.
 */
export function renderTemplate(
  template: string,
  values: Readonly<Record<string, string>>,
  options: RenderOptions = {}
): string {
  const verbatim = new Set(options.verbatim ?? []);
  return template.replace(TEMPLATE_VARIABLE_RE, (placeholder, name: string) => {
    if (!Object.prototype.hasOwnProperty.call(values, name)) return placeholder;
    const value = values[name];
    return verbatim.has(name) ? value : escapeTemplateValue(value);
  });
}

export interface TemplateSpec {
  required: readonly string[];
  allowed: readonly string[];
}

/**
 * Check that a template declares every required variable and nothing
 * outside the allowed set. Returns the template unchanged.
 */
export function compileTemplate(template: string, spec: TemplateSpec, label = 'template'): string {
  const found = detectTemplateVariables(template);
  const missing = spec.required.filter((name) => !found.includes(name));
  const unknown = found.filter((name) => !spec.allowed.includes(name));

  if (missing.length > 0) {
    throw new ConfigurationError(
      `${label} is missing required variables: ${missing.map((n) => `{${n}}`).join(', ')}`
    );
  }
  if (unknown.length > 0) {
    throw new ConfigurationError(
      `${label} has undeclared variables: ${unknown.map((n) => `{${n}}`).join(', ')}`
    );
  }
  return template;
}

/**
 * Fill declared variables with one row's values, matching `{name}` exactly.
 */
export function formatTemplateWithVars(
  template: string,
  templateVariables: readonly string[],
  values: Readonly<Record<string, CellValue | undefined>>
): string {
  let result = template;
  for (const name of templateVariables) {
    if (!(name in values)) {
      throw new DatasetError(`No value for template variable {${name}}`);
    }
    const value = values[name];
    const text = value === null || value === undefined ? '' : escapeTemplateValue(String(value));
    result = result.split(`${START_DELIM}${name}${END_DELIM}`).join(text);
  }
  return result;
}

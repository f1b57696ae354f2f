import { getEncoding, type Tiktoken, type TiktokenEncoding } from 'js-tiktoken';
import type { CellValue, DatasetRow } from '../types.js';
import {
  APPROXIMATE_CHARS_PER_TOKEN,
  DEFAULT_TIKTOKEN_ENCODING,
} from '../library/constants.js';

/**
 * Measures the token cost of text.
 */
export interface TokenCounter {
  /** Tokens in a single value. Absent or empty values count as zero. */
  count(text: CellValue | undefined): number;
  /** One total per row, summed over the named columns present in the row. */
  countRows(rows: readonly DatasetRow[], columns: readonly string[]): number[];
  /** Cheaper approximation, for when exactness is not required. */
  estimate(text: CellValue | undefined): number;
}

function toText(value: CellValue | undefined): string {
  if (value === null || value === undefined) return '';
  return String(value);
}

abstract class BaseTokenCounter implements TokenCounter {
  abstract count(text: CellValue | undefined): number;
  abstract estimate(text: CellValue | undefined): number;

  countRows(rows: readonly DatasetRow[], columns: readonly string[]): number[] {
    return rows.map((row) =>
      columns.reduce(
        (total, column) => (column in row ? total + this.count(row[column]) : total),
        0
      )
    );
  }
}

// Encoders are large; share one per encoding across counters
const encoders = new Map<TiktokenEncoding, Tiktoken>();

function encoderFor(encoding: TiktokenEncoding): Tiktoken {
  let encoder = encoders.get(encoding);
  if (!encoder) {
    encoder = getEncoding(encoding);
    encoders.set(encoding, encoder);
  }
  return encoder;
}

const O200K_FAMILIES = ['gpt-4o', 'gpt-4.1', 'gpt-5', 'o1', 'o3', 'o4'];

/**
 * The encoding that matches a model family. Models outside the OpenAI
 * families get cl100k_base, which is a reasonable estimate for most.
 */
export function encodingForModel(model: string): TiktokenEncoding {
  const lower = model.toLowerCase();
  return O200K_FAMILIES.some((family) => lower === family || lower.startsWith(`${family}-`))
    ? 'o200k_base'
    : DEFAULT_TIKTOKEN_ENCODING;
}

/**
 * Exact count using a sub-word encoding.
 */
export class TiktokenCounter extends BaseTokenCounter {
  readonly encoding: TiktokenEncoding;
  private readonly encoder: Tiktoken;

  constructor(options: { encoding?: TiktokenEncoding; model?: string } = {}) {
    super();
    this.encoding =
      options.encoding ??
      (options.model ? encodingForModel(options.model) : DEFAULT_TIKTOKEN_ENCODING);
    this.encoder = encoderFor(this.encoding);
  }

  count(text: CellValue | undefined): number {
    const value = toText(text);
    if (value === '') return 0;
    // Special-token markup in data is counted as plain text
    return this.encoder.encode(value, [], []).length;
  }

  // Exact count is fast enough to stand in for the estimate
  estimate(text: CellValue | undefined): number {
    return this.count(text);
  }
}

/**
 * Character-based approximation: one token per four characters, rounded down.
 * A row is rounded once, over the characters of all its columns.
 */
export class ApproximateCounter extends BaseTokenCounter {
  count(text: CellValue | undefined): number {
    return Math.floor(toText(text).length / APPROXIMATE_CHARS_PER_TOKEN);
  }

  countRows(rows: readonly DatasetRow[], columns: readonly string[]): number[] {
    return rows.map((row) => {
      const chars = columns.reduce(
        (total, column) => (column in row ? total + toText(row[column]).length : total),
        0
      );
      return Math.floor(chars / APPROXIMATE_CHARS_PER_TOKEN);
    });
  }

  estimate(text: CellValue | undefined): number {
    return this.count(text);
  }
}

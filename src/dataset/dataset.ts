import * as fs from 'fs';
import * as path from 'path';
import { parse as parseCsv } from 'csv-parse/sync';
import { z } from 'zod';
import type { CellValue, DatasetRow, DatasetSource } from '../types.js';
import { DatasetError, errorMessage } from '../library/errors.js';

const rowsSchema = z.array(z.record(z.string(), z.unknown()), {
  invalid_type_error: 'dataset must be an array of objects',
});

function toCell(value: unknown): CellValue {
  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') {
    return value;
  }
  // Nested values are kept as their JSON text
  return JSON.stringify(value);
}

function normalizeRows(records: unknown, origin: string): DatasetRow[] {
  const parsed = rowsSchema.safeParse(records);
  if (!parsed.success) {
    throw new DatasetError(
      `Failed to load dataset from ${origin}: ${parsed.error.issues[0]?.message ?? 'invalid rows'}`,
      { cause: parsed.error }
    );
  }
  return parsed.data.map((record) =>
    Object.fromEntries(
      Object.entries(record).map(([column, value]): [string, CellValue] => [column, toCell(value)])
    )
  );
}

function parseJsonLines(text: string): unknown[] {
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim() !== '')
    .map((line): unknown => JSON.parse(line));
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    // Not a single document: try one object per line
    try {
      return parseJsonLines(text);
    } catch {
      throw error;
    }
  }
}

function readDatasetFile(filePath: string): DatasetRow[] {
  let text: string;
  try {
    text = fs.readFileSync(filePath, 'utf-8');
  } catch (error) {
    throw new DatasetError(`Failed to load dataset from ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const extension = path.extname(filePath).toLowerCase();
  let records: unknown;
  try {
    if (extension === '.csv') {
      const csvRows: unknown = parseCsv(text, {
        columns: true,
        skip_empty_lines: true,
        cast: true,
      });
      records = csvRows;
    } else if (extension === '.jsonl' || extension === '.ndjson') {
      records = parseJsonLines(text);
    } else {
      records = parseJson(text);
    }
  } catch (error) {
    throw new DatasetError(`Failed to load dataset from ${filePath}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const rows = normalizeRows(records, filePath);
  // CSV has no null; an empty cell is a missing value
  return extension === '.csv'
    ? rows.map((row) =>
        Object.fromEntries(
          Object.entries(row).map(([column, value]): [string, CellValue] => [
            column,
            value === '' ? null : value,
          ])
        )
      )
    : rows;
}

/**
 * Load rows from memory or from a JSON array, JSON Lines or CSV file.
 * In-memory rows are copied so callers' data is never mutated.
 */
export function loadDataset(source: DatasetSource): DatasetRow[] {
  if (typeof source === 'string') {
    return readDatasetFile(source);
  }
  return normalizeRows(source, 'memory');
}

/**
 * Column names across all rows, in order of first appearance.
 */
export function columnsOf(rows: readonly DatasetRow[]): string[] {
  const columns = new Set<string>();
  for (const row of rows) {
    for (const column of Object.keys(row)) columns.add(column);
  }
  return [...columns];
}

/**
 * Throws a DatasetError listing every required column absent from the data.
 */
export function assertColumns(rows: readonly DatasetRow[], required: readonly string[]): void {
  const present = new Set(columnsOf(rows));
  const missing = required.filter((column) => !present.has(column));
  if (missing.length > 0) {
    throw new DatasetError(`Dataset missing required columns: ${missing.join(', ')}`);
  }
}

/**
 * A copy of `rows` with the given columns added (or replaced).
 */
export function withColumns(
  rows: readonly DatasetRow[],
  columns: Readonly<Record<string, readonly CellValue[]>>
): DatasetRow[] {
  return rows.map((row, index) => {
    const next: DatasetRow = { ...row };
    for (const [column, values] of Object.entries(columns)) {
      next[column] = values[index] ?? null;
    }
    return next;
  });
}

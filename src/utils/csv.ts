/**
 * CSV Utilities for transaction imports
 *
 * Streams CSV input through csv-parser so statement exports of any size
 * are handled row by row. Each importer supplies its required columns and
 * a row parser; this module takes care of headers, row numbering and
 * error collection.
 */

import { createReadStream } from 'fs';
import { Readable } from 'stream';
import { EventEmitter } from 'events';
import csvParser from 'csv-parser';
import { ImportError } from './AppError';

// ============================================
// Types
// ============================================

/**
 * Raw CSV row keyed by (trimmed) header
 */
export type CsvRow = Record<string, string | undefined>;

/**
 * Result of parsing a single row
 */
export type RowParseResult<T> =
  | { status: 'valid'; data: T; rowNumber: number }
  | { status: 'invalid'; error: string; rowNumber: number }
  | { status: 'skipped'; reason: string; rowNumber: number };

export type RowParser<T> = (row: CsvRow, rowNumber: number) => RowParseResult<T>;

export interface RowError {
  rowNumber: number;
  error: string;
}

export interface CsvParseStats {
  total: number;
  valid: number;
  invalid: number;
  skipped: number;
}

export interface CsvParseResult<T> {
  rows: T[];
  errors: RowError[];
  stats: CsvParseStats;
}

/**
 * A file path or an already-open stream (e.g. an uploaded buffer)
 */
export type CsvInput = string | Readable;

// ============================================
// Row helpers
// ============================================

export const valid = <T>(data: T, rowNumber: number): RowParseResult<T> => ({
  status: 'valid',
  data,
  rowNumber,
});

export const invalid = <T>(error: string, rowNumber: number): RowParseResult<T> => ({
  status: 'invalid',
  error,
  rowNumber,
});

export const skipped = <T>(reason: string, rowNumber: number): RowParseResult<T> => ({
  status: 'skipped',
  reason,
  rowNumber,
});

/**
 * Trimmed cell value, undefined when the column is absent or blank
 */
export function cell(row: CsvRow, column: string): string | undefined {
  const value = row[column]?.trim();
  return value ? value : undefined;
}

// ============================================
// Validation Functions
// ============================================

/**
 * Validates that all required columns are present in the CSV headers.
 * Header names are compared after trimming; case matters.
 */
export function validateCsvHeaders(
  headers: readonly string[],
  required: readonly string[]
): { valid: boolean; missing: string[] } {
  const present = new Set(headers.map((h) => h.trim()));
  const missing = required.filter((col) => !present.has(col));

  return {
    valid: missing.length === 0,
    missing,
  };
}

const utcDate = (year: number, month: number, day: number): Date | null => {
  const date = new Date(Date.UTC(year, month - 1, day));
  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }
  return date;
};

/**
 * Parses D/M/YYYY (a trailing time such as "23:18" is ignored)
 */
export function parseDayMonthYear(value: string): Date | null {
  const match = value.trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s.*)?$/);
  if (!match) return null;
  const [, day, month, year] = match;
  return utcDate(Number(year), Number(month), Number(day));
}

/**
 * Parses M/D/YYYY
 */
export function parseMonthDayYear(value: string): Date | null {
  const match = value.trim().match(/^(\d{1,2})\/(\d{1,2})\/(\d{4})$/);
  if (!match) return null;
  const [, month, day, year] = match;
  return utcDate(Number(year), Number(month), Number(day));
}

/**
 * Parses the date part of YYYY-MM-DD or a full ISO timestamp
 */
export function parseIsoDate(value: string): Date | null {
  const match = value.trim().match(/^(\d{4})-(\d{2})-(\d{2})(?:[T\s].*)?$/);
  if (!match) return null;
  const [, year, month, day] = match;
  return utcDate(Number(year), Number(month), Number(day));
}

/**
 * Parses an amount string from CSV
 * Handles: "1234.56", "$1,234.56", "-500.00", "(45.00)"
 */
export function parseAmount(value: string | undefined): number | null {
  if (!value || value.trim() === '') {
    return null;
  }

  let cleaned = value.replace(/[$,\s]/g, '');
  let sign = 1;
  if (cleaned.startsWith('(') && cleaned.endsWith(')')) {
    sign = -1;
    cleaned = cleaned.slice(1, -1);
  }

  if (!/^-?\d+(\.\d+)?$/.test(cleaned)) {
    return null;
  }

  // Round to 2 decimal places to avoid floating point issues
  return (sign * Math.round(Number(cleaned) * 100)) / 100;
}

// ============================================
// Streaming CSV Parser
// ============================================

const openInput = (input: CsvInput): Readable =>
  typeof input === 'string' ? createReadStream(input) : input;

const describeInput = (input: CsvInput): string =>
  typeof input === 'string' ? input : 'CSV input';

/**
 * Creates a streaming CSV processor. Emits `row` (RowParseResult),
 * `headerError` (missing column names), `error` (ImportError) and `end`
 * (CsvParseStats).
 *
 * @example
 * const processor = createCsvStreamProcessor('statement.csv', ['Date', 'Amount'], parseRow);
 * processor.on('row', (result) => { ... });
 * processor.on('end', (stats) => { ... });
 */
export function createCsvStreamProcessor<T>(
  input: CsvInput,
  requiredColumns: readonly string[],
  parseRow: RowParser<T>
): EventEmitter {
  const emitter = new EventEmitter();
  const stats: CsvParseStats = { total: 0, valid: 0, invalid: 0, skipped: 0 };

  let headersValidated = false;
  let headerFailed = false;

  const source = openInput(input);
  const stream = source.pipe(
    csvParser({
      mapHeaders: ({ header }) => header.replace(/^\uFEFF/, '').trim(),
    })
  );

  const failHeaders = (missing: string[]): void => {
    headerFailed = true;
    emitter.emit('headerError', missing);
  };

  source.on('error', (error: Error) => {
    emitter.emit('error', new ImportError(`Unable to read ${describeInput(input)}: ${error.message}`));
  });

  stream.on('headers', (headers: string[]) => {
    const validation = validateCsvHeaders(headers, requiredColumns);
    if (!validation.valid) {
      failHeaders(validation.missing);
      stream.destroy();
      source.destroy();
      return;
    }
    headersValidated = true;
  });

  stream.on('data', (row: CsvRow) => {
    if (!headersValidated) return;

    stats.total++;
    const result = parseRow(row, stats.total);
    stats[result.status]++;

    emitter.emit('row', result);
  });

  stream.on('error', (error: Error) => {
    emitter.emit('error', new ImportError(`Unable to parse ${describeInput(input)}: ${error.message}`));
  });

  stream.on('end', () => {
    // An empty input never emits headers
    if (!headersValidated && !headerFailed) {
      failHeaders([...requiredColumns]);
      return;
    }
    emitter.emit('end', { ...stats });
  });

  return emitter;
}

/**
 * Processes CSV input and collects all parsed rows.
 * Rejects with an ImportError when required columns are missing or the
 * input cannot be read.
 */
export async function parseCsv<T>(
  input: CsvInput,
  requiredColumns: readonly string[],
  parseRow: RowParser<T>
): Promise<CsvParseResult<T>> {
  return new Promise((resolve, reject) => {
    const rows: T[] = [];
    const errors: RowError[] = [];

    const processor = createCsvStreamProcessor(input, requiredColumns, parseRow);

    processor.on('row', (result: RowParseResult<T>) => {
      if (result.status === 'valid') {
        rows.push(result.data);
      } else if (result.status === 'invalid') {
        errors.push({ rowNumber: result.rowNumber, error: result.error });
      }
    });

    processor.on('headerError', (missing: string[]) => {
      reject(new ImportError(`Missing required columns: ${missing.join(', ')}`));
    });

    processor.on('error', (error: Error) => {
      reject(error);
    });

    processor.on('end', (stats: CsvParseStats) => {
      resolve({ rows, errors, stats });
    });
  });
}

import type { CsvRow, RowError, RowParseResult, CsvParseStats } from '../utils/csv';
import type { Transaction } from '../matching/types';

/**
 * Turns rows of one platform's CSV export into transactions.
 */
export interface TransactionImporter {
  readonly platform: string;
  /** Header names that must be present, compared after trimming */
  readonly requiredColumns: readonly string[];
  parseRow(row: CsvRow, rowNumber: number): RowParseResult<Transaction>;
}

export interface ImportResult {
  platform: string;
  transactions: Transaction[];
  errors: RowError[];
  stats: CsvParseStats;
}

/**
 * Transaction importers
 *
 * Each importer maps one platform's CSV export onto Transaction values.
 * importTransactions streams the input and collects row-level errors.
 */

import { parseCsv } from '../utils/csv';
import type { CsvInput } from '../utils/csv';
import { Logging } from '../utils/logger';
import { bankStatementImporter } from './bankStatement.importer';
import { paperReceiptImporter } from './paperReceipt.importer';
import { stripeImporter } from './stripe.importer';
import type { ImportResult, TransactionImporter } from './types';

export const IMPORTERS: Readonly<Record<string, TransactionImporter>> = {
  [bankStatementImporter.platform]: bankStatementImporter,
  [stripeImporter.platform]: stripeImporter,
  [paperReceiptImporter.platform]: paperReceiptImporter,
};

export const SUPPORTED_PLATFORMS: readonly string[] = Object.keys(IMPORTERS);

export function getImporter(platform: string): TransactionImporter | undefined {
  return Object.prototype.hasOwnProperty.call(IMPORTERS, platform) ? IMPORTERS[platform] : undefined;
}

export async function importTransactions(
  importer: TransactionImporter,
  input: CsvInput
): Promise<ImportResult> {
  const { rows, errors, stats } = await parseCsv(input, importer.requiredColumns, (row, rowNumber) =>
    importer.parseRow(row, rowNumber)
  );

  Logging.debug(
    `Imported ${stats.valid}/${stats.total} ${importer.platform} rows ` +
      `(${stats.invalid} invalid, ${stats.skipped} skipped)`
  );
  for (const { rowNumber, error } of errors) {
    Logging.warn(`${importer.platform} row ${rowNumber}: ${error}`);
  }

  return { platform: importer.platform, transactions: rows, errors, stats };
}

export { bankStatementImporter, stripeImporter, paperReceiptImporter };
export { describeReceipt } from './paperReceipt.importer';
export type { TransactionImporter, ImportResult } from './types';

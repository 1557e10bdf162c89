import {
  cell,
  invalid,
  parseAmount,
  parseDayMonthYear,
  parseIsoDate,
  parseMonthDayYear,
  skipped,
  valid,
} from '../utils/csv';
import type { CsvRow, RowParseResult } from '../utils/csv';
import type { Transaction } from '../matching/types';
import type { TransactionImporter } from './types';

const PLATFORM = 'paper_receipt';

const parseReceiptDate = (value: string): Date | null =>
  parseDayMonthYear(value) ?? parseIsoDate(value) ?? parseMonthDayYear(value);

/**
 * "Paper Receipt - Jane Citizen (Newtown) - Cleaning - cash"
 */
export function describeReceipt(
  name: string,
  suburb?: string,
  service?: string,
  comment?: string
): string {
  let description = `Paper Receipt - ${name}`;
  if (suburb) description += ` (${suburb})`;
  if (service) description += ` - ${service}`;
  if (comment) description += ` - ${comment}`;
  return description;
}

/**
 * Hand-entered receipts. Name and suburb go into platform metadata for
 * the manual-entry matching strategy.
 */
export const paperReceiptImporter: TransactionImporter = {
  platform: PLATFORM,
  requiredColumns: ['Name', 'Suburb', 'DATE', 'AMOUNT', 'Service', 'Email'],

  parseRow(row: CsvRow, rowNumber: number): RowParseResult<Transaction> {
    const rawDate = cell(row, 'DATE');
    if (!rawDate) {
      return skipped('Empty DATE', rowNumber);
    }

    const date = parseReceiptDate(rawDate);
    if (!date) {
      return invalid(`Invalid DATE: "${rawDate}"`, rowNumber);
    }

    const amount = parseAmount(row['AMOUNT']);
    if (amount === null) {
      return invalid(`Invalid AMOUNT: "${row['AMOUNT'] ?? ''}"`, rowNumber);
    }

    const name = cell(row, 'Name') ?? '';
    const suburb = cell(row, 'Suburb');
    const service = cell(row, 'Service');
    const comment = cell(row, 'Comment');

    return valid(
      {
        transactionId: `receipt_${rowNumber}`,
        date,
        amount,
        description: describeReceipt(name, suburb, service, comment),
        email: cell(row, 'Email'),
        platform: PLATFORM,
        platformMetadata: {
          client_name: name,
          client_suburb: suburb,
          service,
          comment,
        },
      },
      rowNumber
    );
  },
};

export default paperReceiptImporter;

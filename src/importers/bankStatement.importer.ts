import { cell, invalid, parseAmount, parseDayMonthYear, valid } from '../utils/csv';
import type { CsvRow, RowParseResult } from '../utils/csv';
import type { Transaction } from '../matching/types';
import type { TransactionImporter } from './types';

const PLATFORM = 'bank_statement';

const OPTIONAL_COLUMNS = {
  account_number: 'Account Number',
  transaction_type: 'Transaction Type',
  balance: 'Balance',
  category: 'Category',
  merchant_name: 'Merchant Name',
} as const;

/**
 * Generic bank statement export. Dates are DD/MM/YYYY; debits may be
 * written in parentheses.
 */
export const bankStatementImporter: TransactionImporter = {
  platform: PLATFORM,
  requiredColumns: ['Date', 'Amount', 'Transaction Details'],

  parseRow(row: CsvRow, rowNumber: number): RowParseResult<Transaction> {
    const rawDate = cell(row, 'Date') ?? '';
    const date = parseDayMonthYear(rawDate);
    if (!date) {
      return invalid(`Invalid Date: "${rawDate}"`, rowNumber);
    }

    const amount = parseAmount(row['Amount']);
    if (amount === null) {
      return invalid(`Invalid Amount: "${row['Amount'] ?? ''}"`, rowNumber);
    }

    const description = cell(row, 'Transaction Details');
    if (!description) {
      return invalid('Missing or empty Transaction Details', rowNumber);
    }

    const platformMetadata: Record<string, string | undefined> = {};
    for (const [key, column] of Object.entries(OPTIONAL_COLUMNS)) {
      platformMetadata[key] = cell(row, column);
    }

    return valid(
      {
        transactionId: `bank_${rowNumber}`,
        date,
        amount,
        description,
        platform: PLATFORM,
        platformMetadata,
      },
      rowNumber
    );
  },
};

export default bankStatementImporter;

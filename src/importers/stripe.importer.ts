import { cell, invalid, parseAmount, parseDayMonthYear, parseIsoDate, valid } from '../utils/csv';
import type { CsvRow, RowParseResult } from '../utils/csv';
import type { Transaction } from '../matching/types';
import type { TransactionImporter } from './types';

const PLATFORM = 'stripe';

// "26/1/2025 23:18" in the dashboard export, ISO from the API export
const parseCreatedDate = (value: string): Date | null =>
  value.includes('/') ? parseDayMonthYear(value) : parseIsoDate(value);

/**
 * Payment processor payments export. The customer id becomes the
 * transaction's platform client identifier.
 */
export const stripeImporter: TransactionImporter = {
  platform: PLATFORM,
  requiredColumns: ['id', 'Customer Email', 'Amount', 'Created date (UTC)', 'Description'],

  parseRow(row: CsvRow, rowNumber: number): RowParseResult<Transaction> {
    const transactionId = cell(row, 'id');
    if (!transactionId) {
      return invalid('Missing id', rowNumber);
    }

    const rawDate = cell(row, 'Created date (UTC)') ?? '';
    const date = parseCreatedDate(rawDate);
    if (!date) {
      return invalid(`${transactionId}: invalid Created date (UTC) "${rawDate}"`, rowNumber);
    }

    const amount = parseAmount(row['Amount']);
    if (amount === null) {
      return invalid(`${transactionId}: invalid Amount "${row['Amount'] ?? ''}"`, rowNumber);
    }

    const customerId = cell(row, 'Customer ID');

    return valid(
      {
        transactionId,
        date,
        amount,
        description: cell(row, 'Description') ?? '',
        email: cell(row, 'Customer Email'),
        clientIdentifier: customerId,
        platform: PLATFORM,
        platformMetadata: {
          customer_id: customerId,
          status: cell(row, 'Status'),
          currency: cell(row, 'Currency') ?? 'aud',
          invoice_id: cell(row, 'Invoice ID'),
        },
      },
      rowNumber
    );
  },
};

export default stripeImporter;

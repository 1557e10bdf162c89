/**
 * Tests for the payment processor importer
 */

import { importTransactions, stripeImporter } from '../../src/importers';
import { csvStream } from '../helpers';

const EXPORT = [
  'id,Customer ID,Customer Email,Amount,Created date (UTC),Description,Status',
  'ch_001,cus_A1,a@x.com,120.50,26/1/2025 23:18,Invoice 1001,Paid',
  'ch_002,,,"1,000.00",2025-02-03T04:05:06Z,Card payment,Paid',
  ',cus_A1,a@x.com,10,2025-02-03,Retry,Paid',
  'ch_004,,,10,31/1/2025x,Refund,Refunded',
  'ch_005,,,n/a,2025-02-03,Refund,Refunded',
].join('\n');

describe('stripeImporter', () => {
  it('should map customer fields onto the transaction', async () => {
    const { transactions } = await importTransactions(stripeImporter, csvStream(EXPORT));

    expect(transactions[0]).toEqual({
      transactionId: 'ch_001',
      date: new Date(Date.UTC(2025, 0, 26)),
      amount: 120.5,
      description: 'Invoice 1001',
      email: 'a@x.com',
      clientIdentifier: 'cus_A1',
      platform: 'stripe',
      platformMetadata: { customer_id: 'cus_A1', status: 'Paid', currency: 'aud' },
    });
  });

  it('should accept ISO timestamps and blank customer fields', async () => {
    const { transactions } = await importTransactions(stripeImporter, csvStream(EXPORT));
    const second = transactions[1];

    expect(second.transactionId).toBe('ch_002');
    expect(second.date).toEqual(new Date(Date.UTC(2025, 1, 3)));
    expect(second.amount).toBe(1000);
    expect(second.email).toBeUndefined();
    expect(second.clientIdentifier).toBeUndefined();
  });

  it('should prefix row errors with the payment id', async () => {
    const { errors, stats } = await importTransactions(stripeImporter, csvStream(EXPORT));

    expect(errors).toEqual([
      { rowNumber: 3, error: 'Missing id' },
      { rowNumber: 4, error: 'ch_004: invalid Created date (UTC) "31/1/2025x"' },
      { rowNumber: 5, error: 'ch_005: invalid Amount "n/a"' },
    ]);
    expect(stats).toEqual({ total: 5, valid: 2, invalid: 3, skipped: 0 });
  });
});

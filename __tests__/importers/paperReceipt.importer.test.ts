/**
 * Tests for the paper receipt importer
 */

import { describeReceipt, importTransactions, paperReceiptImporter } from '../../src/importers';
import { csvStream } from '../helpers';

const RECEIPTS = [
  'Name,Suburb,DATE,AMOUNT,Service,Email,Comment',
  'Chloe Parke,Newtown,3/5/2024,80,Cleaning,,cash',
  'Dan Wright,Kew,2024-05-04,$120.00,Gardening,dan@test,',
  'Someone,Glebe,,50,Cleaning,,',
  'Bad Date,Kew,31/13/2024,10,Cleaning,,',
].join('\n');

describe('paperReceiptImporter', () => {
  it('should build descriptions and manual-entry metadata', async () => {
    const { transactions } = await importTransactions(paperReceiptImporter, csvStream(RECEIPTS));

    expect(transactions[0]).toEqual({
      transactionId: 'receipt_1',
      date: new Date(Date.UTC(2024, 4, 3)),
      amount: 80,
      description: 'Paper Receipt - Chloe Parke (Newtown) - Cleaning - cash',
      platform: 'paper_receipt',
      platformMetadata: {
        client_name: 'Chloe Parke',
        client_suburb: 'Newtown',
        service: 'Cleaning',
        comment: 'cash',
      },
    });
  });

  it('should accept ISO dates and carry the email', async () => {
    const { transactions } = await importTransactions(paperReceiptImporter, csvStream(RECEIPTS));
    const second = transactions[1];

    expect(second.date).toEqual(new Date(Date.UTC(2024, 4, 4)));
    expect(second.amount).toBe(120);
    expect(second.email).toBe('dan@test');
    expect(second.description).toBe('Paper Receipt - Dan Wright (Kew) - Gardening');
  });

  it('should skip rows without a date and reject bad ones', async () => {
    const { errors, stats } = await importTransactions(paperReceiptImporter, csvStream(RECEIPTS));

    expect(errors).toEqual([{ rowNumber: 4, error: 'Invalid DATE: "31/13/2024"' }]);
    expect(stats).toEqual({ total: 4, valid: 2, invalid: 1, skipped: 1 });
  });

  it('should fall back to month-first dates', () => {
    const result = paperReceiptImporter.parseRow(
      { Name: 'Ann', DATE: '12/25/2024', AMOUNT: '10' },
      7
    );

    expect(result.status).toBe('valid');
    if (result.status === 'valid') {
      expect(result.data.date).toEqual(new Date(Date.UTC(2024, 11, 25)));
      expect(result.data.transactionId).toBe('receipt_7');
    }
  });

  it('should reject a bad amount', () => {
    expect(paperReceiptImporter.parseRow({ Name: 'Ann', DATE: '1/2/2024', AMOUNT: 'ten' }, 2)).toEqual({
      status: 'invalid',
      error: 'Invalid AMOUNT: "ten"',
      rowNumber: 2,
    });
  });
});

describe('describeReceipt', () => {
  it('should leave out absent parts', () => {
    expect(describeReceipt('Ann')).toBe('Paper Receipt - Ann');
    expect(describeReceipt('Ann', undefined, 'Ironing')).toBe('Paper Receipt - Ann - Ironing');
  });
});

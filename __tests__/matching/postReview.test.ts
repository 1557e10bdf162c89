/**
 * Tests for PII-assisted post-review resolution
 *
 * Direct order: email → business number → phone → address → name,
 * then email propagation across the batch.
 */

import { PostReviewResolver, type PostReviewEntry } from '../../src/matching/postReview';
import { createTransaction, fixtureRegistry } from '../helpers';

describe('PostReviewResolver', () => {
  let resolver: PostReviewResolver;

  beforeAll(() => {
    resolver = new PostReviewResolver(fixtureRegistry());
  });

  describe('resolveWithPii', () => {
    const tx = createTransaction({ transactionId: 'R1' });

    it('should match an extracted email exactly', () => {
      const result = resolver.resolveWithPii(tx, { email: 'Bob@Carter.test' });

      expect(result.clientId).toBe('C2');
      expect(result.matchMethod).toBe('extracted_email');
      expect(result.confidenceScore).toBe(1);
      expect(result.requiresReview).toBe(false);
    });

    it('should match a business number from the acn field', () => {
      const result = resolver.resolveWithPii(tx, { businessNumber: '123456789' });

      expect(result.clientId).toBe('C3');
      expect(result.matchMethod).toBe('extracted_business_number');
    });

    it('should match a business number from the abn field', () => {
      const result = resolver.resolveWithPii(tx, { businessNumber: ' 51824753556 ' });

      expect(result.clientId).toBe('C4');
      expect(result.matchDetails).toEqual({
        kind: 'extracted_business_number',
        matchedValue: '51824753556',
      });
    });

    it('should compare phone numbers by digits only', () => {
      const result = resolver.resolveWithPii(tx, { phone: '0412-345-678' });

      expect(result.clientId).toBe('C1');
      expect(result.matchMethod).toBe('extracted_phone');
      expect(result.confidenceScore).toBe(0.95);
      expect(result.requiresReview).toBe(false);
    });

    it('should match an extracted address with the lower minimum score', () => {
      const result = resolver.resolveWithPii(tx, { address: '7 Jones Road, Kew' });

      expect(result.clientId).toBe('C4');
      expect(result.matchMethod).toBe('extracted_address_fuzzy');
      expect(result.confidenceScore).toBe(1);
      expect(result.matchDetails).toMatchObject({
        kind: 'extracted_address_fuzzy',
        matchStrategy: 'full_address',
        extractedAddress: '7 Jones Road, Kew',
      });
    });

    it('should match an extracted name on whole-string similarity', () => {
      const result = resolver.resolveWithPii(tx, { name: 'Daniel Wrigt' });

      expect(result.clientId).toBe('C4');
      expect(result.matchMethod).toBe('extracted_name_fuzzy');
      expect(result.confidenceScore).toBe(0.92);
      expect(result.requiresReview).toBe(false);
    });

    it('should flag a medium-band name match for review', () => {
      const result = resolver.resolveWithPii(tx, { name: 'Dan Wright' });

      expect(result.clientId).toBe('C4');
      expect(result.confidenceScore).toBe(0.77);
      expect(result.requiresReview).toBe(true);
    });

    it('should prefer email over phone', () => {
      const result = resolver.resolveWithPii(tx, {
        email: 'bob@carter.test',
        phone: '0412 345 678',
      });

      expect(result.clientId).toBe('C2');
      expect(result.matchMethod).toBe('extracted_email');
    });

    it('should fall through an unknown email to the phone', () => {
      const result = resolver.resolveWithPii(tx, {
        email: 'ghost@none.test',
        phone: '0412345678',
      });

      expect(result.clientId).toBe('C1');
      expect(result.matchMethod).toBe('extracted_phone');
    });

    it('should ignore single-character names', () => {
      const result = resolver.resolveWithPii(tx, { name: 'D' });

      expect(result.matchMethod).toBe('no_match_post_review');
      expect(result.isMatched).toBe(false);
      expect(result.requiresReview).toBe(true);
    });
  });

  describe('resolveBatch', () => {
    it('should propagate a phone match to another transaction with the same email', () => {
      const entries: PostReviewEntry[] = [
        {
          transaction: createTransaction({ transactionId: 'T1', email: 'c3@y.com' }),
          pii: { phone: '+61 400 111 222' },
        },
        {
          transaction: createTransaction({ transactionId: 'T2', email: 'C3@Y.COM' }),
        },
        {
          transaction: createTransaction({ transactionId: 'T3', email: 'nobody@none.test' }),
          pii: {},
        },
      ];

      const [t1, t2, t3] = resolver.resolveBatch(entries);

      expect(t1.clientId).toBe('C3');
      expect(t1.matchMethod).toBe('extracted_phone');

      expect(t2.clientId).toBe('C3');
      expect(t2.matchMethod).toBe('email_propagated_from_extracted_phone');
      expect(t2.confidenceScore).toBe(0.9);
      expect(t2.requiresReview).toBe(false);
      expect(t2.matchDetails).toMatchObject({
        kind: 'email_propagated',
        propagatedFromEmail: 'C3@Y.COM',
        sourceTransactionId: 'T1',
        originalMatchMethod: 'extracted_phone',
      });

      expect(t3.matchMethod).toBe('no_match_post_review');
      expect(t3.confidenceScore).toBe(0);
    });

    it('should propagate backwards to earlier transactions in the batch', () => {
      const [first, second] = resolver.resolveBatch([
        { transaction: createTransaction({ transactionId: 'E1', email: 'late@mapping.test' }) },
        {
          transaction: createTransaction({ transactionId: 'E2', email: 'late@mapping.test' }),
          pii: { email: 'a@x.com' },
        },
      ]);

      expect(second.matchMethod).toBe('extracted_email');
      expect(first.clientId).toBe('C1');
      expect(first.matchMethod).toBe('email_propagated_from_extracted_email');
    });

    it('should keep the first mapping for an email and never override direct matches', () => {
      const results = resolver.resolveBatch([
        {
          transaction: createTransaction({ transactionId: 'D1', email: 'dup@test.example' }),
          pii: { phone: '+61 400 111 222' },
        },
        {
          transaction: createTransaction({ transactionId: 'D2', email: 'dup@test.example' }),
          pii: { email: 'bob@carter.test' },
        },
        {
          transaction: createTransaction({ transactionId: 'D3', email: 'dup@test.example' }),
        },
      ]);

      expect(results.map((r) => r.clientId)).toEqual(['C3', 'C2', 'C3']);
      expect(results[1].matchMethod).toBe('extracted_email');
      expect(results[2].matchMethod).toBe('email_propagated_from_extracted_phone');
    });

    it('should carry previously matched transactions through unchanged', () => {
      const [result] = resolver.resolveBatch([
        {
          transaction: createTransaction({ transactionId: 'P1', email: 'a@x.com' }),
          previouslyMatched: true,
          previousClientId: 'C2',
        },
      ]);

      expect(result.clientId).toBe('C2');
      expect(result.matchMethod).toBe('previously_matched');
      expect(result.confidenceScore).toBe(1);
      expect(result.requiresReview).toBe(false);
    });

    it('should leave transactions without an email unmatched', () => {
      const [result] = resolver.resolveBatch([{ transaction: createTransaction({ transactionId: 'N1' }) }]);

      expect(result.matchMethod).toBe('no_match_post_review');
    });
  });
});

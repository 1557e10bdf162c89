/**
 * Post-review (PII-assisted) resolution
 *
 * After a reviewer has attached extracted fields to unmatched transactions,
 * this pass re-resolves them in two phases:
 *
 * 1. Direct: extracted email → business number → phone → address → name.
 * 2. Propagation: every email that phase 1 tied to a client resolves the
 *    other still-unmatched transactions carrying the same email.
 *
 * Phase 2 only starts once phase 1 has finished for the whole batch.
 */

import { defaultMatchingConfig, type MatchingConfig } from '../config/matching';
import { fullName, type ClientRegistry } from '../registry/clientRegistry';
import { Logging } from '../utils/logger';
import { matchedResult, previouslyMatchedResult, unmatchedResult } from './confidence';
import {
  EXACT_SCORE,
  EXTRACTED_PHONE_SCORE,
  MIN_ADDRESS_INPUT_LENGTH,
  MIN_EXTRACTED_NAME_LENGTH,
} from './constants';
import { similarityRatio } from './stringSimilarity';
import type {
  DirectPiiDetails,
  DirectPiiMethod,
  ExtractedPii,
  MatchResult,
  StrategyHit,
  Transaction,
} from './types';

export interface PostReviewEntry {
  transaction: Transaction;
  pii?: ExtractedPii;
  /** Already matched in an earlier run; kept as is */
  previouslyMatched?: boolean;
  previousClientId?: string;
}

interface EmailMapping {
  clientId: string;
  method: DirectPiiMethod;
  details: DirectPiiDetails;
  sourceTransactionId: string;
}

interface DirectHit extends StrategyHit {
  method: DirectPiiMethod;
  details: DirectPiiDetails;
}

const clean = (value: string | undefined): string => (value ?? '').trim();

export class PostReviewResolver {
  constructor(
    private readonly registry: ClientRegistry,
    private readonly config: MatchingConfig = defaultMatchingConfig
  ) {}

  private findDirect(pii: ExtractedPii): DirectHit | undefined {
    const email = clean(pii.email);
    if (email) {
      const clientId = this.registry.findByEmail(email);
      if (clientId) {
        return {
          clientId,
          score: EXACT_SCORE,
          method: 'extracted_email',
          details: { kind: 'extracted_email', matchedValue: email },
        };
      }
    }

    const businessNumber = clean(pii.businessNumber);
    if (businessNumber) {
      const clientId = this.registry.findByBusinessNumber(businessNumber);
      if (clientId) {
        return {
          clientId,
          score: EXACT_SCORE,
          method: 'extracted_business_number',
          details: { kind: 'extracted_business_number', matchedValue: businessNumber },
        };
      }
    }

    const phone = clean(pii.phone);
    if (phone) {
      const clientId = this.registry.findByPhone(phone);
      if (clientId) {
        return {
          clientId,
          score: EXTRACTED_PHONE_SCORE,
          method: 'extracted_phone',
          details: { kind: 'extracted_phone', matchedValue: phone },
        };
      }
    }

    const address = clean(pii.address);
    if (address.length >= MIN_ADDRESS_INPUT_LENGTH) {
      const match = this.registry.findByAddress(address, this.config.postReview.addressMinScore);
      if (match) {
        return {
          clientId: match.clientId,
          score: match.score,
          method: 'extracted_address_fuzzy',
          details: { kind: 'extracted_address_fuzzy', ...match.details, extractedAddress: address },
        };
      }
    }

    const name = clean(pii.name);
    if (name.length >= MIN_EXTRACTED_NAME_LENGTH) {
      return this.findByExtractedName(name);
    }

    return undefined;
  }

  private findByExtractedName(name: string): DirectHit | undefined {
    const threshold = this.config.postReview.nameThreshold;
    const wanted = name.toLowerCase();
    let best: DirectHit | undefined;

    for (const client of this.registry.clients()) {
      const candidate = fullName(client);
      if (!candidate) continue;

      const score = similarityRatio(wanted, candidate.toLowerCase());
      if (score >= threshold && (!best || score > best.score)) {
        best = {
          clientId: client.clientId,
          score,
          method: 'extracted_name_fuzzy',
          details: {
            kind: 'extracted_name_fuzzy',
            matchedName: candidate,
            extractedName: name,
            fuzzyScore: score,
          },
        };
      }
    }

    return best;
  }

  /**
   * Direct PII resolution for one transaction (phase 1 only).
   */
  resolveWithPii(transaction: Transaction, pii: ExtractedPii): MatchResult {
    const hit = this.findDirect(pii);
    if (!hit) {
      return unmatchedResult(transaction.transactionId, 'no_match_post_review');
    }
    return matchedResult(transaction.transactionId, hit, this.config.confidenceThresholds);
  }

  /**
   * Resolves a reviewed batch: direct matches for every entry first, then
   * email propagation. Output order equals input order.
   */
  resolveBatch(entries: readonly PostReviewEntry[]): MatchResult[] {
    const mappings = new Map<string, EmailMapping>();

    const direct = entries.map(({ transaction, pii, previouslyMatched, previousClientId }) => {
      if (previouslyMatched) {
        return previouslyMatchedResult(transaction.transactionId, previousClientId);
      }

      const hit = this.findDirect(pii ?? {});
      if (!hit) {
        return unmatchedResult(transaction.transactionId, 'no_match_post_review');
      }

      const emailKey = clean(transaction.email).toLowerCase();
      if (emailKey && !mappings.has(emailKey)) {
        mappings.set(emailKey, {
          clientId: hit.clientId,
          method: hit.method,
          details: hit.details,
          sourceTransactionId: transaction.transactionId,
        });
      }

      return matchedResult(transaction.transactionId, hit, this.config.confidenceThresholds);
    });

    Logging.debug(`Post-review found ${mappings.size} email mapping(s) to propagate`);

    return direct.map((result, position) => {
      const { transaction } = entries[position];
      const emailKey = clean(transaction.email).toLowerCase();
      const mapping = emailKey ? mappings.get(emailKey) : undefined;

      if (result.isMatched || !mapping) {
        return result;
      }

      return matchedResult(
        transaction.transactionId,
        {
          clientId: mapping.clientId,
          score: this.config.postReview.propagatedScore,
          method: `email_propagated_from_${mapping.method}` as const,
          details: {
            kind: 'email_propagated',
            propagatedFromEmail: clean(transaction.email),
            sourceTransactionId: mapping.sourceTransactionId,
            originalMatchMethod: mapping.method,
            originalDetails: mapping.details,
          },
        },
        this.config.confidenceThresholds
      );
    });
  }
}

export default PostReviewResolver;

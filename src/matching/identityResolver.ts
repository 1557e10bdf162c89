/**
 * IdentityResolver
 *
 * Runs the strategy cascade for one transaction against a registry
 * snapshot and applies the confidence/review policy. The snapshot is
 * read-only, so a batch can be resolved in any order; results are returned
 * in input order.
 */

import { defaultMatchingConfig, type MatchingConfig } from '../config/matching';
import type { ClientRegistry } from '../registry/clientRegistry';
import { Logging } from '../utils/logger';
import { matchedResult, unmatchedResult } from './confidence';
import { MATCH_CASCADE, type MatchStrategy, type StrategyContext } from './strategies';
import type { MatchResult, Transaction } from './types';

export class IdentityResolver {
  private readonly context: StrategyContext;

  constructor(
    registry: ClientRegistry,
    config: MatchingConfig = defaultMatchingConfig,
    private readonly cascade: readonly MatchStrategy[] = MATCH_CASCADE
  ) {
    this.context = { registry, config };
  }

  get config(): MatchingConfig {
    return this.context.config;
  }

  get registry(): ClientRegistry {
    return this.context.registry;
  }

  /**
   * Resolves one transaction. The first strategy with a hit decides the
   * result; with no hit the result is a no_match requiring review.
   */
  resolve(transaction: Transaction): MatchResult {
    for (const strategy of this.cascade) {
      const hit = strategy.apply(transaction, this.context);
      if (hit) {
        return matchedResult(transaction.transactionId, hit, this.config.confidenceThresholds);
      }
    }

    return unmatchedResult(transaction.transactionId);
  }

  /**
   * Resolves every transaction independently. One failing transaction is
   * logged and reported as unmatched; the rest of the batch still resolves.
   */
  resolveBatch(transactions: readonly Transaction[]): MatchResult[] {
    return transactions.map((transaction) => {
      try {
        return this.resolve(transaction);
      } catch (error) {
        Logging.error(
          `Resolution failed for transaction ${transaction.transactionId}: ${
            error instanceof Error ? error.message : String(error)
          }`
        );
        return unmatchedResult(transaction.transactionId);
      }
    });
  }
}

export default IdentityResolver;

/**
 * Identity Resolution Engine
 *
 * Pure, deterministic matching of transactions to client records:
 * - Strategy cascade (exact identifier, email, manual-entry name, fuzzy name, address)
 * - Confidence bands and review policy
 * - Post-review PII resolution with email propagation
 *
 * Usage:
 * ```typescript
 * import { IdentityResolver } from './matching';
 *
 * const resolver = new IdentityResolver(registry, config);
 * const results = resolver.resolveBatch(transactions);
 * ```
 */

export { IdentityResolver } from './identityResolver';
export { PostReviewResolver } from './postReview';
export type { PostReviewEntry } from './postReview';
export {
  MATCH_CASCADE,
  exactClientIdStrategy,
  exactEmailStrategy,
  enhancedManualEntryStrategy,
  fuzzyNameStrategy,
  addressMatchStrategy,
} from './strategies';
export type { MatchStrategy, StrategyContext } from './strategies';
export {
  confidenceBand,
  requiresReview,
  isPropagatedMethod,
  matchedResult,
  unmatchedResult,
  previouslyMatchedResult,
  explainResult,
} from './confidence';
export { summarize } from './reconciliationSummary';
export type { ReconciliationSummary } from './reconciliationSummary';
export { normalizeAddress } from './normalizeAddress';
export { similarityRatio, partialRatio } from './stringSimilarity';
export * from './constants';
export { EXACT_METHODS } from './types';
export type {
  Transaction,
  ExtractedPii,
  MatchResult,
  MatchMethod,
  CascadeMethod,
  DirectPiiMethod,
  PropagatedMethod,
  MatchDetails,
  DirectPiiDetails,
  ConfidenceBand,
  StrategyHit,
} from './types';

/**
 * ReconciliationSummary: counts and distributions over resolver output.
 * Bands are recomputed from each score with the configured thresholds.
 */

import type { ConfidenceThresholds } from '../config/matching';
import { confidenceBand } from './confidence';
import type { ConfidenceBand, MatchMethod, MatchResult } from './types';

export interface ReconciliationSummary {
  totalTransactions: number;
  matchedTransactions: number;
  unmatchedTransactions: number;
  requiresReview: number;
  /** matched / total, 0 for an empty batch */
  matchRate: number;
  confidenceDistribution: Record<ConfidenceBand, number>;
  matchMethodBreakdown: Partial<Record<MatchMethod, number>>;
}

export function summarize(
  results: readonly MatchResult[],
  thresholds: ConfidenceThresholds
): ReconciliationSummary {
  const confidenceDistribution: Record<ConfidenceBand, number> = { high: 0, medium: 0, low: 0 };
  const matchMethodBreakdown: Partial<Record<MatchMethod, number>> = {};
  let matched = 0;
  let review = 0;

  for (const result of results) {
    if (result.isMatched) matched++;
    if (result.requiresReview) review++;
    confidenceDistribution[confidenceBand(result.confidenceScore, thresholds)]++;
    matchMethodBreakdown[result.matchMethod] = (matchMethodBreakdown[result.matchMethod] ?? 0) + 1;
  }

  const total = results.length;

  return {
    totalTransactions: total,
    matchedTransactions: matched,
    unmatchedTransactions: total - matched,
    requiresReview: review,
    matchRate: total > 0 ? Math.round((matched / total) * 10000) / 10000 : 0,
    confidenceDistribution,
    matchMethodBreakdown,
  };
}

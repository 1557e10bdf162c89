/**
 * Confidence banding and review policy.
 *
 * Bands (default thresholds):
 * - high:   score >= 0.85
 * - medium: score >= 0.60
 * - low:    below medium
 *
 * Exact-identifier and email-propagated methods never require review;
 * every other method requires review unless its score falls in the high
 * band. The band is always recomputed from the score with the configured
 * thresholds.
 */

import type { ConfidenceThresholds } from '../config/matching';
import { EXACT_SCORE, NO_MATCH_SCORE } from './constants';
import {
  EXACT_METHODS,
  type ConfidenceBand,
  type MatchMethod,
  type MatchResult,
  type StrategyHit,
} from './types';

/** Email propagation carries its own fixed confidence and is never reviewed */
export const isPropagatedMethod = (method: MatchMethod): boolean =>
  method.startsWith('email_propagated_from_');

export function confidenceBand(score: number, thresholds: ConfidenceThresholds): ConfidenceBand {
  if (score >= thresholds.high) {
    return 'high';
  }
  if (score >= thresholds.medium) {
    return 'medium';
  }
  return 'low';
}

export function requiresReview(
  method: MatchMethod,
  score: number,
  thresholds: ConfidenceThresholds
): boolean {
  if (EXACT_METHODS.has(method) || isPropagatedMethod(method)) {
    return false;
  }
  return confidenceBand(score, thresholds) !== 'high';
}

/**
 * Builds the result for a strategy hit, applying the review policy.
 */
export function matchedResult(
  transactionId: string,
  hit: StrategyHit,
  thresholds: ConfidenceThresholds
): MatchResult {
  const result: MatchResult = {
    transactionId,
    clientId: hit.clientId,
    confidenceScore: hit.score,
    matchMethod: hit.method,
    matchDetails: hit.details,
    isMatched: true,
    requiresReview: requiresReview(hit.method, hit.score, thresholds),
  };
  return Object.freeze(result);
}

export function unmatchedResult(
  transactionId: string,
  method: 'no_match' | 'no_match_post_review' = 'no_match'
): MatchResult {
  const result: MatchResult = {
    transactionId,
    clientId: undefined,
    confidenceScore: NO_MATCH_SCORE,
    matchMethod: method,
    matchDetails: { kind: 'no_match' },
    isMatched: false,
    requiresReview: true,
  };
  return Object.freeze(result);
}

/**
 * A transaction already matched in an earlier run, carried through unchanged.
 */
export function previouslyMatchedResult(transactionId: string, clientId?: string): MatchResult {
  const result: MatchResult = {
    transactionId,
    clientId,
    confidenceScore: EXACT_SCORE,
    matchMethod: 'previously_matched',
    matchDetails: { kind: 'previously_matched' },
    isMatched: true,
    requiresReview: false,
  };
  return Object.freeze(result);
}

/**
 * One-line, human-readable account of a result for logs and reports.
 *
 * @example
 * explainResult(result, thresholds)
 * // "fuzzy_name → C7 (score 0.92, band high). Matched name "jane citizen""
 */
export function explainResult(result: MatchResult, thresholds: ConfidenceThresholds): string {
  const band = confidenceBand(result.confidenceScore, thresholds);

  if (!result.isMatched) {
    return `${result.matchMethod}: no client found (score ${result.confidenceScore}, band ${band})`;
  }

  const parts = [
    `${result.matchMethod} → ${result.clientId} (score ${result.confidenceScore}, band ${band})`,
  ];

  const details = result.matchDetails;
  switch (details.kind) {
    case 'exact_client_id':
      parts.push(`${details.platform} identifier "${details.matchedIdentifier}"`);
      break;
    case 'exact_email':
      parts.push(`Email "${details.matchedEmail}"`);
      break;
    case 'enhanced_manual_entry':
      parts.push(`Name "${details.extractedName}" ~ "${details.matchedName}" (${details.nameScore})`);
      if (details.suburbBoost > 0) {
        parts.push(`Suburb boost +${details.suburbBoost}`);
      }
      break;
    case 'fuzzy_name':
    case 'extracted_name_fuzzy':
      parts.push(`Matched name "${details.matchedName}"`);
      break;
    case 'address_match':
    case 'extracted_address_fuzzy':
      parts.push(`Address "${details.matchedAddress}" via ${details.matchStrategy}`);
      break;
    case 'extracted_email':
    case 'extracted_business_number':
    case 'extracted_phone':
      parts.push(`Extracted value "${details.matchedValue}"`);
      break;
    case 'email_propagated':
      parts.push(
        `Email "${details.propagatedFromEmail}" resolved on ${details.sourceTransactionId} via ${details.originalMatchMethod}`
      );
      break;
    default:
      break;
  }

  if (result.requiresReview) {
    parts.push('Requires review');
  }

  return parts.join('. ');
}

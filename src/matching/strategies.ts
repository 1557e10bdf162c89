/**
 * Match strategy cascade.
 *
 * A closed, ordered set of strategies. The resolver runs them in order and
 * stops at the first hit; strategies are never combined.
 *
 * 1. exact_client_id       platform identifier lookup            score 1.0
 * 2. exact_email           email index lookup                    score 1.0
 * 3. enhanced_manual_entry extracted name (+ suburb boost), manual-entry platform only
 * 4. fuzzy_name            client full name against the description
 * 5. address_match         registry address search on the description
 */

import type { MatchingConfig } from '../config/matching';
import { fullName, type ClientRegistry } from '../registry/clientRegistry';
import { EXACT_SCORE } from './constants';
import { partialRatio, similarityRatio } from './stringSimilarity';
import type {
  CascadeMethod,
  EnhancedManualEntryDetails,
  StrategyHit,
  Transaction,
} from './types';

export interface StrategyContext {
  registry: ClientRegistry;
  config: MatchingConfig;
}

export interface MatchStrategy {
  readonly method: CascadeMethod;
  /** Returns a hit, or undefined when the strategy finds nothing or does not apply */
  apply(transaction: Transaction, context: StrategyContext): StrategyHit | undefined;
}

const round2 = (value: number): number => Math.round(value * 100) / 100;

const trimmed = (value: string | undefined): string => (value ?? '').trim();

export const exactClientIdStrategy: MatchStrategy = {
  method: 'exact_client_id',
  apply(transaction, { registry }) {
    const identifier = trimmed(transaction.clientIdentifier);
    if (!identifier) return undefined;

    const clientId = registry.findByPlatformIdentifier(transaction.platform, identifier);
    if (!clientId) return undefined;

    return {
      clientId,
      score: EXACT_SCORE,
      method: 'exact_client_id',
      details: { kind: 'exact_client_id', platform: transaction.platform, matchedIdentifier: identifier },
    };
  },
};

export const exactEmailStrategy: MatchStrategy = {
  method: 'exact_email',
  apply(transaction, { registry }) {
    const email = trimmed(transaction.email);
    if (!email) return undefined;

    const clientId = registry.findByEmail(email);
    if (!clientId) return undefined;

    return {
      clientId,
      score: EXACT_SCORE,
      method: 'exact_email',
      details: { kind: 'exact_email', matchedEmail: email },
    };
  },
};

/**
 * Manual-entry receipts carry a hand-typed name and suburb. The name is
 * compared to every client's full name; a suburb that agrees with the
 * client's registry suburb adds a fixed boost (capped at 1.0).
 */
export const enhancedManualEntryStrategy: MatchStrategy = {
  method: 'enhanced_manual_entry',
  apply(transaction, { registry, config }) {
    const { platform, nameGate, suburbThreshold, suburbBoost } = config.enhancedMatching;
    if (transaction.platform !== platform) return undefined;

    const extractedName = trimmed(transaction.platformMetadata?.client_name);
    if (!extractedName) return undefined;

    const extractedSuburb = trimmed(transaction.platformMetadata?.client_suburb);
    const threshold = config.fuzzyMatching.nameThreshold;

    let best: StrategyHit | undefined;

    for (const client of registry.clients()) {
      const name = fullName(client);
      if (!name) continue;

      const nameScore = similarityRatio(extractedName.toLowerCase(), name.toLowerCase());
      if (nameScore < nameGate) continue;

      const details: EnhancedManualEntryDetails = {
        kind: 'enhanced_manual_entry',
        matchedName: name,
        extractedName,
        nameScore,
        suburbBoost: 0,
      };

      let score = nameScore;
      const clientSuburb = client.location.suburb;
      if (extractedSuburb && clientSuburb) {
        const suburbScore = similarityRatio(extractedSuburb.toLowerCase(), clientSuburb.toLowerCase());
        details.extractedSuburb = extractedSuburb;
        details.clientSuburb = clientSuburb;
        details.suburbScore = suburbScore;
        if (suburbScore >= suburbThreshold) {
          score = round2(Math.min(1, nameScore + suburbBoost));
          details.suburbBoost = suburbBoost;
        }
      }

      if (score >= threshold && (!best || score > best.score)) {
        best = { clientId: client.clientId, score, method: 'enhanced_manual_entry', details };
      }
    }

    return best;
  },
};

/**
 * Looks for each client's full name inside the description: verbatim
 * containment scores 1.0, otherwise the best-matching substring score.
 */
export const fuzzyNameStrategy: MatchStrategy = {
  method: 'fuzzy_name',
  apply(transaction, { registry, config }) {
    const description = trimmed(transaction.description).toLowerCase();
    if (!description) return undefined;

    const threshold = config.fuzzyMatching.nameThreshold;
    let best: StrategyHit | undefined;

    for (const client of registry.clients()) {
      const name = fullName(client).toLowerCase();
      if (!name) continue;

      const contained = description.includes(name);
      const score = contained ? EXACT_SCORE : partialRatio(name, description);

      if (score >= threshold && (!best || score > best.score)) {
        best = {
          clientId: client.clientId,
          score,
          method: 'fuzzy_name',
          details: { kind: 'fuzzy_name', matchedName: name, fuzzyScore: score, contained },
        };
        if (score === EXACT_SCORE) break;
      }
    }

    return best;
  },
};

export const addressMatchStrategy: MatchStrategy = {
  method: 'address_match',
  apply(transaction, { registry, config }) {
    if (!config.addressMatching.enabled) return undefined;

    const match = registry.findByAddress(transaction.description, config.addressMatching.minScore);
    if (!match) return undefined;

    return {
      clientId: match.clientId,
      score: match.score,
      method: 'address_match',
      details: { kind: 'address_match', ...match.details },
    };
  },
};

/** Priority order: authoritative and cheap first, registry-wide scans last */
export const MATCH_CASCADE: readonly MatchStrategy[] = Object.freeze([
  exactClientIdStrategy,
  exactEmailStrategy,
  enhancedManualEntryStrategy,
  fuzzyNameStrategy,
  addressMatchStrategy,
]);

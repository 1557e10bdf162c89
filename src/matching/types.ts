/**
 * Type Definitions for the Identity Resolution Engine
 *
 * Transactions come in from importers already normalized to the shape
 * below; the engine turns each one into exactly one MatchResult.
 */

import type { AddressMatchDetails } from '../registry/types';

// ============================================
// INPUT TYPES
// ============================================

/**
 * A financial transaction from any source (bank line, processor charge,
 * receipt). Importers fill platformMetadata with whatever they extract.
 */
export interface Transaction {
  /** Unique within a batch */
  transactionId: string;
  date: Date;
  amount: number;
  /** Free-text description; may contain a name, suburb or street address */
  description: string;
  reference?: string;
  email?: string;
  /** The client's identifier on the transaction's platform */
  clientIdentifier?: string;
  platform: string;
  /** Absent when a caller skips the importers */
  platformMetadata?: Record<string, string | undefined>;
}

/**
 * Fields a reviewer attached by hand to a previously unmatched transaction.
 */
export interface ExtractedPii {
  name?: string;
  address?: string;
  businessNumber?: string;
  phone?: string;
  email?: string;
}

// ============================================
// METHODS
// ============================================

export type CascadeMethod =
  | 'exact_client_id'
  | 'exact_email'
  | 'enhanced_manual_entry'
  | 'fuzzy_name'
  | 'address_match';

export type DirectPiiMethod =
  | 'extracted_email'
  | 'extracted_business_number'
  | 'extracted_phone'
  | 'extracted_address_fuzzy'
  | 'extracted_name_fuzzy';

export type PropagatedMethod = `email_propagated_from_${DirectPiiMethod}`;

export type MatchMethod =
  | CascadeMethod
  | DirectPiiMethod
  | PropagatedMethod
  | 'previously_matched'
  | 'no_match'
  | 'no_match_post_review';

/** Methods backed by an authoritative identifier; never reviewed */
export const EXACT_METHODS: ReadonlySet<MatchMethod> = new Set<MatchMethod>([
  'exact_client_id',
  'exact_email',
  'extracted_email',
  'extracted_business_number',
  'extracted_phone',
  'previously_matched',
]);

// ============================================
// EXPLANATIONS
// ============================================

export interface ExactIdentifierDetails {
  kind: 'exact_client_id';
  platform: string;
  matchedIdentifier: string;
}

export interface ExactEmailDetails {
  kind: 'exact_email';
  matchedEmail: string;
}

export interface EnhancedManualEntryDetails {
  kind: 'enhanced_manual_entry';
  matchedName: string;
  extractedName: string;
  nameScore: number;
  extractedSuburb?: string;
  clientSuburb?: string;
  suburbScore?: number;
  suburbBoost: number;
}

export interface FuzzyNameDetails {
  kind: 'fuzzy_name';
  matchedName: string;
  fuzzyScore: number;
  /** True when the full name appears verbatim in the description */
  contained: boolean;
}

export interface AddressDetails extends AddressMatchDetails {
  kind: 'address_match';
}

export interface ExtractedIdentifierDetails {
  kind: 'extracted_email' | 'extracted_business_number' | 'extracted_phone';
  matchedValue: string;
}

export interface ExtractedAddressDetails extends AddressMatchDetails {
  kind: 'extracted_address_fuzzy';
  extractedAddress: string;
}

export interface ExtractedNameDetails {
  kind: 'extracted_name_fuzzy';
  matchedName: string;
  extractedName: string;
  fuzzyScore: number;
}

export interface PropagatedDetails {
  kind: 'email_propagated';
  propagatedFromEmail: string;
  sourceTransactionId: string;
  originalMatchMethod: DirectPiiMethod;
  originalDetails: DirectPiiDetails;
}

export interface PreviouslyMatchedDetails {
  kind: 'previously_matched';
}

export interface NoMatchDetails {
  kind: 'no_match';
}

export type DirectPiiDetails =
  | ExtractedIdentifierDetails
  | ExtractedAddressDetails
  | ExtractedNameDetails;

export type MatchDetails =
  | ExactIdentifierDetails
  | ExactEmailDetails
  | EnhancedManualEntryDetails
  | FuzzyNameDetails
  | AddressDetails
  | DirectPiiDetails
  | PropagatedDetails
  | PreviouslyMatchedDetails
  | NoMatchDetails;

// ============================================
// OUTPUT TYPES
// ============================================

/**
 * Outcome for one transaction. Immutable once created; the confidence band
 * is derived from confidenceScore on demand and never stored.
 */
export interface MatchResult {
  readonly transactionId: string;
  /** Matched client (undefined when unmatched) */
  readonly clientId?: string;
  /** Similarity in [0, 1] */
  readonly confidenceScore: number;
  readonly matchMethod: MatchMethod;
  readonly matchDetails: MatchDetails;
  readonly isMatched: boolean;
  readonly requiresReview: boolean;
}

export type ConfidenceBand = 'high' | 'medium' | 'low';

/** What a single strategy reports when it finds a client */
export interface StrategyHit {
  clientId: string;
  score: number;
  method: MatchMethod;
  details: MatchDetails;
}

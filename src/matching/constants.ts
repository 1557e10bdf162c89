/**
 * Constants for the identity resolution engine.
 *
 * Tunable thresholds live in config/matching.json (see MatchingConfig);
 * the values here are fixed parts of the scoring rules.
 */

// ============================================
// ADDRESS NORMALIZATION
// ============================================

/**
 * Street-type abbreviations expanded to full words.
 * Matched on word boundaries only, so "st" inside "easter" is untouched.
 */
export const STREET_TYPE_ABBREVIATIONS: Readonly<Record<string, string>> = {
  st: 'street',
  rd: 'road',
  ave: 'avenue',
  dr: 'drive',
  pl: 'place',
  cr: 'crescent',
  ct: 'court',
  ln: 'lane',
  wy: 'way',
};

/** Unit / apartment synonyms, all collapsed to the token "u" */
export const UNIT_SYNONYMS: readonly string[] = ['unit', 'apt', 'apartment', 'flat'];

export const UNIT_TOKEN = 'u';

// ============================================
// ADDRESS SCORING
// ============================================

/** Score given when the client's normalized suburb appears in the input */
export const SUBURB_CONTAINMENT_SCORE = 0.85;

/** Score given when the client's literal postcode appears in the raw input */
export const POSTCODE_EXACT_SCORE = 0.9;

/** Inputs shorter than this (after trimming) are never address-matched */
export const MIN_ADDRESS_INPUT_LENGTH = 5;

// ============================================
// POST-REVIEW (PII) MATCHING
// ============================================

/** Confidence of a phone-number match on manually extracted PII */
export const EXTRACTED_PHONE_SCORE = 0.95;

/** Extracted names shorter than this are ignored */
export const MIN_EXTRACTED_NAME_LENGTH = 2;

/** Platform-identifier fields holding a business number */
export const BUSINESS_NUMBER_FIELDS: readonly string[] = ['acn', 'abn'];

// ============================================
// RESULT SHAPE
// ============================================

export const EXACT_SCORE = 1;

export const NO_MATCH_SCORE = 0;

/**
 * Address normalization for similarity comparison.
 *
 * Example transformations:
 * - "12 Smith St."            → "12 smith street"
 * - "Apt 4/7 Jones Rd, Kew"   → "u 4 7 jones road kew"
 * - "Flat 2 - 9 Lee Ct"       → "u 2 9 lee court"
 *
 * Every step is idempotent, so normalizeAddress(normalizeAddress(x)) === normalizeAddress(x).
 */

import { STREET_TYPE_ABBREVIATIONS, UNIT_SYNONYMS, UNIT_TOKEN } from './constants';

const PUNCTUATION = /[,.\-_/]/g;

const STREET_TYPE_PATTERN = new RegExp(
  `\\b(${Object.keys(STREET_TYPE_ABBREVIATIONS).join('|')})\\b`,
  'g'
);

const UNIT_PATTERN = new RegExp(`\\b(${UNIT_SYNONYMS.join('|')})\\b`, 'g');

/**
 * Canonicalizes free-text address input.
 *
 * 1. Lowercase and trim
 * 2. Comma, period, hyphen, underscore and slash become spaces
 * 3. Street-type abbreviations expand to full words
 * 4. Unit/apartment synonyms collapse to "u"
 * 5. Whitespace runs collapse to a single space
 *
 * @returns Normalized text, or "" for empty/absent input
 */
export function normalizeAddress(input: string | null | undefined): string {
  if (!input) {
    return '';
  }

  return input
    .toLowerCase()
    .trim()
    .replace(PUNCTUATION, ' ')
    .replace(STREET_TYPE_PATTERN, (abbreviation: string) => STREET_TYPE_ABBREVIATIONS[abbreviation])
    .replace(UNIT_PATTERN, UNIT_TOKEN)
    .replace(/\s+/g, ' ')
    .trim();
}

export default normalizeAddress;

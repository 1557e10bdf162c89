/**
 * Matching configuration
 *
 * The nested options object consumed by the resolver. Input keys are
 * snake_case (as written in config/matching.json); the parsed object is
 * camelCase and frozen. Scoring, review policy and reporting all read
 * their thresholds from here.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { ConfigurationError } from '../utils/AppError';

const unitInterval = z.number().min(0).max(1);

const matchingConfigSchema = z
  .object({
    confidence_thresholds: z
      .object({
        high: unitInterval.default(0.85),
        medium: unitInterval.default(0.6),
        low: unitInterval.default(0.4),
      })
      .default({}),
    fuzzy_matching: z
      .object({
        name_threshold: unitInterval.default(0.85),
      })
      .default({}),
    address_matching: z
      .object({
        min_score: unitInterval.default(0.8),
        enabled: z.boolean().default(true),
      })
      .default({}),
    enhanced_matching: z
      .object({
        platform: z.string().min(1).default('paper_receipt'),
        name_gate: unitInterval.default(0.6),
        suburb_threshold: unitInterval.default(0.8),
        suburb_boost: unitInterval.default(0.15),
      })
      .default({}),
    post_review: z
      .object({
        address_min_score: unitInterval.default(0.7),
        name_threshold: unitInterval.default(0.75),
        propagated_score: unitInterval.default(0.9),
      })
      .default({}),
  })
  .refine(
    ({ confidence_thresholds: t }) => t.low <= t.medium && t.medium <= t.high,
    {
      message: 'confidence thresholds must satisfy low <= medium <= high',
      path: ['confidence_thresholds'],
    }
  );

export interface ConfidenceThresholds {
  readonly high: number;
  readonly medium: number;
  readonly low: number;
}

export interface MatchingConfig {
  readonly confidenceThresholds: ConfidenceThresholds;
  readonly fuzzyMatching: { readonly nameThreshold: number };
  readonly addressMatching: { readonly minScore: number; readonly enabled: boolean };
  readonly enhancedMatching: {
    readonly platform: string;
    readonly nameGate: number;
    readonly suburbThreshold: number;
    readonly suburbBoost: number;
  };
  readonly postReview: {
    readonly addressMinScore: number;
    readonly nameThreshold: number;
    readonly propagatedScore: number;
  };
}

/**
 * Validates a raw options object and returns the frozen camelCase config.
 * Unset keys fall back to their defaults.
 *
 * @throws ConfigurationError when a value is out of range or the
 *   thresholds are not ordered
 */
export function parseMatchingConfig(raw: unknown = {}): MatchingConfig {
  const result = matchingConfigSchema.safeParse(raw ?? {});

  if (!result.success) {
    const issues = result.error.errors
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid matching configuration: ${issues}`);
  }

  const parsed = result.data;

  return Object.freeze({
    confidenceThresholds: Object.freeze({ ...parsed.confidence_thresholds }),
    fuzzyMatching: Object.freeze({ nameThreshold: parsed.fuzzy_matching.name_threshold }),
    addressMatching: Object.freeze({
      minScore: parsed.address_matching.min_score,
      enabled: parsed.address_matching.enabled,
    }),
    enhancedMatching: Object.freeze({
      platform: parsed.enhanced_matching.platform,
      nameGate: parsed.enhanced_matching.name_gate,
      suburbThreshold: parsed.enhanced_matching.suburb_threshold,
      suburbBoost: parsed.enhanced_matching.suburb_boost,
    }),
    postReview: Object.freeze({
      addressMinScore: parsed.post_review.address_min_score,
      nameThreshold: parsed.post_review.name_threshold,
      propagatedScore: parsed.post_review.propagated_score,
    }),
  });
}

export const defaultMatchingConfig: MatchingConfig = parseMatchingConfig({});

/**
 * Reads matching options from a JSON file. Without a path the defaults
 * are returned.
 */
export async function loadMatchingConfig(path?: string): Promise<MatchingConfig> {
  if (!path) {
    return defaultMatchingConfig;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(await readFile(path, 'utf8'));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Unable to read matching configuration ${path}: ${reason}`);
  }

  return parseMatchingConfig(raw);
}

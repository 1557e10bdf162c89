/**
 * Tests for matching options
 */

import { join } from 'path';
import {
  defaultMatchingConfig,
  loadMatchingConfig,
  parseMatchingConfig,
} from '../../src/config/matching';
import { ConfigurationError } from '../../src/utils/AppError';

const CONFIG_FILE = join(__dirname, '..', '..', 'config', 'matching.json');

describe('parseMatchingConfig', () => {
  it('should fill every option with its default', () => {
    expect(defaultMatchingConfig).toEqual({
      confidenceThresholds: { high: 0.85, medium: 0.6, low: 0.4 },
      fuzzyMatching: { nameThreshold: 0.85 },
      addressMatching: { minScore: 0.8, enabled: true },
      enhancedMatching: {
        platform: 'paper_receipt',
        nameGate: 0.6,
        suburbThreshold: 0.8,
        suburbBoost: 0.15,
      },
      postReview: { addressMinScore: 0.7, nameThreshold: 0.75, propagatedScore: 0.9 },
    });
  });

  it('should treat null as an empty object', () => {
    expect(parseMatchingConfig(null)).toEqual(defaultMatchingConfig);
  });

  it('should override only the given keys', () => {
    const config = parseMatchingConfig({
      fuzzy_matching: { name_threshold: 0.9 },
      address_matching: { enabled: false },
    });

    expect(config.fuzzyMatching.nameThreshold).toBe(0.9);
    expect(config.addressMatching).toEqual({ minScore: 0.8, enabled: false });
    expect(config.confidenceThresholds).toEqual(defaultMatchingConfig.confidenceThresholds);
  });

  it('should freeze the result', () => {
    const config = parseMatchingConfig({});

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.confidenceThresholds)).toBe(true);
  });

  it('should reject values outside [0, 1]', () => {
    expect(() => parseMatchingConfig({ confidence_thresholds: { high: 1.5 } })).toThrow(
      ConfigurationError
    );
    expect(() => parseMatchingConfig({ confidence_thresholds: { high: 1.5 } })).toThrow(
      'confidence_thresholds.high'
    );
  });

  it('should reject unordered thresholds', () => {
    expect(() =>
      parseMatchingConfig({ confidence_thresholds: { high: 0.5, medium: 0.7 } })
    ).toThrow(
      'Invalid matching configuration: confidence_thresholds: confidence thresholds must satisfy low <= medium <= high'
    );
  });

  it('should reject a non-object', () => {
    expect(() => parseMatchingConfig('strict')).toThrow(/^Invalid matching configuration: \(root\)/);
  });
});

describe('loadMatchingConfig', () => {
  it('should return the defaults without a path', async () => {
    await expect(loadMatchingConfig()).resolves.toBe(defaultMatchingConfig);
  });

  it('should read the shipped options file', async () => {
    await expect(loadMatchingConfig(CONFIG_FILE)).resolves.toEqual(defaultMatchingConfig);
  });

  it('should fail with a ConfigurationError when the file is missing', async () => {
    await expect(loadMatchingConfig('/nonexistent/matching.json')).rejects.toThrow(
      ConfigurationError
    );
    await expect(loadMatchingConfig('/nonexistent/matching.json')).rejects.toThrow(
      'Unable to read matching configuration /nonexistent/matching.json'
    );
  });
});

/**
 * Tests for environment parsing
 */

import { parseEnv } from '../../src/config';

describe('parseEnv', () => {
  it('should apply defaults to an empty environment', () => {
    const config = parseEnv({});

    expect(config.NODE_ENV).toBe('development');
    expect(config.PORT).toBe(3000);
    expect(config.API_PREFIX).toBe('/api/v1');
    expect(config.CORS_ORIGIN).toEqual(['*']);
    expect(config.LOG_LEVEL).toBe('info');
    expect(config.REGISTRY_PATH).toBeUndefined();
    expect(config.REPORTS_DIR).toBe('reconciliation_reports');
  });

  it('should coerce numbers and split CORS origins', () => {
    const config = parseEnv({
      PORT: '8080',
      CORS_ORIGIN: 'http://a.test, http://b.test',
    });

    expect(config.PORT).toBe(8080);
    expect(config.CORS_ORIGIN).toEqual(['http://a.test', 'http://b.test']);
  });

  it('should treat blank paths as unset', () => {
    const config = parseEnv({ REGISTRY_PATH: '  ', STRIPE_CSV: ' exports/stripe.csv ' });

    expect(config.REGISTRY_PATH).toBeUndefined();
    expect(config.STRIPE_CSV).toBe('exports/stripe.csv');
  });

  it('should reject invalid values', () => {
    expect(() => parseEnv({ NODE_ENV: 'staging' })).toThrow(/Invalid environment configuration/);
    expect(() => parseEnv({ PORT: '0' })).toThrow(/PORT/);
    expect(() => parseEnv({ API_PREFIX: 'api' })).toThrow(/API_PREFIX/);
  });
});

/**
 * Jest Unit Tests for Analyst Configuration
 *
 * Tests configuration loading, validation, and defaults.
 */

import { DEFAULT_ANALYST_CONFIG, getAnalystConfig, loadAnalystConfig, validateConfig } from '../config.js';

describe('Analyst Configuration', () => {
  // Save original env vars
  const originalEnv = { ...process.env };

  beforeEach(() => {
    delete process.env.ANALYST_SESSION_TTL_MS;
    delete process.env.ANALYST_MAX_HISTORY;
    delete process.env.ANALYST_MAX_SESSIONS;
    delete process.env.ANALYST_FUZZY_THRESHOLD;
    delete process.env.ANALYST_SAMPLE_ROWS;
    delete process.env.ANALYST_HOTSPOT_LIMIT;
  });

  afterAll(() => {
    Object.assign(process.env, originalEnv);
  });

  // ==========================================================================
  // DEFAULTS
  // ==========================================================================

  describe('Default Configuration', () => {
    test('sessions expire after an hour', () => {
      expect(DEFAULT_ANALYST_CONFIG.sessionTtlMs).toBe(3_600_000);
    });

    test('fuzzy threshold is 0.8', () => {
      expect(DEFAULT_ANALYST_CONFIG.fuzzyThreshold).toBe(0.8);
    });

    test('hotspot lists hold five entries', () => {
      expect(DEFAULT_ANALYST_CONFIG.hotspotLimit).toBe(5);
    });

    test('defaults are valid', () => {
      expect(validateConfig(DEFAULT_ANALYST_CONFIG)).toEqual([]);
    });
  });

  // ==========================================================================
  // LOADING
  // ==========================================================================

  describe('loadAnalystConfig', () => {
    test('returns defaults with no env vars', () => {
      expect(loadAnalystConfig()).toEqual(DEFAULT_ANALYST_CONFIG);
    });

    test('reads env vars', () => {
      process.env.ANALYST_SESSION_TTL_MS = '5000';
      process.env.ANALYST_FUZZY_THRESHOLD = '0.9';
      process.env.ANALYST_HOTSPOT_LIMIT = '3';

      const config = loadAnalystConfig();
      expect(config.sessionTtlMs).toBe(5000);
      expect(config.fuzzyThreshold).toBe(0.9);
      expect(config.hotspotLimit).toBe(3);
      expect(config.maxSessions).toBe(500);
    });

    test('ignores values that are not numbers', () => {
      expect(loadAnalystConfig({}, { ANALYST_MAX_HISTORY: 'lots' }).maxHistoryTurns).toBe(20);
    });

    test('overrides win over env vars', () => {
      const config = loadAnalystConfig({ sampleRowLimit: 2 }, { ANALYST_SAMPLE_ROWS: '10' });
      expect(config.sampleRowLimit).toBe(2);
    });

    test('getAnalystConfig returns the same instance', () => {
      expect(getAnalystConfig()).toBe(getAnalystConfig());
    });
  });

  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  describe('validateConfig', () => {
    test('reports every invalid value', () => {
      const errors = validateConfig({
        sessionTtlMs: 10,
        maxHistoryTurns: 0,
        maxSessions: 0,
        fuzzyThreshold: 1.5,
        sampleRowLimit: 500,
        hotspotLimit: 0,
      });

      expect(errors).toEqual([
        'sessionTtlMs must be at least 1000',
        'maxHistoryTurns must be between 1 and 1000',
        'maxSessions must be at least 1',
        'fuzzyThreshold must be greater than 0 and at most 1',
        'sampleRowLimit must be between 0 and 100',
        'hotspotLimit must be between 1 and 50',
      ]);
    });

    test('threshold of exactly 1 is allowed', () => {
      expect(validateConfig({ ...DEFAULT_ANALYST_CONFIG, fuzzyThreshold: 1 })).toEqual([]);
    });
  });
});

/**
 * Analyst Configuration
 *
 * Default configuration values for the analyst engine.
 * Can be overridden via environment variables or per-engine.
 */

import type { AnalystConfig } from '../../common/types.js';

/**
 * Default analyst configuration
 */
export const DEFAULT_ANALYST_CONFIG: AnalystConfig = {
  // Idle sessions expire after one hour
  sessionTtlMs: 60 * 60 * 1000,

  // Turns kept per session, oldest dropped first
  maxHistoryTurns: 20,

  // Sessions in memory before evicting the oldest 20%
  maxSessions: 500,

  // Similarity floor for typo correction ("Karnatka" -> "Karnataka")
  fuzzyThreshold: 0.8,

  sampleRowLimit: 5,

  hotspotLimit: 5,
};

function readInt(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseInt(value, 10);
  return Number.isNaN(parsed) ? undefined : parsed;
}

function readFloat(value: string | undefined): number | undefined {
  if (!value) return undefined;
  const parsed = parseFloat(value);
  return Number.isNaN(parsed) ? undefined : parsed;
}

/**
 * Load configuration from environment variables
 */
export function loadAnalystConfig(
  overrides?: Partial<AnalystConfig>,
  env: NodeJS.ProcessEnv = process.env
): AnalystConfig {
  const envConfig: Partial<AnalystConfig> = {};

  const ttl = readInt(env.ANALYST_SESSION_TTL_MS);
  if (ttl !== undefined) envConfig.sessionTtlMs = ttl;

  const maxHistory = readInt(env.ANALYST_MAX_HISTORY);
  if (maxHistory !== undefined) envConfig.maxHistoryTurns = maxHistory;

  const maxSessions = readInt(env.ANALYST_MAX_SESSIONS);
  if (maxSessions !== undefined) envConfig.maxSessions = maxSessions;

  const threshold = readFloat(env.ANALYST_FUZZY_THRESHOLD);
  if (threshold !== undefined) envConfig.fuzzyThreshold = threshold;

  const sampleRows = readInt(env.ANALYST_SAMPLE_ROWS);
  if (sampleRows !== undefined) envConfig.sampleRowLimit = sampleRows;

  const hotspots = readInt(env.ANALYST_HOTSPOT_LIMIT);
  if (hotspots !== undefined) envConfig.hotspotLimit = hotspots;

  // Merge: defaults < env < overrides
  return {
    ...DEFAULT_ANALYST_CONFIG,
    ...envConfig,
    ...overrides,
  };
}

// Singleton config instance
let configInstance: AnalystConfig | null = null;

/**
 * Get the current analyst configuration (singleton)
 */
export function getAnalystConfig(): AnalystConfig {
  if (!configInstance) {
    configInstance = loadAnalystConfig();
  }
  return configInstance;
}

/**
 * Validate configuration values
 */
export function validateConfig(config: AnalystConfig): string[] {
  const errors: string[] = [];

  if (config.sessionTtlMs < 1000) {
    errors.push('sessionTtlMs must be at least 1000');
  }

  if (config.maxHistoryTurns < 1 || config.maxHistoryTurns > 1000) {
    errors.push('maxHistoryTurns must be between 1 and 1000');
  }

  if (config.maxSessions < 1) {
    errors.push('maxSessions must be at least 1');
  }

  if (config.fuzzyThreshold <= 0 || config.fuzzyThreshold > 1) {
    errors.push('fuzzyThreshold must be greater than 0 and at most 1');
  }

  if (config.sampleRowLimit < 0 || config.sampleRowLimit > 100) {
    errors.push('sampleRowLimit must be between 0 and 100');
  }

  if (config.hotspotLimit < 1 || config.hotspotLimit > 50) {
    errors.push('hotspotLimit must be between 1 and 50');
  }

  return errors;
}

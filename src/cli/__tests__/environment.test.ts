/**
 * Jest Unit Tests for CLI command setup
 */

import { prepareCommand } from '../environment.js';
import { ConfigError } from '../../common/errors.js';
import { getLogLevel, setLogLevel } from '../../common/services/logger.js';

describe('prepareCommand', () => {
  const originalLevel = getLogLevel();

  afterEach(() => {
    setLogLevel(originalLevel);
  });

  test('options win over the environment', () => {
    const env = prepareCommand({ dataset: 'data/tx.db', table: 'payments' }, { DATASET_PATH: 'other.csv' });
    expect(env.DATASET_PATH).toBe('data/tx.db');
    expect(env.DATASET_TABLE).toBe('payments');
  });

  test('an invalid table option is a config error', () => {
    expect(() => prepareCommand({ table: 'payments--' }, {})).toThrow(ConfigError);
  });

  test('an explicit LOG_LEVEL applies', () => {
    prepareCommand({}, { LOG_LEVEL: 'debug' });
    expect(getLogLevel()).toBe('debug');
  });

  test('without LOG_LEVEL only warnings are logged', () => {
    prepareCommand({}, {});
    expect(getLogLevel()).toBe('warn');
  });
});

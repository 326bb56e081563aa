/**
 * Jest Unit Tests for environment parsing and error types
 */

import { datasetBackend, loadEnvironment, loadEnvironmentWith } from '../environment.js';
import { AnalystError, ConfigError, DatasetError, SessionNotFoundError, errorMessage } from '../errors.js';

describe('Environment', () => {
  test('applies defaults', () => {
    expect(loadEnvironment({})).toEqual({
      NODE_ENV: 'development',
      DATASET_PATH: './data/transactions.csv',
      DATASET_TABLE: 'transactions',
      LOG_LEVEL: 'info',
      TRANSPORT: 'stdio',
    });
  });

  test('rejects an unknown log level', () => {
    expect(() => loadEnvironment({ LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });

  test('rejects a table name that is not an identifier', () => {
    expect(() => loadEnvironment({ DATASET_TABLE: 'transactions; drop' })).toThrow(/DATASET_TABLE/);
  });

  test('dataset options override the environment', () => {
    const env = loadEnvironmentWith({ dataset: 'data/tx.db', table: 'payments' }, { DATASET_PATH: 'other.csv' });
    expect(env.DATASET_PATH).toBe('data/tx.db');
    expect(env.DATASET_TABLE).toBe('payments');
  });

  test('a table option that is not an identifier is rejected', () => {
    expect(() => loadEnvironmentWith({ table: 'transactions; drop table x' }, {})).toThrow(ConfigError);
  });

  test.each([
    ['data/tx.db', 'sqlite'],
    ['data/tx.SQLITE3', 'sqlite'],
    ['data/tx.csv', 'memory'],
    ['data/tx.xlsx', 'memory'],
  ] as const)('%s opens as %s', (path, backend) => {
    expect(datasetBackend(path)).toBe(backend);
  });
});

describe('Errors', () => {
  test('subclasses keep their prototype chain and code', () => {
    const error = new SessionNotFoundError('abc');
    expect(error).toBeInstanceOf(SessionNotFoundError);
    expect(error).toBeInstanceOf(AnalystError);
    expect(error.code).toBe('SESSION_NOT_FOUND');
    expect(error.isOperational).toBe(true);
    expect(error.sessionId).toBe('abc');
  });

  test('dataset errors are not operational and keep their cause', () => {
    const cause = new Error('disk');
    const error = new DatasetError('read failed', cause);
    expect(error.isOperational).toBe(false);
    expect(error.cause).toBe(cause);
    expect(error.name).toBe('DatasetError');
  });

  test('errorMessage renders any thrown value', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});

/**
 * Jest Unit Tests for the SQLite dataset accessor
 *
 * Runs against an in-memory better-sqlite3 database.
 */

import Database from 'better-sqlite3';
import {
  compileAggregation,
  compilePredicate,
  SqliteTransactionDataset,
  TRANSACTIONS_SCHEMA_SQL,
} from '../services/sqlite-dataset.js';
import { DatasetError } from '../errors.js';
import { SAMPLE_TRANSACTIONS } from '../../console/analyst/__tests__/fixtures.js';

function seedDatabase(): Database.Database {
  const db = new Database(':memory:');
  db.exec(TRANSACTIONS_SCHEMA_SQL);
  const insert = db.prepare(`
    INSERT INTO transactions VALUES (
      @id, @timestamp, @transaction_type, @merchant_category, @amount, @transaction_status,
      @sender_age_group, @sender_state, @sender_bank, @receiver_age_group, @receiver_bank,
      @device_type, @network_type, @fraud_flag, @hour_of_day, @day_of_week, @is_weekend
    )
  `);
  for (const row of SAMPLE_TRANSACTIONS) {
    insert.run({ ...row, fraud_flag: row.fraud_flag ? 1 : 0, is_weekend: row.is_weekend ? 1 : 0 });
  }
  return db;
}

describe('SqliteTransactionDataset', () => {
  let db: Database.Database;
  let dataset: SqliteTransactionDataset;

  beforeEach(() => {
    db = seedDatabase();
    dataset = new SqliteTransactionDataset(db);
  });

  afterEach(() => {
    db.close();
  });

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  test('aggregate matches the fixture totals', async () => {
    const values = await dataset.aggregate(
      [],
      [
        { op: 'count', alias: 'count' },
        { op: 'sum', field: 'amount', alias: 'total' },
        { op: 'count', alias: 'frauds', where: { field: 'fraud_flag', op: 'eq', value: true } },
      ]
    );
    expect(values).toEqual({ count: 8, total: 2550, frauds: 2 });
  });

  test('aggregate over no rows yields zeros', async () => {
    const values = await dataset.aggregate(
      [{ field: 'merchant_category', op: 'eq', value: 'Fuel' }],
      [
        { op: 'count', alias: 'count' },
        { op: 'avg', field: 'amount', alias: 'average' },
      ]
    );
    expect(values).toEqual({ count: 0, average: 0 });
  });

  test('groupBy returns ordered keys', async () => {
    const groups = await dataset.groupBy('sender_bank', [], [{ op: 'count', alias: 'count' }]);
    expect(groups).toEqual([
      { key: 'HDFC', values: { count: 3 } },
      { key: 'ICICI', values: { count: 1 } },
      { key: 'SBI', values: { count: 4 } },
    ]);
  });

  test('boolean group keys come back as booleans', async () => {
    const groups = await dataset.groupBy('is_weekend', [], [{ op: 'count', alias: 'count' }]);
    expect(groups).toEqual([
      { key: false, values: { count: 5 } },
      { key: true, values: { count: 3 } },
    ]);
  });

  test('ieq filters status case-insensitively', async () => {
    const rows = await dataset.filter([{ field: 'transaction_status', op: 'ieq', value: 'failed' }]);
    expect(rows.map((r) => r.id)).toEqual(['t2', 't7']);
    expect(rows[1]?.fraud_flag).toBe(true);
  });

  test('an empty in-list matches nothing', async () => {
    expect(await dataset.filter([{ field: 'merchant_category', op: 'in', value: [] }])).toEqual([]);
  });

  test('filter honours the limit', async () => {
    expect((await dataset.filter([], { limit: 2 })).map((r) => r.id)).toEqual(['t1', 't2']);
  });

  test('an unknown table is a dataset error', async () => {
    const broken = new SqliteTransactionDataset(db, 'missing_table');
    await expect(broken.filter([])).rejects.toThrow(DatasetError);
  });

  test('a table name that is not an identifier is refused', () => {
    expect(() => new SqliteTransactionDataset(db, 'transactions; drop table transactions')).toThrow(
      'Invalid dataset table name: transactions; drop table transactions'
    );
    expect(() => SqliteTransactionDataset.open('/nonexistent/transactions.db', 'a b')).toThrow(DatasetError);
  });

  test('opening a missing file is a dataset error', () => {
    expect(() => SqliteTransactionDataset.open('/nonexistent/transactions.db')).toThrow(DatasetError);
  });
});

// =============================================================================
// SQL COMPILATION
// =============================================================================

describe('SQL compilation', () => {
  test('predicates bind their values', () => {
    const params: Array<string | number> = [];
    expect(compilePredicate({ field: 'fraud_flag', op: 'eq', value: true }, params)).toBe('fraud_flag = ?');
    expect(compilePredicate({ field: 'sender_bank', op: 'in', value: ['SBI', 'HDFC'] }, params)).toBe(
      'sender_bank IN (?, ?)'
    );
    expect(compilePredicate({ field: 'transaction_status', op: 'ieq', value: 'failed' }, params)).toBe(
      'LOWER(transaction_status) = LOWER(?)'
    );
    expect(params).toEqual([1, 'SBI', 'HDFC', 'failed']);
  });

  test('aggregations alias their columns', () => {
    const params: Array<string | number> = [];
    expect(compileAggregation({ op: 'avg', field: 'amount', alias: 'average' }, params)).toBe(
      'COALESCE(AVG(amount), 0) AS "average"'
    );
    expect(
      compileAggregation({ op: 'count', alias: 'failed', where: { field: 'transaction_status', op: 'ieq', value: 'FAILED' } }, params)
    ).toBe('COALESCE(SUM(CASE WHEN LOWER(transaction_status) = LOWER(?) THEN 1 ELSE 0 END), 0) AS "failed"');
    expect(params).toEqual(['FAILED']);
  });
});

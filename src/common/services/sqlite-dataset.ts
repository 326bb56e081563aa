/**
 * SQLite Transaction Dataset
 *
 * Read-only accessor over a better-sqlite3 connection. Predicates and
 * aggregations are compiled to parameterised SQL; column names come from the
 * typed Transaction field list and are never taken from user text.
 */

import Database from 'better-sqlite3';
import type {
  Aggregation,
  FilterOptions,
  GroupableField,
  GroupRow,
  Predicate,
  Transaction,
  TransactionDataset,
} from '../types.js';
import { DatasetError, errorMessage } from '../errors.js';
import { TABLE_NAME_PATTERN } from '../environment.js';
import { logDebug } from './logger.js';
import { isBooleanField, isRecord, toTransaction } from './transaction-dataset.js';

type SqlParam = string | number;

/**
 * Table layout expected by the accessor
 */
export const TRANSACTIONS_SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS transactions (
    id TEXT PRIMARY KEY,
    timestamp TEXT NOT NULL,
    transaction_type TEXT NOT NULL,
    merchant_category TEXT NOT NULL,
    amount REAL NOT NULL,
    transaction_status TEXT NOT NULL,
    sender_age_group TEXT NOT NULL,
    sender_state TEXT NOT NULL,
    sender_bank TEXT NOT NULL,
    receiver_age_group TEXT NOT NULL,
    receiver_bank TEXT NOT NULL,
    device_type TEXT NOT NULL,
    network_type TEXT NOT NULL,
    fraud_flag INTEGER NOT NULL DEFAULT 0,
    hour_of_day INTEGER NOT NULL,
    day_of_week INTEGER NOT NULL,
    is_weekend INTEGER NOT NULL DEFAULT 0
  );
  CREATE INDEX IF NOT EXISTS idx_transactions_category ON transactions (merchant_category);
  CREATE INDEX IF NOT EXISTS idx_transactions_state ON transactions (sender_state);
  CREATE INDEX IF NOT EXISTS idx_transactions_fraud ON transactions (fraud_flag);
`;

// =============================================================================
// SQL COMPILATION
// =============================================================================

function toParam(value: string | number | boolean): SqlParam {
  return typeof value === 'boolean' ? (value ? 1 : 0) : value;
}

/**
 * Compile one predicate to a SQL fragment
 */
export function compilePredicate(predicate: Predicate, params: SqlParam[]): string {
  const column = predicate.field;

  switch (predicate.op) {
    case 'eq':
      params.push(toParam(predicate.value));
      return `${column} = ?`;

    case 'ieq':
      params.push(predicate.value);
      return `LOWER(${column}) = LOWER(?)`;

    case 'in':
      if (predicate.value.length === 0) return '0';
      for (const value of predicate.value) params.push(toParam(value));
      return `${column} IN (${predicate.value.map(() => '?').join(', ')})`;

    case 'gte':
      params.push(predicate.value);
      return `${column} >= ?`;

    case 'lte':
      params.push(predicate.value);
      return `${column} <= ?`;
  }
}

function compileWhere(predicates: Predicate[], params: SqlParam[]): string {
  if (predicates.length === 0) return '';
  return ` WHERE ${predicates.map((p) => compilePredicate(p, params)).join(' AND ')}`;
}

/**
 * Compile one aggregation to a SELECT expression
 *
 * Parameters for `where` clauses come before WHERE parameters, matching
 * their position in the statement.
 */
export function compileAggregation(agg: Aggregation, params: SqlParam[]): string {
  const alias = `"${agg.alias.replace(/"/g, '')}"`;

  if (agg.op === 'count') {
    if (agg.where) {
      return `COALESCE(SUM(CASE WHEN ${compilePredicate(agg.where, params)} THEN 1 ELSE 0 END), 0) AS ${alias}`;
    }
    return `COUNT(*) AS ${alias}`;
  }

  if (!agg.field) {
    return `0 AS ${alias}`;
  }

  const column = agg.where
    ? `CASE WHEN ${compilePredicate(agg.where, params)} THEN ${agg.field} END`
    : agg.field;
  return `COALESCE(${agg.op.toUpperCase()}(${column}), 0) AS ${alias}`;
}

function readNumbers(row: unknown, aggregations: Aggregation[]): Record<string, number> {
  const values: Record<string, number> = {};
  for (const agg of aggregations) {
    const raw = isRecord(row) ? row[agg.alias] : undefined;
    const value = typeof raw === 'number' ? raw : Number(raw ?? 0);
    values[agg.alias] = Number.isFinite(value) ? value : 0;
  }
  return values;
}

// The table name is interpolated into every statement
function assertTableName(table: string): void {
  if (!TABLE_NAME_PATTERN.test(table)) {
    throw new DatasetError(`Invalid dataset table name: ${table}`);
  }
}

// =============================================================================
// ACCESSOR
// =============================================================================

export class SqliteTransactionDataset implements TransactionDataset {
  /**
   * @throws DatasetError when the table name is not a plain SQL identifier
   */
  constructor(
    private readonly db: Database.Database,
    private readonly table: string = 'transactions'
  ) {
    assertTableName(table);
  }

  /**
   * Open an existing database file read-only
   */
  static open(path: string, table: string = 'transactions'): SqliteTransactionDataset {
    assertTableName(table);
    try {
      const db = new Database(path, { readonly: true, fileMustExist: true });
      return new SqliteTransactionDataset(db, table);
    } catch (error) {
      throw new DatasetError(`Failed to open dataset database ${path}: ${errorMessage(error)}`, error);
    }
  }

  async filter(predicates: Predicate[], options: FilterOptions = {}): Promise<Transaction[]> {
    const params: SqlParam[] = [];
    let sql = `SELECT * FROM ${this.table}${compileWhere(predicates, params)} ORDER BY rowid`;
    if (options.limit !== undefined) {
      sql += ' LIMIT ?';
      params.push(options.limit);
    }

    const rows = this.run(sql, params);
    const transactions: Transaction[] = [];
    rows.forEach((row, index) => {
      const transaction = isRecord(row) ? toTransaction(row, index) : null;
      if (transaction) transactions.push(transaction);
    });
    return transactions;
  }

  async aggregate(predicates: Predicate[], aggregations: Aggregation[]): Promise<Record<string, number>> {
    const params: SqlParam[] = [];
    const select = aggregations.map((agg) => compileAggregation(agg, params)).join(', ');
    const sql = `SELECT ${select} FROM ${this.table}${compileWhere(predicates, params)}`;

    const rows = this.run(sql, params);
    return readNumbers(rows[0], aggregations);
  }

  async groupBy(
    dimension: GroupableField,
    predicates: Predicate[],
    aggregations: Aggregation[]
  ): Promise<GroupRow[]> {
    const params: SqlParam[] = [];
    const select = aggregations.map((agg) => compileAggregation(agg, params)).join(', ');
    const sql =
      `SELECT ${dimension} AS group_key, ${select} FROM ${this.table}` +
      `${compileWhere(predicates, params)} GROUP BY ${dimension} ORDER BY ${dimension}`;

    const rows = this.run(sql, params);
    const groups: GroupRow[] = [];

    for (const row of rows) {
      if (!isRecord(row)) continue;
      const rawKey = row.group_key;
      if (typeof rawKey !== 'string' && typeof rawKey !== 'number') continue;

      const key = isBooleanField(dimension) ? rawKey === 1 || rawKey === '1' : rawKey;
      groups.push({ key, values: readNumbers(row, aggregations) });
    }

    return groups;
  }

  private run(sql: string, params: SqlParam[]): unknown[] {
    logDebug('Executing dataset SQL', { phase: 'dataset', sql });
    try {
      return this.db.prepare(sql).all(...params);
    } catch (error) {
      throw new DatasetError(`Dataset query failed: ${errorMessage(error)}`, error);
    }
  }
}

/**
 * In-Memory Transaction Dataset
 *
 * Holds the rows in a frozen array and answers filter/aggregate/groupBy
 * without any database. Spreadsheet and CSV files are read through xlsx.
 */

import * as XLSX from 'xlsx';
import type {
  Aggregation,
  FieldValue,
  FilterOptions,
  GroupableField,
  GroupRow,
  Predicate,
  Transaction,
  TransactionDataset,
} from '../types.js';
import { DatasetError, errorMessage } from '../errors.js';
import { logInfo, logWarn } from './logger.js';
import {
  compareGroupKeys,
  computeFinalResults,
  createEmptyState,
  isRecord,
  matchesAll,
  toTransaction,
  updateAccumulator,
  type AggregatorState,
} from './transaction-dataset.js';

export class InMemoryTransactionDataset implements TransactionDataset {
  private readonly rows: readonly Transaction[];

  constructor(rows: Transaction[]) {
    this.rows = Object.freeze(rows.map((row) => Object.freeze({ ...row })));
  }

  /**
   * Load rows from a CSV or XLSX file (first sheet)
   *
   * Rows without a numeric amount are skipped with a warning.
   */
  static fromFile(path: string): InMemoryTransactionDataset {
    let workbook: XLSX.WorkBook;
    try {
      workbook = XLSX.readFile(path, { cellDates: true });
    } catch (error) {
      throw new DatasetError(`Failed to read dataset file ${path}: ${errorMessage(error)}`, error);
    }

    const sheetName = workbook.SheetNames[0];
    const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
    if (!sheet) {
      throw new DatasetError(`Dataset file ${path} has no sheets`);
    }

    const rawRows: unknown[] = XLSX.utils.sheet_to_json(sheet, { defval: null });
    const rows: Transaction[] = [];
    let skipped = 0;

    rawRows.forEach((raw, index) => {
      const row = isRecord(raw) ? toTransaction(raw, index) : null;
      if (row) {
        rows.push(row);
      } else {
        skipped++;
      }
    });

    if (skipped > 0) {
      logWarn('Skipped unreadable dataset rows', { phase: 'load', rows: skipped, path });
    }
    logInfo('Dataset loaded', { phase: 'load', rows: rows.length, path });

    return new InMemoryTransactionDataset(rows);
  }

  get size(): number {
    return this.rows.length;
  }

  async filter(predicates: Predicate[], options: FilterOptions = {}): Promise<Transaction[]> {
    const matched: Transaction[] = [];
    for (const row of this.rows) {
      if (!matchesAll(row, predicates)) continue;
      matched.push(row);
      if (options.limit !== undefined && matched.length >= options.limit) break;
    }
    return matched;
  }

  async aggregate(predicates: Predicate[], aggregations: Aggregation[]): Promise<Record<string, number>> {
    const state = createEmptyState(aggregations);
    for (const row of this.rows) {
      if (matchesAll(row, predicates)) {
        updateAccumulator(state, aggregations, row);
      }
    }
    return computeFinalResults(state, aggregations);
  }

  async groupBy(
    dimension: GroupableField,
    predicates: Predicate[],
    aggregations: Aggregation[]
  ): Promise<GroupRow[]> {
    const groupStates = new Map<FieldValue, AggregatorState>();

    for (const row of this.rows) {
      if (!matchesAll(row, predicates)) continue;

      const key = row[dimension];
      let state = groupStates.get(key);
      if (!state) {
        state = createEmptyState(aggregations);
        groupStates.set(key, state);
      }
      updateAccumulator(state, aggregations, row);
    }

    const groups: GroupRow[] = [];
    for (const [key, state] of groupStates) {
      groups.push({ key, values: computeFinalResults(state, aggregations) });
    }

    groups.sort((a, b) => compareGroupKeys(a.key, b.key));
    return groups;
  }
}

/**
 * Per-call plan context
 *
 * Wraps the dataset for one builder call with a fixed predicate list. Group
 * queries are memoised by dimension, so a builder asking for the same
 * dimension twice (fraud by category and category hotspots) hits the dataset
 * once.
 */

import type {
  Aggregation,
  EntitySet,
  FieldValue,
  GroupableField,
  GroupRow,
  IntentType,
  Predicate,
  Transaction,
  TransactionDataset,
} from '../../../common/types.js';
import { logDebug } from '../../../common/services/logger.js';

export interface PlanRequest {
  intent: IntentType;
  /** Merged entities for the turn */
  entities: EntitySet;
  /** Raw question text, for cues the entity set does not carry */
  query: string;
}

export interface PlanSettings {
  sampleRowLimit: number;
  hotspotLimit: number;
}

/**
 * Aggregates computed for every group
 */
export const STANDARD_AGGREGATIONS: Aggregation[] = [
  { op: 'count', alias: 'count' },
  { op: 'sum', field: 'amount', alias: 'total_amount' },
  { op: 'avg', field: 'amount', alias: 'average_amount' },
  { op: 'count', alias: 'fraud_count', where: { field: 'fraud_flag', op: 'eq', value: true } },
  { op: 'count', alias: 'failed_count', where: { field: 'transaction_status', op: 'ieq', value: 'failed' } },
  { op: 'count', alias: 'success_count', where: { field: 'transaction_status', op: 'ieq', value: 'success' } },
];

export interface StandardValues {
  count: number;
  total_amount: number;
  average_amount: number;
  fraud_count: number;
  failed_count: number;
  success_count: number;
}

export interface StandardGroup extends StandardValues {
  key: FieldValue;
}

export function toStandardValues(values: Record<string, number>): StandardValues {
  return {
    count: values.count ?? 0,
    total_amount: values.total_amount ?? 0,
    average_amount: values.average_amount ?? 0,
    fraud_count: values.fraud_count ?? 0,
    failed_count: values.failed_count ?? 0,
    success_count: values.success_count ?? 0,
  };
}

export class PlanContext {
  private readonly groupCache = new Map<GroupableField, Promise<StandardGroup[]>>();
  private queryCount = 0;

  constructor(
    private readonly dataset: TransactionDataset,
    readonly predicates: Predicate[],
    readonly settings: PlanSettings
  ) {}

  /** Dataset calls issued so far */
  get queries(): number {
    return this.queryCount;
  }

  /**
   * Standard aggregates per group of `dimension` under the context predicates
   */
  groupBy(dimension: GroupableField): Promise<StandardGroup[]> {
    const cached = this.groupCache.get(dimension);
    if (cached) return cached;

    this.queryCount++;
    logDebug('Grouping dataset', { phase: 'plan', dimension });

    const pending = this.dataset
      .groupBy(dimension, this.predicates, STANDARD_AGGREGATIONS)
      .then((rows: GroupRow[]) => rows.map((row) => ({ key: row.key, ...toStandardValues(row.values) })));

    this.groupCache.set(dimension, pending);
    return pending;
  }

  async totals(): Promise<StandardValues> {
    this.queryCount++;
    const values = await this.dataset.aggregate(this.predicates, STANDARD_AGGREGATIONS);
    return toStandardValues(values);
  }

  rows(limit?: number): Promise<Transaction[]> {
    this.queryCount++;
    return this.dataset.filter(this.predicates, limit === undefined ? {} : { limit });
  }
}

// =============================================================================
// NUMBERS
// =============================================================================

export function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Percentage of `part` in `whole`, 0 when `whole` is 0
 */
export function percent(part: number, whole: number): number {
  return whole > 0 ? round2((part / whole) * 100) : 0;
}

export function groupLabel(key: FieldValue): string {
  return String(key);
}

/**
 * Transaction Dataset Helpers
 *
 * Predicate evaluation, streaming aggregation accumulators and row
 * normalisation shared by the dataset accessors.
 *
 * Aggregation state is O(number of groups): each row updates running
 * sums/counts/mins/maxs and final values are computed once at the end.
 */

import type {
  Aggregation,
  FieldValue,
  GroupableField,
  Predicate,
  Transaction,
} from '../types.js';

// =============================================================================
// PREDICATES
// =============================================================================

/**
 * Check a single predicate against a row
 */
export function matchesPredicate(row: Transaction, predicate: Predicate): boolean {
  const rowValue = row[predicate.field];

  switch (predicate.op) {
    case 'eq':
      return rowValue === predicate.value;

    case 'ieq':
      return typeof rowValue === 'string' && rowValue.toLowerCase() === predicate.value.toLowerCase();

    case 'in':
      return predicate.value.some((v) => v === rowValue);

    case 'gte':
      return typeof rowValue === 'number' && rowValue >= predicate.value;

    case 'lte':
      return typeof rowValue === 'number' && rowValue <= predicate.value;
  }
}

/**
 * AND-compose a predicate list
 */
export function matchesAll(row: Transaction, predicates: Predicate[]): boolean {
  return predicates.every((p) => matchesPredicate(row, p));
}

// =============================================================================
// AGGREGATION ACCUMULATORS
// =============================================================================

export interface AggregatorState {
  /** Running sums for each alias */
  sums: Record<string, number>;
  /** Record counts for each alias (used for AVG and COUNT) */
  counts: Record<string, number>;
  /** Minimum values for each alias */
  mins: Record<string, number>;
  /** Maximum values for each alias */
  maxs: Record<string, number>;
}

/**
 * Create empty aggregator state for a set of aggregations
 */
export function createEmptyState(aggregations: Aggregation[]): AggregatorState {
  const state: AggregatorState = {
    sums: {},
    counts: {},
    mins: {},
    maxs: {},
  };

  for (const agg of aggregations) {
    state.sums[agg.alias] = 0;
    state.counts[agg.alias] = 0;
    state.mins[agg.alias] = Infinity;
    state.maxs[agg.alias] = -Infinity;
  }

  return state;
}

/**
 * Fold one row into the accumulators
 */
export function updateAccumulator(state: AggregatorState, aggregations: Aggregation[], row: Transaction): void {
  for (const agg of aggregations) {
    if (agg.where && !matchesPredicate(row, agg.where)) continue;

    if (agg.op === 'count') {
      state.counts[agg.alias] += 1;
      continue;
    }

    if (!agg.field) continue;
    const value = row[agg.field];
    if (typeof value !== 'number' || Number.isNaN(value)) continue;

    state.sums[agg.alias] += value;
    state.counts[agg.alias] += 1;
    if (value < state.mins[agg.alias]) state.mins[agg.alias] = value;
    if (value > state.maxs[agg.alias]) state.maxs[agg.alias] = value;
  }
}

/**
 * Compute final values from accumulator state
 *
 * Empty inputs produce 0 rather than Infinity/NaN.
 */
export function computeFinalResults(state: AggregatorState, aggregations: Aggregation[]): Record<string, number> {
  const results: Record<string, number> = {};

  for (const agg of aggregations) {
    const count = state.counts[agg.alias];
    switch (agg.op) {
      case 'count':
        results[agg.alias] = count;
        break;
      case 'sum':
        results[agg.alias] = state.sums[agg.alias];
        break;
      case 'avg':
        results[agg.alias] = count > 0 ? state.sums[agg.alias] / count : 0;
        break;
      case 'min':
        results[agg.alias] = count > 0 ? state.mins[agg.alias] : 0;
        break;
      case 'max':
        results[agg.alias] = count > 0 ? state.maxs[agg.alias] : 0;
        break;
    }
  }

  return results;
}

/**
 * Stable ordering of group keys: numbers numerically, booleans false first,
 * strings by locale
 */
export function compareGroupKeys(a: FieldValue, b: FieldValue): number {
  if (typeof a === 'number' && typeof b === 'number') return a - b;
  if (typeof a === 'boolean' && typeof b === 'boolean') return Number(a) - Number(b);
  return String(a).localeCompare(String(b));
}

export const BOOLEAN_FIELDS: ReadonlySet<keyof Transaction> = new Set<keyof Transaction>(['fraud_flag', 'is_weekend']);

export function isBooleanField(field: GroupableField | keyof Transaction): boolean {
  return BOOLEAN_FIELDS.has(field);
}

// =============================================================================
// ROW NORMALISATION
// =============================================================================

const DAY_NUMBERS: Record<string, number> = {
  monday: 0,
  tuesday: 1,
  wednesday: 2,
  thursday: 3,
  friday: 4,
  saturday: 5,
  sunday: 6,
};

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * First non-empty value among alternative column names
 *
 * Spreadsheet exports use "transaction type" or "amount (INR)" where the
 * database uses snake_case.
 */
function pick(raw: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    const value = raw[key];
    if (value !== undefined && value !== null && value !== '') return value;
  }
  return undefined;
}

function asText(value: unknown, fallback: string): string {
  if (value === undefined || value === null) return fallback;
  const text = String(value).trim();
  return text.length > 0 ? text : fallback;
}

function asNumber(value: unknown): number | null {
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value.replace(/,/g, ''));
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

function asBoolean(value: unknown): boolean {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'number') return value !== 0;
  if (typeof value === 'string') return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
  return false;
}

function asDayOfWeek(value: unknown): number {
  const numeric = asNumber(value);
  if (numeric !== null) return numeric;
  if (typeof value === 'string') return DAY_NUMBERS[value.trim().toLowerCase()] ?? 0;
  return 0;
}

function asTimestamp(value: unknown): string {
  if (value instanceof Date) return value.toISOString();
  return asText(value, '');
}

/**
 * Convert a raw record (spreadsheet row or SQL row) into a Transaction
 *
 * @returns null when the row has no usable amount
 */
export function toTransaction(raw: Record<string, unknown>, index: number): Transaction | null {
  const amount = asNumber(pick(raw, 'amount', 'amount (INR)', 'amount_inr'));
  if (amount === null) return null;

  const hour = asNumber(pick(raw, 'hour_of_day')) ?? 12;
  const day = asDayOfWeek(pick(raw, 'day_of_week'));

  return {
    id: asText(pick(raw, 'id', 'transaction_id', 'transaction id'), String(index + 1)),
    timestamp: asTimestamp(pick(raw, 'timestamp')),
    transaction_type: asText(pick(raw, 'transaction_type', 'transaction type'), 'P2P'),
    merchant_category: asText(pick(raw, 'merchant_category'), 'Other'),
    amount,
    transaction_status: asText(pick(raw, 'transaction_status', 'status'), 'SUCCESS'),
    sender_age_group: asText(pick(raw, 'sender_age_group'), 'Unknown'),
    sender_state: asText(pick(raw, 'sender_state'), 'Unknown'),
    sender_bank: asText(pick(raw, 'sender_bank'), 'Unknown'),
    receiver_age_group: asText(pick(raw, 'receiver_age_group'), 'Unknown'),
    receiver_bank: asText(pick(raw, 'receiver_bank'), 'Unknown'),
    device_type: asText(pick(raw, 'device_type'), 'Unknown'),
    network_type: asText(pick(raw, 'network_type'), 'Unknown'),
    fraud_flag: asBoolean(pick(raw, 'fraud_flag')),
    hour_of_day: hour,
    day_of_week: day,
    is_weekend: asBoolean(pick(raw, 'is_weekend')),
  };
}

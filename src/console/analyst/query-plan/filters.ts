/**
 * Entity -> predicate translation
 *
 * Undirected keys fall back to the sender column. Receiver state has no
 * column, so it is dropped with a note instead of returning an empty result.
 */

import type {
  EntitySet,
  FilterKey,
  GroupableField,
  GroupingDimension,
  Predicate,
  TimeReference,
} from '../../../common/types.js';

export interface ResolvedFilters {
  predicates: Predicate[];
  notes: string[];
}

export interface FilterOptions {
  /** Columns left unfiltered (the grouping column of a comparison) */
  exclude?: readonly GroupableField[];
}

export const RECEIVER_STATE_NOTE = 'Receiver state is not recorded; the receiver state filter was ignored.';

const FILTER_COLUMNS: Record<FilterKey, GroupableField | null> = {
  merchant_category: 'merchant_category',
  sender_state: 'sender_state',
  receiver_state: null,
  sender_age_group: 'sender_age_group',
  receiver_age_group: 'receiver_age_group',
  sender_bank: 'sender_bank',
  receiver_bank: 'receiver_bank',
  device_type: 'device_type',
  network_type: 'network_type',
  transaction_type: 'transaction_type',
  transaction_status: 'transaction_status',
  state: 'sender_state',
  age_group: 'sender_age_group',
  bank: 'sender_bank',
};

/** Directional keys first so an undirected duplicate never adds a second predicate */
const FILTER_ORDER: readonly FilterKey[] = [
  'merchant_category',
  'sender_state',
  'receiver_state',
  'sender_age_group',
  'receiver_age_group',
  'sender_bank',
  'receiver_bank',
  'device_type',
  'network_type',
  'transaction_type',
  'transaction_status',
  'state',
  'age_group',
  'bank',
];

/**
 * Hours covered by the part-of-day references
 */
export const TIME_BUCKETS: Partial<Record<TimeReference, number[]>> = {
  morning: [6, 7, 8, 9, 10, 11],
  afternoon: [12, 13, 14, 15, 16],
  evening: [17, 18, 19, 20],
  night: [21, 22, 23, 0, 1, 2, 3, 4, 5],
};

/**
 * Dataset column for a grouping dimension; undirected names use the sender side
 *
 * @returns null for receiver state, which has no column
 */
export function groupingColumn(dimension: GroupingDimension): GroupableField | null {
  switch (dimension) {
    case 'bank':
      return 'sender_bank';
    case 'state':
      return 'sender_state';
    case 'age_group':
      return 'sender_age_group';
    case 'receiver_state':
      return null;
    default:
      return dimension;
  }
}

export function hasTimeKeys(entities: EntitySet): boolean {
  return (
    entities.time_reference !== undefined ||
    entities.hour_of_day !== undefined ||
    entities.day_of_week !== undefined ||
    entities.is_weekend !== undefined
  );
}

/**
 * Build AND-composed predicates from an entity set
 */
export function buildFilters(entities: EntitySet, options: FilterOptions = {}): ResolvedFilters {
  const exclude = new Set<GroupableField>(options.exclude ?? []);
  const predicates: Predicate[] = [];
  const notes: string[] = [];
  const used = new Set<GroupableField>();

  for (const key of FILTER_ORDER) {
    const value = entities[key];
    if (value === undefined) continue;

    const column = FILTER_COLUMNS[key];
    if (column === null) {
      notes.push(RECEIVER_STATE_NOTE);
      continue;
    }
    if (exclude.has(column) || used.has(column)) continue;

    used.add(column);
    predicates.push(
      column === 'transaction_status'
        ? { field: column, op: 'ieq', value }
        : { field: column, op: 'eq', value }
    );
  }

  if (entities.hour_of_day !== undefined && !exclude.has('hour_of_day')) {
    predicates.push({ field: 'hour_of_day', op: 'eq', value: entities.hour_of_day });
  }
  if (entities.day_of_week !== undefined && !exclude.has('day_of_week')) {
    predicates.push({ field: 'day_of_week', op: 'eq', value: entities.day_of_week });
  }
  if (entities.is_weekend !== undefined && !exclude.has('is_weekend')) {
    predicates.push({ field: 'is_weekend', op: 'eq', value: entities.is_weekend });
  }

  const bucket = entities.time_reference ? TIME_BUCKETS[entities.time_reference] : undefined;
  if (bucket && !exclude.has('hour_of_day')) {
    predicates.push({ field: 'hour_of_day', op: 'in', value: bucket });
  }

  return { predicates, notes };
}

/**
 * EntitySet key groups and copy helpers
 */

import type { DimensionFamily, EntityKey, EntitySet } from '../../common/types.js';

export const ENTITY_KEYS: readonly EntityKey[] = [
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
  'bank',
  'state',
  'age_group',
  'comparison_dimension',
  'comparison_values',
  'segment_by',
  'metric',
  'time_reference',
  'hour_of_day',
  'day_of_week',
  'is_weekend',
  'top_n',
  'bottom_n',
];

/** Keys that say how a turn groups its rows */
export const GROUPING_KEYS: readonly EntityKey[] = ['comparison_dimension', 'comparison_values', 'segment_by'];

/** Keys of one direction-sensitive family; writing one replaces the others */
export const FAMILY_KEYS: Record<DimensionFamily, readonly EntityKey[]> = {
  bank: ['bank', 'sender_bank', 'receiver_bank'],
  state: ['state', 'sender_state', 'receiver_state'],
  age_group: ['age_group', 'sender_age_group', 'receiver_age_group'],
};

export function copyEntity<K extends EntityKey>(target: EntitySet, source: EntitySet, key: K): void {
  const value = source[key];
  if (value !== undefined) target[key] = value;
}

/**
 * Lay the defined keys of `top` over a copy of `base`
 */
export function overlayEntities(base: EntitySet, top: EntitySet): EntitySet {
  const result: EntitySet = { ...base };
  for (const key of ENTITY_KEYS) copyEntity(result, top, key);
  return result;
}

export function countEntities(entities: EntitySet): number {
  return ENTITY_KEYS.filter((key) => entities[key] !== undefined).length;
}

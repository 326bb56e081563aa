/**
 * Comparative plan: one row per group, sorted by the asked-for metric
 *
 * "top 5 in Food" style questions take a shortcut: group by category,
 * rank by transaction count and keep N.
 */

import type {
  ComparativeResult,
  ComparisonGroup,
  GroupableField,
  Metric,
  Predicate,
  SortMetric,
  TransactionDataset,
} from '../../../common/types.js';
import { NO_MATCH_NOTE } from './descriptive.js';
import { buildFilters, groupingColumn, RECEIVER_STATE_NOTE } from './filters.js';
import { PlanContext, groupLabel, percent, round2, type PlanRequest, type PlanSettings, type StandardGroup } from './plan-context.js';

const SORT_METRICS: Record<Metric, SortMetric> = {
  count: 'transaction_count',
  avg: 'average_amount',
  amount: 'total_amount',
  fraud_rate: 'fraud_rate',
  failure_rate: 'failure_rate',
};

export function toComparisonGroup(group: StandardGroup): ComparisonGroup {
  return {
    group: groupLabel(group.key),
    transaction_count: group.count,
    average_amount: round2(group.average_amount),
    total_amount: round2(group.total_amount),
    success_rate: percent(group.success_count, group.count),
    fraud_rate: percent(group.fraud_count, group.count),
    failure_rate: percent(group.failed_count, group.count),
  };
}

/**
 * "top N" with a category filter and no grouping of its own
 */
function isTopCategoryRanking(request: PlanRequest): boolean {
  const { entities } = request;
  return (
    entities.top_n !== undefined &&
    entities.merchant_category !== undefined &&
    entities.comparison_dimension === undefined &&
    entities.segment_by === undefined
  );
}

/**
 * Grouping column and any note about how it was chosen
 */
function comparisonColumn(request: PlanRequest): { column: GroupableField; notes: string[] } {
  const { entities } = request;

  if (entities.comparison_dimension !== undefined) {
    const column = groupingColumn(entities.comparison_dimension);
    if (column) return { column, notes: [] };
    return { column: 'sender_state', notes: [RECEIVER_STATE_NOTE] };
  }

  // A single device type is compared across networks
  return { column: entities.device_type !== undefined ? 'network_type' : 'device_type', notes: [] };
}

export async function buildComparative(
  dataset: TransactionDataset,
  request: PlanRequest,
  settings: PlanSettings
): Promise<ComparativeResult> {
  const { entities } = request;

  if (isTopCategoryRanking(request)) {
    const limit = entities.top_n ?? 0;
    const { predicates, notes } = buildFilters(entities, { exclude: ['merchant_category'] });
    const context = new PlanContext(dataset, predicates, settings);
    const groups = await context.groupBy('merchant_category');

    const data = groups
      .map(toComparisonGroup)
      .sort((a, b) => b.transaction_count - a.transaction_count || a.group.localeCompare(b.group));

    if (data.length === 0) notes.push(NO_MATCH_NOTE);

    return {
      kind: 'comparative',
      comparison_key: 'merchant_category',
      data: data.slice(0, limit),
      sort_metric: 'transaction_count',
      sort_order: 'desc',
      ranking: 'top_n_within_category',
      limit,
      best_performer: data.length > 0 ? data[0].group : null,
      total_count: data.reduce((sum, g) => sum + g.transaction_count, 0),
      filters_applied: predicates,
      notes,
    };
  }

  const { column, notes: columnNotes } = comparisonColumn(request);
  const { predicates, notes } = buildFilters(entities, { exclude: [column] });
  notes.unshift(...columnNotes);

  const values = entities.comparison_values;
  const scoped: Predicate[] = values && values.length > 0 ? [...predicates, { field: column, op: 'in', value: values }] : predicates;

  const context = new PlanContext(dataset, scoped, settings);
  const groups = await context.groupBy(column);

  const sortMetric = SORT_METRICS[entities.metric ?? 'avg'];
  const ascending = entities.bottom_n !== undefined;
  const data = groups.map(toComparisonGroup).sort((a, b) => {
    const diff = ascending ? a[sortMetric] - b[sortMetric] : b[sortMetric] - a[sortMetric];
    return diff || a.group.localeCompare(b.group);
  });

  let bestPerformer: string | null = null;
  let bestValue = -Infinity;
  for (const group of data) {
    if (group[sortMetric] > bestValue) {
      bestValue = group[sortMetric];
      bestPerformer = group.group;
    }
  }

  const limit = entities.top_n ?? entities.bottom_n;
  if (data.length === 0) notes.push(NO_MATCH_NOTE);

  const result: ComparativeResult = {
    kind: 'comparative',
    comparison_key: column,
    data: limit !== undefined ? data.slice(0, limit) : data,
    sort_metric: sortMetric,
    sort_order: ascending ? 'asc' : 'desc',
    best_performer: bestPerformer,
    total_count: data.reduce((sum, g) => sum + g.transaction_count, 0),
    filters_applied: scoped,
    notes,
  };
  if (limit !== undefined) result.limit = limit;

  return result;
}

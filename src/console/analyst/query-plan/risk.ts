/**
 * Risk plan: fraud and failure rates, optional hotspots and group breakdown
 *
 * Hotspot lists are only produced for questions with a ranking cue ("top",
 * "highest", "worst") and only for the metric the question is about: failure
 * hotspots when it asks about failures, fraud hotspots otherwise.
 */

import type {
  GroupableField,
  Hotspot,
  RiskGroup,
  RiskLevel,
  RiskResult,
  TransactionDataset,
} from '../../../common/types.js';
import { NO_MATCH_NOTE } from './descriptive.js';
import { buildFilters, groupingColumn, RECEIVER_STATE_NOTE } from './filters.js';
import { PlanContext, groupLabel, percent, type PlanRequest, type PlanSettings, type StandardGroup } from './plan-context.js';

const RANKING_CUE = /\b(?:top|highest|worst)\b/i;

type HotspotMetric = 'fraud' | 'failure';

const HOTSPOT_DIMENSIONS: Array<{ suffix: 'category' | 'state' | 'bank'; column: GroupableField }> = [
  { suffix: 'category', column: 'merchant_category' },
  { suffix: 'state', column: 'sender_state' },
  { suffix: 'bank', column: 'sender_bank' },
];

export function riskLevel(fraudRatePercent: number): RiskLevel {
  if (fraudRatePercent > 5) return 'high';
  if (fraudRatePercent > 2) return 'medium';
  return 'low';
}

function incidents(group: StandardGroup, metric: HotspotMetric): number {
  return metric === 'fraud' ? group.fraud_count : group.failed_count;
}

/**
 * Groups with at least one incident, highest rate first
 */
export function rankHotspots(groups: StandardGroup[], metric: HotspotMetric, limit: number): Hotspot[] {
  return groups
    .filter((g) => incidents(g, metric) > 0)
    .map((g) => ({
      group: groupLabel(g.key),
      rate_percent: percent(incidents(g, metric), g.count),
      incidents: incidents(g, metric),
      total: g.count,
    }))
    .sort((a, b) => b.rate_percent - a.rate_percent || b.incidents - a.incidents || a.group.localeCompare(b.group))
    .slice(0, limit);
}

function toRiskGroup(group: StandardGroup): RiskGroup {
  return {
    group: groupLabel(group.key),
    total: group.count,
    fraud_count: group.fraud_count,
    fraud_rate: percent(group.fraud_count, group.count),
    failed_count: group.failed_count,
    failure_rate: percent(group.failed_count, group.count),
  };
}

export async function buildRisk(
  dataset: TransactionDataset,
  request: PlanRequest,
  settings: PlanSettings
): Promise<RiskResult> {
  const { entities } = request;
  const extraNotes: string[] = [];

  let comparisonColumn: GroupableField | null = null;
  if (entities.comparison_dimension !== undefined) {
    comparisonColumn = groupingColumn(entities.comparison_dimension);
    if (!comparisonColumn) {
      comparisonColumn = 'sender_state';
      extraNotes.push(RECEIVER_STATE_NOTE);
    }
  }

  // Status never filters a risk plan
  const exclude: GroupableField[] = ['transaction_status'];
  if (comparisonColumn) exclude.push(comparisonColumn);

  const { predicates, notes } = buildFilters(entities, { exclude });
  notes.unshift(...extraNotes);
  const context = new PlanContext(dataset, predicates, settings);

  const totals = await context.totals();
  const fraudRate = percent(totals.fraud_count, totals.count);

  const byCategory = await context.groupBy('merchant_category');
  const fraudByCategory = byCategory
    .filter((g) => g.fraud_count > 0)
    .map((g) => ({ category: groupLabel(g.key), fraud_count: g.fraud_count }))
    .sort((a, b) => b.fraud_count - a.fraud_count || a.category.localeCompare(b.category));

  const result: RiskResult = {
    kind: 'risk',
    total_transactions: totals.count,
    fraud_count: totals.fraud_count,
    fraud_rate_percent: fraudRate,
    failed_count: totals.failed_count,
    failure_rate_percent: percent(totals.failed_count, totals.count),
    risk_level: riskLevel(fraudRate),
    fraud_by_category: fraudByCategory,
    filters_applied: predicates,
    notes,
  };

  if (totals.count === 0) {
    notes.push(NO_MATCH_NOTE);
  }

  const metric: HotspotMetric = entities.metric === 'failure_rate' ? 'failure' : 'fraud';

  if (RANKING_CUE.test(request.query)) {
    for (const { suffix, column } of HOTSPOT_DIMENSIONS) {
      result[`${metric}_hotspots_by_${suffix}` as const] = rankHotspots(
        await context.groupBy(column),
        metric,
        settings.hotspotLimit
      );
    }
  }

  if (comparisonColumn) {
    const groups = (await context.groupBy(comparisonColumn)).map(toRiskGroup);

    if (entities.top_n !== undefined) {
      const countKey = metric === 'fraud' ? 'fraud_count' : 'failed_count';
      groups.sort((a, b) => b[countKey] - a[countKey] || a.group.localeCompare(b.group));
      result.groups = groups.slice(0, entities.top_n);
    } else {
      groups.sort((a, b) => b.fraud_rate - a.fraud_rate || a.group.localeCompare(b.group));
      result.groups = groups;
    }
    result.comparison_key = comparisonColumn;
  }

  return result;
}

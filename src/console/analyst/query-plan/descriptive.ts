/**
 * Descriptive plan: summary statistics for the filtered rows
 */

import type {
  AmountStatistics,
  DescriptiveResult,
  TemporalBreakdown,
  Transaction,
  TransactionDataset,
} from '../../../common/types.js';
import { buildFilters, hasTimeKeys } from './filters.js';
import { PlanContext, percent, round2, type PlanRequest, type PlanSettings, type StandardGroup } from './plan-context.js';

export const DAY_NAMES = ['Monday', 'Tuesday', 'Wednesday', 'Thursday', 'Friday', 'Saturday', 'Sunday'];

export const NO_MATCH_NOTE = 'No transactions match the requested filters.';

/**
 * Amount statistics; std_dev is the sample deviation and 0 for a single row
 */
export function amountStatistics(amounts: number[]): AmountStatistics | null {
  if (amounts.length === 0) return null;

  const sorted = [...amounts].sort((a, b) => a - b);
  const n = sorted.length;
  const total = sorted.reduce((sum, v) => sum + v, 0);
  const mean = total / n;
  const middle = Math.floor(n / 2);
  const median = n % 2 === 0 ? (sorted[middle - 1] + sorted[middle]) / 2 : sorted[middle];
  const variance = n > 1 ? sorted.reduce((sum, v) => sum + (v - mean) ** 2, 0) / (n - 1) : 0;

  return {
    total_amount: round2(total),
    average_amount: round2(mean),
    median_amount: round2(median),
    min_amount: sorted[0],
    max_amount: sorted[n - 1],
    std_dev: round2(Math.sqrt(variance)),
  };
}

function isSuccess(row: Transaction): boolean {
  return row.transaction_status.toLowerCase() === 'success';
}

async function temporalBreakdown(context: PlanContext): Promise<TemporalBreakdown> {
  const [hours, days, weekend] = await Promise.all([
    context.groupBy('hour_of_day'),
    context.groupBy('day_of_week'),
    context.groupBy('is_weekend'),
  ]);

  const hourly = hours
    .filter((g): g is StandardGroup & { key: number } => typeof g.key === 'number')
    .map((g) => ({ hour: g.key, count: g.count, average_amount: round2(g.average_amount) }))
    .sort((a, b) => a.hour - b.hour);

  const byWeekday = days
    .filter((g): g is StandardGroup & { key: number } => typeof g.key === 'number')
    .map((g) => ({
      day: g.key,
      day_name: DAY_NAMES[g.key] ?? String(g.key),
      count: g.count,
      average_amount: round2(g.average_amount),
    }))
    .sort((a, b) => a.day - b.day);

  const split = (flag: boolean) => {
    const group = weekend.find((g) => g.key === flag);
    return group ? { count: group.count, average_amount: round2(group.average_amount) } : { count: 0, average_amount: 0 };
  };

  const peakHours = [...hourly]
    .sort((a, b) => b.count - a.count || a.hour - b.hour)
    .slice(0, 3)
    .map(({ hour, count }) => ({ hour, count }));

  return {
    hourly,
    by_weekday: byWeekday,
    weekend_split: { weekend: split(true), weekday: split(false) },
    peak_hours: peakHours,
  };
}

export async function buildDescriptive(
  dataset: TransactionDataset,
  request: PlanRequest,
  settings: PlanSettings
): Promise<DescriptiveResult> {
  const { predicates, notes } = buildFilters(request.entities);
  const context = new PlanContext(dataset, predicates, settings);

  const rows = await context.rows();
  const statistics = amountStatistics(rows.map((r) => r.amount));

  const result: DescriptiveResult = {
    kind: 'descriptive',
    total_count: rows.length,
    statistics,
    success_rate: percent(rows.filter(isSuccess).length, rows.length),
    sample_transactions: rows.slice(0, settings.sampleRowLimit).map((r) => ({
      id: r.id,
      amount: r.amount,
      merchant_category: r.merchant_category,
      timestamp: r.timestamp,
    })),
    filters_applied: predicates,
    notes,
  };

  if (rows.length === 0) {
    notes.push(NO_MATCH_NOTE);
  } else if (hasTimeKeys(request.entities)) {
    result.temporal = await temporalBreakdown(context);
  }

  return result;
}

/**
 * Segmentation plan: share of transactions per user segment
 */

import type { GroupableField, SegmentationResult, TransactionDataset } from '../../../common/types.js';
import { NO_MATCH_NOTE } from './descriptive.js';
import { buildFilters, groupingColumn, RECEIVER_STATE_NOTE } from './filters.js';
import { PlanContext, groupLabel, percent, round2, type PlanRequest, type PlanSettings } from './plan-context.js';

const DEFAULT_SEGMENT: GroupableField = 'sender_age_group';

export async function buildSegmentation(
  dataset: TransactionDataset,
  request: PlanRequest,
  settings: PlanSettings
): Promise<SegmentationResult> {
  const { entities } = request;
  const extraNotes: string[] = [];

  let column = DEFAULT_SEGMENT;
  if (entities.segment_by !== undefined) {
    const resolved = groupingColumn(entities.segment_by);
    if (resolved) {
      column = resolved;
    } else {
      column = 'sender_state';
      extraNotes.push(RECEIVER_STATE_NOTE);
    }
  }

  const { predicates, notes } = buildFilters(entities, { exclude: [column] });
  notes.unshift(...extraNotes);

  const context = new PlanContext(dataset, predicates, settings);
  const groups = await context.groupBy(column);
  const total = groups.reduce((sum, g) => sum + g.count, 0);

  const segments = groups
    .map((g) => ({
      segment: groupLabel(g.key),
      transaction_count: g.count,
      average_transaction_value: round2(g.average_amount),
      total_amount: round2(g.total_amount),
      share_percent: percent(g.count, total),
    }))
    .sort((a, b) => b.transaction_count - a.transaction_count || a.segment.localeCompare(b.segment));

  if (segments.length === 0) notes.push(NO_MATCH_NOTE);

  const kept = entities.top_n !== undefined ? segments.slice(0, entities.top_n) : segments;

  return {
    kind: 'segmentation',
    segment_key: column,
    segments: kept,
    top_segment: kept.length > 0 ? kept[0].segment : null,
    total_count: total,
    filters_applied: predicates,
    notes,
  };
}

/**
 * Terminal rendering of analyst responses for the chat command
 */

import chalk from 'chalk';
import type {
  AnalystResponse,
  ClarificationPayload,
  ComparativeResult,
  DescriptiveResult,
  Hotspot,
  RiskResult,
  SegmentationResult,
} from '../common/types.js';

function header(title: string): string {
  return chalk.bold.cyan(title);
}

function notes(list: string[]): string[] {
  return list.map((note) => chalk.yellow(`  note: ${note}`));
}

export function formatDescriptive(result: DescriptiveResult): string[] {
  const lines = [header(`Descriptive: ${result.total_count} transactions`)];
  if (result.statistics) {
    const s = result.statistics;
    lines.push(`  total ${s.total_amount}  average ${s.average_amount}  median ${s.median_amount}`);
    lines.push(`  min ${s.min_amount}  max ${s.max_amount}  std dev ${s.std_dev}`);
    lines.push(`  success rate ${result.success_rate}%`);
  }
  if (result.temporal) {
    const peaks = result.temporal.peak_hours.map((p) => `${p.hour}:00 (${p.count})`).join(', ');
    lines.push(`  peak hours ${peaks}`);
  }
  return [...lines, ...notes(result.notes)];
}

export function formatComparative(result: ComparativeResult): string[] {
  const lines = [header(`Comparison by ${result.comparison_key} (${result.sort_metric} ${result.sort_order})`)];
  for (const row of result.data) {
    lines.push(
      `  ${row.group.padEnd(16)} count ${row.transaction_count}  avg ${row.average_amount}  total ${row.total_amount}  fraud ${row.fraud_rate}%`
    );
  }
  if (result.best_performer) lines.push(chalk.green(`  best: ${result.best_performer}`));
  return [...lines, ...notes(result.notes)];
}

export function formatSegmentation(result: SegmentationResult): string[] {
  const lines = [header(`Segments by ${result.segment_key}`)];
  for (const row of result.segments) {
    lines.push(`  ${row.segment.padEnd(16)} ${row.share_percent}% (${row.transaction_count})  avg ${row.average_transaction_value}`);
  }
  return [...lines, ...notes(result.notes)];
}

function formatHotspots(title: string, hotspots: Hotspot[] | undefined): string[] {
  if (!hotspots) return [];
  return [
    chalk.bold(`  ${title}`),
    ...hotspots.map((h) => `    ${h.group.padEnd(16)} ${h.rate_percent}% (${h.incidents}/${h.total})`),
  ];
}

export function formatRisk(result: RiskResult): string[] {
  const level =
    result.risk_level === 'high'
      ? chalk.red(result.risk_level)
      : result.risk_level === 'medium'
        ? chalk.yellow(result.risk_level)
        : chalk.green(result.risk_level);

  const lines = [
    header(`Risk: ${result.total_transactions} transactions`),
    `  fraud ${result.fraud_count} (${result.fraud_rate_percent}%)  failed ${result.failed_count} (${result.failure_rate_percent}%)  level ${level}`,
    ...formatHotspots('fraud hotspots by category', result.fraud_hotspots_by_category),
    ...formatHotspots('fraud hotspots by state', result.fraud_hotspots_by_state),
    ...formatHotspots('fraud hotspots by bank', result.fraud_hotspots_by_bank),
    ...formatHotspots('failure hotspots by category', result.failure_hotspots_by_category),
    ...formatHotspots('failure hotspots by state', result.failure_hotspots_by_state),
    ...formatHotspots('failure hotspots by bank', result.failure_hotspots_by_bank),
  ];

  for (const group of result.groups ?? []) {
    lines.push(`  ${group.group.padEnd(16)} fraud ${group.fraud_rate}%  failure ${group.failure_rate}%  (${group.total})`);
  }
  return [...lines, ...notes(result.notes)];
}

export function formatClarification(payload: ClarificationPayload): string[] {
  return [chalk.magenta(payload.question), chalk.dim(`  options: ${payload.options.join(', ')}`)];
}

/**
 * Lines to print for one response
 */
export function formatResponse(response: AnalystResponse): string[] {
  if (response.intent === 'clarification') {
    return formatClarification(response.result);
  }

  const result = response.result;
  switch (result.kind) {
    case 'descriptive':
      return formatDescriptive(result);
    case 'comparative':
      return formatComparative(result);
    case 'segmentation':
      return formatSegmentation(result);
    case 'risk':
      return formatRisk(result);
  }
}

/**
 * Jest Unit Tests for the risk plan
 *
 * Hotspots appear only with a ranking cue, and only for the metric asked about.
 */

import { InMemoryTransactionDataset } from '../../../../common/services/memory-dataset.js';
import type { EntitySet } from '../../../../common/types.js';
import type { PlanSettings, StandardGroup } from '../plan-context.js';
import { buildRisk, rankHotspots, riskLevel } from '../risk.js';
import { SAMPLE_TRANSACTIONS } from '../../__tests__/fixtures.js';

const SETTINGS: PlanSettings = { sampleRowLimit: 5, hotspotLimit: 5 };

function group(key: string, count: number, fraud: number, failed: number): StandardGroup {
  return {
    key,
    count,
    total_amount: 0,
    average_amount: 0,
    fraud_count: fraud,
    failed_count: failed,
    success_count: count - failed,
  };
}

describe('Risk plan', () => {
  let dataset: InMemoryTransactionDataset;

  beforeEach(() => {
    dataset = new InMemoryTransactionDataset(SAMPLE_TRANSACTIONS);
  });

  function risk(entities: EntitySet, query: string) {
    return buildRisk(dataset, { intent: 'risk_analysis', entities, query }, SETTINGS);
  }

  // ==========================================================================
  // HELPERS
  // ==========================================================================

  test.each([
    [0, 'low'],
    [2, 'low'],
    [2.5, 'medium'],
    [5, 'medium'],
    [5.01, 'high'],
  ])('riskLevel(%d) is %s', (rate, level) => {
    expect(riskLevel(rate)).toBe(level);
  });

  test('rankHotspots drops groups without incidents and ranks by rate', () => {
    const groups = [group('A', 10, 1, 0), group('B', 4, 2, 0), group('C', 5, 0, 3), group('D', 2, 1, 0)];
    expect(rankHotspots(groups, 'fraud', 2)).toEqual([
      { group: 'B', rate_percent: 50, incidents: 2, total: 4 },
      { group: 'D', rate_percent: 50, incidents: 1, total: 2 },
    ]);
    expect(rankHotspots(groups, 'failure', 5)).toEqual([{ group: 'C', rate_percent: 60, incidents: 3, total: 5 }]);
  });

  // ==========================================================================
  // PLAN
  // ==========================================================================

  test('overall rates without hotspots when there is no ranking cue', async () => {
    const result = await risk({ metric: 'fraud_rate' }, 'fraud overview');

    expect(result.total_transactions).toBe(8);
    expect(result.fraud_count).toBe(2);
    expect(result.fraud_rate_percent).toBe(25);
    expect(result.failed_count).toBe(2);
    expect(result.failure_rate_percent).toBe(25);
    expect(result.risk_level).toBe('high');
    expect(result.fraud_by_category).toEqual([
      { category: 'Shopping', fraud_count: 1 },
      { category: 'Travel', fraud_count: 1 },
    ]);
    expect(Object.keys(result).filter((key) => key.includes('hotspot'))).toEqual([]);
    expect(result.groups).toBeUndefined();
  });

  test('a fraud ranking cue fills only the fraud hotspot lists', async () => {
    const result = await risk({ metric: 'fraud_rate' }, 'top fraud hotspots');

    expect(result.fraud_hotspots_by_category).toEqual([
      { group: 'Shopping', rate_percent: 100, incidents: 1, total: 1 },
      { group: 'Travel', rate_percent: 50, incidents: 1, total: 2 },
    ]);
    expect(result.fraud_hotspots_by_state).toEqual([
      { group: 'Karnataka', rate_percent: 50, incidents: 1, total: 2 },
      { group: 'Maharashtra', rate_percent: 33.33, incidents: 1, total: 3 },
    ]);
    expect(result.fraud_hotspots_by_bank).toEqual([{ group: 'SBI', rate_percent: 50, incidents: 2, total: 4 }]);
    expect(Object.keys(result).filter((key) => key.startsWith('failure_hotspots'))).toEqual([]);
  });

  test('a failure question fills only the failure hotspot lists', async () => {
    const result = await risk({ metric: 'failure_rate' }, 'worst failure rates');

    expect(result.failure_hotspots_by_category).toEqual([
      { group: 'Shopping', rate_percent: 100, incidents: 1, total: 1 },
      { group: 'Food', rate_percent: 33.33, incidents: 1, total: 3 },
    ]);
    expect(Object.keys(result).filter((key) => key.startsWith('fraud_hotspots'))).toEqual([]);
  });

  test('status never filters a risk query', async () => {
    const result = await risk({ transaction_status: 'failed' }, 'failed payments');
    expect(result.filters_applied).toEqual([]);
    expect(result.total_transactions).toBe(8);
  });

  test('comparison dimension adds a per-group breakdown, top N by incidents', async () => {
    const groupBy = jest.spyOn(dataset, 'groupBy');
    const result = await risk(
      { state: 'Maharashtra', top_n: 3, metric: 'fraud_rate', comparison_dimension: 'merchant_category' },
      'top 3 fraud categories in Maharashtra'
    );

    expect(result.filters_applied).toEqual([{ field: 'sender_state', op: 'eq', value: 'Maharashtra' }]);
    expect(result.total_transactions).toBe(3);
    expect(result.fraud_rate_percent).toBe(33.33);
    expect(result.comparison_key).toBe('merchant_category');
    expect(result.groups).toEqual([
      { group: 'Travel', total: 1, fraud_count: 1, fraud_rate: 100, failed_count: 0, failure_rate: 0 },
      { group: 'Food', total: 1, fraud_count: 0, fraud_rate: 0, failed_count: 0, failure_rate: 0 },
      { group: 'Grocery', total: 1, fraud_count: 0, fraud_rate: 0, failed_count: 0, failure_rate: 0 },
    ]);
    expect(result.fraud_hotspots_by_bank).toEqual([{ group: 'SBI', rate_percent: 100, incidents: 1, total: 1 }]);

    // category, state and bank, each grouped once
    expect(groupBy).toHaveBeenCalledTimes(3);
  });

  test('without top N the breakdown is ordered by fraud rate', async () => {
    const result = await risk({ comparison_dimension: 'sender_bank' }, 'fraud by sender bank');
    expect(result.groups?.map((g) => [g.group, g.fraud_rate])).toEqual([
      ['SBI', 50],
      ['HDFC', 0],
      ['ICICI', 0],
    ]);
  });

  test('no matching rows', async () => {
    const result = await risk({ merchant_category: 'Fuel' }, 'fraud in fuel');
    expect(result.total_transactions).toBe(0);
    expect(result.fraud_rate_percent).toBe(0);
    expect(result.risk_level).toBe('low');
    expect(result.fraud_by_category).toEqual([]);
    expect(result.notes).toEqual(['No transactions match the requested filters.']);
  });
});

/**
 * Jest Unit Tests for the descriptive plan
 */

import { InMemoryTransactionDataset } from '../../../../common/services/memory-dataset.js';
import { NO_MATCH_NOTE, amountStatistics, buildDescriptive } from '../descriptive.js';
import type { PlanSettings } from '../plan-context.js';
import { SAMPLE_TRANSACTIONS } from '../../__tests__/fixtures.js';

const SETTINGS: PlanSettings = { sampleRowLimit: 5, hotspotLimit: 5 };

describe('Descriptive plan', () => {
  let dataset: InMemoryTransactionDataset;

  beforeEach(() => {
    dataset = new InMemoryTransactionDataset(SAMPLE_TRANSACTIONS);
  });

  // ==========================================================================
  // STATISTICS
  // ==========================================================================

  describe('amountStatistics', () => {
    test('null for no rows', () => {
      expect(amountStatistics([])).toBeNull();
    });

    test('single row has zero deviation', () => {
      expect(amountStatistics([5])).toEqual({
        total_amount: 5,
        average_amount: 5,
        median_amount: 5,
        min_amount: 5,
        max_amount: 5,
        std_dev: 0,
      });
    });

    test('even count uses the middle pair for the median', () => {
      expect(amountStatistics([4, 1, 3, 2])).toEqual({
        total_amount: 10,
        average_amount: 2.5,
        median_amount: 2.5,
        min_amount: 1,
        max_amount: 4,
        std_dev: 1.29,
      });
    });
  });

  // ==========================================================================
  // PLAN
  // ==========================================================================

  describe('buildDescriptive', () => {
    test('filters by category and summarises', async () => {
      const result = await buildDescriptive(
        dataset,
        { intent: 'descriptive', entities: { merchant_category: 'Food' }, query: 'food' },
        SETTINGS
      );

      expect(result.total_count).toBe(3);
      expect(result.statistics).toEqual({
        total_amount: 600,
        average_amount: 200,
        median_amount: 200,
        min_amount: 100,
        max_amount: 300,
        std_dev: 100,
      });
      expect(result.success_rate).toBe(66.67);
      expect(result.sample_transactions.map((s) => s.id)).toEqual(['t1', 't2', 't8']);
      expect(result.temporal).toBeUndefined();
      expect(result.notes).toEqual([]);
    });

    test('sample rows are bounded', async () => {
      const result = await buildDescriptive(
        dataset,
        { intent: 'descriptive', entities: {}, query: 'overview' },
        { ...SETTINGS, sampleRowLimit: 2 }
      );
      expect(result.total_count).toBe(8);
      expect(result.sample_transactions).toEqual([
        { id: 't1', amount: 100, merchant_category: 'Food', timestamp: '2024-03-04T10:00:00.000Z' },
        { id: 't2', amount: 300, merchant_category: 'Food', timestamp: '2024-03-04T10:00:00.000Z' },
      ]);
    });

    test('no matching rows gives an empty result with a note', async () => {
      const result = await buildDescriptive(
        dataset,
        { intent: 'descriptive', entities: { merchant_category: 'Fuel' }, query: 'fuel' },
        SETTINGS
      );
      expect(result.total_count).toBe(0);
      expect(result.statistics).toBeNull();
      expect(result.success_rate).toBe(0);
      expect(result.sample_transactions).toEqual([]);
      expect(result.notes).toEqual([NO_MATCH_NOTE]);
    });

    test('time keys add the temporal breakdown', async () => {
      const result = await buildDescriptive(
        dataset,
        { intent: 'descriptive', entities: { is_weekend: true }, query: 'weekend transactions' },
        SETTINGS
      );

      expect(result.total_count).toBe(3);
      expect(result.temporal).toEqual({
        hourly: [
          { hour: 9, count: 1, average_amount: 200 },
          { hour: 19, count: 1, average_amount: 1000 },
          { hour: 22, count: 1, average_amount: 500 },
        ],
        by_weekday: [
          { day: 5, day_name: 'Saturday', count: 1, average_amount: 1000 },
          { day: 6, day_name: 'Sunday', count: 2, average_amount: 350 },
        ],
        weekend_split: {
          weekend: { count: 3, average_amount: 566.67 },
          weekday: { count: 0, average_amount: 0 },
        },
        peak_hours: [
          { hour: 9, count: 1 },
          { hour: 19, count: 1 },
          { hour: 22, count: 1 },
        ],
      });
    });

    test('peak hours rank by count', async () => {
      const result = await buildDescriptive(
        dataset,
        { intent: 'descriptive', entities: { time_reference: 'today' }, query: 'today' },
        SETTINGS
      );
      expect(result.temporal?.peak_hours).toEqual([
        { hour: 9, count: 3 },
        { hour: 14, count: 2 },
        { hour: 19, count: 1 },
      ]);
    });
  });
});

/**
 * Jest Unit Tests for IntentClassifier
 *
 * Rule priority: risk keywords, aggregation + "by <dimension>",
 * comparative keywords, segmentation keywords, then descriptive.
 */

import { IntentClassifier, classifyIntent, intentConfidence } from '../intent-classifier.js';
import type { IntentType } from '../../../common/types.js';

describe('IntentClassifier', () => {
  let classifier: IntentClassifier;

  beforeEach(() => {
    classifier = new IntentClassifier();
  });

  // ==========================================================================
  // RISK
  // ==========================================================================

  describe('Risk keywords', () => {
    test('fraud question is risk analysis', () => {
      expect(classifier.classify('Show fraud rate by state')).toEqual({
        type: 'risk_analysis',
        matchedKeyword: 'fraud',
        rule: 'risk_keyword',
      });
    });

    test('risk wins over comparative keywords', () => {
      expect(classifier.classify('fraud rate vs last month').type).toBe('risk_analysis');
      expect(classifier.classify('compare fraud between banks').type).toBe('risk_analysis');
    });

    test('matching is case-insensitive', () => {
      expect(classifier.classify('Any SUSPICIOUS payments?').type).toBe('risk_analysis');
    });
  });

  // ==========================================================================
  // COMPARATIVE
  // ==========================================================================

  describe('Comparative', () => {
    test('aggregation word with "by <dimension>"', () => {
      expect(classifier.classify('total amount by sender bank')).toEqual({
        type: 'comparative',
        matchedKeyword: 'by sender bank',
        rule: 'aggregation_by_dimension',
      });
    });

    test('aggregation by dimension beats segmentation keywords', () => {
      expect(classifier.classify('total value by age group').type).toBe('comparative');
    });

    test.each([
      ['compare Food and Travel', 'compare'],
      ['Food vs Travel spending', 'vs'],
      ['which network is better', 'better'],
    ])('"%s" fires on "%s"', (query, keyword) => {
      const result = classifier.classify(query);
      expect(result.type).toBe('comparative');
      expect(result.rule).toBe('comparative_keyword');
      expect(result.matchedKeyword).toBe(keyword);
    });
  });

  // ==========================================================================
  // SEGMENTATION & DEFAULT
  // ==========================================================================

  describe('Segmentation', () => {
    test('age group mention', () => {
      expect(classifier.classify('show transactions by age group')).toEqual({
        type: 'user_segmentation',
        matchedKeyword: 'age group',
        rule: 'segmentation_keyword',
      });
    });

    test('"by device" without an aggregation word', () => {
      expect(classifier.classify('breakdown of users by device').matchedKeyword).toBe('by device');
    });
  });

  describe('Default', () => {
    test.each<[string, IntentType]>([
      ['average transaction value in Delhi', 'descriptive'],
      ['how about Travel?', 'descriptive'],
      ['', 'descriptive'],
    ])('"%s" is %s', (query, expected) => {
      const result = classifier.classify(query);
      expect(result.type).toBe(expected);
      expect(result.rule).toBe('default');
      expect(result.matchedKeyword).toBeNull();
    });
  });

  // ==========================================================================
  // CONFIDENCE
  // ==========================================================================

  describe('intentConfidence', () => {
    test('starts at 0.7 with no entities', () => {
      expect(intentConfidence({})).toBe(0.7);
    });

    test('adds 0.05 per entity', () => {
      expect(intentConfidence({ metric: 'avg', merchant_category: 'Food' })).toBe(0.8);
    });

    test('caps at 0.95', () => {
      expect(
        intentConfidence({
          metric: 'avg',
          merchant_category: 'Food',
          sender_state: 'Delhi',
          sender_bank: 'SBI',
          device_type: 'iOS',
          network_type: '4G',
        })
      ).toBe(0.95);
    });
  });

  test('classifyIntent uses a shared classifier', () => {
    expect(classifyIntent('fraud in Delhi').type).toBe('risk_analysis');
    expect(classifyIntent('fraud in Delhi')).toEqual(classifyIntent('fraud in Delhi'));
  });
});

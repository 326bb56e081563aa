/**
 * Intent Classifier
 *
 * Assigns one of four intents to a question with ordered keyword rules.
 * The first rule that fires decides; there is no score blending.
 *
 * Priority:
 *   1. risk keywords                         -> risk_analysis
 *   2. aggregation word + "by <dimension>"   -> comparative
 *   3. comparative keywords                  -> comparative
 *   4. segmentation keywords                 -> user_segmentation
 *   5. otherwise                             -> descriptive
 */

import type { EntitySet, IntentType } from '../../common/types.js';
import { getEntityDictionary, DIMENSION_WORD_KEYS, type EntityDictionary } from '../../knowledge/dictionary.js';
import { countEntities } from './entity-set.js';
import { alternation, normalizeQuery } from './text-utils.js';

// =============================================================================
// PATTERN RULES
// =============================================================================

export type ClassificationRule =
  | 'risk_keyword'
  | 'aggregation_by_dimension'
  | 'comparative_keyword'
  | 'segmentation_keyword'
  | 'default';

export interface IntentClassification {
  type: IntentType;
  /** Text that fired the rule, null for the default */
  matchedKeyword: string | null;
  rule: ClassificationRule;
}

interface PatternRule {
  rule: Exclude<ClassificationRule, 'default' | 'aggregation_by_dimension'>;
  type: IntentType;
  patterns: RegExp[];
}

const PATTERN_RULES: PatternRule[] = [
  {
    rule: 'risk_keyword',
    type: 'risk_analysis',
    patterns: [
      /\bfraud\w*/,
      /\brisk\w*/,
      /\bfailed\b/,
      /\bfailures?\b/,
      /\bflagged\b/,
      /\bsuspicious\b/,
      /\banomal\w*/,
      /\bunusual\b/,
      /\bproblems?\b/,
      /\bdeclined\b/,
    ],
  },
  {
    rule: 'comparative_keyword',
    type: 'comparative',
    patterns: [
      /\bcompar\w*/,
      /\bversus\b/,
      /\bvs\b/,
      /\bdifference\b/,
      /\bbetter\b/,
      /\bworse\b/,
      /\bhigher\b/,
      /\blower\b/,
      /\bmore than\b/,
      /\bless than\b/,
      /\bbetween\b/,
      /\bacross\b/,
    ],
  },
  {
    rule: 'segmentation_keyword',
    type: 'user_segmentation',
    patterns: [
      /\bage groups?\b/,
      /\bsegment\w*/,
      /\bdemographic\w*/,
      /\bby (?:age|state|device|network|categor|bank)\w*/,
      /\busers in\b/,
      /\bbreak ?down\b/,
      /\bdistribution\b/,
      /\bwise\b/,
    ],
  },
];

const AGGREGATION_WORD = /\b(?:total|sum|amount|value)\b/;

// =============================================================================
// CLASSIFIER
// =============================================================================

export class IntentClassifier {
  private readonly byDimensionPattern: RegExp;

  constructor(dictionary: EntityDictionary = getEntityDictionary()) {
    const words = DIMENSION_WORD_KEYS.flatMap((key) => dictionary.dimensionWords[key]);
    this.byDimensionPattern = new RegExp(`\\bby (?:(?:sender|receiver)s? )?(?:${alternation(words)})\\b`);
  }

  classify(text: string): IntentClassification {
    const query = normalizeQuery(text);

    const risk = this.firstMatch(PATTERN_RULES[0], query);
    if (risk) return risk;

    const aggregation = AGGREGATION_WORD.exec(query);
    const byDimension = this.byDimensionPattern.exec(query);
    if (aggregation && byDimension) {
      return { type: 'comparative', matchedKeyword: byDimension[0], rule: 'aggregation_by_dimension' };
    }

    for (const rule of PATTERN_RULES.slice(1)) {
      const match = this.firstMatch(rule, query);
      if (match) return match;
    }

    return { type: 'descriptive', matchedKeyword: null, rule: 'default' };
  }

  private firstMatch(rule: PatternRule, query: string): IntentClassification | null {
    for (const pattern of rule.patterns) {
      const match = pattern.exec(query);
      if (match) {
        return { type: rule.type, matchedKeyword: match[0], rule: rule.rule };
      }
    }
    return null;
  }
}

/**
 * Confidence grows with the number of entities pinned down by the question
 */
export function intentConfidence(entities: EntitySet): number {
  const keys = countEntities(entities);
  return Math.min(0.95, Math.round((0.7 + 0.05 * keys) * 100) / 100);
}

// Singleton for the convenience function
let classifierInstance: IntentClassifier | null = null;

/**
 * Classify a question with the default dictionary
 */
export function classifyIntent(text: string): IntentClassification {
  if (!classifierInstance) {
    classifierInstance = new IntentClassifier();
  }
  return classifierInstance.classify(text);
}

/**
 * Entity Extractor
 *
 * Turns a question into an EntitySet. Three strategies run in order:
 *
 * 1. Exact: canonical values and aliases, case-insensitive, on token
 *    boundaries, every occurrence with its offset
 * 2. Regex: top/bottom N, hours, weekdays, time references, grouping
 *    phrases ("by sender bank", "per state", "category wise"), status phrases
 * 3. Fuzzy: leftover words corrected against the dictionaries
 *
 * Bank, state and age mentions are then given a direction from nearby cue
 * words ("from SBI", "Delhi senders"); without a cue they stay under the
 * undirected key for the ambiguity resolver to settle.
 *
 * Extraction never throws. Anything not recognised is simply absent.
 */

import type {
  DimensionFamily,
  EntitySet,
  FilterKey,
  GroupingDimension,
  Metric,
  TimeReference,
} from '../../common/types.js';
import {
  DECLARED_ORDER,
  DICTIONARY_DIMENSIONS,
  DIMENSION_WORD_KEYS,
  getEntityDictionary,
  type DictionaryDimension,
  type DimensionWordKey,
  type EntityDictionary,
} from '../../knowledge/dictionary.js';
import { DEFAULT_ANALYST_CONFIG } from './config.js';
import { matchValue } from './fuzzy-matcher.js';
import {
  NUMBER_PATTERN,
  alternation,
  normalizeQuery,
  overlaps,
  parseCount,
  phrasePattern,
  tokenize,
  type Token,
} from './text-utils.js';

// =============================================================================
// TYPES
// =============================================================================

export type Direction = 'sender' | 'receiver';

interface Span {
  start: number;
  end: number;
}

interface Mention extends Span {
  dimension: DictionaryDimension;
  value: string;
}

interface ResolvedMention extends Mention {
  key: FilterKey;
  direction: Direction | null;
}

interface GroupingPhrase extends Span {
  dimension: GroupingDimension;
}

// =============================================================================
// VOCABULARY
// =============================================================================

const SENDER_CUES: ReadonlySet<string> = new Set(['sender', 'senders', 'from', 'sending', 'sent', 'payer', 'payers']);
const RECEIVER_CUES: ReadonlySet<string> = new Set([
  'receiver',
  'receivers',
  'to',
  'receiving',
  'recipient',
  'recipients',
  'received',
  'payee',
  'payees',
]);

/** Cue words that only count when they come before the mention */
const PRECEDING_ONLY_CUES: ReadonlySet<string> = new Set(['from', 'to']);

const FAMILY_OF: Partial<Record<DimensionWordKey, DimensionFamily>> = {
  bank: 'bank',
  state: 'state',
  age_group: 'age_group',
};

const DIRECTED_KEYS: Record<DimensionFamily, Record<Direction, FilterKey>> = {
  bank: { sender: 'sender_bank', receiver: 'receiver_bank' },
  state: { sender: 'sender_state', receiver: 'receiver_state' },
  age_group: { sender: 'sender_age_group', receiver: 'receiver_age_group' },
};

const METRIC_RULES: Array<{ metric: Metric; pattern: RegExp }> = [
  { metric: 'fraud_rate', pattern: /\bfraud/ },
  { metric: 'failure_rate', pattern: /\bfail|\bdeclin/ },
  { metric: 'avg', pattern: /\b(?:average|avg|mean|typical)\b/ },
  { metric: 'count', pattern: /\b(?:how many|count|number of|volume|frequency)\b/ },
  { metric: 'amount', pattern: /\b(?:total|sum|how much|spend|spending|value)\b/ },
];

const TIME_RULES: Array<{ reference: TimeReference; pattern: RegExp }> = [
  { reference: 'last_week', pattern: /\blast week\b/g },
  { reference: 'last_month', pattern: /\blast month\b/g },
  { reference: 'week', pattern: /\bthis week\b/g },
  { reference: 'month', pattern: /\bthis month\b/g },
  { reference: 'year', pattern: /\bthis year\b/g },
  { reference: 'today', pattern: /\btoday\b/g },
  { reference: 'yesterday', pattern: /\byesterday\b/g },
  { reference: 'morning', pattern: /\bmornings?\b/g },
  { reference: 'afternoon', pattern: /\bafternoons?\b/g },
  { reference: 'evening', pattern: /\bevenings?\b/g },
  { reference: 'night', pattern: /\b(?:nights?|late night)\b/g },
  { reference: 'peak_hours', pattern: /\bpeak\b/g },
];

const WEEKDAYS = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'];

/** Cues that turn a grouping phrase into a comparison rather than a segmentation */
const AGGREGATION_CUE =
  /\b(?:total|sum|amount|value|average|avg|mean|count|how many|number of|rates?|compare|comparison|vs|versus|top|bottom|highest|lowest|best|worst|rank\w*)\b/;

/** Cues that turn a bare dimension word ("banks") into a grouping */
const BARE_GROUPING_CUE = /\bby\b|\bper\b|\bwise\b|\bcompar\w*|\btotal\b|\btop\b|\bgroup\w*|\bsegment\w*|\bacross\b/;

const STATUS_PHRASE =
  /\b(successful|success|pending|failed)\s+(?:transactions?|payments?|transfers?)\b|\bstatus\s+(?:is\s+|of\s+)?(successful|success|failed|pending)\b/;

const RANKING_PATTERN = new RegExp(`\\b(top|bottom)\\s+(${NUMBER_PATTERN})\\b`, 'g');

/** Words the fuzzy pass never tries to correct */
const KEYWORDS: ReadonlySet<string> = new Set([
  ...SENDER_CUES,
  ...RECEIVER_CUES,
  'rank',
  'ranking',
  'ranked',
  'compared',
  'comparing',
  'demographic',
  'demographics',
  'wise',
  'hour',
  'hours',
  'status',
]);

// =============================================================================
// EXTRACTOR
// =============================================================================

export class EntityExtractor {
  private readonly dictionary: EntityDictionary;
  private readonly threshold: number;
  private readonly groupingPatterns: RegExp[];
  private readonly dimensionByWord: Map<string, DimensionWordKey>;
  private readonly dimensionWordTokens: Set<string>;

  constructor(dictionary: EntityDictionary = getEntityDictionary(), threshold: number = DEFAULT_ANALYST_CONFIG.fuzzyThreshold) {
    this.dictionary = dictionary;
    this.threshold = threshold;

    this.dimensionByWord = new Map();
    this.dimensionWordTokens = new Set();
    for (const key of DIMENSION_WORD_KEYS) {
      for (const word of dictionary.dimensionWords[key]) {
        if (!this.dimensionByWord.has(word)) this.dimensionByWord.set(word, key);
        for (const part of word.split(' ')) this.dimensionWordTokens.add(part);
      }
    }

    const words = alternation([...this.dimensionByWord.keys()]);
    this.groupingPatterns = [
      new RegExp(`\\bby (?:(sender|receiver)s?(?:'s)? )?(${words})\\b`, 'g'),
      new RegExp(`\\bper (?:(sender|receiver) )?(${words})\\b`, 'g'),
      new RegExp(`\\b(?:(sender|receiver) )?(${words})[ -]wise\\b`, 'g'),
    ];
  }

  /**
   * Extract entities from a question
   */
  extract(text: string): EntitySet {
    const query = normalizeQuery(text);
    const tokens = tokenize(query);
    const entities: EntitySet = {};

    const mentions = this.findExactMentions(query);
    mentions.push(...this.findFuzzyMentions(query, tokens, mentions));
    mentions.sort((a, b) => a.start - b.start);

    const resolved = mentions.map((m) => this.resolveDirection(m, tokens));
    const comparison = this.applyMentions(resolved, entities);

    this.extractRanking(query, entities);
    this.extractTime(query, entities);
    this.extractStatus(query, entities);
    this.extractMetric(query, entities);
    this.extractGrouping(query, tokens, mentions, comparison, entities);

    return entities;
  }

  // ---------------------------------------------------------------------------
  // Exact values
  // ---------------------------------------------------------------------------

  private findExactMentions(query: string): Mention[] {
    const found: Mention[] = [];

    for (const dimension of DICTIONARY_DIMENSIONS) {
      // Status needs a noun after it ("failed transactions"), see extractStatus
      if (dimension === 'transaction_status') continue;

      const phrases: Array<[string, string]> = [];
      for (const value of this.dictionary.values[dimension]) {
        if (this.dictionary.stopwords.has(value.toLowerCase())) continue;
        phrases.push([value, value]);
      }
      for (const [alias, target] of Object.entries(this.dictionary.aliases[dimension])) {
        phrases.push([alias, target]);
      }

      for (const [phrase, value] of phrases) {
        for (const match of query.matchAll(phrasePattern(phrase))) {
          const start = match.index ?? 0;
          found.push({ dimension, value, start, end: start + match[0].length });
        }
      }
    }

    // Longest mention wins where phrases overlap ("punjab national bank" over "punjab")
    found.sort((a, b) => b.end - b.start - (a.end - a.start) || a.start - b.start);
    const kept: Mention[] = [];
    for (const mention of found) {
      if (!kept.some((k) => overlaps(k, mention))) kept.push(mention);
    }
    return kept;
  }

  // ---------------------------------------------------------------------------
  // Fuzzy values
  // ---------------------------------------------------------------------------

  private isFuzzyCandidate(token: Token, taken: Span[]): boolean {
    return (
      /^[a-z]+$/.test(token.text) &&
      !this.dictionary.stopwords.has(token.text) &&
      !this.dimensionWordTokens.has(token.text) &&
      !KEYWORDS.has(token.text) &&
      !taken.some((span) => overlaps(span, token))
    );
  }

  private findFuzzyMentions(query: string, tokens: Token[], exact: Mention[]): Mention[] {
    const taken: Span[] = [...exact];
    const found: Mention[] = [];

    // Two-word states against bigrams first ("tamil nadoo")
    const twoWordStates = this.dictionary.values.state.filter((s) => s.includes(' '));
    for (let i = 0; i + 1 < tokens.length; i++) {
      const first = tokens[i];
      const second = tokens[i + 1];
      if (!this.isFuzzyCandidate(first, taken) || !this.isFuzzyCandidate(second, taken)) continue;

      const bigram = `${first.text} ${second.text}`;
      const match = matchValue(bigram, twoWordStates, this.threshold);
      if (match) {
        const mention = { dimension: 'state' as const, value: match.value, start: first.start, end: second.end };
        found.push(mention);
        taken.push(mention);
        i++;
      }
    }

    for (const token of tokens) {
      if (token.text.length < 4 || !this.isFuzzyCandidate(token, taken)) continue;

      let best: { dimension: DictionaryDimension; value: string; score: number } | null = null;
      for (const dimension of DECLARED_ORDER) {
        const match = matchValue(token.text, this.dictionary.values[dimension], this.threshold);
        if (match && (!best || match.score > best.score)) {
          best = { dimension, value: match.value, score: match.score };
        }
      }

      if (best) {
        const mention = { dimension: best.dimension, value: best.value, start: token.start, end: token.end };
        found.push(mention);
        taken.push(mention);
      }
    }

    return found;
  }

  // ---------------------------------------------------------------------------
  // Direction
  // ---------------------------------------------------------------------------

  private resolveDirection(mention: Mention, tokens: Token[]): ResolvedMention {
    const family = FAMILY_OF[mention.dimension];
    if (!family) {
      return { ...mention, key: this.plainKey(mention.dimension), direction: null };
    }

    const direction = directionNear(tokens, mention);
    return {
      ...mention,
      key: direction ? DIRECTED_KEYS[family][direction] : family,
      direction,
    };
  }

  private plainKey(dimension: DictionaryDimension): FilterKey {
    return dimension;
  }

  /**
   * Write single-valued dimensions as filters; the first dimension, in
   * dictionary order, with two or more distinct values becomes the
   * comparison instead. "from SBI to HDFC" names one value per direction and
   * stays two filters.
   *
   * @returns the comparison dimension set here, if any
   */
  private applyMentions(mentions: ResolvedMention[], entities: EntitySet): DictionaryDimension | null {
    const byDimension = new Map<DictionaryDimension, ResolvedMention[]>();
    for (const mention of mentions) {
      const list = byDimension.get(mention.dimension) ?? [];
      list.push(mention);
      byDimension.set(mention.dimension, list);
    }

    let comparison: DictionaryDimension | null = null;

    for (const dimension of DICTIONARY_DIMENSIONS) {
      const list = byDimension.get(dimension);
      if (!list) continue;
      const values = [...new Set(list.map((m) => m.value))];

      if (values.length >= 2 && !splitsByDirection(list)) {
        if (comparison === null) {
          comparison = dimension;
          entities.comparison_dimension = comparisonKey(list);
          entities.comparison_values = values;
        }
        continue;
      }

      for (const mention of list) {
        entities[mention.key] = mention.value;
      }
    }

    return comparison;
  }

  // ---------------------------------------------------------------------------
  // Regex extractions
  // ---------------------------------------------------------------------------

  private extractRanking(query: string, entities: EntitySet): void {
    for (const match of query.matchAll(RANKING_PATTERN)) {
      const count = parseCount(match[2]);
      if (count === null || count < 1) continue;
      if (match[1] === 'top') {
        entities.top_n = count;
      } else {
        entities.bottom_n = count;
      }
    }
  }

  private extractTime(query: string, entities: EntitySet): void {
    let latest: { reference: TimeReference; index: number } | null = null;
    for (const rule of TIME_RULES) {
      for (const match of query.matchAll(rule.pattern)) {
        const index = match.index ?? 0;
        if (!latest || index > latest.index) latest = { reference: rule.reference, index };
      }
    }
    if (latest) entities.time_reference = latest.reference;

    for (const match of query.matchAll(/\b(\d{1,2})\s*(am|pm)\b/g)) {
      const hour = parseInt(match[1], 10);
      if (hour < 1 || hour > 12) continue;
      entities.hour_of_day = (hour % 12) + (match[2] === 'pm' ? 12 : 0);
    }
    for (const match of query.matchAll(/\bhour\s+(\d{1,2})\b/g)) {
      const hour = parseInt(match[1], 10);
      if (hour <= 23) entities.hour_of_day = hour;
    }

    for (const match of query.matchAll(new RegExp(`\\b(${WEEKDAYS.join('|')})s?\\b`, 'g'))) {
      entities.day_of_week = WEEKDAYS.indexOf(match[1]);
    }

    for (const match of query.matchAll(/\b(weekend|weekday)s?\b/g)) {
      entities.is_weekend = match[1] === 'weekend';
    }
  }

  private extractStatus(query: string, entities: EntitySet): void {
    const match = STATUS_PHRASE.exec(query);
    if (!match) return;
    const word = match[1] ?? match[2];
    if (!word) return;
    const canonical = this.dictionary.aliases.transaction_status[word] ?? word;
    if (this.dictionary.values.transaction_status.includes(canonical)) {
      entities.transaction_status = canonical;
    }
  }

  private extractMetric(query: string, entities: EntitySet): void {
    const rule = METRIC_RULES.find((r) => r.pattern.test(query));
    if (rule) entities.metric = rule.metric;
  }

  // ---------------------------------------------------------------------------
  // Grouping
  // ---------------------------------------------------------------------------

  private findGroupingPhrase(query: string): GroupingPhrase | null {
    let first: GroupingPhrase | null = null;

    for (const pattern of this.groupingPatterns) {
      for (const match of query.matchAll(pattern)) {
        const start = match.index ?? 0;
        if (first && first.start <= start) continue;

        const key = this.dimensionByWord.get(match[2]);
        if (!key) continue;

        const role = match[1];
        const direction = role === 'sender' || role === 'receiver' ? role : null;
        first = { dimension: groupingDimension(key, direction), start, end: start + match[0].length };
      }
    }

    return first;
  }

  private extractGrouping(
    query: string,
    tokens: Token[],
    mentions: Mention[],
    comparison: DictionaryDimension | null,
    entities: EntitySet
  ): void {
    const phrase = this.findGroupingPhrase(query);

    if (phrase) {
      if (comparison !== null) {
        // "compare SBI and HDFC by sender bank": the phrase only adds direction
        const current = entities.comparison_dimension;
        if (current && familyOfGrouping(phrase.dimension) === familyOfGrouping(current)) {
          entities.comparison_dimension = phrase.dimension;
        }
        return;
      }

      if (AGGREGATION_CUE.test(query)) {
        entities.comparison_dimension = phrase.dimension;
      } else {
        entities.segment_by = phrase.dimension;
      }
      return;
    }

    if (comparison !== null || !BARE_GROUPING_CUE.test(query)) return;

    const bare = this.findBareDimensionWord(query, tokens, mentions);
    if (bare) entities.comparison_dimension = bare;
  }

  /**
   * First dimension word ("categories", "sender banks") whose dimension has
   * no value named in the question
   */
  private findBareDimensionWord(query: string, tokens: Token[], mentions: Mention[]): GroupingDimension | null {
    let first: { dimension: GroupingDimension; start: number } | null = null;

    for (const dimension of DICTIONARY_DIMENSIONS) {
      if (mentions.some((m) => m.dimension === dimension)) continue;

      for (const word of this.dictionary.dimensionWords[dimension]) {
        for (const match of query.matchAll(phrasePattern(word))) {
          const start = match.index ?? 0;
          const span = { start, end: start + match[0].length };
          if (mentions.some((m) => overlaps(m, span))) continue;
          if (first && first.start <= start) continue;

          first = { dimension: groupingDimension(dimension, directionNear(tokens, span)), start };
        }
      }
    }

    return first ? first.dimension : null;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function cueOf(word: string): Direction | null {
  const bare = word.replace(/'s?$/, '');
  if (SENDER_CUES.has(bare)) return 'sender';
  if (RECEIVER_CUES.has(bare)) return 'receiver';
  return null;
}

/**
 * Direction from the three words before a span and the one after it.
 * Nearest cue wins; a preceding cue beats a following one at equal distance.
 */
export function directionNear(tokens: Token[], span: Span): Direction | null {
  const before = tokens.filter((t) => t.end <= span.start).slice(-3).reverse();
  const after = tokens.find((t) => t.start >= span.end);

  for (let distance = 0; distance < 3; distance++) {
    const word = before[distance];
    if (word) {
      const previous = before[distance + 1];
      const comparedTo = word.text === 'to' && previous !== undefined && previous.text.startsWith('compar');
      const cue = comparedTo ? null : cueOf(word.text);
      if (cue) return cue;
    }

    if (distance === 0 && after && !PRECEDING_ONLY_CUES.has(after.text)) {
      const cue = cueOf(after.text);
      if (cue) return cue;
    }
  }

  return null;
}

function groupingDimension(key: DimensionWordKey, direction: Direction | null): GroupingDimension {
  const family = FAMILY_OF[key];
  if (family && direction) return DIRECTED_KEYS[family][direction];
  return key;
}

function familyOfGrouping(dimension: GroupingDimension): DimensionFamily | null {
  switch (dimension) {
    case 'bank':
    case 'sender_bank':
    case 'receiver_bank':
      return 'bank';
    case 'state':
    case 'sender_state':
    case 'receiver_state':
      return 'state';
    case 'age_group':
    case 'sender_age_group':
    case 'receiver_age_group':
      return 'age_group';
    default:
      return null;
  }
}

/**
 * One sender value and one receiver value, every mention with a cue
 */
function splitsByDirection(mentions: ResolvedMention[]): boolean {
  const byDirection = new Map<Direction, Set<string>>();
  for (const mention of mentions) {
    if (mention.direction === null) return false;
    const values = byDirection.get(mention.direction) ?? new Set<string>();
    values.add(mention.value);
    byDirection.set(mention.direction, values);
  }
  return byDirection.size === 2 && [...byDirection.values()].every((values) => values.size === 1);
}

/**
 * Comparison key for a multi-valued dimension: directional when every mention
 * carries the same cue, undirected otherwise
 */
function comparisonKey(mentions: ResolvedMention[]): GroupingDimension {
  const first = mentions[0];
  const family = FAMILY_OF[first.dimension];
  if (!family) return first.key;

  const direction = first.direction;
  if (direction && mentions.every((m) => m.direction === direction)) {
    return DIRECTED_KEYS[family][direction];
  }
  return family;
}

// Singleton for the convenience function
let extractorInstance: EntityExtractor | null = null;

/**
 * Extract entities with the default dictionary and threshold
 */
export function extractEntities(text: string): EntitySet {
  if (!extractorInstance) {
    extractorInstance = new EntityExtractor();
  }
  return extractorInstance.extract(text);
}

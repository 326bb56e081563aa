/**
 * Shared types for the txn-insight analyst
 *
 * Covers the read-only transaction model, dataset predicates/aggregations,
 * the entity vocabulary extracted from questions, session records and the
 * four analysis result shapes.
 */

// =============================================================================
// TRANSACTION MODEL
// =============================================================================

/**
 * A single transaction row. Never mutated by the analyst.
 */
export interface Transaction {
  id: string;
  /** ISO-8601 timestamp */
  timestamp: string;
  transaction_type: string;
  merchant_category: string;
  amount: number;
  transaction_status: string;
  sender_age_group: string;
  sender_state: string;
  sender_bank: string;
  receiver_age_group: string;
  receiver_bank: string;
  device_type: string;
  network_type: string;
  fraud_flag: boolean;
  /** 0-23 */
  hour_of_day: number;
  /** 0 = Monday ... 6 = Sunday */
  day_of_week: number;
  is_weekend: boolean;
}

export type TransactionField = keyof Transaction;

/**
 * Columns the dataset can group by
 */
export type GroupableField =
  | 'merchant_category'
  | 'sender_state'
  | 'sender_age_group'
  | 'receiver_age_group'
  | 'sender_bank'
  | 'receiver_bank'
  | 'device_type'
  | 'network_type'
  | 'transaction_type'
  | 'transaction_status'
  | 'hour_of_day'
  | 'day_of_week'
  | 'is_weekend';

export const GROUPABLE_FIELDS: readonly GroupableField[] = [
  'merchant_category',
  'sender_state',
  'sender_age_group',
  'receiver_age_group',
  'sender_bank',
  'receiver_bank',
  'device_type',
  'network_type',
  'transaction_type',
  'transaction_status',
  'hour_of_day',
  'day_of_week',
  'is_weekend',
];

// =============================================================================
// DATASET PRIMITIVES
// =============================================================================

export type FieldValue = string | number | boolean;

/**
 * Filter predicate (AND-composed when given as a list)
 *
 * `ieq` compares strings case-insensitively (used for status fields).
 */
export type Predicate =
  | { field: TransactionField; op: 'eq'; value: FieldValue }
  | { field: TransactionField; op: 'ieq'; value: string }
  | { field: TransactionField; op: 'in'; value: FieldValue[] }
  | { field: TransactionField; op: 'gte' | 'lte'; value: number };

export type AggregationOp = 'sum' | 'count' | 'avg' | 'min' | 'max';

/**
 * Aggregation definition
 *
 * Example: { op: 'sum', field: 'amount', alias: 'total_amount' }
 * A `count` with `where` counts only the rows matching that predicate.
 */
export interface Aggregation {
  op: AggregationOp;
  /** Required for sum/avg/min/max */
  field?: TransactionField;
  alias: string;
  where?: Predicate;
}

export interface GroupRow {
  key: FieldValue;
  values: Record<string, number>;
}

export interface FilterOptions {
  limit?: number;
}

/**
 * Read-only dataset accessor
 */
export interface TransactionDataset {
  filter(predicates: Predicate[], options?: FilterOptions): Promise<Transaction[]>;
  aggregate(predicates: Predicate[], aggregations: Aggregation[]): Promise<Record<string, number>>;
  groupBy(
    dimension: GroupableField,
    predicates: Predicate[],
    aggregations: Aggregation[]
  ): Promise<GroupRow[]>;
}

// =============================================================================
// INTENTS & ENTITIES
// =============================================================================

export type IntentType = 'descriptive' | 'comparative' | 'user_segmentation' | 'risk_analysis';

export type ResponseIntent = IntentType | 'clarification';

export type Metric = 'amount' | 'count' | 'avg' | 'fraud_rate' | 'failure_rate';

export type TimeReference =
  | 'today'
  | 'yesterday'
  | 'week'
  | 'month'
  | 'year'
  | 'last_week'
  | 'last_month'
  | 'morning'
  | 'afternoon'
  | 'evening'
  | 'night'
  | 'peak_hours';

/**
 * Direction-sensitive dimension families
 */
export type DimensionFamily = 'bank' | 'state' | 'age_group';

export type UndirectedKey = DimensionFamily;

export type FilterKey =
  | 'merchant_category'
  | 'sender_state'
  | 'receiver_state'
  | 'sender_age_group'
  | 'receiver_age_group'
  | 'sender_bank'
  | 'receiver_bank'
  | 'device_type'
  | 'network_type'
  | 'transaction_type'
  | 'transaction_status'
  | UndirectedKey;

/**
 * Anything a question can ask to group by, before direction is resolved
 */
export type GroupingDimension = GroupableField | UndirectedKey | 'receiver_state';

/**
 * Resolved entities for one turn
 */
export interface EntitySet {
  merchant_category?: string;
  sender_state?: string;
  receiver_state?: string;
  sender_age_group?: string;
  receiver_age_group?: string;
  sender_bank?: string;
  receiver_bank?: string;
  device_type?: string;
  network_type?: string;
  transaction_type?: string;
  transaction_status?: string;
  bank?: string;
  state?: string;
  age_group?: string;
  comparison_dimension?: GroupingDimension;
  comparison_values?: string[];
  segment_by?: GroupingDimension;
  metric?: Metric;
  time_reference?: TimeReference;
  hour_of_day?: number;
  day_of_week?: number;
  is_weekend?: boolean;
  top_n?: number;
  bottom_n?: number;
}

export type EntityKey = keyof EntitySet;

export const FILTER_KEYS: readonly FilterKey[] = [
  'merchant_category',
  'sender_state',
  'receiver_state',
  'sender_age_group',
  'receiver_age_group',
  'sender_bank',
  'receiver_bank',
  'device_type',
  'network_type',
  'transaction_type',
  'transaction_status',
  'bank',
  'state',
  'age_group',
];

export interface Intent {
  type: IntentType;
  confidence: number;
  entities: EntitySet;
}

// =============================================================================
// CLARIFICATION & SESSIONS
// =============================================================================

export type ClarificationKind = 'bank_direction' | 'state_direction' | 'age_direction';

export type ClarificationMode = 'comparative' | 'segmentation';

export interface PendingClarification {
  kind: ClarificationKind;
  mode: ClarificationMode;
  /** Entities extracted on the turn that raised the clarification */
  entities: EntitySet;
  query: string;
}

export interface ClarificationPayload {
  needs_clarification: true;
  clarification_type: ClarificationKind;
  options: GroupingDimension[];
  question: string;
}

/**
 * Headline numbers pulled out of a result for session memory
 */
export type ExtractedMetrics = Record<string, number | string | null>;

export interface ConversationTurn {
  timestamp: Date;
  query: string;
  intent: IntentType;
  entities: EntitySet;
  responseSummary: string;
  metrics: ExtractedMetrics;
}

export interface AnalystSession {
  id: string;
  createdAt: Date;
  updatedAt: Date;
  ttlMs: number;
  lastIntent: IntentType | null;
  lastEntities: EntitySet;
  history: ConversationTurn[];
  pendingClarification: PendingClarification | null;
}

export interface ResolvedEntities extends EntitySet {
  last_intent: IntentType | null;
  last_metrics: ExtractedMetrics;
}

// =============================================================================
// ANALYSIS RESULTS
// =============================================================================

export interface AmountStatistics {
  total_amount: number;
  average_amount: number;
  median_amount: number;
  min_amount: number;
  max_amount: number;
  std_dev: number;
}

export interface SampleTransaction {
  id: string;
  amount: number;
  merchant_category: string;
  timestamp: string;
}

export interface HourBucket {
  hour: number;
  count: number;
  average_amount: number;
}

export interface WeekdayBucket {
  day: number;
  day_name: string;
  count: number;
  average_amount: number;
}

export interface SplitBucket {
  count: number;
  average_amount: number;
}

export interface TemporalBreakdown {
  hourly: HourBucket[];
  by_weekday: WeekdayBucket[];
  weekend_split: { weekend: SplitBucket; weekday: SplitBucket };
  peak_hours: Array<{ hour: number; count: number }>;
}

export interface DescriptiveResult {
  kind: 'descriptive';
  total_count: number;
  statistics: AmountStatistics | null;
  success_rate: number;
  sample_transactions: SampleTransaction[];
  temporal?: TemporalBreakdown;
  filters_applied: Predicate[];
  notes: string[];
}

export interface ComparisonGroup {
  group: string;
  transaction_count: number;
  average_amount: number;
  total_amount: number;
  success_rate: number;
  fraud_rate: number;
  failure_rate: number;
}

export type SortMetric = 'transaction_count' | 'average_amount' | 'total_amount' | 'fraud_rate' | 'failure_rate';

export interface ComparativeResult {
  kind: 'comparative';
  comparison_key: GroupableField;
  data: ComparisonGroup[];
  sort_metric: SortMetric;
  sort_order: 'desc' | 'asc';
  ranking?: 'top_n_within_category';
  limit?: number;
  best_performer: string | null;
  total_count: number;
  filters_applied: Predicate[];
  notes: string[];
}

export interface SegmentRow {
  segment: string;
  transaction_count: number;
  average_transaction_value: number;
  total_amount: number;
  share_percent: number;
}

export interface SegmentationResult {
  kind: 'segmentation';
  segment_key: GroupableField;
  segments: SegmentRow[];
  top_segment: string | null;
  total_count: number;
  filters_applied: Predicate[];
  notes: string[];
}

export type RiskLevel = 'high' | 'medium' | 'low';

export interface Hotspot {
  group: string;
  rate_percent: number;
  incidents: number;
  total: number;
}

export interface RiskGroup {
  group: string;
  total: number;
  fraud_count: number;
  fraud_rate: number;
  failed_count: number;
  failure_rate: number;
}

export interface RiskResult {
  kind: 'risk';
  total_transactions: number;
  fraud_count: number;
  fraud_rate_percent: number;
  failed_count: number;
  failure_rate_percent: number;
  risk_level: RiskLevel;
  fraud_by_category: Array<{ category: string; fraud_count: number }>;
  comparison_key?: GroupableField;
  groups?: RiskGroup[];
  fraud_hotspots_by_category?: Hotspot[];
  fraud_hotspots_by_state?: Hotspot[];
  fraud_hotspots_by_bank?: Hotspot[];
  failure_hotspots_by_category?: Hotspot[];
  failure_hotspots_by_state?: Hotspot[];
  failure_hotspots_by_bank?: Hotspot[];
  filters_applied: Predicate[];
  notes: string[];
}

export type AnalysisResult = DescriptiveResult | ComparativeResult | SegmentationResult | RiskResult;

// =============================================================================
// ENGINE RESPONSE
// =============================================================================

export type AnalystResponse =
  | {
      session_id: string;
      intent: IntentType;
      confidence: number;
      entities: EntitySet;
      result: AnalysisResult;
    }
  | {
      session_id: string;
      intent: 'clarification';
      confidence: number;
      entities: EntitySet;
      result: ClarificationPayload;
    };

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface AnalystConfig {
  /** Idle time after which a session is discarded */
  sessionTtlMs: number;
  /** Turns kept per session */
  maxHistoryTurns: number;
  /** Sessions kept in memory before the oldest are evicted */
  maxSessions: number;
  /** Minimum similarity for a fuzzy entity match (0-1) */
  fuzzyThreshold: number;
  /** Sample rows returned by descriptive results */
  sampleRowLimit: number;
  /** Entries per hotspot list in risk results */
  hotspotLimit: number;
}

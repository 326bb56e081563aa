/**
 * Analyst Engine
 *
 * Runs one question through the pipeline:
 *
 *   classify + extract -> pending clarification? -> ambiguity check
 *     -> merge with session memory -> intent preservation -> query plan
 *     -> record turn
 *
 * Session state changes only after the plan has run, so a dataset failure
 * leaves the session as it was.
 */

import type {
  AnalysisResult,
  AnalystConfig,
  AnalystResponse,
  ConversationTurn,
  EntitySet,
  ExtractedMetrics,
  IntentType,
  ResolvedEntities,
  TransactionDataset,
} from '../../common/types.js';
import { errorMessage } from '../../common/errors.js';
import { generateRequestId, logError, logInfo } from '../../common/services/logger.js';
import { getEntityDictionary, type EntityDictionary } from '../../knowledge/dictionary.js';
import { AmbiguityResolver } from './ambiguity-resolver.js';
import { getAnalystConfig } from './config.js';
import { ConversationMemory } from './conversation-memory.js';
import { EntityExtractor } from './entity-extractor.js';
import { IntentClassifier, intentConfidence } from './intent-classifier.js';
import { QueryPlanBuilder } from './query-plan/index.js';

export interface AnalystEngineOptions {
  config?: AnalystConfig;
  dictionary?: EntityDictionary;
  /** Clock for session expiry, epoch milliseconds */
  now?: () => number;
}

const CARRIED_INTENTS: ReadonlySet<IntentType> = new Set(['comparative', 'user_segmentation', 'risk_analysis']);

export class AnalystEngine {
  private readonly classifier: IntentClassifier;
  private readonly extractor: EntityExtractor;
  private readonly resolver = new AmbiguityResolver();
  private readonly memory: ConversationMemory;
  private readonly planner: QueryPlanBuilder;

  constructor(dataset: TransactionDataset, options: AnalystEngineOptions = {}) {
    const config = options.config ?? getAnalystConfig();
    const dictionary = options.dictionary ?? getEntityDictionary();

    this.classifier = new IntentClassifier(dictionary);
    this.extractor = new EntityExtractor(dictionary, config.fuzzyThreshold);
    this.memory = new ConversationMemory({
      ttlMs: config.sessionTtlMs,
      maxHistory: config.maxHistoryTurns,
      maxSessions: config.maxSessions,
      ...(options.now ? { now: options.now } : {}),
    });
    this.planner = new QueryPlanBuilder(dataset, {
      sampleRowLimit: config.sampleRowLimit,
      hotspotLimit: config.hotspotLimit,
    });
  }

  /**
   * Answer one question
   *
   * An unknown or expired session id starts a fresh session under that id;
   * no id starts a session with a generated one.
   *
   * @throws DatasetError when the dataset fails
   */
  async handleQuery(text: string, sessionId?: string): Promise<AnalystResponse> {
    const requestId = generateRequestId();
    const startTime = Date.now();

    const session =
      (sessionId !== undefined ? this.memory.getSession(sessionId) : undefined) ?? this.memory.createSession(sessionId);

    const classification = this.classifier.classify(text);
    const extracted = this.extractor.extract(text);
    const confidence = intentConfidence(extracted);

    let intent: IntentType = classification.type;
    let entities: EntitySet = extracted;
    let answeredClarification = false;

    // 1. A pending clarification gets first look at the turn
    const pending = session.pendingClarification;
    if (pending) {
      const outcome = this.resolver.resolve(pending, text, extracted);

      if (outcome.status === 'restated') {
        logInfo('Clarification restated', { request_id: requestId, session_id: session.id, kind: pending.kind });
        return { session_id: session.id, intent: 'clarification', confidence, entities: extracted, result: outcome.payload };
      }

      if (outcome.status === 'resolved') {
        intent = outcome.intent;
        entities = outcome.entities;
        answeredClarification = true;
      }
    }

    // 2. A new grouping without direction raises (or replaces) a clarification
    if (!answeredClarification) {
      const clarification = this.resolver.detect(extracted, text);
      if (clarification) {
        this.memory.setPendingClarification(session.id, clarification.pending);
        logInfo('Clarification requested', {
          request_id: requestId,
          session_id: session.id,
          kind: clarification.pending.kind,
        });
        return {
          session_id: session.id,
          intent: 'clarification',
          confidence,
          entities: extracted,
          result: clarification.payload,
        };
      }
    }

    // 3. Merge with memory and keep the thread of the conversation
    const merged = this.memory.mergeEntities(session.id, entities);
    if (!answeredClarification) {
      intent = preserveIntent(intent, session.lastIntent, extracted, merged);
    }

    try {
      const result = await this.planner.execute({ intent, entities: merged, query: text });

      // Evicted or deleted while the plan ran: the turn starts the session again
      if (!this.memory.getSession(session.id)) {
        logInfo('Session recreated after query', { request_id: requestId, session_id: session.id });
        this.memory.createSession(session.id);
      }
      if (answeredClarification) {
        this.memory.setPendingClarification(session.id, null);
      }
      this.memory.updateSession(session.id, {
        query: text,
        intent,
        entities: merged,
        responseSummary: summarizeResult(result),
        metrics: extractMetrics(result),
      });

      logInfo('Query answered', {
        request_id: requestId,
        session_id: session.id,
        intent,
        rule: classification.rule,
        duration_ms: Date.now() - startTime,
      });

      return { session_id: session.id, intent, confidence, entities: merged, result };
    } catch (error) {
      logError('Query failed', {
        request_id: requestId,
        session_id: session.id,
        intent,
        error: errorMessage(error),
        duration_ms: Date.now() - startTime,
      });
      throw error;
    }
  }

  // ===========================================================================
  // SESSION PASS-THROUGHS
  // ===========================================================================

  createSession(): string {
    return this.memory.createSession().id;
  }

  getHistory(sessionId: string): ConversationTurn[] {
    return this.memory.getHistory(sessionId);
  }

  deleteSession(sessionId: string): boolean {
    return this.memory.deleteSession(sessionId);
  }

  resetSession(sessionId: string): void {
    this.memory.resetSession(sessionId);
  }

  getResolvedEntities(sessionId: string): ResolvedEntities {
    return this.memory.getResolvedEntities(sessionId);
  }

  hasPendingClarification(sessionId: string): boolean {
    return this.memory.getSession(sessionId)?.pendingClarification != null;
  }
}

// =============================================================================
// HELPERS
// =============================================================================

/**
 * Keep a follow-up ("how about Travel?") in the analysis it follows
 *
 * A descriptive classification inherits a comparative, segmentation or risk
 * intent from the previous turn when the new turn names no metric, and turns
 * comparative when the merged entities still carry a comparison dimension.
 */
export function preserveIntent(
  classified: IntentType,
  lastIntent: IntentType | null,
  extracted: EntitySet,
  merged: EntitySet
): IntentType {
  if (classified !== 'descriptive') return classified;

  if (lastIntent !== null && CARRIED_INTENTS.has(lastIntent) && extracted.metric === undefined) {
    return lastIntent;
  }

  if (merged.comparison_dimension !== undefined) {
    return 'comparative';
  }

  return classified;
}

/**
 * Headline numbers kept in session memory
 */
export function extractMetrics(result: AnalysisResult): ExtractedMetrics {
  switch (result.kind) {
    case 'descriptive':
      return {
        total_count: result.total_count,
        total_amount: result.statistics ? result.statistics.total_amount : 0,
        average_amount: result.statistics ? result.statistics.average_amount : 0,
        success_rate: result.success_rate,
      };
    case 'comparative':
      return {
        comparison_key: result.comparison_key,
        best_performer: result.best_performer,
        groups: result.data.length,
      };
    case 'segmentation':
      return {
        segment_key: result.segment_key,
        top_segment: result.top_segment,
        segments: result.segments.length,
      };
    case 'risk':
      return {
        total_transactions: result.total_transactions,
        fraud_rate_percent: result.fraud_rate_percent,
        failure_rate_percent: result.failure_rate_percent,
        risk_level: result.risk_level,
      };
  }
}

/**
 * One-line summary stored with the turn
 */
export function summarizeResult(result: AnalysisResult): string {
  switch (result.kind) {
    case 'descriptive':
      return result.statistics
        ? `${result.total_count} transactions, average ${result.statistics.average_amount}`
        : 'No matching transactions';
    case 'comparative':
      return `${result.data.length} groups by ${result.comparison_key}, best ${result.best_performer ?? 'n/a'}`;
    case 'segmentation':
      return `${result.segments.length} segments by ${result.segment_key}, top ${result.top_segment ?? 'n/a'}`;
    case 'risk':
      return `Fraud rate ${result.fraud_rate_percent}% (${result.risk_level} risk) over ${result.total_transactions} transactions`;
  }
}

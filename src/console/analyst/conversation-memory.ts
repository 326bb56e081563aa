/**
 * Conversation Memory
 *
 * Process-local session store for the analyst. Sessions carry the merged
 * entities of the last turn, a bounded turn history and at most one pending
 * clarification.
 *
 * Expiry is lazy: a session idle for longer than its TTL is dropped the next
 * time it is looked up. There are no timers.
 */

import { randomUUID } from 'crypto';
import type {
  AnalystSession,
  ConversationTurn,
  EntitySet,
  IntentType,
  ExtractedMetrics,
  PendingClarification,
  ResolvedEntities,
} from '../../common/types.js';
import { SessionNotFoundError } from '../../common/errors.js';
import { logDebug, logInfo } from '../../common/services/logger.js';
import { DEFAULT_ANALYST_CONFIG } from './config.js';
import { FAMILY_KEYS, GROUPING_KEYS, overlayEntities } from './entity-set.js';

// =============================================================================
// CONFIGURATION
// =============================================================================

export interface ConversationMemoryOptions {
  ttlMs: number;
  maxHistory: number;
  maxSessions: number;
  /** Clock in epoch milliseconds */
  now: () => number;
}

const DEFAULT_OPTIONS: ConversationMemoryOptions = {
  ttlMs: DEFAULT_ANALYST_CONFIG.sessionTtlMs,
  maxHistory: DEFAULT_ANALYST_CONFIG.maxHistoryTurns,
  maxSessions: DEFAULT_ANALYST_CONFIG.maxSessions,
  now: () => Date.now(),
};

export interface TurnRecord {
  query: string;
  intent: IntentType;
  entities: EntitySet;
  responseSummary: string;
  metrics: ExtractedMetrics;
}

// =============================================================================
// ENTITY MERGE
// =============================================================================

/**
 * Merge a turn's entities over the session's last entities
 *
 * Every previous key carries over and the new turn wins per key, except:
 * - naming any key of the bank, state or age family drops the inherited
 *   keys of that family ("from SBI" after "to HDFC" replaces, not adds)
 * - top N and bottom N replace each other
 * - a turn that asks for its own grouping (comparison dimension or
 *   segment_by) drops the inherited grouping, so the comparison dimension
 *   carries over only when the new turn names none
 */
export function mergeEntitySets(previous: EntitySet, incoming: EntitySet): EntitySet {
  const merged: EntitySet = overlayEntities({}, previous);

  for (const keys of Object.values(FAMILY_KEYS)) {
    if (keys.some((key) => incoming[key] !== undefined)) {
      for (const key of keys) delete merged[key];
    }
  }

  if (incoming.top_n !== undefined || incoming.bottom_n !== undefined) {
    delete merged.top_n;
    delete merged.bottom_n;
  }

  if (incoming.comparison_dimension !== undefined || incoming.segment_by !== undefined) {
    for (const key of GROUPING_KEYS) delete merged[key];
  }

  return overlayEntities(merged, incoming);
}

// =============================================================================
// SESSION STORE
// =============================================================================

export class ConversationMemory {
  private readonly sessions = new Map<string, AnalystSession>();
  private readonly options: ConversationMemoryOptions;

  constructor(options: Partial<ConversationMemoryOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Start a session; an existing session with the same id is replaced
   */
  createSession(id: string = randomUUID()): AnalystSession {
    const now = new Date(this.options.now());
    const session: AnalystSession = {
      id,
      createdAt: now,
      updatedAt: now,
      ttlMs: this.options.ttlMs,
      lastIntent: null,
      lastEntities: {},
      history: [],
      pendingClarification: null,
    };

    this.sessions.set(id, session);
    if (this.sessions.size > this.options.maxSessions) {
      this.evictOldestSessions();
    }

    logDebug('Session created', { phase: 'memory', session_id: id });
    return session;
  }

  /**
   * Live session by id; expired sessions are removed and reported absent
   */
  getSession(id: string): AnalystSession | undefined {
    const session = this.sessions.get(id);
    if (!session) return undefined;

    if (this.options.now() - session.updatedAt.getTime() > session.ttlMs) {
      this.sessions.delete(id);
      logDebug('Session expired', { phase: 'memory', session_id: id });
      return undefined;
    }

    return session;
  }

  /**
   * @throws SessionNotFoundError when the session is unknown or expired
   */
  requireSession(id: string): AnalystSession {
    const session = this.getSession(id);
    if (!session) throw new SessionNotFoundError(id);
    return session;
  }

  deleteSession(id: string): boolean {
    return this.sessions.delete(id);
  }

  /**
   * Forget history, entities and any pending clarification; keep the id
   */
  resetSession(id: string): AnalystSession {
    const session = this.requireSession(id);
    session.lastIntent = null;
    session.lastEntities = {};
    session.history = [];
    session.pendingClarification = null;
    session.updatedAt = new Date(this.options.now());
    return session;
  }

  getHistory(id: string): ConversationTurn[] {
    return [...this.requireSession(id).history];
  }

  setPendingClarification(id: string, pending: PendingClarification | null): void {
    const session = this.requireSession(id);
    session.pendingClarification = pending;
    session.updatedAt = new Date(this.options.now());
  }

  /**
   * Merge a turn's entities with the session's last entities (no write)
   */
  mergeEntities(id: string, incoming: EntitySet): EntitySet {
    return mergeEntitySets(this.requireSession(id).lastEntities, incoming);
  }

  /**
   * Record a completed turn
   */
  updateSession(id: string, turn: TurnRecord): void {
    const session = this.requireSession(id);
    const now = new Date(this.options.now());

    session.history.push({ timestamp: now, ...turn });
    if (session.history.length > this.options.maxHistory) {
      session.history.splice(0, session.history.length - this.options.maxHistory);
    }

    session.lastIntent = turn.intent;
    session.lastEntities = turn.entities;
    session.updatedAt = now;
  }

  /**
   * Last entities with the last intent and headline metrics
   */
  getResolvedEntities(id: string): ResolvedEntities {
    const session = this.requireSession(id);
    const lastTurn = session.history[session.history.length - 1];
    return {
      ...session.lastEntities,
      last_intent: session.lastIntent,
      last_metrics: lastTurn ? lastTurn.metrics : {},
    };
  }

  /**
   * Evict the least recently active 20% of sessions
   */
  private evictOldestSessions(): void {
    const sessions = Array.from(this.sessions.values());

    // Sort by last activity (oldest first)
    sessions.sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime());

    const toEvict = Math.max(1, Math.floor(sessions.length * 0.2));
    for (let i = 0; i < toEvict; i++) {
      this.sessions.delete(sessions[i].id);
    }

    logInfo('Evicted oldest sessions', { phase: 'memory', evicted: toEvict });
  }
}

/**
 * Ambiguity Resolver
 *
 * Clarification state machine for groupings that need a direction.
 *
 *   NORMAL --(grouping by bank/state/age, no direction)--> AWAITING(kind, mode)
 *   AWAITING --(follow-up names sender or receiver)------> NORMAL
 *   AWAITING --(receiver answer to a state question)-----> AWAITING (restated)
 *   AWAITING --(no cue)----------------------------------> AWAITING, query runs as-is
 *
 * The pending clarification itself lives on the session; this module only
 * decides transitions and builds the payloads.
 */

import type {
  ClarificationKind,
  ClarificationMode,
  ClarificationPayload,
  DimensionFamily,
  EntitySet,
  GroupingDimension,
  IntentType,
  PendingClarification,
} from '../../common/types.js';
import type { Direction } from './entity-extractor.js';
import { overlayEntities } from './entity-set.js';
import { normalizeQuery } from './text-utils.js';

export type FollowUpResolution =
  | { status: 'resolved'; intent: IntentType; entities: EntitySet }
  | { status: 'restated'; payload: ClarificationPayload }
  | { status: 'unanswered' };

export interface ClarificationRequest {
  pending: PendingClarification;
  payload: ClarificationPayload;
}

// =============================================================================
// VOCABULARY
// =============================================================================

const SENDER_ANSWER = /\b(?:senders?|sending|sent|from|payers?)\b/;
const RECEIVER_ANSWER = /\b(?:receivers?|receiving|received|recipients?|to|payees?)\b/;

const KIND_BY_FAMILY: Record<DimensionFamily, ClarificationKind> = {
  bank: 'bank_direction',
  state: 'state_direction',
  age_group: 'age_direction',
};

const OPTIONS: Record<ClarificationKind, Record<Direction, GroupingDimension>> = {
  bank_direction: { sender: 'sender_bank', receiver: 'receiver_bank' },
  state_direction: { sender: 'sender_state', receiver: 'receiver_state' },
  age_direction: { sender: 'sender_age_group', receiver: 'receiver_age_group' },
};

const QUESTIONS: Record<ClarificationKind, string> = {
  bank_direction: "Should banks be grouped by the sender's bank or the receiver's bank?",
  state_direction: "Should states be grouped by the sender's state or the receiver's state?",
  age_direction: "Should age groups be grouped by the sender's age or the receiver's age?",
};

const RECEIVER_STATE_UNAVAILABLE =
  'Receiver state is not recorded for these transactions. Group by sender state instead?';

function isFamily(dimension: GroupingDimension | undefined): dimension is DimensionFamily {
  return dimension === 'bank' || dimension === 'state' || dimension === 'age_group';
}

// =============================================================================
// RESOLVER
// =============================================================================

export class AmbiguityResolver {
  /**
   * Check a turn's entities for a grouping that needs a direction
   *
   * @returns the clarification to raise, or null when the turn can run
   */
  detect(entities: EntitySet, query: string): ClarificationRequest | null {
    const comparison = entities.comparison_dimension;
    const segment = entities.segment_by;

    let mode: ClarificationMode;
    let dimension: GroupingDimension;
    if (comparison !== undefined) {
      mode = 'comparative';
      dimension = comparison;
    } else if (segment !== undefined) {
      mode = 'segmentation';
      dimension = segment;
    } else {
      return null;
    }

    if (dimension === 'receiver_state') {
      const pending: PendingClarification = { kind: 'state_direction', mode, entities, query };
      return { pending, payload: restatedStatePayload() };
    }

    if (!isFamily(dimension)) return null;

    const kind = KIND_BY_FAMILY[dimension];
    return {
      pending: { kind, mode, entities, query },
      payload: {
        needs_clarification: true,
        clarification_type: kind,
        options: [OPTIONS[kind].sender, OPTIONS[kind].receiver],
        question: QUESTIONS[kind],
      },
    };
  }

  /**
   * Try to answer a pending clarification with the follow-up text
   *
   * Follow-up entities are laid over the entities of the turn that raised the
   * clarification, and the grouping key is rewritten to the chosen column.
   */
  resolve(pending: PendingClarification, text: string, followUp: EntitySet): FollowUpResolution {
    const direction = answerDirection(text);
    if (direction === null) {
      return { status: 'unanswered' };
    }

    if (pending.kind === 'state_direction' && direction === 'receiver') {
      return { status: 'restated', payload: restatedStatePayload() };
    }

    const column = OPTIONS[pending.kind][direction];
    const entities = overlayEntities(pending.entities, followUp);

    if (pending.mode === 'comparative') {
      entities.comparison_dimension = column;
      delete entities.segment_by;
    } else {
      entities.segment_by = column;
      delete entities.comparison_dimension;
    }

    return {
      status: 'resolved',
      intent: pending.mode === 'comparative' ? 'comparative' : 'user_segmentation',
      entities,
    };
  }
}

/**
 * Direction named by a clarification answer; the earlier cue wins when both appear
 */
export function answerDirection(text: string): Direction | null {
  const query = normalizeQuery(text);
  const sender = SENDER_ANSWER.exec(query);
  const receiver = RECEIVER_ANSWER.exec(query);

  if (sender && receiver) return sender.index <= receiver.index ? 'sender' : 'receiver';
  if (sender) return 'sender';
  if (receiver) return 'receiver';
  return null;
}

function restatedStatePayload(): ClarificationPayload {
  return {
    needs_clarification: true,
    clarification_type: 'state_direction',
    options: ['sender_state'],
    question: RECEIVER_STATE_UNAVAILABLE,
  };
}

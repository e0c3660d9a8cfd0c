import {
  ConversationStateSchema,
  type ConversationState,
  type RoutingPlan,
  type TaskData,
} from '../contracts/index.js';

/**
 * A partial update returned by a stage. Only the keys present are merged.
 */
export type StateUpdate = Partial<ConversationState>;

type Reducer<T> = (left: T, right: T) => T;

type ReducerTable = { [K in keyof ConversationState]: Reducer<ConversationState[K]> };

const STATE_KEYS = ConversationStateSchema.keyof().options;

// ============================================
// Field reducers
// ============================================

function overwrite<T>(_left: T, right: T): T {
  return right;
}

// First non-null value wins
function setOnce<T>(left: T, right: T): T {
  return left === null || left === undefined ? right : left;
}

function concat<T>(left: T[], right: T[]): T[] {
  return [...left, ...right];
}

function max(left: number, right: number): number {
  return Math.max(left, right);
}

function dedupAppend<T>(left: T[], right: T[]): T[] {
  const merged = [...left];
  for (const item of right) {
    if (!merged.includes(item)) {
      merged.push(item);
    }
  }
  return merged;
}

function keywiseMax(left: Record<string, number>, right: Record<string, number>): Record<string, number> {
  const merged = { ...left };
  for (const [key, value] of Object.entries(right)) {
    merged[key] = key in merged ? Math.max(merged[key], value) : value;
  }
  return merged;
}

function mergeTaskData(left: TaskData, right: TaskData): TaskData {
  const merged: TaskData = { ...left };
  if (right.scheduling) merged.scheduling = right.scheduling;
  if (right.knowledge) merged.knowledge = right.knowledge;
  if (right.contact) merged.contact = right.contact;
  return merged;
}

/**
 * Plans form a lattice ordered by epoch. A later epoch replaces the plan
 * outright; within one epoch the bookkeeping fields accumulate.
 */
export function mergeRoutingPlan(left: RoutingPlan | null, right: RoutingPlan | null): RoutingPlan | null {
  if (left === null) return right;
  if (right === null) return left;
  if (right.epoch > left.epoch) return right;
  if (right.epoch < left.epoch) return left;

  return {
    epoch: left.epoch,
    stages: right.stages,
    tasks: { ...left.tasks, ...right.tasks },
    completed: dedupAppend(left.completed, right.completed),
    current_index: Math.max(left.current_index, right.current_index),
    rationale: right.rationale,
    confidence: right.confidence,
    source: right.source,
  };
}

const REDUCERS: ReducerTable = {
  conversation_id: setOnce,
  created_at: setOnce,
  request: setOnce,
  extracted_context: setOnce,
  updated_at: overwrite,
  draft_output: overwrite,
  status: overwrite,
  decision: overwrite,
  pending_feedback: overwrite,
  cursor: overwrite,
  interrupt: overwrite,
  delivery: overwrite,
  errors: concat,
  messages: concat,
  feedback_history: concat,
  task_data: mergeTaskData,
  routing_plan: mergeRoutingPlan,
  insights: dedupAppend,
  counters: keywiseMax,
  epoch: max,
};

function assignField<K extends keyof ConversationState>(
  target: ConversationState,
  key: K,
  value: ConversationState[K] | undefined,
): void {
  if (value === undefined) return;
  target[key] = REDUCERS[key](target[key], value);
}

function combineField<K extends keyof ConversationState>(
  target: StateUpdate,
  key: K,
  left: ConversationState[K] | undefined,
  right: ConversationState[K] | undefined,
): void {
  if (right === undefined) {
    if (left !== undefined) target[key] = left;
    return;
  }
  target[key] = left === undefined ? right : REDUCERS[key](left, right);
}

// ============================================
// Public API
// ============================================

export function applyUpdate(state: ConversationState, update: StateUpdate): ConversationState {
  const next: ConversationState = { ...state };
  for (const key of STATE_KEYS) {
    assignField(next, key, update[key]);
  }
  return next;
}

/**
 * Fold two updates into one so that applying the result equals applying both in order.
 */
export function combineUpdates(first: StateUpdate, second: StateUpdate): StateUpdate {
  const combined: StateUpdate = {};
  for (const key of STATE_KEYS) {
    combineField(combined, key, first[key], second[key]);
  }
  return combined;
}

export function initialState(conversationId: string, now: Date): ConversationState {
  const at = now.toISOString();
  return {
    conversation_id: conversationId,
    created_at: at,
    updated_at: at,
    request: null,
    extracted_context: null,
    task_data: {},
    draft_output: null,
    routing_plan: null,
    pending_feedback: null,
    feedback_history: [],
    status: 'processing',
    decision: null,
    errors: [],
    epoch: 0,
    messages: [],
    insights: [],
    counters: {},
    cursor: 'parse',
    interrupt: null,
    delivery: null,
  };
}

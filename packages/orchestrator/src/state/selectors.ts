import type {
  ContactResult,
  ConversationState,
  FeedbackEntry,
  KnowledgeResult,
  SchedulingResult,
  StageKind,
  TaskData,
} from '../contracts/index.js';

/** The authoritative completion marker for a stage. */
export function isStageComplete(state: ConversationState, stage: StageKind): boolean {
  return state.task_data[stage]?.completed === true;
}

/** Feedback that opened the current epoch, if any. */
export function currentFeedback(state: ConversationState): FeedbackEntry | null {
  const entries = state.feedback_history.filter((entry) => entry.epoch === state.epoch);
  return entries.length > 0 ? entries[entries.length - 1] : null;
}

export function errorsForEpoch(state: ConversationState, epoch = state.epoch) {
  return state.errors.filter((error) => error.epoch === epoch);
}

export function routeVisitsKey(epoch: number): string {
  return `route_visits:${epoch}`;
}

export function stageRunsKey(stage: StageKind): string {
  return `stage_runs:${stage}`;
}

export function counter(state: ConversationState, key: string): number {
  return state.counters[key] ?? 0;
}

/**
 * Bundle written when classified feedback invalidates a stage's result.
 */
export function clearedBundle(stage: StageKind, epoch: number, task: string, at: Date): TaskData {
  const base = { completed: false, epoch, task, updated_at: at.toISOString() };
  switch (stage) {
    case 'scheduling': {
      const scheduling: SchedulingResult = {
        ...base,
        phase: 'analyze_availability',
        outcome: 'cleared',
        requirements: null,
        busy_windows: [],
        alternatives: [],
        booked_event: null,
        transcript: [],
      };
      return { scheduling };
    }
    case 'knowledge': {
      const knowledge: KnowledgeResult = { ...base, outcome: 'cleared', queries: [], documents: [], missing: [] };
      return { knowledge };
    }
    case 'contact': {
      const contact: ContactResult = { ...base, outcome: 'cleared', queries: [], contacts: [], unknown: [] };
      return { contact };
    }
  }
}

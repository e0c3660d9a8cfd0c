import { v4 as uuidv4 } from 'uuid';
import type {
  ActionRequest,
  ConversationState,
  HumanResponse,
  InterruptNode,
  PendingInterrupt,
  ReviewDecision,
} from '../contracts/index.js';
import { ValidationError, err, ok, type Result } from '../errors/index.js';
import type { StateUpdate } from '../state/store.js';

export type EffectStage = 'send' | 'book';

export interface Resolution {
  decision: ReviewDecision;
  response: HumanResponse['type'] | null;
  feedback: string | null;
}

const EFFECT_FOR: Record<InterruptNode, EffectStage> = {
  review: 'send',
  book_review: 'book',
};

export function idempotencyKey(conversationId: string, epoch: number, stage: EffectStage): string {
  return `${conversationId}:${epoch}:${stage}`;
}

export function raiseInterrupt(
  state: ConversationState,
  node: InterruptNode,
  request: ActionRequest,
  now: Date,
): PendingInterrupt {
  const deadline = request.timeout_seconds !== undefined
    ? new Date(now.getTime() + request.timeout_seconds * 1000).toISOString()
    : null;

  return {
    interrupt_id: uuidv4(),
    conversation_id: state.conversation_id,
    node,
    epoch: state.epoch,
    request,
    raised_at: now.toISOString(),
    deadline,
    idempotency_key: idempotencyKey(state.conversation_id, state.epoch, EFFECT_FOR[node]),
  };
}

export function isExpired(interrupt: PendingInterrupt, now: Date): boolean {
  return interrupt.deadline !== null && Date.parse(interrupt.deadline) <= now.getTime();
}

function feedbackText(args: HumanResponse['args']): string {
  if (typeof args === 'string') return args.trim();
  if (args === undefined) return '';
  const note = args.feedback ?? args.text ?? args.draft;
  return typeof note === 'string' ? note.trim() : JSON.stringify(args);
}

/**
 * Classify a human answer against the action request it answers. A missing
 * answer (deadline passed) is never treated as approval.
 */
export function resolveHumanResponse(request: ActionRequest, response: HumanResponse | null): Result<Resolution> {
  if (response === null) {
    return ok({ decision: 'no_response', response: null, feedback: null });
  }

  switch (response.type) {
    case 'accept':
      if (!request.allow_accept) break;
      return ok({ decision: 'approved', response: 'accept', feedback: null });
    case 'ignore':
      if (!request.allow_ignore) break;
      return ok({ decision: 'rejected', response: 'ignore', feedback: null });
    case 'response':
    case 'edit': {
      const allowed = response.type === 'response' ? request.allow_respond : request.allow_edit;
      if (!allowed) break;
      const text = feedbackText(response.args);
      if (text.length === 0) {
        return err(new ValidationError(`'${response.type}' needs feedback text in args`));
      }
      return ok({ decision: response.type === 'response' ? 'modified' : 'edited', response: response.type, feedback: text });
    }
  }

  return err(new ValidationError(`Response type '${response.type}' is not allowed for action '${request.action}'`));
}

export function isFeedback(decision: ReviewDecision): boolean {
  return decision === 'modified' || decision === 'edited';
}

/**
 * Opens a new epoch carrying the human's feedback back to the router.
 */
export function feedbackUpdate(
  state: ConversationState,
  resolution: Resolution,
  source: InterruptNode,
  now: Date,
): StateUpdate {
  const epoch = state.epoch + 1;
  const text = resolution.feedback ?? '';
  return {
    pending_feedback: text,
    feedback_history: [
      { epoch, kind: resolution.response === 'edit' ? 'edit' : 'response', source, text, at: now.toISOString() },
    ],
    status: 'processing',
    decision: resolution.decision,
    epoch,
    interrupt: null,
    messages: [{ node: source, text: `feedback received, opening epoch ${epoch}`, at: now.toISOString() }],
  };
}

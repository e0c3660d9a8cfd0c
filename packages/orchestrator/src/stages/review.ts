import type { ActionRequest, ConversationState } from '../contracts/index.js';
import { TimeoutError, toStageError } from '../errors/index.js';
import { feedbackUpdate, isFeedback, raiseInterrupt, type Resolution } from '../agent/interrupts.js';
import { continueTo, type NodeResult, type ResumableStage, type StageContext } from '../agent/context.js';

export function reviewRequest(state: ConversationState, timeoutSeconds: number): ActionRequest {
  const request = state.request;
  if (request === null) {
    return {
      action: 'Review: unreadable inbound message',
      args: { review_details: { errors: state.errors.map((e) => e.message) }, draft_response: state.draft_output ?? '' },
      allow_accept: false,
      allow_ignore: true,
      allow_respond: false,
      allow_edit: false,
      timeout_seconds: timeoutSeconds,
    };
  }

  return {
    action: `Review: ${(request.subject || '(no subject)').slice(0, 50)}`,
    args: {
      review_details: {
        epoch: state.epoch,
        stages_completed: state.routing_plan?.completed ?? [],
        errors: state.errors.filter((e) => e.epoch === state.epoch).map((e) => `${e.stage}: ${e.message}`),
      },
      draft_response: state.draft_output ?? '',
      email_context: { from: request.from, subject: request.subject, received_at: request.received_at },
    },
    allow_accept: true,
    allow_ignore: true,
    allow_respond: true,
    allow_edit: true,
    timeout_seconds: timeoutSeconds,
  };
}

export const reviewStage: ResumableStage = {
  name: 'review',

  async execute(state: ConversationState, ctx: StageContext): Promise<NodeResult> {
    const request = reviewRequest(state, ctx.settings.reviewTimeoutSeconds);
    const interrupt = raiseInterrupt(state, 'review', request, ctx.now);
    return {
      kind: 'suspend',
      interrupt,
      update: {
        status: state.request === null ? 'error' : 'awaiting_review',
        interrupt,
        messages: [{ node: 'review', text: `awaiting human review: ${request.action}`, at: ctx.now.toISOString() }],
      },
    };
  },

  async resume(state: ConversationState, resolution: Resolution, ctx: StageContext): Promise<NodeResult> {
    const at = ctx.now.toISOString();

    if (isFeedback(resolution.decision)) {
      return continueTo('route', feedbackUpdate(state, resolution, 'review', ctx.now));
    }

    switch (resolution.decision) {
      case 'approved':
        return continueTo('send', {
          status: 'approved',
          decision: 'approved',
          interrupt: null,
          messages: [{ node: 'review', text: 'draft approved', at }],
        });
      case 'no_response':
        return continueTo('end', {
          status: 'rejected',
          decision: 'no_response',
          interrupt: null,
          errors: [toStageError('review', new TimeoutError('review deadline passed without a response'), state.epoch, ctx.now)],
          messages: [{ node: 'review', text: 'review timed out, treated as rejected', at }],
        });
      default:
        return continueTo('end', {
          status: 'rejected',
          decision: 'rejected',
          interrupt: null,
          messages: [{ node: 'review', text: 'draft rejected', at }],
        });
    }
  },
};

import type { ConversationState } from '../contracts/index.js';
import { ExternalServiceError, ValidationError, toStageError } from '../errors/index.js';
import { idempotencyKey } from '../agent/interrupts.js';
import { dispatchOnce } from '../messaging/outbox.js';
import { replySubject } from '../services/mail.js';
import { continueTo, type NodeResult, type Stage, type StageContext } from '../agent/context.js';

/**
 * Transmits the approved draft. The ledger guarantees one transmission per
 * conversation and epoch, however many times this node is replayed.
 */
export const sendStage: Stage = {
  name: 'send',

  async execute(state: ConversationState, ctx: StageContext): Promise<NodeResult> {
    const at = ctx.now.toISOString();
    const request = state.request;
    const draft = state.draft_output;

    if (request === null || draft === null) {
      const error = new ValidationError('nothing to send: request or draft missing');
      return continueTo('end', { status: 'error', errors: [toStageError('send', error, state.epoch, ctx.now)] });
    }

    const key = idempotencyKey(state.conversation_id, state.epoch, 'send');
    const outcome = await dispatchOnce(ctx.ledger, key, ctx.now, async () => {
      const sent = await ctx.mail.send({
        from: ctx.settings.mailbox,
        to: request.from,
        subject: replySubject(request.subject),
        body: draft,
        thread_id: request.thread_id ?? request.message_id,
        idempotency_key: key,
      });
      return { id: sent.message_id, link: null };
    });

    switch (outcome.kind) {
      case 'sent':
      case 'replayed':
        ctx.log.info({ msg: 'reply_sent', conversation_id: state.conversation_id, key, replayed: outcome.kind === 'replayed' });
        return continueTo('end', {
          status: 'completed',
          delivery: { idempotency_key: key, message_id: outcome.receipt.id, sent_at: at, replayed: outcome.kind === 'replayed' },
          messages: [{ node: 'send', text: `reply ${outcome.kind} as ${outcome.receipt.id}`, at }],
        });
      case 'unknown': {
        const error = new ExternalServiceError(`delivery outcome unknown: claim from ${outcome.claimed_at} never settled`);
        ctx.log.error({ msg: 'reply_outcome_unknown', conversation_id: state.conversation_id, key });
        return continueTo('end', { status: 'error', errors: [toStageError('send', error, state.epoch, ctx.now)] });
      }
      case 'failed':
        ctx.log.error({ msg: 'reply_failed', conversation_id: state.conversation_id, key, error: outcome.error.message });
        return continueTo('end', { status: 'error', errors: [toStageError('send', outcome.error, state.epoch, ctx.now)] });
    }
  },
};

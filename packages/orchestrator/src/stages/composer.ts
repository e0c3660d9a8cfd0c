import { DraftRevisionSchema, type ConversationState, type StageKind } from '../contracts/index.js';
import { attempt, parseExternal, toStageError } from '../errors/index.js';
import { renderIntakeError, renderReply } from '../messaging/templates.js';
import { currentFeedback, errorsForEpoch } from '../state/selectors.js';
import type { StateUpdate } from '../state/store.js';
import { continueTo, type NodeResult, type Stage, type StageContext } from '../agent/context.js';

const REVISION_PROMPT = [
  'Revise the draft reply according to the reviewer feedback.',
  'Keep every time slot, link and address exactly as written. Return JSON {draft}.',
].join('\n');

const STAGE_KINDS: StageKind[] = ['scheduling', 'knowledge', 'contact'];

/**
 * Steps that did not deliver, acknowledged in the draft instead of hidden.
 */
export function collectGaps(state: ConversationState): string[] {
  const gaps: string[] = [];
  if (state.errors.some((error) => error.stage === 'parse')) gaps.push('parse');
  if (errorsForEpoch(state).some((error) => error.stage === 'route')) gaps.push('route');

  const planned = state.routing_plan?.stages ?? [];
  for (const stage of STAGE_KINDS) {
    const bundle = state.task_data[stage];
    if (planned.includes(stage) && (!bundle || !bundle.completed)) {
      gaps.push(stage);
    }
  }
  return gaps;
}

export function templateDraft(state: ConversationState, signature: string): string {
  const visible = <T extends { outcome: string }>(bundle: T | undefined) =>
    bundle && bundle.outcome !== 'cleared' ? bundle : undefined;

  return renderReply({
    summary: state.extracted_context?.summary ?? null,
    scheduling: visible(state.task_data.scheduling),
    knowledge: visible(state.task_data.knowledge),
    contact: visible(state.task_data.contact),
    gaps: collectGaps(state),
    signature,
  });
}

export const composerStage: Stage = {
  name: 'compose',

  async execute(state: ConversationState, ctx: StageContext): Promise<NodeResult> {
    const at = ctx.now.toISOString();

    if (state.request === null) {
      const details = state.errors.filter((error) => error.stage === 'intake').map((error) => error.message);
      return continueTo('review', {
        draft_output: renderIntakeError(details),
        messages: [{ node: 'compose', text: 'intake error acknowledged', at }],
      });
    }

    const draft = templateDraft(state, ctx.settings.signature);
    const feedback = currentFeedback(state);
    if (feedback === null) {
      return continueTo('review', {
        draft_output: draft,
        messages: [{ node: 'compose', text: `draft composed (epoch ${state.epoch})`, at }],
      });
    }

    const raw = await attempt('draft_revision', () =>
      ctx.classifier.classify({
        task: 'draft_revision',
        prompt: REVISION_PROMPT,
        context: { draft, feedback: feedback.text, previous_draft: state.draft_output ?? '' },
      }),
    );
    const revised = raw.ok ? parseExternal(DraftRevisionSchema, raw.value, 'draft_revision') : raw;

    const update: StateUpdate = revised.ok
      ? {
          draft_output: revised.value.draft,
          messages: [{ node: 'compose', text: `draft revised from feedback (epoch ${state.epoch})`, at }],
        }
      : {
          draft_output: draft,
          errors: [toStageError('compose', revised.error, state.epoch, ctx.now)],
          messages: [{ node: 'compose', text: 'draft revision failed, template draft kept', at }],
        };

    return continueTo('review', update);
  },
};

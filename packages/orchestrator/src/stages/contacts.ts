import type { ContactRecord, ContactResult, ConversationState } from '../contracts/index.js';
import { attempt, toStageError } from '../errors/index.js';
import { currentFeedback } from '../state/selectors.js';
import { continueTo, type NodeResult, type Stage, type StageContext } from '../agent/context.js';

export function contactQueries(state: ConversationState, mailbox: string): string[] {
  const task = state.routing_plan?.tasks.contact ?? '';
  const feedback = currentFeedback(state)?.text ?? '';
  const entities = (state.extracted_context?.entities ?? []).filter(
    (entity) => entity.toLowerCase() !== mailbox.toLowerCase(),
  );
  const candidates = [task, feedback, ...entities].map((q) => q.trim()).filter((q) => q.length > 0);
  if (candidates.length === 0 && state.extracted_context) {
    candidates.push(state.extracted_context.summary);
  }
  return [...new Set(candidates)];
}

export const contactStage: Stage = {
  name: 'contact',

  async execute(state: ConversationState, ctx: StageContext): Promise<NodeResult> {
    const queries = contactQueries(state, ctx.settings.mailbox);
    const base = { epoch: state.epoch, task: queries[0] ?? '', updated_at: ctx.now.toISOString(), queries };
    const contacts = new Map<string, ContactRecord>();
    const unknown: string[] = [];

    for (const query of queries) {
      const found = await attempt('contact search', () => ctx.contacts.search(query));
      if (!found.ok) {
        const contact: ContactResult = { ...base, completed: false, outcome: 'failed', contacts: [], unknown: queries };
        return continueTo('route', {
          task_data: { contact },
          errors: [toStageError('contact', found.error, state.epoch, ctx.now)],
        });
      }
      if (found.value.length === 0) unknown.push(query);
      for (const record of found.value) contacts.set(record.id, record);
    }

    const contact: ContactResult = {
      ...base,
      completed: true,
      outcome: contacts.size > 0 ? 'found' : 'not_found',
      contacts: [...contacts.values()],
      unknown: contacts.size > 0 ? [] : unknown,
    };

    ctx.log.info({ msg: 'contact_lookup', conversation_id: state.conversation_id, queries: queries.length, contacts: contacts.size });

    return continueTo('route', {
      task_data: { contact },
      insights: contact.contacts.map((record) => `contact: ${record.name} <${record.email}>`),
    });
  },
};

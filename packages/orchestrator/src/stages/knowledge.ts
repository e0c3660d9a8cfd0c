import type { ConversationState, DocumentRecord, KnowledgeResult } from '../contracts/index.js';
import { attempt, toStageError } from '../errors/index.js';
import { currentFeedback } from '../state/selectors.js';
import { continueTo, type NodeResult, type Stage, type StageContext } from '../agent/context.js';

export function knowledgeQueries(state: ConversationState): string[] {
  const task = state.routing_plan?.tasks.knowledge ?? '';
  const feedback = currentFeedback(state)?.text ?? '';
  const summary = state.extracted_context?.summary ?? '';
  const candidates = [task, feedback, summary].map((q) => q.trim()).filter((q) => q.length > 0);
  return [...new Set(candidates)];
}

export const knowledgeStage: Stage = {
  name: 'knowledge',

  async execute(state: ConversationState, ctx: StageContext): Promise<NodeResult> {
    const queries = knowledgeQueries(state);
    const base = { epoch: state.epoch, task: queries[0] ?? '', updated_at: ctx.now.toISOString(), queries };
    const documents = new Map<string, DocumentRecord>();
    const missing: string[] = [];

    for (const query of queries) {
      const found = await attempt('document search', () => ctx.documents.search(query));
      if (!found.ok) {
        const knowledge: KnowledgeResult = { ...base, completed: false, outcome: 'failed', documents: [], missing: queries };
        return continueTo('route', {
          task_data: { knowledge },
          errors: [toStageError('knowledge', found.error, state.epoch, ctx.now)],
        });
      }
      if (found.value.length === 0) missing.push(query);
      for (const doc of found.value) documents.set(doc.id, doc);
    }

    const knowledge: KnowledgeResult = {
      ...base,
      completed: true,
      outcome: documents.size > 0 ? 'found' : 'not_found',
      documents: [...documents.values()],
      missing: documents.size > 0 ? [] : missing,
    };

    ctx.log.info({ msg: 'knowledge_lookup', conversation_id: state.conversation_id, queries: queries.length, documents: documents.size });

    return continueTo('route', {
      task_data: { knowledge },
      insights: knowledge.documents.map((doc) => `document: ${doc.title}`),
    });
  },
};

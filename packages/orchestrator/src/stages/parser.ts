import { ExtractedContextSchema, type ConversationState, type ExtractedContext, type InboundMessage } from '../contracts/index.js';
import { attempt, parseExternal, toStageError } from '../errors/index.js';
import { continueTo, type NodeResult, type Stage, type StageContext } from '../agent/context.js';

const CONTEXT_PROMPT = [
  'Extract structured context from the email below.',
  'Return JSON {summary, entities[], dates[] (RFC 3339 UTC), requested_actions[], urgency: low|normal|high, sentiment: positive|neutral|negative}.',
].join('\n');

/**
 * Minimal context derived without the classifier, so routing can still run.
 */
export function fallbackContext(request: InboundMessage): ExtractedContext {
  const firstLine = request.body.trim().split('\n')[0] ?? '';
  return {
    summary: (request.subject || firstLine).slice(0, 140),
    entities: [],
    dates: [],
    requested_actions: [],
    urgency: 'normal',
    sentiment: 'neutral',
  };
}

export const parserStage: Stage = {
  name: 'parse',

  async execute(state: ConversationState, ctx: StageContext): Promise<NodeResult> {
    const request = state.request;
    if (request === null) {
      // Intake validation already recorded why; routing sends this to compose
      return continueTo('route', {});
    }

    const raw = await attempt('context_extraction', () =>
      ctx.classifier.classify({
        task: 'context_extraction',
        prompt: CONTEXT_PROMPT,
        context: { from: request.from, subject: request.subject, body: request.body, received_at: request.received_at },
      }),
    );
    const parsed = raw.ok ? parseExternal(ExtractedContextSchema, raw.value, 'context_extraction') : raw;
    const at = ctx.now.toISOString();

    if (!parsed.ok) {
      ctx.log.warn({ msg: 'parse_fallback', conversation_id: state.conversation_id, error: parsed.error.message });
      return continueTo('route', {
        extracted_context: fallbackContext(request),
        errors: [toStageError('parse', parsed.error, state.epoch, ctx.now)],
        messages: [{ node: 'parse', text: 'context extraction failed, using subject line', at }],
      });
    }

    return continueTo('route', {
      extracted_context: parsed.value,
      messages: [{ node: 'parse', text: `parsed: ${parsed.value.summary}`, at }],
    });
  },
};

import { ExternalServiceError, FatalError } from '../errors/index.js';
import { moduleLogger } from '../logging/logger.js';

const log = moduleLogger('classifier');

export type ClassificationTask =
  | 'context_extraction'
  | 'stage_routing'
  | 'feedback_routing'
  | 'meeting_requirements'
  | 'booking_routing'
  | 'draft_revision';

export interface ClassificationRequest {
  task: ClassificationTask;
  prompt: string;
  context: Record<string, unknown>;
}

/**
 * Natural-language interpretation behind a narrow seam. Responses are
 * untrusted: callers validate them against a schema.
 */
export interface ClassificationService {
  classify(request: ClassificationRequest): Promise<unknown>;
}

export interface ClassifierConfig {
  provider: 'keyword' | 'http';
  url?: string;
  apiKey?: string;
  timeoutMs?: number;
}

// ============================================
// HTTP provider
// ============================================

export class HttpClassifier implements ClassificationService {
  constructor(
    private readonly url: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 15000,
  ) {}

  async classify(request: ClassificationRequest): Promise<unknown> {
    const started = Date.now();
    let response: Response;
    try {
      response = await fetch(this.url, {
        method: 'POST',
        headers: {
          'content-type': 'application/json',
          authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify(request),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ExternalServiceError(`classifier request failed: ${reason}`);
    }

    log.debug({ msg: 'classifier_call', task: request.task, status: response.status, duration_ms: Date.now() - started });

    if (response.status === 401 || response.status === 403) {
      throw new ExternalServiceError(`classifier rejected credentials (${response.status})`);
    }
    if (!response.ok) {
      throw new ExternalServiceError(`classifier responded ${response.status}`);
    }

    try {
      const body: unknown = await response.json();
      return body;
    } catch {
      throw new ExternalServiceError('classifier returned non-JSON body');
    }
  }
}

// ============================================
// Keyword provider (offline development)
// ============================================

const ISO_TIMESTAMP = /\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d{3})?)?Z/g;
const EMAIL = /[\w.+-]+@[\w-]+(?:\.[\w-]+)+/g;

function textOf(context: Record<string, unknown>, key: string): string {
  const value = context[key];
  return typeof value === 'string' ? value : '';
}

function listOf(context: Record<string, unknown>, key: string): string[] {
  const value = context[key];
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
}

function normaliseTimestamp(raw: string): string {
  return new Date(raw).toISOString();
}

/**
 * Deterministic stand-in that answers every task from keyword heuristics.
 */
export class KeywordClassifier implements ClassificationService {
  async classify(request: ClassificationRequest): Promise<unknown> {
    const { context } = request;
    switch (request.task) {
      case 'context_extraction':
        return this.extractContext(`${textOf(context, 'subject')}\n${textOf(context, 'body')}`);
      case 'stage_routing':
        return this.routeStages(listOf(context, 'requested_actions'));
      case 'feedback_routing':
        return this.routeFeedback(textOf(context, 'feedback'));
      case 'meeting_requirements':
        return this.meetingRequirements(context);
      case 'booking_routing':
        return {
          route: listOf(context, 'conflicts').length > 0 ? 'exit' : 'review',
          confidence: 0.7,
          detected_conflicts: listOf(context, 'conflicts'),
        };
      case 'draft_revision':
        return { draft: textOf(context, 'draft') };
    }
  }

  private extractContext(text: string) {
    const lower = text.toLowerCase();
    const firstSentence = text.trim().split(/(?<=[.!?])\s|\n/)[0] ?? '';
    const actions: string[] = [];
    if (/\b(meet|meeting|call|schedule|calendar)\b/.test(lower)) actions.push('schedule_meeting');
    if (/\b(contact|introduce|who should|reach out)\b/.test(lower)) actions.push('find_contact');
    if (/\?|\b(information|details|pricing|policy|how do)\b/.test(lower)) actions.push('answer_question');

    return {
      summary: firstSentence.slice(0, 140),
      entities: [...new Set(text.match(EMAIL) ?? [])],
      dates: (text.match(ISO_TIMESTAMP) ?? []).map(normaliseTimestamp),
      requested_actions: actions,
      urgency: /\b(urgent|asap|immediately)\b/.test(lower) ? 'high' : 'normal',
      sentiment: /\b(thanks|thank you|great|appreciate)\b/.test(lower)
        ? 'positive'
        : /\b(disappointed|unhappy|problem|complaint)\b/.test(lower)
          ? 'negative'
          : 'neutral',
    };
  }

  private routeStages(actions: string[]) {
    const plan: string[] = [];
    if (actions.includes('schedule_meeting')) plan.push('scheduling');
    if (actions.includes('answer_question')) plan.push('knowledge');
    if (actions.includes('find_contact')) plan.push('contact');
    plan.push('compose');
    return { execution_plan: plan, rationale: `keyword match on ${actions.join(', ') || 'nothing'}`, confidence: 0.6 };
  }

  private routeFeedback(feedback: string) {
    const lower = feedback.toLowerCase();
    const approving = /\b(approve|approved|looks good|lgtm)\b/.test(lower);
    let domain = 'response-only';
    if (/\b(time|reschedule|another day|slot|meeting|tomorrow|afternoon|morning)\b/.test(lower)) domain = 'scheduling';
    else if (/\b(contact|person|email address|introduce)\b/.test(lower)) domain = 'contact';
    else if (/\b(information|detail|details|price|pricing|document|policy)\b/.test(lower)) domain = 'information';

    return {
      decisions: approving && domain === 'response-only' ? ['approved'] : ['modified'],
      domain,
      instructions: feedback,
      confidence: 0.5,
    };
  }

  private meetingRequirements(context: Record<string, unknown>) {
    const text = `${textOf(context, 'subject')}\n${textOf(context, 'body')}\n${textOf(context, 'feedback')}`;
    const lower = text.toLowerCase();
    const stamps = text.match(ISO_TIMESTAMP) ?? [];
    const duration = /(\d{2,3})\s*(?:min|minutes)\b/.exec(lower);
    const sender = textOf(context, 'from');

    return {
      is_meeting_request: /\b(meet|meeting|call|schedule)\b/.test(lower),
      subject: textOf(context, 'subject') || 'Meeting',
      // Feedback comes last, so its timestamp wins over the original request's
      requested_start: stamps.length > 0 ? normaliseTimestamp(stamps[stamps.length - 1]) : null,
      duration_minutes: duration ? Number(duration[1]) : 30,
      attendees: sender ? [sender] : [],
    };
  }
}

/**
 * Factory function to create a classifier based on config
 */
export function createClassifier(config: ClassifierConfig): ClassificationService {
  switch (config.provider) {
    case 'keyword':
      return new KeywordClassifier();
    case 'http':
      if (!config.url || !config.apiKey) {
        throw new FatalError('http classifier requires CLASSIFIER_URL and CLASSIFIER_API_KEY');
      }
      return new HttpClassifier(config.url, config.apiKey, config.timeoutMs);
    default:
      throw new FatalError(`Unknown classifier provider: ${String(config.provider)}`);
  }
}

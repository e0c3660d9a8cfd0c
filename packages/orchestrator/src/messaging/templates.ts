import type { ContactResult, KnowledgeResult, SchedulingResult } from '../contracts/index.js';
import { formatSlot } from '../booking/conflicts.js';

/**
 * Template variables for a reply draft
 */
export interface ReplyVars {
  summary: string | null;
  scheduling?: SchedulingResult;
  knowledge?: KnowledgeResult;
  contact?: ContactResult;
  gaps: string[];
  signature: string;
}

const GAP_DESCRIPTIONS: Record<string, string> = {
  intake: 'reading your message',
  parse: 'fully interpreting your message',
  route: 'deciding how to handle your request',
  scheduling: 'checking calendar availability',
  knowledge: 'looking up the information you asked for',
  contact: 'identifying the right contact',
  compose: 'tailoring this reply to the reviewer notes',
};

export function describeGap(stage: string): string {
  return GAP_DESCRIPTIONS[stage] ?? stage;
}

function firstSentence(text: string): string {
  const sentence = text.trim().split(/(?<=[.!?])\s/)[0] ?? '';
  return sentence.length > 200 ? `${sentence.slice(0, 197)}...` : sentence;
}

/**
 * Scheduling paragraph. Works only from the bundle, which holds busy windows
 * and alternatives but never the subjects of other people's events.
 */
export function renderSchedulingSection(result: SchedulingResult): string | null {
  const requirements = result.requirements;
  const requested = requirements?.requested_start ? formatSlot(requirements.requested_start) : null;

  switch (result.outcome) {
    case 'booked': {
      const link = result.booked_event?.link ? `\nCalendar link: ${result.booked_event.link}` : '';
      return `I've booked "${requirements?.subject ?? 'our meeting'}" for ${requested ?? 'the requested time'} (${requirements?.duration_minutes ?? 30} minutes).${link}`;
    }
    case 'conflict': {
      const options = result.alternatives.map((slot) => `- ${formatSlot(slot.start_utc)}`).join('\n');
      return `Unfortunately ${requested ?? 'the requested time'} is not available. I can offer either of these times instead:\n${options}`;
    }
    case 'awaiting_approval':
    case 'not_booked':
      return `I'm confirming ${requested ?? 'a meeting time'} and will follow up with an invitation shortly.`;
    case 'missing_time':
      return `I'd be happy to set up a meeting. Could you suggest a date and time that works for you?`;
    case 'declined':
      return `I'm not able to book ${requested ?? 'that time'}. Could you suggest another time?`;
    default:
      return null;
  }
}

export function renderKnowledgeSection(result: KnowledgeResult): string | null {
  if (result.outcome === 'found') {
    const lines = result.documents.map((doc) => `- ${doc.title}: ${firstSentence(doc.content)}`).join('\n');
    return `Here is the information you asked about:\n${lines}`;
  }
  if (result.outcome === 'not_found') {
    return `I couldn't find documentation on ${result.missing.join(', ') || 'your question'} yet and will follow up.`;
  }
  return null;
}

export function renderContactSection(result: ContactResult): string | null {
  if (result.outcome === 'found') {
    const lines = result.contacts
      .map((c) => `- ${c.name}${c.role ? ` (${c.role})` : ''}: ${c.email}`)
      .join('\n');
    return `You can reach the right people here:\n${lines}`;
  }
  if (result.outcome === 'not_found') {
    return `I couldn't identify the right contact for ${result.unknown.join(', ') || 'your request'} yet.`;
  }
  return null;
}

export function renderGapSection(gaps: string[]): string | null {
  if (gaps.length === 0) return null;
  const lines = gaps.map((gap) => `- ${describeGap(gap)}`).join('\n');
  return `I ran into a problem with the following and will follow up separately:\n${lines}`;
}

/**
 * Generate the reply body from the stage bundles
 */
export function renderReply(vars: ReplyVars): string {
  const sections = [
    'Hello,',
    vars.summary ? `Thank you for your message about: ${vars.summary}` : 'Thank you for your message.',
    vars.scheduling ? renderSchedulingSection(vars.scheduling) : null,
    vars.knowledge ? renderKnowledgeSection(vars.knowledge) : null,
    vars.contact ? renderContactSection(vars.contact) : null,
    renderGapSection(vars.gaps),
    `Best regards,\n${vars.signature}`,
  ];

  return sections.filter((section): section is string => section !== null).join('\n\n');
}

export function renderIntakeError(details: string[]): string {
  const lines = details.map((d) => `- ${d}`).join('\n');
  return `The inbound message could not be processed and no reply was drafted.\n\nProblems found:\n${lines || '- unknown'}`;
}

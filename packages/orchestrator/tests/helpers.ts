import type { CalendarEvent, ContactRecord, ConversationState, DocumentRecord, InboundMessage } from '../src/contracts/index';
import { Orchestrator } from '../src/agent/orchestrator';
import { DEFAULT_SETTINGS, type EngineSettings, type StageContext } from '../src/agent/context';
import { InMemoryCalendar } from '../src/calendar/service';
import { moduleLogger } from '../src/logging/logger';
import { InMemoryDeliveryLedger } from '../src/messaging/outbox';
import type { InterruptNotifier } from '../src/messaging/reviewerFeed';
import { InMemoryCheckpointStore, type CheckpointStore } from '../src/persistence/checkpoints';
import type { ClassificationRequest, ClassificationService, ClassificationTask } from '../src/services/classifier';
import { InMemoryDirectory } from '../src/services/directory';
import type { MailTransport, OutboundMail } from '../src/services/mail';
import { applyUpdate, initialState, type StateUpdate } from '../src/state/store';

export type Handler = (request: ClassificationRequest) => unknown;

const DEFAULT_HANDLERS: Record<ClassificationTask, Handler> = {
  context_extraction: () => ({
    summary: 'Question about the product',
    entities: [],
    dates: [],
    requested_actions: [],
    urgency: 'normal',
    sentiment: 'neutral',
  }),
  stage_routing: () => ({ execution_plan: ['compose'], rationale: 'reply only', confidence: 0.9 }),
  feedback_routing: () => ({ decisions: ['modified'], domain: 'response-only', instructions: '', confidence: 0.8 }),
  meeting_requirements: () => ({ is_meeting_request: false }),
  booking_routing: () => ({ route: 'review', confidence: 0.9 }),
  draft_revision: (request) => ({ draft: `${String(request.context.draft)}\n\n(revised)` }),
};

/**
 * Classifier double answering each task from a handler, recording every call.
 */
export class ScriptedClassifier implements ClassificationService {
  readonly calls: ClassificationRequest[] = [];
  private readonly handlers: Partial<Record<ClassificationTask, Handler>>;

  constructor(handlers: Partial<Record<ClassificationTask, Handler>> = {}) {
    this.handlers = { ...handlers };
  }

  on(task: ClassificationTask, handler: Handler): this {
    this.handlers[task] = handler;
    return this;
  }

  count(task: ClassificationTask): number {
    return this.calls.filter((call) => call.task === task).length;
  }

  async classify(request: ClassificationRequest): Promise<unknown> {
    this.calls.push(request);
    const handler = this.handlers[request.task] ?? DEFAULT_HANDLERS[request.task];
    return handler(request);
  }
}

export class RecordingMailTransport implements MailTransport {
  readonly sent: OutboundMail[] = [];
  failure: Error | null = null;

  async send(mail: OutboundMail): Promise<{ message_id: string }> {
    if (this.failure) throw this.failure;
    this.sent.push(mail);
    return { message_id: `msg-${this.sent.length}` };
  }
}

export class RecordingNotifier implements InterruptNotifier {
  readonly raised: string[] = [];
  readonly resolved: string[] = [];

  interruptRaised(interrupt: { node: string }): void {
    this.raised.push(interrupt.node);
  }

  interruptResolved(event: { decision: string }): void {
    this.resolved.push(event.decision);
  }
}

export class ManualClock {
  private current: number;

  constructor(iso: string) {
    this.current = Date.parse(iso);
  }

  now = (): Date => new Date(this.current);

  advance(ms: number): void {
    this.current += ms;
  }
}

export const CONTACTS: ContactRecord[] = [
  { id: 'c-1', name: 'Dana Whitfield', email: 'dana@example.com', role: 'Partnerships', organisation: null, notes: 'partnerships resellers' },
  { id: 'c-2', name: 'Marco Alvarez', email: 'marco@example.com', role: 'Billing', organisation: null, notes: 'invoices refunds' },
];

export const DOCUMENTS: DocumentRecord[] = [
  { id: 'd-1', title: 'Pricing overview', content: 'Annual plans get a discount. Enterprise is quoted per seat.', tags: ['pricing'] },
  { id: 'd-2', title: 'Refund policy', content: 'Refunds are available within 30 days.', tags: ['refund'] },
];

export function inbound(overrides: Partial<InboundMessage> = {}): InboundMessage {
  return {
    message_id: 'm-1',
    thread_id: 't-1',
    from: 'alex@customer.test',
    to: ['assistant@example.com'],
    subject: 'Quick question',
    body: 'Hi, could you tell me about your plans?',
    received_at: '2026-03-02T08:00:00.000Z',
    ...overrides,
  };
}

export interface HarnessOptions {
  classifier?: ScriptedClassifier;
  events?: CalendarEvent[];
  clock?: ManualClock;
  settings?: Partial<EngineSettings>;
  notifier?: InterruptNotifier;
  checkpoints?: CheckpointStore;
}

export function createHarness(options: HarnessOptions = {}) {
  const classifier = options.classifier ?? new ScriptedClassifier();
  const calendar = new InMemoryCalendar(options.events ?? []);
  const mail = new RecordingMailTransport();
  const contacts = new InMemoryDirectory(CONTACTS, (c) => `${c.name} ${c.email} ${c.notes}`);
  const documents = new InMemoryDirectory(DOCUMENTS, (d) => `${d.title} ${d.tags.join(' ')} ${d.content}`);
  const checkpoints = options.checkpoints ?? new InMemoryCheckpointStore();
  const ledger = new InMemoryDeliveryLedger();
  const clock = options.clock ?? new ManualClock('2026-03-02T08:00:00.000Z');

  const engine = new Orchestrator({
    classifier,
    calendar,
    mail,
    contacts,
    documents,
    checkpoints,
    ledger,
    notifier: options.notifier,
    clock: clock.now,
    settings: options.settings,
  });

  return { engine, classifier, calendar, mail, contacts, documents, checkpoints, ledger, clock };
}

/** A stage context over fresh in-memory collaborators, for calling nodes directly. */
export function stageContext(classifier: ClassificationService, now = new Date('2026-03-02T08:00:00.000Z')): StageContext {
  return {
    classifier,
    calendar: new InMemoryCalendar(),
    mail: new RecordingMailTransport(),
    contacts: new InMemoryDirectory(CONTACTS, (c) => `${c.name} ${c.email} ${c.notes}`),
    documents: new InMemoryDirectory(DOCUMENTS, (d) => `${d.title} ${d.content}`),
    ledger: new InMemoryDeliveryLedger(),
    settings: DEFAULT_SETTINGS,
    now,
    log: moduleLogger('test'),
  };
}

export function stateWith(update: StateUpdate, id = 'conv-1'): ConversationState {
  return applyUpdate(initialState(id, new Date('2026-03-02T08:00:00.000Z')), update);
}

/**
 * Small deterministic PRNG (mulberry32) for randomized property checks.
 */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function pick<T>(random: () => number, items: readonly T[]): T {
  return items[Math.floor(random() * items.length)];
}

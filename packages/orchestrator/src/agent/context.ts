import type {
  ContactRecord,
  ConversationState,
  DocumentRecord,
  GraphNode,
  PendingInterrupt,
} from '../contracts/index.js';
import type { BusinessHours } from '../booking/conflicts.js';
import type { CalendarService } from '../calendar/service.js';
import type { Logger } from '../logging/logger.js';
import type { DeliveryLedger } from '../messaging/outbox.js';
import type { InterruptNotifier } from '../messaging/reviewerFeed.js';
import type { CheckpointStore } from '../persistence/checkpoints.js';
import type { ClassificationService } from '../services/classifier.js';
import type { DirectoryService } from '../services/directory.js';
import type { MailTransport } from '../services/mail.js';
import type { StateUpdate } from '../state/store.js';
import type { Resolution } from './interrupts.js';

export interface EngineSettings {
  mailbox: string;
  signature: string;
  reviewTimeoutSeconds: number;
  bookingReviewTimeoutSeconds: number;
  businessHours: BusinessHours;
  maxRouteVisits: number;
}

export const DEFAULT_SETTINGS: EngineSettings = {
  mailbox: 'assistant@example.com',
  signature: 'Inbox Assistant',
  reviewTimeoutSeconds: 86400,
  bookingReviewTimeoutSeconds: 300,
  businessHours: { startHour: 9, endHour: 17 },
  maxRouteVisits: 8,
};

/**
 * Everything the engine talks to. Built once at process start and injected.
 */
export interface EngineDeps {
  classifier: ClassificationService;
  calendar: CalendarService;
  mail: MailTransport;
  contacts: DirectoryService<ContactRecord>;
  documents: DirectoryService<DocumentRecord>;
  checkpoints: CheckpointStore;
  ledger: DeliveryLedger;
  notifier?: InterruptNotifier;
  clock?: () => Date;
  settings?: Partial<EngineSettings>;
}

/** What a stage sees while it runs: collaborators, settings and the step time. */
export interface StageContext {
  classifier: ClassificationService;
  calendar: CalendarService;
  mail: MailTransport;
  contacts: DirectoryService<ContactRecord>;
  documents: DirectoryService<DocumentRecord>;
  ledger: DeliveryLedger;
  settings: EngineSettings;
  now: Date;
  log: Logger;
}

export type NodeResult =
  | { kind: 'continue'; next: GraphNode; update: StateUpdate }
  | { kind: 'suspend'; interrupt: PendingInterrupt; update: StateUpdate };

export function continueTo(next: GraphNode, update: StateUpdate): NodeResult {
  return { kind: 'continue', next, update };
}

export type StageName = 'parse' | 'scheduling' | 'knowledge' | 'contact' | 'compose' | 'review' | 'send';

/**
 * A graph node's behaviour. Stages never mutate the state they are given and
 * report failures through the returned update instead of throwing.
 */
export interface Stage {
  readonly name: StageName;
  execute(state: ConversationState, ctx: StageContext): Promise<NodeResult>;
}

/** A stage that owns an interrupt and continues from the human's answer. */
export interface ResumableStage extends Stage {
  resume(state: ConversationState, resolution: Resolution, ctx: StageContext): Promise<NodeResult>;
}

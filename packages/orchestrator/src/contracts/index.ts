import { z } from 'zod';

// RFC 3339 UTC timestamp validation
const rfc3339UtcRegex = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d{3})?Z$/;

const rfc3339UtcString = z
  .string()
  .regex(rfc3339UtcRegex, 'Timestamp must be RFC 3339 UTC format (YYYY-MM-DDTHH:mm:ss.sssZ)');

const emailString = z.string().email();

const confidence = z.number().min(0).max(1);

// ============================================
// Inbound mail
// ============================================

export const InboundMessageSchema = z.object({
  message_id: z.string().min(1),
  thread_id: z.string().min(1).optional(),
  from: emailString,
  to: z.array(emailString).default([]),
  subject: z.string().max(998).default(''),
  body: z.string().min(1, 'body must not be empty'),
  received_at: rfc3339UtcString,
});

export type InboundMessage = z.infer<typeof InboundMessageSchema>;

export const ExtractedContextSchema = z.object({
  summary: z.string(),
  entities: z.array(z.string()).default([]),
  dates: z.array(z.string()).default([]),
  requested_actions: z.array(z.string()).default([]),
  urgency: z.enum(['low', 'normal', 'high']).default('normal'),
  sentiment: z.enum(['positive', 'neutral', 'negative']).default('neutral'),
});

export type ExtractedContext = z.infer<typeof ExtractedContextSchema>;

// ============================================
// Stages and routing
// ============================================

export const StageKindSchema = z.enum(['scheduling', 'knowledge', 'contact']);
export type StageKind = z.infer<typeof StageKindSchema>;

export const RoutedStageSchema = z.enum(['scheduling', 'knowledge', 'contact', 'compose']);
export type RoutedStage = z.infer<typeof RoutedStageSchema>;

export const FeedbackDomainSchema = z.enum(['scheduling', 'contact', 'information', 'response-only']);
export type FeedbackDomain = z.infer<typeof FeedbackDomainSchema>;

export const RoutingPlanSchema = z.object({
  epoch: z.number().int().min(0),
  stages: z.array(RoutedStageSchema),
  tasks: z.record(z.string()),
  completed: z.array(RoutedStageSchema),
  current_index: z.number().int().min(0),
  rationale: z.string(),
  confidence,
  source: z.enum(['classifier', 'fallback', 'feedback']),
});

export type RoutingPlan = z.infer<typeof RoutingPlanSchema>;

// Classifier output: ordered stage list for a new epoch
export const StageRoutingSchema = z.object({
  execution_plan: z.array(RoutedStageSchema),
  tasks: z.record(z.string()).default({}),
  rationale: z.string().default(''),
  confidence,
});

export type StageRouting = z.infer<typeof StageRoutingSchema>;

export const FeedbackDecisionSchema = z.enum(['approved', 'rejected', 'modified', 'unclear']);
export type FeedbackDecision = z.infer<typeof FeedbackDecisionSchema>;

// Classifier output: which domain a reviewer's feedback targets
export const FeedbackClassificationSchema = z.object({
  decisions: z.array(FeedbackDecisionSchema).min(1),
  domain: FeedbackDomainSchema,
  instructions: z.string().default(''),
  confidence,
});

export type FeedbackClassification = z.infer<typeof FeedbackClassificationSchema>;

export const MeetingRequirementsSchema = z.object({
  is_meeting_request: z.boolean(),
  subject: z.string().min(1).default('Meeting'),
  requested_start: rfc3339UtcString.nullable().default(null),
  duration_minutes: z.number().int().min(5).max(480).default(30),
  attendees: z.array(emailString).default([]),
  description: z.string().optional(),
});

export type MeetingRequirements = z.infer<typeof MeetingRequirementsSchema>;

export const BookingRouteSchema = z.object({
  route: z.enum(['review', 'exit']),
  confidence,
  detected_conflicts: z.array(z.string()).default([]),
});

export type BookingRoute = z.infer<typeof BookingRouteSchema>;

export const DraftRevisionSchema = z.object({
  draft: z.string().min(1),
});

export type DraftRevision = z.infer<typeof DraftRevisionSchema>;

// ============================================
// Collaborator records
// ============================================

export const CalendarEventSchema = z.object({
  id: z.string().min(1),
  subject: z.string(),
  start_utc: rfc3339UtcString,
  end_utc: rfc3339UtcString,
  attendees: z.array(emailString).default([]),
  link: z.string().url().nullable().default(null),
});

export type CalendarEvent = z.infer<typeof CalendarEventSchema>;

export const ContactRecordSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  email: emailString,
  role: z.string().nullable().default(null),
  organisation: z.string().nullable().default(null),
  notes: z.string().default(''),
});

export type ContactRecord = z.infer<typeof ContactRecordSchema>;

export const DocumentRecordSchema = z.object({
  id: z.string().min(1),
  title: z.string().min(1),
  content: z.string(),
  tags: z.array(z.string()).default([]),
});

export type DocumentRecord = z.infer<typeof DocumentRecordSchema>;

// ============================================
// Interrupt wire shapes
// ============================================

export const ActionRequestSchema = z.object({
  action: z.string().min(1),
  args: z.record(z.unknown()),
  allow_accept: z.boolean(),
  allow_ignore: z.boolean(),
  allow_respond: z.boolean(),
  allow_edit: z.boolean(),
  timeout_seconds: z.number().int().positive().optional(),
});

export type ActionRequest = z.infer<typeof ActionRequestSchema>;

export const HumanResponseSchema = z.object({
  type: z.enum(['accept', 'ignore', 'response', 'edit']),
  args: z.union([z.string(), z.record(z.unknown())]).optional(),
});

export type HumanResponse = z.infer<typeof HumanResponseSchema>;

export const ReviewDecisionSchema = z.enum(['approved', 'rejected', 'modified', 'edited', 'no_response']);
export type ReviewDecision = z.infer<typeof ReviewDecisionSchema>;

export const InterruptNodeSchema = z.enum(['review', 'book_review']);
export type InterruptNode = z.infer<typeof InterruptNodeSchema>;

export const PendingInterruptSchema = z.object({
  interrupt_id: z.string().uuid(),
  conversation_id: z.string().min(1),
  node: InterruptNodeSchema,
  epoch: z.number().int().min(0),
  request: ActionRequestSchema,
  raised_at: rfc3339UtcString,
  deadline: rfc3339UtcString.nullable(),
  idempotency_key: z.string().min(1),
});

export type PendingInterrupt = z.infer<typeof PendingInterruptSchema>;

// ============================================
// Stage result bundles
// ============================================

export const TimeWindowSchema = z.object({
  start_utc: rfc3339UtcString,
  end_utc: rfc3339UtcString,
});

export type TimeWindow = z.infer<typeof TimeWindowSchema>;

const bundleBase = {
  completed: z.boolean(),
  epoch: z.number().int().min(0),
  task: z.string(),
  updated_at: rfc3339UtcString,
};

export const SchedulingResultSchema = z.object({
  ...bundleBase,
  phase: z.enum(['analyze_availability', 'book_review', 'book', 'exit']),
  outcome: z.enum([
    'not_applicable',
    'missing_time',
    'conflict',
    'not_booked',
    'awaiting_approval',
    'booked',
    'declined',
    'modification_requested',
    'failed',
    'cleared',
  ]),
  requirements: MeetingRequirementsSchema.nullable(),
  // Busy windows never carry the subject of the event behind them
  busy_windows: z.array(TimeWindowSchema),
  alternatives: z.array(TimeWindowSchema),
  booked_event: z.object({ id: z.string(), link: z.string().nullable() }).nullable(),
  transcript: z.array(z.string()),
});

export type SchedulingResult = z.infer<typeof SchedulingResultSchema>;

export const KnowledgeResultSchema = z.object({
  ...bundleBase,
  outcome: z.enum(['found', 'not_found', 'failed', 'cleared']),
  queries: z.array(z.string()),
  documents: z.array(DocumentRecordSchema),
  missing: z.array(z.string()),
});

export type KnowledgeResult = z.infer<typeof KnowledgeResultSchema>;

export const ContactResultSchema = z.object({
  ...bundleBase,
  outcome: z.enum(['found', 'not_found', 'failed', 'cleared']),
  queries: z.array(z.string()),
  contacts: z.array(ContactRecordSchema),
  unknown: z.array(z.string()),
});

export type ContactResult = z.infer<typeof ContactResultSchema>;

export const TaskDataSchema = z.object({
  scheduling: SchedulingResultSchema.optional(),
  knowledge: KnowledgeResultSchema.optional(),
  contact: ContactResultSchema.optional(),
});

export type TaskData = z.infer<typeof TaskDataSchema>;

// ============================================
// Conversation state
// ============================================

export const ConversationStatusSchema = z.enum([
  'processing',
  'awaiting_review',
  'approved',
  'rejected',
  'completed',
  'error',
]);

export type ConversationStatus = z.infer<typeof ConversationStatusSchema>;

export const ErrorKindSchema = z.enum(['validation', 'external_service', 'timeout', 'fatal']);
export type ErrorKind = z.infer<typeof ErrorKindSchema>;

export const StageErrorSchema = z.object({
  stage: z.string(),
  kind: ErrorKindSchema,
  message: z.string(),
  epoch: z.number().int().min(0),
  at: rfc3339UtcString,
});

export type StageError = z.infer<typeof StageErrorSchema>;

export const AuditEntrySchema = z.object({
  node: z.string(),
  text: z.string(),
  at: rfc3339UtcString,
});

export type AuditEntry = z.infer<typeof AuditEntrySchema>;

export const FeedbackEntrySchema = z.object({
  epoch: z.number().int().min(0),
  kind: z.enum(['response', 'edit']),
  source: InterruptNodeSchema,
  text: z.string(),
  at: rfc3339UtcString,
});

export type FeedbackEntry = z.infer<typeof FeedbackEntrySchema>;

export const DeliverySchema = z.object({
  idempotency_key: z.string(),
  message_id: z.string(),
  sent_at: rfc3339UtcString,
  replayed: z.boolean(),
});

export type Delivery = z.infer<typeof DeliverySchema>;

export const GraphNodeSchema = z.enum([
  'parse',
  'route',
  'scheduling',
  'knowledge',
  'contact',
  'compose',
  'review',
  'send',
  'end',
]);

export type GraphNode = z.infer<typeof GraphNodeSchema>;

export const ConversationStateSchema = z.object({
  conversation_id: z.string().min(1),
  created_at: rfc3339UtcString,
  updated_at: rfc3339UtcString,
  request: InboundMessageSchema.nullable(),
  extracted_context: ExtractedContextSchema.nullable(),
  task_data: TaskDataSchema,
  draft_output: z.string().nullable(),
  routing_plan: RoutingPlanSchema.nullable(),
  pending_feedback: z.string().nullable(),
  feedback_history: z.array(FeedbackEntrySchema),
  status: ConversationStatusSchema,
  decision: ReviewDecisionSchema.nullable(),
  errors: z.array(StageErrorSchema),
  epoch: z.number().int().min(0),
  messages: z.array(AuditEntrySchema),
  insights: z.array(z.string()),
  counters: z.record(z.number()),
  cursor: GraphNodeSchema,
  interrupt: PendingInterruptSchema.nullable(),
  delivery: DeliverySchema.nullable(),
});

export type ConversationState = z.infer<typeof ConversationStateSchema>;

import {
  BookingRouteSchema,
  MeetingRequirementsSchema,
  type ActionRequest,
  type BookingRoute,
  type CalendarEvent,
  type ConversationState,
  type MeetingRequirements,
  type SchedulingResult,
} from '../contracts/index.js';
import { ExternalServiceError, TimeoutError, attempt, parseExternal, toStageError, type OrchestratorError } from '../errors/index.js';
import { feedbackUpdate, isFeedback, raiseInterrupt, type Resolution } from '../agent/interrupts.js';
import { continueTo, type NodeResult, type ResumableStage, type StageContext } from '../agent/context.js';
import { dispatchOnce } from '../messaging/outbox.js';
import { currentFeedback } from '../state/selectors.js';
import { combineUpdates, type StateUpdate } from '../state/store.js';
import { findConflicts, formatSlot, proposeAlternatives, toInterval, type BusinessHours, type Interval } from './conflicts.js';

const DAY_MS = 24 * 60 * 60 * 1000;

const REQUIREMENTS_PROMPT = [
  'Decide whether the email asks for a meeting and extract its requirements.',
  'Reviewer feedback, when present, overrides the original request.',
  'Return JSON {is_meeting_request, subject, requested_start (RFC 3339 UTC or null), duration_minutes, attendees[], description}.',
].join('\n');

function bookingPrompt(hours: BusinessHours): string {
  return [
    'You review calendar availability for a requested meeting.',
    `Working hours are ${hours.startHour}h to ${hours.endHour}h UTC, Monday to Friday.`,
    'Route "review" when the slot looks bookable, "exit" when it conflicts or cannot be booked.',
    'Return JSON {route, confidence, detected_conflicts[]}.',
  ].join('\n');
}

/**
 * Availability as the classifier sees it: busy windows only, never event subjects.
 */
export function availabilityTranscript(requested: Interval, busy: Interval[]): string[] {
  const lines = [`requested ${new Date(requested.start).toISOString()} - ${new Date(requested.end).toISOString()}`];
  for (const window of busy) {
    lines.push(`busy ${new Date(window.start).toISOString()} - ${new Date(window.end).toISOString()}`);
  }
  return lines;
}

function bookingRequest(requirements: MeetingRequirements, requested: Interval, timeoutSeconds: number): ActionRequest {
  const start = new Date(requested.start).toISOString();
  return {
    action: `Book: ${requirements.subject} - ${formatSlot(start)}`,
    args: {
      subject: requirements.subject,
      start_utc: start,
      end_utc: new Date(requested.end).toISOString(),
      duration_minutes: requirements.duration_minutes,
      attendees: requirements.attendees,
    },
    allow_accept: true,
    allow_ignore: true,
    allow_respond: true,
    allow_edit: false,
    timeout_seconds: timeoutSeconds,
  };
}

type Analysis = Omit<SchedulingResult, 'completed' | 'epoch' | 'task' | 'updated_at'>;

export class SchedulingStage implements ResumableStage {
  readonly name = 'scheduling' as const;

  async execute(state: ConversationState, ctx: StageContext): Promise<NodeResult> {
    const task = state.routing_plan?.tasks.scheduling ?? '';
    const requirements = await this.requirements(state, task, ctx);
    if (!requirements.ok) {
      return this.finish(state, ctx, task, false, this.emptyAnalysis('failed', null), [requirements.error]);
    }

    const meeting = requirements.value;
    if (!meeting.is_meeting_request) {
      return this.finish(state, ctx, task, true, this.emptyAnalysis('not_applicable', meeting));
    }
    if (meeting.requested_start === null) {
      return this.finish(state, ctx, task, true, this.emptyAnalysis('missing_time', meeting));
    }

    const start = Date.parse(meeting.requested_start);
    const requested: Interval = { start, end: start + meeting.duration_minutes * 60 * 1000 };
    const dayStart = start - (start % DAY_MS);

    // analyze_availability
    const listed = await attempt('calendar listEvents', () =>
      ctx.calendar.listEvents({
        from: new Date(dayStart).toISOString(),
        to: new Date(Math.max(dayStart + DAY_MS, requested.end)).toISOString(),
      }),
    );
    if (!listed.ok) {
      return this.finish(state, ctx, task, false, this.emptyAnalysis('failed', meeting), [listed.error]);
    }

    const events: CalendarEvent[] = listed.value;
    const busy = events.map(toInterval);
    const transcript = availabilityTranscript(requested, busy);
    const conflicts = findConflicts(requested, events);
    const route = await this.routeAfterAvailability(transcript, meeting, conflicts, ctx);
    const errors: OrchestratorError[] = route.ok ? [] : [route.error];
    const decision: BookingRoute = route.ok ? route.value : { route: 'exit', confidence: 0, detected_conflicts: [] };

    const analysis: Analysis = {
      phase: 'exit',
      outcome: 'not_booked',
      requirements: meeting,
      busy_windows: events.map((event) => ({ start_utc: event.start_utc, end_utc: event.end_utc })),
      alternatives: [],
      booked_event: null,
      transcript,
    };

    ctx.log.info({
      msg: 'availability_analyzed',
      conversation_id: state.conversation_id,
      busy: busy.length,
      conflicts: conflicts.length,
      route: decision.route,
    });

    // A detected overlap always wins over the classifier's route
    if (conflicts.length > 0) {
      const alternatives = proposeAlternatives(requested, conflicts, ctx.settings.businessHours);
      return this.finish(state, ctx, task, true, { ...analysis, outcome: 'conflict', alternatives }, errors);
    }
    if (decision.route === 'exit') {
      return this.finish(state, ctx, task, true, analysis, errors);
    }

    // book_review
    const request = bookingRequest(meeting, requested, ctx.settings.bookingReviewTimeoutSeconds);
    const interrupt = raiseInterrupt(state, 'book_review', request, ctx.now);
    const pending = this.bundle(state, ctx, task, false, { ...analysis, phase: 'book_review', outcome: 'awaiting_approval' });
    return {
      kind: 'suspend',
      interrupt,
      update: combineUpdates(pending, {
        interrupt,
        messages: [{ node: 'scheduling', text: `awaiting booking approval: ${request.action}`, at: ctx.now.toISOString() }],
      }),
    };
  }

  async resume(state: ConversationState, resolution: Resolution, ctx: StageContext): Promise<NodeResult> {
    const current = state.task_data.scheduling;
    const interrupt = state.interrupt;
    const task = current?.task ?? '';
    const meeting = current?.requirements ?? null;
    const analysis: Analysis = {
      phase: 'exit',
      outcome: 'declined',
      requirements: meeting,
      busy_windows: current?.busy_windows ?? [],
      alternatives: [],
      booked_event: null,
      transcript: current?.transcript ?? [],
    };
    const cleared: StateUpdate = { interrupt: null, decision: resolution.decision };

    if (isFeedback(resolution.decision)) {
      const bundle = this.bundle(state, ctx, task, false, { ...analysis, outcome: 'modification_requested' });
      return continueTo('route', combineUpdates(bundle, feedbackUpdate(state, resolution, 'book_review', ctx.now)));
    }

    if (resolution.decision !== 'approved' || meeting === null || meeting.requested_start === null || interrupt === null) {
      const errors = resolution.decision === 'no_response'
        ? [new TimeoutError('booking approval deadline passed without a response')]
        : [];
      return continueTo('route', combineUpdates(cleared, this.bundle(state, ctx, task, true, analysis, errors)));
    }

    // book
    const start = meeting.requested_start;
    const end = new Date(Date.parse(start) + meeting.duration_minutes * 60 * 1000).toISOString();
    const outcome = await dispatchOnce(ctx.ledger, interrupt.idempotency_key, ctx.now, () =>
      ctx.calendar.createEvent({
        subject: meeting.subject,
        start_utc: start,
        end_utc: end,
        attendees: meeting.attendees,
        description: meeting.description,
        idempotency_key: interrupt.idempotency_key,
      }),
    );

    if (outcome.kind === 'sent' || outcome.kind === 'replayed') {
      ctx.log.info({ msg: 'meeting_booked', conversation_id: state.conversation_id, event_id: outcome.receipt.id });
      const booked = this.bundle(state, ctx, task, true, {
        ...analysis,
        phase: 'exit',
        outcome: 'booked',
        booked_event: { id: outcome.receipt.id, link: outcome.receipt.link },
      });
      return continueTo('route', combineUpdates(cleared, booked));
    }

    const error = outcome.kind === 'failed'
      ? outcome.error
      : new ExternalServiceError(`booking outcome unknown: claim from ${outcome.claimed_at} never settled`);
    const failed = this.bundle(state, ctx, task, false, { ...analysis, outcome: 'failed' }, [error]);
    return continueTo('route', combineUpdates(cleared, failed));
  }

  private async requirements(state: ConversationState, task: string, ctx: StageContext) {
    const request = state.request;
    const raw = await attempt('meeting_requirements', () =>
      ctx.classifier.classify({
        task: 'meeting_requirements',
        prompt: REQUIREMENTS_PROMPT,
        context: {
          from: request?.from ?? '',
          subject: request?.subject ?? '',
          body: request?.body ?? '',
          dates: state.extracted_context?.dates ?? [],
          task,
          feedback: currentFeedback(state)?.text ?? '',
        },
      }),
    );
    return raw.ok ? parseExternal(MeetingRequirementsSchema, raw.value, 'meeting_requirements') : raw;
  }

  private async routeAfterAvailability(
    transcript: string[],
    meeting: MeetingRequirements,
    conflicts: CalendarEvent[],
    ctx: StageContext,
  ) {
    const raw = await attempt('booking_routing', () =>
      ctx.classifier.classify({
        task: 'booking_routing',
        prompt: bookingPrompt(ctx.settings.businessHours),
        context: {
          transcript,
          requested_start: meeting.requested_start,
          duration_minutes: meeting.duration_minutes,
          conflicts: conflicts.map((event) => `${event.start_utc} - ${event.end_utc}`),
        },
      }),
    );
    return raw.ok ? parseExternal(BookingRouteSchema, raw.value, 'booking_routing') : raw;
  }

  private emptyAnalysis(outcome: SchedulingResult['outcome'], requirements: MeetingRequirements | null): Analysis {
    return {
      phase: 'exit',
      outcome,
      requirements,
      busy_windows: [],
      alternatives: [],
      booked_event: null,
      transcript: [],
    };
  }

  private bundle(
    state: ConversationState,
    ctx: StageContext,
    task: string,
    completed: boolean,
    analysis: Analysis,
    errors: OrchestratorError[] = [],
  ): StateUpdate {
    const scheduling: SchedulingResult = {
      ...analysis,
      completed,
      epoch: state.epoch,
      task,
      updated_at: ctx.now.toISOString(),
    };
    const update: StateUpdate = {
      task_data: { scheduling },
      messages: [{ node: 'scheduling', text: `scheduling ${analysis.outcome}`, at: ctx.now.toISOString() }],
    };
    if (errors.length > 0) {
      update.errors = errors.map((error) => toStageError('scheduling', error, state.epoch, ctx.now));
    }
    return update;
  }

  private finish(
    state: ConversationState,
    ctx: StageContext,
    task: string,
    completed: boolean,
    analysis: Analysis,
    errors: OrchestratorError[] = [],
  ): NodeResult {
    return continueTo('route', this.bundle(state, ctx, task, completed, analysis, errors));
  }
}

export const schedulingStage = new SchedulingStage();

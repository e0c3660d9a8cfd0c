import { describe, it, expect, jest } from '@jest/globals';
import type { ClassificationRequest } from '../src/services/classifier';
import { generateICalUID } from '../src/calendar/service';
import { NotFoundError, ValidationError } from '../src/errors/index';
import type { RunResult } from '../src/agent/orchestrator';
import { createHarness, inbound, ManualClock, RecordingNotifier, ScriptedClassifier } from './helpers';

const HOUR = 60 * 60 * 1000;

function interrupted(result: RunResult) {
  if (result.kind !== 'interrupted') throw new Error(`expected an interrupt, got ${result.kind}`);
  return result;
}

function meetingClassifier(extra: Partial<Record<'requested_start', string>> = {}) {
  return new ScriptedClassifier()
    .on('context_extraction', () => ({
      summary: 'Meeting request',
      dates: ['2026-03-03T10:00:00.000Z'],
      requested_actions: ['schedule_meeting'],
    }))
    .on('stage_routing', () => ({
      execution_plan: ['scheduling'],
      tasks: { scheduling: 'book intro call' },
      rationale: 'meeting',
      confidence: 0.9,
    }))
    .on('meeting_requirements', () => ({
      is_meeting_request: true,
      subject: 'Intro call',
      requested_start: extra.requested_start ?? '2026-03-03T10:00:00.000Z',
      duration_minutes: 30,
      attendees: ['alex@customer.test'],
    }));
}

describe('conversation scenarios', () => {
  it('drafts a plain reply, waits for approval and sends it once', async () => {
    const notifier = new RecordingNotifier();
    const { engine, mail, classifier } = createHarness({ notifier });

    const started = interrupted(await engine.start(inbound()));
    expect(started.status).toBe('awaiting_review');
    expect(started.interrupt.node).toBe('review');
    expect(started.interrupt.request.action).toBe('Review: Quick question');
    expect(started.interrupt.deadline).toBe('2026-03-03T08:00:00.000Z');
    expect(started.interrupt.idempotency_key).toBe(`${started.conversation_id}:0:send`);
    expect(started.state.routing_plan?.stages).toEqual(['compose']);
    expect(started.state.draft_output).toBe(
      'Hello,\n\nThank you for your message about: Question about the product\n\nBest regards,\nInbox Assistant',
    );
    expect(mail.sent).toEqual([]);

    const finished = await engine.resume(started.conversation_id, { type: 'accept' });
    expect(finished.kind).toBe('finished');
    expect(finished.status).toBe('completed');
    expect(finished.state.decision).toBe('approved');
    expect(finished.state.delivery).toEqual({
      idempotency_key: `${started.conversation_id}:0:send`,
      message_id: 'msg-1',
      sent_at: '2026-03-02T08:00:00.000Z',
      replayed: false,
    });

    expect(mail.sent).toHaveLength(1);
    expect(mail.sent[0]).toEqual({
      from: 'assistant@example.com',
      to: 'alex@customer.test',
      subject: 'Re: Quick question',
      body: started.state.draft_output,
      thread_id: 't-1',
      idempotency_key: `${started.conversation_id}:0:send`,
    });

    expect(classifier.calls.map((call) => call.task)).toEqual(['context_extraction', 'stage_routing']);
    expect(notifier.raised).toEqual(['review']);
    expect(notifier.resolved).toEqual(['approved']);
  });

  it('offers alternatives for a conflicting meeting without naming the other event', async () => {
    const { engine } = createHarness({
      classifier: meetingClassifier(),
      events: [
        {
          id: 'e-1',
          subject: 'Board offsite planning',
          start_utc: '2026-03-03T10:00:00.000Z',
          end_utc: '2026-03-03T11:00:00.000Z',
          attendees: [],
          link: null,
        },
      ],
    });

    const result = interrupted(await engine.start(inbound({ subject: 'Intro call' })));

    expect(result.status).toBe('awaiting_review');
    expect(result.interrupt.node).toBe('review');
    expect(result.state.task_data.scheduling?.outcome).toBe('conflict');
    expect(result.state.draft_output).toBe(
      [
        'Hello,',
        'Thank you for your message about: Meeting request',
        'Unfortunately 2026-03-03 10:00 UTC is not available. I can offer either of these times instead:\n- 2026-03-03 11:00 UTC\n- 2026-03-03 12:00 UTC',
        'Best regards,\nInbox Assistant',
      ].join('\n\n'),
    );
    expect(JSON.stringify(result.state)).not.toContain('Board offsite');
  });

  it('reruns only the stage the feedback targets', async () => {
    const classifier = new ScriptedClassifier()
      .on('context_extraction', () => ({
        summary: 'Pricing and intro call',
        entities: ['dana@example.com'],
        requested_actions: ['schedule_meeting', 'answer_question', 'find_contact'],
      }))
      .on('stage_routing', () => ({
        execution_plan: ['scheduling', 'knowledge', 'contact'],
        tasks: { scheduling: 'book intro call', knowledge: 'pricing', contact: 'partnerships' },
        rationale: 'three asks',
        confidence: 0.9,
      }))
      .on('meeting_requirements', (request: ClassificationRequest) => ({
        is_meeting_request: true,
        subject: 'Intro call',
        requested_start: String(request.context.feedback).includes('Thursday')
          ? '2026-03-05T14:00:00.000Z'
          : '2026-03-03T10:00:00.000Z',
        duration_minutes: 30,
      }))
      .on('booking_routing', () => ({ route: 'exit', confidence: 0.6 }))
      .on('feedback_routing', () => ({
        decisions: ['modified'],
        domain: 'scheduling',
        instructions: 'Thursday 14:00 instead',
        confidence: 0.8,
      }));
    const { engine, documents, contacts, mail } = createHarness({ classifier });
    const documentSearch = jest.spyOn(documents, 'search');
    const contactSearch = jest.spyOn(contacts, 'search');

    const first = interrupted(await engine.start(inbound({ subject: 'Intro call and pricing' })));
    expect(first.state.routing_plan?.completed).toEqual(['scheduling', 'knowledge', 'contact']);
    expect(documentSearch).toHaveBeenCalledTimes(2);
    expect(contactSearch).toHaveBeenCalledTimes(2);

    const second = interrupted(
      await engine.resume(first.conversation_id, { type: 'response', args: 'Thursday at 14:00 works better' }),
    );

    expect(second.state.epoch).toBe(1);
    expect(second.status).toBe('awaiting_review');
    expect(documentSearch).toHaveBeenCalledTimes(2);
    expect(contactSearch).toHaveBeenCalledTimes(2);
    expect(classifier.count('meeting_requirements')).toBe(2);
    expect(classifier.count('stage_routing')).toBe(1);
    expect(classifier.count('feedback_routing')).toBe(1);

    expect(second.state.task_data.scheduling?.epoch).toBe(1);
    expect(second.state.task_data.scheduling?.requirements?.requested_start).toBe('2026-03-05T14:00:00.000Z');
    expect(second.state.task_data.knowledge?.epoch).toBe(0);
    expect(second.state.task_data.contact?.epoch).toBe(0);
    expect(second.state.draft_output).toBe(
      [
        'Hello,',
        'Thank you for your message about: Pricing and intro call',
        "I'm confirming 2026-03-05 14:00 UTC and will follow up with an invitation shortly.",
        'Here is the information you asked about:\n- Pricing overview: Annual plans get a discount.',
        'You can reach the right people here:\n- Dana Whitfield (Partnerships): dana@example.com',
        'Best regards,\nInbox Assistant',
        '(revised)',
      ].join('\n\n'),
    );

    const done = await engine.resume(first.conversation_id, { type: 'accept' });
    expect(done.status).toBe('completed');
    expect(mail.sent).toHaveLength(1);
    expect(mail.sent[0].idempotency_key).toBe(`${first.conversation_id}:1:send`);
  });

  it('books an approved slot before drafting the reply', async () => {
    const notifier = new RecordingNotifier();
    const { engine, calendar } = createHarness({ classifier: meetingClassifier(), notifier });

    const booking = interrupted(await engine.start(inbound({ subject: 'Intro call' })));
    expect(booking.interrupt.node).toBe('book_review');
    expect(booking.status).toBe('processing');
    expect(booking.state.cursor).toBe('scheduling');

    const review = interrupted(await engine.resume(booking.conversation_id, { type: 'accept' }));
    const id = generateICalUID(`${booking.conversation_id}:0:book`, '2026-03-03T10:00:00.000Z');

    expect(review.interrupt.node).toBe('review');
    expect(review.state.task_data.scheduling?.booked_event).toEqual({ id, link: `https://calendar.example.com/events/${id}` });
    expect(review.state.draft_output).toContain(
      `I've booked "Intro call" for 2026-03-03 10:00 UTC (30 minutes).\nCalendar link: https://calendar.example.com/events/${id}`,
    );
    expect(calendar.all().map((event) => event.id)).toEqual([id]);
    expect(notifier.raised).toEqual(['book_review', 'review']);
    expect(notifier.resolved).toEqual(['approved']);
  });

  it('acknowledges a failed lookup in the draft', async () => {
    const classifier = new ScriptedClassifier().on('stage_routing', () => ({
      execution_plan: ['knowledge'],
      confidence: 0.7,
    }));
    const { engine, documents } = createHarness({ classifier });
    jest.spyOn(documents, 'search').mockRejectedValue(new Error('index offline'));

    const result = interrupted(await engine.start(inbound()));

    expect(result.state.errors).toEqual([
      {
        stage: 'knowledge',
        kind: 'external_service',
        message: 'document search failed: index offline',
        epoch: 0,
        at: '2026-03-02T08:00:00.000Z',
      },
    ]);
    expect(result.state.draft_output).toBe(
      [
        'Hello,',
        'Thank you for your message about: Question about the product',
        'I ran into a problem with the following and will follow up separately:\n- looking up the information you asked for',
        'Best regards,\nInbox Assistant',
      ].join('\n\n'),
    );
  });

  it('rejects a review that times out', async () => {
    const clock = new ManualClock('2026-03-02T08:00:00.000Z');
    const { engine, mail } = createHarness({ clock });
    const started = interrupted(await engine.start(inbound()));

    expect(await engine.expireOverdue(new Date('2026-03-03T07:59:59.000Z'))).toEqual([]);

    clock.advance(24 * 60 * 60 * 1000);
    const [expired] = await engine.expireOverdue();
    expect(expired.kind).toBe('finished');
    expect(expired.status).toBe('rejected');
    expect(expired.state.decision).toBe('no_response');
    expect(expired.state.errors.map((e) => `${e.stage}:${e.kind}`)).toEqual(['review:timeout']);
    expect(mail.sent).toEqual([]);
    expect(await engine.listPending()).toEqual([]);
    expect((await engine.get(started.conversation_id)).status).toBe('rejected');
  });

  it('treats an accept after the deadline as no answer', async () => {
    const clock = new ManualClock('2026-03-02T08:00:00.000Z');
    const notifier = new RecordingNotifier();
    const { engine, mail } = createHarness({ clock, notifier });
    const started = interrupted(await engine.start(inbound()));

    clock.advance(25 * HOUR);
    const late = await engine.resume(started.conversation_id, { type: 'accept' });

    expect(late.kind).toBe('finished');
    expect(late.status).toBe('rejected');
    expect(late.state.decision).toBe('no_response');
    expect(late.state.errors.map((e) => e.message)).toEqual(['review deadline passed without a response']);
    expect(mail.sent).toEqual([]);
    expect(notifier.resolved).toEqual(['no_response']);
  });

  it('books nothing when the booking approval arrives late', async () => {
    const clock = new ManualClock('2026-03-02T08:00:00.000Z');
    const { engine, calendar } = createHarness({ classifier: meetingClassifier(), clock });
    const booking = interrupted(await engine.start(inbound({ subject: 'Intro call' })));

    clock.advance(6 * 60 * 1000);
    const review = interrupted(await engine.resume(booking.conversation_id, { type: 'accept' }));

    expect(review.interrupt.node).toBe('review');
    expect(review.state.task_data.scheduling?.outcome).toBe('declined');
    expect(calendar.all()).toEqual([]);
  });

  it('leaves the next epoch review alone when the sweep works from a stale listing', async () => {
    const clock = new ManualClock('2026-03-02T08:00:00.000Z');
    const { engine, checkpoints } = createHarness({ clock });
    const started = interrupted(await engine.start(inbound()));
    const staleListing = await checkpoints.listActive();

    clock.advance(23 * HOUR);
    const revised = interrupted(
      await engine.resume(started.conversation_id, { type: 'response', args: 'please shorten the wording' }),
    );
    expect(revised.state.epoch).toBe(1);

    clock.advance(2 * HOUR);
    jest.spyOn(checkpoints, 'listActive').mockResolvedValueOnce(staleListing);
    expect(await engine.expireOverdue()).toEqual([]);

    const current = await engine.get(started.conversation_id);
    expect(current.status).toBe('awaiting_review');
    expect(current.interrupt?.interrupt_id).toBe(revised.interrupt.interrupt_id);
  });

  it('lets a reviewer answer win over a sweep queued behind it', async () => {
    const clock = new ManualClock('2026-03-02T08:00:00.000Z');
    const { engine } = createHarness({ clock });
    const started = interrupted(await engine.start(inbound()));
    clock.advance(23 * HOUR);

    const [answered, swept] = await Promise.all([
      engine.resume(started.conversation_id, { type: 'response', args: 'please shorten the wording' }),
      engine.expireOverdue(new Date('2026-03-03T09:00:00.000Z')),
    ]);

    expect(answered.kind).toBe('interrupted');
    expect(answered.status).toBe('awaiting_review');
    expect(answered.state.epoch).toBe(1);
    expect(swept).toEqual([]);
    expect((await engine.get(started.conversation_id)).status).toBe('awaiting_review');
  });

  it('routes a malformed message to a reviewer who can only dismiss it', async () => {
    const { engine, classifier } = createHarness();
    const started = interrupted(await engine.start({ from: 'not-an-email' }));

    expect(started.status).toBe('error');
    expect(started.state.request).toBeNull();
    expect(started.state.errors[0].stage).toBe('intake');
    expect(started.state.errors[0].message.startsWith('inbound message failed validation')).toBe(true);
    expect(started.state.draft_output?.startsWith('The inbound message could not be processed and no reply was drafted.')).toBe(true);
    expect(started.interrupt.request.allow_accept).toBe(false);
    expect(classifier.calls).toEqual([]);

    await expect(engine.resume(started.conversation_id, { type: 'accept' })).rejects.toThrow(
      "Response type 'accept' is not allowed for action 'Review: unreadable inbound message'",
    );

    const dismissed = await engine.resume(started.conversation_id, { type: 'ignore' });
    expect(dismissed.status).toBe('rejected');
  });

  it('ends in error when the transport fails', async () => {
    const { engine, mail } = createHarness();
    mail.failure = new Error('smtp down');
    const started = interrupted(await engine.start(inbound()));

    const result = await engine.resume(started.conversation_id, { type: 'accept' });
    expect(result.kind).toBe('finished');
    expect(result.status).toBe('error');
    expect(result.state.errors[result.state.errors.length - 1].message).toBe('smtp down');
  });
});

describe('exactly-once delivery', () => {
  it('ignores a second resume of the same interrupt', async () => {
    const { engine, mail } = createHarness();
    const started = interrupted(await engine.start(inbound()));

    const [first, second] = await Promise.all([
      engine.resume(started.conversation_id, { type: 'accept' }),
      engine.resume(started.conversation_id, { type: 'accept' }),
    ]);

    expect(first.kind).toBe('finished');
    expect(second.kind).toBe('already_resolved');
    expect(mail.sent).toHaveLength(1);
  });

  it('replays a restored snapshot without sending again', async () => {
    const { engine, mail, checkpoints } = createHarness();
    const started = interrupted(await engine.start(inbound()));
    await engine.resume(started.conversation_id, { type: 'accept' });

    // A stale copy of the suspended run comes back, as after a crash before the archive write
    await checkpoints.save(started.state);
    const replayed = await engine.resume(started.conversation_id, { type: 'accept' });

    expect(replayed.status).toBe('completed');
    expect(replayed.state.delivery?.replayed).toBe(true);
    expect(replayed.state.delivery?.message_id).toBe('msg-1');
    expect(mail.sent).toHaveLength(1);
  });

  it('refuses answers the interrupt does not allow and unknown conversations', async () => {
    const { engine } = createHarness({ classifier: meetingClassifier() });
    const booking = interrupted(await engine.start(inbound({ subject: 'Intro call' })));

    await expect(engine.resume(booking.conversation_id, { type: 'edit', args: 'x' })).rejects.toBeInstanceOf(ValidationError);
    await expect(engine.resume('missing', { type: 'accept' })).rejects.toBeInstanceOf(NotFoundError);
    expect((await engine.listPending()).map((p) => p.interrupt.node)).toEqual(['book_review']);
  });
});

/**
 * Conversation orchestration service
 * Drives one conversation through the graph, from intake to send or rejection
 */

import { v4 as uuidv4 } from 'uuid';
import {
  InboundMessageSchema,
  type ConversationState,
  type ConversationStatus,
  type GraphNode,
  type HumanResponse,
  type InterruptNode,
  type PendingInterrupt,
} from '../contracts/index.js';
import { FatalError, NotFoundError, ValidationError, formatZodIssues, toStageError } from '../errors/index.js';
import { schedulingStage } from '../booking/workflow.js';
import { moduleLogger } from '../logging/logger.js';
import { silentNotifier, type InterruptNotifier } from '../messaging/reviewerFeed.js';
import { composerStage } from '../stages/composer.js';
import { contactStage } from '../stages/contacts.js';
import { knowledgeStage } from '../stages/knowledge.js';
import { parserStage } from '../stages/parser.js';
import { reviewStage } from '../stages/review.js';
import { sendStage } from '../stages/send.js';
import { applyUpdate, combineUpdates, initialState } from '../state/store.js';
import { assertTransition } from '../state/transitions.js';
import {
  DEFAULT_SETTINGS,
  type EngineDeps,
  type EngineSettings,
  type NodeResult,
  type ResumableStage,
  type Stage,
  type StageContext,
  type StageName,
} from './context.js';
import { isExpired, resolveHumanResponse } from './interrupts.js';
import { routeNext } from './router.js';
import { assertEdge, isTerminalNode, ownerOf } from './stateMachine.js';

const log = moduleLogger('engine');
const stageLog = moduleLogger('stage');

// Upper bound on nodes executed in one run; the router's visit cap keeps real runs far below it
const MAX_STEPS = 64;

export type RunResult =
  | { kind: 'interrupted'; conversation_id: string; status: ConversationStatus; interrupt: PendingInterrupt; state: ConversationState }
  | { kind: 'finished'; conversation_id: string; status: ConversationStatus; state: ConversationState }
  | { kind: 'already_resolved'; conversation_id: string; status: ConversationStatus; state: ConversationState };

export interface PendingReview {
  conversation_id: string;
  status: ConversationStatus;
  interrupt: PendingInterrupt;
}

const STAGES: Record<StageName, Stage> = {
  parse: parserStage,
  scheduling: schedulingStage,
  knowledge: knowledgeStage,
  contact: contactStage,
  compose: composerStage,
  review: reviewStage,
  send: sendStage,
};

const RESUMABLE: Record<InterruptNode, ResumableStage> = {
  review: reviewStage,
  book_review: schedulingStage,
};

export class Orchestrator {
  private readonly settings: EngineSettings;
  private readonly notifier: InterruptNotifier;
  private readonly clock: () => Date;
  private readonly locks = new Map<string, Promise<void>>();

  constructor(private readonly deps: EngineDeps) {
    this.settings = { ...DEFAULT_SETTINGS, ...deps.settings };
    this.notifier = deps.notifier ?? silentNotifier;
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Accept an inbound message and run until the first interrupt or the end.
   * A malformed message still opens a conversation so the reviewer sees the problem.
   */
  async start(input: unknown): Promise<RunResult> {
    const now = this.clock();
    const conversationId = uuidv4();
    const parsed = InboundMessageSchema.safeParse(input);
    const base = initialState(conversationId, now);

    const state = parsed.success
      ? applyUpdate(base, {
          request: parsed.data,
          messages: [{ node: 'intake', text: `received ${parsed.data.message_id}`, at: now.toISOString() }],
        })
      : applyUpdate(base, {
          errors: [
            toStageError(
              'intake',
              new ValidationError('inbound message failed validation', formatZodIssues(parsed.error)),
              0,
              now,
            ),
          ],
        });

    log.info({ msg: 'conversation_started', conversation_id: conversationId, valid_request: parsed.success });
    await this.deps.checkpoints.save(state);
    return this.withLock(conversationId, () => this.run(state));
  }

  /**
   * Continue a suspended conversation with the reviewer's answer.
   * An answer arriving after the deadline counts as no answer.
   */
  async resume(conversationId: string, response: HumanResponse): Promise<RunResult> {
    return this.withLock(conversationId, async (): Promise<RunResult> => {
      const state = await this.load(conversationId);
      const interrupt = state.interrupt;
      if (interrupt === null) {
        log.info({ msg: 'resume_without_interrupt', conversation_id: conversationId, status: state.status });
        return { kind: 'already_resolved', conversation_id: conversationId, status: state.status, state };
      }

      const now = this.clock();
      if (isExpired(interrupt, now)) {
        log.warn({
          msg: 'late_response_ignored',
          conversation_id: conversationId,
          interrupt_id: interrupt.interrupt_id,
          response: response.type,
          deadline: interrupt.deadline,
        });
        return this.settle(state, interrupt, null, now);
      }
      return this.settle(state, interrupt, response, now);
    });
  }

  /**
   * Resolve every interrupt whose deadline has passed as a missing response.
   * Each candidate is re-read under the conversation lock and skipped unless
   * the same interrupt is still pending and still overdue.
   */
  async expireOverdue(now: Date = this.clock()): Promise<RunResult[]> {
    const results: RunResult[] = [];
    for (const candidate of await this.deps.checkpoints.listActive()) {
      const seen = candidate.interrupt;
      if (seen === null || !isExpired(seen, now)) continue;
      const conversationId = candidate.conversation_id;

      try {
        const result = await this.withLock(conversationId, async (): Promise<RunResult | null> => {
          const state = await this.load(conversationId);
          const interrupt = state.interrupt;
          if (interrupt === null || interrupt.interrupt_id !== seen.interrupt_id || !isExpired(interrupt, now)) {
            log.info({ msg: 'expire_skipped', conversation_id: conversationId, interrupt_id: seen.interrupt_id });
            return null;
          }
          return this.settle(state, interrupt, null, now);
        });
        if (result !== null) results.push(result);
      } catch (error) {
        log.error({ msg: 'expire_failed', conversation_id: conversationId, err: error });
      }
    }
    return results;
  }

  async get(conversationId: string): Promise<ConversationState> {
    return this.load(conversationId);
  }

  async listPending(): Promise<PendingReview[]> {
    const active = await this.deps.checkpoints.listActive();
    const pending: PendingReview[] = [];
    for (const state of active) {
      if (state.interrupt) {
        pending.push({ conversation_id: state.conversation_id, status: state.status, interrupt: state.interrupt });
      }
    }
    return pending;
  }

  /**
   * Apply a reviewer's answer, or its absence, to the pending interrupt and
   * continue the run. Callers hold the conversation lock.
   */
  private async settle(
    state: ConversationState,
    interrupt: PendingInterrupt,
    response: HumanResponse | null,
    now: Date,
  ): Promise<RunResult> {
    const conversationId = state.conversation_id;
    const resolution = resolveHumanResponse(interrupt.request, response);
    if (!resolution.ok) {
      throw resolution.error;
    }

    const owner = ownerOf(interrupt.node);
    const result = await RESUMABLE[interrupt.node].resume(state, resolution.value, this.context(now));
    const next = this.commit(state, owner, result, now);
    await this.deps.checkpoints.save(next);

    log.info({
      msg: 'interrupt_resolved',
      conversation_id: conversationId,
      interrupt_id: interrupt.interrupt_id,
      node: interrupt.node,
      decision: resolution.value.decision,
    });
    this.notifier.interruptResolved({
      conversation_id: conversationId,
      interrupt_id: interrupt.interrupt_id,
      decision: resolution.value.decision,
    });

    if (result.kind === 'suspend') {
      return this.suspended(next, result.interrupt);
    }
    return this.run(next);
  }

  private async run(initial: ConversationState): Promise<RunResult> {
    let state = initial;

    for (let step = 0; step < MAX_STEPS; step++) {
      if (isTerminalNode(state.cursor)) {
        await this.deps.checkpoints.archive(state);
        log.info({ msg: 'conversation_finished', conversation_id: state.conversation_id, status: state.status, epoch: state.epoch });
        return { kind: 'finished', conversation_id: state.conversation_id, status: state.status, state };
      }

      const now = this.clock();
      const node = state.cursor;
      const result = await this.execute(node, state, this.context(now));
      state = this.commit(state, node, result, now);
      await this.deps.checkpoints.save(state);

      if (result.kind === 'suspend') {
        return this.suspended(state, result.interrupt);
      }
    }

    throw new FatalError(`Conversation ${initial.conversation_id} exceeded ${MAX_STEPS} steps`);
  }

  private suspended(state: ConversationState, interrupt: PendingInterrupt): RunResult {
    log.info({
      msg: 'interrupt_raised',
      conversation_id: state.conversation_id,
      node: interrupt.node,
      action: interrupt.request.action,
      deadline: interrupt.deadline,
    });
    this.notifier.interruptRaised(interrupt);
    return { kind: 'interrupted', conversation_id: state.conversation_id, status: state.status, interrupt, state };
  }

  private async execute(node: GraphNode, state: ConversationState, ctx: StageContext): Promise<NodeResult> {
    if (node === 'route') {
      return routeNext(state, ctx);
    }
    if (node === 'end') {
      throw new FatalError('end node has no behaviour');
    }
    return STAGES[node].execute(state, ctx);
  }

  /**
   * Merge a node's update and move the cursor. An illegal edge or status change throws
   * before anything is persisted.
   */
  private commit(state: ConversationState, from: GraphNode, result: NodeResult, now: Date): ConversationState {
    const cursor = result.kind === 'continue' ? result.next : from;
    if (result.kind === 'continue') {
      assertEdge(from, cursor);
    }

    const next = applyUpdate(state, combineUpdates(result.update, { cursor, updated_at: now.toISOString() }));
    assertTransition(state.status, next.status);
    return next;
  }

  private context(now: Date): StageContext {
    return {
      classifier: this.deps.classifier,
      calendar: this.deps.calendar,
      mail: this.deps.mail,
      contacts: this.deps.contacts,
      documents: this.deps.documents,
      ledger: this.deps.ledger,
      settings: this.settings,
      now,
      log: stageLog,
    };
  }

  private async load(conversationId: string): Promise<ConversationState> {
    const state = await this.deps.checkpoints.load(conversationId);
    if (!state) {
      throw new NotFoundError(`Conversation ${conversationId} not found`);
    }
    return state;
  }

  /**
   * Serialise calls for one conversation inside this process.
   */
  private async withLock<T>(conversationId: string, task: () => Promise<T>): Promise<T> {
    const previous = this.locks.get(conversationId) ?? Promise.resolve();
    const run = previous.then(task);
    const tail = run.then(
      () => undefined,
      () => undefined,
    );
    this.locks.set(conversationId, tail);
    try {
      return await run;
    } finally {
      if (this.locks.get(conversationId) === tail) {
        this.locks.delete(conversationId);
      }
    }
  }
}


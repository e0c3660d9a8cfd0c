import {
  FeedbackClassificationSchema,
  StageRoutingSchema,
  type ConversationState,
  type FeedbackClassification,
  type FeedbackDecision,
  type FeedbackDomain,
  type RoutedStage,
  type RoutingPlan,
  type StageKind,
} from '../contracts/index.js';
import { attempt, parseExternal, toStageError, type Result } from '../errors/index.js';
import type { StateUpdate } from '../state/store.js';
import { applyUpdate, combineUpdates } from '../state/store.js';
import { clearedBundle, counter, isStageComplete, routeVisitsKey, stageRunsKey } from '../state/selectors.js';
import { continueTo, type NodeResult, type StageContext } from './context.js';
import { nodeForStage } from './stateMachine.js';

export interface RouteDecision {
  next: RoutedStage;
  rationale: string;
  confidence: number;
}

const STAGE_ROUTING_PROMPT = [
  'Decide which specialist stages must run before a reply can be written.',
  'Stages: scheduling (meetings and calendar), knowledge (answers from documents), contact (people and addresses).',
  'Return JSON {execution_plan: string[], tasks: {stage: instruction}, rationale, confidence}. compose always runs last.',
].join('\n');

const FEEDBACK_ROUTING_PROMPT = [
  'Classify reviewer feedback on a draft reply.',
  'domain: scheduling | contact | information | response-only (wording changes only).',
  'decisions: any of approved | rejected | modified | unclear.',
  'Return JSON {decisions, domain, instructions, confidence}.',
].join('\n');

const DOMAIN_TO_STAGE: Record<FeedbackDomain, StageKind | null> = {
  scheduling: 'scheduling',
  contact: 'contact',
  information: 'knowledge',
  'response-only': null,
};

/**
 * Modification wins over approval when the classifier reports both;
 * approval alone means only the wording needs another pass.
 */
export function resolveFeedbackDomain(classification: FeedbackClassification): FeedbackDomain {
  const decisions = new Set<FeedbackDecision>(classification.decisions);
  if (decisions.has('modified') || decisions.has('unclear')) {
    return classification.domain;
  }
  return 'response-only';
}

export function stageForDomain(domain: FeedbackDomain): StageKind | null {
  return DOMAIN_TO_STAGE[domain];
}

function withCompose(stages: RoutedStage[]): RoutedStage[] {
  const unique = stages.filter((stage, index) => stage !== 'compose' && stages.indexOf(stage) === index);
  return [...unique, 'compose'];
}

function fallbackPlan(epoch: number, previous: RoutingPlan | null, rationale: string): RoutingPlan {
  return {
    epoch,
    stages: previous?.stages ?? ['compose'],
    tasks: previous?.tasks ?? {},
    // Everything is treated as done so the next visit goes straight to compose
    completed: (previous?.stages ?? []).filter((stage) => stage !== 'compose'),
    current_index: previous?.stages.length ?? 0,
    rationale,
    confidence: 0,
    source: 'fallback',
  };
}

function routeTo(state: ConversationState, decision: RouteDecision, update: StateUpdate, ctx: StageContext): NodeResult {
  const at = ctx.now.toISOString();
  const bookkeeping: StateUpdate = {
    messages: [{ node: 'route', text: `-> ${decision.next}: ${decision.rationale}`, at }],
  };
  if (decision.next !== 'compose') {
    bookkeeping.counters = { [stageRunsKey(decision.next)]: counter(state, stageRunsKey(decision.next)) + 1 };
  }

  ctx.log.info({
    msg: 'route_decision',
    conversation_id: state.conversation_id,
    epoch: state.epoch,
    next: decision.next,
    confidence: decision.confidence,
    rationale: decision.rationale,
  });

  return continueTo(nodeForStage(decision.next), combineUpdates(update, bookkeeping));
}

async function classify<T>(
  ctx: StageContext,
  task: 'stage_routing' | 'feedback_routing',
  prompt: string,
  context: Record<string, unknown>,
  parse: (raw: unknown) => Result<T>,
): Promise<Result<T>> {
  const raw = await attempt(task, () => ctx.classifier.classify({ task, prompt, context }));
  return raw.ok ? parse(raw.value) : raw;
}

/**
 * Apply classified feedback: a new plan for this epoch that keeps every
 * completed stage except the one the feedback targets.
 */
async function absorbFeedback(state: ConversationState, ctx: StageContext): Promise<{ update: StateUpdate; fallback: string | null }> {
  const feedback = state.pending_feedback ?? '';
  const previous = state.routing_plan;
  const result = await classify(
    ctx,
    'feedback_routing',
    FEEDBACK_ROUTING_PROMPT,
    {
      feedback,
      summary: state.extracted_context?.summary ?? '',
      completed_stages: previous?.completed ?? [],
    },
    (raw) => parseExternal(FeedbackClassificationSchema, raw, 'feedback_routing'),
  );

  if (!result.ok) {
    return {
      fallback: 'feedback classification failed',
      update: {
        pending_feedback: null,
        errors: [toStageError('route', result.error, state.epoch, ctx.now)],
        routing_plan: fallbackPlan(state.epoch, previous, 'feedback classification failed'),
      },
    };
  }

  const domain = resolveFeedbackDomain(result.value);
  const target = stageForDomain(domain);
  const baseStages: RoutedStage[] = previous?.stages ?? ['compose'];
  const stages = target && !baseStages.includes(target) ? withCompose([...baseStages, target]) : withCompose(baseStages);
  const completed = (previous?.completed ?? []).filter((stage) => stage !== target && stage !== 'compose');
  const tasks = { ...(previous?.tasks ?? {}) };
  if (target && result.value.instructions) {
    tasks[target] = result.value.instructions;
  }

  const plan: RoutingPlan = {
    epoch: state.epoch,
    stages,
    tasks,
    completed,
    current_index: completed.length,
    rationale: `feedback targets ${domain}`,
    confidence: result.value.confidence,
    source: 'feedback',
  };

  ctx.log.info({
    msg: 'feedback_classified',
    conversation_id: state.conversation_id,
    epoch: state.epoch,
    domain,
    decisions: result.value.decisions,
    cleared: target,
  });

  const update: StateUpdate = {
    pending_feedback: null,
    routing_plan: plan,
    insights: [`epoch ${state.epoch} feedback targets ${domain}`],
  };
  if (target) {
    update.task_data = clearedBundle(target, state.epoch, tasks[target] ?? '', ctx.now);
  }
  return { update, fallback: null };
}

async function buildPlan(state: ConversationState, ctx: StageContext): Promise<{ update: StateUpdate; fallback: string | null }> {
  const context = state.extracted_context;
  const result = await classify(
    ctx,
    'stage_routing',
    STAGE_ROUTING_PROMPT,
    {
      summary: context?.summary ?? '',
      requested_actions: context?.requested_actions ?? [],
      entities: context?.entities ?? [],
      dates: context?.dates ?? [],
      urgency: context?.urgency ?? 'normal',
    },
    (raw) => parseExternal(StageRoutingSchema, raw, 'stage_routing'),
  );

  if (!result.ok) {
    return {
      fallback: 'stage classification failed',
      update: {
        errors: [toStageError('route', result.error, state.epoch, ctx.now)],
        routing_plan: fallbackPlan(state.epoch, null, 'stage classification failed'),
      },
    };
  }

  const plan: RoutingPlan = {
    epoch: state.epoch,
    stages: withCompose(result.value.execution_plan),
    tasks: result.value.tasks,
    completed: [],
    current_index: 0,
    rationale: result.value.rationale,
    confidence: result.value.confidence,
    source: 'classifier',
  };
  return { update: { routing_plan: plan }, fallback: null };
}

/**
 * Supervisor node: picks the next stage or compose.
 */
export async function routeNext(state: ConversationState, ctx: StageContext): Promise<NodeResult> {
  const visitsKey = routeVisitsKey(state.epoch);
  const visits = counter(state, visitsKey) + 1;
  let update: StateUpdate = { counters: { [visitsKey]: visits } };

  if (visits > ctx.settings.maxRouteVisits) {
    ctx.log.warn({ msg: 'route_visit_limit', conversation_id: state.conversation_id, epoch: state.epoch, visits });
    return routeTo(state, { next: 'compose', rationale: 'route visit limit reached', confidence: 1 }, update, ctx);
  }

  if (state.request === null || state.extracted_context === null) {
    return routeTo(state, { next: 'compose', rationale: 'request or parsed context missing', confidence: 1 }, update, ctx);
  }

  if (state.pending_feedback !== null) {
    const absorbed = await absorbFeedback(state, ctx);
    update = combineUpdates(update, absorbed.update);
    if (absorbed.fallback) {
      return routeTo(state, { next: 'compose', rationale: absorbed.fallback, confidence: 0 }, update, ctx);
    }
  } else if (state.routing_plan === null || state.routing_plan.epoch < state.epoch) {
    const built = await buildPlan(state, ctx);
    update = combineUpdates(update, built.update);
    if (built.fallback) {
      return routeTo(state, { next: 'compose', rationale: built.fallback, confidence: 0 }, update, ctx);
    }
  }

  // Evaluate against the plan and markers as they stand after this visit's changes
  const view = applyUpdate(state, update);
  const plan = view.routing_plan;
  if (plan === null) {
    return routeTo(state, { next: 'compose', rationale: 'no routing plan', confidence: 0 }, update, ctx);
  }

  const index = plan.stages.findIndex((stage) => !plan.completed.includes(stage));
  const candidate = index === -1 ? 'compose' : plan.stages[index];

  if (candidate === 'compose') {
    return routeTo(state, { next: 'compose', rationale: 'all planned stages complete', confidence: plan.confidence }, update, ctx);
  }

  const dispatched: RoutingPlan = {
    ...plan,
    completed: [...plan.completed, candidate],
    current_index: Math.max(plan.current_index, index + 1),
  };
  update = combineUpdates(update, { routing_plan: dispatched });

  if (isStageComplete(view, candidate)) {
    ctx.log.warn({
      msg: 'routing_override',
      conversation_id: state.conversation_id,
      epoch: state.epoch,
      stage: candidate,
      rationale: `${candidate} already reported completion`,
    });
    return routeTo(
      state,
      { next: 'compose', rationale: `override: ${candidate} already complete`, confidence: 1 },
      combineUpdates(update, { insights: [`routing override on ${candidate} in epoch ${state.epoch}`] }),
      ctx,
    );
  }

  return routeTo(state, { next: candidate, rationale: plan.tasks[candidate] || plan.rationale, confidence: plan.confidence }, update, ctx);
}

/**
 * Dialogue Manager - runs one caller turn through the right stage graph.
 *
 * `processTurn` only decides: response text, next stage, updated facts and
 * a side-effect descriptor. `handleTurn` is the orchestrating layer that
 * carries out the owner notifications and writes the end-of-call summary.
 */

import {
  isDeliveryStage,
  isStageOf,
  isUnknownStage,
  NO_ACTION,
  type CallerRole,
  type Facts,
  type Stage,
} from '@shared/schema';
import { summarize } from '../services/callSummary';
import type { NotificationDispatcher, NotificationKind } from '../services/notifications';
import { formatUrgentMessage } from '../services/notifications';
import { say } from '../utils/say';
import { isUrgent } from '../utils/speech-helpers';
import { handleDeliveryTurn } from './deliveryFlow';
import { classifyIntent, describeIntent, identifyCallerRole, type IntentType } from './intentRouter';
import { handleUnknownTurn } from './unknownCallerFlow';
import type { FlowDeps, StageContext, StepResult, TurnInput, TurnResult } from './turnTypes';

type KnownRole = Exclude<CallerRole, 'undetermined'>;

/**
 * Settle who is calling and where in their graph we are. A stage that only
 * one graph has decides the role; otherwise the utterance does.
 */
function resolvePosition(input: TurnInput): { role: KnownRole; stage: Stage } {
  const { callerRole, stage, utterance } = input;

  if (callerRole !== 'undetermined') {
    if (isStageOf(callerRole, stage)) return { role: callerRole, stage };
    console.warn(`[DialogueManager] Stage "${stage}" is not part of the ${callerRole} graph, restarting`);
    return { role: callerRole, stage: 'start' };
  }

  const delivery = isDeliveryStage(stage);
  const unknown = isUnknownStage(stage);
  if (delivery && !unknown) return { role: 'delivery', stage };
  if (unknown && !delivery) return { role: 'unknown', stage };
  return { role: identifyCallerRole(utterance), stage: stage === 'end_of_call' ? stage : 'start' };
}

function urgentStep(ctx: StageContext): StepResult<Stage> {
  const message = `Urgent call from ${ctx.facts.name || 'an unknown caller'}.`;
  console.log(`[DialogueManager] Urgent override: ${message}`);
  return {
    responseText: say(ctx.language, 'urgent'),
    nextStage: 'end_of_call',
    facts: ctx.facts,
    action: { type: 'urgent_notification', message },
    endCall: true,
  };
}

// Counter for the stage we stay on; cleared once the call moves on
function trackAttempts(facts: Facts, stage: Stage, step: StepResult<Stage>): Facts {
  if (step.nextStage === stage) {
    if (!step.retry) return facts;
    const spent = facts.stageAttempts?.[stage] ?? 0;
    return { ...facts, stageAttempts: { [stage]: spent + 1 } };
  }
  return facts.stageAttempts ? { ...facts, stageAttempts: {} } : facts;
}

async function runGraph(
  role: KnownRole,
  stage: Stage,
  ctx: StageContext
): Promise<{ role: KnownRole; step: StepResult<Stage> }> {
  if (role === 'delivery' && isDeliveryStage(stage)) {
    const outcome = await handleDeliveryTurn(stage, ctx);
    if (!('handoff' in outcome)) return { role, step: outcome };
    return { role: 'unknown', step: await handleUnknownTurn('start', { ...ctx, attempts: 0 }) };
  }
  if (isUnknownStage(stage)) {
    return { role: 'unknown', step: await handleUnknownTurn(stage, ctx) };
  }
  return { role: 'unknown', step: await handleUnknownTurn('start', { ...ctx, attempts: 0 }) };
}

/**
 * Decide one turn. Given the same input and collaborators that answer the
 * same way, the next stage and action are always the same; the ledger is
 * the only state kept between calls.
 */
export async function processTurn(input: TurnInput, deps: FlowDeps): Promise<TurnResult> {
  const utterance = input.utterance.trim();
  const intent: IntentType = classifyIntent(utterance);
  const position = resolvePosition({ ...input, utterance });

  console.log(
    `[DialogueManager] ${position.role}/${position.stage} "${utterance}" -> ${intent} (${describeIntent(intent)})`
  );

  const ctx: StageContext = {
    utterance,
    intent,
    facts: input.facts,
    language: input.language,
    callerId: input.callerId,
    attempts: input.facts.stageAttempts?.[position.stage] ?? 0,
    deps,
  };

  let role = position.role;
  let step: StepResult<Stage>;

  // Urgency overrides every stage; goodbyes are left to the graphs
  if (isUrgent(utterance)) {
    step = urgentStep(ctx);
  } else {
    ({ role, step } = await runGraph(role, position.stage, ctx));
  }

  const facts = trackAttempts(step.facts, position.stage, step);
  const endCall = step.endCall ?? step.nextStage === 'end_of_call';

  console.log(`[DialogueManager] -> ${step.nextStage}${step.action ? ` (${step.action.type})` : ''}`);

  return {
    responseText: step.responseText,
    nextStage: step.nextStage,
    facts,
    action: step.action ?? NO_ACTION,
    history: [
      ...input.history,
      { role: 'user', content: utterance },
      { role: 'assistant', content: step.responseText },
    ],
    callerRole: role,
    intent,
    endCall,
    requiresSms: step.requiresSms ?? false,
    companyRequested: step.companyRequested,
    ownerNotification: step.ownerNotification,
  };
}

export interface Orchestration {
  notifier: NotificationDispatcher;
  ownerPhone: string;
}

async function notifyOwner(orchestration: Orchestration, message: string, kind: NotificationKind): Promise<boolean> {
  if (!orchestration.ownerPhone) {
    console.warn('[DialogueManager] Owner phone number not configured, notification skipped');
    return false;
  }
  try {
    return await orchestration.notifier.notify(orchestration.ownerPhone, message, kind);
  } catch (error) {
    console.error('[DialogueManager] Notification failed:', error);
    return false;
  }
}

/**
 * Decide the turn, then carry out what it asked for: urgent and
 * unknown-caller notifications to the owner, and a summary once the call
 * is over. SMS fetching is left to the caller of `/generate`.
 */
export async function handleTurn(input: TurnInput, deps: FlowDeps & Orchestration): Promise<TurnResult> {
  const result = await processTurn(input, deps);

  if (result.action.type === 'urgent_notification') {
    await notifyOwner(deps, formatUrgentMessage(result.action.message), 'urgent_call');
  }
  if (result.ownerNotification) {
    await notifyOwner(deps, result.ownerNotification, 'caller_message');
  }
  if (result.nextStage === 'end_of_call') {
    return { ...result, summary: await summarize(result.history, result.facts, deps.languageModel) };
  }
  return result;
}

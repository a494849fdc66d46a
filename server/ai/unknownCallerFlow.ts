/**
 * Unknown-caller graph - take a message for the owner.
 *
 * start -> asking_name -> asking_purpose -> [asking_followup ->
 * [asking_second_followup]] -> collecting_contact -> end_of_call
 */

import type { Facts, UnknownStage } from '@shared/schema';
import { formatUnknownCallerMessage } from '../services/notifications';
import { formatDigitsForSpeech } from '../utils/phone';
import { say, type TemplateKey, type TemplateVars } from '../utils/say';
import { titleCase } from '../utils/text';
import { planFollowup } from './followupPlanner';
import { extractFacts, mergeFacts } from './informationExtractor';
import { isLastAttempt, type StageContext, type StepResult } from './turnTypes';

type Step = StepResult<UnknownStage>;

const NOT_A_NAME = new Set(['yes', 'no', 'hello', 'hi']);
const CALLER_NUMBER_PLACEHOLDER = "Caller's Number";

function reply(
  ctx: StageContext,
  nextStage: UnknownStage,
  key: TemplateKey,
  vars: TemplateVars = {},
  facts: Facts = ctx.facts,
  extra: Partial<Step> = {}
): Step {
  return { responseText: say(ctx.language, key, vars), nextStage, facts, ...extra };
}

function spokenPhone(phone: string): string {
  return formatDigitsForSpeech(phone) || phone;
}

/**
 * End the call, and tell the owner who called when we learned anything.
 */
export function finishUnknownCall(ctx: StageContext, facts: Facts, key: TemplateKey, vars: TemplateVars = {}): Step {
  const ownerNotification = facts.name || facts.purpose ? formatUnknownCallerMessage(facts) : undefined;
  return reply(ctx, 'end_of_call', key, vars, facts, { endCall: true, ownerNotification });
}

function toContact(ctx: StageContext, facts: Facts, askKey: TemplateKey): Step {
  if (facts.phone) {
    return finishUnknownCall(ctx, facts, 'have_number', { phone: spokenPhone(facts.phone) });
  }
  return reply(ctx, 'collecting_contact', askKey, {}, facts);
}

function withDetail(facts: Facts, detail: string): Facts {
  return { ...facts, additionalDetails: [...(facts.additionalDetails ?? []), detail] };
}

// The whole reply as a name: short, has letters, not a yes/no or greeting
function replyAsName(utterance: string): string | undefined {
  const candidate = utterance.trim().replace(/[.!?,]+$/, '');
  if (!candidate || candidate.length > 20 || !/\p{L}/u.test(candidate)) return undefined;
  if (NOT_A_NAME.has(candidate.toLowerCase())) return undefined;
  return titleCase(candidate);
}

async function askPurpose(ctx: StageContext, facts: Facts): Promise<Step> {
  const purpose = facts.purpose || ctx.utterance;
  let next: Facts = { ...facts, purpose };

  if (!next.followupAsked) {
    const plan = await planFollowup(purpose, next.name, ctx.deps.languageModel);
    next = { ...next, followupAsked: true, followupPlan: plan };

    if (plan.needsFollowup && plan.firstQuestion) {
      return { responseText: plan.firstQuestion, nextStage: 'asking_followup', facts: next };
    }
  }
  return toContact(ctx, next, 'ask_callback');
}

/**
 * One unknown-caller turn. Urgent calls are handled before this.
 */
export async function handleUnknownTurn(stage: UnknownStage, ctx: StageContext): Promise<Step> {
  if (stage === 'start') {
    return reply(ctx, 'asking_name', 'collect_name');
  }
  if (stage === 'end_of_call') {
    return finishUnknownCall(ctx, ctx.facts, 'unknown_goodbye');
  }

  if (stage === 'collecting_contact' && ctx.intent === 'provide_self_number') {
    const facts = { ...ctx.facts, phone: ctx.callerId || CALLER_NUMBER_PLACEHOLDER };
    return finishUnknownCall(ctx, facts, 'self_number');
  }

  const facts = mergeFacts(ctx.facts, await extractFacts(ctx.utterance, ctx.facts, ctx.deps.languageModel));

  switch (stage) {
    case 'asking_name': {
      const name = facts.name ?? (ctx.intent === 'ending_conversation' ? undefined : replyAsName(ctx.utterance));
      if (name) {
        return reply(ctx, 'asking_purpose', 'name_ack', { name }, { ...facts, name });
      }
      if (ctx.intent === 'ending_conversation') {
        return finishUnknownCall(ctx, facts, 'unknown_goodbye');
      }
      if (isLastAttempt(ctx)) {
        return reply(ctx, 'asking_purpose', 'name_give_up', {}, facts);
      }
      return reply(ctx, 'asking_name', 'name_retry', {}, facts, { retry: true });
    }

    case 'asking_purpose':
      return askPurpose(ctx, facts);

    case 'asking_followup': {
      const next = withDetail(facts, ctx.utterance);
      const second = next.followupPlan?.secondQuestion;
      if (second) {
        return { responseText: second, nextStage: 'asking_second_followup', facts: next };
      }
      return toContact(ctx, next, 'ask_callback_after_followup');
    }

    case 'asking_second_followup':
      return toContact(ctx, withDetail(facts, ctx.utterance), 'ask_callback_after_second');

    case 'collecting_contact':
      if (facts.phone) {
        return finishUnknownCall(ctx, facts, 'contact_done', { phone: spokenPhone(facts.phone) });
      }
      if (ctx.intent === 'ending_conversation') {
        return finishUnknownCall(ctx, facts, 'unknown_goodbye');
      }
      if (isLastAttempt(ctx)) {
        return finishUnknownCall(ctx, { ...facts, phone: ctx.callerId || CALLER_NUMBER_PLACEHOLDER }, 'contact_give_up');
      }
      return reply(ctx, 'collecting_contact', 'contact_retry', {}, facts, { retry: true });

    default: {
      const unreachable: never = stage;
      throw new Error(`Unhandled unknown-caller stage: ${String(unreachable)}`);
    }
  }
}

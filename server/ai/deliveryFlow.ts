/**
 * Delivery graph - greets a courier, guides them to the door and gets them
 * their OTP, either from the owner's SMS inbox or typed in by hand.
 */

import type {
  DeliveryStage,
  Facts,
  HistoryTurn,
  Language,
  LocationMatch,
  RouteSummary,
  SmsMessage,
} from '@shared/schema';
import { findBestMatch, parseBatch } from '../services/otpExtraction';
import type { OrderLedger } from '../services/orderLedger';
import { formatDigitsForSpeech } from '../utils/phone';
import { say, type TemplateKey, type TemplateVars } from '../utils/say';
import {
  classifyYesNo,
  hasArrived,
  isGreeting,
  isLost,
  wantsDirections,
} from '../utils/speech-helpers';
import { cleanLocationText, extractSpokenCode } from '../utils/text';
import {
  extractCompanyFromText,
  extractFacts,
  findKnownCompany,
  mergeFacts,
} from './informationExtractor';
import { identifyCallerRole } from './intentRouter';
import { isLastAttempt, type FlowDeps, type StageContext, type StepResult, type TurnResult } from './turnTypes';

type Step = StepResult<DeliveryStage>;

/** The caller is not a courier after all */
export interface Handoff {
  handoff: 'unknown';
}

export type DeliveryOutcome = Step | Handoff;

// Stages where digits in the reply are the OTP itself, not a request for one
const MANUAL_OTP_STAGES: readonly DeliveryStage[] = ['otp_not_found', 'manual_otp_entry', 'confirming_manual_otp'];

export function acceptsOtpRequest(stage: DeliveryStage): boolean {
  return !MANUAL_OTP_STAGES.includes(stage);
}

function reply(
  ctx: StageContext,
  nextStage: DeliveryStage,
  key: TemplateKey,
  vars: TemplateVars = {},
  facts: Facts = ctx.facts,
  extra: Partial<Step> = {}
): Step {
  return { responseText: say(ctx.language, key, vars), nextStage, facts, ...extra };
}

/**
 * Reuse the order already tied to this call, or open one for `company`.
 */
export function ensureOrder(facts: Facts, company: string, ledger: OrderLedger): Facts {
  if (facts.orderId && ledger.has(facts.orderId)) return facts;
  return { ...facts, orderId: ledger.add(company) };
}

/**
 * Ask for the company when it is unknown, otherwise ask the calling layer
 * to fetch the owner's SMS.
 */
export function requestOtp(ctx: StageContext, facts: Facts, key: TemplateKey = 'checking_sms'): Step {
  const company = facts.company;
  if (!company) {
    return reply(ctx, 'asking_otp_company', 'ask_otp_company', {}, facts);
  }

  console.log(`[DeliveryFlow] Requesting SMS for ${company} OTP`);
  return reply(ctx, 'checking_sms', key, { company }, ensureOrder(facts, company, ctx.deps.ledger), {
    action: { type: 'request_sms_otp', company },
    requiresSms: true,
    companyRequested: company,
  });
}

// A goodbye ends the call only when no stage rule took the reply
function unmatched(ctx: StageContext, step: Step): Step {
  if (ctx.intent !== 'ending_conversation') return step;
  return reply(ctx, 'end_of_call', 'closing', {}, ctx.facts, { endCall: true });
}

function arrivalCheck(ctx: StageContext, facts: Facts): Step {
  if (!facts.company) {
    return reply(ctx, 'asking_company_for_otp', 'arrived_ask_company', {}, facts);
  }
  return reply(ctx, 'asking_if_otp_needed', 'arrived_ask_otp', { company: facts.company },
    ensureOrder(facts, facts.company, ctx.deps.ledger));
}

async function companyFromReply(ctx: StageContext): Promise<string | undefined> {
  const extracted = await extractFacts(ctx.utterance, ctx.facts, ctx.deps.languageModel);
  return extracted.company ?? extractCompanyFromText(ctx.utterance);
}

async function opening(stage: DeliveryStage, ctx: StageContext): Promise<DeliveryOutcome> {
  const { utterance } = ctx;

  if (identifyCallerRole(utterance) === 'delivery') {
    const merged = mergeFacts(ctx.facts, await extractFacts(utterance, ctx.facts, ctx.deps.languageModel));
    const company = merged.company ?? findKnownCompany(utterance);
    const facts = company ? { ...merged, company } : merged;
    const first = stage === 'start';

    if (company) {
      return reply(ctx, 'asking_location_help', first ? 'delivery_company_known_start' : 'delivery_company_known', { company }, facts);
    }
    return reply(ctx, 'asking_company_first', first ? 'delivery_ask_company_start' : 'delivery_ask_company', {}, facts);
  }

  if (ctx.intent === 'ending_conversation') {
    return reply(ctx, 'end_of_call', 'closing', {}, ctx.facts, { endCall: true });
  }

  if (stage === 'start') {
    return isGreeting(utterance)
      ? reply(ctx, 'waiting_for_context', 'greeting_reply')
      : reply(ctx, 'initial_greeting', 'greeting');
  }

  console.log('[DeliveryFlow] No delivery context, handing over to unknown caller flow');
  return { handoff: 'unknown' };
}

async function locate(ctx: StageContext): Promise<Step> {
  const { location, home } = ctx.deps;
  const spoken = cleanLocationText(ctx.utterance);

  let matches: LocationMatch[] = [];
  try {
    matches = await location.geocode(spoken);
  } catch (error) {
    console.error('[DeliveryFlow] Geocoding failed:', error);
  }

  const best = matches[0];
  if (!best) {
    if (isLastAttempt(ctx)) {
      return unmatched(ctx, reply(ctx, 'traveling_to_location', 'location_give_up', { home: home.address }));
    }
    return unmatched(ctx, reply(ctx, 'getting_current_location', 'location_not_found', {}, ctx.facts, { retry: true }));
  }

  const facts: Facts = { ...ctx.facts, currentLocation: best };
  let route: RouteSummary | null = null;
  try {
    route = await location.route(best, home);
  } catch (error) {
    console.error('[DeliveryFlow] Routing failed:', error);
  }

  if (!route) {
    return reply(ctx, 'traveling_to_location', 'location_found_no_route', { place: best.name, home: home.address }, facts);
  }
  return reply(ctx, 'traveling_to_location', 'location_found_route', {
    place: best.name,
    steps: route.steps.join(' '),
    distance: route.distanceKm,
    eta: route.etaMinutes,
  }, facts);
}

function manualEntry(ctx: StageContext): Step {
  const code = extractSpokenCode(ctx.utterance);
  if (code) {
    return reply(ctx, 'confirming_manual_otp', 'manual_otp_confirm',
      { company: ctx.facts.company ?? 'delivery', otp: formatDigitsForSpeech(code) },
      { ...ctx.facts, manualOtp: code });
  }
  if (isLastAttempt(ctx)) {
    return reply(ctx, 'end_of_call', 'delivery_give_up', {}, ctx.facts, { endCall: true });
  }
  return unmatched(ctx, reply(ctx, 'manual_otp_entry', 'manual_otp_retry', {}, ctx.facts, { retry: true }));
}

function otpNeeded(ctx: StageContext): Step {
  switch (classifyYesNo(ctx.utterance)) {
    case 'yes':
      return requestOtp(ctx, ctx.facts);
    case 'no':
      return reply(ctx, 'end_of_call', 'otp_goodbye', {}, ctx.facts, { endCall: true });
    case 'unclear':
      if (isLastAttempt(ctx)) return reply(ctx, 'end_of_call', 'delivery_give_up', {}, ctx.facts, { endCall: true });
      return unmatched(ctx, reply(ctx, 'asking_if_otp_needed', 'otp_needed_clarify', {}, ctx.facts, { retry: true }));
  }
}

function confirmManualOtp(ctx: StageContext): Step {
  const otp = ctx.facts.manualOtp;
  if (!otp) {
    return reply(ctx, 'manual_otp_entry', 'manual_otp_reenter');
  }

  const company = ctx.facts.company ?? 'delivery';
  switch (classifyYesNo(ctx.utterance)) {
    case 'yes':
      return reply(ctx, 'otp_provided', 'manual_otp_confirmed', { company, otp: formatDigitsForSpeech(otp) }, ctx.facts, {
        action: { type: 'provide_otp', otp, company },
      });
    case 'no':
      return reply(ctx, 'manual_otp_entry', 'manual_otp_reenter', {}, { ...ctx.facts, manualOtp: undefined });
    case 'unclear':
      return unmatched(ctx, reply(ctx, 'confirming_manual_otp', 'manual_otp_clarify', { otp: formatDigitsForSpeech(otp) }, ctx.facts, { retry: true }));
  }
}

/**
 * One delivery turn. Urgent calls are handled before this.
 */
export async function handleDeliveryTurn(stage: DeliveryStage, ctx: StageContext): Promise<DeliveryOutcome> {
  const { utterance } = ctx;

  if (ctx.intent === 'requesting_otp' && acceptsOtpRequest(stage) && stage !== 'end_of_call') {
    const company = ctx.facts.company ?? findKnownCompany(utterance);
    return requestOtp(ctx, company ? { ...ctx.facts, company } : ctx.facts);
  }

  switch (stage) {
    case 'start':
    case 'waiting_for_context':
    case 'initial_greeting':
      return opening(stage, ctx);

    case 'asking_company_first': {
      const company = await companyFromReply(ctx);
      if (!company) return unmatched(ctx, reply(ctx, stage, 'company_retry', {}, ctx.facts, { retry: true }));
      return reply(ctx, 'asking_location_help', 'company_confirmed', { company }, { ...ctx.facts, company });
    }

    case 'asking_location_help':
      if (wantsDirections(utterance)) return reply(ctx, 'getting_current_location', 'ask_landmark');
      if (hasArrived(utterance)) return arrivalCheck(ctx, ctx.facts);
      return unmatched(ctx, reply(ctx, stage, 'clarify_location_help', {}, ctx.facts, { retry: true }));

    case 'getting_current_location':
      return locate(ctx);

    case 'traveling_to_location':
      if (hasArrived(utterance)) return arrivalCheck(ctx, ctx.facts);
      if (isLost(utterance)) return reply(ctx, 'getting_current_location', 'ask_landmarks_again');
      return unmatched(ctx, reply(ctx, stage, 'waiting_arrival'));

    case 'asking_company_for_otp': {
      const company = await companyFromReply(ctx);
      if (!company) return unmatched(ctx, reply(ctx, stage, 'company_retry', {}, ctx.facts, { retry: true }));
      return arrivalCheck(ctx, { ...ctx.facts, company });
    }

    case 'asking_otp_company': {
      const company = await companyFromReply(ctx);
      if (!company) return unmatched(ctx, reply(ctx, stage, 'company_retry', {}, ctx.facts, { retry: true }));
      return requestOtp(ctx, { ...ctx.facts, company }, 'checking_sms_after_company');
    }

    case 'asking_if_otp_needed':
      return otpNeeded(ctx);

    case 'checking_sms':
      return requestOtp(ctx, ctx.facts, 'still_checking_sms');

    case 'otp_not_found':
    case 'manual_otp_entry':
      return manualEntry(ctx);

    case 'confirming_manual_otp':
      return confirmManualOtp(ctx);

    case 'otp_provided':
    case 'call_ending':
      if (classifyYesNo(utterance) === 'no') {
        return reply(ctx, 'end_of_call', 'closing', {}, ctx.facts, { endCall: true });
      }
      return unmatched(ctx, reply(ctx, stage, 'closing_prompt'));

    case 'end_of_call':
      return reply(ctx, 'end_of_call', 'closing', {}, ctx.facts, { endCall: true });

    default: {
      const unreachable: never = stage;
      throw new Error(`Unhandled delivery stage: ${String(unreachable)}`);
    }
  }
}

// ═══════════════════════════════════════════════
// SMS reprocessing
// ═══════════════════════════════════════════════

export interface ReprocessInput {
  company?: string;
  smsBatch: SmsMessage[];
  facts: Facts;
  history: HistoryTurn[];
  language: Language;
}

/**
 * Second half of the OTP request: the calling layer fetched the owner's
 * SMS and hands them back here.
 */
export function reprocessSms(input: ReprocessInput, deps: Pick<FlowDeps, 'ledger'>): TurnResult {
  const target = input.company?.trim() || input.facts.company || '';
  const facts: Facts = target && !input.facts.company ? { ...input.facts, company: target } : input.facts;
  const label = target || 'delivery';

  const finish = (nextStage: DeliveryStage, responseText: string, extra: Partial<TurnResult> = {}): TurnResult => ({
    responseText,
    nextStage,
    facts,
    action: { type: 'none' },
    history: [...input.history, { role: 'assistant', content: responseText }],
    callerRole: 'delivery',
    intent: 'requesting_otp',
    endCall: false,
    requiresSms: false,
    ...extra,
  });

  if (input.smsBatch.length === 0) {
    console.log('[DeliveryFlow] Reprocess with an empty SMS batch');
    return finish('otp_not_found', say(input.language, 'no_sms'));
  }

  const parsed = parseBatch(input.smsBatch, target || undefined);
  const best = findBestMatch(parsed, target);
  const otp = best?.match.otp;

  if (!best || !otp) {
    console.log(`[DeliveryFlow] No ${label} OTP in ${input.smsBatch.length} messages`);
    return finish('otp_not_found', say(input.language, 'otp_not_in_sms', { count: input.smsBatch.length, company: label }));
  }

  const { match } = best;
  const spoken = formatDigitsForSpeech(otp);
  const confident = match.confidence >= 0.8 && !best.fallbackUsed;
  console.log(`[DeliveryFlow] OTP found for ${label}: confidence=${match.confidence} fallback=${best.fallbackUsed}`);

  let responseText = confident
    ? say(input.language, 'otp_found', { company: label, otp: spoken })
    : say(input.language, 'otp_found_verify', { sender: match.sender || 'an unknown sender', otp: spoken, company: label });
  if (match.trackingId) {
    responseText += say(input.language, 'tracking_suffix', { tracking: match.trackingId });
  }

  if (facts.orderId) {
    for (const status of ['approved', 'completed'] as const) {
      const result = deps.ledger.setStatus(facts.orderId, status);
      if (!result.ok) console.warn(`[DeliveryFlow] ${result.reason}`);
    }
  }

  return finish('call_ending', responseText, {
    action: { type: 'provide_otp', otp, company: label },
    endCall: true,
  });
}

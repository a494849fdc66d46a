/**
 * OTP Extraction Engine
 *
 * Pulls one-time passcodes and tracking ids out of forwarded SMS bodies.
 * Company-specific patterns are tried first (the expected company, then
 * whichever company the body names); a generic cascade covers the rest.
 */

import type { ParsedMessage, SmsMessage } from '@shared/schema';

interface KeywordToken {
  /** Case-insensitive lead-in, e.g. "order" */
  keyword: RegExp;
  /** Case-sensitive token searched for after the lead-in */
  token: RegExp;
}

interface CompanyPattern {
  otp: RegExp;
  tracking: KeywordToken;
  indicators: string[];
}

// Uppercase/digit token of at least `min` characters containing a digit
function trackingToken(min: number, max = ''): RegExp {
  return new RegExp(`\\b(?=[A-Z0-9]*\\d)([A-Z0-9]{${min},${max}})\\b`);
}

const COMPANY_PATTERNS: Record<string, CompanyPattern> = {
  zomato: {
    otp: /(?:OTP|code|password).*?(\d{4,6})/i,
    tracking: { keyword: /(?:order|tracking)/i, token: trackingToken(8) },
    indicators: ['zomato', 'zmt'],
  },
  swiggy: {
    otp: /(?:OTP|code|verification).*?(\d{4,6})/i,
    tracking: { keyword: /(?:order|track)/i, token: trackingToken(8) },
    indicators: ['swiggy', 'swg'],
  },
  amazon: {
    otp: /(?:OTP|code|pin).*?(\d{4,6})/i,
    tracking: { keyword: /(?:tracking|order)/i, token: trackingToken(10) },
    indicators: ['amazon', 'amzn'],
  },
  flipkart: {
    otp: /(?:OTP|code|verification).*?(\d{4,6})/i,
    tracking: { keyword: /(?:order|tracking)/i, token: trackingToken(8) },
    indicators: ['flipkart', 'fkrt'],
  },
  bigbasket: {
    otp: /(?:OTP|code).*?(\d{4,6})/i,
    tracking: { keyword: /(?:order|delivery)/i, token: trackingToken(8) },
    indicators: ['bigbasket', 'bb'],
  },
  dunzo: {
    otp: /(?:OTP|code).*?(\d{4,6})/i,
    tracking: { keyword: /(?:task|order)/i, token: trackingToken(8) },
    indicators: ['dunzo'],
  },
};

export const SUPPORTED_COMPANIES = Object.keys(COMPANY_PATTERNS);

const BASE_CONFIDENCE = 0.5;
const INDICATOR_BOOST = 0.3;
const OTP_BOOST = 0.2;
const TRACKING_BOOST = 0.2;

const GENERIC_OTP_PATTERNS: Array<{ pattern: RegExp; confidence: number }> = [
  { pattern: /\b(\d{4})\b/, confidence: 0.6 },
  { pattern: /\b(\d{6})\b/, confidence: 0.7 },
  { pattern: /(?:OTP|code|verification|pin).*?(\d{4,6})/i, confidence: 0.8 },
];

const GENERIC_TRACKING_PATTERNS: Array<{ pattern: RegExp; confidence: number }> = [
  { pattern: /\b([A-Z]{2,4}\d{8,12})\b/, confidence: 0.7 },
  { pattern: /\b(?=[A-Z0-9]*[A-Z])(?=[A-Z0-9]*\d)([A-Z0-9]{8,15})\b/, confidence: 0.5 },
];

const SENDER_MAPPING: Record<string, string[]> = {
  zomato: ['zomato', 'zmt', 'zm-'],
  swiggy: ['swiggy', 'swg', 'sg-'],
  amazon: ['amazon', 'amzn', 'az-'],
  flipkart: ['flipkart', 'fkrt', 'fk-'],
  bigbasket: ['bigbasket', 'bb-', 'bigb'],
  dunzo: ['dunzo', 'dz-'],
  paytm: ['paytm'],
  phonepe: ['phonepe'],
  googlepay: ['gpay', 'google'],
  banking: ['hdfc', 'icici', 'sbi', 'axis', 'kotak'],
};

function firstGroup(pattern: RegExp, text: string): string | undefined {
  return pattern.exec(text)?.[1];
}

function matchAfterKeyword({ keyword, token }: KeywordToken, text: string): string | undefined {
  const lead = keyword.exec(text);
  if (!lead) return undefined;
  return firstGroup(token, text.slice(lead.index + lead[0].length));
}

// Indicators must start a word: "bb" counts in "BB-ORDER" but not in "hobby"
function hasIndicator(lowerText: string, indicators: string[]): boolean {
  return indicators.some(indicator => {
    let from = lowerText.indexOf(indicator);
    while (from !== -1) {
      if (from === 0 || !/[a-z0-9]/.test(lowerText.charAt(from - 1))) return true;
      from = lowerText.indexOf(indicator, from + 1);
    }
    return false;
  });
}

function companyKey(company: string): string {
  return company.toLowerCase().replace(/\s+/g, '');
}

/**
 * Which known company a body mentions, by indicator, in table order.
 */
export function detectCompany(text: string): string | undefined {
  const lower = text.toLowerCase();
  return SUPPORTED_COMPANIES.find(company => {
    const entry = COMPANY_PATTERNS[company];
    return entry !== undefined && hasIndicator(lower, entry.indicators);
  });
}

function parseWithCompanyPattern(rawText: string, company: string, sender: string): ParsedMessage | undefined {
  const entry = COMPANY_PATTERNS[company];
  if (!entry) return undefined;

  const named = hasIndicator(rawText.toLowerCase(), entry.indicators);
  let score = BASE_CONFIDENCE;
  if (named) score += INDICATOR_BOOST;

  const otp = firstGroup(entry.otp, rawText);
  if (otp) score += OTP_BOOST;

  const trackingId = matchAfterKeyword(entry.tracking, rawText);
  if (trackingId) score += TRACKING_BOOST;

  // A company pattern that found nothing does not count as a match
  if (!otp && !trackingId) return undefined;

  return {
    rawText,
    sender,
    otp,
    trackingId,
    // An expected company's pattern can fit another company's SMS
    companyGuess: named ? company : undefined,
    confidence: Math.min(score, 1),
  };
}

function parseWithGenericPatterns(rawText: string, sender: string): ParsedMessage {
  let otp: string | undefined;
  let trackingId: string | undefined;
  let bestOtpConfidence = 0;
  let bestTrackingConfidence = 0;

  for (const { pattern, confidence } of GENERIC_OTP_PATTERNS) {
    const found = firstGroup(pattern, rawText);
    if (found && confidence > bestOtpConfidence) {
      otp = found;
      bestOtpConfidence = confidence;
    }
  }

  for (const { pattern, confidence } of GENERIC_TRACKING_PATTERNS) {
    const found = firstGroup(pattern, rawText);
    if (found && confidence > bestTrackingConfidence) {
      trackingId = found;
      bestTrackingConfidence = confidence;
    }
  }

  return {
    rawText,
    sender,
    otp,
    trackingId,
    confidence: Math.max(bestOtpConfidence, bestTrackingConfidence),
  };
}

/**
 * Parse one SMS body.
 *
 * When a company pattern extracts the same digits the generic cascade
 * would, it keeps at least the generic confidence.
 */
export function parseMessage(rawText: string, expectedCompany?: string, sender = ''): ParsedMessage {
  const text = rawText ?? '';
  const generic = parseWithGenericPatterns(text, sender);

  let parsed: ParsedMessage | undefined;
  if (expectedCompany) {
    parsed = parseWithCompanyPattern(text, companyKey(expectedCompany), sender);
  }
  if (!parsed) {
    const detected = detectCompany(text);
    if (detected) parsed = parseWithCompanyPattern(text, detected, sender);
  }

  if (parsed) {
    if (parsed.otp && parsed.otp === generic.otp && generic.confidence > parsed.confidence) {
      parsed = { ...parsed, confidence: generic.confidence };
    }
  } else {
    parsed = generic;
  }

  if (!parsed.companyGuess) {
    const fromSender = detectCompanyFromSender(sender);
    if (fromSender !== 'unknown') parsed = { ...parsed, companyGuess: fromSender };
  }

  return parsed;
}

export function parseBatch(messages: SmsMessage[], expectedCompany?: string): ParsedMessage[] {
  return messages.map(sms => parseMessage(sms.message, expectedCompany, sms.sender));
}

/**
 * Map an SMS sender id such as "VM-ZOMATO" to a company, or "unknown".
 */
export function detectCompanyFromSender(sender: string): string {
  if (!sender) return 'unknown';
  const lower = sender.toLowerCase();

  for (const [company, patterns] of Object.entries(SENDER_MAPPING)) {
    if (patterns.some(p => lower.includes(p))) return company;
  }
  return 'unknown';
}

export interface BestMatch {
  match: ParsedMessage;
  score: number;
  /** True when nothing pointed at the target company and the most confident OTP was taken instead */
  fallbackUsed: boolean;
}

export function scoreCandidate(candidate: ParsedMessage, target: string, index: number): number {
  const t = companyKey(target);
  let score = 0;

  if (t) {
    const detected = companyKey(candidate.companyGuess ?? '');
    if (detected && (detected.includes(t) || t.includes(detected))) score += 50;
    if (candidate.sender.toLowerCase().includes(t)) score += 40;
    if (candidate.rawText.toLowerCase().includes(t)) score += 20;
  }
  score += candidate.confidence * 10;
  if (index === 0) score += 5;

  return score;
}

/**
 * Pick the OTP for `target` out of a batch ordered most recent first.
 * Candidates without an OTP never win; ties keep list order.
 */
export function findBestMatch(candidates: ParsedMessage[], target: string): BestMatch | null {
  let best: BestMatch | null = null;

  for (const [index, candidate] of candidates.entries()) {
    if (!candidate.otp) continue;
    const score = scoreCandidate(candidate, target, index);
    if (score > 0 && (!best || score > best.score)) {
      best = { match: candidate, score, fallbackUsed: false };
    }
  }
  if (best) return best;

  let fallback: ParsedMessage | undefined;
  for (const candidate of candidates) {
    if (candidate.otp && (!fallback || candidate.confidence > fallback.confidence)) {
      fallback = candidate;
    }
  }
  if (!fallback) return null;

  console.log(`[OTP] No candidate pointed at "${target}", falling back to most confident OTP`);
  return { match: fallback, score: 0, fallbackUsed: true };
}

export interface DeliveryDetails {
  deliveryPhone?: string;
  deliveryPerson?: string;
  estimatedTime?: string;
}

/**
 * Courier phone, courier name and ETA when the SMS mentions them.
 */
export function extractDeliveryDetails(text: string): DeliveryDetails {
  const details: DeliveryDetails = {};

  const phone = /(?:^|\D)(\+91\d{10}|\d{10})(?!\d)/.exec(text);
  if (phone?.[1]) details.deliveryPhone = phone[1];

  const person =
    matchAfterKeyword(
      { keyword: /(?:delivery boy|delivery partner|delivery agent|driver)/i, token: /\b([A-Z][a-z]+)\b/ },
      text,
    ) ?? firstGroup(/\b([A-Z][a-z]+) (?:is|will be|has been) (?:delivering|arriving|on the way)/, text);
  if (person) details.deliveryPerson = person;

  const eta =
    firstGroup(/(?:in|within|by)\s+(\d+\s*(?:mins?|minutes?|hours?|hrs?))/i, text) ??
    firstGroup(/(\d{1,2}:\d{2}\s*(?:AM|PM))/i, text);
  if (eta) details.estimatedTime = eta;

  return details;
}

export interface OtpAlternative {
  otp: string;
  company: string;
  sender: string;
  confidence: number;
  reasoning: string;
}

/**
 * Up to three OTP-bearing candidates, most confident first, for when the
 * requested company could not be matched.
 */
export function suggestAlternatives(candidates: ParsedMessage[]): OtpAlternative[] {
  const ranked = candidates
    .map((candidate, index) => ({ candidate, index }))
    .filter(({ candidate }) => Boolean(candidate.otp))
    .sort((a, b) => b.candidate.confidence - a.candidate.confidence || a.index - b.index)
    .slice(0, 3);

  return ranked.map(({ candidate, index }) => {
    const reasons: string[] = [];
    if (candidate.confidence > 0.8) reasons.push('high confidence');
    else if (candidate.confidence > 0.6) reasons.push('good confidence');
    if (index === 0) reasons.push('most recent');
    if (candidate.companyGuess) reasons.push(`from ${candidate.companyGuess}`);
    else if (candidate.sender) reasons.push(`sender: ${candidate.sender}`);

    return {
      otp: candidate.otp ?? '',
      company: candidate.companyGuess ?? 'unknown',
      sender: candidate.sender,
      confidence: candidate.confidence,
      reasoning: reasons.length ? reasons.join(', ') : 'available option',
    };
  });
}

/**
 * Information Extractor
 *
 * Turns one utterance into partial facts (name, purpose, phone, company).
 * The language model is asked first when one is configured; the keyword
 * and regex rules below take over whenever it is missing, throws, or sends
 * back something that does not validate. Never throws.
 */

import type { ExtractedFacts, Facts } from '@shared/schema';
import type { LanguageModel } from './languageModel';
import { extractPhoneNumber, normalizePhoneNumber } from '../utils/phone';
import { hasAnyCue } from '../utils/speech-helpers';
import { titleCase } from '../utils/text';

const FALLBACK_COMPANIES = ['amazon', 'flipkart', 'swiggy', 'zomato', 'dunzo', 'zepto', 'bluedart'];

const NAME_PATTERNS: RegExp[] = [
  /my name is\s+([a-z]+(?:\s+[a-z]+)*)/,
  /\bi am\s+([a-z]+(?:\s+[a-z]+)*)/,
  /\bthis is\s+([a-z]+(?:\s+[a-z]+)*)/,
  /\bi'm\s+([a-z]+(?:\s+[a-z]+)*)/,
  /(?:^|\s)((?:[a-z]\s+){2,}[a-z])(?=\s|$)/,
  /name is\s+([^\s,]+)/,
  /\bis\s+([^\s,.]+)/,
];

// A captured name stops at the first of these
const NAME_BREAKS = new Set([
  'and', 'from', 'with', 'for', 'about', 'at', 'in', 'near', 'on', 'the', 'a', 'an',
  'calling', 'speaking', 'talking', 'here', 'i', 'not', 'looking', 'your', 'my', 'to',
]);

const REJECTED_NAMES = new Set([
  'calling', 'talking', 'speaking', 'here', 'you', 'me', 'fine', 'good', 'okay', 'ok',
  'yes', 'no', 'delivery', 'urgent', 'sorry', 'busy',
]);

const LAST_RESORT_STOPWORDS = new Set([
  'my', 'name', 'is', 'this', 'i', 'am', "i'm", 'the', 'a', 'an', 'it', "it's",
  'hello', 'hi', 'hey', 'yes', 'no', 'ok', 'okay', 'thank', 'thanks', 'you', 'bye', 'goodbye', 'namaste', 'नमस्ते', 'मेरा', 'नाम', 'है',
]);

function cleanNameCandidate(raw: string): string | undefined {
  const parts = raw.trim().split(/\s+/).filter(Boolean);

  // "r u d r a" -> "rudra"
  if (parts.length > 2 && parts.every(p => p.length === 1 && /[a-z]/.test(p))) {
    return parts.join('');
  }

  const kept: string[] = [];
  for (const part of parts) {
    if (NAME_BREAKS.has(part) || kept.length === 3) break;
    kept.push(part);
  }
  const candidate = kept.join(' ');

  if (candidate.length <= 1 || candidate.length >= 20 || REJECTED_NAMES.has(candidate)) {
    return undefined;
  }
  return candidate;
}

export function extractName(message: string): string | undefined {
  const lower = message.toLowerCase().replace(/[!?"]/g, ' ');

  for (const pattern of NAME_PATTERNS) {
    const captured = pattern.exec(lower)?.[1];
    if (!captured) continue;
    const name = cleanNameCandidate(captured);
    if (name) return titleCase(name);
  }

  // Short replies like "Rudra" or "रूद्रा" are taken as the name itself
  const words = message.split(/\s+/).filter(Boolean);
  if (words.length > 3) return undefined;

  for (const word of words) {
    const token = word.replace(/^[.,!?]+|[.,!?]+$/g, '');
    if (!LAST_RESORT_STOPWORDS.has(token.toLowerCase()) && token.length > 1 && token.length < 15) {
      return titleCase(token);
    }
  }
  return undefined;
}

/**
 * Rule-based extraction used when no language model answers.
 */
export function ruleBasedExtract(message: string): ExtractedFacts {
  const extracted: ExtractedFacts = {};
  if (!message || !message.trim()) return extracted;

  const lower = message.toLowerCase();
  const company = FALLBACK_COMPANIES.find(c => lower.includes(c));
  if (company) extracted.company = titleCase(company);

  const name = extractName(message);
  if (name) extracted.name = name;

  const phone = extractPhoneNumber(message);
  if (phone) extracted.phone = phone;

  return extracted;
}

function normalizeModelFacts(raw: ExtractedFacts): ExtractedFacts {
  const facts: ExtractedFacts = {};
  if (raw.name) facts.name = raw.name.trim();
  if (raw.purpose) facts.purpose = raw.purpose.trim();
  if (raw.phone) {
    const phone = normalizePhoneNumber(raw.phone);
    if (phone) facts.phone = phone;
  }
  if (raw.company && raw.company.trim()) facts.company = titleCase(raw.company);
  return facts;
}

/**
 * Partial facts for one utterance.
 */
export async function extractFacts(
  utterance: string,
  knownFacts: Facts,
  model?: LanguageModel
): Promise<ExtractedFacts> {
  if (model) {
    try {
      const extracted = normalizeModelFacts(await model.extract(utterance, knownFacts));
      console.log('[Extractor] Model extracted:', extracted);
      return extracted;
    } catch (error) {
      console.warn('[Extractor] Model extraction failed, using rules:', error instanceof Error ? error.message : error);
    }
  }

  try {
    return ruleBasedExtract(utterance);
  } catch (error) {
    console.error('[Extractor] Rule extraction failed:', error);
    return {};
  }
}

/**
 * Adds newly extracted values without overwriting what the call already
 * established.
 */
export function mergeFacts(facts: Facts, extracted: ExtractedFacts): Facts {
  const merged: Facts = { ...facts };
  if (!merged.name && extracted.name) merged.name = extracted.name;
  if (!merged.purpose && extracted.purpose) merged.purpose = extracted.purpose;
  if (!merged.phone && extracted.phone) merged.phone = extracted.phone;
  if (!merged.company && extracted.company) merged.company = extracted.company;
  return merged;
}

const COMPANY_ALIASES: Array<{ company: string; aliases: string[] }> = [
  { company: 'Zomato', aliases: ['zomato', 'zmt'] },
  { company: 'Swiggy', aliases: ['swiggy', 'swg', 'instamart'] },
  { company: 'Amazon', aliases: ['amazon', 'amzn', 'amz'] },
  { company: 'Flipkart', aliases: ['flipkart', 'fkrt', 'fk'] },
  { company: 'BigBasket', aliases: ['bigbasket', 'big basket', 'bb'] },
  { company: 'Dunzo', aliases: ['dunzo'] },
  { company: 'Zepto', aliases: ['zepto'] },
  { company: 'Blinkit', aliases: ['blinkit', 'grofers'] },
  { company: 'Myntra', aliases: ['myntra'] },
  { company: 'BlueDart', aliases: ['bluedart', 'blue dart'] },
  { company: 'Delhivery', aliases: ['delhivery'] },
  { company: 'FedEx', aliases: ['fedex'] },
  { company: 'Paytm', aliases: ['paytm'] },
  { company: 'PhonePe', aliases: ['phonepe', 'phone pe'] },
  { company: 'GPay', aliases: ['gpay', 'google pay'] },
];

/**
 * A well-known company named anywhere in the text, by name or short form.
 */
export function findKnownCompany(text: string): string | undefined {
  return COMPANY_ALIASES.find(entry => hasAnyCue(text, entry.aliases))?.company;
}

const COMPANY_FILLER = /\b(from|for|of|the|a|an|it's|its|it|is|this|delivery|order|otp|company|parcel)\b/g;

/**
 * Company named in a reply to "which company is this from?".
 * Known names and their short forms first; otherwise whatever is left of
 * the reply once filler words are gone, when at least 3 characters remain.
 */
export function extractCompanyFromText(text: string): string | undefined {
  if (!text || !text.trim()) return undefined;

  const known = findKnownCompany(text);
  if (known) return known;

  const cleaned = text
    .toLowerCase()
    .replace(/[.,!?]/g, ' ')
    .replace(COMPANY_FILLER, ' ')
    .replace(/\s+/g, ' ')
    .trim();

  return cleaned.length > 2 ? titleCase(cleaned) : undefined;
}

/**
 * Intent Router - keyword intent classification for caller utterances.
 *
 * The cascade is ordered and the first rule that matches wins, so the order
 * of the checks below is part of the contract. An utterance that names an
 * OTP is always `requesting_otp`, whatever else it says.
 */

import type { CallerRole } from '@shared/schema';
import { hasAnyCue, normalizeUtterance } from '../utils/speech-helpers';

export const INTENT_TYPES = [
  'requesting_otp',
  'providing_location',
  'initial_delivery',
  'non_urgent_callback',
  'provide_self_number',
  'requesting_callback',
  'general_yes',
  'declining',
  'ending_conversation',
  'general',
] as const;

export type IntentType = (typeof INTENT_TYPES)[number];

const OTP_PHRASES = [
  'otp', 'one time password', 'code', 'verification code',
  'pin', 'security code', 'auth code', 'login code',
  'give me the code', 'what is the code', 'tell me the otp',
  'need the otp', 'share the otp', 'provide otp',
  'otp चाहिए', 'ओटीपी चाहिए', 'कोड चाहिए', 'चाहिए otp', 'code चाहिए', 'ओटीपी',
];

// Company or Hindi possessive/source particle next to an OTP-ish word
const COMPANY_CONTEXT = [
  'amazon', 'flipkart', 'myntra', 'zomato', 'swiggy', 'delivery',
  'zepto', 'bluedart', 'का', 'से',
];
const OTP_ADJACENT = ['code', 'otp', 'pin', 'चाहिए', 'कोड'];

const LOCATION_WORDS = [
  'road', 'nagar', 'colony', 'market', 'station', 'gate', 'circle',
  'apartment', 'complex', 'mall', 'near', 'nearby', 'opposite', 'metro',
  'bus stop', 'landmark',
];

const DELIVERY_WORDS = [
  'delivery', 'parcel', 'package', 'amazon', 'flipkart', 'swiggy', 'zomato', 'zepto',
];

const NON_URGENT_CALLBACK = ["it's fine", "it's ok", 'ask him to call', 'ask her to call', 'just call me back'];
const SELF_NUMBER = ['same number', 'this number', "number i'm calling from", 'number i am calling from'];
const CALLBACK = ['call back', 'callback', 'call me back'];
const SHORT_YES = ['yes', 'yeah', 'yep', 'ok', 'okay', 'sure', 'correct', 'haan', 'हाँ', 'हां', 'जी'];
const SHORT_NO = ['no', 'nope', 'not really', 'nahi', 'नहीं'];
const ENDING = ['thank', 'thanks', 'thank you', 'bye', 'goodbye', 'धन्यवाद', 'शुक्रिया'];

/**
 * Classify a single utterance. Pure and synchronous.
 */
export function classifyIntent(utterance: string): IntentType {
  const text = utterance.toLowerCase().trim();
  const cleaned = normalizeUtterance(text);

  if (hasAnyCue(text, OTP_PHRASES)) return 'requesting_otp';
  if (hasAnyCue(text, COMPANY_CONTEXT) && hasAnyCue(text, OTP_ADJACENT)) return 'requesting_otp';
  if (hasAnyCue(text, LOCATION_WORDS)) return 'providing_location';
  if (hasAnyCue(text, DELIVERY_WORDS)) return 'initial_delivery';
  if (hasAnyCue(text, NON_URGENT_CALLBACK)) return 'non_urgent_callback';
  if (hasAnyCue(text, SELF_NUMBER)) return 'provide_self_number';
  if (hasAnyCue(text, CALLBACK)) return 'requesting_callback';
  if (SHORT_YES.includes(cleaned)) return 'general_yes';
  if (SHORT_NO.includes(cleaned)) return 'declining';
  if (hasAnyCue(text, ENDING)) return 'ending_conversation';

  return 'general';
}

const CALLER_ROLE_WORDS = [
  'delivery', 'parcel', 'package', 'amazon', 'flipkart',
  'swiggy', 'zomato', 'zepto', 'bluedart', 'myntra',
  'courier', 'order', 'shipped', 'डिलीवरी', 'पार्सल',
  'otp', 'one time password', 'ओटीपी',
];

/**
 * First-turn guess at who is calling. Anything that does not sound like a
 * delivery is treated as an unknown caller.
 */
export function identifyCallerRole(utterance: string): Exclude<CallerRole, 'undetermined'> {
  return hasAnyCue(utterance, CALLER_ROLE_WORDS) ? 'delivery' : 'unknown';
}

/**
 * Human-readable label for logs
 */
export function describeIntent(intent: IntentType): string {
  const descriptions: Record<IntentType, string> = {
    requesting_otp: 'Asking for a delivery OTP',
    providing_location: 'Describing where they are',
    initial_delivery: 'Announcing a delivery',
    non_urgent_callback: 'Happy to wait for a callback',
    provide_self_number: 'Call back on this number',
    requesting_callback: 'Asking for a callback',
    general_yes: 'Yes',
    declining: 'No',
    ending_conversation: 'Wrapping up',
    general: 'Anything else',
  };
  return descriptions[intent];
}

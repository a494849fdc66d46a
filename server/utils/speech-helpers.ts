/**
 * Speech Recognition Helpers
 *
 * Central utilities for interpreting short spoken replies in the call flows.
 * Latin-script cues are matched on word boundaries. `\b` does not understand
 * Devanagari, so other single-word cues are compared token by token and
 * multi-word ones as substrings.
 */

const ASCII_ONLY = /^[\x00-\x7F]+$/;

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * True when any cue occurs in the text.
 */
export function hasAnyCue(text: string, cues: readonly string[]): boolean {
  if (!text) return false;
  const lower = text.toLowerCase();
  const tokens = normalizeUtterance(lower).split(' ');

  return cues.some(cue => {
    if (!ASCII_ONLY.test(cue)) {
      return cue.includes(' ') ? lower.includes(cue) : tokens.includes(cue);
    }
    return new RegExp(`(^|[^a-z0-9])${escapeRegExp(cue)}(?=$|[^a-z0-9])`).test(lower);
  });
}

/** Lowercased, punctuation stripped, single spaces */
export function normalizeUtterance(text: string): string {
  return text
    .toLowerCase()
    .replace(/[.,!?;:"।]/g, ' ')
    .replace(/\s+/g, ' ')
    .trim();
}

// Affirmative words and phrases
const AFFIRMATIVE_WORDS = [
  'yes', 'yeah', 'yep', 'yup', 'yea', 'ya',
  'ok', 'okay', 'sure', 'alright',
  'correct', 'right', 'absolutely', 'definitely',
  'please', 'need', 'go ahead', 'of course', "that's right",
  'haan', 'han', 'ji',
  'हाँ', 'हां', 'जी', 'ठीक', 'सही', 'चाहिए',
];

// Negative words and phrases
const NEGATIVE_WORDS = [
  'no', 'nope', 'nah', 'not', 'negative',
  'wrong', 'incorrect', 'nahi',
  'नहीं', 'नही', 'ना',
];

// Checked before any single token so "don't need" is not read as "need"
const NEGATIVE_PHRASES = [
  "don't need", 'dont need', 'do not need',
  'not needed', 'no need', 'not required',
  'absolutely not', 'definitely not',
  'नहीं चाहिए', 'nahi chahiye',
];

/**
 * Check if speech contains an affirmative response
 */
export function isAffirmative(speech: string): boolean {
  return classifyYesNo(speech) === 'yes';
}

/**
 * Check if speech contains a negative response
 */
export function isNegative(speech: string): boolean {
  return classifyYesNo(speech) === 'no';
}

/**
 * Determine if speech is a clear yes/no response with NO-wins precedence.
 * "yeah no" and "don't need it" are both NO.
 */
export function classifyYesNo(speech: string): 'yes' | 'no' | 'unclear' {
  if (!speech) return 'unclear';
  const normalized = normalizeUtterance(speech);

  if (hasAnyCue(normalized, NEGATIVE_PHRASES) || hasAnyCue(normalized, NEGATIVE_WORDS)) {
    return 'no';
  }
  if (hasAnyCue(normalized, AFFIRMATIVE_WORDS)) {
    return 'yes';
  }
  return 'unclear';
}

const DIRECTION_CUES = [
  'need help', 'help', 'directions', 'direction', 'how to get', 'where is',
  'guide me', 'lost', 'route', 'navigate',
  'मदद', 'रास्ता', 'कहाँ', 'कैसे',
];

const ARRIVAL_CUES = [
  'here', 'arrived', 'at the location', 'reached', 'outside',
  'at your place', 'at the door', 'at the gate',
  'यहाँ', 'यहां', 'पहुँच', 'पहुंच', 'पहुँचा', 'पहुंचा', 'आ गया', 'आ चुका', 'हूं', 'हूँ',
];

const LOST_CUES = ["lost", "can't find", 'cant find', 'help', 'confused', 'where'];

const GREETING_CUES = ['hello', 'hi', 'hey', 'namaste', 'नमस्ते'];

const URGENT_CUES = ['urgent', 'asap', 'emergency', 'जरूरी', 'तुरंत'];

export function wantsDirections(speech: string): boolean {
  return hasAnyCue(speech, DIRECTION_CUES);
}

export function hasArrived(speech: string): boolean {
  return hasAnyCue(speech, ARRIVAL_CUES);
}

export function isLost(speech: string): boolean {
  return hasAnyCue(speech, LOST_CUES);
}

export function isGreeting(speech: string): boolean {
  return hasAnyCue(speech, GREETING_CUES);
}

export function isUrgent(speech: string): boolean {
  return hasAnyCue(speech, URGENT_CUES);
}

// Export the word lists for testing
export { AFFIRMATIVE_WORDS, NEGATIVE_WORDS, URGENT_CUES };

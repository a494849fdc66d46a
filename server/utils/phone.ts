/**
 * Phone number helpers for spoken callback numbers.
 */

// Tried in order. A pattern with three groups is a grouped number like (965) 060-6105
const PHONE_PATTERNS: RegExp[] = [
  /\(?(\d{3})\)?[-.\s]*(\d{3})[-.\s]*(\d{4})/,
  /\+?91[-.\s]*(\d{10})/,
  /(\d{10})/,
  /(\d{3}[-.\s]*\d{3}[-.\s]*\d{4})/,
  /(\d{4}[-.\s]*\d{3}[-.\s]*\d{3})/,
  /(\d{2}[-.\s]*\d{4}[-.\s]*\d{4})/,
];

const MIN_PHONE_LENGTH = 10;

/**
 * Pull a callback number out of an utterance.
 * Returns digits (and a leading + when present), or undefined.
 */
export function extractPhoneNumber(message: string): string | undefined {
  if (!message) return undefined;

  for (const pattern of PHONE_PATTERNS) {
    const match = pattern.exec(message);
    if (!match) continue;

    const [, first = '', second, third] = match;
    const raw = second !== undefined && third !== undefined ? first + second + third : first;
    const phone = raw.replace(/[^\d+]/g, '');

    if (phone.length >= MIN_PHONE_LENGTH) {
      return phone;
    }
  }

  return undefined;
}

/**
 * Normalize to +91XXXXXXXXXX.
 * 10 digits get the country code, 12 digits starting with 91 get a +,
 * anything else is returned as bare digits (undefined when there are none).
 */
export function normalizePhoneNumber(phone: string): string | undefined {
  const digits = phone.replace(/\D/g, '');

  if (digits.length === 10) return `+91${digits}`;
  if (digits.length === 12 && digits.startsWith('91')) return `+${digits}`;

  return digits || undefined;
}

/**
 * "9876543210" -> "9 8 7 6 5 4 3 2 1 0" so TTS reads each digit.
 */
export function formatDigitsForSpeech(value: string): string {
  return value.replace(/\D/g, '').split('').join(' ');
}

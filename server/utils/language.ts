import type { Language } from '@shared/schema';

const DEVANAGARI = /[\u0900-\u097F]/;

// Romanized Hindi that callers commonly mix into English
const HINDI_KEYWORDS = [
  'hai', 'hain', 'aur', 'kya', 'kaise', 'kahan', 'kab', 'kaun',
  'mere', 'mera', 'aapka', 'aap', 'hum', 'main',
  'namaste', 'dhanyawad', 'kripaya', 'madad', 'chahiye', 'bhaiya',
];

/**
 * Best-effort guess used only when a request does not name its language.
 */
export function detectLanguage(text: string, fallback: Language = 'en'): Language {
  if (!text || !text.trim()) return fallback;
  if (DEVANAGARI.test(text)) return 'hi';

  const words = text.toLowerCase().split(/[^a-z]+/).filter(Boolean);
  const hits = HINDI_KEYWORDS.filter(k => words.includes(k)).length;

  return hits >= 2 ? 'hi' : fallback;
}

/**
 * Small text utilities shared by the extractors and the call flows.
 */

/**
 * "big basket" -> "Big Basket". Scripts without case pass through unchanged.
 */
export function titleCase(value: string): string {
  return value
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}

/**
 * Strip the "I am at / I'm near" lead-in from a spoken location.
 */
export function cleanLocationText(raw: string): string {
  const cleaned = raw
    .toLowerCase()
    .replace(/^(i(\s*am|'m)?\s*(here\s*)?(in|at|near)\s+)/, '')
    .replace(/\s+(now|currently|right now)[.!?]*$/, '')
    .replace(/[.!?]+$/, '');
  return titleCase(cleaned);
}

const SPOKEN_DIGITS: Record<string, string> = {
  zero: '0', oh: '0', o: '0',
  one: '1', two: '2', three: '3', four: '4', five: '5',
  six: '6', seven: '7', eight: '8', nine: '9',
  ek: '1', teen: '3', char: '4', paanch: '5',
  chhe: '6', saat: '7', aath: '8', nau: '9', shunya: '0',
};

/**
 * Turns a spoken code into digits: "four eight two one" -> "4821".
 * Digit words and numerals may be mixed. The first consecutive run of
 * `minLength`..`maxLength` digits wins.
 */
export function parseSpokenDigits(text: string, minLength = 4, maxLength = 6): string | undefined {
  const tokens = text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean);
  const runs: string[] = [];
  let current = '';

  for (const token of tokens) {
    const digit = /^\d+$/.test(token) ? token : SPOKEN_DIGITS[token];
    if (digit !== undefined) {
      current += digit;
    } else if (current) {
      runs.push(current);
      current = '';
    }
  }
  if (current) runs.push(current);

  return runs.find(run => run.length >= minLength && run.length <= maxLength);
}

/**
 * A 4-6 digit code written as numerals, else spoken as words.
 */
export function extractSpokenCode(text: string): string | undefined {
  const numeric = /\b(\d{4,6})\b/.exec(text);
  if (numeric?.[1]) return numeric[1];
  return parseSpokenDigits(text);
}

/**
 * Trim to at most `maxWords` words.
 */
export function limitWords(text: string, maxWords: number): string {
  const words = text.trim().split(/\s+/).filter(Boolean);
  if (words.length <= maxWords) return words.join(' ');
  return `${words.slice(0, maxWords).join(' ')}...`;
}

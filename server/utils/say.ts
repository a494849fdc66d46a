import responses from '../data/responses.json';
import type { Language } from '@shared/schema';

export type TemplateKey = keyof typeof responses.en;

// Typing the table this way makes a missing Hindi key a compile error
const TEMPLATES: Record<Language, Record<TemplateKey, string>> = responses;

export type TemplateVars = Record<string, string | number | undefined>;

/**
 * Fill a response template for the caller's language.
 * Placeholders with no value are left in place so they show up in logs.
 */
export function say(language: Language, key: TemplateKey, vars: TemplateVars = {}): string {
  const template = TEMPLATES[language][key];
  return template.replace(/\{(\w+)\}/g, (whole, name: string) => {
    const value = vars[name];
    return value === undefined ? whole : String(value);
  });
}

/**
 * Language Model capability - the three things the call flows ask of a
 * hosted model. Every method may throw; callers own the fallback.
 */

import { z } from 'zod';
import type { ExtractedFacts, Facts, FollowupPlan, HistoryTurn } from '@shared/schema';
import { complete, completeJson, getAvailableProvider, type LLMCredentials } from './llmProvider';

export interface LanguageModel {
  readonly name: string;
  extract(utterance: string, knownFacts: Facts): Promise<ExtractedFacts>;
  summarize(history: HistoryTurn[], facts: Facts): Promise<string>;
  planFollowup(purpose: string, name?: string): Promise<FollowupPlan>;
}

// Models like to send null or "" for "not mentioned"
const optionalText = z
  .string()
  .nullish()
  .transform(v => (v && v.trim() ? v.trim() : undefined));

export const extractionSchema = z.object({
  name: optionalText,
  purpose: optionalText,
  phone: z
    .union([z.string(), z.number()])
    .nullish()
    .transform(v => (v === null || v === undefined ? undefined : String(v))),
  company: optionalText,
});

const modelPlanSchema = z
  .object({
    needs_followup: z.boolean(),
    importance_level: z.enum(['low', 'medium', 'high']),
    first_question: z.string().nullish(),
    second_question: z.string().nullish(),
    reasoning: z.string().default(''),
  })
  .transform((plan): FollowupPlan => ({
    needsFollowup: plan.needs_followup && Boolean(plan.first_question),
    importance: plan.importance_level,
    firstQuestion: plan.first_question ?? undefined,
    secondQuestion: plan.second_question ?? undefined,
    reasoning: plan.reasoning,
  }));

const EXTRACTION_PROMPT = `You are an information extraction assistant for phone calls.

Extract these fields from the caller's message:
- "name": the caller's name, if they say it
- "purpose": the reason for calling, if they say it
- "phone": a callback phone number, if they say it
- "company": a company name, especially delivery companies (Amazon, Flipkart, Swiggy, Zomato, ...)

Rules:
1. "I have a delivery from Amazon" gives {"company": "Amazon"}
2. "delivery for you" names no company, so return {}
3. Return ONLY a JSON object with the fields you found. Return {} when nothing was said.`;

const FOLLOWUP_PROMPT = `You screen calls for a busy home owner. Decide whether the caller's stated purpose needs follow-up questions
that would help the owner prioritise the callback.

Ask follow-ups for business opportunities, investments, partnerships, sponsorships, collaborations,
job opportunities and media requests. Do not ask for simple inquiries, personal calls, complaints or basic questions.
Ask at most two short, conversational questions.

Respond with JSON only:
{"needs_followup": boolean, "importance_level": "high" | "medium" | "low",
 "first_question": string | null, "second_question": string | null, "reasoning": string}`;

const SUMMARY_PROMPT = `Summarise this phone call for the home owner in at most 60 words.
Mention who called, why, and any number or OTP that was shared. Plain sentences, no lists.`;

export class LlmLanguageModel implements LanguageModel {
  readonly name: string;

  constructor(private readonly credentials: LLMCredentials) {
    this.name = `llm:${getAvailableProvider(credentials) ?? 'none'}`;
  }

  async extract(utterance: string, knownFacts: Facts): Promise<ExtractedFacts> {
    const known = { name: knownFacts.name, purpose: knownFacts.purpose, phone: knownFacts.phone, company: knownFacts.company };
    return completeJson(
      [
        { role: 'system', content: EXTRACTION_PROMPT },
        { role: 'user', content: `Current information: ${JSON.stringify(known)}\nCaller's message: "${utterance}"` },
      ],
      extractionSchema,
      { temperature: 0.1, maxTokens: 150 },
      this.credentials
    );
  }

  async planFollowup(purpose: string, name?: string): Promise<FollowupPlan> {
    return completeJson(
      [
        { role: 'system', content: FOLLOWUP_PROMPT },
        { role: 'user', content: `Caller: ${name ?? 'the caller'}\nPurpose: "${purpose}"` },
      ],
      modelPlanSchema,
      { temperature: 0.3, maxTokens: 300 },
      this.credentials
    );
  }

  async summarize(history: HistoryTurn[], facts: Facts): Promise<string> {
    const transcript = history.map(turn => `${turn.role === 'user' ? 'Caller' : 'Assistant'}: ${turn.content}`).join('\n');
    const response = await complete(
      [
        { role: 'system', content: SUMMARY_PROMPT },
        { role: 'user', content: `Known details: ${JSON.stringify(facts)}\n\n${transcript}` },
      ],
      { temperature: 0.3, maxTokens: 150 },
      this.credentials
    );

    if (response.provider === 'fallback' || !response.content.trim()) {
      throw new Error('No summary from language model');
    }
    return response.content.trim();
  }
}

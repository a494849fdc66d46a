/**
 * LLM Provider - Abstraction layer for AI model access
 * Supports OpenAI and Anthropic with automatic fallback between them
 */

import { z } from 'zod';
import { env } from '../utils/env';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMOptions {
  temperature?: number;
  maxTokens?: number;
  model?: string;
}

export type LLMProviderName = 'openai' | 'anthropic';

export interface LLMResponse {
  content: string;
  provider: LLMProviderName | 'fallback';
  model: string;
}

export interface LLMCredentials {
  openaiApiKey?: string;
  openaiBaseUrl?: string;
  anthropicApiKey?: string;
}

const openAiResponseSchema = z.object({
  choices: z.array(z.object({ message: z.object({ content: z.string().nullable() }) })).default([]),
});

const anthropicResponseSchema = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
});

function credentialsFromEnv(): LLMCredentials {
  return {
    openaiApiKey: env.OPENAI_API_KEY,
    openaiBaseUrl: env.OPENAI_BASE_URL,
    anthropicApiKey: env.ANTHROPIC_API_KEY,
  };
}

// Detect which provider is available
export function getAvailableProvider(credentials: LLMCredentials = credentialsFromEnv()): LLMProviderName | null {
  if (credentials.openaiApiKey) return 'openai';
  if (credentials.anthropicApiKey) return 'anthropic';
  return null;
}

/**
 * Call OpenAI API
 */
async function callOpenAI(
  messages: LLMMessage[],
  options: LLMOptions,
  credentials: LLMCredentials
): Promise<LLMResponse> {
  if (!credentials.openaiApiKey) throw new Error('OpenAI API key not configured');
  const baseUrl = credentials.openaiBaseUrl || 'https://api.openai.com/v1';
  const model = options.model || 'gpt-4o-mini';

  const response = await fetch(`${baseUrl}/chat/completions`, {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'Authorization': `Bearer ${credentials.openaiApiKey}`
    },
    body: JSON.stringify({
      model,
      messages,
      temperature: options.temperature ?? 0.3,
      max_tokens: options.maxTokens ?? 300
    })
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(`OpenAI API error ${response.status}: ${errorText}`);
  }

  const data = openAiResponseSchema.parse(await response.json());
  return {
    content: data.choices[0]?.message.content ?? '',
    provider: 'openai',
    model
  };
}

/**
 * Call Anthropic API
 */
async function callAnthropic(
  messages: LLMMessage[],
  options: LLMOptions,
  credentials: LLMCredentials
): Promise<LLMResponse> {
  if (!credentials.anthropicApiKey) throw new Error('Anthropic API key not configured');
  const model = options.model || 'claude-3-haiku-20240307';

  const systemMessage = messages.find(m => m.role === 'system')?.content || '';
  const anthropicMessages = messages.flatMap(m =>
    m.role === 'system' ? [] : [{ role: m.role, content: m.content }]
  );

  const response = await fetch('https://api.anthropic.com/v1/messages', {
    method: 'POST',
    headers: {
      'Content-Type': 'application/json',
      'x-api-key': credentials.anthropicApiKey,
      'anthropic-version': '2023-06-01'
    },
    body: JSON.stringify({
      model,
      max_tokens: options.maxTokens ?? 300,
      temperature: options.temperature ?? 0.3,
      system: systemMessage,
      messages: anthropicMessages
    })
  });

  if (!response.ok) {
    const errorText = await response.text();
    throw new Error(`Anthropic API error ${response.status}: ${errorText}`);
  }

  const data = anthropicResponseSchema.parse(await response.json());
  return {
    content: data.content.find(block => block.type === 'text')?.text ?? '',
    provider: 'anthropic',
    model
  };
}

function callProvider(
  provider: LLMProviderName,
  messages: LLMMessage[],
  options: LLMOptions,
  credentials: LLMCredentials
): Promise<LLMResponse> {
  return provider === 'openai'
    ? callOpenAI(messages, options, credentials)
    : callAnthropic(messages, options, credentials);
}

/**
 * Main completion function. Tries the configured provider, then the other
 * one when both are configured, and finally returns an empty 'fallback'
 * response. Never throws.
 */
export async function complete(
  messages: LLMMessage[],
  options: LLMOptions = {},
  credentials: LLMCredentials = credentialsFromEnv()
): Promise<LLMResponse> {
  const provider = getAvailableProvider(credentials);

  if (!provider) {
    console.warn('[LLM] No AI provider configured, returning fallback');
    return { content: '', provider: 'fallback', model: 'none' };
  }

  try {
    return await callProvider(provider, messages, options, credentials);
  } catch (error) {
    console.error(`[LLM] ${provider} failed:`, error);

    const fallbackProvider: LLMProviderName = provider === 'openai' ? 'anthropic' : 'openai';
    const hasFallback = fallbackProvider === 'openai'
      ? Boolean(credentials.openaiApiKey)
      : Boolean(credentials.anthropicApiKey);

    if (hasFallback) {
      console.log(`[LLM] Trying fallback to ${fallbackProvider}`);
      try {
        return await callProvider(fallbackProvider, messages, options, credentials);
      } catch (fallbackError) {
        console.error(`[LLM] Fallback ${fallbackProvider} also failed:`, fallbackError);
      }
    }

    return { content: '', provider: 'fallback', model: 'none' };
  }
}

/**
 * Pull the first JSON object out of a model reply, tolerating code fences
 * and prose around it. Returns undefined when there is none.
 */
export function extractJsonObject(content: string): unknown {
  const start = content.indexOf('{');
  const end = content.lastIndexOf('}');
  if (start === -1 || end <= start) return undefined;

  try {
    return JSON.parse(content.slice(start, end + 1));
  } catch {
    return undefined;
  }
}

/**
 * Completion whose reply must be a JSON object matching `schema`.
 * Throws when the model is unavailable or the reply does not validate,
 * so callers can drop to their rule-based fallback.
 */
export async function completeJson<T>(
  messages: LLMMessage[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options: LLMOptions = {},
  credentials: LLMCredentials = credentialsFromEnv()
): Promise<T> {
  const response = await complete(messages, options, credentials);
  if (response.provider === 'fallback') {
    throw new Error('No language model response');
  }

  const parsed = schema.safeParse(extractJsonObject(response.content));
  if (!parsed.success) {
    throw new Error(`Malformed model output: ${parsed.error.issues.map(i => i.message).join('; ')}`);
  }
  return parsed.data;
}

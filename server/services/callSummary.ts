/**
 * Call summaries for the owner, written when a call ends or on request.
 */

import dayjs from 'dayjs';
import type { Facts, HistoryTurn } from '@shared/schema';
import type { LanguageModel } from '../ai/languageModel';
import { hasAnyCue } from '../utils/speech-helpers';
import { limitWords } from '../utils/text';

const MAX_SUMMARY_WORDS = 70;

export type CallType = 'delivery' | 'inquiry' | 'general';

export interface CallSummary {
  summary: string;
  callType: CallType;
  keyPoints: string[];
  formattedDuration?: string;
  generatedAt: string;
}

const DELIVERY_KEYWORDS = ['delivery', 'deliver', 'parcel', 'package', 'otp', 'code', 'amazon', 'swiggy', 'zomato', 'flipkart'];
const INQUIRY_KEYWORDS = ['inquiry', 'question', 'help', 'support', 'information'];

function transcriptOf(history: HistoryTurn[]): string {
  return history.map(turn => turn.content).join('\n');
}

export function identifyCallType(history: HistoryTurn[], facts: Facts = {}): CallType {
  if (facts.company) return 'delivery';
  const transcript = transcriptOf(history);
  if (hasAnyCue(transcript, DELIVERY_KEYWORDS)) return 'delivery';
  if (hasAnyCue(transcript, INQUIRY_KEYWORDS)) return 'inquiry';
  return 'general';
}

export function formatDuration(seconds: number): string {
  const total = Math.max(0, Math.floor(seconds));
  if (total < 60) return `${total} seconds`;
  if (total < 3600) return `${Math.floor(total / 60)}m ${total % 60}s`;
  return `${Math.floor(total / 3600)}h ${Math.floor((total % 3600) / 60)}m`;
}

export function extractKeyPoints(history: HistoryTurn[]): string[] {
  const transcript = transcriptOf(history);
  const points: string[] = [];

  if (hasAnyCue(transcript, ['delivery'])) points.push('Delivery assistance request');
  if (hasAnyCue(transcript, ['otp', 'code'])) points.push('OTP/verification code provided');
  if (hasAnyCue(transcript, ['direction', 'directions', 'location', 'help getting'])) points.push('Location/direction assistance');
  if (hasAnyCue(transcript, ['amazon', 'swiggy', 'zomato', 'flipkart'])) points.push('Company-specific delivery support');
  if (hasAnyCue(transcript, ['arrived', 'here'])) points.push('Delivery person arrival confirmation');

  return points.slice(0, 5);
}

/**
 * Template summary used when no model answers.
 */
export function fallbackSummary(history: HistoryTurn[], facts: Facts): string {
  if (history.length === 0) return 'No conversation to summarize';

  if (facts.company) {
    return `Delivery person from ${facts.company} called for assistance. Provided directions and OTP as needed. Call completed successfully.`;
  }
  const who = facts.name ? `${facts.name} called` : 'Unknown caller contacted for assistance';
  const why = facts.purpose ? ` about ${facts.purpose}` : '';
  return `${who}${why}. Collected contact information and forwarded to the owner. Call completed successfully.`;
}

/**
 * Summary text, at most 70 words. Never throws.
 */
export async function summarize(history: HistoryTurn[], facts: Facts, model?: LanguageModel): Promise<string> {
  if (model && history.length > 0) {
    try {
      return limitWords(await model.summarize(history, facts), MAX_SUMMARY_WORDS);
    } catch (error) {
      console.warn('[Summary] Model summary failed, using template:', error instanceof Error ? error.message : error);
    }
  }
  return fallbackSummary(history, facts);
}

export async function buildCallSummary(
  history: HistoryTurn[],
  facts: Facts,
  durationSeconds?: number,
  model?: LanguageModel
): Promise<CallSummary> {
  return {
    summary: await summarize(history, facts, model),
    callType: identifyCallType(history, facts),
    keyPoints: extractKeyPoints(history),
    formattedDuration: durationSeconds === undefined ? undefined : formatDuration(durationSeconds),
    generatedAt: dayjs().toISOString(),
  };
}

/**
 * SMS source - the owner's recent text messages, newest first.
 */

import dayjs from 'dayjs';
import { z } from 'zod';
import { smsMessageSchema, type SmsMessage } from '@shared/schema';

export interface SmsSource {
  readonly name: string;
  /** Throws when the inbox cannot be reached */
  fetchLatest(userId?: string, limit?: number): Promise<SmsMessage[]>;
}

const DEFAULT_LIMIT = 10;

const latestResponseSchema = z.union([
  z.array(smsMessageSchema),
  z.object({ messages: z.array(smsMessageSchema).default([]) }).transform(body => body.messages),
]);

export class BackendSmsSource implements SmsSource {
  readonly name = 'backend';

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string
  ) {}

  async fetchLatest(userId?: string, limit = DEFAULT_LIMIT): Promise<SmsMessage[]> {
    const params = new URLSearchParams({ limit: String(limit) });
    if (userId) params.set('userId', userId);

    const response = await fetch(`${this.baseUrl}/api/sms/latest?${params.toString()}`, {
      headers: { Authorization: `Bearer ${this.apiKey}` },
    });
    if (!response.ok) {
      throw new Error(`SMS backend responded ${response.status}`);
    }

    const messages = latestResponseSchema.parse(await response.json());
    console.log(`[SMS] Fetched ${messages.length} messages from backend`);
    return messages.slice(0, limit);
  }
}

const DEMO_MESSAGES: Array<{ sender: string; message: string }> = [
  { sender: 'DEMO-ZOMATO', message: '[DEMO] Your Zomato OTP is 1111. Do not share it with anyone.' },
  { sender: 'DEMO-SWIGGY', message: '[DEMO] Your Swiggy delivery code is 2222.' },
  { sender: 'DEMO-AMAZON', message: '[DEMO] Amazon delivery OTP: 3333.' },
  { sender: 'DEMO-FKRT', message: '[DEMO] Flipkart verification code 4444 for your order.' },
];

/**
 * Placeholder inbox used when no SMS backend is configured. Every body is
 * prefixed with [DEMO] so it can never be mistaken for a real code.
 */
export class DemoSmsSource implements SmsSource {
  readonly name = 'demo';

  async fetchLatest(_userId?: string, limit = DEFAULT_LIMIT): Promise<SmsMessage[]> {
    const now = dayjs();
    return DEMO_MESSAGES.slice(0, limit).map((sms, index) => ({
      ...sms,
      timestamp: now.subtract(index * 5, 'minute').toISOString(),
    }));
  }
}

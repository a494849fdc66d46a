/**
 * Notification Dispatcher - tells the owner about callers.
 *
 * Push through the companion backend, SMS through Twilio, or just a log
 * line. A failed send is logged and reported as `false`; it never breaks
 * the call.
 */

import dayjs from 'dayjs';
import twilio from 'twilio';
import type { Facts } from '@shared/schema';

export type NotificationKind = 'urgent_call' | 'caller_message';

const TITLES: Record<NotificationKind, string> = {
  urgent_call: 'Urgent Call',
  caller_message: 'New Caller Message',
};

export interface NotificationDispatcher {
  readonly name: string;
  notify(targetPhone: string, message: string, kind?: NotificationKind): Promise<boolean>;
}

export class BackendPushDispatcher implements NotificationDispatcher {
  readonly name = 'backend-push';

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string
  ) {}

  async notify(targetPhone: string, message: string, kind: NotificationKind = 'caller_message'): Promise<boolean> {
    try {
      const response = await fetch(`${this.baseUrl}/api/send-notification`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          user_phone: targetPhone,
          title: TITLES[kind],
          message,
          type: kind,
          action_required: kind === 'urgent_call',
          timestamp: dayjs().unix(),
        }),
      });

      if (!response.ok) {
        console.error(`[Notify] Backend push failed: ${response.status} ${await response.text()}`);
        return false;
      }
      console.log(`[Notify] ${kind} push sent to`, targetPhone);
      return true;
    } catch (error) {
      console.error('[Notify] Backend push error:', error);
      return false;
    }
  }
}

export class TwilioSmsDispatcher implements NotificationDispatcher {
  readonly name = 'twilio-sms';
  private readonly client: ReturnType<typeof twilio>;

  constructor(
    accountSid: string,
    authToken: string,
    private readonly fromNumber: string
  ) {
    this.client = twilio(accountSid, authToken);
  }

  async notify(targetPhone: string, message: string): Promise<boolean> {
    try {
      await this.client.messages.create({
        body: message,
        from: this.fromNumber,
        to: targetPhone,
      });
      console.log('[Notify] SMS sent to', targetPhone);
      return true;
    } catch (error) {
      console.error('[Notify] Failed to send SMS', error);
      return false;
    }
  }
}

export class LogOnlyDispatcher implements NotificationDispatcher {
  readonly name = 'log';

  async notify(targetPhone: string, message: string, kind: NotificationKind = 'caller_message'): Promise<boolean> {
    console.log(`[Notify] (log only) ${kind} to ${targetPhone || 'owner'}: ${message}`);
    return true;
  }
}

export function formatUnknownCallerMessage(facts: Facts): string {
  const details = facts.additionalDetails?.length
    ? ` Additional info: ${facts.additionalDetails.join(' | ')}`
    : '';
  return `Unknown caller: ${facts.name || 'Unknown caller'}. Purpose: ${facts.purpose || 'Not specified'}. Callback: ${facts.phone || 'Not provided'}${details}`;
}

export function formatUrgentMessage(message: string): string {
  return `URGENT: ${message}`;
}

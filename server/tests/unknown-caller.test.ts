/**
 * Unknown Caller Flow Tests
 * Message taking, follow-up questions and owner notifications
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Facts } from '@shared/schema';
import { handleTurn, processTurn } from '../ai/dialogueManager';
import type { FlowDeps } from '../ai/turnTypes';
import type { NotificationDispatcher } from '../services/notifications';
import { testDeps, turn } from './fixtures';

let deps: FlowDeps;

beforeEach(() => {
  deps = testDeps();
});

function fakeNotifier(impl: () => Promise<boolean> = () => Promise.resolve(true)) {
  const notify = vi.fn<NotificationDispatcher['notify']>(impl);
  const notifier: NotificationDispatcher = { name: 'fake', notify };
  return { notifier, notify };
}

describe('message taking', () => {
  it('asks a caller who only says hello for their name', async () => {
    const result = await processTurn(turn('hello', 'start', 'undetermined'), deps);
    expect(result.callerRole).toBe('unknown');
    expect(result.nextStage).toBe('asking_name');
    expect(result.responseText).toBe("May I know who's calling?");
  });

  it('acknowledges the name', async () => {
    const result = await processTurn(turn('My name is Asha', 'asking_name', 'unknown'), deps);
    expect(result.nextStage).toBe('asking_purpose');
    expect(result.facts.name).toBe('Asha');
    expect(result.responseText).toBe('Hi Asha! And what is the reason for your call?');
  });

  it('keeps a name given with thanks', async () => {
    const result = await processTurn(turn('Thanks, my name is Ravi', 'asking_name', 'unknown'), deps);
    expect(result.intent).toBe('ending_conversation');
    expect(result.nextStage).toBe('asking_purpose');
    expect(result.facts.name).toBe('Ravi');
    expect(result.responseText).toBe('Hi Ravi! And what is the reason for your call?');
  });

  it('ends the call on a goodbye instead of a name', async () => {
    const result = await processTurn(turn('thank you bye', 'asking_name', 'unknown'), deps);
    expect(result.nextStage).toBe('end_of_call');
    expect(result.facts.name).toBeUndefined();
    expect(result.ownerNotification).toBeUndefined();
  });

  it('takes a goodbye-sounding reply as the purpose', async () => {
    const result = await processTurn(
      turn('just wanted to say thanks for the help', 'asking_purpose', 'unknown', { name: 'Asha' }),
      deps
    );
    expect(result.nextStage).toBe('collecting_contact');
    expect(result.facts.purpose).toBe('just wanted to say thanks for the help');
  });

  it('asks again when no name was heard', async () => {
    const result = await processTurn(turn('hello', 'asking_name', 'unknown'), deps);
    expect(result.nextStage).toBe('asking_name');
    expect(result.responseText).toBe("I'm sorry, I didn't catch your name. Could you please spell it out?");
    expect(result.facts.stageAttempts).toEqual({ asking_name: 1 });
  });

  it('moves on without a name after the last attempt', async () => {
    const result = await processTurn(
      turn('hello', 'asking_name', 'unknown', { stageAttempts: { asking_name: 2 } }),
      deps
    );
    expect(result.nextStage).toBe('asking_purpose');
    expect(result.responseText).toBe('No problem. What is the reason for your call?');
  });

  it('goes straight to the callback number for simple calls', async () => {
    const result = await processTurn(turn('just returning your call', 'asking_purpose', 'unknown', { name: 'Ravi' }), deps);
    expect(result.nextStage).toBe('collecting_contact');
    expect(result.facts.purpose).toBe('just returning your call');
    expect(result.facts.followupPlan?.needsFollowup).toBe(false);
    expect(result.responseText).toBe("Got it. What's the best number for the owner to call you back on?");
  });
});

describe('follow-up questions', () => {
  it('walks a sponsorship call through both questions to the callback', async () => {
    const purpose = await processTurn(
      turn('I want to discuss a sponsorship deal', 'asking_purpose', 'unknown', { name: 'Asha' }),
      deps
    );
    expect(purpose.nextStage).toBe('asking_followup');
    expect(purpose.responseText).toBe(
      "I see you're interested in sponsorship. What type of sponsorship opportunity are you proposing?"
    );
    expect(purpose.facts.followupAsked).toBe(true);

    const first = await processTurn(turn('A cricket tournament', 'asking_followup', 'unknown', purpose.facts), deps);
    expect(first.nextStage).toBe('asking_second_followup');
    expect(first.responseText).toBe("And what's the scale or budget range you're considering?");

    const second = await processTurn(turn('About five lakh', 'asking_second_followup', 'unknown', first.facts), deps);
    expect(second.nextStage).toBe('collecting_contact');
    expect(second.facts.additionalDetails).toEqual(['A cricket tournament', 'About five lakh']);
    expect(second.facts.name).toBe('Asha');

    const contact = await processTurn(turn('call me at 9876543210', 'collecting_contact', 'unknown', second.facts), deps);
    expect(contact.nextStage).toBe('end_of_call');
    expect(contact.endCall).toBe(true);
    expect(contact.responseText).toBe(
      'Great, I have your number as 9 8 7 6 5 4 3 2 1 0. ' +
        "I'll make sure the owner gets all this information and calls you back. Thank you for calling, and have a wonderful day!"
    );
    expect(contact.ownerNotification).toBe(
      'Unknown caller: Asha. Purpose: I want to discuss a sponsorship deal. Callback: 9876543210 ' +
        'Additional info: A cricket tournament | About five lakh'
    );
  });
});

describe('callback number', () => {
  it('uses the calling number when asked to', async () => {
    const input = { ...turn('you can use this number', 'collecting_contact', 'unknown', { name: 'Asha' }), callerId: '+919999999999' };
    const result = await processTurn(input, deps);

    expect(result.intent).toBe('provide_self_number');
    expect(result.nextStage).toBe('end_of_call');
    expect(result.facts.phone).toBe('+919999999999');
    expect(result.responseText).toBe(
      'Okay, noted. The owner will call you back on the number you are calling from. Thank you!'
    );
  });

  it('falls back to the calling number after the last attempt', async () => {
    const facts: Facts = { name: 'Asha', stageAttempts: { collecting_contact: 2 } };
    const result = await processTurn(turn('not now', 'collecting_contact', 'unknown', facts), deps);
    expect(result.nextStage).toBe('end_of_call');
    expect(result.facts.phone).toBe("Caller's Number");
  });
});

describe('handleTurn', () => {
  it('notifies the owner of an urgent call and summarizes it', async () => {
    const { notifier, notify } = fakeNotifier();
    const result = await handleTurn(
      turn('this is urgent please call', 'asking_purpose', 'unknown', { name: 'Asha' }),
      { ...deps, notifier, ownerPhone: '+910000000000' }
    );

    expect(result.nextStage).toBe('end_of_call');
    expect(result.action).toEqual({ type: 'urgent_notification', message: 'Urgent call from Asha.' });
    expect(result.responseText).toBe('Okay, I understand this is urgent. I am notifying the owner immediately.');
    expect(notify).toHaveBeenCalledWith('+910000000000', 'URGENT: Urgent call from Asha.', 'urgent_call');
    expect(result.summary).toBe(
      'Asha called. Collected contact information and forwarded to the owner. Call completed successfully.'
    );
  });

  it('passes the message on when the caller says goodbye', async () => {
    const { notifier, notify } = fakeNotifier();
    const result = await handleTurn(
      turn('thank you bye', 'collecting_contact', 'unknown', { name: 'Asha', purpose: 'sponsorship' }),
      { ...deps, notifier, ownerPhone: '+910000000000' }
    );

    expect(result.responseText).toBe(
      "Thank you for calling. I'll make sure the owner gets your message. Have a great day!"
    );
    expect(notify).toHaveBeenCalledWith(
      '+910000000000',
      'Unknown caller: Asha. Purpose: sponsorship. Callback: Not provided',
      'caller_message'
    );
    expect(result.summary).toBe(
      'Asha called about sponsorship. Collected contact information and forwarded to the owner. Call completed successfully.'
    );
  });

  it('skips notifications without an owner number', async () => {
    const { notifier, notify } = fakeNotifier();
    await handleTurn(turn('this is urgent', 'asking_name', 'unknown'), { ...deps, notifier, ownerPhone: '' });
    expect(notify).not.toHaveBeenCalled();
  });

  it('finishes the turn when the notifier fails', async () => {
    const { notifier } = fakeNotifier(() => Promise.reject(new Error('offline')));
    const result = await handleTurn(
      turn('this is urgent', 'asking_name', 'unknown'),
      { ...deps, notifier, ownerPhone: '+910000000000' }
    );
    expect(result.endCall).toBe(true);
    expect(result.action.type).toBe('urgent_notification');
  });

  it('leaves mid-call turns without a summary', async () => {
    const { notifier, notify } = fakeNotifier();
    const result = await handleTurn(turn('My name is Asha', 'asking_name', 'unknown'), {
      ...deps,
      notifier,
      ownerPhone: '+910000000000',
    });
    expect(result.summary).toBeUndefined();
    expect(notify).not.toHaveBeenCalled();
  });
});

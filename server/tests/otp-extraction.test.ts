/**
 * OTP Extraction Tests
 */

import { describe, it, expect } from 'vitest';
import type { ParsedMessage } from '@shared/schema';
import {
  detectCompanyFromSender,
  extractDeliveryDetails,
  findBestMatch,
  parseBatch,
  parseMessage,
  suggestAlternatives,
  SUPPORTED_COMPANIES,
} from '../services/otpExtraction';

const ZOMATO_SMS = { sender: 'VM-ZOMATO', message: 'Your Zomato order OTP is 4821. Order ID: ZMT123456789' };
const SWIGGY_SMS = {
  sender: 'AD-SWIGGY',
  message: 'Swiggy: Share code 5530 with your delivery partner Ravi. Arriving in 10 mins',
};
const BANK_SMS = { sender: 'HDFCBK', message: 'Use 889911 as your one time password' };

describe('parseMessage', () => {
  it('uses the company pattern and clamps the score', () => {
    expect(parseMessage(ZOMATO_SMS.message, 'Zomato', ZOMATO_SMS.sender)).toEqual({
      rawText: ZOMATO_SMS.message,
      sender: 'VM-ZOMATO',
      otp: '4821',
      trackingId: 'ZMT123456789',
      companyGuess: 'zomato',
      confidence: 1,
    });
  });

  it('auto-detects the company from the body', () => {
    const parsed = parseMessage('Your Amazon delivery PIN is 667012. Tracking ID AMZN12345678901');
    expect(parsed.companyGuess).toBe('amazon');
    expect(parsed.otp).toBe('667012');
    expect(parsed.trackingId).toBe('AMZN12345678901');
  });

  it('keeps the generic confidence when both find the same digits', () => {
    const parsed = parseMessage('Your code is 4821', 'Zomato');
    expect(parsed.otp).toBe('4821');
    expect(parsed.confidence).toBe(0.8);
    expect(parsed.companyGuess).toBeUndefined();
  });

  it('falls back to the generic cascade and the sender id', () => {
    const parsed = parseMessage(BANK_SMS.message, undefined, BANK_SMS.sender);
    expect(parsed.otp).toBe('889911');
    expect(parsed.confidence).toBe(0.7);
    expect(parsed.companyGuess).toBe('banking');
  });

  it('does not credit the expected company for another company\'s SMS', () => {
    const parsed = parseMessage(SWIGGY_SMS.message, 'Zomato', SWIGGY_SMS.sender);
    expect(parsed.otp).toBe('5530');
    expect(parsed.companyGuess).toBe('swiggy');
  });

  it('returns no OTP for plain text', () => {
    const parsed = parseMessage('Your parcel is out for delivery');
    expect(parsed.otp).toBeUndefined();
    expect(parsed.confidence).toBe(0);
  });
});

describe('confidence across the company table', () => {
  const unnamedBodies = {
    otpOnly: 'Your OTP is 4821',
    otpAndTracking: 'Your OTP is 4821. Order ABCD12345678',
    trackingOnly: 'Order ABCD12345678 is on the way',
  };

  for (const company of SUPPORTED_COMPANIES) {
    it(`scores ${company} messages within [0, 1]`, () => {
      const named = [
        parseMessage(`Your ${company} OTP is 4821`, company),
        parseMessage(`Your ${company} OTP is 4821. Order ABCD12345678`, company),
        parseMessage(`Your ${company} order ABCD12345678 is on the way`, company),
      ];
      expect(named.map(p => p.confidence)).toEqual([1, 1, 1]);
      expect(named.map(p => p.companyGuess)).toEqual([company, company, company]);
      expect(named.map(p => p.otp)).toEqual(['4821', '4821', undefined]);
      expect(named.map(p => p.trackingId)).toEqual([undefined, 'ABCD12345678', 'ABCD12345678']);
    });

    it(`never scores the ${company} pattern below the generic cascade`, () => {
      for (const body of Object.values(unnamedBodies)) {
        const withCompany = parseMessage(body, company);
        const generic = parseMessage(body);
        expect(withCompany.confidence).toBeLessThanOrEqual(1);
        expect(withCompany.confidence).toBeGreaterThanOrEqual(generic.confidence - 1e-9);
      }
    });
  }
});

describe('detectCompanyFromSender', () => {
  it('maps sender ids', () => {
    expect(detectCompanyFromSender('VM-ZOMATO')).toBe('zomato');
    expect(detectCompanyFromSender('JD-ICICIB')).toBe('banking');
    expect(detectCompanyFromSender('')).toBe('unknown');
  });
});

describe('findBestMatch', () => {
  it('prefers the target company over the most recent message', () => {
    const parsed = parseBatch([SWIGGY_SMS, ZOMATO_SMS], 'Zomato');
    const best = findBestMatch(parsed, 'Zomato');
    expect(best?.match.otp).toBe('4821');
    expect(best?.score).toBe(120);
    expect(best?.fallbackUsed).toBe(false);
  });

  it('takes the most confident OTP when nothing scores', () => {
    const candidates: ParsedMessage[] = [
      { rawText: 'hello', sender: '', confidence: 0 },
      { rawText: 'a', sender: '', otp: '1111', confidence: 0 },
    ];
    const best = findBestMatch(candidates, 'Zomato');
    expect(best).toEqual({ match: candidates[1], score: 0, fallbackUsed: true });
  });

  it('returns null without any OTP', () => {
    expect(findBestMatch([{ rawText: 'hi', sender: '', confidence: 0.5 }], 'Zomato')).toBeNull();
    expect(findBestMatch([], 'Zomato')).toBeNull();
  });
});

describe('suggestAlternatives', () => {
  it('ranks OTP-bearing messages by confidence with reasons', () => {
    const parsed = parseBatch([SWIGGY_SMS, BANK_SMS]);
    expect(suggestAlternatives(parsed)).toEqual([
      { otp: '5530', company: 'swiggy', sender: 'AD-SWIGGY', confidence: 1, reasoning: 'high confidence, most recent, from swiggy' },
      { otp: '889911', company: 'banking', sender: 'HDFCBK', confidence: 0.7, reasoning: 'good confidence, from banking' },
    ]);
  });
});

describe('extractDeliveryDetails', () => {
  it('finds the courier name and ETA', () => {
    expect(extractDeliveryDetails(SWIGGY_SMS.message)).toEqual({ deliveryPerson: 'Ravi', estimatedTime: '10 mins' });
  });

  it('finds a courier phone number', () => {
    expect(extractDeliveryDetails('Call your driver Suresh on 9876543210').deliveryPhone).toBe('9876543210');
  });
});

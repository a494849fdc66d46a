/**
 * Text, phone and language helper tests
 */

import { describe, it, expect } from 'vitest';
import {
  cleanLocationText,
  extractSpokenCode,
  limitWords,
  parseSpokenDigits,
  titleCase,
} from '../utils/text';
import { extractPhoneNumber, formatDigitsForSpeech, normalizePhoneNumber } from '../utils/phone';
import { detectLanguage } from '../utils/language';
import { say } from '../utils/say';

describe('titleCase', () => {
  it('capitalizes each word', () => {
    expect(titleCase('big basket')).toBe('Big Basket');
    expect(titleCase('  ZOMATO ')).toBe('Zomato');
  });
});

describe('cleanLocationText', () => {
  it('drops the lead-in and trailing "now"', () => {
    expect(cleanLocationText('I am at Koramangala now.')).toBe('Koramangala');
    expect(cleanLocationText("I'm near Sony Signal")).toBe('Sony Signal');
  });

  it('keeps a bare place name', () => {
    expect(cleanLocationText('indiranagar')).toBe('Indiranagar');
  });
});

describe('spoken codes', () => {
  it('turns digit words into digits', () => {
    expect(parseSpokenDigits('four eight two one')).toBe('4821');
    expect(parseSpokenDigits('my code is 4 8 2 1')).toBe('4821');
  });

  it('mixes in Hindi digit words', () => {
    expect(parseSpokenDigits('ek teen paanch saat')).toBe('1357');
  });

  it('ignores runs that are too short', () => {
    expect(parseSpokenDigits('one two')).toBeUndefined();
  });

  it('prefers written numerals', () => {
    expect(extractSpokenCode('the otp is 4821')).toBe('4821');
    expect(extractSpokenCode('it is five five three zero')).toBe('5530');
    expect(extractSpokenCode('I do not know')).toBeUndefined();
  });
});

describe('limitWords', () => {
  it('cuts long text and marks the cut', () => {
    expect(limitWords('a b c d', 2)).toBe('a b...');
    expect(limitWords('a b', 2)).toBe('a b');
  });
});

describe('phone helpers', () => {
  it('finds a plain ten digit number', () => {
    expect(extractPhoneNumber('call me at 9876543210')).toBe('9876543210');
  });

  it('joins a grouped number', () => {
    expect(extractPhoneNumber('my number is (965) 060-6105')).toBe('9650606105');
  });

  it('returns undefined without a number', () => {
    expect(extractPhoneNumber('call me later')).toBeUndefined();
    expect(extractPhoneNumber('')).toBeUndefined();
  });

  it('normalizes to +91', () => {
    expect(normalizePhoneNumber('9876543210')).toBe('+919876543210');
    expect(normalizePhoneNumber('919876543210')).toBe('+919876543210');
    expect(normalizePhoneNumber('12345')).toBe('12345');
    expect(normalizePhoneNumber('none')).toBeUndefined();
  });

  it('spaces digits for speech', () => {
    expect(formatDigitsForSpeech('98-765')).toBe('9 8 7 6 5');
  });
});

describe('detectLanguage', () => {
  it('detects Devanagari', () => {
    expect(detectLanguage('मुझे मदद चाहिए')).toBe('hi');
  });

  it('detects romanized Hindi with two keywords', () => {
    expect(detectLanguage('bhaiya madad chahiye')).toBe('hi');
  });

  it('falls back otherwise', () => {
    expect(detectLanguage('I have a parcel')).toBe('en');
    expect(detectLanguage('', 'hi')).toBe('hi');
  });
});

describe('say', () => {
  it('fills placeholders', () => {
    expect(say('en', 'otp_found', { company: 'Zomato', otp: '4 8 2 1' })).toBe(
      "I found your Zomato OTP! It's 4 8 2 1. Thank you and have a safe delivery!"
    );
  });

  it('leaves unfilled placeholders in place', () => {
    expect(say('en', 'name_ack')).toBe('Hi {name}! And what is the reason for your call?');
  });
});

/**
 * Speech Helpers Tests
 * Yes/no classification and the cue lists the call flows branch on
 */

import { describe, it, expect } from 'vitest';
import {
  classifyYesNo,
  hasAnyCue,
  hasArrived,
  isAffirmative,
  isGreeting,
  isLost,
  isNegative,
  isUrgent,
  normalizeUtterance,
  wantsDirections,
} from '../utils/speech-helpers';

describe('classifyYesNo', () => {
  const yes = ['yes', 'Yes please', 'okay sure', 'haan', 'हाँ', 'go ahead'];
  yes.forEach(reply => {
    it(`reads "${reply}" as yes`, () => {
      expect(classifyYesNo(reply)).toBe('yes');
    });
  });

  const no = ['no', 'nope', 'नहीं', "I don't need it", 'no need', 'nahi chahiye'];
  no.forEach(reply => {
    it(`reads "${reply}" as no`, () => {
      expect(classifyYesNo(reply)).toBe('no');
    });
  });

  it('lets NO win when both appear', () => {
    expect(classifyYesNo('yeah no')).toBe('no');
    expect(classifyYesNo('okay, not right now')).toBe('no');
  });

  it('returns unclear when neither appears', () => {
    expect(classifyYesNo('maybe later')).toBe('unclear');
    expect(classifyYesNo('')).toBe('unclear');
  });

  it('backs isAffirmative and isNegative', () => {
    expect(isAffirmative('sure')).toBe(true);
    expect(isNegative('sure')).toBe(false);
    expect(isNegative('nope')).toBe(true);
  });
});

describe('hasAnyCue', () => {
  it('matches latin cues on word boundaries only', () => {
    expect(hasAnyCue('I know the place', ['no'])).toBe(false);
    expect(hasAnyCue('no, wrong house', ['no'])).toBe(true);
  });

  it('matches multi-word cues', () => {
    expect(hasAnyCue('I am at the gate now', ['at the gate'])).toBe(true);
  });

  it('matches Devanagari cues token by token', () => {
    expect(hasAnyCue('मैं पहुंच गया', ['पहुंच'])).toBe(true);
    expect(hasAnyCue('मैं पहुंचा', ['पहुंच'])).toBe(false);
  });
});

describe('normalizeUtterance', () => {
  it('lowercases, strips punctuation and collapses spaces', () => {
    expect(normalizeUtterance('  Hello,   there!  ')).toBe('hello there');
  });
});

describe('flow cues', () => {
  it('spots a request for directions', () => {
    expect(wantsDirections('I need directions')).toBe(true);
    expect(wantsDirections('fine thanks')).toBe(false);
  });

  it('spots arrival', () => {
    expect(hasArrived("I'm at the gate")).toBe(true);
    expect(hasArrived('मैं आ गया')).toBe(true);
  });

  it('spots a lost courier', () => {
    expect(isLost("I can't find the building")).toBe(true);
  });

  it('spots greetings without matching inside words', () => {
    expect(isGreeting('hello there')).toBe(true);
    expect(isGreeting('this is nothing')).toBe(false);
  });

  it('spots urgency', () => {
    expect(isUrgent('this is urgent')).toBe(true);
    expect(isUrgent('यह जरूरी है')).toBe(true);
    expect(isUrgent('whenever is fine')).toBe(false);
  });
});

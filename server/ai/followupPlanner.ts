/**
 * Followup Planner - decides whether an unknown caller's purpose deserves
 * one or two extra questions before we take a callback number.
 */

import type { FollowupPlan } from '@shared/schema';
import type { LanguageModel } from './languageModel';
import { hasAnyCue } from '../utils/speech-helpers';

const BUSINESS_KEYWORDS = [
  'sponsorship', 'business', 'collaboration', 'partnership',
  'investment', 'project', 'proposal', 'meeting', 'interview',
  'opportunity', 'deal', 'funding', 'venture', 'startup',
  'media', 'press', 'journalist', 'article', 'feature',
];

interface RulePlan {
  keywords: string[];
  plan: FollowupPlan;
}

// Checked in order; the first rule with a keyword hit wins
const RULES: RulePlan[] = [
  {
    keywords: ['sponsorship'],
    plan: {
      needsFollowup: true,
      importance: 'high',
      firstQuestion: "I see you're interested in sponsorship. What type of sponsorship opportunity are you proposing?",
      secondQuestion: "And what's the scale or budget range you're considering?",
      reasoning: 'Sponsorship needs its type and scale to be evaluated',
    },
  },
  {
    keywords: ['investment', 'funding', 'venture'],
    plan: {
      needsFollowup: true,
      importance: 'high',
      firstQuestion: 'I understand this is about investment. What kind of investment opportunity are you proposing?',
      secondQuestion: 'What stage is your company or project currently at?',
      reasoning: 'Investment opportunities need their type and maturity stage',
    },
  },
  {
    keywords: ['business', 'collaboration', 'partnership'],
    plan: {
      needsFollowup: true,
      importance: 'medium',
      firstQuestion: 'That sounds interesting! Can you tell me more about the nature of this business opportunity?',
      secondQuestion: 'What timeline are you looking at for this collaboration?',
      reasoning: 'Business opportunities need scope and timeline',
    },
  },
  {
    keywords: ['media', 'press', 'journalist', 'article'],
    plan: {
      needsFollowup: true,
      importance: 'medium',
      firstQuestion: 'I see this is a media inquiry. What publication or outlet are you with?',
      secondQuestion: "What's the focus or angle of the story you're working on?",
      reasoning: 'Media requests need the outlet and the story angle',
    },
  },
];

const GENERIC_PLAN: FollowupPlan = {
  needsFollowup: true,
  importance: 'medium',
  firstQuestion: "That sounds important! Could you provide a bit more detail about what you'd like to discuss?",
  secondQuestion: 'What would be the best time frame for the owner to get back to you on this?',
  reasoning: 'Professional inquiry needs more context and timing',
};

const NO_FOLLOWUP: FollowupPlan = {
  needsFollowup: false,
  importance: 'low',
  reasoning: "Simple inquiry that doesn't need follow-up questions",
};

export function ruleBasedFollowup(purpose: string): FollowupPlan {
  if (!hasAnyCue(purpose, BUSINESS_KEYWORDS)) {
    return { ...NO_FOLLOWUP };
  }
  const rule = RULES.find(r => hasAnyCue(purpose, r.keywords));
  return { ...(rule ? rule.plan : GENERIC_PLAN) };
}

/**
 * Ask the model first, fall back to keyword rules on any failure.
 */
export async function planFollowup(purpose: string, name: string | undefined, model?: LanguageModel): Promise<FollowupPlan> {
  if (model) {
    try {
      const plan = await model.planFollowup(purpose, name);
      console.log(`[FollowupPlanner] Model plan: followup=${plan.needsFollowup} importance=${plan.importance}`);
      return plan;
    } catch (error) {
      console.warn('[FollowupPlanner] Model planning failed, using rules:', error instanceof Error ? error.message : error);
    }
  }
  return ruleBasedFollowup(purpose);
}

/**
 * AI Module - conversation layer for doorline
 *
 * - Intent classification and caller-role detection
 * - Fact extraction (language model first, rules as fallback)
 * - Followup planning for unknown callers
 * - The delivery and unknown-caller stage graphs
 *
 * Usage:
 *   import { handleTurn, reprocessSms } from './ai';
 */

// LLM Provider
export {
  complete,
  completeJson,
  getAvailableProvider,
  type LLMCredentials,
  type LLMMessage,
  type LLMOptions,
  type LLMResponse
} from './llmProvider';

// Language Model capability
export { LlmLanguageModel, type LanguageModel } from './languageModel';

// Intent Router
export {
  classifyIntent,
  describeIntent,
  identifyCallerRole,
  INTENT_TYPES,
  type IntentType
} from './intentRouter';

// Information Extractor
export {
  extractFacts,
  extractCompanyFromText,
  findKnownCompany,
  mergeFacts,
  ruleBasedExtract
} from './informationExtractor';

// Followup Planner
export { planFollowup, ruleBasedFollowup } from './followupPlanner';

// Stage graphs
export { reprocessSms, type ReprocessInput } from './deliveryFlow';

// Dialogue Manager
export {
  processTurn,
  handleTurn,
  type Orchestration
} from './dialogueManager';

export type { FlowDeps, TurnInput, TurnResult } from './turnTypes';

import type {
  CallerRole,
  Facts,
  HistoryTurn,
  Language,
  SideEffectAction,
  Stage,
} from '@shared/schema';
import type { GeoPoint, LocationService } from '../services/location';
import type { OrderLedger } from '../services/orderLedger';
import type { IntentType } from './intentRouter';
import type { LanguageModel } from './languageModel';

export interface TurnInput {
  utterance: string;
  callerRole: CallerRole;
  stage: Stage;
  facts: Facts;
  history: HistoryTurn[];
  language: Language;
  /** Number the caller is ringing from, when telephony knows it */
  callerId?: string;
}

/** What the state machine may consult while deciding a turn */
export interface FlowDeps {
  languageModel?: LanguageModel;
  location: LocationService;
  ledger: OrderLedger;
  home: GeoPoint & { address: string };
  maxStageAttempts: number;
}

export interface TurnResult {
  responseText: string;
  nextStage: Stage;
  facts: Facts;
  action: SideEffectAction;
  history: HistoryTurn[];
  callerRole: CallerRole;
  intent: IntentType;
  endCall: boolean;
  requiresSms: boolean;
  companyRequested?: string;
  /** Message for the owner, sent by the orchestrator */
  ownerNotification?: string;
  summary?: string;
}

/** One stage handler's decision */
export interface StepResult<S extends Stage> {
  responseText: string;
  nextStage: S;
  facts: Facts;
  action?: SideEffectAction;
  endCall?: boolean;
  requiresSms?: boolean;
  companyRequested?: string;
  ownerNotification?: string;
  /** Input was not understood; counts against the stage's retry budget */
  retry?: boolean;
}

export interface StageContext {
  utterance: string;
  intent: IntentType;
  facts: Facts;
  language: Language;
  callerId?: string;
  /** Unrecognized turns already spent at this stage */
  attempts: number;
  deps: FlowDeps;
}

export function isLastAttempt(ctx: StageContext): boolean {
  return ctx.attempts + 1 >= ctx.deps.maxStageAttempts;
}

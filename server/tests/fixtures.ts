import type { Facts, Stage } from '@shared/schema';
import type { FlowDeps, TurnInput } from '../ai/turnTypes';
import { OfflineLocationService } from '../services/location';
import { OrderLedger } from '../services/orderLedger';

export const HOME = { lat: 0, lng: 0, address: '12 Test Street' };

// 0.01 degrees due north of HOME, about 1.1 km
export const TEST_LANDMARKS = [
  { name: 'Test Market', aliases: ['test market'], lat: 0.01, lng: 0, address: '1 Market Road' },
];

export function sequentialIds(prefix = 'order') {
  let n = 0;
  return () => `${prefix}-${++n}`;
}

export function testDeps(overrides: Partial<FlowDeps> = {}): FlowDeps {
  return {
    location: new OfflineLocationService(HOME, TEST_LANDMARKS),
    ledger: new OrderLedger({ generateId: sequentialIds(), now: () => '2026-01-01T00:00:00.000Z' }),
    home: HOME,
    maxStageAttempts: 3,
    ...overrides,
  };
}

export function turn(
  utterance: string,
  stage: Stage,
  callerRole: TurnInput['callerRole'],
  facts: Facts = {}
): TurnInput {
  return { utterance, stage, callerRole, facts, history: [], language: 'en' };
}

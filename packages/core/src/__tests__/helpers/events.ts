import { v4 as uuidv4 } from 'uuid';
import type { EventEnvelope, JsonValue } from '@streamvault/types';

const CORRELATION_ID = '0f8fad5b-d9cb-469f-a165-70867728950e';

/**
 * Committed-looking envelope for tests that bypass the journal
 */
export function createTestEvent(overrides: Partial<EventEnvelope> = {}): EventEnvelope {
  return {
    eventId: uuidv4(),
    streamId: 'stream-1',
    version: 1,
    type: 'Deposited',
    payload: { amount: 1 },
    correlationId: CORRELATION_ID,
    causationId: null,
    occurredAt: '2026-04-01T08:00:00.000Z',
    ...overrides,
  };
}

export function eventAt(streamId: string, version: number, payload: JsonValue = { amount: version }): EventEnvelope {
  return createTestEvent({ streamId, version, payload });
}

/**
 * Consecutive envelopes fromVersion..toVersion
 */
export function eventRange(streamId: string, fromVersion: number, toVersion: number): EventEnvelope[] {
  const events: EventEnvelope[] = [];
  for (let version = fromVersion; version <= toVersion; version++) {
    events.push(eventAt(streamId, version));
  }
  return events;
}

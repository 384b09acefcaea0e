import { z } from 'zod';
import { defineAggregate } from '../../cqrs/aggregate.js';

/**
 * Small aggregate used across the rehydration and command tests
 */

export interface CounterState {
  total: number;
  count: number;
}

export type CounterEvents = {
  Incremented: { by: number };
  Reset: { reason: string };
};

export const counterAggregate = defineAggregate<CounterState, CounterEvents>({
  name: 'Counter',
  initialState: { total: 0, count: 0 },
  stateSchema: z.object({ total: z.number(), count: z.number().int() }),
  schemas: {
    Incremented: z.object({ by: z.number().int() }),
    Reset: z.object({ reason: z.string() }),
  },
  handlers: {
    Incremented: (state, { by }) => ({ total: state.total + by, count: state.count + 1 }),
    Reset: (state) => ({ total: 0, count: state.count + 1 }),
  },
});

export function increment(by: number): { type: 'Incremented'; payload: { by: number } } {
  return { type: 'Incremented', payload: { by } };
}

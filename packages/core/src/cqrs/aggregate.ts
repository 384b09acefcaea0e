/**
 * CQRS Aggregate Definitions
 *
 * An aggregate is a pure fold over its stream:
 * - one zod payload schema per event type
 * - one handler per event type (the handler table is exhaustive over the event map)
 * - a state schema used to decode snapshots
 */

import type { z } from 'zod';
import { JsonValueSchema, type EventEnvelope, type JsonValue, type NewEvent } from '@streamvault/types';
import { UnknownEventTypeError, ValidationError } from '../errors.js';

// ============================================================================
// CORE TYPES
// ============================================================================

/** Event type name → payload type */
export type EventMap = Record<string, unknown>;

export type EventSchemas<TEvents extends EventMap> = {
  [K in keyof TEvents]: z.ZodType<TEvents[K], z.ZodTypeDef, unknown>;
};

export type EventHandlers<TState, TEvents extends EventMap> = {
  [K in keyof TEvents]: (state: TState, payload: TEvents[K], event: EventEnvelope) => TState;
};

export interface AggregateConfig<TState, TEvents extends EventMap> {
  name: string;
  initialState: TState;
  stateSchema: z.ZodType<TState, z.ZodTypeDef, unknown>;
  schemas: EventSchemas<TEvents>;
  handlers: EventHandlers<TState, TEvents>;
}

export type EventType<TEvents extends EventMap> = keyof TEvents & string;

/** Metadata a command may attach to the events it emits */
export interface EventMetadata {
  eventId?: string;
  correlationId?: string;
  causationId?: string | null;
}

// ============================================================================
// AGGREGATE DEFINITION
// ============================================================================

export class AggregateDefinition<TState, TEvents extends EventMap> {
  readonly name: string;
  readonly initialState: TState;

  constructor(private readonly config: AggregateConfig<TState, TEvents>) {
    this.name = config.name;
    this.initialState = config.initialState;
  }

  isKnownType(type: string): type is EventType<TEvents> {
    return Object.prototype.hasOwnProperty.call(this.config.handlers, type);
  }

  /**
   * Apply one committed event to a state
   */
  fold(state: TState, event: EventEnvelope): TState {
    if (!this.isKnownType(event.type)) {
      throw new UnknownEventTypeError(this.name, event.type);
    }
    return this.applyTyped(state, event.type, event);
  }

  foldAll(state: TState, events: Iterable<EventEnvelope>): TState {
    let current = state;
    for (const event of events) {
      current = this.fold(current, event);
    }
    return current;
  }

  /**
   * Build a NewEvent for this aggregate, validating the payload first
   */
  createEvent<K extends EventType<TEvents>>(
    type: K,
    payload: TEvents[K],
    metadata: EventMetadata = {}
  ): NewEvent {
    const parsed = this.config.schemas[type].safeParse(payload);
    if (!parsed.success) {
      throw new ValidationError(`Invalid ${this.name}.${type} payload`, parsed.error.flatten());
    }
    return { type, payload: toJsonValue(parsed.data), ...metadata };
  }

  encodeState(state: TState): JsonValue {
    return toJsonValue(state);
  }

  decodeState(json: JsonValue): TState {
    const parsed = this.config.stateSchema.safeParse(json);
    if (!parsed.success) {
      throw new ValidationError(`Invalid ${this.name} snapshot state`, parsed.error.flatten());
    }
    return parsed.data;
  }

  private applyTyped<K extends EventType<TEvents>>(
    state: TState,
    type: K,
    event: EventEnvelope
  ): TState {
    const schema = this.config.schemas[type];
    const handler = this.config.handlers[type];

    const parsed = schema.safeParse(event.payload);
    if (!parsed.success) {
      throw new ValidationError(
        `Invalid ${this.name}.${type} payload at ${event.streamId}@${event.version}`,
        parsed.error.flatten()
      );
    }
    return handler(state, parsed.data, event);
  }
}

/**
 * Declare an aggregate
 *
 * @example
 * ```typescript
 * type CounterEvents = { Incremented: { by: number } };
 *
 * const counter = defineAggregate<{ total: number }, CounterEvents>({
 *   name: 'Counter',
 *   initialState: { total: 0 },
 *   stateSchema: z.object({ total: z.number() }),
 *   schemas: { Incremented: z.object({ by: z.number() }) },
 *   handlers: { Incremented: (state, { by }) => ({ total: state.total + by }) },
 * });
 * ```
 */
export function defineAggregate<TState, TEvents extends EventMap>(
  config: AggregateConfig<TState, TEvents>
): AggregateDefinition<TState, TEvents> {
  return new AggregateDefinition(config);
}

/**
 * Fold a single event with a definition
 * @throws UnknownEventTypeError when the definition has no handler for the type
 * @throws ValidationError when the payload does not match the type's schema
 */
export function foldEvent<TState, TEvents extends EventMap>(
  definition: AggregateDefinition<TState, TEvents>,
  state: TState,
  event: EventEnvelope
): TState {
  return definition.fold(state, event);
}

/**
 * Normalize a value to plain JSON (drops undefined, serializes Dates)
 */
export function toJsonValue(value: unknown): JsonValue {
  const serialized = JSON.stringify(value);
  if (typeof serialized !== 'string') {
    throw new ValidationError('Value is not JSON-serializable');
  }
  return JsonValueSchema.parse(JSON.parse(serialized));
}

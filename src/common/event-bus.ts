import type { FastifyBaseLogger } from 'fastify';
import { v4 as uuid } from 'uuid';
import type { DomainEvent } from './types.js';
import type { EventPayloads, EventType } from '../modules/events/events.types.js';

export type TypedEvent<K extends EventType> = DomainEvent<EventPayloads[K]> & { type: K };

export type EventHandler<K extends EventType> = (event: TypedEvent<K>) => void | Promise<void>;

type HandlerTable = { [K in EventType]?: EventHandler<K>[] };

/**
 * Handlers run after the publishing call returns, so a slow subscriber (such as
 * notification fan-out) never sits on the request path. `drain()` resolves once
 * every dispatched handler has settled.
 */
export class InMemoryEventBus {
  private handlers: HandlerTable = {};
  private inFlight = new Set<Promise<void>>();

  constructor(private readonly logger?: FastifyBaseLogger) {}

  publish<K extends EventType>(type: K, tenantId: string, payload: EventPayloads[K]): TypedEvent<K> {
    const event: TypedEvent<K> = { id: uuid(), type, occurredAt: new Date().toISOString(), tenantId, payload };
    const list = this.handlers[type] ?? [];
    for (const handler of list) {
      this.dispatch(event, handler);
    }
    return event;
  }

  subscribe<K extends EventType>(type: K, handler: EventHandler<K>) {
    const list: EventHandler<K>[] = (this.handlers[type] ??= []);
    list.push(handler);
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
  }

  private dispatch<K extends EventType>(event: TypedEvent<K>, handler: EventHandler<K>) {
    const task = new Promise<void>(resolve => setImmediate(resolve))
      .then(() => handler(event))
      .catch(err => {
        this.logger?.error({ err, eventId: event.id, eventType: event.type }, 'Event handler failed');
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }
}

export function createEventBus(logger?: FastifyBaseLogger): InMemoryEventBus {
  return new InMemoryEventBus(logger);
}

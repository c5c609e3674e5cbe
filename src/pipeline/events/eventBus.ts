/**
 * Event Bus
 *
 * In-process publish/subscribe with named topics.
 *
 * - publish() returns immediately; delivery happens on a later tick
 * - per topic, handlers are invoked in publish order
 * - a throwing or rejecting handler is logged and affects nobody else
 * - subscribers only see events published after they subscribed
 */

import { randomUUID } from 'crypto';
import type { Logger } from 'pino';
import { createComponentLogger, serializeError } from '../../service/logger';

// ============================================================================
// Types
// ============================================================================

export interface BusEvent<TEvents, K extends keyof TEvents = keyof TEvents> {
  id: string;
  topic: K;
  published_at: string;
  payload: TEvents[K];
}

export type EventHandler<TEvents, K extends keyof TEvents> =
  (event: BusEvent<TEvents, K>) => void | Promise<void>;

export type Unsubscribe = () => void;

export interface EventBus<TEvents> {
  publish<K extends keyof TEvents & string>(topic: K, payload: TEvents[K]): string;
  subscribe<K extends keyof TEvents & string>(topic: K, handler: EventHandler<TEvents, K>): Unsubscribe;
  /** Most recent published events, newest last */
  recent<K extends keyof TEvents & string>(topic: K, limit?: number): Array<BusEvent<TEvents, K>>;
  recent(topic?: undefined, limit?: number): Array<BusEvent<TEvents>>;
  /** Resolves once every queued event is delivered and every handler has settled */
  idle(): Promise<void>;
}

export interface EventBusOptions {
  logger?: Logger;
  /** Published events kept for recent() */
  historySize?: number;
}

interface Delivery<TEvents> {
  event: BusEvent<TEvents>;
  handlers: Array<(event: BusEvent<TEvents>) => void | Promise<void>>;
}

// ============================================================================
// Implementation
// ============================================================================

export class InProcessEventBus<TEvents> implements EventBus<TEvents> {
  private subscribers = new Map<string, Array<(event: BusEvent<TEvents>) => void | Promise<void>>>();
  private queues = new Map<string, Array<Delivery<TEvents>>>();
  private draining = new Set<string>();
  private inFlight = new Set<Promise<void>>();
  private history: Array<BusEvent<TEvents>> = [];
  private logger: Logger;
  private historySize: number;

  constructor(options: EventBusOptions = {}) {
    this.logger = options.logger ?? createComponentLogger('event-bus');
    this.historySize = options.historySize ?? 500;
  }

  publish<K extends keyof TEvents & string>(topic: K, payload: TEvents[K]): string {
    const event: BusEvent<TEvents, K> = {
      id: randomUUID(),
      topic,
      published_at: new Date().toISOString(),
      payload
    };

    this.history.push(event);
    if (this.history.length > this.historySize) {
      this.history = this.history.slice(-this.historySize);
    }

    const handlers = [...(this.subscribers.get(topic) ?? [])];
    const queue = this.queues.get(topic) ?? [];
    queue.push({ event, handlers });
    this.queues.set(topic, queue);

    this.logger.debug({ topic, eventId: event.id, subscribers: handlers.length }, 'Event published');

    if (!this.draining.has(topic)) {
      this.draining.add(topic);
      setImmediate(() => this.drain(topic));
    }

    return event.id;
  }

  subscribe<K extends keyof TEvents & string>(topic: K, handler: EventHandler<TEvents, K>): Unsubscribe {
    const wrapped = (event: BusEvent<TEvents>): void | Promise<void> => {
      if (isTopic(event, topic)) {
        return handler(event);
      }
    };

    const handlers = this.subscribers.get(topic) ?? [];
    handlers.push(wrapped);
    this.subscribers.set(topic, handlers);

    return () => {
      const current = this.subscribers.get(topic) ?? [];
      this.subscribers.set(topic, current.filter(h => h !== wrapped));
    };
  }

  recent<K extends keyof TEvents & string>(topic: K, limit?: number): Array<BusEvent<TEvents, K>>;
  recent(topic?: undefined, limit?: number): Array<BusEvent<TEvents>>;
  recent(topic?: keyof TEvents & string, limit = 50): Array<BusEvent<TEvents>> {
    const events = topic === undefined
      ? this.history
      : this.history.filter(event => isTopic(event, topic));
    return events.slice(-limit);
  }

  async idle(): Promise<void> {
    while (this.draining.size > 0 || this.inFlight.size > 0) {
      if (this.inFlight.size > 0) {
        await Promise.allSettled([...this.inFlight]);
      } else {
        await new Promise<void>(resolve => setImmediate(resolve));
      }
    }
  }

  private drain(topic: string): void {
    const queue = this.queues.get(topic) ?? [];
    this.queues.delete(topic);
    this.draining.delete(topic);

    for (const { event, handlers } of queue) {
      for (const handler of handlers) {
        this.invoke(handler, event);
      }
    }
  }

  private invoke(handler: (event: BusEvent<TEvents>) => void | Promise<void>, event: BusEvent<TEvents>): void {
    let result: void | Promise<void>;
    try {
      result = handler(event);
    } catch (error) {
      this.reportFailure(event, error);
      return;
    }

    if (result instanceof Promise) {
      const tracked = result.then(
        () => undefined,
        (error: unknown) => this.reportFailure(event, error)
      );
      this.inFlight.add(tracked);
      void tracked.finally(() => this.inFlight.delete(tracked));
    }
  }

  private reportFailure(event: BusEvent<TEvents>, error: unknown): void {
    this.logger.error(
      { topic: event.topic, eventId: event.id, err: serializeError(error) },
      'Event handler failed'
    );
  }
}

function isTopic<TEvents, K extends keyof TEvents>(
  event: BusEvent<TEvents>,
  topic: K
): event is BusEvent<TEvents, K> {
  return event.topic === topic;
}

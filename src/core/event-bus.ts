/**
 * In-process fan-out for trace events.
 * Never blocks the producer: publish() only schedules one microtask per
 * sink and returns. A sink that throws or rejects is logged and isolated.
 */

import type { TraceEvent } from './protocol/types.js';
import { AtomicCounter } from './queues/atomic-counter.js';
import { createComponentLogger, type StructuredLogger } from '../integrations/utilities/logger.js';
import { formatErrorForLog } from '../errors/index.js';

/**
 * Something that consumes bus events. Returning a promise is allowed but
 * the bus never waits on it.
 */
export interface EventSink<T = TraceEvent> {
  /** Label used in logs */
  readonly name?: string;
  ingest(event: T): void | Promise<void>;
}

export type EventSinkFn<T = TraceEvent> = (event: T) => void | Promise<void>;

/**
 * Handle returned by subscribe().
 */
export interface SubscriptionHandle {
  readonly id: string;
  unsubscribe(): void;
}

export interface EventBusConfig {
  logger?: StructuredLogger;
}

export interface EventBusStats {
  /** Currently registered sinks */
  sinks: number;
  /** Events accepted by publish() */
  published: number;
  /** Sink invocations that threw or rejected */
  sinkErrors: number;
}

interface Registration<T> {
  id: string;
  name: string;
  sink: EventSinkFn<T>;
}

/**
 * Non-blocking pub/sub bus between the trace source and its consumers.
 *
 * Features:
 * - publish() cost is one microtask enqueue per sink
 * - Per-sink publish order is preserved (microtasks run FIFO)
 * - Unsubscribing takes effect for dispatches that have not run yet
 * - Sink failures are caught, logged and counted
 */
export class EventBus<T = TraceEvent> {
  private readonly registrations = new Map<string, Registration<T>>();
  private readonly ids = new AtomicCounter('sink');
  private readonly log: StructuredLogger;
  private publishedCount = 0;
  private sinkErrorCount = 0;

  constructor(config?: EventBusConfig) {
    this.log = config?.logger ?? createComponentLogger('EventBus');
  }

  /**
   * Hands an event to every registered sink.
   */
  publish(event: T): void {
    this.publishedCount++;

    for (const registration of this.registrations.values()) {
      queueMicrotask(() => this.dispatch(registration, event));
    }
  }

  /**
   * Registers a sink for events published from now on.
   */
  subscribe(sink: EventSink<T> | EventSinkFn<T>): SubscriptionHandle {
    const id = this.ids.next();
    let registration: Registration<T>;
    if (typeof sink === 'function') {
      registration = { id, name: sink.name || id, sink };
    } else {
      const target = sink;
      registration = { id, name: target.name ?? id, sink: (event) => target.ingest(event) };
    }

    this.registrations.set(id, registration);
    this.log.debug('Sink subscribed', { sinkId: id, sink: registration.name });

    return {
      id,
      unsubscribe: () => this.unsubscribe(id),
    };
  }

  /**
   * Removes a sink. Accepts the handle or its id.
   */
  unsubscribe(handle: SubscriptionHandle | string): boolean {
    const id = typeof handle === 'string' ? handle : handle.id;
    const removed = this.registrations.delete(id);
    if (removed) {
      this.log.debug('Sink unsubscribed', { sinkId: id });
    }
    return removed;
  }

  clear(): void {
    this.registrations.clear();
  }

  stats(): EventBusStats {
    return {
      sinks: this.registrations.size,
      published: this.publishedCount,
      sinkErrors: this.sinkErrorCount,
    };
  }

  private dispatch(registration: Registration<T>, event: T): void {
    // Unsubscribed after this dispatch was scheduled
    if (this.registrations.get(registration.id) !== registration) {
      return;
    }

    try {
      const result = registration.sink(event);
      if (result instanceof Promise) {
        result.catch((error: unknown) => this.reportSinkError(registration, error));
      }
    } catch (error) {
      this.reportSinkError(registration, error);
    }
  }

  private reportSinkError(registration: Registration<T>, error: unknown): void {
    this.sinkErrorCount++;
    this.log.error('Sink failed, continuing dispatch', {
      sinkId: registration.id,
      sink: registration.name,
      error: formatErrorForLog(error),
    });
  }
}

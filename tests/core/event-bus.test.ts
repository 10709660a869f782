/**
 * Event Bus Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { EventBus } from '../../src/core/event-bus.js';
import type { TraceEvent } from '../../src/core/protocol/types.js';
import { events, flushMicrotasks, quietLogger, thinking } from '../helpers/fixtures.js';

describe('EventBus', () => {
  it('publish returns before any sink runs', async () => {
    const { logger } = quietLogger();
    const bus = new EventBus({ logger });
    const sink = vi.fn();
    bus.subscribe(sink);

    bus.publish(thinking(1));
    expect(sink).not.toHaveBeenCalled();

    await flushMicrotasks();
    expect(sink).toHaveBeenCalledTimes(1);
  });

  it('delivers events to each sink in publish order', async () => {
    const { logger } = quietLogger();
    const bus = new EventBus({ logger });
    const a: number[] = [];
    const b: number[] = [];
    bus.subscribe((event) => {
      a.push(event.sequence);
    });
    bus.subscribe({ name: 'collector', ingest: (event) => { b.push(event.sequence); } });

    for (const event of events(1, 5)) {
      bus.publish(event);
    }
    await flushMicrotasks();

    expect(a).toEqual([1, 2, 3, 4, 5]);
    expect(b).toEqual([1, 2, 3, 4, 5]);
  });

  it('isolates a throwing sink from the others', async () => {
    const { logger, sink: logs } = quietLogger();
    const bus = new EventBus({ logger });
    const healthy: number[] = [];

    bus.subscribe({
      name: 'broken',
      ingest: () => {
        throw new Error('boom');
      },
    });
    bus.subscribe((event) => {
      healthy.push(event.sequence);
    });

    bus.publish(thinking(1));
    bus.publish(thinking(2));
    await flushMicrotasks();

    expect(healthy).toEqual([1, 2]);
    expect(bus.stats().sinkErrors).toBe(2);
    const errors = logs.getEntries({ level: 'error' });
    expect(errors).toHaveLength(2);
    expect(errors[0].message).toBe('Sink failed, continuing dispatch');
    expect(errors[0].data?.sink).toBe('broken');
    expect(errors[0].data?.error).toBe('[Error] boom');
  });

  it('counts a rejecting async sink without waiting on it', async () => {
    const { logger } = quietLogger();
    const bus = new EventBus({ logger });
    bus.subscribe(async () => {
      throw new Error('async boom');
    });

    bus.publish(thinking(1));
    await flushMicrotasks();

    expect(bus.stats().sinkErrors).toBe(1);
  });

  it('stops delivering once unsubscribed, including already scheduled dispatches', async () => {
    const { logger } = quietLogger();
    const bus = new EventBus({ logger });
    const seen: TraceEvent[] = [];
    const handle = bus.subscribe((event) => {
      seen.push(event);
    });

    bus.publish(thinking(1));
    handle.unsubscribe();
    bus.publish(thinking(2));
    await flushMicrotasks();

    expect(seen).toEqual([]);
    expect(bus.unsubscribe(handle)).toBe(false);
    expect(bus.stats()).toEqual({ sinks: 0, published: 2, sinkErrors: 0 });
  });

  it('assigns sequential sink ids', () => {
    const { logger } = quietLogger();
    const bus = new EventBus({ logger });
    expect(bus.subscribe(() => undefined).id).toBe('sink-0');
    expect(bus.subscribe(() => undefined).id).toBe('sink-1');
    expect(bus.unsubscribe('sink-0')).toBe(true);
    expect(bus.stats().sinks).toBe(1);
  });
});

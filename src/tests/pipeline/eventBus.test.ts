/**
 * Tests for the in-process event bus
 */

import { describe, it, expect, vi } from 'vitest';
import pino from 'pino';
import { InProcessEventBus } from '../../pipeline/events/eventBus';

interface TestEvents {
  Ping: { n: number };
  Pong: { n: number };
}

function createBus(historySize?: number) {
  return new InProcessEventBus<TestEvents>({ logger: pino({ level: 'silent' }), historySize });
}

describe('InProcessEventBus', () => {
  it('delivers asynchronously after publish returns', async () => {
    const bus = createBus();
    const seen: number[] = [];
    bus.subscribe('Ping', event => {
      seen.push(event.payload.n);
    });

    const id = bus.publish('Ping', { n: 1 });

    expect(typeof id).toBe('string');
    expect(seen).toEqual([]);
    await bus.idle();
    expect(seen).toEqual([1]);
  });

  it('keeps publish order per topic', async () => {
    const bus = createBus();
    const seen: number[] = [];
    bus.subscribe('Ping', event => {
      seen.push(event.payload.n);
    });

    for (let n = 1; n <= 5; n++) {
      bus.publish('Ping', { n });
    }
    await bus.idle();

    expect(seen).toEqual([1, 2, 3, 4, 5]);
  });

  it('routes events only to subscribers of their topic', async () => {
    const bus = createBus();
    const ping = vi.fn();
    const pong = vi.fn();
    bus.subscribe('Ping', ping);
    bus.subscribe('Pong', pong);

    bus.publish('Pong', { n: 7 });
    await bus.idle();

    expect(ping).not.toHaveBeenCalled();
    expect(pong).toHaveBeenCalledTimes(1);
    expect(pong.mock.calls[0][0].payload).toEqual({ n: 7 });
  });

  it('does not deliver events published before subscribing', async () => {
    const bus = createBus();
    bus.publish('Ping', { n: 1 });
    const handler = vi.fn();
    bus.subscribe('Ping', handler);

    await bus.idle();

    expect(handler).not.toHaveBeenCalled();
  });

  it('isolates throwing and rejecting handlers', async () => {
    const bus = createBus();
    const healthy = vi.fn();
    bus.subscribe('Ping', () => {
      throw new Error('sync failure');
    });
    bus.subscribe('Ping', async () => {
      throw new Error('async failure');
    });
    bus.subscribe('Ping', healthy);

    bus.publish('Ping', { n: 1 });
    bus.publish('Ping', { n: 2 });
    await bus.idle();

    expect(healthy).toHaveBeenCalledTimes(2);
  });

  it('stops delivery after unsubscribe', async () => {
    const bus = createBus();
    const handler = vi.fn();
    const unsubscribe = bus.subscribe('Ping', handler);

    unsubscribe();
    bus.publish('Ping', { n: 1 });
    await bus.idle();

    expect(handler).not.toHaveBeenCalled();
  });

  it('waits for async handlers and the events they publish', async () => {
    const bus = createBus();
    const pongs: number[] = [];
    bus.subscribe('Ping', async event => {
      await new Promise(resolve => setTimeout(resolve, 5));
      bus.publish('Pong', { n: event.payload.n * 10 });
    });
    bus.subscribe('Pong', event => {
      pongs.push(event.payload.n);
    });

    bus.publish('Ping', { n: 3 });
    await bus.idle();

    expect(pongs).toEqual([30]);
  });

  it('keeps a bounded history filterable by topic', async () => {
    const bus = createBus(3);
    bus.publish('Ping', { n: 1 });
    bus.publish('Pong', { n: 2 });
    bus.publish('Ping', { n: 3 });
    bus.publish('Ping', { n: 4 });

    expect(bus.recent().map(e => e.payload)).toEqual([{ n: 2 }, { n: 3 }, { n: 4 }]);
    expect(bus.recent('Ping').map(e => e.payload)).toEqual([{ n: 3 }, { n: 4 }]);
    expect(bus.recent('Ping', 1).map(e => e.payload)).toEqual([{ n: 4 }]);
    await bus.idle();
  });
});

import { EventBus } from './event-bus.js';
import type { ServerEvent } from '@hostwarden/core';

function makeEvent(n: number): ServerEvent {
  return { type: 'info', ts: n, server_id: 'alpha', data: { n } };
}

describe('EventBus', () => {
  it('delivers events in publish order', async () => {
    const bus = new EventBus();
    bus.publish(makeEvent(1));
    bus.publish(makeEvent(2));
    bus.publish(makeEvent(3));

    expect((await bus.next()).ts).toBe(1);
    expect((await bus.next()).ts).toBe(2);
    expect(bus.tryNext()?.ts).toBe(3);
    expect(bus.tryNext()).toBeUndefined();
  });

  it('never blocks producers and keeps everything buffered', () => {
    const bus = new EventBus();
    for (let i = 0; i < 10_000; i++) bus.publish(makeEvent(i));
    expect(bus.length).toBe(10_000);
  });

  it('wakes a waiting consumer on publish', async () => {
    const bus = new EventBus();
    const pending = bus.next();
    bus.publish(makeEvent(7));
    await expect(pending).resolves.toEqual(makeEvent(7));
    expect(bus.length).toBe(0);
  });

  it('rejects a waiting read when its signal aborts', async () => {
    const bus = new EventBus();
    const controller = new AbortController();
    const pending = bus.next(controller.signal);
    controller.abort();
    await expect(pending).rejects.toThrow('EventBus read aborted');

    // The aborted waiter must not swallow the next event.
    bus.publish(makeEvent(1));
    expect(bus.length).toBe(1);
  });

  it('rejects immediately for an already-aborted signal', async () => {
    const bus = new EventBus();
    const controller = new AbortController();
    controller.abort();
    await expect(bus.next(controller.signal)).rejects.toThrow('EventBus read aborted');
  });

  it('returns buffered events before honoring an aborted signal', async () => {
    const bus = new EventBus();
    bus.publish(makeEvent(1));
    const controller = new AbortController();
    controller.abort();
    await expect(bus.next(controller.signal)).resolves.toEqual(makeEvent(1));
  });

  it('drain() empties the queue', () => {
    const bus = new EventBus();
    bus.publish(makeEvent(1));
    bus.publish(makeEvent(2));
    expect(bus.drain().map((e) => e.ts)).toEqual([1, 2]);
    expect(bus.length).toBe(0);
  });

  it('supports async iteration', async () => {
    const bus = new EventBus();
    bus.publish(makeEvent(1));
    bus.publish(makeEvent(2));

    const seen: number[] = [];
    for await (const event of bus) {
      seen.push(event.ts);
      if (seen.length === 2) break;
    }
    expect(seen).toEqual([1, 2]);
  });
});

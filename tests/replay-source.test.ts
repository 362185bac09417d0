import { describe, it, expect } from 'vitest';
import { ReplayEventSource } from '../src/adapters/replay-source.js';
import { SourceClosedError, isAbortError } from '../src/errors.js';
import { createAccessEvent } from '../src/event.js';

const first = createAccessEvent({ actorId: 1, resourcePath: '/etc/passwd' });
const second = createAccessEvent({ actorId: 2, resourcePath: '/etc/shadow' });

describe('ReplayEventSource', () => {
  it('hands out events in order', async () => {
    const source = new ReplayEventSource([first, second]);
    const signal = new AbortController().signal;

    expect(await source.next(signal)).toBe(first);
    expect(await source.next(signal)).toBe(second);
    expect(source.remaining).toBe(0);
  });

  it('waits for cancellation once the events run out', async () => {
    const source = new ReplayEventSource([]);
    const controller = new AbortController();
    let settled = false;

    const pending = source.next(controller.signal);
    pending.then(
      () => (settled = true),
      () => (settled = true)
    );
    await new Promise((resolve) => setTimeout(resolve, 10));
    expect(settled).toBe(false);

    controller.abort();
    const err = await pending.catch((e: unknown) => e);
    expect(isAbortError(err)).toBe(true);
  });

  it('rejects immediately on an aborted signal even with events left', async () => {
    const source = new ReplayEventSource([first]);
    const controller = new AbortController();
    controller.abort();

    const err = await source.next(controller.signal).catch((e: unknown) => e);

    expect(isAbortError(err)).toBe(true);
    expect(source.remaining).toBe(1);
  });

  it('records block requests, including repeats', async () => {
    const source = new ReplayEventSource([]);
    await source.block(1234);
    await source.block(1234);

    expect(source.blockRequests).toEqual([1234, 1234]);
    expect(source.isBlocked(1234)).toBe(true);
    expect(source.isBlocked(99)).toBe(false);
  });

  it('fails every operation after close', async () => {
    const source = new ReplayEventSource([first]);
    await source.close();

    await expect(source.next(new AbortController().signal)).rejects.toBeInstanceOf(
      SourceClosedError
    );
    await expect(source.block(1)).rejects.toBeInstanceOf(SourceClosedError);
  });
});

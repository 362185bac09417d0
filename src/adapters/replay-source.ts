/**
 * Replays a fixed list of events in order, then waits for cancellation.
 * Block requests are only recorded.
 */

import { SourceClosedError } from '../errors.js';
import { untilAborted, type EventSource } from '../event-source.js';
import type { AccessEvent } from '../types.js';

export class ReplayEventSource implements EventSource {
  private readonly events: readonly AccessEvent[];
  private readonly blocked = new Set<number>();
  private index = 0;
  private closed = false;
  /** Every block() call, in order, including redundant ones. */
  readonly blockRequests: number[] = [];

  constructor(events: Iterable<AccessEvent>) {
    this.events = [...events];
  }

  async next(signal: AbortSignal): Promise<AccessEvent> {
    if (this.closed) throw new SourceClosedError();
    signal.throwIfAborted();

    if (this.index < this.events.length) {
      return this.events[this.index++];
    }

    return untilAborted(signal);
  }

  async block(actorId: number): Promise<void> {
    if (this.closed) throw new SourceClosedError();
    this.blockRequests.push(actorId);
    this.blocked.add(actorId);
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  isBlocked(actorId: number): boolean {
    return this.blocked.has(actorId);
  }

  /** Number of events not yet handed out. */
  get remaining(): number {
    return this.events.length - this.index;
  }
}

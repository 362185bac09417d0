import type { ActorState } from './types.js';

/**
 * Per-actor violation counters and the set of actors already blocked.
 * Entries are never removed or reset; both only grow for the lifetime of
 * the ledger.
 */
export class ViolationLedger {
  private readonly counts = new Map<number, number>();
  private readonly blocked = new Set<number>();

  /** Count one violation for `actorId` and return its new total. */
  recordViolation(actorId: number): number {
    const count = (this.counts.get(actorId) ?? 0) + 1;
    this.counts.set(actorId, count);
    return count;
  }

  /** Returns false if the actor was already blocked. */
  markBlocked(actorId: number): boolean {
    if (this.blocked.has(actorId)) return false;
    this.blocked.add(actorId);
    return true;
  }

  countFor(actorId: number): number {
    return this.counts.get(actorId) ?? 0;
  }

  total(): number {
    let sum = 0;
    for (const count of this.counts.values()) sum += count;
    return sum;
  }

  isBlocked(actorId: number): boolean {
    return this.blocked.has(actorId);
  }

  hasBlocked(): boolean {
    return this.blocked.size > 0;
  }

  blockedActors(): number[] {
    return [...this.blocked];
  }

  stateOf(actorId: number): ActorState {
    if (this.blocked.has(actorId)) return 'blocked';
    return this.counts.has(actorId) ? 'violating' : 'unseen';
  }

  entries(): Array<[number, number]> {
    return [...this.counts.entries()];
  }
}

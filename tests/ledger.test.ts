import { describe, it, expect } from 'vitest';
import { ViolationLedger } from '../src/ledger.js';

describe('ViolationLedger', () => {
  it('starts empty', () => {
    const ledger = new ViolationLedger();
    expect(ledger.total()).toBe(0);
    expect(ledger.countFor(1)).toBe(0);
    expect(ledger.hasBlocked()).toBe(false);
    expect(ledger.stateOf(1)).toBe('unseen');
  });

  it('counts violations per actor', () => {
    const ledger = new ViolationLedger();
    expect(ledger.recordViolation(10)).toBe(1);
    expect(ledger.recordViolation(10)).toBe(2);
    expect(ledger.recordViolation(20)).toBe(1);
    expect(ledger.countFor(10)).toBe(2);
    expect(ledger.countFor(20)).toBe(1);
    expect(ledger.total()).toBe(3);
    expect(ledger.stateOf(10)).toBe('violating');
  });

  it('marks an actor blocked only once', () => {
    const ledger = new ViolationLedger();
    ledger.recordViolation(10);
    expect(ledger.markBlocked(10)).toBe(true);
    expect(ledger.markBlocked(10)).toBe(false);
    expect(ledger.isBlocked(10)).toBe(true);
    expect(ledger.hasBlocked()).toBe(true);
    expect(ledger.stateOf(10)).toBe('blocked');
  });

  it('keeps counting after an actor is blocked', () => {
    const ledger = new ViolationLedger();
    ledger.recordViolation(10);
    ledger.markBlocked(10);
    expect(ledger.recordViolation(10)).toBe(2);
  });

  it('returns copies of its collections', () => {
    const ledger = new ViolationLedger();
    ledger.recordViolation(10);
    ledger.markBlocked(10);

    const blocked = ledger.blockedActors();
    blocked.push(99);
    const entries = ledger.entries();
    entries.push([99, 5]);

    expect(ledger.blockedActors()).toEqual([10]);
    expect(ledger.entries()).toEqual([[10, 1]]);
  });
});

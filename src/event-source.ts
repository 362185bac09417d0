import type { AccessEvent } from './types.js';

/**
 * Supplier of access events and executor of block commands.
 *
 * Production implementations sit in front of the capture/enforcement
 * subsystem; tests can replay a fixed list of events.
 */
export interface EventSource {
  /**
   * Resolve with the next event. Rejects with the signal's reason once it
   * is aborted. When the supply is exhausted this waits for the abort
   * instead of resolving.
   */
  next(signal: AbortSignal): Promise<AccessEvent>;
  /** Deny the actor any further access. Redundant calls are harmless. */
  block(actorId: number): Promise<void>;
  /** Release resources. Every later call rejects with SourceClosedError. */
  close(): Promise<void>;
}

/** Pending until `signal` aborts, then rejects with its reason. */
export function untilAborted(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener('abort', () => reject(signal.reason), { once: true });
  });
}

/** Settle with `promise`, or reject with the abort reason if `signal` fires first. */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => reject(signal.reason);
    signal.addEventListener('abort', onAbort, { once: true });
    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

import { setImmediate as nextTurn } from 'node:timers/promises';

import type { DecisionEngine } from './engine.js';
import { describeError, isAbortError } from './errors.js';
import type { EventSource } from './event-source.js';
import { createConsoleLogger, type Logger } from './logger.js';
import type { AccessEvent } from './types.js';

export interface ControlLoopOptions {
  logger?: Logger;
}

/**
 * Feeds every event from a source into the engine until the signal aborts.
 *
 * Read and processing failures are logged and the loop carries on; there
 * is no backoff and no error budget. After a failed read the loop yields
 * one macrotask turn so that a source which always fails cannot starve
 * the timers and signal handlers that would cancel it.
 */
export class ControlLoop {
  private readonly logger: Logger;

  constructor(
    private readonly engine: DecisionEngine,
    private readonly source: EventSource,
    options: ControlLoopOptions = {}
  ) {
    this.logger = options.logger ?? createConsoleLogger();
  }

  /** Resolves once `signal` aborts. Never rejects. */
  async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      let event: AccessEvent;
      try {
        event = await this.source.next(signal);
      } catch (err: unknown) {
        if (isAbortError(err) || signal.aborted) return;
        this.logger.error(`reading event: ${describeError(err)}`);
        await nextTurn();
        continue;
      }

      try {
        await this.engine.process(event);
      } catch (err: unknown) {
        this.logger.error(`processing event: ${describeError(err)}`);
      }
    }
  }
}

/**
 * Decision engine: turns a stream of access events into per-actor
 * violation counts and issues one block command per actor once its count
 * reaches the threshold.
 *
 * Per-actor lifecycle: unseen → violating → blocked. Blocking is final for
 * the lifetime of the engine, and a blocked actor keeps accumulating
 * violations if it keeps tripping the policy.
 */

import { ConfigError, EnforcementError, describeError } from './errors.js';
import { isUint32 } from './event.js';
import type { EventSource } from './event-source.js';
import { ViolationLedger } from './ledger.js';
import { createConsoleLogger, type Logger } from './logger.js';
import { compilePatterns, findMatch, type CompiledPattern } from './matcher.js';
import { formatBlocked, formatViolation } from './report.js';
import {
  ALL_ACTORS,
  type AccessEvent,
  type ActorState,
  type BlockNotice,
  type EngineSnapshot,
  type PolicyConfig,
  type ViolationNotice,
} from './types.js';

export interface DecisionEngineOptions {
  logger?: Logger;
  onViolation?: (notice: ViolationNotice) => void;
  onBlocked?: (notice: BlockNotice) => void;
}

function validatePolicy(config: PolicyConfig): void {
  if (!Number.isInteger(config.threshold) || config.threshold < 1) {
    throw new ConfigError(`threshold must be a positive integer, got ${config.threshold}`);
  }
  if (!isUint32(config.targetActor)) {
    throw new ConfigError(`target PID must be a uint32, got ${config.targetActor}`);
  }
}

export class DecisionEngine {
  readonly config: PolicyConfig;
  private readonly patterns: CompiledPattern[];
  private readonly ledger = new ViolationLedger();
  private readonly logger: Logger;
  private readonly onViolation?: (notice: ViolationNotice) => void;
  private readonly onBlocked?: (notice: BlockNotice) => void;

  constructor(
    private readonly source: EventSource,
    config: PolicyConfig,
    options: DecisionEngineOptions = {}
  ) {
    validatePolicy(config);
    this.config = Object.freeze({ ...config, patterns: Object.freeze([...config.patterns]) });
    this.patterns = compilePatterns(this.config.patterns);
    this.logger = options.logger ?? createConsoleLogger();
    this.onViolation = options.onViolation;
    this.onBlocked = options.onBlocked;
  }

  /**
   * Apply one event. Rejects with EnforcementError when the block command
   * fails; the actor stays marked as blocked either way.
   */
  async process(event: AccessEvent): Promise<void> {
    const { targetActor, threshold } = this.config;
    if (targetActor !== ALL_ACTORS && event.actorId !== targetActor) return;

    const pattern = findMatch(event.resourcePath, this.patterns);
    if (pattern === null) return;

    const count = this.ledger.recordViolation(event.actorId);
    const enforce = count >= threshold && this.ledger.markBlocked(event.actorId);
    const violation: ViolationNotice = {
      actorId: event.actorId,
      actorName: event.actorName,
      resourcePath: event.resourcePath,
      pattern,
      count,
      threshold,
    };
    this.notify('violation', () => {
      this.logger.info(formatViolation(violation));
      this.onViolation?.(violation);
    });

    if (!enforce) return;

    try {
      await this.source.block(event.actorId);
    } catch (err: unknown) {
      throw new EnforcementError(event.actorId, err);
    }

    const blocked: BlockNotice = {
      actorId: event.actorId,
      actorName: event.actorName,
      count,
    };
    this.notify('block', () => {
      this.logger.info(formatBlocked(blocked));
      this.onBlocked?.(blocked);
    });
  }

  /** Listener failures are logged; they never change a decision. */
  private notify(kind: string, emit: () => void): void {
    try {
      emit();
    } catch (err: unknown) {
      this.logger.warn(`${kind} listener failed: ${describeError(err)}`);
    }
  }

  totalViolationCount(): number {
    return this.ledger.total();
  }

  violationCount(actorId: number): number {
    return this.ledger.countFor(actorId);
  }

  /** True once any actor has been blocked. */
  isBlocked(): boolean {
    return this.ledger.hasBlocked();
  }

  isActorBlocked(actorId: number): boolean {
    return this.ledger.isBlocked(actorId);
  }

  /** Blocked actor ids, in no particular order. */
  blockedActors(): number[] {
    return this.ledger.blockedActors();
  }

  actorState(actorId: number): ActorState {
    return this.ledger.stateOf(actorId);
  }

  snapshot(): EngineSnapshot {
    const violations = new Map(this.ledger.entries());
    let totalViolations = 0;
    for (const count of violations.values()) totalViolations += count;
    return {
      totalViolations,
      violations,
      blockedActors: Object.freeze(this.ledger.blockedActors()),
    };
  }
}

/** Target filter value meaning "every actor". */
export const ALL_ACTORS = 0;

export const MAX_ACTOR_ID = 0xffffffff;

/** Byte widths of the bounded string fields. */
export const ACTOR_NAME_BYTES = 16;
export const RESOURCE_PATH_BYTES = 256;

export interface AccessEvent {
  readonly actorId: number;
  /** Credential identity; informational only. */
  readonly ownerId: number;
  readonly actorName: string;
  readonly resourcePath: string;
  /** Open flags as captured; never used for decisions. */
  readonly flags: number;
}

export interface PolicyConfig {
  /** Disallowed patterns, checked in order. */
  readonly patterns: readonly string[];
  /** Violations needed before an actor is blocked. */
  readonly threshold: number;
  /** Actor to watch, or ALL_ACTORS. */
  readonly targetActor: number;
}

export type ActorState = 'unseen' | 'violating' | 'blocked';

export interface ViolationNotice {
  actorId: number;
  actorName: string;
  resourcePath: string;
  /** The disallowed pattern that matched. */
  pattern: string;
  count: number;
  threshold: number;
}

export interface BlockNotice {
  actorId: number;
  actorName: string;
  count: number;
}

export interface EngineSnapshot {
  totalViolations: number;
  violations: ReadonlyMap<number, number>;
  blockedActors: readonly number[];
}

import {
  ALL_ACTORS,
  type BlockNotice,
  type EngineSnapshot,
  type PolicyConfig,
  type ViolationNotice,
} from './types.js';

export function formatViolation(notice: ViolationNotice): string {
  return `[VIOLATION ${notice.count}/${notice.threshold}] PID ${notice.actorId} (${notice.actorName}) opened disallowed file: ${notice.resourcePath}`;
}

export function formatBlocked(notice: BlockNotice): string {
  return `*** PID ${notice.actorId} is now BLOCKED from opening any further files! ***`;
}

export function formatBanner(config: PolicyConfig): string[] {
  const lines = [
    `Disallowed files: ${config.patterns.join(', ')}`,
    `Threshold: ${config.threshold} file(s)`,
  ];
  if (config.targetActor !== ALL_ACTORS) {
    lines.push(`Target PID: ${config.targetActor}`);
  }
  return lines;
}

export function formatSummary(snapshot: EngineSnapshot): string[] {
  const blocked = [...snapshot.blockedActors].sort((a, b) => a - b);
  return [
    `Total violations: ${snapshot.totalViolations}`,
    `Blocked PIDs: ${blocked.length > 0 ? blocked.join(', ') : 'none'}`,
  ];
}

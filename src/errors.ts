export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class SourceClosedError extends Error {
  constructor(message = 'event source is closed') {
    super(message);
    this.name = 'SourceClosedError';
  }
}

/** The enforcement command for an actor could not be carried out. */
export class EnforcementError extends Error {
  constructor(
    public readonly actorId: number,
    cause: unknown
  ) {
    super(`failed to block PID ${actorId}: ${describeError(cause)}`, { cause });
    this.name = 'EnforcementError';
  }
}

export function isAbortError(error: unknown): boolean {
  // Node's DOMException is not typed without the DOM lib; check the name.
  return (
    typeof error === 'object' &&
    error !== null &&
    'name' in error &&
    error.name === 'AbortError'
  );
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

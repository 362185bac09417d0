import { existsSync, readFileSync } from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { z } from 'zod';

import { ConfigError, describeError } from './errors.js';
import { ALL_ACTORS, MAX_ACTOR_ID, type PolicyConfig } from './types.js';

export const DEFAULT_THRESHOLD = 2;

const Pattern = z.string().min(1, 'patterns must not be empty');
const Threshold = z.number().int().positive();
const ActorId = z.number().int().min(0).max(MAX_ACTOR_ID);

/** Shape of a JSON policy file passed with --config. */
export const PolicyFileSchema = z
  .object({
    disallowed: z.array(Pattern),
    threshold: Threshold.optional(),
    targetActor: ActorId.optional(),
  })
  .strict();
export type PolicyFile = z.infer<typeof PolicyFileSchema>;

const PolicyConfigSchema = z.object({
  patterns: z.array(Pattern).min(1, 'at least one disallowed pattern is required'),
  threshold: Threshold,
  targetActor: ActorId,
});

/** Values taken from the command line, all optional. */
export interface PolicyFlags {
  disallowed?: string;
  threshold?: number;
  pid?: number;
}

function resolvePath(p: string): string {
  if (p.startsWith('~')) return path.join(os.homedir(), p.slice(1));
  return path.resolve(p);
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    )
    .join('; ');
}

/** Split a comma-separated pattern list, dropping blank entries. */
export function parsePatternList(csv: string): string[] {
  return csv
    .split(',')
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
}

export function loadPolicyFile(filePath: string): PolicyFile {
  const resolved = resolvePath(filePath);
  if (!existsSync(resolved)) {
    throw new ConfigError(`policy file not found: ${resolved}`);
  }
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(resolved, 'utf-8'));
  } catch (err: unknown) {
    throw new ConfigError(`policy file ${resolved} is not valid JSON: ${describeError(err)}`);
  }
  const parsed = PolicyFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(`invalid policy file ${resolved}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

/**
 * Merge command-line flags over an optional policy file over defaults.
 * Flags win field by field.
 */
export function resolveConfig(flags: PolicyFlags, file?: PolicyFile): PolicyConfig {
  const patterns =
    flags.disallowed !== undefined
      ? parsePatternList(flags.disallowed)
      : (file?.disallowed ?? []);
  const parsed = PolicyConfigSchema.safeParse({
    patterns,
    threshold: flags.threshold ?? file?.threshold ?? DEFAULT_THRESHOLD,
    targetActor: flags.pid ?? file?.targetActor ?? ALL_ACTORS,
  });
  if (!parsed.success) {
    throw new ConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}

import { Minimatch, type MinimatchOptions } from 'minimatch';

/**
 * Shell-style globbing only: `*`, `?` and bracket classes, none of which
 * match `/`. Negation, comments, braces and extglobs are read literally,
 * and `**` is just two stars.
 */
const GLOB_OPTIONS: MinimatchOptions = {
  dot: true,
  nonegate: true,
  nocomment: true,
  nobrace: true,
  noext: true,
  noglobstar: true,
  preserveMultipleSlashes: true,
};

const STARS_ONLY = /^\*+$/;

interface SegmentGlob {
  source: string;
  glob: Minimatch;
}

export interface CompiledPattern {
  source: string;
  segments: SegmentGlob[];
}

export function compilePatterns(patterns: readonly string[]): CompiledPattern[] {
  return patterns.map((source) => ({
    source,
    segments: source.split('/').map((segment) => ({
      source: segment,
      glob: new Minimatch(segment, GLOB_OPTIONS),
    })),
  }));
}

// minimatch never lets `*` match an empty segment, as in `/etc/` or `//`.
function segmentMatches(segment: SegmentGlob, part: string): boolean {
  if (part === '') return segment.source === '' || STARS_ONLY.test(segment.source);
  return segment.glob.match(part);
}

function globMatches(resourcePath: string, pattern: CompiledPattern): boolean {
  const parts = resourcePath.split('/');
  return (
    parts.length === pattern.segments.length &&
    parts.every((part, i) => segmentMatches(pattern.segments[i], part))
  );
}

/**
 * Return the first pattern that matches `resourcePath`, either as a glob
 * over the whole path or as a literal substring of it.
 */
export function findMatch(
  resourcePath: string,
  patterns: readonly CompiledPattern[]
): string | null {
  for (const pattern of patterns) {
    if (globMatches(resourcePath, pattern) || resourcePath.includes(pattern.source)) {
      return pattern.source;
    }
  }
  return null;
}

export function matches(resourcePath: string, patterns: readonly string[]): boolean {
  return findMatch(resourcePath, compilePatterns(patterns)) !== null;
}

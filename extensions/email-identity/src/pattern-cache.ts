import type { CompiledPattern } from "./types.js";
import { compileCatchAllPattern, testCompiledPattern } from "./catch-all.js";

// Shared across every caller in the process. Compilation is deterministic, so
// an entry can always be rebuilt and clearing the cache changes no results.
const patternCache = new Map<string, CompiledPattern>();

export function getCompiledPattern(pattern: string): CompiledPattern {
  const cached = patternCache.get(pattern);
  if (cached) {
    return cached;
  }
  const compiled = compileCatchAllPattern(pattern);
  patternCache.set(pattern, compiled);
  return compiled;
}

export function matchesCatchAll(pattern: string, address: string): boolean {
  return testCompiledPattern(getCompiledPattern(pattern), address);
}

export function clearPatternCache(): void {
  patternCache.clear();
}

export function patternCacheSize(): number {
  return patternCache.size;
}

import type { Identity, MatchResult } from "./types.js";
import { normalizeAddress } from "./email-address.js";
import { getCompiledPattern } from "./pattern-cache.js";
import { testCompiledPattern } from "./catch-all.js";
import { getIdentityLogger } from "./runtime.js";

export type MatchIdentityParams<T extends Identity> = {
  identities: readonly T[];
  hints: readonly string[];
  useFallbackDefault?: boolean;
  defaultIdentity?: T | null;
};

function report<T extends Identity>(result: MatchResult<T>): MatchResult<T> {
  getIdentityLogger().debug(
    {
      kind: result.kind,
      identityId: result.identity?.id,
      matchedAddress: result.matchedAddress,
    },
    "resolved reply identity",
  );
  return result;
}

function noMatch<T extends Identity>(): MatchResult<T> {
  return { identity: null, matchedAddress: null, kind: "none" };
}

function fallback<T extends Identity>(identity: T | null): MatchResult<T> {
  return { identity, matchedAddress: null, kind: "fallback" };
}

// Hint-major: a lower-priority hint that equals some identity's email still
// beats every catch-all candidate.
export function findExactMatch<T extends Identity>(
  identities: readonly T[],
  hints: readonly string[],
): MatchResult<T> | null {
  for (const hint of hints) {
    const normalizedHint = normalizeAddress(hint);
    if (!normalizedHint) {
      continue;
    }
    for (const identity of identities) {
      const email = normalizeAddress(identity.email);
      if (email && email === normalizedHint) {
        return { identity, matchedAddress: hint.trim(), kind: "exact" };
      }
    }
  }
  return null;
}

// Identity-major: list order decides between identities, and each identity
// takes its highest-priority matching hint.
export function findCatchAllMatch<T extends Identity>(
  identities: readonly T[],
  hints: readonly string[],
): MatchResult<T> | null {
  for (const identity of identities) {
    const pattern = identity.catchAll?.trim();
    if (!pattern) {
      continue;
    }
    const compiled = getCompiledPattern(pattern);
    for (const hint of hints) {
      if (testCompiledPattern(compiled, hint)) {
        return { identity, matchedAddress: hint.trim(), kind: "catch-all" };
      }
    }
  }
  return null;
}

function resolveFallback<T extends Identity>(params: MatchIdentityParams<T>): MatchResult<T> {
  if (params.useFallbackDefault) {
    return fallback(params.defaultIdentity ?? null);
  }
  return fallback(params.identities[0]);
}

/**
 * Picks the identity to reply or forward from.
 *
 * Exact email matches are tried first, then catch-all patterns, then the
 * fallback (the configured default when `useFallbackDefault` is set, else the
 * first identity). Never throws.
 *
 * A single identity is selected whatever the hints say, but it still goes
 * through the exact and catch-all passes, so the result reports `exact` or
 * `catch-all` with the address it was reached through. A lone catch-all
 * identity can then override the visible From address. Use
 * `matchExactIdentity` for the hint-free shortcut.
 */
export function matchIdentity<T extends Identity>(params: MatchIdentityParams<T>): MatchResult<T> {
  const { identities, hints } = params;
  if (identities.length === 0) {
    return report(noMatch<T>());
  }
  if (identities.length === 1) {
    // The only identity is always chosen; the passes just report which
    // address it was reached through.
    return report(
      findExactMatch(identities, hints) ??
        findCatchAllMatch(identities, hints) ??
        fallback(identities[0]),
    );
  }

  const result =
    findExactMatch(identities, hints) ??
    findCatchAllMatch(identities, hints) ??
    resolveFallback(params);
  return report(result);
}

/**
 * Exact-match-only selection, without catch-all patterns. A single identity
 * is returned as the fallback without looking at the hints.
 */
export function matchExactIdentity<T extends Identity>(
  params: MatchIdentityParams<T>,
): MatchResult<T> {
  const { identities, hints } = params;
  if (identities.length === 0) {
    return noMatch<T>();
  }
  if (identities.length === 1) {
    return fallback(identities[0]);
  }
  return findExactMatch(identities, hints) ?? resolveFallback(params);
}

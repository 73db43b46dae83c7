import type { ResolvedIdentitySettings } from "./config.js";
import type { ConfiguredIdentity } from "./config-schema.js";
import type { Identity, MatchResult } from "./types.js";
import { extractHints } from "./header-extract.js";
import { createHeaderLookup, type HeaderSource } from "./header-lookup.js";
import { matchIdentity } from "./identity-match.js";

export type ReplySender<T extends Identity = ConfiguredIdentity> = {
  match: MatchResult<T>;
  fromAddress: string | null;
  fromHeader: string | null;
};

export function formatFromHeader(address: string, name?: string): string {
  const displayName = name?.trim();
  if (!displayName) {
    return address;
  }
  const escaped = displayName.replace(/[\\"]/g, "\\$&");
  return `"${escaped}" <${address}>`;
}

// A catch-all match replaces the visible From with the address the message
// was actually sent to.
export function resolveFromAddress(match: MatchResult): string | null {
  if (match.kind === "catch-all" && match.matchedAddress) {
    return match.matchedAddress;
  }
  return match.identity?.email?.trim() || null;
}

export function resolveReplySender(params: {
  settings: ResolvedIdentitySettings;
  headers: HeaderSource;
}): ReplySender {
  const { settings, headers } = params;
  const hints = extractHints(settings.headerPriority, createHeaderLookup(headers));
  const match = matchIdentity({
    identities: settings.identities,
    hints,
    useFallbackDefault: settings.useFallbackDefault,
    defaultIdentity: settings.defaultIdentity,
  });

  const fromAddress = resolveFromAddress(match);
  return {
    match,
    fromAddress,
    fromHeader: fromAddress ? formatFromHeader(fromAddress, match.identity?.name) : null,
  };
}

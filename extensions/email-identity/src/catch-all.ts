import type { CompiledPattern } from "./types.js";
import { getIdentityLogger } from "./runtime.js";

const WILDCARD = "*";
// One or more characters, never crossing into the other half of the address.
const WILDCARD_SOURCE = "[^@]+";

const DISABLED: CompiledPattern = Object.freeze({ state: "disabled" as const });

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

function partToSource(part: string): string {
  return part.split(WILDCARD).map(escapeRegExp).join(WILDCARD_SOURCE);
}

function findPatternProblem(pattern: string): string | null {
  if (/\s/.test(pattern)) {
    return "pattern contains whitespace";
  }
  const parts = pattern.split("@");
  if (parts.length !== 2) {
    return "pattern must contain exactly one @";
  }
  const [local, domain] = parts;
  if (!local) {
    return "empty local part";
  }
  if (!domain) {
    return "empty domain part";
  }
  return null;
}

/**
 * Compiles a catch-all address pattern such as `*@example.com` or
 * `user+*@example.com`.
 *
 * Literal characters match case-insensitively and `*` stands for one or more
 * characters other than `@`, so `*@example.com` does not reach
 * `user@sub.example.com` unless the domain part spells out its own wildcard
 * (`*@*.example.com`). The whole address must match.
 *
 * An empty pattern is `disabled` and a malformed one is `invalid`; neither
 * matches anything, and compiling never throws.
 */
export function compileCatchAllPattern(pattern: string): CompiledPattern {
  const trimmed = pattern.trim();
  if (!trimmed) {
    return DISABLED;
  }

  const reason = findPatternProblem(trimmed);
  if (reason) {
    getIdentityLogger().debug({ pattern, reason }, "catch-all pattern is invalid");
    const invalid: CompiledPattern = { state: "invalid", pattern, reason };
    return Object.freeze(invalid);
  }

  const at = trimmed.indexOf("@");
  const regex = new RegExp(
    `^${partToSource(trimmed.slice(0, at))}@${partToSource(trimmed.slice(at + 1))}$`,
    "i",
  );

  const valid: CompiledPattern = {
    state: "valid",
    pattern,
    matches: (address: string) => regex.test(address.trim()),
  };
  return Object.freeze(valid);
}

export function testCompiledPattern(compiled: CompiledPattern, address: string): boolean {
  return compiled.state === "valid" && compiled.matches(address);
}

import type { z } from "zod";
import { IdentitySettingsSchema, type ConfiguredIdentity } from "./config-schema.js";
import { DEFAULT_HEADER_PRIORITY } from "./header-extract.js";

const ENV_HEADER_PRIORITY = "EMAIL_IDENTITY_HEADER_PRIORITY";

export type ResolvedIdentitySettings = {
  identities: ConfiguredIdentity[];
  headerPriority: string[];
  useFallbackDefault: boolean;
  defaultIdentity: ConfiguredIdentity | null;
};

export type Env = Record<string, string | undefined>;

export class IdentitySettingsError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`email-identity: invalid identity settings\n${issues.join("\n")}`);
    this.name = "IdentitySettingsError";
    this.issues = issues;
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

function parseHeaderList(raw: string | undefined): string[] {
  return (raw ?? "")
    .split(",")
    .map((entry) => entry.trim())
    .filter(Boolean);
}

function resolveHeaderPriority(configured: string[] | undefined, env: Env): string[] {
  const fromEnv = parseHeaderList(env[ENV_HEADER_PRIORITY]);
  if (fromEnv.length > 0) {
    return fromEnv;
  }
  return configured ?? [...DEFAULT_HEADER_PRIORITY];
}

export function safeParseIdentitySettings(
  raw: unknown,
  env: Env = process.env,
):
  | { ok: true; settings: ResolvedIdentitySettings }
  | { ok: false; error: IdentitySettingsError } {
  const parsed = IdentitySettingsSchema.safeParse(raw);
  if (!parsed.success) {
    return { ok: false, error: new IdentitySettingsError(formatIssues(parsed.error)) };
  }

  const { identities, headerPriority, useFallbackDefault, defaultIdentityId } = parsed.data;
  return {
    ok: true,
    settings: {
      identities,
      headerPriority: resolveHeaderPriority(headerPriority, env),
      useFallbackDefault: useFallbackDefault ?? false,
      defaultIdentity: identities.find((identity) => identity.id === defaultIdentityId) ?? null,
    },
  };
}

export function resolveIdentitySettings(
  raw: unknown,
  env: Env = process.env,
): ResolvedIdentitySettings {
  const result = safeParseIdentitySettings(raw, env);
  if (!result.ok) {
    throw result.error;
  }
  return result.settings;
}

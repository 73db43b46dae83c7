export type Identity = {
  id?: string;
  name?: string;
  email?: string;
  catchAll?: string;
};

export type AddressHint = {
  address: string;
  header: string;
};

export type MatchKind = "exact" | "catch-all" | "fallback" | "none";

export type MatchResult<T extends Identity = Identity> = {
  identity: T | null;
  matchedAddress: string | null;
  kind: MatchKind;
};

export type HeaderLookup = {
  getHeaderValues(name: string): string[];
};

export type CompiledPattern =
  | { state: "disabled" }
  | { state: "invalid"; pattern: string; reason: string }
  | { state: "valid"; pattern: string; matches: (address: string) => boolean };

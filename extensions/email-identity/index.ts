export type {
  AddressHint,
  CompiledPattern,
  HeaderLookup,
  Identity,
  MatchKind,
  MatchResult,
} from "./src/types.js";
export {
  normalizeAddress,
  parseAddressEntry,
  parseAddressList,
  splitAddressList,
  type ParsedAddressEntry,
} from "./src/email-address.js";
export { createHeaderLookup, type HeaderSource, type RawHeader } from "./src/header-lookup.js";
export {
  DEFAULT_HEADER_PRIORITY,
  extractAddressHints,
  extractHints,
} from "./src/header-extract.js";
export { compileCatchAllPattern, testCompiledPattern } from "./src/catch-all.js";
export {
  clearPatternCache,
  getCompiledPattern,
  matchesCatchAll,
  patternCacheSize,
} from "./src/pattern-cache.js";
export {
  findCatchAllMatch,
  findExactMatch,
  matchExactIdentity,
  matchIdentity,
  type MatchIdentityParams,
} from "./src/identity-match.js";
export {
  IdentitySchema,
  IdentitySettingsSchema,
  type ConfiguredIdentity,
} from "./src/config-schema.js";
export {
  IdentitySettingsError,
  resolveIdentitySettings,
  safeParseIdentitySettings,
  type Env,
  type ResolvedIdentitySettings,
} from "./src/config.js";
export {
  formatFromHeader,
  resolveFromAddress,
  resolveReplySender,
  type ReplySender,
} from "./src/reply-sender.js";
export { createLogger, type Logger } from "./src/logger.js";
export { getIdentityLogger, setIdentityLogger } from "./src/runtime.js";

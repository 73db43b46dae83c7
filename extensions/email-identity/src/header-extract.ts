import type { AddressHint, HeaderLookup } from "./types.js";
import { parseAddressEntry, splitAddressList } from "./email-address.js";
import { getIdentityLogger } from "./runtime.js";

export const DEFAULT_HEADER_PRIORITY: readonly string[] = Object.freeze([
  "Delivered-To",
  "X-Envelope-To",
  "X-Original-To",
  "To",
  "Cc",
]);

export function extractAddressHints(
  headerNames: readonly string[],
  lookup: HeaderLookup,
): AddressHint[] {
  const hints: AddressHint[] = [];

  for (const header of headerNames) {
    for (const value of lookup.getHeaderValues(header)) {
      for (const segment of splitAddressList(value)) {
        const parsed = parseAddressEntry(segment);
        if (!parsed.ok) {
          getIdentityLogger().debug(
            { header, entry: parsed.entry, reason: parsed.reason },
            "skipping malformed address entry",
          );
          continue;
        }
        hints.push({ address: parsed.address, header });
      }
    }
  }

  return hints;
}

// Hints keep header priority order and are not de-duplicated.
export function extractHints(headerNames: readonly string[], lookup: HeaderLookup): string[] {
  return extractAddressHints(headerNames, lookup).map((hint) => hint.address);
}

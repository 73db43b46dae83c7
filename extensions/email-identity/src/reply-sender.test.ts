import { beforeEach, describe, expect, it } from "vitest";
import { resolveIdentitySettings } from "./config.js";
import { clearPatternCache } from "./pattern-cache.js";
import { formatFromHeader, resolveReplySender } from "./reply-sender.js";

describe("resolveReplySender", () => {
  const settings = resolveIdentitySettings(
    {
      identities: [
        { id: "personal", name: "Me", email: "me@home.com" },
        { id: "shop", name: "Shop Desk", email: "info@shop.com", catchAll: "*@shop.com" },
      ],
    },
    {},
  );

  beforeEach(() => {
    clearPatternCache();
  });

  it("overrides the From address with a catch-all match", () => {
    const sender = resolveReplySender({
      settings,
      headers: [
        { name: "To", value: "Orders <orders@shop.com>" },
        { name: "Delivered-To", value: "orders@shop.com" },
      ],
    });

    expect(sender.match.kind).toBe("catch-all");
    expect(sender.match.identity?.id).toBe("shop");
    expect(sender.fromAddress).toBe("orders@shop.com");
    expect(sender.fromHeader).toBe('"Shop Desk" <orders@shop.com>');
  });

  it("uses the identity email on an exact match", () => {
    const sender = resolveReplySender({
      settings,
      headers: { To: "Someone <someone@shop.com>", Cc: "ME@home.com" },
    });

    expect(sender.match).toEqual({
      identity: { id: "personal", name: "Me", email: "me@home.com" },
      matchedAddress: "ME@home.com",
      kind: "exact",
    });
    expect(sender.fromAddress).toBe("me@home.com");
    expect(sender.fromHeader).toBe('"Me" <me@home.com>');
  });

  it("falls back to the configured default identity", () => {
    const withDefault = resolveIdentitySettings(
      {
        identities: [
          { id: "personal", email: "me@home.com" },
          { id: "shop", email: "info@shop.com" },
        ],
        useFallbackDefault: true,
        defaultIdentityId: "shop",
      },
      {},
    );

    const sender = resolveReplySender({
      settings: withDefault,
      headers: { To: "stranger@else.com" },
    });

    expect(sender.match.kind).toBe("fallback");
    expect(sender.fromAddress).toBe("info@shop.com");
    expect(sender.fromHeader).toBe("info@shop.com");
  });

  it("has no sender without identities", () => {
    const sender = resolveReplySender({
      settings: resolveIdentitySettings({ identities: [] }, {}),
      headers: { To: "me@home.com" },
    });

    expect(sender).toEqual({
      match: { identity: null, matchedAddress: null, kind: "none" },
      fromAddress: null,
      fromHeader: null,
    });
  });

  it("has no From address for an identity without an email", () => {
    const sender = resolveReplySender({
      settings: resolveIdentitySettings({ identities: [{ id: "bare" }, { id: "other" }] }, {}),
      headers: {},
    });

    expect(sender.match.identity?.id).toBe("bare");
    expect(sender.fromAddress).toBeNull();
    expect(sender.fromHeader).toBeNull();
  });
});

describe("formatFromHeader", () => {
  it("returns the bare address without a name", () => {
    expect(formatFromHeader("a@x.com")).toBe("a@x.com");
    expect(formatFromHeader("a@x.com", "  ")).toBe("a@x.com");
  });

  it("quotes and escapes the display name", () => {
    expect(formatFromHeader("a@x.com", 'Jane "JD" Doe')).toBe('"Jane \\"JD\\" Doe" <a@x.com>');
  });
});

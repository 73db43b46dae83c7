import { describe, expect, it } from "vitest";
import { createLogger } from "./logger.js";
import { getIdentityLogger, setIdentityLogger } from "./runtime.js";

describe("identity logger", () => {
  it("creates loggers bound to their service", () => {
    const logger = createLogger({ service: "email-identity-test", level: "debug" });
    expect(logger.level).toBe("debug");
    expect(logger.bindings()).toMatchObject({ service: "email-identity-test" });
  });

  it("reuses the lazily created logger until replaced", () => {
    const first = getIdentityLogger();
    expect(getIdentityLogger()).toBe(first);

    const next = createLogger({ service: "email-identity", level: "silent" });
    setIdentityLogger(next);
    expect(getIdentityLogger()).toBe(next);
  });
});

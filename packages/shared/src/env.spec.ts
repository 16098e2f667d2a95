import { describe, it, expect } from "vitest";

import { validateEnv } from "./env";

describe("validateEnv", () => {
  it("fills defaults", () => {
    const env = validateEnv({});
    expect(env.NODE_ENV).toBe("development");
    expect(env.PORT).toBe(8080);
    expect(env.JOURNAL_TZ).toBe("UTC");
    expect(env.HYPERLIQUID_API_URL).toBe("https://api.hyperliquid.xyz");
    expect(env.PROVIDER_REQUEST_GAP_MS).toBe(500);
    expect(env.FILL_LIMIT).toBe(10);
  });

  it("coerces numeric variables", () => {
    const env = validateEnv({ PORT: "3001", FILL_LIMIT: "25", PROVIDER_TIMEOUT_MS: "2500" });
    expect(env.PORT).toBe(3001);
    expect(env.FILL_LIMIT).toBe(25);
    expect(env.PROVIDER_TIMEOUT_MS).toBe(2500);
  });

  it("lists every invalid variable", () => {
    expect(() => validateEnv({ PORT: "0", LOG_LEVEL: "loud" })).toThrow(/PORT: .*; LOG_LEVEL: /);
  });
});

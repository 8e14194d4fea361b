import { describe, expect, it } from "vitest";
import { collectCredentials, readServerEnv } from "../src/troupe/config/env.js";

describe("readServerEnv", () => {
  it("uses defaults when nothing is set", () => {
    expect(readServerEnv({})).toEqual({ maxConcurrentRuns: 5, queueTimeoutMs: 30_000, logLevel: "info" });
  });

  it("reads numeric values from strings", () => {
    expect(
      readServerEnv({ TROUPE_MAX_CONCURRENT: "2", TROUPE_QUEUE_TIMEOUT_MS: "0", TROUPE_LOG_LEVEL: "debug" })
    ).toEqual({ maxConcurrentRuns: 2, queueTimeoutMs: 0, logLevel: "debug" });
  });

  it("rejects malformed values", () => {
    expect(() => readServerEnv({ TROUPE_MAX_CONCURRENT: "lots" })).toThrow(/^Invalid environment: TROUPE_MAX_CONCURRENT: /);
  });
});

describe("collectCredentials", () => {
  it("copies only the named variables", () => {
    expect(collectCredentials(["A_KEY", "B_KEY"], { A_KEY: "test-secret", OTHER: "x" })).toEqual({
      A_KEY: "test-secret",
      B_KEY: undefined
    });
  });
});

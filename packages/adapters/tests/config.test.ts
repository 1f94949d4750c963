import { describe, expect, it } from "vitest";

import { DEFAULT_AGGREGATOR_CONFIG, parseAggregatorConfig } from "../src/config";

describe("parseAggregatorConfig", () => {
  it("fills defaults", () => {
    expect(parseAggregatorConfig(undefined)._unsafeUnwrap()).toEqual({ testnet: false, retryAttempts: 3, timeoutMs: 5000 });
    expect(DEFAULT_AGGREGATOR_CONFIG).toEqual({ testnet: false, retryAttempts: 3, timeoutMs: 5000 });
  });

  it("keeps explicit values", () => {
    expect(parseAggregatorConfig({ testnet: true, retryAttempts: 1, timeoutMs: 250 })._unsafeUnwrap()).toEqual({
      testnet: true,
      retryAttempts: 1,
      timeoutMs: 250,
    });
  });

  it.each([{ retryAttempts: 0 }, { retryAttempts: 11 }, { timeoutMs: 0 }, { testnet: "yes" }])(
    "rejects %o as a config error",
    input => {
      const error = parseAggregatorConfig(input)._unsafeUnwrapErr();
      expect(error.type).toBe("config_error");
      expect(error.message.startsWith("invalid aggregator config: ")).toBe(true);
    },
  );
});

import { describe, expect, it } from "vitest";

import { parseCommand } from "../../src/services/command-parser";

const ctx = { symbol: "BTC" };

describe("parseCommand", () => {
  it("parses a market buy against the current symbol", () => {
    expect(parseCommand("buy dydx 100", ctx)._unsafeUnwrap()).toEqual({
      type: "trade",
      venue: "dydx",
      request: { asset: "BTC", side: "buy", kind: "market", usdValue: "100", leverage: 1, reduceOnly: false },
    });
  });

  it("parses every trade option", () => {
    expect(parseCommand("sell HL 250.5 limit 51000 lev 5 cross reduce", ctx)._unsafeUnwrap()).toEqual({
      type: "trade",
      venue: "hyperliquid",
      request: {
        asset: "BTC",
        side: "sell",
        kind: "limit",
        usdValue: "250.5",
        limitPrice: "51000",
        leverage: 5,
        crossMargin: true,
        reduceOnly: true,
      },
    });
  });

  it.each([
    ["", "empty command"],
    ["   ", "empty command"],
    ["buy kraken 100", 'invalid venue "kraken": unknown venue (dydx, hyperliquid)'],
    ["buy constructor 100", 'invalid venue "constructor": unknown venue (dydx, hyperliquid)'],
    ["buy dydx", "missing usd value"],
    ["buy dydx -5", 'invalid usd value "-5": expected a positive number'],
    ["buy dydx 0", 'invalid usd value "0": expected a positive number'],
    ["buy dydx 100 limit", "missing limit price"],
    ["buy dydx 100 lev", "missing leverage"],
    ["buy dydx 100 lev 2.5", 'invalid leverage "2.5": leverage must be a whole number'],
    ["buy dydx 100 lev 0", 'invalid leverage "0": leverage must be >= 1'],
    ["buy dydx 100 fast", 'unknown option "fast"'],
    ["symbol", "missing symbol"],
    ["symbol BTC-USD", 'invalid symbol "BTC-USD": expected an asset code like BTC'],
    ["cancel dydx", "missing order id"],
    ["close a eth abc", 'invalid size "abc": expected a signed size like -0.5'],
    ["launch", 'unknown command "launch" (try help)'],
  ])("rejects %j with %j", (line, message) => {
    expect(parseCommand(line, ctx)._unsafeUnwrapErr()).toBe(message);
  });

  it("upper-cases symbols", () => {
    expect(parseCommand("symbol eth", ctx)._unsafeUnwrap()).toEqual({ type: "symbol", symbol: "ETH" });
    expect(parseCommand("s kPEPE", ctx)._unsafeUnwrap()).toEqual({ type: "symbol", symbol: "KPEPE" });
  });

  it("parses cancel and close with venue aliases", () => {
    expect(parseCommand("cancel b 91490942", ctx)._unsafeUnwrap()).toEqual({
      type: "cancel",
      venue: "hyperliquid",
      orderId: "91490942",
    });
    expect(parseCommand("close a eth -0.5", ctx)._unsafeUnwrap()).toEqual({
      type: "close",
      venue: "dydx",
      symbol: "ETH",
      signedSize: "-0.5",
    });
  });

  it.each([
    ["positions", "positions"],
    ["pos", "positions"],
    ["orders", "orders"],
    ["help", "help"],
    ["?", "help"],
    ["quit", "quit"],
    ["exit", "quit"],
    ["Q", "quit"],
  ])("maps %j to %s", (line, type) => {
    expect(parseCommand(line, ctx)._unsafeUnwrap()).toEqual({ type });
  });
});

import { describe, expect, it } from "vitest";

import type { VenueSessionState } from "@perp-aggregator/adapters";
import type { VenueTag } from "@perp-aggregator/core";
import { LayoutPolicy, Style } from "@perp-aggregator/utils";

import type { MarketComparison, VenueView } from "../../src/services/aggregator";
import {
  depthRows,
  formatCompact,
  formatFunding,
  metricRows,
  renderComparison,
  topOfBook,
} from "../../src/services/market-view";
import { bookOf } from "../helpers/fake-venue";

const session = (venue: VenueTag, supervisorState: VenueSessionState["supervisorState"]): VenueSessionState => ({
  venue,
  desiredSymbol: "BTC",
  supervisorState,
  connectAttempts: 0,
  backoffDeadlineMs: null,
  currentBook: null,
  lastGoodSummary: null,
});

const dydxView: VenueView = {
  venue: "dydx",
  book: bookOf("dydx", "BTC", [["100", "1"], ["99", "2"]], [["101", "3"]]),
  bookError: null,
  summary: {
    symbol: "BTC",
    markPrice: "50000",
    volume24h: "123456789.12",
    openInterest: "1234.5",
    fundingRate: "0.00001",
  },
  summaryStale: false,
  leverage: { venue: "dydx", symbol: "BTC", maxLeverage: 20, source: "metadata" },
  session: session("dydx", "STREAMING"),
};

const hyperliquidView: VenueView = {
  venue: "hyperliquid",
  book: null,
  bookError: { type: "not_ready", message: "no orderbook for BTC" },
  summary: { symbol: "BTC", markPrice: "50012.0", volume24h: "1500000000.5" },
  summaryStale: true,
  leverage: { venue: "hyperliquid", symbol: "BTC", maxLeverage: 50, source: "policy" },
  session: session("hyperliquid", "BACKOFF"),
};

const comparison: MarketComparison = {
  symbol: "BTC",
  generatedAtMs: 1_700_000_000_000,
  venues: [dydxView, hyperliquidView],
};

describe("topOfBook", () => {
  it("computes spread and spread in basis points of mid", () => {
    expect(topOfBook(dydxView.book)).toEqual({ bid: "100", ask: "101", spread: "1", spreadBps: "99.50" });
  });

  it("shows dashes without a book or with one side empty", () => {
    expect(topOfBook(null)).toEqual({ bid: "-", ask: "-", spread: "-", spreadBps: "-" });
    expect(topOfBook(bookOf("dydx", "BTC", [["100", "1"]], []))).toEqual({
      bid: "100",
      ask: "-",
      spread: "-",
      spreadBps: "-",
    });
  });
});

describe("number formatting", () => {
  it.each([
    ["123456789.12", "123.46M"],
    ["1500000000.5", "1.50B"],
    ["1234.5", "1.23K"],
    ["-2500000", "-2.50M"],
    ["999.999", "1000.00"],
    ["abc", "-"],
  ])("formatCompact(%s) = %s", (input, expected) => {
    expect(formatCompact(input)).toBe(expected);
  });

  it("formatCompact(undefined) is a dash", () => {
    expect(formatCompact(undefined)).toBe("-");
  });

  it.each([
    ["0.00001", "0.0010%"],
    ["-0.000002", "-0.0002%"],
    ["0.0000125", "0.0013%"],
  ])("formatFunding(%s) = %s", (input, expected) => {
    expect(formatFunding(input)).toBe(expected);
  });
});

describe("metricRows", () => {
  it("lists every metric with one cell per venue", () => {
    expect(metricRows(comparison)).toEqual([
      ["state", "STREAMING", "BACKOFF"],
      ["best bid", "100", "-"],
      ["best ask", "101", "-"],
      ["spread", "1 (99.50 bps)", "-"],
      ["mark", "50000", "50012.0 (stale)"],
      ["24h volume", "123.46M", "1.50B"],
      ["open interest", "1.23K", "-"],
      ["funding", "0.0010%", "-"],
      ["max leverage", "20x", "50x (default)"],
    ]);
  });

  it("shows no data when a venue has no summary at all", () => {
    const rows = metricRows({ ...comparison, venues: [{ ...hyperliquidView, summary: null, summaryStale: false }] });

    expect(rows.slice(4, 8)).toEqual([
      ["mark", "no data"],
      ["24h volume", "no data"],
      ["open interest", "no data"],
      ["funding", "no data"],
    ]);
  });
});

describe("depthRows", () => {
  it("pads missing levels with empty cells", () => {
    expect(depthRows(dydxView.book, 3)).toEqual([
      ["1", "100", "101", "3"],
      ["2", "99", "", ""],
      ["", "", "", ""],
    ]);
    expect(depthRows(null, 1)).toEqual([["", "", "", ""]]);
  });
});

describe("renderComparison", () => {
  const box = (content: string) => `│ ${content.padEnd(76)} │`;
  const metric = (label: string, a: string, b: string) => box(`${label.padEnd(14)} ${a.padStart(30)} ${b.padStart(30)}`);
  const depth = ([label, ...cells]: string[]) => box([(label ?? "").padEnd(14), ...cells.map(c => c.padStart(14))].join(" "));

  it("lays both venues out side by side at 80 columns", () => {
    const lines = renderComparison(comparison, {
      style: new Style({ noColor: true }),
      layout: new LayoutPolicy(() => 80),
      width: 80,
      depth: 1,
    });

    expect(lines).toHaveLength(18);
    expect(lines[0]).toBe(`┌${"─".repeat(26)} BTC  dydx vs hyperliquid ${"─".repeat(26)}┐`);
    expect(lines[1]).toBe(metric("", "DYDX", "HYPERLIQUID"));
    expect(lines[2]).toBe(metric("state", "STREAMING", "BACKOFF"));
    expect(lines[5]).toBe(metric("spread", "1 (99.50 bps)", "-"));
    expect(lines[6]).toBe(metric("mark", "50000", "50012.0 (stale)"));
    expect(lines[10]).toBe(metric("max leverage", "20x", "50x (default)"));
    expect(lines[11]).toBe(`├${"─".repeat(78)}┤`);
    expect(lines[12]).toBe(depth(["dydx", "bid size", "bid", "ask", "ask size"]));
    expect(lines[13]).toBe(depth(["", "1", "100", "101", "3"]));
    expect(lines[15]).toBe(depth(["hyperliquid", "bid size", "bid", "ask", "ask size"]));
    expect(lines[16]).toBe(depth(["", "", "", "", ""]));
    expect(lines[17]).toBe(`└${"─".repeat(78)}┘`);
  });
});

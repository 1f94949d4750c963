/**
 * Order book reconstruction: snapshot, delta and crossed-book handling
 */

import { describe, expect, it } from "vitest";

import { bestAsk, bestBid, findBookViolations, OrderBookBuilder, spreadOf } from "../src/orderbook";

const lv = (price: string, size: string) => ({ price, size });

const createBuilder = (clock: () => number = () => 1_000) => new OrderBookBuilder("dydx", "BTC", clock);

describe("OrderBookBuilder", () => {
  it("is not ready before the first snapshot", () => {
    const b = createBuilder();
    expect(b.isReady()).toBe(false);
    expect(b.current()).toBeNull();
  });

  it("removes a level when a delta carries size 0", () => {
    const b = createBuilder();
    b.applySnapshot([lv("100", "1")], [lv("101", "1")]);

    const result = b.applyDelta([], [lv("101", "0")]);

    expect(result.isOk()).toBe(true);
    const book = b.current();
    expect(book?.bids).toEqual([{ price: "100", size: "1", orders: 1 }]);
    expect(book?.asks).toEqual([]);
  });

  it("replaces a level size absolutely instead of adding to it", () => {
    const b = createBuilder();
    b.applySnapshot([lv("100", "1")], []);

    b.applyDelta([lv("100", "2")], []);

    expect(b.current()?.bids).toEqual([{ price: "100", size: "2", orders: 1 }]);
  });

  it("treats numerically equal prices as the same level", () => {
    const b = createBuilder();
    b.applySnapshot([lv("100.0", "1")], []);

    b.applyDelta([lv("100", "3")], []);

    expect(b.current()?.bids).toEqual([{ price: "100", size: "3", orders: 1 }]);
  });

  it("sorts bids descending and asks ascending after each batch", () => {
    const b = createBuilder();
    b.applySnapshot([lv("99", "1"), lv("100", "1")], [lv("102", "1"), lv("101", "1")]);
    b.applyDelta([lv("99.5", "4")], [lv("101.5", "2")]);

    const book = b.current();
    expect(book?.bids.map(l => l.price)).toEqual(["100", "99.5", "99"]);
    expect(book?.asks.map(l => l.price)).toEqual(["101", "101.5", "102"]);
  });

  it("skips size-0 levels inside a snapshot", () => {
    const b = createBuilder();
    b.applySnapshot([lv("100", "0"), lv("99", "1")], []);

    expect(b.current()?.bids.map(l => l.price)).toEqual(["99"]);
  });

  it("keeps the venue order count when present", () => {
    const b = new OrderBookBuilder("hyperliquid", "ETH", () => 5);
    b.applySnapshot([{ price: "3000", size: "2", orders: 7 }], []);

    expect(b.current()?.bids[0]).toEqual({ price: "3000", size: "2", orders: 7 });
    expect(b.current()?.venue).toBe("hyperliquid");
    expect(b.current()?.symbol).toBe("ETH");
  });

  it("ignores deltas until a snapshot arrives", () => {
    const b = createBuilder();

    const result = b.applyDelta([lv("100", "1")], []);

    expect(result.isErr()).toBe(true);
    expect(result._unsafeUnwrapErr().type).toBe("awaiting_snapshot");
    expect(b.current()).toBeNull();
  });

  it("drops the whole book when a batch crosses it", () => {
    const b = createBuilder();
    b.applySnapshot([lv("100", "1")], [lv("101", "1")]);

    const result = b.applyDelta([lv("101.5", "1")], []);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "crossed",
      bestBid: "101.5",
      bestAsk: "101",
      message: "crossed book for BTC: bid 101.5 >= ask 101",
    });
    expect(b.current()).toBeNull();
    expect(b.isReady()).toBe(false);
    expect(b.applyDelta([lv("100", "1")], []).isErr()).toBe(true);
  });

  it("treats a locked book (bid == ask) as crossed", () => {
    const b = createBuilder();

    const result = b.applySnapshot([lv("100", "1")], [lv("100", "1")]);

    expect(result._unsafeUnwrapErr().type).toBe("crossed");
  });

  it("rejects a batch with an invalid level without touching the book", () => {
    const b = createBuilder();
    b.applySnapshot([lv("100", "1")], [lv("101", "1")]);

    const result = b.applyDelta([lv("99", "1"), lv("abc", "1")], []);

    expect(result._unsafeUnwrapErr().type).toBe("invalid_level");
    expect(b.current()?.bids.map(l => l.price)).toEqual(["100"]);
  });

  it("rejects non-positive prices and negative sizes", () => {
    const b = createBuilder();
    expect(b.applySnapshot([lv("0", "1")], [])._unsafeUnwrapErr().type).toBe("invalid_level");
    expect(b.applySnapshot([lv("1", "-1")], [])._unsafeUnwrapErr().type).toBe("invalid_level");
  });

  it("keeps timestamps non-decreasing when the clock steps back", () => {
    const ticks = [2_000, 1_500, 2_500];
    let i = 0;
    const b = createBuilder(() => ticks[i++] ?? 0);

    const t1 = b.applySnapshot([lv("100", "1")], [])._unsafeUnwrap().timestampMs;
    const t2 = b.applyDelta([lv("99", "1")], [])._unsafeUnwrap().timestampMs;
    const t3 = b.applyDelta([lv("98", "1")], [])._unsafeUnwrap().timestampMs;

    expect([t1, t2, t3]).toEqual([2_000, 2_000, 2_500]);
  });

  it("keeps the timestamp floor across a reset", () => {
    const ticks = [5_000, 4_000];
    let i = 0;
    const b = createBuilder(() => ticks[i++] ?? 0);

    b.applySnapshot([lv("100", "1")], []);
    b.reset();
    const after = b.applySnapshot([lv("100", "1")], [])._unsafeUnwrap();

    expect(after.timestampMs).toBe(5_000);
  });

  it("never mutates a published snapshot", () => {
    const b = createBuilder();
    const first = b.applySnapshot([lv("100", "1")], [lv("101", "1")])._unsafeUnwrap();

    b.applyDelta([lv("100", "0")], [lv("102", "5")]);

    expect(first.bids).toEqual([{ price: "100", size: "1", orders: 1 }]);
    expect(first.asks).toEqual([{ price: "101", size: "1", orders: 1 }]);
    expect(Object.isFrozen(first)).toBe(true);
  });
});

describe("book read helpers", () => {
  it("returns best levels and spread", () => {
    const b = createBuilder();
    const book = b.applySnapshot([lv("100", "1"), lv("99", "2")], [lv("100.5", "1")])._unsafeUnwrap();

    expect(bestBid(book)?.price).toBe("100");
    expect(bestAsk(book)?.price).toBe("100.5");
    const s = spreadOf(book);
    expect(s?.spread.toString()).toBe("0.5");
    expect(s?.mid.toString()).toBe("100.25");
  });

  it("returns null spread for a one-sided book", () => {
    const book = createBuilder().applySnapshot([lv("100", "1")], [])._unsafeUnwrap();
    expect(spreadOf(book)).toBeNull();
  });

  it("reports violations of a hand-built bad book", () => {
    const violations = findBookViolations({
      venue: "dydx",
      symbol: "BTC",
      bids: [
        { price: "100", size: "1", orders: 1 },
        { price: "100", size: "0", orders: 1 },
      ],
      asks: [{ price: "99", size: "1", orders: 1 }],
      timestampMs: 0,
    });

    expect(violations).toEqual([
      "bids not strictly ordered at 0: 100, 100",
      "bids[1] size not positive: 0",
      "crossed: bid 100 >= ask 99",
    ]);
  });
});

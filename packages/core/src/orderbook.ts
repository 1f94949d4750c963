/**
 * Order Book Reconstruction - Pure logic for snapshot + delta books
 *
 * - Snapshot replaces both sides; delta levels with size 0 delete the price,
 *   any other size replaces the level absolutely
 * - Levels are keyed by numeric price, so "100" and "100.0" are one level
 * - Each batch is validated before it touches the book
 * - A crossed result drops the whole book; the caller is expected to resubscribe
 *
 * This module is pure (no I/O, no throw).
 */

import Decimal from "decimal.js";
import { err, ok, type Result } from "neverthrow";

import { parseDecimal } from "./decimal";
import type { DecimalStr, Level, Ms, OrderBook, VenueTag } from "./types";

/** Wire-level price point; size "0" is the removal marker */
export interface LevelUpdate {
  price: DecimalStr;
  size: DecimalStr;
  orders?: number;
}

export type BookUpdateError =
  | { type: "awaiting_snapshot"; message: string }
  | { type: "invalid_level"; message: string }
  | { type: "crossed"; bestBid: DecimalStr; bestAsk: DecimalStr; message: string };

interface ParsedLevel {
  key: string;
  price: Decimal;
  size: Decimal;
  level: Level;
}

interface SideEntry {
  price: Decimal;
  level: Level;
}

type Clock = () => Ms;

function parseLevels(updates: ReadonlyArray<LevelUpdate>, side: "bid" | "ask"): Result<ParsedLevel[], BookUpdateError> {
  const parsed: ParsedLevel[] = [];
  for (const u of updates) {
    const price = parseDecimal(u.price);
    const size = parseDecimal(u.size);
    if (price === null || price.lte(0)) {
      return err({ type: "invalid_level", message: `invalid ${side} price: ${u.price}` });
    }
    if (size === null || size.lt(0)) {
      return err({ type: "invalid_level", message: `invalid ${side} size at ${u.price}: ${u.size}` });
    }
    parsed.push({
      key: price.toString(),
      price,
      size,
      level: { price: u.price, size: u.size, orders: u.orders ?? 1 },
    });
  }
  return ok(parsed);
}

function materialize(side: Map<string, SideEntry>, descending: boolean): Level[] {
  const entries = Array.from(side.values());
  entries.sort((a, b) => (descending ? b.price.comparedTo(a.price) : a.price.comparedTo(b.price)));
  return entries.map(e => e.level);
}

/**
 * Single-writer book for one (venue, symbol) stream. Every successful apply
 * publishes a new frozen OrderBook; published snapshots are never mutated.
 */
export class OrderBookBuilder {
  readonly venue: VenueTag;
  readonly symbol: string;
  private readonly clock: Clock;

  private readonly bids = new Map<string, SideEntry>();
  private readonly asks = new Map<string, SideEntry>();
  private published: OrderBook | null = null;
  private hasSnapshot = false;
  private lastTimestampMs = 0;

  constructor(venue: VenueTag, symbol: string, clock: Clock = Date.now) {
    this.venue = venue;
    this.symbol = symbol;
    this.clock = clock;
  }

  isReady(): boolean {
    return this.hasSnapshot && this.published !== null;
  }

  current(): OrderBook | null {
    return this.published;
  }

  /**
   * Replaces the book with absolute levels. Size-0 levels in a snapshot are skipped.
   */
  applySnapshot(
    bids: ReadonlyArray<LevelUpdate>,
    asks: ReadonlyArray<LevelUpdate>,
  ): Result<OrderBook, BookUpdateError> {
    const parsedBids = parseLevels(bids, "bid");
    if (parsedBids.isErr()) return err(parsedBids.error);
    const parsedAsks = parseLevels(asks, "ask");
    if (parsedAsks.isErr()) return err(parsedAsks.error);

    this.bids.clear();
    this.asks.clear();
    for (const p of parsedBids.value) {
      if (!p.size.isZero()) this.bids.set(p.key, { price: p.price, level: p.level });
    }
    for (const p of parsedAsks.value) {
      if (!p.size.isZero()) this.asks.set(p.key, { price: p.price, level: p.level });
    }
    this.hasSnapshot = true;

    return this.commit();
  }

  /**
   * Applies one message's batch of changes. Ignored until a snapshot arrived.
   */
  applyDelta(bids: ReadonlyArray<LevelUpdate>, asks: ReadonlyArray<LevelUpdate>): Result<OrderBook, BookUpdateError> {
    if (!this.hasSnapshot) {
      return err({ type: "awaiting_snapshot", message: `delta before snapshot for ${this.symbol}` });
    }

    const parsedBids = parseLevels(bids, "bid");
    if (parsedBids.isErr()) return err(parsedBids.error);
    const parsedAsks = parseLevels(asks, "ask");
    if (parsedAsks.isErr()) return err(parsedAsks.error);

    const apply = (side: Map<string, SideEntry>, levels: ParsedLevel[]) => {
      for (const p of levels) {
        if (p.size.isZero()) {
          side.delete(p.key);
        } else {
          side.set(p.key, { price: p.price, level: p.level });
        }
      }
    };
    apply(this.bids, parsedBids.value);
    apply(this.asks, parsedAsks.value);

    return this.commit();
  }

  /**
   * Drops all levels and waits for the next snapshot. The timestamp floor is
   * kept so the stream stays monotonic across resubscribes.
   */
  reset(): void {
    this.bids.clear();
    this.asks.clear();
    this.published = null;
    this.hasSnapshot = false;
  }

  private commit(): Result<OrderBook, BookUpdateError> {
    const bids = materialize(this.bids, true);
    const asks = materialize(this.asks, false);

    const topBid = bids[0];
    const topAsk = asks[0];
    if (topBid !== undefined && topAsk !== undefined && !new Decimal(topBid.price).lt(topAsk.price)) {
      this.reset();
      return err({
        type: "crossed",
        bestBid: topBid.price,
        bestAsk: topAsk.price,
        message: `crossed book for ${this.symbol}: bid ${topBid.price} >= ask ${topAsk.price}`,
      });
    }

    const timestampMs = Math.max(this.clock(), this.lastTimestampMs);
    this.lastTimestampMs = timestampMs;

    const book: OrderBook = Object.freeze({
      venue: this.venue,
      symbol: this.symbol,
      bids: Object.freeze(bids),
      asks: Object.freeze(asks),
      timestampMs,
    });
    this.published = book;
    return ok(book);
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Read helpers
// ─────────────────────────────────────────────────────────────────────────────

export function bestBid(book: OrderBook): Level | undefined {
  return book.bids[0];
}

export function bestAsk(book: OrderBook): Level | undefined {
  return book.asks[0];
}

/**
 * (ask - bid) and mid, or null when either side is empty.
 */
export function spreadOf(book: OrderBook): { spread: Decimal; mid: Decimal } | null {
  const bid = bestBid(book);
  const ask = bestAsk(book);
  if (!bid || !ask) return null;
  const b = new Decimal(bid.price);
  const a = new Decimal(ask.price);
  return { spread: a.minus(b), mid: a.plus(b).div(2) };
}

/**
 * Lists every invariant a published book violates (empty for a valid book).
 */
export function findBookViolations(book: OrderBook): string[] {
  const violations: string[] = [];

  const checkSide = (levels: readonly Level[], name: "bids" | "asks") => {
    for (let i = 0; i < levels.length; i++) {
      const level = levels[i];
      if (level === undefined) continue;
      const price = parseDecimal(level.price);
      const size = parseDecimal(level.size);
      if (price === null || price.lte(0)) violations.push(`${name}[${i}] price not positive: ${level.price}`);
      if (size === null || size.lte(0)) violations.push(`${name}[${i}] size not positive: ${level.size}`);
      const next = levels[i + 1];
      if (next === undefined || price === null) continue;
      const nextPrice = parseDecimal(next.price);
      if (nextPrice === null) continue;
      const ordered = name === "bids" ? price.gt(nextPrice) : price.lt(nextPrice);
      if (!ordered) violations.push(`${name} not strictly ordered at ${i}: ${level.price}, ${next.price}`);
    }
  };

  checkSide(book.bids, "bids");
  checkSide(book.asks, "asks");

  const bid = bestBid(book);
  const ask = bestAsk(book);
  if (bid && ask && !new Decimal(bid.price).lt(ask.price)) {
    violations.push(`crossed: bid ${bid.price} >= ask ${ask.price}`);
  }

  return violations;
}

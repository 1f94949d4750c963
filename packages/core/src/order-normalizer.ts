/**
 * Order Request Normalizer - Pure logic turning a USD-denominated request
 * into a venue order
 *
 * 1. validate the request and pre-check the USD floor
 * 2. reference price: best ask (buy) / best bid (sell) for market orders,
 *    the venue-rounded limit price otherwise
 * 3. size = usdValue / referencePrice, rounded to the size step (half away from zero)
 * 4. rounded size 0 → rejected(too_small); size × price under the floor → rejected(below_minimum)
 * 5. market orders become IOC limits at the top-of-book price; limits are GTC
 *
 * The leverage update and the client id belong to the adapter, which calls
 * this before touching the network.
 *
 * This module is pure (no I/O, no throw).
 */

import Decimal from "decimal.js";
import { err, ok, type Result } from "neverthrow";

import { decimalsOfStep, formatFixed, parseDecimal, roundToStep } from "./decimal";
import { notReady, rejected, type VenueError } from "./errors";
import { bestAsk, bestBid } from "./orderbook";
import type {
  DecimalStr,
  InstrumentSpec,
  NormalizedOrder,
  OrderBook,
  PriceRule,
  Side,
  TradeRequest,
  VenueTag,
} from "./types";

export const DEFAULT_MIN_NOTIONAL_USD: DecimalStr = "10";

const USD_DECIMALS = 2;

export interface NormalizeContext {
  venue: VenueTag;
  instrument: InstrumentSpec;
  /** Live book; required for market orders */
  book: OrderBook | null;
  minNotionalUsd?: DecimalStr;
}

interface ReferencePrice {
  value: Decimal;
  text: DecimalStr;
}

// ─────────────────────────────────────────────────────────────────────────────
// Price rules
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Rounds a price onto the venue's grid.
 *
 * tick: nearest multiple of tickSize.
 * significant: at most N significant figures and maxDecimals decimals;
 * integers are always accepted.
 */
export function roundPrice(price: Decimal, rule: PriceRule): Decimal {
  if (rule.type === "tick") {
    const tick = parseDecimal(rule.tickSize);
    return tick === null ? price : roundToStep(price, tick);
  }

  if (price.gte(new Decimal(10).pow(rule.significantFigures))) {
    return price.toDecimalPlaces(0, Decimal.ROUND_HALF_UP);
  }
  return price
    .toSignificantDigits(rule.significantFigures, Decimal.ROUND_HALF_UP)
    .toDecimalPlaces(Math.max(0, rule.maxDecimals), Decimal.ROUND_HALF_UP);
}

export function formatPrice(price: Decimal, rule: PriceRule): DecimalStr {
  if (rule.type === "tick") return formatFixed(price, decimalsOfStep(rule.tickSize));
  return price.toFixed();
}

// ─────────────────────────────────────────────────────────────────────────────
// Steps
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Checks that need no market data. Runs before any network call, so a
 * request under the USD floor is rejected without touching the venue.
 */
export function precheckTradeRequest(
  request: TradeRequest,
  minNotionalUsd: DecimalStr = DEFAULT_MIN_NOTIONAL_USD,
): Result<TradeRequest, VenueError> {
  if (request.asset.trim() === "") {
    return err(rejected("invalid_request", "asset is required"));
  }

  const usd = parseDecimal(request.usdValue);
  if (usd === null || usd.lte(0)) {
    return err(rejected("invalid_request", `usd value must be positive: ${request.usdValue}`));
  }

  if (!Number.isFinite(request.leverage) || request.leverage < 1) {
    return err(rejected("invalid_request", `leverage must be >= 1: ${request.leverage}`));
  }

  if (request.kind === "limit") {
    const limit = parseDecimal(request.limitPrice);
    if (limit === null || limit.lte(0)) {
      return err(rejected("invalid_price", `limit orders need a positive price: ${request.limitPrice ?? "none"}`));
    }
  }

  const floor = parseDecimal(minNotionalUsd) ?? new Decimal(DEFAULT_MIN_NOTIONAL_USD);
  if (usd.lt(floor)) {
    return err(rejected("below_minimum", `order value $${usd.toFixed()} is below the $${floor.toFixed()} minimum`));
  }

  return ok(request);
}

/**
 * Top-of-book price for a market order on `side`: the ask for buys, the bid
 * for sells. not_ready unless both sides are populated.
 */
export function marketReferencePrice(side: Side, book: OrderBook | null, symbol: string): Result<ReferencePrice, VenueError> {
  if (book === null) {
    return err(notReady(`no orderbook for ${symbol}`));
  }
  const bid = bestBid(book);
  const ask = bestAsk(book);
  if (!bid || !ask) {
    return err(notReady(`orderbook for ${symbol} has an empty side`));
  }
  const level = side === "buy" ? ask : bid;
  return ok({ value: new Decimal(level.price), text: level.price });
}

function limitReferencePrice(request: TradeRequest, rule: PriceRule): Result<ReferencePrice, VenueError> {
  const raw = parseDecimal(request.limitPrice);
  if (raw === null || raw.lte(0)) {
    return err(rejected("invalid_price", `invalid limit price: ${request.limitPrice ?? "none"}`));
  }
  const rounded = roundPrice(raw, rule);
  if (rounded.lte(0)) {
    return err(rejected("invalid_price", `limit price ${raw.toFixed()} rounds to zero`));
  }
  return ok({ value: rounded, text: formatPrice(rounded, rule) });
}

function roundSize(raw: Decimal, instrument: InstrumentSpec): Decimal {
  const step = parseDecimal(instrument.sizeStep);
  if (step !== null && step.gt(0)) return roundToStep(raw, step);
  return raw.toDecimalPlaces(instrument.sizeDecimals, Decimal.ROUND_HALF_UP);
}

// ─────────────────────────────────────────────────────────────────────────────
// Entry points
// ─────────────────────────────────────────────────────────────────────────────

export function normalizeTradeRequest(request: TradeRequest, ctx: NormalizeContext): Result<NormalizedOrder, VenueError> {
  const minNotional = ctx.minNotionalUsd ?? DEFAULT_MIN_NOTIONAL_USD;
  const checked = precheckTradeRequest(request, minNotional);
  if (checked.isErr()) return err(checked.error);

  const symbol = request.asset.trim().toUpperCase();
  const reference =
    request.kind === "market" ?
      marketReferencePrice(request.side, ctx.book, symbol)
    : limitReferencePrice(request, ctx.instrument.priceRule);
  if (reference.isErr()) return err(reference.error);

  const usd = new Decimal(request.usdValue);
  const size = roundSize(usd.div(reference.value.value), ctx.instrument);
  if (size.lte(0)) {
    return err(
      rejected(
        "too_small",
        `$${usd.toFixed()} at ${reference.value.text} rounds to zero ${symbol} (step ${ctx.instrument.sizeStep})`,
      ),
    );
  }

  const notional = size.mul(reference.value.value);
  const floor = parseDecimal(minNotional) ?? new Decimal(DEFAULT_MIN_NOTIONAL_USD);
  if (notional.lt(floor)) {
    return err(
      rejected("below_minimum", `rounded order value $${notional.toFixed(USD_DECIMALS)} is below the $${floor.toFixed()} minimum`),
    );
  }

  return ok({
    venue: ctx.venue,
    symbol,
    side: request.side,
    price: reference.value.text,
    size: formatFixed(size, ctx.instrument.sizeDecimals),
    timeInForce: request.kind === "market" ? "ioc" : "gtc",
    reduceOnly: request.reduceOnly,
    notionalUsd: notional.toFixed(USD_DECIMALS, Decimal.ROUND_HALF_UP),
  });
}

/**
 * Reduce-only IOC order flattening `signedSize` (positive = long) at the top
 * of book. Exact size, so the USD floor does not apply.
 */
export function normalizeClose(
  symbol: string,
  signedSize: DecimalStr,
  ctx: Omit<NormalizeContext, "minNotionalUsd">,
): Result<NormalizedOrder, VenueError> {
  const upper = symbol.trim().toUpperCase();
  const position = parseDecimal(signedSize);
  if (position === null || position.isZero()) {
    return err(rejected("invalid_request", `no position size to close for ${upper}: ${signedSize}`));
  }

  const side: Side = position.gt(0) ? "sell" : "buy";
  const reference = marketReferencePrice(side, ctx.book, upper);
  if (reference.isErr()) return err(reference.error);

  const size = roundSize(position.abs(), ctx.instrument);
  if (size.lte(0)) {
    return err(rejected("too_small", `${position.abs().toFixed()} ${upper} rounds to zero (step ${ctx.instrument.sizeStep})`));
  }

  return ok({
    venue: ctx.venue,
    symbol: upper,
    side,
    price: reference.value.text,
    size: formatFixed(size, ctx.instrument.sizeDecimals),
    timeInForce: "ioc",
    reduceOnly: true,
    notionalUsd: size.mul(reference.value.value).toFixed(USD_DECIMALS, Decimal.ROUND_HALF_UP),
  });
}

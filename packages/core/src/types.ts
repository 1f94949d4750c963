/**
 * Core Domain Types
 *
 * Venue-agnostic market data and order shapes shared by adapters and the
 * terminal app. No I/O dependencies.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Value Objects
// ─────────────────────────────────────────────────────────────────────────────

/** Decimal as string to avoid floating point issues */
export type DecimalStr = string;

/** Milliseconds since epoch */
export type Ms = number;

export type VenueTag = "dydx" | "hyperliquid";

export const VENUE_TAGS: readonly VenueTag[] = ["dydx", "hyperliquid"];

export type Side = "buy" | "sell";

export type OrderKind = "market" | "limit";

export type TimeInForce = "ioc" | "gtc";

// ─────────────────────────────────────────────────────────────────────────────
// Market Data
// ─────────────────────────────────────────────────────────────────────────────

/**
 * One price point of a materialized book. `size` is always > 0 here;
 * size 0 only exists on the wire as the removal marker.
 */
export interface Level {
  price: DecimalStr;
  size: DecimalStr;
  orders: number;
}

/**
 * Canonical L2 book.
 *
 * - bids strictly descending, asks strictly ascending
 * - best bid < best ask whenever both sides are non-empty
 * - timestampMs non-decreasing within one (venue, symbol) stream
 */
export interface OrderBook {
  venue: VenueTag;
  symbol: string;
  bids: readonly Level[];
  asks: readonly Level[];
  timestampMs: Ms;
}

/**
 * Absent fields mean the venue did not report them (never zero-filled).
 * fundingRate is a per-interval rate, not a percentage.
 */
export interface MarketSummary {
  symbol: string;
  markPrice?: DecimalStr;
  volume24h?: DecimalStr;
  openInterest?: DecimalStr;
  fundingRate?: DecimalStr;
}

export interface LeverageInfo {
  venue: VenueTag;
  symbol: string;
  maxLeverage: number;
  /** "policy" when the venue's documented fallback constant was used */
  source: "metadata" | "policy";
}

// ─────────────────────────────────────────────────────────────────────────────
// Instruments
// ─────────────────────────────────────────────────────────────────────────────

export type PriceRule =
  | { type: "tick"; tickSize: DecimalStr }
  | { type: "significant"; significantFigures: number; maxDecimals: number };

export interface InstrumentSpec {
  symbol: string;
  /** Smallest size increment, e.g. "0.0001" */
  sizeStep: DecimalStr;
  sizeDecimals: number;
  priceRule: PriceRule;
}

// ─────────────────────────────────────────────────────────────────────────────
// Orders
// ─────────────────────────────────────────────────────────────────────────────

/**
 * What the operator asked for. usdValue is the notional as typed; sizing
 * happens in the normalizer.
 */
export interface TradeRequest {
  asset: string;
  side: Side;
  kind: OrderKind;
  usdValue: DecimalStr;
  limitPrice?: DecimalStr;
  leverage: number;
  crossMargin?: boolean;
  reduceOnly: boolean;
}

export interface NormalizedOrder {
  venue: VenueTag;
  symbol: string;
  side: Side;
  price: DecimalStr;
  size: DecimalStr;
  timeInForce: TimeInForce;
  reduceOnly: boolean;
  notionalUsd: DecimalStr;
}

/**
 * Payload handed to an order gateway.
 */
export interface VenueOrder extends NormalizedOrder {
  /** Random unsigned 32-bit id */
  clientId: number;
  leverage: number;
  crossMargin?: boolean;
}

export type ReceiptStatus = "submitted" | "resting" | "filled";

export interface VenueReceipt {
  venue: VenueTag;
  /** Opaque venue order id, accepted back by cancelOrder */
  orderId: string;
  clientId: number;
  symbol: string;
  side: Side;
  price: DecimalStr;
  size: DecimalStr;
  status: ReceiptStatus;
  raw?: unknown;
}

// ─────────────────────────────────────────────────────────────────────────────
// Account
// ─────────────────────────────────────────────────────────────────────────────

export interface Position {
  venue: VenueTag;
  symbol: string;
  /** Signed: positive long, negative short */
  size: DecimalStr;
  entryPrice?: DecimalStr;
  liquidationPrice?: DecimalStr;
  unrealizedPnl?: DecimalStr;
  marginUsed?: DecimalStr;
  leverage?: number;
}

export interface OpenOrder {
  venue: VenueTag;
  orderId: string;
  symbol: string;
  side: Side;
  price: DecimalStr;
  size: DecimalStr;
  status: string;
}

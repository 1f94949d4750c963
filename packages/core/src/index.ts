/**
 * packages/core - venue-agnostic market data types and pure logic
 *
 * No DB/HTTP/WS/FS. Adapters feed wire data in; the app reads results out.
 */

export * from "./types";
export * from "./errors";
export { decimalsOfStep, formatFixed, parseDecimal, roundToStep } from "./decimal";
export { bestAsk, bestBid, findBookViolations, OrderBookBuilder, spreadOf } from "./orderbook";
export type { BookUpdateError, LevelUpdate } from "./orderbook";
export { computeBackoffDelayMs, DEFAULT_BACKOFF_POLICY } from "./backoff";
export type { BackoffPolicy } from "./backoff";
export {
  DEFAULT_MIN_NOTIONAL_USD,
  formatPrice,
  marketReferencePrice,
  normalizeClose,
  normalizeTradeRequest,
  precheckTradeRequest,
  roundPrice,
} from "./order-normalizer";
export type { NormalizeContext } from "./order-normalizer";

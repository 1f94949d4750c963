/**
 * packages/adapters - Venue Adapters
 *
 * - Port interfaces for venue-agnostic market data and trading
 * - Websocket connection, JSON HTTP client and subscription supervisor
 * - dYdX v4 and Hyperliquid adapters
 */

// Port interfaces
export * from "./ports";

// Shared plumbing
export { AggregatorConfigSchema, DEFAULT_AGGREGATOR_CONFIG, parseAggregatorConfig } from "./config";
export type { AggregatorConfig } from "./config";
export { buildUrl, HttpStatusError, JsonHttpClient, mapHttpError } from "./http/http-client";
export type { FetchLike, HttpClientOptions, QueryParams } from "./http/http-client";
export { defaultConnectionFactory, WsConnection } from "./ws/ws-connection";
export type { IWsConnection, WsConnectionFactory, WsConnectionOptions } from "./ws/ws-connection";
export { SubscriptionSupervisor } from "./supervisor/subscription-supervisor";
export type {
  HandleOutcome,
  StreamHandler,
  SupervisorOptions,
  SupervisorSnapshot,
  SupervisorTransition,
} from "./supervisor/subscription-supervisor";
export { DEFAULT_ORDER_TIMEOUT_MS, DEFAULT_SUMMARY_REFRESH_MS, mapGatewayError, normalizeSymbol, VenueAdapter } from "./venue-adapter";
export type { MarketSession, VenueAdapterOptions } from "./venue-adapter";

// Venues
export * from "./dydx";
export * from "./hyperliquid";

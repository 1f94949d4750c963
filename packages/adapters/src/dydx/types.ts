/**
 * dYdX v4 Indexer Types
 *
 * Wire schemas for the indexer websocket and REST API.
 *
 * Documentation: https://docs.dydx.exchange/api_integration-indexer/indexer_api
 */

import { z } from "zod";

// ============================================================================
// Endpoints
// ============================================================================

export interface DydxEndpoints {
  restUrl: string;
  wsUrl: string;
}

export const DYDX_MAINNET: DydxEndpoints = {
  restUrl: "https://indexer.dydx.trade/v4",
  wsUrl: "wss://indexer.dydx.trade/v4/ws",
};

export const DYDX_TESTNET: DydxEndpoints = {
  restUrl: "https://indexer.v4testnet.dydx.exchange/v4",
  wsUrl: "wss://indexer.v4testnet.dydx.exchange/v4/ws",
};

export const ORDERBOOK_CHANNEL = "v4_orderbook";
export const MARKETS_CHANNEL = "v4_markets";

/** Max leverage when the market omits initialMarginFraction */
export const DYDX_FALLBACK_MAX_LEVERAGE = 20;

/** BTC → BTC-USD */
export const toTicker = (symbol: string): string => `${symbol}-USD`;

/** BTC-USD → BTC */
export const fromTicker = (ticker: string): string => ticker.replace(/-USD$/, "");

// ============================================================================
// Account
// ============================================================================

export const DydxAccountSchema = z.object({
  /**
   * dydx1... bech32 address
   */
  address: z.string().regex(/^dydx1[0-9a-z]{38}$/, "Must be a dydx1 address"),

  subaccountNumber: z.number().int().min(0).max(128_000).default(0),
});

export type DydxAccount = z.infer<typeof DydxAccountSchema>;

// ============================================================================
// Websocket messages
// ============================================================================

const decimalString = z.string().regex(/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/, "Must be a decimal string");

/** Snapshot levels arrive as objects */
export const SnapshotLevelSchema = z.object({
  price: decimalString,
  size: decimalString,
});

/** Delta levels arrive as [price, size] tuples */
export const DeltaLevelSchema = z.tuple([decimalString, decimalString]);

export const OrderbookSnapshotContentsSchema = z.object({
  bids: z.array(SnapshotLevelSchema),
  asks: z.array(SnapshotLevelSchema),
});

export const OrderbookDeltaContentsSchema = z.object({
  bids: z.array(DeltaLevelSchema).optional(),
  asks: z.array(DeltaLevelSchema).optional(),
});

export const WsMarketFieldsSchema = z.object({
  oraclePrice: decimalString.nullish(),
  volume24H: decimalString.nullish(),
  openInterest: decimalString.nullish(),
  nextFundingRate: decimalString.nullish(),
});

export type WsMarketFields = z.infer<typeof WsMarketFieldsSchema>;

export const MarketsSnapshotContentsSchema = z.object({
  markets: z.record(z.string(), WsMarketFieldsSchema.loose()),
});

export const MarketsDeltaContentsSchema = z.object({
  trading: z.record(z.string(), WsMarketFieldsSchema.loose()).optional(),
  oraclePrices: z.record(z.string(), z.object({ oraclePrice: decimalString }).loose()).optional(),
});

/**
 * Envelope of every indexer websocket frame
 */
export const WsEnvelopeSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("connected"), connection_id: z.string().optional() }).loose(),
  z
    .object({
      type: z.literal("subscribed"),
      channel: z.string(),
      id: z.string().optional(),
      contents: z.unknown(),
    })
    .loose(),
  z
    .object({
      type: z.literal("channel_data"),
      channel: z.string(),
      id: z.string().optional(),
      contents: z.unknown(),
    })
    .loose(),
  z
    .object({
      type: z.literal("channel_batch_data"),
      channel: z.string(),
      id: z.string().optional(),
      contents: z.array(z.unknown()),
    })
    .loose(),
  z.object({ type: z.literal("unsubscribed"), channel: z.string(), id: z.string().optional() }).loose(),
  z.object({ type: z.literal("error"), message: z.string() }).loose(),
]);

export type WsEnvelope = z.infer<typeof WsEnvelopeSchema>;

// ============================================================================
// REST responses
// ============================================================================

export const PerpetualMarketSchema = z
  .object({
    ticker: z.string(),
    status: z.string(),
    oraclePrice: decimalString.nullish(),
    volume24H: decimalString.nullish(),
    openInterest: decimalString.nullish(),
    nextFundingRate: decimalString.nullish(),
    initialMarginFraction: decimalString.nullish(),
    tickSize: decimalString,
    stepSize: decimalString,
  })
  .loose();

export type PerpetualMarket = z.infer<typeof PerpetualMarketSchema>;

export const PerpetualMarketsResponseSchema = z.object({
  markets: z.record(z.string(), PerpetualMarketSchema),
});

export const PerpetualPositionSchema = z
  .object({
    market: z.string(),
    status: z.string(),
    side: z.enum(["LONG", "SHORT"]),
    size: decimalString,
    entryPrice: decimalString.nullish(),
    unrealizedPnl: decimalString.nullish(),
  })
  .loose();

export const PerpetualPositionsResponseSchema = z.object({
  positions: z.array(PerpetualPositionSchema),
});

export const IndexerOrderSchema = z
  .object({
    id: z.string(),
    ticker: z.string(),
    side: z.enum(["BUY", "SELL"]),
    price: decimalString,
    size: decimalString,
    status: z.string(),
  })
  .loose();

export const OrdersResponseSchema = z.array(IndexerOrderSchema);

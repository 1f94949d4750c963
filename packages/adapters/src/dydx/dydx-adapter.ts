/**
 * dYdX v4 Adapter
 *
 * - Indexer websocket: v4_orderbook (snapshot + [price, size] deltas) and
 *   v4_markets (summary enrichment) for one ticker
 * - Indexer REST: market metadata, summary, positions, open orders
 * - DRAINING clears the book: a diff stream cannot resume without a snapshot
 *
 * API Docs: https://docs.dydx.exchange/api_integration-indexer/indexer_websocket
 */

import Decimal from "decimal.js";
import { err, errAsync, ok, okAsync, type ResultAsync } from "neverthrow";
import type { z } from "zod";

import {
  configError,
  decimalsOfStep,
  parseDecimal,
  rejected,
  type InstrumentSpec,
  type LeverageInfo,
  type MarketSummary,
  type Ms,
  type OpenOrder,
  type OrderBookBuilder,
  type Position,
  type VenueError,
} from "@perp-aggregator/core";

import type { HandleOutcome, StreamHandler } from "../supervisor/subscription-supervisor";
import { DEFAULT_SUMMARY_REFRESH_MS, VenueAdapter, type VenueAdapterOptions } from "../venue-adapter";
import { DydxIndexerClient } from "./indexer-client";
import {
  DYDX_FALLBACK_MAX_LEVERAGE,
  DYDX_MAINNET,
  DYDX_TESTNET,
  fromTicker,
  MARKETS_CHANNEL,
  MarketsDeltaContentsSchema,
  MarketsSnapshotContentsSchema,
  ORDERBOOK_CHANNEL,
  OrderbookDeltaContentsSchema,
  OrderbookSnapshotContentsSchema,
  toTicker,
  WsEnvelopeSchema,
  type DydxAccount,
  type DydxEndpoints,
  type PerpetualMarket,
  type WsMarketFields,
} from "./types";

export interface DydxAdapterOptions extends VenueAdapterOptions {
  account?: DydxAccount;
  /** How long a REST summary (patched by the websocket) is served before refetching */
  summaryRefreshMs?: number;
  endpoints?: DydxEndpoints;
}

interface SummaryCache {
  symbol: string;
  summary: MarketSummary;
  restFetchedAtMs: Ms | null;
}

// ============================================================================
// Normalization (Indexer → Domain)
// ============================================================================

export function summaryFromMarket(symbol: string, market: WsMarketFields): MarketSummary {
  return {
    symbol,
    markPrice: market.oraclePrice ?? undefined,
    volume24h: market.volume24H ?? undefined,
    openInterest: market.openInterest ?? undefined,
    fundingRate: market.nextFundingRate ?? undefined,
  };
}

/**
 * Overlays the fields the websocket reported; absent fields keep their value.
 */
export function patchSummary(summary: MarketSummary, fields: WsMarketFields): MarketSummary {
  return {
    symbol: summary.symbol,
    markPrice: fields.oraclePrice ?? summary.markPrice,
    volume24h: fields.volume24H ?? summary.volume24h,
    openInterest: fields.openInterest ?? summary.openInterest,
    fundingRate: fields.nextFundingRate ?? summary.fundingRate,
  };
}

/**
 * maxLeverage = 1 / initialMarginFraction, two decimals rounded down
 */
export function leverageFromMarket(symbol: string, market: PerpetualMarket | null): LeverageInfo {
  const imf = parseDecimal(market?.initialMarginFraction);
  if (imf !== null && imf.gt(0)) {
    return {
      venue: "dydx",
      symbol,
      maxLeverage: new Decimal(1).div(imf).toDecimalPlaces(2, Decimal.ROUND_DOWN).toNumber(),
      source: "metadata",
    };
  }
  return { venue: "dydx", symbol, maxLeverage: DYDX_FALLBACK_MAX_LEVERAGE, source: "policy" };
}

export function instrumentFromMarket(symbol: string, market: PerpetualMarket): InstrumentSpec {
  return {
    symbol,
    sizeStep: market.stepSize,
    sizeDecimals: decimalsOfStep(market.stepSize),
    priceRule: { type: "tick", tickSize: market.tickSize },
  };
}

// ============================================================================
// DydxAdapter
// ============================================================================

export class DydxAdapter extends VenueAdapter {
  private readonly endpoints: DydxEndpoints;
  private readonly indexer: DydxIndexerClient;
  private readonly account: DydxAccount | undefined;
  private readonly summaryRefreshMs: number;

  private readonly markets = new Map<string, PerpetualMarket>();
  private summaryCache: SummaryCache | null = null;

  constructor(options: DydxAdapterOptions) {
    super("dydx", options);
    this.endpoints = options.endpoints ?? (options.config.testnet ? DYDX_TESTNET : DYDX_MAINNET);
    this.account = options.account;
    this.summaryRefreshMs = options.summaryRefreshMs ?? DEFAULT_SUMMARY_REFRESH_MS;
    this.indexer = new DydxIndexerClient({
      restUrl: this.endpoints.restUrl,
      timeoutMs: this.config.timeoutMs,
      retryAttempts: this.config.retryAttempts,
      retryDelayMs: this.retryDelayMs,
      fetch: this.fetchFn,
      signal: this.shutdownSignal,
    });
  }

  protected websocketUrl(): string {
    return this.endpoints.wsUrl;
  }

  protected override onSessionStart(symbol: string): void {
    if (this.summaryCache?.symbol !== symbol) {
      this.summaryCache = null;
    }
  }

  // ============================================================================
  // Websocket protocol
  // ============================================================================

  protected createStreamHandler(symbol: string, builder: OrderBookBuilder): StreamHandler {
    const ticker = toTicker(symbol);
    const orderbookSubscription = { channel: ORDERBOOK_CHANNEL, id: ticker };

    return {
      subscribe: connection => {
        connection.send({ type: "subscribe", channel: MARKETS_CHANNEL });
        connection.send({ type: "subscribe", ...orderbookSubscription });
      },
      unsubscribe: connection => {
        connection.send({ type: "unsubscribe", ...orderbookSubscription });
      },
      resubscribe: connection => {
        connection.send({ type: "unsubscribe", ...orderbookSubscription });
        connection.send({ type: "subscribe", ...orderbookSubscription });
      },
      handleMessage: message => this.handleMessage(symbol, builder, message),
      drain: () => {
        builder.reset();
        this.log.info("Cleared book while disconnected", { symbol });
      },
    };
  }

  private handleMessage(symbol: string, builder: OrderBookBuilder, message: unknown): HandleOutcome {
    const envelope = WsEnvelopeSchema.safeParse(message);
    if (!envelope.success) {
      this.rejectFrame("envelope", envelope.error);
      return "continue";
    }

    const frame = envelope.data;
    switch (frame.type) {
      case "connected":
      case "unsubscribed":
        return "continue";
      case "error":
        this.log.error("Indexer websocket error", { symbol, message: frame.message });
        return "continue";
      case "subscribed":
        return this.handleContents(symbol, builder, frame.channel, frame.id, frame.contents, true);
      case "channel_data":
        return this.handleContents(symbol, builder, frame.channel, frame.id, frame.contents, false);
      case "channel_batch_data": {
        for (const contents of frame.contents) {
          if (this.handleContents(symbol, builder, frame.channel, frame.id, contents, false) === "resubscribe") {
            return "resubscribe";
          }
        }
        return "continue";
      }
    }
  }

  private handleContents(
    symbol: string,
    builder: OrderBookBuilder,
    channel: string,
    id: string | undefined,
    contents: unknown,
    isSnapshot: boolean,
  ): HandleOutcome {
    if (channel === MARKETS_CHANNEL) {
      this.applyMarkets(symbol, contents, isSnapshot);
      return "continue";
    }

    if (channel !== ORDERBOOK_CHANNEL) {
      this.log.debug("Ignoring channel", { channel });
      return "continue";
    }
    if (id !== toTicker(symbol)) {
      this.log.debug("Ignoring orderbook for another ticker", { id });
      return "continue";
    }

    if (isSnapshot) {
      const parsed = OrderbookSnapshotContentsSchema.safeParse(contents);
      if (!parsed.success) {
        this.rejectFrame("v4_orderbook snapshot", parsed.error);
        return "continue";
      }
      return this.handleBookResult(symbol, builder, builder.applySnapshot(parsed.data.bids, parsed.data.asks));
    }

    const parsed = OrderbookDeltaContentsSchema.safeParse(contents);
    if (!parsed.success) {
      this.rejectFrame("v4_orderbook delta", parsed.error);
      return "continue";
    }
    const toLevel = ([price, size]: [string, string]) => ({ price, size });
    const bids = (parsed.data.bids ?? []).map(toLevel);
    const asks = (parsed.data.asks ?? []).map(toLevel);
    return this.handleBookResult(symbol, builder, builder.applyDelta(bids, asks));
  }

  private applyMarkets(symbol: string, contents: unknown, isSnapshot: boolean): void {
    const ticker = toTicker(symbol);
    let fields: WsMarketFields | undefined;

    if (isSnapshot) {
      const parsed = MarketsSnapshotContentsSchema.safeParse(contents);
      if (!parsed.success) {
        this.rejectFrame("v4_markets snapshot", parsed.error);
        return;
      }
      fields = parsed.data.markets[ticker];
    } else {
      const parsed = MarketsDeltaContentsSchema.safeParse(contents);
      if (!parsed.success) {
        this.rejectFrame("v4_markets update", parsed.error);
        return;
      }
      const trading = parsed.data.trading?.[ticker];
      const oracle = parsed.data.oraclePrices?.[ticker];
      if (trading || oracle) {
        fields = { ...trading, oraclePrice: oracle?.oraclePrice ?? trading?.oraclePrice };
      }
    }

    if (!fields) return;

    const previous = this.summaryCache?.symbol === symbol ? this.summaryCache : null;
    const summary = patchSummary(previous?.summary ?? { symbol }, fields);
    this.summaryCache = { symbol, summary, restFetchedAtMs: previous?.restFetchedAtMs ?? null };
    this.emitEvent({ type: "summary", ts: new Date(this.clock()), venue: this.venue, summary });
  }

  private rejectFrame(what: string, error: z.ZodError): void {
    const issues = error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    this.log.error("Rejected indexer frame", { what, issues });
  }

  // ============================================================================
  // REST queries
  // ============================================================================

  protected fetchMarketSummary(symbol: string): ResultAsync<MarketSummary, VenueError> {
    const cached = this.summaryCache;
    if (
      cached?.symbol === symbol &&
      cached.restFetchedAtMs !== null &&
      this.clock() - cached.restFetchedAtMs < this.summaryRefreshMs
    ) {
      return okAsync(cached.summary);
    }

    return this.indexer.getMarket(symbol).map(market => {
      this.markets.set(symbol, market);
      const summary = summaryFromMarket(symbol, market);
      if (this.currentSymbol() === symbol) {
        this.summaryCache = { symbol, summary, restFetchedAtMs: this.clock() };
      }
      return summary;
    });
  }

  async getLeverageInfo(symbol: string): Promise<LeverageInfo> {
    const upper = symbol.trim().toUpperCase();
    const cached = this.markets.get(upper);
    if (cached) return leverageFromMarket(upper, cached);

    const market = await this.indexer.getMarket(upper).match(
      fetched => {
        this.markets.set(upper, fetched);
        return fetched;
      },
      error => {
        this.log.debug("Leverage metadata unavailable, using fallback", { symbol: upper, error: error.message });
        return null;
      },
    );
    return leverageFromMarket(upper, market);
  }

  getAvailableAssets(): ResultAsync<string[], VenueError> {
    return this.indexer.getMarkets().map(markets => {
      for (const market of markets) {
        this.markets.set(fromTicker(market.ticker), market);
      }
      return markets
        .filter(m => m.status === "ACTIVE")
        .map(m => fromTicker(m.ticker))
        .sort();
    });
  }

  protected loadInstrument(symbol: string): ResultAsync<InstrumentSpec, VenueError> {
    const cached = this.markets.get(symbol);
    const market: ResultAsync<PerpetualMarket, VenueError> =
      cached ?
        okAsync(cached)
      : this.indexer.getMarket(symbol).map(fetched => {
          this.markets.set(symbol, fetched);
          return fetched;
        });

    return market.andThen(m =>
      m.status === "ACTIVE" ?
        ok(instrumentFromMarket(symbol, m))
      : err<InstrumentSpec, VenueError>(rejected("venue", `dydx market ${m.ticker} is ${m.status}`)),
    );
  }

  getPositions(): ResultAsync<Position[], VenueError> {
    const account = this.account;
    if (!account) {
      return errAsync(configError("no dydx address configured"));
    }

    return this.indexer.getOpenPositions(account).map(positions =>
      positions.map(p => {
        const size = new Decimal(p.size);
        const signed = p.side === "SHORT" && size.gt(0) ? size.neg() : size;
        return {
          venue: "dydx" as const,
          symbol: fromTicker(p.market),
          size: signed.toFixed(),
          entryPrice: p.entryPrice ?? undefined,
          unrealizedPnl: p.unrealizedPnl ?? undefined,
        };
      }),
    );
  }

  getOpenOrders(): ResultAsync<OpenOrder[], VenueError> {
    const account = this.account;
    if (!account) {
      return errAsync(configError("no dydx address configured"));
    }

    return this.indexer.getOpenOrders(account).map(orders =>
      orders.map(o => ({
        venue: "dydx" as const,
        orderId: o.id,
        symbol: fromTicker(o.ticker),
        side: o.side === "BUY" ? ("buy" as const) : ("sell" as const),
        price: o.price,
        size: o.size,
        status: o.status,
      })),
    );
  }
}

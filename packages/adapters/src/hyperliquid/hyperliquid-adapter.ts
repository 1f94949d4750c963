/**
 * Hyperliquid Adapter
 *
 * - Websocket l2Book: every message is a full snapshot of the coin's book;
 *   messages with an empty side are discarded
 * - POST /info metaAndAssetCtxs: summary, size decimals and max leverage
 * - DRAINING keeps the last book; it stays meaningful until the next snapshot
 *
 * API Docs: https://hyperliquid.gitbook.io/hyperliquid-docs/for-developers/api/websocket
 */

import Decimal from "decimal.js";
import { err, errAsync, ok, okAsync, type ResultAsync } from "neverthrow";
import type { z } from "zod";

import {
  configError,
  notFound,
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
import { HyperliquidInfoClient, type AssetMeta } from "./info-client";
import {
  HEARTBEAT_INTERVAL_MS,
  HYPERLIQUID_FALLBACK_MAX_LEVERAGE,
  HYPERLIQUID_MAINNET,
  HYPERLIQUID_TESTNET,
  L2BookDataSchema,
  MAX_PRICE_DECIMALS,
  PRICE_SIGNIFICANT_FIGURES,
  WsFrameSchema,
  type HyperliquidAccount,
  type HyperliquidEndpoints,
} from "./types";

export interface HyperliquidAdapterOptions extends VenueAdapterOptions {
  account?: HyperliquidAccount;
  /** How long one metaAndAssetCtxs snapshot answers summary queries */
  summaryRefreshMs?: number;
  endpoints?: HyperliquidEndpoints;
}

// ============================================================================
// Normalization (/info → Domain)
// ============================================================================

export function summaryFromAssetMeta(symbol: string, meta: AssetMeta): MarketSummary {
  return {
    symbol,
    markPrice: meta.ctx?.markPx ?? undefined,
    volume24h: meta.ctx?.dayNtlVlm ?? undefined,
    openInterest: meta.ctx?.openInterest ?? undefined,
    fundingRate: meta.ctx?.funding ?? undefined,
  };
}

export function instrumentFromAssetMeta(symbol: string, meta: AssetMeta): InstrumentSpec {
  const szDecimals = meta.universe.szDecimals;
  return {
    symbol,
    sizeStep: new Decimal(10).pow(-szDecimals).toFixed(),
    sizeDecimals: szDecimals,
    priceRule: {
      type: "significant",
      significantFigures: PRICE_SIGNIFICANT_FIGURES,
      maxDecimals: Math.max(0, MAX_PRICE_DECIMALS - szDecimals),
    },
  };
}

export function leverageFromAssetMeta(symbol: string, meta: AssetMeta | undefined): LeverageInfo {
  const maxLeverage = meta?.universe.maxLeverage;
  if (maxLeverage !== undefined) {
    return { venue: "hyperliquid", symbol, maxLeverage, source: "metadata" };
  }
  return { venue: "hyperliquid", symbol, maxLeverage: HYPERLIQUID_FALLBACK_MAX_LEVERAGE, source: "policy" };
}

// ============================================================================
// HyperliquidAdapter
// ============================================================================

export class HyperliquidAdapter extends VenueAdapter {
  private readonly endpoints: HyperliquidEndpoints;
  private readonly info: HyperliquidInfoClient;
  private readonly account: HyperliquidAccount | undefined;
  private readonly summaryRefreshMs: number;

  /** Keyed by upper-cased coin name */
  private readonly assets = new Map<string, AssetMeta>();
  private assetsFetchedAtMs: Ms | null = null;

  constructor(options: HyperliquidAdapterOptions) {
    super("hyperliquid", options);
    this.endpoints = options.endpoints ?? (options.config.testnet ? HYPERLIQUID_TESTNET : HYPERLIQUID_MAINNET);
    this.account = options.account;
    this.summaryRefreshMs = options.summaryRefreshMs ?? DEFAULT_SUMMARY_REFRESH_MS;
    this.info = new HyperliquidInfoClient({
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

  /** Venue spelling of a symbol ("KPEPE" → "kPEPE") once metadata is loaded */
  private coinFor(symbol: string): string {
    return this.assets.get(symbol)?.universe.name ?? symbol;
  }

  // ============================================================================
  // Websocket protocol
  // ============================================================================

  protected createStreamHandler(symbol: string, builder: OrderBookBuilder): StreamHandler {
    const coin = this.coinFor(symbol);
    const subscription = { type: "l2Book", coin };

    return {
      subscribe: connection => {
        connection.send({ method: "subscribe", subscription });
      },
      unsubscribe: connection => {
        connection.send({ method: "unsubscribe", subscription });
      },
      resubscribe: connection => {
        connection.send({ method: "unsubscribe", subscription });
        connection.send({ method: "subscribe", subscription });
      },
      handleMessage: message => this.handleMessage(symbol, coin, builder, message),
      drain: () => {
        this.log.info("Keeping last book while disconnected", { symbol });
      },
      heartbeat: { intervalMs: HEARTBEAT_INTERVAL_MS, message: { method: "ping" } },
    };
  }

  private handleMessage(symbol: string, coin: string, builder: OrderBookBuilder, message: unknown): HandleOutcome {
    const frame = WsFrameSchema.safeParse(message);
    if (!frame.success) {
      this.rejectFrame("frame", frame.error);
      return "continue";
    }

    const data = frame.data;
    switch (data.channel) {
      case "pong":
        return "continue";
      case "subscriptionResponse":
        this.log.debug("Subscription acknowledged", { symbol });
        return "continue";
      case "error":
        this.log.error("Hyperliquid websocket error", { symbol, data: data.data });
        return "continue";
      case "l2Book":
        return this.applyBook(symbol, coin, builder, data.data);
    }
  }

  private applyBook(symbol: string, coin: string, builder: OrderBookBuilder, data: unknown): HandleOutcome {
    const parsed = L2BookDataSchema.safeParse(data);
    if (!parsed.success) {
      this.rejectFrame("l2Book", parsed.error);
      return "continue";
    }
    if (parsed.data.coin !== coin) {
      this.log.debug("Ignoring book for another coin", { coin: parsed.data.coin });
      return "continue";
    }

    const [bids, asks] = parsed.data.levels;
    if (bids.length === 0 || asks.length === 0) {
      this.log.debug("Discarding l2Book with an empty side", { symbol, bids: bids.length, asks: asks.length });
      return "continue";
    }

    const toLevel = (l: { px: string; sz: string; n: number }) => ({ price: l.px, size: l.sz, orders: l.n });
    return this.handleBookResult(symbol, builder, builder.applySnapshot(bids.map(toLevel), asks.map(toLevel)));
  }

  private rejectFrame(what: string, error: z.ZodError): void {
    const issues = error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
    this.log.error("Rejected hyperliquid frame", { what, issues });
  }

  // ============================================================================
  // REST queries
  // ============================================================================

  private refreshAssets(): ResultAsync<Map<string, AssetMeta>, VenueError> {
    return this.info.getMetaAndAssetCtxs().map(metas => {
      this.assetsFetchedAtMs = this.clock();
      for (const meta of metas) {
        this.assets.set(meta.universe.name.toUpperCase(), meta);
      }
      return this.assets;
    });
  }

  private assetsFresh(): boolean {
    return this.assetsFetchedAtMs !== null && this.clock() - this.assetsFetchedAtMs < this.summaryRefreshMs;
  }

  /**
   * `reuseListed` answers from any cached entry regardless of age (static metadata).
   * Otherwise the snapshot is reused only inside the refresh window.
   */
  private assetFor(symbol: string, reuseListed: boolean): ResultAsync<AssetMeta, VenueError> {
    const cached = this.assets.get(symbol);
    if (cached && reuseListed) return okAsync(cached);

    const source: ResultAsync<Map<string, AssetMeta>, VenueError> = this.assetsFresh()
      ? okAsync(this.assets)
      : this.refreshAssets();
    return source.andThen(assets => {
      const meta = assets.get(symbol);
      return meta ? ok(meta) : err<AssetMeta, VenueError>(notFound(`hyperliquid has no perp ${symbol}`));
    });
  }

  protected fetchMarketSummary(symbol: string): ResultAsync<MarketSummary, VenueError> {
    return this.assetFor(symbol, false).map(meta => summaryFromAssetMeta(symbol, meta));
  }

  async getLeverageInfo(symbol: string): Promise<LeverageInfo> {
    const upper = symbol.trim().toUpperCase();
    const meta = await this.assetFor(upper, true).match(
      found => found,
      error => {
        this.log.debug("Leverage metadata unavailable, using fallback", { symbol: upper, error: error.message });
        return undefined;
      },
    );
    return leverageFromAssetMeta(upper, meta);
  }

  getAvailableAssets(): ResultAsync<string[], VenueError> {
    return this.refreshAssets().map(assets =>
      Array.from(assets.entries())
        .filter(([, meta]) => meta.universe.isDelisted !== true)
        .map(([symbol]) => symbol)
        .sort(),
    );
  }

  protected loadInstrument(symbol: string): ResultAsync<InstrumentSpec, VenueError> {
    return this.assetFor(symbol, true).andThen(meta =>
      meta.universe.isDelisted === true ?
        err<InstrumentSpec, VenueError>(rejected("venue", `hyperliquid perp ${symbol} is delisted`))
      : ok(instrumentFromAssetMeta(symbol, meta)),
    );
  }

  getPositions(): ResultAsync<Position[], VenueError> {
    const account = this.account;
    if (!account) {
      return errAsync(configError("no hyperliquid address configured"));
    }

    return this.info.getClearinghouseState(account.address).map(state =>
      state.assetPositions
        .map(entry => entry.position)
        .filter(p => !new Decimal(p.szi).isZero())
        .map(p => ({
          venue: "hyperliquid" as const,
          symbol: p.coin.toUpperCase(),
          size: p.szi,
          entryPrice: p.entryPx ?? undefined,
          liquidationPrice: p.liquidationPx ?? undefined,
          unrealizedPnl: p.unrealizedPnl ?? undefined,
          marginUsed: p.marginUsed ?? undefined,
          leverage: p.leverage?.value,
        })),
    );
  }

  getOpenOrders(): ResultAsync<OpenOrder[], VenueError> {
    const account = this.account;
    if (!account) {
      return errAsync(configError("no hyperliquid address configured"));
    }

    return this.info.getOpenOrders(account.address).map(orders =>
      orders.map(o => ({
        venue: "hyperliquid" as const,
        orderId: String(o.oid),
        symbol: o.coin.toUpperCase(),
        side: o.side === "B" ? ("buy" as const) : ("sell" as const),
        price: o.limitPx,
        size: o.sz,
        status: "open",
      })),
    );
  }
}

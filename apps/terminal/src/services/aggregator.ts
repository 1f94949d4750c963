/**
 * Aggregator - venue registry, fan-out queries and the last-good summary cache
 *
 * - Orderbook queries never fall back; a missing book is reported as-is
 * - Summary queries fall back to the last value seen for (venue, symbol),
 *   marked stale; this is the only place a failure is masked
 * - Order errors are returned verbatim
 */

import { err, errAsync, ok, ResultAsync, type Result } from "neverthrow";

import {
  DydxAdapter,
  HyperliquidAdapter,
  parseAggregatorConfig,
  type AggregatorConfig,
  type DydxAdapterOptions,
  type HyperliquidAdapterOptions,
  type VenueEvent,
  type VenuePort,
  type VenueSessionState,
} from "@perp-aggregator/adapters";
import {
  configError,
  describeVenueError,
  VENUE_TAGS,
  type LeverageInfo,
  type MarketSummary,
  type Ms,
  type OpenOrder,
  type OrderBook,
  type Position,
  type TradeRequest,
  type VenueError,
  type VenueReceipt,
  type VenueTag,
} from "@perp-aggregator/core";
import { createLogger } from "@perp-aggregator/utils";

const log = createLogger("aggregator");

export interface AggregatorOptions {
  /** Extra options for the dYdX adapter (account, gateway, test seams) */
  dydx?: Omit<DydxAdapterOptions, "config">;
  hyperliquid?: Omit<HyperliquidAdapterOptions, "config">;
  /** Prebuilt venues; replaces the default adapters */
  venues?: ReadonlyArray<VenuePort>;
  clock?: () => Ms;
}

export interface SummaryReading {
  summary: MarketSummary;
  /** True when served from the cache after a failed query */
  stale: boolean;
  /** The failure that forced the cache fallback */
  error?: VenueError;
}

export interface VenueOutcome<T> {
  venue: VenueTag;
  result: Result<T, VenueError>;
}

export interface VenueFailure {
  venue: VenueTag;
  error: VenueError;
}

export interface MergedListing<T> {
  items: T[];
  failures: VenueFailure[];
}

/**
 * One venue's column in the side-by-side view
 */
export interface VenueView {
  venue: VenueTag;
  book: OrderBook | null;
  bookError: VenueError | null;
  /** null renders as "no data" */
  summary: MarketSummary | null;
  summaryStale: boolean;
  leverage: LeverageInfo;
  session: VenueSessionState;
}

export interface MarketComparison {
  symbol: string;
  generatedAtMs: Ms;
  venues: VenueView[];
}

const summaryKey = (venue: VenueTag, symbol: string): string => `${venue}:${symbol.trim().toUpperCase()}`;

export class Aggregator {
  private readonly venues: ReadonlyMap<VenueTag, VenuePort>;
  private readonly clock: () => Ms;
  private readonly lastKnownSummary = new Map<string, MarketSummary>();
  private readonly assets = new Map<VenueTag, string[]>();

  private constructor(venues: ReadonlyArray<VenuePort>, clock: () => Ms) {
    this.venues = new Map(venues.map(v => [v.venue, v]));
    this.clock = clock;
  }

  /**
   * Validates the config, builds both adapters and loads their asset lists.
   * One venue failing the bootstrap is logged; all of them failing is an error.
   */
  static create(config: Partial<AggregatorConfig> | undefined, options: AggregatorOptions = {}): ResultAsync<Aggregator, VenueError> {
    const parsed = parseAggregatorConfig(config);
    if (parsed.isErr()) {
      return errAsync(parsed.error);
    }

    const venues = options.venues ?? [
      new DydxAdapter({ ...options.dydx, config: parsed.value }),
      new HyperliquidAdapter({ ...options.hyperliquid, config: parsed.value }),
    ];
    if (venues.length === 0) {
      return errAsync(configError("no venues configured"));
    }

    const aggregator = new Aggregator(venues, options.clock ?? Date.now);
    return ResultAsync.fromSafePromise(aggregator.bootstrap()).andThen((failures): Result<Aggregator, VenueError> => {
      if (failures.length < venues.length) return ok(aggregator);

      const details = failures.map(f => `${f.venue}: ${f.error.message}`).join("; ");
      const first = failures[0]?.error ?? configError("no venues configured");
      return err({ ...first, message: `metadata bootstrap failed on every venue (${details})` });
    });
  }

  venueTags(): VenueTag[] {
    return VENUE_TAGS.filter(tag => this.venues.has(tag));
  }

  /** Symbols the venue listed at bootstrap (empty if it failed) */
  availableAssets(venue: VenueTag): readonly string[] {
    return this.assets.get(venue) ?? [];
  }

  onVenueEvent(handler: (event: VenueEvent) => void): void {
    for (const port of this.venues.values()) {
      port.onEvent(handler);
    }
  }

  // ============================================================================
  // Market data
  // ============================================================================

  /**
   * Starts `symbol` on every venue. A venue that fails is logged and reported;
   * the others keep running.
   */
  async startAllMarketUpdates(symbol: string): Promise<VenueOutcome<void>[]> {
    return Promise.all(
      Array.from(this.venues.values()).map(async port => {
        const result = await port.startMarketUpdates(symbol);
        if (result.isErr()) {
          log.warn("Market updates failed to start", { venue: port.venue, symbol, error: describeVenueError(result.error) });
        }
        return { venue: port.venue, result };
      }),
    );
  }

  getExchangeOrderbook(venue: VenueTag, symbol: string): Result<OrderBook, VenueError> {
    const port = this.venues.get(venue);
    if (!port) return err(configError(`no adapter registered for ${venue}`));
    return port.getOrderbook(symbol);
  }

  getExchangeSummary(venue: VenueTag, symbol: string): ResultAsync<SummaryReading, VenueError> {
    const port = this.venues.get(venue);
    if (!port) return errAsync(configError(`no adapter registered for ${venue}`));

    const key = summaryKey(venue, symbol);
    return port
      .getMarketSummary(symbol)
      .map((summary): SummaryReading => {
        this.lastKnownSummary.set(key, summary);
        return { summary, stale: false };
      })
      .orElse((error): Result<SummaryReading, VenueError> => {
        const cached = this.lastKnownSummary.get(key);
        if (!cached) return err(error);
        log.debug("Serving cached summary", { venue, symbol, error: error.message });
        return ok({ summary: cached, stale: true, error });
      });
  }

  /**
   * One query cycle over every venue for the UI.
   */
  async display(symbol: string): Promise<MarketComparison> {
    const upper = symbol.trim().toUpperCase();
    const views = await Promise.all(Array.from(this.venues.values()).map(port => this.viewOf(port, upper)));

    return {
      symbol: upper,
      generatedAtMs: this.clock(),
      venues: views.sort((a, b) => VENUE_TAGS.indexOf(a.venue) - VENUE_TAGS.indexOf(b.venue)),
    };
  }

  private async viewOf(port: VenuePort, symbol: string): Promise<VenueView> {
    const book = port.getOrderbook(symbol);
    const [summary, leverage] = await Promise.all([
      this.getExchangeSummary(port.venue, symbol),
      port.getLeverageInfo(symbol),
    ]);

    return {
      venue: port.venue,
      book: book.isOk() ? book.value : null,
      bookError: book.isErr() ? book.error : null,
      summary: summary.isOk() ? summary.value.summary : null,
      summaryStale: summary.isOk() && summary.value.stale,
      leverage,
      session: port.getSessionState(),
    };
  }

  // ============================================================================
  // Trading
  // ============================================================================

  placeTrade(venue: VenueTag, request: TradeRequest): ResultAsync<VenueReceipt, VenueError> {
    const port = this.venues.get(venue);
    if (!port) return errAsync(configError(`no adapter registered for ${venue}`));

    return port
      .placeOrder(request)
      .map(receipt => {
        log.info("Order placed", { venue, orderId: receipt.orderId, symbol: receipt.symbol, side: receipt.side });
        return receipt;
      })
      .mapErr(error => {
        log.warn("Order failed", { venue, asset: request.asset, error: describeVenueError(error) });
        return error;
      });
  }

  cancelOrder(venue: VenueTag, orderId: string): ResultAsync<void, VenueError> {
    const port = this.venues.get(venue);
    if (!port) return errAsync(configError(`no adapter registered for ${venue}`));
    return port.cancelOrder(orderId);
  }

  closePosition(venue: VenueTag, symbol: string, signedSize: string): ResultAsync<VenueReceipt, VenueError> {
    const port = this.venues.get(venue);
    if (!port) return errAsync(configError(`no adapter registered for ${venue}`));
    return port.closePosition(symbol, signedSize);
  }

  getPositions(): Promise<MergedListing<Position>> {
    return this.merge(port => port.getPositions());
  }

  getOpenOrders(): Promise<MergedListing<OpenOrder>> {
    return this.merge(port => port.getOpenOrders());
  }

  async shutdown(): Promise<void> {
    await Promise.all(Array.from(this.venues.values()).map(port => port.shutdown()));
    log.info("Aggregator stopped");
  }

  // ============================================================================
  // Helpers
  // ============================================================================

  private async bootstrap(): Promise<VenueFailure[]> {
    const failures: VenueFailure[] = [];

    await Promise.all(
      Array.from(this.venues.values()).map(async port => {
        const result = await port.getAvailableAssets();
        if (result.isOk()) {
          this.assets.set(port.venue, result.value);
          log.info("Loaded venue metadata", { venue: port.venue, assets: result.value.length });
        } else {
          failures.push({ venue: port.venue, error: result.error });
          log.warn("Venue metadata unavailable", { venue: port.venue, error: describeVenueError(result.error) });
        }
      }),
    );

    return failures;
  }

  private async merge<T>(query: (port: VenuePort) => ResultAsync<T[], VenueError>): Promise<MergedListing<T>> {
    const outcomes = await Promise.all(
      Array.from(this.venues.values()).map(async port => ({ venue: port.venue, result: await query(port) })),
    );

    const items: T[] = [];
    const failures: VenueFailure[] = [];
    for (const { venue, result } of outcomes) {
      if (result.isOk()) {
        items.push(...result.value);
      } else {
        failures.push({ venue, error: result.error });
      }
    }
    return { items, failures };
  }
}

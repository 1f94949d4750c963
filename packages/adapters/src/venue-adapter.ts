/**
 * Venue Adapter base - lifecycle and order pipeline shared by both venues
 *
 * - startMarketUpdates calls are serialized through a promise chain:
 *   swap session, await previous supervisor stop, spawn the new one
 * - The book cell belongs to the session; readers get immutable snapshots
 * - Orders: local precheck → instrument → normalize → leverage → submit
 */

import { randomInt } from "node:crypto";

import { err, errAsync, ok, okAsync, ResultAsync, type Result } from "neverthrow";

import {
  configError,
  DEFAULT_MIN_NOTIONAL_USD,
  insufficientFunds,
  normalizeClose,
  normalizeTradeRequest,
  notReady,
  OrderBookBuilder,
  precheckTradeRequest,
  rejected,
  transient,
  type BackoffPolicy,
  type BookUpdateError,
  type DecimalStr,
  type InstrumentSpec,
  type LeverageInfo,
  type MarketSummary,
  type Ms,
  type NormalizedOrder,
  type OpenOrder,
  type OrderBook,
  type Position,
  type TradeRequest,
  type VenueError,
  type VenueReceipt,
  type VenueTag,
} from "@perp-aggregator/core";
import { createLogger, TimeoutError, withTimeout, type Logger } from "@perp-aggregator/utils";

import type { AggregatorConfig } from "./config";
import type { FetchLike } from "./http/http-client";
import type { OrderGateway, VenueEvent, VenuePort, VenueSessionState } from "./ports";
import {
  SubscriptionSupervisor,
  type HandleOutcome,
  type StreamHandler,
  type SupervisorTransition,
} from "./supervisor/subscription-supervisor";
import { defaultConnectionFactory, type WsConnectionFactory } from "./ws/ws-connection";

export const DEFAULT_ORDER_TIMEOUT_MS = 30_000;
/** REST market summaries older than this are refetched */
export const DEFAULT_SUMMARY_REFRESH_MS = 10_000;

const SYMBOL_PATTERN = /^[A-Z0-9]{1,20}$/;
const UINT32_RANGE = 2 ** 32;

export interface VenueAdapterOptions {
  config: AggregatorConfig;
  orderTimeoutMs?: number;
  minNotionalUsd?: DecimalStr;
  /** Without a gateway, trading calls fail with config_error */
  gateway?: OrderGateway;
  connectionFactory?: WsConnectionFactory;
  fetch?: FetchLike;
  clock?: () => Ms;
  backoff?: BackoffPolicy;
  stopTimeoutMs?: number;
  /** Base delay between REST retries */
  retryDelayMs?: number;
}

/**
 * One live subscription: its book and the supervisor feeding it
 */
export interface MarketSession {
  symbol: string;
  builder: OrderBookBuilder;
  supervisor: SubscriptionSupervisor;
}

/**
 * Bare asset code, upper-cased; null when it is not one.
 */
export function normalizeSymbol(symbol: string): string | null {
  const upper = symbol.trim().toUpperCase();
  return SYMBOL_PATTERN.test(upper) ? upper : null;
}

/**
 * Maps an error thrown by an order gateway onto the venue error model.
 */
export function mapGatewayError(error: unknown): VenueError {
  if (error instanceof TimeoutError) {
    return transient(error.message);
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();

    if (message.includes("insufficient") || message.includes("not enough")) {
      return insufficientFunds(error.message);
    }
    if (message.includes("margin")) {
      return rejected("margin", error.message);
    }
    if (message.includes("timeout") || message.includes("timed out") || message.includes("econn") || message.includes("network")) {
      return transient(error.message);
    }
    return rejected("venue", error.message);
  }

  return rejected("venue", String(error));
}

export abstract class VenueAdapter implements VenuePort {
  readonly venue: VenueTag;

  protected readonly config: AggregatorConfig;
  protected readonly clock: () => Ms;
  protected readonly log: Logger;
  protected readonly fetchFn: FetchLike | undefined;
  protected readonly retryDelayMs: number | undefined;
  /** Aborted by shutdown; REST clients stop retrying on it */
  protected readonly shutdownSignal: AbortSignal;

  private readonly lifetime = new AbortController();
  private readonly orderTimeoutMs: number;
  private readonly minNotionalUsd: DecimalStr;
  private readonly gateway: OrderGateway | undefined;
  private readonly connectionFactory: WsConnectionFactory;
  private readonly backoff: BackoffPolicy | undefined;
  private readonly stopTimeoutMs: number | undefined;

  private eventHandlers: ((event: VenueEvent) => void)[] = [];
  private session: MarketSession | null = null;
  private startChain: Promise<void> = Promise.resolve();
  private isShutdown = false;

  protected lastGoodSummary: MarketSummary | null = null;

  protected constructor(venue: VenueTag, options: VenueAdapterOptions) {
    this.venue = venue;
    this.config = options.config;
    this.clock = options.clock ?? Date.now;
    this.log = createLogger(venue);
    this.fetchFn = options.fetch;
    this.retryDelayMs = options.retryDelayMs;
    this.shutdownSignal = this.lifetime.signal;
    this.orderTimeoutMs = options.orderTimeoutMs ?? DEFAULT_ORDER_TIMEOUT_MS;
    this.minNotionalUsd = options.minNotionalUsd ?? DEFAULT_MIN_NOTIONAL_USD;
    this.gateway = options.gateway;
    this.connectionFactory = options.connectionFactory ?? defaultConnectionFactory;
    this.backoff = options.backoff;
    this.stopTimeoutMs = options.stopTimeoutMs;
  }

  // ============================================================================
  // Venue hooks
  // ============================================================================

  protected abstract websocketUrl(): string;

  /**
   * Wire protocol for one subscription, writing into `builder`
   */
  protected abstract createStreamHandler(symbol: string, builder: OrderBookBuilder): StreamHandler;

  protected abstract fetchMarketSummary(symbol: string): ResultAsync<MarketSummary, VenueError>;

  protected abstract loadInstrument(symbol: string): ResultAsync<InstrumentSpec, VenueError>;

  abstract getLeverageInfo(symbol: string): Promise<LeverageInfo>;

  abstract getAvailableAssets(): ResultAsync<string[], VenueError>;

  abstract getPositions(): ResultAsync<Position[], VenueError>;

  abstract getOpenOrders(): ResultAsync<OpenOrder[], VenueError>;

  /**
   * Runs when a new symbol's session is about to start
   */
  protected onSessionStart(_symbol: string): void {}

  // ============================================================================
  // Market data
  // ============================================================================

  startMarketUpdates(symbol: string): ResultAsync<void, VenueError> {
    const upper = normalizeSymbol(symbol);
    if (upper === null) {
      return errAsync(configError(`invalid symbol: "${symbol}"`));
    }
    if (this.isShutdown) {
      return errAsync(configError(`${this.venue} adapter is shut down`));
    }

    const next = this.startChain.then(() => this.switchSession(upper));
    this.startChain = next;
    return ResultAsync.fromSafePromise(next);
  }

  getOrderbook(symbol: string): Result<OrderBook, VenueError> {
    const upper = symbol.trim().toUpperCase();
    const session = this.session;

    if (session?.symbol !== upper) {
      return err(notReady(`${this.venue} is not streaming ${upper}`));
    }
    const book = session.builder.current();
    if (book === null) {
      return err(notReady(`no ${this.venue} orderbook for ${upper} yet`));
    }
    return ok(book);
  }

  getMarketSummary(symbol: string): ResultAsync<MarketSummary, VenueError> {
    const upper = normalizeSymbol(symbol);
    if (upper === null) {
      return errAsync(configError(`invalid symbol: "${symbol}"`));
    }
    return this.fetchMarketSummary(upper).map(summary => {
      if (this.session?.symbol === upper) this.lastGoodSummary = summary;
      return summary;
    });
  }

  getSessionState(): VenueSessionState {
    const session = this.session;
    const snapshot = session?.supervisor.snapshot();

    return {
      venue: this.venue,
      desiredSymbol: session?.symbol ?? null,
      supervisorState: snapshot?.state ?? "IDLE",
      connectAttempts: snapshot?.connectAttempts ?? 0,
      backoffDeadlineMs: snapshot?.backoffDeadlineMs ?? null,
      currentBook: session?.builder.current() ?? null,
      lastGoodSummary: this.lastGoodSummary,
    };
  }

  onEvent(handler: (event: VenueEvent) => void): void {
    this.eventHandlers.push(handler);
  }

  async shutdown(): Promise<void> {
    this.isShutdown = true;
    this.lifetime.abort();
    const next = this.startChain.then(async () => {
      const session = this.session;
      this.session = null;
      if (session) await session.supervisor.stop();
    });
    this.startChain = next;
    await next;
  }

  /** Symbol of the live session, if any */
  protected currentSymbol(): string | null {
    return this.session?.symbol ?? null;
  }

  /** Current book when `symbol` is the live session's symbol */
  protected bookFor(symbol: string): OrderBook | null {
    return this.session?.symbol === symbol ? this.session.builder.current() : null;
  }

  // ============================================================================
  // Trading
  // ============================================================================

  placeOrder(request: TradeRequest): ResultAsync<VenueReceipt, VenueError> {
    const checked = precheckTradeRequest(request, this.minNotionalUsd);
    if (checked.isErr()) {
      return errAsync(checked.error);
    }

    const gateway = this.gateway;
    if (!gateway) {
      return errAsync(configError(`no order gateway configured for ${this.venue}`));
    }

    const symbol = request.asset.trim().toUpperCase();
    return this.loadInstrument(symbol)
      .andThen(instrument => this.applyLeverage(gateway, symbol, request).map(() => instrument))
      .andThen(instrument =>
        normalizeTradeRequest(request, {
          venue: this.venue,
          instrument,
          book: this.bookFor(symbol),
          minNotionalUsd: this.minNotionalUsd,
        }),
      )
      .andThen(order => this.submit(gateway, order, request.leverage, request.crossMargin));
  }

  closePosition(symbol: string, signedSize: string): ResultAsync<VenueReceipt, VenueError> {
    const upper = normalizeSymbol(symbol);
    if (upper === null) {
      return errAsync(rejected("invalid_request", `invalid symbol: "${symbol}"`));
    }

    const gateway = this.gateway;
    if (!gateway) {
      return errAsync(configError(`no order gateway configured for ${this.venue}`));
    }

    return this.loadInstrument(upper)
      .andThen(instrument => normalizeClose(upper, signedSize, { venue: this.venue, instrument, book: this.bookFor(upper) }))
      .andThen(order => this.submit(gateway, order, 1, undefined));
  }

  cancelOrder(orderId: string): ResultAsync<void, VenueError> {
    const gateway = this.gateway;
    if (!gateway) {
      return errAsync(configError(`no order gateway configured for ${this.venue}`));
    }
    if (orderId.trim() === "") {
      return errAsync(rejected("invalid_request", "order id is required"));
    }

    return ResultAsync.fromPromise(
      withTimeout(gateway.cancelOrder(orderId.trim()), this.orderTimeoutMs, `cancel ${this.venue} order`),
      mapGatewayError,
    ).map(() => {
      this.log.info("Order cancelled", { orderId });
    });
  }

  private applyLeverage(gateway: OrderGateway, symbol: string, request: TradeRequest): ResultAsync<void, VenueError> {
    if (request.leverage <= 1 || !gateway.updateLeverage) {
      return okAsync(undefined);
    }

    return ResultAsync.fromPromise(
      withTimeout(
        gateway.updateLeverage(symbol, request.leverage, request.crossMargin ?? false),
        this.orderTimeoutMs,
        `update ${this.venue} leverage`,
      ),
      mapGatewayError,
    );
  }

  private submit(
    gateway: OrderGateway,
    order: NormalizedOrder,
    leverage: number,
    crossMargin: boolean | undefined,
  ): ResultAsync<VenueReceipt, VenueError> {
    const clientId = randomInt(0, UINT32_RANGE);

    this.log.info("Submitting order", {
      symbol: order.symbol,
      side: order.side,
      price: order.price,
      size: order.size,
      tif: order.timeInForce,
      reduceOnly: order.reduceOnly,
      clientId,
    });

    return ResultAsync.fromPromise(
      withTimeout(
        gateway.submitOrder({ ...order, clientId, leverage, crossMargin }),
        this.orderTimeoutMs,
        `submit ${this.venue} order`,
      ),
      mapGatewayError,
    );
  }

  // ============================================================================
  // Sessions
  // ============================================================================

  private async switchSession(symbol: string): Promise<void> {
    const previous = this.session;
    if (previous?.symbol === symbol) return;

    const session = this.createSession(symbol);
    this.session = session;
    this.lastGoodSummary = null;
    this.onSessionStart(symbol);

    if (previous) {
      await previous.supervisor.stop();
    }
    session.supervisor.start();
    this.log.info("Market updates started", { symbol, replaced: previous?.symbol });
  }

  private createSession(symbol: string): MarketSession {
    const builder = new OrderBookBuilder(this.venue, symbol, this.clock);
    const supervisor = new SubscriptionSupervisor({
      url: this.websocketUrl(),
      label: `${this.venue}:${symbol}`,
      handler: this.createStreamHandler(symbol, builder),
      connectionFactory: this.connectionFactory,
      connectTimeoutMs: this.config.timeoutMs,
      stopTimeoutMs: this.stopTimeoutMs,
      backoff: this.backoff,
      clock: this.clock,
    });

    supervisor.onTransition(transition => this.emitTransition(symbol, transition));
    return { symbol, builder, supervisor };
  }

  /**
   * Turns a builder result into the supervisor's next step. Crossed books and
   * rejected batches drop the book and ask for a fresh snapshot.
   */
  protected handleBookResult(
    symbol: string,
    builder: OrderBookBuilder,
    result: Result<OrderBook, BookUpdateError>,
  ): HandleOutcome {
    if (result.isOk()) return "continue";

    const error = result.error;
    if (error.type === "awaiting_snapshot") {
      this.log.debug("Ignoring delta before snapshot", { symbol });
      return "continue";
    }

    builder.reset();
    this.log.warn("Dropped orderbook", { symbol, reason: error.message });
    this.emitEvent({ type: "book_dropped", ts: new Date(this.clock()), venue: this.venue, symbol, reason: error.message });
    return "resubscribe";
  }

  // ============================================================================
  // Event Handling
  // ============================================================================

  protected emitEvent(event: VenueEvent): void {
    for (const handler of this.eventHandlers) {
      try {
        handler(event);
      } catch (error) {
        this.log.error("Event handler threw an error", { error });
      }
    }
  }

  private emitTransition(symbol: string, transition: SupervisorTransition): void {
    const ts = new Date(this.clock());

    this.emitEvent({
      type: "state",
      ts,
      venue: this.venue,
      symbol,
      from: transition.from,
      to: transition.to,
      connectAttempts: transition.connectAttempts,
      delayMs: transition.delayMs,
    });

    if (transition.to === "STREAMING") {
      this.emitEvent({ type: "connected", ts, venue: this.venue, symbol });
    } else if (transition.to === "DRAINING") {
      this.emitEvent({ type: "disconnected", ts, venue: this.venue, symbol });
    } else if (transition.to === "BACKOFF") {
      this.emitEvent({
        type: "reconnecting",
        ts,
        venue: this.venue,
        symbol,
        reason: `Reconnecting in ${transition.delayMs ?? 0}ms (attempt ${transition.connectAttempts})`,
      });
    }
  }
}

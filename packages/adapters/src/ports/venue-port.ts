/**
 * Venue Port - Interface every venue adapter implements
 *
 * - Market data: one live (venue, symbol) subscription at a time
 * - Queries: orderbook (in-memory), summary/leverage/assets (metadata)
 * - Trading: normalized orders handed to an OrderGateway
 */

import type { ResultAsync, Result } from "neverthrow";

import type {
  LeverageInfo,
  MarketSummary,
  Ms,
  OpenOrder,
  OrderBook,
  Position,
  TradeRequest,
  VenueError,
  VenueOrder,
  VenueReceipt,
  VenueTag,
} from "@perp-aggregator/core";

// ============================================================================
// Session State
// ============================================================================

export type SupervisorState = "IDLE" | "CONNECTING" | "STREAMING" | "DRAINING" | "BACKOFF" | "STOPPED";

/**
 * Read-only view of one adapter's live session, for display and tests
 */
export interface VenueSessionState {
  venue: VenueTag;
  desiredSymbol: string | null;
  supervisorState: SupervisorState;
  connectAttempts: number;
  backoffDeadlineMs: Ms | null;
  currentBook: OrderBook | null;
  lastGoodSummary: MarketSummary | null;
}

// ============================================================================
// Events
// ============================================================================

/**
 * Connection event
 */
export interface ConnectionEvent {
  type: "connected" | "disconnected" | "reconnecting";
  ts: Date;
  venue: VenueTag;
  symbol: string;
  reason?: string;
}

/**
 * Supervisor transition
 */
export interface StateEvent {
  type: "state";
  ts: Date;
  venue: VenueTag;
  symbol: string;
  from: SupervisorState;
  to: SupervisorState;
  connectAttempts: number;
  delayMs?: number;
}

/**
 * A published book was discarded (crossed or invalid wire data)
 */
export interface BookDroppedEvent {
  type: "book_dropped";
  ts: Date;
  venue: VenueTag;
  symbol: string;
  reason: string;
}

/**
 * Websocket enrichment applied to the cached summary
 */
export interface SummaryEvent {
  type: "summary";
  ts: Date;
  venue: VenueTag;
  summary: MarketSummary;
}

export type VenueEvent = ConnectionEvent | StateEvent | BookDroppedEvent | SummaryEvent;

// ============================================================================
// Order Gateway
// ============================================================================

/**
 * Signs and submits orders on behalf of an adapter. Implementations wrap a
 * venue's trading SDK and wallet; errors are thrown and mapped by the adapter.
 */
export interface OrderGateway {
  submitOrder(order: VenueOrder): Promise<VenueReceipt>;
  cancelOrder(orderId: string): Promise<void>;
  updateLeverage?(symbol: string, leverage: number, crossMargin: boolean): Promise<void>;
}

// ============================================================================
// Venue Port
// ============================================================================

export interface VenuePort {
  readonly venue: VenueTag;

  /**
   * Starts (or switches) the live subscription. Idempotent per symbol;
   * resolves once the supervisor is registered, not once data arrives.
   */
  startMarketUpdates(symbol: string): ResultAsync<void, VenueError>;

  /**
   * Latest published book for the current symbol; not_ready otherwise.
   */
  getOrderbook(symbol: string): Result<OrderBook, VenueError>;

  getMarketSummary(symbol: string): ResultAsync<MarketSummary, VenueError>;

  /**
   * Never fails; falls back to the venue's documented constant.
   */
  getLeverageInfo(symbol: string): Promise<LeverageInfo>;

  getAvailableAssets(): ResultAsync<string[], VenueError>;

  placeOrder(request: TradeRequest): ResultAsync<VenueReceipt, VenueError>;

  cancelOrder(orderId: string): ResultAsync<void, VenueError>;

  /**
   * Reduce-only order against `signedSize` (positive = long).
   */
  closePosition(symbol: string, signedSize: string): ResultAsync<VenueReceipt, VenueError>;

  getPositions(): ResultAsync<Position[], VenueError>;

  getOpenOrders(): ResultAsync<OpenOrder[], VenueError>;

  getSessionState(): VenueSessionState;

  onEvent(handler: (event: VenueEvent) => void): void;

  /**
   * Stops the supervisor; safe to call more than once.
   */
  shutdown(): Promise<void>;
}

/**
 * dYdX Indexer REST client
 */

import { err, ok, type ResultAsync } from "neverthrow";
import type { z } from "zod";

import { notFound, type VenueError } from "@perp-aggregator/core";

import { JsonHttpClient, type FetchLike } from "../http/http-client";
import {
  OrdersResponseSchema,
  PerpetualMarketsResponseSchema,
  PerpetualPositionsResponseSchema,
  toTicker,
  type DydxAccount,
  type PerpetualMarket,
} from "./types";

export interface DydxIndexerClientOptions {
  restUrl: string;
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs?: number;
  fetch?: FetchLike;
  signal?: AbortSignal;
}

export type DydxPosition = z.infer<typeof PerpetualPositionsResponseSchema>["positions"][number];
export type DydxOrder = z.infer<typeof OrdersResponseSchema>[number];

export class DydxIndexerClient {
  private readonly http: JsonHttpClient;

  constructor(options: DydxIndexerClientOptions) {
    this.http = new JsonHttpClient({
      baseUrl: options.restUrl,
      timeoutMs: options.timeoutMs,
      retryAttempts: options.retryAttempts,
      retryDelayMs: options.retryDelayMs,
      fetch: options.fetch,
      label: "dydx-indexer",
      signal: options.signal,
    });
  }

  /**
   * GET /perpetualMarkets?ticker=SYMBOL-USD
   */
  getMarket(symbol: string): ResultAsync<PerpetualMarket, VenueError> {
    const ticker = toTicker(symbol);
    return this.http
      .get("perpetualMarkets", PerpetualMarketsResponseSchema, { ticker })
      .andThen(response => {
        const market = response.markets[ticker];
        return market ? ok(market) : err<PerpetualMarket, VenueError>(notFound(`dydx has no market ${ticker}`));
      });
  }

  /**
   * GET /perpetualMarkets
   */
  getMarkets(): ResultAsync<PerpetualMarket[], VenueError> {
    return this.http.get("perpetualMarkets", PerpetualMarketsResponseSchema).map(response => Object.values(response.markets));
  }

  /**
   * GET /perpetualPositions?address&subaccountNumber&status=OPEN
   */
  getOpenPositions(account: DydxAccount): ResultAsync<DydxPosition[], VenueError> {
    return this.http
      .get("perpetualPositions", PerpetualPositionsResponseSchema, {
        address: account.address,
        subaccountNumber: account.subaccountNumber,
        status: "OPEN",
      })
      .map(response => response.positions);
  }

  /**
   * GET /orders?address&subaccountNumber&status=OPEN
   */
  getOpenOrders(account: DydxAccount): ResultAsync<DydxOrder[], VenueError> {
    return this.http.get("orders", OrdersResponseSchema, {
      address: account.address,
      subaccountNumber: account.subaccountNumber,
      status: "OPEN",
    });
  }
}

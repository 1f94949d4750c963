/**
 * Hyperliquid /info client
 *
 * All reads are POST /info with a `type` discriminator.
 */

import type { ResultAsync } from "neverthrow";
import type { z } from "zod";

import type { VenueError } from "@perp-aggregator/core";

import { JsonHttpClient, type FetchLike } from "../http/http-client";
import {
  ClearinghouseStateSchema,
  MetaAndAssetCtxsSchema,
  OpenOrdersSchema,
  type AssetCtx,
  type UniverseEntry,
} from "./types";

export interface HyperliquidInfoClientOptions {
  restUrl: string;
  timeoutMs: number;
  retryAttempts: number;
  retryDelayMs?: number;
  fetch?: FetchLike;
  signal?: AbortSignal;
}

/**
 * One universe entry joined with its asset context (same index)
 */
export interface AssetMeta {
  universe: UniverseEntry;
  ctx: AssetCtx | undefined;
}

export type ClearinghouseState = z.infer<typeof ClearinghouseStateSchema>;
export type HyperliquidOpenOrder = z.infer<typeof OpenOrdersSchema>[number];

export class HyperliquidInfoClient {
  private readonly http: JsonHttpClient;

  constructor(options: HyperliquidInfoClientOptions) {
    this.http = new JsonHttpClient({
      baseUrl: options.restUrl,
      timeoutMs: options.timeoutMs,
      retryAttempts: options.retryAttempts,
      retryDelayMs: options.retryDelayMs,
      fetch: options.fetch,
      label: "hyperliquid-info",
      signal: options.signal,
    });
  }

  /**
   * {type: "metaAndAssetCtxs"} → universe[i] joined with ctxs[i]
   */
  getMetaAndAssetCtxs(): ResultAsync<AssetMeta[], VenueError> {
    return this.http
      .post("info", { type: "metaAndAssetCtxs" }, MetaAndAssetCtxsSchema)
      .map(([meta, ctxs]) => meta.universe.map((universe, i) => ({ universe, ctx: ctxs[i] })));
  }

  getClearinghouseState(user: string): ResultAsync<ClearinghouseState, VenueError> {
    return this.http.post("info", { type: "clearinghouseState", user }, ClearinghouseStateSchema);
  }

  getOpenOrders(user: string): ResultAsync<HyperliquidOpenOrder[], VenueError> {
    return this.http.post("info", { type: "openOrders", user }, OpenOrdersSchema);
  }
}

/**
 * Hyperliquid Types
 *
 * Wire schemas for the websocket l2Book feed and the /info endpoint.
 *
 * Documentation: https://hyperliquid.gitbook.io/hyperliquid-docs/for-developers/api
 */

import { z } from "zod";

// ============================================================================
// Endpoints
// ============================================================================

export interface HyperliquidEndpoints {
  restUrl: string;
  wsUrl: string;
}

export const HYPERLIQUID_MAINNET: HyperliquidEndpoints = {
  restUrl: "https://api.hyperliquid.xyz",
  wsUrl: "wss://api.hyperliquid.xyz/ws",
};

export const HYPERLIQUID_TESTNET: HyperliquidEndpoints = {
  restUrl: "https://api.hyperliquid-testnet.xyz",
  wsUrl: "wss://api.hyperliquid-testnet.xyz/ws",
};

/** Max leverage when the universe entry is missing */
export const HYPERLIQUID_FALLBACK_MAX_LEVERAGE = 50;

/** Perp prices carry at most this many significant figures */
export const PRICE_SIGNIFICANT_FIGURES = 5;

/** Perp prices carry at most MAX_PRICE_DECIMALS - szDecimals decimals */
export const MAX_PRICE_DECIMALS = 6;

export const HEARTBEAT_INTERVAL_MS = 30_000;

// ============================================================================
// Account
// ============================================================================

export const HyperliquidAccountSchema = z.object({
  /**
   * 0x-prefixed user address
   */
  address: z.string().regex(/^0x[a-fA-F0-9]{40}$/, "Must be a 0x address"),
});

export type HyperliquidAccount = z.infer<typeof HyperliquidAccountSchema>;

// ============================================================================
// Websocket messages
// ============================================================================

const decimalString = z.string().regex(/^-?\d+(\.\d+)?([eE][-+]?\d+)?$/, "Must be a decimal string");

export const WsLevelSchema = z.object({
  px: decimalString,
  sz: decimalString,
  n: z.number().int().nonnegative(),
});

export const L2BookDataSchema = z.object({
  coin: z.string(),
  time: z.number(),
  levels: z.tuple([z.array(WsLevelSchema), z.array(WsLevelSchema)]),
});

export type L2BookData = z.infer<typeof L2BookDataSchema>;

/**
 * Every frame the adapter subscribes to; anything else is rejected
 */
export const WsFrameSchema = z.discriminatedUnion("channel", [
  z.object({ channel: z.literal("l2Book"), data: z.unknown() }),
  z.object({ channel: z.literal("subscriptionResponse"), data: z.unknown() }),
  z.object({ channel: z.literal("pong") }).loose(),
  z.object({ channel: z.literal("error"), data: z.unknown() }),
]);

// ============================================================================
// /info responses
// ============================================================================

export const UniverseEntrySchema = z
  .object({
    name: z.string(),
    szDecimals: z.number().int().nonnegative(),
    maxLeverage: z.number().positive().optional(),
    isDelisted: z.boolean().optional(),
  })
  .loose();

export type UniverseEntry = z.infer<typeof UniverseEntrySchema>;

export const AssetCtxSchema = z
  .object({
    markPx: decimalString.nullish(),
    dayNtlVlm: decimalString.nullish(),
    openInterest: decimalString.nullish(),
    funding: decimalString.nullish(),
  })
  .loose();

export type AssetCtx = z.infer<typeof AssetCtxSchema>;

export const MetaAndAssetCtxsSchema = z.tuple([
  z.object({ universe: z.array(UniverseEntrySchema) }).loose(),
  z.array(AssetCtxSchema),
]);

export const ClearinghouseStateSchema = z
  .object({
    assetPositions: z.array(
      z
        .object({
          position: z
            .object({
              coin: z.string(),
              szi: decimalString,
              entryPx: decimalString.nullish(),
              liquidationPx: decimalString.nullish(),
              unrealizedPnl: decimalString.nullish(),
              marginUsed: decimalString.nullish(),
              leverage: z.object({ type: z.string(), value: z.number() }).loose().optional(),
            })
            .loose(),
        })
        .loose(),
    ),
  })
  .loose();

export const OpenOrdersSchema = z.array(
  z
    .object({
      coin: z.string(),
      limitPx: decimalString,
      oid: z.number().int(),
      side: z.enum(["A", "B"]),
      sz: decimalString,
    })
    .loose(),
);

/**
 * Terminal Environment Configuration
 *
 * - Type-safe environment variables with Zod validation
 * - `.env` is loaded by dotenv before validation
 *
 * See .env.example for a template.
 */

import "dotenv/config";

import { createEnv } from "@t3-oss/env-core";
import { z } from "zod";

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform(v => v === "true" || v === "1");

/**
 * t3-env (@t3-oss/env-core) validated environment.
 *
 * Import `env` instead of reading `process.env` directly.
 */
export const env = createEnv({
  server: {
    // =========================================================================
    // Venues
    // =========================================================================

    /**
     * Use the testnet endpoints of both venues
     */
    PERP_TESTNET: booleanFlag.default(false),

    /**
     * Total attempts per REST request, first try included
     */
    PERP_RETRY_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),

    /**
     * Bound on every REST call and websocket connect (ms)
     */
    PERP_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),

    /**
     * Bound on order submission and cancellation (ms)
     */
    PERP_ORDER_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

    /**
     * Smallest order value accepted, in USD
     */
    PERP_MIN_NOTIONAL_USD: z
      .string()
      .regex(/^\d+(\.\d+)?$/, "Must be a non-negative decimal")
      .default("10"),

    /**
     * Symbol streamed at startup (bare asset code, e.g. BTC)
     */
    PERP_DEFAULT_SYMBOL: z
      .string()
      .regex(/^[A-Za-z0-9]{1,20}$/, "Must be a bare asset code")
      .default("BTC"),

    // =========================================================================
    // Accounts (read-only queries)
    // =========================================================================

    /**
     * dydx1... address used for positions and open orders
     */
    DYDX_ADDRESS: z
      .string()
      .regex(/^dydx1[0-9a-z]{38}$/, "Must be a dydx1 address")
      .optional(),

    DYDX_SUBACCOUNT_NUMBER: z.coerce.number().int().min(0).default(0),

    /**
     * 0x... user address used for positions and open orders
     */
    HYPERLIQUID_ADDRESS: z
      .string()
      .regex(/^0x[a-fA-F0-9]{40}$/, "Must be a 0x address")
      .optional(),

    // =========================================================================
    // Logging
    // =========================================================================

    /**
     * Valid values: ERROR | WARN | LOG | INFO | DEBUG
     */
    LOG_LEVEL: z.enum(["ERROR", "WARN", "LOG", "INFO", "DEBUG"]).default("INFO"),

    // =========================================================================
    // CLI Dashboard (TTY UI)
    // =========================================================================

    /**
     * Full-screen dashboard; plain log output when false or not on a TTY
     */
    DASHBOARD_ENABLED: booleanFlag.default(true),

    /**
     * Screen refresh interval (ms)
     */
    DASHBOARD_REFRESH_MS: z.coerce.number().int().positive().default(500),

    /**
     * Monochrome output
     */
    NO_COLOR: booleanFlag.default(false),
  },
  runtimeEnv: process.env,
  emptyStringAsUndefined: true,
});

export type Env = typeof env;

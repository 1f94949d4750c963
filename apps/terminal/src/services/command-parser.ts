/**
 * Command Parser - operator input → typed commands
 *
 *   symbol <ASSET>
 *   buy|sell <venue> <usd> [limit <price>] [lev <n>] [cross] [reduce]
 *   cancel <venue> <orderId>
 *   close <venue> <ASSET> <signedSize>
 *   positions | orders | help | quit
 *
 * Trades apply to the symbol currently streamed.
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

import type { Side, TradeRequest, VenueTag } from "@perp-aggregator/core";

export type Command =
  | { type: "symbol"; symbol: string }
  | { type: "trade"; venue: VenueTag; request: TradeRequest }
  | { type: "cancel"; venue: VenueTag; orderId: string }
  | { type: "close"; venue: VenueTag; symbol: string; signedSize: string }
  | { type: "positions" }
  | { type: "orders" }
  | { type: "help" }
  | { type: "quit" };

export interface ParseContext {
  /** Symbol trades apply to */
  symbol: string;
}

export const HELP_TEXT: readonly string[] = [
  "symbol <ASSET>                                   switch both venues to ASSET",
  "buy|sell <venue> <usd> [limit <px>] [lev <n>] [cross] [reduce]",
  "cancel <venue> <orderId>",
  "close <venue> <ASSET> <signedSize>               reduce-only IOC at top of book",
  "positions | orders | help | quit",
  "venues: dydx (a), hyperliquid (hl, b)",
];

const VENUE_ALIASES = new Map<string, VenueTag>([
  ["dydx", "dydx"],
  ["a", "dydx"],
  ["hyperliquid", "hyperliquid"],
  ["hl", "hyperliquid"],
  ["b", "hyperliquid"],
]);

const VenueSchema = z.string().transform((value, ctx) => {
  const venue = VENUE_ALIASES.get(value.toLowerCase());
  if (venue === undefined) {
    ctx.addIssue({ code: "custom", message: "unknown venue (dydx, hyperliquid)" });
    return z.NEVER;
  }
  return venue;
});

const SymbolSchema = z
  .string()
  .regex(/^[A-Za-z0-9]{1,20}$/, "expected an asset code like BTC")
  .transform(s => s.toUpperCase());

const PositiveDecimalSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "expected a positive number")
  .refine(s => Number(s) > 0, "expected a positive number");

const SignedDecimalSchema = z.string().regex(/^-?\d+(\.\d+)?$/, "expected a signed size like -0.5");

const LeverageSchema = z.coerce.number().int("leverage must be a whole number").min(1, "leverage must be >= 1");

const fail = (message: string): Result<Command, string> => err(message);

function parseArg<T>(schema: z.ZodType<T>, value: string | undefined, name: string): Result<T, string> {
  if (value === undefined) return err(`missing ${name}`);
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    return err(`invalid ${name} "${value}": ${parsed.error.issues[0]?.message ?? "invalid"}`);
  }
  return ok(parsed.data);
}

function parseTrade(side: Side, args: string[], ctx: ParseContext): Result<Command, string> {
  const [venueArg, usdArg, ...flags] = args;
  const venue = parseArg(VenueSchema, venueArg, "venue");
  if (venue.isErr()) return fail(venue.error);
  const usd = parseArg(PositiveDecimalSchema, usdArg, "usd value");
  if (usd.isErr()) return fail(usd.error);

  const request: TradeRequest = {
    asset: ctx.symbol,
    side,
    kind: "market",
    usdValue: usd.value,
    leverage: 1,
    reduceOnly: false,
  };

  for (let i = 0; i < flags.length; i++) {
    const flag = flags[i]?.toLowerCase();
    switch (flag) {
      case "limit": {
        const price = parseArg(PositiveDecimalSchema, flags[++i], "limit price");
        if (price.isErr()) return fail(price.error);
        request.kind = "limit";
        request.limitPrice = price.value;
        break;
      }
      case "lev": {
        const leverage = parseArg(LeverageSchema, flags[++i], "leverage");
        if (leverage.isErr()) return fail(leverage.error);
        request.leverage = leverage.value;
        break;
      }
      case "cross":
        request.crossMargin = true;
        break;
      case "reduce":
        request.reduceOnly = true;
        break;
      default:
        return fail(`unknown option "${flags[i] ?? ""}"`);
    }
  }

  return ok({ type: "trade", venue: venue.value, request });
}

export function parseCommand(line: string, ctx: ParseContext): Result<Command, string> {
  const [head, ...args] = line.trim().split(/\s+/).filter(t => t !== "");
  if (head === undefined) return fail("empty command");

  switch (head.toLowerCase()) {
    case "symbol":
    case "s": {
      const symbol = parseArg(SymbolSchema, args[0], "symbol");
      return symbol.map((value): Command => ({ type: "symbol", symbol: value }));
    }
    case "buy":
      return parseTrade("buy", args, ctx);
    case "sell":
      return parseTrade("sell", args, ctx);
    case "cancel": {
      const venue = parseArg(VenueSchema, args[0], "venue");
      if (venue.isErr()) return fail(venue.error);
      const orderId = args[1];
      if (orderId === undefined) return fail("missing order id");
      return ok({ type: "cancel", venue: venue.value, orderId });
    }
    case "close": {
      const venue = parseArg(VenueSchema, args[0], "venue");
      if (venue.isErr()) return fail(venue.error);
      const symbol = parseArg(SymbolSchema, args[1], "symbol");
      if (symbol.isErr()) return fail(symbol.error);
      const size = parseArg(SignedDecimalSchema, args[2], "size");
      if (size.isErr()) return fail(size.error);
      return ok({ type: "close", venue: venue.value, symbol: symbol.value, signedSize: size.value });
    }
    case "positions":
    case "pos":
      return ok({ type: "positions" });
    case "orders":
      return ok({ type: "orders" });
    case "help":
    case "?":
      return ok({ type: "help" });
    case "quit":
    case "exit":
    case "q":
      return ok({ type: "quit" });
    default:
      return fail(`unknown command "${head}" (try help)`);
  }
}

export { DydxAdapter, leverageFromMarket, patchSummary, summaryFromMarket } from "./dydx-adapter";
export type { DydxAdapterOptions } from "./dydx-adapter";
export { DydxIndexerClient } from "./indexer-client";
export { DYDX_FALLBACK_MAX_LEVERAGE, DYDX_MAINNET, DYDX_TESTNET, DydxAccountSchema, fromTicker, toTicker } from "./types";
export type { DydxAccount, DydxEndpoints } from "./types";

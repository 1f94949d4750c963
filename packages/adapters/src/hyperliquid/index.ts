export {
  HyperliquidAdapter,
  instrumentFromAssetMeta,
  leverageFromAssetMeta,
  summaryFromAssetMeta,
} from "./hyperliquid-adapter";
export type { HyperliquidAdapterOptions } from "./hyperliquid-adapter";
export { HyperliquidInfoClient } from "./info-client";
export type { AssetMeta } from "./info-client";
export {
  HYPERLIQUID_FALLBACK_MAX_LEVERAGE,
  HYPERLIQUID_MAINNET,
  HYPERLIQUID_TESTNET,
  HyperliquidAccountSchema,
} from "./types";
export type { HyperliquidAccount, HyperliquidEndpoints } from "./types";

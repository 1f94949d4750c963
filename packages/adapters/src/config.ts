/**
 * Aggregator configuration shared by every adapter
 */

import { err, ok, type Result } from "neverthrow";
import { z } from "zod";

import { configError, type VenueError } from "@perp-aggregator/core";

export const AggregatorConfigSchema = z.object({
  /**
   * Use the venues' testnet endpoints
   */
  testnet: z.boolean().default(false),

  /**
   * Total attempts per REST request (first try included)
   */
  retryAttempts: z.number().int().min(1).max(10).default(3),

  /**
   * Bound on each REST attempt and each websocket connect. Retries get a fresh
   * bound, so one REST call can take up to retryAttempts * timeoutMs plus backoff.
   */
  timeoutMs: z.number().int().positive().default(5000),
});

export type AggregatorConfig = z.infer<typeof AggregatorConfigSchema>;

export const DEFAULT_AGGREGATOR_CONFIG: AggregatorConfig = AggregatorConfigSchema.parse({});

export function parseAggregatorConfig(input: unknown): Result<AggregatorConfig, VenueError> {
  const parsed = AggregatorConfigSchema.safeParse(input ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join(".")}: ${i.message}`).join("; ");
    return err(configError(`invalid aggregator config: ${issues}`));
  }
  return ok(parsed.data);
}

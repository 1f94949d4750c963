/**
 * Error kinds distinguished across every venue.
 *
 * - not_ready: data not received yet; retry shortly
 * - not_found: symbol unknown to the venue
 * - transient: network blip, timeout or 5xx
 * - rejected: venue (or local validation) refused the order; not retried
 * - insufficient_funds: rejection that UIs render separately
 * - config_error: misconfiguration, fatal to the affected adapter
 */

export type RejectReason = "too_small" | "below_minimum" | "invalid_price" | "invalid_request" | "margin" | "venue";

export type VenueError =
  | { type: "not_ready"; message: string }
  | { type: "not_found"; message: string }
  | { type: "transient"; message: string }
  | { type: "rejected"; reason: RejectReason; message: string }
  | { type: "insufficient_funds"; message: string }
  | { type: "config_error"; message: string };

export type VenueErrorType = VenueError["type"];

export const notReady = (message: string): VenueError => ({ type: "not_ready", message });
export const notFound = (message: string): VenueError => ({ type: "not_found", message });
export const transient = (message: string): VenueError => ({ type: "transient", message });
export const rejected = (reason: RejectReason, message: string): VenueError => ({ type: "rejected", reason, message });
export const insufficientFunds = (message: string): VenueError => ({ type: "insufficient_funds", message });
export const configError = (message: string): VenueError => ({ type: "config_error", message });

export function describeVenueError(error: VenueError): string {
  return error.type === "rejected" ? `rejected(${error.reason}): ${error.message}` : `${error.type}: ${error.message}`;
}

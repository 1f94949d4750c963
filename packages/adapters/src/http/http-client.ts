/**
 * JSON HTTP client for venue REST endpoints
 *
 * - Every attempt is bounded by timeoutMs (AbortSignal.timeout)
 * - Transient failures (network, timeout, 429, 5xx) are retried with linear backoff
 * - A call therefore lasts at most retryAttempts * timeoutMs plus the backoff waits
 * - Response bodies are validated with zod; a schema mismatch is logged as ERROR
 */

import { err, ok, ResultAsync } from "neverthrow";
import type { z } from "zod";

import { notFound, rejected, transient, type VenueError } from "@perp-aggregator/core";
import { AbortedError, createLogger, withRetry, type Logger } from "@perp-aggregator/utils";

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface HttpClientOptions {
  baseUrl: string;
  /** Per attempt, not per call */
  timeoutMs: number;
  /** Total attempts per request, including the first */
  retryAttempts: number;
  retryDelayMs?: number;
  fetch?: FetchLike;
  /** Scope for log lines, e.g. "dydx-http" */
  label?: string;
  /** Aborting stops pending retries; the call fails as transient */
  signal?: AbortSignal;
}

export type QueryParams = Record<string, string | number | boolean | undefined>;

/**
 * Non-2xx response
 */
export class HttpStatusError extends Error {
  readonly status: number;

  constructor(status: number, url: string, body: string) {
    super(`HTTP ${status} from ${url}${body === "" ? "" : `: ${body.slice(0, 200)}`}`);
    this.name = "HttpStatusError";
    this.status = status;
  }
}

export function isTransientStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Maps a failed request onto the venue error model.
 */
export function mapHttpError(error: unknown): VenueError {
  if (error instanceof HttpStatusError) {
    if (isTransientStatus(error.status)) return transient(error.message);
    if (error.status === 404) return notFound(error.message);
    return rejected("venue", error.message);
  }
  if (error instanceof AbortedError) {
    return transient(`request cancelled: ${error.message}`);
  }
  if (error instanceof Error) {
    if (error.name === "TimeoutError" || error.name === "AbortError") {
      return transient(`request timed out: ${error.message}`);
    }
    return transient(error.message);
  }
  return transient(String(error));
}

function isRetryable(error: unknown): boolean {
  return !(error instanceof HttpStatusError) || isTransientStatus(error.status);
}

export function buildUrl(baseUrl: string, path: string, query?: QueryParams): string {
  const url = new URL(`${baseUrl.replace(/\/+$/, "")}/${path.replace(/^\/+/, "")}`);
  for (const [key, value] of Object.entries(query ?? {})) {
    if (value !== undefined) url.searchParams.set(key, String(value));
  }
  return url.toString();
}

export class JsonHttpClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;
  private readonly fetchFn: FetchLike;
  private readonly signal: AbortSignal | undefined;
  private readonly log: Logger;

  constructor(options: HttpClientOptions) {
    this.baseUrl = options.baseUrl;
    this.timeoutMs = options.timeoutMs;
    this.retryAttempts = Math.max(1, options.retryAttempts);
    this.retryDelayMs = options.retryDelayMs ?? 250;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.signal = options.signal;
    this.log = createLogger(options.label ?? "http");
  }

  get<T>(path: string, schema: z.ZodType<T>, query?: QueryParams): ResultAsync<T, VenueError> {
    return this.request(buildUrl(this.baseUrl, path, query), { method: "GET" }, schema);
  }

  post<T>(path: string, body: unknown, schema: z.ZodType<T>): ResultAsync<T, VenueError> {
    return this.request(
      buildUrl(this.baseUrl, path),
      { method: "POST", headers: { "Content-Type": "application/json" }, body: JSON.stringify(body) },
      schema,
    );
  }

  private request<T>(url: string, init: RequestInit, schema: z.ZodType<T>): ResultAsync<T, VenueError> {
    const call = withRetry(() => this.fetchJson(url, init), {
      retries: this.retryAttempts - 1,
      delayMs: this.retryDelayMs,
      shouldRetry: isRetryable,
      signal: this.signal,
      onRetry: (attempt, error) =>
        this.log.debug("Retrying request", { url, attempt, error: error instanceof Error ? error.message : String(error) }),
    });

    return ResultAsync.fromPromise(call, mapHttpError).andThen(body => {
      const parsed = schema.safeParse(body);
      if (!parsed.success) {
        const issues = parsed.error.issues.map(i => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ");
        this.log.error("Response failed schema validation", { url, issues });
        return err(transient(`unexpected response from ${url}: ${issues}`));
      }
      return ok(parsed.data);
    });
  }

  private async fetchJson(url: string, init: RequestInit): Promise<unknown> {
    const response = await this.fetchFn(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    if (!response.ok) {
      const text = await response.text().catch(() => "");
      throw new HttpStatusError(response.status, url, text);
    }
    const body: unknown = await response.json();
    return body;
  }
}

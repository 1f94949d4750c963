/**
 * WsConnection - WebSocket connection wrapper with AsyncIterable support
 *
 * - Messages are parsed JSON; frames that fail to parse are logged and skipped
 * - `for await` ends when the socket closes, and throws if it closed on error
 * - close() waits for the close handshake, then terminates the socket
 */

import WebSocket from "ws";
import { createLogger } from "@perp-aggregator/utils";

const log = createLogger("ws");

const DEFAULT_CLOSE_TIMEOUT_MS = 1_000;

/**
 * Options for creating a WebSocket connection
 */
export interface WsConnectionOptions {
  /**
   * Full WebSocket URL (e.g., wss://indexer.dydx.trade/v4/ws)
   */
  url: string;

  /**
   * Label for logging (e.g., "dydx:BTC")
   */
  label?: string;

  /**
   * How long close() waits for the handshake before terminating
   */
  closeTimeoutMs?: number;
}

/**
 * Interface for WebSocket connections used by adapters.
 * Both WsConnection and test fakes implement this interface.
 */
export interface IWsConnection<T> extends AsyncIterable<T> {
  connect: () => Promise<void>;
  send: (message: unknown) => void;
  close: () => Promise<void>;
  isClosed: () => boolean;
}

/**
 * Connection factory type for dependency injection in tests
 */
export type WsConnectionFactory<T = unknown> = (url: string, label?: string) => IWsConnection<T>;

function decodeFrame(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString("utf8");
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  return Buffer.from(data).toString("utf8");
}

/**
 * A WebSocket connection that implements AsyncIterable for message consumption.
 *
 * Usage:
 * ```ts
 * const conn = new WsConnection({ url: "wss://..." });
 * await conn.connect();
 * conn.send({ method: "subscribe" });
 * for await (const message of conn) {
 *   // message is parsed JSON
 * }
 * ```
 */
export class WsConnection<T = unknown> implements IWsConnection<T> {
  private ws: WebSocket | null = null;
  private closed = true;
  private readonly url: string;
  private readonly label: string;
  private readonly closeTimeoutMs: number;

  // Queue for buffering incoming messages
  private queue: T[] = [];
  private pendingResolve: ((result: IteratorResult<T>) => void) | null = null;
  private pendingReject: ((error: unknown) => void) | null = null;
  private lastError: Error | null = null;

  constructor(options: WsConnectionOptions) {
    this.url = options.url;
    this.label = options.label ?? options.url;
    this.closeTimeoutMs = options.closeTimeoutMs ?? DEFAULT_CLOSE_TIMEOUT_MS;
  }

  /**
   * Connect to the WebSocket server
   */
  async connect(): Promise<void> {
    if (this.ws && !this.closed) {
      return;
    }

    return new Promise((resolve, reject) => {
      let opened = false;
      this.lastError = null;
      this.queue = [];

      const ws = new WebSocket(this.url);
      this.ws = ws;

      ws.on("open", () => {
        opened = true;
        this.closed = false;
        log.debug(`WsConnection opened: ${this.label}`);
        resolve();
      });

      ws.on("message", (data: WebSocket.RawData) => {
        try {
          const parsed: T = JSON.parse(decodeFrame(data));
          this.enqueue(parsed);
        } catch (error) {
          log.warn(`WsConnection parse error: ${this.label}`, { error });
        }
      });

      ws.on("close", (code, reason) => {
        log.debug(`WsConnection closed: ${this.label}`, { code, reason: reason.toString("utf8") });
        if (!opened) {
          reject(this.lastError ?? new Error(`connection to ${this.label} closed before open (code ${code})`));
        }
        this.handleClose();
      });

      ws.on("error", error => {
        log.warn(`WsConnection error: ${this.label}`, { error });
        this.lastError = error;

        if (!opened) {
          reject(error);
        } else {
          this.handleClose();
        }
      });
    });
  }

  send(message: unknown): void {
    if (!this.ws || this.closed || this.ws.readyState !== WebSocket.OPEN) {
      log.debug(`WsConnection send skipped (not open): ${this.label}`);
      return;
    }
    this.ws.send(JSON.stringify(message));
  }

  /**
   * Close the WebSocket connection; terminates if the peer does not answer
   * the close frame within closeTimeoutMs
   */
  async close(): Promise<void> {
    const ws = this.ws;
    this.ws = null;
    this.closed = true;
    this.wakeIterator();

    if (!ws || ws.readyState === WebSocket.CLOSED) return;

    await new Promise<void>(resolve => {
      const timer = setTimeout(() => {
        log.debug(`WsConnection terminate after close timeout: ${this.label}`);
        ws.terminate();
        resolve();
      }, this.closeTimeoutMs);
      ws.once("close", () => {
        clearTimeout(timer);
        resolve();
      });
      if (ws.readyState === WebSocket.CONNECTING) {
        ws.terminate();
      } else {
        ws.close();
      }
    });
  }

  /**
   * Check if the connection is closed
   */
  isClosed(): boolean {
    return this.closed;
  }

  // =========================================================================
  // AsyncIterable Implementation
  // =========================================================================

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: async (): Promise<IteratorResult<T>> => {
        const value = this.queue.shift();
        if (value !== undefined) {
          return { value, done: false };
        }

        if (this.closed) {
          if (this.lastError) {
            throw this.lastError;
          }
          return { value: undefined, done: true };
        }

        return new Promise<IteratorResult<T>>((resolve, reject) => {
          this.pendingResolve = resolve;
          this.pendingReject = reject;
        });
      },

      return: async (): Promise<IteratorResult<T>> => {
        await this.close();
        return { value: undefined, done: true };
      },
    };
  }

  // =========================================================================
  // Private Helpers
  // =========================================================================

  private enqueue(message: T): void {
    if (this.pendingResolve) {
      const resolve = this.pendingResolve;
      this.pendingResolve = null;
      this.pendingReject = null;
      resolve({ value: message, done: false });
    } else {
      this.queue.push(message);
    }
  }

  private handleClose(): void {
    this.closed = true;
    this.wakeIterator();
  }

  private wakeIterator(): void {
    if (!this.pendingResolve) return;

    const resolve = this.pendingResolve;
    const reject = this.pendingReject;
    this.pendingResolve = null;
    this.pendingReject = null;

    if (this.lastError && reject) {
      reject(this.lastError);
    } else {
      resolve({ value: undefined, done: true });
    }
  }
}

/**
 * Default connection factory using WsConnection
 */
export const defaultConnectionFactory: WsConnectionFactory = (url: string, label?: string) =>
  new WsConnection<unknown>({ url, label });

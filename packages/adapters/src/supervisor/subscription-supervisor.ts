/**
 * Subscription Supervisor - one background loop per (venue, symbol)
 *
 * CONNECTING → STREAMING → DRAINING → BACKOFF → CONNECTING
 * CONNECTING → BACKOFF on connect/subscribe failure
 * any state → STOPPED on stop()
 *
 * - connectAttempts resets to 0 once a connection is subscribed
 * - BACKOFF increments connectAttempts, then waits min(base × attempts, cap)
 * - Messages are handed to the venue handler in receive order; messages
 *   arriving after stop() are discarded
 */

import { computeBackoffDelayMs, DEFAULT_BACKOFF_POLICY, type BackoffPolicy, type Ms } from "@perp-aggregator/core";
import { createLogger, sleep, withTimeout, type Logger } from "@perp-aggregator/utils";

import type { SupervisorState } from "../ports";
import type { IWsConnection, WsConnectionFactory } from "../ws/ws-connection";

const DEFAULT_STOP_TIMEOUT_MS = 1_000;

/**
 * What the supervisor should do after a message was applied
 */
export type HandleOutcome = "continue" | "resubscribe";

/**
 * Venue-specific protocol hooks. Implementations must not throw.
 */
export interface StreamHandler {
  /** Sends subscription frames on a fresh (or resubscribing) connection */
  subscribe(connection: IWsConnection<unknown>): void;
  /** Sends unsubscribe frames on teardown */
  unsubscribe(connection: IWsConnection<unknown>): void;
  /** Re-requests the book on the live connection after it was dropped */
  resubscribe(connection: IWsConnection<unknown>): void;
  handleMessage(message: unknown): HandleOutcome;
  /** STREAMING → DRAINING; decides which state survives the disconnect */
  drain(): void;
  heartbeat?: { intervalMs: number; message: unknown };
}

export interface SupervisorTransition {
  from: SupervisorState;
  to: SupervisorState;
  connectAttempts: number;
  delayMs?: number;
}

export interface SupervisorSnapshot {
  state: SupervisorState;
  connectAttempts: number;
  backoffDeadlineMs: Ms | null;
}

export interface SupervisorOptions {
  url: string;
  label: string;
  handler: StreamHandler;
  connectionFactory: WsConnectionFactory;
  /** Bound on transport connect */
  connectTimeoutMs: number;
  /** Bound on stop() */
  stopTimeoutMs?: number;
  backoff?: BackoffPolicy;
  clock?: () => Ms;
}

export class SubscriptionSupervisor {
  private readonly url: string;
  private readonly label: string;
  private readonly handler: StreamHandler;
  private readonly connectionFactory: WsConnectionFactory;
  private readonly connectTimeoutMs: number;
  private readonly stopTimeoutMs: number;
  private readonly backoff: BackoffPolicy;
  private readonly clock: () => Ms;
  private readonly log: Logger;

  private readonly abortController = new AbortController();
  private readonly listeners: ((transition: SupervisorTransition) => void)[] = [];

  private state: SupervisorState = "IDLE";
  private connectAttempts = 0;
  private backoffDeadlineMs: Ms | null = null;
  private connection: IWsConnection<unknown> | null = null;
  private loop: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(options: SupervisorOptions) {
    this.url = options.url;
    this.label = options.label;
    this.handler = options.handler;
    this.connectionFactory = options.connectionFactory;
    this.connectTimeoutMs = options.connectTimeoutMs;
    this.stopTimeoutMs = options.stopTimeoutMs ?? DEFAULT_STOP_TIMEOUT_MS;
    this.backoff = options.backoff ?? DEFAULT_BACKOFF_POLICY;
    this.clock = options.clock ?? Date.now;
    this.log = createLogger(options.label);
  }

  /**
   * Spawns the background loop. No-op once started or stopped.
   */
  start(): void {
    if (this.loop || this.abortController.signal.aborted) return;

    this.loop = this.run().catch((error: unknown) => {
      this.log.error("Supervisor loop failed", { error });
    });
  }

  /**
   * Cancels the loop: sends unsubscribe, closes the transport, wakes the
   * backoff timer. Resolves within stopTimeoutMs even if the transport hangs.
   */
  stop(): Promise<void> {
    if (this.stopping) return this.stopping;

    this.stopping = this.teardown();
    return this.stopping;
  }

  snapshot(): SupervisorSnapshot {
    return {
      state: this.state,
      connectAttempts: this.connectAttempts,
      backoffDeadlineMs: this.backoffDeadlineMs,
    };
  }

  onTransition(listener: (transition: SupervisorTransition) => void): void {
    this.listeners.push(listener);
  }

  // ============================================================================
  // Loop
  // ============================================================================

  private async run(): Promise<void> {
    const signal = this.abortController.signal;

    while (!signal.aborted) {
      this.transition("CONNECTING");
      const connection = this.connectionFactory(this.url, this.label);
      this.connection = connection;

      const subscribed = await this.connect(connection);
      if (signal.aborted) break;

      if (subscribed) {
        this.connectAttempts = 0;
        this.transition("STREAMING");
        await this.stream(connection, signal);
        if (signal.aborted) break;

        this.transition("DRAINING");
        this.handler.drain();
      }
      await connection.close();
      if (signal.aborted) break;

      this.connectAttempts++;
      const delayMs = computeBackoffDelayMs(this.connectAttempts, this.backoff);
      this.backoffDeadlineMs = this.clock() + delayMs;
      this.transition("BACKOFF", delayMs);
      await sleep(delayMs, signal);
      this.backoffDeadlineMs = null;
    }
  }

  private async connect(connection: IWsConnection<unknown>): Promise<boolean> {
    try {
      await withTimeout(connection.connect(), this.connectTimeoutMs, `connect ${this.label}`);
      this.handler.subscribe(connection);
      return true;
    } catch (error) {
      this.log.warn("Connect failed", { url: this.url, attempts: this.connectAttempts + 1, error });
      return false;
    }
  }

  private async stream(connection: IWsConnection<unknown>, signal: AbortSignal): Promise<void> {
    const heartbeat = this.handler.heartbeat;
    const timer =
      heartbeat ? setInterval(() => connection.send(heartbeat.message), heartbeat.intervalMs) : null;

    try {
      for await (const message of connection) {
        if (signal.aborted) break;

        let outcome: HandleOutcome;
        try {
          outcome = this.handler.handleMessage(message);
        } catch (error) {
          this.log.error("Message handler threw an error", { error });
          continue;
        }

        if (outcome === "resubscribe") {
          this.log.warn("Resubscribing on the live connection");
          this.handler.resubscribe(connection);
        }
      }
      if (!signal.aborted) {
        this.log.warn("Stream ended", { url: this.url });
      }
    } catch (error) {
      if (!signal.aborted) {
        this.log.warn("Stream disconnected", { url: this.url, error });
      }
    } finally {
      if (timer) clearInterval(timer);
    }
  }

  private async teardown(): Promise<void> {
    this.abortController.abort();

    const connection = this.connection;
    if (connection && !connection.isClosed()) {
      this.handler.unsubscribe(connection);
    }

    const pending = Promise.all([connection?.close(), this.loop]);
    try {
      await withTimeout(pending, this.stopTimeoutMs, `stop ${this.label}`);
    } catch (error) {
      this.log.warn("Supervisor stop did not finish in time", { error });
    }

    this.backoffDeadlineMs = null;
    this.transition("STOPPED");
  }

  private transition(to: SupervisorState, delayMs?: number): void {
    const from = this.state;
    if (from === to || from === "STOPPED") return;
    this.state = to;

    const transition: SupervisorTransition = { from, to, connectAttempts: this.connectAttempts, delayMs };
    if (to === "BACKOFF") {
      this.log.info(`Reconnecting in ${delayMs ?? 0}ms (attempt ${this.connectAttempts})`);
    } else {
      this.log.info(`${from} → ${to}`);
    }

    for (const listener of this.listeners) {
      try {
        listener(transition);
      } catch (error) {
        this.log.error("Transition listener threw an error", { error });
      }
    }
  }
}

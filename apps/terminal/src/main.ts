/**
 * Terminal Main Entry Point
 *
 * - Composition root: env → aggregator → dashboard
 * - Streams the default symbol on both venues
 * - Refreshes the side-by-side view on an interval
 * - Reads operator commands from stdin
 */

import { createInterface } from "node:readline";

import { describeVenueError } from "@perp-aggregator/core";
import { LayoutPolicy, logger, parseLogLevel, Style } from "@perp-aggregator/utils";

import { env } from "./env";
import { Aggregator } from "./services/aggregator";
import { TerminalDashboard } from "./services/cli-dashboard";
import { CommandRunner } from "./services/command-runner";
import { renderComparison } from "./services/market-view";

async function main(): Promise<void> {
  logger.setLevel(parseLogLevel(env.LOG_LEVEL));

  const shared = {
    orderTimeoutMs: env.PERP_ORDER_TIMEOUT_MS,
    minNotionalUsd: env.PERP_MIN_NOTIONAL_USD,
  };
  const created = await Aggregator.create(
    {
      testnet: env.PERP_TESTNET,
      retryAttempts: env.PERP_RETRY_ATTEMPTS,
      timeoutMs: env.PERP_TIMEOUT_MS,
    },
    {
      dydx: {
        ...shared,
        account:
          env.DYDX_ADDRESS !== undefined ?
            { address: env.DYDX_ADDRESS, subaccountNumber: env.DYDX_SUBACCOUNT_NUMBER }
          : undefined,
      },
      hyperliquid: {
        ...shared,
        account: env.HYPERLIQUID_ADDRESS !== undefined ? { address: env.HYPERLIQUID_ADDRESS } : undefined,
      },
    },
  );
  if (created.isErr()) {
    logger.error("Failed to start aggregator", { error: describeVenueError(created.error) });
    process.exitCode = 1;
    return;
  }
  const aggregator = created.value;

  // CLI dashboard (TTY UI)
  const dashboard = new TerminalDashboard({
    enabled: env.DASHBOARD_ENABLED,
    refreshMs: env.DASHBOARD_REFRESH_MS,
    noColor: env.NO_COLOR,
  });
  dashboard.start();
  aggregator.onVenueEvent(event => dashboard.onVenueEvent(event));

  const runner = new CommandRunner(aggregator, env.PERP_DEFAULT_SYMBOL);
  dashboard.print(await runner.run(`symbol ${env.PERP_DEFAULT_SYMBOL}`).then(o => o.lines));

  // Plain mode prints the comparison on a slower cadence
  const plainStyle = new Style({ noColor: env.NO_COLOR });
  const plainLayout = new LayoutPolicy();
  const refreshMs = dashboard.isEnabled() ? env.DASHBOARD_REFRESH_MS : Math.max(5_000, env.DASHBOARD_REFRESH_MS);

  let refreshing = false;
  const refresh = async (): Promise<void> => {
    if (refreshing) return;
    refreshing = true;
    try {
      const comparison = await aggregator.display(runner.currentSymbol());
      if (dashboard.isEnabled()) {
        dashboard.setComparison(comparison);
      } else {
        const width = Math.max(60, Math.min(120, plainLayout.getTerminalWidth()));
        dashboard.print(renderComparison(comparison, { style: plainStyle, layout: plainLayout, width }));
      }
    } finally {
      refreshing = false;
    }
  };
  const refreshInterval = setInterval(() => {
    refresh().catch((error: unknown) => {
      logger.error("Refresh failed", { error });
    });
  }, refreshMs);

  // Graceful shutdown
  let stopping = false;
  const input = createInterface({ input: process.stdin, terminal: false });
  const shutdown = async (): Promise<void> => {
    if (stopping) return;
    stopping = true;
    logger.info("Shutting down");

    clearInterval(refreshInterval);
    input.close();
    await aggregator.shutdown();

    dashboard.stop();
    logger.info("Shutdown complete");
    process.exitCode = 0;
  };
  const stop = (): void => {
    shutdown().catch((error: unknown) => {
      logger.error("Shutdown failed", { error });
      process.exitCode = 1;
    });
  };

  input.on("line", line => {
    if (line.trim() === "") return;
    runner
      .run(line)
      .then(outcome => {
        dashboard.print(outcome.lines);
        if (outcome.quit) stop();
      })
      .catch((error: unknown) => {
        logger.error("Command failed", { line, error });
      });
  });
  input.on("close", stop);
  process.on("SIGINT", stop);
  process.on("SIGTERM", stop);

  logger.info("Terminal running", { symbol: runner.currentSymbol(), venues: aggregator.venueTags().join(",") });
}

// Run
main().catch((error: unknown) => {
  logger.error("Fatal error", { error });
  process.exitCode = 1;
});

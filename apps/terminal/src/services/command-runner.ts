/**
 * Command Runner - executes parsed operator commands against the aggregator
 * and turns the outcome into display lines.
 */

import { describeVenueError, type VenueReceipt, type VenueTag } from "@perp-aggregator/core";

import type { Aggregator, VenueFailure } from "./aggregator";
import { HELP_TEXT, parseCommand, type Command } from "./command-parser";

export interface CommandOutcome {
  lines: string[];
  quit: boolean;
}

function receiptLine(venue: VenueTag, receipt: VenueReceipt): string {
  return `${venue} order ${receipt.orderId}: ${receipt.side} ${receipt.size} ${receipt.symbol} @ ${receipt.price} (${receipt.status})`;
}

function failureLines(failures: ReadonlyArray<VenueFailure>): string[] {
  return failures.map(f => `${f.venue}: ${describeVenueError(f.error)}`);
}

export class CommandRunner {
  private readonly aggregator: Aggregator;
  private symbol: string;

  constructor(aggregator: Aggregator, symbol: string) {
    this.aggregator = aggregator;
    this.symbol = symbol.trim().toUpperCase();
  }

  currentSymbol(): string {
    return this.symbol;
  }

  async run(line: string): Promise<CommandOutcome> {
    const parsed = parseCommand(line, { symbol: this.symbol });
    if (parsed.isErr()) {
      return { lines: [`error: ${parsed.error}`], quit: false };
    }
    return this.execute(parsed.value);
  }

  async execute(command: Command): Promise<CommandOutcome> {
    switch (command.type) {
      case "symbol":
        return { lines: await this.switchSymbol(command.symbol), quit: false };

      case "trade": {
        const result = await this.aggregator.placeTrade(command.venue, command.request);
        return {
          lines: [
            result.match(
              receipt => receiptLine(command.venue, receipt),
              error => `${command.venue} order failed: ${describeVenueError(error)}`,
            ),
          ],
          quit: false,
        };
      }

      case "cancel": {
        const result = await this.aggregator.cancelOrder(command.venue, command.orderId);
        return {
          lines: [
            result.match(
              () => `${command.venue} order ${command.orderId} cancelled`,
              error => `${command.venue} cancel failed: ${describeVenueError(error)}`,
            ),
          ],
          quit: false,
        };
      }

      case "close": {
        const result = await this.aggregator.closePosition(command.venue, command.symbol, command.signedSize);
        return {
          lines: [
            result.match(
              receipt => receiptLine(command.venue, receipt),
              error => `${command.venue} close failed: ${describeVenueError(error)}`,
            ),
          ],
          quit: false,
        };
      }

      case "positions": {
        const { items, failures } = await this.aggregator.getPositions();
        const lines = items.map(
          p => `${p.venue} ${p.symbol} ${p.size} entry ${p.entryPrice ?? "-"} uPnL ${p.unrealizedPnl ?? "-"}`,
        );
        if (items.length === 0 && failures.length === 0) lines.push("no open positions");
        return { lines: [...lines, ...failureLines(failures)], quit: false };
      }

      case "orders": {
        const { items, failures } = await this.aggregator.getOpenOrders();
        const lines = items.map(o => `${o.venue} ${o.orderId} ${o.side} ${o.size} ${o.symbol} @ ${o.price} ${o.status}`);
        if (items.length === 0 && failures.length === 0) lines.push("no open orders");
        return { lines: [...lines, ...failureLines(failures)], quit: false };
      }

      case "help":
        return { lines: [...HELP_TEXT], quit: false };

      case "quit":
        return { lines: [], quit: true };
    }
  }

  private async switchSymbol(symbol: string): Promise<string[]> {
    const outcomes = await this.aggregator.startAllMarketUpdates(symbol);
    if (outcomes.some(o => o.result.isOk())) {
      this.symbol = symbol;
    }
    return outcomes.map(o =>
      o.result.match(
        () => `${o.venue}: streaming ${symbol}`,
        error => `${o.venue}: failed to start ${symbol}: ${describeVenueError(error)}`,
      ),
    );
  }
}

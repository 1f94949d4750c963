/**
 * Terminal CLI Dashboard (TTY UI)
 *
 * One screen showing:
 * - both venues side by side (top of book, depth, summary, leverage, feed state)
 * - the output of the last command
 * - recent log records (the logger is routed here while the dashboard runs)
 *
 * Without a TTY the dashboard is disabled and command output goes straight to
 * the write function.
 */

import type { VenueEvent } from "@perp-aggregator/adapters";
import type { VenueTag } from "@perp-aggregator/core";
import { LayoutPolicy, logger, resolveDashboardConfig, Style } from "@perp-aggregator/utils";

import type { MarketComparison } from "./aggregator";
import { LogPane } from "./log-pane";
import { renderComparison } from "./market-view";
import { TerminalScreen, type ExitHook } from "./terminal-screen";

const OUTPUT_LINES = 6;

export interface TerminalDashboardOptions {
  enabled: boolean;
  refreshMs?: number;
  noColor?: boolean;
  logLines?: number;
  maxLogs?: number;
  write?: (chunk: string) => void;
  isTTY?: boolean;
  columns?: () => number | undefined;
  clock?: () => number;
  /** Exit-signal registration for the alt-screen restore */
  onProcessOnce?: ExitHook;
}

export class TerminalDashboard {
  private readonly enabled: boolean;
  private readonly refreshMs: number;
  private readonly logLines: number;
  private readonly write: (chunk: string) => void;
  private readonly clock: () => number;

  private interval: ReturnType<typeof setInterval> | null = null;
  private comparison: MarketComparison | null = null;
  private output: string[] = [];
  private readonly reconnects = new Map<VenueTag, number>();
  private readonly dropped = new Map<VenueTag, number>();

  private readonly style: Style;
  private readonly layout: LayoutPolicy;
  private readonly screen: TerminalScreen;
  private readonly logs: LogPane;

  constructor(args: TerminalDashboardOptions) {
    this.write = args.write ?? (chunk => process.stdout.write(chunk));
    const cfg = resolveDashboardConfig({
      enabled: args.enabled,
      refreshMs: args.refreshMs ?? 500,
      noColor: args.noColor ?? false,
      isTTY: args.isTTY ?? process.stdout.isTTY === true,
      logLines: args.logLines,
    });

    this.enabled = cfg.enabled;
    this.refreshMs = cfg.refreshMs;
    this.logLines = cfg.logLines;
    this.clock = args.clock ?? Date.now;

    this.style = new Style({ noColor: cfg.noColor });
    this.layout = new LayoutPolicy(args.columns);
    this.screen = new TerminalScreen({ write: this.write, layout: this.layout, onProcessOnce: args.onProcessOnce });
    this.logs = new LogPane(args.maxLogs ?? 300);
  }

  isEnabled(): boolean {
    return this.enabled;
  }

  start(): void {
    if (!this.enabled || this.interval) return;
    this.screen.enter();
    logger.setSink({
      write: r => {
        this.logs.add(r);
      },
    });

    this.interval = setInterval(() => {
      this.render();
    }, this.refreshMs);
  }

  stop(): void {
    if (!this.enabled) return;
    if (this.interval) clearInterval(this.interval);
    this.interval = null;
    logger.clearSink();
    this.screen.leave();
  }

  setComparison(comparison: MarketComparison): void {
    this.comparison = comparison;
  }

  /**
   * Command output: kept in the output pane, or written out directly when
   * the dashboard is off.
   */
  print(lines: ReadonlyArray<string>): void {
    if (!this.enabled) {
      if (lines.length > 0) this.write(`${lines.join("\n")}\n`);
      return;
    }
    this.output = lines.slice(-OUTPUT_LINES);
  }

  onVenueEvent(event: VenueEvent): void {
    if (event.type === "reconnecting") {
      this.reconnects.set(event.venue, (this.reconnects.get(event.venue) ?? 0) + 1);
    } else if (event.type === "book_dropped") {
      this.dropped.set(event.venue, (this.dropped.get(event.venue) ?? 0) + 1);
    }
  }

  /**
   * Full frame for the current state; `render` writes it.
   */
  frame(): string[] {
    const width = Math.max(60, this.layout.getTerminalWidth());
    const nowMs = this.clock();
    const lines: string[] = [];

    const counters = Array.from(new Set([...this.reconnects.keys(), ...this.dropped.keys()]))
      .map(v => `${v} reconnects=${this.reconnects.get(v) ?? 0} dropped=${this.dropped.get(v) ?? 0}`)
      .join("  ");
    lines.push(
      `${this.style.badge("PERP AGGREGATOR", "bold", "inverse")} ${new Date(nowMs).toISOString()}${counters === "" ? "" : `  ${counters}`}`,
    );

    if (this.comparison) {
      lines.push(...renderComparison(this.comparison, { style: this.style, layout: this.layout, width }));
      lines.push(this.style.wrap(`updated ${this.layout.formatAgeMs(nowMs, this.comparison.generatedAtMs)} ago`, "dim"));
    } else {
      lines.push(this.style.wrap("waiting for market data...", "dim"));
    }

    lines.push(this.layout.sectionHeader("Output", width));
    for (const line of this.output) {
      lines.push(this.layout.boxContent(line, width));
    }
    lines.push(this.layout.boxLine(width, "bottom"));

    lines.push(this.layout.sectionHeader(this.logs.title(), width));
    for (const row of this.logs.rows(this.logLines, this.style)) {
      lines.push(this.layout.boxContent(row, width));
    }
    lines.push(this.layout.boxLine(width, "bottom"));
    lines.push(this.style.wrap("> type a command and press enter (help for the list)", "dim"));

    return lines;
  }

  private render(): void {
    if (!this.enabled) return;
    this.screen.paint(this.frame());
  }
}

/**
 * Market View - side-by-side text rendering of a MarketComparison
 *
 * Pure: returns frame lines; the dashboard decides where they go.
 */

import Decimal from "decimal.js";

import { parseDecimal, spreadOf, type Level, type OrderBook } from "@perp-aggregator/core";
import type { Column, LayoutPolicy, Style, StyleToken } from "@perp-aggregator/utils";

import type { MarketComparison, VenueView } from "./aggregator";

export const DEFAULT_DEPTH = 5;

const LABEL_WIDTH = 14;
const NO_DATA = "no data";

export interface TopOfBook {
  bid: string;
  ask: string;
  spread: string;
  spreadBps: string;
}

export interface RenderOptions {
  style: Style;
  layout: LayoutPolicy;
  width: number;
  depth?: number;
}

// ============================================================================
// Formatting
// ============================================================================

export function topOfBook(book: OrderBook | null): TopOfBook {
  if (book === null) return { bid: "-", ask: "-", spread: "-", spreadBps: "-" };

  const spread = spreadOf(book);
  return {
    bid: book.bids[0]?.price ?? "-",
    ask: book.asks[0]?.price ?? "-",
    spread: spread ? spread.spread.toFixed() : "-",
    spreadBps: spread && spread.mid.gt(0) ? spread.spread.div(spread.mid).mul(10_000).toFixed(2) : "-",
  };
}

/**
 * 123456789.12 → "123.46M"
 */
export function formatCompact(value: string | undefined): string {
  const n = parseDecimal(value);
  if (n === null) return "-";

  const abs = n.abs();
  if (abs.gte(1e9)) return `${n.div(1e9).toFixed(2)}B`;
  if (abs.gte(1e6)) return `${n.div(1e6).toFixed(2)}M`;
  if (abs.gte(1e3)) return `${n.div(1e3).toFixed(2)}K`;
  return n.toFixed(2);
}

/**
 * Per-interval rate as a percentage: "0.00001" → "0.0010%"
 */
export function formatFunding(rate: string | undefined): string {
  const n = parseDecimal(rate);
  return n === null ? "-" : `${n.mul(100).toFixed(4)}%`;
}

function formatLeverage(view: VenueView): string {
  const text = `${new Decimal(view.leverage.maxLeverage).toFixed()}x`;
  return view.leverage.source === "policy" ? `${text} (default)` : text;
}

function summaryCell(view: VenueView, value: string | undefined, format: (v: string | undefined) => string): string {
  if (view.summary === null) return NO_DATA;
  return format(value);
}

/**
 * Label + one cell per venue, in display order.
 */
export function metricRows(comparison: MarketComparison): string[][] {
  const views = comparison.venues;
  const row = (label: string, cell: (view: VenueView) => string): string[] => [label, ...views.map(cell)];

  return [
    row("state", v => v.session.supervisorState),
    row("best bid", v => topOfBook(v.book).bid),
    row("best ask", v => topOfBook(v.book).ask),
    row("spread", v => {
      const top = topOfBook(v.book);
      return top.spread === "-" ? "-" : `${top.spread} (${top.spreadBps} bps)`;
    }),
    row("mark", v => {
      const mark = summaryCell(v, v.summary?.markPrice, p => p ?? "-");
      return v.summaryStale ? `${mark} (stale)` : mark;
    }),
    row("24h volume", v => summaryCell(v, v.summary?.volume24h, formatCompact)),
    row("open interest", v => summaryCell(v, v.summary?.openInterest, formatCompact)),
    row("funding", v => summaryCell(v, v.summary?.fundingRate, formatFunding)),
    row("max leverage", formatLeverage),
  ];
}

/**
 * [bid size, bid price, ask price, ask size] for the top `depth` levels.
 */
export function depthRows(book: OrderBook | null, depth = DEFAULT_DEPTH): string[][] {
  const rows: string[][] = [];
  const cell = (level: Level | undefined, field: "price" | "size") => level?.[field] ?? "";

  for (let i = 0; i < depth; i++) {
    const bid = book?.bids[i];
    const ask = book?.asks[i];
    rows.push([cell(bid, "size"), cell(bid, "price"), cell(ask, "price"), cell(ask, "size")]);
  }
  return rows;
}

// ============================================================================
// Frame
// ============================================================================

function stateStyle(state: string): StyleToken {
  if (state === "STREAMING") return "green";
  if (state === "BACKOFF" || state === "CONNECTING") return "yellow";
  return "gray";
}

export function renderComparison(comparison: MarketComparison, options: RenderOptions): string[] {
  const { style, layout, width } = options;
  const depth = options.depth ?? DEFAULT_DEPTH;
  const inner = Math.max(0, width - 4);
  const venueCount = Math.max(1, comparison.venues.length);

  const venueWidth = Math.max(12, Math.floor((inner - LABEL_WIDTH) / venueCount) - 1);
  const metricColumns: Column[] = [
    { width: LABEL_WIDTH },
    ...comparison.venues.map((): Column => ({ width: venueWidth, align: "right" })),
  ];

  const depthWidth = Math.max(8, Math.floor((inner - LABEL_WIDTH) / 4) - 1);
  const depthColumns: Column[] = [
    { width: LABEL_WIDTH },
    { width: depthWidth, align: "right" },
    { width: depthWidth, align: "right" },
    { width: depthWidth, align: "right" },
    { width: depthWidth, align: "right" },
  ];

  const lines: string[] = [];
  const venues = comparison.venues.map(v => v.venue).join(" vs ");
  lines.push(layout.sectionHeader(`${comparison.symbol}  ${venues}`, width));
  lines.push(
    layout.boxContent(
      layout.tableRow(["", ...comparison.venues.map(v => style.wrap(v.venue.toUpperCase(), "bold"))], metricColumns),
      width,
    ),
  );

  for (const [label = "", ...cells] of metricRows(comparison)) {
    const styled = cells.map(cell => {
      if (label === "state") return style.wrap(cell, stateStyle(cell));
      if (label === "best bid") return style.wrap(cell, "green");
      if (label === "best ask") return style.wrap(cell, "red");
      if (label === "funding") return style.signed(cell);
      return cell;
    });
    lines.push(layout.boxContent(layout.tableRow([style.wrap(label, "dim"), ...styled], metricColumns), width));
  }

  for (const view of comparison.venues) {
    lines.push(layout.boxLine(width, "middle"));
    lines.push(
      layout.boxContent(
        layout.tableRow([style.wrap(view.venue, "bold"), "bid size", "bid", "ask", "ask size"], depthColumns),
        width,
      ),
    );
    for (const [bidSize = "", bid = "", ask = "", askSize = ""] of depthRows(view.book, depth)) {
      lines.push(
        layout.boxContent(
          layout.tableRow(["", bidSize, style.wrap(bid, "green"), style.wrap(ask, "red"), askSize], depthColumns),
          width,
        ),
      );
    }
  }

  lines.push(layout.boxLine(width, "bottom"));
  return lines;
}

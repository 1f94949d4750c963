/**
 * Log pane: recent log records with warning counts attributed to a venue.
 *
 * Adapter loggers are scoped by venue ("dydx", "hyperliquid-info",
 * "dydx:BTC"), other loggers may tag a record with a `venue` field.
 */

import { VENUE_TAGS, type VenueTag } from "@perp-aggregator/core";
import { formatLogRecord, LogLevel, type LogRecord, type Style, type StyleToken } from "@perp-aggregator/utils";

const LEVEL_STYLE: Record<LogLevel, StyleToken> = {
  [LogLevel.ERROR]: "red",
  [LogLevel.WARN]: "yellow",
  [LogLevel.INFO]: "cyan",
  [LogLevel.DEBUG]: "gray",
  [LogLevel.LOG]: "white",
};

type WarningBucket = VenueTag | "other";

export function venueOfRecord(record: LogRecord): VenueTag | null {
  const prefix = record.scope?.split(/[:-]/, 1)[0];
  const tagged = record.fields?.venue;
  return VENUE_TAGS.find(venue => venue === prefix || venue === tagged) ?? null;
}

export class LogPane {
  private readonly capacity: number;
  private records: LogRecord[] = [];
  /** Survives eviction from `records` */
  private readonly warnings = new Map<WarningBucket, number>();

  constructor(capacity: number) {
    this.capacity = Math.max(1, capacity);
  }

  add(record: LogRecord): void {
    if (record.level === LogLevel.WARN || record.level === LogLevel.ERROR) {
      const bucket = venueOfRecord(record) ?? "other";
      this.warnings.set(bucket, (this.warnings.get(bucket) ?? 0) + 1);
    }
    this.records.push(record);
    if (this.records.length > this.capacity) {
      this.records = this.records.slice(-this.capacity);
    }
  }

  warningsFor(bucket: WarningBucket): number {
    return this.warnings.get(bucket) ?? 0;
  }

  /** "Logs", or "Logs (warnings: dydx 2, other 1)" */
  title(): string {
    const counts = [...VENUE_TAGS, "other" as const]
      .filter(bucket => this.warningsFor(bucket) > 0)
      .map(bucket => `${bucket} ${this.warningsFor(bucket)}`);
    return counts.length === 0 ? "Logs" : `Logs (warnings: ${counts.join(", ")})`;
  }

  /** The newest `count` records as pane rows, oldest first */
  rows(count: number, style: Style): string[] {
    if (count <= 0) return [];
    return this.records.slice(-count).map(record => {
      const time = new Date(record.tsMs).toISOString().slice(11, 19);
      const level = style.wrap(record.level.padEnd(5), LEVEL_STYLE[record.level]);
      const scope = record.scope !== undefined ? `[${record.scope}] ` : "";
      return `${time} ${level} ${scope}${formatLogRecord(record)}`;
    });
  }
}

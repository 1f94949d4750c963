/**
 * packages/utils - shared logging, async helpers and dashboard layout
 */

export { createLogger, formatLogRecord, logger, LogLevel, parseLogLevel } from "./logger";
export type { LogFields, Logger, LogRecord, LogSink } from "./logger";

export { AbortedError, sleep, TimeoutError, withRetry, withTimeout } from "./async";
export type { RetryOptions } from "./async";

export { resolveDashboardConfig } from "./cli-dashboard/dashboard-control";
export type { DashboardConfig } from "./cli-dashboard/dashboard-control";
export { BOX, LayoutPolicy } from "./cli-dashboard/layout-policy";
export type { Align, Column } from "./cli-dashboard/layout-policy";
export { Style } from "./cli-dashboard/style";
export type { StyleToken } from "./cli-dashboard/style";

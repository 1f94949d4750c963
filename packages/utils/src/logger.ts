/**
 * Log levels, controlled by `LOG_LEVEL` (or `logger.setLevel`).
 * Examples: LOG_LEVEL=DEBUG, LOG_LEVEL=INFO, LOG_LEVEL=WARN, LOG_LEVEL=ERROR
 *
 * Priority: ERROR > WARN > LOG > INFO > DEBUG
 * Only logs at or above the active level are emitted.
 */

export enum LogLevel {
  ERROR = "ERROR",
  WARN = "WARN",
  INFO = "INFO",
  DEBUG = "DEBUG",
  LOG = "LOG",
}

export type LogRecord = {
  tsMs: number;
  level: LogLevel;
  message: string;
  scope?: string;
  fields?: Record<string, string>;
};

export interface LogSink {
  write(record: LogRecord): void;
}

export type LogFields = Record<string, unknown>;

export interface Logger {
  log(message: string, fields?: LogFields): void;
  info(message: string, fields?: LogFields): void;
  debug(message: string, fields?: LogFields): void;
  warn(message: string, fields?: LogFields): void;
  error(message: string, fields?: LogFields): void;
}

// Lower number = higher priority
const LOG_LEVEL_PRIORITY = {
  [LogLevel.ERROR]: 0,
  [LogLevel.WARN]: 1,
  [LogLevel.LOG]: 2,
  [LogLevel.INFO]: 3,
  [LogLevel.DEBUG]: 4,
} as const;

const COLORS: Record<LogLevel, string | null> = {
  [LogLevel.ERROR]: "\x1b[31m",
  [LogLevel.WARN]: "\x1b[33m",
  [LogLevel.INFO]: "\x1b[36m",
  [LogLevel.DEBUG]: "\x1b[32m",
  [LogLevel.LOG]: null,
};

let sink: LogSink | null = null;
let levelOverride: LogLevel | null = null;

export function parseLogLevel(value: string | undefined): LogLevel | null {
  const upper = value?.toUpperCase();
  for (const level of Object.values(LogLevel)) {
    if (level === upper) return level;
  }
  return null;
}

const getCurrentLogLevel = (): LogLevel => levelOverride ?? parseLogLevel(process.env.LOG_LEVEL) ?? LogLevel.INFO;

const shouldLog = (level: LogLevel): boolean => LOG_LEVEL_PRIORITY[level] <= LOG_LEVEL_PRIORITY[getCurrentLogLevel()];

const colorize = (text: string, level: LogLevel): string => {
  const color = COLORS[level];
  return color === null ? text : `${color}${text}\x1b[0m`;
};

function stringifyField(value: unknown): string {
  if (typeof value === "string") return value;
  if (value instanceof Error) return value.message;
  if (typeof value === "bigint") return value.toString();
  const encoded = JSON.stringify(value);
  return encoded === undefined ? String(value) : encoded;
}

function toFields(fields: LogFields | undefined): Record<string, string> | undefined {
  if (!fields) return undefined;
  const out: Record<string, string> = {};
  for (const [k, v] of Object.entries(fields)) {
    if (v === undefined) continue;
    out[k] = stringifyField(v);
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

/**
 * One-line text form of a record, used by the console path and by
 * dashboards that print the log pane.
 */
export function formatLogRecord(record: LogRecord): string {
  if (!record.fields) return record.message;
  const fields = Object.entries(record.fields)
    .map(([k, v]) => `${k}=${v}`)
    .join(" ");
  return `${record.message} ${fields}`;
}

function emit(level: LogLevel, scope: string | undefined, message: string, fields: LogFields | undefined): void {
  if (!shouldLog(level)) return;

  const record: LogRecord = {
    tsMs: Date.now(),
    level,
    message,
    scope,
    fields: toFields(fields),
  };

  if (sink) {
    sink.write(record);
    return;
  }

  const header = colorize(`[${new Date(record.tsMs).toISOString()}] [${level}]`, level);
  const scopeTag = scope !== undefined ? ` [${scope}]` : "";
  const line = `${header}${scopeTag} ${formatLogRecord(record)}`;

  switch (level) {
    case LogLevel.ERROR:
      console.error(line);
      break;
    case LogLevel.WARN:
      console.warn(line);
      break;
    case LogLevel.INFO:
      console.info(line);
      break;
    default:
      console.log(line);
  }
}

function scoped(scope: string | undefined): Logger {
  return {
    log: (message, fields) => emit(LogLevel.LOG, scope, message, fields),
    info: (message, fields) => emit(LogLevel.INFO, scope, message, fields),
    debug: (message, fields) => emit(LogLevel.DEBUG, scope, message, fields),
    warn: (message, fields) => emit(LogLevel.WARN, scope, message, fields),
    error: (message, fields) => emit(LogLevel.ERROR, scope, message, fields),
  };
}

/**
 * Logger tagged with a scope (e.g. "dydx", "supervisor:hyperliquid").
 */
export function createLogger(scope: string): Logger {
  return scoped(scope);
}

export const logger = {
  ...scoped(undefined),
  getCurrentLevel: (): LogLevel => getCurrentLogLevel(),
  getLevels: (): LogLevel[] => Object.values(LogLevel),
  /**
   * Overrides `LOG_LEVEL` for the rest of the process. `null` restores it.
   */
  setLevel: (level: LogLevel | null): void => {
    levelOverride = level;
  },
  /**
   * Route logs to a custom sink (e.g. the terminal dashboard) instead of the console.
   */
  setSink: (next: LogSink): void => {
    sink = next;
  },
  clearSink: (): void => {
    sink = null;
  },
};

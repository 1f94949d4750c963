export type DashboardConfig = {
  enabled: boolean;
  refreshMs: number;
  noColor: boolean;
  logLines: number;
};

/**
 * Clamps dashboard settings; the dashboard only runs on a TTY.
 */
export function resolveDashboardConfig(args: {
  enabled: boolean;
  refreshMs: number;
  noColor: boolean;
  isTTY: boolean;
  logLines?: number;
}): DashboardConfig {
  return {
    enabled: args.enabled && args.isTTY,
    refreshMs: Math.min(5_000, Math.max(100, Math.floor(args.refreshMs))),
    noColor: args.noColor,
    logLines: Math.min(50, Math.max(0, Math.floor(args.logLines ?? 8))),
  };
}

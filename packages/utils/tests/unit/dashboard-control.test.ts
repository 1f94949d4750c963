import { describe, expect, it } from "vitest";

import { resolveDashboardConfig } from "../../src/cli-dashboard/dashboard-control";

describe("resolveDashboardConfig", () => {
  it("disables the dashboard when stdout is not a TTY", () => {
    const cfg = resolveDashboardConfig({ enabled: true, refreshMs: 250, noColor: false, isTTY: false });
    expect(cfg.enabled).toBe(false);
  });

  it("clamps the refresh interval and log pane size", () => {
    const cfg = resolveDashboardConfig({ enabled: true, refreshMs: 20, noColor: true, isTTY: true, logLines: 500 });
    expect(cfg).toEqual({ enabled: true, refreshMs: 100, noColor: true, logLines: 50 });
  });

  it("defaults to eight log lines", () => {
    const cfg = resolveDashboardConfig({ enabled: true, refreshMs: 9_999, noColor: false, isTTY: true });
    expect(cfg.refreshMs).toBe(5_000);
    expect(cfg.logLines).toBe(8);
  });
});

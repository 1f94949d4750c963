import { describe, expect, it } from "vitest";

import { LayoutPolicy } from "@perp-aggregator/utils";

import { TerminalScreen } from "../../src/services/terminal-screen";

const openScreen = (columns = 200) => {
  const writes: string[] = [];
  const hooks: string[] = [];
  const screen = new TerminalScreen({
    write: chunk => writes.push(chunk),
    layout: new LayoutPolicy(() => columns),
    onProcessOnce: event => hooks.push(event),
  });
  screen.enter();
  writes.length = 0;
  return { screen, writes, hooks };
};

describe("TerminalScreen", () => {
  it("enters once, restores on leave and registers exit hooks", () => {
    const writes: string[] = [];
    const hooks: string[] = [];
    const screen = new TerminalScreen({
      write: chunk => writes.push(chunk),
      layout: new LayoutPolicy(() => 80),
      onProcessOnce: event => hooks.push(event),
    });

    screen.enter();
    screen.enter();
    expect(screen.isOpen()).toBe(true);
    expect(hooks).toEqual(["SIGINT", "SIGTERM", "exit"]);

    screen.leave();
    screen.leave();
    expect(screen.isOpen()).toBe(false);
    expect(writes).toEqual(["\x1b[?1049h\x1b[?25l\x1b[2J\x1b[H", "\x1b[?25h\x1b[?1049l"]);
  });

  it("leaves the alternate screen when an exit hook fires", () => {
    const handlers: (() => void)[] = [];
    const writes: string[] = [];
    const screen = new TerminalScreen({
      write: chunk => writes.push(chunk),
      layout: new LayoutPolicy(() => 80),
      onProcessOnce: (_event, handler) => handlers.push(handler),
    });

    screen.enter();
    handlers[0]?.();

    expect(screen.isOpen()).toBe(false);
    expect(writes.at(-1)).toBe("\x1b[?25h\x1b[?1049l");
  });

  it("paints nothing while closed", () => {
    const writes: string[] = [];
    const screen = new TerminalScreen({ write: chunk => writes.push(chunk), layout: new LayoutPolicy(() => 80) });

    screen.paint(["dydx 50000 / 50001"]);

    expect(writes).toEqual([]);
  });

  it("repaints only the venue rows whose quotes changed", () => {
    const { screen, writes } = openScreen();

    screen.paint(["BTC", "dydx 50000 / 50001", "hyperliquid 50002 / 50003"]);
    screen.paint(["BTC", "dydx 50000 / 50001", "hyperliquid 50002 / 50004"]);
    screen.paint(["BTC", "dydx 50000 / 50001", "hyperliquid 50002 / 50004"]);

    expect(writes).toEqual([
      "\x1b[1;1H\x1b[2KBTC\x1b[2;1H\x1b[2Kdydx 50000 / 50001\x1b[3;1H\x1b[2Khyperliquid 50002 / 50003",
      "\x1b[3;1H\x1b[2Khyperliquid 50002 / 50004",
    ]);
  });

  it("erases rows left over from a taller frame", () => {
    const { screen, writes } = openScreen();

    screen.paint(["ETH", "dydx", "hyperliquid"]);
    screen.paint(["ETH"]);

    expect(writes[1]).toBe("\x1b[2;1H\x1b[2K\x1b[3;1H\x1b[2K");
  });

  it("repaints everything after re-entering", () => {
    const { screen, writes } = openScreen();

    screen.paint(["BTC"]);
    screen.leave();
    screen.enter();
    screen.paint(["BTC"]);

    expect(writes.at(-1)).toBe("\x1b[1;1H\x1b[2KBTC");
  });

  it("keeps one frame line on one screen row", () => {
    const { screen, writes } = openScreen();

    screen.paint(["rejected:\nbelow\tminimum\u0007"]);

    expect(writes[0]).toBe("\x1b[1;1H\x1b[2Krejected: below minimum");
  });

  it("truncates rows to the terminal width", () => {
    const { screen, writes } = openScreen(10);

    screen.paint(["hyperliquid 50002.5"]);

    expect(writes[0]).toBe("\x1b[1;1H\x1b[2Khyperliqu\x1b[0m…");
  });
});

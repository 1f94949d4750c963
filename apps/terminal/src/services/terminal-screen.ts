/**
 * Alternate-screen session for the dashboard.
 *
 * While open, `paint` repaints only the rows that differ from the previously
 * painted frame; rows beyond a shorter frame are erased. Closing (directly, or
 * on SIGINT/SIGTERM/exit) restores the cursor and the main screen.
 */

import type { LayoutPolicy } from "@perp-aggregator/utils";

const ENTER = "\x1b[?1049h\x1b[?25l\x1b[2J\x1b[H";
const LEAVE = "\x1b[?25h\x1b[?1049l";
const ERASE_ROW = "\x1b[2K";
const moveTo = (row: number) => `\x1b[${row};1H`;

const LINE_BREAKS = /[\r\n\t\u2028\u2029]/g;
// Control characters except ESC, which style sequences need
const CONTROL_CHARS = /[\u0000-\u001a\u001c-\u001f\u007f]/g;

export type ExitHook = (event: "SIGINT" | "SIGTERM" | "exit", handler: () => void) => void;

export interface TerminalScreenOptions {
  write: (chunk: string) => void;
  layout: LayoutPolicy;
  onProcessOnce?: ExitHook;
}

export class TerminalScreen {
  private readonly write: (chunk: string) => void;
  private readonly layout: LayoutPolicy;
  private readonly onProcessOnce: ExitHook;
  private painted: string[] = [];
  private open = false;

  constructor(options: TerminalScreenOptions) {
    this.write = options.write;
    this.layout = options.layout;
    this.onProcessOnce = options.onProcessOnce ?? ((event, handler) => process.once(event, handler));
  }

  isOpen(): boolean {
    return this.open;
  }

  enter(): void {
    if (this.open) return;
    this.open = true;
    this.painted = [];
    this.write(ENTER);

    for (const event of ["SIGINT", "SIGTERM", "exit"] as const) {
      this.onProcessOnce(event, () => this.leave());
    }
  }

  leave(): void {
    if (!this.open) return;
    this.open = false;
    this.write(LEAVE);
  }

  /** One dashboard frame, one string per screen row */
  paint(frame: ReadonlyArray<string>): void {
    if (!this.open) return;

    const width = this.layout.getTerminalWidth();
    const rows = frame.map(line => this.fitRow(line, width));
    let chunk = "";

    rows.forEach((row, index) => {
      if (this.painted[index] !== row) chunk += moveTo(index + 1) + ERASE_ROW + row;
    });
    for (let index = rows.length; index < this.painted.length; index++) {
      chunk += moveTo(index + 1) + ERASE_ROW;
    }

    this.painted = rows;
    if (chunk !== "") this.write(chunk);
  }

  private fitRow(line: string, width: number): string {
    const row = line.replace(LINE_BREAKS, " ").replace(CONTROL_CHARS, "");
    return width > 0 && this.layout.visibleLength(row) > width ? this.layout.truncate(row, width) : row;
  }
}

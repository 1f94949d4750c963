export const BOX = {
  topLeft: "┌",
  topRight: "┐",
  bottomLeft: "└",
  bottomRight: "┘",
  horizontal: "─",
  vertical: "│",
  teeRight: "├",
  teeLeft: "┤",
} as const;

const DEFAULT_TERM_WIDTH = 120;

export type Align = "left" | "right";

export interface Column {
  width: number;
  align?: Align;
}

/**
 * Width-aware text layout for the dashboard. All measurements ignore ANSI SGR
 * sequences.
 */
export class LayoutPolicy {
  private readonly columns: () => number | undefined;

  constructor(columns: () => number | undefined = () => process.stdout.columns) {
    this.columns = columns;
  }

  getTerminalWidth(): number {
    return this.columns() ?? DEFAULT_TERM_WIDTH;
  }

  visibleLength(text: string): number {
    let visibleLen = 0;
    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 27 && text[i + 1] === "[") {
        i += 2;
        while (i < text.length && text[i] !== "m") i++;
        continue;
      }
      visibleLen++;
    }
    return visibleLen;
  }

  /**
   * Cuts `text` to `width` visible characters, keeping ANSI sequences and
   * ending with a reset plus ellipsis.
   */
  truncate(text: string, width: number): string {
    if (width <= 0) return "";
    if (this.visibleLength(text) <= width) return text;

    let result = "";
    let visibleLen = 0;
    const targetWidth = width - 1;

    for (let i = 0; i < text.length; i++) {
      if (text.charCodeAt(i) === 27 && text[i + 1] === "[") {
        let seq = text[i];
        i++;
        while (i < text.length) {
          seq += text[i];
          if (text[i] === "m") break;
          i++;
        }
        result += seq;
        continue;
      }

      if (visibleLen >= targetWidth) break;
      result += text[i];
      visibleLen++;
    }

    return result + "\x1b[0m…";
  }

  padRight(text: string, width: number): string {
    const visibleLen = this.visibleLength(text);
    if (visibleLen >= width) return text;
    return text + " ".repeat(width - visibleLen);
  }

  padLeft(text: string, width: number): string {
    const visibleLen = this.visibleLength(text);
    if (visibleLen >= width) return text;
    return " ".repeat(width - visibleLen) + text;
  }

  boxLine(width: number, type: "top" | "middle" | "bottom"): string {
    const innerWidth = Math.max(0, width - 2);
    const left =
      type === "top" ? BOX.topLeft
      : type === "middle" ? BOX.teeRight
      : BOX.bottomLeft;
    const right =
      type === "top" ? BOX.topRight
      : type === "middle" ? BOX.teeLeft
      : BOX.bottomRight;
    return left + BOX.horizontal.repeat(innerWidth) + right;
  }

  /**
   * `│ content │` padded (or truncated) to exactly `width` visible columns.
   */
  boxContent(content: string, width: number): string {
    const innerWidth = Math.max(0, width - 4);
    const fitted = this.visibleLength(content) > innerWidth ? this.truncate(content, innerWidth) : content;
    return `${BOX.vertical} ${this.padRight(fitted, innerWidth)} ${BOX.vertical}`;
  }

  /**
   * `┌── title ──┐` spanning `width` columns.
   */
  sectionHeader(title: string, width: number): string {
    const innerWidth = Math.max(0, width - 2);
    const maxTitle = Math.max(1, innerWidth - 4);
    const fitted = this.visibleLength(title) > maxTitle ? this.truncate(title, maxTitle) : title;
    const remaining = Math.max(0, innerWidth - this.visibleLength(fitted) - 2);
    const left = Math.max(1, Math.floor(remaining / 2));
    const right = Math.max(1, remaining - left);
    return BOX.topLeft + BOX.horizontal.repeat(left) + " " + fitted + " " + BOX.horizontal.repeat(right) + BOX.topRight;
  }

  formatAgeMs(nowMs: number, tsMs?: number | null): string {
    if (tsMs === null || tsMs === undefined) return "-";
    const age = Math.max(0, nowMs - tsMs);
    if (age < 1_000) return `${age}ms`;
    if (age < 60_000) return `${(age / 1_000).toFixed(1)}s`;
    return `${(age / 60_000).toFixed(1)}m`;
  }

  /**
   * Fixed-width row; cells wider than their column are truncated.
   */
  tableRow(cells: ReadonlyArray<string>, columns: ReadonlyArray<Column>, separator = " "): string {
    return cells
      .map((cell, i) => {
        const col = columns[i] ?? { width: 10 };
        const fitted = this.visibleLength(cell) > col.width ? this.truncate(cell, col.width) : cell;
        return col.align === "right" ? this.padLeft(fitted, col.width) : this.padRight(fitted, col.width);
      })
      .join(separator);
  }
}

export type StyleToken =
  | "reset"
  | "dim"
  | "bold"
  | "inverse"
  | "red"
  | "yellow"
  | "green"
  | "cyan"
  | "magenta"
  | "gray"
  | "white"
  | "bgRed"
  | "bgYellow"
  | "bgGreen"
  | "bgBlue";

const ANSI: Record<StyleToken, string> = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  bold: "\x1b[1m",
  inverse: "\x1b[7m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  green: "\x1b[32m",
  cyan: "\x1b[36m",
  magenta: "\x1b[35m",
  gray: "\x1b[90m",
  white: "\x1b[97m",
  bgRed: "\x1b[41m",
  bgYellow: "\x1b[43m",
  bgGreen: "\x1b[42m",
  bgBlue: "\x1b[44m",
};

/**
 * ANSI styling that collapses to plain text when colour is off
 * (`noColor` or the `NO_COLOR` convention).
 */
export class Style {
  private readonly noColor: boolean;

  constructor(args: { noColor: boolean }) {
    this.noColor = args.noColor || process.env.NO_COLOR !== undefined;
  }

  enabled(): boolean {
    return !this.noColor;
  }

  /**
   * e.g. style.wrap("ERROR", "bold", "red") => "\x1b[1m\x1b[31mERROR\x1b[0m"
   */
  wrap(text: string, ...tokens: StyleToken[]): string {
    if (this.noColor || tokens.length === 0) return text;
    return tokens.map(t => ANSI[t]).join("") + text + ANSI.reset;
  }

  badge(text: string, ...tokens: StyleToken[]): string {
    return this.wrap(` ${text} `, ...tokens);
  }

  /**
   * Green for positive, red for negative, unstyled for zero or non-numeric text.
   */
  signed(text: string): string {
    const n = Number.parseFloat(text);
    if (!Number.isFinite(n) || n === 0) return text;
    return this.wrap(text, n > 0 ? "green" : "red");
  }
}

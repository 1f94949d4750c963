import Decimal from "decimal.js";

/**
 * Parses a decimal string; null for anything decimal.js rejects or for
 * non-finite values.
 */
export function parseDecimal(value: string | number | undefined | null): Decimal | null {
  if (value === undefined || value === null) return null;
  if (typeof value === "string" && value.trim() === "") return null;
  try {
    const d = new Decimal(value);
    return d.isFinite() ? d : null;
  } catch {
    return null;
  }
}

/** Number of decimals implied by a step such as "0.001" (→ 3) or "10" (→ 0) */
export function decimalsOfStep(step: string): number {
  const d = parseDecimal(step);
  return d === null ? 0 : d.decimalPlaces();
}

/**
 * Rounds `value` to the nearest multiple of `step`, halves away from zero.
 */
export function roundToStep(value: Decimal, step: Decimal): Decimal {
  if (step.lte(0)) return value;
  return value.div(step).toDecimalPlaces(0, Decimal.ROUND_HALF_UP).mul(step);
}

/**
 * Fixed-point text for a value already on a `decimals` grid.
 */
export function formatFixed(value: Decimal, decimals: number): string {
  return value.toFixed(Math.max(0, decimals), Decimal.ROUND_HALF_UP);
}

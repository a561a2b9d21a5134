import { Decimal } from "decimal.js";

// Entry averaging, margin and liquidation price divide by quantities and
// leverages that rarely terminate; state keeps 40 significant digits.
Decimal.set({
  precision: 40,
  rounding: Decimal.ROUND_HALF_UP,
  toExpNeg: -40,
  toExpPos: 40,
});

export { Decimal };

export const ZERO = new Decimal(0);

/**
 * Parse a decimal from a number, numeric string or Decimal.
 * Returns null for anything that is not a finite number.
 */
export function parseDecimal(value: unknown): Decimal | null {
  if (value instanceof Decimal) {
    return value.isFinite() ? value : null;
  }
  if (typeof value === "number") {
    // String(value) gives the shortest round-trip form, so 0.1 stays "0.1"
    return Number.isFinite(value) ? new Decimal(String(value)) : null;
  }
  if (typeof value === "string" && value.trim() !== "") {
    try {
      const parsed = new Decimal(value.trim());
      return parsed.isFinite() ? parsed : null;
    } catch {
      return null;
    }
  }
  return null;
}

/**
 * Round for presentation (snapshots, logs). Never feed the result back into state.
 */
export function round2(value: Decimal): number {
  return value.toDecimalPlaces(2).toNumber();
}

export function formatPrice(value: Decimal): string {
  return value.toFixed(2);
}

import Decimal from "decimal.js";

export const ZERO = new Decimal(0);

const DECIMAL_RE = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

/**
 * Accepts numbers, Decimals and strings with either decimal separator.
 * Returns null for anything that is not a finite decimal.
 */
export function toDecimal(v: Decimal.Value | null | undefined): Decimal | null {
  if (v == null) return null;
  if (Decimal.isDecimal(v)) return v.isFinite() ? v : null;
  if (typeof v === "number") return Number.isFinite(v) ? new Decimal(v) : null;

  const s = String(v).trim().replace(/\s+/g, "").replace(",", ".");
  if (!DECIMAL_RE.test(s)) return null;
  return new Decimal(s);
}

export function sumDecimals(values: readonly Decimal[]): Decimal {
  let acc = ZERO;
  for (const v of values) acc = acc.plus(v);
  return acc;
}

export function roundHalfUp(v: Decimal, decimals: number): number {
  return v.toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP).toNumber();
}

import { Decimal } from "decimal.js";

/**
 * Decimal constructor used for every human-unit amount and price.
 * 80 significant digits keeps 18-decimal tokens with large supplies exact.
 */
export const Dec = Decimal.clone({ precision: 80, rounding: Decimal.ROUND_HALF_EVEN });

export type { Decimal };

export const ZERO = new Dec(0);

export function pow10(exponent: number): Decimal {
  return new Dec(10).pow(exponent);
}

/** Truncates toward zero and returns the integer part as a bigint. */
export function toBigInt(value: Decimal): bigint {
  return BigInt(value.toDecimalPlaces(0, Decimal.ROUND_DOWN).toFixed(0));
}

import { Dec, type Decimal } from "./decimal";
import { InvalidSlippageError } from "./errors";

export const BPS_DENOMINATOR = 10_000;

/** Slippage tolerance in basis points (1 bps = 0.01%). */
export class Slippage {
  readonly bps: number;

  constructor(bps = 100) {
    if (!Number.isInteger(bps) || bps < 0 || bps > BPS_DENOMINATOR) {
      throw new InvalidSlippageError(bps);
    }
    this.bps = bps;
  }

  static fromPercentage(percentage: number): Slippage {
    return new Slippage(Math.round(percentage * 100));
  }

  toPercentage(): number {
    return this.bps / 100;
  }

  /** e.g. 0.99 for 100 bps */
  toMultiplier(): Decimal {
    return new Dec(1).minus(new Dec(this.bps).div(BPS_DENOMINATOR));
  }

  /** `floor(raw * (10000 - bps) / 10000)` */
  minimumAmount(raw: bigint): bigint {
    return (raw * BigInt(BPS_DENOMINATOR - this.bps)) / BigInt(BPS_DENOMINATOR);
  }

  toString(): string {
    return `${this.bps} bps`;
  }
}

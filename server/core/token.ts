import { Dec, pow10, toBigInt, type Decimal } from "./decimal";

/**
 * Normalises an address for identity comparisons. EVM hex addresses are
 * case-insensitive; Solana base58 addresses are not.
 */
export function addressKey(address: string): string {
  return /^0x/i.test(address) ? address.toLowerCase() : address;
}

/**
 * Immutable token descriptor. Identity is `(address, chain)`; `symbol` is a
 * display label and may repeat across chains.
 */
export class TokenInfo {
  readonly symbol: string;
  readonly address: string;
  readonly decimals: number;
  readonly chain: string;
  readonly isNative: boolean;

  constructor(init: { symbol: string; address: string; decimals: number; chain: string; isNative?: boolean }) {
    if (!Number.isInteger(init.decimals) || init.decimals < 0 || init.decimals > 255) {
      throw new RangeError(`Invalid decimals for ${init.symbol}: ${init.decimals}`);
    }
    this.symbol = init.symbol;
    this.address = init.address;
    this.decimals = init.decimals;
    this.chain = init.chain;
    this.isNative = init.isNative ?? false;
    Object.freeze(this);
  }

  get key(): string {
    return `${this.chain}:${addressKey(this.address)}`;
  }

  /** `amount * 10^decimals`; digits beyond the token's precision are truncated. */
  toBaseUnits(amount: Decimal.Value): bigint {
    return toBigInt(new Dec(amount).mul(pow10(this.decimals)));
  }

  fromBaseUnits(raw: bigint | number | string): Decimal {
    return new Dec(raw.toString()).div(pow10(this.decimals));
  }

  toAmount(value: Decimal.Value): TokenAmount {
    return new TokenAmount(this, new Dec(value));
  }

  toAmountFromBaseUnits(raw: bigint): TokenAmount {
    return new TokenAmount(this, this.fromBaseUnits(raw));
  }

  equals(other: TokenInfo): boolean {
    return this.key === other.key;
  }

  toString(): string {
    return `${this.symbol} (${this.address}) on ${this.chain}`;
  }
}

export class TokenAmount {
  constructor(
    readonly token: TokenInfo,
    readonly value: Decimal,
  ) {
    Object.freeze(this);
  }

  get baseUnits(): bigint {
    return this.token.toBaseUnits(this.value);
  }

  isZero(): boolean {
    return this.value.isZero();
  }

  toString(): string {
    return `${this.value.toFixed()} ${this.token.symbol}`;
  }
}

/** Orders two tokens by ascending address, the way pools order token0/token1. */
export function canonicalPair(a: TokenInfo, b: TokenInfo): [TokenInfo, TokenInfo] {
  return addressKey(a.address) < addressKey(b.address) ? [a, b] : [b, a];
}

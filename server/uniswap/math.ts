import { Dec, type Decimal } from "../core/decimal";
import { NoMarketError } from "../core/errors";
import { addressKey, type TokenInfo } from "../core/token";

const Q192 = new Dec(2).pow(192);

/** Pools order their tokens by ascending address. */
export function isToken0(token: TokenInfo, other: TokenInfo): boolean {
  return addressKey(token.address) < addressKey(other.address);
}

/**
 * Mid price of a V2 pair from its reserves: how much `tokenOut` one unit of
 * `tokenIn` is worth.
 */
export function v2MidPrice(reserve0: bigint, reserve1: bigint, tokenOut: TokenInfo, tokenIn: TokenInfo): Decimal {
  const outIsToken0 = isToken0(tokenOut, tokenIn);
  const amount0 = (outIsToken0 ? tokenOut : tokenIn).fromBaseUnits(reserve0);
  const amount1 = (outIsToken0 ? tokenIn : tokenOut).fromBaseUnits(reserve1);
  if (amount0.isZero() || amount1.isZero()) {
    throw new NoMarketError(`V2 pair ${tokenOut.symbol}/${tokenIn.symbol} has no reserves`);
  }
  return outIsToken0 ? amount0.div(amount1) : amount1.div(amount0);
}

/**
 * Spot price of a V3 pool from `slot0.sqrtPriceX96`.
 * `(sqrtPriceX96 / 2^96)^2` is token1 per token0 in raw units; decimals rescale it.
 */
export function v3PriceFromSqrt(sqrtPriceX96: bigint, tokenOut: TokenInfo, tokenIn: TokenInfo): Decimal {
  if (sqrtPriceX96 === 0n) {
    throw new NoMarketError(`V3 pool ${tokenOut.symbol}/${tokenIn.symbol} is not initialized`);
  }
  const inIsToken0 = isToken0(tokenIn, tokenOut);
  const [token0, token1] = inIsToken0 ? [tokenIn, tokenOut] : [tokenOut, tokenIn];
  const rawPrice = new Dec(sqrtPriceX96.toString()).pow(2).div(Q192);
  const token1PerToken0 = rawPrice.mul(new Dec(10).pow(token0.decimals - token1.decimals));
  return inIsToken0 ? token1PerToken0 : new Dec(1).div(token1PerToken0);
}

/**
 * Linear price-impact estimate in basis points: `amountIn * 10000 / liquidity`.
 * Ignores tick crossings; good enough to flag trades that eat most of a pool.
 */
export function estimatePriceImpactBps(rawAmountIn: bigint, liquidity: bigint): bigint | undefined {
  if (liquidity === 0n) return undefined;
  return (rawAmountIn * 10_000n) / liquidity;
}

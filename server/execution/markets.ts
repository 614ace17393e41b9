import { toErrorMessage } from "../core/errors";
import { canonicalPair, type TokenInfo } from "../core/token";

/**
 * Every distinct unordered pair of `tokens`, in input order. Repeated tokens
 * and self-pairs are dropped.
 */
export function distinctPairs(tokens: readonly TokenInfo[]): Array<[TokenInfo, TokenInfo]> {
  const pairs = new Map<string, [TokenInfo, TokenInfo]>();
  for (let i = 0; i < tokens.length; i++) {
    for (let j = i + 1; j < tokens.length; j++) {
      const [tokenA, tokenB] = [tokens[i], tokens[j]];
      if (tokenA.equals(tokenB)) continue;
      const [token0, token1] = canonicalPair(tokenA, tokenB);
      const key = `${token0.key}|${token1.key}`;
      if (!pairs.has(key)) pairs.set(key, [tokenA, tokenB]);
    }
  }
  return [...pairs.values()];
}

/**
 * Checks each distinct pair with `hasMarket` and reports the ones that trade,
 * in canonical order. A failed check is logged under `tag` and skipped.
 */
export async function discoverMarkets(
  tag: string,
  tokens: readonly TokenInfo[],
  hasMarket: (tokenA: TokenInfo, tokenB: TokenInfo) => Promise<boolean>,
): Promise<Array<[TokenInfo, TokenInfo]>> {
  const markets: Array<[TokenInfo, TokenInfo]> = [];
  for (const [tokenA, tokenB] of distinctPairs(tokens)) {
    try {
      if (await hasMarket(tokenA, tokenB)) markets.push(canonicalPair(tokenA, tokenB));
    } catch (err) {
      console.warn(`[${tag}] Error checking pair ${tokenA.symbol}/${tokenB.symbol}: ${toErrorMessage(err)}`);
    }
  }
  return markets;
}

import { describe, expect, it } from "vitest";
import { NoMarketError } from "../core/errors";
import { TokenInfo } from "../core/token";
import { estimatePriceImpactBps, isToken0, v2MidPrice, v3PriceFromSqrt } from "./math";

const tokenA = new TokenInfo({ symbol: "A", address: "0x1000000000000000000000000000000000000001", decimals: 18, chain: "ethereum" });
const tokenB = new TokenInfo({ symbol: "B", address: "0x2000000000000000000000000000000000000002", decimals: 18, chain: "ethereum" });
const usdc = new TokenInfo({ symbol: "USDC", address: "0x1000000000000000000000000000000000000003", decimals: 6, chain: "ethereum" });
const weth = new TokenInfo({ symbol: "WETH", address: "0x2000000000000000000000000000000000000004", decimals: 18, chain: "ethereum" });

const Q96 = 2n ** 96n;
const E18 = 10n ** 18n;

describe("isToken0", () => {
  it("orders by address", () => {
    expect(isToken0(tokenA, tokenB)).toBe(true);
    expect(isToken0(tokenB, tokenA)).toBe(false);
  });
});

describe("v2MidPrice", () => {
  it("prices each side from the reserves", () => {
    expect(v2MidPrice(100n * E18, 50n * E18, tokenB, tokenA).toString()).toBe("0.5");
    expect(v2MidPrice(100n * E18, 50n * E18, tokenA, tokenB).toString()).toBe("2");
  });

  it("accounts for decimals", () => {
    expect(v2MidPrice(3000n * 10n ** 6n, E18, usdc, weth).toString()).toBe("3000");
    expect(v2MidPrice(3000n * 10n ** 6n, E18, weth, usdc).mul(3000).toDecimalPlaces(20).toString()).toBe("1");
  });

  it("has no market without reserves", () => {
    expect(() => v2MidPrice(0n, E18, tokenB, tokenA)).toThrow(NoMarketError);
  });
});

describe("v3PriceFromSqrt", () => {
  it("reads token1 per token0 from sqrtPriceX96", () => {
    expect(v3PriceFromSqrt(Q96, tokenB, tokenA).toString()).toBe("1");
    expect(v3PriceFromSqrt(2n * Q96, tokenB, tokenA).toString()).toBe("4");
    expect(v3PriceFromSqrt(2n * Q96, tokenA, tokenB).toString()).toBe("0.25");
  });

  it("rescales by the decimals difference", () => {
    const sqrtPriceX96 = 20_000n * Q96;
    expect(v3PriceFromSqrt(sqrtPriceX96, weth, usdc).toString()).toBe("0.0004");
    expect(v3PriceFromSqrt(sqrtPriceX96, usdc, weth).toString()).toBe("2500");
  });

  it("has no market for an uninitialized pool", () => {
    expect(() => v3PriceFromSqrt(0n, tokenB, tokenA)).toThrow(NoMarketError);
  });
});

describe("estimatePriceImpactBps", () => {
  it("is amount over liquidity in basis points", () => {
    expect(estimatePriceImpactBps(1_000n, 1_000_000n)).toBe(10n);
    expect(estimatePriceImpactBps(1n, 1_000_000n)).toBe(0n);
  });

  it("cannot be estimated without liquidity", () => {
    expect(estimatePriceImpactBps(1_000n, 0n)).toBeUndefined();
  });
});

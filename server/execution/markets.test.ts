import { afterEach, describe, expect, it, vi } from "vitest";
import { TokenInfo } from "../core/token";
import { discoverMarkets, distinctPairs } from "./markets";

const usdc = new TokenInfo({ symbol: "USDC", address: "0x1000000000000000000000000000000000000001", decimals: 6, chain: "base" });
const weth = new TokenInfo({ symbol: "WETH", address: "0x2000000000000000000000000000000000000002", decimals: 18, chain: "base" });
const dai = new TokenInfo({ symbol: "DAI", address: "0x3000000000000000000000000000000000000003", decimals: 18, chain: "base" });

function symbols(pairs: Array<[TokenInfo, TokenInfo]>): string[] {
  return pairs.map(([a, b]) => `${a.symbol}/${b.symbol}`);
}

describe("distinctPairs", () => {
  it("pairs every token with each later one", () => {
    expect(symbols(distinctPairs([weth, usdc, dai]))).toEqual(["WETH/USDC", "WETH/DAI", "USDC/DAI"]);
  });

  it("drops repeated tokens and self-pairs", () => {
    expect(symbols(distinctPairs([usdc, weth, usdc]))).toEqual(["USDC/WETH"]);
    expect(distinctPairs([usdc, usdc])).toEqual([]);
  });

  it("identifies tokens by address, not symbol", () => {
    const alias = new TokenInfo({ symbol: "USDbC", address: usdc.address, decimals: 6, chain: "base" });
    expect(symbols(distinctPairs([usdc, weth, alias]))).toEqual(["USDC/WETH"]);
  });
});

describe("discoverMarkets", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("checks each pair once and returns markets in canonical order", async () => {
    const hasMarket = vi.fn(async (a: TokenInfo, b: TokenInfo) => a.equals(weth) || b.equals(weth));

    const markets = await discoverMarkets("test", [weth, usdc, weth, dai], hasMarket);

    expect(hasMarket).toHaveBeenCalledTimes(3);
    expect(symbols(markets)).toEqual(["USDC/WETH", "WETH/DAI"]);
  });

  it("skips pairs whose check fails", async () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);
    const hasMarket = async (a: TokenInfo) => {
      if (a.equals(usdc)) throw new Error("node unavailable");
      return true;
    };

    const markets = await discoverMarkets("test", [weth, usdc, dai], hasMarket);

    expect(symbols(markets)).toEqual(["USDC/WETH", "WETH/DAI"]);
    expect(warn).toHaveBeenCalledWith("[test] Error checking pair USDC/DAI: node unavailable");
  });
});

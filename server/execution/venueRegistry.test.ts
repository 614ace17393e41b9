import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Dec } from "../core/decimal";
import { UnknownVenueError, UnsupportedChainError } from "../core/errors";
import { loadConfig } from "../engine/config";
import { JupiterClient } from "../jupiter/jupiterClient";
import { UniswapV2Client } from "../uniswap/uniswapV2Client";
import { UniswapV3Client } from "../uniswap/uniswapV3Client";
import { type DexClient } from "./types";
import { createDefaultRegistry, VenueRegistry } from "./venueRegistry";

const config = loadConfig(
  { UNISWAP_V3_FEE_TIERS: "500,3000" },
  {
    ethereum: { tokens: { WETH: { address: "0xC02aaA39b223FE8D0A0e5C4F27eAD9083C756Cc2", decimals: 18 } } },
    base: { tokens: {} },
    solana: { tokens: {} },
  },
);

describe("VenueRegistry", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("registers the built-in venues", () => {
    const registry = createDefaultRegistry();
    expect(registry.names()).toEqual(["uniswap_v2", "uniswap_v3", "jupiter"]);
    expect(registry.has("jupiter")).toBe(true);
  });

  it("builds clients for the requested chain", () => {
    const registry = createDefaultRegistry();

    const v3 = registry.create("uniswap_v3", config, "base");
    expect(v3).toBeInstanceOf(UniswapV3Client);
    expect(v3.chain).toBe("base");
    if (v3 instanceof UniswapV3Client) expect(v3.feeTiers).toEqual([500, 3000]);

    expect(registry.create("uniswap_v2", config, "ethereum")).toBeInstanceOf(UniswapV2Client);
    expect(registry.create("jupiter", config, "solana")).toBeInstanceOf(JupiterClient);
  });

  it("lists the known venues for an unknown name", () => {
    expect(() => createDefaultRegistry().create("sushiswap", config, "ethereum")).toThrow(
      new UnknownVenueError("sushiswap", ["uniswap_v2", "uniswap_v3", "jupiter"]),
    );
  });

  it("rejects chains a venue does not serve", () => {
    const registry = createDefaultRegistry();
    expect(() => registry.create("uniswap_v2", config, "solana")).toThrow(UnsupportedChainError);
    expect(() => registry.create("uniswap_v3", config, "ethereum_sepolia")).toThrow(UnsupportedChainError);
    expect(() => registry.create("jupiter", config, "ethereum")).toThrow(UnsupportedChainError);
  });

  it("accepts custom venues", () => {
    const stub: DexClient = {
      venue: "stub",
      chain: "ethereum",
      getTokenPrice: async () => new Dec(3),
      swap: async () => {
        throw new Error("not used");
      },
      getMarketsForTokens: async () => [],
    };
    const registry = new VenueRegistry().register("stub", () => stub);
    expect(registry.create("stub", config, "ethereum")).toBe(stub);
    expect(registry.names()).toEqual(["stub"]);
  });
});

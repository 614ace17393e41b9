import { mkdtempSync, rmSync } from "fs";
import { tmpdir } from "os";
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { Dec } from "../core/decimal";
import { loadConfig } from "../engine/config";
import { type EngineContext } from "../execution/handler";
import { type DexClient } from "../execution/types";
import { VenueRegistry } from "../execution/venueRegistry";
import { ReceiptStore } from "../receipts/store";
import { invoke, manifest } from "./tradingSkill";

const config = loadConfig(
  {},
  {
    base_sepolia: {
      tokens: {
        WETH: { address: "0x4200000000000000000000000000000000000006", decimals: 18 },
        USDC: { address: "0x036CbD53842c5426634e7929541eC2318f3dCF7e", decimals: 6 },
      },
    },
  },
);

function stubVenue(chain: string): DexClient {
  return {
    venue: "uniswap_v3",
    chain,
    getTokenPrice: async () => new Dec("0.0004"),
    swap: async (_base, _quote, quoteAmount) => ({
      success: true,
      amountSpent: quoteAmount,
      amountReceived: new Dec("0.01"),
      txHash: "0xabc",
      state: "Confirmed",
    }),
    getMarketsForTokens: async () => [],
  };
}

describe("tradingSkill", () => {
  let dir: string;
  let ctx: EngineContext;

  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => undefined);
    dir = mkdtempSync(join(tmpdir(), "skill-"));
    ctx = {
      config,
      registry: new VenueRegistry().register("uniswap_v3", (_config, chain) => stubVenue(chain)),
      receipts: new ReceiptStore(dir),
    };
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it("describes every action it dispatches", () => {
    expect(Object.keys(manifest().actions)).toEqual([
      "get_token_price",
      "execute_swap",
      "get_markets",
      "get_balance",
      "get_receipts",
    ]);
  });

  it("quotes a price", async () => {
    const result = await invoke(ctx, "get_token_price", { chain: "base_sepolia", tokenOut: "WETH", tokenIn: "USDC" });
    expect(result).toEqual({
      ok: true,
      data: { chain: "base_sepolia", venue: "uniswap_v3", tokenOut: "WETH", tokenIn: "USDC", price: "0.0004" },
    });
  });

  it("tags swaps with their source", async () => {
    const result = await invoke(ctx, "execute_swap", { chain: "base_sepolia", baseToken: "WETH", quoteToken: "USDC", amount: 25 });

    expect(result).toMatchObject({ ok: true, data: { source: "skill", amountSpent: "25", amountReceived: "0.01", slippageBps: 100 } });
    expect(await invoke(ctx, "get_receipts", { limit: 1 })).toMatchObject({ ok: true, data: [{ source: "skill", txHash: "0xabc" }] });
  });

  it("validates arguments", async () => {
    expect(await invoke(ctx, "get_token_price", { chain: "base_sepolia", tokenOut: "WETH" })).toEqual({
      ok: false,
      error: "Invalid arguments for get_token_price: tokenIn: Required",
    });
    expect(await invoke(ctx, "execute_swap", { chain: "base_sepolia", baseToken: "WETH", quoteToken: "USDC", amount: "1", slippageBps: 1.5 })).toEqual({
      ok: false,
      error: "Invalid arguments for execute_swap: slippageBps: Expected integer, received float",
    });
    expect(await invoke(ctx, "get_receipts", { limit: 0 })).toEqual({
      ok: false,
      error: "Invalid arguments for get_receipts: limit: Number must be greater than 0",
    });
  });

  it("treats missing arguments as empty", async () => {
    expect(await invoke(ctx, "get_receipts", undefined)).toEqual({ ok: true, data: [] });
  });

  it("rejects unknown actions", async () => {
    expect(await invoke(ctx, "withdraw", {})).toEqual({ ok: false, error: "Unknown action: withdraw" });
  });
});

import { encodeErrorResult, encodeFunctionData, type Address } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import {
  InvalidAddressError,
  InvalidConfigError,
  RpcError,
  TransactionRevertedError,
  TransactionTimeoutError,
  UnsupportedChainError,
} from "../core/errors";
import { TokenInfo } from "../core/token";
import { type ChainConfig } from "../engine/config";
import { ContractRevert, FakeEvmNode } from "../testing/fakeEvmNode";
import { ERC20_ABI } from "./erc20";
import { EvmClient, EvmSigner, extractRevertReason, type TransactionStep } from "./evmClient";

const PRIVATE_KEY = `0x${"11".repeat(32)}` as const;
const WALLET = privateKeyToAccount(PRIVATE_KEY).address;
const SPENDER: Address = "0x5000000000000000000000000000000000000005";

const USDC_ADDRESS: Address = "0xA0b86991c6218b36c1d19D4a2e9Eb0cE3606eB48";
const usdc = new TokenInfo({ symbol: "USDC", address: USDC_ADDRESS, decimals: 6, chain: "ethereum" });
const UNLISTED: Address = "0x6000000000000000000000000000000000000006";

function chainConfig(overrides: Partial<ChainConfig> = {}): ChainConfig {
  return {
    chain: "ethereum",
    rpcUrl: "http://localhost:8545",
    privateKey: PRIVATE_KEY,
    gasLimit: 250000,
    tokens: { USDC: usdc },
    ...overrides,
  };
}

describe("EvmClient", () => {
  let node: FakeEvmNode;
  let client: EvmClient;

  beforeEach(() => {
    node = new FakeEvmNode();
    client = new EvmClient(chainConfig(), { transport: node.transport(), pollIntervalMs: 5, confirmationTimeoutMs: 50 });
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("rejects non-EVM chains", () => {
    expect(() => new EvmClient(chainConfig({ chain: "solana" }))).toThrow(UnsupportedChainError);
  });

  it("reads native balances in ether", async () => {
    node.balances.set(WALLET.toLowerCase(), 1_500_000_000_000_000_000n);
    expect((await client.getNativeBalance(WALLET)).toString()).toBe("1.5");
  });

  it("reads ERC-20 balances and allowances", async () => {
    node.register(USDC_ADDRESS, ERC20_ABI, (fn) => {
      if (fn === "balanceOf") return 2_500_000n;
      if (fn === "allowance") return 7n;
      throw new Error(`unexpected ${fn}`);
    });
    expect((await client.getTokenBalance(usdc, WALLET)).toString()).toBe("2.5");
    expect(await client.getAllowance(usdc, WALLET, SPENDER)).toBe(7n);
  });

  it("wraps failed reads in RpcError", async () => {
    await expect(client.getTokenBalance(usdc, WALLET)).rejects.toBeInstanceOf(RpcError);
  });

  it("rejects malformed addresses", async () => {
    expect(() => client.toChecksumAddress("0x1234")).toThrow(InvalidAddressError);
    await expect(client.getNativeBalance("not-an-address")).rejects.toBeInstanceOf(InvalidAddressError);
    expect(client.toChecksumAddress(usdc.address.toLowerCase())).toBe(usdc.address);
  });

  describe("getTokenInfo", () => {
    it("resolves registry tokens without a call", async () => {
      const token = await client.getTokenInfo(usdc.address.toLowerCase());
      expect(token).toBe(usdc);
      expect(node.methods).not.toContain("eth_call");
    });

    it("reads and caches unlisted tokens", async () => {
      const handler = vi.fn((fn: string) => (fn === "decimals" ? 8 : "WBTC"));
      node.register(UNLISTED, ERC20_ABI, handler);

      const token = await client.getTokenInfo(UNLISTED);
      expect(token.symbol).toBe("WBTC");
      expect(token.decimals).toBe(8);
      expect(token.chain).toBe("ethereum");

      await client.getTokenInfo(UNLISTED);
      expect(handler).toHaveBeenCalledTimes(2);

      client.clearTokenCache();
      await client.getTokenInfo(UNLISTED);
      expect(handler).toHaveBeenCalledTimes(4);
    });

    it("refetches once the TTL has passed", async () => {
      const handler = vi.fn((fn: string) => (fn === "decimals" ? 8 : "WBTC"));
      node.register(UNLISTED, ERC20_ABI, handler);
      const noCache = new EvmClient(chainConfig(), { transport: node.transport(), tokenInfoTtlMs: 0 });

      await noCache.getTokenInfo(UNLISTED);
      await noCache.getTokenInfo(UNLISTED);
      expect(handler).toHaveBeenCalledTimes(4);
    });
  });

  describe("signing", () => {
    it("needs a private key only when signing", () => {
      const readOnly = new EvmClient(chainConfig({ privateKey: undefined, walletAddress: SPENDER }), { transport: node.transport() });
      expect(readOnly.walletAddress).toBe(SPENDER);
      expect(() => readOnly.getSigner()).toThrow(InvalidConfigError);
    });

    it("rejects malformed keys", () => {
      expect(() => new EvmSigner("0x1234")).toThrow(InvalidConfigError);
      expect(new EvmSigner("11".repeat(32)).address).toBe(WALLET);
    });

    it("signs with the pending nonce, configured gas limit and EIP-1559 fees", async () => {
      node.nonce = 4;
      const signer = client.getSigner();
      const hash = await client.sendTransaction(signer, { to: SPENDER, data: "0x1234", description: "test call" });

      expect(node.sent).toHaveLength(1);
      const [tx] = node.sent;
      expect(tx.hash).toBe(hash);
      expect(tx.nonce).toBe(4);
      expect(tx.gas).toBe(250_000n);
      expect(tx.maxPriorityFeePerGas).toBe(1_000_000_000n);
      expect(tx.maxFeePerGas).toBe(21_000_000_000n);
      expect(tx.to.toLowerCase()).toBe(SPENDER);
    });

    it("serializes concurrent sends from one sender", async () => {
      const signer = client.getSigner();
      const step: TransactionStep = { to: SPENDER, data: "0x", description: "noop" };
      await Promise.all([client.sendTransaction(signer, step), client.sendTransaction(signer, step)]);
      expect(node.sent.map((tx) => tx.nonce)).toEqual([0, 1]);
    });

    it("falls back to the priority fee when the block has no base fee", async () => {
      node.baseFeePerGas = 0n;
      const fees = await client.estimateFees();
      expect(fees.maxFeePerGas).toBe(1_000_000_000n);
      expect(console.warn).toHaveBeenCalled();
    });
  });

  describe("confirmation", () => {
    it("returns the receipt once mined", async () => {
      const signer = client.getSigner();
      const receipt = await client.sendAndConfirm(signer, { to: SPENDER, data: "0x", description: "noop" });
      expect(receipt.status).toBe("success");
    });

    it("waits for a receipt mined after the first poll", async () => {
      const patient = new EvmClient(chainConfig(), { transport: node.transport(), pollIntervalMs: 5, confirmationTimeoutMs: 2_000 });
      node.onTransaction = () => "pending";
      const hash = await patient.sendTransaction(patient.getSigner(), { to: SPENDER, data: "0x", description: "noop" });

      const waiting = patient.waitForReceipt(hash);
      await new Promise((resolve) => setTimeout(resolve, 30));
      node.settle(hash, { status: "success" });

      const receipt = await waiting;
      expect(receipt.transactionHash).toBe(hash);
      expect(receipt.blockNumber).toBe(node.blockNumber);
    });

    it("times out when no receipt appears", async () => {
      node.onTransaction = () => "pending";
      const hash = await client.sendTransaction(client.getSigner(), { to: SPENDER, data: "0x", description: "noop" });
      await expect(client.waitForReceipt(hash)).rejects.toBeInstanceOf(TransactionTimeoutError);
    });

    it("replays a reverted transaction for its reason", async () => {
      node.register(SPENDER, ERC20_ABI, () => {
        throw new ContractRevert("insufficient allowance");
      });
      node.onTransaction = () => ({ status: "reverted" });
      const signer = client.getSigner();
      const step: TransactionStep = {
        to: SPENDER,
        data: encodeFunctionData({ abi: ERC20_ABI, functionName: "approve", args: [SPENDER, 1000n] }),
        description: "approve",
      };

      const failure = await client.sendAndConfirm(signer, step).catch((err: unknown) => err);
      expect(failure).toBeInstanceOf(TransactionRevertedError);
      if (failure instanceof TransactionRevertedError) {
        expect(failure.reason).toBe("insufficient allowance");
        expect(failure.txHash).toBe(node.sent[0]?.hash);
      }
    });
  });
});

describe("extractRevertReason", () => {
  it("decodes Error(string) data anywhere in the cause chain", () => {
    const data = encodeErrorResult({
      abi: [{ type: "error", name: "Error", inputs: [{ name: "message", type: "string" }] }],
      errorName: "Error",
      args: ["Too little received"],
    });
    const err = new Error("call failed", { cause: Object.assign(new Error("rpc"), { data }) });
    expect(extractRevertReason(err)).toBe("Too little received");
  });

  it("decodes panics", () => {
    const data = encodeErrorResult({
      abi: [{ type: "error", name: "Panic", inputs: [{ name: "code", type: "uint256" }] }],
      errorName: "Panic",
      args: [0x11n],
    });
    expect(extractRevertReason(Object.assign(new Error("rpc"), { data }))).toBe("Panic(0x11)");
  });

  it("falls back to the node's message", () => {
    expect(extractRevertReason(new Error("outer", { cause: new Error("execution reverted: STF") }))).toBe("STF");
    expect(extractRevertReason(new Error("execution reverted"))).toBe("execution reverted");
    expect(extractRevertReason(new Error("connection refused"))).toBe("connection refused");
  });
});

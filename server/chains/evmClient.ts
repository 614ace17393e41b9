import {
  createPublicClient,
  decodeErrorResult,
  getAddress,
  http,
  isAddress,
  isHex,
  type Address,
  type Chain,
  type Hex,
  type PublicClient,
  type TransactionReceipt,
  type Transport,
  WaitForTransactionReceiptTimeoutError,
} from "viem";
import { privateKeyToAccount, type PrivateKeyAccount } from "viem/accounts";
import { base, baseSepolia, mainnet, sepolia } from "viem/chains";
import pLimit, { type LimitFunction } from "p-limit";
import { Dec, pow10, type Decimal } from "../core/decimal";
import {
  InvalidAddressError,
  InvalidConfigError,
  isDexError,
  RpcError,
  TransactionRevertedError,
  TransactionTimeoutError,
  UnsupportedChainError,
  toErrorMessage,
} from "../core/errors";
import { addressKey, TokenInfo } from "../core/token";
import { type ChainConfig, type EngineConfig, type EvmChainName, getChainConfig, isEvmChain } from "../engine/config";
import { ERC20_ABI } from "./erc20";

export const VIEM_CHAINS: Record<EvmChainName, Chain> = {
  ethereum: mainnet,
  ethereum_sepolia: sepolia,
  base,
  base_sepolia: baseSepolia,
};

export const DEFAULT_GAS_LIMIT = 200_000n;

export interface TransactionStep {
  to: Address;
  data: Hex;
  value?: bigint;
  description: string;
}

export interface FeeEstimate {
  baseFeePerGas: bigint;
  maxPriorityFeePerGas: bigint;
  maxFeePerGas: bigint;
}

export interface EvmClientOptions {
  /** Overrides the HTTP transport built from the chain's RPC URL. */
  transport?: Transport;
  confirmationTimeoutMs?: number;
  pollIntervalMs?: number;
  tokenInfoTtlMs?: number;
}

export class EvmSigner {
  readonly account: PrivateKeyAccount;

  constructor(
    privateKey: string,
    readonly gasLimit: bigint = DEFAULT_GAS_LIMIT,
  ) {
    const key = privateKey.startsWith("0x") ? privateKey : `0x${privateKey}`;
    if (!isHex(key) || key.length !== 66) {
      throw new InvalidConfigError("EVM private key must be 32 bytes of hex");
    }
    this.account = privateKeyToAccount(key);
  }

  get address(): Address {
    return this.account.address;
  }
}

// One queue per (chain, sender): the pending-nonce read and the broadcast must not interleave.
const nonceLocks = new Map<string, LimitFunction>();

function nonceLock(chain: string, sender: Address): LimitFunction {
  const key = `${chain}:${sender.toLowerCase()}`;
  let limit = nonceLocks.get(key);
  if (!limit) {
    limit = pLimit(1);
    nonceLocks.set(key, limit);
  }
  return limit;
}

function* errorChain(err: unknown): Generator<unknown> {
  const seen = new Set<unknown>();
  let current: unknown = err;
  while (current !== undefined && current !== null && !seen.has(current)) {
    seen.add(current);
    yield current;
    current = current instanceof Error ? current.cause : undefined;
  }
}

/**
 * Pulls a human readable revert reason out of a failed `eth_call`. ABI-encoded
 * `Error(string)` / `Panic(uint256)` payloads win over node message text.
 */
export function extractRevertReason(err: unknown): string {
  for (const link of errorChain(err)) {
    if (typeof link !== "object" || link === null || !("data" in link)) continue;
    const data = link.data;
    if (!isHex(data) || data.length < 10) continue;
    try {
      const decoded = decodeErrorResult({ data });
      const [arg] = decoded.args ?? [];
      if (decoded.errorName === "Panic" && typeof arg === "bigint") return `Panic(0x${arg.toString(16)})`;
      if (typeof arg === "string") return arg;
      return decoded.errorName;
    } catch (decodeErr) {
      console.warn("[evmClient] Undecodable revert data:", toErrorMessage(decodeErr));
    }
  }

  let innermost = "";
  for (const link of errorChain(err)) {
    if (link instanceof Error && link.message) innermost = link.message;
  }
  const match = /execution reverted(?::\s*([^\n]+))?/i.exec(innermost);
  if (match) return match[1]?.trim() || "execution reverted";
  return toErrorMessage(err);
}

export class EvmClient {
  readonly chain: EvmChainName;
  readonly viemChain: Chain;
  readonly publicClient: PublicClient<Transport, Chain>;

  private readonly confirmationTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly tokenInfoTtlMs: number;
  private readonly tokenCache = new Map<string, { token: TokenInfo; expiresAt: number }>();
  private signer: EvmSigner | undefined;

  constructor(
    readonly chainConfig: ChainConfig,
    options: EvmClientOptions = {},
  ) {
    if (!isEvmChain(chainConfig.chain)) {
      throw new UnsupportedChainError(chainConfig.chain, `EvmClient does not support chain '${chainConfig.chain}'`);
    }
    this.chain = chainConfig.chain;
    this.viemChain = VIEM_CHAINS[this.chain];
    const transport: Transport = options.transport ?? http(chainConfig.rpcUrl);
    this.publicClient = createPublicClient({ chain: this.viemChain, transport });
    this.confirmationTimeoutMs = options.confirmationTimeoutMs ?? 150_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 1_000;
    this.tokenInfoTtlMs = options.tokenInfoTtlMs ?? 600_000;
  }

  static fromConfig(config: EngineConfig, chain: string, transport?: Transport): EvmClient {
    return new EvmClient(getChainConfig(config, chain), {
      transport,
      confirmationTimeoutMs: config.transactions.confirmationTimeoutMs,
      pollIntervalMs: config.transactions.pollIntervalMs,
      tokenInfoTtlMs: config.tokenInfoTtlMs,
    });
  }

  toChecksumAddress(address: string): Address {
    if (!isAddress(address, { strict: false })) throw new InvalidAddressError(address);
    return getAddress(address);
  }

  /** Runs a read against the node, wrapping anything that is not already a DexError in RpcError. */
  async rpc<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isDexError(err)) throw err;
      throw new RpcError(`${this.chain} ${operation}`, err);
    }
  }

  // ── Balances ────────────────────────────────────────────────────────────────

  async getNativeBalance(owner: string): Promise<Decimal> {
    const address = this.toChecksumAddress(owner);
    const wei = await this.rpc("getBalance", () => this.publicClient.getBalance({ address }));
    return new Dec(wei.toString()).div(pow10(18));
  }

  async getRawTokenBalance(token: TokenInfo, owner: string): Promise<bigint> {
    const account = this.toChecksumAddress(owner);
    if (token.isNative) {
      return this.rpc("getBalance", () => this.publicClient.getBalance({ address: account }));
    }
    const address = this.toChecksumAddress(token.address);
    return this.rpc(`balanceOf(${token.symbol})`, () =>
      this.publicClient.readContract({ address, abi: ERC20_ABI, functionName: "balanceOf", args: [account] }),
    );
  }

  async getTokenBalance(token: TokenInfo, owner: string): Promise<Decimal> {
    return token.fromBaseUnits(await this.getRawTokenBalance(token, owner));
  }

  async getAllowance(token: TokenInfo, owner: string, spender: string): Promise<bigint> {
    const address = this.toChecksumAddress(token.address);
    const args = [this.toChecksumAddress(owner), this.toChecksumAddress(spender)] as const;
    return this.rpc(`allowance(${token.symbol})`, () =>
      this.publicClient.readContract({ address, abi: ERC20_ABI, functionName: "allowance", args }),
    );
  }

  // ── Token metadata ─────────────────────────────────────────────────────────

  /**
   * Registry tokens resolve without a network call; anything else reads
   * `decimals()` and `symbol()` once and is cached for `tokenInfoTtlMs`.
   */
  async getTokenInfo(address: string): Promise<TokenInfo> {
    const key = addressKey(address);
    const registered = Object.values(this.chainConfig.tokens).find((token) => addressKey(token.address) === key);
    if (registered) return registered;

    const cached = this.tokenCache.get(key);
    if (cached && cached.expiresAt > Date.now()) return cached.token;

    const checksummed = this.toChecksumAddress(address);
    const [decimals, symbol] = await this.rpc(`token metadata ${checksummed}`, () =>
      Promise.all([
        this.publicClient.readContract({ address: checksummed, abi: ERC20_ABI, functionName: "decimals" }),
        this.publicClient.readContract({ address: checksummed, abi: ERC20_ABI, functionName: "symbol" }),
      ]),
    );
    const token = new TokenInfo({ symbol, address: checksummed, decimals, chain: this.chain });
    this.tokenCache.set(key, { token, expiresAt: Date.now() + this.tokenInfoTtlMs });
    return token;
  }

  clearTokenCache(): void {
    this.tokenCache.clear();
  }

  // ── Wallet ─────────────────────────────────────────────────────────────────

  getSigner(): EvmSigner {
    if (this.signer) return this.signer;
    const { privateKey, gasLimit } = this.chainConfig;
    if (!privateKey) {
      throw new InvalidConfigError(`No private key configured for ${this.chain}`);
    }
    this.signer = new EvmSigner(privateKey, gasLimit !== undefined ? BigInt(gasLimit) : DEFAULT_GAS_LIMIT);
    return this.signer;
  }

  get walletAddress(): Address {
    if (this.chainConfig.privateKey) return this.getSigner().address;
    if (this.chainConfig.walletAddress) return this.toChecksumAddress(this.chainConfig.walletAddress);
    throw new InvalidConfigError(`No wallet configured for ${this.chain}`);
  }

  // ── Transactions ───────────────────────────────────────────────────────────

  async estimateFees(): Promise<FeeEstimate> {
    const block = await this.rpc("getBlock", () => this.publicClient.getBlock({ blockTag: "latest" }));
    const baseFeePerGas = block.baseFeePerGas ?? 0n;
    if (baseFeePerGas === 0n) {
      console.warn(`[evmClient] ${this.chain} latest block reports no base fee; maxFeePerGas falls back to the priority fee`);
    }
    const maxPriorityFeePerGas = await this.rpc("estimateMaxPriorityFeePerGas", () =>
      this.publicClient.estimateMaxPriorityFeePerGas(),
    );
    return { baseFeePerGas, maxPriorityFeePerGas, maxFeePerGas: 2n * baseFeePerGas + maxPriorityFeePerGas };
  }

  /** Signs locally and broadcasts; returns the transaction hash without waiting. */
  async sendTransaction(signer: EvmSigner, step: TransactionStep): Promise<Hex> {
    return nonceLock(this.chain, signer.address)(async () => {
      const nonce = await this.rpc("getTransactionCount", () =>
        this.publicClient.getTransactionCount({ address: signer.address, blockTag: "pending" }),
      );
      const fees = await this.estimateFees();
      const serializedTransaction = await signer.account.signTransaction({
        chainId: this.viemChain.id,
        type: "eip1559",
        to: step.to,
        data: step.data,
        value: step.value ?? 0n,
        nonce,
        gas: signer.gasLimit,
        maxFeePerGas: fees.maxFeePerGas,
        maxPriorityFeePerGas: fees.maxPriorityFeePerGas,
      });
      const hash = await this.rpc("sendRawTransaction", () =>
        this.publicClient.sendRawTransaction({ serializedTransaction }),
      );
      console.log(`[evmClient] ${this.chain} sent ${step.description}: ${hash}`);
      return hash;
    });
  }

  /** Waits for the receipt. Throws TransactionTimeoutError once the confirmation timeout elapses. */
  async waitForReceipt(hash: Hex): Promise<TransactionReceipt> {
    try {
      return await this.publicClient.waitForTransactionReceipt({
        hash,
        timeout: this.confirmationTimeoutMs,
        pollingInterval: this.pollIntervalMs,
      });
    } catch (err) {
      if (err instanceof WaitForTransactionReceiptTimeoutError) {
        throw new TransactionTimeoutError(hash, this.confirmationTimeoutMs);
      }
      throw new RpcError(`${this.chain} waitForTransactionReceipt`, err);
    }
  }

  /** Replays the failed call at the receipt's block to recover its revert reason. */
  async getRevertReason(receipt: TransactionReceipt, step: TransactionStep, from: Address): Promise<string> {
    try {
      await this.publicClient.call({
        account: from,
        to: step.to,
        data: step.data,
        value: step.value,
        blockNumber: receipt.blockNumber,
      });
    } catch (err) {
      return extractRevertReason(err);
    }
    return "execution reverted (replay succeeded; state changed since inclusion)";
  }

  /** Sends, waits, and throws TransactionRevertedError when the receipt status is not success. */
  async sendAndConfirm(signer: EvmSigner, step: TransactionStep): Promise<TransactionReceipt> {
    const hash = await this.sendTransaction(signer, step);
    const receipt = await this.waitForReceipt(hash);
    if (receipt.status !== "success") {
      const reason = await this.getRevertReason(receipt, step, signer.address);
      console.error(`[evmClient] ${step.description} reverted (${hash}): ${reason}`);
      throw new TransactionRevertedError(reason, hash);
    }
    return receipt;
  }
}

import { Connection, Keypair, PublicKey, Transaction, VersionedTransaction } from "@solana/web3.js";
import bs58 from "bs58";
import { z } from "zod";
import { Dec, pow10, type Decimal } from "../core/decimal";
import {
  ConfirmationTimeoutError,
  InvalidAddressError,
  InvalidConfigError,
  isDexError,
  RpcError,
  TransactionRevertedError,
  UnsupportedChainError,
  toErrorMessage,
} from "../core/errors";
import { pollUntil } from "../core/poll";
import { type TokenInfo } from "../core/token";
import { type ChainConfig, type EngineConfig, getChainConfig, isSolanaChain, type SolanaChainName } from "../engine/config";

/** The slice of `Connection` the client depends on. */
export type SolanaRpc = Pick<
  Connection,
  "getBalance" | "getParsedTokenAccountsByOwner" | "sendRawTransaction" | "getSignatureStatuses" | "getLatestBlockhash"
>;

export interface SolanaClientOptions {
  rpc?: SolanaRpc;
  confirmationTimeoutMs?: number;
  pollIntervalMs?: number;
}

const LAMPORTS_DECIMALS = 9;

const parsedTokenAccountSchema = z.object({
  info: z.object({
    tokenAmount: z.object({ amount: z.string().regex(/^\d+$/) }),
  }),
});

const secretKeyBytesSchema = z.array(z.number().int().min(0).max(255)).length(64);

/** Accepts a base58 secret key or a JSON byte array (the Solana CLI keypair file format). */
export function loadKeypair(secret: string): Keypair {
  const cleaned = secret.trim();
  try {
    if (cleaned.startsWith("[")) {
      const bytes = secretKeyBytesSchema.parse(JSON.parse(cleaned));
      return Keypair.fromSecretKey(Uint8Array.from(bytes));
    }
    return Keypair.fromSecretKey(bs58.decode(cleaned));
  } catch (err) {
    throw new InvalidConfigError(`Invalid Solana secret key: ${toErrorMessage(err)}`);
  }
}

export function toPublicKey(address: string): PublicKey {
  try {
    return new PublicKey(address);
  } catch {
    throw new InvalidAddressError(address);
  }
}

export class SolanaClient {
  readonly chain: SolanaChainName;
  readonly rpc: SolanaRpc;

  private readonly confirmationTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private keypair: Keypair | undefined;

  constructor(
    readonly chainConfig: ChainConfig,
    options: SolanaClientOptions = {},
  ) {
    if (!isSolanaChain(chainConfig.chain)) {
      throw new UnsupportedChainError(chainConfig.chain, `SolanaClient does not support chain '${chainConfig.chain}'`);
    }
    this.chain = chainConfig.chain;
    this.rpc = options.rpc ?? new Connection(chainConfig.rpcUrl, "confirmed");
    this.confirmationTimeoutMs = options.confirmationTimeoutMs ?? 10_000;
    this.pollIntervalMs = options.pollIntervalMs ?? 1_000;
  }

  static fromConfig(config: EngineConfig, chain: string, rpc?: SolanaRpc): SolanaClient {
    return new SolanaClient(getChainConfig(config, chain), {
      rpc,
      confirmationTimeoutMs: config.transactions.solanaConfirmationTimeoutMs,
      pollIntervalMs: config.transactions.solanaPollIntervalMs,
    });
  }

  private async call<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (isDexError(err)) throw err;
      throw new RpcError(`${this.chain} ${operation}`, err);
    }
  }

  getKeypair(): Keypair {
    if (this.keypair) return this.keypair;
    if (!this.chainConfig.privateKey) {
      throw new InvalidConfigError(`No private key configured for ${this.chain}`);
    }
    this.keypair = loadKeypair(this.chainConfig.privateKey);
    return this.keypair;
  }

  get walletAddress(): string {
    if (this.chainConfig.privateKey) return this.getKeypair().publicKey.toBase58();
    if (this.chainConfig.walletAddress) return toPublicKey(this.chainConfig.walletAddress).toBase58();
    throw new InvalidConfigError(`No wallet configured for ${this.chain}`);
  }

  async getNativeBalance(owner: string): Promise<Decimal> {
    const key = toPublicKey(owner);
    const lamports = await this.call("getBalance", () => this.rpc.getBalance(key));
    return new Dec(lamports).div(pow10(LAMPORTS_DECIMALS));
  }

  /** SPL balances sum every token account the owner holds for the mint; no account means zero. */
  async getTokenBalance(token: TokenInfo, owner: string): Promise<Decimal> {
    const ownerKey = toPublicKey(owner);
    if (token.isNative) {
      const lamports = await this.call("getBalance", () => this.rpc.getBalance(ownerKey));
      return token.fromBaseUnits(lamports);
    }
    const mint = toPublicKey(token.address);
    const accounts = await this.call(`getParsedTokenAccountsByOwner(${token.symbol})`, () =>
      this.rpc.getParsedTokenAccountsByOwner(ownerKey, { mint }),
    );
    let raw = 0n;
    for (const { account } of accounts.value) {
      const parsed = parsedTokenAccountSchema.safeParse(account.data.parsed);
      if (!parsed.success) {
        console.warn(`[solanaClient] Skipping unparseable token account for ${token.symbol}`);
        continue;
      }
      raw += BigInt(parsed.data.info.tokenAmount.amount);
    }
    return token.fromBaseUnits(raw);
  }

  /**
   * Broadcasts a signed transaction and polls its status until it is
   * finalized. A status error means the transaction failed on chain.
   */
  async submitAndConfirm(rawTransaction: Uint8Array): Promise<string> {
    const signature = await this.call("sendRawTransaction", () =>
      this.rpc.sendRawTransaction(rawTransaction, { preflightCommitment: "confirmed" }),
    );
    console.log(`[solanaClient] ${this.chain} submitted ${signature}`);

    const finalized = await pollUntil(
      async () => {
        const { value } = await this.call("getSignatureStatuses", () => this.rpc.getSignatureStatuses([signature]));
        const status = value[0];
        if (status?.err) {
          throw new TransactionRevertedError(JSON.stringify(status.err), signature);
        }
        return status?.confirmationStatus === "finalized" ? signature : undefined;
      },
      { intervalMs: this.pollIntervalMs, timeoutMs: this.confirmationTimeoutMs },
    );
    if (!finalized) throw new ConfirmationTimeoutError(signature, this.confirmationTimeoutMs);
    return finalized;
  }

  async signAndSubmit(transaction: Transaction | VersionedTransaction): Promise<string> {
    const keypair = this.getKeypair();
    if (transaction instanceof VersionedTransaction) {
      transaction.sign([keypair]);
      return this.submitAndConfirm(transaction.serialize());
    }
    if (!transaction.recentBlockhash) {
      const { blockhash } = await this.call("getLatestBlockhash", () => this.rpc.getLatestBlockhash());
      transaction.recentBlockhash = blockhash;
    }
    if (!transaction.feePayer) transaction.feePayer = keypair.publicKey;
    transaction.sign(keypair);
    return this.submitAndConfirm(transaction.serialize());
  }
}

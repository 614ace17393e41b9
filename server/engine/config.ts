import { readFileSync } from "fs";
import { z } from "zod";
import { InvalidConfigError, UnsupportedChainError } from "../core/errors";
import { addressKey, TokenInfo } from "../core/token";

export const EVM_CHAINS = ["ethereum", "ethereum_sepolia", "base", "base_sepolia"] as const;
export const SOLANA_CHAINS = ["solana", "solana_devnet"] as const;

export type EvmChainName = (typeof EVM_CHAINS)[number];
export type SolanaChainName = (typeof SOLANA_CHAINS)[number];

export function isEvmChain(chain: string): chain is EvmChainName {
  return EVM_CHAINS.some((name) => name === chain);
}

export function isSolanaChain(chain: string): chain is SolanaChainName {
  return SOLANA_CHAINS.some((name) => name === chain);
}

export interface ChainConfig {
  chain: string;
  rpcUrl: string;
  privateKey?: string;
  walletAddress?: string;
  gasLimit?: number;
  tokens: Record<string, TokenInfo>;
}

export interface UniswapV3Settings {
  feeTiers: number[];
}

export interface JupiterSettings {
  quoteApiUrl: string;
  slippageBps: number;
  apiKey?: string;
}

export interface TransactionSettings {
  confirmationTimeoutMs: number;
  pollIntervalMs: number;
  solanaConfirmationTimeoutMs: number;
  solanaPollIntervalMs: number;
  deadlineSeconds: number;
}

export interface EngineConfig {
  chains: Record<string, ChainConfig>;
  venues: {
    uniswap_v3: UniswapV3Settings;
    jupiter: JupiterSettings;
  };
  transactions: TransactionSettings;
  tokenInfoTtlMs: number;
}

// ── Defaults (public, non-secret) ─────────────────────────────────────────────
const DEFAULT_RPC_URLS: Record<string, string> = {
  ethereum: "https://eth.llamarpc.com",
  ethereum_sepolia: "https://rpc.sepolia.org",
  base: "https://mainnet.base.org",
  base_sepolia: "https://sepolia.base.org",
  solana: "https://api.mainnet-beta.solana.com",
  solana_devnet: "https://api.devnet.solana.com",
};

// Env var prefix per chain: <PREFIX>_RPC_URL, <PREFIX>_PRIVATE_KEY, <PREFIX>_WALLET_ADDRESS
const ENV_PREFIX: Record<string, string> = {
  ethereum: "ETH",
  ethereum_sepolia: "ETH_SEPOLIA",
  base: "BASE",
  base_sepolia: "BASE_SEPOLIA",
  solana: "SOL",
  solana_devnet: "SOL_DEVNET",
};

export const DEFAULT_FEE_TIERS = [100, 500, 3000, 10000];

// ── Schemas ───────────────────────────────────────────────────────────────────
const tokenRegistrySchema = z.record(
  z.string(),
  z.object({
    gasLimit: z.number().int().positive().optional(),
    tokens: z.record(
      z.string(),
      z.object({
        address: z.string().min(1),
        decimals: z.number().int().min(0).max(255),
        isNative: z.boolean().optional(),
      }),
    ),
  }),
);

export type TokenRegistry = z.infer<typeof tokenRegistrySchema>;

const envSchema = z.object({
  JUPITER_QUOTE_API_URL: z.string().url().default("https://quote-api.jup.ag/v6/quote"),
  JUPITER_API_KEY: z.string().min(1).optional(),
  JUPITER_SLIPPAGE_BPS: z.coerce.number().int().min(0).max(10_000).default(100),
  UNISWAP_V3_FEE_TIERS: z
    .string()
    .default(DEFAULT_FEE_TIERS.join(","))
    .transform((value) => value.split(",").map((tier) => Number(tier.trim())))
    .pipe(z.array(z.number().int().positive()).nonempty()),
  TX_CONFIRMATION_TIMEOUT_MS: z.coerce.number().int().positive().default(150_000),
  TX_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
  SOLANA_CONFIRMATION_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  SOLANA_POLL_INTERVAL_MS: z.coerce.number().int().positive().default(1_000),
  TX_DEADLINE_SECONDS: z.coerce.number().int().positive().default(300),
  TOKEN_INFO_TTL_MS: z.coerce.number().int().nonnegative().default(600_000),
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`).join("; ");
}

export function readTokenRegistry(): unknown {
  const raw = readFileSync(new URL("./tokens.json", import.meta.url), "utf-8");
  return JSON.parse(raw);
}

function envValue(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value && value.trim() !== "" ? value.trim() : undefined;
}

function rpcUrlFor(env: NodeJS.ProcessEnv, chain: string, prefix: string): string {
  if (chain === "solana") return envValue(env, "SOLANA_RPC_URL") ?? DEFAULT_RPC_URLS[chain];
  const url = envValue(env, `${prefix}_RPC_URL`) ?? DEFAULT_RPC_URLS[chain];
  if (!url) throw new InvalidConfigError(`${prefix}_RPC_URL not set`);
  return url;
}

/**
 * Builds the engine configuration from environment variables and the token
 * registry. Everything downstream treats the result as already validated.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, registry: unknown = readTokenRegistry()): EngineConfig {
  const parsedRegistry = tokenRegistrySchema.safeParse(registry);
  if (!parsedRegistry.success) {
    throw new InvalidConfigError(`Invalid token registry: ${formatIssues(parsedRegistry.error)}`);
  }
  const parsedEnv = envSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new InvalidConfigError(`Invalid environment: ${formatIssues(parsedEnv.error)}`);
  }
  const settings = parsedEnv.data;

  const chains: Record<string, ChainConfig> = {};
  for (const [chain, entry] of Object.entries(parsedRegistry.data)) {
    if (!isEvmChain(chain) && !isSolanaChain(chain)) {
      throw new InvalidConfigError(`Token registry lists unknown chain '${chain}'`);
    }
    const prefix = ENV_PREFIX[chain] ?? chain.toUpperCase();
    const tokens: Record<string, TokenInfo> = {};
    for (const [symbol, token] of Object.entries(entry.tokens)) {
      tokens[symbol] = new TokenInfo({ symbol, chain, ...token });
    }
    chains[chain] = {
      chain,
      rpcUrl: rpcUrlFor(env, chain, prefix),
      privateKey: envValue(env, `${prefix}_PRIVATE_KEY`),
      walletAddress: envValue(env, `${prefix}_WALLET_ADDRESS`),
      gasLimit: entry.gasLimit,
      tokens,
    };
  }

  return {
    chains,
    venues: {
      uniswap_v3: { feeTiers: settings.UNISWAP_V3_FEE_TIERS },
      jupiter: {
        quoteApiUrl: settings.JUPITER_QUOTE_API_URL,
        slippageBps: settings.JUPITER_SLIPPAGE_BPS,
        apiKey: settings.JUPITER_API_KEY,
      },
    },
    transactions: {
      confirmationTimeoutMs: settings.TX_CONFIRMATION_TIMEOUT_MS,
      pollIntervalMs: settings.TX_POLL_INTERVAL_MS,
      solanaConfirmationTimeoutMs: settings.SOLANA_CONFIRMATION_TIMEOUT_MS,
      solanaPollIntervalMs: settings.SOLANA_POLL_INTERVAL_MS,
      deadlineSeconds: settings.TX_DEADLINE_SECONDS,
    },
    tokenInfoTtlMs: settings.TOKEN_INFO_TTL_MS,
  };
}

export function getChainConfig(config: EngineConfig, chain: string): ChainConfig {
  const chainConfig = config.chains[chain];
  if (!chainConfig) {
    throw new UnsupportedChainError(chain, `Chain '${chain}' is not configured. Configured: ${Object.keys(config.chains).join(", ")}`);
  }
  return chainConfig;
}

export function getTokenInfo(config: EngineConfig, chain: string, symbol: string): TokenInfo {
  const token = getChainConfig(config, chain).tokens[symbol];
  if (!token) {
    throw new InvalidConfigError(`Token '${symbol}' is not registered on ${chain}`);
  }
  return token;
}

/** Resolves a registered token by symbol (case-insensitive) or by address. */
export function findToken(config: EngineConfig, chain: string, symbolOrAddress: string): TokenInfo | undefined {
  const { tokens } = getChainConfig(config, chain);
  const wanted = symbolOrAddress.toUpperCase();
  const key = addressKey(symbolOrAddress);
  return Object.values(tokens).find((token) => token.symbol.toUpperCase() === wanted || addressKey(token.address) === key);
}

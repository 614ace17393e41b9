import { z } from "zod";
import {
  type EngineContext,
  type HandlerResult,
  handleBalance,
  handleMarkets,
  handleQuote,
  handleReceipts,
  handleSwap,
} from "../execution/handler";

export function manifest() {
  return {
    name: "dex-trading-skill",
    version: "0.1.0",
    description:
      "Multi-chain DEX trading: Uniswap V2/V3 on Ethereum and Base (mainnet and testnets), Jupiter quotes on Solana. Tokens are given by registered symbol or address.",
    actions: {
      get_token_price: {
        chain: '"ethereum" | "ethereum_sepolia" | "base" | "base_sepolia" | "solana"',
        "venue (optional)": '"uniswap_v2" | "uniswap_v3" | "jupiter"; defaults to uniswap_v3 on EVM, jupiter on Solana',
        tokenOut: "token the price is expressed in",
        tokenIn: "token being priced",
      },
      execute_swap: {
        chain: "EVM chain name",
        "venue (optional)": '"uniswap_v2" | "uniswap_v3"',
        baseToken: "token to buy",
        quoteToken: "token to spend",
        amount: "amount of quoteToken to spend",
        "slippageBps (optional)": "0-10000, default 100",
      },
      get_markets: {
        chain: "chain name",
        "venue (optional)": "venue name",
        "tokens (optional)": "token symbols to pair up; defaults to the chain's registry",
      },
      get_balance: {
        chain: "chain name",
        "token (optional)": "single token; defaults to every registered token",
        "owner (optional)": "address to query; defaults to the configured wallet",
      },
      get_receipts: { "limit (optional)": "number of most recent receipts, default 50" },
    },
  };
}

const priceArgs = z.object({
  chain: z.string(),
  venue: z.string().optional(),
  tokenOut: z.string(),
  tokenIn: z.string(),
});

const swapArgs = z.object({
  chain: z.string(),
  venue: z.string().optional(),
  baseToken: z.string(),
  quoteToken: z.string(),
  amount: z.union([z.string(), z.number()]),
  slippageBps: z.number().int().optional(),
});

const marketsArgs = z.object({
  chain: z.string(),
  venue: z.string().optional(),
  tokens: z.array(z.string()).optional(),
});

const balanceArgs = z.object({
  chain: z.string(),
  token: z.string().optional(),
  owner: z.string().optional(),
});

const receiptsArgs = z.object({
  limit: z.number().int().positive().optional(),
});

function parseArgs<T>(
  schema: z.ZodType<T>,
  action: string,
  args: unknown,
): { ok: true; data: T } | { ok: false; error: string } {
  const parsed = schema.safeParse(args ?? {});
  if (parsed.success) return { ok: true, data: parsed.data };
  const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`);
  return { ok: false, error: `Invalid arguments for ${action}: ${issues.join("; ")}` };
}

/** Dispatches one skill action. Never throws; invalid input comes back as an error result. */
export async function invoke(ctx: EngineContext, action: string, args: unknown): Promise<HandlerResult<unknown>> {
  switch (action) {
    case "get_token_price": {
      const parsed = parseArgs(priceArgs, action, args);
      return parsed.ok ? handleQuote(ctx, parsed.data) : parsed;
    }

    case "execute_swap": {
      const parsed = parseArgs(swapArgs, action, args);
      return parsed.ok ? handleSwap(ctx, { ...parsed.data, source: "skill" }) : parsed;
    }

    case "get_markets": {
      const parsed = parseArgs(marketsArgs, action, args);
      return parsed.ok ? handleMarkets(ctx, parsed.data) : parsed;
    }

    case "get_balance": {
      const parsed = parseArgs(balanceArgs, action, args);
      return parsed.ok ? handleBalance(ctx, parsed.data) : parsed;
    }

    case "get_receipts": {
      const parsed = parseArgs(receiptsArgs, action, args);
      return parsed.ok ? handleReceipts(ctx, parsed.data.limit) : parsed;
    }

    default:
      return { ok: false, error: `Unknown action: ${action}` };
  }
}

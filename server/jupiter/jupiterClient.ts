import { z } from "zod";
import { Dec, type Decimal } from "../core/decimal";
import { NoMarketError, NotImplementedError, RpcError, UnsupportedChainError } from "../core/errors";
import { type TokenInfo } from "../core/token";
import { type EngineConfig, type JupiterSettings } from "../engine/config";
import { discoverMarkets } from "../execution/markets";
import { type DexClient, type SwapResult } from "../execution/types";

const swapInfoSchema = z.object({
  ammKey: z.string(),
  label: z.string().nullish(),
  inputMint: z.string(),
  outputMint: z.string(),
  inAmount: z.string(),
  outAmount: z.string(),
  feeAmount: z.string(),
  feeMint: z.string(),
});

const quoteResponseSchema = z.object({
  outAmount: z.string().regex(/^\d+$/),
  routePlan: z.array(z.object({ swapInfo: swapInfoSchema, percent: z.number() })),
});

export type JupiterQuoteResponse = z.infer<typeof quoteResponseSchema>;

export interface JupiterQuote {
  amountIn: Decimal;
  amountOut: Decimal;
  /** `tokenOut` per one `tokenIn` */
  price: Decimal;
  routePlan: JupiterQuoteResponse["routePlan"];
  /** AMM keys joined with "/" */
  route: string;
}

/**
 * Quote-only client for the Jupiter aggregator on Solana. Prices come from the
 * quote endpoint; swaps are not executed through this venue.
 */
export class JupiterClient implements DexClient {
  readonly venue = "jupiter";
  readonly chain = "solana";

  constructor(
    chain: string,
    private readonly settings: JupiterSettings,
  ) {
    if (chain !== "solana") {
      throw new UnsupportedChainError(chain, `Chain '${chain}' not supported. JupiterClient only supports solana`);
    }
    console.log(`[jupiter] Initialized on ${chain} via ${settings.quoteApiUrl}`);
  }

  static fromConfig(config: EngineConfig, chain: string): JupiterClient {
    return new JupiterClient(chain, config.venues.jupiter);
  }

  async getQuote(tokenOut: TokenInfo, tokenIn: TokenInfo, amountIn: Decimal.Value = 1): Promise<JupiterQuote> {
    for (const token of [tokenOut, tokenIn]) {
      if (token.chain !== this.chain) {
        throw new UnsupportedChainError(token.chain, `Jupiter only supports Solana tokens; ${token.symbol} is on ${token.chain}`);
      }
    }

    const params = new URLSearchParams({
      inputMint: tokenIn.address,
      outputMint: tokenOut.address,
      swapMode: "ExactIn",
      amount: tokenIn.toBaseUnits(amountIn).toString(),
      slippageBps: String(this.settings.slippageBps),
    });
    const headers: Record<string, string> = { Accept: "application/json" };
    if (this.settings.apiKey) headers["x-api-key"] = this.settings.apiKey;

    let res: Response;
    try {
      res = await fetch(`${this.settings.quoteApiUrl}?${params.toString()}`, { headers });
    } catch (err) {
      throw new RpcError("Jupiter quote", err);
    }
    if (!res.ok) {
      const body = await res.text();
      if (res.status === 400 && /route/i.test(body)) {
        throw new NoMarketError(`Jupiter has no route for ${tokenIn.symbol} -> ${tokenOut.symbol}: ${body}`);
      }
      throw new RpcError("Jupiter quote", new Error(`HTTP ${res.status}: ${body}`));
    }

    const parsed = quoteResponseSchema.safeParse(await res.json());
    if (!parsed.success) {
      throw new RpcError("Jupiter quote", new Error(`Unexpected response: ${parsed.error.message}`));
    }
    const quote = parsed.data;
    const amountInDec = new Dec(amountIn);
    const amountOut = tokenOut.fromBaseUnits(BigInt(quote.outAmount));
    const route = quote.routePlan.map((step) => step.swapInfo.ammKey).join("/");
    console.log(`[jupiter] Quote ${amountInDec.toString()} ${tokenIn.symbol} -> ${amountOut.toString()} ${tokenOut.symbol} via ${route || "(direct)"}`);

    return {
      amountIn: amountInDec,
      amountOut,
      price: amountOut.div(amountInDec),
      routePlan: quote.routePlan,
      route,
    };
  }

  /** Quotes exactly one `tokenIn`. */
  async getTokenPrice(tokenOut: TokenInfo, tokenIn: TokenInfo): Promise<Decimal> {
    const quote = await this.getQuote(tokenOut, tokenIn, 1);
    return quote.price;
  }

  async swap(baseToken: TokenInfo, quoteToken: TokenInfo): Promise<SwapResult> {
    throw new NotImplementedError(`Jupiter swap (${quoteToken.symbol} -> ${baseToken.symbol}) is not implemented`);
  }

  /** A pair is a market when the aggregator can route one unit between the tokens. */
  async getMarketsForTokens(tokens: readonly TokenInfo[]): Promise<Array<[TokenInfo, TokenInfo]>> {
    return discoverMarkets("jupiter", tokens, async (tokenA, tokenB) => {
      try {
        await this.getQuote(tokenB, tokenA, 1);
        return true;
      } catch (err) {
        if (err instanceof NoMarketError) return false;
        throw err;
      }
    });
  }
}

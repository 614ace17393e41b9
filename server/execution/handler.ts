import { randomUUID } from "crypto";
import { EvmClient } from "../chains/evmClient";
import { SolanaClient } from "../chains/solanaClient";
import { Dec, type Decimal } from "../core/decimal";
import { type DexErrorCode, isDexError, toErrorMessage, UnknownTokenError } from "../core/errors";
import { type TokenInfo } from "../core/token";
import { type EngineConfig, findToken, getChainConfig, isEvmChain } from "../engine/config";
import { type ReceiptStore, type SwapReceipt } from "../receipts/store";
import { type DexClient, type VenueName } from "./types";
import { type VenueRegistry } from "./venueRegistry";

/** Reads balances for a chain's wallet; both chain clients satisfy it. */
export interface BalanceReader {
  readonly walletAddress: string;
  getTokenBalance(token: TokenInfo, owner: string): Promise<Decimal>;
}

export interface EngineContext {
  config: EngineConfig;
  registry: VenueRegistry;
  receipts: ReceiptStore;
  /** Overrides how balance readers are built, e.g. against an in-process node. */
  balanceReader?: (chain: string) => BalanceReader;
}

export type HandlerResult<T> = { ok: true; data: T } | { ok: false; error: string; code?: DexErrorCode };

export interface QuoteRequest {
  chain: string;
  venue?: string;
  /** Symbol or address */
  tokenOut: string;
  tokenIn: string;
}

export interface QuoteResponse {
  chain: string;
  venue: string;
  tokenOut: string;
  tokenIn: string;
  /** `tokenOut` per one `tokenIn` */
  price: string;
}

export interface SwapRequest {
  chain: string;
  venue?: string;
  baseToken: string;
  quoteToken: string;
  /** Amount of `quoteToken` to spend, in human units. */
  amount: string | number;
  slippageBps?: number;
  source?: string;
}

export interface MarketsRequest {
  chain: string;
  venue?: string;
  /** Defaults to every registered token on the chain. */
  tokens?: string[];
}

export interface BalanceRequest {
  chain: string;
  /** Defaults to every registered token on the chain. */
  token?: string;
  owner?: string;
}

export interface BalanceEntry {
  symbol: string;
  address: string;
  balance: string;
}

export function defaultVenue(chain: string): VenueName {
  return isEvmChain(chain) ? "uniswap_v3" : "jupiter";
}

function fail(err: unknown): { ok: false; error: string; code?: DexErrorCode } {
  if (isDexError(err)) return { ok: false, error: err.message, code: err.code };
  return { ok: false, error: toErrorMessage(err) };
}

function resolveToken(config: EngineConfig, chain: string, symbolOrAddress: string): TokenInfo {
  const token = findToken(config, chain, symbolOrAddress);
  if (!token) throw new UnknownTokenError(symbolOrAddress, chain);
  return token;
}

function createBalanceReader(ctx: EngineContext, chain: string): BalanceReader {
  if (ctx.balanceReader) return ctx.balanceReader(chain);
  if (isEvmChain(chain)) return EvmClient.fromConfig(ctx.config, chain);
  return SolanaClient.fromConfig(ctx.config, chain);
}

function createClient(ctx: EngineContext, chain: string, venue?: string): DexClient {
  return ctx.registry.create(venue ?? defaultVenue(chain), ctx.config, chain);
}

/**
 * Quote, swap, market and balance entry points for the HTTP routes and the
 * agent skill. None of them throws; failures come back as `{ ok: false }`.
 */
export async function handleQuote(ctx: EngineContext, request: QuoteRequest): Promise<HandlerResult<QuoteResponse>> {
  try {
    const tokenOut = resolveToken(ctx.config, request.chain, request.tokenOut);
    const tokenIn = resolveToken(ctx.config, request.chain, request.tokenIn);
    const client = createClient(ctx, request.chain, request.venue);
    const price = await client.getTokenPrice(tokenOut, tokenIn);
    return {
      ok: true,
      data: {
        chain: request.chain,
        venue: client.venue,
        tokenOut: tokenOut.symbol,
        tokenIn: tokenIn.symbol,
        price: price.toString(),
      },
    };
  } catch (err) {
    console.error(`[handler] Quote failed on ${request.chain}: ${toErrorMessage(err)}`);
    return fail(err);
  }
}

/**
 * Runs a swap and records it. A swap that was broadcast but failed is still a
 * receipt (`success: false`); only failures before broadcast are errors.
 */
export async function handleSwap(ctx: EngineContext, request: SwapRequest): Promise<HandlerResult<SwapReceipt>> {
  try {
    const baseToken = resolveToken(ctx.config, request.chain, request.baseToken);
    const quoteToken = resolveToken(ctx.config, request.chain, request.quoteToken);
    const amount = new Dec(request.amount);
    if (!amount.isFinite() || amount.lte(0)) {
      throw new RangeError(`Swap amount must be positive, got ${request.amount}`);
    }
    const client = createClient(ctx, request.chain, request.venue);
    const slippageBps = request.slippageBps ?? 100;
    const result = await client.swap(baseToken, quoteToken, amount, slippageBps);

    const receipt: SwapReceipt = {
      id: randomUUID().slice(0, 8),
      ts: Date.now(),
      chain: request.chain,
      venue: client.venue,
      baseToken: baseToken.symbol,
      quoteToken: quoteToken.symbol,
      amountSpent: result.amountSpent.toString(),
      amountReceived: result.amountReceived.toString(),
      slippageBps,
      success: result.success,
      state: result.state,
      txHash: result.txHash,
      approvalTxHash: result.approvalTxHash,
      error: result.error,
      errorCode: result.errorCode,
      source: request.source ?? "api",
    };
    try {
      ctx.receipts.append(receipt);
    } catch (err) {
      console.error(`[handler] Failed to record receipt ${receipt.id} (${receipt.txHash ?? "no tx"}): ${toErrorMessage(err)}`);
    }
    if (!result.success) {
      console.error(`[handler] Swap ${receipt.id} failed in state ${result.state}: ${result.error ?? "unknown error"}`);
    }
    return { ok: true, data: receipt };
  } catch (err) {
    console.error(`[handler] Swap failed on ${request.chain}: ${toErrorMessage(err)}`);
    return fail(err);
  }
}

export async function handleMarkets(
  ctx: EngineContext,
  request: MarketsRequest,
): Promise<HandlerResult<Array<[string, string]>>> {
  try {
    const tokens = request.tokens
      ? request.tokens.map((token) => resolveToken(ctx.config, request.chain, token))
      : Object.values(getChainConfig(ctx.config, request.chain).tokens);
    const client = createClient(ctx, request.chain, request.venue);
    const markets = await client.getMarketsForTokens(tokens);
    return { ok: true, data: markets.map(([a, b]) => [a.symbol, b.symbol]) };
  } catch (err) {
    console.error(`[handler] Market discovery failed on ${request.chain}: ${toErrorMessage(err)}`);
    return fail(err);
  }
}

export async function handleBalance(ctx: EngineContext, request: BalanceRequest): Promise<HandlerResult<BalanceEntry[]>> {
  try {
    const tokens = request.token
      ? [resolveToken(ctx.config, request.chain, request.token)]
      : Object.values(getChainConfig(ctx.config, request.chain).tokens);
    const reader = createBalanceReader(ctx, request.chain);
    const owner = request.owner ?? reader.walletAddress;
    const entries: BalanceEntry[] = [];
    for (const token of tokens) {
      const balance = await reader.getTokenBalance(token, owner);
      entries.push({ symbol: token.symbol, address: token.address, balance: balance.toString() });
    }
    return { ok: true, data: entries };
  } catch (err) {
    console.error(`[handler] Balance lookup failed on ${request.chain}: ${toErrorMessage(err)}`);
    return fail(err);
  }
}

export function handleReceipts(ctx: EngineContext, limit = 50): HandlerResult<Record<string, unknown>[]> {
  try {
    return { ok: true, data: ctx.receipts.list(limit) };
  } catch (err) {
    console.error(`[handler] Reading receipts failed: ${toErrorMessage(err)}`);
    return fail(err);
  }
}

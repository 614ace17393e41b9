import { type Decimal } from "../core/decimal";
import { type DexErrorCode } from "../core/errors";
import { type TokenInfo } from "../core/token";
import { type SwapState } from "./swapExecution";

export type VenueName = "uniswap_v2" | "uniswap_v3" | "jupiter";

export interface SwapResult {
  success: boolean;
  /** Amount of the quote token the caller asked to spend. */
  amountSpent: Decimal;
  /** Amount of the base token credited to the wallet, reconciled from Transfer logs; 0 on failure. */
  amountReceived: Decimal;
  txHash?: string;
  approvalTxHash?: string;
  error?: string;
  errorCode?: DexErrorCode;
  state: SwapState;
}

/**
 * Uniform contract every venue implements. `getTokenPrice(tokenOut, tokenIn)`
 * is the amount of `tokenOut` one unit of `tokenIn` buys.
 */
export interface DexClient {
  readonly venue: string;
  readonly chain: string;
  getTokenPrice(tokenOut: TokenInfo, tokenIn: TokenInfo): Promise<Decimal>;
  /** Spends `quoteAmount` of `quoteToken` to buy `baseToken`. */
  swap(baseToken: TokenInfo, quoteToken: TokenInfo, quoteAmount: Decimal, slippageBps?: number): Promise<SwapResult>;
  getMarketsForTokens(tokens: readonly TokenInfo[]): Promise<Array<[TokenInfo, TokenInfo]>>;
}

import { encodeFunctionData, type Address, type Hex, type TransactionReceipt } from "viem";
import { ERC20_ABI } from "../chains/erc20";
import { type EvmClient, type EvmSigner, type TransactionStep } from "../chains/evmClient";
import { sumTransfersTo } from "../chains/transfers";
import { Dec, type Decimal } from "../core/decimal";
import {
  ApprovalFailedError,
  InsufficientBalanceError,
  TransactionRevertedError,
  TransactionTimeoutError,
  UnsupportedChainError,
  toErrorMessage,
} from "../core/errors";
import { Slippage } from "../core/slippage";
import { type TokenInfo } from "../core/token";
import { type EvmChainName } from "../engine/config";
import { SwapExecution } from "../execution/swapExecution";
import { type DexClient, type SwapResult, type VenueName } from "../execution/types";

export const DEFAULT_SLIPPAGE_BPS = 100;
export const DEFAULT_DEADLINE_SECONDS = 300;

export interface UniswapClientOptions {
  deadlineSeconds?: number;
}

export interface SwapCallParams {
  baseToken: TokenInfo;
  quoteToken: TokenInfo;
  rawAmountIn: bigint;
  minAmountOut: bigint;
  recipient: Address;
  deadline: bigint;
}

/**
 * Approve-then-swap flow shared by the V2 and V3 engines. Subclasses say how
 * a market is found, priced and traded; `TMarket` is whatever they need to
 * carry from discovery to the swap call (a pair address, a selected pool).
 */
export abstract class UniswapClientBase<TMarket> implements DexClient {
  abstract readonly venue: VenueName;
  readonly chain: EvmChainName;
  protected abstract readonly routerAddress: Address;
  protected readonly deadlineSeconds: number;

  constructor(
    readonly evm: EvmClient,
    options: UniswapClientOptions = {},
  ) {
    this.chain = evm.chain;
    this.deadlineSeconds = options.deadlineSeconds ?? DEFAULT_DEADLINE_SECONDS;
  }

  /** Fails with NoMarketError when the venue has no pool for the pair. */
  protected abstract resolveMarket(tokenA: TokenInfo, tokenB: TokenInfo): Promise<TMarket>;
  protected abstract priceFromMarket(market: TMarket, tokenOut: TokenInfo, tokenIn: TokenInfo): Promise<Decimal>;
  protected abstract buildSwapStep(market: TMarket, params: SwapCallParams): TransactionStep;
  protected checkPriceImpact?(market: TMarket, rawAmountIn: bigint, slippage: Slippage): void;

  abstract getMarketsForTokens(tokens: readonly TokenInfo[]): Promise<Array<[TokenInfo, TokenInfo]>>;

  async getTokenPrice(tokenOut: TokenInfo, tokenIn: TokenInfo): Promise<Decimal> {
    this.assertOnChain(tokenOut, tokenIn);
    const market = await this.resolveMarket(tokenOut, tokenIn);
    return this.priceFromMarket(market, tokenOut, tokenIn);
  }

  protected assertOnChain(...tokens: TokenInfo[]): void {
    for (const token of tokens) {
      if (token.chain !== this.chain) {
        throw new UnsupportedChainError(token.chain, `${token.symbol} is on ${token.chain}; this ${this.venue} client serves ${this.chain}`);
      }
    }
  }

  async swap(
    baseToken: TokenInfo,
    quoteToken: TokenInfo,
    quoteAmount: Decimal,
    slippageBps: number = DEFAULT_SLIPPAGE_BPS,
  ): Promise<SwapResult> {
    // ── Pre-flight: nothing is broadcast if any of these throw ─────────────
    const slippage = new Slippage(slippageBps);
    this.assertOnChain(baseToken, quoteToken);
    const rawAmountIn = quoteToken.toBaseUnits(quoteAmount);
    if (rawAmountIn <= 0n) {
      throw new RangeError(`Swap amount must be positive, got ${quoteAmount.toString()} ${quoteToken.symbol}`);
    }

    const signer = this.evm.getSigner();
    const wallet = signer.address;
    console.log(`[${this.venue}] Swapping ${quoteAmount.toString()} ${quoteToken.symbol} -> ${baseToken.symbol} on ${this.chain} from ${wallet}`);

    const [quoteBalance, gasBalance] = await Promise.all([
      this.evm.getRawTokenBalance(quoteToken, wallet),
      this.evm.getNativeBalance(wallet),
    ]);
    console.log(`[${this.venue}] ${quoteToken.symbol} balance: ${quoteToken.fromBaseUnits(quoteBalance).toString()}, gas balance: ${gasBalance.toString()}`);
    if (quoteBalance === 0n) {
      throw new InsufficientBalanceError(`Cannot swap: wallet ${wallet} holds no ${quoteToken.symbol}`);
    }
    if (quoteBalance < rawAmountIn) {
      throw new InsufficientBalanceError(
        `Cannot swap ${quoteAmount.toString()} ${quoteToken.symbol}: balance is ${quoteToken.fromBaseUnits(quoteBalance).toString()}`,
      );
    }

    const market = await this.resolveMarket(baseToken, quoteToken);
    const execution = new SwapExecution(new Dec(quoteAmount));

    // ── Approval ─────────────────────────────────────────────────────────────
    try {
      execution.markApproved(await this.approveIfNeeded(signer, quoteToken, rawAmountIn));
    } catch (err) {
      const failure = err instanceof ApprovalFailedError ? err : new ApprovalFailedError(toErrorMessage(err), undefined, { cause: err });
      execution.approvalTxHash = failure.txHash;
      console.error(`[${this.venue}] ${failure.message}`);
      return execution.abort(failure);
    }

    // ── Swap ─────────────────────────────────────────────────────────────────
    let step: TransactionStep;
    let txHash: Hex;
    try {
      const price = await this.priceFromMarket(market, baseToken, quoteToken);
      const expectedOut = execution.amountSpent.mul(price);
      const minAmountOut = slippage.minimumAmount(baseToken.toBaseUnits(expectedOut));
      console.log(`[${this.venue}] Expected output: ${expectedOut.toString()} ${baseToken.symbol}`);
      console.log(`[${this.venue}] Minimum output with ${slippage.toString()} slippage (raw): ${minAmountOut}`);

      this.checkPriceImpact?.(market, rawAmountIn, slippage);

      step = this.buildSwapStep(market, {
        baseToken,
        quoteToken,
        rawAmountIn,
        minAmountOut,
        recipient: wallet,
        deadline: BigInt(Math.floor(Date.now() / 1000) + this.deadlineSeconds),
      });
      txHash = await this.evm.sendTransaction(signer, step);
      execution.markSubmitted(txHash);
    } catch (err) {
      console.error(`[${this.venue}] Swap not submitted: ${toErrorMessage(err)}`);
      return execution.abort(err);
    }

    let receipt: TransactionReceipt;
    try {
      receipt = await this.evm.waitForReceipt(txHash);
    } catch (err) {
      if (err instanceof TransactionTimeoutError) {
        console.error(`[${this.venue}] ${err.message}`);
        return execution.timeout(err);
      }
      console.error(`[${this.venue}] Lost track of ${txHash}: ${toErrorMessage(err)}`);
      return execution.abort(err);
    }

    if (receipt.status !== "success") {
      const reason = await this.evm.getRevertReason(receipt, step, wallet);
      console.error(`[${this.venue}] Transaction ${txHash} failed because of: ${reason}`);
      return execution.revert(new TransactionRevertedError(reason, txHash));
    }

    // Transfer logs are authoritative; the pre-trade quote is only an estimate
    const received = baseToken.fromBaseUnits(sumTransfersTo(receipt.logs, baseToken.address, wallet));
    console.log(`[${this.venue}] Swap ${txHash} confirmed: received ${received.toString()} ${baseToken.symbol}`);
    return execution.confirm(received);
  }

  /** Returns the approval hash, or undefined when the allowance already covers `rawAmount`. */
  private async approveIfNeeded(signer: EvmSigner, token: TokenInfo, rawAmount: bigint): Promise<string | undefined> {
    const allowance = await this.evm.getAllowance(token, signer.address, this.routerAddress);
    if (allowance >= rawAmount) {
      console.log(`[${this.venue}] Existing ${token.symbol} allowance ${allowance} covers ${rawAmount}; skipping approval`);
      return undefined;
    }

    const step: TransactionStep = {
      to: this.evm.toChecksumAddress(token.address),
      data: encodeFunctionData({ abi: ERC20_ABI, functionName: "approve", args: [this.routerAddress, rawAmount] }),
      description: `approve ${token.symbol} for ${this.venue} router`,
    };
    const hash = await this.evm.sendTransaction(signer, step);
    console.log(`[${this.venue}] Waiting for approval transaction ${hash} to be mined...`);

    let receipt: TransactionReceipt;
    try {
      receipt = await this.evm.waitForReceipt(hash);
    } catch (err) {
      throw new ApprovalFailedError(toErrorMessage(err), hash, { cause: err });
    }
    if (receipt.status !== "success") {
      throw new ApprovalFailedError(await this.evm.getRevertReason(receipt, step, signer.address), hash);
    }
    return hash;
  }
}

import { encodeFunctionData, zeroAddress, type Address } from "viem";
import { EvmClient, type TransactionStep } from "../chains/evmClient";
import { type Decimal } from "../core/decimal";
import { NoMarketError } from "../core/errors";
import { type Slippage } from "../core/slippage";
import { type TokenInfo } from "../core/token";
import { DEFAULT_FEE_TIERS, type EngineConfig } from "../engine/config";
import { discoverMarkets } from "../execution/markets";
import { SWAP_ROUTER_02_ABI, SWAP_ROUTER_ABI, V3_FACTORY_ABI, V3_POOL_ABI } from "./abis";
import { UNISWAP_V3_DEPLOYMENTS, type V3Deployment, type V3RouterKind } from "./deployments";
import { estimatePriceImpactBps, v3PriceFromSqrt } from "./math";
import { type SwapCallParams, UniswapClientBase, type UniswapClientOptions } from "./uniswapClientBase";

export interface UniswapV3Options extends UniswapClientOptions {
  feeTiers?: readonly number[];
  deployment?: V3Deployment;
}

export interface V3Pool {
  address: Address;
  fee: number;
  liquidity: bigint;
}

export class UniswapV3Client extends UniswapClientBase<V3Pool> {
  readonly venue = "uniswap_v3";
  readonly feeTiers: readonly number[];
  protected readonly routerAddress: Address;
  private readonly factoryAddress: Address;
  private readonly routerKind: V3RouterKind;

  constructor(evm: EvmClient, options: UniswapV3Options = {}) {
    super(evm, options);
    const deployment = options.deployment ?? UNISWAP_V3_DEPLOYMENTS[evm.chain];
    this.routerAddress = deployment.router;
    this.factoryAddress = deployment.factory;
    this.routerKind = deployment.routerKind;
    this.feeTiers = options.feeTiers ?? DEFAULT_FEE_TIERS;
    console.log(
      `[uniswap_v3] Initialized on ${this.chain}: factory=${this.factoryAddress} router=${this.routerAddress} (${this.routerKind}) tiers=${this.feeTiers.join(",")}`,
    );
  }

  static fromConfig(config: EngineConfig, chain: string): UniswapV3Client {
    return new UniswapV3Client(EvmClient.fromConfig(config, chain), {
      deadlineSeconds: config.transactions.deadlineSeconds,
      feeTiers: config.venues.uniswap_v3.feeTiers,
    });
  }

  /** Deployed pools for the pair, one per fee tier that has one. */
  private async findPools(tokenA: TokenInfo, tokenB: TokenInfo): Promise<Array<{ address: Address; fee: number }>> {
    const a = this.evm.toChecksumAddress(tokenA.address);
    const b = this.evm.toChecksumAddress(tokenB.address);
    const pools: Array<{ address: Address; fee: number }> = [];
    for (const fee of this.feeTiers) {
      const address = await this.evm.rpc(`getPool(${tokenA.symbol}, ${tokenB.symbol}, ${fee})`, () =>
        this.evm.publicClient.readContract({
          address: this.factoryAddress,
          abi: V3_FACTORY_ABI,
          functionName: "getPool",
          args: [a, b, fee],
        }),
      );
      if (address.toLowerCase() !== zeroAddress) pools.push({ address, fee });
    }
    return pools;
  }

  /** Picks the pool with the most in-range liquidity across fee tiers, not the first or cheapest. */
  protected async resolveMarket(tokenA: TokenInfo, tokenB: TokenInfo): Promise<V3Pool> {
    const pools = await this.findPools(tokenA, tokenB);
    let best: V3Pool | undefined;
    for (const pool of pools) {
      const liquidity = await this.evm.rpc(`liquidity(${pool.address})`, () =>
        this.evm.publicClient.readContract({ address: pool.address, abi: V3_POOL_ABI, functionName: "liquidity" }),
      );
      if (!best || liquidity > best.liquidity) best = { ...pool, liquidity };
    }
    if (!best) {
      throw new NoMarketError(`No V3 pool found for ${tokenA.symbol}/${tokenB.symbol} on ${this.chain}`);
    }
    console.log(`[uniswap_v3] Selected ${tokenA.symbol}/${tokenB.symbol} pool ${best.address} (fee ${best.fee}, liquidity ${best.liquidity})`);
    return best;
  }

  protected async priceFromMarket(pool: V3Pool, tokenOut: TokenInfo, tokenIn: TokenInfo): Promise<Decimal> {
    const [sqrtPriceX96] = await this.evm.rpc(`slot0(${pool.address})`, () =>
      this.evm.publicClient.readContract({ address: pool.address, abi: V3_POOL_ABI, functionName: "slot0" }),
    );
    return v3PriceFromSqrt(sqrtPriceX96, tokenOut, tokenIn);
  }

  protected checkPriceImpact(pool: V3Pool, rawAmountIn: bigint, slippage: Slippage): void {
    const impactBps = estimatePriceImpactBps(rawAmountIn, pool.liquidity);
    if (impactBps === undefined) {
      console.warn(`[uniswap_v3] Pool ${pool.address} reports zero liquidity; price impact cannot be estimated`);
      return;
    }
    console.log(`[uniswap_v3] Estimated price impact: ${impactBps} bps`);
    // rawAmountIn * 10000 / liquidity > 2/3 * bps, without rounding the estimate
    if (rawAmountIn * 10_000n * 3n > pool.liquidity * BigInt(slippage.bps) * 2n) {
      console.warn(
        `[uniswap_v3] Price impact ${impactBps} bps exceeds two thirds of the ${slippage.toString()} slippage budget; little room for price movement`,
      );
    }
  }

  protected buildSwapStep(pool: V3Pool, params: SwapCallParams): TransactionStep {
    const { baseToken, quoteToken, rawAmountIn, minAmountOut, recipient, deadline } = params;
    const tokenIn = this.evm.toChecksumAddress(quoteToken.address);
    const tokenOut = this.evm.toChecksumAddress(baseToken.address);
    const description = `swap ${quoteToken.symbol} -> ${baseToken.symbol} (fee ${pool.fee})`;

    if (this.routerKind === "SwapRouter") {
      return {
        to: this.routerAddress,
        data: encodeFunctionData({
          abi: SWAP_ROUTER_ABI,
          functionName: "exactInputSingle",
          args: [
            {
              tokenIn,
              tokenOut,
              fee: pool.fee,
              recipient,
              deadline,
              amountIn: rawAmountIn,
              amountOutMinimum: minAmountOut,
              sqrtPriceLimitX96: 0n,
            },
          ],
        }),
        description,
      };
    }

    const call = encodeFunctionData({
      abi: SWAP_ROUTER_02_ABI,
      functionName: "exactInputSingle",
      args: [
        {
          tokenIn,
          tokenOut,
          fee: pool.fee,
          recipient,
          amountIn: rawAmountIn,
          amountOutMinimum: minAmountOut,
          sqrtPriceLimitX96: 0n,
        },
      ],
    });
    return {
      to: this.routerAddress,
      data: encodeFunctionData({ abi: SWAP_ROUTER_02_ABI, functionName: "multicall", args: [deadline, [call]] }),
      description,
    };
  }

  async getMarketsForTokens(tokens: readonly TokenInfo[]): Promise<Array<[TokenInfo, TokenInfo]>> {
    return discoverMarkets(this.venue, tokens, async (tokenA, tokenB) => (await this.findPools(tokenA, tokenB)).length > 0);
  }
}

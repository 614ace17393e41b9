import { encodeFunctionData, zeroAddress, type Address } from "viem";
import { EvmClient, type TransactionStep } from "../chains/evmClient";
import { type Decimal } from "../core/decimal";
import { NoMarketError } from "../core/errors";
import { type TokenInfo } from "../core/token";
import { type EngineConfig } from "../engine/config";
import { discoverMarkets } from "../execution/markets";
import { V2_FACTORY_ABI, V2_PAIR_ABI, V2_ROUTER_ABI } from "./abis";
import { UNISWAP_V2_DEPLOYMENTS, type V2Deployment } from "./deployments";
import { v2MidPrice } from "./math";
import { type SwapCallParams, UniswapClientBase, type UniswapClientOptions } from "./uniswapClientBase";

export interface UniswapV2Options extends UniswapClientOptions {
  deployment?: V2Deployment;
}

export class UniswapV2Client extends UniswapClientBase<Address> {
  readonly venue = "uniswap_v2";
  protected readonly routerAddress: Address;
  private readonly factoryAddress: Address;

  constructor(evm: EvmClient, options: UniswapV2Options = {}) {
    super(evm, options);
    const deployment = options.deployment ?? UNISWAP_V2_DEPLOYMENTS[evm.chain];
    this.routerAddress = deployment.router;
    this.factoryAddress = deployment.factory;
    console.log(`[uniswap_v2] Initialized on ${this.chain}: factory=${this.factoryAddress} router=${this.routerAddress}`);
  }

  static fromConfig(config: EngineConfig, chain: string): UniswapV2Client {
    return new UniswapV2Client(EvmClient.fromConfig(config, chain), {
      deadlineSeconds: config.transactions.deadlineSeconds,
    });
  }

  private async getPair(tokenA: TokenInfo, tokenB: TokenInfo): Promise<Address> {
    const args = [this.evm.toChecksumAddress(tokenA.address), this.evm.toChecksumAddress(tokenB.address)] as const;
    return this.evm.rpc(`getPair(${tokenA.symbol}, ${tokenB.symbol})`, () =>
      this.evm.publicClient.readContract({ address: this.factoryAddress, abi: V2_FACTORY_ABI, functionName: "getPair", args }),
    );
  }

  protected async resolveMarket(tokenA: TokenInfo, tokenB: TokenInfo): Promise<Address> {
    const pair = await this.getPair(tokenA, tokenB);
    if (pair.toLowerCase() === zeroAddress) {
      console.warn(`[uniswap_v2] No V2 pair found for ${tokenA.symbol}/${tokenB.symbol} on ${this.chain}`);
      throw new NoMarketError(`No V2 pair found for ${tokenA.symbol}/${tokenB.symbol} on ${this.chain}`);
    }
    return pair;
  }

  protected async priceFromMarket(pair: Address, tokenOut: TokenInfo, tokenIn: TokenInfo): Promise<Decimal> {
    const [reserve0, reserve1] = await this.evm.rpc(`getReserves(${pair})`, () =>
      this.evm.publicClient.readContract({ address: pair, abi: V2_PAIR_ABI, functionName: "getReserves" }),
    );
    return v2MidPrice(reserve0, reserve1, tokenOut, tokenIn);
  }

  protected buildSwapStep(_pair: Address, params: SwapCallParams): TransactionStep {
    const { baseToken, quoteToken, rawAmountIn, minAmountOut, recipient, deadline } = params;
    const path = [this.evm.toChecksumAddress(quoteToken.address), this.evm.toChecksumAddress(baseToken.address)];
    return {
      to: this.routerAddress,
      data: encodeFunctionData({
        abi: V2_ROUTER_ABI,
        functionName: "swapExactTokensForTokens",
        args: [rawAmountIn, minAmountOut, path, recipient, deadline],
      }),
      description: `swap ${quoteToken.symbol} -> ${baseToken.symbol}`,
    };
  }

  async getMarketsForTokens(tokens: readonly TokenInfo[]): Promise<Array<[TokenInfo, TokenInfo]>> {
    return discoverMarkets(this.venue, tokens, async (tokenA, tokenB) => {
      const pair = await this.getPair(tokenA, tokenB);
      return pair.toLowerCase() !== zeroAddress;
    });
  }
}

import { type EvmClient } from "../chains/evmClient";
import { type PortfolioSwap } from "./portfolio";

export interface AssetTransfer {
  hash: string;
  blockNumber: number;
  tokenAddress: string;
  from: string;
  to: string;
  rawValue: bigint;
}

export interface TransferQuery {
  wallet: string;
  chain: string;
  direction: "incoming" | "outgoing";
  fromBlock?: number;
  toBlock?: number;
}

/** Indexer boundary: returns the ERC-20 transfers touching a wallet. */
export interface TransferSource {
  getTransfers(query: TransferQuery): Promise<AssetTransfer[]>;
}

export class PortfolioEvm {
  constructor(
    readonly wallet: string,
    private readonly evm: EvmClient,
    private readonly source: TransferSource,
  ) {}

  /**
   * Rebuilds swaps from transfers: an incoming and an outgoing transfer that
   * share a transaction hash are one swap. Transfers without a counterpart are
   * plain sends or receipts and are left out.
   */
  async getSwaps(range: { fromBlock?: number; toBlock?: number } = {}): Promise<PortfolioSwap[]> {
    const base = { wallet: this.wallet, chain: this.evm.chain, ...range };
    const [incoming, outgoing] = await Promise.all([
      this.source.getTransfers({ ...base, direction: "incoming" }),
      this.source.getTransfers({ ...base, direction: "outgoing" }),
    ]);

    const outgoingByHash = new Map<string, AssetTransfer>();
    for (const transfer of outgoing) {
      const key = transfer.hash.toLowerCase();
      if (outgoingByHash.has(key)) {
        console.warn(`[portfolioEvm] Multiple outgoing transfers in ${transfer.hash}; keeping the first`);
        continue;
      }
      outgoingByHash.set(key, transfer);
    }

    const swaps: PortfolioSwap[] = [];
    for (const received of incoming) {
      const sent = outgoingByHash.get(received.hash.toLowerCase());
      if (!sent) continue;
      const [soldToken, boughtToken] = await Promise.all([
        this.evm.getTokenInfo(sent.tokenAddress),
        this.evm.getTokenInfo(received.tokenAddress),
      ]);
      swaps.push({
        sold: soldToken.toAmountFromBaseUnits(sent.rawValue),
        bought: boughtToken.toAmountFromBaseUnits(received.rawValue),
        hash: received.hash,
        blockNumber: received.blockNumber,
      });
    }
    return swaps.sort((a, b) => a.blockNumber - b.blockNumber);
  }
}

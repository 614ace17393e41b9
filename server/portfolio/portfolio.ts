import { Dec, type Decimal, ZERO } from "../core/decimal";
import { UnmatchedSaleError } from "../core/errors";
import { type TokenAmount, type TokenInfo } from "../core/token";

/** One executed swap as seen from the wallet: what left it and what arrived. */
export interface PortfolioSwap {
  sold: TokenAmount;
  bought: TokenAmount;
  hash: string;
  blockNumber: number;
}

/** A matched slice of a sale. Prices are in base token per unit of the asset. */
export interface PnlDetail {
  soldAmount: Decimal;
  buyingPrice: Decimal;
  sellingPrice: Decimal;
  pnl: Decimal;
}

export interface OpenLot {
  token: TokenInfo;
  amount: Decimal;
  buyingPrice: Decimal;
}

/** Current prices keyed by `TokenInfo.key`, in base token per unit. */
export type PriceMap = ReadonlyMap<string, Decimal>;

export class PortfolioPnl {
  constructor(
    readonly baseToken: TokenInfo,
    private readonly detailsPerAsset: ReadonlyMap<string, readonly PnlDetail[]>,
    private readonly lotsPerAsset: ReadonlyMap<string, readonly OpenLot[]>,
    /** Base token spent opening lots. */
    readonly totalCost: Decimal,
    /** Base token received closing lots. */
    readonly totalProceeds: Decimal,
  ) {}

  get assets(): string[] {
    return [...new Set([...this.detailsPerAsset.keys(), ...this.lotsPerAsset.keys()])];
  }

  details(asset: TokenInfo): readonly PnlDetail[] {
    return this.detailsPerAsset.get(asset.key) ?? [];
  }

  openLots(asset?: TokenInfo): OpenLot[] {
    if (asset) return [...(this.lotsPerAsset.get(asset.key) ?? [])];
    return [...this.lotsPerAsset.values()].flat();
  }

  realizedPnl(asset?: TokenInfo): Decimal {
    const details = asset ? this.details(asset) : [...this.detailsPerAsset.values()].flat();
    return details.reduce((sum, detail) => sum.add(detail.pnl), ZERO);
  }

  realizedPnlPerAsset(): Map<string, Decimal> {
    const result = new Map<string, Decimal>();
    for (const [key, details] of this.detailsPerAsset) {
      result.set(key, details.reduce((sum, detail) => sum.add(detail.pnl), ZERO));
    }
    return result;
  }

  /** Value of the open lots at `prices`, in base token. */
  openValue(prices: PriceMap): Decimal {
    return this.openLots().reduce((sum, lot) => sum.add(lot.amount.mul(priceOf(prices, lot.token))), ZERO);
  }

  unrealizedPnl(prices: PriceMap): Decimal {
    return this.openLots().reduce(
      (sum, lot) => sum.add(lot.amount.mul(priceOf(prices, lot.token).minus(lot.buyingPrice))),
      ZERO,
    );
  }

  totalPnl(prices: PriceMap): Decimal {
    return this.realizedPnl().add(this.unrealizedPnl(prices));
  }

  /** Shorthand for total realized PnL. */
  pnl(): Decimal {
    return this.realizedPnl();
  }
}

function priceOf(prices: PriceMap, token: TokenInfo): Decimal {
  const price = prices.get(token.key);
  if (!price) throw new RangeError(`No current price for open ${token.symbol} lot`);
  return price;
}

/**
 * First-in-first-out realized PnL valued in `baseToken`. Selling the base
 * token for an asset opens a lot; selling the asset back closes the oldest
 * lots first. Swaps are applied in block order.
 */
export function computePnlFifo(swaps: readonly PortfolioSwap[], baseToken: TokenInfo): PortfolioPnl {
  const ordered = [...swaps].sort((a, b) => a.blockNumber - b.blockNumber);
  const lots = new Map<string, OpenLot[]>();
  const details = new Map<string, PnlDetail[]>();
  let totalCost = ZERO;
  let totalProceeds = ZERO;

  for (const swap of ordered) {
    const soldIsBase = swap.sold.token.equals(baseToken);
    const boughtIsBase = swap.bought.token.equals(baseToken);

    if (soldIsBase === boughtIsBase) {
      console.warn(`[portfolio] Skipping swap ${swap.hash}: ${swap.sold.toString()} -> ${swap.bought.toString()} does not trade against ${baseToken.symbol}`);
      continue;
    }

    if (soldIsBase) {
      const asset = swap.bought.token;
      if (swap.bought.value.isZero()) {
        console.warn(`[portfolio] Skipping swap ${swap.hash}: bought zero ${asset.symbol}`);
        continue;
      }
      const queue = lots.get(asset.key) ?? [];
      queue.push({ token: asset, amount: swap.bought.value, buyingPrice: swap.sold.value.div(swap.bought.value) });
      lots.set(asset.key, queue);
      totalCost = totalCost.add(swap.sold.value);
      continue;
    }

    const asset = swap.sold.token;
    if (swap.sold.value.isZero()) continue;
    const sellingPrice = swap.bought.value.div(swap.sold.value);
    const queue = lots.get(asset.key) ?? [];
    const assetDetails = details.get(asset.key) ?? [];
    let remaining: Decimal = new Dec(swap.sold.value);

    while (remaining.gt(0)) {
      const lot = queue[0];
      if (!lot) {
        throw new UnmatchedSaleError(
          `Swap ${swap.hash} sells ${remaining.toString()} ${asset.symbol} more than the open lots hold`,
        );
      }
      const matched = Dec.min(remaining, lot.amount);
      assetDetails.push({
        soldAmount: matched,
        buyingPrice: lot.buyingPrice,
        sellingPrice,
        pnl: matched.mul(sellingPrice.minus(lot.buyingPrice)),
      });
      totalProceeds = totalProceeds.add(matched.mul(sellingPrice));
      remaining = remaining.minus(matched);
      if (matched.eq(lot.amount)) {
        queue.shift();
      } else {
        queue[0] = { ...lot, amount: lot.amount.minus(matched) };
      }
    }

    lots.set(asset.key, queue);
    details.set(asset.key, assetDetails);
  }

  for (const [key, queue] of lots) {
    if (queue.length === 0) lots.delete(key);
  }
  return new PortfolioPnl(baseToken, details, lots, totalCost, totalProceeds);
}

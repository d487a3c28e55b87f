import type { PriceTable } from '../coincatch/types.js';
import type { MarketSnapshot } from '../wallex/types.js';
import type { ReconciledMarket } from './types.js';

/**
 * Pairs every listed Wallex market with its CoinCatch price. The Wallex listing defines the
 * symbol universe, in listing order; a missing CoinCatch price is kept as `null`.
 */
export function reconcileMarkets(markets: MarketSnapshot, prices: PriceTable): ReconciledMarket[] {
  return Array.from(markets.values(), market => ({
    symbol: market.symbol,
    baseAsset: market.baseAsset,
    referencePrice: prices.get(market.symbol) ?? null,
  }));
}

export function countCommonSymbols(markets: ReconciledMarket[]): number {
  return markets.filter(market => market.referencePrice !== null).length;
}

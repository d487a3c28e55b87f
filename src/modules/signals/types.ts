export type Action = 'BUY' | 'SELL';

export type ComparisonInput = {
  symbol: string;
  baseAsset: string;
  entryPrice: number | null;
  referencePrice: number | null;
};

/**
 * One evaluated symbol. `entryPrice` comes from Wallex, `referencePrice` from CoinCatch;
 * `percentageDiff` is signed, `magnitude` is its absolute value.
 */
export type Comparison = {
  symbol: string;
  baseAsset: string;
  entryPrice: number;
  referencePrice: number;
  percentageDiff: number;
  action: Action;
  magnitude: number;
  signal: boolean;
};

export type Signal = Comparison & { signal: true };

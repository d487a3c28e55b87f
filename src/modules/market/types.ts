export type ReconciledMarket = {
  symbol: string;
  baseAsset: string;
  referencePrice: number | null;
};

export type WallexMarket = {
  symbol: string;
  baseAsset: string;
  quoteAsset: string;
};

export type MarketSnapshot = Map<string, WallexMarket>;

export type WallexTrade = {
  price: string | number;
};

export type PriceTable = Map<string, number>;

export type CoinCatchTicker = {
  symbol?: string;
  close?: string | number | null;
};

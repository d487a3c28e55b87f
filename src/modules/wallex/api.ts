import { z } from 'zod';
import { API_KEY_PLACEHOLDER, type WallexConfig } from '../../config/config.js';
import { getJson } from '../http/request.js';
import type { SourceContext } from '../http/types.js';
import { parsePositivePrice } from '../utils/parsing.js';
import type { MarketSnapshot, WallexTrade } from './types.js';

const MarketsResponseSchema = z.object({
  result: z
    .object({
      symbols: z.record(z.unknown()).default({}),
    })
    .default({}),
});

const MarketSchema = z.object({
  baseAsset: z.string(),
  quoteAsset: z.string(),
});

const TradesResponseSchema = z.object({
  result: z
    .object({
      latestTrades: z.array(z.unknown()).default([]),
    })
    .default({}),
});

const TradeSchema = z.object({
  price: z.union([z.string(), z.number()]),
});

export function hasUsableApiKey(config: WallexConfig): boolean {
  const apiKey = config.api_key.trim();
  return apiKey !== '' && apiKey !== API_KEY_PLACEHOLDER;
}

export function filterMarkets(symbols: Record<string, unknown>, pivotCurrency: string): MarketSnapshot {
  const markets: MarketSnapshot = new Map();

  for (const [symbol, details] of Object.entries(symbols)) {
    const parsed = MarketSchema.safeParse(details);
    if (!parsed.success || parsed.data.quoteAsset !== pivotCurrency) continue;

    markets.set(symbol, { symbol, ...parsed.data });
  }

  return markets;
}

export async function fetchMarkets(
  config: WallexConfig,
  { logger, timeoutMs }: SourceContext,
): Promise<MarketSnapshot> {
  try {
    const body = await getJson(config.base_url, config.markets_endpoint, { timeoutMs });
    const { result } = MarketsResponseSchema.parse(body);
    return filterMarkets(result.symbols, config.pivot_currency);
  } catch (error) {
    logger.error({ err: error }, 'Error fetching Wallex markets');
    return new Map();
  }
}

/**
 * Price of the most recent Wallex trade for `symbol`, or `null` when it is unavailable.
 * No request is made without a usable API key.
 */
export async function fetchLastTradePrice(
  config: WallexConfig,
  symbol: string,
  { logger, timeoutMs }: SourceContext,
): Promise<number | null> {
  if (!hasUsableApiKey(config)) {
    return null;
  }

  try {
    const body = await getJson(config.base_url, config.trades_endpoint, {
      params: { symbol },
      headers: { 'x-api-key': config.api_key },
      timeoutMs,
    });
    const [newest] = TradesResponseSchema.parse(body).result.latestTrades;
    if (newest === undefined) {
      return null;
    }
    const trade: WallexTrade = TradeSchema.parse(newest);
    return parsePositivePrice(trade.price);
  } catch (error) {
    logger.warn({ err: error, symbol }, `Could not fetch Wallex last trade for ${symbol}`);
    return null;
  }
}

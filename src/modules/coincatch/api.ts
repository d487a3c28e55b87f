import { z } from 'zod';
import type { CoinCatchConfig } from '../../config/config.js';
import { getJson } from '../http/request.js';
import type { SourceContext } from '../http/types.js';
import { normalizeSymbol, parsePositivePrice } from '../utils/parsing.js';
import type { CoinCatchTicker, PriceTable } from './types.js';

const TickersResponseSchema = z.object({
  data: z.array(z.unknown()).default([]),
});

const TickerSchema = z.object({
  symbol: z.string().optional(),
  close: z.union([z.string(), z.number()]).nullish(),
});

export function parseTickers(entries: unknown[]): PriceTable {
  const prices: PriceTable = new Map();

  for (const entry of entries) {
    const parsed = TickerSchema.safeParse(entry);
    if (!parsed.success) continue;

    const ticker: CoinCatchTicker = parsed.data;
    const symbol = normalizeSymbol(ticker.symbol ?? '');
    const price = parsePositivePrice(ticker.close);
    if (!symbol || price === null) continue;

    prices.set(symbol, price);
  }

  return prices;
}

export async function fetchBulkPrices(
  config: CoinCatchConfig,
  { logger, timeoutMs }: SourceContext,
): Promise<PriceTable> {
  try {
    const body = await getJson(config.base_url, config.tickers_endpoint, { timeoutMs });
    const { data } = TickersResponseSchema.parse(body);
    const prices = parseTickers(data);

    logger.info({ received: data.length, usable: prices.size }, `Fetched ${prices.size} tickers from CoinCatch`);
    return prices;
  } catch (error) {
    logger.error({ err: error }, 'Error fetching CoinCatch prices');
    return new Map();
  }
}

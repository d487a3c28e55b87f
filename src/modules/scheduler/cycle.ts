import type { AppConfig } from '../../config/config.js';
import { fetchBulkPrices } from '../coincatch/api.js';
import type { SourceContext } from '../http/types.js';
import { countCommonSymbols, reconcileMarkets } from '../market/service.js';
import type { ReconciledMarket } from '../market/types.js';
import { buildSignalMessage } from '../notifications/formatting.js';
import { formatComparisonReport } from '../signals/formatting.js';
import { evaluateComparison, isSignal } from '../signals/service.js';
import { fetchLastTradePrice, fetchMarkets, hasUsableApiKey } from '../wallex/api.js';
import type { CycleDeps, CycleResult, PriceSources } from './types.js';

export function createPriceSources(config: AppConfig, context: SourceContext): PriceSources {
  const { wallex, coincatch } = config.price_sources;
  return {
    fetchBulkPrices: () => fetchBulkPrices(coincatch, context),
    fetchMarkets: () => fetchMarkets(wallex, context),
    fetchLastTradePrice: symbol => fetchLastTradePrice(wallex, symbol, context),
  };
}

type SymbolOutcome = 'skipped' | 'compared' | 'signal';

type PricedMarket = ReconciledMarket & { referencePrice: number };

async function checkSymbol(market: PricedMarket, deps: CycleDeps): Promise<SymbolOutcome> {
  const { config, logger, notifier, sources, echo = console.log, now = () => new Date() } = deps;
  const { wallex } = config.price_sources;
  const { settings } = config;

  const entryPrice = await sources.fetchLastTradePrice(market.symbol);
  const comparison = evaluateComparison({ ...market, entryPrice }, settings.price_difference_threshold);

  if (!comparison) {
    logger.debug(
      { symbol: market.symbol, entryPrice, referencePrice: market.referencePrice },
      'No usable Wallex price; skipping symbol',
    );
    return 'skipped';
  }

  echo(formatComparisonReport(comparison));

  if (!isSignal(comparison)) {
    return 'compared';
  }

  logger.info(
    { symbol: comparison.symbol, action: comparison.action, percentageDiff: comparison.percentageDiff },
    'Signal found',
  );
  const message = buildSignalMessage(comparison, {
    pivotCurrency: wallex.pivot_currency,
    tradeLinkBase: wallex.trade_link_base,
    timeZone: settings.timezone,
    now: now(),
  });
  try {
    await notifier.send(message);
  } catch (error) {
    logger.error({ err: error, symbol: comparison.symbol }, `Error sending alert for ${comparison.symbol}`);
  }
  return 'signal';
}

/**
 * One pass over every Wallex market priced by both exchanges. Symbols are checked one at a
 * time with `settings.symbol_delay_ms` after each Wallex request to stay under its rate limit.
 * Markets CoinCatch does not price are skipped without a Wallex request.
 */
export async function runCycle(deps: CycleDeps): Promise<CycleResult> {
  const { config, logger, sources, sleep, signal } = deps;
  const result: CycleResult = { status: 'completed', checked: 0, compared: 0, signals: 0 };

  logger.info('Starting new analysis cycle');

  const prices = await sources.fetchBulkPrices();
  const markets = await sources.fetchMarkets();

  if (prices.size === 0 || markets.size === 0) {
    logger.warn({ prices: prices.size, markets: markets.size }, 'Could not fetch necessary data. Skipping cycle.');
    return { ...result, status: 'skipped-no-data' };
  }

  if (!hasUsableApiKey(config.price_sources.wallex)) {
    logger.error('Wallex API key is missing in config. Cannot fetch Wallex prices.');
    return { ...result, status: 'skipped-no-credential' };
  }

  const universe = reconcileMarkets(markets, prices);
  logger.info(
    { markets: universe.length, common: countCommonSymbols(universe) },
    `Comparing ${universe.length} Wallex markets with CoinCatch prices`,
  );

  for (const market of universe) {
    signal?.throwIfAborted();

    const { referencePrice } = market;
    if (referencePrice === null) {
      logger.debug({ symbol: market.symbol }, 'No CoinCatch price; skipping symbol');
      continue;
    }
    result.checked++;

    try {
      const outcome = await checkSymbol({ ...market, referencePrice }, deps);
      if (outcome !== 'skipped') result.compared++;
      if (outcome === 'signal') result.signals++;
    } catch (error) {
      logger.error({ err: error, symbol: market.symbol }, `Unexpected error while checking ${market.symbol}`);
    }

    await sleep(config.settings.symbol_delay_ms, signal);
  }

  return result;
}

import type { AppConfig } from '../../config/config.js';
import type { Logger } from '../../config/logger.js';
import type { PriceTable } from '../coincatch/types.js';
import type { Notifier } from '../notifications/types.js';
import type { MarketSnapshot } from '../wallex/types.js';

export type PriceSources = {
  fetchBulkPrices: () => Promise<PriceTable>;
  fetchMarkets: () => Promise<MarketSnapshot>;
  fetchLastTradePrice: (symbol: string) => Promise<number | null>;
};

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export type CycleDeps = {
  config: AppConfig;
  logger: Logger;
  notifier: Notifier;
  sources: PriceSources;
  sleep: Sleep;
  echo?: (text: string) => void;
  now?: () => Date;
  signal?: AbortSignal;
};

export type CycleStatus = 'skipped-no-data' | 'skipped-no-credential' | 'completed';

export type CycleResult = {
  status: CycleStatus;
  checked: number;
  compared: number;
  signals: number;
};

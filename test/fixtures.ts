import { vi } from 'vitest';
import { type AppConfig, parseConfig } from '../src/config/config.js';
import { createLogger } from '../src/config/logger.js';

export const WALLEX_BASE = 'https://wallex.test';
export const COINCATCH_BASE = 'https://coincatch.test';

type ConfigOverrides = {
  apiKey?: string;
  threshold?: number;
};

export function makeConfig({ apiKey = 'test-key', threshold = 1.5 }: ConfigOverrides = {}): AppConfig {
  return parseConfig(
    {
      price_sources: {
        wallex: {
          base_url: WALLEX_BASE,
          markets_endpoint: '/v1/markets',
          trades_endpoint: '/v1/trades',
          api_key: apiKey,
        },
        coincatch: {
          base_url: COINCATCH_BASE,
          tickers_endpoint: '/api/spot/v1/market/tickers',
        },
      },
      settings: {
        price_difference_threshold: threshold,
        check_interval_seconds: 60,
      },
      telegram: {
        bot_token: 'test-token',
        group_chat_id: -100123,
        message_thread_id: 7,
      },
    },
    'test-config.json',
  );
}

export function makeLogger() {
  return createLogger('silent');
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

export function stubFetch(handler: (url: string, init?: RequestInit) => Response | Promise<Response>) {
  const fetchMock = vi.fn(async (input: string | URL | Request, init?: RequestInit) => handler(String(input), init));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

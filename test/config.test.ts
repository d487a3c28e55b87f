import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, expect, it } from 'vitest';
import { ConfigError, loadConfig, resolveConfigPath } from '../src/config/config.js';

const validConfig = {
  price_sources: {
    wallex: {
      base_url: 'https://wallex.test',
      markets_endpoint: '/v1/markets',
      trades_endpoint: '/v1/trades',
      api_key: 'test-key',
    },
    coincatch: {
      base_url: 'https://coincatch.test',
      tickers_endpoint: '/api/spot/v1/market/tickers',
    },
  },
  settings: {
    price_difference_threshold: 1.5,
    check_interval_seconds: 30,
  },
  telegram: {
    bot_token: 'test-token',
    group_chat_id: -100123,
  },
};

function writeConfig(content: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'price-gap-watch-'));
  const path = join(dir, 'config.json');
  writeFileSync(path, content);
  return path;
}

describe('loadConfig', () => {
  it('applies defaults for optional settings', () => {
    const config = loadConfig(writeConfig(JSON.stringify(validConfig)));

    expect(config.price_sources.wallex.pivot_currency).toBe('USDT');
    expect(config.price_sources.wallex.trade_link_base).toBe('https://wallex.ir/app/trade/');
    expect(config.settings).toEqual({
      price_difference_threshold: 1.5,
      check_interval_seconds: 30,
      symbol_delay_ms: 500,
      request_timeout_seconds: 10,
      timezone: 'Asia/Tehran',
    });
    expect(config.telegram.message_thread_id).toBeUndefined();
    expect(config.log_level).toBe('info');
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('fails on a missing file', () => {
    const path = join(tmpdir(), 'price-gap-watch-does-not-exist.json');
    expect(() => loadConfig(path)).toThrow(ConfigError);
  });

  it('fails on malformed JSON', () => {
    expect(() => loadConfig(writeConfig('{ "settings": '))).toThrow(/is not valid JSON/);
  });

  it('names the offending field', () => {
    const broken = { ...validConfig, settings: { price_difference_threshold: 1.5, check_interval_seconds: 0 } };
    const path = writeConfig(JSON.stringify(broken));

    expect(() => loadConfig(path)).toThrow(`Invalid config ${path}: settings.check_interval_seconds:`);
  });

  it('rejects a negative threshold', () => {
    const broken = { ...validConfig, settings: { price_difference_threshold: -1, check_interval_seconds: 30 } };

    expect(() => loadConfig(writeConfig(JSON.stringify(broken)))).toThrow(/settings\.price_difference_threshold/);
  });
});

describe('resolveConfigPath', () => {
  it('prefers CONFIG_PATH over the default', () => {
    expect(resolveConfigPath({ CONFIG_PATH: '/etc/gap/config.json' })).toBe('/etc/gap/config.json');
    expect(resolveConfigPath({})).toBe('config.json');
  });
});

import { readFileSync } from 'node:fs';
import { z } from 'zod';

export const API_KEY_PLACEHOLDER = 'YOUR_API_KEY_HERE';

const WallexSchema = z.object({
  base_url: z.string().url(),
  markets_endpoint: z.string(),
  trades_endpoint: z.string(),
  api_key: z.string().default(''),
  pivot_currency: z.string().min(1).default('USDT'),
  trade_link_base: z.string().url().default('https://wallex.ir/app/trade/'),
});

const CoinCatchSchema = z.object({
  base_url: z.string().url(),
  tickers_endpoint: z.string(),
});

const ConfigSchema = z.object({
  price_sources: z.object({
    wallex: WallexSchema,
    coincatch: CoinCatchSchema,
  }),
  settings: z.object({
    price_difference_threshold: z.number().nonnegative(),
    check_interval_seconds: z.number().int().positive(),
    symbol_delay_ms: z.number().int().nonnegative().default(500),
    request_timeout_seconds: z.number().positive().default(10),
    timezone: z.string().min(1).default('Asia/Tehran'),
  }),
  telegram: z.object({
    bot_token: z.string().default(''),
    group_chat_id: z.union([z.number().int(), z.string().min(1)]),
    message_thread_id: z.number().int().nullish(),
  }),
  log_level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
});

export type AppConfig = z.infer<typeof ConfigSchema>;
export type WallexConfig = AppConfig['price_sources']['wallex'];
export type CoinCatchConfig = AppConfig['price_sources']['coincatch'];
export type TelegramConfig = AppConfig['telegram'];

export class ConfigError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function resolveConfigPath(env: NodeJS.ProcessEnv = process.env): string {
  return env.CONFIG_PATH || 'config.json';
}

export function parseConfig(raw: unknown, configPath: string): AppConfig {
  const result = ConfigSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const field = issue.path.join('.') || '<root>';
    throw new ConfigError(`Invalid config ${configPath}: ${field}: ${issue.message}`, configPath);
  }
  return Object.freeze(result.data);
}

export function loadConfig(configPath: string): AppConfig {
  let text: string;
  try {
    text = readFileSync(configPath, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${configPath} could not be read: ${reason}`, configPath);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`Config file ${configPath} is not valid JSON: ${reason}`, configPath);
  }

  return parseConfig(raw, configPath);
}

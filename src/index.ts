import { createNotifier } from './config/bot.js';
import { type AppConfig, ConfigError, loadConfig, resolveConfigPath } from './config/config.js';
import { createLogger } from './config/logger.js';
import { createPriceSources } from './modules/scheduler/cycle.js';
import { sleep, startScheduler } from './modules/scheduler/service.js';

async function main() {
  const bootLogger = createLogger();

  let config: AppConfig;
  try {
    config = loadConfig(resolveConfigPath());
  } catch (error) {
    if (error instanceof ConfigError) {
      bootLogger.fatal({ path: error.path }, error.message);
      process.exit(1);
    }
    throw error;
  }

  const logger = createLogger(config.log_level);
  const controller = new AbortController();
  const shutdown = (reason: string) => {
    logger.info({ reason }, 'Shutting down');
    controller.abort();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  const sources = createPriceSources(config, {
    logger,
    timeoutMs: config.settings.request_timeout_seconds * 1000,
  });

  await startScheduler({
    config,
    logger,
    notifier: createNotifier(config.telegram, logger),
    sources,
    sleep,
    signal: controller.signal,
  });
}

main().catch(error => {
  console.error('Fatal:', error);
  process.exit(1);
});

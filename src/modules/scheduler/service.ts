import { setTimeout as delay } from 'node:timers/promises';
import { runCycle } from './cycle.js';
import type { CycleDeps, Sleep } from './types.js';

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};

/**
 * Runs analysis cycles until `signal` aborts, sleeping `settings.check_interval_seconds`
 * between them. A failed cycle is logged and the next one starts on schedule.
 */
export async function startScheduler(deps: CycleDeps): Promise<void> {
  const { config, logger, signal } = deps;
  const waitSeconds = config.settings.check_interval_seconds;

  while (!signal?.aborted) {
    try {
      await runCycle(deps);
    } catch (error) {
      if (signal?.aborted) break;
      logger.error({ err: error }, 'Analysis cycle failed');
    }

    if (signal?.aborted) break;
    logger.info(`Cycle complete. Waiting for ${waitSeconds} seconds.`);

    try {
      await deps.sleep(waitSeconds * 1000, signal);
    } catch (error) {
      if (signal?.aborted) break;
      throw error;
    }
  }

  logger.info('Scheduler stopped');
}

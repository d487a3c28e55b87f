import { Bot } from 'grammy';
import { createDisabledNotifier, createTelegramNotifier } from '../modules/notifications/service.js';
import type { Notifier } from '../modules/notifications/types.js';
import type { TelegramConfig } from './config.js';
import type { Logger } from './logger.js';

export function createNotifier(config: TelegramConfig, logger: Logger): Notifier {
  if (!config.bot_token) {
    logger.warn('telegram.bot_token is empty; signals will only be printed');
    return createDisabledNotifier(logger);
  }

  // Send-only: the bot never polls for updates.
  const bot = new Bot(config.bot_token);

  return createTelegramNotifier(
    bot.api,
    { chatId: config.group_chat_id, threadId: config.message_thread_id },
    logger,
  );
}

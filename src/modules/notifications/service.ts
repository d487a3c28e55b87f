import type { Api } from 'grammy';
import type { Logger } from '../../config/logger.js';
import type { NotificationTarget, Notifier } from './types.js';

export type MessageApi = Pick<Api, 'sendMessage'>;

export function createTelegramNotifier(api: MessageApi, target: NotificationTarget, logger: Logger): Notifier {
  return {
    send: async text => {
      try {
        await api.sendMessage(target.chatId, text, {
          parse_mode: 'MarkdownV2',
          message_thread_id: target.threadId ?? undefined,
          link_preview_options: { is_disabled: true },
        });
      } catch (error) {
        logger.error({ err: error, chatId: target.chatId }, 'Error sending Telegram message');
      }
    },
  };
}

export function createDisabledNotifier(logger: Logger): Notifier {
  return {
    send: async () => {
      logger.debug('Telegram bot token is not set; alert not sent');
    },
  };
}

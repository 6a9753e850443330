import { describeError } from "./errors.js";
import type { TelegramApi } from "./telegram.js";
import type { Logger } from "./types.js";

export interface Notifier {
  send(message: string): Promise<boolean>;
}

/** Sends to the one configured chat. Failures are logged, never retried. */
export function createNotifier(api: TelegramApi | null, chatId: string | undefined, logger: Logger = console): Notifier {
  return {
    async send(message) {
      if (!api || !chatId) {
        logger.error("Telegram notification skipped: TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID is not configured");
        return false;
      }
      try {
        await api.sendMessage(chatId, message);
        logger.info("Telegram notification sent.");
        return true;
      } catch (error) {
        logger.error(`Failed to send Telegram message: ${describeError(error)}`);
        return false;
      }
    },
  };
}

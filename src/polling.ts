import type { BotDeps, Conversation } from "./bot.js";
import { handleMessage } from "./bot.js";
import { describeError } from "./errors.js";
import type { TelegramApi, TelegramUpdate } from "./telegram.js";

const POLL_SECONDS = 30;
const RETRY_DELAY_MS = 5_000;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function conversationFor(api: TelegramApi, chatId: number): Conversation {
  return {
    async reply(text) {
      const sent = await api.sendMessage(chatId, text);
      return {
        edit: (next) => api.editMessageText(chatId, sent.message_id, next),
      };
    },
  };
}

export interface PollingOptions {
  signal?: AbortSignal;
  pollSeconds?: number;
  retryDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Long-polls the Bot API and handles one message at a time, in order.
 * Returns once the signal is aborted, after confirming the last handled
 * offset so Telegram does not deliver that batch again.
 */
export async function runPolling(api: TelegramApi, deps: BotDeps, options: PollingOptions = {}): Promise<void> {
  const logger = deps.logger ?? console;
  const wait = options.sleep ?? sleep;
  let offset: number | undefined;

  while (!options.signal?.aborted) {
    let updates: TelegramUpdate[];
    try {
      updates = await api.getUpdates(offset, options.pollSeconds ?? POLL_SECONDS, options.signal);
    } catch (error) {
      if (options.signal?.aborted) break;
      logger.error(`Polling failed: ${describeError(error)}`);
      await wait(options.retryDelayMs ?? RETRY_DELAY_MS);
      continue;
    }

    for (const update of updates) {
      offset = update.update_id + 1;
      const text = update.message?.text;
      if (!update.message || !text) continue;
      await handleMessage(text, conversationFor(api, update.message.chat.id), deps);
    }
  }

  if (offset === undefined) return;
  try {
    await api.getUpdates(offset, 0);
  } catch (error) {
    logger.warn(`Could not confirm handled updates: ${describeError(error)}`);
  }
}

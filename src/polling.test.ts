import test from "node:test";
import assert from "node:assert/strict";
import { HELP_TEXT } from "./bot.js";
import { runPolling } from "./polling.js";
import type { TelegramApi, TelegramMessage, TelegramUpdate } from "./telegram.js";

const logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

class FakeTelegram implements TelegramApi {
  offsets: (number | undefined)[] = [];
  pollSeconds: number[] = [];
  sent: { chatId: number | string; text: string }[] = [];
  edits: { messageId: number; text: string }[] = [];

  constructor(private batches: (TelegramUpdate[] | Error)[], private controller: AbortController) {}

  async getUpdates(offset: number | undefined, pollSeconds: number): Promise<TelegramUpdate[]> {
    this.offsets.push(offset);
    this.pollSeconds.push(pollSeconds);
    const next = this.batches.shift();
    if (next === undefined) {
      this.controller.abort();
      return [];
    }
    if (next instanceof Error) throw next;
    return next;
  }

  async sendMessage(chatId: number | string, text: string): Promise<TelegramMessage> {
    this.sent.push({ chatId, text });
    return { message_id: this.sent.length, chat: { id: Number(chatId) } };
  }

  async editMessageText(_chatId: number | string, messageId: number, text: string): Promise<void> {
    this.edits.push({ messageId, text });
  }
}

const catalog = {
  searchByTitle: async () => [],
  checkAvailability: async () => null,
};

const watchlist = {
  listAll: async () => [],
  append: async () => false,
  deleteByTitle: async () => false,
};

test("runPolling handles messages in order and advances the offset", async () => {
  const controller = new AbortController();
  const telegram = new FakeTelegram(
    [
      [
        { update_id: 5, message: { message_id: 1, chat: { id: 42 }, text: "/h" } },
        { update_id: 6 },
        { update_id: 7, message: { message_id: 2, chat: { id: 42 }, text: "nothing here" } },
      ],
      new Error("network down"),
    ],
    controller
  );
  const delays: number[] = [];

  await runPolling(
    telegram,
    { catalog, watchlist, logger },
    { signal: controller.signal, retryDelayMs: 1234, sleep: async (ms) => void delays.push(ms) }
  );

  assert.deepEqual(telegram.offsets, [undefined, 8, 8, 8]);
  assert.deepEqual(delays, [1234]);
  assert.deepEqual(telegram.sent, [
    { chatId: 42, text: HELP_TEXT },
    { chatId: 42, text: "🔍 Searching for 'nothing here'..." },
  ]);
  assert.deepEqual(telegram.edits, [{ messageId: 2, text: "❌ No results for 'nothing here'." }]);
});

test("runPolling confirms the last handled update when stopped", async () => {
  const controller = new AbortController();
  const telegram = new FakeTelegram(
    [[{ update_id: 10, message: { message_id: 1, chat: { id: 42 }, text: "/a Book A" } }]],
    controller
  );
  const appended: string[] = [];

  await runPolling(
    telegram,
    {
      catalog,
      watchlist: {
        ...watchlist,
        append: async (entry) => {
          appended.push(entry.title);
          controller.abort();
          return true;
        },
      },
      logger,
    },
    { signal: controller.signal, pollSeconds: 30 }
  );

  assert.deepEqual(appended, ["Book A"]);
  assert.deepEqual(telegram.offsets, [undefined, 11]);
  assert.deepEqual(telegram.pollSeconds, [30, 0]);
});

test("runPolling sends no confirmation when nothing was handled", async () => {
  const controller = new AbortController();
  const telegram = new FakeTelegram([], controller);

  await runPolling(telegram, { catalog, watchlist, logger }, { signal: controller.signal });

  assert.deepEqual(telegram.offsets, [undefined]);
});

import { z } from "zod";

const API_BASE = "https://api.telegram.org";

// Bot API rejects longer texts
export const MAX_MESSAGE_LENGTH = 4096;

const MessageSchema = z.object({
  message_id: z.number(),
  chat: z.object({ id: z.number() }),
  text: z.string().optional(),
});

const UpdateSchema = z.object({
  update_id: z.number(),
  message: MessageSchema.optional(),
});

const EnvelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
});

export type TelegramMessage = z.infer<typeof MessageSchema>;
export type TelegramUpdate = z.infer<typeof UpdateSchema>;

export interface TelegramApi {
  getUpdates(offset: number | undefined, pollSeconds: number, signal?: AbortSignal): Promise<TelegramUpdate[]>;
  sendMessage(chatId: number | string, text: string): Promise<TelegramMessage>;
  editMessageText(chatId: number | string, messageId: number, text: string): Promise<void>;
}

export function clampText(text: string): string {
  if (text.length <= MAX_MESSAGE_LENGTH) return text;
  let end = MAX_MESSAGE_LENGTH - 1;
  // Never split a surrogate pair
  const last = text.charCodeAt(end - 1);
  if (last >= 0xd800 && last <= 0xdbff) end -= 1;
  return `${text.slice(0, end)}…`;
}

export function createTelegramApi(
  token: string,
  options: { timeoutMs?: number; fetch?: typeof fetch; baseUrl?: string } = {}
): TelegramApi {
  const timeoutMs = options.timeoutMs ?? 10_000;
  const fetchImpl = options.fetch ?? fetch;
  const baseUrl = options.baseUrl ?? API_BASE;

  async function call<T>(
    method: string,
    payload: Record<string, unknown>,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    signal: AbortSignal
  ): Promise<T> {
    const response = await fetchImpl(`${baseUrl}/bot${token}/${method}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
      signal,
    });
    const envelope = EnvelopeSchema.safeParse(await response.json());
    if (!envelope.success) {
      throw new Error(`Telegram ${method} returned HTTP ${response.status} with an unexpected body`);
    }
    if (!envelope.data.ok) {
      throw new Error(`Telegram ${method} failed: ${envelope.data.description ?? `HTTP ${response.status}`}`);
    }
    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new Error(`Telegram ${method} returned an unexpected result`);
    }
    return result.data;
  }

  return {
    getUpdates(offset, pollSeconds, signal) {
      // Long polling holds the request open for pollSeconds
      const timeout = AbortSignal.timeout(pollSeconds * 1000 + timeoutMs);
      return call(
        "getUpdates",
        { offset, timeout: pollSeconds, allowed_updates: ["message"] },
        z.array(UpdateSchema),
        signal ? AbortSignal.any([signal, timeout]) : timeout
      );
    },

    sendMessage(chatId, text) {
      return call(
        "sendMessage",
        { chat_id: chatId, text: clampText(text) },
        MessageSchema,
        AbortSignal.timeout(timeoutMs)
      );
    },

    async editMessageText(chatId, messageId, text) {
      await call(
        "editMessageText",
        { chat_id: chatId, message_id: messageId, text: clampText(text) },
        z.unknown(),
        AbortSignal.timeout(timeoutMs)
      );
    },
  };
}

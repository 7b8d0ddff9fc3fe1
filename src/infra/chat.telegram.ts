/**
 * Telegram Bot API driver for ChatPort.
 *
 * - POST {base}/bot{token}/{method} with a JSON body.
 * - The API answers { ok, result } or { ok: false, error_code, description }.
 * - 403 and "chat not found" mean the subject is unreachable (`blocked`);
 *   429 and 5xx are transient; other refusals are `rejected`.
 * - The token is part of the URL, so URLs are never logged.
 */

import { z } from "zod";
import type { ChatButton, ChatMessage, ChatPort } from "../ports/ChatPort";
import { Result, fail, ok } from "../types/result";
import { requestJson, statusKind, truncate } from "./http";

export interface TelegramOptions {
  botToken: string;
  apiBaseUrl: string;
  timeoutMs: number;
}

const ApiReply = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  error_code: z.number().optional(),
  description: z.string().optional()
});

const SentResult = z.object({ message_id: z.number() }).passthrough();

const UNREACHABLE = /forbidden|chat not found|user is deactivated|bot was blocked/i;

export function createTelegramChat(opts: TelegramOptions): ChatPort {
  const base = opts.apiBaseUrl.replace(/\/+$/, "");

  async function call(method: string, payload: Record<string, unknown>): Promise<Result<unknown>> {
    const res = await requestJson({
      url: `${base}/bot${opts.botToken}/${method}`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify(payload),
      timeoutMs: opts.timeoutMs
    });
    if (!res.ok) return res;
    const parsed = ApiReply.safeParse(res.value.body);
    const description = parsed.success ? parsed.data.description ?? "" : truncate(res.value.text, 200);
    if (res.value.status >= 200 && res.value.status < 300 && parsed.success && parsed.data.ok) {
      return ok(parsed.data.result);
    }
    const status = parsed.success ? parsed.data.error_code ?? res.value.status : res.value.status;
    if (status === 403 || UNREACHABLE.test(description)) {
      return fail("blocked", description || "forbidden", status);
    }
    return fail(statusKind(status), description || `HTTP ${status}`, status);
  }

  return {
    async sendMessage(chatId, message) {
      const res = await call("sendMessage", toPayload(chatId, message));
      if (!res.ok) return res;
      const sent = SentResult.safeParse(res.value);
      return ok(sent.success ? { messageId: sent.data.message_id } : {});
    },

    async answerCallback(callbackId) {
      const res = await call("answerCallbackQuery", { callback_query_id: callbackId });
      return res.ok ? ok(undefined) : res;
    },

    async setWebhook(url, secret, dropPendingUpdates) {
      const res = await call("setWebhook", {
        url,
        ...(secret ? { secret_token: secret } : {}),
        drop_pending_updates: dropPendingUpdates,
        allowed_updates: ["message", "callback_query"]
      });
      return res.ok ? ok(undefined) : res;
    }
  };
}

function toPayload(chatId: string, message: ChatMessage): Record<string, unknown> {
  return {
    chat_id: chatId,
    text: message.text,
    disable_web_page_preview: true,
    ...(message.html ? { parse_mode: "HTML" } : {}),
    ...(message.buttons && message.buttons.length > 0
      ? { reply_markup: { inline_keyboard: message.buttons.map((row) => row.map(toButton)) } }
      : {})
  };
}

function toButton(b: ChatButton): Record<string, string> {
  return "url" in b ? { text: b.text, url: b.url } : { text: b.text, callback_data: b.callbackData };
}

/**
 * ChatPort
 *
 * Purpose
 * - Single boundary for messages sent to subjects over the chat platform.
 * - Handlers, the follow-up action and the delivery service call this port;
 *   the platform protocol lives in infra/chat.telegram.ts.
 *
 * Design
 * - Every call returns a Result. A `blocked` error means the subject can no
 *   longer be reached (bot blocked, chat deleted) and callers mark it so.
 * - Delivery is at-least-once. Idempotency belongs to the callers
 *   (delivery record, follow-up counter).
 *
 * Drivers
 * - "noop" (default): logs and records the message in memory.
 * - "telegram": Bot API over HTTPS.
 */

import type { AppConfig } from "../config";
import { createTelegramChat } from "../infra/chat.telegram";
import { createLogger } from "../infra/logger";
import { Result, ok } from "../types/result";

export type ChatButton = { text: string; url: string } | { text: string; callbackData: string };

export interface ChatMessage {
  text: string;
  /** Inline keyboard rows. */
  buttons?: ChatButton[][];
  html?: boolean;
}

export interface SentMessage {
  messageId?: number;
}

export interface ChatPort {
  sendMessage(chatId: string, message: ChatMessage): Promise<Result<SentMessage>>;
  /** Stop the client-side spinner of a button press. */
  answerCallback(callbackId: string): Promise<Result<void>>;
  /** Register the ingress URL with the platform. */
  setWebhook(url: string, secret: string, dropPendingUpdates: boolean): Promise<Result<void>>;
}

export function getChatPort(config: AppConfig): ChatPort {
  if (config.chat.driver === "telegram") {
    return createTelegramChat({
      botToken: config.chat.botToken,
      apiBaseUrl: config.chat.apiBaseUrl,
      timeoutMs: config.outboundTimeoutMs
    });
  }
  return createNoopChat();
}

/* -----------------------------------------------------------
 * Noop driver (development/test)
 * --------------------------------------------------------- */

const log = createLogger("chat.noop");

export function createNoopChat(): ChatPort & { sent: Array<{ chatId: string; message: ChatMessage }> } {
  const sent: Array<{ chatId: string; message: ChatMessage }> = [];
  return {
    sent,
    async sendMessage(chatId, message) {
      sent.push({ chatId, message });
      log.info("sendMessage(noop)", { chatId, chars: message.text.length });
      return ok({});
    },
    async answerCallback() {
      return ok(undefined);
    },
    async setWebhook(url) {
      log.info("setWebhook(noop)", { url });
      return ok(undefined);
    }
  };
}

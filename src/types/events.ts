/**
 * Inbound chat events.
 *
 * Raw platform updates (Telegram Bot API `Update` objects) are parsed once,
 * at the start of a dispatch task, into a tagged union. Handlers only ever
 * see ChatEvent; anything the service does not act on becomes `unsupported`.
 *
 * Callback data
 *   buy:{planId}      buy at list price
 *   buy:{planId}:d    buy at the follow-up discount
 *   pay:verify        "I have paid"
 */

import { z } from "zod";

const Chat = z.object({ id: z.union([z.number(), z.string()]) });
const User = z.object({ id: z.union([z.number(), z.string()]) });

export const UpdateSchema = z.object({
  update_id: z.number().optional(),
  message: z
    .object({
      message_id: z.number().optional(),
      chat: Chat,
      from: User.optional(),
      text: z.string().optional()
    })
    .optional(),
  callback_query: z
    .object({
      id: z.string(),
      from: User,
      message: z.object({ chat: Chat }).optional(),
      data: z.string().optional()
    })
    .optional()
});
export type Update = z.infer<typeof UpdateSchema>;

interface Addressed {
  subjectId: string;
  chatId: string;
}

export type ChatEvent =
  | ({ kind: "start"; payload: string } & Addressed)
  | ({ kind: "buy"; planId: string; discounted: boolean; callbackId: string } & Addressed)
  | ({ kind: "verify"; callbackId: string } & Addressed)
  | ({ kind: "text"; text: string } & Addressed)
  | { kind: "unsupported"; reason: string };

export type ChatEventKind = ChatEvent["kind"];

const BUY = /^buy:([a-z0-9_-]+)(:d)?$/;

export function parseChatEvent(raw: string): ChatEvent {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return { kind: "unsupported", reason: "malformed json" };
  }
  const parsed = UpdateSchema.safeParse(json);
  if (!parsed.success) return { kind: "unsupported", reason: "not an update" };
  return toChatEvent(parsed.data);
}

export function toChatEvent(update: Update): ChatEvent {
  const cb = update.callback_query;
  if (cb) {
    const subjectId = String(cb.from.id);
    const chatId = String(cb.message?.chat.id ?? cb.from.id);
    const data = cb.data ?? "";
    if (data === "pay:verify") return { kind: "verify", subjectId, chatId, callbackId: cb.id };
    const buy = BUY.exec(data);
    if (buy) return { kind: "buy", subjectId, chatId, planId: buy[1], discounted: buy[2] !== undefined, callbackId: cb.id };
    return { kind: "unsupported", reason: `callback ${data.slice(0, 32)}` };
  }

  const msg = update.message;
  if (msg) {
    const subjectId = String(msg.from?.id ?? msg.chat.id);
    const chatId = String(msg.chat.id);
    const text = (msg.text ?? "").trim();
    if (text === "/start" || text.startsWith("/start ")) {
      return { kind: "start", subjectId, chatId, payload: text.slice("/start".length).trim() };
    }
    if (text !== "") return { kind: "text", subjectId, chatId, text };
    return { kind: "unsupported", reason: "message without text" };
  }

  return { kind: "unsupported", reason: "no message or callback" };
}

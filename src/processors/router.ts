/**
 * Event routing: one handler per ChatEvent kind, looked up by tag.
 *
 * `createEventHandler` turns the table into the dispatch loop's handler:
 * parse the raw payload, route, and let errors propagate to the loop, which
 * logs them and acks the event.
 */

import type { ChatEvent, ChatEventKind } from "../types/events";
import { parseChatEvent } from "../types/events";
import type { HandlerContext } from "./context";
import { handleBuy } from "./handleBuy";
import { handleStart } from "./handleStart";
import { handleVerify } from "./handleVerify";

type HandlerFor<K extends ChatEventKind> = (ctx: HandlerContext, ev: Extract<ChatEvent, { kind: K }>) => Promise<void>;

export type HandlerTable = { [K in ChatEventKind]: HandlerFor<K> };

export const handlers: HandlerTable = {
  start: handleStart,
  buy: handleBuy,
  verify: handleVerify,
  text: async (ctx, ev) => {
    ctx.log.debug("text ignored", { subjectId: ev.subjectId, chars: ev.text.length });
  },
  unsupported: async (ctx, ev) => {
    ctx.log.debug("unsupported update", { reason: ev.reason });
  }
};

export async function routeEvent(ctx: HandlerContext, ev: ChatEvent, table: HandlerTable = handlers): Promise<void> {
  switch (ev.kind) {
    case "start":
      return table.start(ctx, ev);
    case "buy":
      return table.buy(ctx, ev);
    case "verify":
      return table.verify(ctx, ev);
    case "text":
      return table.text(ctx, ev);
    case "unsupported":
      return table.unsupported(ctx, ev);
  }
}

export function createEventHandler(ctx: HandlerContext, table: HandlerTable = handlers): (raw: string) => Promise<void> {
  return async (raw) => {
    const ev = parseChatEvent(raw);
    if (ev.kind === "unsupported") ctx.log.info("event dropped", { reason: ev.reason });
    await routeEvent(ctx, ev, table);
  };
}

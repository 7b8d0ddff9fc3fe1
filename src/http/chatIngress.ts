/**
 * Chat ingress (framework agnostic).
 *
 * The platform posts one update per request. The handler checks the shared
 * secret header and pushes the raw body onto the durable queue untouched;
 * parsing happens in the worker. A wrong secret is answered with
 * `{ ok: false }` and nothing is queued.
 *
 * A store failure answers 503 so the platform delivers the update again.
 */

import { timingSafeEqual } from "crypto";
import type { DurableQueue } from "../engine/durableQueue";
import { getHeader } from "../infra/gateway.webhook";
import { createLogger, errorMessage } from "../infra/logger";

export const CHAT_SECRET_HEADER = "x-telegram-bot-api-secret-token";

export type IngressRequest = {
  headers: Record<string, unknown>;
  rawBody: Buffer | string;
};

export type IngressResponse = {
  statusCode: number;
  body: { ok: boolean; reason?: string };
};

export type ChatIngressDeps = {
  queue: DurableQueue;
  webhookSecret: string;
};

const log = createLogger("ingress");

function secretMatches(expected: string, given: string | undefined): boolean {
  if (!expected) return true;
  if (!given) return false;
  const a = Buffer.from(expected, "utf8");
  const b = Buffer.from(given, "utf8");
  return a.length === b.length && timingSafeEqual(a, b);
}

export async function handleChatIngress(deps: ChatIngressDeps, req: IngressRequest): Promise<IngressResponse> {
  if (!secretMatches(deps.webhookSecret, getHeader(req.headers, CHAT_SECRET_HEADER))) {
    log.warn("chat webhook secret mismatch");
    return { statusCode: 200, body: { ok: false, reason: "secret mismatch" } };
  }

  const raw = typeof req.rawBody === "string" ? req.rawBody : req.rawBody.toString("utf8");
  if (raw.trim() === "") return { statusCode: 200, body: { ok: false, reason: "empty body" } };

  try {
    const depth = await deps.queue.push(raw);
    log.debug("update queued", { depth });
    return { statusCode: 200, body: { ok: true } };
  } catch (err) {
    log.error("update enqueue failed", { error: errorMessage(err) });
    return { statusCode: 503, body: { ok: false, reason: "store unavailable" } };
  }
}

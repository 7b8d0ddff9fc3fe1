/**
 * Outbound driver tests
 *
 * Goals
 * - Replies are classified into transient, rejected, blocked and config.
 * - Requests carry the fields the remote APIs expect.
 *
 * Test strategy
 * - Global fetch is stubbed; each test scripts the replies it needs.
 */

import { describe, it, beforeEach, afterEach, expect, vi } from "vitest";
import { createHttpAnalytics } from "../../src/infra/analytics.http";
import { createTelegramChat } from "../../src/infra/chat.telegram";
import { createStripeGateway } from "../../src/infra/gateway.stripe";

interface Call {
  url: string;
  init: RequestInit | undefined;
}

let calls: Call[];
let replies: Array<Response | Error>;

beforeEach(() => {
  calls = [];
  replies = [];
  vi.stubGlobal("fetch", async (url: string, init?: RequestInit) => {
    calls.push({ url, init });
    const next = replies.shift();
    if (!next) throw new Error("no scripted reply");
    if (next instanceof Error) throw next;
    return next;
  });
});

afterEach(() => {
  vi.unstubAllGlobals();
});

function json(status: number, body: unknown): Response {
  return new Response(JSON.stringify(body), { status, headers: { "content-type": "application/json" } });
}

function sentBody(i = 0): unknown {
  const body = calls[i]?.init?.body;
  return typeof body === "string" ? JSON.parse(body) : null;
}

// ---------------------------------------------
// Chat
// ---------------------------------------------

describe("telegram chat driver", () => {
  const chat = createTelegramChat({ botToken: "test-token", apiBaseUrl: "https://chat.test/", timeoutMs: 1000 });

  it("sends a message with inline buttons", async () => {
    replies.push(json(200, { ok: true, result: { message_id: 42 } }));

    const res = await chat.sendMessage("7", {
      text: "hi",
      buttons: [[{ text: "Pay", url: "https://pay.test/1" }], [{ text: "Done", callbackData: "pay:verify" }]]
    });

    expect(res).toEqual({ ok: true, value: { messageId: 42 } });
    expect(calls[0].url).toBe("https://chat.test/bottest-token/sendMessage");
    expect(sentBody()).toEqual({
      chat_id: "7",
      text: "hi",
      disable_web_page_preview: true,
      reply_markup: {
        inline_keyboard: [[{ text: "Pay", url: "https://pay.test/1" }], [{ text: "Done", callback_data: "pay:verify" }]]
      }
    });
  });

  it("reports a blocked chat", async () => {
    replies.push(json(403, { ok: false, error_code: 403, description: "Forbidden: bot was blocked by the user" }));
    expect(await chat.sendMessage("7", { text: "hi" })).toEqual({
      ok: false,
      error: { kind: "blocked", message: "Forbidden: bot was blocked by the user", status: 403 }
    });
  });

  it("classifies rate limits as transient and bad requests as rejected", async () => {
    replies.push(json(429, { ok: false, error_code: 429, description: "Too Many Requests" }));
    replies.push(json(400, { ok: false, error_code: 400, description: "Bad Request: message is too long" }));

    const limited = await chat.sendMessage("7", { text: "hi" });
    const refused = await chat.sendMessage("7", { text: "hi" });

    expect(limited.ok ? null : limited.error.kind).toBe("transient");
    expect(refused.ok ? null : refused.error.kind).toBe("rejected");
  });

  it("turns network failures into transient errors", async () => {
    replies.push(new Error("ECONNRESET"));
    expect(await chat.answerCallback("cb")).toEqual({ ok: false, error: { kind: "transient", message: "ECONNRESET" } });
  });
});

// ---------------------------------------------
// Gateway
// ---------------------------------------------

describe("stripe gateway driver", () => {
  const gateway = createStripeGateway({
    secretKey: "test-secret",
    apiBaseUrl: "https://gateway.test/v1",
    successUrl: "https://portal.test/ok",
    cancelUrl: "",
    locale: "en",
    timeoutMs: 1000
  });
  const input = { subjectId: "7", orderId: "order-1", amount: 14.99, currency: "GBP", description: "7 days" };

  it("creates a checkout session in minor units", async () => {
    replies.push(json(200, { id: "cs_1", url: "https://pay.test/cs_1", payment_status: "unpaid" }));

    expect(await gateway.createCheckout(input)).toEqual({
      ok: true,
      value: { sessionId: "cs_1", checkoutUrl: "https://pay.test/cs_1", rawStatus: "unpaid" }
    });
    const form = new URLSearchParams(String(calls[0].init?.body));
    expect(form.get("line_items[0][price_data][unit_amount]")).toBe("1499");
    expect(form.get("line_items[0][price_data][currency]")).toBe("gbp");
    expect(form.get("client_reference_id")).toBe("7");
    expect(form.get("cancel_url")).toBeNull();
  });

  it("reports the gateway's error message", async () => {
    replies.push(json(402, { error: { message: "Your card was declined." } }));
    expect(await gateway.createCheckout(input)).toEqual({
      ok: false,
      error: { kind: "rejected", message: "Your card was declined.", status: 402 }
    });
  });

  it("reports expired sessions as expired", async () => {
    replies.push(json(200, { id: "cs_1", status: "expired", payment_status: "unpaid" }));
    replies.push(json(200, { id: "cs_1", status: "complete", payment_status: "paid" }));

    expect(await gateway.queryStatus("cs_1")).toEqual({ ok: true, value: { rawStatus: "expired" } });
    expect(await gateway.queryStatus("cs_1")).toEqual({ ok: true, value: { rawStatus: "paid" } });
    expect(calls[0].url).toBe("https://gateway.test/v1/checkout/sessions/cs_1");
  });
});

// ---------------------------------------------
// Analytics
// ---------------------------------------------

describe("http analytics driver", () => {
  const event = {
    eventId: "evt-1",
    eventName: "Purchase",
    eventTime: 1_768_478_400,
    subjectId: "7",
    value: 14.99,
    currency: "GBP",
    tracking: { utm_source: "ads" }
  };

  it("answers config when a sink is not configured", async () => {
    const analytics = createHttpAnalytics({ orderUrl: "", orderToken: "", eventUrl: "", eventToken: "", platform: "p", timeoutMs: 1000 });
    const res = await analytics.sendEvent(event);
    expect(res.ok ? null : res.error.kind).toBe("config");
    expect(calls).toHaveLength(0);
  });

  it("posts events with a hashed subject id", async () => {
    const analytics = createHttpAnalytics({
      orderUrl: "",
      orderToken: "",
      eventUrl: "https://events.test/",
      eventToken: "test-token",
      platform: "p",
      timeoutMs: 1000
    });
    replies.push(new Response("", { status: 200 }));
    replies.push(new Response("upstream down", { status: 503 }));

    expect(await analytics.sendEvent(event)).toEqual({ ok: true, value: undefined });
    expect(sentBody()).toMatchObject({ data: [{ event_name: "Purchase", event_id: "evt-1", custom_data: { value: 14.99, currency: "GBP", utm_source: "ads" } }] });
    expect(await analytics.sendEvent(event)).toEqual({ ok: false, error: { kind: "transient", message: "upstream down", status: 503 } });
  });
});

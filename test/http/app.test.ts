/**
 * HTTP surface tests
 *
 * Goals
 * - Chat ingress queues raw updates only when the secret header matches.
 * - Gateway webhook verifies signatures over the raw body and reconciles.
 * - Portal key check, admin token guard, ops snapshot, manual delivery.
 * - Campaign links mint a stored token and redirect to the bot.
 * - Funnel reset needs the admin token and an explicit confirmation.
 *
 * Test strategy
 * - supertest against createApp; the runtime is fully in memory.
 */

import { describe, it, beforeEach, expect } from "vitest";
import request from "supertest";
import type { Express } from "express";
import { signPayload } from "../../src/infra/gateway.webhook";
import { createApp } from "../../src/http/app";
import { type TestRig, buildTestRig, startUpdate } from "../helpers";

let rig: TestRig;
let app: Express;

function use(next: TestRig): void {
  rig = next;
  app = createApp(rig.rt, rig.clock.now);
}

beforeEach(() => {
  use(buildTestRig());
});

describe("GET /health", () => {
  it("answers ok", async () => {
    const res = await request(app).get("/health");
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, service: "outreach-jobs-service", time: new Date(rig.clock.ms).toISOString() });
  });
});

// ---------------------------------------------
// Chat ingress
// ---------------------------------------------

describe("POST /chat/webhook", () => {
  it("queues the raw update when the secret matches", async () => {
    const body = startUpdate(5);
    const res = await request(app)
      .post("/chat/webhook")
      .set("Content-Type", "application/json")
      .set("X-Telegram-Bot-Api-Secret-Token", "test-chat-secret")
      .send(body);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
    expect(await rig.store.lrange(rig.rt.keys.queue, 0, -1)).toEqual([body]);
  });

  it("queues nothing on a wrong secret", async () => {
    const res = await request(app)
      .post("/chat/webhook")
      .set("Content-Type", "application/json")
      .set("X-Telegram-Bot-Api-Secret-Token", "nope")
      .send(startUpdate(5));

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: false, reason: "secret mismatch" });
    expect(await rig.rt.queue.depth()).toBe(0);
  });
});

// ---------------------------------------------
// Gateway webhook
// ---------------------------------------------

describe("POST /payments/webhook", () => {
  async function openCheckout(): Promise<string> {
    await rig.rt.subjects.touch("7", "7", { newCycle: true });
    const res = await rig.rt.context.checkout.getOrCreate("7", { id: "week", label: "7 days", amount: 10, days: 7 }, {});
    if (!res.ok) throw new Error(res.error.message);
    return res.value.transactionId;
  }

  function completedEvent(sessionId: string): string {
    return JSON.stringify({
      id: "evt_1",
      type: "checkout.session.completed",
      data: { object: { id: sessionId, payment_status: "paid", client_reference_id: "7" } }
    });
  }

  it("confirms the payment of a correctly signed callback", async () => {
    const tx = await openCheckout();
    const body = completedEvent(tx);
    const ts = Math.floor(rig.clock.ms / 1000);

    const res = await request(app)
      .post("/payments/webhook")
      .set("Content-Type", "application/json")
      .set("Stripe-Signature", `t=${ts},v1=${signPayload("test-secret", ts, body)}`)
      .send(body);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, outcome: "confirmed" });
    expect(await rig.rt.subjects.isPaid("7")).toBe(true);
  });

  it("answers 200 with ok false on a bad signature and changes nothing", async () => {
    const tx = await openCheckout();
    const body = completedEvent(tx);
    const ts = Math.floor(rig.clock.ms / 1000);

    const res = await request(app)
      .post("/payments/webhook")
      .set("Content-Type", "application/json")
      .set("Stripe-Signature", `t=${ts},v1=${signPayload("wrong-secret", ts, body)}`)
      .send(body);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: false, reason: "signature mismatch" });
    expect(await rig.rt.subjects.isPaid("7")).toBe(false);
  });
});

// ---------------------------------------------
// Portal
// ---------------------------------------------

describe("GET /portal/verify", () => {
  it("resolves a delivered key to its subject", async () => {
    await rig.rt.subjects.touch("7", "7", { newCycle: true });
    const delivered = await rig.rt.delivery.deliverIfNeeded("7");
    if (!delivered.ok) throw new Error("delivery failed");

    const res = await request(app).get("/portal/verify").query({ key: delivered.value.accessKey });
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, subjectId: "7" });
  });

  it("answers 404 for an unknown key and 400 without one", async () => {
    expect((await request(app).get("/portal/verify?key=unknown")).body).toEqual({ ok: false, subjectId: null });
    expect((await request(app).get("/portal/verify")).status).toBe(400);
  });
});

// ---------------------------------------------
// Campaign links
// ---------------------------------------------

describe("GET /r", () => {
  it("stores the campaign parameters under a token and redirects to the bot", async () => {
    const res = await request(app).get("/r").query({ utm_source: "ads", utm_campaign: "spring", other: "x" });

    expect(res.status).toBe(302);
    const match = /^https:\/\/t\.me\/testbot\?start=([0-9a-f]{10})$/.exec(res.headers.location ?? "");
    expect(match).not.toBeNull();
    const token = match?.[1] ?? "";
    expect(await rig.store.hgetall(rig.rt.keys.campaign(token))).toEqual({ utm_source: "ads", utm_campaign: "spring" });
    expect(rig.store.ttl(rig.rt.keys.campaign(token))).toBe(7 * 24 * 60 * 60);
    expect(await rig.rt.campaigns.resolve(token)).toEqual({ utm_source: "ads", utm_campaign: "spring" });
  });

  it("answers 400 without campaign parameters", async () => {
    const res = await request(app).get("/r").query({ other: "x" });
    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: "missing query params" });
  });

  it("answers 503 when no bot link is configured", async () => {
    use(buildTestRig({ CHAT_DEEPLINK_URL: "" }));
    const res = await request(app).get("/r").query({ utm_source: "ads" });
    expect(res.status).toBe(503);
    expect(res.body).toEqual({ ok: false, error: "deep link not configured" });
  });

  it("answers HEAD without redirecting", async () => {
    const res = await request(app).head("/r").query({ utm_source: "ads" });
    expect(res.status).toBe(200);
    expect(res.headers.location).toBeUndefined();
  });
});

// ---------------------------------------------
// Admin
// ---------------------------------------------

describe("admin routes", () => {
  it("refuses requests without the token", async () => {
    expect((await request(app).get("/admin/ops")).status).toBe(403);
    expect((await request(app).get("/admin/ops").set("x-admin-token", "wrong")).status).toBe(403);
  });

  it("refuses everything when no token is configured", async () => {
    use(buildTestRig({ ADMIN_TOKEN: "" }));
    expect((await request(app).get("/admin/ops").set("x-admin-token", "")).status).toBe(403);
  });

  it("reports queue, pending, due and retry depths", async () => {
    await rig.rt.queue.push(startUpdate(5));
    await rig.rt.scheduler.schedule("5", 360);
    await rig.rt.ledger.addPending("5");

    const res = await request(app).get("/admin/ops").query({ token: "test-admin" });

    expect(res.status).toBe(200);
    expect(res.body.ops).toEqual({
      queueDepth: 1,
      processingDepth: 0,
      pendingPayments: 1,
      followupsDue: 1,
      retryDepth: 0,
      funnel: {},
      funnelToday: {}
    });
  });

  it("dumps recent log lines", async () => {
    const res = await request(app).get("/admin/logs?limit=5").set("x-admin-token", "test-admin");
    expect(res.status).toBe(200);
    expect(Array.isArray(res.body.lines)).toBe(true);
    expect(res.body.lines.length).toBeLessThanOrEqual(5);
  });

  it("re-delivers access on demand", async () => {
    await rig.rt.subjects.touch("7", "7", { newCycle: true });
    await rig.rt.delivery.deliverIfNeeded("7");

    const res = await request(app).post("/admin/subjects/7/deliver").set("x-admin-token", "test-admin");

    expect(res.body).toEqual({ ok: true, sentNow: true });
    expect(rig.chat.textsTo("7")).toHaveLength(2);
  });

  it("rejects malformed subject ids", async () => {
    const res = await request(app).post("/admin/subjects/not%20valid/deliver").set("x-admin-token", "test-admin");
    expect(res.status).toBe(400);
  });

  it("resets funnel metrics once confirmed", async () => {
    await rig.rt.funnel.record("start", { subjectId: "5" });
    await rig.rt.funnel.record("followup_sent", { subjectId: "5" });

    const res = await request(app).post("/admin/funnel/reset").query({ confirm: "RESET" }).set("x-admin-token", "test-admin");

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true, deletedDayKeys: 1 });
    expect(await rig.rt.funnel.counters()).toEqual({});
    expect(await rig.rt.funnel.today()).toEqual({});
    expect(await rig.store.lrange(rig.rt.keys.funnelEvents, 0, -1)).toEqual([]);
  });

  it("keeps funnel metrics without the confirmation", async () => {
    await rig.rt.funnel.record("start", { subjectId: "5" });

    const res = await request(app).post("/admin/funnel/reset").set("x-admin-token", "test-admin");

    expect(res.status).toBe(400);
    expect(res.body).toEqual({ ok: false, error: "confirm_required", hint: "Use confirm=RESET" });
    expect(await rig.rt.funnel.counters()).toEqual({ events_total: "1", start: "1" });
  });

  it("refuses a funnel reset without the token", async () => {
    await rig.rt.funnel.record("start", { subjectId: "5" });
    expect((await request(app).post("/admin/funnel/reset").query({ confirm: "RESET" })).status).toBe(403);
    expect(await rig.rt.funnel.counters()).toEqual({ events_total: "1", start: "1" });
  });
});

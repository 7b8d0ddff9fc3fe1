/**
 * Express app factory. Routes:
 * - POST /chat/webhook      chat platform updates -> durable queue
 * - POST /payments/webhook  gateway callbacks -> reconciler push path
 * - GET  /portal/verify     access key check
 * - GET  /r                 campaign link: stores the query under a token, redirects to the bot
 * - /admin/*                ops snapshot, log dump, manual delivery, funnel reset
 * - GET  /health
 *
 * Both webhooks read the raw body: the chat update is queued verbatim and
 * the gateway signature covers the exact bytes.
 */

import express, { type Express } from "express";
import { createLogger, errorMessage } from "../infra/logger";
import type { Runtime } from "../runtime";
import { campaignParams } from "../services/tracking";
import { adminRouter } from "./admin";
import { handleChatIngress } from "./chatIngress";
import { handlePaymentsWebhook } from "./paymentsWebhook";

const log = createLogger("http");

export function createApp(rt: Runtime, now: () => number = Date.now): Express {
  const app = express();
  const raw = express.raw({ type: "*/*", limit: "1mb" });

  app.get("/health", (_req, res) => {
    res.json({ ok: true, service: "outreach-jobs-service", time: new Date(now()).toISOString() });
  });

  app.post("/chat/webhook", raw, async (req, res) => {
    const result = await handleChatIngress(
      { queue: rt.queue, webhookSecret: rt.config.chat.webhookSecret },
      { headers: req.headers, rawBody: Buffer.isBuffer(req.body) ? req.body : "" }
    );
    res.status(result.statusCode).json(result.body);
  });

  app.post("/payments/webhook", raw, async (req, res) => {
    const result = await handlePaymentsWebhook(
      {
        reconciler: rt.reconciler,
        webhookSecret: rt.config.gateway.webhookSecret,
        toleranceSeconds: rt.config.gateway.webhookToleranceSeconds,
        now
      },
      { headers: req.headers, rawBody: Buffer.isBuffer(req.body) ? req.body : "" }
    );
    res.status(result.statusCode).json(result.body);
  });

  app.get("/portal/verify", async (req, res) => {
    const key = typeof req.query.key === "string" ? req.query.key.trim() : "";
    if (key === "") {
      res.status(400).json({ ok: false, subjectId: null });
      return;
    }
    try {
      const subjectId = await rt.delivery.lookup(key);
      res.status(subjectId ? 200 : 404).json({ ok: subjectId !== null, subjectId });
    } catch (err) {
      log.error("portal lookup failed", { error: errorMessage(err) });
      res.status(503).json({ ok: false, subjectId: null });
    }
  });

  // Link checkers send HEAD; only a real visit mints a token.
  app.head("/r", (_req, res) => {
    res.status(200).end();
  });

  app.get("/r", async (req, res) => {
    const params = campaignParams(req.query);
    if (Object.keys(params).length === 0) {
      res.status(400).json({ ok: false, error: "missing query params" });
      return;
    }
    if (rt.config.chat.deepLinkUrl === "") {
      res.status(503).json({ ok: false, error: "deep link not configured" });
      return;
    }
    try {
      const token = await rt.campaigns.save(params);
      const target = new URL(rt.config.chat.deepLinkUrl);
      target.searchParams.set("start", token);
      log.info("campaign token minted", { token, params: Object.keys(params).join(",") });
      res.redirect(302, target.toString());
    } catch (err) {
      log.error("campaign token save failed", { error: errorMessage(err) });
      res.status(503).json({ ok: false, error: "store unavailable" });
    }
  });

  app.use("/admin", adminRouter(rt));

  return app;
}

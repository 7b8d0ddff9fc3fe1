/**
 * Gateway webhook HTTP handler (framework agnostic).
 *
 * - Verifies the signature over the raw body.
 * - Normalizes checkout-session events to a GatewaySignal.
 * - Feeds the signal to the reconciler's push path.
 *
 * Answers 200 in every case so the gateway does not redeliver. A bad
 * signature is answered with `{ ok: false }`; unknown subjects and ignored
 * event types with `{ ok: true }`. The poll path picks up whatever a lost
 * callback would have confirmed.
 *
 * Usage (Express):
 *   app.post("/payments/webhook", express.raw({ type: "*\/*" }), async (req, res) => {
 *     const result = await handlePaymentsWebhook(deps, { headers: req.headers, rawBody: req.body });
 *     res.status(result.statusCode).json(result.body);
 *   });
 */

import { normalizeGatewayEvent, verifyGatewaySignature } from "../infra/gateway.webhook";
import { createLogger, errorMessage } from "../infra/logger";
import type { PaymentReconciler, ReconcileOutcome } from "../payments/reconciler";

export type WebhookRequest = {
  headers: Record<string, unknown>;
  rawBody: Buffer | string;
};

export type WebhookResponse = {
  statusCode: number;
  body: { ok: boolean; outcome?: ReconcileOutcome | "ignored" | "error"; reason?: string };
};

export type PaymentsWebhookDeps = {
  reconciler: PaymentReconciler;
  webhookSecret: string;
  toleranceSeconds: number;
  now?: () => number;
};

const log = createLogger("payments.webhook");

export async function handlePaymentsWebhook(deps: PaymentsWebhookDeps, req: WebhookRequest): Promise<WebhookResponse> {
  // 1) Verify signature
  const verified = verifyGatewaySignature(req.headers, req.rawBody, {
    secret: deps.webhookSecret,
    toleranceSeconds: deps.toleranceSeconds,
    nowSeconds: Math.floor((deps.now ?? Date.now)() / 1000)
  });
  if (!verified.ok) {
    log.warn("gateway webhook rejected", { reason: verified.reason });
    return { statusCode: 200, body: { ok: false, reason: verified.reason } };
  }

  // 2) Normalize
  const normalized = normalizeGatewayEvent(req.rawBody);
  if (normalized.kind === "invalid") {
    log.warn("gateway webhook unreadable", { reason: normalized.reason });
    return { statusCode: 200, body: { ok: true, outcome: "ignored", reason: normalized.reason } };
  }
  if (normalized.kind === "ignored") {
    log.debug("gateway event ignored", { eventType: normalized.eventType });
    return { statusCode: 200, body: { ok: true, outcome: "ignored" } };
  }

  // 3) Reconcile
  try {
    const result = await deps.reconciler.handlePush(normalized.signal);
    log.info("gateway webhook handled", {
      eventType: normalized.signal.eventType,
      subjectId: result.subjectId,
      outcome: result.outcome
    });
    return { statusCode: 200, body: { ok: true, outcome: result.outcome } };
  } catch (err) {
    log.error("gateway webhook reconcile failed", { eventType: normalized.signal.eventType, error: errorMessage(err) });
    return { statusCode: 200, body: { ok: true, outcome: "error" } };
  }
}

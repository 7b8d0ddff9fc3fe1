/**
 * Gateway webhook intake tests
 *
 * Goals
 * - Prove signature verification accepts a correctly signed body and rejects
 *   tampering, wrong secrets, stale timestamps and malformed headers.
 * - Prove checkout-session events normalize to the expected GatewaySignal.
 */

import { describe, it, expect } from "vitest";
import {
  normalizeGatewayEvent,
  parseSignatureHeader,
  signPayload,
  verifyGatewaySignature
} from "../../src/infra/gateway.webhook";

const SECRET = "test-secret";
const NOW = 1_768_478_400;

function sessionEvent(type: string, session: Record<string, unknown>): string {
  return JSON.stringify({ id: "evt_1", type, data: { object: { id: "cs_test_1", ...session } } });
}

function signed(body: string, ts = NOW, secret = SECRET): Record<string, string> {
  return { "Stripe-Signature": `t=${ts},v1=${signPayload(secret, ts, body)}` };
}

// ---------------------------------------------
// Signature
// ---------------------------------------------

describe("verifyGatewaySignature", () => {
  const body = sessionEvent("checkout.session.completed", { payment_status: "paid" });
  const opts = { secret: SECRET, toleranceSeconds: 300, nowSeconds: NOW };

  it("accepts a correctly signed body", () => {
    expect(verifyGatewaySignature(signed(body), Buffer.from(body), opts)).toEqual({ ok: true });
  });

  it("accepts any matching v1 entry", () => {
    const headers = { "stripe-signature": `t=${NOW},v1=deadbeef,v1=${signPayload(SECRET, NOW, body)}` };
    expect(verifyGatewaySignature(headers, body, opts)).toEqual({ ok: true });
  });

  it("rejects a tampered body", () => {
    expect(verifyGatewaySignature(signed(body), body.replace("paid", "free"), opts)).toEqual({ ok: false, reason: "signature mismatch" });
  });

  it("rejects a body signed with another secret", () => {
    expect(verifyGatewaySignature(signed(body, NOW, "other-secret"), body, opts)).toEqual({ ok: false, reason: "signature mismatch" });
  });

  it("rejects timestamps outside the tolerance", () => {
    expect(verifyGatewaySignature(signed(body, NOW - 301), body, opts)).toEqual({ ok: false, reason: "timestamp outside tolerance" });
    expect(verifyGatewaySignature(signed(body, NOW - 300), body, opts)).toEqual({ ok: true });
  });

  it("skips the timestamp check when tolerance is zero", () => {
    expect(verifyGatewaySignature(signed(body, NOW - 86_400), body, { ...opts, toleranceSeconds: 0 })).toEqual({ ok: true });
  });

  it("rejects missing headers and an unset secret", () => {
    expect(verifyGatewaySignature({}, body, opts)).toEqual({ ok: false, reason: "missing signature header" });
    expect(verifyGatewaySignature({ "stripe-signature": "v1=abc" }, body, opts)).toEqual({ ok: false, reason: "malformed signature header" });
    expect(verifyGatewaySignature(signed(body), body, { ...opts, secret: "" })).toEqual({ ok: false, reason: "webhook secret not configured" });
  });
});

describe("parseSignatureHeader", () => {
  it("reads the timestamp and every v1 signature", () => {
    expect(parseSignatureHeader("t=12, v1=aa, v0=bb, v1=cc")).toEqual({ timestamp: 12, signatures: ["aa", "cc"] });
  });
});

// ---------------------------------------------
// Normalization
// ---------------------------------------------

describe("normalizeGatewayEvent", () => {
  it("maps a completed session to its payment status with hints and identifiers", () => {
    const body = sessionEvent("checkout.session.completed", {
      payment_status: "paid",
      status: "complete",
      client_reference_id: "7",
      metadata: { user_id: "7", event_id: "order-abc" }
    });
    expect(normalizeGatewayEvent(body)).toEqual({
      kind: "signal",
      signal: {
        eventType: "checkout.session.completed",
        rawStatus: "paid",
        subjectHint: "7",
        transactionId: "cs_test_1",
        identifiers: ["order-abc"]
      }
    });
  });

  it("treats a completed session as paid whatever its payment_status says", () => {
    const res = normalizeGatewayEvent(sessionEvent("checkout.session.completed", { payment_status: "unpaid", status: "complete", client_reference_id: "7" }));
    expect(res.kind === "signal" ? res.signal.rawStatus : null).toBe("paid");
  });

  it("falls back to metadata.user_id for the subject hint", () => {
    const res = normalizeGatewayEvent(sessionEvent("checkout.session.async_payment_succeeded", { payment_status: "paid", metadata: { user_id: "9" } }));
    expect(res.kind === "signal" ? res.signal.subjectHint : null).toBe("9");
  });

  it("maps expiry and async failure to failure statuses", () => {
    const expired = normalizeGatewayEvent(sessionEvent("checkout.session.expired", { status: "open" }));
    const failed = normalizeGatewayEvent(sessionEvent("checkout.session.async_payment_failed", {}));
    expect(expired.kind === "signal" ? expired.signal.rawStatus : null).toBe("expired");
    expect(failed.kind === "signal" ? failed.signal.rawStatus : null).toBe("failed");
  });

  it("ignores other event types", () => {
    expect(normalizeGatewayEvent(JSON.stringify({ type: "charge.refunded", data: { object: {} } }))).toEqual({
      kind: "ignored",
      eventType: "charge.refunded"
    });
  });

  it("reports unreadable bodies", () => {
    expect(normalizeGatewayEvent("{")).toEqual({ kind: "invalid", reason: "malformed json" });
    expect(normalizeGatewayEvent(JSON.stringify({ hello: "world" }))).toEqual({ kind: "invalid", reason: "not a gateway event" });
  });
});

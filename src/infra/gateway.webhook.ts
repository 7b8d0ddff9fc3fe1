/**
 * Payment gateway webhook intake and normalization.
 *
 * Responsibilities
 * - Verify authenticity of the callback (HMAC-SHA256 over "{t}.{rawBody}").
 * - Parse the raw JSON and keep only checkout-session events.
 * - Normalize to the GatewaySignal shape consumed by the reconciler.
 *
 * Requires the *raw* request body bytes for signature verification.
 *
 * Header
 * - stripe-signature: "t=<unix seconds>,v1=<hex hmac>[,v1=...]"
 *
 * Event mapping
 * - checkout.session.completed / async_payment_succeeded  -> "paid"
 * - checkout.session.expired                              -> "expired"
 * - checkout.session.async_payment_failed                 -> "failed"
 * Other event types are acknowledged and ignored.
 */

import { createHmac, timingSafeEqual } from "crypto";
import { z } from "zod";
import type { GatewaySignal } from "../payments/reconciler";

/* -----------------------------------------------------------
 * Options and header helpers
 * --------------------------------------------------------- */

export const SIGNATURE_HEADER = "stripe-signature";

export type VerifyOptions = {
  secret: string;
  toleranceSeconds: number;
  nowSeconds?: number;
};

export type VerifyResult = { ok: true } | { ok: false; reason: string };

/** Get a header value case-insensitively. */
export function getHeader(headers: Record<string, unknown>, name: string): string | undefined {
  const lower = name.toLowerCase();
  for (const [k, v] of Object.entries(headers)) {
    if (k.toLowerCase() !== lower) continue;
    if (typeof v === "string") return v;
    if (Array.isArray(v) && typeof v[0] === "string") return v[0];
    return undefined;
  }
  return undefined;
}

export type SignatureHeader = { timestamp: number; signatures: string[] };

export function parseSignatureHeader(value: string): SignatureHeader | null {
  let timestamp: number | null = null;
  const signatures: string[] = [];
  for (const part of value.split(",")) {
    const eq = part.indexOf("=");
    if (eq <= 0) continue;
    const key = part.slice(0, eq).trim();
    const val = part.slice(eq + 1).trim();
    if (key === "t" && /^\d+$/.test(val)) timestamp = Number(val);
    else if (key === "v1" && val !== "") signatures.push(val);
  }
  if (timestamp === null || signatures.length === 0) return null;
  return { timestamp, signatures };
}

/* -----------------------------------------------------------
 * Signature verification
 * --------------------------------------------------------- */

export function signPayload(secret: string, timestamp: number, rawBody: string): string {
  return createHmac("sha256", secret).update(`${timestamp}.${rawBody}`).digest("hex");
}

export function verifyGatewaySignature(
  headers: Record<string, unknown>,
  rawBody: Buffer | string,
  opts: VerifyOptions
): VerifyResult {
  if (!opts.secret) return { ok: false, reason: "webhook secret not configured" };
  const header = getHeader(headers, SIGNATURE_HEADER);
  if (!header) return { ok: false, reason: "missing signature header" };
  const parsed = parseSignatureHeader(header);
  if (!parsed) return { ok: false, reason: "malformed signature header" };

  const now = opts.nowSeconds ?? Math.floor(Date.now() / 1000);
  if (opts.toleranceSeconds > 0 && Math.abs(now - parsed.timestamp) > opts.toleranceSeconds) {
    return { ok: false, reason: "timestamp outside tolerance" };
  }

  const body = typeof rawBody === "string" ? rawBody : rawBody.toString("utf8");
  const expected = Buffer.from(signPayload(opts.secret, parsed.timestamp, body), "utf8");
  const match = parsed.signatures.some((sig) => {
    const given = Buffer.from(sig, "utf8");
    return given.length === expected.length && timingSafeEqual(given, expected);
  });
  return match ? { ok: true } : { ok: false, reason: "signature mismatch" };
}

/* -----------------------------------------------------------
 * Normalization to GatewaySignal
 * --------------------------------------------------------- */

const SessionSchema = z
  .object({
    id: z.string().min(1),
    client_reference_id: z.string().nullish(),
    metadata: z.record(z.string()).nullish()
  })
  .passthrough();

const EventSchema = z
  .object({
    id: z.string().optional(),
    type: z.string(),
    data: z.object({ object: z.unknown() })
  })
  .passthrough();

export type NormalizeResult =
  | { kind: "signal"; signal: GatewaySignal }
  | { kind: "ignored"; eventType: string }
  | { kind: "invalid"; reason: string };

/** The event type decides the outcome; the session's own status fields are not consulted. */
function rawStatusFor(eventType: string): string | null {
  switch (eventType) {
    case "checkout.session.completed":
    case "checkout.session.async_payment_succeeded":
      return "paid";
    case "checkout.session.expired":
      return "expired";
    case "checkout.session.async_payment_failed":
      return "failed";
    default:
      return null;
  }
}

/** Normalize a raw webhook body. Never throws. */
export function normalizeGatewayEvent(rawBody: Buffer | string): NormalizeResult {
  let json: unknown;
  try {
    json = JSON.parse(typeof rawBody === "string" ? rawBody : rawBody.toString("utf8"));
  } catch {
    return { kind: "invalid", reason: "malformed json" };
  }

  const event = EventSchema.safeParse(json);
  if (!event.success) return { kind: "invalid", reason: "not a gateway event" };
  const eventType = event.data.type;
  if (!eventType.startsWith("checkout.session.")) return { kind: "ignored", eventType };

  const session = SessionSchema.safeParse(event.data.data.object);
  if (!session.success) return { kind: "invalid", reason: "session object missing" };

  const rawStatus = rawStatusFor(eventType);
  if (rawStatus === null) return { kind: "ignored", eventType };

  const metadata = session.data.metadata ?? {};
  const identifiers = [metadata.event_id, metadata.order_id].filter((v): v is string => typeof v === "string" && v !== "");

  return {
    kind: "signal",
    signal: {
      eventType,
      rawStatus,
      subjectHint: session.data.client_reference_id ?? metadata.user_id ?? undefined,
      transactionId: session.data.id,
      identifiers
    }
  };
}

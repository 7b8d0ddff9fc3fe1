/**
 * Stripe Checkout driver for GatewayPort.
 *
 * - POST /checkout/sessions (form-encoded) creates a hosted checkout.
 * - GET /checkout/sessions/{id} reports `payment_status` ("paid", "unpaid",
 *   "no_payment_required") and `status` ("open", "complete", "expired").
 *   An expired session is reported as "expired" so the reconciler can stop
 *   polling it; otherwise payment_status wins.
 */

import { z } from "zod";
import type { GatewayPort } from "../ports/GatewayPort";
import { CreateCheckoutInputSchema } from "../types/checkout";
import { fail, ok } from "../types/result";
import { requestJson, statusKind, truncate } from "./http";

export interface StripeOptions {
  secretKey: string;
  apiBaseUrl: string;
  successUrl: string;
  cancelUrl: string;
  locale: string;
  timeoutMs: number;
}

const SessionSchema = z
  .object({
    id: z.string(),
    url: z.string().nullable().optional(),
    status: z.string().nullable().optional(),
    payment_status: z.string().nullable().optional()
  })
  .passthrough();

const ErrorSchema = z.object({ error: z.object({ message: z.string() }).passthrough() });

export function createStripeGateway(opts: StripeOptions): GatewayPort {
  const base = opts.apiBaseUrl.replace(/\/+$/, "");
  const auth = { authorization: `Bearer ${opts.secretKey}` };

  function refusal(status: number, body: unknown, text: string) {
    const parsed = ErrorSchema.safeParse(body);
    const message = parsed.success ? parsed.data.error.message : truncate(text, 300);
    return fail(statusKind(status), message || `HTTP ${status}`, status);
  }

  return {
    async createCheckout(input) {
      const parsedInput = CreateCheckoutInputSchema.safeParse(input);
      if (!parsedInput.success) return fail("rejected", parsedInput.error.issues.map((i) => i.message).join("; "));
      const data = parsedInput.data;
      const form = new URLSearchParams({
        mode: "payment",
        client_reference_id: data.subjectId,
        "metadata[user_id]": data.subjectId,
        "metadata[event_id]": data.orderId,
        "line_items[0][quantity]": "1",
        "line_items[0][price_data][currency]": data.currency.toLowerCase(),
        "line_items[0][price_data][unit_amount]": String(Math.round(data.amount * 100)),
        "line_items[0][price_data][product_data][name]": data.description,
        locale: opts.locale
      });
      if (opts.successUrl) form.set("success_url", opts.successUrl);
      if (opts.cancelUrl) form.set("cancel_url", opts.cancelUrl);

      const res = await requestJson({
        url: `${base}/checkout/sessions`,
        method: "POST",
        headers: {
          ...auth,
          "content-type": "application/x-www-form-urlencoded",
          "idempotency-key": data.orderId
        },
        body: form.toString(),
        timeoutMs: opts.timeoutMs
      });
      if (!res.ok) return res;
      if (res.value.status < 200 || res.value.status >= 300) {
        return refusal(res.value.status, res.value.body, res.value.text);
      }
      const session = SessionSchema.safeParse(res.value.body);
      if (!session.success || !session.data.url) {
        return fail("rejected", "checkout session without url");
      }
      return ok({
        sessionId: session.data.id,
        checkoutUrl: session.data.url,
        rawStatus: session.data.payment_status ?? session.data.status ?? "unpaid"
      });
    },

    async queryStatus(transactionId) {
      const res = await requestJson({
        url: `${base}/checkout/sessions/${encodeURIComponent(transactionId)}`,
        headers: auth,
        timeoutMs: opts.timeoutMs
      });
      if (!res.ok) return res;
      if (res.value.status < 200 || res.value.status >= 300) {
        return refusal(res.value.status, res.value.body, res.value.text);
      }
      const session = SessionSchema.safeParse(res.value.body);
      if (!session.success) return fail("rejected", "unexpected session payload");
      const { status, payment_status } = session.data;
      if (status === "expired") return ok({ rawStatus: "expired" });
      return ok({ rawStatus: payment_status ?? status ?? "unpaid" });
    }
  };
}

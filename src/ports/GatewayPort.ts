/**
 * GatewayPort
 *
 * Purpose
 * - Single boundary for the payment gateway: create a hosted checkout and
 *   look up the status of an existing one.
 * - Statuses come back raw; the reconciler owns the vocabulary.
 *
 * Non-goals
 * - No retries here. The poller asks again on its next sweep.
 *
 * Drivers
 * - "noop" (default): deterministic fake checkouts kept in memory.
 * - "stripe": Checkout Sessions over HTTPS (infra/gateway.stripe.ts).
 */

import type { AppConfig } from "../config";
import { createStripeGateway } from "../infra/gateway.stripe";
import { CreateCheckoutInput, CreateCheckoutInputSchema } from "../types/checkout";
import { Result, fail, ok } from "../types/result";

export type { CreateCheckoutInput };

export interface Checkout {
  sessionId: string;
  checkoutUrl: string;
  rawStatus: string;
}

export interface GatewayStatus {
  rawStatus: string;
}

export interface GatewayPort {
  createCheckout(input: CreateCheckoutInput): Promise<Result<Checkout>>;
  queryStatus(transactionId: string): Promise<Result<GatewayStatus>>;
}

export function getGatewayPort(config: AppConfig): GatewayPort {
  if (config.gateway.driver === "stripe") {
    return createStripeGateway({
      secretKey: config.gateway.secretKey,
      apiBaseUrl: config.gateway.apiBaseUrl,
      successUrl: config.gateway.successUrl,
      cancelUrl: config.gateway.cancelUrl,
      locale: config.gateway.locale,
      timeoutMs: config.outboundTimeoutMs
    });
  }
  return createNoopGateway();
}

/* -----------------------------------------------------------
 * Noop driver (development/test)
 * --------------------------------------------------------- */

export interface NoopGateway extends GatewayPort {
  /** Set the status later lookups report for a session. */
  setStatus(sessionId: string, rawStatus: string): void;
  created: CreateCheckoutInput[];
}

export function createNoopGateway(): NoopGateway {
  const statuses = new Map<string, string>();
  const created: CreateCheckoutInput[] = [];
  return {
    created,
    setStatus(sessionId, rawStatus) {
      statuses.set(sessionId, rawStatus);
    },
    async createCheckout(input) {
      const parsed = CreateCheckoutInputSchema.safeParse(input);
      if (!parsed.success) return fail("rejected", parsed.error.issues.map((i) => i.message).join("; "));
      created.push(parsed.data);
      const sessionId = `cs_noop_${parsed.data.orderId}`;
      statuses.set(sessionId, "unpaid");
      return ok({ sessionId, checkoutUrl: `https://checkout.invalid/${sessionId}`, rawStatus: "unpaid" });
    },
    async queryStatus(transactionId) {
      const rawStatus = statuses.get(transactionId);
      if (rawStatus === undefined) return fail("rejected", `unknown session ${transactionId}`, 404);
      return ok({ rawStatus });
    }
  };
}

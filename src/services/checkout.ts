/**
 * Checkout creation for buy clicks.
 *
 * - A pending checkout for the same amount, younger than the reuse window,
 *   is handed out again instead of creating a new gateway session.
 * - A new checkout is written as the subject's Pending Payment Record, its
 *   session id and order id are mapped to the subject, and the subject joins
 *   the pending set.
 * - Gateway failures are recorded in {p}payment:error:{id} and returned.
 */

import { createHash } from "crypto";
import { createLogger } from "../infra/logger";
import type { GatewayPort } from "../ports/GatewayPort";
import type { PaymentLedger, PaymentRecord } from "../payments/paymentLedger";
import { normalizeStatus, statusLabel } from "../payments/statusVocabulary";
import type { NotificationDispatcher } from "../queues/notifications";
import { Result, describeError, fail, ok } from "../types/result";
import type { Tracking } from "../types/notifications";
import type { Plan } from "./offers";

export interface CheckoutLink {
  checkoutUrl: string;
  orderId: string;
  transactionId: string;
  reused: boolean;
}

export interface CheckoutServiceOptions {
  currency: string;
  reuseWindowSeconds: number;
  now?: () => number;
}

const log = createLogger("checkout");

export function orderIdFor(subjectId: string, amount: number, ms: number): string {
  return createHash("sha256").update(`${subjectId}:${amount.toFixed(2)}:${ms}`).digest("hex").slice(0, 16);
}

export class CheckoutService {
  private readonly now: () => number;

  constructor(
    private readonly ledger: PaymentLedger,
    private readonly gateway: GatewayPort,
    private readonly notifications: NotificationDispatcher,
    private readonly opts: CheckoutServiceOptions
  ) {
    this.now = opts.now ?? Date.now;
  }

  /** The subject's open checkout if it can be handed out again for `amount`. */
  reusable(record: PaymentRecord | null, amount: number): CheckoutLink | null {
    if (!record || !record.checkoutUrl) return null;
    if (record.status !== "" && record.status !== "PENDING") return null;
    if (Math.abs(record.amount - amount) >= 0.005) return null;
    const age = Math.floor(this.now() / 1000) - record.createdAt;
    if (age > this.opts.reuseWindowSeconds) return null;
    return { checkoutUrl: record.checkoutUrl, orderId: record.orderId, transactionId: record.transactionId, reused: true };
  }

  async getOrCreate(subjectId: string, plan: Plan, tracking: Tracking): Promise<Result<CheckoutLink>> {
    const record = await this.ledger.get(subjectId);
    if (record?.status === "OK") return fail("rejected", "already paid");
    const reuse = this.reusable(record, plan.amount);
    if (reuse) {
      log.info("checkout reused", { subjectId, orderId: reuse.orderId });
      return ok(reuse);
    }
    return this.create(subjectId, plan, tracking);
  }

  async create(subjectId: string, plan: Plan, tracking: Tracking): Promise<Result<CheckoutLink>> {
    const ms = this.now();
    const orderId = orderIdFor(subjectId, plan.amount, ms);
    const res = await this.gateway.createCheckout({
      subjectId,
      orderId,
      amount: plan.amount,
      currency: this.opts.currency,
      description: plan.label
    });
    if (!res.ok) {
      await this.ledger.recordFailure(subjectId, "gateway", describeError(res.error), {
        order_id: orderId,
        amount: plan.amount.toFixed(2)
      });
      log.warn("checkout creation failed", { subjectId, error: describeError(res.error) });
      return res;
    }

    const { sessionId, checkoutUrl, rawStatus } = res.value;
    const opened = await this.ledger.open(subjectId, {
      transactionId: sessionId,
      orderId,
      rawStatus,
      status: statusLabel(normalizeStatus(rawStatus)),
      amount: plan.amount,
      currency: this.opts.currency,
      planId: plan.id,
      planLabel: plan.label,
      checkoutUrl
    });
    if (!opened) return fail("rejected", "already paid");

    log.info("checkout created", { subjectId, orderId, plan: plan.id });
    await this.notifications.order({
      orderId,
      subjectId,
      status: "waiting_payment",
      amountInCents: Math.round(plan.amount * 100),
      currency: this.opts.currency,
      planName: plan.label,
      createdAt: new Date(ms).toISOString(),
      approvedAt: null,
      tracking
    });
    return ok({ checkoutUrl, orderId, transactionId: sessionId, reused: false });
  }
}

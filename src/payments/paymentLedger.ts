/**
 * Pending Payment Records, the pending index and the identifier map.
 *
 * Record fields ({p}payment:{subject}):
 *   transaction_id  gateway session id
 *   order_id        internal order identifier (also sent as metadata)
 *   status          OK | PENDING | failure kind
 *   raw_status      last raw status seen
 *   amount, currency, plan_id, plan_label, checkout_url
 *   created_at, last_seen_at, confirmed_at, reminded_at   unix seconds
 *   source          push | poll | verify | admin (path that confirmed)
 *
 * `confirmed_at` is the paid marker. It is only ever set with HSETNX and
 * never removed, so OK is absorbing at the storage level: `get` reports OK
 * whenever it exists, and every write of `status` re-asserts OK afterwards
 * when it does.
 */

import type { KeyValueStore } from "../ports/KeyValueStore";
import type { StoreKeys } from "../store/keys";

export interface PaymentRecord {
  subjectId: string;
  transactionId: string;
  orderId: string;
  status: string;
  rawStatus: string;
  amount: number;
  currency: string;
  planId: string;
  planLabel: string;
  checkoutUrl: string;
  createdAt: number;
  lastSeenAt: number;
  confirmedAt: number | null;
}

export interface NewPayment {
  transactionId: string;
  orderId: string;
  rawStatus: string;
  status: string;
  amount: number;
  currency: string;
  planId: string;
  planLabel: string;
  checkoutUrl: string;
}

export class PaymentLedger {
  constructor(
    private readonly store: KeyValueStore,
    private readonly keys: StoreKeys,
    private readonly now: () => number = Date.now
  ) {}

  async get(subjectId: string): Promise<PaymentRecord | null> {
    const h = await this.store.hgetall(this.keys.payment(subjectId));
    if (Object.keys(h).length === 0) return null;
    return {
      subjectId,
      transactionId: h.transaction_id ?? "",
      orderId: h.order_id ?? "",
      status: h.confirmed_at ? "OK" : h.status ?? "",
      rawStatus: h.raw_status ?? "",
      amount: Number(h.amount ?? "0"),
      currency: h.currency ?? "",
      planId: h.plan_id ?? "",
      planLabel: h.plan_label ?? "",
      checkoutUrl: h.checkout_url ?? "",
      createdAt: Number(h.created_at ?? "0"),
      lastSeenAt: Number(h.last_seen_at ?? "0"),
      confirmedAt: h.confirmed_at ? Number(h.confirmed_at) : null
    };
  }

  /**
   * Store a freshly created checkout over the previous one of the subject.
   * A confirmed record is never reopened, including one confirmed while
   * this call runs.
   */
  async open(subjectId: string, p: NewPayment): Promise<boolean> {
    const key = this.keys.payment(subjectId);
    if (await this.isConfirmed(subjectId)) return false;
    const ts = this.seconds();
    await this.store.hset(key, {
      transaction_id: p.transactionId,
      order_id: p.orderId,
      status: p.status,
      raw_status: p.rawStatus,
      amount: p.amount.toFixed(2),
      currency: p.currency,
      plan_id: p.planId,
      plan_label: p.planLabel,
      checkout_url: p.checkoutUrl,
      created_at: ts,
      last_seen_at: ts
    });
    await this.store.hdel(key, "reminded_at");
    await this.mapIdentifier(p.transactionId, subjectId);
    await this.mapIdentifier(p.orderId, subjectId);
    await this.store.sadd(this.keys.paymentPending, subjectId);
    // A confirmation that claimed after the first check leaves the record paid.
    if (await this.reassertConfirmed(subjectId)) {
      await this.store.srem(this.keys.paymentPending, subjectId);
      return false;
    }
    return true;
  }

  async recordFailure(subjectId: string, where: string, error: string, extra: Record<string, string> = {}): Promise<void> {
    const key = this.keys.paymentError(subjectId);
    await this.store.hset(key, { where, error, ts: this.seconds(), ...extra });
    await this.store.expire(key, 7 * 24 * 60 * 60);
  }

  async lastFailure(subjectId: string): Promise<Record<string, string>> {
    return this.store.hgetall(this.keys.paymentError(subjectId));
  }

  async update(subjectId: string, fields: Record<string, string>): Promise<void> {
    await this.store.hset(this.keys.payment(subjectId), fields);
  }

  /**
   * Record a non-OK status. Returns true when the record turned out to be
   * confirmed, in which case `status` is put back to OK.
   */
  async recordStatus(subjectId: string, fields: Record<string, string> & { status: string }): Promise<boolean> {
    await this.store.hset(this.keys.payment(subjectId), fields);
    return this.reassertConfirmed(subjectId);
  }

  /** Take the one-time confirmation slot. True only for the first caller. */
  claimConfirmation(subjectId: string): Promise<boolean> {
    return this.store.hsetnx(this.keys.payment(subjectId), "confirmed_at", this.seconds());
  }

  async isConfirmed(subjectId: string): Promise<boolean> {
    return (await this.store.hget(this.keys.payment(subjectId), "confirmed_at")) !== null;
  }

  private async reassertConfirmed(subjectId: string): Promise<boolean> {
    if (!(await this.isConfirmed(subjectId))) return false;
    await this.store.hset(this.keys.payment(subjectId), { status: "OK" });
    return true;
  }

  /** One checkout reminder per checkout: the record is replaced on every new checkout. */
  claimReminder(subjectId: string): Promise<boolean> {
    return this.store.hsetnx(this.keys.payment(subjectId), "reminded_at", this.seconds());
  }

  async mapIdentifier(identifier: string, subjectId: string): Promise<void> {
    if (!identifier) return;
    await this.store.hset(this.keys.identifierMap, { [identifier]: subjectId });
  }

  async resolveIdentifier(identifier: string): Promise<string | null> {
    if (!identifier) return null;
    return (await this.store.hget(this.keys.identifierMap, identifier)) || null;
  }

  addPending(subjectId: string): Promise<boolean> {
    return this.store.sadd(this.keys.paymentPending, subjectId);
  }

  removePending(subjectId: string): Promise<boolean> {
    return this.store.srem(this.keys.paymentPending, subjectId);
  }

  isPending(subjectId: string): Promise<boolean> {
    return this.store.sismember(this.keys.paymentPending, subjectId);
  }

  samplePending(count: number): Promise<string[]> {
    return this.store.srandmember(this.keys.paymentPending, count);
  }

  pendingCount(): Promise<number> {
    return this.store.scard(this.keys.paymentPending);
  }

  seconds(): string {
    return String(Math.floor(this.now() / 1000));
  }
}

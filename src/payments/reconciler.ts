/**
 * Payment reconciler.
 *
 * Push (gateway webhook), poll (pending sweep), verify (button) and admin
 * checks all end in `reconcile`. Signals for one subject may run
 * concurrently; nothing serializes them. The routine stays correct because
 * the paid marker (`confirmed_at`, HSETNX) is claimed before anything else
 * and every non-OK write re-checks it afterwards.
 *
 * Transitions
 * - OK       -> claim `confirmed_at`, record OK, mark the subject paid, drop
 *               its follow-up entry, leave the pending set; deliver access
 *               (claimed per send in the delivery record); claim winner
 *               only: analytics + funnel.
 * - FAILED   -> record the failure kind, leave the pending set. Never paid.
 * - PENDING  -> refresh raw status and last-seen time.
 * Once OK is recorded, no later signal changes the status. A non-OK signal
 * about an older checkout than the one on record is ignored; a payment on
 * an older checkout still confirms.
 */

import type { AccessDelivery } from "../delivery/accessDelivery";
import { Logger, createLogger } from "../infra/logger";
import type { NotificationDispatcher } from "../queues/notifications";
import type { RetryQueue } from "../queues/retryQueue";
import type { FollowupScheduler } from "../scheduler/followupScheduler";
import type { FunnelMetrics } from "../services/funnelMetrics";
import { type SubjectRepository, isSubjectId } from "../services/subjects";
import { describeError, isRetryable } from "../types/result";
import type { PaymentLedger, PaymentRecord } from "./paymentLedger";
import { NormalizedStatus, normalizeStatus, statusLabel } from "./statusVocabulary";

export type SignalSource = "push" | "poll" | "verify" | "admin";

export interface ReconcileInput {
  subjectId: string;
  rawStatus: string;
  transactionId?: string;
  identifiers?: string[];
  source: SignalSource;
}

export type ReconcileOutcome = "confirmed" | "already-paid" | "failed" | "pending" | "unresolved";

export interface ReconcileResult {
  outcome: ReconcileOutcome;
  subjectId: string | null;
  status: NormalizedStatus;
}

/** A normalized gateway callback. */
export interface GatewaySignal {
  eventType: string;
  rawStatus: string;
  subjectHint?: string;
  transactionId?: string;
  identifiers: string[];
}

export interface ReconcilerDeps {
  ledger: PaymentLedger;
  subjects: SubjectRepository;
  scheduler: FollowupScheduler;
  delivery: AccessDelivery;
  retry: RetryQueue;
  notifications: NotificationDispatcher;
  funnel: FunnelMetrics;
  now?: () => number;
  logger?: Logger;
}

export class PaymentReconciler {
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(private readonly deps: ReconcilerDeps) {
    this.log = deps.logger ?? createLogger("reconcile");
    this.now = deps.now ?? Date.now;
  }

  async reconcile(input: ReconcileInput): Promise<ReconcileResult> {
    const { subjectId, source } = input;
    const status = normalizeStatus(input.rawStatus);
    const { ledger } = this.deps;

    for (const id of [input.transactionId ?? "", ...(input.identifiers ?? [])]) {
      await ledger.mapIdentifier(id, subjectId);
    }

    const current = await ledger.get(subjectId);
    const seen = { raw_status: input.rawStatus, last_seen_at: ledger.seconds() };

    if (current?.status === "OK" && status.kind !== "OK") {
      await ledger.update(subjectId, { last_seen_at: seen.last_seen_at });
      return this.alreadyPaid(input);
    }

    const superseded =
      input.transactionId !== undefined && current !== null && current.transactionId !== "" && current.transactionId !== input.transactionId;
    if (superseded && status.kind !== "OK") {
      this.log.info("signal for a superseded checkout ignored", { subjectId, source, rawStatus: input.rawStatus });
      return { outcome: "pending", subjectId, status };
    }

    switch (status.kind) {
      case "OK":
        return this.confirm(input, current, status);

      case "FAILED": {
        if (await ledger.recordStatus(subjectId, { ...seen, status: statusLabel(status) })) {
          return this.alreadyPaid(input);
        }
        const wasPending = await ledger.removePending(subjectId);
        if (wasPending) await this.deps.funnel.record("payment_failed", { subjectId, reason: status.reason });
        this.log.info("payment failed", { subjectId, source, reason: status.reason });
        return { outcome: "failed", subjectId, status };
      }

      case "PENDING":
        if (current && (await ledger.recordStatus(subjectId, { ...seen, status: "PENDING" }))) {
          return this.alreadyPaid(input);
        }
        return { outcome: "pending", subjectId, status };
    }
  }

  private alreadyPaid(input: ReconcileInput): ReconcileResult {
    this.log.info("late signal ignored for paid subject", { subjectId: input.subjectId, source: input.source, rawStatus: input.rawStatus });
    return { outcome: "already-paid", subjectId: input.subjectId, status: { kind: "OK" } };
  }

  /** Subject for a callback: explicit hint first, then the identifier map. */
  async resolveSubject(hint: string | undefined, identifiers: string[]): Promise<string | null> {
    if (isSubjectId(hint)) return hint;
    for (const id of identifiers) {
      const mapped = await this.deps.ledger.resolveIdentifier(id);
      if (isSubjectId(mapped)) return mapped;
    }
    return null;
  }

  /** Push path. Unresolved callbacks are logged and acknowledged, never retried. */
  async handlePush(signal: GatewaySignal): Promise<ReconcileResult> {
    const identifiers = [signal.transactionId ?? "", ...signal.identifiers].filter((id) => id !== "");
    const subjectId = await this.resolveSubject(signal.subjectHint, identifiers);
    if (!subjectId) {
      this.log.warn("gateway callback without a known subject", { eventType: signal.eventType, identifiers });
      return { outcome: "unresolved", subjectId: null, status: normalizeStatus(signal.rawStatus) };
    }
    return this.reconcile({
      subjectId,
      rawStatus: signal.rawStatus,
      transactionId: signal.transactionId,
      identifiers: signal.identifiers,
      source: "push"
    });
  }

  private async confirm(input: ReconcileInput, current: PaymentRecord | null, status: NormalizedStatus): Promise<ReconcileResult> {
    const { subjectId, source } = input;
    const { ledger, subjects, scheduler, funnel } = this.deps;

    const first = await ledger.claimConfirmation(subjectId);
    await ledger.update(subjectId, {
      status: "OK",
      raw_status: input.rawStatus,
      last_seen_at: ledger.seconds(),
      ...(input.transactionId && !current?.transactionId ? { transaction_id: input.transactionId } : {})
    });
    await subjects.markPaid(subjectId);
    await scheduler.unschedule(subjectId);
    await ledger.removePending(subjectId);

    await this.deliver(subjectId);

    if (!first) {
      this.log.debug("confirmation already handled", { subjectId, source });
      return { outcome: "already-paid", subjectId, status };
    }

    await ledger.update(subjectId, { source });
    this.log.info("payment confirmed", { subjectId, source });
    await this.announce(subjectId, current);
    await funnel.record("payment_confirmed", { subjectId, source, amount: current?.amount });
    return { outcome: "confirmed", subjectId, status };
  }

  private async deliver(subjectId: string): Promise<void> {
    const res = await this.deps.delivery.deliverIfNeeded(subjectId);
    if (res.ok) {
      if (res.value.sentNow) await this.deps.funnel.record("access_delivered", { subjectId });
      return;
    }
    if (isRetryable(res.error)) {
      await this.deps.retry.enqueue({ sink: "delivery", payload: { subjectId } }, describeError(res.error));
    }
  }

  private async announce(subjectId: string, record: PaymentRecord | null): Promise<void> {
    const subject = await this.deps.subjects.get(subjectId);
    const tracking = subject?.tracking ?? {};
    const ms = this.now();
    const amount = record?.amount ?? 0;
    const currency = record?.currency || "GBP";
    const orderId = record?.orderId || `subject-${subjectId}`;
    const createdAt = record ? new Date(record.createdAt * 1000).toISOString() : new Date(ms).toISOString();

    await this.deps.notifications.order({
      orderId,
      subjectId,
      status: "paid",
      amountInCents: Math.round(amount * 100),
      currency,
      planName: record?.planLabel || "access",
      createdAt,
      approvedAt: new Date(ms).toISOString(),
      tracking
    });
    await this.deps.notifications.event({
      eventName: "Purchase",
      eventId: orderId,
      subjectId,
      eventTime: Math.floor(ms / 1000),
      value: amount,
      currency,
      tracking
    });
  }
}

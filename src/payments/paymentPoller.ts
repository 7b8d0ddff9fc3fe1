/**
 * Poll path of the reconciler.
 *
 * Every sweep samples up to `sample` members of the pending set and checks
 * them with at most `concurrency` gateway lookups in flight. Housekeeping on
 * the way: members that are not valid subject ids, and members without a
 * payment record, leave the set. A record already carrying a non-PENDING
 * status (e.g. written by the webhook) is reconciled without a lookup.
 */

import { Semaphore } from "../engine/semaphore";
import { pause } from "../engine/pause";
import { Logger, createLogger, errorMessage } from "../infra/logger";
import type { GatewayPort } from "../ports/GatewayPort";
import { isSubjectId } from "../services/subjects";
import { describeError } from "../types/result";
import type { PaymentLedger } from "./paymentLedger";
import type { PaymentReconciler, ReconcileResult, SignalSource } from "./reconciler";

export interface PaymentPollerOptions {
  sample: number;
  concurrency: number;
  intervalMs: number;
  idleMs: number;
  logger?: Logger;
}

export type CheckOutcome = ReconcileResult["outcome"] | "removed" | "lookup-failed";

export interface SweepReport {
  checked: number;
  outcomes: Partial<Record<CheckOutcome, number>>;
}

export class PaymentPoller {
  private readonly log: Logger;

  constructor(
    private readonly ledger: PaymentLedger,
    private readonly gateway: GatewayPort,
    private readonly reconciler: PaymentReconciler,
    private readonly opts: PaymentPollerOptions
  ) {
    this.log = opts.logger ?? createLogger("poller");
  }

  async sweep(): Promise<SweepReport> {
    const members = await this.ledger.samplePending(this.opts.sample);
    const slots = new Semaphore(this.opts.concurrency);
    const outcomes: Partial<Record<CheckOutcome, number>> = {};
    await Promise.all(
      members.map((member) =>
        slots.use(async () => {
          let outcome: CheckOutcome;
          try {
            outcome = await this.checkOne(member, "poll");
          } catch (err) {
            this.log.warn("pending check failed", { subjectId: member, error: errorMessage(err) });
            outcome = "lookup-failed";
          }
          outcomes[outcome] = (outcomes[outcome] ?? 0) + 1;
        })
      )
    );
    return { checked: members.length, outcomes };
  }

  /** One poll-path reconciliation for a single subject (verify button, admin). */
  checkSubject(subjectId: string, source: SignalSource = "verify"): Promise<CheckOutcome> {
    return this.checkOne(subjectId, source);
  }

  async run(signal: AbortSignal): Promise<void> {
    this.log.info("payment poller started", { sample: this.opts.sample, concurrency: this.opts.concurrency });
    while (!signal.aborted) {
      let checked = 0;
      try {
        const report = await this.sweep();
        checked = report.checked;
        if (checked > 0) this.log.info("pending sweep", { checked, ...report.outcomes });
      } catch (err) {
        this.log.warn("pending sweep failed", { error: errorMessage(err) });
      }
      await pause(checked === 0 ? this.opts.idleMs : this.opts.intervalMs, signal);
    }
    this.log.info("payment poller stopped");
  }

  private async checkOne(member: string, source: SignalSource): Promise<CheckOutcome> {
    if (!isSubjectId(member)) {
      await this.ledger.removePending(member);
      this.log.warn("invalid pending member removed", { member: String(member).slice(0, 80) });
      return "removed";
    }

    const record = await this.ledger.get(member);
    if (!record) {
      await this.ledger.removePending(member);
      this.log.info("pending member without payment record removed", { subjectId: member });
      return "removed";
    }

    if (record.status !== "" && record.status !== "PENDING") {
      const res = await this.reconciler.reconcile({ subjectId: member, rawStatus: record.status, source });
      return res.outcome;
    }

    if (!record.transactionId) {
      await this.ledger.removePending(member);
      this.log.info("pending record without transaction removed", { subjectId: member });
      return "removed";
    }

    const lookup = await this.gateway.queryStatus(record.transactionId);
    if (!lookup.ok) {
      this.log.warn("gateway lookup failed", { subjectId: member, error: describeError(lookup.error) });
      return "lookup-failed";
    }
    const res = await this.reconciler.reconcile({
      subjectId: member,
      rawStatus: lookup.value.rawStatus,
      transactionId: record.transactionId,
      source
    });
    return res.outcome;
  }
}

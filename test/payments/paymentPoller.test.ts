/**
 * Payment poller tests
 *
 * Goals
 * - Prove a sweep confirms subjects whose checkout the gateway reports paid.
 * - Prove housekeeping: invalid members and members without a record leave the set.
 * - Prove a failed gateway lookup keeps the subject pending for the next sweep.
 * - Prove gateway lookups never exceed the configured concurrency.
 *
 * Test strategy
 * - In-memory runtime; the noop gateway's statuses are set per session.
 */

import { describe, it, beforeEach, expect } from "vitest";
import { setTimeout as sleep } from "timers/promises";
import { PaymentPoller } from "../../src/payments/paymentPoller";
import type { GatewayPort } from "../../src/ports/GatewayPort";
import { fail, ok } from "../../src/types/result";
import { type TestRig, TEST_OFFERS, buildTestRig } from "../helpers";

let rig: TestRig;

async function openCheckout(subjectId: string): Promise<string> {
  await rig.rt.subjects.touch(subjectId, subjectId, { newCycle: true });
  const res = await rig.rt.context.checkout.getOrCreate(subjectId, TEST_OFFERS.plans[0], {});
  if (!res.ok) throw new Error(res.error.message);
  return res.value.transactionId;
}

beforeEach(() => {
  rig = buildTestRig();
});

describe("PaymentPoller.sweep", () => {
  it("confirms paid checkouts and leaves unpaid ones pending", async () => {
    const paidTx = await openCheckout("100");
    await openCheckout("200");
    rig.gateway.setStatus(paidTx, "paid");

    const report = await rig.rt.poller.sweep();

    expect(report.checked).toBe(2);
    expect(report.outcomes).toEqual({ confirmed: 1, pending: 1 });
    expect(await rig.rt.subjects.isPaid("100")).toBe(true);
    expect(await rig.rt.ledger.isPending("100")).toBe(false);
    expect(await rig.rt.ledger.isPending("200")).toBe(true);
  });

  it("removes invalid members and members without a record", async () => {
    await rig.rt.ledger.addPending("not a subject!");
    await rig.rt.ledger.addPending("300");

    const report = await rig.rt.poller.sweep();

    expect(report.outcomes).toEqual({ removed: 2 });
    expect(await rig.rt.ledger.pendingCount()).toBe(0);
  });

  it("reconciles a terminal status already on record without a lookup", async () => {
    await openCheckout("100");
    await rig.rt.ledger.update("100", { status: "EXPIRED" });

    const report = await rig.rt.poller.sweep();

    expect(report.outcomes).toEqual({ failed: 1 });
    expect(await rig.rt.ledger.isPending("100")).toBe(false);
  });

  it("keeps a subject pending when the lookup fails", async () => {
    await openCheckout("100");
    const down: GatewayPort = {
      createCheckout: rig.gateway.createCheckout,
      queryStatus: async () => fail("transient", "timeout")
    };
    const poller = new PaymentPoller(rig.rt.ledger, down, rig.rt.reconciler, { sample: 10, concurrency: 2, intervalMs: 10, idleMs: 10 });

    const report = await poller.sweep();

    expect(report.outcomes).toEqual({ "lookup-failed": 1 });
    expect(await rig.rt.ledger.isPending("100")).toBe(true);
  });

  it("bounds concurrent gateway lookups", async () => {
    for (let i = 1; i <= 6; i++) await openCheckout(String(i));
    let active = 0;
    let peak = 0;
    const slow: GatewayPort = {
      createCheckout: rig.gateway.createCheckout,
      queryStatus: async () => {
        active++;
        peak = Math.max(peak, active);
        await sleep(5);
        active--;
        return ok({ rawStatus: "unpaid" });
      }
    };
    const poller = new PaymentPoller(rig.rt.ledger, slow, rig.rt.reconciler, { sample: 10, concurrency: 2, intervalMs: 10, idleMs: 10 });

    const report = await poller.sweep();

    expect(report.checked).toBe(6);
    expect(peak).toBe(2);
  });
});

describe("PaymentPoller.checkSubject", () => {
  it("returns the reconcile outcome for one subject", async () => {
    const tx = await openCheckout("100");
    expect(await rig.rt.poller.checkSubject("100")).toBe("pending");
    rig.gateway.setStatus(tx, "paid");
    expect(await rig.rt.poller.checkSubject("100")).toBe("confirmed");
    expect(await rig.rt.poller.checkSubject("100")).toBe("already-paid");
  });
});

/**
 * Follow-up action tests
 *
 * Goals
 * - An unpaid subject without a checkout gets the discount offer once.
 * - A subject with an open checkout gets a "complete payment" nudge instead.
 * - Paid, blocked and foreign-owned subjects are skipped without using the claim.
 */

import { describe, it, beforeEach, expect } from "vitest";
import { createFollowupAction, type FollowupSkip } from "../../src/scheduler/followupAction";
import type { DueAction } from "../../src/scheduler/followupScheduler";
import { createEventHandler } from "../../src/processors/router";
import { type TestRig, buildTestRig, callbackUpdate, startUpdate } from "../helpers";

let rig: TestRig;
let action: DueAction;
let skips: Array<[string, FollowupSkip]>;

async function startAndWait(userId: number): Promise<void> {
  await createEventHandler(rig.rt.context)(startUpdate(userId));
  rig.clock.advance(360);
}

beforeEach(() => {
  rig = buildTestRig();
  skips = [];
  action = createFollowupAction(rig.rt.context, (subjectId, reason) => skips.push([subjectId, reason]));
});

describe("follow-up action", () => {
  it("offers the discount once to a subject who never bought", async () => {
    await startAndWait(5);

    expect(await rig.rt.scheduler.poll(action)).toBe(1);
    expect(await rig.rt.scheduler.poll(action)).toBe(0);

    const followups = rig.chat.sent.slice(1);
    expect(followups).toEqual([
      {
        chatId: "5",
        message: {
          text: "Still thinking? Here is 20% off any plan:",
          buttons: [[{ text: "7 days · £8.00", callbackData: "buy:week:d" }], [{ text: "lifetime · £32.00", callbackData: "buy:lifetime:d" }]]
        }
      }
    ]);
    expect((await rig.rt.funnel.counters()).followup_sent).toBe("1");
  });

  it("nudges towards the open checkout when there is one", async () => {
    await createEventHandler(rig.rt.context)(startUpdate(5));
    await createEventHandler(rig.rt.context)(callbackUpdate(5, "buy:week"));
    const url = (await rig.rt.ledger.get("5"))?.checkoutUrl;
    rig.clock.advance(360);

    await rig.rt.scheduler.poll(action);

    expect(rig.chat.sent.at(-1)?.message).toEqual({
      text: "Your payment is still open. Complete it to unlock access.",
      buttons: [[{ text: "Complete payment", url }], [{ text: "I have paid", callbackData: "pay:verify" }]]
    });
  });

  it("skips paid subjects", async () => {
    await startAndWait(5);
    await rig.rt.subjects.markPaid("5");

    await rig.rt.scheduler.poll(action);

    expect(skips).toEqual([["5", "paid"]]);
    expect(rig.chat.sent).toHaveLength(1);
    expect(await rig.rt.scheduler.firedCount("5")).toBe(0);
  });

  it("skips blocked subjects", async () => {
    await startAndWait(5);
    await rig.rt.subjects.markBlocked("5");
    await rig.rt.scheduler.poll(action);
    expect(skips).toEqual([["5", "blocked"]]);
  });

  it("leaves subjects owned by another instance alone", async () => {
    await startAndWait(5);
    await rig.store.hset(rig.rt.keys.subject("5"), { owner: "other" });
    await rig.rt.scheduler.poll(action);
    expect(skips).toEqual([["5", "foreign-owner"]]);
    expect(rig.chat.sent).toHaveLength(1);
  });
});

/**
 * Buy button: hand the subject a checkout link for the chosen plan.
 *
 * A failed checkout creation always ends in an explicit "try again"
 * message. A freshly created checkout also arms a one-time reminder.
 */

import { checkoutFailedMessage, checkoutMessage, checkoutReminderMessage, unknownPlanMessage } from "../services/copy";
import { resolvePlan } from "../services/offers";
import type { ChatEvent } from "../types/events";
import { describeError } from "../types/result";
import { HandlerContext, answer, sendTo } from "./context";

export type BuyEvent = Extract<ChatEvent, { kind: "buy" }>;

export async function handleBuy(ctx: HandlerContext, ev: BuyEvent): Promise<void> {
  const { subjectId, chatId } = ev;
  await answer(ctx, ev.callbackId);
  await ctx.subjects.touch(subjectId, chatId, { newCycle: false });

  if (await ctx.subjects.isPaid(subjectId)) {
    const res = await ctx.delivery.deliverIfNeeded(subjectId, { forceResend: true });
    if (!res.ok) ctx.log.warn("access resend on buy failed", { subjectId, error: describeError(res.error) });
    return;
  }

  const plan = resolvePlan(ctx.offers, ev.planId, ev.discounted);
  if (!plan) {
    await sendTo(ctx, subjectId, chatId, unknownPlanMessage());
    return;
  }

  const tracking = (await ctx.subjects.get(subjectId))?.tracking ?? {};
  const res = await ctx.checkout.getOrCreate(subjectId, plan, tracking);
  if (!res.ok) {
    await ctx.funnel.record("checkout_failed", { subjectId, plan: plan.id });
    await sendTo(ctx, subjectId, chatId, checkoutFailedMessage());
    return;
  }

  const link = res.value;
  await ctx.funnel.record(link.reused ? "checkout_reused" : "checkout_created", { subjectId, plan: plan.id, amount: plan.amount });
  await sendTo(ctx, subjectId, chatId, checkoutMessage(ctx.offers, plan, link.checkoutUrl));

  const delaySeconds = ctx.settings.checkoutReminderSeconds;
  if (!link.reused && delaySeconds > 0) {
    ctx.tasks.spawnDelayed("checkout-reminder", delaySeconds * 1000, async () => {
      await remindCheckout(ctx, subjectId, chatId, link.transactionId);
    });
  }
}

/** Nudge once if the same checkout is still open. */
export async function remindCheckout(ctx: HandlerContext, subjectId: string, chatId: string, transactionId: string): Promise<boolean> {
  if (await ctx.subjects.isPaid(subjectId)) return false;
  if (await ctx.subjects.isBlocked(subjectId)) return false;
  const record = await ctx.ledger.get(subjectId);
  if (!record || record.transactionId !== transactionId || record.status !== "PENDING") return false;
  if (!(await ctx.ledger.claimReminder(subjectId))) return false;
  const sent = await sendTo(ctx, subjectId, chatId, checkoutReminderMessage(record.checkoutUrl));
  if (sent) await ctx.funnel.record("checkout_reminder_sent", { subjectId });
  return sent;
}

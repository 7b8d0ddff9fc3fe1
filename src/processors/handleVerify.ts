/**
 * "I have paid": one poll-path reconciliation for this subject, then either
 * the access key (again) or a "not confirmed yet" reply.
 */

import { noCheckoutMessage, notConfirmedMessage } from "../services/copy";
import type { ChatEvent } from "../types/events";
import { describeError } from "../types/result";
import { HandlerContext, answer, sendTo } from "./context";

export type VerifyEvent = Extract<ChatEvent, { kind: "verify" }>;

export async function handleVerify(ctx: HandlerContext, ev: VerifyEvent): Promise<void> {
  const { subjectId, chatId } = ev;
  await answer(ctx, ev.callbackId);
  await ctx.funnel.record("verify_clicked", { subjectId });

  const record = await ctx.ledger.get(subjectId);
  if (!record && !(await ctx.subjects.isPaid(subjectId))) {
    await sendTo(ctx, subjectId, chatId, noCheckoutMessage(ctx.offers));
    return;
  }

  const outcome = record ? await ctx.poller.checkSubject(subjectId, "verify") : "already-paid";
  ctx.log.info("verify requested", { subjectId, outcome });

  // A first confirmation already delivered access inside the reconciler.
  if (outcome === "confirmed") return;

  if (await ctx.subjects.isPaid(subjectId)) {
    const res = await ctx.delivery.deliverIfNeeded(subjectId, { forceResend: true });
    if (!res.ok) ctx.log.warn("access resend on verify failed", { subjectId, error: describeError(res.error) });
    return;
  }

  await sendTo(ctx, subjectId, chatId, notConfirmedMessage());
}

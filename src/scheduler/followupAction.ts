/**
 * The follow-up sent when a subject's due time passes without payment.
 *
 * Subjects owned by another instance, paid or blocked subjects, and subjects
 * without a chat address are skipped. The claim is taken right before the
 * send, so a skip leaves the slot unused.
 */

import type { HandlerContext } from "../processors/context";
import { sendTo } from "../processors/context";
import { completePaymentMessage, discountOfferMessage } from "../services/copy";
import type { DueAction } from "./followupScheduler";

export type FollowupSkip = "no-subject" | "foreign-owner" | "paid" | "blocked" | "claimed";

export function createFollowupAction(ctx: HandlerContext, onSkip?: (subjectId: string, reason: FollowupSkip) => void): DueAction {
  const skip = (subjectId: string, reason: FollowupSkip): void => {
    ctx.log.debug("follow-up skipped", { subjectId, reason });
    onSkip?.(subjectId, reason);
  };

  return async ({ subjectId, claim }) => {
    const subject = await ctx.subjects.get(subjectId);
    if (!subject || !subject.chatId) return skip(subjectId, "no-subject");
    if (subject.owner !== ctx.subjects.instanceTag) return skip(subjectId, "foreign-owner");
    if (subject.paid) return skip(subjectId, "paid");
    if (await ctx.subjects.isBlocked(subjectId)) return skip(subjectId, "blocked");
    if (!(await claim())) return skip(subjectId, "claimed");

    const record = await ctx.ledger.get(subjectId);
    const message =
      record && record.status === "PENDING" && record.checkoutUrl
        ? completePaymentMessage(record.checkoutUrl)
        : discountOfferMessage(ctx.offers);
    if (await sendTo(ctx, subjectId, subject.chatId, message)) {
      await ctx.funnel.record("followup_sent", { subjectId, kind: record?.status === "PENDING" ? "complete" : "discount" });
    }
  };
}

/**
 * /start: open a new cycle for the subject.
 *
 * - Record chat address, owner tag and campaign parameters (a short token
 *   from the /r redirect resolves to the parameters stored behind it).
 * - A subject who sends /start again is reachable, so it leaves the blocked set.
 * - Paid subjects get their access again instead of offers.
 * - Everyone else: follow-up reset and scheduled, welcome message with plans.
 */

import { welcomeMessage } from "../services/copy";
import type { ChatEvent } from "../types/events";
import { describeError } from "../types/result";
import { HandlerContext, sendTo } from "./context";

export type StartEvent = Extract<ChatEvent, { kind: "start" }>;

export async function handleStart(ctx: HandlerContext, ev: StartEvent): Promise<void> {
  const { subjectId, chatId } = ev;
  const tracking = await ctx.campaigns.resolve(ev.payload);

  await ctx.subjects.touch(subjectId, chatId, { newCycle: true, tracking });
  await ctx.subjects.unblock(subjectId);
  await ctx.funnel.record("start", { subjectId });

  if (await ctx.subjects.isPaid(subjectId)) {
    const res = await ctx.delivery.deliverIfNeeded(subjectId, { forceResend: true });
    if (!res.ok) ctx.log.warn("access resend on start failed", { subjectId, error: describeError(res.error) });
    return;
  }

  await ctx.scheduler.reset(subjectId);
  await ctx.scheduler.schedule(subjectId, ctx.settings.followupDelaySeconds);
  await sendTo(ctx, subjectId, chatId, welcomeMessage(ctx.offers));
}

/**
 * Collaborators handed to every event handler and to the follow-up action.
 * Built once per process in runtime.ts.
 */

import type { AccessDelivery } from "../delivery/accessDelivery";
import type { TaskSet } from "../engine/taskSet";
import type { Logger } from "../infra/logger";
import type { PaymentLedger } from "../payments/paymentLedger";
import type { PaymentPoller } from "../payments/paymentPoller";
import type { ChatMessage, ChatPort } from "../ports/ChatPort";
import type { FollowupScheduler } from "../scheduler/followupScheduler";
import type { CheckoutService } from "../services/checkout";
import type { FunnelMetrics } from "../services/funnelMetrics";
import type { Offers } from "../services/offers";
import type { SubjectRepository } from "../services/subjects";
import type { CampaignTokens } from "../services/tracking";
import { describeError } from "../types/result";

export interface HandlerSettings {
  followupDelaySeconds: number;
  checkoutReminderSeconds: number;
}

export interface HandlerContext {
  subjects: SubjectRepository;
  scheduler: FollowupScheduler;
  ledger: PaymentLedger;
  checkout: CheckoutService;
  poller: PaymentPoller;
  delivery: AccessDelivery;
  chat: ChatPort;
  funnel: FunnelMetrics;
  campaigns: CampaignTokens;
  offers: Offers;
  /** Delayed in-process actions (checkout reminders). */
  tasks: TaskSet;
  settings: HandlerSettings;
  log: Logger;
}

/**
 * Send to a subject. A `blocked` failure marks the subject blocked and drops
 * its follow-up entry. Returns whether the platform accepted the message.
 */
export async function sendTo(ctx: HandlerContext, subjectId: string, chatId: string, message: ChatMessage): Promise<boolean> {
  const res = await ctx.chat.sendMessage(chatId, message);
  if (res.ok) return true;
  if (res.error.kind === "blocked") {
    await ctx.subjects.markBlocked(subjectId);
    await ctx.scheduler.unschedule(subjectId);
    await ctx.funnel.record("subject_blocked", { subjectId });
  }
  ctx.log.warn("chat send failed", { subjectId, error: describeError(res.error) });
  return false;
}

export async function answer(ctx: HandlerContext, callbackId: string): Promise<void> {
  const res = await ctx.chat.answerCallback(callbackId);
  if (!res.ok) ctx.log.debug("callback answer failed", { error: describeError(res.error) });
}

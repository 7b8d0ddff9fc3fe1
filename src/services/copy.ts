/**
 * Message builders for every text the service sends.
 */

import type { ChatButton, ChatMessage } from "../ports/ChatPort";
import { Offers, Plan, discounted } from "./offers";

export const VERIFY_CALLBACK = "pay:verify";

export function buyCallback(plan: Plan, withDiscount: boolean): string {
  return withDiscount ? `buy:${plan.id}:d` : `buy:${plan.id}`;
}

export function formatAmount(offers: Offers, amount: number): string {
  return `${offers.currencySymbol}${amount.toFixed(2)}`;
}

function planRows(offers: Offers, withDiscount: boolean): ChatButton[][] {
  return offers.plans.map((base) => {
    const plan = withDiscount ? discounted(base, offers.followupDiscount) : base;
    return [{ text: `${plan.label} · ${formatAmount(offers, plan.amount)}`, callbackData: buyCallback(base, withDiscount) }];
  });
}

export function welcomeMessage(offers: Offers): ChatMessage {
  return { text: "Welcome! Pick a plan to get access:", buttons: planRows(offers, false) };
}

export function checkoutMessage(offers: Offers, plan: Plan, checkoutUrl: string): ChatMessage {
  return {
    text: `Your ${plan.label} plan: ${formatAmount(offers, plan.amount)}.\nPay securely with the link below, then tap "I have paid".`,
    buttons: [[{ text: "Pay now", url: checkoutUrl }], [{ text: "I have paid", callbackData: VERIFY_CALLBACK }]]
  };
}

export function checkoutFailedMessage(): ChatMessage {
  return { text: "We could not create your payment link right now. Please try again in a moment." };
}

export function completePaymentMessage(checkoutUrl: string): ChatMessage {
  return {
    text: "Your payment is still open. Complete it to unlock access.",
    buttons: [[{ text: "Complete payment", url: checkoutUrl }], [{ text: "I have paid", callbackData: VERIFY_CALLBACK }]]
  };
}

export function discountOfferMessage(offers: Offers): ChatMessage {
  const pct = Math.round(offers.followupDiscount * 100);
  return { text: `Still thinking? Here is ${pct}% off any plan:`, buttons: planRows(offers, true) };
}

export function checkoutReminderMessage(checkoutUrl: string): ChatMessage {
  return {
    text: "Your payment link is waiting for you.",
    buttons: [[{ text: "Complete payment", url: checkoutUrl }], [{ text: "I have paid", callbackData: VERIFY_CALLBACK }]]
  };
}

export function notConfirmedMessage(): ChatMessage {
  return { text: "We have not received your payment confirmation yet. Try again in a minute." };
}

export function noCheckoutMessage(offers: Offers): ChatMessage {
  return { text: "There is no open payment for you yet. Pick a plan:", buttons: planRows(offers, false) };
}

export function accessMessage(portalLink: string, accessKey: string): ChatMessage {
  return { text: `Payment confirmed, thank you!\n\nOpen: ${portalLink}\nKey: ${accessKey}` };
}

export function unknownPlanMessage(): ChatMessage {
  return { text: "That offer is no longer available. Send /start to see current plans." };
}

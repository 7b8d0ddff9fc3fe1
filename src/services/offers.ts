/**
 * Offer catalogue, read once from config/offers.json.
 */

import { readFileSync } from "fs";
import path from "path";
import { z } from "zod";

export const PlanSchema = z.object({
  id: z.string().regex(/^[a-z0-9_-]+$/),
  label: z.string().min(1),
  amount: z.number().positive(),
  days: z.number().int().positive().nullable()
});
export type Plan = z.infer<typeof PlanSchema>;

export const OffersSchema = z.object({
  currency: z.string().length(3),
  currencySymbol: z.string().min(1),
  followupDiscount: z.number().min(0).lt(1),
  plans: z.array(PlanSchema).min(1)
});
export type Offers = z.infer<typeof OffersSchema>;

export const DEFAULT_OFFERS_PATH = path.join(__dirname, "..", "..", "config", "offers.json");

export function loadOffers(file: string = DEFAULT_OFFERS_PATH): Offers {
  const parsed = OffersSchema.safeParse(JSON.parse(readFileSync(file, "utf8")));
  if (!parsed.success) {
    throw new Error(`Invalid offers file ${file}: ${parsed.error.issues.map((i) => i.message).join("; ")}`);
  }
  return parsed.data;
}

/** Round to cents. */
export function roundAmount(amount: number): number {
  return Math.round(amount * 100) / 100;
}

export function discounted(plan: Plan, discount: number): Plan {
  return { ...plan, amount: roundAmount(plan.amount * (1 - discount)) };
}

/**
 * Resolve the plan a buy button refers to. Amounts always come from the
 * catalogue; the button only names the plan and whether the follow-up
 * discount applies.
 */
export function resolvePlan(offers: Offers, planId: string, withDiscount: boolean): Plan | undefined {
  const plan = offers.plans.find((p) => p.id === planId);
  if (!plan) return undefined;
  return withDiscount ? discounted(plan, offers.followupDiscount) : plan;
}
